import type { Diagnostic } from 'vscode-languageserver-types';

import type { EvalContext } from './EvalContext';
import { ConfigError, createDiagnostic, DecodeError } from './errors';
import { ExpressionEvaluator } from './ExpressionEvaluator';
import type { SourceRange, Token } from './model';
import { getBlockBody, getBlockLabels } from './ParsedDocument';
import { convertValue } from './values/convert';
import type { ValueType } from './values/types';
import type { Value } from './values/values';

export interface AttributeSpec {
	name: string;
	type: ValueType;
	required?: boolean;
}

export interface BlockSpec {
	type: string;
	labels: string[];
	/** Body schema; an opaque block keeps its body undecoded. */
	body: BodySpec | 'opaque';
	/** Several blocks of this type may appear; otherwise at most one. */
	multiple?: boolean;
}

export interface BodySpec {
	attributes: AttributeSpec[];
	blocks: BlockSpec[];
	/** Collect unlisted content instead of rejecting it. */
	remain?: boolean;
}

export interface DecodedBlock {
	type: string;
	labels: string[];
	token: Token;
	/** Undefined for opaque blocks. */
	body?: DecodedBody;
}

export interface DecodedBody {
	attributes: Map<string, Value>;
	blocks: Map<string, DecodedBlock[]>;
	/** Items the schema did not claim, left unevaluated. */
	remain: Token[];
}

const describeRange = (range: SourceRange): string =>
	`${range.source}:${range.start.line},${range.start.column}`;

/**
 * Decodes a body against a schema, evaluating attribute expressions with the
 * given context. Every problem found is collected; the decode fails once,
 * at the end, with all of them.
 */
export class BodyDecoder {
	private diagnostics: Diagnostic[] = [];
	private evaluator: ExpressionEvaluator;

	constructor(context: EvalContext) {
		this.evaluator = new ExpressionEvaluator(context);
	}

	public async decode(items: Token[], spec: BodySpec, owner: SourceRange): Promise<DecodedBody> {
		this.diagnostics = [];
		const body = await this.decodeBody(items, spec, owner);
		if (this.diagnostics.length > 0) {
			throw new DecodeError(this.diagnostics);
		}
		return body;
	}

	private report(location: SourceRange, summary: string, detail: string): void {
		this.diagnostics.push(createDiagnostic(location, summary, detail, 'DecodeError'));
	}

	private async decodeBody(items: Token[], spec: BodySpec, owner: SourceRange): Promise<DecodedBody> {
		const body: DecodedBody = { attributes: new Map(), blocks: new Map(), remain: [] };
		const seenAttributes = new Map<string, Token>();

		for (const item of items) {
			const name = item.getDisplayText();

			if (item.type === 'attribute') {
				const attributeSpec = spec.attributes.find(attribute => attribute.name === name);
				if (!attributeSpec) {
					if (spec.remain) body.remain.push(item);
					else this.report(item.location, 'Unsupported argument', `An argument named "${name}" is not expected here.`);
					continue;
				}

				const previous = seenAttributes.get(name);
				if (previous) {
					this.report(
						item.location,
						'Attribute redefined',
						`The argument "${name}" was already set at ${describeRange(previous.location)}. Each argument may be set only once.`
					);
					continue;
				}
				seenAttributes.set(name, item);

				const value = await this.decodeAttribute(item, attributeSpec);
				if (value !== undefined) {
					body.attributes.set(name, value);
				}
				continue;
			}

			if (item.type === 'block') {
				const blockSpec = spec.blocks.find(block => block.type === name);
				if (!blockSpec) {
					if (spec.remain) body.remain.push(item);
					else this.report(item.location, 'Unsupported block type', `Blocks of type "${name}" are not expected here.`);
					continue;
				}

				const existing = body.blocks.get(name) ?? [];
				if (!blockSpec.multiple && existing.length > 0) {
					this.report(
						item.location,
						`Duplicate ${name} block`,
						`Only one ${name} block is allowed. Another was defined at ${describeRange(existing[0].token.location)}.`
					);
					continue;
				}

				const block = await this.decodeBlock(item, blockSpec);
				if (block) {
					body.blocks.set(name, [...existing, block]);
				}
			}
		}

		for (const attributeSpec of spec.attributes) {
			if (attributeSpec.required && !seenAttributes.has(attributeSpec.name)) {
				this.report(
					owner,
					'Missing required argument',
					`The argument "${attributeSpec.name}" is required, but no definition was found.`
				);
			}
		}

		return body;
	}

	private async decodeBlock(token: Token, spec: BlockSpec): Promise<DecodedBlock | undefined> {
		const labels = getBlockLabels(token);
		const labelNames = spec.labels.join(', ');

		if (labels.length < spec.labels.length) {
			this.report(
				token.location,
				`Missing name for ${spec.type}`,
				`All ${spec.type} blocks must have ${spec.labels.length} labels (${labelNames}).`
			);
			return undefined;
		}
		if (labels.length > spec.labels.length) {
			this.report(
				labels[spec.labels.length].location,
				`Extraneous label for ${spec.type}`,
				spec.labels.length === 0
					? `No labels are expected for ${spec.type} blocks.`
					: `Only ${spec.labels.length} labels (${labelNames}) are expected for ${spec.type} blocks.`
			);
			return undefined;
		}

		const decoded: DecodedBlock = {
			type: spec.type,
			labels: labels.map(label => label.getDisplayText()),
			token
		};
		if (spec.body !== 'opaque') {
			const items = getBlockBody(token)?.children ?? [];
			decoded.body = await this.decodeBody(items, spec.body, token.location);
		}
		return decoded;
	}

	private async decodeAttribute(token: Token, spec: AttributeSpec): Promise<Value | undefined> {
		const [expression] = token.children;
		let value: Value;
		try {
			value = await this.evaluator.evaluate(expression);
		} catch (error) {
			if (error instanceof DecodeError) {
				this.diagnostics.push(...error.diagnostics);
				return undefined;
			}
			throw error;
		}

		if (value.type === 'null' && spec.type.kind !== 'dynamic') {
			if (spec.required) {
				this.report(
					expression.location,
					'Invalid attribute value',
					`The argument "${spec.name}" is required, but the given value is null.`
				);
			}
			return undefined;
		}

		try {
			return convertValue(value, spec.type);
		} catch (error) {
			if (error instanceof ConfigError) {
				this.report(
					expression.location,
					'Incorrect attribute value type',
					`Inappropriate value for attribute "${spec.name}": ${error.message}.`
				);
				return undefined;
			}
			throw error;
		}
	}
}

export const decodeBody = (items: Token[], spec: BodySpec, owner: SourceRange, context: EvalContext): Promise<DecodedBody> =>
	new BodyDecoder(context).decode(items, spec, owner);
