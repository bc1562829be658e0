import { readFileSync } from 'node:fs';
import path from 'node:path';

import type { Parser } from 'peggy';
import { generate } from 'peggy';

import { createDiagnostic, HclSyntaxError } from './errors';
import type { SourcePosition, SourceRange, TokenValue } from './model';
import { isTokenType, Token } from './model';
import { ParsedDocument } from './ParsedDocument';

const GRAMMAR_PATH = path.join(__dirname, '..', 'grammar', 'terragrunt.peggy');

let compiledGrammar: Parser | undefined;

const getGrammar = (): Parser => {
	if (!compiledGrammar) {
		compiledGrammar = generate(readFileSync(GRAMMAR_PATH, 'utf8'), {
			output: 'parser',
			allowedStartRules: ['ConfigFile', 'TemplateContent'],
			grammarSource: GRAMMAR_PATH
		});
	}
	return compiledGrammar;
};

interface RawNode {
	type: string;
	value: TokenValue;
	location: SourceRange;
	children: unknown[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const isPosition = (value: unknown): value is SourcePosition =>
	isRecord(value) &&
	typeof value.offset === 'number' &&
	typeof value.line === 'number' &&
	typeof value.column === 'number';

const isRange = (value: unknown): value is SourceRange =>
	isRecord(value) && isPosition(value.start) && isPosition(value.end);

const isTokenValue = (value: unknown): value is TokenValue =>
	value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const isRawNode = (value: unknown): value is RawNode =>
	isRecord(value) &&
	typeof value.type === 'string' &&
	isTokenValue(value.value) &&
	isRange(value.location) &&
	Array.isArray(value.children);

/** Removes the common leading whitespace of an indented heredoc. */
const stripIndent = (text: string): string => {
	const lines = text.split('\n');
	let indent = Infinity;
	for (const line of lines) {
		if (line.trim() === '') continue;
		const leading = /^[ \t]*/.exec(line);
		indent = Math.min(indent, leading ? leading[0].length : 0);
	}
	if (indent === Infinity || indent === 0) return text;
	return lines.map(line => line.slice(Math.min(indent, line.length - line.trimStart().length))).join('\n');
};

/** Offset of the first byte that does not continue a valid UTF-8 sequence. */
const invalidByteOffset = (bytes: Uint8Array): number => {
	const decoder = new TextDecoder('utf-8', { fatal: true });
	for (let offset = 0; offset < bytes.length; offset++) {
		try {
			decoder.decode(bytes.subarray(offset, offset + 1), { stream: true });
		} catch (error) {
			if (error instanceof TypeError) return offset;
			throw error;
		}
	}
	return bytes.length;
};

const positionAt = (bytes: Uint8Array, offset: number): SourcePosition => {
	const before = new TextDecoder().decode(bytes.subarray(0, offset));
	const lines = before.split('\n');
	return { offset, line: lines.length, column: lines[lines.length - 1].length + 1 };
};

/**
 * Turns raw bytes into a ParsedDocument. The filename is attached to every
 * token location and every diagnostic, so re-parses of rewritten bytes keep
 * reporting against the same source name.
 */
export class DocumentParser {
	private nextId = 0;

	constructor(private readonly filename: string) { }

	public parse(input: Uint8Array | string): ParsedDocument {
		const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
		const content = typeof input === 'string' ? input : this.decode(input);
		this.nextId = 0;

		const root = this.createToken(this.runParser(content, 'ConfigFile'), null);
		return new ParsedDocument(this.filename, bytes, content, root);
	}

	private decode(bytes: Uint8Array): string {
		try {
			return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
		} catch (error) {
			if (!(error instanceof TypeError)) throw error;
			const position = positionAt(bytes, invalidByteOffset(bytes));
			const location: SourceRange = { source: this.filename, start: position, end: position };
			throw new HclSyntaxError(`${this.filename} is not valid UTF-8`, [
				createDiagnostic(
					location,
					'Invalid character encoding',
					'All input files must be UTF-8 encoded. Ensure that UTF-8 encoding is selected in your editor.',
					'SyntaxError'
				)
			]);
		}
	}

	private runParser(content: string, startRule: 'ConfigFile' | 'TemplateContent'): RawNode {
		const grammar = getGrammar();
		let result: unknown;
		try {
			result = grammar.parse(content, { startRule, grammarSource: this.filename });
		} catch (error) {
			if (error instanceof grammar.SyntaxError) {
				const location: SourceRange = {
					source: this.filename,
					start: error.location.start,
					end: error.location.end
				};
				throw new HclSyntaxError(error.message, [
					createDiagnostic(location, 'Invalid configuration syntax', error.message, 'SyntaxError')
				]);
			}
			throw error;
		}

		if (!isRawNode(result)) {
			throw new HclSyntaxError(`parser produced an unexpected result for ${this.filename}`, []);
		}
		return result;
	}

	private createToken(node: RawNode, parent: Token | null, relocateTo?: SourceRange): Token {
		if (!isTokenType(node.type)) {
			throw new HclSyntaxError(`unknown syntax node "${node.type}" in ${this.filename}`, []);
		}

		const location = relocateTo ?? { ...node.location, source: this.filename };
		const token = new Token(this.nextId++, node.type, node.value, location);
		token.parent = parent;

		for (const child of node.children) {
			if (!isRawNode(child)) {
				throw new HclSyntaxError(`malformed syntax tree in ${this.filename}`, []);
			}
			token.children.push(this.createToken(child, token, relocateTo));
		}

		if (token.type === 'heredoc' || token.type === 'indented_heredoc') {
			this.attachHeredocTemplate(token);
		}

		return token;
	}

	/**
	 * Heredoc bodies are parsed a second time as template content. Positions
	 * inside that parse are relative to the heredoc text, so the resulting
	 * tokens report the location of the whole heredoc instead.
	 */
	private attachHeredocTemplate(token: Token): void {
		const raw = typeof token.value === 'string' ? token.value : '';
		const text = token.type === 'indented_heredoc' ? stripIndent(raw) : raw;
		token.value = text;
		token.children = [this.createToken(this.runParser(text, 'TemplateContent'), token, token.location)];
	}
}

export const parseDocument = (input: Uint8Array | string, filename: string): ParsedDocument =>
	new DocumentParser(filename).parse(input);
