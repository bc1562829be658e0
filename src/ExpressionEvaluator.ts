import type { EvalContext } from './EvalContext';
import { ConfigError, DecodeError } from './errors';
import type { Token } from './model';
import { convertValue } from './values/convert';
import type { ValueType } from './values/types';
import { friendlyName, Types } from './values/types';
import type { Value } from './values/values';
import {
	isMapping,
	isSequence,
	makeBool,
	makeNull,
	makeNumber,
	makeObject,
	makeString,
	makeTuple,
	makeUnknown,
	sortedEntries,
	typeOf,
	valueEquals
} from './values/values';

const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error);

const isDecodeError = (error: unknown): error is DecodeError => error instanceof DecodeError;

const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/', '%']);
const COMPARISON_OPERATORS = new Set(['<', '<=', '>', '>=']);
const LOGICAL_OPERATORS = new Set(['&&', '||']);

/** One item of a `for` expression's collection. */
interface IterationItem {
	key: Value;
	value: Value;
}

/**
 * Evaluates expression tokens against an evaluation context. Local scopes are
 * introduced by `for` expressions and directives; every other name comes from
 * the context's variables.
 */
export class ExpressionEvaluator {
	constructor(
		private readonly context: EvalContext,
		private readonly locals: ReadonlyMap<string, Value> = new Map()
	) { }

	public async evaluate(node: Token): Promise<Value> {
		switch (node.type) {
			case 'number_lit': {
				return makeNumber(Number(node.value));
			}
			case 'boolean_lit': {
				return makeBool(node.value === true);
			}
			case 'null_lit': {
				return makeNull();
			}
			case 'template': {
				return this.evaluateTemplate(node);
			}
			case 'heredoc':
			case 'indented_heredoc': {
				const template = node.findChild('template');
				return template ? this.evaluateTemplate(template) : makeString(node.getDisplayText());
			}
			case 'tuple': {
				const elements: Value[] = [];
				for (const child of node.children) {
					elements.push(await this.evaluate(child));
				}
				return makeTuple(elements);
			}
			case 'object': {
				return this.evaluateObject(node);
			}
			case 'variable': {
				return this.lookupVariable(node);
			}
			case 'traversal': {
				const [base, ...operators] = node.children;
				return this.applyTraversal(await this.evaluate(base), operators);
			}
			case 'function_call': {
				return this.evaluateFunctionCall(node);
			}
			case 'for_tuple':
			case 'for_object': {
				return this.evaluateFor(node);
			}
			case 'conditional': {
				return this.evaluateConditional(node);
			}
			case 'binary_expression': {
				return this.evaluateBinary(node);
			}
			case 'unary_expression': {
				return this.evaluateUnary(node);
			}
			default: {
				throw DecodeError.at(node.location, 'Invalid expression', `A ${node.type} cannot be used as an expression.`);
			}
		}
	}

	private withLocals(bindings: Iterable<[string, Value]>): ExpressionEvaluator {
		const locals = new Map(this.locals);
		for (const [name, value] of bindings) {
			locals.set(name, value);
		}
		return new ExpressionEvaluator(this.context, locals);
	}

	private lookupVariable(node: Token): Value {
		const name = node.getDisplayText();
		const value = this.locals.get(name) ?? this.context.variables.get(name);
		if (value === undefined) {
			throw DecodeError.at(node.location, 'Unknown variable', `There is no variable named "${name}".`);
		}
		return value;
	}

	// Templates

	private async evaluateTemplate(node: Token): Promise<Value> {
		const [only] = node.children;
		// A template of a single interpolation yields the value itself, not its string form
		if (node.children.length === 1 && only.type === 'interpolation') {
			return this.evaluate(only.children[0]);
		}
		const rendered = await this.renderTemplate(node);
		return rendered === undefined ? makeUnknown(Types.string) : makeString(rendered);
	}

	/** Renders template parts; undefined when any interpolated value is unknown. */
	private async renderTemplate(node: Token): Promise<string | undefined> {
		let result = '';
		let known = true;

		for (const part of node.children) {
			switch (part.type) {
				case 'string_content': {
					result += part.getDisplayText();
					break;
				}
				case 'interpolation': {
					const text = this.interpolationText(part, await this.evaluate(part.children[0]));
					if (text === undefined) known = false;
					else result += text;
					break;
				}
				case 'if_directive': {
					const [conditionNode, whenTrue, whenFalse] = part.children;
					const condition = this.requireBool(conditionNode, await this.evaluate(conditionNode));
					if (condition === undefined) {
						known = false;
						break;
					}
					const text = await this.renderTemplate(condition ? whenTrue : whenFalse);
					if (text === undefined) known = false;
					else result += text;
					break;
				}
				case 'for_directive': {
					const text = await this.renderForDirective(part);
					if (text === undefined) known = false;
					else result += text;
					break;
				}
				default: {
					throw DecodeError.at(part.location, 'Invalid template', `Unexpected ${part.type} in template.`);
				}
			}
		}

		return known ? result : undefined;
	}

	private interpolationText(node: Token, value: Value): string | undefined {
		if (value.type === 'unknown') return undefined;
		if (value.type === 'null') {
			throw DecodeError.at(
				node.location,
				'Invalid template interpolation value',
				'The expression result is null. Cannot include a null value in a string template.'
			);
		}
		if (isSequence(value) || isMapping(value)) {
			throw DecodeError.at(
				node.location,
				'Invalid template interpolation value',
				`Cannot include the given value in a string template: string required, got ${friendlyName(typeOf(value))}.`
			);
		}
		const converted = convertValue(value, Types.string);
		return converted.type === 'string' ? converted.value : undefined;
	}

	private async renderForDirective(node: Token): Promise<string | undefined> {
		const body = node.findChild('template');
		const collection = node.findChild('for_collection');
		if (!body || !collection) {
			throw DecodeError.at(node.location, 'Invalid template', 'Incomplete for directive.');
		}

		const items = await this.iterationItems(collection);
		if (items === undefined) return undefined;

		let result = '';
		for (const item of items) {
			const text = await this.withLocals(this.forBindings(node, item)).renderTemplate(body);
			if (text === undefined) return undefined;
			result += text;
		}
		return result;
	}

	// Collections

	private async evaluateObject(node: Token): Promise<Value> {
		const attributes = new Map<string, Value>();
		for (const item of node.children) {
			const [keyNode, valueNode] = item.children;
			const key = keyNode.type === 'object_key'
				? keyNode.getDisplayText()
				: this.requireKey(keyNode, await this.evaluate(keyNode));
			if (key === undefined) {
				return makeUnknown(Types.dynamic);
			}
			attributes.set(key, await this.evaluate(valueNode));
		}
		return makeObject(attributes);
	}

	private requireKey(node: Token, value: Value): string | undefined {
		if (value.type === 'unknown') return undefined;
		if (value.type === 'null') {
			throw DecodeError.at(node.location, 'Invalid object key', 'Key expression result must not be null.');
		}
		try {
			const converted = convertValue(value, Types.string);
			return converted.type === 'string' ? converted.value : undefined;
		} catch (error) {
			throw DecodeError.at(node.location, 'Invalid object key', `The key expression produced an invalid result: ${errorMessage(error)}.`);
		}
	}

	// Traversals

	private async applyTraversal(start: Value, operators: Token[]): Promise<Value> {
		let value = start;
		for (const [index, operator] of operators.entries()) {
			if (operator.type === 'attr_splat' || operator.type === 'full_splat') {
				return this.applySplat(value, operators.slice(index + 1));
			}
			value = await this.applyOperator(value, operator);
		}
		return value;
	}

	/** Applies the remaining operators to every element. */
	private async applySplat(value: Value, rest: Token[]): Promise<Value> {
		if (value.type === 'unknown') return makeUnknown(Types.dynamic);
		if (value.type === 'null') return makeTuple([]);
		const elements = isSequence(value) ? value.value : [value];
		const results: Value[] = [];
		for (const element of elements) {
			results.push(await this.applyTraversal(element, rest));
		}
		return makeTuple(results);
	}

	private async applyOperator(value: Value, operator: Token): Promise<Value> {
		switch (operator.type) {
			case 'get_attr': {
				return this.getAttribute(value, operator.getDisplayText(), operator);
			}
			case 'legacy_index': {
				return this.index(value, makeNumber(Number(operator.value)), operator);
			}
			case 'index': {
				return this.index(value, await this.evaluate(operator.children[0]), operator);
			}
			default: {
				throw DecodeError.at(operator.location, 'Invalid traversal', `Unexpected ${operator.type}.`);
			}
		}
	}

	private getAttribute(value: Value, name: string, node: Token): Value {
		switch (value.type) {
			case 'unknown': {
				return makeUnknown(Types.dynamic);
			}
			case 'null': {
				throw DecodeError.at(node.location, 'Attempt to get attribute from null value', 'This value is null, so it does not have any attributes.');
			}
			case 'object': {
				const attribute = value.value.get(name);
				if (attribute === undefined) {
					throw DecodeError.at(node.location, 'Unsupported attribute', `This object does not have an attribute named "${name}".`);
				}
				return attribute;
			}
			case 'map': {
				const element = value.value.get(name);
				if (element === undefined) {
					throw DecodeError.at(node.location, 'Missing map element', `This map does not have an element with the key "${name}".`);
				}
				return element;
			}
			default: {
				throw DecodeError.at(
					node.location,
					'Unsupported attribute',
					`Can't access attributes on a value of type ${friendlyName(typeOf(value))}.`
				);
			}
		}
	}

	private index(collection: Value, key: Value, node: Token): Value {
		if (collection.type === 'unknown' || key.type === 'unknown') {
			return makeUnknown(Types.dynamic);
		}
		if (collection.type === 'null') {
			throw DecodeError.at(node.location, 'Attempt to index null value', 'This value is null, so it does not have any indices.');
		}
		if (key.type === 'null') {
			throw DecodeError.at(node.location, 'Invalid index', 'Can\'t use a null value as an indexing key.');
		}

		if (collection.type === 'set') {
			throw DecodeError.at(
				node.location,
				'Invalid index',
				'Elements of a set are identified only by their value and don\'t have any separate index or key to select with.'
			);
		}

		if (isSequence(collection)) {
			const position = this.convertOrFail(key, Types.number, node, 'Invalid index');
			const element = position.type === 'number' && Number.isInteger(position.value)
				? collection.value[position.value]
				: undefined;
			if (element === undefined) {
				throw DecodeError.at(node.location, 'Invalid index', 'The given key does not identify an element in this collection value.');
			}
			return element;
		}

		if (isMapping(collection)) {
			const name = this.convertOrFail(key, Types.string, node, 'Invalid index');
			const element = name.type === 'string' ? collection.value.get(name.value) : undefined;
			if (element === undefined) {
				throw DecodeError.at(node.location, 'Invalid index', 'The given key does not identify an element in this collection value.');
			}
			return element;
		}

		throw DecodeError.at(
			node.location,
			'Invalid index',
			`This value does not have any indices: ${friendlyName(typeOf(collection))} cannot be indexed.`
		);
	}

	// Function calls

	private async evaluateFunctionCall(node: Token): Promise<Value> {
		const name = node.getDisplayText();
		if (!this.context.functions.hasFunction(name)) {
			throw DecodeError.at(node.location, 'Call to unknown function', `There is no function named "${name}".`);
		}

		const argumentNodes = node.children.filter(child => child.type !== 'expand_final');
		const expandFinal = node.findChild('expand_final') !== undefined;
		const args: Value[] = [];
		for (const argument of argumentNodes) {
			args.push(await this.evaluate(argument));
		}

		if (expandFinal) {
			const last = args.pop();
			if (last === undefined || !isSequence(last)) {
				throw DecodeError.at(node.location, 'Invalid expanding argument value', 'The expanding argument (indicated by ...) must be a list or tuple.');
			}
			args.push(...last.value);
		}

		if (args.some(arg => arg.type === 'unknown')) {
			return makeUnknown(Types.dynamic);
		}

		try {
			return await this.context.functions.evaluateFunction(name, args, this.context.functionContext);
		} catch (error) {
			if (isDecodeError(error)) throw error;
			throw DecodeError.at(node.location, 'Error in function call', `Call to function "${name}" failed: ${errorMessage(error)}.`);
		}
	}

	// For expressions

	private async iterationItems(collectionNode: Token): Promise<IterationItem[] | undefined> {
		const expression = collectionNode.children[0];
		const collection = await this.evaluate(expression);

		if (collection.type === 'unknown') return undefined;
		if (collection.type === 'null') {
			throw DecodeError.at(expression.location, 'Iteration over null value', 'A null value cannot be used as the collection in a \'for\' expression.');
		}
		if (isSequence(collection)) {
			return collection.value.map((value, i) => ({
				key: collection.type === 'set' ? value : makeNumber(i),
				value
			}));
		}
		if (isMapping(collection)) {
			return sortedEntries(collection).map(([key, value]) => ({ key: makeString(key), value }));
		}
		throw DecodeError.at(
			expression.location,
			'Iteration over non-iterable value',
			`A value of type ${friendlyName(typeOf(collection))} cannot be used as the collection in a 'for' expression.`
		);
	}

	private forBindings(node: Token, item: IterationItem): [string, Value][] {
		const bindings: [string, Value][] = [];
		const keyVariable = node.findChild('key_variable');
		const valueVariable = node.findChild('value_variable');
		if (keyVariable) bindings.push([keyVariable.getDisplayText(), item.key]);
		if (valueVariable) bindings.push([valueVariable.getDisplayText(), item.value]);
		return bindings;
	}

	private async evaluateFor(node: Token): Promise<Value> {
		const collection = node.findChild('for_collection');
		const valueNode = node.findChild('for_value');
		if (!collection || !valueNode) {
			throw DecodeError.at(node.location, 'Invalid \'for\' expression', 'Incomplete for expression.');
		}
		const keyNode = node.findChild('for_key');
		const conditionNode = node.findChild('for_condition');
		const grouping = node.findChild('for_grouping') !== undefined;

		const items = await this.iterationItems(collection);
		if (items === undefined) return makeUnknown(Types.dynamic);

		const elements: Value[] = [];
		const attributes = new Map<string, Value>();
		const groups = new Map<string, Value[]>();

		for (const item of items) {
			const scope = this.withLocals(this.forBindings(node, item));

			if (conditionNode) {
				const expression = conditionNode.children[0];
				const include = scope.requireBool(expression, await scope.evaluate(expression));
				if (include === undefined) return makeUnknown(Types.dynamic);
				if (!include) continue;
			}

			const value = await scope.evaluate(valueNode.children[0]);
			if (node.type === 'for_tuple') {
				elements.push(value);
				continue;
			}

			if (!keyNode) {
				throw DecodeError.at(node.location, 'Invalid \'for\' expression', 'Key expression is required when building an object.');
			}
			const key = scope.requireKey(keyNode.children[0], await scope.evaluate(keyNode.children[0]));
			if (key === undefined) return makeUnknown(Types.dynamic);

			if (grouping) {
				groups.set(key, [...(groups.get(key) ?? []), value]);
				continue;
			}
			if (attributes.has(key)) {
				throw DecodeError.at(
					keyNode.location,
					'Duplicate object key',
					`Two different items produced the key "${key}" in this 'for' expression. If duplicate keys are expected, use the ellipsis (...) after the value expression to enable grouping by key.`
				);
			}
			attributes.set(key, value);
		}

		if (node.type === 'for_tuple') {
			return makeTuple(elements);
		}
		if (grouping) {
			const grouped = new Map<string, Value>();
			for (const [key, values] of groups) {
				grouped.set(key, makeTuple(values));
			}
			return makeObject(grouped);
		}
		return makeObject(attributes);
	}

	// Operators

	private requireBool(node: Token, value: Value): boolean | undefined {
		if (value.type === 'unknown') return undefined;
		if (value.type === 'null') {
			throw DecodeError.at(node.location, 'Null condition', 'The condition value is null. Conditions must either be true or false.');
		}
		const converted = this.convertOrFail(value, Types.bool, node, 'Incorrect condition type');
		return converted.type === 'bool' ? converted.value : undefined;
	}

	private convertOrFail(value: Value, type: ValueType, node: Token, summary: string): Value {
		try {
			return convertValue(value, type);
		} catch (error) {
			if (error instanceof ConfigError) {
				throw DecodeError.at(node.location, summary, `${error.message}.`);
			}
			throw error;
		}
	}

	private async evaluateConditional(node: Token): Promise<Value> {
		const [conditionNode, whenTrue, whenFalse] = node.children;
		const condition = this.requireBool(conditionNode, await this.evaluate(conditionNode));
		if (condition === undefined) return makeUnknown(Types.dynamic);
		return this.evaluate(condition ? whenTrue : whenFalse);
	}

	private async evaluateUnary(node: Token): Promise<Value> {
		const operand = await this.evaluate(node.children[0]);
		if (node.value === '!') {
			const value = this.requireOperand(node.children[0], operand, Types.bool);
			return value.type === 'bool' ? makeBool(!value.value) : makeUnknown(Types.bool);
		}
		const value = this.requireOperand(node.children[0], operand, Types.number);
		return value.type === 'number' ? makeNumber(-value.value) : makeUnknown(Types.number);
	}

	private requireOperand(node: Token, value: Value, type: ValueType): Value {
		if (value.type === 'unknown') return makeUnknown(type);
		if (value.type === 'null') {
			throw DecodeError.at(node.location, 'Invalid operand', `Unsuitable value for operand: a ${friendlyName(type)} is required, got null.`);
		}
		return this.convertOrFail(value, type, node, 'Invalid operand');
	}

	private async evaluateBinary(node: Token): Promise<Value> {
		const operator = node.getDisplayText();
		const [leftNode, rightNode] = node.children;
		const left = await this.evaluate(leftNode);
		const right = await this.evaluate(rightNode);

		if (operator === '==' || operator === '!=') {
			if (left.type === 'unknown' || right.type === 'unknown') return makeUnknown(Types.bool);
			const equal = valueEquals(left, right);
			return makeBool(operator === '==' ? equal : !equal);
		}

		if (LOGICAL_OPERATORS.has(operator)) {
			const a = this.requireOperand(leftNode, left, Types.bool);
			const b = this.requireOperand(rightNode, right, Types.bool);
			if (a.type !== 'bool' || b.type !== 'bool') return makeUnknown(Types.bool);
			return makeBool(operator === '&&' ? a.value && b.value : a.value || b.value);
		}

		const a = this.requireOperand(leftNode, left, Types.number);
		const b = this.requireOperand(rightNode, right, Types.number);

		if (COMPARISON_OPERATORS.has(operator)) {
			if (a.type !== 'number' || b.type !== 'number') return makeUnknown(Types.bool);
			switch (operator) {
				case '<': return makeBool(a.value < b.value);
				case '<=': return makeBool(a.value <= b.value);
				case '>': return makeBool(a.value > b.value);
				default: return makeBool(a.value >= b.value);
			}
		}

		if (!ARITHMETIC_OPERATORS.has(operator)) {
			throw DecodeError.at(node.location, 'Invalid operator', `Unsupported operator "${operator}".`);
		}
		if (a.type !== 'number' || b.type !== 'number') return makeUnknown(Types.number);

		if ((operator === '/' || operator === '%') && b.value === 0) {
			throw DecodeError.at(node.location, 'Operation failed', 'Error during operation: divide by zero.');
		}
		switch (operator) {
			case '+': return makeNumber(a.value + b.value);
			case '-': return makeNumber(a.value - b.value);
			case '*': return makeNumber(a.value * b.value);
			case '/': return makeNumber(a.value / b.value);
			default: return makeNumber(a.value % b.value);
		}
	}
}

export const evaluateExpression = (node: Token, context: EvalContext): Promise<Value> =>
	new ExpressionEvaluator(context).evaluate(node);
