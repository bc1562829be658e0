import type { Value } from './values/values';

export interface SourcePosition {
	offset: number;
	line: number;
	column: number;
}

export interface SourceRange {
	source: string;
	start: SourcePosition;
	end: SourcePosition;
}

export const TOKEN_TYPES = [
	// Structure
	'root',
	'body',
	'block',
	'parameter',
	'attribute',

	// Literals
	'number_lit',
	'boolean_lit',
	'null_lit',

	// Templates
	'template',
	'string_content',
	'interpolation',
	'if_directive',
	'for_directive',
	'heredoc',
	'indented_heredoc',

	// Collections
	'tuple',
	'object',
	'object_item',
	'object_key',

	// For expressions
	'for_tuple',
	'for_object',
	'key_variable',
	'value_variable',
	'for_collection',
	'for_key',
	'for_value',
	'for_grouping',
	'for_condition',

	// References and calls
	'variable',
	'function_call',
	'expand_final',
	'traversal',
	'get_attr',
	'index',
	'legacy_index',
	'attr_splat',
	'full_splat',

	// Operators
	'conditional',
	'binary_expression',
	'unary_expression'
] as const;

export type TokenType = typeof TOKEN_TYPES[number];

export type TokenValue = string | number | boolean | null;

export const isTokenType = (value: string): value is TokenType =>
	TOKEN_TYPES.some(type => type === value);

export class Token {
	readonly id: number;
	type: TokenType;
	value: TokenValue;
	location: SourceRange;
	children: Token[];
	parent: Token | null;

	constructor(
		id: number,
		type: TokenType,
		value: TokenValue,
		location: SourceRange
	) {
		this.id = id;
		this.type = type;
		this.value = value;
		this.location = location;
		this.children = [];
		this.parent = null;
	}

	getDisplayText(): string {
		if (this.value === null) return '';
		return String(this.value);
	}

	findChild(type: TokenType): Token | undefined {
		return this.children.find(child => child.type === type);
	}
}

export interface FunctionContext {
	workingDirectory: string;
	environmentVariables: Readonly<Record<string, string | undefined>>;
	document: {
		filename: string;
	};
	terraformCommand?: string;
}

export type FunctionImplementation = (args: Value[], context: FunctionContext) => Promise<Value>;

export interface FunctionGroup {
	namespace: string;
	functions: Record<string, FunctionImplementation>;
}
