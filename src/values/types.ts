import { ConversionFailedError } from '../errors';

export type PrimitiveTypeKind = 'string' | 'number' | 'bool';

export interface PrimitiveType {
	readonly kind: PrimitiveTypeKind;
}

export interface DynamicType {
	readonly kind: 'dynamic';
}

export interface CollectionType {
	readonly kind: 'list' | 'set' | 'map';
	readonly element: ValueType;
}

export interface ObjectType {
	readonly kind: 'object';
	readonly attributes: Readonly<Record<string, ValueType>>;
}

export interface TupleType {
	readonly kind: 'tuple';
	readonly elements: readonly ValueType[];
}

export type ValueType = PrimitiveType | DynamicType | CollectionType | ObjectType | TupleType;

/**
 * Self-describing JSON form of a type: `"string"`, `["list", "number"]`,
 * `["object", {"a": "bool"}]`, `["tuple", ["string", "number"]]`.
 */
export type TypeJson =
	| string
	| [string, TypeJson]
	| ['object', { [name: string]: TypeJson }]
	| ['tuple', TypeJson[]];

export const Types = {
	string: { kind: 'string' } as const satisfies PrimitiveType,
	number: { kind: 'number' } as const satisfies PrimitiveType,
	bool: { kind: 'bool' } as const satisfies PrimitiveType,
	dynamic: { kind: 'dynamic' } as const satisfies DynamicType,
	list: (element: ValueType): CollectionType => ({ kind: 'list', element }),
	set: (element: ValueType): CollectionType => ({ kind: 'set', element }),
	map: (element: ValueType): CollectionType => ({ kind: 'map', element }),
	object: (attributes: Record<string, ValueType>): ObjectType => ({ kind: 'object', attributes }),
	tuple: (elements: ValueType[]): TupleType => ({ kind: 'tuple', elements })
};

export const isCollectionType = (type: ValueType): type is CollectionType =>
	type.kind === 'list' || type.kind === 'set' || type.kind === 'map';

export const typeEquals = (a: ValueType, b: ValueType): boolean => {
	switch (a.kind) {
		case 'string':
		case 'number':
		case 'bool':
		case 'dynamic': {
			return a.kind === b.kind;
		}
		case 'list':
		case 'set':
		case 'map': {
			return b.kind === a.kind && isCollectionType(b) && typeEquals(a.element, b.element);
		}
		case 'object': {
			if (b.kind !== 'object') return false;
			const names = Object.keys(a.attributes);
			if (names.length !== Object.keys(b.attributes).length) return false;
			return names.every(name => {
				const other = attributeType(b, name);
				return other !== undefined && typeEquals(a.attributes[name], other);
			});
		}
		case 'tuple': {
			if (b.kind !== 'tuple' || a.elements.length !== b.elements.length) return false;
			return a.elements.every((element, i) => typeEquals(element, b.elements[i]));
		}
	}
};

/** Attribute type of an object type; inherited members never count as attributes. */
export const attributeType = (type: ObjectType, name: string): ValueType | undefined =>
	Object.hasOwn(type.attributes, name) ? type.attributes[name] : undefined;

export const friendlyName = (type: ValueType): string => {
	switch (type.kind) {
		case 'string':
		case 'number':
		case 'bool': {
			return type.kind;
		}
		case 'dynamic': {
			return 'any type';
		}
		case 'list':
		case 'set':
		case 'map': {
			return `${type.kind} of ${friendlyName(type.element)}`;
		}
		case 'object':
		case 'tuple': {
			return type.kind;
		}
	}
};

export const marshalType = (type: ValueType): TypeJson => {
	switch (type.kind) {
		case 'string':
		case 'number':
		case 'bool':
		case 'dynamic': {
			return type.kind;
		}
		case 'list':
		case 'set':
		case 'map': {
			return [type.kind, marshalType(type.element)];
		}
		case 'object': {
			const names = Object.keys(type.attributes).sort();
			return ['object', Object.fromEntries(
				names.map((name): [string, TypeJson] => [name, marshalType(type.attributes[name])])
			)];
		}
		case 'tuple': {
			return ['tuple', type.elements.map(marshalType)];
		}
	}
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

export const unmarshalType = (json: unknown): ValueType => {
	if (typeof json === 'string') {
		switch (json) {
			case 'string': return Types.string;
			case 'number': return Types.number;
			case 'bool': return Types.bool;
			case 'dynamic': return Types.dynamic;
		}
		throw new ConversionFailedError(`invalid primitive type name "${json}"`);
	}

	if (!Array.isArray(json) || json.length < 2) {
		throw new ConversionFailedError('type must be a string or a [kind, ...] array');
	}

	const [kind, argument] = json;
	switch (kind) {
		case 'list': return Types.list(unmarshalType(argument));
		case 'set': return Types.set(unmarshalType(argument));
		case 'map': return Types.map(unmarshalType(argument));
		case 'object': {
			if (!isPlainObject(argument)) {
				throw new ConversionFailedError('object type requires an attribute type mapping');
			}
			return Types.object(Object.fromEntries(
				Object.entries(argument).map(([name, attribute]): [string, ValueType] => [name, unmarshalType(attribute)])
			));
		}
		case 'tuple': {
			if (!Array.isArray(argument)) {
				throw new ConversionFailedError('tuple type requires an element type array');
			}
			return Types.tuple(argument.map(unmarshalType));
		}
	}
	throw new ConversionFailedError(`invalid complex type kind ${JSON.stringify(kind)}`);
};
