import type { ValueType } from './types';
import { Types, typeEquals } from './types';

export interface NullValue {
	readonly type: 'null';
	readonly value: null;
	readonly declaredType: ValueType;
}

/** Placeholder for a value that has a type but is not yet known. */
export interface UnknownValue {
	readonly type: 'unknown';
	readonly value: null;
	readonly declaredType: ValueType;
}

export interface BoolValue {
	readonly type: 'bool';
	readonly value: boolean;
}

export interface NumberValue {
	readonly type: 'number';
	readonly value: number;
}

export interface StringValue {
	readonly type: 'string';
	readonly value: string;
}

export interface ListValue {
	readonly type: 'list';
	readonly elementType: ValueType;
	readonly value: readonly Value[];
}

export interface SetValue {
	readonly type: 'set';
	readonly elementType: ValueType;
	readonly value: readonly Value[];
}

export interface TupleValue {
	readonly type: 'tuple';
	readonly value: readonly Value[];
}

export interface MapValue {
	readonly type: 'map';
	readonly elementType: ValueType;
	readonly value: ReadonlyMap<string, Value>;
}

/** Record: every attribute carries its own type. */
export interface ObjectValue {
	readonly type: 'object';
	readonly value: ReadonlyMap<string, Value>;
}

export type Value =
	| NullValue
	| UnknownValue
	| BoolValue
	| NumberValue
	| StringValue
	| ListValue
	| SetValue
	| TupleValue
	| MapValue
	| ObjectValue;

export type SequenceValue = ListValue | SetValue | TupleValue;
export type MappingValue = MapValue | ObjectValue;

export const makeNull = (declaredType: ValueType = Types.dynamic): NullValue => ({ type: 'null', value: null, declaredType });

export const makeUnknown = (declaredType: ValueType = Types.dynamic): UnknownValue => ({ type: 'unknown', value: null, declaredType });

export const makeBool = (value: boolean): BoolValue => ({ type: 'bool', value });

export const makeNumber = (value: number): NumberValue => ({ type: 'number', value });

export const makeString = (value: string): StringValue => ({ type: 'string', value });

export const makeList = (elementType: ValueType, value: readonly Value[]): ListValue => ({ type: 'list', elementType, value });

export const makeSet = (elementType: ValueType, elements: readonly Value[]): SetValue => {
	const unique: Value[] = [];
	for (const element of elements) {
		if (!unique.some(existing => valueEquals(existing, element))) {
			unique.push(element);
		}
	}
	return { type: 'set', elementType, value: unique };
};

export const makeTuple = (value: readonly Value[]): TupleValue => ({ type: 'tuple', value });

const toEntryMap = (entries: ReadonlyMap<string, Value> | Record<string, Value>): ReadonlyMap<string, Value> =>
	entries instanceof Map ? new Map(entries) : new Map(Object.entries(entries));

export const makeMap = (elementType: ValueType, entries: ReadonlyMap<string, Value> | Record<string, Value>): MapValue =>
	({ type: 'map', elementType, value: toEntryMap(entries) });

export const makeObject = (attributes: ReadonlyMap<string, Value> | Record<string, Value> = {}): ObjectValue =>
	({ type: 'object', value: toEntryMap(attributes) });

export const isSequence = (value: Value): value is SequenceValue =>
	value.type === 'list' || value.type === 'set' || value.type === 'tuple';

export const isMapping = (value: Value): value is MappingValue =>
	value.type === 'map' || value.type === 'object';

/** Map and object attributes iterate in lexicographic key order. */
export const sortedEntries = (value: MappingValue): [string, Value][] =>
	[...value.value.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

export const typeOf = (value: Value): ValueType => {
	switch (value.type) {
		case 'null':
		case 'unknown': {
			return value.declaredType;
		}
		case 'bool': {
			return Types.bool;
		}
		case 'number': {
			return Types.number;
		}
		case 'string': {
			return Types.string;
		}
		case 'list': {
			return Types.list(value.elementType);
		}
		case 'set': {
			return Types.set(value.elementType);
		}
		case 'map': {
			return Types.map(value.elementType);
		}
		case 'tuple': {
			return Types.tuple(value.value.map(typeOf));
		}
		case 'object': {
			return Types.object(Object.fromEntries(
				[...value.value].map(([name, attribute]): [string, ValueType] => [name, typeOf(attribute)])
			));
		}
	}
};

export const isKnown = (value: Value): boolean => {
	if (value.type === 'unknown') return false;
	if (isSequence(value)) return value.value.every(isKnown);
	if (isMapping(value)) return [...value.value.values()].every(isKnown);
	return true;
};

export const valueEquals = (a: Value, b: Value): boolean => {
	if (a.type === 'null' || b.type === 'null') {
		return a.type === b.type;
	}
	switch (a.type) {
		case 'unknown': {
			return false;
		}
		case 'bool':
		case 'number':
		case 'string': {
			return a.type === b.type && a.value === b.value;
		}
		case 'list':
		case 'set':
		case 'tuple': {
			if (!isSequence(b) || b.type !== a.type || a.value.length !== b.value.length) return false;
			if (a.type !== 'tuple' && b.type !== 'tuple' && !typeEquals(a.elementType, b.elementType)) return false;
			if (a.type === 'set') {
				return a.value.every(element => b.value.some(other => valueEquals(element, other)));
			}
			return a.value.every((element, i) => valueEquals(element, b.value[i]));
		}
		case 'map':
		case 'object': {
			if (!isMapping(b) || b.type !== a.type || a.value.size !== b.value.size) return false;
			if (a.type === 'map' && b.type === 'map' && !typeEquals(a.elementType, b.elementType)) return false;
			for (const [name, attribute] of a.value) {
				const other = b.value.get(name);
				if (other === undefined || !valueEquals(attribute, other)) return false;
			}
			return true;
		}
	}
};
