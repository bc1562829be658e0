import { ConversionFailedError } from '../errors';
import type { ValueType } from './types';
import { attributeType, friendlyName, isCollectionType, marshalType, Types, unmarshalType } from './types';
import type { ObjectValue, Value } from './values';
import {
	makeBool,
	makeList,
	makeMap,
	makeNull,
	makeNumber,
	makeObject,
	makeSet,
	makeString,
	makeTuple,
	sortedEntries,
	typeOf
} from './values';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
	[key: string]: JsonValue;
}

export const isJsonObject = (value: unknown): value is JsonObject =>
	typeof value === 'object' && value !== null && !Array.isArray(value) && Object.values(value).every(isJsonValue);

export const isJsonValue = (value: unknown): value is JsonValue => {
	if (value === null) return true;
	switch (typeof value) {
		case 'boolean':
		case 'string': {
			return true;
		}
		case 'number': {
			return Number.isFinite(value);
		}
		case 'object': {
			return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
		}
		default: {
			return false;
		}
	}
};

const childPath = (path: string, step: string | number): string =>
	typeof step === 'number' ? `${path}[${step}]` : path ? `${path}.${step}` : step;

/**
 * Converts a value to its JSON form under the given type. Under the dynamic
 * type the value is wrapped as `{"value": ..., "type": ...}` so that it can be
 * read back without knowing the type in advance.
 */
export const toJsonValue = (value: Value, type: ValueType, path = ''): JsonValue => {
	if (value.type === 'unknown') {
		throw new ConversionFailedError('value is not known', path);
	}
	if (value.type === 'null') {
		return null;
	}

	if (type.kind === 'dynamic') {
		const actualType = typeOf(value);
		return {
			value: toJsonValue(value, actualType, path),
			type: marshalType(actualType)
		};
	}

	switch (value.type) {
		case 'bool':
		case 'string': {
			return value.value;
		}
		case 'number': {
			if (!Number.isFinite(value.value)) {
				throw new ConversionFailedError('cannot serialize infinity as JSON', path);
			}
			return value.value;
		}
		case 'list':
		case 'set': {
			if (!isCollectionType(type) || type.kind !== value.type) break;
			return value.value.map((element, i) => toJsonValue(element, type.element, childPath(path, i)));
		}
		case 'tuple': {
			if (type.kind !== 'tuple' || type.elements.length !== value.value.length) break;
			return value.value.map((element, i) => toJsonValue(element, type.elements[i], childPath(path, i)));
		}
		case 'map': {
			if (type.kind !== 'map') break;
			return Object.fromEntries(sortedEntries(value).map(([key, element]): [string, JsonValue] =>
				[key, toJsonValue(element, type.element, childPath(path, key))]
			));
		}
		case 'object': {
			if (type.kind !== 'object') break;
			return Object.fromEntries(sortedEntries(value).map(([name, attribute]): [string, JsonValue] => {
				const wanted = attributeType(type, name);
				if (wanted === undefined) {
					throw new ConversionFailedError(`unsupported attribute "${name}"`, path);
				}
				return [name, toJsonValue(attribute, wanted, childPath(path, name))];
			}));
		}
	}

	throw new ConversionFailedError(`${value.type} value does not conform to ${friendlyName(type)}`, path);
};

export const marshalValue = (value: Value, type: ValueType): string => JSON.stringify(toJsonValue(value, type));

const describeJson = (json: JsonValue): string => {
	if (json === null) return 'null';
	if (Array.isArray(json)) return 'array';
	return typeof json;
};

/**
 * Reads a JSON value back under the given type; the inverse of toJsonValue.
 */
export const fromJsonValue = (json: JsonValue, type: ValueType, path = ''): Value => {
	if (json === null) {
		return makeNull(type);
	}

	if (type.kind === 'dynamic') {
		if (!isJsonObject(json) || !('value' in json) || !('type' in json)) {
			throw new ConversionFailedError('dynamic value must be an object with "value" and "type"', path);
		}
		return fromJsonValue(json.value, unmarshalType(json.type), path);
	}

	switch (type.kind) {
		case 'string': {
			if (typeof json === 'string') return makeString(json);
			if (typeof json === 'number' || typeof json === 'boolean') return makeString(String(json));
			break;
		}
		case 'number': {
			if (typeof json === 'number') return makeNumber(json);
			if (typeof json === 'string' && json.trim() !== '' && Number.isFinite(Number(json))) {
				return makeNumber(Number(json));
			}
			break;
		}
		case 'bool': {
			if (typeof json === 'boolean') return makeBool(json);
			if (json === 'true' || json === 'false') return makeBool(json === 'true');
			break;
		}
		case 'list':
		case 'set': {
			if (!Array.isArray(json)) break;
			const elements = json.map((element, i) => fromJsonValue(element, type.element, childPath(path, i)));
			return type.kind === 'list' ? makeList(type.element, elements) : makeSet(type.element, elements);
		}
		case 'map': {
			if (!isJsonObject(json)) break;
			const entries = new Map<string, Value>();
			for (const [key, element] of Object.entries(json)) {
				entries.set(key, fromJsonValue(element, type.element, childPath(path, key)));
			}
			return makeMap(type.element, entries);
		}
		case 'object': {
			if (!isJsonObject(json)) break;
			const attributes = new Map<string, Value>();
			for (const name of Object.keys(json)) {
				if (!Object.hasOwn(type.attributes, name)) {
					throw new ConversionFailedError(`unsupported attribute "${name}"`, path);
				}
			}
			for (const [name, wanted] of Object.entries(type.attributes)) {
				if (!Object.hasOwn(json, name)) {
					throw new ConversionFailedError(`missing required attribute "${name}"`, path);
				}
				attributes.set(name, fromJsonValue(json[name], wanted, childPath(path, name)));
			}
			return makeObject(attributes);
		}
		case 'tuple': {
			if (!Array.isArray(json)) break;
			if (json.length !== type.elements.length) {
				throw new ConversionFailedError(`tuple requires ${type.elements.length} elements, got ${json.length}`, path);
			}
			return makeTuple(json.map((element, i) => fromJsonValue(element, type.elements[i], childPath(path, i))));
		}
	}

	throw new ConversionFailedError(`${friendlyName(type)} required, got ${describeJson(json)}`, path);
};

const parseJson = (text: string): JsonValue => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw new ConversionFailedError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}
	if (!isJsonValue(parsed)) {
		throw new ConversionFailedError('JSON document contains values that cannot be represented');
	}
	return parsed;
};

export const unmarshalValue = (text: string, type: ValueType): Value => fromJsonValue(parseJson(text), type);

export { parseJson };

/**
 * Derives a value from plain JSON without a type: arrays become tuples and
 * objects become objects, so mixed element types are kept as they are.
 */
export const impliedValue = (json: JsonValue): Value => {
	if (json === null) return makeNull(Types.dynamic);
	if (typeof json === 'boolean') return makeBool(json);
	if (typeof json === 'number') return makeNumber(json);
	if (typeof json === 'string') return makeString(json);
	if (Array.isArray(json)) return makeTuple(json.map(impliedValue));
	return impliedObject(json);
};

export const impliedObject = (json: JsonObject): ObjectValue => {
	const attributes = new Map<string, Value>();
	for (const [name, element] of Object.entries(json)) {
		attributes.set(name, impliedValue(element));
	}
	return makeObject(attributes);
};
