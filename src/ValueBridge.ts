import { ConversionFailedError } from './errors';
import type { JsonObject } from './values/json';
import { impliedObject, isJsonObject, parseJson, marshalValue } from './values/json';
import type { ValueType, ObjectType } from './values/types';
import { Types } from './values/types';
import type { ObjectValue, Value } from './values/values';
import { typeOf } from './values/values';
import { convertValue } from './values/convert';

/** Plain JSON-shaped mapping handed to callers outside the value system. */
export type GenericMap = JsonObject;

/**
 * Converts an object or map value into a plain mapping. The value is marshaled
 * under the dynamic type, so the JSON carries `{"value": ..., "type": ...}`,
 * and only the `value` member is read back.
 */
export function valueToGenericMap(value: Value): GenericMap {
	const wire = parseJson(marshalValue(value, Types.dynamic));
	if (wire === null) {
		return {};
	}
	if (!isJsonObject(wire)) {
		throw new ConversionFailedError('marshaled value is missing its type wrapper');
	}

	const inner = wire.value;
	if (!isJsonObject(inner)) {
		throw new ConversionFailedError(`a map or object is required, got ${value.type}`);
	}
	return inner;
}

/**
 * Derives an object type whose attribute types are exactly the runtime types
 * of the given entries. Objects are the only aggregate allowing a different
 * type per key, which lets outputs of any shape share one value.
 */
export function syntheticRecordType(entries: ReadonlyMap<string, Value>): ObjectType {
	return Types.object(Object.fromEntries(
		[...entries].map(([name, entry]): [string, ValueType] => [name, typeOf(entry)])
	));
}

export function recordFromMap(entries: ReadonlyMap<string, Value>): ObjectValue {
	const converted = convertValue(
		{ type: 'object', value: entries },
		syntheticRecordType(entries)
	);
	if (converted.type !== 'object') {
		throw new ConversionFailedError(`an object is required, got ${converted.type}`);
	}
	return converted;
}

export function genericMapToValue(map: GenericMap): ObjectValue {
	return impliedObject(map);
}
