import { convertValue } from '../values/convert';
import { friendlyName, Types } from '../values/types';
import type { MappingValue, SequenceValue, Value } from '../values/values';
import { isMapping, isSequence, typeOf } from '../values/values';

export const describeValue = (value: Value): string => friendlyName(typeOf(value));

export const requireArgCount = (name: string, args: Value[], min: number, max = min): void => {
	if (args.length < min || args.length > max) {
		const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
		throw new Error(`${name} requires ${expected} argument(s), got ${args.length}`);
	}
};

export const requireKnown = (name: string, value: Value, position: number): Exclude<Value, { type: 'unknown' | 'null' }> => {
	if (value.type === 'null') {
		throw new Error(`${name}: argument ${position + 1} must not be null`);
	}
	if (value.type === 'unknown') {
		throw new Error(`${name}: argument ${position + 1} is not known`);
	}
	return value;
};

export const stringArg = (name: string, args: Value[], position: number): string => {
	const converted = convertValue(requireKnown(name, args[position], position), Types.string);
	if (converted.type !== 'string') {
		throw new Error(`${name}: argument ${position + 1} must be a string`);
	}
	return converted.value;
};

export const sequenceArg = (name: string, args: Value[], position: number): SequenceValue => {
	const value = requireKnown(name, args[position], position);
	if (!isSequence(value)) {
		throw new Error(`${name}: argument ${position + 1} must be a list, got ${describeValue(value)}`);
	}
	return value;
};

export const mappingArg = (name: string, args: Value[], position: number): MappingValue => {
	const value = requireKnown(name, args[position], position);
	if (!isMapping(value)) {
		throw new Error(`${name}: argument ${position + 1} must be a map or object, got ${describeValue(value)}`);
	}
	return value;
};
