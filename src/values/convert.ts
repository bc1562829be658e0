import { ConversionFailedError } from '../errors';
import type { ValueType } from './types';
import { friendlyName, typeEquals, Types } from './types';
import type { Value } from './values';
import {
	isMapping,
	isSequence,
	makeBool,
	makeList,
	makeMap,
	makeNull,
	makeNumber,
	makeObject,
	makeSet,
	makeString,
	makeTuple,
	makeUnknown,
	sortedEntries,
	typeOf
} from './values';

const formatNumber = (value: number): string => String(value);

const childPath = (path: string, step: string | number): string =>
	typeof step === 'number' ? `${path}[${step}]` : path ? `${path}.${step}` : step;

const fail = (value: Value, want: ValueType, path: string): never => {
	throw new ConversionFailedError(`${friendlyName(want)} required, got ${friendlyName(typeOf(value))}`, path);
};

const convertPrimitive = (value: Value, want: ValueType, path: string): Value => {
	switch (want.kind) {
		case 'string': {
			if (value.type === 'string') return value;
			if (value.type === 'number') return makeString(formatNumber(value.value));
			if (value.type === 'bool') return makeString(value.value ? 'true' : 'false');
			break;
		}
		case 'number': {
			if (value.type === 'number') return value;
			if (value.type === 'string') {
				const text = value.value.trim();
				const parsed = Number(text);
				if (text === '' || Number.isNaN(parsed)) {
					throw new ConversionFailedError(`a number is required, got "${value.value}"`, path);
				}
				return makeNumber(parsed);
			}
			break;
		}
		case 'bool': {
			if (value.type === 'bool') return value;
			if (value.type === 'string') {
				if (value.value === 'true') return makeBool(true);
				if (value.value === 'false') return makeBool(false);
				throw new ConversionFailedError(`a bool is required, got "${value.value}"`, path);
			}
			break;
		}
	}
	return fail(value, want, path);
};

/**
 * Converts a value to the wanted type, following the usual HCL conversion
 * rules: primitives convert through their string form, tuples and sets become
 * lists, objects become maps when every attribute converts to one element
 * type. Null and unknown values take the wanted type.
 */
export const convertValue = (value: Value, want: ValueType, path = ''): Value => {
	if (want.kind === 'dynamic') {
		return value;
	}
	if (value.type === 'null') {
		return makeNull(want);
	}
	if (value.type === 'unknown') {
		return makeUnknown(want);
	}

	switch (want.kind) {
		case 'string':
		case 'number':
		case 'bool': {
			return convertPrimitive(value, want, path);
		}
		case 'list':
		case 'set': {
			if (!isSequence(value)) break;
			const elements = value.value.map((element, i) => convertValue(element, want.element, childPath(path, i)));
			const elementType = want.element.kind === 'dynamic' ? unifiedElementType(elements) : want.element;
			return want.kind === 'list' ? makeList(elementType, elements) : makeSet(elementType, elements);
		}
		case 'map': {
			if (!isMapping(value)) break;
			const entries = new Map<string, Value>();
			for (const [key, element] of sortedEntries(value)) {
				entries.set(key, convertValue(element, want.element, childPath(path, key)));
			}
			const elementType = want.element.kind === 'dynamic' ? unifiedElementType([...entries.values()]) : want.element;
			return makeMap(elementType, entries);
		}
		case 'object': {
			if (!isMapping(value)) break;
			const attributes = new Map<string, Value>();
			for (const [name, attributeType] of Object.entries(want.attributes)) {
				const attribute = value.value.get(name);
				if (attribute === undefined) {
					throw new ConversionFailedError(`attribute "${name}" is required`, path);
				}
				attributes.set(name, convertValue(attribute, attributeType, childPath(path, name)));
			}
			return makeObject(attributes);
		}
		case 'tuple': {
			if (!isSequence(value) || value.type === 'set') break;
			if (value.value.length !== want.elements.length) {
				throw new ConversionFailedError(`a tuple of ${want.elements.length} elements is required`, path);
			}
			return makeTuple(value.value.map((element, i) => convertValue(element, want.elements[i], childPath(path, i))));
		}
	}

	return fail(value, want, path);
};

/**
 * Finds the single type every element shares; mixed element types are
 * rejected since lists, sets and maps are homogeneous.
 */
const unifiedElementType = (elements: readonly Value[]): ValueType => {
	const known = elements.filter(element => element.type !== 'null' && element.type !== 'unknown');
	if (known.length === 0) {
		return elements.length > 0 ? typeOf(elements[0]) : Types.dynamic;
	}
	const first = typeOf(known[0]);
	for (const element of known.slice(1)) {
		if (!typeEquals(first, typeOf(element))) {
			throw new ConversionFailedError('all elements must have the same type');
		}
	}
	return first;
};
