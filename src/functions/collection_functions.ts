import type { FunctionContext, FunctionGroup } from '../model';
import { recordFromMap } from '../ValueBridge';
import { Types } from '../values/types';
import type { Value } from '../values/values';
import {
	isMapping,
	isSequence,
	makeBool,
	makeList,
	makeNumber,
	makeString,
	makeTuple,
	sortedEntries,
	valueEquals
} from '../values/values';
import { describeValue, mappingArg, requireArgCount, requireKnown, sequenceArg, stringArg } from './utils';

export const collectionFunctionGroup: FunctionGroup = {
	namespace: 'collection',
	functions: {
		length: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('length', args, 1);
			const value = requireKnown('length', args[0], 0);
			if (value.type === 'string') return makeNumber([...value.value].length);
			if (isSequence(value)) return makeNumber(value.value.length);
			if (isMapping(value)) return makeNumber(value.value.size);
			throw new Error(`length: argument must be a string, collection or structural value, got ${describeValue(value)}`);
		},

		concat: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('concat', args, 1, Infinity);
			const elements: Value[] = [];
			args.forEach((_arg, i) => {
				elements.push(...sequenceArg('concat', args, i).value);
			});
			return makeTuple(elements);
		},

		// Later arguments win; the result is an object so values may differ in type
		merge: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			const merged = new Map<string, Value>();
			args.forEach((arg, i) => {
				if (arg.type === 'null') return;
				for (const [key, value] of sortedEntries(mappingArg('merge', args, i))) {
					merged.set(key, value);
				}
			});
			return recordFromMap(merged);
		},

		lookup: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('lookup', args, 2, 3);
			const map = mappingArg('lookup', args, 0);
			const key = stringArg('lookup', args, 1);
			const found = map.value.get(key);
			if (found !== undefined) return found;
			if (args.length === 3) return args[2];
			throw new Error(`lookup: the given key "${key}" does not exist and no default was given`);
		},

		keys: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('keys', args, 1);
			const map = mappingArg('keys', args, 0);
			return makeList(Types.string, sortedEntries(map).map(([key]) => makeString(key)));
		},

		values: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('values', args, 1);
			const map = mappingArg('values', args, 0);
			const values = sortedEntries(map).map(([, value]) => value);
			return map.type === 'map' ? makeList(map.elementType, values) : makeTuple(values);
		},

		contains: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('contains', args, 2);
			const list = sequenceArg('contains', args, 0);
			const needle = args[1];
			return makeBool(list.value.some(element => valueEquals(element, needle)));
		}
	}
};
