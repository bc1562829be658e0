import type { FunctionContext, FunctionGroup } from '../model';
import { convertValue } from '../values/convert';
import { Types } from '../values/types';
import type { Value } from '../values/values';
import { makeList, makeString } from '../values/values';
import { describeValue, requireArgCount, requireKnown, sequenceArg, stringArg } from './utils';

const REGEX_PATTERN = /^\/(.*)\/$/s;

const formatVerb = (verb: string, value: Value): string => {
	const known = requireKnown('format', value, 0);
	switch (verb) {
		case 'd': {
			const number = convertValue(known, Types.number);
			if (number.type !== 'number' || !Number.isInteger(number.value)) {
				throw new Error(`format: %d requires a whole number, got ${describeValue(known)}`);
			}
			return String(number.value);
		}
		case 'f': {
			const number = convertValue(known, Types.number);
			if (number.type !== 'number') {
				throw new Error(`format: %f requires a number, got ${describeValue(known)}`);
			}
			return number.value.toFixed(6);
		}
		case 't': {
			const bool = convertValue(known, Types.bool);
			if (bool.type !== 'bool') {
				throw new Error(`format: %t requires a bool, got ${describeValue(known)}`);
			}
			return String(bool.value);
		}
		case 'q': {
			const text = convertValue(known, Types.string);
			if (text.type !== 'string') {
				throw new Error(`format: %q requires a string, got ${describeValue(known)}`);
			}
			return JSON.stringify(text.value);
		}
		default: {
			const text = convertValue(known, Types.string);
			if (text.type !== 'string') {
				throw new Error(`format: %${verb} cannot format ${describeValue(known)}`);
			}
			return text.value;
		}
	}
};

export const stringFunctionGroup: FunctionGroup = {
	namespace: 'string',
	functions: {
		upper: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('upper', args, 1);
			return makeString(stringArg('upper', args, 0).toUpperCase());
		},

		lower: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('lower', args, 1);
			return makeString(stringArg('lower', args, 0).toLowerCase());
		},

		trimspace: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('trimspace', args, 1);
			return makeString(stringArg('trimspace', args, 0).trim());
		},

		replace: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('replace', args, 3);
			const str = stringArg('replace', args, 0);
			const search = stringArg('replace', args, 1);
			const replacement = stringArg('replace', args, 2);

			// A search string wrapped in slashes is a regular expression
			const regex = REGEX_PATTERN.exec(search);
			if (regex) {
				return makeString(str.replace(new RegExp(regex[1], 'g'), replacement));
			}
			return makeString(str.split(search).join(replacement));
		},

		split: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('split', args, 2);
			const separator = stringArg('split', args, 0);
			const str = stringArg('split', args, 1);
			return makeList(Types.string, str.split(separator).map(makeString));
		},

		join: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('join', args, 2, Infinity);
			const separator = stringArg('join', args, 0);
			const parts: string[] = [];
			for (let i = 1; i < args.length; i++) {
				const list = sequenceArg('join', args, i);
				list.value.forEach((element, index) => {
					const converted = convertValue(requireKnown('join', element, index), Types.string);
					if (converted.type === 'string') parts.push(converted.value);
				});
			}
			return makeString(parts.join(separator));
		},

		format: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('format', args, 1, Infinity);
			const spec = stringArg('format', args, 0);
			let next = 1;
			const result = spec.replace(/%([%sdvftq])/g, (_match, verb: string) => {
				if (verb === '%') return '%';
				if (next >= args.length) {
					throw new Error(`format: not enough arguments for "${spec}"`);
				}
				return formatVerb(verb, args[next++]);
			});
			if (next < args.length) {
				throw new Error(`format: too many arguments; only ${next - 1} used by "${spec}"`);
			}
			return makeString(result);
		}
	}
};
