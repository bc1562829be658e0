import type { FunctionContext, FunctionGroup } from '../model';
import { impliedValue, parseJson, toJsonValue } from '../values/json';
import type { Value } from '../values/values';
import { makeString, typeOf } from '../values/values';
import { requireArgCount, stringArg } from './utils';

export const encodingFunctionGroup: FunctionGroup = {
	namespace: 'encoding',
	functions: {
		jsonencode: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('jsonencode', args, 1);
			const [value] = args;
			return makeString(JSON.stringify(toJsonValue(value, typeOf(value))));
		},

		jsondecode: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('jsondecode', args, 1);
			return impliedValue(parseJson(stringArg('jsondecode', args, 0)));
		}
	}
};
