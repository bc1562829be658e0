import type { FunctionContext, FunctionGroup } from '../model';
import type { Value } from '../values/values';
import { makeString } from '../values/values';
import { requireArgCount, stringArg } from './utils';

export const terragruntFunctionGroup: FunctionGroup = {
	namespace: 'terragrunt',
	functions: {
		get_env: async (args: Value[], context: FunctionContext): Promise<Value> => {
			requireArgCount('get_env', args, 1, 2);
			const varName = stringArg('get_env', args, 0);
			const value = Object.hasOwn(context.environmentVariables, varName) ? context.environmentVariables[varName] : undefined;
			if (value !== undefined) {
				return makeString(value);
			}
			if (args.length === 2) {
				return makeString(stringArg('get_env', args, 1));
			}
			throw new Error(`environment variable "${varName}" is not set and no default was given`);
		},

		get_terragrunt_dir: async (args: Value[], context: FunctionContext): Promise<Value> => {
			requireArgCount('get_terragrunt_dir', args, 0);
			return makeString(context.workingDirectory);
		},

		get_platform: async (args: Value[], _context: FunctionContext): Promise<Value> => {
			requireArgCount('get_platform', args, 0);
			return makeString(process.platform);
		}
	}
};
