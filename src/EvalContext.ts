import { FunctionRegistry } from './FunctionsRegistry';
import type { Logger } from './logger';
import type { FunctionContext, FunctionGroup } from './model';
import type { Value } from './values/values';

export const DEPENDENCY_VARIABLE = 'dependency';

/** Variable scope and functions seen by expressions during a decode. */
export interface EvalContext {
	readonly variables: ReadonlyMap<string, Value>;
	readonly functions: FunctionRegistry;
	readonly functionContext: FunctionContext;
}

export interface BuildContextOptions {
	functions?: readonly FunctionGroup[];
	functionContext?: FunctionContext;
	logger?: Logger;
}

const emptyFunctionContext = (): FunctionContext => ({
	workingDirectory: '',
	environmentVariables: {},
	document: { filename: '' }
});

/**
 * Binds the resolved dependency record under `dependency`. Without one the
 * context has no variables at all.
 */
export function buildContext(dependencyValue?: Value, options: BuildContextOptions = {}): EvalContext {
	const variables = new Map<string, Value>();
	if (dependencyValue !== undefined) {
		variables.set(DEPENDENCY_VARIABLE, dependencyValue);
	}

	return {
		variables,
		functions: new FunctionRegistry(options.functions, options.logger),
		functionContext: options.functionContext ?? emptyFunctionContext()
	};
}
