import type { EvalContext } from '../src/EvalContext';
import { evaluateExpression } from '../src/ExpressionEvaluator';
import { FunctionRegistry } from '../src/FunctionsRegistry';
import { silentLogger } from '../src/logger';
import type { FunctionGroup } from '../src/model';
import { parseDocument } from '../src/DocumentParser';
import { DecodeError } from '../src/errors';
import type { JsonValue } from '../src/values/json';
import { toJsonValue } from '../src/values/json';
import type { Value } from '../src/values/values';
import { typeOf } from '../src/values/values';

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('expected the promise to reject');
}

export function thrownBy(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error('expected the function to throw');
}

export function createContext(
	variables: Record<string, Value> = {},
	functions: readonly FunctionGroup[] = []
): EvalContext {
	return {
		variables: new Map(Object.entries(variables)),
		functions: new FunctionRegistry(functions, silentLogger),
		functionContext: {
			workingDirectory: '/work/app',
			environmentVariables: { TEST_REGION: 'test-region' },
			document: { filename: 'test.hcl' }
		}
	};
}

/** Parses `value = <expression>` and evaluates the right-hand side. */
export function evaluateSource(expression: string, context: EvalContext = createContext()): Promise<Value> {
	const document = parseDocument(`value = ${expression}\n`, 'test.hcl');
	const [attribute] = document.getAttributes();
	return evaluateExpression(attribute.children[0], context);
}

/** The value as plain JSON, the same form `jsonencode` produces. */
export const toPlain = (value: Value): JsonValue => toJsonValue(value, typeOf(value));

/** Diagnostic messages of the DecodeError an expression fails with. */
export async function decodeFailure(expression: string, context: EvalContext = createContext()): Promise<string> {
	const error = await rejectionOf(evaluateSource(expression, context));
	if (!(error instanceof DecodeError)) {
		throw new Error(`expected a DecodeError, got ${String(error)}`);
	}
	return error.diagnostics.map(diagnostic => diagnostic.message).join('\n');
}
