import { expect } from 'chai';

import { collectionFunctionGroup } from '../../src/functions';
import type { JsonValue } from '../../src/values/json';
import { createContext, decodeFailure, evaluateSource, toPlain } from '../helpers';

const context = createContext({}, [collectionFunctionGroup]);

describe('collection functions', () => {
	interface TestCase {
		name: string;
		expression: string;
		expected: JsonValue;
	}

	const tests: TestCase[] = [
		{ name: 'length of a string', expression: 'length("héllo")', expected: 5 },
		{ name: 'length of a tuple', expression: 'length([1, 2])', expected: 2 },
		{ name: 'length of an object', expression: 'length({ a = 1 })', expected: 1 },
		{ name: 'concat', expression: 'concat([1], ["a"])', expected: [1, 'a'] },
		{ name: 'merge', expression: 'merge({ a = 1, b = 2 }, { b = "x" }, null)', expected: { a: 1, b: 'x' } },
		{ name: 'lookup', expression: 'lookup({ a = 1 }, "a")', expected: 1 },
		{ name: 'lookup with a default', expression: 'lookup({ a = 1 }, "z", 0)', expected: 0 },
		{ name: 'keys', expression: 'keys({ b = 1, a = 2 })', expected: ['a', 'b'] },
		{ name: 'values', expression: 'values({ b = 1, a = 2 })', expected: [2, 1] },
		{ name: 'contains', expression: 'contains(["a", "b"], "b")', expected: true },
		{ name: 'contains compares types', expression: 'contains([1], "1")', expected: false }
	];

	tests.forEach(test => {
		it(test.name, async () => {
			expect(toPlain(await evaluateSource(test.expression, context))).to.deep.equal(test.expected);
		});
	});

	it('gives merge an object type so values may differ', async () => {
		const merged = await evaluateSource('merge({ a = 1 }, { b = "x" })', context);
		expect(merged.type).to.equal('object');
	});

	describe('errors', () => {
		const failures: [string, string][] = [
			['lookup({ a = 1 }, "z")', 'lookup: the given key "z" does not exist and no default was given'],
			['length(1)', 'length: argument must be a string, collection or structural value, got number'],
			['keys([1])', 'keys: argument 1 must be a map or object, got tuple'],
			['concat()', 'concat requires at least 1 argument(s), got 0']
		];

		failures.forEach(([expression, message]) => {
			it(`rejects ${expression}`, async () => {
				const name = expression.slice(0, expression.indexOf('('));
				expect(await decodeFailure(expression, context)).to.equal(
					`Error in function call; Call to function "${name}" failed: ${message}.`
				);
			});
		});
	});
});
