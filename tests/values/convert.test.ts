import { expect } from 'chai';

import { ConversionFailedError } from '../../src/errors';
import { convertValue } from '../../src/values/convert';
import { Types } from '../../src/values/types';
import type { Value } from '../../src/values/values';
import {
	makeBool,
	makeNull,
	makeNumber,
	makeObject,
	makeString,
	makeTuple,
	makeUnknown,
	typeOf
} from '../../src/values/values';
import { thrownBy } from '../helpers';

describe('values/convert', () => {
	describe('primitives', () => {
		interface TestCase {
			name: string;
			value: Value;
			want: typeof Types.string | typeof Types.number | typeof Types.bool;
			expected: Value;
		}

		const tests: TestCase[] = [
			{ name: 'number to string', value: makeNumber(1.5), want: Types.string, expected: makeString('1.5') },
			{ name: 'bool to string', value: makeBool(true), want: Types.string, expected: makeString('true') },
			{ name: 'string to number', value: makeString(' 42 '), want: Types.number, expected: makeNumber(42) },
			{ name: 'string to bool', value: makeString('false'), want: Types.bool, expected: makeBool(false) }
		];

		tests.forEach(test => {
			it(test.name, () => {
				expect(convertValue(test.value, test.want)).to.deep.equal(test.expected);
			});
		});

		it('rejects strings that are not numbers', () => {
			const error = thrownBy(() => convertValue(makeString('ten'), Types.number));
			expect(error).to.be.instanceOf(ConversionFailedError).and.to.have.property('message', 'a number is required, got "ten"');
		});

		it('rejects bool to number', () => {
			const error = thrownBy(() => convertValue(makeBool(true), Types.number));
			expect(error).to.have.property('message', 'number required, got bool');
		});
	});

	it('converts a tuple to a list of strings', () => {
		const converted = convertValue(makeTuple([makeString('plan'), makeNumber(1)]), Types.list(Types.string));
		expect(converted.type).to.equal('list');
		expect(typeOf(converted)).to.deep.equal(Types.list(Types.string));
		expect(converted.value).to.deep.equal([makeString('plan'), makeString('1')]);
	});

	it('converts an object to a map when the attributes agree', () => {
		const converted = convertValue(makeObject({ a: makeNumber(1), b: makeNumber(2) }), Types.map(Types.dynamic));
		expect(typeOf(converted)).to.deep.equal(Types.map(Types.number));
	});

	it('rejects an object with mixed attribute types as a map', () => {
		const error = thrownBy(() => convertValue(makeObject({ a: makeNumber(1), b: makeString('x') }), Types.map(Types.dynamic)));
		expect(error).to.have.property('message', 'all elements must have the same type');
	});

	it('gives null and unknown values the wanted type', () => {
		expect(convertValue(makeNull(), Types.string)).to.deep.equal(makeNull(Types.string));
		expect(convertValue(makeUnknown(), Types.bool)).to.deep.equal(makeUnknown(Types.bool));
	});

	it('reports the path of a nested failure', () => {
		const value = makeObject({ ports: makeTuple([makeNumber(80), makeString('x')]) });
		const error = thrownBy(() => convertValue(value, Types.object({ ports: Types.list(Types.number) })));
		expect(error).to.have.property('path', 'ports[1]');
	});
});
