import { expect } from 'chai';

import { ConversionFailedError } from '../src/errors';
import { genericMapToValue, recordFromMap, syntheticRecordType, valueToGenericMap } from '../src/ValueBridge';
import { Types } from '../src/values/types';
import type { Value } from '../src/values/values';
import {
	makeBool,
	makeList,
	makeMap,
	makeNull,
	makeNumber,
	makeObject,
	makeString,
	makeTuple,
	makeUnknown,
	typeOf,
	valueEquals
} from '../src/values/values';
import { thrownBy } from './helpers';

describe('ValueBridge', () => {
	describe('valueToGenericMap', () => {
		it('converts a record with mixed attribute types', () => {
			const value = makeObject({
				name: makeString('db'),
				port: makeNumber(5432),
				public: makeBool(false),
				zones: makeList(Types.string, [makeString('a'), makeString('b')]),
				tags: makeMap(Types.string, { team: makeString('infra') }),
				extra: makeNull()
			});

			expect(valueToGenericMap(value)).to.deep.equal({
				extra: null,
				name: 'db',
				port: 5432,
				public: false,
				tags: { team: 'infra' },
				zones: ['a', 'b']
			});
		});

		it('keeps keys named like Object.prototype members', () => {
			const value = makeObject(new Map<string, Value>([
				['__proto__', makeString('x')],
				['b', makeNumber(1)]
			]));

			const map = valueToGenericMap(value);

			expect(Object.keys(map)).to.deep.equal(['__proto__', 'b']);
			expect(Object.getOwnPropertyDescriptor(map, '__proto__')?.value).to.equal('x');
			expect(Object.getPrototypeOf(map)).to.equal(Object.prototype);
		});

		it('gives an empty mapping for null', () => {
			expect(valueToGenericMap(makeNull())).to.deep.equal({});
		});

		it('fails for values that are not maps or objects', () => {
			const error = thrownBy(() => valueToGenericMap(makeString('x')));
			expect(error).to.be.instanceOf(ConversionFailedError).and.to.have.property('message', 'a map or object is required, got string');
		});

		it('fails when a value is not known', () => {
			const error = thrownBy(() => valueToGenericMap(makeObject({ id: makeUnknown(Types.string) })));
			expect(error).to.be.instanceOf(ConversionFailedError);
		});

		it('keeps large integers and fractions exact', () => {
			const value = makeObject({ big: makeNumber(9007199254740991), ratio: makeNumber(0.1) });
			const map = valueToGenericMap(value);
			expect(map.big).to.equal(9007199254740991);
			expect(map.ratio).to.equal(0.1);
		});
	});

	describe('round trip', () => {
		const records: [string, Value][] = [
			['scalars', makeObject({ s: makeString('x y "z"'), n: makeNumber(-12), f: makeNumber(3.25), b: makeBool(true) })],
			['nested', makeObject({ outer: makeObject({ inner: makeTuple([makeString('a'), makeNumber(1)]) }) })],
			['empty', makeObject()]
		];

		records.forEach(([name, record]) => {
			it(`reproduces the ${name} record`, () => {
				const map = valueToGenericMap(record);
				const back = genericMapToValue(map);
				expect(valueEquals(back, record)).to.equal(true);
				expect(valueToGenericMap(back)).to.deep.equal(map);
			});
		});
	});

	describe('syntheticRecordType', () => {
		it('takes each attribute type from its value', () => {
			const entries = new Map<string, Value>([
				['a', makeString('x')],
				['b', makeTuple([makeNumber(1)])]
			]);
			expect(syntheticRecordType(entries)).to.deep.equal(Types.object({
				a: Types.string,
				b: Types.tuple([Types.number])
			}));
		});
	});

	describe('recordFromMap', () => {
		it('builds one object whose type matches its entries', () => {
			const entries = new Map<string, Value>([
				['vpc', makeObject({ outputs: makeObject({ id: makeString('vpc-1') }) })],
				['db', makeObject()]
			]);
			const record = recordFromMap(entries);
			expect(typeOf(record)).to.deep.equal(Types.object({
				vpc: Types.object({ outputs: Types.object({ id: Types.string }) }),
				db: Types.object({})
			}));
		});
	});
});
