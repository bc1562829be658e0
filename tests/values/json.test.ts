import { expect } from 'chai';

import { ConversionFailedError } from '../../src/errors';
import { impliedValue, marshalValue, toJsonValue, unmarshalValue } from '../../src/values/json';
import { Types, unmarshalType } from '../../src/values/types';
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
	valueEquals
} from '../../src/values/values';
import { thrownBy } from '../helpers';

describe('values/json', () => {
	describe('marshalValue', () => {
		it('wraps a value with its type under the dynamic type', () => {
			const value = makeObject({ name: makeString('db'), port: makeNumber(5432) });
			expect(marshalValue(value, Types.dynamic)).to.equal(
				'{"value":{"name":"db","port":5432},"type":["object",{"name":"string","port":"number"}]}'
			);
		});

		it('writes plain JSON under a concrete type', () => {
			const value = makeList(Types.string, [makeString('a'), makeString('b')]);
			expect(marshalValue(value, Types.list(Types.string))).to.equal('["a","b"]');
		});

		it('writes null without a wrapper', () => {
			expect(marshalValue(makeNull(), Types.dynamic)).to.equal('null');
		});

		it('sorts object keys', () => {
			const value = makeObject({ b: makeBool(true), a: makeBool(false) });
			expect(marshalValue(value, Types.object({ a: Types.bool, b: Types.bool }))).to.equal('{"a":false,"b":true}');
		});

		it('refuses unknown values', () => {
			const error = thrownBy(() => marshalValue(makeObject({ id: makeUnknown(Types.string) }), Types.dynamic));
			expect(error).to.be.instanceOf(ConversionFailedError).and.to.have.property('path', 'id');
		});

		it('refuses infinite numbers', () => {
			const error = thrownBy(() => toJsonValue(makeNumber(Infinity), Types.number));
			expect(error).to.be.instanceOf(ConversionFailedError);
		});
	});

	describe('unmarshalValue', () => {
		it('reads back a dynamic wrapper', () => {
			const value = unmarshalValue('{"value":["a",1],"type":["tuple",["string","number"]]}', Types.dynamic);
			expect(valueEquals(value, makeTuple([makeString('a'), makeNumber(1)]))).to.equal(true);
		});

		it('converts primitives the way the type asks', () => {
			expect(unmarshalValue('12', Types.string)).to.deep.equal(makeString('12'));
			expect(unmarshalValue('"12"', Types.number)).to.deep.equal(makeNumber(12));
			expect(unmarshalValue('"true"', Types.bool)).to.deep.equal(makeBool(true));
		});

		it('reads a map', () => {
			const value = unmarshalValue('{"x":1,"y":2}', Types.map(Types.number));
			expect(valueEquals(value, makeMap(Types.number, { x: makeNumber(1), y: makeNumber(2) }))).to.equal(true);
		});

		it('rejects objects with missing attributes', () => {
			const error = thrownBy(() => unmarshalValue('{"a":"x"}', Types.object({ a: Types.string, b: Types.string })));
			expect(error).to.be.instanceOf(ConversionFailedError).and.to.have.property('message', 'missing required attribute "b"');
		});

		it('rejects tuples of the wrong length', () => {
			const error = thrownBy(() => unmarshalValue('[1]', Types.tuple([Types.number, Types.number])));
			expect(error).to.have.property('message', 'tuple requires 2 elements, got 1');
		});

		it('rejects malformed JSON', () => {
			expect(thrownBy(() => unmarshalValue('{', Types.dynamic))).to.be.instanceOf(ConversionFailedError);
		});
	});

	describe('unmarshalType', () => {
		it('reads nested type descriptors', () => {
			expect(unmarshalType(['map', ['list', 'string']])).to.deep.equal(Types.map(Types.list(Types.string)));
		});

		it('rejects unknown type names', () => {
			const error = thrownBy(() => unmarshalType('text'));
			expect(error).to.have.property('message', 'invalid primitive type name "text"');
		});
	});

	describe('impliedValue', () => {
		it('turns arrays into tuples and objects into objects', () => {
			const value = impliedValue({ tags: ['a', 1], on: true, none: null });
			expect(value.type).to.equal('object');
			expect(valueEquals(value, makeObject({
				tags: makeTuple([makeString('a'), makeNumber(1)]),
				on: makeBool(true),
				none: makeNull()
			}))).to.equal(true);
		});
	});
});
