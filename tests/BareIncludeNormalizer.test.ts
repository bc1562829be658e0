import { expect } from 'chai';

import { normalizeBareInclude } from '../src/BareIncludeNormalizer';
import { parseDocument } from '../src/DocumentParser';
import { MultipleBareIncludesError } from '../src/errors';
import { thrownBy } from './helpers';

const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('normalizeBareInclude', () => {
	interface TestCase {
		name: string;
		input: string;
		expected: string;
		changed: boolean;
	}

	const tests: TestCase[] = [
		{
			name: 'labels a bare include',
			input: 'include {\n  path = "x"\n}\n',
			expected: 'include "" {\n  path = "x"\n}\n',
			changed: true
		},
		{
			name: 'labels a bare include after other items',
			input: 'a = 1\n\ninclude {}\n',
			expected: 'a = 1\n\ninclude "" {}\n',
			changed: true
		},
		{
			name: 'keeps a labeled include',
			input: 'include "root" {\n  path = "x"\n}\n',
			expected: 'include "root" {\n  path = "x"\n}\n',
			changed: false
		},
		{
			name: 'keeps a file without includes',
			input: 'terraform {}\n',
			expected: 'terraform {}\n',
			changed: false
		},
		{
			name: 'allows one bare include beside labeled ones',
			input: 'include "a" {}\ninclude {}\n',
			expected: 'include "a" {}\ninclude "" {}\n',
			changed: true
		}
	];

	tests.forEach(test => {
		it(test.name, () => {
			const result = normalizeBareInclude(parseDocument(test.input, 'test.hcl'));
			expect(result.changed).to.equal(test.changed);
			expect(decode(result.bytes)).to.equal(test.expected);
		});
	});

	it('returns the original bytes when nothing changes', () => {
		const document = parseDocument('include "root" {}\n', 'test.hcl');
		expect(normalizeBareInclude(document).bytes).to.equal(document.bytes);
	});

	it('gives a document that parses with one label', () => {
		const result = normalizeBareInclude(parseDocument('include {}\n', 'test.hcl'));
		const [include] = parseDocument(result.bytes, 'test.hcl').getBlocks('include');
		expect(include.children.filter(child => child.type === 'parameter').map(label => label.value)).to.deep.equal(['']);
	});

	it('rejects more than one bare include', () => {
		const error = thrownBy(() => normalizeBareInclude(parseDocument('include {}\n\ninclude {}\n', 'root.hcl')));
		expect(error).to.be.instanceOf(MultipleBareIncludesError).and.to.have.property('kind', 'MultipleBareIncludes');
		expect(error).to.have.property(
			'message',
			'root.hcl:3,1-11: Multiple bare include blocks; Only one include block without a label is allowed'
		);
	});
});
