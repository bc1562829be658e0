import { expect } from 'chai';

import { terragruntFunctionGroup } from '../../src/functions';
import { createContext, decodeFailure, evaluateSource, toPlain } from '../helpers';

const context = createContext({}, [terragruntFunctionGroup]);

describe('terragrunt functions', () => {
	it('reads environment variables from the context', async () => {
		expect(toPlain(await evaluateSource('get_env("TEST_REGION")', context))).to.equal('test-region');
	});

	it('falls back to the default of an unset variable', async () => {
		expect(toPlain(await evaluateSource('get_env("UNSET_VAR", "fallback")', context))).to.equal('fallback');
	});

	it('fails for an unset variable without a default', async () => {
		expect(await decodeFailure('get_env("UNSET_VAR")', context)).to.equal(
			'Error in function call; Call to function "get_env" failed: environment variable "UNSET_VAR" is not set and no default was given.'
		);
	});

	it('gives the working directory', async () => {
		expect(toPlain(await evaluateSource('get_terragrunt_dir()', context))).to.equal('/work/app');
	});

	it('gives the platform', async () => {
		expect(toPlain(await evaluateSource('get_platform()', context))).to.equal(process.platform);
	});
});
