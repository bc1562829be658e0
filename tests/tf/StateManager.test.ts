import { expect } from 'chai';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { DependencyOutputUnavailableError } from '../../src/errors';
import type { Logger } from '../../src/logger';
import { STATE_FILE_NAME, StateFileOutputRetriever } from '../../src/tf/StateManager';
import { rejectionOf } from '../helpers';

const STATE = {
	version: 4,
	terraform_version: '1.7.0',
	outputs: {
		vpc_id: { value: 'vpc-1', type: 'string' },
		zones: { value: ['a', 'b'], type: ['list', 'string'], sensitive: true }
	}
};

describe('StateFileOutputRetriever', () => {
	let workspace: string;
	let warnings: string[];
	let debugMessages: string[];
	let logger: Logger;

	const writeState = async (dependency: string, content: string): Promise<void> => {
		const directory = path.join(workspace, dependency);
		await fs.mkdir(directory, { recursive: true });
		await fs.writeFile(path.join(directory, STATE_FILE_NAME), content, 'utf8');
	};

	const context = (): { workingDirectory: string } => ({ workingDirectory: path.join(workspace, 'app') });

	beforeEach(async () => {
		workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'state-retriever-'));
		warnings = [];
		debugMessages = [];
		logger = {
			debug: (message: string) => { debugMessages.push(message); },
			warn: (message: string) => { warnings.push(message); },
			error: () => undefined
		};
	});

	afterEach(async () => {
		await fs.rm(workspace, { recursive: true, force: true });
	});

	it('resolves the state file next to the dependency config', () => {
		const retriever = new StateFileOutputRetriever(logger);
		const uri = retriever.getStateUri({ name: 'vpc', configPath: '../vpc' }, { workingDirectory: '/work/app' });
		expect(uri.fsPath).to.equal('/work/vpc/terraform.tfstate');
		expect(uri.scheme).to.equal('file');
	});

	it('reads outputs from the state file', async () => {
		await writeState('vpc', JSON.stringify(STATE));
		const retriever = new StateFileOutputRetriever(logger);

		const result = await retriever.retrieveOutputs({ name: 'vpc', configPath: '../vpc' }, context());

		expect(result).to.deep.equal({
			available: true,
			json: {
				vpc_id: { sensitive: false, type: 'string', value: 'vpc-1' },
				zones: { sensitive: true, type: ['list', 'string'], value: ['a', 'b'] }
			}
		});
	});

	it('reports a dependency that was never applied', async () => {
		const retriever = new StateFileOutputRetriever(logger);

		const result = await retriever.retrieveOutputs({ name: 'db', configPath: '../db' }, context());

		expect(result).to.deep.equal({ available: false, reason: 'no state file' });
		expect(debugMessages).to.have.length(1);
		expect(debugMessages[0].startsWith('No state file found for dependency "db" at ')).to.equal(true);
	});

	it('caches states until invalidated', async () => {
		await writeState('vpc', JSON.stringify(STATE));
		const retriever = new StateFileOutputRetriever(logger);
		const request = { name: 'vpc', configPath: '../vpc' };

		await retriever.findState(request, context());
		await writeState('vpc', JSON.stringify({ version: 4, outputs: {} }));

		expect(Object.keys((await retriever.findState(request, context()))?.outputs ?? {})).to.deep.equal(['vpc_id', 'zones']);

		retriever.invalidateCache(retriever.getStateUri(request, context()));
		expect((await retriever.findState(request, context()))?.outputs).to.deep.equal({});
	});

	it('rejects a state file that is not JSON', async () => {
		await writeState('vpc', '{ not json');
		const retriever = new StateFileOutputRetriever(logger);

		const error = await rejectionOf(retriever.retrieveOutputs({ name: 'vpc', configPath: '../vpc' }, context()));

		expect(error).to.be.instanceOf(DependencyOutputUnavailableError).and.to.have.property('dependency', 'vpc');
		expect(warnings).to.have.length(1);
	});

	it('rejects a file that is not a terraform state', async () => {
		await writeState('vpc', JSON.stringify({ outputs: [] }));
		const retriever = new StateFileOutputRetriever(logger);

		const error = await rejectionOf(retriever.retrieveOutputs({ name: 'vpc', configPath: '../vpc' }, context()));

		expect(error).to.be.instanceOf(DependencyOutputUnavailableError);
		expect(warnings[0].endsWith('has an unexpected shape')).to.equal(true);
	});
});
