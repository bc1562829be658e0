import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { URI } from 'vscode-uri';

import { DependencyOutputUnavailableError } from '../errors';
import type { Logger } from '../logger';
import type { JsonObject } from '../values/json';
import { isJsonObject } from '../values/json';
import type { OutputRequest, OutputRetrievalResult, OutputRetriever, RetrievalContext, TerraformState, TerraformStateOutput } from './model';

export const STATE_FILE_NAME = 'terraform.tfstate';

const isStateOutput = (value: unknown): value is TerraformStateOutput =>
	isJsonObject(value) &&
	'value' in value &&
	'type' in value &&
	(value.sensitive === undefined || typeof value.sensitive === 'boolean');

const isTerraformState = (value: unknown): value is TerraformState => {
	if (!isJsonObject(value) || typeof value.version !== 'number') return false;
	const outputs = value.outputs;
	return isJsonObject(outputs) && Object.values(outputs).every(isStateOutput);
};

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads dependency outputs from the `terraform.tfstate` file found in the
 * dependency's config directory. States are cached per file URI until
 * invalidated.
 */
export class StateFileOutputRetriever implements OutputRetriever {
	private stateCache = new Map<string, TerraformState>();

	constructor(private readonly logger: Logger = console) { }

	public getStateUri(dependency: OutputRequest, context: RetrievalContext): URI {
		const directory = path.resolve(context.workingDirectory, dependency.configPath);
		return URI.file(path.join(directory, STATE_FILE_NAME));
	}

	/**
	 * Finds and reads the state file of a dependency; undefined when the
	 * dependency has never been applied.
	 */
	public async findState(dependency: OutputRequest, context: RetrievalContext): Promise<TerraformState | undefined> {
		const stateUri = this.getStateUri(dependency, context);
		const key = stateUri.toString();

		const cached = this.stateCache.get(key);
		if (cached) {
			return cached;
		}

		let stateText: string;
		try {
			stateText = await fs.readFile(stateUri.fsPath, 'utf8');
		} catch (error) {
			if (isMissingFile(error)) {
				this.logger.debug(`No state file found for dependency "${dependency.name}" at ${stateUri.fsPath}`);
				return undefined;
			}
			this.logger.warn(`Cannot read state file ${stateUri.fsPath}:`, error);
			throw new DependencyOutputUnavailableError(dependency.name, `cannot read ${stateUri.fsPath}`);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(stateText);
		} catch (error) {
			this.logger.warn(`State file ${stateUri.fsPath} is not valid JSON:`, error);
			throw new DependencyOutputUnavailableError(dependency.name, `${stateUri.fsPath} is not valid JSON`);
		}
		if (!isTerraformState(parsed)) {
			this.logger.warn(`State file ${stateUri.fsPath} has an unexpected shape`);
			throw new DependencyOutputUnavailableError(dependency.name, `${stateUri.fsPath} is not a terraform state file`);
		}

		this.stateCache.set(key, parsed);
		return parsed;
	}

	public async retrieveOutputs(dependency: OutputRequest, context: RetrievalContext): Promise<OutputRetrievalResult> {
		const state = await this.findState(dependency, context);
		if (!state) {
			return { available: false, reason: 'no state file' };
		}

		const json = Object.fromEntries(Object.entries(state.outputs).map(([name, output]): [string, JsonObject] => [name, {
			sensitive: output.sensitive ?? false,
			type: output.type,
			value: output.value
		}]));
		return { available: true, json };
	}

	public invalidateCache(stateUri?: URI): void {
		if (stateUri) {
			this.stateCache.delete(stateUri.toString());
		} else {
			this.stateCache.clear();
		}
	}
}
