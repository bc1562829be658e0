import { decodeBody } from './BodyDecoder';
import type { Dependency } from './ConfigDecoder';
import { toDependencies } from './ConfigDecoder';
import type { EvalContext } from './EvalContext';
import { ConversionFailedError, DependencyOutputUnavailableError } from './errors';
import type { Logger } from './logger';
import type { ParsedDocument } from './ParsedDocument';
import { dependencyOnlySpec } from './Schema';
import type { OutputRetriever, RetrievalContext } from './tf/model';
import { recordFromMap, valueToGenericMap } from './ValueBridge';
import type { JsonObject } from './values/json';
import { fromJsonValue, impliedValue, isJsonObject, toJsonValue } from './values/json';
import { marshalType, unmarshalType } from './values/types';
import type { ObjectValue, Value } from './values/values';
import { isMapping, sortedEntries, typeOf } from './values/values';

export interface ResolverOptions {
	outputRetriever?: OutputRetriever;
	retrievalContext: RetrievalContext;
	logger: Logger;
}

export interface DependencyResolution {
	/** `name → { outputs? }`; absent when the file declares no dependency. */
	value?: ObjectValue;
	dependencies: Dependency[];
}

/**
 * Turns output JSON (name → `{ sensitive, type, value }`) into one value per
 * output.
 */
export function outputsFromJson(json: JsonObject, dependencyName: string): Map<string, Value> {
	const outputs = new Map<string, Value>();
	for (const [name, meta] of Object.entries(json)) {
		if (!isJsonObject(meta) || !('type' in meta) || !('value' in meta)) {
			throw new ConversionFailedError(`output "${name}" of dependency "${dependencyName}" must have a type and a value`);
		}
		const type = unmarshalType(meta.type);
		outputs.set(name, fromJsonValue(meta.value, type, name));
	}
	return outputs;
}

/**
 * Encodes mock outputs the way real outputs arrive, so both take the same
 * path into the output record.
 */
export function mockOutputsToJson(mockOutputs: Value): JsonObject {
	return Object.fromEntries(Object.entries(valueToGenericMap(mockOutputs)).map(([name, value]): [string, JsonObject] => {
		const implied = impliedValue(value);
		const type = typeOf(implied);
		return [name, {
			sensitive: false,
			type: marshalType(type),
			value: toJsonValue(implied, type)
		}];
	}));
}

const mockOutputsAllowed = (dependency: Dependency, terraformCommand?: string): boolean =>
	terraformCommand === undefined ||
	dependency.mockOutputsAllowedTerraformCommands === undefined ||
	dependency.mockOutputsAllowedTerraformCommands.includes(terraformCommand);

export class DependencyResolver {
	constructor(private readonly options: ResolverOptions) { }

	/**
	 * Decodes only the dependency blocks, computes the outputs of each and
	 * encodes them all as one value keyed by dependency name.
	 */
	public async resolve(document: ParsedDocument, context: EvalContext): Promise<DependencyResolution> {
		const body = await decodeBody(document.getBodyItems(), dependencyOnlySpec, document.root.location, context);
		const declared = toDependencies(body.blocks.get('dependency') ?? []);
		if (declared.length === 0) {
			return { dependencies: [] };
		}

		const dependencies = await Promise.all(declared.map(dependency => this.renderOutputs(dependency)));

		const encoded = new Map<string, Value>();
		for (const dependency of dependencies) {
			const attributes = new Map<string, Value>();
			if (dependency.renderedOutputs) {
				attributes.set('outputs', dependency.renderedOutputs);
			}
			encoded.set(dependency.name, recordFromMap(attributes));
		}

		return { value: recordFromMap(encoded), dependencies };
	}

	private async renderOutputs(dependency: Dependency): Promise<Dependency> {
		const { mockOutputs } = dependency;
		if (mockOutputs === undefined) {
			return { ...dependency };
		}

		const { outputRetriever, retrievalContext, logger } = this.options;

		if (!dependency.skipOutputs && outputRetriever) {
			const result = await outputRetriever.retrieveOutputs(
				{ name: dependency.name, configPath: dependency.configPath },
				retrievalContext
			);
			if (result.available) {
				const outputs = outputsFromJson(result.json, dependency.name);
				if (dependency.mockOutputsMergeWithState && isMapping(mockOutputs)) {
					for (const [name, value] of sortedEntries(mockOutputs)) {
						if (!outputs.has(name)) outputs.set(name, value);
					}
				}
				return { ...dependency, renderedOutputs: recordFromMap(outputs) };
			}
			logger.debug(`Outputs of dependency "${dependency.name}" are not available${result.reason ? ` (${result.reason})` : ''}`);
		}

		if (!mockOutputsAllowed(dependency, retrievalContext.terraformCommand)) {
			throw new DependencyOutputUnavailableError(
				dependency.name,
				`mock outputs are not allowed for terraform command "${retrievalContext.terraformCommand ?? ''}"`
			);
		}

		logger.debug(`Using mock outputs for dependency "${dependency.name}"`);
		const outputs = outputsFromJson(mockOutputsToJson(mockOutputs), dependency.name);
		return { ...dependency, renderedOutputs: recordFromMap(outputs) };
	}
}
