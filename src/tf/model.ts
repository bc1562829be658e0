import type { JsonObject, JsonValue } from '../values/json';

export interface TerraformStateOutput {
	value: JsonValue;
	type: JsonValue;
	sensitive?: boolean;
}

export interface TerraformState {
	version: number;
	terraform_version?: string;
	serial?: number;
	lineage?: string;
	outputs: Record<string, TerraformStateOutput>;
}

/** What a retriever needs to know about the dependency it looks up. */
export interface OutputRequest {
	name: string;
	configPath: string;
}

export interface RetrievalContext {
	/** Directory `config_path` values are relative to. */
	workingDirectory: string;
	terraformCommand?: string;
}

/**
 * Real outputs, as output name → `{ sensitive, type, value }` with `type` in
 * the type JSON encoding, or a signal that none are available.
 */
export type OutputRetrievalResult =
	| { available: true; json: JsonObject }
	| { available: false; reason?: string };

/**
 * Source of a dependency's real outputs. Resolving to "not available" makes
 * the caller fall back to mock outputs; rejecting is a hard failure.
 */
export interface OutputRetriever {
	retrieveOutputs(dependency: OutputRequest, context: RetrievalContext): Promise<OutputRetrievalResult>;
}
