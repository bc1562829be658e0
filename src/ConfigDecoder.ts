import type { Diagnostic } from 'vscode-languageserver-types';

import type { DecodedBlock, DecodedBody } from './BodyDecoder';
import { decodeBody } from './BodyDecoder';
import type { EvalContext } from './EvalContext';
import { createDiagnostic, DecodeError } from './errors';
import type { Token } from './model';
import type { ParsedDocument } from './ParsedDocument';
import { getBlockBody } from './ParsedDocument';
import { terragruntConfigSpec } from './Schema';
import type { GenericMap } from './ValueBridge';
import { valueToGenericMap } from './ValueBridge';
import type { ObjectValue, Value } from './values/values';

export interface TerraformConfig {
	source?: string;
}

export interface Dependency {
	name: string;
	configPath: string;
	skipOutputs?: boolean;
	mockOutputs?: Value;
	mockOutputsAllowedTerraformCommands?: string[];
	mockOutputsMergeWithState?: boolean;
	/** Computed by the dependency resolver, never read from the file. */
	renderedOutputs?: ObjectValue;
}

export interface IncludeDeclaration {
	name: string;
	/** Body items, not evaluated. */
	body: Token[];
	token: Token;
}

/** Result of decoding a whole file, before assembly. */
export interface ConfigFile {
	terraform?: TerraformConfig;
	terraformBinary?: string;
	inputs?: Value;
	dependencies: Dependency[];
	includes: IncludeDeclaration[];
}

export interface ResolvedConfiguration {
	terraform?: TerraformConfig;
	terraformBinary: string;
	dependencies: Dependency[];
	inputs: GenericMap;
}

const stringAttribute = (body: DecodedBody, name: string): string | undefined => {
	const value = body.attributes.get(name);
	return value?.type === 'string' ? value.value : undefined;
};

const boolAttribute = (body: DecodedBody, name: string): boolean | undefined => {
	const value = body.attributes.get(name);
	return value?.type === 'bool' ? value.value : undefined;
};

const stringListAttribute = (body: DecodedBody, name: string): string[] | undefined => {
	const value = body.attributes.get(name);
	if (value?.type !== 'list') return undefined;
	return value.value.flatMap(element => element.type === 'string' ? [element.value] : []);
};

const toDependency = (block: DecodedBlock): Dependency => {
	const dependency: Dependency = {
		name: block.labels[0],
		configPath: ''
	};
	if (!block.body) return dependency;

	dependency.configPath = stringAttribute(block.body, 'config_path') ?? '';

	const skipOutputs = boolAttribute(block.body, 'skip_outputs');
	if (skipOutputs !== undefined) dependency.skipOutputs = skipOutputs;

	const mockOutputs = block.body.attributes.get('mock_outputs');
	if (mockOutputs !== undefined) dependency.mockOutputs = mockOutputs;

	const allowedCommands = stringListAttribute(block.body, 'mock_outputs_allowed_terraform_commands');
	if (allowedCommands !== undefined) dependency.mockOutputsAllowedTerraformCommands = allowedCommands;

	const mergeWithState = boolAttribute(block.body, 'mock_outputs_merge_with_state');
	if (mergeWithState !== undefined) dependency.mockOutputsMergeWithState = mergeWithState;

	return dependency;
};

/**
 * Converts decoded dependency blocks, in file order. Names must be unique
 * since they key the `dependency` variable.
 */
export function toDependencies(blocks: DecodedBlock[]): Dependency[] {
	const seen = new Map<string, DecodedBlock>();
	const diagnostics: Diagnostic[] = [];

	for (const block of blocks) {
		const name = block.labels[0];
		const previous = seen.get(name);
		if (previous) {
			diagnostics.push(createDiagnostic(
				block.token.location,
				'Duplicate dependency block',
				`A dependency named "${name}" was already declared at ${previous.token.location.source}:${previous.token.location.start.line},${previous.token.location.start.column}. Dependency names must be unique.`,
				'DecodeError'
			));
			continue;
		}
		seen.set(name, block);
	}

	if (diagnostics.length > 0) {
		throw new DecodeError(diagnostics);
	}
	return blocks.map(toDependency);
}

/**
 * Decodes the whole file against the context. Undefined when the file has
 * neither attributes nor blocks.
 */
export async function decodeFull(document: ParsedDocument, context: EvalContext): Promise<ConfigFile | undefined> {
	if (document.isEmpty()) {
		return undefined;
	}

	const body = await decodeBody(document.getBodyItems(), terragruntConfigSpec, document.root.location, context);

	const config: ConfigFile = {
		dependencies: toDependencies(body.blocks.get('dependency') ?? []),
		includes: (body.blocks.get('include') ?? []).map(block => ({
			name: block.labels[0],
			body: getBlockBody(block.token)?.children ?? [],
			token: block.token
		}))
	};

	const [terraform] = body.blocks.get('terraform') ?? [];
	if (terraform?.body) {
		const source = stringAttribute(terraform.body, 'source');
		config.terraform = source === undefined ? {} : { source };
	}

	const terraformBinary = stringAttribute(body, 'terraform_binary');
	if (terraformBinary !== undefined) config.terraformBinary = terraformBinary;

	const inputs = body.attributes.get('inputs');
	if (inputs !== undefined) config.inputs = inputs;

	return config;
}

/**
 * Builds the public configuration. Rendered outputs computed by the first
 * pass are attached to the dependencies of the same name.
 */
export function assemble(target: ConfigFile, resolvedDependencies: Dependency[] = []): ResolvedConfiguration {
	const rendered = new Map<string, ObjectValue>();
	for (const dependency of resolvedDependencies) {
		if (dependency.renderedOutputs) rendered.set(dependency.name, dependency.renderedOutputs);
	}

	const resolved: ResolvedConfiguration = {
		terraformBinary: target.terraformBinary ?? '',
		dependencies: target.dependencies.map(dependency => {
			const renderedOutputs = rendered.get(dependency.name);
			return renderedOutputs === undefined ? { ...dependency } : { ...dependency, renderedOutputs };
		}),
		inputs: target.inputs === undefined || target.inputs.type === 'null' ? {} : valueToGenericMap(target.inputs)
	};
	if (target.terraform) {
		resolved.terraform = { ...target.terraform };
	}
	return resolved;
}
