import * as path from 'node:path';

import { normalizeBareInclude } from './BareIncludeNormalizer';
import type { ResolvedConfiguration } from './ConfigDecoder';
import { assemble, decodeFull } from './ConfigDecoder';
import { DependencyResolver } from './DependencyResolver';
import { DocumentParser } from './DocumentParser';
import { buildContext } from './EvalContext';
import { NoConfigurationFoundError } from './errors';
import type { Logger } from './logger';
import type { FunctionContext, FunctionGroup } from './model';
import type { OutputRetriever } from './tf/model';

export interface EvaluateOptions {
	/** Name used in diagnostics; also locates the working directory. */
	filename?: string;
	workingDirectory?: string;
	/** Source of real dependency outputs; without one mock outputs are used. */
	outputRetriever?: OutputRetriever;
	terraformCommand?: string;
	functions?: readonly FunctionGroup[];
	environment?: Readonly<Record<string, string | undefined>>;
	logger?: Logger;
}

export interface ResolvedOptions {
	filename: string;
	workingDirectory: string;
	outputRetriever?: OutputRetriever;
	terraformCommand?: string;
	functions: readonly FunctionGroup[];
	environment: Readonly<Record<string, string | undefined>>;
	logger: Logger;
}

export const DEFAULT_FILENAME = 'terragrunt.hcl';

export function resolveOptions(options: EvaluateOptions = {}): ResolvedOptions {
	const filename = options.filename ?? DEFAULT_FILENAME;
	return {
		filename,
		workingDirectory: options.workingDirectory ?? path.dirname(path.resolve(filename)),
		outputRetriever: options.outputRetriever,
		terraformCommand: options.terraformCommand,
		functions: options.functions ?? [],
		environment: options.environment ?? process.env,
		logger: options.logger ?? console
	};
}

/**
 * Evaluates one configuration file in two passes: dependency outputs first,
 * then the whole file with those outputs bound under `dependency`.
 */
export async function parseConfig(content: Uint8Array | string, options: EvaluateOptions = {}): Promise<ResolvedConfiguration> {
	const resolved = resolveOptions(options);
	const { filename, logger } = resolved;
	const parser = new DocumentParser(filename);

	let document = parser.parse(content);
	const normalized = normalizeBareInclude(document);
	if (normalized.changed) {
		logger.debug(`Re-parsing ${filename} after labeling its bare include block`);
		document = parser.parse(normalized.bytes);
	}

	const functionContext: FunctionContext = {
		workingDirectory: resolved.workingDirectory,
		environmentVariables: resolved.environment,
		document: { filename },
		terraformCommand: resolved.terraformCommand
	};
	const contextOptions = { functions: resolved.functions, functionContext, logger };

	const resolver = new DependencyResolver({
		outputRetriever: resolved.outputRetriever,
		retrievalContext: {
			workingDirectory: resolved.workingDirectory,
			terraformCommand: resolved.terraformCommand
		},
		logger
	});
	const resolution = await resolver.resolve(document, buildContext(undefined, contextOptions));

	const context = buildContext(resolution.value, contextOptions);
	const target = await decodeFull(document, context);
	if (target === undefined) {
		throw new NoConfigurationFoundError(filename);
	}

	return assemble(target, resolution.dependencies);
}
