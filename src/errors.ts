import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver-types';

import type { SourceRange } from './model';

export type ConfigErrorKind =
	| 'SyntaxError'
	| 'MultipleBareIncludes'
	| 'DecodeError'
	| 'ConversionFailed'
	| 'NoConfigurationFound'
	| 'DependencyOutputUnavailable';

const SUMMARY_SEPARATOR = '; ';

/**
 * Builds an editor-style diagnostic from a parser range. Parser positions are
 * 1-based, diagnostic positions are 0-based.
 */
export const createDiagnostic = (
	location: SourceRange,
	summary: string,
	detail: string,
	kind: ConfigErrorKind
): Diagnostic => Diagnostic.create(
	Range.create(
		location.start.line - 1,
		location.start.column - 1,
		location.end.line - 1,
		location.end.column - 1
	),
	detail ? `${summary}${SUMMARY_SEPARATOR}${detail}` : summary,
	DiagnosticSeverity.Error,
	kind,
	location.source
);

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
	const { start, end } = diagnostic.range;
	const columns = start.line === end.line
		? `${start.character + 1}-${end.character + 1}`
		: `${start.character + 1}-${end.line + 1},${end.character + 1}`;
	return `${diagnostic.source ?? ''}:${start.line + 1},${columns}: ${diagnostic.message}`;
};

export class ConfigError extends Error {
	readonly kind: ConfigErrorKind;
	readonly diagnostics: Diagnostic[];

	constructor(kind: ConfigErrorKind, message: string, diagnostics: Diagnostic[] = []) {
		super(diagnostics.length > 0 ? diagnostics.map(formatDiagnostic).join('\n') : message);
		this.name = 'ConfigError';
		this.kind = kind;
		this.diagnostics = diagnostics;
	}
}

export class HclSyntaxError extends ConfigError {
	constructor(message: string, diagnostics: Diagnostic[]) {
		super('SyntaxError', message, diagnostics);
		this.name = 'HclSyntaxError';
	}
}

export class MultipleBareIncludesError extends ConfigError {
	constructor(diagnostics: Diagnostic[]) {
		super(
			'MultipleBareIncludes',
			'multiple bare include blocks (include blocks without label) is not supported',
			diagnostics
		);
		this.name = 'MultipleBareIncludesError';
	}
}

export class DecodeError extends ConfigError {
	constructor(diagnostics: Diagnostic[]) {
		super('DecodeError', 'failed to decode configuration', diagnostics);
		this.name = 'DecodeError';
	}

	static at(location: SourceRange, summary: string, detail: string): DecodeError {
		return new DecodeError([createDiagnostic(location, summary, detail, 'DecodeError')]);
	}
}

export class ConversionFailedError extends ConfigError {
	readonly path: string;

	constructor(message: string, path = '') {
		super('ConversionFailed', path ? `${path}: ${message}` : message);
		this.name = 'ConversionFailedError';
		this.path = path;
	}
}

export class NoConfigurationFoundError extends ConfigError {
	constructor(filename: string) {
		super('NoConfigurationFound', `no terragrunt configuration found in ${filename}`);
		this.name = 'NoConfigurationFoundError';
	}
}

export class DependencyOutputUnavailableError extends ConfigError {
	readonly dependency: string;

	constructor(dependency: string, reason: string) {
		super('DependencyOutputUnavailable', `outputs of dependency "${dependency}" are not available: ${reason}`);
		this.name = 'DependencyOutputUnavailableError';
		this.dependency = dependency;
	}
}
