import { createDiagnostic, MultipleBareIncludesError } from './errors';
import type { ParsedDocument } from './ParsedDocument';
import { getBlockLabels } from './ParsedDocument';

export interface NormalizeResult {
	bytes: Uint8Array;
	changed: boolean;
}

const INCLUDE_BLOCK = 'include';
const SYNTHETIC_LABEL = ' ""';

/**
 * Gives a bare `include` block the empty label so every include block has
 * the same label arity. Works on the text; callers must re-parse the returned
 * bytes when `changed` is set.
 */
export function normalizeBareInclude(document: ParsedDocument): NormalizeResult {
	const bareIncludes = document
		.getBlocks(INCLUDE_BLOCK)
		.filter(block => getBlockLabels(block).length === 0);

	if (bareIncludes.length > 1) {
		throw new MultipleBareIncludesError(bareIncludes.slice(1).map(block => createDiagnostic(
			block.location,
			'Multiple bare include blocks',
			'Only one include block without a label is allowed',
			'MultipleBareIncludes'
		)));
	}

	const [include] = bareIncludes;
	if (include === undefined) {
		return { bytes: document.bytes, changed: false };
	}

	const insertAt = include.location.start.offset + INCLUDE_BLOCK.length;
	const content = document.content.slice(0, insertAt) + SYNTHETIC_LABEL + document.content.slice(insertAt);
	return { bytes: new TextEncoder().encode(content), changed: true };
}
