import type { Token } from './model';

/**
 * A parsed but not yet decoded configuration file. The original bytes are
 * kept next to the tree because normalization rewrites the bytes, not the
 * tree.
 */
export class ParsedDocument {
	constructor(
		public readonly filename: string,
		public readonly bytes: Uint8Array,
		public readonly content: string,
		public readonly root: Token
	) { }

	public getBodyItems(): Token[] {
		return this.root.children;
	}

	public getBlocks(type?: string): Token[] {
		return this.root.children.filter(child =>
			child.type === 'block' && (type === undefined || child.value === type)
		);
	}

	public getAttributes(): Token[] {
		return this.root.children.filter(child => child.type === 'attribute');
	}

	public isEmpty(): boolean {
		return this.root.children.length === 0;
	}
}

/** Labels of a block, in source order. */
export const getBlockLabels = (block: Token): Token[] =>
	block.children.filter(child => child.type === 'parameter');

export const getBlockBody = (block: Token): Token | undefined => block.findChild('body');
