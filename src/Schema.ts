import type { BlockSpec, BodySpec } from './BodyDecoder';
import { Types } from './values/types';

export const dependencyBlockSpec: BlockSpec = {
	type: 'dependency',
	labels: ['name'],
	multiple: true,
	body: {
		attributes: [
			{ name: 'config_path', type: Types.string, required: true },
			{ name: 'skip_outputs', type: Types.bool },
			{ name: 'mock_outputs', type: Types.dynamic },
			{ name: 'mock_outputs_allowed_terraform_commands', type: Types.list(Types.string) },
			{ name: 'mock_outputs_merge_with_state', type: Types.bool }
		],
		blocks: []
	}
};

export const terraformBlockSpec: BlockSpec = {
	type: 'terraform',
	labels: [],
	body: {
		attributes: [{ name: 'source', type: Types.string }],
		blocks: []
	}
};

export const includeBlockSpec: BlockSpec = {
	type: 'include',
	labels: ['name'],
	multiple: true,
	body: 'opaque'
};

/** The whole configuration file. */
export const terragruntConfigSpec: BodySpec = {
	attributes: [
		{ name: 'terraform_binary', type: Types.string },
		{ name: 'inputs', type: Types.dynamic }
	],
	blocks: [terraformBlockSpec, dependencyBlockSpec, includeBlockSpec]
};

/** Only the dependency blocks; everything else is kept undecoded. */
export const dependencyOnlySpec: BodySpec = {
	attributes: [],
	blocks: [dependencyBlockSpec],
	remain: true
};
