import type { FunctionGroup } from '../model';
import { collectionFunctionGroup } from './collection_functions';
import { encodingFunctionGroup } from './encoding_functions';
import { stringFunctionGroup } from './string_functions';
import { terragruntFunctionGroup } from './terragrunt_functions';

export { collectionFunctionGroup, encodingFunctionGroup, stringFunctionGroup, terragruntFunctionGroup };

/** Every shipped function group; none is registered unless a caller asks. */
export const standardFunctions: readonly FunctionGroup[] = [
	stringFunctionGroup,
	collectionFunctionGroup,
	encodingFunctionGroup,
	terragruntFunctionGroup
];
