import type { Logger } from './logger';
import type { FunctionContext, FunctionGroup, FunctionImplementation } from './model';
import type { Value } from './values/values';

export class FunctionRegistry {
	private functions = new Map<string, FunctionImplementation>();
	private functionGroups = new Map<string, FunctionGroup>();

	constructor(groups: readonly FunctionGroup[] = [], private readonly logger?: Logger) {
		for (const group of groups) {
			this.registerFunctionGroup(group);
		}
	}

	registerFunction(name: string, implementation: FunctionImplementation): void {
		if (this.functions.has(name)) {
			this.logger?.warn(`Function "${name}" already registered, keeping the first definition`);
			return;
		}

		this.functions.set(name, implementation);
	}

	registerFunctionGroup(group: FunctionGroup): void {
		if (this.functionGroups.has(group.namespace)) {
			this.logger?.debug(`Function group ${group.namespace} already registered`);
			return;
		}

		this.functionGroups.set(group.namespace, group);
		for (const [name, implementation] of Object.entries(group.functions)) {
			this.registerFunction(name, implementation);
		}
	}

	async evaluateFunction(name: string, args: Value[], context: FunctionContext): Promise<Value> {
		const implementation = this.functions.get(name);
		if (!implementation) {
			throw new Error(`function "${name}" is not registered`);
		}

		return implementation(args, context);
	}

	getFunctionNames(): string[] {
		return [...this.functions.keys()];
	}

	hasFunction(name: string): boolean {
		return this.functions.has(name);
	}
}
