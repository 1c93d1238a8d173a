/**
 * Instance ids whose routine lines reach the console. Built once at startup
 * and frozen; an empty list lets every instance through.
 */
export class ConsoleAllowlist {
	private readonly ids: ReadonlySet<string>;

	constructor(ids: readonly string[] = []) {
		this.ids = new Set(ids);
		Object.freeze(this);
	}

	get size(): number {
		return this.ids.size;
	}

	allows(instanceId: string): boolean {
		return this.ids.size === 0 || this.ids.has(instanceId);
	}
}
