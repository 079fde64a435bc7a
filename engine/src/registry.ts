import { debug } from './log';

export type TypeNameEntry = readonly [key: string, name: string];

// Stable type identity -> display name. Only ever replaced as a whole.
export class TypeNameRegistry {
	private readonly names = new Map<string, string>();

	constructor(entries: Iterable<TypeNameEntry> = []) {
		this.setAll(entries);
	}

	// Clears, then inserts every pair in order; a later duplicate key wins.
	setAll(entries: Iterable<TypeNameEntry>) {
		this.names.clear();
		for (const [key, name] of entries) this.names.set(key, name);
		debug('registry', `replaced with ${this.names.size} entries`);
	}

	lookup(key: string): string | null {
		return this.names.get(key) ?? null;
	}

	get size(): number { return this.names.size; }

	entries(): [string, string][] {
		return Array.from(this.names.entries());
	}

	static fromObject(obj: Record<string, string>): TypeNameRegistry {
		return new TypeNameRegistry(Object.entries(obj));
	}
}
