import type { FileSystem } from './core/pipeline';
import type { TypeNameRegistry } from './registry';
import { DEFAULT_MAX_DEPTH } from './serializer';
import { debug } from './log';

export interface EngineOptions {
	// overrides consulted for every record name; empty when absent
	registry?: TypeNameRegistry;
	// -I, -isystem, -D, -U, -nostdinc; anything else is ignored
	compilerArgs?: readonly string[];
	// deepest record nesting the serializer accepts
	maxDepth?: number;
	fs?: FileSystem;
	// directory of the synthetic translation unit
	cwd?: string;
	// bundled system headers; null disables them, undefined searches next to the package
	sysroot?: string | null;
}

export function resolveMaxDepth(explicit?: number): number {
	if (explicit !== undefined) {
		if (Number.isInteger(explicit) && explicit > 0) return explicit;
		debug('options', 'ignoring maxDepth', explicit);
	}
	const raw = process.env.MACRO_INIT_MAX_DEPTH;
	if (raw) {
		const n = Number.parseInt(raw, 10);
		if (Number.isInteger(n) && n > 0) return n;
		debug('options', 'ignoring MACRO_INIT_MAX_DEPTH', raw);
	}
	return DEFAULT_MAX_DEPTH;
}
