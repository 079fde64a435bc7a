import { evaluateMacro as evaluate } from './evaluate';
import { TypeNameRegistry } from './registry';
import type { EngineOptions } from './options';
import { debug } from './log';

// Process-wide state behind the host-facing calls: the override registry and
// the strings handed out by evaluateMacro until the host releases them.

export class HostContractError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'HostContractError';
	}
}

const registry = new TypeNameRegistry();
const strings = new Map<number, string>();
let nextHandle = 1;
let baseOptions: Omit<EngineOptions, 'registry' | 'compilerArgs'> = {};

export function setCustomTypeNames(keys: readonly string[], names: readonly string[], count: number) {
	if (!Number.isInteger(count) || count < 0) throw new HostContractError(`invalid entry count ${count}`);
	if (count > keys.length || count > names.length) {
		throw new HostContractError(`entry count ${count} exceeds the ${keys.length} keys and ${names.length} names supplied`);
	}
	const entries: [string, string][] = [];
	for (let i = 0; i < count; i++) entries.push([keys[i] ?? '', names[i] ?? '']);
	registry.setAll(entries);
}

// Non-zero handle to the declaration text, or 0 when the macro yields none.
export function evaluateMacro(headerPath: string, macroName: string, compilerArgs: readonly string[] = []): number {
	const text = evaluate(headerPath, macroName, { ...baseOptions, registry, compilerArgs });
	if (text === null) return 0;
	const handle = nextHandle++;
	strings.set(handle, text);
	return handle;
}

export function readString(handle: number): string {
	const text = strings.get(handle);
	if (text === undefined) throw new HostContractError(`handle ${handle} is not live`);
	return text;
}

export function releaseString(handle: number) {
	if (handle === 0) return;
	if (!strings.delete(handle)) debug('host', `release of unknown or released handle ${handle}`);
}

export function liveStringCount(): number {
	return strings.size;
}

export function customTypeNames(): [string, string][] {
	return registry.entries();
}

// File system, working directory and sysroot used by evaluateMacro.
export function configureHost(options: Omit<EngineOptions, 'registry' | 'compilerArgs'>) {
	baseOptions = { ...options };
}
