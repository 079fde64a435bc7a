import { runFrontEnd } from './driver';
import { evaluateMacro } from './evaluate';
import type { EngineOptions } from './options';
import { debug } from './log';

export type MacroEvaluation = { name: string; declaration: string | null };
export type ParsedDeclaration = { type: string; name: string; value: string };

// Object-like macros the header itself defines, in definition order, minus
// reserved names, empty bodies and the include guard.
export function listCandidateMacros(headerPath: string, options: EngineOptions = {}): string[] {
	const { pre } = runFrontEnd(headerPath, null, options);
	if (pre.fatal) return [];
	const headerFile = pre.includes[0];
	if (headerFile === undefined) return [];
	const guard = pre.includeGuards.get(headerFile);
	const names: string[] = [];
	for (const def of pre.macros.values()) {
		if (def.file !== headerFile || def.params !== null) continue;
		if (def.name.startsWith('__') || def.body.length === 0 || def.name === guard) continue;
		names.push(def.name);
	}
	debug('batch', headerFile, names);
	return names;
}

export function evaluateHeader(headerPath: string, options: EngineOptions = {}): MacroEvaluation[] {
	return listCandidateMacros(headerPath, options).map(name => ({ name, declaration: evaluateMacro(headerPath, name, options) }));
}

const DECLARATION = /^(.+?)\s+([A-Za-z_]\w*)\s*=\s*(.*);\s*$/s;

// `Point P = Point{x=1, y=2};` -> { type: 'Point', name: 'P', value: 'Point{x=1, y=2}' }
export function parseDeclaration(text: string): ParsedDeclaration | null {
	const m = DECLARATION.exec(text.trim());
	if (!m) return null;
	const [, type, name, value] = m;
	if (type === undefined || name === undefined || value === undefined || !value.trim()) return null;
	return { type, name, value };
}
