import path from 'node:path';
import { type FileSystem, type MacroOp, defaultFs, preprocessSource } from './core/pipeline';
import type { PreprocessResult } from './core/macro';
import { type SourceManager, toFsPath } from './core/source';
import type { TranslationUnit } from './ast';
import { parseTranslationUnit } from './ast/parser';
import { MI_DIAGCODES } from './diagCodes';
import type { EngineOptions } from './options';
import { debug } from './log';

export const SENTINEL_NAME = '__macro_init_value';
export const SYNTHETIC_FILE = 'macro_eval.c';

export type CompilerArgs = {
	includePaths: string[];
	systemPaths: string[];
	macroOps: MacroOp[];
	noStdInc: boolean;
};

// The subset of compiler flags that changes what a header means.
export function parseCompilerArgs(args: readonly string[]): CompilerArgs {
	const out: CompilerArgs = { includePaths: [], systemPaths: [], macroOps: [], noStdInc: false };
	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		const value = (flag: string): string | null => {
			if (arg.length > flag.length) return arg.slice(flag.length);
			const v = args[++i];
			if (v === undefined) { debug('args', `missing value for ${flag}`); return null; }
			return v;
		};
		if (arg.startsWith('-isystem')) {
			const v = value('-isystem');
			if (v !== null) out.systemPaths.push(v);
		} else if (arg.startsWith('-I')) {
			const v = value('-I');
			if (v !== null) out.includePaths.push(v);
		} else if (arg.startsWith('-D')) {
			const v = value('-D');
			if (v === null) continue;
			const eq = v.indexOf('=');
			out.macroOps.push(eq < 0 ? { kind: 'define', name: v, value: '1' } : { kind: 'define', name: v.slice(0, eq), value: v.slice(eq + 1) });
		} else if (arg.startsWith('-U')) {
			const v = value('-U');
			if (v !== null) out.macroOps.push({ kind: 'undef', name: v });
		} else if (arg === '-nostdinc') {
			out.noStdInc = true;
		} else if (arg === '-x') {
			i++;
			debug('args', 'ignoring -x', args[i]);
		} else {
			debug('args', 'ignoring', arg);
		}
	}
	return out;
}

// The bundled `sysroot/` directory: nearest ancestor of this module that has one.
export function findSysroot(fs: FileSystem = defaultFs, from: string = __dirname): string | null {
	let dir = from;
	for (;;) {
		const candidate = path.join(dir, 'sysroot');
		if (fs.existsSync(path.join(candidate, 'stdint.h'))) return candidate;
		const parent = path.dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

export function isSystemHeader(headerPath: string): boolean {
	return headerPath.startsWith('<') && headerPath.endsWith('>');
}

export function syntheticSource(header: string, macroName: string | null): string {
	const lines = [`#include "${header}"`];
	if (macroName !== null) lines.push(`const __auto_type ${SENTINEL_NAME} = ${macroName};`);
	return lines.join('\n') + '\n';
}

export interface FrontEndRun {
	file: string;
	header: string;
	pre: PreprocessResult;
	sources: SourceManager;
}

export interface CompiledMacro extends FrontEndRun {
	unit: TranslationUnit;
}

// Preprocess the synthetic unit that includes `headerPath` and, when given, uses `macroName`.
export function runFrontEnd(headerPath: string, macroName: string | null, options: EngineOptions = {}): FrontEndRun {
	const fs = options.fs ?? defaultFs;
	const cwd = options.cwd ?? process.cwd();
	const header = toFsPath(headerPath);
	const file = path.join(cwd, SYNTHETIC_FILE);
	const args = parseCompilerArgs(options.compilerArgs ?? []);
	const includePaths = [...args.includePaths, path.dirname(path.resolve(cwd, header))];
	const systemPaths = [...args.systemPaths];
	if (!args.noStdInc) {
		const sysroot = options.sysroot === undefined ? findSysroot(fs) : options.sysroot;
		if (sysroot) systemPaths.push(sysroot);
	}
	debug('driver', 'header', header, 'include', includePaths, 'system', systemPaths);
	const run = preprocessSource(syntheticSource(header, macroName), file, { includePaths, systemPaths, macroOps: args.macroOps, fs });
	if (macroName !== null && !run.fatal && !run.macros.has(macroName)) {
		const text = run.sources.text(file) ?? '';
		const at = text.lastIndexOf(macroName);
		run.diagnostics.push({
			span: { start: at, end: at + macroName.length },
			file,
			message: `macro '${macroName}' is not defined`,
			severity: 'error',
			code: MI_DIAGCODES.UNDEFINED_MACRO,
		});
	}
	return { file, header, pre: run, sources: run.sources };
}

export function compileMacro(headerPath: string, macroName: string, options: EngineOptions = {}): CompiledMacro {
	const run = runFrontEnd(headerPath, macroName, options);
	const unit = parseTranslationUnit(run.pre.tokens, run.sources);
	return { ...run, unit };
}
