import path from 'node:path';
import nodeFs from 'node:fs';
import type { Token } from './tokens';
import { Tokenizer } from './tokenizer';
import { type IncludeResolver, type PreprocessResult, type ResolvedInclude, Preprocessor } from './macro';
import { SourceManager } from './source';
import { debug } from '../log';

// The subset of node:fs the front end reads through; tests pass an in-memory implementation.
export type FileSystem = {
	existsSync(p: string): boolean;
	statSync(p: string): { mtimeMs: number; isFile(): boolean };
	readFileSync(p: string, encoding: 'utf8'): string;
};

export const defaultFs: FileSystem = nodeFs;

export type IncludeResolverOptions = {
	includePaths: string[];   // -I, searched for quoted and angled includes
	systemPaths: string[];    // -isystem and the bundled sysroot, angled includes last
	fs?: FileSystem;
};

// Tokenized files keyed by path; an entry is reused while the file's mtime is unchanged.
type CachedEntry = ResolvedInclude & { mtimeMs: number };
const includeCache = new Map<string, CachedEntry>();
export function clearIncludeResolverCache() { includeCache.clear(); }

export function tokenizeFile(text: string, file: string): Token[] {
	const tz = new Tokenizer(text, file);
	const toks: Token[] = [];
	for (;;) { const t = tz.next(); toks.push(t); if (t.kind === 'eof') break; }
	return toks;
}

export function buildIncludeResolver(opts: IncludeResolverOptions): IncludeResolver {
	const fs = opts.fs ?? defaultFs;
	return (target, angled, fromFile) => {
		const candidates: string[] = [];
		if (path.isAbsolute(target)) candidates.push(target);
		else {
			// quoted includes look next to the including file first
			if (!angled && !fromFile.startsWith('<')) candidates.push(path.join(path.dirname(fromFile), target));
			for (const p of opts.includePaths) candidates.push(path.join(p, target));
			for (const p of opts.systemPaths) candidates.push(path.join(p, target));
		}
		for (const filePath of candidates) {
			if (!fs.existsSync(filePath)) continue;
			try {
				const stat = fs.statSync(filePath);
				if (!stat.isFile()) continue;
				const prev = includeCache.get(filePath);
				if (prev && prev.mtimeMs === stat.mtimeMs) return prev;
				const text = fs.readFileSync(filePath, 'utf8');
				const entry: CachedEntry = { id: filePath, text, tokens: tokenizeFile(text, filePath), mtimeMs: stat.mtimeMs };
				includeCache.set(filePath, entry);
				debug('include', 'tokenized', filePath);
				return entry;
			} catch (err) {
				const error = err instanceof Error ? err.message : String(err);
				debug('include', 'unreadable', filePath, error);
				return { id: filePath, error };
			}
		}
		debug('include', 'not found', target, 'from', fromFile, candidates);
		return null;
	};
}

export type MacroOp = { kind: 'define'; name: string; value: string } | { kind: 'undef'; name: string };

export const BUILTIN_FILE = '<built-in>';

// Target-independent predefines of an LP64 C11 hosted environment
const PREDEFINES = [
	'__STDC__ 1',
	'__STDC_VERSION__ 201112L',
	'__STDC_HOSTED__ 1',
	'__CHAR_BIT__ 8',
	'__SIZEOF_SHORT__ 2',
	'__SIZEOF_INT__ 4',
	'__SIZEOF_LONG__ 8',
	'__SIZEOF_LONG_LONG__ 8',
	'__SIZEOF_POINTER__ 8',
	'__SIZEOF_FLOAT__ 4',
	'__SIZEOF_DOUBLE__ 8',
	'__LP64__ 1',
	'_LP64 1',
	'__macro_init__ 1',
];

export function predefinesText(ops: readonly MacroOp[]): string {
	const lines = PREDEFINES.map(d => `#define ${d}`);
	for (const op of ops) lines.push(op.kind === 'define' ? `#define ${op.name} ${op.value}` : `#undef ${op.name}`);
	return lines.join('\n') + '\n';
}

export type PreprocessSourceOptions = IncludeResolverOptions & {
	macroOps?: readonly MacroOp[];
	sources?: SourceManager;
};

// Preprocess an in-memory main file: predefines, then the file with its includes.
export function preprocessSource(text: string, file: string, opts: PreprocessSourceOptions): PreprocessResult & { sources: SourceManager } {
	const sources = opts.sources ?? new SourceManager();
	const pp = new Preprocessor({ resolver: buildIncludeResolver(opts), sources });
	const builtin = predefinesText(opts.macroOps ?? []);
	sources.add(BUILTIN_FILE, builtin);
	pp.processFile(BUILTIN_FILE, tokenizeFile(builtin, BUILTIN_FILE));
	sources.add(file, text);
	pp.processFile(file, tokenizeFile(text, file));
	return { ...pp.finish(file), sources };
}
