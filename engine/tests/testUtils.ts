import path from 'node:path';
import type { FileSystem } from '../src/core/pipeline';
import { preprocessSource } from '../src/core/pipeline';
import { parseTranslationUnit } from '../src/ast/parser';
import type { Expr, VarDecl } from '../src/ast';

export const fixturesDir = path.join(__dirname, 'fixtures');

// every write gets a fresh mtime so the include cache sees a change
let clock = 1;

export type MemFs = FileSystem & {
	write(p: string, text: string): void;
	// paths passed to readFileSync, in order
	reads: string[];
};

export function memFs(files: Record<string, string>): MemFs {
	const entries = new Map<string, { text: string; mtimeMs: number }>();
	const isDir = (p: string) => {
		const prefix = p.endsWith('/') ? p : p + '/';
		for (const key of entries.keys()) if (key.startsWith(prefix)) return true;
		return false;
	};
	const fs: MemFs = {
		reads: [],
		write(p, text) { entries.set(p, { text, mtimeMs: clock++ }); },
		existsSync(p) { return entries.has(p) || isDir(p); },
		statSync(p) {
			const e = entries.get(p);
			if (e) return { mtimeMs: e.mtimeMs, isFile: () => true };
			if (isDir(p)) return { mtimeMs: 0, isFile: () => false };
			throw Object.assign(new Error(`ENOENT: no such file or directory, stat '${p}'`), { code: 'ENOENT' });
		},
		readFileSync(p) {
			const e = entries.get(p);
			if (!e) throw Object.assign(new Error(`ENOENT: no such file or directory, open '${p}'`), { code: 'ENOENT' });
			fs.reads.push(p);
			return e.text;
		},
	};
	for (const [p, text] of Object.entries(files)) fs.write(p, text);
	return fs;
}

// Reads of `paths` fail the way a file without read permission does.
export function unreadable(fs: FileSystem, ...paths: string[]): FileSystem {
	return {
		existsSync: p => fs.existsSync(p),
		statSync: p => fs.statSync(p),
		readFileSync(p, encoding) {
			if (paths.includes(p)) throw Object.assign(new Error(`EACCES: permission denied, open '${p}'`), { code: 'EACCES' });
			return fs.readFileSync(p, encoding);
		},
	};
}

export const TEST_FILE = '/src/test.c';

// Preprocess and parse a standalone source with no include paths.
export function parseSource(text: string, files: Record<string, string> = {}) {
	const pre = preprocessSource(text, TEST_FILE, { includePaths: [], systemPaths: [], fs: memFs(files) });
	const unit = parseTranslationUnit(pre.tokens, pre.sources);
	return { pre, unit, sources: pre.sources };
}

export function varOf(unit: { vars: Map<string, VarDecl> }, name: string): VarDecl {
	const v = unit.vars.get(name);
	if (!v) throw new Error(`no variable '${name}'`);
	return v;
}

// Compact view of an initializer value for assertions
export function describeValue(e: Expr): string {
	switch (e.kind) {
		case 'IntegerLiteral': return e.value.toString();
		case 'FloatLiteral': return String(e.value);
		case 'StringLiteral': return `"${e.content}"`;
		case 'Identifier': return e.name;
		case 'ImplicitValueInit': return '<implicit>';
		case 'Paren': return describeValue(e.inner);
		case 'InitList': return `{${(e.inits ?? []).map(describeValue).join(', ')}}`;
		default: return `<${e.kind}>`;
	}
}

export const SHAPES_PATH = '/proj/shapes.h';

// Line numbers matter: the anonymous `info` struct opens on line 17, column 2.
export const SHAPES_H = [
	'#ifndef SHAPES_H',
	'#define SHAPES_H',
	'',
	'typedef struct { int x; int y; } Point;',
	'',
	'struct Rectangle {',
	'\tPoint origin;',
	'\tfloat width, height;',
	'\tconst char *label;',
	'};',
	'',
	'enum Color { RED, GREEN = 5, BLUE };',
	'',
	'typedef union { int count; double ratio; } Metric;',
	'',
	'typedef struct {',
	'\tstruct {',
	'\t\tMetric metric;',
	'\t\tconst char *description;',
	'\t} info;',
	'\tPoint position;',
	'} ComplexStruct;',
	'',
	'#define ORIGIN (Point){ 0, 0 }',
	'#define P (Point){ 1, 2 }',
	'#define RECT (struct Rectangle){ { 3, 4 }, 1.5f, 2.0, "box" }',
	'#define ANSWER 42',
	'#define NEG (Point){ .y = -7 }',
	'#define COMPLEX_VAL (ComplexStruct){ .info = { { 42 }, "ok" }, .position = { 3, 4 } }',
	'#define PAIR_OF(a, b) (Point){ a, b }',
	'#define MADE PAIR_OF(5, 6)',
	'#define COLORED (Point){ BLUE, RED }',
	'#define ARRAY (int[]){ 1, 2, 3 }',
	'#define BAD_FIELD (Point){ .z = 1 }',
	'#ifdef USE_ALT',
	'#define ALT (Point){ 8, 9 }',
	'#endif',
	'',
	'#endif',
	'',
].join('\n');

export const shapesOptions = (files: Record<string, string> = {}) => ({
	fs: memFs({ [SHAPES_PATH]: SHAPES_H, ...files }),
	cwd: '/proj',
	sysroot: null,
});
