import { describe, it, expect, beforeEach } from 'vitest';
import { clearIncludeResolverCache } from '../src/core/pipeline';
import { SENTINEL_NAME, findSysroot, isSystemHeader, parseCompilerArgs, runFrontEnd, syntheticSource } from '../src/driver';
import { resolveMaxDepth } from '../src/options';
import { memFs, SHAPES_PATH, shapesOptions } from './testUtils';

describe('compiler arguments', () => {
	it('keeps include paths, definitions and -nostdinc', () => {
		const args = parseCompilerArgs(['-I', 'inc', '-Iother', '-isystem', '/sys', '-DFOO', '-DBAR=2', '-U', 'BAZ', '-nostdinc', '-x', 'c', '-Wall']);
		expect(args).toEqual({
			includePaths: ['inc', 'other'],
			systemPaths: ['/sys'],
			macroOps: [
				{ kind: 'define', name: 'FOO', value: '1' },
				{ kind: 'define', name: 'BAR', value: '2' },
				{ kind: 'undef', name: 'BAZ' },
			],
			noStdInc: true,
		});
	});

	it('ignores a flag missing its value', () => {
		expect(parseCompilerArgs(['-I']).includePaths).toEqual([]);
	});
});

describe('front end driver', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('writes a synthetic unit that includes the header and uses the macro', () => {
		expect(syntheticSource('/proj/a.h', 'P')).toBe(`#include "/proj/a.h"\nconst __auto_type ${SENTINEL_NAME} = P;\n`);
		expect(syntheticSource('/proj/a.h', null)).toBe('#include "/proj/a.h"\n');
	});

	it('recognises angle-bracket system headers', () => {
		expect(isSystemHeader('<stdio.h>')).toBe(true);
		expect(isSystemHeader('stdio.h')).toBe(false);
	});

	it('places the synthetic unit in the working directory', () => {
		const run = runFrontEnd(SHAPES_PATH, 'P', shapesOptions());
		expect(run.file).toBe('/proj/macro_eval.c');
		expect(run.pre.includes).toEqual([SHAPES_PATH]);
		expect(run.pre.fatal).toBe(false);
	});

	it('searches the sysroot for angled includes unless -nostdinc is given', () => {
		const files = {
			'/proj/uses.h': '#include <base.h>\n#define U (Base){ 1 }\n',
			'/opt/sysroot/stdint.h': '',
			'/opt/sysroot/base.h': 'typedef struct { int b; } Base;\n',
		};
		const options = { fs: memFs(files), cwd: '/proj', sysroot: '/opt/sysroot' };
		expect(runFrontEnd('/proj/uses.h', 'U', options).pre.fatal).toBe(false);
		expect(runFrontEnd('/proj/uses.h', 'U', { ...options, compilerArgs: ['-nostdinc'] }).pre.fatal).toBe(true);
	});

	it('finds the bundled sysroot in an ancestor directory', () => {
		const fs = memFs({ '/opt/pkg/sysroot/stdint.h': '' });
		expect(findSysroot(fs, '/opt/pkg/dist/lib')).toBe('/opt/pkg/sysroot');
		expect(findSysroot(fs, '/elsewhere')).toBeNull();
	});
});

describe('nesting limit', () => {
	it('prefers an explicit limit over the environment', () => {
		const saved = process.env.MACRO_INIT_MAX_DEPTH;
		try {
			process.env.MACRO_INIT_MAX_DEPTH = '8';
			expect(resolveMaxDepth()).toBe(8);
			expect(resolveMaxDepth(3)).toBe(3);
			process.env.MACRO_INIT_MAX_DEPTH = 'deep';
			expect(resolveMaxDepth()).toBe(64);
		} finally {
			if (saved === undefined) delete process.env.MACRO_INIT_MAX_DEPTH;
			else process.env.MACRO_INIT_MAX_DEPTH = saved;
		}
	});
});
