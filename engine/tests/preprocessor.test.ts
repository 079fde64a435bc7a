import { describe, it, expect, beforeEach } from 'vitest';
import { type MacroOp, clearIncludeResolverCache, preprocessSource } from '../src/core/pipeline';
import { memFs } from './testUtils';

const MAIN = '/src/main.c';

function run(src: string, files: Record<string, string> = {}, macroOps: MacroOp[] = []) {
	const pre = preprocessSource(src, MAIN, { includePaths: [], systemPaths: ['/sys'], macroOps, fs: memFs(files) });
	const text = pre.tokens.filter(t => t.kind !== 'eof').map(t => t.value).join(' ');
	return { pre, text };
}

describe('preprocessor: macro expansion', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('substitutes function-like macro arguments', () => {
		expect(run('#define ADD(a, b) ((a) + (b))\nADD(1, 2)').text).toBe('( ( 1 ) + ( 2 ) )');
	});

	it('stringifies an argument, escaping string literals', () => {
		expect(run('#define STR(x) #x\nSTR(a + "b")').text).toBe('"a + \\"b\\""');
	});

	it('pastes tokens into a single identifier', () => {
		const { pre } = run('#define CAT(a, b) a ## b\nCAT(foo, bar)');
		const [tok] = pre.tokens;
		expect(tok?.kind).toBe('id');
		expect(tok?.value).toBe('foobar');
	});

	it('drops the comma before an empty variadic pack', () => {
		const src = '#define LOG(fmt, ...) f(fmt, ## __VA_ARGS__)\n';
		expect(run(src + 'LOG("a")').text).toBe('f ( "a" )');
		expect(run(src + 'LOG("b", 1, 2)').text).toBe('f ( "b" , 1 , 2 )');
	});

	it('expands __VA_OPT__ only when arguments are present', () => {
		const src = '#define OPT(x, ...) x __VA_OPT__(+ __VA_ARGS__)\n';
		expect(run(src + 'OPT(1)').text).toBe('1');
		expect(run(src + 'OPT(1, 2)').text).toBe('1 + 2');
	});

	it('does not re-expand a macro inside its own expansion', () => {
		expect(run('#define foo foo + 1\nfoo').text).toBe('foo + 1');
	});

	it('leaves a function-like macro name alone without a call', () => {
		expect(run('#define F(x) x\nF + 1').text).toBe('F + 1');
	});

	it('applies command-line definitions', () => {
		const ops: MacroOp[] = [{ kind: 'define', name: 'MODE', value: '3' }, { kind: 'define', name: 'GONE', value: '1' }, { kind: 'undef', name: 'GONE' }];
		expect(run('MODE GONE', {}, ops).text).toBe('3 GONE');
	});

	it('expands __LINE__ to the line of use', () => {
		expect(run('\n\n__LINE__').text).toBe('3');
	});

	it('warns when a macro is redefined differently', () => {
		const { pre } = run('#define A 1\n#define A 1\n#define A 2\nA');
		expect(pre.diagnostics).toHaveLength(1);
		expect(pre.diagnostics[0]?.message).toBe("'A' macro redefined");
		expect(pre.diagnostics[0]?.severity).toBe('warning');
		expect(pre.diagnostics[0]?.code).toBe('MI009');
	});

	it('reports a call with the wrong number of arguments', () => {
		const { pre, text } = run('#define TWO(a, b) a b\nTWO(1)');
		expect(text).toBe('TWO ( 1 )');
		expect(pre.diagnostics[0]?.message).toBe("too few arguments provided to function-like macro invocation 'TWO'");
	});
});

describe('preprocessor: conditionals', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('selects #if / #elif / #else branches', () => {
		const src = [
			'#define V 2',
			'#if V == 1',
			'one',
			'#elif V == 2 && defined(V)',
			'yes',
			'#else',
			'no',
			'#endif',
			'#if 0x10 > 15',
			'hex',
			'#endif',
		].join('\n');
		expect(run(src).text).toBe('yes hex');
	});

	it('handles #ifdef, #ifndef and nesting inside inactive groups', () => {
		const src = [
			'#define ON',
			'#ifdef OFF',
			'#if 1',
			'a',
			'#endif',
			'#else',
			'b',
			'#endif',
			'#ifndef OFF',
			'c',
			'#endif',
		].join('\n');
		expect(run(src).text).toBe('b c');
	});

	it('reports an unterminated conditional', () => {
		const { pre } = run('#if 1\nx\n');
		expect(pre.diagnostics.map(d => d.code)).toEqual(['MI005']);
	});

	it('stops at #error', () => {
		const { pre, text } = run('#error stop here\nint x;');
		expect(pre.fatal).toBe(true);
		expect(text).toBe('');
		expect(pre.diagnostics[0]?.message).toBe('#error stop here');
		expect(pre.diagnostics[0]?.code).toBe('MI003');
	});
});

describe('preprocessor: includes', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('resolves quoted includes beside the file and angled ones on the system path', () => {
		const { pre, text } = run('#include "defs.h"\n#include <sys.h>\nW S', {
			'/src/defs.h': '#define W 3\n',
			'/sys/sys.h': '#define S 4\n',
		});
		expect(text).toBe('3 4');
		expect(pre.includes).toEqual(['/src/defs.h', '/sys/sys.h']);
	});

	it('fails on a missing include', () => {
		const { pre } = run('#include "nope.h"\n');
		expect(pre.fatal).toBe(true);
		expect(pre.diagnostics[0]?.message).toBe("'nope.h' file not found");
		expect(pre.diagnostics[0]?.code).toBe('MI001');
	});

	it('detects include guards and honours them', () => {
		const guarded = '#ifndef G_H\n#define G_H\nint g;\n#endif\n';
		const { pre, text } = run('#include "g.h"\n#include "g.h"\n', { '/src/g.h': guarded });
		expect(pre.includeGuards.get('/src/g.h')).toBe('G_H');
		expect(text).toBe('int g ;');
	});

	it('includes a #pragma once file a single time', () => {
		const { text } = run('#include "o.h"\n#include "o.h"\n', { '/src/o.h': '#pragma once\nint o;\n' });
		expect(text).toBe('int o ;');
	});

	it('records the defining file of each macro', () => {
		const { pre } = run('#include "defs.h"\n#define LOCAL 1\n', { '/src/defs.h': '#define W 3\n' });
		expect(pre.macros.get('W')?.file).toBe('/src/defs.h');
		expect(pre.macros.get('LOCAL')?.file).toBe(MAIN);
	});
});
