import { describe, it, expect } from 'vitest';
import { typeToString } from '../src/ast/ctypes';
import { parseSource, varOf } from './testUtils';

describe('parser: declarations', () => {
	it('records typedef-named anonymous structs and tagged records', () => {
		const { unit } = parseSource([
			'typedef struct { int x, y; } Point;',
			'struct Rect { Point origin; float w; };',
		].join('\n'));
		const point = unit.typedefs.get('Point')?.type;
		if (point?.kind !== 'record') throw new Error('Point is not a record');
		expect(point.decl.tag).toBeNull();
		expect(point.decl.typedefName).toBe('Point');
		const rect = unit.records.find(r => r.tag === 'Rect');
		expect(rect?.fields?.map(f => `${typeToString(f.type)} ${f.name}`)).toEqual(['Point origin', 'float w']);
		expect(unit.diagnostics).toEqual([]);
	});

	it('numbers enumerators', () => {
		const { unit } = parseSource('enum Color { RED, GREEN = 5, BLUE, WHITE = GREEN * 2 };');
		expect(unit.enums[0]?.constants).toEqual([
			{ name: 'RED', value: 0n },
			{ name: 'GREEN', value: 5n },
			{ name: 'BLUE', value: 6n },
			{ name: 'WHITE', value: 10n },
		]);
	});

	it('builds pointer, array and function declarator types', () => {
		const { unit } = parseSource('int (*fp)(int, char *);\nchar *names[4];\nconst char *const s = "x";\nunsigned long long big;');
		expect(typeToString(varOf(unit, 'fp').type)).toBe('int (*)(int, char *)');
		expect(typeToString(varOf(unit, 'names').type)).toBe('char *[4]');
		expect(typeToString(varOf(unit, 's').type)).toBe('const char *const');
		expect(typeToString(varOf(unit, 'big').type)).toBe('unsigned long long');
	});

	it('sizes an array from its initializer', () => {
		const { unit } = parseSource('int arr[] = { 1, 2, 3 };');
		expect(typeToString(varOf(unit, 'arr').type)).toBe('int[3]');
	});

	it('skips function bodies', () => {
		const { unit } = parseSource('static int f(int a) { return a + 1; }\nint after = 2;');
		expect(unit.vars.has('after')).toBe(true);
		expect(unit.vars.has('f')).toBe(false);
		expect(unit.diagnostics).toEqual([]);
	});

	it('accepts extern "C" blocks, attributes and static asserts', () => {
		const { unit } = parseSource('extern "C" {\n_Static_assert(1, "ok");\nint __attribute__((unused)) a = 1;\n}');
		expect(unit.vars.has('a')).toBe(true);
		expect(unit.diagnostics).toEqual([]);
	});

	it('deduces __auto_type from a compound literal', () => {
		const { unit } = parseSource('typedef struct { int a; } S;\nconst __auto_type v = (S){ 1 };');
		const v = varOf(unit, 'v');
		expect(typeToString(v.type)).toBe('const S');
		expect(v.init?.kind).toBe('CompoundLiteral');
		expect(v.errorCount).toBe(0);
	});

	it('parses a functional compound literal spelled with a typedef name', () => {
		const { unit } = parseSource('typedef struct { int a; } S;\nS v = S{ 1 };');
		const init = varOf(unit, 'v').init;
		expect(init?.kind === 'CompoundLiteral' && init.form).toBe('functional');
	});
});

describe('parser: diagnostics', () => {
	it('reports unknown type names', () => {
		const { unit } = parseSource('Foo x;');
		expect(unit.diagnostics.map(d => [d.code, d.message])).toEqual([['MI020', "unknown type name 'Foo'"]]);
	});

	it('counts errors in the declaration that raised them', () => {
		const { unit } = parseSource('int ok = 1;\nint v = missing;');
		expect(varOf(unit, 'ok').errorCount).toBe(0);
		expect(varOf(unit, 'v').errorCount).toBe(1);
		expect(unit.diagnostics[0]?.message).toBe("use of undeclared identifier 'missing'");
	});

	it('requires a constant array designator', () => {
		const { unit } = parseSource('int n = 1;\nint arr[4] = { [n] = 1 };');
		expect(unit.diagnostics.map(d => d.code)).toEqual(['MI024']);
		expect(varOf(unit, 'arr').errorCount).toBe(1);
	});

	it('reports a redefined tag', () => {
		const { unit } = parseSource('struct A { int a; };\nstruct A { int b; };');
		expect(unit.diagnostics.map(d => [d.code, d.message])).toEqual([['MI023', "redefinition of 'A'"]]);
	});

	it('completes a forward-declared struct', () => {
		const { unit } = parseSource('struct Node;\nstruct Node *head;\nstruct Node { int v; struct Node *next; };');
		const node = unit.records.filter(r => r.tag === 'Node');
		expect(node).toHaveLength(1);
		expect(node[0]?.fields?.map(f => f.name)).toEqual(['v', 'next']);
	});

	it('recovers at the next declaration after a syntax error', () => {
		const { unit } = parseSource('int bad = ;\nint good = 3;');
		expect(varOf(unit, 'bad').errorCount).toBe(1);
		expect(varOf(unit, 'good').errorCount).toBe(0);
	});
});
