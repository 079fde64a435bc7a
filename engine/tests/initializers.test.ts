import { describe, it, expect } from 'vitest';
import { describeValue, parseSource, varOf } from './testUtils';

const TYPES = [
	'typedef struct { int x, y; } P;',
	'struct L { P a; P b; };',
	'union U { int i; float f; };',
].join('\n');

function initOf(src: string, name: string) {
	const { unit } = parseSource(`${TYPES}\n${src}`);
	const v = varOf(unit, name);
	const init = v.init;
	if (init?.kind !== 'InitList') throw new Error(`${name} has no initializer list`);
	return { v, init, unit };
}

describe('initializer binding', () => {
	it('fills nested aggregates from a flat list', () => {
		const { init } = initOf('struct L l = { 1, 2, 3 };', 'l');
		expect(describeValue(init)).toBe('{{1, 2}, {3, <implicit>}}');
		const first = init.inits?.[0];
		expect(first?.kind === 'InitList' && first.synthetic).toBe(true);
	});

	it('applies nested designators inside the designated member', () => {
		const { init } = initOf('struct L l = { .b.y = 7, .a = { 9 } };', 'l');
		expect(describeValue(init)).toBe('{{9, <implicit>}, {<implicit>, 7}}');
	});

	it('continues positionally after a designator', () => {
		const { init } = initOf('P p = { .y = 1, 2 };', 'p');
		expect(describeValue(init)).toBe('{<implicit>, 1}');
	});

	it('lets a later designator override an earlier value', () => {
		const { init } = initOf('P p = { 1, 2, .x = 5 };', 'p');
		expect(describeValue(init)).toBe('{5, 2}');
	});

	it('tracks the active union member', () => {
		const designated = initOf('union U u = { .f = 1.5f };', 'u').init;
		expect(designated.unionField).toBe(1);
		expect(describeValue(designated)).toBe('{1.5}');
		const positional = initOf('union U u = { 3 };', 'u').init;
		expect(positional.unionField).toBe(0);
	});

	it('binds array elements by index designator', () => {
		const { init, v } = initOf('int a[] = { [2] = 4, 5 };', 'a');
		expect(describeValue(init)).toBe('{<implicit>, <implicit>, 4, 5}');
		expect(v.type.kind === 'array' && v.type.size).toBe(4);
	});

	it('reports an unknown field as an error of the declaration', () => {
		const { v, unit } = initOf('struct L bad = { .z = 1 };', 'bad');
		expect(v.errorCount).toBe(1);
		expect(unit.diagnostics.map(d => [d.code, d.message])).toEqual([
			['MI031', "field designator 'z' does not refer to any field in type 'struct L'"],
		]);
	});

	it('warns about excess elements without failing the declaration', () => {
		const { v, unit } = initOf('P p = { 1, 2, 3 };', 'p');
		expect(v.errorCount).toBe(0);
		expect(unit.diagnostics.map(d => [d.severity, d.code, d.message])).toEqual([
			['warning', 'MI030', 'excess elements in struct initializer'],
		]);
	});

	it('rejects an array designator on a struct', () => {
		const { v, unit } = initOf('P p = { [0] = 1 };', 'p');
		expect(v.errorCount).toBe(1);
		expect(unit.diagnostics[0]?.code).toBe('MI032');
	});

	it('initializes a char array from a braced string', () => {
		const { init } = initOf('char s[8] = { "hi" };', 's');
		expect(describeValue(init)).toBe('{"hi"}');
	});
});
