import { describe, it, expect } from 'vitest';
import { type CType, QUAL_CONST } from '../src/ast';
import { arrayOf, builtin, canonical, pointerTo } from '../src/ast/ctypes';
import { typeIdentity } from '../src/identity';
import { parseSource, varOf } from './testUtils';

const SRC = [
	'typedef struct { int x, y; } Point;',
	'struct Tagged { int a; };',
	'union Value { int i; float f; };',
	'struct Outer { struct { int depth; } info; union { int k; } u; };',
	'typedef enum { MODE_A } Mode;',
	'enum Color { RED };',
	'typedef struct Tagged TaggedAlias;',
	'struct { int q; } loose;',
	'TaggedAlias alias;',
].join('\n');

function fixture() {
	const { unit } = parseSource(SRC);
	const typedefType = (name: string): CType => {
		const td = unit.typedefs.get(name);
		if (!td) throw new Error(`no typedef ${name}`);
		return td.type;
	};
	const record = (tag: string): CType => {
		const decl = unit.records.find(r => r.tag === tag);
		if (!decl) throw new Error(`no record ${tag}`);
		return { kind: 'record', decl, quals: 0 };
	};
	return { unit, typedefType, record };
}

describe('stable type identity', () => {
	it('encodes builtins with one letter and ignores top-level qualifiers', () => {
		expect(typeIdentity(builtin('int'))).toBe('c:I');
		expect(typeIdentity(builtin('unsigned char'))).toBe('c:c');
		expect(typeIdentity(builtin('long double'))).toBe('c:D');
		expect(typeIdentity(builtin('int', QUAL_CONST))).toBe('c:I');
	});

	it('encodes composites with nested qualifiers', () => {
		expect(typeIdentity(pointerTo(builtin('char', QUAL_CONST)))).toBe('c:*1C');
		expect(typeIdentity(arrayOf(builtin('float'), 4))).toBe('c:[4f');
		expect(typeIdentity({
			kind: 'function', result: builtin('int'), params: [pointerTo(builtin('void'))], variadic: true, prototyped: true, quals: 0,
		})).toBe('c:FI(*v.)');
	});

	it('names tagged and typedef-named records', () => {
		const { typedefType, record } = fixture();
		expect(typeIdentity(record('Tagged'))).toBe('c:@S@Tagged');
		expect(typeIdentity(record('Value'))).toBe('c:@U@Value');
		expect(typeIdentity(typedefType('Point'))).toBe('c:@SA@Point');
		expect(typeIdentity(pointerTo(record('Tagged')))).toBe('c:*$@S@Tagged');
	});

	it('names a typedef by its own name', () => {
		const { unit } = fixture();
		const point = unit.typedefs.get('Point');
		if (!point) throw new Error('no Point');
		expect(typeIdentity({ kind: 'typedef', decl: point, quals: 0 })).toBe('c:@T@Point');
	});

	it('names anonymous member records after their owner and field', () => {
		const { record } = fixture();
		const outer = record('Outer');
		if (outer.kind !== 'record') throw new Error('not a record');
		const [info, u] = outer.decl.fields ?? [];
		expect(info && typeIdentity(info.type)).toBe('c:@S@Outer@Sa@info');
		expect(u && typeIdentity(u.type)).toBe('c:@S@Outer@Ua@u');
	});

	it('names enums', () => {
		const { typedefType, unit } = fixture();
		expect(typeIdentity(typedefType('Mode'))).toBe('c:@EA@Mode');
		const color = unit.enums.find(e => e.tag === 'Color');
		if (!color) throw new Error('no Color');
		expect(typeIdentity({ kind: 'enum', decl: color, quals: 0 })).toBe('c:@E@Color');
	});

	it('has no identity for a record with no naming context', () => {
		const { unit } = fixture();
		expect(typeIdentity(varOf(unit, 'loose').type)).toBeNull();
	});

	it('gives the same identity however the type is spelled', () => {
		const { unit, record } = fixture();
		const alias = varOf(unit, 'alias').type;
		expect(typeIdentity(alias)).toBe('c:@T@TaggedAlias');
		expect(typeIdentity(canonical(alias))).toBe(typeIdentity(record('Tagged')));
	});
});
