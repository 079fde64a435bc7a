import type { BuiltinKind, CType, EnumDecl, RecordDecl } from './ast';
import { QUAL_CONST, QUAL_RESTRICT, QUAL_VOLATILE } from './ast';

// Stable Type Identity: a USR-like key that depends on what a type is, not on how or where it was spelled.
//   builtins        c:I  c:S  c:K  c:C  c:c  c:r  c:f  c:d ...
//   records         c:@S@Point  c:@U@Value
//   typedef-named   c:@SA@Point (anonymous struct named by `typedef struct {..} Point`)
//   member-named    c:@S@Outer@Sa@info (anonymous struct declared as the type of `Outer.info`)
//   enums           c:@E@Color  c:@EA@Mode
//   typedefs        c:@T@Point
//   composites      c:*C  c:[4I  c:FI(I*v)  c:1C (qualifier digit: const 1, volatile 2, restrict 4)
// Top-level qualifiers are not part of the identity.

const BUILTIN_CODES: Record<BuiltinKind, string> = {
	'void': 'v', '_Bool': 'b',
	'char': 'C', 'signed char': 'r', 'unsigned char': 'c',
	'short': 'S', 'unsigned short': 's',
	'int': 'I', 'unsigned int': 'i',
	'long': 'L', 'unsigned long': 'l',
	'long long': 'K', 'unsigned long long': 'k',
	'__int128': 'J', 'unsigned __int128': 'j',
	'float': 'f', 'double': 'd', 'long double': 'D',
};

export function typeIdentity(t: CType): string | null {
	const body = encode(t, false);
	return body === null ? null : `c:${body}`;
}

function qualDigit(quals: number): string {
	const q = (quals & QUAL_CONST ? 1 : 0) | (quals & QUAL_VOLATILE ? 2 : 0) | (quals & QUAL_RESTRICT ? 4 : 0);
	return q ? String(q) : '';
}

function encode(t: CType, nested: boolean): string | null {
	const q = nested ? qualDigit(t.quals) : '';
	switch (t.kind) {
		case 'builtin': return q + BUILTIN_CODES[t.name];
		case 'pointer': {
			const p = encode(t.pointee, true);
			return p === null ? null : `${q}*${p}`;
		}
		case 'array': {
			const e = encode(t.element, true);
			return e === null ? null : `${q}[${t.size ?? ''}${e}`;
		}
		case 'function': {
			const r = encode(t.result, true);
			const params = t.params.map(p => encode(p, true));
			if (r === null || params.some(p => p === null)) return null;
			return `${q}F${r}(${params.join('')}${t.variadic ? '.' : ''})`;
		}
		case 'record': {
			const id = recordIdentity(t.decl);
			return id === null ? null : q + (nested ? '$' : '') + id;
		}
		case 'enum': {
			const id = enumIdentity(t.decl);
			return id === null ? null : q + (nested ? '$' : '') + id;
		}
		case 'typedef': return q + (nested ? '$' : '') + `@T@${t.decl.name}`;
	}
}

export function recordIdentity(decl: RecordDecl): string | null {
	const letter = decl.tagKind === 'union' ? 'U' : 'S';
	if (decl.tag) return `@${letter}@${decl.tag}`;
	if (decl.typedefName) return `@${letter}A@${decl.typedefName}`;
	if (decl.owner) {
		const owner = recordIdentity(decl.owner.record);
		return owner === null ? null : `${owner}@${letter.toLowerCase()}a@${decl.owner.field}`;
	}
	return null;
}

function enumIdentity(decl: EnumDecl): string | null {
	if (decl.tag) return `@E@${decl.tag}`;
	if (decl.typedefName) return `@EA@${decl.typedefName}`;
	return null;
}
