import { type BuiltinKind, type CType, type EnumDecl, type RecordDecl, QUAL_CONST, QUAL_RESTRICT, QUAL_VOLATILE } from './index';
import { formatLocation } from '../core/source';

export function builtin(name: BuiltinKind, quals = 0): CType { return { kind: 'builtin', name, quals }; }
export function pointerTo(pointee: CType, quals = 0): CType { return { kind: 'pointer', pointee, quals }; }
export function arrayOf(element: CType, size: number | null): CType { return { kind: 'array', element, size, quals: 0 }; }

export function withQuals(t: CType, quals: number): CType {
	if (!quals) return t;
	return { ...t, quals: t.quals | quals };
}

export function unqualified(t: CType): CType {
	return t.quals ? { ...t, quals: 0 } : t;
}

// Strip typedef sugar at every level; qualifiers of removed typedefs move onto the result.
export function canonical(t: CType): CType {
	switch (t.kind) {
		case 'typedef': return withQuals(canonical(t.decl.type), t.quals);
		case 'pointer': return { ...t, pointee: canonical(t.pointee) };
		case 'array': return { ...t, element: canonical(t.element) };
		case 'function': return { ...t, result: canonical(t.result), params: t.params.map(canonical) };
		default: return t;
	}
}

export function isRecord(t: CType): t is Extract<CType, { kind: 'record' }> { return t.kind === 'record'; }

export function recordOf(t: CType): RecordDecl | null {
	const c = canonical(t);
	return c.kind === 'record' ? c.decl : null;
}

export function isAggregate(t: CType): boolean {
	const c = canonical(t);
	return c.kind === 'record' || c.kind === 'array';
}

export function isCharKind(name: BuiltinKind): boolean {
	return name === 'char' || name === 'signed char' || name === 'unsigned char';
}

export function isFloatingKind(name: BuiltinKind): boolean {
	return name === 'float' || name === 'double' || name === 'long double';
}

export function isCharArray(t: CType): boolean {
	const c = canonical(t);
	return c.kind === 'array' && c.element.kind === 'builtin' && isCharKind(c.element.name);
}

export function sameType(a: CType, b: CType): boolean {
	const x = canonical(a);
	const y = canonical(b);
	if (x.kind !== y.kind) return false;
	switch (x.kind) {
		case 'builtin': return y.kind === 'builtin' && x.name === y.name;
		case 'record': return y.kind === 'record' && x.decl === y.decl;
		case 'enum': return y.kind === 'enum' && x.decl === y.decl;
		case 'pointer': return y.kind === 'pointer' && sameType(x.pointee, y.pointee);
		case 'array': return y.kind === 'array' && x.size === y.size && sameType(x.element, y.element);
		case 'function': return y.kind === 'function' && sameType(x.result, y.result) && x.params.length === y.params.length && x.params.every((p, i) => { const q = y.params[i]; return !!q && sameType(p, q); });
		default: return false;
	}
}

// --- spelling ---

function qualPrefix(quals: number): string {
	const parts: string[] = [];
	if (quals & QUAL_CONST) parts.push('const');
	if (quals & QUAL_VOLATILE) parts.push('volatile');
	if (quals & QUAL_RESTRICT) parts.push('restrict');
	return parts.join(' ');
}

function tagSpelling(decl: RecordDecl | EnumDecl): string {
	const keyword = decl.kind === 'record' ? decl.tagKind : 'enum';
	if (decl.tag) return `${keyword} ${decl.tag}`;
	if (decl.typedefName) return decl.typedefName;
	return `${keyword} (unnamed ${keyword} at ${formatLocation(decl.location)})`;
}

// Spelling of a type as written through the type system: typedef names are kept,
// declarators print like `char *`, `char[100]` and `int (*)(int, void *)`.
export function typeToString(t: CType): string {
	return print(t, '');
}

function print(t: CType, inner: string): string {
	switch (t.kind) {
		case 'builtin': case 'record': case 'enum': case 'typedef': {
			const base = t.kind === 'builtin' ? t.name : t.kind === 'typedef' ? t.decl.name : tagSpelling(t.decl);
			const q = qualPrefix(t.quals);
			const head = q ? `${q} ${base}` : base;
			// array suffixes attach without a space: `char[100]`
			if (!inner) return head;
			return inner.startsWith('[') ? head + inner : `${head} ${inner}`;
		}
		case 'pointer': {
			const q = qualPrefix(t.quals);
			let next = '*' + (q ? q + (inner ? ' ' : '') : '') + inner;
			if (t.pointee.kind === 'array' || t.pointee.kind === 'function') next = `(${next})`;
			return print(t.pointee, next);
		}
		case 'array':
			return print(t.element, inner + `[${t.size ?? ''}]`);
		case 'function': {
			const params = t.params.map(typeToString);
			if (t.variadic) params.push('...');
			const list = params.length ? params.join(', ') : (t.prototyped ? 'void' : '');
			return print(t.result, inner + `(${list})`);
		}
	}
}

// --- layout (LP64) ---

const BUILTIN_SIZE: Record<BuiltinKind, number> = {
	'void': 1, '_Bool': 1,
	'char': 1, 'signed char': 1, 'unsigned char': 1,
	'short': 2, 'unsigned short': 2, 'int': 4, 'unsigned int': 4,
	'long': 8, 'unsigned long': 8, 'long long': 8, 'unsigned long long': 8,
	'__int128': 16, 'unsigned __int128': 16,
	'float': 4, 'double': 8, 'long double': 16,
};

export function alignOf(t: CType): number | null {
	const c = canonical(t);
	switch (c.kind) {
		case 'builtin': return BUILTIN_SIZE[c.name];
		case 'pointer': return 8;
		case 'enum': return 4;
		case 'array': return alignOf(c.element);
		case 'function': return null;
		case 'record': {
			if (!c.decl.fields) return null;
			let a = 1;
			for (const f of c.decl.fields) { const fa = alignOf(f.type); if (fa === null) return null; a = Math.max(a, fa); }
			return a;
		}
		default: return null;
	}
}

export function sizeOf(t: CType): number | null {
	const c = canonical(t);
	switch (c.kind) {
		case 'builtin': return BUILTIN_SIZE[c.name];
		case 'pointer': return 8;
		case 'enum': return 4;
		case 'array': {
			const e = sizeOf(c.element);
			return e === null || c.size === null ? null : e * c.size;
		}
		case 'function': return null;
		case 'record': {
			const fields = c.decl.fields;
			const align = alignOf(c);
			if (!fields || align === null) return null;
			let size = 0;
			for (const f of fields) {
				const fs = sizeOf(f.type);
				const fa = alignOf(f.type);
				if (fs === null || fa === null) return null;
				if (c.decl.tagKind === 'union') size = Math.max(size, fs);
				else size = Math.ceil(size / fa) * fa + fs;
			}
			return Math.ceil(size / align) * align;
		}
		default: return null;
	}
}
