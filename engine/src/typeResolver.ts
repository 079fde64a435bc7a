import type { BuiltinKind, CType } from './ast';
import { canonical, isCharKind, typeToString } from './ast/ctypes';
import { typeIdentity } from './identity';
import type { TypeNameRegistry } from './registry';
import { debug } from './log';

const PRIMITIVE_NAMES: Partial<Record<BuiltinKind, string>> = {
	'int': 'i32',
	'short': 'i16',
	'long long': 'i64',
	'char': 'u8',
	'signed char': 'u8',
	'unsigned char': 'u8',
	'float': 'f32',
	'double': 'f64',
};

export const STRING_REF_NAME = 'str';
export const ANY_POINTER_NAME = 'anyptr';

// Identities to try for a type: as written, then with typedefs stripped.
export function identityCandidates(type: CType): string[] {
	const keys: string[] = [];
	const sugared = typeIdentity(type);
	if (sugared !== null) keys.push(sugared);
	const plain = typeIdentity(canonical(type));
	if (plain !== null && plain !== sugared) keys.push(plain);
	return keys;
}

// Name a type the binding knows it by. A registry hit always wins; otherwise
// primitives map to fixed-width names, pointers to `str` or `anyptr`, and
// everything else keeps its C spelling. Never fails.
export function resolveTypeName(type: CType, registry: TypeNameRegistry): string {
	for (const key of identityCandidates(type)) {
		const name = registry.lookup(key);
		if (name !== null) {
			debug('resolve', key, '->', name);
			return name;
		}
	}
	return normalizeTypeName(type);
}

export function normalizeTypeName(type: CType): string {
	const c = canonical(type);
	if (c.kind === 'builtin') {
		const name = PRIMITIVE_NAMES[c.name];
		if (name) return name;
	}
	if (c.kind === 'pointer') {
		const pointee = c.pointee;
		return pointee.kind === 'builtin' && isCharKind(pointee.name) ? STRING_REF_NAME : ANY_POINTER_NAME;
	}
	return typeToString(type);
}
