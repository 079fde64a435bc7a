// Numeric and character literal decoding shared by `#if` evaluation and the parser

export type IntegerLiteralInfo = { value: bigint; unsigned: boolean; longs: 0 | 1 | 2 };

export function isFloatingLiteral(text: string): boolean {
	if (/^0[xX]/.test(text)) return /[pP]/.test(text);
	return /[.eE]/.test(text);
}

export function parseIntegerLiteral(text: string): IntegerLiteralInfo | null {
	const m = /^(0[xX][0-9a-fA-F]+|0[bB][01]+|0[0-7]*|[1-9][0-9]*)([uUlL]*)$/.exec(text.replace(/'/g, ''));
	if (!m) return null;
	const digits = m[1] ?? '';
	const suffix = (m[2] ?? '').toLowerCase();
	if (suffix.length > 3) return null;
	const unsigned = suffix.includes('u');
	const lCount = suffix.replace('u', '').length;
	if (lCount > 2 || suffix.replace('u', '').replace(/l/g, '').length) return null;
	let value: bigint;
	if (/^0[xXbB]/.test(digits)) value = BigInt(digits);
	else if (digits.length > 1 && digits.startsWith('0')) value = BigInt('0o' + digits.slice(1));
	else value = BigInt(digits);
	const longs = lCount === 2 ? 2 : lCount === 1 ? 1 : 0;
	return { value, unsigned, longs };
}

export type FloatLiteralInfo = { value: number; precision: 'float' | 'double' | 'long double' };

export function parseFloatLiteral(text: string): FloatLiteralInfo | null {
	let body = text;
	let precision: FloatLiteralInfo['precision'] = 'double';
	const last = body[body.length - 1] ?? '';
	const isHex = /^0[xX]/.test(body);
	if (last === 'f' || last === 'F') { precision = 'float'; body = body.slice(0, -1); }
	else if (last === 'l' || last === 'L') { precision = 'long double'; body = body.slice(0, -1); }
	if (isHex) {
		const m = /^0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)$/.exec(body);
		if (!m) return null;
		const intPart = m[1] ?? '';
		const fracPart = m[2] ?? '';
		if (!intPart && !fracPart) return null;
		let mant = 0;
		for (const ch of intPart) mant = mant * 16 + parseInt(ch, 16);
		let scale = 1 / 16;
		for (const ch of fracPart) { mant += parseInt(ch, 16) * scale; scale /= 16; }
		const value = mant * Math.pow(2, Number(m[3]));
		return { value: precision === 'float' ? Math.fround(value) : value, precision };
	}
	if (!/^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(body)) return null;
	const value = Number(body);
	return { value: precision === 'float' ? Math.fround(value) : value, precision };
}

const SIMPLE_ESCAPES: Record<string, number> = {
	n: 10, t: 9, r: 13, '0': 0, a: 7, b: 8, f: 12, v: 11, e: 27, '\\': 92, '\'': 39, '"': 34, '?': 63,
};

// Value of a character constant; multi-character constants pack bytes big-endian like common compilers
export function parseCharLiteral(text: string): bigint | null {
	const m = /^(?:L|u8|u|U)?'([\s\S]*)'$/.exec(text);
	if (!m) return null;
	const body = m[1] ?? '';
	if (!body.length) return null;
	const units: number[] = [];
	for (let i = 0; i < body.length;) {
		const ch = body[i] ?? '';
		if (ch !== '\\') { units.push(body.codePointAt(i) ?? 0); i += ch.length; continue; }
		const esc = body[i + 1] ?? '';
		if (esc === 'x') {
			const hex = /^[0-9a-fA-F]+/.exec(body.slice(i + 2));
			if (!hex) return null;
			units.push(parseInt(hex[0], 16));
			i += 2 + hex[0].length;
			continue;
		}
		if (/[0-7]/.test(esc)) {
			const oct = /^[0-7]{1,3}/.exec(body.slice(i + 1));
			const digits = oct ? oct[0] : '0';
			units.push(parseInt(digits, 8));
			i += 1 + digits.length;
			continue;
		}
		const simple = SIMPLE_ESCAPES[esc];
		if (simple === undefined) return null;
		units.push(simple);
		i += 2;
	}
	if (units.length === 1) {
		const u = units[0] ?? 0;
		// plain char is signed
		return !/^[LuU]/.test(text) && u > 127 && u < 256 ? BigInt(u - 256) : BigInt(u);
	}
	let v = 0n;
	for (const u of units) v = (v << 8n) | BigInt(u & 0xff);
	return BigInt.asIntN(32, v);
}

// Literal body without prefix or quotes; escapes are kept as written
export function stringLiteralContent(text: string): string {
	const m = /^(?:L|u8|u|U)?"([\s\S]*)"$/.exec(text);
	return m ? m[1] ?? '' : text.replace(/^(?:L|u8|u|U)?"/, '');
}
