import type { CType, Expr } from './index';
import { alignOf, canonical, sizeOf } from './ctypes';

// Integer constant expression value, or null when the expression is not constant.
export function evalIntegerConstant(e: Expr): bigint | null {
	switch (e.kind) {
		case 'IntegerLiteral': return e.value;
		case 'CharLiteral': return e.value;
		case 'Identifier': return e.constant;
		case 'Paren': return evalIntegerConstant(e.inner);
		case 'Cast': {
			const v = evalIntegerConstant(e.operand);
			if (v === null) return null;
			const t = canonical(e.type);
			if (t.kind === 'builtin') {
				const size = sizeOf(t);
				if (t.name === '_Bool') return v !== 0n ? 1n : 0n;
				if (size !== null && t.name !== 'float' && t.name !== 'double' && t.name !== 'long double') {
					return t.name.startsWith('unsigned') ? BigInt.asUintN(size * 8, v) : BigInt.asIntN(size * 8, v);
				}
			}
			return v;
		}
		case 'SizeOf': {
			if (isTypeOperand(e.operand)) {
				const n = e.keyword === 'sizeof' ? sizeOf(e.operand) : alignOf(e.operand);
				return n === null ? null : BigInt(n);
			}
			return null;
		}
		case 'Unary': {
			if (e.postfix) return null;
			const v = evalIntegerConstant(e.operand);
			if (v === null) return null;
			switch (e.op) {
				case '+': return v;
				case '-': return BigInt.asIntN(64, -v);
				case '~': return BigInt.asIntN(64, ~v);
				case '!': return v === 0n ? 1n : 0n;
				default: return null;
			}
		}
		case 'Binary': {
			const l = evalIntegerConstant(e.left);
			if (l === null) return null;
			if (e.op === '&&' && l === 0n) return 0n;
			if (e.op === '||' && l !== 0n) return 1n;
			const r = evalIntegerConstant(e.right);
			if (r === null) return null;
			return applyBinary(e.op, l, r);
		}
		case 'Conditional': {
			const c = evalIntegerConstant(e.cond);
			if (c === null) return null;
			return evalIntegerConstant(c !== 0n ? e.then : e.otherwise);
		}
		default: return null;
	}
}

export function isTypeOperand(op: CType | Expr): op is CType {
	return op.kind === 'builtin' || op.kind === 'pointer' || op.kind === 'array' || op.kind === 'function'
		|| op.kind === 'record' || op.kind === 'enum' || op.kind === 'typedef';
}

function applyBinary(op: string, l: bigint, r: bigint): bigint | null {
	const wrap = (v: bigint) => BigInt.asIntN(64, v);
	switch (op) {
		case '*': return wrap(l * r);
		case '/': return r === 0n ? null : wrap(l / r);
		case '%': return r === 0n ? null : wrap(l % r);
		case '+': return wrap(l + r);
		case '-': return wrap(l - r);
		case '<<': return r < 0n || r > 63n ? null : wrap(l << r);
		case '>>': return r < 0n || r > 63n ? null : l >> r;
		case '<': return l < r ? 1n : 0n;
		case '>': return l > r ? 1n : 0n;
		case '<=': return l <= r ? 1n : 0n;
		case '>=': return l >= r ? 1n : 0n;
		case '==': return l === r ? 1n : 0n;
		case '!=': return l !== r ? 1n : 0n;
		case '&': return l & r;
		case '^': return l ^ r;
		case '|': return l | r;
		case '&&': return l !== 0n && r !== 0n ? 1n : 0n;
		case '||': return l !== 0n || r !== 0n ? 1n : 0n;
		case ',': return r;
		default: return null;
	}
}
