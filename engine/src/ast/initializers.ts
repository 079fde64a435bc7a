import type { CType, Expr, InitElement, InitListExpr, TokenRange } from './index';
import { canonical, isAggregate, isCharArray, recordOf, sameType, typeToString } from './ctypes';
import { type DiagCode, type Severity, MI_DIAGCODES } from '../diagCodes';

export type BindReporter = (range: TokenRange, message: string, code: DiagCode, severity: Severity) => void;

// Binds a braced initializer list to the type it initializes, the way C does:
// designators pick members, positional elements continue after the last one,
// aggregates without braces take their elements from the enclosing list, and
// members left without an initializer get an ImplicitValueInit.
export function bindInitList(list: InitListExpr, type: CType, report: BindReporter) {
	new InitBinder(report).bind(list, type);
}

export function implicitValue(type: CType, range: TokenRange): Expr {
	return { kind: 'ImplicitValueInit', type, range: { ...range } };
}

function syntheticList(range: TokenRange): InitListExpr {
	return { kind: 'InitList', range: { ...range }, elements: [], type: null, inits: null, unionField: null, synthetic: true };
}

type Filled = { pos: number; value: Expr };

class InitBinder {
	private readonly seen = new Set<string>();

	constructor(private readonly reporter: BindReporter) {}

	private report(range: TokenRange, message: string, code: DiagCode, severity: Severity = 'error') {
		// nested designators rebind the same elements; report each problem once
		const key = `${range.start}:${range.end}:${message}`;
		if (this.seen.has(key)) return;
		this.seen.add(key);
		this.reporter(range, message, code, severity);
	}

	bind(list: InitListExpr, type: CType) {
		list.type = type;
		const c = canonical(type);
		if (c.kind === 'record') { this.fillRecord(list.elements, 0, type, list, true, false); return; }
		if (c.kind === 'array') { this.fillArray(list.elements, 0, type, list, true, false); return; }
		const first = list.elements[0];
		if (first && first.designators.length) {
			const d = first.designators[0];
			if (d) this.report(d.range, `designator in initializer for scalar type '${typeToString(type)}'`, MI_DIAGCODES.INVALID_DESIGNATOR);
		}
		let value: Expr = first ? first.value : implicitValue(type, list.range);
		if (value.kind === 'InitList') {
			this.report(value.range, 'too many braces around scalar initializer', MI_DIAGCODES.SCALAR_BRACES, 'warning');
			this.bind(value, type);
			value = value.inits?.[0] ?? implicitValue(type, value.range);
		}
		list.inits = [value];
		list.unionField = null;
		const extra = list.elements[1];
		if (extra) this.report(extra.value.range, 'excess elements in scalar initializer', MI_DIAGCODES.EXCESS_INITIALIZERS, 'warning');
	}

	// Whether `v` initializes a member of aggregate type `t` as a whole rather than its first scalar.
	private initializesDirectly(v: Expr, t: CType): boolean {
		let e = v;
		while (e.kind === 'Paren') e = e.inner;
		switch (e.kind) {
			case 'CompoundLiteral': return sameType(e.type, t);
			case 'StringLiteral': return isCharArray(t);
			case 'IntegerLiteral': case 'FloatLiteral': case 'CharLiteral':
			case 'Unary': case 'Binary': case 'SizeOf': case 'ImplicitValueInit':
				return false;
			case 'Identifier': return e.constant === null;
			default: return true;
		}
	}

	private initMember(elems: InitElement[], pos: number, memberType: CType, designated: boolean): Filled {
		const el = elems[pos];
		if (!el) return { pos, value: implicitValue(memberType, { start: 0, end: 0 }) };
		const v = el.value;
		if (v.kind === 'InitList') {
			this.bind(v, memberType);
			return { pos: pos + 1, value: v };
		}
		if (isAggregate(memberType) && !this.initializesDirectly(v, memberType)) {
			const sub = syntheticList(v.range);
			const next = canonical(memberType).kind === 'record'
				? this.fillRecord(elems, pos, memberType, sub, false, designated)
				: this.fillArray(elems, pos, memberType, sub, false, designated);
			if (next > pos) {
				const last = elems[next - 1];
				if (last) sub.range = { start: v.range.start, end: last.value.range.end };
				sub.elements = elems.slice(pos, next).map((e, k) => k === 0 && designated ? { designators: [], value: e.value } : e);
				return { pos: next, value: sub };
			}
		}
		return { pos: pos + 1, value: v };
	}

	// `.a.b = v` or `[1].x = v`: the leading designator picked the member, the rest apply inside it
	private designate(existing: Expr | undefined, memberType: CType, el: InitElement): InitListExpr {
		const sub = existing && existing.kind === 'InitList' && existing.synthetic ? existing : syntheticList(el.value.range);
		sub.elements.push(el);
		this.bind(sub, memberType);
		return sub;
	}

	private fillRecord(elems: InitElement[], start: number, type: CType, target: InitListExpr, braced: boolean, firstConsumed: boolean): number {
		target.type = type;
		const rec = recordOf(type);
		const fields = rec?.fields;
		if (!rec || !fields) {
			this.report(target.range, `initialization of incomplete type '${typeToString(type)}'`, MI_DIAGCODES.INCOMPLETE_TYPE);
			target.inits = [];
			return braced ? elems.length : start + 1;
		}
		const isUnion = rec.tagKind === 'union';
		const limit = isUnion ? 1 : fields.length;
		const inits: (Expr | undefined)[] = [];
		let active: number | null = null;
		let fi = 0;
		let pos = start;
		while (pos < elems.length) {
			const el = elems[pos];
			if (!el) break;
			const designators = pos === start && firstConsumed ? [] : el.designators;
			const d = designators[0];
			if (d) {
				if (!braced) break;
				if (d.kind !== 'field') {
					this.report(d.range, `array designator cannot initialize non-array type '${typeToString(type)}'`, MI_DIAGCODES.INVALID_DESIGNATOR);
					pos++;
					continue;
				}
				const idx = fields.findIndex(f => f.name === d.name);
				const field = fields[idx];
				if (!field) {
					this.report(d.range, `field designator '${d.name}' does not refer to any field in type '${typeToString(type)}'`, MI_DIAGCODES.UNKNOWN_FIELD);
					pos++;
					continue;
				}
				fi = idx;
				if (designators.length > 1) {
					inits[fi] = this.designate(inits[fi], field.type, { designators: designators.slice(1), value: el.value });
					pos++;
				} else {
					const r = this.initMember(elems, pos, field.type, true);
					inits[fi] = r.value;
					pos = r.pos;
				}
				if (isUnion) active = fi;
				fi++;
				continue;
			}
			if (fi >= limit) break;
			const field = fields[fi];
			if (!field) break;
			// unnamed bit-fields take no initializer
			if (field.name === null && field.bitWidth !== null) { fi++; continue; }
			const r = this.initMember(elems, pos, field.type, false);
			inits[fi] = r.value;
			pos = r.pos;
			if (isUnion) active = fi;
			fi++;
		}
		const excess = elems[pos];
		if (braced && excess) {
			this.report(excess.value.range, `excess elements in ${rec.tagKind} initializer`, MI_DIAGCODES.EXCESS_INITIALIZERS, 'warning');
			pos = elems.length;
		}
		if (isUnion) {
			const u = active ?? 0;
			const field = fields[u];
			target.unionField = field ? u : null;
			target.inits = field ? [inits[u] ?? implicitValue(field.type, target.range)] : [];
		} else {
			target.unionField = null;
			target.inits = fields.map((f, i) => inits[i] ?? implicitValue(f.type, target.range));
		}
		return pos;
	}

	private fillArray(elems: InitElement[], start: number, type: CType, target: InitListExpr, braced: boolean, firstConsumed: boolean): number {
		target.type = type;
		target.unionField = null;
		const c = canonical(type);
		if (c.kind !== 'array') { target.inits = []; return start + 1; }
		const first = elems[start];
		// char s[] = { "text" }
		if (braced && first && first.value.kind === 'StringLiteral' && isCharArray(type) && !first.designators.length) {
			target.inits = [first.value];
			const extra = elems[start + 1];
			if (extra) this.report(extra.value.range, 'excess elements in char array initializer', MI_DIAGCODES.EXCESS_INITIALIZERS, 'warning');
			return elems.length;
		}
		const size = c.size;
		const elementType = c.element;
		const inits: (Expr | undefined)[] = [];
		let idx = 0;
		let pos = start;
		while (pos < elems.length) {
			const el = elems[pos];
			if (!el) break;
			const designators = pos === start && firstConsumed ? [] : el.designators;
			const d = designators[0];
			if (d) {
				if (!braced) break;
				if (d.kind !== 'index') {
					this.report(d.range, 'field designator cannot initialize a non-struct, non-union type', MI_DIAGCODES.INVALID_DESIGNATOR);
					pos++;
					continue;
				}
				if (d.index < 0n || (size !== null && d.index >= BigInt(size))) {
					this.report(d.range, `array designator index (${d.index}) exceeds array bounds (${size ?? 0})`, MI_DIAGCODES.INVALID_DESIGNATOR);
					pos++;
					continue;
				}
				idx = Number(d.index);
				if (designators.length > 1) {
					inits[idx] = this.designate(inits[idx], elementType, { designators: designators.slice(1), value: el.value });
					pos++;
				} else {
					const r = this.initMember(elems, pos, elementType, true);
					inits[idx] = r.value;
					pos = r.pos;
				}
				idx++;
				continue;
			}
			if (size !== null && idx >= size) break;
			const r = this.initMember(elems, pos, elementType, false);
			inits[idx] = r.value;
			pos = r.pos;
			idx++;
		}
		const excess = elems[pos];
		if (braced && excess) {
			this.report(excess.value.range, 'excess elements in array initializer', MI_DIAGCODES.EXCESS_INITIALIZERS, 'warning');
			pos = elems.length;
		}
		// explicit elements only; trailing elements stay implicit
		target.inits = Array.from({ length: inits.length }, (_, i) => inits[i] ?? implicitValue(elementType, target.range));
		return pos;
	}
}
