import type { CType, CompoundLiteralExpr, Expr, InitListExpr, TokenRange } from './ast';
import type { Token } from './core/tokens';
import type { SourceManager } from './core/source';
import { canonical, recordOf } from './ast/ctypes';
import { sourceText } from './ast/sourceText';
import { implicitValue } from './ast/initializers';
import { resolveTypeName } from './typeResolver';
import type { TypeNameRegistry } from './registry';
import { debug } from './log';

export const NOT_A_RECORD = '<not a record>';
export const NOT_AN_INIT_LIST = '<not an init list>';

export const DEFAULT_MAX_DEPTH = 64;

export class NestingLimitError extends Error {
	constructor(readonly limit: number) {
		super(`initializer nesting exceeds ${limit} levels`);
		this.name = 'NestingLimitError';
	}
}

export interface SerializeContext {
	registry: TypeNameRegistry;
	tokens: readonly Token[];
	sources: SourceManager;
	maxDepth?: number;
	// receives every fragment copied verbatim from the source
	passthrough?: string[];
}

// Initializer text for one expression.
export function serialize(e: Expr, ctx: SerializeContext, depth = 0): string {
	switch (e.kind) {
		case 'IntegerLiteral': return BigInt.asIntN(64, e.value).toString();
		case 'FloatLiteral': return formatFloat(e.value, e.precision);
		case 'StringLiteral': return `"${e.content}".ref()`;
		case 'CompoundLiteral': return compoundToInit(e, ctx, depth);
		case 'InitList':
			if (e.type && recordOf(e.type)) return recordInit(e.type, e, ctx, depth);
			// elided braces leave no source text to copy
			if (e.synthetic) return `{${(e.inits ?? []).map(v => serialize(v, ctx, depth)).join(', ')}}`;
			return passthrough(e.range, ctx);
		case 'ImplicitValueInit': return zeroValue(e.type, ctx, depth);
		default: return passthrough(e.range, ctx);
	}
}

// `Name{f0=v0, f1=v1}` for a compound literal of record type
export function compoundToInit(lit: CompoundLiteralExpr, ctx: SerializeContext, depth = 0): string {
	if (!recordOf(lit.type)) return NOT_A_RECORD;
	if (lit.init.kind !== 'InitList') return NOT_AN_INIT_LIST;
	return recordInit(lit.type, lit.init, ctx, depth);
}

function recordInit(type: CType, list: InitListExpr, ctx: SerializeContext, depth: number): string {
	const limit = ctx.maxDepth ?? DEFAULT_MAX_DEPTH;
	if (depth >= limit) throw new NestingLimitError(limit);
	const rec = recordOf(type);
	const fields = rec?.fields ?? [];
	const name = resolveTypeName(type, ctx.registry);
	const inits = list.inits ?? [];
	const parts: string[] = [];
	if (rec && rec.tagKind === 'union') {
		const field = fields[list.unionField ?? 0];
		const init = inits[0];
		if (field && init) parts.push(`${field.name ?? ''}=${serialize(init, ctx, depth + 1)}`);
	} else {
		fields.forEach((field, i) => {
			const init = inits[i];
			if (!init) return;
			parts.push(`${field.name ?? ''}=${serialize(init, ctx, depth + 1)}`);
		});
	}
	const text = `${name}{${parts.join(', ')}}`;
	debug('serialize', text);
	return text;
}

// Value of a member that has no initializer
function zeroValue(type: CType, ctx: SerializeContext, depth: number): string {
	const c = canonical(type);
	switch (c.kind) {
		case 'builtin':
			return c.name === 'float' || c.name === 'double' || c.name === 'long double' ? '0.0' : '0';
		case 'enum': return '0';
		case 'pointer': return 'null';
		case 'record': {
			const fields = c.decl.fields ?? [];
			const members = c.decl.tagKind === 'union' ? fields.slice(0, 1) : fields;
			const range = { start: 0, end: 0 };
			const list: InitListExpr = {
				kind: 'InitList', range, elements: [], type,
				inits: members.map(f => implicitValue(f.type, range)),
				unionField: c.decl.tagKind === 'union' ? 0 : null, synthetic: true,
			};
			return recordInit(type, list, ctx, depth);
		}
		default: {
			const text = '{0}';
			ctx.passthrough?.push(text);
			return text;
		}
	}
}

function passthrough(range: TokenRange, ctx: SerializeContext): string {
	const text = sourceText(ctx.tokens, range, ctx.sources);
	debug('serialize', 'passthrough', JSON.stringify(text));
	ctx.passthrough?.push(text);
	return text;
}

// Shortest decimal text that reads back to the same value at the literal's precision,
// always with a `.` or an exponent.
export function formatFloat(value: number, precision: 'float' | 'double' | 'long double'): string {
	if (Number.isNaN(value)) return 'NaN';
	if (!Number.isFinite(value)) return value < 0 ? '-Inf' : 'Inf';
	let text = String(value);
	if (precision === 'float') {
		for (let digits = 1; digits <= 9; digits++) {
			const candidate = Number(value.toPrecision(digits));
			if (Math.fround(candidate) === value) { text = String(candidate); break; }
		}
	}
	return /[.eE]/.test(text) ? text : `${text}.0`;
}
