import { type Span, type Token, isPunct, isWordToken } from './tokens';
import { Tokenizer, tokenize } from './tokenizer';
import { parseCharLiteral, parseIntegerLiteral } from './literals';
import type { SourceManager } from './source';
import { type Diagnostic, type DiagCode, type Severity, MI_DIAGCODES } from '../diagCodes';
import { debug } from '../log';

export interface MacroDef {
	name: string;
	// null for object-like macros; variadic macros list `__VA_ARGS__` (or the named pack) last
	params: string[] | null;
	variadic: boolean;
	body: Token[];
	file: string;
	span: Span;
}

export type MacroTable = Map<string, MacroDef>;

export type ResolvedInclude = { id: string; text: string; tokens: Token[] };
// the file exists but reading it failed
export type UnreadableInclude = { id: string; error: string };
export type IncludeResolver = (target: string, angled: boolean, fromFile: string) => ResolvedInclude | UnreadableInclude | null;

export interface PreprocessOptions {
	resolver: IncludeResolver;
	sources: SourceManager;
	maxIncludeDepth?: number;
}

export interface PreprocessResult {
	tokens: Token[];            // active, macro-expanded tokens of the whole unit, terminated by eof
	macros: MacroTable;         // final macro table, in definition order
	diagnostics: Diagnostic[];
	includes: string[];         // resolved file ids in order of first inclusion
	includeGuards: Map<string, string>; // file id -> guard macro name
	fatal: boolean;
}

type Frame = {
	active: boolean;
	taken: boolean;     // some branch of this chain was already selected
	sawElse: boolean;
	parentActive: boolean;
	start: Token;
};

const DEFAULT_MAX_INCLUDE_DEPTH = 200;

export class Preprocessor {
	private readonly resolver: IncludeResolver;
	private readonly sources: SourceManager;
	private readonly maxIncludeDepth: number;
	private readonly macros: MacroTable = new Map();
	private readonly diagnostics: Diagnostic[] = [];
	private readonly includes: string[] = [];
	private readonly pragmaOnce = new Set<string>();
	private readonly includeGuards = new Map<string, string>();
	private readonly out: Token[] = [];
	private depth = 0;
	private fatal = false;
	private counter = 0;

	constructor(opts: PreprocessOptions) {
		this.resolver = opts.resolver;
		this.sources = opts.sources;
		this.maxIncludeDepth = opts.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
	}

	get failed(): boolean { return this.fatal; }

	isDefined(name: string): boolean { return this.macros.has(name); }

	// Run directives and expand the active text of one file; included files are processed inline.
	processFile(file: string, tokens: readonly Token[]) {
		if (this.fatal || this.pragmaOnce.has(file)) return;
		const frames: Frame[] = [];
		let pending: Token[] = [];
		const flush = () => {
			if (!pending.length) return;
			for (const t of this.expand(pending)) this.out.push(t);
			pending = [];
		};
		const active = () => { const top = frames[frames.length - 1]; return !top || top.active; };
		this.detectIncludeGuard(file, tokens);
		for (const t of tokens) {
			if (this.fatal) return;
			if (t.kind === 'comment-line' || t.kind === 'comment-block') continue;
			if (t.kind === 'eof') break;
			if (t.kind === 'directive') {
				flush();
				this.handleDirective(t, file, frames, active());
				continue;
			}
			if (active()) pending.push(t);
		}
		flush();
		for (const f of frames) this.report(f.start, 'unterminated conditional directive', MI_DIAGCODES.UNTERMINATED_CONDITIONAL);
	}

	finish(mainFile: string): PreprocessResult {
		const mainText = this.sources.text(mainFile) ?? '';
		this.out.push({ kind: 'eof', value: '', span: { start: mainText.length, end: mainText.length }, file: mainFile });
		return {
			tokens: this.out,
			macros: this.macros,
			diagnostics: this.diagnostics,
			includes: this.includes,
			includeGuards: this.includeGuards,
			fatal: this.fatal,
		};
	}

	// `#ifndef X` followed by `#define X` as the first two directives of a file
	private detectIncludeGuard(file: string, tokens: readonly Token[]) {
		const directives = tokens.filter(t => t.kind === 'directive').slice(0, 2);
		if (directives.length < 2) return;
		const first = /^#\s*ifndef\s+([A-Za-z_]\w*)/.exec(directives[0]?.value ?? '');
		const second = /^#\s*define\s+([A-Za-z_]\w*)/.exec(directives[1]?.value ?? '');
		const firstCode = tokens.find(t => t.kind !== 'comment-line' && t.kind !== 'comment-block');
		if (first && second && first[1] === second[1] && firstCode === directives[0]) this.includeGuards.set(file, first[1] ?? '');
	}

	private directiveTokens(t: Token, file: string): Token[] {
		const text = this.sources.text(file) ?? '';
		const tz = new Tokenizer(text, file, { start: t.span.start, end: t.span.end, directives: false });
		const toks: Token[] = [];
		for (;;) {
			const tk = tz.next();
			if (tk.kind === 'eof') break;
			if (tk.kind === 'comment-line' || tk.kind === 'comment-block') continue;
			toks.push(tk);
		}
		return toks;
	}

	private handleDirective(t: Token, file: string, frames: Frame[], isActive: boolean) {
		const dt = this.directiveTokens(t, file);
		const nameTok = dt[1];
		if (!nameTok) return; // null directive
		const name = nameTok.value;
		const rest = dt.slice(2);
		const top = frames[frames.length - 1];
		switch (name) {
			case 'if': case 'ifdef': case 'ifndef': {
				if (!isActive) { frames.push({ active: false, taken: true, sawElse: false, parentActive: false, start: t }); return; }
				const v = this.evalBranch(name, rest, nameTok, file);
				frames.push({ active: v, taken: v, sawElse: false, parentActive: true, start: t });
				return;
			}
			case 'elif': case 'elifdef': case 'elifndef': {
				if (!top) { this.report(nameTok, `#${name} without #if`, MI_DIAGCODES.UNMATCHED_DIRECTIVE); return; }
				if (top.sawElse) this.report(nameTok, `#${name} after #else`, MI_DIAGCODES.UNMATCHED_DIRECTIVE);
				if (!top.parentActive || top.taken) { top.active = false; return; }
				const v = this.evalBranch(name.slice(2), rest, nameTok, file);
				top.active = v;
				top.taken = v;
				return;
			}
			case 'else': {
				if (!top) { this.report(nameTok, '#else without #if', MI_DIAGCODES.UNMATCHED_DIRECTIVE); return; }
				if (top.sawElse) this.report(nameTok, '#else after #else', MI_DIAGCODES.UNMATCHED_DIRECTIVE);
				top.sawElse = true;
				top.active = top.parentActive && !top.taken;
				top.taken = true;
				return;
			}
			case 'endif': {
				if (!frames.pop()) this.report(nameTok, '#endif without #if', MI_DIAGCODES.UNMATCHED_DIRECTIVE);
				return;
			}
		}
		if (!isActive) return;
		switch (name) {
			case 'define': this.define(rest, nameTok, file); return;
			case 'undef': {
				const id = rest[0];
				if (!id || !isWordToken(id)) { this.report(nameTok, 'macro name missing', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
				this.macros.delete(id.value);
				return;
			}
			case 'include': case 'include_next': case 'import': this.include(t, rest, nameTok, file); return;
			case 'pragma': {
				if (rest[0]?.value === 'once') this.pragmaOnce.add(file);
				return;
			}
			case 'error': {
				this.report(nameTok, `#error ${this.restText(rest)}`.trimEnd(), MI_DIAGCODES.ERROR_DIRECTIVE);
				this.fatal = true;
				return;
			}
			case 'warning': this.report(nameTok, `#warning ${this.restText(rest)}`.trimEnd(), MI_DIAGCODES.WARNING_DIRECTIVE, 'warning'); return;
			case 'line': case 'ident': case 'sccs': case 'assert': case 'unassert': return;
		}
		// GNU line markers: `# 12 "file.h"`
		if (nameTok.kind === 'number') return;
		this.report(nameTok, `invalid preprocessing directive #${name}`, MI_DIAGCODES.INVALID_DIRECTIVE, 'warning');
	}

	private restText(rest: Token[]): string {
		return rest.map((t, i) => (i > 0 && t.spaceBefore ? ' ' : '') + t.value).join('');
	}

	private evalBranch(kind: string, rest: Token[], at: Token, file: string): boolean {
		if (kind === 'ifdef' || kind === 'ifndef' || kind === 'def' || kind === 'ndef') {
			const id = rest[0];
			if (!id || !isWordToken(id)) { this.report(at, 'macro name missing', MI_DIAGCODES.INVALID_DIRECTIVE); return false; }
			const defined = this.macros.has(id.value) || BUILTIN_MACROS.has(id.value);
			return kind === 'ifdef' || kind === 'def' ? defined : !defined;
		}
		return this.evalCondition(rest, at, file);
	}

	private define(rest: Token[], at: Token, file: string) {
		const nameTok = rest[0];
		if (!nameTok || !isWordToken(nameTok)) { this.report(at, 'macro name must be an identifier', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
		if (nameTok.value === 'defined') { this.report(nameTok, '"defined" cannot be used as a macro name', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
		let i = 1;
		let params: string[] | null = null;
		let variadic = false;
		const open = rest[1];
		if (open && isPunct(open, '(') && !open.spaceBefore) {
			params = [];
			i = 2;
			for (;;) {
				const p = rest[i];
				if (!p) { this.report(nameTok, 'missing \')\' in macro parameter list', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
				if (params.length === 0 && isPunct(p, ')')) { i++; break; }
				if (isPunct(p, '...')) { variadic = true; params.push('__VA_ARGS__'); i++; }
				else if (isWordToken(p)) {
					params.push(p.value); i++;
					if (isPunct(rest[i], '...')) { variadic = true; i++; }
				} else { this.report(p, 'invalid token in macro parameter list', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
				const sep = rest[i];
				if (sep && isPunct(sep, ')') ) { i++; break; }
				if (!variadic && sep && isPunct(sep, ',')) { i++; continue; }
				this.report(sep ?? p, 'expected comma in macro parameter list', MI_DIAGCODES.INVALID_DIRECTIVE);
				return;
			}
		}
		const body = rest.slice(i);
		const edge = body[0] && isPunct(body[0], '##') ? body[0] : body.length && isPunct(body[body.length - 1], '##') ? body[body.length - 1] : undefined;
		if (edge) { this.report(edge, '\'##\' cannot appear at either end of a macro expansion', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
		const last = body[body.length - 1];
		const def: MacroDef = {
			name: nameTok.value,
			params,
			variadic,
			body,
			file,
			span: { start: nameTok.span.start, end: last ? last.span.end : nameTok.span.end },
		};
		const prev = this.macros.get(def.name);
		if (prev && !sameDefinition(prev, def)) this.report(nameTok, `'${def.name}' macro redefined`, MI_DIAGCODES.MACRO_REDEFINED, 'warning');
		this.macros.delete(def.name);
		this.macros.set(def.name, def);
	}

	private include(t: Token, rest: Token[], at: Token, file: string) {
		let target: string | null = null;
		let angled = false;
		const first = rest[0];
		if (first && first.kind === 'string') target = first.value.slice(1, -1);
		else if (first && isPunct(first, '<')) {
			const m = /<([^>\n]*)>/.exec(t.value);
			if (m) { target = m[1] ?? null; angled = true; }
		} else if (first) {
			const expanded = this.expand(rest);
			const head = expanded[0];
			if (head && head.kind === 'string') target = head.value.slice(1, -1);
			else if (head && isPunct(head, '<')) {
				const close = expanded.findIndex(x => isPunct(x, '>'));
				if (close > 0) { target = expanded.slice(1, close).map(x => x.value).join(''); angled = true; }
			}
		}
		if (!target) { this.report(at, '#include expects "FILENAME" or <FILENAME>', MI_DIAGCODES.INVALID_DIRECTIVE); return; }
		if (this.depth >= this.maxIncludeDepth) {
			this.report(at, '#include nested too deeply', MI_DIAGCODES.INCLUDE_DEPTH);
			this.fatal = true;
			return;
		}
		const res = this.resolver(target, angled, file);
		if (!res) {
			this.report(first ?? at, `'${target}' file not found`, MI_DIAGCODES.INCLUDE_NOT_FOUND);
			this.fatal = true;
			return;
		}
		if ('error' in res) {
			this.report(first ?? at, `'${target}' cannot be read: ${res.error}`, MI_DIAGCODES.INCLUDE_NOT_FOUND);
			this.fatal = true;
			return;
		}
		debug('preproc', 'include', target, '->', res.id);
		if (!this.includes.includes(res.id)) this.includes.push(res.id);
		if (!this.sources.has(res.id)) this.sources.add(res.id, res.text);
		this.depth++;
		try { this.processFile(res.id, res.tokens); }
		finally { this.depth--; }
	}

	// --- #if evaluation ---

	private evalCondition(rest: Token[], at: Token, file: string): boolean {
		const pre: Token[] = [];
		for (let i = 0; i < rest.length; i++) {
			const tk = rest[i];
			if (!tk) break;
			if (isWordToken(tk) && tk.value === 'defined') {
				let id = rest[i + 1];
				let skip = 1;
				if (id && isPunct(id, '(')) { id = rest[i + 2]; skip = isPunct(rest[i + 3], ')') ? 3 : 2; }
				if (!id || !isWordToken(id)) { this.report(tk, 'macro name missing after defined', MI_DIAGCODES.INVALID_DIRECTIVE); return false; }
				const v = this.macros.has(id.value) || BUILTIN_MACROS.has(id.value);
				pre.push({ ...tk, kind: 'number', value: v ? '1' : '0' });
				i += skip;
				continue;
			}
			if (isWordToken(tk) && tk.value.startsWith('__has_') && isPunct(rest[i + 1], '(')) {
				const close = rest.findIndex((x, k) => k > i && isPunct(x, ')'));
				if (close < 0) { this.report(tk, `missing ')' after ${tk.value}`, MI_DIAGCODES.INVALID_DIRECTIVE); return false; }
				const inner = rest.slice(i + 2, close);
				let v = false;
				if (tk.value === '__has_include' || tk.value === '__has_include_next') {
					const head = inner[0];
					if (head && head.kind === 'string') v = this.resolver(head.value.slice(1, -1), false, file) !== null;
					else if (head && isPunct(head, '<')) {
						const m = /__has_include(?:_next)?\s*\(\s*<([^>]*)>/.exec(this.sources.slice(file, { start: tk.span.start, end: (rest[close]?.span.end ?? tk.span.end) }) ?? '');
						v = !!m && this.resolver(m[1] ?? '', true, file) !== null;
					}
				}
				pre.push({ ...tk, kind: 'number', value: v ? '1' : '0' });
				i = close;
				continue;
			}
			pre.push(tk);
		}
		const expanded = this.expand(pre);
		const result = evaluateIfExpression(expanded);
		if (!result.ok) { this.report(expanded[result.at] ?? at, result.message, MI_DIAGCODES.INVALID_DIRECTIVE); return false; }
		debug('preproc', '#if', this.restText(rest), '=>', result.value.toString());
		return result.value !== 0n;
	}

	// --- macro expansion ---

	// Expand macros in a token list; expansions are rescanned with the tokens that follow them.
	expand(input: readonly Token[]): Token[] {
		const out: Token[] = [];
		const stack: Token[] = input.slice().reverse();
		for (;;) {
			const t = stack.pop();
			if (!t) break;
			if (!isWordToken(t) || (t.hide && t.hide.has(t.value))) { out.push(t); continue; }
			const builtin = this.expandBuiltin(t);
			if (builtin) { out.push(builtin); continue; }
			const def = this.macros.get(t.value);
			if (!def) { out.push(t); continue; }
			if (def.params === null) {
				const repl = this.substitute(def, [], withName(t.hide, def.name), t);
				for (let k = repl.length - 1; k >= 0; k--) { const r = repl[k]; if (r) stack.push(r); }
				continue;
			}
			const open = stack[stack.length - 1];
			if (!open || !isPunct(open, '(')) { out.push(t); continue; }
			const call = this.collectArgs(stack, def, t);
			if (!call) { out.push(t); continue; }
			const hide = withName(intersect(t.hide, call.close.hide), def.name);
			const repl = this.substitute(def, call.args, hide, t);
			for (let k = repl.length - 1; k >= 0; k--) { const r = repl[k]; if (r) stack.push(r); }
		}
		return out;
	}

	private expandBuiltin(t: Token): Token | null {
		switch (t.value) {
			case '__FILE__': return { ...t, kind: 'string', value: JSON.stringify(t.file) };
			case '__LINE__': return { ...t, kind: 'number', value: String(this.sources.locate(t.file, t.span.start).line) };
			case '__COUNTER__': return { ...t, kind: 'number', value: String(this.counter++) };
			case '__INCLUDE_LEVEL__': return { ...t, kind: 'number', value: String(this.depth) };
			default: return null;
		}
	}

	// Pops `( args )` from the work stack; on failure the popped tokens are restored.
	private collectArgs(stack: Token[], def: MacroDef, nameTok: Token): { args: Token[][]; close: Token } | null {
		const params = def.params ?? [];
		const taken: Token[] = [];
		const open = stack.pop();
		if (!open) return null;
		taken.push(open);
		const args: Token[][] = [[]];
		let depth = 1;
		let close: Token | null = null;
		for (;;) {
			const tk = stack.pop();
			if (!tk) break;
			taken.push(tk);
			if (isPunct(tk, '(')) depth++;
			else if (isPunct(tk, ')')) { depth--; if (depth === 0) { close = tk; break; } }
			else if (isPunct(tk, ',') && depth === 1 && !(def.variadic && args.length >= params.length)) { args.push([]); continue; }
			const cur = args[args.length - 1];
			if (cur) cur.push(tk);
		}
		const restore = () => { for (let k = taken.length - 1; k >= 0; k--) { const r = taken[k]; if (r) stack.push(r); } };
		if (!close) {
			this.report(nameTok, `unterminated function-like macro invocation '${def.name}'`, MI_DIAGCODES.MACRO_ARGUMENTS);
			restore();
			return null;
		}
		if (params.length === 0 && args.length === 1 && args[0]?.length === 0) args.length = 0;
		if (def.variadic && args.length === params.length - 1) args.push([]);
		if (args.length !== params.length) {
			const msg = args.length > params.length
				? `too many arguments provided to function-like macro invocation '${def.name}'`
				: `too few arguments provided to function-like macro invocation '${def.name}'`;
			this.report(nameTok, msg, MI_DIAGCODES.MACRO_ARGUMENTS);
			restore();
			return null;
		}
		return { args, close };
	}

	private substitute(def: MacroDef, args: Token[][], hide: ReadonlySet<string>, site: Token): Token[] {
		const result = this.substituteBody(def, def.body, args, new Map());
		return result.map((t, i) => {
			const copy: Token = { ...t, hide: union(t.hide, hide) };
			if (i === 0) copy.spaceBefore = site.spaceBefore;
			return copy;
		});
	}

	private substituteBody(def: MacroDef, body: readonly Token[], args: Token[][], expandedArgs: Map<number, Token[]>): Token[] {
		const params = def.params ?? [];
		const paramIndex = (tk: Token | undefined) => tk && isWordToken(tk) ? params.indexOf(tk.value) : -1;
		const vaIndex = def.variadic ? params.length - 1 : -1;
		const vaPresent = vaIndex >= 0 && (args[vaIndex]?.length ?? 0) > 0;
		const expandedArg = (p: number): Token[] => {
			let e = expandedArgs.get(p);
			if (!e) { e = this.expand(args[p] ?? []); expandedArgs.set(p, e); }
			return e;
		};
		const out: Token[] = [];
		let pasteNext = false;
		let lastEmpty = false;
		const append = (toks: Token[], lead?: Token) => {
			const items = toks.map((tk, k) => k === 0 && lead ? { ...tk, spaceBefore: lead.spaceBefore } : tk);
			if (pasteNext) {
				pasteNext = false;
				const lhs = out.pop();
				const rhs = items[0];
				if (!lhs || !rhs) { if (lhs) out.push(lhs); out.push(...items); lastEmpty = items.length === 0 && !lhs; return; }
				out.push(...this.paste(lhs, rhs), ...items.slice(1));
				lastEmpty = false;
				return;
			}
			out.push(...items);
			lastEmpty = items.length === 0;
		};
		for (let i = 0; i < body.length; i++) {
			const b = body[i];
			if (!b) break;
			if (def.variadic && b.value === '__VA_OPT__' && isPunct(body[i + 1], '(')) {
				let depth = 0;
				let j = i + 1;
				for (; j < body.length; j++) {
					const x = body[j];
					if (isPunct(x, '(')) depth++;
					else if (isPunct(x, ')')) { depth--; if (depth === 0) break; }
				}
				const inner = vaPresent ? this.substituteBody(def, body.slice(i + 2, j), args, expandedArgs) : [];
				append(inner, b);
				i = j;
				continue;
			}
			if (def.params && isPunct(b, '#') && paramIndex(body[i + 1]) >= 0) {
				const p = paramIndex(body[i + 1]);
				const end = body[i + 1]?.span.end ?? b.span.end;
				append([stringify(args[p] ?? [], b, end)]);
				i++;
				continue;
			}
			if (isPunct(b, '##')) {
				pasteNext = !lastEmpty && out.length > 0;
				continue;
			}
			const p = paramIndex(b);
			if (p >= 0) {
				const raw = args[p] ?? [];
				// GNU `, ## __VA_ARGS__`: the comma goes away when the pack is empty
				if (pasteNext && p === vaIndex && isPunct(out[out.length - 1], ',')) {
					pasteNext = false;
					if (!raw.length) out.pop();
					append(raw, b);
					continue;
				}
				const pasted = isPunct(body[i - 1], '##') || isPunct(body[i + 1], '##');
				append(pasted ? raw : expandedArg(p), b);
				continue;
			}
			append([b]);
		}
		return out;
	}

	private paste(lhs: Token, rhs: Token): Token[] {
		const text = lhs.value + rhs.value;
		const toks = tokenize(text, lhs.file, { directives: false }).filter(t => t.kind !== 'eof');
		const only = toks[0];
		if (toks.length !== 1 || !only) {
			this.report(rhs, `pasting formed '${text}', an invalid preprocessing token`, MI_DIAGCODES.MACRO_ARGUMENTS);
			return [lhs, rhs];
		}
		const end = lhs.file === rhs.file && rhs.span.end >= lhs.span.start ? rhs.span.end : lhs.span.end;
		const pasted: Token = { kind: only.kind, value: only.value, span: { start: lhs.span.start, end }, file: lhs.file };
		if (lhs.spaceBefore) pasted.spaceBefore = true;
		if (lhs.hide) pasted.hide = lhs.hide;
		return [pasted];
	}

	private report(t: Token, message: string, code: DiagCode, severity: Severity = 'error') {
		this.diagnostics.push({ span: { start: t.span.start, end: t.span.end }, file: t.file, message, severity, code });
	}
}

const BUILTIN_MACROS: ReadonlySet<string> = new Set(['__FILE__', '__LINE__', '__COUNTER__', '__INCLUDE_LEVEL__']);

function sameDefinition(a: MacroDef, b: MacroDef): boolean {
	if (a.variadic !== b.variadic) return false;
	if ((a.params ?? []).join(',') !== (b.params ?? []).join(',') || (a.params === null) !== (b.params === null)) return false;
	if (a.body.length !== b.body.length) return false;
	return a.body.every((t, i) => t.value === b.body[i]?.value && (i === 0 || !!t.spaceBefore === !!b.body[i]?.spaceBefore));
}

function stringify(arg: readonly Token[], hash: Token, end: number): Token {
	let s = '';
	arg.forEach((t, k) => {
		if (k > 0 && t.spaceBefore) s += ' ';
		s += t.kind === 'string' || t.kind === 'char' ? t.value.replace(/[\\"]/g, m => '\\' + m) : t.value;
	});
	return { kind: 'string', value: `"${s}"`, span: { start: hash.span.start, end }, file: hash.file };
}

function withName(hide: ReadonlySet<string> | undefined, name: string): ReadonlySet<string> {
	const s = new Set(hide ?? []);
	s.add(name);
	return s;
}

function intersect(a: ReadonlySet<string> | undefined, b: ReadonlySet<string> | undefined): ReadonlySet<string> | undefined {
	if (!a || !b) return undefined;
	const s = new Set<string>();
	for (const v of a) if (b.has(v)) s.add(v);
	return s;
}

function union(a: ReadonlySet<string> | undefined, b: ReadonlySet<string>): ReadonlySet<string> {
	if (!a || !a.size) return b;
	const s = new Set(a);
	for (const v of b) s.add(v);
	return s;
}

// --- #if expression evaluation ---

export type IfExprResult = { ok: true; value: bigint } | { ok: false; message: string; at: number };

function binaryPrec(op: string): number {
	switch (op) {
		case '||': return 1;
		case '&&': return 2;
		case '|': return 3;
		case '^': return 4;
		case '&': return 5;
		case '==': case '!=': return 6;
		case '<': case '>': case '<=': case '>=': return 7;
		case '<<': case '>>': return 8;
		case '+': case '-': return 9;
		case '*': case '/': case '%': return 10;
		default: return 0;
	}
}

class IfExprError extends Error {
	constructor(message: string, readonly at: number) { super(message); }
}

// Evaluates a fully macro-expanded `#if` expression with 64-bit signed arithmetic.
// Identifiers that survive expansion evaluate to 0.
export function evaluateIfExpression(toks: readonly Token[]): IfExprResult {
	let p = 0;
	const peek = () => toks[p];
	const fail = (message: string): never => { throw new IfExprError(message, Math.min(p, toks.length - 1)); };
	const wrap = (v: bigint) => BigInt.asIntN(64, v);

	function parsePrimary(): bigint {
		const t = toks[p];
		if (!t) return fail('expected value in expression');
		p++;
		if (t.kind === 'number') {
			const lit = parseIntegerLiteral(t.value);
			if (!lit) return fail(`invalid integer constant '${t.value}' in preprocessor expression`);
			return wrap(lit.value);
		}
		if (t.kind === 'char') {
			const v = parseCharLiteral(t.value);
			if (v === null) return fail(`invalid character constant ${t.value}`);
			return v;
		}
		if (isWordToken(t)) return t.value === 'true' ? 1n : 0n;
		if (isPunct(t, '(')) {
			const v = parseConditional();
			if (!isPunct(peek(), ')')) return fail('expected \')\' in preprocessor expression');
			p++;
			return v;
		}
		p--;
		return fail(`invalid token '${t.value}' at start of a preprocessor expression`);
	}

	function parseUnary(): bigint {
		const t = peek();
		if (t && t.kind === 'op' && ['!', '~', '+', '-'].includes(t.value)) {
			p++;
			const v = parseUnary();
			if (t.value === '!') return v === 0n ? 1n : 0n;
			if (t.value === '~') return wrap(~v);
			if (t.value === '-') return wrap(-v);
			return v;
		}
		return parsePrimary();
	}

	function apply(op: string, l: bigint, r: bigint): bigint {
		switch (op) {
			case '*': return wrap(l * r);
			case '/': if (r === 0n) fail('division by zero in preprocessor expression'); return wrap(l / r);
			case '%': if (r === 0n) fail('remainder by zero in preprocessor expression'); return wrap(l % r);
			case '+': return wrap(l + r);
			case '-': return wrap(l - r);
			case '<<': return wrap(l << r);
			case '>>': return l >> r;
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
			default: return fail(`unsupported operator '${op}'`);
		}
	}

	function parseBinary(minPrec: number): bigint {
		let left = parseUnary();
		for (;;) {
			const look = peek();
			if (!look || look.kind !== 'op') break;
			const prec = binaryPrec(look.value);
			if (prec === 0 || prec < minPrec) break;
			p++;
			const right = parseBinary(prec + 1);
			left = apply(look.value, left, right);
		}
		return left;
	}

	function parseConditional(): bigint {
		const cond = parseBinary(1);
		if (!isPunct(peek(), '?')) return cond;
		p++;
		const a = parseConditional();
		if (!isPunct(peek(), ':')) return fail('expected \':\' in conditional expression');
		p++;
		const b = parseConditional();
		return cond !== 0n ? a : b;
	}

	try {
		if (!toks.length) return { ok: false, message: 'expected value in expression', at: 0 };
		const value = parseConditional();
		if (p < toks.length) return { ok: false, message: `token is not a valid binary operator in a preprocessor subexpression`, at: p };
		return { ok: true, value };
	} catch (e: unknown) {
		if (e instanceof IfExprError) return { ok: false, message: e.message, at: e.at };
		throw e;
	}
}
