import { type Token, isPunct } from '../core/tokens';
import type { SourceManager, SourceLocation } from '../core/source';
import { isFloatingLiteral, parseCharLiteral, parseFloatLiteral, parseIntegerLiteral, stringLiteralContent } from '../core/literals';
import { type Diagnostic, type DiagCode, type Severity, MI_DIAGCODES } from '../diagCodes';
import {
	type BinaryOp, type BuiltinKind, type CType, type CompoundLiteralExpr, type Designator, type EnumDecl, type Expr,
	type InitElement, type InitListExpr, type RecordDecl, type TokenRange, type TranslationUnit, type TypedefDecl,
	type UnaryOp, type VarDecl, QUAL_CONST, QUAL_RESTRICT, QUAL_VOLATILE, rangeFrom,
} from './index';
import { arrayOf, builtin, canonical, pointerTo, withQuals } from './ctypes';
import { evalIntegerConstant } from './constEval';
import { bindInitList } from './initializers';

type Storage = 'typedef' | 'extern' | 'static' | 'auto' | 'register' | 'thread';

type Specifiers = {
	// null for `__auto_type`, deduced from the initializer
	type: CType | null;
	quals: number;
	storage: Storage | null;
};

type Declarator = {
	name: Token | null;
	// no pointer, array or function part
	plain: boolean;
	apply: (base: CType) => CType;
};

type Suffix =
	| { kind: 'array'; size: number | null }
	| { kind: 'function'; params: CType[]; variadic: boolean; prototyped: boolean };

type Counter = 'void' | 'bool' | 'char' | 'short' | 'int' | 'long' | 'float' | 'double' | 'signed' | 'unsigned' | 'int128' | 'complex';
type Counts = Record<Counter, number>;

const BASE_WORDS = new Map<string, Counter>([
	['void', 'void'], ['_Bool', 'bool'], ['char', 'char'], ['short', 'short'], ['int', 'int'], ['long', 'long'],
	['float', 'float'], ['double', 'double'], ['signed', 'signed'], ['__signed__', 'signed'], ['unsigned', 'unsigned'],
	['_Complex', 'complex'],
]);

const STORAGE = new Map<string, Storage>([
	['typedef', 'typedef'], ['extern', 'extern'], ['static', 'static'], ['auto', 'auto'], ['register', 'register'],
	['_Thread_local', 'thread'],
]);

const TYPE_START = new Set([
	'void', 'char', 'short', 'int', 'long', 'float', 'double', 'signed', 'unsigned', '_Bool', '_Complex',
	'struct', 'union', 'enum', 'const', 'volatile', 'restrict', '_Atomic', '__auto_type', 'typeof', '__typeof__',
	'__const', '__restrict', '__restrict__', '__volatile__', '__signed__', '__attribute__', '__attribute', '_Alignas',
]);

const DECL_START = new Set([
	...TYPE_START,
	'typedef', 'extern', 'static', 'auto', 'register', '_Thread_local', 'inline', '__inline', '__inline__',
	'_Noreturn', '__extension__', '__declspec',
]);

const ASSIGN_OPS = new Set(['=', '*=', '/=', '%=', '+=', '-=', '<<=', '>>=', '&=', '^=', '|=']);
const UNARY_OPS = new Set(['&', '*', '+', '-', '~', '!']);

// Lowest binding first; `?:` and assignment are handled outside
function prec(op: string): number {
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

function isBinaryOp(op: string): op is BinaryOp {
	return prec(op) > 0 || ASSIGN_OPS.has(op) || op === ',';
}

function isUnaryOp(op: string): op is UnaryOp {
	return UNARY_OPS.has(op) || op === '++' || op === '--';
}

// Parses the declarations of a preprocessed translation unit. Function bodies are
// skipped; every file-scope variable keeps its initializer, bound to its type.
export function parseTranslationUnit(tokens: Token[], sources: SourceManager): TranslationUnit {
	return new Parser(tokens, sources).parse();
}

export class Parser {
	private pos = 0;
	private errors = 0;
	private externBlocks = 0;
	private readonly diagnostics: Diagnostic[] = [];
	private readonly typedefs = new Map<string, TypedefDecl>();
	private readonly tags = new Map<string, RecordDecl | EnumDecl>();
	private readonly constants = new Map<string, bigint>();
	private readonly functions = new Set<string>();
	private readonly vars = new Map<string, VarDecl>();
	private readonly records: RecordDecl[] = [];
	private readonly enums: EnumDecl[] = [];
	private readonly eofToken: Token;

	constructor(private readonly toks: Token[], private readonly sources: SourceManager) {
		const last = toks[toks.length - 1];
		this.eofToken = last && last.kind === 'eof' ? last : { kind: 'eof', value: '', span: { start: 0, end: 0 }, file: '<unknown>' };
	}

	parse(): TranslationUnit {
		let guard = 0;
		while (this.peek().kind !== 'eof') {
			const before = this.pos;
			this.parseExternalDeclaration();
			// never stall on a token the declaration parser refused
			if (this.pos === before) this.next();
			if (++guard > 1_000_000) break;
		}
		return {
			tokens: this.toks,
			vars: this.vars,
			typedefs: this.typedefs,
			records: this.records,
			enums: this.enums,
			diagnostics: this.diagnostics,
		};
	}

	// --- token cursor ---

	private peek(k = 0): Token { return this.toks[this.pos + k] ?? this.eofToken; }

	private next(): Token {
		const t = this.peek();
		if (t.kind !== 'eof') this.pos++;
		return t;
	}

	private is(value: string, k = 0): boolean {
		const t = this.peek(k);
		return (isPunct(t, value) || t.kind === 'keyword') && t.value === value;
	}

	private maybe(value: string): Token | null {
		return this.is(value) ? this.next() : null;
	}

	// Missing tokens are reported and treated as present.
	private eat(value: string): Token {
		const t = this.maybe(value);
		if (t) return t;
		const at = this.peek();
		this.report(at, `expected '${value}'`);
		return { kind: 'punct', value, span: { start: at.span.start, end: at.span.start }, file: at.file };
	}

	private isId(k = 0): boolean { return this.peek(k).kind === 'id'; }

	private report(at: Token | TokenRange, message: string, code: DiagCode = MI_DIAGCODES.SYNTAX, severity: Severity = 'error') {
		let file: string;
		let span: { start: number; end: number };
		if ('kind' in at) {
			file = at.file;
			span = { ...at.span };
		} else {
			const first = this.toks[at.start] ?? this.eofToken;
			const last = this.toks[Math.max(at.start, at.end - 1)] ?? first;
			file = first.file;
			span = { start: first.span.start, end: last.file === first.file && last.span.end >= first.span.start ? last.span.end : first.span.end };
		}
		if (severity === 'error') this.errors++;
		this.diagnostics.push({ span, file, message, severity, code });
	}

	private locate(t: Token): SourceLocation {
		return this.sources.locate(t.file, t.span.start);
	}

	// Consumes a balanced group starting at the opener under the cursor.
	private skipBalanced() {
		let depth = 0;
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof') { this.report(t, 'unbalanced brackets at end of input'); return; }
			this.next();
			if (isPunct(t, '(') || isPunct(t, '[') || isPunct(t, '{')) depth++;
			else if (isPunct(t, ')') || isPunct(t, ']') || isPunct(t, '}')) {
				depth--;
				if (depth <= 0) return;
			}
		}
	}

	private skipAttributes() {
		for (;;) {
			const t = this.peek();
			const attr = t.kind === 'keyword' && (t.value === '__attribute__' || t.value === '__attribute' || t.value === '__declspec');
			const asm = t.kind === 'id' && (t.value === '__asm__' || t.value === '__asm' || t.value === 'asm');
			if (!attr && !asm) return;
			this.next();
			if (this.is('(')) this.skipBalanced();
		}
	}

	// Skip to the end of a broken declaration: past `;` at depth 0, or before a `}` closing an outer block.
	private syncTopLevel() {
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof') return;
			if (isPunct(t, ';')) { this.next(); return; }
			if (isPunct(t, '}')) return;
			if (isPunct(t, '(') || isPunct(t, '[') || isPunct(t, '{')) { this.skipBalanced(); continue; }
			this.next();
		}
	}

	private isTypedefName(k = 0): boolean {
		const t = this.peek(k);
		return t.kind === 'id' && (this.typedefs.has(t.value) || t.value === '__int128');
	}

	private startsTypeName(k = 0): boolean {
		const t = this.peek(k);
		if (t.kind === 'keyword') return TYPE_START.has(t.value);
		return this.isTypedefName(k);
	}

	private startsDeclaration(): boolean {
		const t = this.peek();
		if (t.kind === 'keyword') return DECL_START.has(t.value);
		return this.isTypedefName();
	}

	// --- declarations ---

	private parseExternalDeclaration() {
		const t = this.peek();
		if (isPunct(t, ';')) { this.next(); return; }
		if (isPunct(t, '}')) {
			this.next();
			if (this.externBlocks > 0) this.externBlocks--;
			else this.report(t, "extraneous closing brace ('}')");
			return;
		}
		if (t.kind === 'keyword' && t.value === '_Static_assert') {
			this.next();
			if (this.is('(')) this.skipBalanced();
			this.eat(';');
			return;
		}
		if (t.kind === 'keyword' && t.value === 'extern' && this.peek(1).kind === 'string') {
			this.next();
			this.next();
			if (this.maybe('{')) this.externBlocks++;
			return;
		}
		if (t.kind === 'id' && (t.value === '__asm__' || t.value === 'asm')) {
			this.skipAttributes();
			this.eat(';');
			return;
		}
		const start = this.pos;
		if (!this.startsDeclaration()) {
			if (t.kind === 'id' && (this.isId(1) || this.is('*', 1))) {
				this.report(t, `unknown type name '${t.value}'`, MI_DIAGCODES.UNKNOWN_TYPE);
			} else {
				this.report(t, 'expected external declaration');
			}
			this.syncTopLevel();
			return;
		}
		const specs = this.parseDeclSpecifiers();
		if (this.maybe(';')) return;
		for (;;) {
			const errorsBefore = this.errors;
			const d = this.parseDeclarator('named');
			this.skipAttributes();
			const nameTok = d.name;
			if (!nameTok) { this.syncTopLevel(); return; }
			const name = nameTok.value;
			const type = specs.type ? d.apply(specs.type) : null;
			if (type && canonical(type).kind === 'function' && specs.storage !== 'typedef') {
				this.functions.add(name);
				if (this.is('{')) { this.skipBalanced(); return; }
			} else if (specs.storage === 'typedef') {
				this.declareTypedef(nameTok, type ?? builtin('int'), specs, d);
			} else {
				const decl = this.parseVarRest(start, nameTok, specs, d);
				this.vars.set(name, decl);
				if (!this.maybe(',')) { this.eat(';'); decl.errorCount = this.errors - errorsBefore; return; }
				decl.errorCount = this.errors - errorsBefore;
				continue;
			}
			if (this.maybe(',')) continue;
			if (!this.maybe(';')) { this.report(this.peek(), "expected ';' after top level declarator"); this.syncTopLevel(); }
			return;
		}
	}

	private declareTypedef(nameTok: Token, type: CType, specs: Specifiers, d: Declarator) {
		const decl: TypedefDecl = { kind: 'typedef', name: nameTok.value, type, location: this.locate(nameTok) };
		this.typedefs.set(decl.name, decl);
		// `typedef struct { ... } Name;` names the anonymous record
		const base = specs.type;
		if (d.plain && base && (base.kind === 'record' || base.kind === 'enum')) {
			const tagDecl = base.decl;
			if (tagDecl.tag === null && tagDecl.typedefName === null && (tagDecl.kind === 'enum' || tagDecl.owner === null)) {
				tagDecl.typedefName = decl.name;
			}
		}
	}

	private parseVarRest(start: number, nameTok: Token, specs: Specifiers, d: Declarator): VarDecl {
		let init: Expr | null = null;
		if (this.maybe('=')) init = this.is('{') ? this.parseInitList() : this.parseAssignment();
		let type: CType;
		if (specs.type) {
			type = d.apply(specs.type);
		} else if (!init) {
			this.report(nameTok, `declaration of variable '${nameTok.value}' with deduced type '__auto_type' requires an initializer`);
			type = builtin('int');
		} else if (init.kind === 'InitList') {
			this.report(init.range, "cannot use '__auto_type' with initializer list");
			type = builtin('int');
		} else {
			type = d.apply(withQuals(this.typeOfExpr(init), specs.quals));
		}
		if (init && init.kind === 'InitList') type = this.bindList(init, type);
		return {
			kind: 'var',
			name: nameTok.value,
			type,
			init,
			range: rangeFrom(start, this.pos),
			errorCount: 0,
			location: this.locate(nameTok),
		};
	}

	// Binds a brace list; an array of unknown size takes its size from the list.
	private bindList(list: InitListExpr, type: CType): CType {
		bindInitList(list, type, (range, message, code, severity) => this.report(range, message, code, severity));
		const c = canonical(type);
		if (c.kind === 'array' && c.size === null && list.inits) {
			const sized = arrayOf(c.element, list.inits.length);
			list.type = sized;
			return sized;
		}
		return type;
	}

	private typeOfExpr(e: Expr): CType {
		switch (e.kind) {
			case 'CompoundLiteral': case 'Cast': return e.type;
			case 'Paren': return this.typeOfExpr(e.inner);
			case 'IntegerLiteral': return builtin(e.unsigned ? 'unsigned int' : 'int');
			case 'FloatLiteral': return builtin(e.precision);
			case 'CharLiteral': return builtin('int');
			case 'StringLiteral': return pointerTo(builtin('char'));
			case 'Identifier': {
				const v = this.vars.get(e.name);
				return v ? v.type : builtin('int');
			}
			default: return builtin('int');
		}
	}

	private parseDeclSpecifiers(): Specifiers {
		let quals = 0;
		let storage: Storage | null = null;
		let named: CType | null = null;
		let autoType = false;
		const n: Counts = { void: 0, bool: 0, char: 0, short: 0, int: 0, long: 0, float: 0, double: 0, signed: 0, unsigned: 0, int128: 0, complex: 0 };
		let any = false;
		const first = this.peek();
		for (;;) {
			const t = this.peek();
			if (t.kind === 'id') {
				if (t.value === '__int128') { this.next(); n.int128++; any = true; continue; }
				const td = this.typedefs.get(t.value);
				const hasBase = named !== null || autoType || Object.values(n).some(v => v > 0);
				if (td && !hasBase) { this.next(); named = { kind: 'typedef', decl: td, quals: 0 }; any = true; continue; }
				break;
			}
			if (t.kind !== 'keyword') break;
			const st = STORAGE.get(t.value);
			if (st) { storage = st; this.next(); any = true; continue; }
			const counter = BASE_WORDS.get(t.value);
			if (counter) { n[counter]++; this.next(); any = true; continue; }
			let consumed = true;
			switch (t.value) {
				case 'inline': case '__inline': case '__inline__': case '_Noreturn': case '__extension__':
					this.next(); break;
				case 'const': case '__const': quals |= QUAL_CONST; this.next(); break;
				case 'volatile': case '__volatile__': quals |= QUAL_VOLATILE; this.next(); break;
				case 'restrict': case '__restrict': case '__restrict__': quals |= QUAL_RESTRICT; this.next(); break;
				case '_Atomic':
					this.next();
					if (this.is('(')) { this.next(); named = this.parseTypeName(); this.eat(')'); }
					break;
				case 'struct': case 'union': named = this.parseRecordSpecifier(); break;
				case 'enum': named = this.parseEnumSpecifier(); break;
				case '__auto_type': autoType = true; this.next(); break;
				case 'typeof': case '__typeof__': named = this.parseTypeof(); break;
				case '__attribute__': case '__attribute': case '__declspec': this.skipAttributes(); break;
				case '_Alignas':
					this.next();
					if (this.is('(')) this.skipBalanced();
					break;
				default: consumed = false;
			}
			if (!consumed) break;
			any = true;
		}
		if (!any) {
			this.report(first, 'expected declaration specifiers');
			return { type: builtin('int'), quals, storage };
		}
		if (autoType) return { type: null, quals, storage };
		const counted = Object.values(n).some(v => v > 0);
		if (named) {
			if (counted) this.report(first, 'cannot combine with previous declaration specifier', MI_DIAGCODES.INVALID_TYPE_SPECIFIERS);
			return { type: withQuals(named, quals), quals, storage };
		}
		if (!counted) {
			this.report(first, "type specifier missing, defaults to 'int'", MI_DIAGCODES.INVALID_TYPE_SPECIFIERS);
			return { type: builtin('int', quals), quals, storage };
		}
		return { type: builtin(this.builtinKind(n, first), quals), quals, storage };
	}

	private builtinKind(n: Counts, at: Token): BuiltinKind {
		const invalid = () => this.report(at, 'cannot combine with previous declaration specifier', MI_DIAGCODES.INVALID_TYPE_SPECIFIERS);
		const sign = n.signed + n.unsigned;
		const bases = n.void + n.bool + n.char + n.float + n.double + n.int128;
		if (bases > 1 || sign > 1 || n.long > 2 || (n.short && n.long)) invalid();
		if (n.void) { if (sign || n.short || n.long || n.int) invalid(); return 'void'; }
		if (n.bool) { if (sign || n.short || n.long || n.int) invalid(); return '_Bool'; }
		if (n.float || n.double) {
			if (sign || n.short || n.int) invalid();
			if (n.float) { if (n.long) invalid(); return 'float'; }
			if (n.long > 1) invalid();
			return n.long ? 'long double' : 'double';
		}
		if (n.char) {
			if (n.short || n.long || n.int) invalid();
			return n.signed ? 'signed char' : n.unsigned ? 'unsigned char' : 'char';
		}
		if (n.int128) return n.unsigned ? 'unsigned __int128' : '__int128';
		if (n.short) return n.unsigned ? 'unsigned short' : 'short';
		if (n.long >= 2) return n.unsigned ? 'unsigned long long' : 'long long';
		if (n.long === 1) return n.unsigned ? 'unsigned long' : 'long';
		return n.unsigned ? 'unsigned int' : 'int';
	}

	private parseTypeof(): CType {
		this.next();
		this.eat('(');
		let t: CType;
		if (this.startsTypeName()) t = this.parseTypeName();
		else t = this.typeOfExpr(this.parseExpression());
		this.eat(')');
		return t;
	}

	private parseRecordSpecifier(): CType {
		const kw = this.next();
		const tagKind = kw.value === 'union' ? 'union' : 'struct';
		this.skipAttributes();
		const tagTok = this.isId() ? this.next() : null;
		let decl: RecordDecl;
		if (this.is('{')) {
			const existing = tagTok ? this.tags.get(tagTok.value) : undefined;
			if (existing && existing.kind === 'record' && existing.tagKind === tagKind && existing.fields === null) {
				decl = existing;
			} else {
				if (existing && tagTok) {
					if (existing.kind !== 'record' || existing.tagKind !== tagKind) {
						this.report(tagTok, `use of '${tagTok.value}' with tag type that does not match previous declaration`, MI_DIAGCODES.REDEFINITION);
					} else {
						this.report(tagTok, `redefinition of '${tagTok.value}'`, MI_DIAGCODES.REDEFINITION);
					}
				}
				decl = { kind: 'record', tagKind, tag: tagTok ? tagTok.value : null, typedefName: null, owner: null, fields: null, location: this.locate(kw) };
				this.records.push(decl);
				if (tagTok) this.tags.set(tagTok.value, decl);
			}
			decl.fields = this.parseFields(decl);
		} else {
			if (!tagTok) {
				this.report(kw, `declaration of anonymous ${tagKind} must be a definition`);
				return builtin('int');
			}
			const existing = this.tags.get(tagTok.value);
			if (existing && existing.kind === 'record' && existing.tagKind === tagKind) {
				decl = existing;
			} else {
				if (existing) this.report(tagTok, `use of '${tagTok.value}' with tag type that does not match previous declaration`, MI_DIAGCODES.REDEFINITION);
				decl = { kind: 'record', tagKind, tag: tagTok.value, typedefName: null, owner: null, fields: null, location: this.locate(kw) };
				this.records.push(decl);
				this.tags.set(tagTok.value, decl);
			}
		}
		this.skipAttributes();
		return { kind: 'record', decl, quals: 0 };
	}

	private parseFields(owner: RecordDecl) {
		this.eat('{');
		const fields: NonNullable<RecordDecl['fields']> = [];
		while (!this.is('}') && this.peek().kind !== 'eof') {
			if (this.maybe(';')) continue;
			if (this.is('_Static_assert')) {
				this.next();
				if (this.is('(')) this.skipBalanced();
				this.eat(';');
				continue;
			}
			const startTok = this.peek();
			if (!this.startsTypeName() && !this.is('__extension__')) {
				this.report(startTok, startTok.kind === 'id' ? `unknown type name '${startTok.value}'` : 'expected member declaration',
					startTok.kind === 'id' ? MI_DIAGCODES.UNKNOWN_TYPE : MI_DIAGCODES.SYNTAX);
				this.syncMember();
				continue;
			}
			const specs = this.parseDeclSpecifiers();
			const base = specs.type ?? builtin('int');
			if (this.is(';')) {
				// C11 anonymous struct/union member
				if (base.kind === 'record' && base.decl.tag === null) {
					fields.push({ name: null, type: base, bitWidth: null, location: base.decl.location });
				}
				this.next();
				continue;
			}
			let firstDeclarator = true;
			for (;;) {
				if (this.is(':')) {
					this.next();
					fields.push({ name: null, type: base, bitWidth: this.parseBitWidth(), location: this.locate(startTok) });
				} else {
					const d = this.parseDeclarator('named');
					const nameTok = d.name;
					if (!nameTok) { this.syncMember(); break; }
					const bitWidth = this.maybe(':') ? this.parseBitWidth() : null;
					if (firstDeclarator && base.kind === 'record' && base.decl.tag === null && base.decl.owner === null) {
						base.decl.owner = { record: owner, field: nameTok.value };
					}
					if (fields.some(f => f.name === nameTok.value)) this.report(nameTok, `duplicate member '${nameTok.value}'`, MI_DIAGCODES.REDEFINITION);
					fields.push({ name: nameTok.value, type: d.apply(base), bitWidth, location: this.locate(nameTok) });
				}
				firstDeclarator = false;
				this.skipAttributes();
				if (!this.maybe(',')) break;
			}
			this.eat(';');
		}
		this.eat('}');
		return fields;
	}

	private syncMember() {
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof' || isPunct(t, '}')) return;
			if (isPunct(t, ';')) { this.next(); return; }
			if (isPunct(t, '(') || isPunct(t, '[') || isPunct(t, '{')) { this.skipBalanced(); continue; }
			this.next();
		}
	}

	private parseBitWidth(): number {
		const e = this.parseConditional();
		const v = evalIntegerConstant(e);
		if (v === null) {
			this.report(e.range, 'bit-field width is not an integer constant expression', MI_DIAGCODES.NOT_CONSTANT);
			return 0;
		}
		return Number(v);
	}

	private parseEnumSpecifier(): CType {
		const kw = this.next();
		this.skipAttributes();
		const tagTok = this.isId() ? this.next() : null;
		// fixed underlying type
		if (this.is(':')) { this.next(); this.parseTypeName(); }
		let decl: EnumDecl;
		const existing = tagTok ? this.tags.get(tagTok.value) : undefined;
		if (this.is('{')) {
			if (existing && existing.kind === 'enum' && existing.constants === null) {
				decl = existing;
			} else {
				if (existing && tagTok) this.report(tagTok, `redefinition of '${tagTok.value}'`, MI_DIAGCODES.REDEFINITION);
				decl = { kind: 'enum', tag: tagTok ? tagTok.value : null, typedefName: null, constants: null, location: this.locate(kw) };
				this.enums.push(decl);
				if (tagTok) this.tags.set(tagTok.value, decl);
			}
			decl.constants = this.parseEnumerators();
		} else {
			if (!tagTok) {
				this.report(kw, 'declaration of anonymous enum must be a definition');
				return builtin('int');
			}
			if (existing && existing.kind === 'enum') {
				decl = existing;
			} else {
				if (existing) this.report(tagTok, `use of '${tagTok.value}' with tag type that does not match previous declaration`, MI_DIAGCODES.REDEFINITION);
				decl = { kind: 'enum', tag: tagTok.value, typedefName: null, constants: null, location: this.locate(kw) };
				this.enums.push(decl);
				this.tags.set(tagTok.value, decl);
			}
		}
		this.skipAttributes();
		return { kind: 'enum', decl, quals: 0 };
	}

	private parseEnumerators() {
		this.eat('{');
		const constants: { name: string; value: bigint }[] = [];
		let value = 0n;
		while (!this.is('}') && this.peek().kind !== 'eof') {
			const nameTok = this.peek();
			if (nameTok.kind !== 'id') { this.report(nameTok, 'expected identifier'); this.syncMember(); break; }
			this.next();
			this.skipAttributes();
			if (this.maybe('=')) {
				const e = this.parseConditional();
				const v = evalIntegerConstant(e);
				if (v === null) this.report(e.range, 'expression is not an integer constant expression', MI_DIAGCODES.NOT_CONSTANT);
				else value = v;
			}
			if (this.constants.has(nameTok.value)) this.report(nameTok, `redefinition of enumerator '${nameTok.value}'`, MI_DIAGCODES.REDEFINITION);
			constants.push({ name: nameTok.value, value });
			this.constants.set(nameTok.value, value);
			value++;
			if (!this.maybe(',')) break;
		}
		this.eat('}');
		return constants;
	}

	// `(` opens a nested declarator rather than a parameter list
	private nestedDeclaratorAhead(): boolean {
		if (!this.is('(')) return false;
		const t = this.peek(1);
		if (isPunct(t, '*') || isPunct(t, '(') || isPunct(t, '[') || isPunct(t, '^')) return true;
		if (t.kind === 'keyword' && (t.value === '__attribute__' || t.value === '__attribute')) return true;
		return t.kind === 'id' && !this.typedefs.has(t.value);
	}

	private parseDeclarator(mode: 'named' | 'abstract' | 'either'): Declarator {
		const pointers: number[] = [];
		while (this.maybe('*')) {
			let q = 0;
			for (;;) {
				if (this.is('const') || this.is('__const')) q |= QUAL_CONST;
				else if (this.is('volatile') || this.is('__volatile__')) q |= QUAL_VOLATILE;
				else if (this.is('restrict') || this.is('__restrict') || this.is('__restrict__')) q |= QUAL_RESTRICT;
				else if (this.is('_Atomic')) { /* no distinct representation */ }
				else if (this.is('__attribute__') || this.is('__attribute')) { this.skipAttributes(); continue; }
				else break;
				this.next();
			}
			pointers.push(q);
		}
		this.skipAttributes();
		let inner: Declarator | null = null;
		let name: Token | null = null;
		if (this.nestedDeclaratorAhead()) {
			this.next();
			inner = this.parseDeclarator(mode);
			this.eat(')');
		} else if (mode !== 'abstract' && this.isId()) {
			name = this.next();
		} else if (mode === 'named') {
			this.report(this.peek(), 'expected identifier or \'(\'');
		}
		const suffixes: Suffix[] = [];
		for (;;) {
			if (this.maybe('[')) {
				while (this.is('static') || this.is('const') || this.is('volatile') || this.is('restrict')) this.next();
				let size: number | null = null;
				if (this.is('*') && this.is(']', 1)) this.next();
				else if (!this.is(']')) {
					const e = this.parseAssignment();
					const v = evalIntegerConstant(e);
					if (v === null) this.report(e.range, 'array size is not an integer constant expression', MI_DIAGCODES.NOT_CONSTANT);
					else if (v < 0n) this.report(e.range, 'array has negative size', MI_DIAGCODES.NOT_CONSTANT);
					else size = Number(v);
				}
				this.eat(']');
				suffixes.push({ kind: 'array', size });
				continue;
			}
			if (this.is('(')) {
				this.next();
				suffixes.push({ kind: 'function', ...this.parseParamList() });
				continue;
			}
			break;
		}
		const plain = pointers.length === 0 && suffixes.length === 0 && (!inner || inner.plain);
		const apply = (base: CType): CType => {
			let t = base;
			for (const q of pointers) t = pointerTo(t, q);
			for (let i = suffixes.length - 1; i >= 0; i--) {
				const s = suffixes[i];
				if (!s) continue;
				t = s.kind === 'array' ? arrayOf(t, s.size) : { kind: 'function', result: t, params: s.params, variadic: s.variadic, prototyped: s.prototyped, quals: 0 };
			}
			return inner ? inner.apply(t) : t;
		};
		return { name: inner ? inner.name : name, plain, apply };
	}

	private parseParamList(): { params: CType[]; variadic: boolean; prototyped: boolean } {
		if (this.maybe(')')) return { params: [], variadic: false, prototyped: false };
		if (this.is('void') && this.is(')', 1)) { this.next(); this.next(); return { params: [], variadic: false, prototyped: true }; }
		const params: CType[] = [];
		let variadic = false;
		for (;;) {
			if (this.maybe('...')) { variadic = true; break; }
			if (!this.startsTypeName() && !this.is('register')) {
				// identifier list of an old-style definition
				if (this.isId()) { this.next(); params.push(builtin('int')); if (this.maybe(',')) continue; break; }
				this.report(this.peek(), 'expected parameter declarator');
				while (!this.is(')') && this.peek().kind !== 'eof') {
					if (this.is('(') || this.is('[') || this.is('{')) this.skipBalanced(); else this.next();
				}
				break;
			}
			const specs = this.parseDeclSpecifiers();
			const d = this.parseDeclarator('either');
			this.skipAttributes();
			params.push(adjustParam(d.apply(specs.type ?? builtin('int'))));
			if (!this.maybe(',')) break;
		}
		this.eat(')');
		return { params, variadic, prototyped: true };
	}

	private parseTypeName(): CType {
		const specs = this.parseDeclSpecifiers();
		if (specs.storage) this.report(this.peek(), 'type name does not allow storage class to be specified');
		const d = this.parseDeclarator('abstract');
		return d.apply(specs.type ?? builtin('int'));
	}

	// --- expressions ---

	private parseExpression(): Expr {
		const start = this.pos;
		let left = this.parseAssignment();
		while (this.is(',')) {
			this.next();
			const right = this.parseAssignment();
			left = { kind: 'Binary', range: rangeFrom(start, this.pos), op: ',', left, right };
		}
		return left;
	}

	private parseAssignment(): Expr {
		const start = this.pos;
		const left = this.parseConditional();
		const t = this.peek();
		if (t.kind === 'op' && ASSIGN_OPS.has(t.value) && isBinaryOp(t.value)) {
			const op = t.value;
			this.next();
			const right = this.parseAssignment();
			return { kind: 'Binary', range: rangeFrom(start, this.pos), op, left, right };
		}
		return left;
	}

	private parseConditional(): Expr {
		const start = this.pos;
		const cond = this.parseBinary(1);
		if (!this.maybe('?')) return cond;
		// GNU `a ?: b`
		const then = this.is(':') ? cond : this.parseExpression();
		this.eat(':');
		const otherwise = this.parseConditional();
		return { kind: 'Conditional', range: rangeFrom(start, this.pos), cond, then, otherwise };
	}

	private parseBinary(minPrec: number): Expr {
		const start = this.pos;
		let left = this.parseCast();
		for (;;) {
			const t = this.peek();
			if (t.kind !== 'op') break;
			const p = prec(t.value);
			if (p === 0 || p < minPrec) break;
			const op = t.value;
			if (!isBinaryOp(op)) break;
			this.next();
			const right = this.parseBinary(p + 1);
			left = { kind: 'Binary', range: rangeFrom(start, this.pos), op, left, right };
		}
		return left;
	}

	private parseCast(): Expr {
		if (this.is('(') && this.startsTypeName(1)) {
			const start = this.pos;
			this.next();
			const type = this.parseTypeName();
			this.eat(')');
			if (this.is('{')) return this.parsePostfix(this.compoundLiteral(start, 'cast', type), start);
			const operand = this.parseCast();
			return { kind: 'Cast', range: rangeFrom(start, this.pos), type, operand };
		}
		return this.parseUnary();
	}

	private compoundLiteral(start: number, form: 'cast' | 'functional', written: CType): CompoundLiteralExpr {
		const init = this.parseInitList();
		const type = this.bindList(init, written);
		return { kind: 'CompoundLiteral', range: rangeFrom(start, this.pos), form, type, init };
	}

	private parseUnary(): Expr {
		const start = this.pos;
		const t = this.peek();
		if (t.kind === 'op' && (t.value === '++' || t.value === '--')) {
			const op = t.value;
			this.next();
			const operand = this.parseUnary();
			return { kind: 'Unary', range: rangeFrom(start, this.pos), op, operand, postfix: false };
		}
		if (t.kind === 'op' && UNARY_OPS.has(t.value) && isUnaryOp(t.value)) {
			const op = t.value;
			this.next();
			const operand = this.parseCast();
			return { kind: 'Unary', range: rangeFrom(start, this.pos), op, operand, postfix: false };
		}
		if (t.kind === 'keyword' && (t.value === 'sizeof' || t.value === '_Alignof')) {
			this.next();
			const keyword = t.value === 'sizeof' ? 'sizeof' : '_Alignof';
			if (this.is('(') && this.startsTypeName(1)) {
				const open = this.pos;
				this.next();
				const type = this.parseTypeName();
				this.eat(')');
				if (this.is('{')) {
					const operand = this.parsePostfix(this.compoundLiteral(open, 'cast', type), open);
					return { kind: 'SizeOf', range: rangeFrom(start, this.pos), keyword, operand };
				}
				return { kind: 'SizeOf', range: rangeFrom(start, this.pos), keyword, operand: type };
			}
			const operand = this.parseUnary();
			return { kind: 'SizeOf', range: rangeFrom(start, this.pos), keyword, operand };
		}
		if (t.kind === 'id' && (t.value === '__alignof__' || t.value === '__alignof')) {
			this.next();
			if (this.is('(') && this.startsTypeName(1)) {
				this.next();
				const type = this.parseTypeName();
				this.eat(')');
				return { kind: 'SizeOf', range: rangeFrom(start, this.pos), keyword: '_Alignof', operand: type };
			}
			const operand = this.parseUnary();
			return { kind: 'SizeOf', range: rangeFrom(start, this.pos), keyword: '_Alignof', operand };
		}
		if (t.kind === 'keyword' && t.value === '__extension__') {
			this.next();
			return this.parseCast();
		}
		return this.parsePostfix(this.parsePrimary(), start);
	}

	private parsePrimary(): Expr {
		const start = this.pos;
		const t = this.peek();
		switch (t.kind) {
			case 'number': {
				this.next();
				const range = rangeFrom(start, this.pos);
				if (isFloatingLiteral(t.value)) {
					const f = parseFloatLiteral(t.value);
					if (f) return { kind: 'FloatLiteral', range, value: f.value, precision: f.precision };
				} else {
					const i = parseIntegerLiteral(t.value);
					if (i) return { kind: 'IntegerLiteral', range, value: i.value, unsigned: i.unsigned };
				}
				this.report(t, `invalid numeric literal '${t.value}'`);
				return { kind: 'ErrorExpr', range };
			}
			case 'char': {
				this.next();
				const range = rangeFrom(start, this.pos);
				const v = parseCharLiteral(t.value);
				if (v === null) { this.report(t, 'empty character constant'); return { kind: 'ErrorExpr', range }; }
				return { kind: 'CharLiteral', range, value: v };
			}
			case 'string': {
				let content = '';
				while (this.peek().kind === 'string') content += stringLiteralContent(this.next().value);
				return { kind: 'StringLiteral', range: rangeFrom(start, this.pos), content };
			}
			case 'id': {
				const td = this.typedefs.get(t.value);
				if (td && this.is('{', 1)) {
					this.next();
					return this.compoundLiteral(start, 'functional', { kind: 'typedef', decl: td, quals: 0 });
				}
				this.next();
				const range = rangeFrom(start, this.pos);
				const constant = this.constants.get(t.value) ?? null;
				if (constant === null && !this.vars.has(t.value) && !this.functions.has(t.value) && !t.value.startsWith('__builtin_') && !isPunct(this.peek(), '(')) {
					this.report(t, `use of undeclared identifier '${t.value}'`);
				}
				return { kind: 'Identifier', range, name: t.value, constant };
			}
			case 'keyword':
				if (t.value === '_Generic') {
					this.next();
					if (this.is('(')) this.skipBalanced();
					return { kind: 'Opaque', range: rangeFrom(start, this.pos) };
				}
				break;
			default:
				if (isPunct(t, '(')) {
					// GNU statement expression
					if (this.is('{', 1)) {
						this.skipBalanced();
						return { kind: 'Opaque', range: rangeFrom(start, this.pos) };
					}
					this.next();
					const inner = this.parseExpression();
					this.eat(')');
					return { kind: 'Paren', range: rangeFrom(start, this.pos), inner };
				}
		}
		this.report(t, 'expected expression');
		if (!(isPunct(t, ';') || isPunct(t, ',') || isPunct(t, ')') || isPunct(t, '}') || isPunct(t, ']'))) this.next();
		return { kind: 'ErrorExpr', range: rangeFrom(start, this.pos) };
	}

	private parsePostfix(base: Expr, start: number): Expr {
		let e = base;
		for (;;) {
			if (this.maybe('[')) {
				const index = this.parseExpression();
				this.eat(']');
				e = { kind: 'Index', range: rangeFrom(start, this.pos), object: e, index };
				continue;
			}
			if (this.maybe('(')) {
				const args: Expr[] = [];
				if (!this.is(')')) {
					for (;;) {
						args.push(this.parseAssignment());
						if (!this.maybe(',')) break;
					}
				}
				this.eat(')');
				e = { kind: 'Call', range: rangeFrom(start, this.pos), callee: e, args };
				continue;
			}
			if (this.is('.') || this.is('->')) {
				const arrow = this.next().value === '->';
				const nameTok = this.peek();
				if (nameTok.kind === 'id') this.next(); else this.report(nameTok, 'expected identifier');
				e = { kind: 'Member', range: rangeFrom(start, this.pos), object: e, member: nameTok.value, arrow };
				continue;
			}
			if (this.is('++') || this.is('--')) {
				const op = this.next().value === '++' ? '++' : '--';
				e = { kind: 'Unary', range: rangeFrom(start, this.pos), op, operand: e, postfix: true };
				continue;
			}
			return e;
		}
	}

	private parseInitList(): InitListExpr {
		const start = this.pos;
		this.eat('{');
		const elements: InitElement[] = [];
		while (!this.is('}') && this.peek().kind !== 'eof') {
			const designators: Designator[] = [];
			let designated = false;
			for (;;) {
				const dStart = this.pos;
				if (this.is('.') && this.isId(1)) {
					this.next();
					const name = this.next().value;
					designators.push({ kind: 'field', name, range: rangeFrom(dStart, this.pos) });
					continue;
				}
				if (this.is('[')) {
					this.next();
					designated = true;
					const e = this.parseConditional();
					const v = evalIntegerConstant(e);
					// GNU range designator `[a ... b]`: the first index stands for the range
					if (this.maybe('...')) this.parseConditional();
					this.eat(']');
					if (v === null) {
						this.report(e.range, 'expression is not an integer constant expression', MI_DIAGCODES.NOT_CONSTANT);
						continue;
					}
					designators.push({ kind: 'index', index: v, range: rangeFrom(dStart, this.pos) });
					continue;
				}
				break;
			}
			if (designators.length || designated) {
				if (!this.maybe('=')) this.report(this.peek(), "expected '=' or another designator");
			} else if (this.isId() && this.is(':', 1)) {
				// old GNU `field: value`
				const dStart = this.pos;
				const name = this.next().value;
				this.next();
				designators.push({ kind: 'field', name, range: rangeFrom(dStart, this.pos) });
			}
			const value = this.is('{') ? this.parseInitList() : this.parseAssignment();
			elements.push({ designators, value });
			if (!this.maybe(',')) break;
		}
		this.eat('}');
		return { kind: 'InitList', range: rangeFrom(start, this.pos), elements, type: null, inits: null, unionField: null, synthetic: false };
	}
}

// Array and function parameters decay to pointers.
function adjustParam(t: CType): CType {
	if (t.kind === 'array') return pointerTo(t.element, t.quals);
	if (t.kind === 'function') return pointerTo(t);
	return t;
}
