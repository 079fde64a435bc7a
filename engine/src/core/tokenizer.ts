import { type Token, TokenStream } from './tokens';

export const C_KEYWORDS: ReadonlySet<string> = new Set([
	'auto', 'break', 'case', 'char', 'const', 'continue', 'default', 'do', 'double', 'else', 'enum',
	'extern', 'float', 'for', 'goto', 'if', 'inline', 'int', 'long', 'register', 'restrict', 'return',
	'short', 'signed', 'sizeof', 'static', 'struct', 'switch', 'typedef', 'union', 'unsigned', 'void',
	'volatile', 'while', '_Alignas', '_Alignof', '_Atomic', '_Bool', '_Complex', '_Generic',
	'_Imaginary', '_Noreturn', '_Static_assert', '_Thread_local',
	// GNU spellings accepted by common headers
	'__auto_type', '__attribute__', '__attribute', '__extension__', '__inline', '__inline__',
	'__restrict', '__restrict__', '__const', '__volatile__', '__signed__', '__declspec', '__typeof__', 'typeof',
]);

export function isKeyword(word: string): boolean {
	return C_KEYWORDS.has(word);
}

const THREE = new Set(['<<=', '>>=', '...']);
const TWO = new Set(['==', '!=', '<=', '>=', '&&', '||', '<<', '>>', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '++', '--', '->', '##']);
const SINGLE = new Set(['+', '-', '*', '/', '%', '!', '~', '<', '>', '=', '&', '|', '^', '.', '?', '#']);
const PUNCT = new Set([';', ',', '(', ')', '{', '}', '[', ']', ':']);
const LITERAL_PREFIXES = new Set(['L', 'u', 'U', 'u8']);

export type TokenizerOptions = {
	// scan only text[start, end); offsets stay absolute
	start?: number;
	end?: number;
	// recognise `#` at line start as a directive line (off when re-scanning a directive body)
	directives?: boolean;
};

// Standalone tokenizer: consumes whitespace and line continuations, emits
// comments and directives as tokens, but does NOT expand or evaluate macros.
export class Tokenizer {
	private i: number;
	private readonly n: number;
	private readonly text: string;
	private readonly file: string;
	private readonly directives: boolean;
	private readonly ts: TokenStream;
	private pendingSpace = false;

	constructor(text: string, file = '<unknown>', opts: TokenizerOptions = {}) {
		this.text = text;
		this.file = file;
		this.i = opts.start ?? 0;
		this.n = Math.min(opts.end ?? text.length, text.length);
		this.directives = opts.directives !== false;
		this.ts = new TokenStream(() => this.scanOne());
	}

	next(): Token { return this.ts.next(); }
	peek(): Token { return this.ts.peek(); }
	pushBack(t: Token) { this.ts.pushBack(t); }

	private scanOne(): Token {
		// skip whitespace and splice line continuations
		while (this.i < this.n) {
			const ch = this.text[this.i];
			if (ch === '\\') {
				let k = this.i + 1; while (k < this.n && (this.text[k] === ' ' || this.text[k] === '\t')) k++;
				if (this.text[k] === '\n') { this.i = k + 1; this.pendingSpace = true; continue; }
				if (this.text[k] === '\r' && this.text[k + 1] === '\n') { this.i = k + 2; this.pendingSpace = true; continue; }
			}
			if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v') { this.i++; this.pendingSpace = true; continue; }
			break;
		}
		if (this.i >= this.n) return this.mk('eof', '', this.n, this.n);

		const c = this.text[this.i];
		// preprocessor directive at start of line (allow indentation). Build the token value
		// while removing continuation backslashes and inserting a single '\n' per splice.
		if (c === '#' && this.directives && this.atLineStart(this.i)) {
			let j = this.i + 1;
			let segStart = this.i;
			let acc = '';
			while (j < this.n) {
				if (this.text[j] === '\\') {
					let k = j + 1; while (k < this.n && (this.text[k] === ' ' || this.text[k] === '\t')) k++;
					if (this.text[k] === '\n' || (this.text[k] === '\r' && this.text[k + 1] === '\n')) {
						acc += this.text.slice(segStart, j) + '\n';
						j = this.text[k] === '\n' ? k + 1 : k + 2;
						segStart = j;
						continue;
					}
				}
				// block comments may span lines inside a directive
				if (this.text[j] === '/' && this.text[j + 1] === '*') {
					const close = this.text.indexOf('*/', j + 2);
					j = close < 0 || close + 2 > this.n ? this.n : close + 2;
					continue;
				}
				if (this.text[j] === '/' && this.text[j + 1] === '/') { j = this.findLineEnd(j); break; }
				if (this.text[j] === '\n') break;
				j++;
			}
			acc += this.text.slice(segStart, j);
			const t = this.mk('directive', acc.replace(/\r$/, ''), this.i, j);
			this.i = j;
			return t;
		}

		// comments
		if (c === '/') {
			const d = this.text[this.i + 1];
			if (d === '/') {
				const s = this.i; const e = this.findLineEnd(this.i + 2);
				this.i = e;
				const t = this.mk('comment-line', this.text.slice(s, e), s, e);
				this.pendingSpace = true;
				return t;
			}
			if (d === '*') {
				const s = this.i; let j = this.i + 2;
				while (j < this.n && !(this.text[j] === '*' && this.text[j + 1] === '/')) j++;
				if (j < this.n) j += 2;
				this.i = j;
				const t = this.mk('comment-block', this.text.slice(s, j), s, j);
				this.pendingSpace = true;
				return t;
			}
		}

		// strings and character constants
		if (c === '"' || c === '\'') return this.scanQuoted(this.i, this.i);

		// numbers (pp-number: digits, letters, dots, signed exponents)
		if (/[0-9]/.test(c) || (c === '.' && /[0-9]/.test(this.text[this.i + 1] ?? ''))) {
			const s = this.i; let j = this.i + 1;
			while (j < this.n) {
				const ch = this.text[j];
				if ((ch === '+' || ch === '-') && /[eEpP]/.test(this.text[j - 1])) { j++; continue; }
				if (/[0-9A-Za-z_.]/.test(ch)) { j++; continue; }
				break;
			}
			this.i = j;
			return this.mk('number', this.text.slice(s, j), s, j);
		}

		// identifiers/keywords
		if (/[A-Za-z_$]/.test(c)) {
			const s = this.i; let j = this.i + 1;
			while (j < this.n && /[A-Za-z0-9_$]/.test(this.text[j])) j++;
			const word = this.text.slice(s, j);
			if (LITERAL_PREFIXES.has(word) && (this.text[j] === '"' || this.text[j] === '\'')) return this.scanQuoted(s, j);
			this.i = j;
			return this.mk(isKeyword(word) ? 'keyword' : 'id', word, s, j);
		}

		// operators and punctuation
		const three = this.text.slice(this.i, this.i + 3);
		if (THREE.has(three)) { const t = this.mk('op', three, this.i, this.i + 3); this.i += 3; return t; }
		const two = this.text.slice(this.i, this.i + 2);
		if (TWO.has(two)) { const t = this.mk('op', two, this.i, this.i + 2); this.i += 2; return t; }
		if (SINGLE.has(c)) { const t = this.mk('op', c, this.i, this.i + 1); this.i++; return t; }
		if (PUNCT.has(c)) { const t = this.mk('punct', c, this.i, this.i + 1); this.i++; return t; }

		// unknown char -> emit as punct to keep stream progressing
		const t = this.mk('punct', c, this.i, this.i + 1); this.i++; return t;
	}

	private scanQuoted(start: number, quoteAt: number): Token {
		const q = this.text[quoteAt];
		let j = quoteAt + 1;
		while (j < this.n) {
			const ch = this.text[j];
			if (ch === '\\') { j += 2; continue; }
			if (ch === '\n') break; // unterminated literal ends at the line break
			j++;
			if (ch === q) break;
		}
		j = Math.min(j, this.n);
		this.i = j;
		return this.mk(q === '"' ? 'string' : 'char', this.text.slice(start, j), start, j);
	}

	private atLineStart(pos: number): boolean {
		let j = pos - 1;
		while (j >= 0 && (this.text[j] === ' ' || this.text[j] === '\t')) j--;
		return j < 0 || this.text[j] === '\n';
	}

	private findLineEnd(pos: number): number { let i = pos; while (i < this.n && this.text[i] !== '\n') i++; return i; }

	private mk(kind: Token['kind'], value: string, start: number, end: number): Token {
		const t: Token = { kind, value, span: { start, end }, file: this.file };
		if (kind !== 'comment-line' && kind !== 'comment-block') {
			if (this.pendingSpace) t.spaceBefore = true;
			this.pendingSpace = false;
		}
		return t;
	}
}

export function tokenize(text: string, file = '<unknown>', opts?: TokenizerOptions): Token[] {
	const tz = new Tokenizer(text, file, opts);
	const out: Token[] = [];
	for (; ;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}
