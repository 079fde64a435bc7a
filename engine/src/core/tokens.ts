// Core token model shared by the tokenizer, the preprocessor and the parser

export type Span = { start: number; end: number };

export type TokenKind =
	| 'id'
	| 'number'
	| 'string'
	| 'char'
	| 'keyword'
	| 'op'
	| 'punct'
	| 'comment-line'
	| 'comment-block'
	| 'directive' // entire preprocessor directive line (combined with continuations)
	| 'eof';

export interface Token {
	kind: TokenKind;
	value: string;
	// offsets into the text of `file`; tokens produced by macro expansion keep the
	// location they were spelled at (macro body or macro argument)
	span: Span;
	file: string;
	// whitespace preceded the token in its source line
	spaceBefore?: boolean;
	// macro names that must not re-expand this token (hide set)
	hide?: ReadonlySet<string>;
}

// Pull-based stream over a token producer with single-token pushback.
export class TokenStream {
	private readonly producer: () => Token;
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;

	constructor(producer: () => Token) {
		this.producer = producer;
	}

	next(): Token {
		const back = this.pushback.pop();
		if (back) return back;
		if (this.stickyEof) return this.stickyEof;
		const t = this.producer();
		if (t.kind === 'eof') this.stickyEof = t;
		return t;
	}

	peek(): Token {
		const t = this.next();
		this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}
}

export function isWordToken(t: Token): boolean {
	return t.kind === 'id' || t.kind === 'keyword';
}

export function isPunct(t: Token | undefined, value: string): boolean {
	return !!t && (t.kind === 'punct' || t.kind === 'op') && t.value === value;
}
