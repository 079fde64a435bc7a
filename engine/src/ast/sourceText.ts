import type { Token } from '../core/tokens';
import type { SourceManager } from '../core/source';
import type { TokenRange } from './index';

// whitespace, comments and line continuations
const TRIVIA = /^(?:\s|\\\r?\n|\/\*[\s\S]*?\*\/|\/\/[^\n]*)*$/;

// Verbatim text of a token range. When every token still sits where it was spelled,
// in one file and in order, the original slice is returned (comments and line breaks
// included); otherwise the spellings are joined, keeping the spaces that preceded them.
export function sourceText(tokens: readonly Token[], range: TokenRange, sources: SourceManager): string {
	const toks = tokens.slice(range.start, range.end).filter(t => t.kind !== 'eof');
	const first = toks[0];
	const last = toks[toks.length - 1];
	if (!first || !last) return '';
	if (isContiguous(toks, sources)) {
		const text = sources.slice(first.file, { start: first.span.start, end: last.span.end });
		if (text !== null) return text;
	}
	return joinSpellings(toks);
}

export function joinSpellings(toks: readonly Token[]): string {
	let out = '';
	toks.forEach((t, i) => {
		if (i > 0 && t.spaceBefore) out += ' ';
		out += t.value;
	});
	return out;
}

function isContiguous(toks: readonly Token[], sources: SourceManager): boolean {
	let prev: Token | null = null;
	for (const t of toks) {
		if (sources.slice(t.file, t.span) !== t.value) return false;
		if (prev) {
			if (prev.file !== t.file || t.span.start < prev.span.end) return false;
			const gap = sources.slice(t.file, { start: prev.span.end, end: t.span.start });
			if (gap === null || !TRIVIA.test(gap)) return false;
		}
		prev = t;
	}
	return true;
}
