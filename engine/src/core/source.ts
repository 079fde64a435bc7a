import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { Span } from './tokens';

export type SourceLocation = { file: string; line: number; column: number };

// Every file the front end has read, addressed by the id the include resolver gave it.
export class SourceManager {
	private readonly docs = new Map<string, TextDocument>();

	add(file: string, text: string): TextDocument {
		const uri = file.startsWith('<') ? `untitled:${encodeURIComponent(file)}` : URI.file(file).toString();
		const doc = TextDocument.create(uri, 'c', 0, text);
		this.docs.set(file, doc);
		return doc;
	}

	has(file: string): boolean { return this.docs.has(file); }

	text(file: string): string | null {
		const doc = this.docs.get(file);
		return doc ? doc.getText() : null;
	}

	slice(file: string, span: Span): string | null {
		const text = this.text(file);
		if (text === null || span.end > text.length) return null;
		return text.slice(span.start, span.end);
	}

	// 1-based line and column
	locate(file: string, offset: number): SourceLocation {
		const doc = this.docs.get(file);
		if (!doc) return { file, line: 0, column: 0 };
		const pos = doc.positionAt(offset);
		return { file, line: pos.line + 1, column: pos.character + 1 };
	}

	files(): string[] { return Array.from(this.docs.keys()); }
}

export function formatLocation(loc: SourceLocation): string {
	return `${loc.file}:${loc.line}:${loc.column}`;
}

// Accepts plain paths and file:// URIs
export function toFsPath(pathOrUri: string): string {
	return pathOrUri.startsWith('file://') ? URI.parse(pathOrUri).fsPath : pathOrUri;
}
