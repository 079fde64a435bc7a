import type { Span } from './core/tokens';

export const MI_DIAGCODES = {
	SYNTAX: 'MI000',
	INCLUDE_NOT_FOUND: 'MI001',
	INCLUDE_DEPTH: 'MI002',
	ERROR_DIRECTIVE: 'MI003',
	WARNING_DIRECTIVE: 'MI004',
	UNTERMINATED_CONDITIONAL: 'MI005',
	UNMATCHED_DIRECTIVE: 'MI006',
	INVALID_DIRECTIVE: 'MI007',
	MACRO_ARGUMENTS: 'MI008',
	MACRO_REDEFINED: 'MI009',
	UNDEFINED_MACRO: 'MI010',
	UNKNOWN_TYPE: 'MI020',
	INVALID_TYPE_SPECIFIERS: 'MI021',
	INCOMPLETE_TYPE: 'MI022',
	REDEFINITION: 'MI023',
	NOT_CONSTANT: 'MI024',
	EXCESS_INITIALIZERS: 'MI030',
	UNKNOWN_FIELD: 'MI031',
	INVALID_DESIGNATOR: 'MI032',
	SCALAR_BRACES: 'MI033',
} as const;
export type DiagCode = typeof MI_DIAGCODES[keyof typeof MI_DIAGCODES];

export type Severity = 'error' | 'warning' | 'info';

// Front-end problem attached to a span of `file`
export interface Diagnostic {
	span: Span;
	file: string;
	message: string;
	severity: Severity;
	code: DiagCode;
}

const DIAG_VALUE_SET = new Set<string>(Object.values(MI_DIAGCODES));

// Build name->code mapping from the table so `include-not-found` and `MI001` both resolve.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(MI_DIAGCODES)) {
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

function isDiagCode(raw: string): raw is DiagCode {
	return DIAG_VALUE_SET.has(raw);
}

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export function hasErrors(diags: readonly Diagnostic[]): boolean {
	return diags.some(d => d.severity === 'error');
}

export function formatDiagnostic(d: Diagnostic, position?: { line: number; column: number }): string {
	const where = position ? `${d.file}:${position.line}:${position.column}` : d.file;
	return `${where}: ${d.severity}: ${d.message} [${d.code}]`;
}
