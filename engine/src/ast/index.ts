import type { SourceLocation } from '../core/source';
import type { Diagnostic } from '../diagCodes';
import type { Token } from '../core/tokens';

// Half-open range of token indexes into TranslationUnit.tokens
export type TokenRange = { start: number; end: number };

export const QUAL_CONST = 1;
export const QUAL_VOLATILE = 2;
export const QUAL_RESTRICT = 4;

export const BUILTIN_KINDS = [
	'void', '_Bool',
	'char', 'signed char', 'unsigned char',
	'short', 'unsigned short', 'int', 'unsigned int', 'long', 'unsigned long', 'long long', 'unsigned long long',
	'__int128', 'unsigned __int128',
	'float', 'double', 'long double',
] as const;
export type BuiltinKind = typeof BUILTIN_KINDS[number];

export type CType =
	| { kind: 'builtin'; name: BuiltinKind; quals: number }
	| { kind: 'pointer'; pointee: CType; quals: number }
	| { kind: 'array'; element: CType; size: number | null; quals: number }
	| { kind: 'function'; result: CType; params: CType[]; variadic: boolean; prototyped: boolean; quals: number }
	| { kind: 'record'; decl: RecordDecl; quals: number }
	| { kind: 'enum'; decl: EnumDecl; quals: number }
	| { kind: 'typedef'; decl: TypedefDecl; quals: number };

export interface FieldDecl {
	// null for C11 anonymous struct/union members
	name: string | null;
	type: CType;
	bitWidth: number | null;
	location: SourceLocation;
}

export interface RecordDecl {
	kind: 'record';
	tagKind: 'struct' | 'union';
	tag: string | null;
	// first typedef naming an anonymous record
	typedefName: string | null;
	// anonymous record declared as the type of a named member
	owner: { record: RecordDecl; field: string } | null;
	// null until the definition is seen
	fields: FieldDecl[] | null;
	location: SourceLocation;
}

export interface EnumDecl {
	kind: 'enum';
	tag: string | null;
	typedefName: string | null;
	constants: { name: string; value: bigint }[] | null;
	location: SourceLocation;
}

export interface TypedefDecl {
	kind: 'typedef';
	name: string;
	type: CType;
	location: SourceLocation;
}

export interface VarDecl {
	kind: 'var';
	name: string;
	type: CType;
	init: Expr | null;
	range: TokenRange;
	// error diagnostics raised while parsing or binding this declaration
	errorCount: number;
	location: SourceLocation;
}

export type Designator =
	| { kind: 'field'; name: string; range: TokenRange }
	| { kind: 'index'; index: bigint; range: TokenRange };

export type InitElement = { designators: Designator[]; value: Expr };

export type UnaryOp = '+' | '-' | '!' | '~' | '*' | '&' | '++' | '--';
export type BinaryOp =
	| '*' | '/' | '%' | '+' | '-' | '<<' | '>>'
	| '<' | '>' | '<=' | '>=' | '==' | '!='
	| '&' | '^' | '|' | '&&' | '||'
	| '=' | '*=' | '/=' | '%=' | '+=' | '-=' | '<<=' | '>>=' | '&=' | '^=' | '|=' | ',';

export interface InitListExpr {
	kind: 'InitList';
	range: TokenRange;
	// syntactic elements as written
	elements: InitElement[];
	// set by initializer binding
	type: CType | null;
	// one entry per field (records) or per element (arrays); unions hold the single active member
	inits: Expr[] | null;
	unionField: number | null;
	// created for brace elision or nested designators, no braces in the source
	synthetic: boolean;
}

export interface CompoundLiteralExpr {
	kind: 'CompoundLiteral';
	range: TokenRange;
	// `(T){...}` or `T{...}`
	form: 'cast' | 'functional';
	type: CType;
	init: Expr;
}

export type Expr =
	| { kind: 'IntegerLiteral'; range: TokenRange; value: bigint; unsigned: boolean }
	| { kind: 'FloatLiteral'; range: TokenRange; value: number; precision: 'float' | 'double' | 'long double' }
	| { kind: 'CharLiteral'; range: TokenRange; value: bigint }
	| { kind: 'StringLiteral'; range: TokenRange; content: string }
	| { kind: 'Identifier'; range: TokenRange; name: string; constant: bigint | null }
	| CompoundLiteralExpr
	| InitListExpr
	| { kind: 'ImplicitValueInit'; range: TokenRange; type: CType }
	| { kind: 'Paren'; range: TokenRange; inner: Expr }
	| { kind: 'Cast'; range: TokenRange; type: CType; operand: Expr }
	| { kind: 'Unary'; range: TokenRange; op: UnaryOp; operand: Expr; postfix: boolean }
	| { kind: 'Binary'; range: TokenRange; op: BinaryOp; left: Expr; right: Expr }
	| { kind: 'Conditional'; range: TokenRange; cond: Expr; then: Expr; otherwise: Expr }
	| { kind: 'Call'; range: TokenRange; callee: Expr; args: Expr[] }
	| { kind: 'Member'; range: TokenRange; object: Expr; member: string; arrow: boolean }
	| { kind: 'Index'; range: TokenRange; object: Expr; index: Expr }
	| { kind: 'SizeOf'; range: TokenRange; keyword: 'sizeof' | '_Alignof'; operand: CType | Expr }
	// GNU statement expressions, _Generic and similar: kept only as source text
	| { kind: 'Opaque'; range: TokenRange }
	| { kind: 'ErrorExpr'; range: TokenRange };

export interface TranslationUnit {
	tokens: Token[];
	vars: Map<string, VarDecl>;
	typedefs: Map<string, TypedefDecl>;
	records: RecordDecl[];
	enums: EnumDecl[];
	diagnostics: Diagnostic[];
}

export function rangeFrom(start: number, end: number): TokenRange {
	return { start, end };
}
