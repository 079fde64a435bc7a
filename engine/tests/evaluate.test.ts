import { describe, it, expect, beforeEach } from 'vitest';
import { clearIncludeResolverCache } from '../src/core/pipeline';
import { evaluateMacro, evaluateMacroDetailed } from '../src/evaluate';
import { TypeNameRegistry } from '../src/registry';
import { SHAPES_PATH, shapesOptions, unreadable } from './testUtils';

function declaration(macro: string, extra: Parameters<typeof evaluateMacro>[2] = {}): string | null {
	return evaluateMacro(SHAPES_PATH, macro, { ...shapesOptions(), ...extra });
}

function reason(macro: string, header = SHAPES_PATH, extra: Parameters<typeof evaluateMacro>[2] = {}): string {
	const result = evaluateMacroDetailed(header, macro, { ...shapesOptions(), ...extra });
	return result.ok ? 'ok' : result.reason;
}

describe('evaluateMacro', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('rewrites a simple compound literal', () => {
		expect(declaration('P')).toBe('Point P = Point{x=1, y=2};');
	});

	it('rewrites nested records, floats and strings', () => {
		expect(declaration('RECT')).toBe(
			'struct Rectangle RECT = struct Rectangle{origin=Point{x=3, y=4}, width=1.5, height=2.0, label="box".ref()};',
		);
	});

	it('zero-fills members a designated initializer skips', () => {
		const result = evaluateMacroDetailed(SHAPES_PATH, 'NEG', shapesOptions());
		if (!result.ok) throw new Error(result.reason);
		expect(result.evaluation.declaration).toBe('Point NEG = Point{x=0, y=-7};');
		expect(result.evaluation.fidelity).toEqual({ kind: 'passthrough', fragments: ['-7'] });
	});

	it('names an anonymous member struct by its location', () => {
		expect(declaration('COMPLEX_VAL')).toBe(
			'ComplexStruct COMPLEX_VAL = ComplexStruct{info=struct (unnamed struct at /proj/shapes.h:17:2)'
			+ '{metric=Metric{count=42}, description="ok".ref()}, position=Point{x=3, y=4}};',
		);
	});

	it('names an anonymous member struct from the registry', () => {
		const registry = new TypeNameRegistry([['c:@SA@ComplexStruct@Sa@info', 'Info']]);
		expect(declaration('COMPLEX_VAL', { registry })).toBe(
			'ComplexStruct COMPLEX_VAL = ComplexStruct{info=Info{metric=Metric{count=42}, description="ok".ref()}, position=Point{x=3, y=4}};',
		);
	});

	it('follows macros that expand to other macros', () => {
		const result = evaluateMacroDetailed(SHAPES_PATH, 'MADE', shapesOptions());
		if (!result.ok) throw new Error(result.reason);
		expect(result.evaluation.declaration).toBe('Point MADE = Point{x=5, y=6};');
		expect(result.evaluation.fidelity).toEqual({ kind: 'modeled' });
	});

	it('copies enumerators through as written', () => {
		const result = evaluateMacroDetailed(SHAPES_PATH, 'COLORED', shapesOptions());
		if (!result.ok) throw new Error(result.reason);
		expect(result.evaluation.initializer).toBe('Point{x=BLUE, y=RED}');
		expect(result.evaluation.fidelity).toEqual({ kind: 'passthrough', fragments: ['BLUE', 'RED'] });
	});

	it('uses registry names for the declared type', () => {
		expect(declaration('P', { registry: new TypeNameRegistry([['c:@T@Point', 'Vec2']]) })).toBe('Vec2 P = Vec2{x=1, y=2};');
		expect(declaration('P', { registry: new TypeNameRegistry([['c:@SA@Point', 'Vec2']]) })).toBe('Vec2 P = Vec2{x=1, y=2};');
	});

	it('applies -D flags from the compiler arguments', () => {
		expect(declaration('ALT')).toBeNull();
		expect(declaration('ALT', { compilerArgs: ['-DUSE_ALT'] })).toBe('Point ALT = Point{x=8, y=9};');
	});

	it('copies parenthesized member values as written', () => {
		const options = shapesOptions({ '/proj/paren.h': '#include "shapes.h"\n#define PAREN (Point){ (1), (-2) }\n' });
		const result = evaluateMacroDetailed('/proj/paren.h', 'PAREN', options);
		if (!result.ok) throw new Error(result.reason);
		expect(result.evaluation.declaration).toBe('Point PAREN = Point{x=(1), y=(-2)};');
		expect(result.evaluation.fidelity).toEqual({ kind: 'passthrough', fragments: ['(1)', '(-2)'] });
	});

	it('finds headers through -I', () => {
		const options = shapesOptions({ '/proj/inc/more.h': '#include "shapes.h"\n#define MORE (Point){ 7, 7 }\n' });
		expect(evaluateMacro('more.h', 'MORE', { ...options, compilerArgs: ['-I', '/proj/inc', '-I/proj'] })).toBe('Point MORE = Point{x=7, y=7};');
	});
});

describe('evaluateMacro failures', () => {
	beforeEach(() => clearIncludeResolverCache());

	it('rejects system headers', () => {
		expect(reason('EOF', '<stdio.h>')).toBe('system-header');
		expect(evaluateMacro('<stdio.h>', 'EOF', shapesOptions())).toBeNull();
	});

	it('fails when the macro is not defined', () => {
		const result = evaluateMacroDetailed(SHAPES_PATH, 'NOPE', shapesOptions());
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.reason).toBe('frontend-failed');
		expect(result.diagnostics.map(d => d.message)).toContain("macro 'NOPE' is not defined");
	});

	it('fails when the header cannot be found', () => {
		expect(reason('P', '/proj/missing.h')).toBe('frontend-failed');
	});

	it('fails when the header exists but cannot be read', () => {
		const options = shapesOptions();
		const result = evaluateMacroDetailed(SHAPES_PATH, 'P', { ...options, fs: unreadable(options.fs, SHAPES_PATH) });
		if (result.ok) throw new Error('evaluation succeeded');
		expect(result.reason).toBe('frontend-failed');
		expect(result.diagnostics.map(d => d.message)).toContain(
			`'${SHAPES_PATH}' cannot be read: EACCES: permission denied, open '${SHAPES_PATH}'`,
		);
	});

	it('fails for a macro that is not a compound literal', () => {
		expect(reason('ANSWER')).toBe('not-compound-literal');
	});

	it('fails for a compound literal wrapped in parentheses', () => {
		const options = shapesOptions({ '/proj/wrapped.h': '#include "shapes.h"\n#define WRAPPED ((Point){ 1, 2 })\n' });
		expect(reason('WRAPPED', '/proj/wrapped.h', options)).toBe('not-compound-literal');
	});

	it('fails for a compound literal of non-record type', () => {
		expect(reason('ARRAY')).toBe('not-a-record');
	});

	it('fails when the initializer does not compile', () => {
		expect(reason('BAD_FIELD')).toBe('initializer-error');
	});

	it('fails when records nest deeper than allowed', () => {
		expect(reason('RECT', SHAPES_PATH, { maxDepth: 1 })).toBe('nesting-too-deep');
		expect(reason('RECT', SHAPES_PATH, { maxDepth: 2 })).toBe('ok');
	});

	it('fails for a function-like macro used bare', () => {
		expect(reason('PAIR_OF')).toBe('initializer-error');
	});
});
