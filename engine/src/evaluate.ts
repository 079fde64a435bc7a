import { type Diagnostic, hasErrors } from './diagCodes';
import type { SourceManager } from './core/source';
import { SENTINEL_NAME, compileMacro, isSystemHeader } from './driver';
import { type EngineOptions, resolveMaxDepth } from './options';
import { TypeNameRegistry } from './registry';
import { NOT_AN_INIT_LIST, NOT_A_RECORD, NestingLimitError, compoundToInit } from './serializer';
import { resolveTypeName } from './typeResolver';
import { debug } from './log';

export type FailureReason =
	| 'system-header'
	| 'frontend-failed'
	| 'declaration-missing'
	| 'initializer-error'
	| 'not-compound-literal'
	| 'not-a-record'
	| 'not-an-init-list'
	| 'nesting-too-deep';

export type Fidelity =
	| { kind: 'modeled' }
	// some values were copied from the source as written
	| { kind: 'passthrough'; fragments: string[] };

export interface Evaluation {
	macro: string;
	typeName: string;
	initializer: string;
	// `<typeName> <macro> = <initializer>;`
	declaration: string;
	fidelity: Fidelity;
}

export type EvaluationResult =
	| { ok: true; evaluation: Evaluation }
	// `sources` locates the diagnostics; null when the front end never ran
	| { ok: false; reason: FailureReason; diagnostics: Diagnostic[]; sources: SourceManager | null };

const EMPTY_REGISTRY = new TypeNameRegistry();

function fail(reason: FailureReason, diagnostics: Diagnostic[] = [], sources: SourceManager | null = null): EvaluationResult {
	debug('evaluate', 'failed:', reason);
	return { ok: false, reason, diagnostics, sources };
}

export function evaluateMacroDetailed(headerPath: string, macroName: string, options: EngineOptions = {}): EvaluationResult {
	if (isSystemHeader(headerPath)) return fail('system-header');
	const compiled = compileMacro(headerPath, macroName, options);
	const { pre, unit, file } = compiled;
	const diagnostics = [...pre.diagnostics, ...unit.diagnostics];
	const failed = (reason: FailureReason) => fail(reason, diagnostics, compiled.sources);
	if (pre.fatal || !pre.macros.has(macroName)) return failed('frontend-failed');

	const decl = unit.vars.get(SENTINEL_NAME);
	if (!decl || !decl.init) return failed('declaration-missing');
	const localErrors = hasErrors(pre.diagnostics.filter(d => d.file === file));
	if (decl.errorCount > 0 || localErrors) return failed('initializer-error');

	const init = decl.init;
	if (init.kind !== 'CompoundLiteral') return failed('not-compound-literal');

	const registry = options.registry ?? EMPTY_REGISTRY;
	const fragments: string[] = [];
	let initializer: string;
	try {
		initializer = compoundToInit(init, {
			registry,
			tokens: unit.tokens,
			sources: compiled.sources,
			maxDepth: resolveMaxDepth(options.maxDepth),
			passthrough: fragments,
		});
	} catch (err) {
		if (err instanceof NestingLimitError) return failed('nesting-too-deep');
		throw err;
	}
	if (initializer === NOT_A_RECORD) return failed('not-a-record');
	if (initializer === NOT_AN_INIT_LIST) return failed('not-an-init-list');

	const typeName = resolveTypeName(init.type, registry);
	const declaration = `${typeName} ${macroName} = ${initializer};`;
	debug('evaluate', declaration);
	return {
		ok: true,
		evaluation: {
			macro: macroName,
			typeName,
			initializer,
			declaration,
			fidelity: fragments.length ? { kind: 'passthrough', fragments } : { kind: 'modeled' },
		},
	};
}

// Declaration text for one macro, or null when it cannot be produced.
export function evaluateMacro(headerPath: string, macroName: string, options: EngineOptions = {}): string | null {
	const result = evaluateMacroDetailed(headerPath, macroName, options);
	return result.ok ? result.evaluation.declaration : null;
}
