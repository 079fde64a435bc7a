export { TypeNameRegistry, type TypeNameEntry } from './registry';
export { loadTypeNames, parseTypeNames } from './names';
export { typeIdentity, recordIdentity } from './identity';
export { resolveTypeName, normalizeTypeName, identityCandidates } from './typeResolver';
export { serialize, compoundToInit, formatFloat, NestingLimitError, NOT_A_RECORD, NOT_AN_INIT_LIST, DEFAULT_MAX_DEPTH, type SerializeContext } from './serializer';
export { evaluateMacro, evaluateMacroDetailed, type Evaluation, type EvaluationResult, type FailureReason, type Fidelity } from './evaluate';
export { listCandidateMacros, evaluateHeader, parseDeclaration, type MacroEvaluation, type ParsedDeclaration } from './batch';
export { compileMacro, runFrontEnd, parseCompilerArgs, findSysroot, syntheticSource, SENTINEL_NAME, SYNTHETIC_FILE } from './driver';
export { type EngineOptions, resolveMaxDepth } from './options';
export { type Diagnostic, type DiagCode, MI_DIAGCODES, normalizeDiagCode, formatDiagnostic } from './diagCodes';
export { setDebugLogging } from './log';
export { parseTranslationUnit } from './ast/parser';
export { typeToString } from './ast/ctypes';
export { preprocessSource, clearIncludeResolverCache, type FileSystem } from './core/pipeline';
export * as host from './host';
export type * from './ast';
