// Main exports for the IFJ25 semantic analyzer

export { SemanticAnalyzer, analyze } from './validation/analyzer';
export type { AnalyzerOptions, AnalysisResult, AnalysisSuccess, AnalysisFailure } from './validation/analyzer';
export { parseProgramJson, readProgram, AstFormatError } from './ast/ast-json';
export { BUILTINS, BUILTIN_PREFIX, defaultExtensions } from './builtins';
export type { BuiltinSpec, BuiltinExtensions, BuiltinExtension, BuiltinParamKind } from './builtins';
export { GlobalRegistry, isGlobalName } from './validation/global-registry';
export { formatScopedSymbols, formatGlobals } from './symbols/symbol-dump';
export { logger, Logger, LogLevel } from './logger';
export * from './errors';
export * from './types';
