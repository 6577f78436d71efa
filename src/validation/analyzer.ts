// Entry point of semantic analysis for IFJ25 programs

import { BuiltinExtensions, defaultExtensions, installBuiltins } from '../builtins';
import { ErrorCode, SemanticError, isSemanticError } from '../errors';
import { logger, LogLevel } from '../logger';
import { DataType, Program, ScopedSymbol } from '../types';
import { SemanticContext } from './context';
import { declareProgram } from './declaration-pass';
import { FunctionRegistry } from './function-registry';
import { formatScopedSymbols } from '../symbols/symbol-dump';
import { GlobalRegistry } from './global-registry';
import { collectHeaders } from './header-collector';
import { resolveProgram } from './resolution-pass';

export interface AnalyzerOptions {
  extensions?: Partial<BuiltinExtensions>;
  verbose?: boolean;
}

export interface AnalysisSuccess {
  success: true;
  globals: string[];
  globalTypes: Map<string, DataType>;
  symbols: ScopedSymbol[];
}

export interface AnalysisFailure {
  success: false;
  code: ErrorCode;
  error: SemanticError;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export class SemanticAnalyzer {
  // Global-convention names survive the passes for the code generator
  readonly globals = new GlobalRegistry();
  readonly extensions: BuiltinExtensions;
  public verbose: boolean;

  constructor(opts?: AnalyzerOptions) {
    this.extensions = { ...defaultExtensions, ...opts?.extensions };
    this.verbose = opts?.verbose ?? false;
    if (this.verbose) {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('[sem] analyzer initialized with verbose mode');
    }
  }

  /**
   * Runs both passes over `program`, annotating it in place. Stops at the first error.
   */
  analyze(program: Program): AnalysisResult {
    this.globals.reset();
    const registry = new FunctionRegistry();
    const context = new SemanticContext(registry, this.globals, this.extensions);

    try {
      logger.debug('[sem] seeding builtins');
      installBuiltins(registry, this.extensions);

      logger.debug('[sem] collecting headers');
      collectHeaders(program, context);

      logger.debug('[sem] pass 1: declarations');
      declareProgram(program, context);

      context.resetScopes();
      logger.debug('[sem] pass 2: resolution');
      resolveProgram(program, context);

      return {
        success: true,
        globals: this.globals.takeNames(),
        globalTypes: this.globals.takeTypes(),
        symbols: context.symbolIndex.list()
      };
    } catch (error) {
      if (!isSemanticError(error)) {
        throw error;
      }
      logger.debug(`[sem] RETURN rc=${error.code} (${error.name}): ${error.message}`);
      if (logger.isEnabled(LogLevel.DEBUG)) {
        logger.debug(`[sem] symbols at failure:\n${formatScopedSymbols(context.symbolIndex.list())}`);
      }
      return { success: false, code: error.code, error };
    } finally {
      context.scopes.dispose();
      registry.dispose();
    }
  }

  /**
   * Global identifiers of the last run; the caller owns the returned array.
   */
  takeGlobals(): string[] {
    return this.globals.takeNames();
  }
}

export function analyze(program: Program, options?: AnalyzerOptions): AnalysisResult {
  return new SemanticAnalyzer(options).analyze(program);
}
