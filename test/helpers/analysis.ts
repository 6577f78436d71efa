import { analyze, AnalysisSuccess, AnalyzerOptions } from '../../src/validation/analyzer';
import { ErrorCode, SemanticError } from '../../src/errors';
import type { Program } from '../../src/types';

export function analyzeOk(program: Program, options?: AnalyzerOptions): AnalysisSuccess {
  const result = analyze(program, options);
  if (!result.success) {
    throw new Error(`Analysis failed for test program (${result.code}): ${result.error.message}`);
  }
  return result;
}

export function analyzeFail(program: Program, code: ErrorCode, options?: AnalyzerOptions): SemanticError {
  const result = analyze(program, options);
  if (result.success) {
    throw new Error(`Expected analysis to fail with code ${code}, but it succeeded`);
  }
  if (result.code !== code) {
    throw new Error(`Expected code ${code}, got ${result.code}: ${result.error.message}`);
  }
  return result.error;
}
