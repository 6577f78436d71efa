import { SourceLocation } from './types';

// Exit codes shared with the rest of the IFJ25 toolchain
export enum ErrorCode {
  SUCCESS = 0,
  SYNTAX = 2,
  DEFINITION = 3,
  REDEFINITION = 4,
  ARGUMENT_COUNT = 5,
  EXPRESSION_TYPE = 6,
  FLOW_CONTROL = 10,
  INTERNAL = 99
}

function formatLocation(location?: SourceLocation): string {
  if (!location) {
    return '';
  }
  const file = location.filename ? `${location.filename}:` : '';
  return `${file}${location.start.line}:${location.start.column}: `;
}

export abstract class SemanticError extends Error {
  abstract readonly code: ErrorCode;

  constructor(public readonly detail: string, public readonly location?: SourceLocation) {
    super(`${formatLocation(location)}${detail}`);
    this.name = new.target.name;
  }
}

// Missing or malformed main(), undefined identifier or function, read of a setter-only property
export class DefinitionError extends SemanticError {
  readonly code = ErrorCode.DEFINITION;
}

// Duplicate signature or accessor in one class, local redeclared in one block
export class RedefinitionError extends SemanticError {
  readonly code = ErrorCode.REDEFINITION;
}

// Arity mismatch, or a literal argument of the wrong kind for a builtin
export class ArgumentCountError extends SemanticError {
  readonly code = ErrorCode.ARGUMENT_COUNT;
}

export class ExpressionTypeError extends SemanticError {
  readonly code = ErrorCode.EXPRESSION_TYPE;
}

// break/continue outside a loop
export class FlowControlError extends SemanticError {
  readonly code = ErrorCode.FLOW_CONTROL;
}

export class InternalError extends SemanticError {
  readonly code = ErrorCode.INTERNAL;
}

export function isSemanticError(error: unknown): error is SemanticError {
  return error instanceof SemanticError;
}
