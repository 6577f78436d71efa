// Pass 2: re-walks the program with fresh scopes, resolves names, infers and learns types, names locals for codegen

import { DefinitionError, InternalError } from '../errors';
import { logger } from '../logger';
import { ScopeFrame } from '../symbols/scope-stack';
import { typeToString, learnAssignedType } from '../type-utils';
import {
  AssignmentStatement, BlockStatement, CallableDeclaration, Parameter, Program, Statement, SymbolData,
  VariableDeclaration
} from '../types';
import { SemanticContext } from './context';
import { callableFrameKey, callableParameters, isLocalSymbol } from './declaration-pass';
import { inferExpression } from './expression-typer';
import { isGlobalName } from './global-registry';

/**
 * "x" declared in scope "1.2.3" becomes "x_123".
 */
export function makeCodegenName(name: string, scopePath: string): string {
  return `${name}_${scopePath.split('.').join('')}`;
}

export function resolveProgram(program: Program, context: SemanticContext): void {
  for (const classDecl of program.classes) {
    context.currentClass = classDecl;
    resolveBlock(classDecl.body, context);
  }
  context.currentClass = undefined;
}

function resolveBlock(block: BlockStatement, context: SemanticContext): void {
  context.enterBlock(block, 'resolve', frame => {
    for (const stmt of block.body) {
      resolveStatement(stmt, context);
    }
    publishLearnedTypes(frame);
  });
}

// Final types of the frame's variables are written back to their declarations.
function publishLearnedTypes(frame: ScopeFrame): void {
  frame.table.forEach((_key, data) => {
    if (data.declaration?.kind === 'variable') {
      data.declaration.dataType = data.dataType;
    }
  });
}

function resolveStatement(stmt: Statement, context: SemanticContext): void {
  switch (stmt.kind) {
    case 'block':
      resolveBlock(stmt, context);
      break;
    case 'if':
      inferExpression(stmt.condition, context);
      resolveBlock(stmt.thenBlock, context);
      if (stmt.elseBlock) {
        resolveBlock(stmt.elseBlock, context);
      }
      break;
    case 'while':
      inferExpression(stmt.condition, context);
      resolveBlock(stmt.body, context);
      break;
    case 'break':
    case 'continue':
      break;
    case 'expression':
      inferExpression(stmt.expression, context);
      break;
    case 'variable':
      bindVariable(stmt, context);
      break;
    case 'assignment':
      resolveAssignment(stmt, context);
      break;
    case 'function':
    case 'getter':
    case 'setter':
      resolveCallable(stmt, context);
      break;
    case 'return':
      if (stmt.argument) {
        inferExpression(stmt.argument, context);
      }
      break;
  }
}

function declareInFrame(name: string, context: SemanticContext): SymbolData {
  if (!context.scopes.declareLocal(name, true)) {
    throw new InternalError(`'${name}' collided on re-declaration in scope ${context.currentPath()}`);
  }
  const symbol = context.scopes.lookupInCurrent(name);
  if (!symbol) {
    throw new InternalError(`'${name}' missing right after declaration in scope ${context.currentPath()}`);
  }
  symbol.scopeName = context.currentPath();
  return symbol;
}

function bindVariable(decl: VariableDeclaration, context: SemanticContext): void {
  const name = decl.identifier.name;
  const symbol = declareInFrame(name, context);
  symbol.declaration = decl;
  symbol.codegenName = makeCodegenName(name, context.currentPath());
  decl.codegenName = symbol.codegenName;
  decl.identifier.codegenName = symbol.codegenName;
  decl.dataType = symbol.dataType;
}

function bindParameter(param: Parameter, context: SemanticContext): void {
  const name = param.name.name;
  const symbol = declareInFrame(name, context);
  symbol.kind = 'parameter';
  symbol.declaration = param;
  symbol.codegenName = makeCodegenName(name, context.currentPath());
  param.codegenName = symbol.codegenName;
  param.name.codegenName = symbol.codegenName;
}

function resolveCallable(decl: CallableDeclaration, context: SemanticContext): void {
  const params = callableParameters(decl);
  context.scopes.top()?.table.insert(callableFrameKey(decl.name.name), 'function', true);
  if (decl.kind === 'function') {
    decl.codegenName = `${decl.name.name}$${params.length}`;
  }

  context.enterBlock(decl.body, 'resolve', frame => {
    for (const param of params) {
      bindParameter(param, context);
    }
    for (const stmt of decl.body.body) {
      resolveStatement(stmt, context);
    }
    publishLearnedTypes(frame);
  });
}

/**
 * Resolves the target, infers the value and lets the target learn the value's type.
 */
function resolveAssignment(stmt: AssignmentStatement, context: SemanticContext): void {
  const target = stmt.target;
  const name = target.name;
  const symbol = context.scopes.lookup(name);

  if (isLocalSymbol(symbol)) {
    target.codegenName = symbol.codegenName;
    target.resolvedAs = symbol.kind === 'parameter' ? 'parameter' : 'local';
    const valueType = inferExpression(stmt.value, context);
    const before = symbol.dataType;
    symbol.dataType = learnAssignedType(before, valueType);
    target.inferredType = symbol.dataType;
    logger.debug(`[sem] ${name}: ${typeToString(before)} <- ${typeToString(valueType)} = ${typeToString(symbol.dataType)}`);
    return;
  }

  if (context.registry.getAccessor('set', name)) {
    target.resolvedAs = 'setter';
    inferExpression(stmt.value, context);
    return;
  }

  if (isGlobalName(name)) {
    target.resolvedAs = 'global';
    const valueType = inferExpression(stmt.value, context);
    target.inferredType = context.globals.learn(name, valueType);
    return;
  }

  throw new DefinitionError(`assignment to undefined identifier '${name}'`, target.location);
}
