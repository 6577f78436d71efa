// Pass 1 body walk: declarations, assignment targets, loop context, early call and literal checks

import { BUILTINS, getParamSpec, isBuiltinEnabled, isBuiltinQName } from '../builtins';
import { ArgumentCountError, DefinitionError, FlowControlError, RedefinitionError } from '../errors';
import { logger } from '../logger';
import {
  BlockStatement, CallExpression, CallableDeclaration, Expression, Identifier, Parameter, Program, Statement,
  SymbolData, SymbolKind, VariableDeclaration
} from '../types';
import { SemanticContext } from './context';
import { isGlobalName } from './global-registry';
import { checkLiteralBinary, reduceLiteralKind } from './literal-checks';

/**
 * Frame key of a callable declared in a block. Kept apart from plain names so
 * locals never collide with it.
 */
export function callableFrameKey(name: string): string {
  return `fn:${name}`;
}

export function isLocalSymbol(symbol: SymbolData | null): symbol is SymbolData {
  return symbol !== null && (symbol.kind === 'variable' || symbol.kind === 'parameter' || symbol.kind === 'constant');
}

export function declareProgram(program: Program, context: SemanticContext): void {
  for (const spec of BUILTINS) {
    if (isBuiltinEnabled(spec, context.extensions)) {
      context.symbolIndex.record('global', spec.qname, 'function', spec.params.length);
    }
  }

  for (const classDecl of program.classes) {
    context.currentClass = classDecl;
    declareBlock(classDecl.body, context);
  }
  context.currentClass = undefined;
}

function declareBlock(block: BlockStatement, context: SemanticContext): void {
  context.enterBlock(block, 'declare', () => {
    for (const stmt of block.body) {
      declareStatement(stmt, context);
    }
  });
}

function declareStatement(stmt: Statement, context: SemanticContext): void {
  switch (stmt.kind) {
    case 'block':
      declareBlock(stmt, context);
      break;

    case 'if':
      checkExpression(stmt.condition, context);
      declareBlock(stmt.thenBlock, context);
      if (stmt.elseBlock) {
        declareBlock(stmt.elseBlock, context);
      }
      break;

    case 'while':
      checkExpression(stmt.condition, context);
      context.loopDepth++;
      logger.debug(`[sem] while enter (depth=${context.loopDepth}, scope=${context.currentPath()})`);
      try {
        declareBlock(stmt.body, context);
      } finally {
        context.loopDepth--;
      }
      break;

    case 'break':
    case 'continue':
      if (context.loopDepth <= 0) {
        throw new FlowControlError(`${stmt.kind} outside of loop`, stmt.location);
      }
      break;

    case 'expression':
      checkExpression(stmt.expression, context);
      break;

    case 'variable':
      declareVariable(stmt, context);
      break;

    case 'assignment':
      checkAssignmentTarget(stmt.target, context);
      checkExpression(stmt.value, context);
      break;

    case 'function':
    case 'getter':
    case 'setter':
      declareCallable(stmt, context);
      break;

    case 'return':
      if (stmt.argument) {
        checkExpression(stmt.argument, context);
      }
      break;
  }
}

function declareVariable(decl: VariableDeclaration, context: SemanticContext): void {
  const name = decl.identifier.name;
  const path = context.currentPath();
  logger.debug(`[sem] var declare: ${name} (scope=${path})`);
  if (!context.scopes.declareLocal(name, true)) {
    throw new RedefinitionError(`variable '${name}' already declared in this scope`, decl.identifier.location);
  }
  const symbol = context.scopes.lookupInCurrent(name);
  if (symbol) {
    symbol.declaration = decl;
  }
  context.symbolIndex.record(path, name, 'variable', 0);
}

function declareParameter(param: Parameter, context: SemanticContext): void {
  const name = param.name.name;
  const path = context.currentPath();
  logger.debug(`[sem] param declare: ${name} (scope=${path})`);
  if (!context.scopes.declareLocal(name, true)) {
    throw new RedefinitionError(`parameter '${name}' redeclared in the same scope`, param.location);
  }
  const symbol = context.scopes.lookupInCurrent(name);
  if (symbol) {
    symbol.kind = 'parameter';
    symbol.declaration = param;
  }
  context.symbolIndex.record(path, name, 'parameter', 0);
}

export function callableParameters(decl: CallableDeclaration): Parameter[] {
  switch (decl.kind) {
    case 'function':
      return decl.parameters;
    case 'getter':
      return [];
    case 'setter':
      return [decl.parameter];
  }
}

export function callableSymbolKind(decl: CallableDeclaration): SymbolKind {
  return decl.kind === 'function' ? 'function' : decl.kind;
}

/**
 * Registers the callable in the enclosing scope, then opens one frame that
 * holds its parameters together with the top-level statements of its body.
 */
function declareCallable(decl: CallableDeclaration, context: SemanticContext): void {
  const name = decl.name.name;
  const params = callableParameters(decl);
  logger.debug(`[sem] ${decl.kind} body: ${context.className()}.${name} (scope=${context.currentPath()})`);

  context.scopes.top()?.table.insert(callableFrameKey(name), 'function', true);
  context.symbolIndex.record(context.currentPath(), name, callableSymbolKind(decl), params.length);

  const outerLoopDepth = context.loopDepth;
  context.loopDepth = 0;
  try {
    context.enterBlock(decl.body, 'declare', () => {
      for (const param of params) {
        declareParameter(param, context);
      }
      for (const stmt of decl.body.body) {
        declareStatement(stmt, context);
      }
    });
  } finally {
    context.loopDepth = outerLoopDepth;
  }
}

/**
 * An assignment target must be a visible local or parameter, a property with a
 * setter, or a global-convention name.
 */
function checkAssignmentTarget(target: Identifier, context: SemanticContext): void {
  const name = target.name;
  logger.debug(`[sem] assign to: ${name} (scope=${context.currentPath()})`);

  if (isLocalSymbol(context.scopes.lookup(name))) {
    return;
  }
  if (context.registry.getAccessor('set', name)) {
    return;
  }
  if (isGlobalName(name)) {
    context.globals.track(name);
    return;
  }
  throw new DefinitionError(`assignment to undefined identifier '${name}'`, target.location);
}

function checkExpression(expr: Expression, context: SemanticContext): void {
  switch (expr.kind) {
    case 'literal':
    case 'identifier':
      break;
    case 'call':
      checkCall(expr, context);
      break;
    case 'unary':
      checkExpression(expr.operand, context);
      break;
    case 'binary':
      checkExpression(expr.left, context);
      checkExpression(expr.right, context);
      checkLiteralBinary(expr);
      break;
    case 'conditional':
      checkExpression(expr.test, context);
      checkExpression(expr.consequent, context);
      checkExpression(expr.alternate, context);
      break;
    case 'is':
      checkExpression(expr.operand, context);
      break;
  }
}

/**
 * Arity is checked when the callee is already known; unknown names wait for the
 * resolution pass.
 */
function checkCall(call: CallExpression, context: SemanticContext): void {
  const name = call.callee;
  const arity = call.arguments.length;
  logger.debug(`[sem] call: ${name}(arity=${arity})`);

  for (const arg of call.arguments) {
    checkExpression(arg, context);
  }

  const { registry } = context;
  if (registry.hasSignature(name, arity)) {
    if (isBuiltinQName(name)) {
      checkBuiltinLiteralArguments(call);
    }
    return;
  }

  const known = isBuiltinQName(name) ? registry.builtinArities(name).length > 0 : registry.hasOverload(name);
  if (known) {
    throw new ArgumentCountError(`wrong number of arguments for ${name} (arity=${arity})`, call.location);
  }
  logger.debug(`[sem]  -> unresolved callee in pass 1 (defer): ${name}`);
}

function checkBuiltinLiteralArguments(call: CallExpression): void {
  const spec = getParamSpec(call.callee);
  call.arguments.forEach((arg, index) => {
    const expected = spec[index];
    const actual = reduceLiteralKind(arg);
    if (!actual || !expected || expected === 'any') {
      return;
    }
    const actualKind = actual === 'string' ? 'string' : 'number';
    if (actualKind !== expected) {
      throw new ArgumentCountError(
        `argument ${index + 1} of ${call.callee} must be a ${expected}, got a ${actualKind} literal`,
        arg.location ?? call.location
      );
    }
  });
}
