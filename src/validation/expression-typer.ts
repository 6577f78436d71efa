import { BuiltinParamKind, getParamSpec, isBuiltinQName } from '../builtins';
import { ArgumentCountError, DefinitionError, ExpressionTypeError } from '../errors';
import { logger } from '../logger';
import {
  binaryResultType, isKnownType, isNumericType, literalDataType, typeToString
} from '../type-utils';
import {
  BinaryExpression, CallExpression, DataType, Expression, Identifier, TypeTestExpression
} from '../types';
import { SemanticContext } from './context';
import { isLocalSymbol } from './declaration-pass';
import { isGlobalName } from './global-registry';

export const TYPE_TEST_NAMES: readonly string[] = ['Num', 'String', 'Null'];

/**
 * Infers the type of `expr` bottom-up, resolving every identifier and call on
 * the way. The result is also stored on the node as `inferredType`.
 */
export function inferExpression(expr: Expression, context: SemanticContext): DataType {
  const type = inferExpressionType(expr, context);
  expr.inferredType = type;
  return type;
}

function inferExpressionType(expr: Expression, context: SemanticContext): DataType {
  switch (expr.kind) {
    case 'literal':
      return literalDataType(expr);
    case 'identifier':
      return resolveIdentifier(expr, context);
    case 'call':
      return inferCall(expr, context);
    case 'unary':
      inferExpression(expr.operand, context);
      return 'bool';
    case 'binary':
      return inferBinary(expr, context);
    case 'conditional':
      inferExpression(expr.test, context);
      inferExpression(expr.consequent, context);
      inferExpression(expr.alternate, context);
      return 'unknown';
    case 'is':
      return inferTypeTest(expr, context);
  }
}

/**
 * Resolution order: local or parameter, then accessor, then global-convention name.
 */
export function resolveIdentifier(identifier: Identifier, context: SemanticContext): DataType {
  const name = identifier.name;
  const symbol = context.scopes.lookup(name);
  if (isLocalSymbol(symbol)) {
    identifier.codegenName = symbol.codegenName;
    identifier.resolvedAs = symbol.kind === 'parameter' ? 'parameter' : 'local';
    return symbol.dataType;
  }

  const getter = context.registry.getAccessor('get', name);
  if (getter) {
    identifier.resolvedAs = 'getter';
    return getter.returnType ?? 'unknown';
  }
  if (context.registry.getAccessor('set', name)) {
    throw new DefinitionError(`property '${name}' has a setter but no getter and cannot be read`, identifier.location);
  }

  if (isGlobalName(name)) {
    identifier.resolvedAs = 'global';
    context.globals.track(name);
    return context.globals.typeOf(name);
  }

  throw new DefinitionError(`undefined identifier '${name}'`, identifier.location);
}

function inferCall(call: CallExpression, context: SemanticContext): DataType {
  const argTypes = call.arguments.map(arg => inferExpression(arg, context));
  const name = call.callee;
  const arity = call.arguments.length;
  const signature = context.registry.getSignature(name, arity);

  if (isBuiltinQName(name)) {
    if (!signature) {
      throw new ArgumentCountError(`no builtin ${name} taking ${arity} argument(s)`, call.location);
    }
    checkBuiltinArgumentTypes(call, argTypes);
    call.codegenName = name;
    call.signature = `${name}#${arity}`;
    return signature.returnType ?? 'unknown';
  }

  if (signature) {
    call.codegenName = `${name}$${arity}`;
    call.signature = `${name}#${arity}`;
    return signature.returnType ?? 'unknown';
  }
  if (context.registry.hasOverload(name)) {
    throw new ArgumentCountError(`wrong number of arguments for ${name} (arity=${arity})`, call.location);
  }
  throw new DefinitionError(`call to undefined function '${name}'`, call.location);
}

function matchesParamKind(kind: BuiltinParamKind, type: DataType): boolean {
  switch (kind) {
    case 'any':
      return true;
    case 'string':
      return type === 'string';
    case 'number':
      return isNumericType(type);
  }
}

// Only arguments of statically known type are checked
function checkBuiltinArgumentTypes(call: CallExpression, argTypes: DataType[]): void {
  const spec = getParamSpec(call.callee);
  argTypes.forEach((type, index) => {
    const expected = spec[index];
    if (expected && isKnownType(type) && !matchesParamKind(expected, type)) {
      throw new ArgumentCountError(
        `argument ${index + 1} of ${call.callee} must be a ${expected}, got ${typeToString(type)}`,
        call.arguments[index].location ?? call.location
      );
    }
  });
}

function inferBinary(expr: BinaryExpression, context: SemanticContext): DataType {
  const left = inferExpression(expr.left, context);
  const right = inferExpression(expr.right, context);
  const result = binaryResultType(expr.operator, left, right);
  if (result === null) {
    throw new ExpressionTypeError(
      `operator '${expr.operator}' cannot be applied to types '${typeToString(left)}' and '${typeToString(right)}'`,
      expr.location
    );
  }
  logger.debug(`[sem] ${typeToString(left)} ${expr.operator} ${typeToString(right)} -> ${typeToString(result)}`);
  return result;
}

function inferTypeTest(expr: TypeTestExpression, context: SemanticContext): DataType {
  inferExpression(expr.operand, context);
  const typeName = expr.typeName;
  if (typeName.kind !== 'identifier' || !TYPE_TEST_NAMES.includes(typeName.name)) {
    throw new ExpressionTypeError(`right side of 'is' must be one of ${TYPE_TEST_NAMES.join(', ')}`, typeName.location ?? expr.location);
  }
  return 'bool';
}
