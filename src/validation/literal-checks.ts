import { ExpressionTypeError } from '../errors';
import { BinaryExpression, Expression } from '../types';

/**
 * Coarse kind of an expression built only from literals.
 */
export type LiteralKind = 'int' | 'float' | 'string';

function isNumericKind(kind: LiteralKind): boolean {
  return kind === 'int' || kind === 'float';
}

/**
 * Kind of `expr` when it reduces to a pure literal of known kind, otherwise null.
 * Null and boolean literals have no kind here.
 */
export function reduceLiteralKind(expr: Expression): LiteralKind | null {
  switch (expr.kind) {
    case 'literal':
      if (expr.literalType === 'int' || expr.literalType === 'float' || expr.literalType === 'string') {
        return expr.literalType;
      }
      return null;
    case 'binary':
      return reduceBinary(expr);
    default:
      return null;
  }
}

function reduceBinary(expr: BinaryExpression): LiteralKind | null {
  const left = reduceLiteralKind(expr.left);
  const right = reduceLiteralKind(expr.right);
  if (!left || !right) {
    return null;
  }
  const numeric = isNumericKind(left) && isNumericKind(right);
  switch (expr.operator) {
    case '+':
      if (numeric) {
        return left === 'int' && right === 'int' ? 'int' : 'float';
      }
      return left === 'string' && right === 'string' ? 'string' : null;
    case '-':
      if (!numeric) return null;
      return left === 'int' && right === 'int' ? 'int' : 'float';
    case '/':
      return numeric ? 'float' : null;
    case '*':
      if (numeric) {
        return left === 'int' && right === 'int' ? 'int' : 'float';
      }
      return left === 'string' && right === 'int' ? 'string' : null;
    default:
      return null;
  }
}

/**
 * Rejects an operator applied to two literal operands of incompatible kinds.
 * Nothing is checked unless both sides reduce to literals.
 *
 * String repetition is only accepted with the string on the left here, which is
 * stricter than the rule applied once types are inferred.
 */
export function checkLiteralBinary(expr: BinaryExpression): void {
  const left = reduceLiteralKind(expr.left);
  const right = reduceLiteralKind(expr.right);
  if (!left || !right) {
    return;
  }
  const numeric = isNumericKind(left) && isNumericKind(right);

  switch (expr.operator) {
    case '+':
      if (!numeric && !(left === 'string' && right === 'string')) {
        throw new ExpressionTypeError(`invalid literal '+' operands (${left}, ${right})`, expr.location);
      }
      break;
    case '-':
    case '/':
      if (!numeric) {
        throw new ExpressionTypeError(`invalid literal '${expr.operator}' operands (${left}, ${right})`, expr.location);
      }
      break;
    case '*':
      if (!numeric && !(left === 'string' && right === 'int')) {
        throw new ExpressionTypeError(`invalid literal '*' operands (${left}, ${right})`, expr.location);
      }
      break;
    case '<':
    case '<=':
    case '>':
    case '>=':
      if (!numeric) {
        throw new ExpressionTypeError(`relational operator '${expr.operator}' requires numeric literals (${left}, ${right})`, expr.location);
      }
      break;
    default:
      break;
  }
}
