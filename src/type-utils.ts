import { BinaryOperator, DataType, Literal } from './types';

const typeNames: Record<DataType, string> = {
  null: 'Null',
  int: 'Int',
  double: 'Double',
  string: 'String',
  bool: 'Bool',
  void: 'Void',
  unknown: 'Unknown'
};

export function typeToString(type: DataType): string {
  return typeNames[type];
}

export function isNumericType(type: DataType): boolean {
  return type === 'int' || type === 'double';
}

export function isStringType(type: DataType): boolean {
  return type === 'string';
}

export function isBooleanType(type: DataType): boolean {
  return type === 'bool';
}

/**
 * Unknown and Void carry no static information; checks involving them are skipped.
 */
export function isKnownType(type: DataType): boolean {
  return type !== 'unknown' && type !== 'void';
}

// double wins over int
export function getCommonNumericType(left: DataType, right: DataType): DataType {
  if (!isNumericType(left) || !isNumericType(right)) {
    return 'unknown';
  }
  return left === 'double' || right === 'double' ? 'double' : 'int';
}

export function literalDataType(literal: Literal): DataType {
  switch (literal.literalType) {
    case 'int':
      return 'int';
    case 'float':
      return 'double';
    case 'string':
      return 'string';
    case 'bool':
      return 'bool';
    case 'null':
      return 'null';
  }
}

export function isRelationalOperator(operator: BinaryOperator): boolean {
  return operator === '<' || operator === '<=' || operator === '>' || operator === '>=';
}

export function isEqualityOperator(operator: BinaryOperator): boolean {
  return operator === '==' || operator === '!=';
}

export function isLogicalOperator(operator: BinaryOperator): boolean {
  return operator === '&&' || operator === '||';
}

/**
 * Result type of `left <operator> right`, or null when the combination is illegal.
 * When either side is Unknown or Void nothing is checked: relational, equality
 * and logical operators still yield Bool, everything else yields Unknown.
 */
export function binaryResultType(operator: BinaryOperator, left: DataType, right: DataType): DataType | null {
  const booleanResult = isRelationalOperator(operator) || isEqualityOperator(operator) || isLogicalOperator(operator);
  if (!isKnownType(left) || !isKnownType(right)) {
    return booleanResult ? 'bool' : 'unknown';
  }

  switch (operator) {
    case '+':
      if (isNumericType(left) && isNumericType(right)) {
        return getCommonNumericType(left, right);
      }
      return isStringType(left) && isStringType(right) ? 'string' : null;
    case '-':
    case '/':
      return isNumericType(left) && isNumericType(right) ? getCommonNumericType(left, right) : null;
    case '*':
      if (isNumericType(left) && isNumericType(right)) {
        return getCommonNumericType(left, right);
      }
      if ((isStringType(left) && right === 'int') || (left === 'int' && isStringType(right))) {
        return 'string';
      }
      return null;
    case '++':
      return isStringType(left) && isStringType(right) ? 'string' : null;
    case '<':
    case '<=':
    case '>':
    case '>=':
      return isNumericType(left) && isNumericType(right) ? 'bool' : null;
    case '==':
    case '!=':
      return 'bool';
    case '&&':
    case '||':
      return isBooleanType(left) && isBooleanType(right) ? 'bool' : null;
  }
}

/**
 * Type of a symbol after a value of type `assigned` is stored into it.
 *
 * An unset (Unknown, Void or Null) symbol adopts a known assigned type and
 * stays as it is otherwise. A symbol with a concrete type widens between
 * numeric types, keeps an equal type, and degrades to Unknown for anything
 * else, a value of unknown type included.
 */
export function learnAssignedType(current: DataType, assigned: DataType): DataType {
  if (current === 'unknown' || current === 'void' || current === 'null') {
    return isKnownType(assigned) ? assigned : current;
  }
  if (!isKnownType(assigned)) {
    return 'unknown';
  }
  if (isNumericType(current) && isNumericType(assigned)) {
    return getCommonNumericType(current, assigned);
  }
  if (current === assigned) {
    return current;
  }
  return 'unknown';
}
