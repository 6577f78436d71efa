import { describe, it, expect } from 'vitest';
import {
  binaryResultType, getCommonNumericType, learnAssignedType, literalDataType, typeToString
} from '../src/type-utils';
import { float, nil, str } from '../src/ast/builders';

describe('Type utilities', () => {
  it('should name types', () => {
    expect(typeToString('int')).toBe('Int');
    expect(typeToString('double')).toBe('Double');
    expect(typeToString('unknown')).toBe('Unknown');
  });

  it('should map literals to types', () => {
    expect(literalDataType(float(1.5))).toBe('double');
    expect(literalDataType(str('a'))).toBe('string');
    expect(literalDataType(nil())).toBe('null');
  });

  it('should widen numeric types', () => {
    expect(getCommonNumericType('int', 'int')).toBe('int');
    expect(getCommonNumericType('int', 'double')).toBe('double');
    expect(getCommonNumericType('string', 'int')).toBe('unknown');
  });

  describe('binaryResultType', () => {
    it('should type arithmetic', () => {
      expect(binaryResultType('+', 'int', 'int')).toBe('int');
      expect(binaryResultType('+', 'int', 'double')).toBe('double');
      expect(binaryResultType('+', 'string', 'string')).toBe('string');
      expect(binaryResultType('+', 'string', 'int')).toBeNull();
      expect(binaryResultType('-', 'string', 'string')).toBeNull();
      expect(binaryResultType('/', 'int', 'int')).toBe('int');
    });

    it('should accept string repetition in either order', () => {
      expect(binaryResultType('*', 'string', 'int')).toBe('string');
      expect(binaryResultType('*', 'int', 'string')).toBe('string');
      expect(binaryResultType('*', 'string', 'double')).toBeNull();
    });

    it('should type concatenation, comparison and logic', () => {
      expect(binaryResultType('++', 'string', 'string')).toBe('string');
      expect(binaryResultType('++', 'string', 'int')).toBeNull();
      expect(binaryResultType('<', 'int', 'double')).toBe('bool');
      expect(binaryResultType('<', 'string', 'string')).toBeNull();
      expect(binaryResultType('==', 'string', 'int')).toBe('bool');
      expect(binaryResultType('&&', 'bool', 'bool')).toBe('bool');
      expect(binaryResultType('||', 'bool', 'int')).toBeNull();
    });

    it('should skip checks when a side is unknown or void', () => {
      expect(binaryResultType('+', 'unknown', 'string')).toBe('unknown');
      expect(binaryResultType('-', 'void', 'bool')).toBe('unknown');
      expect(binaryResultType('<', 'unknown', 'string')).toBe('bool');
      expect(binaryResultType('&&', 'int', 'unknown')).toBe('bool');
    });
  });

  describe('learnAssignedType', () => {
    it('should adopt the first known type', () => {
      expect(learnAssignedType('unknown', 'int')).toBe('int');
      expect(learnAssignedType('void', 'string')).toBe('string');
      expect(learnAssignedType('null', 'bool')).toBe('bool');
    });

    it('should leave an unset symbol alone for unknown values', () => {
      expect(learnAssignedType('unknown', 'unknown')).toBe('unknown');
      expect(learnAssignedType('null', 'void')).toBe('null');
    });

    it('should degrade a concrete type for unknown values', () => {
      expect(learnAssignedType('int', 'unknown')).toBe('unknown');
      expect(learnAssignedType('string', 'void')).toBe('unknown');
    });

    it('should widen, keep or degrade', () => {
      expect(learnAssignedType('int', 'double')).toBe('double');
      expect(learnAssignedType('double', 'int')).toBe('double');
      expect(learnAssignedType('string', 'string')).toBe('string');
      expect(learnAssignedType('string', 'int')).toBe('unknown');
      expect(learnAssignedType('int', 'null')).toBe('unknown');
    });
  });
});
