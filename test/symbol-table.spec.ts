import { describe, it, expect } from 'vitest';
import { SymbolTable, hashKey, DEFAULT_TABLE_CAPACITY } from '../src/symbols/symbol-table';
import { InternalError } from '../src/errors';

describe('SymbolTable', () => {
  describe('hashKey', () => {
    it('should start from the djb2 seed', () => {
      expect(hashKey('')).toBe(5381);
      expect(hashKey('a')).toBe(5381 * 33 + 97);
    });

    it('should stay within 32 unsigned bits for long keys', () => {
      const hash = hashKey('x'.repeat(200));
      expect(hash).toBeGreaterThanOrEqual(0);
      expect(hash).toBeLessThan(2 ** 32);
    });
  });

  it('should use the default capacity', () => {
    expect(new SymbolTable().capacity).toBe(DEFAULT_TABLE_CAPACITY);
  });

  it('should insert and find entries with default data', () => {
    const table = new SymbolTable(17);
    table.insert('x', 'variable', true);

    const entry = table.find('x');
    expect(entry?.key).toBe('x');
    expect(entry?.data).toEqual({
      id: 'x',
      kind: 'variable',
      dataType: 'unknown',
      defined: true,
      global: false,
      arity: 0,
      scopeName: null
    });
    expect(table.find('y')).toBeNull();
    expect(table.get('y')).toBeNull();
  });

  it('should leave the original entry untouched on repeated insert', () => {
    const table = new SymbolTable(17);
    table.insert('x', 'variable', true);
    const data = table.get('x');
    if (!data) throw new Error('missing x');
    data.dataType = 'int';

    table.insert('x', 'function', false);

    expect(table.size).toBe(1);
    expect(table.get('x')).toBe(data);
    expect(data.kind).toBe('variable');
    expect(data.dataType).toBe('int');
  });

  it('should resolve collisions by probing', () => {
    const table = new SymbolTable(2);
    table.insert('a', 'variable', true);
    table.insert('b', 'variable', true);

    expect(table.size).toBe(2);
    expect(table.get('a')?.id).toBe('a');
    expect(table.get('b')?.id).toBe('b');
  });

  it('should fail with an internal error when full', () => {
    const table = new SymbolTable(1);
    table.insert('a', 'variable', true);
    expect(() => table.insert('b', 'variable', true)).toThrow(InternalError);
    expect(() => table.insert('b', 'variable', true)).toThrow("symbol table full (capacity 1) while inserting 'b'");
  });

  it('should reject invalid capacities', () => {
    expect(() => new SymbolTable(0)).toThrow(InternalError);
    expect(() => new SymbolTable(2.5)).toThrow('invalid symbol table capacity 2.5');
  });

  it('should visit every entry and forget them on dispose', () => {
    const table = new SymbolTable(7);
    table.insert('a', 'variable', true);
    table.insert('b', 'parameter', true);

    const keys: string[] = [];
    table.forEach(key => keys.push(key));
    expect(keys.sort()).toEqual(['a', 'b']);

    table.dispose();
    expect(table.size).toBe(0);
    expect(table.find('a')).toBeNull();
  });
});
