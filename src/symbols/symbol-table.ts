import { InternalError } from '../errors';
import { SymbolData, SymbolEntry, SymbolKind } from '../types';

export const DEFAULT_TABLE_CAPACITY = 16381;

/**
 * djb2 over UTF-16 code units, kept in 32 bits.
 */
export function hashKey(key: string): number {
  let hash = 5381;
  for (let i = 0; i < key.length; i++) {
    hash = ((hash << 5) + hash + key.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Open-addressed hash table from string keys to symbol data.
 *
 * Collisions are resolved by linear probing with wraparound. The capacity is
 * fixed at construction; entries are never removed or moved.
 */
export class SymbolTable {
  private readonly slots: Array<SymbolEntry | undefined>;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_TABLE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new InternalError(`invalid symbol table capacity ${capacity}`);
    }
    this.slots = new Array<SymbolEntry | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  find(key: string): SymbolEntry | null {
    const start = hashKey(key) % this.capacity;
    let index = start;
    do {
      const slot = this.slots[index];
      if (slot && slot.key === key) {
        return slot;
      }
      index = (index + 1) % this.capacity;
    } while (index !== start);
    return null;
  }

  /**
   * Inserts a fresh record under `key`. Does nothing when the key is already present.
   */
  insert(key: string, kind: SymbolKind, defined: boolean): void {
    if (this.find(key)) {
      return;
    }
    if (this.count >= this.capacity) {
      throw new InternalError(`symbol table full (capacity ${this.capacity}) while inserting '${key}'`);
    }

    let index = hashKey(key) % this.capacity;
    while (this.slots[index]) {
      index = (index + 1) % this.capacity;
    }

    this.slots[index] = {
      key,
      data: {
        id: key,
        kind,
        dataType: 'unknown',
        defined,
        global: false,
        arity: 0,
        scopeName: null
      }
    };
    this.count++;
  }

  get(key: string): SymbolData | null {
    const entry = this.find(key);
    return entry ? entry.data : null;
  }

  forEach(callback: (key: string, data: SymbolData) => void): void {
    for (const slot of this.slots) {
      if (slot) {
        callback(slot.key, slot.data);
      }
    }
  }

  dispose(): void {
    this.slots.fill(undefined);
    this.count = 0;
  }
}
