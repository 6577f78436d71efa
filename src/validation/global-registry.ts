import { DataType } from '../types';
import { learnAssignedType } from '../type-utils';

export const GLOBAL_PREFIX = '__';

/**
 * Names starting with "__" are implicitly declared program-wide state.
 */
export function isGlobalName(name: string): boolean {
  return name.startsWith(GLOBAL_PREFIX);
}

/**
 * Global-convention identifiers seen as assignment targets, with the types
 * learned for them. Lives across both passes so the code generator can read it
 * afterwards; reset before every analysis run.
 */
export class GlobalRegistry {
  private readonly names: string[] = [];
  private readonly types = new Map<string, DataType>();

  reset(): void {
    this.names.length = 0;
    this.types.clear();
  }

  /**
   * Records `name` once, in first-seen order.
   */
  track(name: string): void {
    if (!this.types.has(name)) {
      this.names.push(name);
      this.types.set(name, 'unknown');
    }
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  typeOf(name: string): DataType {
    return this.types.get(name) ?? 'unknown';
  }

  learn(name: string, assigned: DataType): DataType {
    this.track(name);
    const next = learnAssignedType(this.typeOf(name), assigned);
    this.types.set(name, next);
    return next;
  }

  get size(): number {
    return this.names.length;
  }

  /**
   * Copy of the tracked names; the caller owns the returned array.
   */
  takeNames(): string[] {
    return [...this.names];
  }

  takeTypes(): Map<string, DataType> {
    return new Map(this.types);
  }
}
