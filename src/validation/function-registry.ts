import { InternalError, RedefinitionError } from '../errors';
import { SymbolTable } from '../symbols/symbol-table';
import { DataType, DeclarationNode, SourceLocation, SymbolData } from '../types';
import { logger } from '../logger';

export type AccessorKind = 'get' | 'set';

export function signatureKey(name: string, arity: number): string {
  return `${name}#${arity}`;
}

export function accessorKey(kind: AccessorKind, name: string): string {
  return `${kind}:${name}`;
}

export function overloadSentinelKey(name: string): string {
  return `@${name}`;
}

/**
 * Callable signatures of the program: builtins, user functions (overloaded by
 * arity) and property accessors. Uniqueness is enforced per owning class; the
 * same signature declared in another class is shared.
 */
export class FunctionRegistry {
  readonly table: SymbolTable;

  constructor(capacity?: number) {
    this.table = new SymbolTable(capacity);
  }

  registerBuiltin(qname: string, arity: number, returnType: DataType): void {
    const key = signatureKey(qname, arity);
    if (this.table.find(key)) {
      return;
    }
    const data = this.insert(key, 'function', true);
    data.id = qname;
    data.arity = arity;
    data.global = true;
    data.returnType = returnType;
  }

  registerFunction(name: string, arity: number, owner: string, declaration?: DeclarationNode, location?: SourceLocation): SymbolData {
    const key = signatureKey(name, arity);
    const data = this.registerOwned(key, name, arity, owner, declaration, () =>
      new RedefinitionError(`duplicate function signature ${name}/${arity} in class '${owner}'`, location)
    );
    this.table.insert(overloadSentinelKey(name), 'function', true);
    return data;
  }

  registerAccessor(kind: AccessorKind, name: string, owner: string, declaration?: DeclarationNode, location?: SourceLocation): SymbolData {
    const key = accessorKey(kind, name);
    const data = this.registerOwned(key, name, kind === 'set' ? 1 : 0, owner, declaration, () =>
      new RedefinitionError(`duplicate ${kind === 'get' ? 'getter' : 'setter'} for '${name}' in class '${owner}'`, location)
    );
    data.kind = kind === 'get' ? 'getter' : 'setter';
    return data;
  }

  private registerOwned(
    key: string,
    name: string,
    arity: number,
    owner: string,
    declaration: DeclarationNode | undefined,
    duplicate: () => RedefinitionError
  ): SymbolData {
    const existing = this.table.get(key);
    if (existing) {
      const owners = existing.owners ?? new Set<string>();
      if (owners.has(owner)) {
        throw duplicate();
      }
      owners.add(owner);
      existing.owners = owners;
      logger.debug(`[sem] signature ${key} shared with class '${owner}'`);
      return existing;
    }

    logger.debug(`[sem] insert signature ${key} (class-scope=${owner})`);
    const data = this.insert(key, 'function', false);
    data.id = name;
    data.arity = arity;
    data.global = true;
    data.scopeName = owner;
    data.owners = new Set([owner]);
    data.declaration = declaration;
    return data;
  }

  private insert(key: string, kind: 'function', defined: boolean): SymbolData {
    this.table.insert(key, kind, defined);
    const data = this.table.get(key);
    if (!data) {
      throw new InternalError(`failed to store signature '${key}'`);
    }
    return data;
  }

  hasSignature(name: string, arity: number): boolean {
    return this.table.find(signatureKey(name, arity)) !== null;
  }

  getSignature(name: string, arity: number): SymbolData | null {
    return this.table.get(signatureKey(name, arity));
  }

  /**
   * True when at least one user overload of `name` exists, whatever its arity.
   */
  hasOverload(name: string): boolean {
    return this.table.find(overloadSentinelKey(name)) !== null;
  }

  getAccessor(kind: AccessorKind, name: string): SymbolData | null {
    return this.table.get(accessorKey(kind, name));
  }

  /**
   * Arities registered for a builtin, in ascending order.
   */
  builtinArities(qname: string): number[] {
    const arities: number[] = [];
    this.table.forEach((key, data) => {
      if (data.id === qname && key === signatureKey(qname, data.arity)) {
        arities.push(data.arity);
      }
    });
    return arities.sort((a, b) => a - b);
  }

  dispose(): void {
    this.table.dispose();
  }
}
