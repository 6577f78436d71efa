import { BuiltinExtensions } from '../builtins';
import { InternalError } from '../errors';
import { logger } from '../logger';
import { ScopeFrame, ScopeStack } from '../symbols/scope-stack';
import { SymbolTable } from '../symbols/symbol-table';
import { BlockStatement, ClassDeclaration, ScopedSymbol, SymbolKind } from '../types';
import { FunctionRegistry } from './function-registry';
import { GlobalRegistry } from './global-registry';

export type PassName = 'declare' | 'resolve';

/**
 * Block paths assigned by the declaration pass, keyed by block node. The
 * resolution pass checks its own numbering against them.
 */
export type BlockPathCache = WeakMap<BlockStatement, string>;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Every symbol declared anywhere in the program, keyed "<scope>::<name>".
 */
export class ScopedSymbolIndex {
  private readonly table = new SymbolTable();

  record(scope: string, name: string, kind: SymbolKind, arity: number): void {
    const key = kind === 'getter' || kind === 'setter'
      ? `${scope}::${name}@${kind === 'getter' ? 'get' : 'set'}`
      : `${scope}::${name}`;
    if (this.table.find(key)) {
      return;
    }
    this.table.insert(key, kind, true);
    const data = this.table.get(key);
    if (!data) {
      throw new InternalError(`failed to record symbol '${key}'`);
    }
    data.id = name;
    data.arity = arity;
    data.scopeName = scope;
  }

  /**
   * Sorted by scope, then name, then kind and arity.
   */
  list(): ScopedSymbol[] {
    const rows: ScopedSymbol[] = [];
    this.table.forEach((_key, data) => {
      rows.push({ scope: data.scopeName ?? 'global', name: data.id, kind: data.kind, arity: data.arity });
    });
    return rows.sort((a, b) =>
      compareText(a.scope, b.scope)
      || compareText(a.name, b.name)
      || compareText(a.kind, b.kind)
      || a.arity - b.arity
    );
  }
}

/**
 * Working state of one analysis run. The registry, the global registry and the
 * block-path cache outlive the individual passes; the scope stack belongs to
 * whichever pass is walking.
 */
export class SemanticContext {
  scopes = new ScopeStack();
  loopDepth = 0;
  seenMain = false;
  currentClass?: ClassDeclaration;
  readonly blockPaths: BlockPathCache = new WeakMap();
  readonly symbolIndex = new ScopedSymbolIndex();

  constructor(
    readonly registry: FunctionRegistry,
    readonly globals: GlobalRegistry,
    readonly extensions: BuiltinExtensions
  ) {}

  /**
   * Replaces the scope stack with an empty one for the next pass.
   */
  resetScopes(): void {
    this.scopes.dispose();
    this.scopes = new ScopeStack();
    this.loopDepth = 0;
    this.currentClass = undefined;
  }

  /**
   * Opens the scope of `block`, runs `body`, and closes the scope again. This is
   * the only place where frames are pushed during a walk.
   */
  enterBlock<T>(block: BlockStatement, pass: PassName, body: (frame: ScopeFrame) => T): T {
    return this.scopes.withScope(frame => {
      this.bindBlockPath(block, frame.path, pass);
      logger.debug(`[sem] scope PUSH ${frame.path} (${pass})`);
      const result = body(frame);
      logger.debug(`[sem] scope POP ${frame.path} (${pass})`);
      return result;
    });
  }

  private bindBlockPath(block: BlockStatement, path: string, pass: PassName): void {
    if (pass === 'declare') {
      this.blockPaths.set(block, path);
      block.scopePath = path;
      return;
    }
    const expected = this.blockPaths.get(block);
    if (expected !== path) {
      throw new InternalError(`scope path drift: block labelled '${expected ?? 'none'}' was re-entered as '${path}'`, block.location);
    }
  }

  currentPath(): string {
    return this.scopes.currentPath();
  }

  className(): string {
    return this.currentClass?.name.name ?? '(anonymous)';
  }
}
