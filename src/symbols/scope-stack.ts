import { InternalError } from '../errors';
import { SymbolData } from '../types';
import { SymbolTable } from './symbol-table';

export const MAX_SCOPE_DEPTH = 32;
export const FRAME_CAPACITY = 1021;

interface ScopePathFrame {
  path: string;
  childCount: number;
}

/**
 * Produces hierarchical labels for nested blocks: "1", "1.1", "1.2", "1.2.1", ...
 * Siblings are numbered in the order they are entered.
 */
export class ScopePathStack {
  private readonly frames: ScopePathFrame[] = [];
  private rootCount = 0;

  get depth(): number {
    return this.frames.length;
  }

  enterRoot(): string {
    if (this.frames.length > 0) {
      throw new InternalError(`cannot open a root scope inside '${this.current()}'`);
    }
    this.rootCount++;
    const frame = { path: String(this.rootCount), childCount: 0 };
    this.frames.push(frame);
    return frame.path;
  }

  enterChild(): string {
    const parent = this.frames[this.frames.length - 1];
    if (!parent) {
      return this.enterRoot();
    }
    if (this.frames.length >= MAX_SCOPE_DEPTH) {
      throw new InternalError(`scope nesting exceeds ${MAX_SCOPE_DEPTH} levels at '${parent.path}'`);
    }
    parent.childCount++;
    const frame = { path: `${parent.path}.${parent.childCount}`, childCount: 0 };
    this.frames.push(frame);
    return frame.path;
  }

  leave(): void {
    if (!this.frames.pop()) {
      throw new InternalError('scope path stack underflow');
    }
  }

  current(): string {
    const top = this.frames[this.frames.length - 1];
    return top ? top.path : 'global';
  }
}

export interface ScopeFrame {
  table: SymbolTable;
  path: string;
}

/**
 * LIFO stack of block scopes. Each frame carries its own symbol table and the
 * path label of the block, so the two are always pushed and popped together.
 */
export class ScopeStack {
  private readonly frames: ScopeFrame[] = [];
  private readonly paths = new ScopePathStack();

  constructor(private readonly frameCapacity: number = FRAME_CAPACITY) {}

  get depth(): number {
    return this.frames.length;
  }

  isEmpty(): boolean {
    return this.frames.length === 0;
  }

  /**
   * Opens a block: a fresh symbol table plus the next path label.
   */
  push(): ScopeFrame {
    if (this.frames.length >= MAX_SCOPE_DEPTH) {
      throw new InternalError(`scope nesting exceeds ${MAX_SCOPE_DEPTH} levels at '${this.currentPath()}'`);
    }
    const path = this.paths.enterChild();
    const frame: ScopeFrame = { table: new SymbolTable(this.frameCapacity), path };
    this.frames.push(frame);
    return frame;
  }

  pop(): ScopeFrame {
    const frame = this.frames.pop();
    if (!frame) {
      throw new InternalError('scope stack underflow');
    }
    this.paths.leave();
    frame.table.dispose();
    return frame;
  }

  top(): ScopeFrame | null {
    return this.frames[this.frames.length - 1] ?? null;
  }

  currentPath(): string {
    return this.paths.current();
  }

  /**
   * Declares `name` in the innermost frame. Fails only when that frame already
   * holds the name; shadowing an outer frame is always allowed.
   */
  declareLocal(name: string, defined: boolean): boolean {
    const frame = this.top();
    if (!frame || frame.table.find(name)) {
      return false;
    }
    frame.table.insert(name, 'variable', defined);
    return true;
  }

  lookupInCurrent(name: string): SymbolData | null {
    const frame = this.top();
    return frame ? frame.table.get(name) : null;
  }

  lookup(name: string): SymbolData | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const data = this.frames[i].table.get(name);
      if (data) {
        return data;
      }
    }
    return null;
  }

  /**
   * Runs `body` inside a new frame and pops it afterwards, also when `body` throws.
   */
  withScope<T>(body: (frame: ScopeFrame) => T): T {
    const frame = this.push();
    try {
      return body(frame);
    } finally {
      this.pop();
    }
  }

  dispose(): void {
    while (this.frames.length > 0) {
      this.pop();
    }
  }
}
