import { typeToString } from '../type-utils';
import { DataType, ScopedSymbol } from '../types';

const RULE = '-'.repeat(59);

/**
 * Renders symbols grouped by scope, one table per scope. Rows are expected to be
 * sorted by scope already.
 */
export function formatScopedSymbols(rows: ScopedSymbol[]): string {
  if (rows.length === 0) {
    return '(no symbols)\n';
  }

  const lines: string[] = [];
  let currentScope: string | undefined;
  for (const row of rows) {
    if (row.scope !== currentScope) {
      currentScope = row.scope;
      lines.push(RULE, `Scope: ${currentScope}`, RULE);
      lines.push(`${'Name'.padEnd(20)} ${'Kind'.padEnd(10)} Arity`);
    }
    lines.push(`${row.name.padEnd(20)} ${row.kind.padEnd(10)} ${row.arity}`);
  }
  lines.push(RULE);
  return lines.join('\n') + '\n';
}

export function formatGlobals(names: string[], types: Map<string, DataType>): string {
  if (names.length === 0) {
    return '(no globals)\n';
  }
  return names.map(name => `${name}: ${typeToString(types.get(name) ?? 'unknown')}`).join('\n') + '\n';
}
