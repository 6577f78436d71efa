// Metadata for the IFJ25 standard library (the `Ifj` namespace)

import { DataType } from './types';
import type { FunctionRegistry } from './validation/function-registry';

export const BUILTIN_PREFIX = 'Ifj.';

/**
 * Coarse compile-time kind of one builtin parameter.
 * 'any' leaves the argument unchecked.
 */
export type BuiltinParamKind = 'any' | 'string' | 'number';

export type BuiltinExtension = 'boolthen' | 'statican';

export interface BuiltinExtensions {
  boolthen: boolean;
  statican: boolean;
}

export interface BuiltinSpec {
  qname: string;
  params: readonly BuiltinParamKind[];
  returnType: DataType;
  extension?: BuiltinExtension;
}

export const BUILTINS: readonly BuiltinSpec[] = [
  // I/O
  { qname: 'Ifj.read_str', params: [], returnType: 'unknown' },
  { qname: 'Ifj.read_num', params: [], returnType: 'unknown' },
  { qname: 'Ifj.write', params: ['any'], returnType: 'null' },

  // Conversions
  { qname: 'Ifj.floor', params: ['number'], returnType: 'int' },
  { qname: 'Ifj.str', params: ['any'], returnType: 'string' },

  // Strings
  { qname: 'Ifj.length', params: ['string'], returnType: 'int' },
  { qname: 'Ifj.substring', params: ['string', 'number', 'number'], returnType: 'unknown' },
  { qname: 'Ifj.strcmp', params: ['string', 'string'], returnType: 'int' },
  { qname: 'Ifj.ord', params: ['string', 'number'], returnType: 'int' },
  { qname: 'Ifj.chr', params: ['number'], returnType: 'string' },

  // Extensions
  { qname: 'Ifj.read_bool', params: [], returnType: 'unknown', extension: 'boolthen' },
  { qname: 'Ifj.is_int', params: ['any'], returnType: 'bool', extension: 'statican' }
];

export const defaultExtensions: BuiltinExtensions = { boolthen: false, statican: false };

export function isBuiltinQName(name: string): boolean {
  return name.startsWith(BUILTIN_PREFIX);
}

export function getBuiltin(qname: string): BuiltinSpec | undefined {
  return BUILTINS.find(b => b.qname === qname);
}

/**
 * Parameter kinds of a builtin in declaration order, or an empty list for unknown names.
 */
export function getParamSpec(qname: string): readonly BuiltinParamKind[] {
  return getBuiltin(qname)?.params ?? [];
}

export function isBuiltinEnabled(spec: BuiltinSpec, config: BuiltinExtensions): boolean {
  return spec.extension === undefined || config[spec.extension];
}

/**
 * Registers every enabled builtin under "<qname>#<arity>". Already present keys are left as they are.
 */
export function installBuiltins(registry: FunctionRegistry, config: BuiltinExtensions = defaultExtensions): void {
  for (const spec of BUILTINS) {
    if (isBuiltinEnabled(spec, config)) {
      registry.registerBuiltin(spec.qname, spec.params.length, spec.returnType);
    }
  }
}
