import { BuiltinExtensions, defaultExtensions, installBuiltins } from '../../src/builtins';
import { SemanticContext } from '../../src/validation/context';
import { FunctionRegistry } from '../../src/validation/function-registry';
import { GlobalRegistry } from '../../src/validation/global-registry';

export function createContext(extensions: BuiltinExtensions = defaultExtensions): SemanticContext {
  const registry = new FunctionRegistry();
  installBuiltins(registry, extensions);
  return new SemanticContext(registry, new GlobalRegistry(), extensions);
}
