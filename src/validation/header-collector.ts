import { DefinitionError } from '../errors';
import { logger } from '../logger';
import { BlockStatement, FunctionDeclaration, Program } from '../types';
import { SemanticContext } from './context';

export const MAIN_FUNCTION = 'main';

/**
 * Collects every function, getter and setter signature of the program into the
 * registry and verifies that `main()` exists with no parameters.
 */
export function collectHeaders(program: Program, context: SemanticContext): void {
  for (const classDecl of program.classes) {
    context.currentClass = classDecl;
    collectFromBlock(classDecl.body, classDecl.name.name, context);
  }
  context.currentClass = undefined;

  if (!context.seenMain) {
    throw new DefinitionError(`missing ${MAIN_FUNCTION}() with 0 parameters`, program.location);
  }
}

// Nested blocks are searched; callable bodies are not.
function collectFromBlock(block: BlockStatement, owner: string, context: SemanticContext): void {
  for (const stmt of block.body) {
    switch (stmt.kind) {
      case 'function':
        collectFunction(stmt, owner, context);
        break;
      case 'getter':
        context.registry.registerAccessor('get', stmt.name.name, owner, stmt, stmt.location);
        break;
      case 'setter':
        context.registry.registerAccessor('set', stmt.name.name, owner, stmt, stmt.location);
        break;
      case 'block':
        collectFromBlock(stmt, owner, context);
        break;
      default:
        break;
    }
  }
}

function collectFunction(fn: FunctionDeclaration, owner: string, context: SemanticContext): void {
  const name = fn.name.name;
  const arity = fn.parameters.length;
  logger.debug(`[sem] header: ${name} params=${fn.parameters.map(p => p.name.name).join(', ')}`);

  context.registry.registerFunction(name, arity, owner, fn, fn.location);

  if (name === MAIN_FUNCTION) {
    if (arity !== 0) {
      throw new DefinitionError(`${MAIN_FUNCTION}() must have 0 parameters, found ${arity}`, fn.location);
    }
    context.seenMain = true;
  }
}
