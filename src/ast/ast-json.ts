// Reads syntax trees serialized as JSON by an external parser

import {
  BinaryOperator, BlockStatement, ClassDeclaration, Expression, Identifier, ImportDeclaration, Literal, Parameter,
  Program, SourceLocation, Statement, UnaryOperator
} from '../types';

export class AstFormatError extends Error {
  constructor(message: string, public readonly path: string) {
    super(`${path}: ${message}`);
    this.name = 'AstFormatError';
  }
}

type JsonObject = { [key: string]: unknown };

const BINARY_OPERATORS: readonly BinaryOperator[] = [
  '+', '-', '*', '/', '<', '<=', '>', '>=', '==', '!=', '&&', '||', '++'
];
const UNARY_OPERATORS: readonly UnaryOperator[] = ['not', 'notNull'];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new AstFormatError('expected an object', path);
  }
  return value;
}

function expectArray(obj: JsonObject, key: string, path: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new AstFormatError(`expected '${key}' to be an array`, path);
  }
  return value;
}

function expectString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new AstFormatError(`expected '${key}' to be a string`, path);
  }
  return value;
}

function expectKind(obj: JsonObject, kind: string, path: string): void {
  if (obj.kind !== kind) {
    throw new AstFormatError(`expected a '${kind}' node, found '${String(obj.kind)}'`, path);
  }
}

function isPosition(value: unknown): value is { line: number; column: number } {
  return isObject(value) && typeof value.line === 'number' && typeof value.column === 'number';
}

/**
 * Turns parsed JSON into typed nodes. Locations without their own filename
 * get the one the reader was created with.
 */
class AstReader {
  constructor(private readonly filename?: string) {}

  private readLocation(obj: JsonObject, path: string): SourceLocation | undefined {
    const value = obj.location;
    if (value === undefined) {
      return undefined;
    }
    if (!isObject(value)) {
      throw new AstFormatError('malformed location', `${path}.location`);
    }
    const start = value.start;
    const end = value.end;
    if (!isPosition(start) || !isPosition(end)) {
      throw new AstFormatError('malformed location', `${path}.location`);
    }
    const location: SourceLocation = {
      start: { line: start.line, column: start.column },
      end: { line: end.line, column: end.column }
    };
    const filename = typeof value.filename === 'string' ? value.filename : this.filename;
    if (filename !== undefined) {
      location.filename = filename;
    }
    return location;
  }

  private readIdentifier(value: unknown, path: string): Identifier {
    // A bare string is accepted wherever a name is expected
    if (typeof value === 'string') {
      return { kind: 'identifier', name: value };
    }
    const obj = expectObject(value, path);
    expectKind(obj, 'identifier', path);
    return { kind: 'identifier', name: expectString(obj, 'name', path), location: this.readLocation(obj, path) };
  }

  private readParameter(value: unknown, path: string): Parameter {
    if (typeof value === 'string') {
      return { kind: 'parameter', name: { kind: 'identifier', name: value } };
    }
    const obj = expectObject(value, path);
    expectKind(obj, 'parameter', path);
    return { kind: 'parameter', name: this.readIdentifier(obj.name, `${path}.name`), location: this.readLocation(obj, path) };
  }

  private readBlock(value: unknown, path: string): BlockStatement {
    const obj = expectObject(value, path);
    expectKind(obj, 'block', path);
    return {
      kind: 'block',
      body: expectArray(obj, 'body', path).map((stmt, i) => this.readStatement(stmt, `${path}.body[${i}]`)),
      location: this.readLocation(obj, path)
    };
  }

  private readLiteral(obj: JsonObject, path: string): Literal {
    const location = this.readLocation(obj, path);
    const value = obj.value;
    switch (obj.literalType) {
      case 'int':
        if (typeof value !== 'number' || !Number.isInteger(value)) {
          throw new AstFormatError('int literal needs an integer value', path);
        }
        return { kind: 'literal', literalType: 'int', value, location };
      case 'float':
        if (typeof value !== 'number') {
          throw new AstFormatError('float literal needs a numeric value', path);
        }
        return { kind: 'literal', literalType: 'float', value, location };
      case 'string':
        if (typeof value !== 'string') {
          throw new AstFormatError('string literal needs a string value', path);
        }
        return { kind: 'literal', literalType: 'string', value, location };
      case 'bool':
        if (typeof value !== 'boolean') {
          throw new AstFormatError('bool literal needs a boolean value', path);
        }
        return { kind: 'literal', literalType: 'bool', value, location };
      case 'null':
        return { kind: 'literal', literalType: 'null', value: null, location };
      default:
        throw new AstFormatError(`unknown literal type '${String(obj.literalType)}'`, path);
    }
  }

  private readBinaryOperator(obj: JsonObject, path: string): BinaryOperator {
    const op = BINARY_OPERATORS.find(candidate => candidate === obj.operator);
    if (!op) {
      throw new AstFormatError(`unknown binary operator '${String(obj.operator)}'`, path);
    }
    return op;
  }

  private readUnaryOperator(obj: JsonObject, path: string): UnaryOperator {
    const op = UNARY_OPERATORS.find(candidate => candidate === obj.operator);
    if (!op) {
      throw new AstFormatError(`unknown unary operator '${String(obj.operator)}'`, path);
    }
    return op;
  }

  readExpression(value: unknown, path: string): Expression {
    const obj = expectObject(value, path);
    const location = this.readLocation(obj, path);
    switch (obj.kind) {
      case 'literal':
        return this.readLiteral(obj, path);
      case 'identifier':
        return this.readIdentifier(obj, path);
      case 'call':
        return {
          kind: 'call',
          callee: expectString(obj, 'callee', path),
          arguments: expectArray(obj, 'arguments', path).map((arg, i) => this.readExpression(arg, `${path}.arguments[${i}]`)),
          location
        };
      case 'unary':
        return {
          kind: 'unary',
          operator: this.readUnaryOperator(obj, path),
          operand: this.readExpression(obj.operand, `${path}.operand`),
          location
        };
      case 'binary':
        return {
          kind: 'binary',
          operator: this.readBinaryOperator(obj, path),
          left: this.readExpression(obj.left, `${path}.left`),
          right: this.readExpression(obj.right, `${path}.right`),
          location
        };
      case 'conditional':
        return {
          kind: 'conditional',
          test: this.readExpression(obj.test, `${path}.test`),
          consequent: this.readExpression(obj.consequent, `${path}.consequent`),
          alternate: this.readExpression(obj.alternate, `${path}.alternate`),
          location
        };
      case 'is':
        return {
          kind: 'is',
          operand: this.readExpression(obj.operand, `${path}.operand`),
          typeName: this.readExpression(obj.typeName, `${path}.typeName`),
          location
        };
      default:
        throw new AstFormatError(`unknown expression kind '${String(obj.kind)}'`, path);
    }
  }

  readStatement(value: unknown, path: string): Statement {
    const obj = expectObject(value, path);
    const location = this.readLocation(obj, path);
    switch (obj.kind) {
      case 'block':
        return this.readBlock(obj, path);
      case 'if':
        return {
          kind: 'if',
          condition: this.readExpression(obj.condition, `${path}.condition`),
          thenBlock: this.readBlock(obj.thenBlock, `${path}.thenBlock`),
          elseBlock: obj.elseBlock === undefined || obj.elseBlock === null
            ? undefined
            : this.readBlock(obj.elseBlock, `${path}.elseBlock`),
          location
        };
      case 'while':
        return {
          kind: 'while',
          condition: this.readExpression(obj.condition, `${path}.condition`),
          body: this.readBlock(obj.body, `${path}.body`),
          location
        };
      case 'break':
        return { kind: 'break', location };
      case 'continue':
        return { kind: 'continue', location };
      case 'expression':
        return { kind: 'expression', expression: this.readExpression(obj.expression, `${path}.expression`), location };
      case 'variable':
        return { kind: 'variable', identifier: this.readIdentifier(obj.identifier, `${path}.identifier`), location };
      case 'assignment':
        return {
          kind: 'assignment',
          target: this.readIdentifier(obj.target, `${path}.target`),
          value: this.readExpression(obj.value, `${path}.value`),
          location
        };
      case 'function':
        return {
          kind: 'function',
          name: this.readIdentifier(obj.name, `${path}.name`),
          parameters: expectArray(obj, 'parameters', path).map((p, i) => this.readParameter(p, `${path}.parameters[${i}]`)),
          body: this.readBlock(obj.body, `${path}.body`),
          location
        };
      case 'getter':
        return {
          kind: 'getter',
          name: this.readIdentifier(obj.name, `${path}.name`),
          body: this.readBlock(obj.body, `${path}.body`),
          location
        };
      case 'setter':
        return {
          kind: 'setter',
          name: this.readIdentifier(obj.name, `${path}.name`),
          parameter: this.readParameter(obj.parameter, `${path}.parameter`),
          body: this.readBlock(obj.body, `${path}.body`),
          location
        };
      case 'return':
        return {
          kind: 'return',
          argument: obj.argument === undefined || obj.argument === null
            ? undefined
            : this.readExpression(obj.argument, `${path}.argument`),
          location
        };
      default:
        throw new AstFormatError(`unknown statement kind '${String(obj.kind)}'`, path);
    }
  }

  private readImport(value: unknown, path: string): ImportDeclaration {
    const obj = expectObject(value, path);
    expectKind(obj, 'import', path);
    return {
      kind: 'import',
      path: expectString(obj, 'path', path),
      alias: expectString(obj, 'alias', path),
      location: this.readLocation(obj, path)
    };
  }

  private readClass(value: unknown, path: string): ClassDeclaration {
    const obj = expectObject(value, path);
    expectKind(obj, 'class', path);
    return {
      kind: 'class',
      name: this.readIdentifier(obj.name, `${path}.name`),
      body: this.readBlock(obj.body, `${path}.body`),
      location: this.readLocation(obj, path)
    };
  }

  readProgram(value: unknown): Program {
    const obj = expectObject(value, '$');
    expectKind(obj, 'program', '$');
    const imports = obj.imports === undefined ? [] : expectArray(obj, 'imports', '$');
    return {
      kind: 'program',
      imports: imports.map((imp, i) => this.readImport(imp, `$.imports[${i}]`)),
      classes: expectArray(obj, 'classes', '$').map((cls, i) => this.readClass(cls, `$.classes[${i}]`)),
      location: this.readLocation(obj, '$'),
      filename: this.filename
    };
  }
}

export function readExpression(value: unknown, path: string, filename?: string): Expression {
  return new AstReader(filename).readExpression(value, path);
}

export function readStatement(value: unknown, path: string, filename?: string): Statement {
  return new AstReader(filename).readStatement(value, path);
}

export function readProgram(value: unknown, filename?: string): Program {
  return new AstReader(filename).readProgram(value);
}

export function parseProgramJson(text: string, filename?: string): Program {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AstFormatError(`invalid JSON: ${reason}`, '$');
  }
  return readProgram(value, filename);
}
