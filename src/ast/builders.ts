// Factory helpers for building IFJ25 syntax trees by hand

import {
  AssignmentStatement, BinaryExpression, BinaryOperator, BlockStatement, BreakStatement, CallExpression,
  ClassDeclaration, ConditionalExpression, ContinueStatement, Expression, ExpressionStatement, FunctionDeclaration,
  GetterDeclaration, Identifier, IfStatement, ImportDeclaration, Literal, Parameter, Program, ReturnStatement,
  SetterDeclaration, Statement, TypeTestExpression, UnaryExpression, VariableDeclaration, WhileStatement
} from '../types';

export function program(classes: ClassDeclaration[], imports: ImportDeclaration[] = []): Program {
  return { kind: 'program', imports, classes };
}

export function importDecl(path: string, alias: string): ImportDeclaration {
  return { kind: 'import', path, alias };
}

export function classDecl(name: string, body: Statement[]): ClassDeclaration {
  return { kind: 'class', name: identifier(name), body: block(body) };
}

export function block(body: Statement[]): BlockStatement {
  return { kind: 'block', body };
}

export function parameter(name: string): Parameter {
  return { kind: 'parameter', name: identifier(name) };
}

export function func(name: string, params: string[], body: Statement[]): FunctionDeclaration {
  return { kind: 'function', name: identifier(name), parameters: params.map(parameter), body: block(body) };
}

export function getter(name: string, body: Statement[]): GetterDeclaration {
  return { kind: 'getter', name: identifier(name), body: block(body) };
}

export function setter(name: string, param: string, body: Statement[]): SetterDeclaration {
  return { kind: 'setter', name: identifier(name), parameter: parameter(param), body: block(body) };
}

export function varDecl(name: string): VariableDeclaration {
  return { kind: 'variable', identifier: identifier(name) };
}

export function assign(name: string, value: Expression): AssignmentStatement {
  return { kind: 'assignment', target: identifier(name), value };
}

export function exprStmt(expression: Expression): ExpressionStatement {
  return { kind: 'expression', expression };
}

export function ifStmt(condition: Expression, thenBody: Statement[], elseBody?: Statement[]): IfStatement {
  return {
    kind: 'if',
    condition,
    thenBlock: block(thenBody),
    elseBlock: elseBody ? block(elseBody) : undefined
  };
}

export function whileStmt(condition: Expression, body: Statement[]): WhileStatement {
  return { kind: 'while', condition, body: block(body) };
}

export function breakStmt(): BreakStatement {
  return { kind: 'break' };
}

export function continueStmt(): ContinueStatement {
  return { kind: 'continue' };
}

export function returnStmt(argument?: Expression): ReturnStatement {
  return { kind: 'return', argument };
}

export function identifier(name: string): Identifier {
  return { kind: 'identifier', name };
}

export function int(value: number): Literal {
  return { kind: 'literal', value, literalType: 'int' };
}

export function float(value: number): Literal {
  return { kind: 'literal', value, literalType: 'float' };
}

export function str(value: string): Literal {
  return { kind: 'literal', value, literalType: 'string' };
}

export function bool(value: boolean): Literal {
  return { kind: 'literal', value, literalType: 'bool' };
}

export function nil(): Literal {
  return { kind: 'literal', value: null, literalType: 'null' };
}

export function call(callee: string, ...args: Expression[]): CallExpression {
  return { kind: 'call', callee, arguments: args };
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { kind: 'binary', operator, left, right };
}

export function not(operand: Expression): UnaryExpression {
  return { kind: 'unary', operator: 'not', operand };
}

export function notNull(operand: Expression): UnaryExpression {
  return { kind: 'unary', operator: 'notNull', operand };
}

export function conditional(test: Expression, consequent: Expression, alternate: Expression): ConditionalExpression {
  return { kind: 'conditional', test, consequent, alternate };
}

export function isType(operand: Expression, typeName: string): TypeTestExpression {
  return { kind: 'is', operand, typeName: identifier(typeName) };
}

/**
 * A program with one class `Program` containing `members`.
 */
export function programOf(...members: Statement[]): Program {
  return program([classDecl('Program', members)]);
}
