// Core type definitions for the IFJ25 semantic analyzer

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

// Type system: the seven tags the analyzer reasons about
export type DataType = 'null' | 'int' | 'double' | 'string' | 'bool' | 'void' | 'unknown';

export type SymbolKind = 'variable' | 'constant' | 'function' | 'parameter' | 'global' | 'getter' | 'setter';

// AST Node base
export interface ASTNode {
  kind: string;
  location?: SourceLocation;
}

// Expressions

export type Expression =
  | Literal
  | Identifier
  | CallExpression
  | UnaryExpression
  | BinaryExpression
  | ConditionalExpression
  | TypeTestExpression;

export interface Literal extends ASTNode {
  kind: 'literal';
  value: string | number | boolean | null;
  literalType: 'int' | 'float' | 'string' | 'bool' | 'null';
  inferredType?: DataType;
}

export interface Identifier extends ASTNode {
  kind: 'identifier';
  name: string;
  inferredType?: DataType;
  // Filled by resolution when the name binds to a local or parameter
  codegenName?: string;
  resolvedAs?: 'local' | 'parameter' | 'getter' | 'setter' | 'global';
}

export interface CallExpression extends ASTNode {
  kind: 'call';
  // Fully qualified for builtins ("Ifj.write"), plain otherwise
  callee: string;
  arguments: Expression[];
  inferredType?: DataType;
  codegenName?: string;
  signature?: string;
}

export type UnaryOperator = 'not' | 'notNull';

export interface UnaryExpression extends ASTNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
  inferredType?: DataType;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type RelationalOperator = '<' | '<=' | '>' | '>=';
export type EqualityOperator = '==' | '!=';
export type LogicalOperator = '&&' | '||';
// '++' is the explicit string concatenation operator
export type BinaryOperator = ArithmeticOperator | RelationalOperator | EqualityOperator | LogicalOperator | '++';

export interface BinaryExpression extends ASTNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
  inferredType?: DataType;
}

export interface ConditionalExpression extends ASTNode {
  kind: 'conditional';
  test: Expression;
  consequent: Expression;
  alternate: Expression;
  inferredType?: DataType;
}

// `value is Num`
export interface TypeTestExpression extends ASTNode {
  kind: 'is';
  operand: Expression;
  typeName: Expression;
  inferredType?: DataType;
}

// Statements

export type Statement =
  | BlockStatement
  | IfStatement
  | WhileStatement
  | BreakStatement
  | ContinueStatement
  | ExpressionStatement
  | VariableDeclaration
  | AssignmentStatement
  | FunctionDeclaration
  | GetterDeclaration
  | SetterDeclaration
  | ReturnStatement;

export interface BlockStatement extends ASTNode {
  kind: 'block';
  body: Statement[];
  scopePath?: string;
}

export interface IfStatement extends ASTNode {
  kind: 'if';
  condition: Expression;
  thenBlock: BlockStatement;
  elseBlock?: BlockStatement;
}

export interface WhileStatement extends ASTNode {
  kind: 'while';
  condition: Expression;
  body: BlockStatement;
}

export interface BreakStatement extends ASTNode {
  kind: 'break';
}

export interface ContinueStatement extends ASTNode {
  kind: 'continue';
}

export interface ExpressionStatement extends ASTNode {
  kind: 'expression';
  expression: Expression;
}

export interface VariableDeclaration extends ASTNode {
  kind: 'variable';
  identifier: Identifier;
  codegenName?: string;
  // Type learned for the variable by the end of its scope
  dataType?: DataType;
}

export interface AssignmentStatement extends ASTNode {
  kind: 'assignment';
  target: Identifier;
  value: Expression;
}

export interface Parameter extends ASTNode {
  kind: 'parameter';
  name: Identifier;
  codegenName?: string;
}

export interface FunctionDeclaration extends ASTNode {
  kind: 'function';
  name: Identifier;
  parameters: Parameter[];
  body: BlockStatement;
  codegenName?: string;
}

export interface GetterDeclaration extends ASTNode {
  kind: 'getter';
  name: Identifier;
  body: BlockStatement;
}

export interface SetterDeclaration extends ASTNode {
  kind: 'setter';
  name: Identifier;
  parameter: Parameter;
  body: BlockStatement;
}

export interface ReturnStatement extends ASTNode {
  kind: 'return';
  argument?: Expression;
}

export type CallableDeclaration = FunctionDeclaration | GetterDeclaration | SetterDeclaration;

// Program structure

export interface ImportDeclaration extends ASTNode {
  kind: 'import';
  path: string;
  alias: string;
}

export interface ClassDeclaration extends ASTNode {
  kind: 'class';
  name: Identifier;
  body: BlockStatement;
}

export interface Program extends ASTNode {
  kind: 'program';
  imports: ImportDeclaration[];
  classes: ClassDeclaration[];
  filename?: string;
}

// Symbols

export type DeclarationNode = VariableDeclaration | Parameter | CallableDeclaration;

export interface SymbolData {
  id: string;
  kind: SymbolKind;
  dataType: DataType;
  defined: boolean;
  global: boolean;
  arity: number;
  // Scope path for locals, owning class for registry entries
  scopeName: string | null;
  // Non-owning link back to the declaring node; the AST owns the node
  declaration?: DeclarationNode;
  codegenName?: string;
  returnType?: DataType;
  owners?: Set<string>;
}

export interface SymbolEntry {
  key: string;
  data: SymbolData;
}

export interface ScopedSymbol {
  scope: string;
  name: string;
  kind: SymbolKind;
  arity: number;
}
