/*
The bound tree is the input to closure conversion: a typed method body as
produced by the binder and type checker. Declarations live in arenas on the
method (`variables`, `functions`) and the tree refers to them by index.
*/

export type VariableId = number;
export type FunctionId = number;
export type BlockId = number;

export type TypeRef =
  | NamedType
  | TypeParameterType

export interface NamedType {
  type: 'NamedType';
  name: string;
  typeArguments: TypeRef[];
}

export interface TypeParameterType {
  type: 'TypeParameterType';
  name: string;
}

export interface BoundMethod {
  name: string;
  enclosingType: EnclosingType;
  isStatic: boolean;
  typeParameters: string[];
  returnType: TypeRef;
  parameters: VariableId[];
  variables: BoundVariable[];
  functions: BoundFunction[];
  body: Block;
}

export interface EnclosingType {
  name: string;
  typeParameters: string[];
}

export interface BoundVariable {
  name: string;
  declaredType: TypeRef;
  kind: 'parameter' | 'local';
  // The block that declares the variable. Parameters are declared in the body
  // block of their function.
  scope: BlockId;
}

export interface BoundFunction {
  name: string;
  kind: 'lambda' | 'local-function';
  parameters: VariableId[];
  returnType: TypeRef;
  body: Block;
  // The block in which the function is declared (for lambdas, the block
  // containing the lambda expression)
  scope: BlockId;
  isConvertedToDelegate: boolean;
  isAsync: boolean;
  isIterator: boolean;
}

export type Statement =
  | Block
  | LocalDeclaration
  | ExpressionStatement
  | ReturnStatement
  | IfStatement
  | WhileStatement
  | LocalFunctionStatement

export interface Block {
  type: 'Block';
  id: BlockId;
  statements: Statement[];
}

export interface LocalDeclaration {
  type: 'LocalDeclaration';
  variable: VariableId;
  initializer?: Expression;
}

export interface ExpressionStatement {
  type: 'ExpressionStatement';
  expression: Expression;
}

export interface ReturnStatement {
  type: 'ReturnStatement';
  value?: Expression;
}

export interface IfStatement {
  type: 'IfStatement';
  condition: Expression;
  consequent: Statement;
  alternate?: Statement;
}

export interface WhileStatement {
  type: 'WhileStatement';
  condition: Expression;
  body: Statement;
}

export interface LocalFunctionStatement {
  type: 'LocalFunctionStatement';
  function: FunctionId;
}

export type Expression =
  | Literal
  | VariableReference
  | ThisReference
  | FieldAccess
  | Assignment
  | BinaryExpression
  | UnaryExpression
  | CallExpression
  | LocalFunctionCall
  | LambdaExpression
  | FunctionConversion

export type LiteralValue = number | string | boolean | null;

export interface Literal {
  type: 'Literal';
  value: LiteralValue;
}

export interface VariableReference {
  type: 'VariableReference';
  variable: VariableId;
}

export interface ThisReference {
  type: 'ThisReference';
}

export interface FieldAccess {
  type: 'FieldAccess';
  receiver: Expression;
  field: string;
}

export interface Assignment {
  type: 'Assignment';
  target: VariableReference | FieldAccess;
  value: Expression;
}

export interface BinaryExpression {
  type: 'BinaryExpression';
  operator: string;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression {
  type: 'UnaryExpression';
  operator: string;
  operand: Expression;
}

// A call to an ordinary method (not a nested function)
export interface CallExpression {
  type: 'CallExpression';
  receiver?: Expression;
  method: string;
  args: Expression[];
}

// A direct call to a local function
export interface LocalFunctionCall {
  type: 'LocalFunctionCall';
  function: FunctionId;
  args: Expression[];
}

export interface LambdaExpression {
  type: 'LambdaExpression';
  function: FunctionId;
  delegateType: TypeRef;
}

// A local function used as a value (converted to a delegate)
export interface FunctionConversion {
  type: 'FunctionConversion';
  function: FunctionId;
  delegateType: TypeRef;
}

export type Node =
  | Statement
  | Expression

export function namedType(name: string, ...typeArguments: TypeRef[]): NamedType {
  return { type: 'NamedType', name, typeArguments };
}

export function typeParameter(name: string): TypeParameterType {
  return { type: 'TypeParameterType', name };
}

export function containsNestedFunctions(method: BoundMethod): boolean {
  return method.functions.length > 0;
}
