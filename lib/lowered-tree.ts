/*
The lowered tree is the output of closure conversion. It has no nested
functions: every name in it is resolved to a local, a parameter, a field or a
method on a concrete receiver, and environments appear as ordinary locals and
types. Unlike the bound tree it is self-contained (names and types are inline,
not arena references), so the code emitter does not need the analysis.
*/
import type { LiteralValue, TypeRef } from './bound-tree';
export type { LiteralValue, TypeRef } from './bound-tree';

export interface ConversionResult {
  body: Block;
  environments: SynthesizedEnvironment[];
  methods: SynthesizedMethod[];
}

export interface SynthesizedEnvironment {
  name: string;
  kind: EnvironmentKind;
  typeParameters: string[];
  fields: FieldDeclaration[];
}

export type EnvironmentKind = 'struct' | 'class';

export interface FieldDeclaration {
  name: string;
  fieldType: TypeRef;
}

export type MethodContainer =
  | { type: 'EnclosingType' }
  | { type: 'Environment', name: string }

export interface SynthesizedMethod {
  name: string;
  container: MethodContainer;
  isStatic: boolean;
  typeParameters: string[];
  parameters: ParameterDeclaration[];
  returnType: TypeRef;
  isAsync: boolean;
  isIterator: boolean;
  body: Block;
}

export interface ParameterDeclaration {
  name: string;
  parameterType: TypeRef;
  isRef: boolean;
}

export type Statement =
  | Block
  | LocalDeclaration
  | ExpressionStatement
  | ReturnStatement
  | IfStatement
  | WhileStatement

export interface Block {
  type: 'Block';
  statements: Statement[];
}

export interface LocalDeclaration {
  type: 'LocalDeclaration';
  name: string;
  localType: TypeRef;
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

export type Expression =
  | Literal
  | LocalReference
  | ThisReference
  | FieldAccess
  | Assignment
  | BinaryExpression
  | UnaryExpression
  | CallExpression
  | DelegateCreation
  | NewEnvironment
  | DefaultValue
  | RefArgument

export interface Literal {
  type: 'Literal';
  value: LiteralValue;
}

// A local variable or parameter of the current method
export interface LocalReference {
  type: 'LocalReference';
  name: string;
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
  target: LocalReference | FieldAccess;
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

export interface CallExpression {
  type: 'CallExpression';
  // Undefined for a static method of the enclosing type
  receiver?: Expression;
  method: string;
  typeArguments: TypeRef[];
  args: Expression[];
}

export interface DelegateCreation {
  type: 'DelegateCreation';
  receiver?: Expression;
  method: string;
  typeArguments: TypeRef[];
  delegateType: TypeRef;
}

// Allocation of a class environment
export interface NewEnvironment {
  type: 'NewEnvironment';
  environmentType: TypeRef;
}

// The zero value of a struct environment
export interface DefaultValue {
  type: 'DefaultValue';
  valueType: TypeRef;
}

// Passes a struct environment by reference
export interface RefArgument {
  type: 'RefArgument';
  operand: LocalReference;
}
