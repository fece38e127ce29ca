import { BlockId, FunctionId, VariableId } from '../bound-tree';
import { EnvironmentKind, ParameterDeclaration, SynthesizedEnvironment, TypeRef } from '../lowered-tree';
import { TypeParameterMap } from './type-substitution';

export type ScopeId = number;
export type ClosureId = number;
export type EnvironmentId = number;

/**
 * The output model of the analysis passes (1 to 6). Scopes, closures and
 * environments are stored in arenas and refer to each other by index.
 */
export interface AnalysisModel {
  scopes: Scope[];
  // Indexed by the function's id in the bound method, so `ClosureId` and
  // `FunctionId` coincide
  closures: Closure[];
  environments: Environment[];

  rootScope: ScopeId;
  scopeByBlock: Map<BlockId, ScopeId>;
  // The scope that declares each variable (including `thisVariable`)
  variableScopes: Map<VariableId, ScopeId>;

  // The analysis-only variable standing in for the receiver (`this`) of an
  // instance method. It is declared in the root scope and is captured and
  // hoisted like any other root-level variable. Its id is one past the last
  // variable of the bound method.
  thisVariable?: VariableId;

  // Every variable hoisted into some environment, with its owner
  hoistedVariables: Map<VariableId, EnvironmentId>;
}

export type ScopeKind =
  | 'method-body'
  | 'block'
  | 'lambda-body'
  | 'local-function-body'

export interface Scope {
  id: ScopeId;
  kind: ScopeKind;
  block: BlockId;
  parent?: ScopeId;
  children: ScopeId[];
  depth: number;

  declaredVariables: VariableId[];
  // Nested functions declared directly in this scope (local function
  // statements and lambda expressions that occur here)
  nestedFunctions: ClosureId[];

  // For the body scope of a nested function
  closure?: ClosureId;

  environment?: EnvironmentId;
}

export interface Closure {
  id: ClosureId;
  function: FunctionId;
  kind: 'lambda' | 'local-function';
  name: string;

  // The body scope of the function
  scope: ScopeId;
  // The scope in which the function is declared
  declaringScope: ScopeId;
  parameters: VariableId[];

  // Variables referenced in the body (not in nested functions) that are
  // declared outside the function
  directCaptures: Set<VariableId>;
  // Transitively closed over `references`
  capturedVariables: Set<VariableId>;
  // Other closures this one calls, converts to a delegate, or declares in its
  // body. Self-references are not recorded.
  references: Set<ClosureId>;

  // False for lambdas, and for local functions that are converted to a
  // delegate or rewritten as a state machine (async, iterator). Only eligible
  // closures can receive struct environments by reference.
  canTakeRefParameters: boolean;

  // Environments owning at least one of `capturedVariables`
  capturedEnvironments: Set<EnvironmentId>;

  // The class environment that hosts the lowered method, or undefined if it
  // is lowered onto the enclosing type
  containingEnvironment?: EnvironmentId;

  signature?: ClosureSignature;
}

export interface Environment {
  id: EnvironmentId;
  scope: ScopeId;
  kind: EnvironmentKind;
  variables: VariableId[];

  // True if the environment has a field pointing to the frame that was current
  // when it was constructed (see `frameAtEntry`)
  capturesParent: boolean;

  declaration?: EnvironmentDeclaration;
}

export interface EnvironmentDeclaration extends SynthesizedEnvironment {
  // Name of the local (or `ref` parameter) that holds the environment
  localName: string;
  // Alpha-renaming of the method's type parameters to the environment's own
  typeParameterMap: TypeParameterMap;
  fieldNames: Map<VariableId, string>;
  // Type of the parent field, if the environment captures its parent
  parentType?: TypeRef;
}

export interface ClosureSignature {
  methodName: string;
  isStatic: boolean;
  typeParameters: string[];
  // Original parameters followed by one `ref` parameter per struct environment
  parameters: ParameterDeclaration[];
  // Struct environments received by reference, in parameter order
  refEnvironments: EnvironmentId[];
  // How the method's type parameters are spelled inside the lowered body
  typeParameterMap: TypeParameterMap;
}

/**
 * The frame is the class environment (or receiver) that the "current frame
 * pointer" refers to at some point in a lowered method. Class environments
 * that capture their parent store the frame that was current when they were
 * created.
 */
export type Frame =
  | { type: 'EnvironmentFrame', environment: EnvironmentId }
  | { type: 'ReceiverFrame' }
  | { type: 'NoFrame' }
