import { VariableId } from '../bound-tree';
import { notUndefined } from '../utils';
import { AnalysisModel, Closure, Environment, Frame, ScopeId } from './analysis-model';

export function isStrictAncestor(model: AnalysisModel, ancestor: ScopeId, scope: ScopeId): boolean {
  let current = model.scopes[scope].parent;
  while (current !== undefined) {
    if (current === ancestor) return true;
    current = model.scopes[current].parent;
  }
  return false;
}

export function isAncestorOrSelf(model: AnalysisModel, ancestor: ScopeId, scope: ScopeId): boolean {
  return ancestor === scope || isStrictAncestor(model, ancestor, scope);
}

export function scopeOfVariable(model: AnalysisModel, variable: VariableId): ScopeId {
  return notUndefined(model.variableScopes.get(variable));
}

// True if the variable lives outside the body of the closure
export function isDeclaredOutside(model: AnalysisModel, variable: VariableId, closure: Closure): boolean {
  return isStrictAncestor(model, scopeOfVariable(model, variable), closure.scope);
}

export function liveEnvironments(model: AnalysisModel): Environment[] {
  return model.scopes
    .map(s => s.environment)
    .filter((e): e is number => e !== undefined)
    .map(e => model.environments[e]);
}

export function environmentOfScope(model: AnalysisModel, scope: ScopeId): Environment | undefined {
  const id = model.scopes[scope].environment;
  return id === undefined ? undefined : model.environments[id];
}

/**
 * True if the closure uses the receiver directly (as opposed to through a
 * hoisted `$this` field). Only meaningful once environments are allocated.
 */
export function closureReadsReceiver(model: AnalysisModel, closure: Closure): boolean {
  const thisVariable = model.thisVariable;
  return thisVariable !== undefined
    && closure.capturedVariables.has(thisVariable)
    && !model.hoistedVariables.has(thisVariable);
}

/**
 * The frame a lowered closure starts with: its containing environment (as
 * `this` of an environment method), the receiver (as `this` of an instance
 * method on the enclosing type), or nothing for a static method.
 */
export function hostFrame(model: AnalysisModel, closure: Closure): Frame {
  if (closure.containingEnvironment !== undefined) {
    return { type: 'EnvironmentFrame', environment: closure.containingEnvironment };
  }
  return closureReadsReceiver(model, closure)
    ? { type: 'ReceiverFrame' }
    : { type: 'NoFrame' };
}

/**
 * The frame current when control enters the scope, before the scope's own
 * environment (if any) is created. This is what a class environment's parent
 * field is initialized from.
 */
export function frameAtEntry(model: AnalysisModel, scopeId: ScopeId): Frame {
  const scope = model.scopes[scopeId];
  if (scope.closure !== undefined) {
    return hostFrame(model, model.closures[scope.closure]);
  }
  if (scope.parent === undefined) {
    return model.thisVariable !== undefined
      ? { type: 'ReceiverFrame' }
      : { type: 'NoFrame' };
  }
  return frameInside(model, scope.parent);
}

// The frame current inside the scope, after its own environment is created
export function frameInside(model: AnalysisModel, scopeId: ScopeId): Frame {
  const environment = environmentOfScope(model, scopeId);
  if (environment && environment.kind === 'class') {
    return { type: 'EnvironmentFrame', environment: environment.id };
  }
  return frameAtEntry(model, scopeId);
}

export function parentFrame(model: AnalysisModel, environment: Environment): Frame {
  return frameAtEntry(model, environment.scope);
}

export function sameFrame(a: Frame, b: Frame): boolean {
  if (a.type === 'EnvironmentFrame' && b.type === 'EnvironmentFrame') {
    return a.environment === b.environment;
  }
  return a.type === b.type;
}
