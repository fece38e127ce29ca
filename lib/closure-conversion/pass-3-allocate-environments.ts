import { VariableId } from '../bound-tree';
import { hardAssert, notUndefined } from '../utils';
import { ClosureId, Environment } from './analysis-model';
import { AnalysisState } from './analysis-state';

export function pass3_allocateEnvironments({ model }: AnalysisState) {
  /*
  Every scope that declares a captured variable gets an environment holding
  exactly those of its variables that are captured.

  The environment can be a struct (stack-allocated, passed to callees by
  reference) only if every closure that captures any of its variables can take
  reference parameters. One lambda, delegate-converted local function, or
  async/iterator local function among them forces a class. Capture sets are
  already transitively closed at this point, so a lambda that only reaches a
  variable by calling a local function counts as capturing it.
  */

  const { scopes, closures, environments, hoistedVariables } = model;

  const capturedBy = new Map<VariableId, ClosureId[]>();
  for (const closure of closures) {
    for (const variable of closure.capturedVariables) {
      const capturers = capturedBy.get(variable) ?? [];
      capturers.push(closure.id);
      capturedBy.set(variable, capturers);
    }
  }

  // Scopes are stored in pre-order, so environment ids follow the nesting
  for (const scope of scopes) {
    const variables = scope.declaredVariables.filter(v => capturedBy.has(v));
    if (variables.length === 0) continue;

    const isStruct = variables.every(v =>
      notUndefined(capturedBy.get(v)).every(c => closures[c].canTakeRefParameters));

    const environment: Environment = {
      id: environments.length,
      scope: scope.id,
      kind: isStruct ? 'struct' : 'class',
      variables,
      capturesParent: false,
    };
    environments.push(environment);
    scope.environment = environment.id;

    for (const variable of variables) {
      hardAssert(!hoistedVariables.has(variable), 'variable hoisted twice');
      hoistedVariables.set(variable, environment.id);
    }
  }

  for (const closure of closures) {
    for (const variable of closure.capturedVariables) {
      closure.capturedEnvironments.add(notUndefined(hoistedVariables.get(variable)));
    }
  }
}
