import { hardAssert } from '../utils';
import { Environment } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { liveEnvironments } from './frames';

export function pass5_optimizeEnvironments(state: AnalysisState) {
  /*
  Removes environments whose only content is the receiver. Such an
  environment exists just to forward `this`, which the closures can use
  directly if they are lowered onto the enclosing type.

    - A struct environment can go if every closure reading it is already on
      the enclosing type. Those closures become instance methods.
    - A class environment can always go. The closures lowered onto it move to
      the enclosing type, and environments that chained to it now chain to the
      receiver instead (the frame at their entry is recomputed from the scope
      tree, so this needs no explicit rewiring).

  Removing one environment changes the frames and hosts the next candidate is
  judged on, so this runs until nothing more is removed.
  */

  const { model } = state;
  const { thisVariable } = model;
  if (thisVariable === undefined) return;

  while (removeOneThisOnlyEnvironment(thisVariable)) {
    state.trace?.writeLine('Removed an environment that only forwarded the receiver');
  }

  function removeOneThisOnlyEnvironment(thisVariable: number): boolean {
    for (const environment of liveEnvironments(model)) {
      if (environment.variables.length !== 1 || environment.variables[0] !== thisVariable) continue;

      const readers = model.closures.filter(c => c.capturedEnvironments.has(environment.id));
      if (environment.kind === 'struct') {
        if (readers.some(c => c.containingEnvironment !== undefined)) continue;
      } else {
        for (const closure of model.closures) {
          if (closure.containingEnvironment === environment.id) {
            closure.containingEnvironment = undefined;
          }
        }
      }

      removeEnvironment(environment);
      return true;
    }
    return false;
  }

  function removeEnvironment(environment: Environment) {
    const scope = model.scopes[environment.scope];
    hardAssert(scope.environment === environment.id);
    scope.environment = undefined;
    for (const variable of environment.variables) {
      model.hoistedVariables.delete(variable);
    }
    for (const closure of model.closures) {
      closure.capturedEnvironments.delete(environment.id);
    }
  }
}
