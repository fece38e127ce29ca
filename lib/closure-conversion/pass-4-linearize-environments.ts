import _ from 'lodash';
import { invariantViolation } from '../utils';
import { Closure } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { parentFrame } from './frames';

export function pass4_linearizeEnvironments({ model }: AnalysisState) {
  /*
  Each closure is lowered onto the innermost class environment it captures.
  This keeps the closure as close to its point of use as the data allows: more
  distant environments are reached through parent fields rather than by
  hosting the closure further out. Struct environments never host a closure,
  since a struct method could not outlive the frame that owns the struct.

  The containing environments must all be known before any chain is walked,
  because the frame at the entry of a closure body (and therefore the parent
  of any environment created there) is the host of that closure.

  Then, for each closure, the chain from its containing environment is walked
  upwards through parent frames until every class environment the closure
  captures has been passed. Each environment that the walk leaves through its
  parent field must capture its parent.
  */

  const { closures, environments } = model;

  for (const closure of closures) {
    const classEnvironments = [...closure.capturedEnvironments]
      .map(e => environments[e])
      .filter(e => e.kind === 'class');
    const innermost = _.maxBy(classEnvironments, e => model.scopes[e.scope].depth);
    closure.containingEnvironment = innermost?.id;
  }

  for (const closure of closures) {
    linkChain(closure);
  }

  function linkChain(closure: Closure) {
    if (closure.containingEnvironment === undefined) return;

    const remaining = new Set([...closure.capturedEnvironments]
      .filter(e => environments[e].kind === 'class'));
    let current = environments[closure.containingEnvironment];
    remaining.delete(current.id);

    while (remaining.size > 0) {
      const parent = parentFrame(model, current);
      if (parent.type !== 'EnvironmentFrame') {
        return invariantViolation(`closure '${closure.name}' cannot reach ${
          [...remaining].map(e => `environment ${e}`).join(', ')
        } from environment ${closure.containingEnvironment}`);
      }
      current.capturesParent = true;
      current = environments[parent.environment];
      remaining.delete(current.id);
    }
  }
}
