import { BoundMethod } from '../bound-tree';
import { ConversionResult } from '../lowered-tree';
import { stringifyConversionResult } from '../stringify-lowered';
import { TraceFile } from '../trace-file';
import { AnalysisState } from './analysis-state';
import { pass1_buildScopeTree } from './pass-1-build-scope-tree';
import { pass2_analyzeCaptures } from './pass-2-analyze-captures';
import { pass3_allocateEnvironments } from './pass-3-allocate-environments';
import { pass4_linearizeEnvironments } from './pass-4-linearize-environments';
import { pass5_optimizeEnvironments } from './pass-5-optimize-environments';
import { pass6_synthesizeDeclarations } from './pass-6-synthesize-declarations';
import { pass7_rewriteTree } from './pass-7-rewrite-tree';
import { stringifyAnalysis } from './stringify-analysis';

export * from './analysis-model';
export { stringifyAnalysis } from './stringify-analysis';

export interface ConversionOptions {
  // If set, a dump of the analysis after each pass and the lowered output are
  // written to this file
  traceFilename?: string;
}

/*
Closure conversion rewrites a method containing lambdas and local functions
into one that contains none.

  - Captured variables move out of the stack frame into environments: a
    synthesized struct (passed by `ref`) or class (heap allocated) per scope.
  - Every nested function becomes a method, either on an environment class or
    on the enclosing type.
  - Every use of a captured variable and every call or conversion of a nested
    function is rewritten to go through the environment that now owns it.

The input method is not modified. A method that fails conversion produces no
output at all.
*/
export function convertClosures(method: BoundMethod, options: ConversionOptions = {}): ConversionResult {
  /*
  This function works in 7 passes with a "blackboard" design pattern. Each pass
  populates or uses information from the `state.model`, which contains both
  intermediate information and the final declarations.
  */

  const trace = options.traceFilename !== undefined
    ? new TraceFile(options.traceFilename)
    : undefined;

  const state = createAnalysisState(method, trace);

  const traceModel = (title: string) =>
    trace?.writeSection(title, () => stringifyAnalysis(method, state.model));

  try {
    /*
    # Pass 1: Build scope tree

    Mirror the blocks and nested function bodies as a tree of scopes, attach
    every variable and function declaration to its scope, and check the input
    against the binder's annotations.
    */
    pass1_buildScopeTree(state);
    traceModel('Pass 1: Build scope tree');

    /*
    # Pass 2: Analyze captures

    Compute the set of outer variables each closure needs, including those it
    only needs because it calls (or declares) another closure that needs them.
    */
    pass2_analyzeCaptures(state);
    traceModel('Pass 2: Analyze captures');

    /*
    # Pass 3: Allocate environments

    Give each scope with captured variables an environment, and decide whether
    it can be a struct.
    */
    pass3_allocateEnvironments(state);
    traceModel('Pass 3: Allocate environments');

    /*
    # Pass 4: Linearize environments

    Choose the environment that hosts each closure and link environments into
    parent chains so that every closure can reach everything it captures.
    */
    pass4_linearizeEnvironments(state);
    traceModel('Pass 4: Linearize environments');

    /*
    # Pass 5: Optimize environments

    Remove environments that would only hold the receiver.
    */
    pass5_optimizeEnvironments(state);
    traceModel('Pass 5: Optimize environments');

    /*
    # Pass 6: Synthesize declarations

    Name and shape the environment types, and compute the signature of every
    lowered closure, from the final environment configuration.
    */
    pass6_synthesizeDeclarations(state);
    traceModel('Pass 6: Synthesize declarations');

    /*
    # Pass 7: Rewrite tree

    Produce the lowered method body and the bodies of the lowered closures.
    */
    const result = pass7_rewriteTree(state);
    trace?.writeSection('Lowered', () => stringifyConversionResult(result));
    return result;
  } finally {
    trace?.dispose();
  }
}

export function createAnalysisState(method: BoundMethod, trace?: TraceFile): AnalysisState {
  return {
    method,
    cur: { methodName: method.name },
    model: {
      scopes: [],
      closures: [],
      environments: [],
      rootScope: 0, // Populated in pass1_buildScopeTree
      scopeByBlock: new Map(),
      variableScopes: new Map(),
      hoistedVariables: new Map(),
    },
    takenNames: new Set([method.name, method.enclosingType.name, ...method.variables.map(v => v.name)]),
    trace,
  };
}
