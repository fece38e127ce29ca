import * as B from '../bound-tree';
import { assertUnreachable, hardAssert, throwError } from '../utils';
import { Closure, ClosureId } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { visitingNode } from './common';
import { isDeclaredOutside } from './frames';

export function pass2_analyzeCaptures({ method, cur, model }: AnalysisState) {
  /*
  First, each closure body is walked once to find its direct captures and the
  other closures it refers to. The walk stops at nested function bodies: a
  nested closure is recorded as a reference of the closure that declares it,
  which is enough for its captures to flow outwards in the second step.

  Second, the capture sets are closed over the reference graph with a
  worklist. Whenever the capture set of B grows, every closure A that refers
  to B takes the captures of B that are declared outside A, and is queued again
  if that changed anything. Sets only grow and are bounded by the variables of
  the method, so this terminates. Processed in FIFO order, each round
  propagates captures one more hop, so the number of steps is bounded by
  n * (n + 1) for n closures.
  */

  const { closures } = model;

  for (const closure of closures) {
    findDirectCaptures(closure);
  }

  closeCaptureSets();

  function findDirectCaptures(closure: Closure) {
    const func = method.functions[closure.function];
    cur.functionName = func.name;
    for (const statement of func.body.statements) {
      visitStatement(statement);
    }
    cur.functionName = undefined;

    function capture(variable: B.VariableId) {
      if (isDeclaredOutside(model, variable, closure)) {
        closure.directCaptures.add(variable);
      }
    }

    function refer(target: ClosureId) {
      // Recursion adds nothing to the capture set
      if (target !== closure.id) {
        closure.references.add(target);
      }
    }

    function visitStatement(statement: B.Statement) {
      visitingNode(cur, statement);
      switch (statement.type) {
        case 'Block': return statement.statements.forEach(visitStatement);
        case 'LocalDeclaration': return statement.initializer && visitExpression(statement.initializer);
        case 'ExpressionStatement': return visitExpression(statement.expression);
        case 'ReturnStatement': return statement.value && visitExpression(statement.value);
        case 'IfStatement': {
          visitExpression(statement.condition);
          visitStatement(statement.consequent);
          if (statement.alternate) visitStatement(statement.alternate);
          return;
        }
        case 'WhileStatement': {
          visitExpression(statement.condition);
          visitStatement(statement.body);
          return;
        }
        case 'LocalFunctionStatement': return refer(statement.function);
        default: assertUnreachable(statement);
      }
    }

    function visitExpression(expression: B.Expression) {
      visitingNode(cur, expression);
      switch (expression.type) {
        case 'Literal': return;
        case 'VariableReference': return capture(expression.variable);
        case 'ThisReference': {
          hardAssert(model.thisVariable !== undefined);
          return capture(model.thisVariable);
        }
        case 'FieldAccess': return visitExpression(expression.receiver);
        case 'Assignment': {
          visitExpression(expression.target);
          visitExpression(expression.value);
          return;
        }
        case 'BinaryExpression': {
          visitExpression(expression.left);
          visitExpression(expression.right);
          return;
        }
        case 'UnaryExpression': return visitExpression(expression.operand);
        case 'CallExpression': {
          if (expression.receiver) visitExpression(expression.receiver);
          expression.args.forEach(visitExpression);
          return;
        }
        case 'LocalFunctionCall': {
          refer(expression.function);
          expression.args.forEach(visitExpression);
          return;
        }
        case 'FunctionConversion': return refer(expression.function);
        case 'LambdaExpression': return refer(expression.function);
        default: assertUnreachable(expression);
      }
    }
  }

  function closeCaptureSets() {
    const referencedBy = new Map<ClosureId, ClosureId[]>();
    for (const closure of closures) {
      closure.capturedVariables = new Set(closure.directCaptures);
      for (const target of closure.references) {
        const referrers = referencedBy.get(target) ?? [];
        referrers.push(closure.id);
        referencedBy.set(target, referrers);
      }
    }

    const worklist = closures.map(c => c.id);
    const queued = new Set(worklist);
    const maxSteps = closures.length * (closures.length + 1);
    let steps = 0;

    while (worklist.length > 0) {
      if (++steps > maxSteps) {
        throwError(`Capture analysis did not converge after ${maxSteps} steps in '${method.name}'`);
      }
      const id = worklist.shift();
      hardAssert(id !== undefined);
      queued.delete(id);
      const changed = closures[id];

      for (const referrerId of referencedBy.get(id) ?? []) {
        const referrer = closures[referrerId];
        let grew = false;
        for (const variable of changed.capturedVariables) {
          if (!referrer.capturedVariables.has(variable) && isDeclaredOutside(model, variable, referrer)) {
            referrer.capturedVariables.add(variable);
            grew = true;
          }
        }
        if (grew && !queued.has(referrerId)) {
          worklist.push(referrerId);
          queued.add(referrerId);
        }
      }
    }
  }
}
