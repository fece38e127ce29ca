import * as B from '../bound-tree';
import { assertUnreachable } from '../utils';
import { Closure, Scope, ScopeId, ScopeKind } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { malformedInput, visitingNode } from './common';
import { isAncestorOrSelf } from './frames';

export function pass1_buildScopeTree({ method, cur, model }: AnalysisState) {
  /*
  (See convertClosures for a description of this pass)

  A single traversal of the bound tree that mirrors every block and every
  nested function body as a scope, and attaches declarations to the scope that
  lexically owns them. The binder's annotation of the declaring block on each
  variable and function is checked against the position at which the
  declaration is found.

  References are not resolved during the traversal, since local functions may
  refer to functions (and functions to variables) that are declared further
  down. They are collected and checked once all declarations are known.
  */

  const { scopes, closures, scopeByBlock, variableScopes } = model;

  const pendingVariableReferences: { variable: B.VariableId, scope: ScopeId, node: B.Node }[] = [];
  const pendingFunctionReferences: { func: B.FunctionId, scope: ScopeId, node: B.Node }[] = [];

  const root = createScope('method-body', method.body, undefined);
  model.rootScope = root.id;

  for (const parameter of method.parameters) {
    declareVariable(parameter, root, 'parameter');
  }

  if (!method.isStatic) {
    const thisVariable = method.variables.length;
    model.thisVariable = thisVariable;
    root.declaredVariables.push(thisVariable);
    variableScopes.set(thisVariable, root.id);
  }

  traverseBlockBody(method.body, root);

  cur.node = undefined;
  cur.functionName = undefined;

  for (let id = 0; id < method.functions.length; id++) {
    if (!closures[id]) {
      malformedInput(cur, `function '${method.functions[id].name}' is never declared in the method body`);
    }
  }

  for (const { variable, scope, node } of pendingVariableReferences) {
    visitingNode(cur, node);
    const declaringScope = variableScopes.get(variable);
    if (declaringScope === undefined) {
      malformedInput(cur, `variable '${method.variables[variable].name}' is referenced but never declared`);
    }
    if (!isAncestorOrSelf(model, declaringScope, scope)) {
      malformedInput(cur, `variable '${method.variables[variable].name}' is referenced outside the scope that declares it`);
    }
  }

  for (const { func, scope, node } of pendingFunctionReferences) {
    visitingNode(cur, node);
    if (!isAncestorOrSelf(model, closures[func].declaringScope, scope)) {
      malformedInput(cur, `function '${method.functions[func].name}' is referenced outside the scope that declares it`);
    }
  }

  function createScope(kind: ScopeKind, block: B.Block, parent: Scope | undefined): Scope {
    if (scopeByBlock.has(block.id)) {
      visitingNode(cur, block);
      malformedInput(cur, `duplicate block id ${block.id}`);
    }
    const scope: Scope = {
      id: scopes.length,
      kind,
      block: block.id,
      parent: parent?.id,
      children: [],
      depth: parent ? parent.depth + 1 : 0,
      declaredVariables: [],
      nestedFunctions: [],
    };
    scopes.push(scope);
    scopeByBlock.set(block.id, scope.id);
    parent?.children.push(scope.id);
    return scope;
  }

  function declareVariable(id: B.VariableId, scope: Scope, kind: B.BoundVariable['kind']) {
    const variable = lookupVariable(id);
    if (variable.kind !== kind) {
      malformedInput(cur, `variable '${variable.name}' is declared as a ${kind} but bound as a ${variable.kind}`);
    }
    if (variable.scope !== scope.block) {
      malformedInput(cur, `variable '${variable.name}' is bound to block ${variable.scope} but declared in block ${scope.block}`);
    }
    if (variableScopes.has(id)) {
      malformedInput(cur, `variable '${variable.name}' is declared more than once`);
    }
    variableScopes.set(id, scope.id);
    scope.declaredVariables.push(id);
  }

  function lookupVariable(id: B.VariableId): B.BoundVariable {
    const variable = method.variables[id];
    if (!variable) {
      malformedInput(cur, `no variable with id ${id}`);
    }
    return variable;
  }

  function lookupFunction(id: B.FunctionId): B.BoundFunction {
    const func = method.functions[id];
    if (!func) {
      malformedInput(cur, `no nested function with id ${id}`);
    }
    return func;
  }

  function declareFunction(id: B.FunctionId, scope: Scope, kind: B.BoundFunction['kind']) {
    const func = lookupFunction(id);
    if (func.kind !== kind) {
      malformedInput(cur, `function '${func.name}' is declared as a ${kind} but bound as a ${func.kind}`);
    }
    if (func.scope !== scope.block) {
      malformedInput(cur, `function '${func.name}' is bound to block ${func.scope} but declared in block ${scope.block}`);
    }
    if (closures[id]) {
      malformedInput(cur, `function '${func.name}' is declared more than once`);
    }

    const bodyScope = createScope(kind === 'lambda' ? 'lambda-body' : 'local-function-body', func.body, scope);
    const closure: Closure = {
      id,
      function: id,
      kind,
      name: func.name,
      scope: bodyScope.id,
      declaringScope: scope.id,
      parameters: func.parameters,
      directCaptures: new Set(),
      capturedVariables: new Set(),
      references: new Set(),
      // Lambdas are always converted to a delegate
      canTakeRefParameters: kind === 'local-function'
        && !func.isConvertedToDelegate
        && !func.isAsync
        && !func.isIterator,
      capturedEnvironments: new Set(),
    };
    closures[id] = closure;
    bodyScope.closure = id;
    scope.nestedFunctions.push(id);

    const outerFunctionName = cur.functionName;
    cur.functionName = func.name;
    for (const parameter of func.parameters) {
      declareVariable(parameter, bodyScope, 'parameter');
    }
    traverseBlockBody(func.body, bodyScope);
    cur.functionName = outerFunctionName;
  }

  function traverseBlockBody(block: B.Block, scope: Scope) {
    for (const statement of block.statements) {
      traverseStatement(statement, scope);
    }
  }

  function traverseStatement(statement: B.Statement, scope: Scope) {
    visitingNode(cur, statement);
    switch (statement.type) {
      case 'Block': {
        const blockScope = createScope('block', statement, scope);
        traverseBlockBody(statement, blockScope);
        return;
      }
      case 'LocalDeclaration': {
        declareVariable(statement.variable, scope, 'local');
        if (statement.initializer) {
          traverseExpression(statement.initializer, scope);
        }
        return;
      }
      case 'ExpressionStatement': return traverseExpression(statement.expression, scope);
      case 'ReturnStatement': {
        if (statement.value) {
          traverseExpression(statement.value, scope);
        }
        return;
      }
      case 'IfStatement': {
        traverseExpression(statement.condition, scope);
        traverseStatement(statement.consequent, scope);
        if (statement.alternate) {
          traverseStatement(statement.alternate, scope);
        }
        return;
      }
      case 'WhileStatement': {
        traverseExpression(statement.condition, scope);
        traverseStatement(statement.body, scope);
        return;
      }
      case 'LocalFunctionStatement': return declareFunction(statement.function, scope, 'local-function');
      default: assertUnreachable(statement);
    }
  }

  function traverseExpression(expression: B.Expression, scope: Scope) {
    visitingNode(cur, expression);
    switch (expression.type) {
      case 'Literal': return;
      case 'VariableReference': {
        lookupVariable(expression.variable);
        pendingVariableReferences.push({ variable: expression.variable, scope: scope.id, node: expression });
        return;
      }
      case 'ThisReference': {
        if (method.isStatic) {
          malformedInput(cur, '`this` referenced in a static method');
        }
        return;
      }
      case 'FieldAccess': return traverseExpression(expression.receiver, scope);
      case 'Assignment': {
        traverseExpression(expression.target, scope);
        traverseExpression(expression.value, scope);
        return;
      }
      case 'BinaryExpression': {
        traverseExpression(expression.left, scope);
        traverseExpression(expression.right, scope);
        return;
      }
      case 'UnaryExpression': return traverseExpression(expression.operand, scope);
      case 'CallExpression': {
        if (expression.receiver) {
          traverseExpression(expression.receiver, scope);
        }
        expression.args.forEach(arg => traverseExpression(arg, scope));
        return;
      }
      case 'LocalFunctionCall': {
        referenceFunction(expression.function, scope, expression);
        expression.args.forEach(arg => traverseExpression(arg, scope));
        return;
      }
      case 'FunctionConversion': {
        const func = referenceFunction(expression.function, scope, expression);
        if (!func.isConvertedToDelegate) {
          malformedInput(cur, `function '${func.name}' is converted to a delegate but not bound as such`);
        }
        return;
      }
      case 'LambdaExpression': return declareFunction(expression.function, scope, 'lambda');
      default: assertUnreachable(expression);
    }
  }

  function referenceFunction(id: B.FunctionId, scope: Scope, node: B.Node): B.BoundFunction {
    const func = lookupFunction(id);
    if (func.kind !== 'local-function') {
      malformedInput(cur, `lambda '${func.name}' cannot be referenced by name`);
    }
    pendingFunctionReferences.push({ func: id, scope: scope.id, node });
    return func;
  }
}
