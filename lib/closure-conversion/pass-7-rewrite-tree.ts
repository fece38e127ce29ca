import * as B from '../bound-tree';
import * as L from '../lowered-tree';
import { assertUnreachable, hardAssert, invariantViolation, notUndefined } from '../utils';
import { Closure, ClosureSignature, EnvironmentId, Frame } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { visitingNode } from './common';
import { frameAtEntry, hostFrame, parentFrame, sameFrame } from './frames';
import { parentFieldName } from './pass-6-synthesize-declarations';
import { TypeParameterMap, identityTypeMap, substituteType, typeArgumentsFor } from './type-substitution';

/**
 * What the rewriter knows at a point in a lowered method. A new context is
 * derived on entry to each scope that creates an environment; nothing here is
 * mutated, so each subtree can be rewritten in isolation given its context.
 */
export interface RewriteContext {
  // The current reference-environment pointer, and how to spell it here
  frame: Frame;
  frameExpression?: L.Expression;
  // The frame the lowered method itself starts with (its `this`). Anything
  // not created in the method is reached from here, never from `frame`, since
  // environments created in the method need not link back to it.
  entryFrame: Frame;
  entryFrameExpression?: L.Expression;
  // Environments that can be named directly: locals created in this method,
  // `ref` parameters, and the environment hosting the method (as `this`)
  environments: ReadonlyMap<EnvironmentId, L.Expression>;
  typeParameterMap: TypeParameterMap;
}

export function pass7_rewriteTree({ method, cur, model }: AnalysisState): L.ConversionResult {
  /*
  A single traversal of the bound tree that produces the lowered tree for the
  method body and for every closure body. All declarations were finalized by
  the previous pass, so a call site can be rewritten even when the callee is
  declared further down or is the function being rewritten.
  */

  const rootFrame = frameAtEntry(model, model.rootScope);
  const body = rewriteScopeBlock(method.body, methodEntryContext(rootFrame, new Map(), identityTypeMap));

  const methods = model.closures.map(lowerClosure);

  const environments = model.environments
    .filter(e => model.scopes[e.scope].environment === e.id)
    .map(e => {
      const { name, kind, typeParameters, fields } = notUndefined(e.declaration);
      return { name, kind, typeParameters, fields };
    });

  return { body, environments, methods };

  function lowerClosure(closure: Closure): L.SynthesizedMethod {
    const func = method.functions[closure.function];
    const signature = notUndefined(closure.signature);
    cur.functionName = func.name;

    const frame = hostFrame(model, closure);
    const environments = new Map<EnvironmentId, L.Expression>();
    if (closure.containingEnvironment !== undefined) {
      environments.set(closure.containingEnvironment, thisReference());
    }
    signature.refEnvironments.forEach(e =>
      environments.set(e, localReference(notUndefined(model.environments[e].declaration).localName)));

    const body = rewriteScopeBlock(func.body, methodEntryContext(frame, environments, signature.typeParameterMap));
    cur.functionName = undefined;

    const host = closure.containingEnvironment === undefined
      ? undefined
      : notUndefined(model.environments[closure.containingEnvironment].declaration);

    return {
      name: signature.methodName,
      container: host
        ? { type: 'Environment', name: host.name }
        : { type: 'EnclosingType' },
      isStatic: signature.isStatic,
      typeParameters: signature.typeParameters,
      parameters: signature.parameters,
      returnType: substituteType(func.returnType, signature.typeParameterMap),
      isAsync: func.isAsync,
      isIterator: func.isIterator,
      body,
    };
  }

  // In every lowered method, the entry frame is spelled `this`
  function methodEntryContext(
    frame: Frame,
    environments: ReadonlyMap<EnvironmentId, L.Expression>,
    typeParameterMap: TypeParameterMap,
  ): RewriteContext {
    const frameExpression = frame.type === 'NoFrame' ? undefined : thisReference();
    return {
      frame,
      frameExpression,
      entryFrame: frame,
      entryFrameExpression: frameExpression,
      environments,
      typeParameterMap,
    };
  }

  function rewriteScopeBlock(block: B.Block, outer: RewriteContext): L.Block {
    const scope = model.scopes[notUndefined(model.scopeByBlock.get(block.id))];
    const statements: L.Statement[] = [];
    let ctx = outer;

    if (scope.environment !== undefined) {
      const environment = model.environments[scope.environment];
      const declaration = notUndefined(environment.declaration);
      const environmentType = B.namedType(declaration.name,
        ...typeArgumentsFor(method.typeParameters, ctx.typeParameterMap));
      const local = localReference(declaration.localName);

      statements.push({
        type: 'LocalDeclaration',
        name: declaration.localName,
        localType: environmentType,
        initializer: environment.kind === 'class'
          ? { type: 'NewEnvironment', environmentType }
          : { type: 'DefaultValue', valueType: environmentType },
      });

      if (environment.capturesParent) {
        hardAssert(sameFrame(parentFrame(model, environment), ctx.frame));
        statements.push(assignStatement(fieldAccess(local, parentFieldName), notUndefined(ctx.frameExpression)));
      }

      // Parameters and the receiver already have values on entry, so they are
      // copied in here. Locals are stored into the environment where they are
      // declared.
      for (const variable of environment.variables) {
        const field = fieldAccess(local, notUndefined(declaration.fieldNames.get(variable)));
        if (variable === model.thisVariable) {
          statements.push(assignStatement(field, thisReference()));
        } else if (method.variables[variable].kind === 'parameter') {
          statements.push(assignStatement(field, localReference(method.variables[variable].name)));
        }
      }

      const environments = new Map(ctx.environments);
      environments.set(environment.id, local);
      ctx = environment.kind === 'class'
        ? { ...ctx, environments, frame: { type: 'EnvironmentFrame', environment: environment.id }, frameExpression: local }
        : { ...ctx, environments };
    }

    for (const statement of block.statements) {
      statements.push(...rewriteStatement(statement, ctx));
    }

    return { type: 'Block', statements };
  }

  function rewriteStatement(statement: B.Statement, ctx: RewriteContext): L.Statement[] {
    visitingNode(cur, statement);
    switch (statement.type) {
      case 'Block': return [rewriteScopeBlock(statement, ctx)];
      case 'LocalDeclaration': {
        const variable = method.variables[statement.variable];
        const initializer = statement.initializer && rewriteExpression(statement.initializer, ctx);
        if (model.hoistedVariables.has(statement.variable)) {
          return initializer
            ? [assignStatement(accessVariable(statement.variable, ctx), initializer)]
            : [];
        }
        return [{
          type: 'LocalDeclaration',
          name: variable.name,
          localType: substituteType(variable.declaredType, ctx.typeParameterMap),
          initializer,
        }];
      }
      case 'ExpressionStatement': return [{ type: 'ExpressionStatement', expression: rewriteExpression(statement.expression, ctx) }];
      case 'ReturnStatement': return [{
        type: 'ReturnStatement',
        value: statement.value && rewriteExpression(statement.value, ctx),
      }];
      case 'IfStatement': return [{
        type: 'IfStatement',
        condition: rewriteExpression(statement.condition, ctx),
        consequent: rewriteEmbeddedStatement(statement.consequent, ctx),
        alternate: statement.alternate && rewriteEmbeddedStatement(statement.alternate, ctx),
      }];
      case 'WhileStatement': return [{
        type: 'WhileStatement',
        condition: rewriteExpression(statement.condition, ctx),
        body: rewriteEmbeddedStatement(statement.body, ctx),
      }];
      // The function now lives in its synthesized method
      case 'LocalFunctionStatement': return [];
      default: return assertUnreachable(statement);
    }
  }

  function rewriteEmbeddedStatement(statement: B.Statement, ctx: RewriteContext): L.Statement {
    const rewritten = rewriteStatement(statement, ctx);
    return rewritten.length === 1 ? rewritten[0] : { type: 'Block', statements: rewritten };
  }

  function rewriteExpression(expression: B.Expression, ctx: RewriteContext): L.Expression {
    visitingNode(cur, expression);
    switch (expression.type) {
      case 'Literal': return { type: 'Literal', value: expression.value };
      case 'VariableReference': return accessVariable(expression.variable, ctx);
      case 'ThisReference': return accessReceiver(ctx);
      case 'FieldAccess': return fieldAccess(rewriteExpression(expression.receiver, ctx), expression.field);
      case 'Assignment': {
        const target = expression.target.type === 'VariableReference'
          ? accessVariable(expression.target.variable, ctx)
          : fieldAccess(rewriteExpression(expression.target.receiver, ctx), expression.target.field);
        return assign(target, rewriteExpression(expression.value, ctx));
      }
      case 'BinaryExpression': return {
        type: 'BinaryExpression',
        operator: expression.operator,
        left: rewriteExpression(expression.left, ctx),
        right: rewriteExpression(expression.right, ctx),
      };
      case 'UnaryExpression': return {
        type: 'UnaryExpression',
        operator: expression.operator,
        operand: rewriteExpression(expression.operand, ctx),
      };
      case 'CallExpression': return {
        type: 'CallExpression',
        receiver: expression.receiver && rewriteExpression(expression.receiver, ctx),
        method: expression.method,
        typeArguments: [],
        args: expression.args.map(a => rewriteExpression(a, ctx)),
      };
      case 'LocalFunctionCall': {
        const closure = model.closures[expression.function];
        const signature = notUndefined(closure.signature);
        const args = expression.args.map(a => rewriteExpression(a, ctx));
        for (const environment of signature.refEnvironments) {
          args.push({ type: 'RefArgument', operand: refOperand(environment, ctx) });
        }
        return {
          type: 'CallExpression',
          receiver: closureReceiver(closure, ctx),
          method: signature.methodName,
          typeArguments: closureTypeArguments(closure, ctx),
          args,
        };
      }
      case 'LambdaExpression':
      case 'FunctionConversion': {
        const closure = model.closures[expression.function];
        const signature = notUndefined(closure.signature);
        // A delegate cannot carry `ref` arguments
        hardAssert(signature.refEnvironments.length === 0);
        return {
          type: 'DelegateCreation',
          receiver: closureReceiver(closure, ctx),
          method: signature.methodName,
          typeArguments: closureTypeArguments(closure, ctx),
          delegateType: substituteType(expression.delegateType, ctx.typeParameterMap),
        };
      }
      default: return assertUnreachable(expression);
    }
  }

  function accessVariable(variable: B.VariableId, ctx: RewriteContext): L.LocalReference | L.FieldAccess {
    const environmentId = model.hoistedVariables.get(variable);
    if (environmentId === undefined) {
      hardAssert(variable !== model.thisVariable);
      return localReference(method.variables[variable].name);
    }
    const declaration = notUndefined(model.environments[environmentId].declaration);
    return fieldAccess(accessEnvironment(environmentId, ctx), notUndefined(declaration.fieldNames.get(variable)));
  }

  function accessReceiver(ctx: RewriteContext): L.Expression {
    const { thisVariable } = model;
    if (thisVariable !== undefined && model.hoistedVariables.has(thisVariable)) {
      return accessVariable(thisVariable, ctx);
    }
    return walkFrameChain({ type: 'ReceiverFrame' }, ctx);
  }

  function accessEnvironment(environmentId: EnvironmentId, ctx: RewriteContext): L.Expression {
    const direct = ctx.environments.get(environmentId);
    if (direct) return direct;
    if (model.environments[environmentId].kind === 'struct') {
      return invariantViolation(`struct environment ${environmentId} is not reachable here`);
    }
    return walkFrameChain({ type: 'EnvironmentFrame', environment: environmentId }, ctx);
  }

  // Follows parent fields from the method's entry frame until reaching `target`
  function walkFrameChain(target: Frame, ctx: RewriteContext): L.Expression {
    let frame = ctx.entryFrame;
    let expression = ctx.entryFrameExpression;
    while (!sameFrame(frame, target)) {
      if (frame.type !== 'EnvironmentFrame') {
        return invariantViolation(`no chain link reaches ${describeFrame(target)}`);
      }
      const environment = model.environments[frame.environment];
      if (!environment.capturesParent) {
        return invariantViolation(`environment ${environment.id} does not capture its parent but ${describeFrame(target)} is above it`);
      }
      expression = fieldAccess(notUndefined(expression), parentFieldName);
      frame = parentFrame(model, environment);
    }
    return notUndefined(expression);
  }

  function refOperand(environmentId: EnvironmentId, ctx: RewriteContext): L.LocalReference {
    const operand = accessEnvironment(environmentId, ctx);
    if (operand.type !== 'LocalReference') {
      return invariantViolation(`struct environment ${environmentId} is not held in a local or parameter`);
    }
    return operand;
  }

  function closureReceiver(closure: Closure, ctx: RewriteContext): L.Expression | undefined {
    if (closure.containingEnvironment !== undefined) {
      return accessEnvironment(closure.containingEnvironment, ctx);
    }
    return notUndefined(closure.signature).isStatic ? undefined : accessReceiver(ctx);
  }

  // Methods on the enclosing type are generic over the method's type
  // parameters, while methods on an environment get them from the environment
  function closureTypeArguments(closure: Closure, ctx: RewriteContext): L.TypeRef[] {
    const signature: ClosureSignature = notUndefined(closure.signature);
    return signature.typeParameters.length > 0
      ? typeArgumentsFor(signature.typeParameters, ctx.typeParameterMap)
      : [];
  }

  function describeFrame(frame: Frame): string {
    switch (frame.type) {
      case 'EnvironmentFrame': return `environment ${frame.environment}`;
      case 'ReceiverFrame': return 'the receiver';
      case 'NoFrame': return 'nothing';
    }
  }
}

function thisReference(): L.ThisReference {
  return { type: 'ThisReference' };
}

function localReference(name: string): L.LocalReference {
  return { type: 'LocalReference', name };
}

function fieldAccess(receiver: L.Expression, field: string): L.FieldAccess {
  return { type: 'FieldAccess', receiver, field };
}

function assignStatement(target: L.LocalReference | L.FieldAccess, value: L.Expression): L.ExpressionStatement {
  return { type: 'ExpressionStatement', expression: assign(target, value) };
}

function assign(target: L.LocalReference | L.FieldAccess, value: L.Expression): L.Assignment {
  return { type: 'Assignment', target, value };
}
