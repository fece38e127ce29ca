import * as B from './bound-tree';
import * as L from './lowered-tree';
import { MalformedInputError, assertUnreachable } from './utils';

/**
 * Copies the body of a method without nested functions into the lowered tree.
 * No analysis is needed: every variable stays a local and `this` stays `this`.
 */
export function transcribeMethod(method: B.BoundMethod): L.ConversionResult {
  if (B.containsNestedFunctions(method)) {
    throw new MalformedInputError(`Method '${method.name}' has nested functions and cannot be transcribed`);
  }

  return {
    body: transcribeBlock(method.body),
    environments: [],
    methods: [],
  };

  function transcribeBlock(block: B.Block): L.Block {
    return {
      type: 'Block',
      statements: block.statements.map(transcribeStatement),
    };
  }

  function transcribeStatement(statement: B.Statement): L.Statement {
    switch (statement.type) {
      case 'Block': return transcribeBlock(statement);
      case 'LocalDeclaration': {
        const variable = lookupVariable(statement.variable);
        return {
          type: 'LocalDeclaration',
          name: variable.name,
          localType: variable.declaredType,
          initializer: statement.initializer && transcribeExpression(statement.initializer),
        };
      }
      case 'ExpressionStatement': return { type: 'ExpressionStatement', expression: transcribeExpression(statement.expression) };
      case 'ReturnStatement': return { type: 'ReturnStatement', value: statement.value && transcribeExpression(statement.value) };
      case 'IfStatement': return {
        type: 'IfStatement',
        condition: transcribeExpression(statement.condition),
        consequent: transcribeStatement(statement.consequent),
        alternate: statement.alternate && transcribeStatement(statement.alternate),
      };
      case 'WhileStatement': return {
        type: 'WhileStatement',
        condition: transcribeExpression(statement.condition),
        body: transcribeStatement(statement.body),
      };
      case 'LocalFunctionStatement': return nestedFunction();
      default: return assertUnreachable(statement);
    }
  }

  function transcribeExpression(expression: B.Expression): L.Expression {
    switch (expression.type) {
      case 'Literal': return { type: 'Literal', value: expression.value };
      case 'VariableReference': return transcribeVariable(expression);
      case 'ThisReference': return { type: 'ThisReference' };
      case 'FieldAccess': return { type: 'FieldAccess', receiver: transcribeExpression(expression.receiver), field: expression.field };
      case 'Assignment': return {
        type: 'Assignment',
        target: expression.target.type === 'VariableReference'
          ? transcribeVariable(expression.target)
          : { type: 'FieldAccess', receiver: transcribeExpression(expression.target.receiver), field: expression.target.field },
        value: transcribeExpression(expression.value),
      };
      case 'BinaryExpression': return {
        type: 'BinaryExpression',
        operator: expression.operator,
        left: transcribeExpression(expression.left),
        right: transcribeExpression(expression.right),
      };
      case 'UnaryExpression': return {
        type: 'UnaryExpression',
        operator: expression.operator,
        operand: transcribeExpression(expression.operand),
      };
      case 'CallExpression': return {
        type: 'CallExpression',
        receiver: expression.receiver && transcribeExpression(expression.receiver),
        method: expression.method,
        typeArguments: [],
        args: expression.args.map(transcribeExpression),
      };
      case 'LocalFunctionCall':
      case 'LambdaExpression':
      case 'FunctionConversion':
        return nestedFunction();
      default: return assertUnreachable(expression);
    }
  }

  function transcribeVariable(reference: B.VariableReference): L.LocalReference {
    return { type: 'LocalReference', name: lookupVariable(reference.variable).name };
  }

  function lookupVariable(id: B.VariableId): B.BoundVariable {
    const variable = method.variables[id];
    if (!variable) {
      throw new MalformedInputError(`Malformed bound tree: no variable with id ${id} in '${method.name}'`);
    }
    return variable;
  }

  function nestedFunction(): never {
    throw new MalformedInputError(`Malformed bound tree: '${method.name}' refers to a nested function but declares none`);
  }
}
