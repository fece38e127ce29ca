import * as L from './lowered-tree';
import { assertUnreachable } from './utils';

/*
Renders the lowered tree as C#-like text, for tests and trace output. The
rendering is meant to be read, not compiled: `iterator` is shown as a modifier
and struct environments are shown with their fields only.
*/

export function stringifyConversionResult(result: L.ConversionResult): string {
  const environmentSections = result.environments.map(environment => {
    const methods = result.methods.filter(m =>
      m.container.type === 'Environment' && m.container.name === environment.name);
    return stringifyEnvironment(environment, methods);
  });

  const enclosingTypeMethods = result.methods
    .filter(m => m.container.type === 'EnclosingType')
    .map(m => stringifyLoweredMethod(m, ''));

  return [
    `body ${stringifyBlock(result.body, '')}`,
    ...environmentSections,
    ...enclosingTypeMethods,
  ].join('\n\n');
}

export function stringifyEnvironment(environment: L.SynthesizedEnvironment, methods: L.SynthesizedMethod[] = []): string {
  const members = [
    ...environment.fields.map(f => `  ${stringifyType(f.fieldType)} ${f.name};`),
    ...methods.map(m => '  ' + stringifyLoweredMethod(m, '  ')),
  ];
  return `${environment.kind} ${environment.name}${
    stringifyTypeParameters(environment.typeParameters)
  } {${
    members.map(m => '\n' + m).join('')
  }\n}`;
}

export function stringifyLoweredMethod(method: L.SynthesizedMethod, indent: string): string {
  const modifiers = [
    method.isStatic ? 'static ' : '',
    method.isAsync ? 'async ' : '',
    method.isIterator ? 'iterator ' : '',
  ].join('');
  const parameters = method.parameters
    .map(p => `${p.isRef ? 'ref ' : ''}${stringifyType(p.parameterType)} ${p.name}`)
    .join(', ');
  return `${modifiers}${stringifyType(method.returnType)} ${method.name}${
    stringifyTypeParameters(method.typeParameters)
  }(${parameters}) ${stringifyBlock(method.body, indent)}`;
}

export function stringifyBlock(block: L.Block, indent: string): string {
  if (block.statements.length === 0) {
    return '{ }';
  }
  return `{${
    block.statements
      .map(s => `\n${indent}  ${stringifyStatement(s, indent + '  ')}`)
      .join('')
  }\n${indent}}`;
}

export function stringifyStatement(statement: L.Statement, indent: string): string {
  switch (statement.type) {
    case 'Block': return stringifyBlock(statement, indent);
    case 'LocalDeclaration': return `${stringifyType(statement.localType)} ${statement.name}${
      statement.initializer ? ` = ${stringifyExpression(statement.initializer)}` : ''
    };`;
    case 'ExpressionStatement': return `${stringifyExpression(statement.expression)};`;
    case 'ReturnStatement': return statement.value
      ? `return ${stringifyExpression(statement.value)};`
      : 'return;';
    case 'IfStatement': return `if (${stringifyExpression(statement.condition)}) ${
      stringifyStatement(statement.consequent, indent)
    }${
      statement.alternate ? ` else ${stringifyStatement(statement.alternate, indent)}` : ''
    }`;
    case 'WhileStatement': return `while (${stringifyExpression(statement.condition)}) ${
      stringifyStatement(statement.body, indent)
    }`;
    default: return assertUnreachable(statement);
  }
}

export function stringifyExpression(expression: L.Expression): string {
  switch (expression.type) {
    case 'Literal': return stringifyLiteral(expression.value);
    case 'LocalReference': return expression.name;
    case 'ThisReference': return 'this';
    case 'FieldAccess': return `${stringifyOperand(expression.receiver)}.${expression.field}`;
    case 'Assignment': return `${stringifyExpression(expression.target)} = ${stringifyExpression(expression.value)}`;
    case 'BinaryExpression': return `${stringifyOperand(expression.left)} ${expression.operator} ${stringifyOperand(expression.right)}`;
    case 'UnaryExpression': return `${expression.operator}${stringifyOperand(expression.operand)}`;
    case 'CallExpression': return `${stringifyMethodReference(expression)}(${
      expression.args.map(stringifyExpression).join(', ')
    })`;
    case 'DelegateCreation': return `new ${stringifyType(expression.delegateType)}(${stringifyMethodReference(expression)})`;
    case 'NewEnvironment': return `new ${stringifyType(expression.environmentType)}()`;
    case 'DefaultValue': return `default(${stringifyType(expression.valueType)})`;
    case 'RefArgument': return `ref ${expression.operand.name}`;
    default: return assertUnreachable(expression);
  }
}

export function stringifyType(type: L.TypeRef): string {
  switch (type.type) {
    case 'TypeParameterType': return type.name;
    case 'NamedType': return type.typeArguments.length > 0
      ? `${type.name}<${type.typeArguments.map(stringifyType).join(', ')}>`
      : type.name;
    default: return assertUnreachable(type);
  }
}

function stringifyTypeParameters(typeParameters: string[]): string {
  return typeParameters.length > 0 ? `<${typeParameters.join(', ')}>` : '';
}

function stringifyMethodReference(reference: L.CallExpression | L.DelegateCreation): string {
  const typeArguments = reference.typeArguments.length > 0
    ? `<${reference.typeArguments.map(stringifyType).join(', ')}>`
    : '';
  const receiver = reference.receiver ? `${stringifyOperand(reference.receiver)}.` : '';
  return `${receiver}${reference.method}${typeArguments}`;
}

// Compound expressions are parenthesized when used as an operand
function stringifyOperand(expression: L.Expression): string {
  switch (expression.type) {
    case 'Assignment':
    case 'BinaryExpression':
    case 'UnaryExpression':
      return `(${stringifyExpression(expression)})`;
    default:
      return stringifyExpression(expression);
  }
}

function stringifyLiteral(value: L.LiteralValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
