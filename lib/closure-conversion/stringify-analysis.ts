import { BoundMethod, VariableId } from '../bound-tree';
import { stringifyType } from '../stringify-lowered';
import { mapEmplace } from '../utils';
import { AnalysisModel, Closure, Environment, Scope } from './analysis-model';
import { liveEnvironments } from './frames';

// Dumps the analysis graph for trace output. Environments removed by the
// optimizer are not shown.
export function stringifyAnalysis(method: BoundMethod, model: AnalysisModel): string {
  const variableNames = new Map<VariableId, string>();
  const variableName = (variable: VariableId) => mapEmplace(variableNames, variable, {
    insert: () => variable === model.thisVariable ? 'this' : method.variables[variable].name,
  });
  const variableList = (variables: Iterable<VariableId>) => {
    const names = [...variables].map(variableName);
    return names.length > 0 ? names.join(', ') : '-';
  };

  const sections: string[] = [];

  if (model.scopes.length > 0) {
    sections.push(renderScope(model.scopes[model.rootScope], ''));
  }
  sections.push(...model.closures.map(renderClosure));
  sections.push(...liveEnvironments(model).map(renderEnvironment));

  return sections.join('\n');

  function renderScope(scope: Scope, indent: string): string {
    let line = `${indent}scope ${scope.id} ${scope.kind}`;
    if (scope.closure !== undefined) line += ` '${model.closures[scope.closure].name}'`;
    if (scope.declaredVariables.length) line += ` declares ${variableList(scope.declaredVariables)}`;
    if (scope.environment !== undefined) line += ` [environment ${scope.environment}]`;
    return [line, ...scope.children.map(c => renderScope(model.scopes[c], indent + '  '))].join('\n');
  }

  function renderClosure(closure: Closure): string {
    const lines = [
      `closure ${closure.id} '${closure.name}' (${closure.kind}${closure.canTakeRefParameters ? ', ref-eligible' : ''})`,
      `  captures ${variableList(closure.capturedVariables)}`,
    ];
    if (closure.references.size) {
      lines.push(`  refers to ${[...closure.references].map(r => `'${model.closures[r].name}'`).join(', ')}`);
    }
    if (closure.capturedEnvironments.size) {
      lines.push(`  reads environments ${[...closure.capturedEnvironments].join(', ')}`);
    }
    if (closure.containingEnvironment !== undefined) {
      lines.push(`  lowered onto environment ${closure.containingEnvironment}`);
    }
    if (closure.signature) {
      lines.push(`  lowered as ${closure.signature.isStatic ? 'static ' : ''}${closure.signature.methodName}`);
    }
    return lines.join('\n');
  }

  function renderEnvironment(environment: Environment): string {
    const { declaration } = environment;
    let line = `environment ${environment.id} ${environment.kind} in scope ${environment.scope}: ${variableList(environment.variables)}`;
    if (environment.capturesParent) line += ' [captures parent]';
    if (declaration) {
      line += ` as ${declaration.name} ${declaration.localName}`;
      if (declaration.parentType) line += ` (parent ${stringifyType(declaration.parentType)})`;
    }
    return line;
  }
}
