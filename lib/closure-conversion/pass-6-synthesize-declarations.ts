import _ from 'lodash';
import { TypeRef, namedType, typeParameter } from '../bound-tree';
import { FieldDeclaration, ParameterDeclaration } from '../lowered-tree';
import { hardAssert, invariantViolation, notUndefined, uniqueNameInSet } from '../utils';
import { Closure, Environment, EnvironmentDeclaration } from './analysis-model';
import { AnalysisState } from './analysis-state';
import { closureReadsReceiver, liveEnvironments, parentFrame } from './frames';
import { TypeParameterMap, identityTypeMap, substituteType, typeArgumentsFor } from './type-substitution';

export const parentFieldName = '$parent';
const thisFieldName = '$this';

export function pass6_synthesizeDeclarations({ method, model, takenNames }: AnalysisState) {
  /*
  Fixes the shape of everything the rewriter will refer to: environment types
  (name, kind, type parameters, fields) and the signature of every lowered
  closure. All signatures must exist before the rewriter runs because a local
  function can be called before (or from within) its own declaration.

  This is also the last point at which the configuration is checked, so that a
  broken invariant fails here rather than producing declarations.
  */

  const { closures } = model;
  const environments = liveEnvironments(model);

  validate();

  const enclosingTypeParameters = new Set(method.enclosingType.typeParameters);
  const receiverType = namedType(method.enclosingType.name,
    ...method.enclosingType.typeParameters.map(typeParameter));

  environments.forEach((environment, index) => {
    const name = uniqueNameInSet(`${method.name}_Env${index}`, takenNames);
    const localName = uniqueNameInSet(`$env${index}`, takenNames);

    // The environment is nested in the enclosing type, so its type parameters
    // must not shadow the enclosing type's own
    const reserved = new Set(enclosingTypeParameters);
    const typeParameterMap = new Map<string, string>();
    for (const original of method.typeParameters) {
      typeParameterMap.set(original, uniqueNameInSet(original, reserved));
    }

    environment.declaration = {
      name,
      kind: environment.kind,
      typeParameters: [...typeParameterMap.values()],
      fields: [],
      localName,
      typeParameterMap,
      fieldNames: new Map(),
    };
  });

  for (const environment of environments) {
    const declaration = notUndefined(environment.declaration);
    const fieldNames = new Set([parentFieldName]);
    for (const variable of environment.variables) {
      const isThis = variable === model.thisVariable;
      const fieldName = uniqueNameInSet(isThis ? thisFieldName : method.variables[variable].name, fieldNames);
      const fieldType = isThis ? receiverType : method.variables[variable].declaredType;
      declaration.fieldNames.set(variable, fieldName);
      declaration.fields.push({
        name: fieldName,
        fieldType: substituteType(fieldType, declaration.typeParameterMap),
      });
    }
    if (environment.capturesParent) {
      declaration.parentType = parentTypeOf(environment, declaration.typeParameterMap);
      const parentField: FieldDeclaration = { name: parentFieldName, fieldType: declaration.parentType };
      declaration.fields.push(parentField);
    }
  }

  for (const closure of closures) {
    closure.signature = synthesizeSignature(closure);
  }

  function synthesizeSignature(closure: Closure) {
    const func = method.functions[closure.function];
    const host = closure.containingEnvironment === undefined
      ? undefined
      : notUndefined(model.environments[closure.containingEnvironment].declaration);
    const typeParameterMap = host ? host.typeParameterMap : identityTypeMap;

    const refEnvironments = _.sortBy(
      [...closure.capturedEnvironments]
        .map(e => model.environments[e])
        .filter(e => e.kind === 'struct'),
      // Innermost first, then in order of creation
      [e => -model.scopes[e.scope].depth, e => e.id],
    );

    if (refEnvironments.length > 0 && !closure.canTakeRefParameters) {
      invariantViolation(`'${closure.name}' needs struct environments by reference but is not eligible for reference parameters`);
    }

    const parameters: ParameterDeclaration[] = closure.parameters.map(p => ({
      name: method.variables[p].name,
      parameterType: substituteType(method.variables[p].declaredType, typeParameterMap),
      isRef: false,
    }));
    for (const environment of refEnvironments) {
      const declaration = notUndefined(environment.declaration);
      parameters.push({
        name: declaration.localName,
        parameterType: environmentType(environment, typeParameterMap),
        isRef: true,
      });
    }

    const methodName = uniqueNameInSet(`${method.name}_${func.name}`, takenNames);

    return {
      methodName,
      isStatic: !host && !closureReadsReceiver(model, closure),
      typeParameters: host ? [] : [...method.typeParameters],
      parameters,
      refEnvironments: refEnvironments.map(e => e.id),
      typeParameterMap,
    };
  }

  function parentTypeOf(environment: Environment, map: TypeParameterMap): TypeRef {
    const parent = parentFrame(model, environment);
    switch (parent.type) {
      case 'EnvironmentFrame': return environmentType(model.environments[parent.environment], map);
      case 'ReceiverFrame': return receiverType;
      case 'NoFrame': return invariantViolation(`environment ${environment.id} captures its parent but has none`);
    }
  }

  // The type of an environment as spelled in a context using `map`
  function environmentType(environment: Environment, map: TypeParameterMap): TypeRef {
    const declaration = notUndefined(environment.declaration);
    return namedType(declaration.name, ...typeArgumentsFor(method.typeParameters, map));
  }

  function validate() {
    const owners = new Map<number, number>();
    for (const environment of environments) {
      for (const variable of environment.variables) {
        if (owners.has(variable)) {
          invariantViolation(`variable ${variable} is hoisted into environments ${owners.get(variable)} and ${environment.id}`);
        }
        owners.set(variable, environment.id);
      }

      if (environment.capturesParent) {
        if (environment.kind === 'struct') {
          invariantViolation(`struct environment ${environment.id} captures its parent`);
        }
        const parent = parentFrame(model, environment);
        if (parent.type === 'EnvironmentFrame' && model.environments[parent.environment].kind === 'struct') {
          invariantViolation(`environment ${environment.id} would hold struct environment ${parent.environment} in a field`);
        }
      }
    }

    for (const closure of closures) {
      if (closure.containingEnvironment === undefined) continue;
      const host = model.environments[closure.containingEnvironment];
      hardAssert(model.scopes[host.scope].environment === host.id, `'${closure.name}' is lowered onto a removed environment`);
      if (host.kind === 'struct') {
        invariantViolation(`'${closure.name}' is lowered onto struct environment ${host.id}`);
      }
    }
  }
}
