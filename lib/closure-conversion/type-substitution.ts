import { TypeRef, namedType, typeParameter } from '../bound-tree';
import { assertUnreachable } from '../utils';

// Maps type parameter names of the original method to the names used in some
// lowered context (an environment declaration, or a method lowered onto it)
export type TypeParameterMap = ReadonlyMap<string, string>;

export const identityTypeMap: TypeParameterMap = new Map();

export function substituteType(type: TypeRef, map: TypeParameterMap): TypeRef {
  switch (type.type) {
    case 'TypeParameterType': {
      const renamed = map.get(type.name);
      return renamed === undefined ? type : typeParameter(renamed);
    }
    case 'NamedType': {
      if (type.typeArguments.length === 0) return type;
      return namedType(type.name, ...type.typeArguments.map(t => substituteType(t, map)));
    }
    default: return assertUnreachable(type);
  }
}

// The type arguments that instantiate a declaration generic over `typeParameters`
// from inside a context using `map`
export function typeArgumentsFor(typeParameters: readonly string[], map: TypeParameterMap): TypeRef[] {
  return typeParameters.map(name => substituteType(typeParameter(name), map));
}
