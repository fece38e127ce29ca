export class ClosureConversionError extends Error {
}

/**
 * A defect in the pass itself (or in the analysis graph it built), never a
 * problem with the user's program.
 */
export class InternalCompilerError extends ClosureConversionError {
}

/**
 * The bound tree handed to the pass broke its contract with the binder.
 */
export class MalformedInputError extends ClosureConversionError {
}

export class OperationCanceledError extends ClosureConversionError {
}

export function throwError(message: string): never {
  // A good place to set a breakpoint
  throw new InternalCompilerError(message);
}

export function assertUnreachable(value: never): never {
  throwError('Internal compiler error (reached unexpected code path)');
}

export function hardAssert(predicate: unknown, message?: string): asserts predicate {
  if (!predicate) {
    throwError('Internal compiler error' + (message ? ': ' + message : ''));
  }
}

export function invariantViolation(message: string): never {
  throwError(`Closure conversion invariant violated: ${message}`);
}

export function notUndefined<T>(v: T | undefined | null): T {
  if (v === undefined || v === null) {
    throwError('Internal compiler error: Did not expect value to be undefined');
  }
  return v;
}

export function uniqueName(base: string, nameTaken: (name: string) => boolean): string {
  if (!nameTaken(base)) {
    return base;
  }
  const endsInNumber = base.match(/^(.*?)(\d+)$/);
  let counter;
  if (endsInNumber) {
    let counterStr: string;
    [, base, counterStr] = endsInNumber;
    counter = parseInt(counterStr);
  } else {
    counter = 1;
  }
  let name = base + counter;
  while (nameTaken(name)) {
    name = base + (++counter);
  }
  return name;
}

/*
 * I caught myself using `uniqueName` but not adding the result to the set,
 * which is why I created this.
 */
export function uniqueNameInSet(base: string, set: Set<string>): string {
  const name = uniqueName(base, n => set.has(n));
  set.add(name);
  return name;
}

// Modelled after https://github.com/tc39/proposal-upsert
export function mapEmplace<K, V>(map: Map<K, V>, key: K, handler: {
  insert(key: K, map: Map<K, V>): V;
}): V {
  const existing = map.get(key);
  if (existing !== undefined) {
    return existing;
  }
  const newValue = handler.insert(key, map);
  map.set(key, newValue);
  return newValue;
}
