import path from 'path';
import { BoundMethod, containsNestedFunctions } from './bound-tree';
import { convertClosures } from './closure-conversion';
import { ConversionResult } from './lowered-tree';
import { transcribeMethod } from './transcribe-method';
import { ClosureConversionError, OperationCanceledError } from './utils';

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

export interface LowerMethodsOptions {
  cancellation?: CancellationToken;
  // For debug purposes: write a trace of each converted method to
  // `<traceDirectory>/<Type>.<Method>.trace`
  traceDirectory?: string;
}

export type LoweredMethod =
  | { type: 'Lowered', method: BoundMethod, result: ConversionResult, converted: boolean }
  | { type: 'Failed', method: BoundMethod, error: ClosureConversionError }

/**
 * Lowers each method independently. Methods without nested functions are
 * transcribed as they are. A method that fails yields a `Failed` entry and the
 * batch continues with the next one.
 *
 * Cancellation is checked before each method, never during one.
 */
export function lowerMethods(methods: readonly BoundMethod[], opts: LowerMethodsOptions = {}): LoweredMethod[] {
  const results: LoweredMethod[] = [];
  for (const method of methods) {
    if (opts.cancellation?.isCancellationRequested) {
      throw new OperationCanceledError(`Lowering canceled after ${results.length} of ${methods.length} methods`);
    }
    results.push(lowerMethod(method, opts));
  }
  return results;
}

function lowerMethod(method: BoundMethod, opts: LowerMethodsOptions): LoweredMethod {
  const converted = containsNestedFunctions(method);
  try {
    const result = converted
      ? convertClosures(method, {
        traceFilename: opts.traceDirectory !== undefined
          ? path.join(opts.traceDirectory, `${method.enclosingType.name}.${method.name}.trace`)
          : undefined,
      })
      : transcribeMethod(method);
    return { type: 'Lowered', method, result, converted };
  } catch (e) {
    if (e instanceof ClosureConversionError) {
      return { type: 'Failed', method, error: e };
    }
    throw e;
  }
}
