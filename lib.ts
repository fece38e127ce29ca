export { convertClosures } from './lib/closure-conversion';
export type { ConversionOptions } from './lib/closure-conversion';
export { stringifyAnalysis } from './lib/closure-conversion/stringify-analysis';
export { lowerMethods } from './lib/lower-methods';
export type { LowerMethodsOptions, LoweredMethod, CancellationToken } from './lib/lower-methods';
export { transcribeMethod } from './lib/transcribe-method';
export {
  stringifyConversionResult,
  stringifyLoweredMethod,
  stringifyEnvironment,
  stringifyType,
} from './lib/stringify-lowered';
export {
  ClosureConversionError,
  InternalCompilerError,
  MalformedInputError,
  OperationCanceledError,
} from './lib/utils';
export * as B from './lib/bound-tree';
export * as L from './lib/lowered-tree';
export type { BoundMethod } from './lib/bound-tree';
export type { ConversionResult, SynthesizedEnvironment, SynthesizedMethod } from './lib/lowered-tree';
