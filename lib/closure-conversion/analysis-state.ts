import { BoundMethod } from '../bound-tree';
import { TraceFile } from '../trace-file';
import { AnalysisModel } from './analysis-model';
import { SourceCursor } from './common';

export interface AnalysisState {
  method: BoundMethod;
  cur: SourceCursor;
  model: AnalysisModel;

  // Names already taken by synthesized types, methods and locals
  takenNames: Set<string>;

  trace?: TraceFile;
}
