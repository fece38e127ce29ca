import { noCase } from 'no-case';
import * as B from '../bound-tree';
import { MalformedInputError } from '../utils';

// Tells us where we are in the bound tree
export interface SourceCursor {
  methodName: string;
  node?: B.Node;
  // Set while visiting the body of a nested function
  functionName?: string;
}

// This is called before we investigate a node during analysis or rewriting. It
// records the current node so that if subsequent errors are generated then we
// know roughly where the error occurred
export function visitingNode(cur: SourceCursor, node: B.Node) {
  cur.node = node;
}

export function malformedInput(cur: SourceCursor, message: string): never {
  throw new MalformedInputError(`Malformed bound tree: ${message}\n      at ${describeLocation(cur)}`);
}

export function describeLocation(cur: SourceCursor): string {
  const where = cur.functionName !== undefined
    ? `${cur.methodName} > ${cur.functionName}`
    : cur.methodName;
  return cur.node ? `${noCase(cur.node.type)} (${where})` : where;
}
