import { isDeepStrictEqual } from 'node:util';
import type { EdgeLike, NodeLike } from './graph';

/** The read-only surface diffGraphs needs; any Graph<N, E> satisfies it. */
export interface ReadableGraph {
  readonly directed: boolean;
  nodes(): NodeLike[];
  edges(): EdgeLike[];
  getNode(id: string): NodeLike | undefined;
  hasNode(id: string): boolean;
}

export interface GraphDiff {
  directed?: { left: boolean; right: boolean };
  missingNodes: string[];     // in left, not in right
  extraNodes: string[];       // in right, not in left
  changedNodes: string[];
  missingEdges: string[];
  extraEdges: string[];
  changedEdges: string[];
}

const edgeLabel = (e: EdgeLike) => `${e.from} -> ${e.to}`;

/** Attribute-level comparison of two graphs keyed by node id and edge endpoints. */
export function diffGraphs(left: ReadableGraph, right: ReadableGraph): GraphDiff {
  const diff: GraphDiff = {
    missingNodes: [], extraNodes: [], changedNodes: [],
    missingEdges: [], extraEdges: [], changedEdges: [],
  };
  if (left.directed !== right.directed) diff.directed = { left: left.directed, right: right.directed };

  for (const n of left.nodes()) {
    const other = right.getNode(n.id);
    if (!other) diff.missingNodes.push(n.id);
    else if (!isDeepStrictEqual(n, other)) diff.changedNodes.push(n.id);
  }
  for (const n of right.nodes()) if (!left.hasNode(n.id)) diff.extraNodes.push(n.id);

  // edges are compared in their stored orientation
  const rightEdges = new Map(right.edges().map((e) => [edgeLabel(e), e]));
  const leftKeys = new Set<string>();
  for (const e of left.edges()) {
    const k = edgeLabel(e);
    leftKeys.add(k);
    const other = rightEdges.get(k);
    if (!other) diff.missingEdges.push(k);
    else if (!isDeepStrictEqual(e, other)) diff.changedEdges.push(k);
  }
  for (const k of rightEdges.keys()) if (!leftKeys.has(k)) diff.extraEdges.push(k);
  return diff;
}

export function graphsEqual(left: ReadableGraph, right: ReadableGraph): boolean {
  const d = diffGraphs(left, right);
  return !d.directed
    && d.missingNodes.length === 0 && d.extraNodes.length === 0 && d.changedNodes.length === 0
    && d.missingEdges.length === 0 && d.extraEdges.length === 0 && d.changedEdges.length === 0;
}
