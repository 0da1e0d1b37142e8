import type { EdgeLike, Graph, NodeLike } from './graph';

export interface GraphStats {
  nodes: number;
  edges: number;
  nodeKinds: Record<string, number>;
  edgeKinds: Record<string, number>;
}

function countBy<T>(items: T[], key: (x: T) => string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const k of items.map(key).sort()) out[k] = (out[k] ?? 0) + 1;
  return out;
}

export function graphStats<N extends NodeLike, E extends EdgeLike>(g: Graph<N, E>): GraphStats {
  return {
    nodes: g.nodeCount,
    edges: g.edgeCount,
    nodeKinds: countBy(g.nodes(), (n) => n.kind),
    edgeKinds: countBy(g.edges(), (e) => e.kind),
  };
}
