// packages/graph/src/graph.ts
import {
  compareNames,
  DuplicateEdgeError,
  DuplicateNodeError,
  GraphFrozenError,
  UnknownNodeError,
} from '@lattice/core';

export interface NodeLike { id: string; kind: string }
export interface EdgeLike { from: string; to: string; kind: string }

const pairKey = (from: string, to: string) => `${from}\u0000${to}`;

/**
 * Typed graph of nodes and attributed edges. Directed graphs keep at most one
 * edge per ordered pair; undirected graphs at most one per unordered pair.
 * Every listing is sorted by id so iteration never depends on insertion order.
 */
export class Graph<N extends NodeLike = NodeLike, E extends EdgeLike = EdgeLike> {
  readonly directed: boolean;
  private readonly nodeMap = new Map<string, N>();
  private readonly edgeMap = new Map<string, E>();
  private readonly out = new Map<string, Set<string>>();
  private readonly inc = new Map<string, Set<string>>();
  private frozen = false;

  constructor(opts: { directed?: boolean } = {}) {
    this.directed = opts.directed ?? true;
  }

  // ---------- mutation (build phase only) ----------
  addNode(node: N): this {
    if (this.frozen) throw new GraphFrozenError(`addNode(${node.id})`);
    if (this.nodeMap.has(node.id)) throw new DuplicateNodeError(node.id);
    this.nodeMap.set(node.id, node);
    this.out.set(node.id, new Set());
    this.inc.set(node.id, new Set());
    return this;
  }

  addEdge(edge: E): this {
    if (this.frozen) throw new GraphFrozenError(`addEdge(${edge.from} -> ${edge.to})`);
    if (!this.nodeMap.has(edge.from)) throw new UnknownNodeError(edge.from, 'edge source');
    if (!this.nodeMap.has(edge.to)) throw new UnknownNodeError(edge.to, 'edge target');
    const key = pairKey(edge.from, edge.to);
    const clash = this.edgeMap.has(key) || (!this.directed && this.edgeMap.has(pairKey(edge.to, edge.from)));
    if (clash) throw new DuplicateEdgeError(edge.from, edge.to);
    this.edgeMap.set(key, edge);
    this.adj(this.out, edge.from).add(edge.to);
    this.adj(this.inc, edge.to).add(edge.from);
    return this;
  }

  /** After freeze() the graph is a read-only snapshot safe to share across requests. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean { return this.frozen; }

  // ---------- lookup ----------
  get nodeCount(): number { return this.nodeMap.size; }
  get edgeCount(): number { return this.edgeMap.size; }

  hasNode(id: string): boolean { return this.nodeMap.has(id); }

  getNode(id: string): N | undefined { return this.nodeMap.get(id); }

  requireNode(id: string, role?: string): N {
    const n = this.nodeMap.get(id);
    if (!n) throw new UnknownNodeError(id, role);
    return n;
  }

  hasEdge(from: string, to: string): boolean {
    return this.edgeMap.has(pairKey(from, to)) || (!this.directed && this.edgeMap.has(pairKey(to, from)));
  }

  /**
   * Edge between a and b in either direction (a->b preferred). The returned
   * edge keeps its stored from/to so callers can tell which way it points.
   */
  getEdge(a: string, b: string): E | null {
    return this.edgeMap.get(pairKey(a, b)) ?? this.edgeMap.get(pairKey(b, a)) ?? null;
  }

  /** Adjacent ids in both directions, ascending. */
  neighbors(id: string): string[] {
    this.requireNode(id);
    const all = new Set([...this.adj(this.out, id), ...this.adj(this.inc, id)]);
    return [...all].sort(compareNames);
  }

  successors(id: string): string[] {
    this.requireNode(id);
    if (!this.directed) return this.neighbors(id);
    return [...this.adj(this.out, id)].sort(compareNames);
  }

  predecessors(id: string): string[] {
    this.requireNode(id);
    if (!this.directed) return this.neighbors(id);
    return [...this.adj(this.inc, id)].sort(compareNames);
  }

  /** Outgoing edges of a node (all incident edges for undirected graphs), sorted by target. */
  outEdges(id: string): E[] {
    return this.successors(id).map((to) => this.getEdge(id, to)).filter((e): e is E => e !== null);
  }

  /** Incoming edges of a node (all incident edges for undirected graphs), sorted by source. */
  inEdges(id: string): E[] {
    return this.predecessors(id).map((from) => this.getEdge(from, id)).filter((e): e is E => e !== null);
  }

  nodes(): N[] {
    return [...this.nodeMap.values()].sort((a, b) => compareNames(a.id, b.id));
  }

  edges(): E[] {
    return [...this.edgeMap.values()].sort((a, b) => compareNames(a.from, b.from) || compareNames(a.to, b.to));
  }

  nodesOfKind<K extends N['kind']>(kind: K): Array<Extract<N, { kind: K }>> {
    return this.nodes().filter((n): n is Extract<N, { kind: K }> => n.kind === kind);
  }

  private adj(map: Map<string, Set<string>>, id: string): Set<string> {
    const s = map.get(id);
    if (!s) throw new UnknownNodeError(id);
    return s;
  }
}
