// packages/resolver/src/join-path.ts
import {
  checkCancelled,
  compareNames,
  NoPathError,
  type JoinEdge,
  type JoinEnrichment,
} from '@lattice/core';
import type { SchemaGraph } from '@lattice/graph';
import { MinQueue } from './queue';

export interface JoinStep {
  from: string;             // traversal order
  to: string;
  relationshipKind: string;
  joinColumn: string | null;
  weight: number;
  reversed: boolean;        // true when traversed against the stored direction
  edge: { from: string; to: string };
  enrichment: JoinEnrichment;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

const EPS = 1e-9;
const CANCEL_EVERY = 256;

/**
 * Cheapest link between two tables in the undirected projection. When both
 * directions are stored, the lighter edge wins, then the one whose stored
 * (from, to) sorts first, so the choice does not depend on which side asks.
 */
function linkBetween(schema: SchemaGraph, a: string, b: string): JoinEdge | null {
  const links = [schema.hasEdge(a, b) ? schema.getEdge(a, b) : null, schema.hasEdge(b, a) ? schema.getEdge(b, a) : null]
    .filter((e): e is JoinEdge => e !== null);
  links.sort((x, y) => x.weight - y.weight || compareNames(x.from, y.from) || compareNames(x.to, y.to));
  return links[0] ?? null;
}

/** Settled distances from `origin` over the undirected projection. */
function distancesFrom(schema: SchemaGraph, origin: string, stopAt: string, signal?: AbortSignal): Map<string, number> {
  const settled = new Map<string, number>();
  const best = new Map<string, number>([[origin, 0]]);
  const queue = new MinQueue<string>((a, b) => compareNames(a, b));
  queue.push(origin, 0);
  let pops = 0;
  while (queue.size > 0) {
    const next = queue.pop();
    if (!next) break;
    const { item: u, priority: d } = next;
    if (settled.has(u)) continue;
    if (++pops % CANCEL_EVERY === 0) checkCancelled(signal, 'resolveJoinPath');
    settled.set(u, d);
    if (u === stopAt) break;
    for (const v of schema.neighbors(u)) {
      if (settled.has(v)) continue;
      const link = linkBetween(schema, u, v);
      if (!link) continue;
      const nd = d + link.weight;
      const prev = best.get(v);
      if (prev === undefined || nd < prev - EPS) {
        best.set(v, nd);
        queue.push(v, nd);
      }
    }
  }
  return settled;
}

/**
 * Node sequence of the lexicographically smallest minimum-cost path from
 * `start` to `end`. Distances are taken from `end`; walking forward from
 * `start`, the smallest neighbor that stays on a shortest path is taken.
 */
function canonicalPath(schema: SchemaGraph, start: string, end: string, signal?: AbortSignal): string[] | null {
  const dist = distancesFrom(schema, end, start, signal);
  if (!dist.has(start)) return null;
  const path = [start];
  let u = start;
  while (u !== end) {
    const du = dist.get(u);
    if (du === undefined) return null;
    const next = schema.neighbors(u).find((v) => {
      const dv = dist.get(v);
      const link = linkBetween(schema, u, v);
      return dv !== undefined && link !== null && Math.abs(du - (link.weight + dv)) <= EPS * Math.max(1, du);
    });
    if (next === undefined) return null;
    path.push(next);
    u = next;
  }
  return path;
}

function toStep(schema: SchemaGraph, from: string, to: string): JoinStep {
  const link = linkBetween(schema, from, to);
  if (!link) throw new NoPathError(from, to);
  return {
    from,
    to,
    relationshipKind: link.relationshipKind,
    joinColumn: link.joinColumn,
    weight: link.weight,
    reversed: link.from !== from,
    edge: { from: link.from, to: link.to },
    enrichment: { ...link.enrichment },
  };
}

/**
 * Minimum-cost join path between two tables, ignoring edge direction.
 * Among equal-cost paths the lexicographically smallest node sequence wins,
 * measured from the smaller endpoint, so (b, a) is always the reverse of (a, b).
 */
export function resolveJoinPath(schema: SchemaGraph, source: string, target: string, opts: ResolveOptions = {}): JoinStep[] {
  schema.requireNode(source, 'source table');
  schema.requireNode(target, 'target table');
  checkCancelled(opts.signal, 'resolveJoinPath');
  if (source === target) return [];

  const flip = compareNames(source, target) > 0;
  const canonical = flip ? canonicalPath(schema, target, source, opts.signal) : canonicalPath(schema, source, target, opts.signal);
  if (!canonical) throw new NoPathError(source, target);
  const nodes = flip ? canonical.reverse() : canonical;

  const steps: JoinStep[] = [];
  for (let i = 0; i + 1 < nodes.length; i++) {
    steps.push(toStep(schema, nodes[i], nodes[i + 1]));
  }
  return steps;
}

export interface JoinPlan {
  root: string;
  tables: string[];
  steps: JoinStep[];
}

/**
 * Join tree for a multi-table query: the union of the paths from the first
 * table to every other one, each link kept once in first-use order.
 */
export function resolveJoinPlan(schema: SchemaGraph, tables: string[], opts: ResolveOptions = {}): JoinPlan {
  const unique = [...new Set(tables)];
  const root = unique[0];
  if (root === undefined) return { root: '', tables: [], steps: [] };
  schema.requireNode(root, 'source table');

  const seen = new Set<string>();
  const steps: JoinStep[] = [];
  for (const t of unique.slice(1)) {
    for (const step of resolveJoinPath(schema, root, t, opts)) {
      const key = compareNames(step.from, step.to) < 0 ? `${step.from}\u0000${step.to}` : `${step.to}\u0000${step.from}`;
      if (seen.has(key)) continue;
      seen.add(key);
      steps.push(step);
    }
  }
  return { root, tables: unique, steps };
}

/** One line per step, preferring the edge's natural-language alias. */
export function describeJoinPath(steps: JoinStep[]): string[] {
  return steps.map((s) => {
    const on = s.joinColumn ? ` on ${s.joinColumn}` : '';
    return `${s.from} -> ${s.to}${on}: ${s.enrichment.naturalLanguageAlias ?? s.relationshipKind}`;
  });
}
