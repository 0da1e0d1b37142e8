// packages/graph-store/src/codec.ts
import { createHash } from 'node:crypto';
import { parseCatalogEdge, parseCatalogNode, type CatalogEdge, type CatalogNode } from '@lattice/core';
import type { StoreDocument } from './driver';

const KEY_CHAR = /[A-Za-z0-9_\-:.@()+,=;!*'%]/;
const MAX_KEY = 200;

/**
 * Store-safe document key for a node id. Ids that are already safe pass
 * through unchanged; anything else is rewritten and suffixed with a short
 * SHA-1 of the original so distinct ids never collide.
 */
export function storeKey(id: string): string {
  let safe = '';
  for (const ch of id) safe += KEY_CHAR.test(ch) ? ch : '_';
  if (safe === id && id.length > 0 && id.length <= MAX_KEY) return id;
  const digest = createHash('sha1').update(id, 'utf8').digest('hex').slice(0, 10);
  return `${safe.slice(0, MAX_KEY - 11) || 'k'}-${digest}`;
}

export const edgeKey = (from: string, to: string) => `${storeKey(from)}->${storeKey(to)}`;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Drops undefined members (stores either reject them or turn them into null). */
export function compact(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (v === undefined) continue;
    out[k] = isPlainObject(v) ? compact(v) : v;
  }
  return out;
}

export function encodeNode(node: CatalogNode): StoreDocument {
  const { id, ...attrs } = node;
  return { ...compact(attrs), _id: storeKey(id), label: id };
}

export function encodeEdge(edge: CatalogEdge): StoreDocument {
  return { ...compact({ ...edge }), _id: edgeKey(edge.from, edge.to), _from: storeKey(edge.from), _to: storeKey(edge.to) };
}

export function decodeNode(doc: StoreDocument): CatalogNode {
  const { _id, label, ...attrs } = doc;
  return parseCatalogNode({ ...attrs, id: label });
}

export function decodeEdge(doc: StoreDocument): CatalogEdge {
  const { _id, _from, _to, ...attrs } = doc;
  return parseCatalogEdge(attrs);
}
