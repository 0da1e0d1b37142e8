/* packages/graph-store/test/persistence.spec.ts */
import { beforeEach, describe, it, expect } from 'vitest';
import {
  CatalogIntegrityError,
  GraphExistsError,
  GraphNotFoundError,
  OperationCancelledError,
  PartialWriteError,
  StoreUnavailableError,
  type JoinEdge,
  type TableNode,
} from '@lattice/core';
import { createSchemaGraph, diffGraphs, graphsEqual } from '@lattice/graph';
import { decodeNode, encodeNode, GraphPersistence, storeKey } from '../src';
import { fixtureCatalog } from '../../../tests/helpers';
import { MemoryGraphStoreDriver } from './memory-driver';

const table = (name: string): TableNode => ({ id: name, kind: 'Table', name, tableType: 'fact', description: null });
const join = (from: string, to: string, weight = 1): JoinEdge => ({
  from, to, kind: 'JOIN', relationshipKind: 'references', joinColumn: null, weight, enrichment: {}
});

const staged = (graph: string, generation: number, kind: 'nodes' | 'edges') =>
  new RegExp(`^${graph}_g${generation}_[0-9a-f]{8}_${kind}$`);

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (e) {
    return e;
  }
  throw new Error('expected a rejection');
}

describe('GraphPersistence', () => {
  let driver: MemoryGraphStoreDriver;
  let store: GraphPersistence;
  beforeEach(() => {
    driver = new MemoryGraphStoreDriver();
    store = new GraphPersistence(driver, { batchSize: 3 });
  });

  it('round-trips the schema and semantic graphs', async () => {
    const { schema, semantic } = fixtureCatalog();
    await store.persist(schema, 'schema_graph');
    await store.persist(semantic, 'semantic_layer');
    const loadedSchema = await store.load('schema_graph');
    const loadedSemantic = await store.load('semantic_layer');
    expect(diffGraphs(loadedSchema, schema)).toEqual({
      missingNodes: [], extraNodes: [], changedNodes: [],
      missingEdges: [], extraEdges: [], changedEdges: [],
    });
    expect(graphsEqual(loadedSemantic, semantic)).toBe(true);
    expect(loadedSchema.isFrozen).toBe(true);
  });

  it('writes in batches and reports the new generation', async () => {
    const { schema } = fixtureCatalog();
    const res = await store.persist(schema, 'schema_graph');
    expect(res).toEqual({ name: 'schema_graph', generation: 1, nodes: 8, edges: 6, batches: 5, replacedGeneration: null });
    const manifest = driver.manifests.get('schema_graph');
    expect(manifest?.nodeCollection).toMatch(staged('schema_graph', 1, 'nodes'));
    expect(manifest?.edgeCollection).toMatch(staged('schema_graph', 1, 'edges'));
    expect([...driver.collections.keys()].sort()).toEqual([manifest?.edgeCollection, manifest?.nodeCollection].sort());
  });

  it('refuses to replace an existing graph without overwrite', async () => {
    const { schema } = fixtureCatalog();
    await store.persist(schema, 'schema_graph');
    await expect(store.persist(schema, 'schema_graph')).rejects.toBeInstanceOf(GraphExistsError);
  });

  it('overwrite commits a new generation and drops the old one', async () => {
    const { schema } = fixtureCatalog();
    await store.persist(schema, 'schema_graph');
    const smaller = createSchemaGraph().addNode(table('a')).addNode(table('b')).addEdge(join('a', 'b'));
    const res = await store.persist(smaller, 'schema_graph', { overwrite: true });
    expect(res.generation).toBe(2);
    expect(res.replacedGeneration).toBe(1);
    const keys = [...driver.collections.keys()];
    expect(keys).toHaveLength(2);
    expect(keys.every((k) => /^schema_graph_g2_/.test(k))).toBe(true);
    expect(graphsEqual(await store.load('schema_graph'), smaller)).toBe(true);
  });

  it('leaves the previous graph intact when a batch fails', async () => {
    const { schema } = fixtureCatalog();
    await store.persist(schema, 'schema_graph');
    const before = [...driver.collections.keys()].sort();
    driver.failInsert = (collection, call) => (collection.endsWith('_edges') && call === 1 ? new Error('disk full') : undefined);

    const err = await rejection(store.persist(schema, 'schema_graph', { overwrite: true, batchSize: 2 }));
    expect(err).toBeInstanceOf(PartialWriteError);
    expect(err).toMatchObject({ store: 'schema_graph', phase: 'edges', batchIndex: 1 });
    expect(err).toHaveProperty('message', 'Write of graph schema_graph failed in edges batch 1: disk full; re-run with overwrite=true');

    expect(driver.manifests.get('schema_graph')?.generation).toBe(1);
    expect([...driver.collections.keys()].sort()).toEqual(before);
    driver.failInsert = null;
    expect(graphsEqual(await store.load('schema_graph'), schema)).toBe(true);
  });

  it('stops on cancellation and cleans up the staged generation', async () => {
    const { schema } = fixtureCatalog();
    const ctl = new AbortController();
    driver.onInsert = (collection, call) => {
      if (collection.endsWith('_nodes') && call === 0) ctl.abort();
    };
    await expect(store.persist(schema, 'schema_graph', { signal: ctl.signal })).rejects.toBeInstanceOf(OperationCancelledError);
    expect(await store.exists('schema_graph')).toBe(false);
    expect(driver.collections.size).toBe(0);
  });

  it('turns a lost manifest race into a PartialWriteError in commit', async () => {
    const { schema } = fixtureCatalog();
    driver.loseNextSwap = true;
    const err = await rejection(store.persist(schema, 'schema_graph'));
    expect(err).toMatchObject({ code: 'SG_PARTIAL_WRITE', phase: 'commit', batchIndex: null });
    expect(driver.collections.size).toBe(0);
  });

  it('reports an unreachable store', async () => {
    driver.down = true;
    const err = await rejection(store.persist(fixtureCatalog().schema, 'schema_graph'));
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toHaveProperty('message', 'Graph store unavailable (memory): connection refused');
    await expect(store.load('schema_graph')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('raises GraphNotFoundError for a graph that was never persisted', async () => {
    await expect(store.load('nothing_here')).rejects.toBeInstanceOf(GraphNotFoundError);
    await expect(store.drop('nothing_here')).rejects.toBeInstanceOf(GraphNotFoundError);
  });

  it('rejects graph names that cannot be collection prefixes', async () => {
    await expect(store.persist(fixtureCatalog().schema, 'bad name')).rejects.toMatchObject({ code: 'SG_CONFIG' });
  });

  it('lets exactly one of two concurrent overwrites win without touching its collections', async () => {
    const { schema } = fixtureCatalog();
    await store.persist(schema, 'schema_graph');
    const left = createSchemaGraph().addNode(table('a')).addNode(table('b')).addEdge(join('a', 'b'));
    const right = createSchemaGraph().addNode(table('x')).addNode(table('y')).addNode(table('z')).addEdge(join('x', 'z'));

    const settled = await Promise.allSettled([
      store.persist(left, 'schema_graph', { overwrite: true }),
      store.persist(right, 'schema_graph', { overwrite: true }),
    ]);
    const won = settled.findIndex((r) => r.status === 'fulfilled');
    const lost = settled.find((r) => r.status === 'rejected');
    expect(settled.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(lost?.status === 'rejected' ? lost.reason : null).toMatchObject({ code: 'SG_PARTIAL_WRITE', phase: 'commit' });

    const winner = won === 0 ? left : right;
    const manifest = driver.manifests.get('schema_graph');
    expect(manifest?.generation).toBe(2);
    expect([...driver.collections.keys()].sort()).toEqual([manifest?.edgeCollection, manifest?.nodeCollection].sort());
    expect(graphsEqual(await store.load('schema_graph'), winner)).toBe(true);
  });

  it('keeps one edge per pair when reciprocal edges load undirected', async () => {
    const lighterBack = createSchemaGraph()
      .addNode(table('a')).addNode(table('b'))
      .addEdge(join('a', 'b', 2)).addEdge(join('b', 'a', 1));
    await store.persist(lighterBack, 'pairs');

    const undirected = await store.load('pairs', { directed: false });
    expect(undirected.edgeCount).toBe(1);
    expect(undirected.edges().map((e) => [e.from, e.to])).toEqual([['b', 'a']]);
    expect((await store.load('pairs')).edgeCount).toBe(2);

    const even = createSchemaGraph()
      .addNode(table('a')).addNode(table('b'))
      .addEdge(join('b', 'a', 1)).addEdge(join('a', 'b', 1));
    await store.persist(even, 'even_pairs');
    expect((await store.load('even_pairs', { directed: false })).edges().map((e) => [e.from, e.to])).toEqual([['a', 'b']]);
  });

  it('loads undirected when asked', async () => {
    await store.persist(fixtureCatalog().schema, 'schema_graph');
    const g = await store.load('schema_graph', { directed: false });
    expect(g.directed).toBe(false);
    expect(g.successors('customer')).toEqual(['order']);
  });

  it('drops, lists and checks existence at manifest level', async () => {
    const { schema, semantic } = fixtureCatalog();
    await store.persist(semantic, 'semantic_layer');
    await store.persist(schema, 'schema_graph');
    expect((await store.list()).map((m) => [m.name, m.generation, m.directed])).toEqual([
      ['schema_graph', 1, true],
      ['semantic_layer', 1, true],
    ]);
    await store.drop('schema_graph');
    expect(await store.exists('schema_graph')).toBe(false);
    expect(await store.exists('semantic_layer')).toBe(true);
    const kept = driver.manifests.get('semantic_layer');
    expect([...driver.collections.keys()].sort()).toEqual([kept?.edgeCollection, kept?.nodeCollection].sort());
  });

  it('rejects stored documents that no longer match the graph schema', async () => {
    await store.persist(fixtureCatalog().schema, 'schema_graph');
    const nodeCollection = driver.manifests.get('schema_graph')?.nodeCollection ?? '';
    const doc = driver.collections.get(nodeCollection)?.get('order');
    if (doc) doc.kind = 'Bogus';
    const err = await rejection(store.load('schema_graph'));
    expect(err).toBeInstanceOf(CatalogIntegrityError);
    expect(err).toMatchObject({ relation: nodeCollection, rowKeys: { _id: 'order' } });
  });

  it('notices documents missing from a generation', async () => {
    await store.persist(fixtureCatalog().schema, 'schema_graph');
    driver.collections.get(driver.manifests.get('schema_graph')?.edgeCollection ?? '')?.clear();
    await expect(store.load('schema_graph')).rejects.toBeInstanceOf(CatalogIntegrityError);
  });
});

describe('store keys', () => {
  it('keeps safe ids and rewrites the rest with a hash suffix', () => {
    expect(storeKey('order')).toBe('order');
    expect(storeKey('field:product_defects.severity')).toBe('field:product_defects.severity');
    expect(storeKey('line item/2')).toMatch(/^line_item_2-[0-9a-f]{10}$/);
    expect(storeKey('a b')).not.toBe(storeKey('a/b'));
  });

  it('keeps the original id as the node label', () => {
    const doc = encodeNode(table('line item'));
    expect(doc.label).toBe('line item');
    expect(decodeNode(doc)).toEqual(table('line item'));
  });

  it('round-trips graphs whose ids need rewriting', async () => {
    const store = new GraphPersistence(new MemoryGraphStoreDriver());
    const g = createSchemaGraph().addNode(table('line item')).addNode(table('sales order')).addEdge(join('line item', 'sales order'));
    await store.persist(g, 'odd_names');
    expect(graphsEqual(await store.load('odd_names'), g)).toBe(true);
  });
});
