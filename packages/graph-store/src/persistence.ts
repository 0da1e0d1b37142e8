// packages/graph-store/src/persistence.ts
import { randomBytes } from 'node:crypto';
import {
  CatalogIntegrityError,
  checkCancelled,
  compareNames,
  ConfigError,
  createLogger,
  GraphExistsError,
  GraphNotFoundError,
  isGraphEngineError,
  OperationCancelledError,
  PartialWriteError,
  StoreUnavailableError,
  type CatalogEdge,
  type CatalogNode,
  type WritePhase,
} from '@lattice/core';
import { Graph } from '@lattice/graph';
import { decodeEdge, decodeNode, encodeEdge, encodeNode } from './codec';
import { generationCollections, type GraphManifest, type GraphStoreDriver, type StoreDocument } from './driver';

const log = createLogger('graph-store');

const GRAPH_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

/** Anything with a direction flag and sorted node/edge listings; every catalog graph qualifies. */
export interface PersistableGraph {
  readonly directed: boolean;
  nodes(): CatalogNode[];
  edges(): CatalogEdge[];
}

export type StoredGraph = Graph<CatalogNode, CatalogEdge>;

export interface PersistOptions {
  batchSize?: number;
  overwrite?: boolean;
  signal?: AbortSignal;
}

export interface LoadOptions {
  /** Overrides the direction recorded at persist time. */
  directed?: boolean;
  signal?: AbortSignal;
}

export interface PersistResult {
  name: string;
  generation: number;
  nodes: number;
  edges: number;
  batches: number;
  replacedGeneration: number | null;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

const edgeCost = (e: CatalogEdge): number => (e.kind === 'JOIN' ? e.weight : 0);

/** True when `a` should stand for the pair instead of `b`: lighter first, then the smaller (from, to). */
function preferEdge(a: CatalogEdge, b: CatalogEdge): boolean {
  const byCost = edgeCost(a) - edgeCost(b);
  if (byCost !== 0) return byCost < 0;
  return (compareNames(a.from, b.from) || compareNames(a.to, b.to)) < 0;
}

/**
 * An undirected graph holds one edge per unordered pair, so an edge and its
 * reverse collapse into the preferred one of the two.
 */
export function collapseReciprocal(edges: CatalogEdge[]): CatalogEdge[] {
  const kept = new Map<string, CatalogEdge>();
  for (const e of edges) {
    const [lo, hi] = compareNames(e.from, e.to) <= 0 ? [e.from, e.to] : [e.to, e.from];
    const key = JSON.stringify([lo, hi]);
    const prev = kept.get(key);
    if (!prev || preferEdge(e, prev)) kept.set(key, e);
  }
  return [...kept.values()];
}

function assertGraphName(name: string): void {
  if (!GRAPH_NAME.test(name)) {
    throw new ConfigError([{ path: 'graph', msg: `invalid graph name "${name}" (letters, digits, _ and -, starting with a letter)` }]);
  }
}

/**
 * Writes and reads whole graphs through a GraphStoreDriver. A persist stages a
 * new generation and only becomes visible when the manifest swap succeeds, so
 * the previously committed graph stays loadable whatever happens mid-write.
 */
export class GraphPersistence {
  private readonly batchSize: number;

  constructor(private readonly driver: GraphStoreDriver, opts: { batchSize?: number } = {}) {
    this.batchSize = opts.batchSize ?? 1000;
  }

  // ---------- store access ----------
  private async reach<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (isGraphEngineError(e)) throw e;
      log.error({ err: e, store: this.driver.name, what }, 'store-unreachable');
      throw new StoreUnavailableError(this.driver.name, { cause: e });
    }
  }

  private async manifest(name: string, signal: AbortSignal | undefined, operation: string): Promise<GraphManifest | null> {
    checkCancelled(signal, operation);
    await this.reach('ping', () => this.driver.ping());
    return this.reach('readManifest', () => this.driver.readManifest(name));
  }

  private async dropQuietly(collections: string[], reason: string): Promise<void> {
    for (const c of collections) {
      try {
        await this.driver.dropCollection(c);
      } catch (err) {
        log.warn({ err, collection: c, reason }, 'drop-failed');
      }
    }
  }

  // ---------- operations ----------
  async ping(): Promise<void> {
    await this.reach('ping', () => this.driver.ping());
  }

  async exists(name: string, opts: { signal?: AbortSignal } = {}): Promise<boolean> {
    return (await this.manifest(name, opts.signal, `exists ${name}`)) !== null;
  }

  async list(opts: { signal?: AbortSignal } = {}): Promise<GraphManifest[]> {
    checkCancelled(opts.signal, 'list graphs');
    await this.reach('ping', () => this.driver.ping());
    return this.reach('listManifests', () => this.driver.listManifests());
  }

  async persist(graph: PersistableGraph, name: string, opts: PersistOptions = {}): Promise<PersistResult> {
    assertGraphName(name);
    const batchSize = opts.batchSize ?? this.batchSize;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigError([{ path: 'batchSize', msg: `must be a positive integer, got ${batchSize}` }]);
    }
    const operation = `persist ${name}`;
    const current = await this.manifest(name, opts.signal, operation);
    if (current && !opts.overwrite) throw new GraphExistsError(name);

    const generation = (current?.generation ?? 0) + 1;
    const attempt = randomBytes(4).toString('hex');
    const { nodeCollection, edgeCollection } = generationCollections(name, generation, attempt);
    const staged = [nodeCollection, edgeCollection];
    const nodeDocs = graph.nodes().map(encodeNode);
    const edgeDocs = graph.edges().map(encodeEdge);
    let batches = 0;

    // Only this attempt's own collections are ever dropped on failure.
    const fail = async (phase: WritePhase, batchIndex: number | null, cause: unknown): Promise<never> => {
      await this.dropQuietly(staged, `${operation} failed`);
      if (cause instanceof OperationCancelledError) {
        log.warn({ graph: name, generation, phase }, 'persist-cancelled');
        throw cause;
      }
      log.error({ err: cause, graph: name, generation, phase, batchIndex }, 'persist-failed');
      throw new PartialWriteError(name, phase, batchIndex, { cause });
    };

    const write = async (phase: 'nodes' | 'edges', collection: string, docs: StoreDocument[]) => {
      const parts = chunk(docs, batchSize);
      for (let i = 0; i < parts.length; i++) {
        try {
          checkCancelled(opts.signal, operation);
          await this.driver.insertMany(collection, parts[i]);
        } catch (e) {
          return fail(phase, i, e);
        }
        batches++;
      }
    };
    await write('nodes', nodeCollection, nodeDocs);
    await write('edges', edgeCollection, edgeDocs);

    const manifest: GraphManifest = {
      name,
      generation,
      directed: graph.directed,
      nodeCollection,
      edgeCollection,
      nodeCount: nodeDocs.length,
      edgeCount: edgeDocs.length,
      committedAt: new Date().toISOString(),
    };
    let committed: boolean;
    try {
      checkCancelled(opts.signal, operation);
      committed = await this.driver.swapManifest(manifest, current?.generation ?? null);
    } catch (e) {
      return fail('commit', null, e);
    }
    if (!committed) {
      return fail('commit', null, new Error(`manifest for ${name} changed during the write (concurrent persist)`));
    }

    if (current) {
      await this.dropQuietly([current.nodeCollection, current.edgeCollection], `${operation} replaced generation ${current.generation}`);
    }
    log.info({ graph: name, generation, nodes: nodeDocs.length, edges: edgeDocs.length, batches }, 'graph-persisted');
    return {
      name,
      generation,
      nodes: nodeDocs.length,
      edges: edgeDocs.length,
      batches,
      replacedGeneration: current?.generation ?? null,
    };
  }

  async load(name: string, opts: LoadOptions = {}): Promise<StoredGraph> {
    const operation = `load ${name}`;
    const manifest = await this.manifest(name, opts.signal, operation);
    if (!manifest) throw new GraphNotFoundError(name);

    checkCancelled(opts.signal, operation);
    const nodeDocs = await this.reach('findAll', () => this.driver.findAll(manifest.nodeCollection));
    checkCancelled(opts.signal, operation);
    const edgeDocs = await this.reach('findAll', () => this.driver.findAll(manifest.edgeCollection));
    checkCancelled(opts.signal, operation);

    if (nodeDocs.length !== manifest.nodeCount || edgeDocs.length !== manifest.edgeCount) {
      throw new CatalogIntegrityError(
        'graph_manifests',
        { graph: name, generation: manifest.generation },
        `expected ${manifest.nodeCount} nodes and ${manifest.edgeCount} edges, found ${nodeDocs.length} and ${edgeDocs.length}`
      );
    }

    const decode = <T>(collection: string, doc: StoreDocument, fn: (d: StoreDocument) => T): T => {
      try {
        return fn(doc);
      } catch (e) {
        throw new CatalogIntegrityError(collection, { _id: doc._id }, 'stored document does not match the graph schema', { cause: e });
      }
    };

    const directed = opts.directed ?? manifest.directed;
    const graph: StoredGraph = new Graph<CatalogNode, CatalogEdge>({ directed });
    for (const d of nodeDocs) graph.addNode(decode(manifest.nodeCollection, d, decodeNode));
    const edges = edgeDocs.map((d) => decode(manifest.edgeCollection, d, decodeEdge));
    const kept = directed ? edges : collapseReciprocal(edges);
    if (kept.length !== edges.length) {
      log.debug({ graph: name, merged: edges.length - kept.length }, 'reciprocal-edges-merged');
    }
    for (const e of kept) graph.addEdge(e);
    log.debug({ graph: name, generation: manifest.generation, nodes: graph.nodeCount, edges: graph.edgeCount }, 'graph-loaded');
    return graph.freeze();
  }

  async drop(name: string, opts: { signal?: AbortSignal } = {}): Promise<void> {
    const manifest = await this.manifest(name, opts.signal, `drop ${name}`);
    if (!manifest) throw new GraphNotFoundError(name);
    const removed = await this.reach('deleteManifest', () => this.driver.deleteManifest(name, manifest.generation));
    if (!removed) throw new PartialWriteError(name, 'commit', null);
    await this.dropQuietly([manifest.nodeCollection, manifest.edgeCollection], `drop ${name}`);
    log.info({ graph: name, generation: manifest.generation }, 'graph-dropped');
  }
}
