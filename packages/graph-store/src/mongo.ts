// packages/graph-store/src/mongo.ts
import { MongoClient, MongoServerError, type Db } from 'mongodb';
import type { GraphManifest, GraphStoreDriver, StoreDocument } from './driver';

const MANIFESTS = 'graph_manifests';
const DUPLICATE_KEY = 11000;
const NAMESPACE_NOT_FOUND = 26;

type ManifestDoc = GraphManifest & { _id: string };

function fromDoc(doc: ManifestDoc): GraphManifest {
  const { _id, ...manifest } = doc;
  return manifest;
}

export interface MongoDriverConfig {
  uri: string;
  db: string;
  serverSelectionTimeoutMS?: number;
}

/**
 * GraphStoreDriver over MongoDB. Manifests live in one collection keyed by
 * graph name; each generation gets its own node and edge collections.
 */
export class MongoGraphStoreDriver implements GraphStoreDriver {
  readonly name: string;
  private readonly cli: MongoClient;
  private readonly db: Db;

  constructor(cfg: MongoDriverConfig) {
    this.cli = new MongoClient(cfg.uri, { serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS ?? 5000 });
    this.db = this.cli.db(cfg.db);
    this.name = `mongodb/${cfg.db}`;
  }

  private manifests() {
    return this.db.collection<ManifestDoc>(MANIFESTS);
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }

  async readManifest(graph: string): Promise<GraphManifest | null> {
    const doc = await this.manifests().findOne({ _id: graph });
    return doc ? fromDoc(doc) : null;
  }

  async listManifests(): Promise<GraphManifest[]> {
    const docs = await this.manifests().find({}).sort({ _id: 1 }).toArray();
    return docs.map(fromDoc);
  }

  async swapManifest(manifest: GraphManifest, expected: number | null): Promise<boolean> {
    const doc: ManifestDoc = { ...manifest, _id: manifest.name };
    if (expected === null) {
      try {
        await this.manifests().insertOne(doc);
        return true;
      } catch (e) {
        if (e instanceof MongoServerError && e.code === DUPLICATE_KEY) return false;
        throw e;
      }
    }
    const res = await this.manifests().replaceOne({ _id: manifest.name, generation: expected }, doc);
    return res.matchedCount === 1;
  }

  async deleteManifest(graph: string, expected: number): Promise<boolean> {
    const res = await this.manifests().deleteOne({ _id: graph, generation: expected });
    return res.deletedCount === 1;
  }

  async insertMany(collection: string, docs: StoreDocument[]): Promise<void> {
    if (docs.length === 0) return;
    await this.db.collection<StoreDocument>(collection).insertMany(docs, { ordered: true });
  }

  async findAll(collection: string): Promise<StoreDocument[]> {
    return this.db.collection<StoreDocument>(collection).find({}).sort({ _id: 1 }).toArray();
  }

  async dropCollection(collection: string): Promise<void> {
    try {
      await this.db.dropCollection(collection);
    } catch (e) {
      if (e instanceof MongoServerError && e.code === NAMESPACE_NOT_FOUND) return;
      throw e;
    }
  }

  async close(): Promise<void> {
    await this.cli.close();
  }
}
