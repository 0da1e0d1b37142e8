// packages/graph-store/src/driver.ts

/** One committed generation of a named graph. */
export interface GraphManifest {
  name: string;
  generation: number;
  directed: boolean;
  nodeCollection: string;
  edgeCollection: string;
  nodeCount: number;
  edgeCount: number;
  committedAt: string;     // ISO-8601
}

export interface StoreDocument {
  _id: string;
  [key: string]: unknown;
}

/**
 * What GraphPersistence needs from a document store. Implementations report
 * failures by rejecting; the persistence layer maps them to engine errors.
 */
export interface GraphStoreDriver {
  /** Human-readable endpoint, used in error messages. */
  readonly name: string;
  ping(): Promise<void>;
  readManifest(graph: string): Promise<GraphManifest | null>;
  listManifests(): Promise<GraphManifest[]>;
  /**
   * Writes `manifest` only if the stored generation for its graph equals
   * `expected` (null: no manifest yet). Resolves false when another writer won.
   */
  swapManifest(manifest: GraphManifest, expected: number | null): Promise<boolean>;
  deleteManifest(graph: string, expected: number): Promise<boolean>;
  insertMany(collection: string, docs: StoreDocument[]): Promise<void>;
  /** Every document of a collection, ascending by _id. */
  findAll(collection: string): Promise<StoreDocument[]>;
  /** No-op when the collection does not exist. */
  dropCollection(collection: string): Promise<void>;
  close(): Promise<void>;
}

/** Collections one persist attempt stages into; the attempt id keeps concurrent writers apart. */
export const generationCollections = (graph: string, generation: number, attempt: string) => ({
  nodeCollection: `${graph}_g${generation}_${attempt}_nodes`,
  edgeCollection: `${graph}_g${generation}_${attempt}_edges`,
});
