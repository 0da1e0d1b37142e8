// packages/graph-store/src/index.ts
import type { EngineConfig } from '@lattice/core';
import { MongoGraphStoreDriver } from './mongo';
import { GraphPersistence } from './persistence';

export * from './driver';
export * from './codec';
export * from './mongo';
export * from './persistence';

/** MongoDB-backed persistence wired from the engine config. */
export function createGraphStore(cfg: Pick<EngineConfig, 'store' | 'writeBatchSize'>) {
  const driver = new MongoGraphStoreDriver({ uri: cfg.store.uri, db: cfg.store.db });
  return { driver, persistence: new GraphPersistence(driver, { batchSize: cfg.writeBatchSize }) };
}
