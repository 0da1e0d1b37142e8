// packages/catalog/src/index.ts
import { createLogger } from '@lattice/core';
import { graphStats, type Catalog } from '@lattice/graph';
import { buildCatalog, type BuildOptions } from './build';
import type { CatalogDb } from './db';
import { readCatalogSnapshot, type ReadOptions } from './snapshot';

export * from './db';
export * from './rows';
export * from './build';
export * from './snapshot';
export * from './sqljs';

const log = createLogger('catalog');

export type LoadOptions = ReadOptions & BuildOptions;

/** Reads the catalog relations and builds both frozen graphs. */
export async function loadCatalog(db: CatalogDb, opts: LoadOptions = {}): Promise<Catalog> {
  const started = Date.now();
  const snapshot = await readCatalogSnapshot(db, { signal: opts.signal });
  const catalog = buildCatalog(snapshot, { strictFieldTables: opts.strictFieldTables });
  log.info(
    {
      schema: graphStats(catalog.schema),
      semantic: graphStats(catalog.semantic),
      ms: Date.now() - started,
    },
    'catalog-loaded'
  );
  return catalog;
}
