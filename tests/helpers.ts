/* tests/helpers.ts */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { buildCatalog, parseCatalogSnapshot, type CatalogSnapshot } from '@lattice/catalog';
import type { Catalog } from '@lattice/graph';

export const FIXTURE_PATH = fileURLToPath(new URL('./fixtures/manufacturing-catalog.json', import.meta.url));

/** Fresh copy of the manufacturing catalog rows on every call. */
export function fixtureSnapshot(): CatalogSnapshot {
  const doc: unknown = JSON.parse(readFileSync(FIXTURE_PATH, 'utf8'));
  return parseCatalogSnapshot(doc);
}

export function fixtureCatalog(): Catalog {
  return buildCatalog(fixtureSnapshot());
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Copy of `rows` with `patch` applied to every row matching `where`. */
export function patchRows(rows: unknown[], where: Record<string, unknown>, patch: Record<string, unknown>): unknown[] {
  return rows.map((r) => {
    if (!isRecord(r)) return r;
    const hit = Object.entries(where).every(([k, v]) => r[k] === v);
    return hit ? { ...r, ...patch } : r;
  });
}
