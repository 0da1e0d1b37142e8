// packages/catalog/src/snapshot.ts
import { readFile } from 'node:fs/promises';
import { checkCancelled, CatalogIntegrityError, OperationCancelledError } from '@lattice/core';
import type { CatalogDb } from './db';
import { CatalogSnapshotSchema, type CatalogSnapshot } from './rows';

export interface ReadOptions {
  signal?: AbortSignal;
}

/**
 * Reads every catalog relation in key order. No validation happens here;
 * buildCatalog() owns that so a snapshot file and a live database go
 * through the same checks.
 */
export async function readCatalogSnapshot(db: CatalogDb, opts: ReadOptions = {}): Promise<CatalogSnapshot> {
  const step = async <T>(relation: string, q: () => Promise<T[]>): Promise<T[]> => {
    checkCancelled(opts.signal, `read ${relation}`);
    const rows = await q();
    checkCancelled(opts.signal, `read ${relation}`);
    return rows;
  };

  const tables = await step('schema_nodes', () =>
    db.selectFrom('schema_nodes').selectAll().orderBy('table_name').execute());
  const edges = await step('schema_edges', () =>
    db.selectFrom('schema_edges').selectAll().orderBy('from_table').orderBy('to_table').execute());
  const intents = await step('schema_intents', () =>
    db.selectFrom('schema_intents').selectAll().orderBy('intent_id').execute());
  const perspectives = await step('schema_perspectives', () =>
    db.selectFrom('schema_perspectives').selectAll().orderBy('perspective_id').execute());
  const concepts = await step('schema_concepts', () =>
    db.selectFrom('schema_concepts').selectAll().orderBy('concept_id').execute());
  const conceptFields = await step('schema_concept_fields', () =>
    db.selectFrom('schema_concept_fields').selectAll()
      .orderBy('concept_id').orderBy('table_name').orderBy('field_name').execute());
  const intentPerspectives = await step('schema_intent_perspectives', () =>
    db.selectFrom('schema_intent_perspectives').selectAll()
      .orderBy('intent_id').orderBy('perspective_id').execute());
  const perspectiveConcepts = await step('schema_perspective_concepts', () =>
    db.selectFrom('schema_perspective_concepts').selectAll()
      .orderBy('perspective_id').orderBy('concept_id').execute());
  const intentConcepts = await step('schema_intent_concepts', () =>
    db.selectFrom('schema_intent_concepts').selectAll()
      .orderBy('intent_id').orderBy('concept_id').execute());

  return {
    tables, edges, intents, perspectives, concepts,
    conceptFields, intentPerspectives, perspectiveConcepts, intentConcepts,
  };
}

/** Validates the outer shape of a snapshot document (relation -> rows). */
export function parseCatalogSnapshot(input: unknown): CatalogSnapshot {
  const r = CatalogSnapshotSchema.safeParse(input);
  if (!r.success) {
    const issue = r.error.issues[0];
    throw new CatalogIntegrityError('snapshot', { path: issue?.path.join('.') ?? '' }, issue?.message ?? 'invalid snapshot', { cause: r.error });
  }
  return r.data;
}

/** Loads a JSON snapshot exported from a catalog database. */
export async function readCatalogSnapshotFile(path: string, opts: ReadOptions = {}): Promise<CatalogSnapshot> {
  checkCancelled(opts.signal, `read ${path}`);
  let text: string;
  try {
    text = await readFile(path, { encoding: 'utf8', signal: opts.signal });
  } catch (e) {
    if (opts.signal?.aborted) throw new OperationCancelledError(`read ${path}`, { cause: e });
    throw e;
  }
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new CatalogIntegrityError('snapshot', { path }, 'not valid JSON', { cause: e });
  }
  return parseCatalogSnapshot(doc);
}
