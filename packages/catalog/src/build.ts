// packages/catalog/src/build.ts
import type { z } from 'zod';
import {
  CatalogIntegrityError,
  intentEdgeKind,
  nodeIds,
  type ConceptNode,
  type IntentNode,
  type JoinEnrichment,
  type PerspectiveNode,
} from '@lattice/core';
import { createSchemaGraph, createSemanticGraph, type Catalog } from '@lattice/graph';
import {
  ConceptFieldRow,
  ConceptRow,
  EdgeRow,
  IntentConceptRow,
  IntentPerspectiveRow,
  IntentRow,
  PerspectiveConceptRow,
  PerspectiveRow,
  RELATION_NAMES,
  TableRow,
  type CatalogSnapshot,
} from './rows';

export interface BuildOptions {
  /** Reject concept fields whose table is not a schema node. */
  strictFieldTables?: boolean;
}

type RowKeys = Record<string, unknown>;

function pickKeys(raw: unknown, keys: readonly string[]): RowKeys {
  const out: RowKeys = {};
  if (typeof raw !== 'object' || raw === null) return out;
  for (const k of keys) {
    if (k in raw) out[k] = Reflect.get(raw, k);
  }
  return out;
}

function validateRows<S extends z.ZodTypeAny>(
  relation: keyof CatalogSnapshot,
  raw: unknown[],
  schema: S,
  keys: readonly string[]
): Array<{ row: z.output<S>; keys: RowKeys }> {
  return raw.map((r, index) => {
    const parsed = schema.safeParse(r);
    const rowKeys = { ...pickKeys(r, keys) };
    if (Object.keys(rowKeys).length === 0) rowKeys.row = index;
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '(row)'}: ${i.message}`).join('; ');
      throw new CatalogIntegrityError(RELATION_NAMES[relation], rowKeys, reason, { cause: parsed.error });
    }
    return { row: parsed.data, keys: rowKeys };
  });
}

function enrichmentOf(row: EdgeRow): JoinEnrichment {
  const out: JoinEnrichment = {};
  if (row.join_column_description !== null) out.joinColumnDescription = row.join_column_description;
  if (row.natural_language_alias !== null) out.naturalLanguageAlias = row.natural_language_alias;
  if (row.few_shot_example !== null) out.exampleQuery = row.few_shot_example;
  if (row.context !== null) out.context = row.context;
  return out;
}

/**
 * Builds both graphs from a snapshot and freezes them. Every dangling
 * reference, duplicate key and out-of-range value is a CatalogIntegrityError
 * naming the relation and row; nothing partial is ever returned.
 */
export function buildCatalog(snapshot: CatalogSnapshot, opts: BuildOptions = {}): Catalog {
  const schema = createSchemaGraph();
  const semantic = createSemanticGraph();

  // ---------- schema graph ----------
  for (const { row, keys } of validateRows('tables', snapshot.tables, TableRow, ['table_name'])) {
    if (schema.hasNode(row.table_name)) {
      throw new CatalogIntegrityError(RELATION_NAMES.tables, keys, 'duplicate table_name');
    }
    if (row.table_name.includes('.')) {
      throw new CatalogIntegrityError(RELATION_NAMES.tables, keys, `table_name ${row.table_name} contains '.'`);
    }
    schema.addNode({
      id: nodeIds.table(row.table_name),
      kind: 'Table',
      name: row.table_name,
      tableType: row.table_type,
      description: row.description,
    });
  }

  for (const { row, keys } of validateRows('edges', snapshot.edges, EdgeRow, ['from_table', 'to_table'])) {
    const rel = RELATION_NAMES.edges;
    if (!schema.hasNode(row.from_table)) throw new CatalogIntegrityError(rel, keys, `unknown from_table ${row.from_table}`);
    if (!schema.hasNode(row.to_table)) throw new CatalogIntegrityError(rel, keys, `unknown to_table ${row.to_table}`);
    if (row.from_table === row.to_table) throw new CatalogIntegrityError(rel, keys, 'self-join edges are not allowed');
    if (schema.hasEdge(row.from_table, row.to_table)) throw new CatalogIntegrityError(rel, keys, 'duplicate edge');
    schema.addEdge({
      from: row.from_table,
      to: row.to_table,
      kind: 'JOIN',
      relationshipKind: row.relationship_type,
      joinColumn: row.join_column,
      weight: row.weight,
      enrichment: enrichmentOf(row),
    });
  }

  // ---------- semantic nodes ----------
  const intents = new Map<number, IntentNode>();
  const perspectives = new Map<number, PerspectiveNode>();
  const concepts = new Map<number, ConceptNode>();

  for (const { row, keys } of validateRows('intents', snapshot.intents, IntentRow, ['intent_id', 'intent_name'])) {
    const node: IntentNode = {
      id: nodeIds.intent(row.intent_name), kind: 'Intent', name: row.intent_name,
      catalogId: row.intent_id, description: row.description,
    };
    if (intents.has(row.intent_id)) throw new CatalogIntegrityError(RELATION_NAMES.intents, keys, 'duplicate intent_id');
    if (semantic.hasNode(node.id)) throw new CatalogIntegrityError(RELATION_NAMES.intents, keys, 'duplicate intent_name');
    intents.set(row.intent_id, node);
    semantic.addNode(node);
  }

  for (const { row, keys } of validateRows('perspectives', snapshot.perspectives, PerspectiveRow, ['perspective_id', 'perspective_name'])) {
    const node: PerspectiveNode = {
      id: nodeIds.perspective(row.perspective_name), kind: 'Perspective', name: row.perspective_name,
      catalogId: row.perspective_id, description: row.description,
    };
    if (perspectives.has(row.perspective_id)) throw new CatalogIntegrityError(RELATION_NAMES.perspectives, keys, 'duplicate perspective_id');
    if (semantic.hasNode(node.id)) throw new CatalogIntegrityError(RELATION_NAMES.perspectives, keys, 'duplicate perspective_name');
    perspectives.set(row.perspective_id, node);
    semantic.addNode(node);
  }

  for (const { row, keys } of validateRows('concepts', snapshot.concepts, ConceptRow, ['concept_id', 'concept_name'])) {
    const node: ConceptNode = {
      id: nodeIds.concept(row.concept_name), kind: 'Concept', name: row.concept_name,
      catalogId: row.concept_id, description: row.description,
    };
    if (concepts.has(row.concept_id)) throw new CatalogIntegrityError(RELATION_NAMES.concepts, keys, 'duplicate concept_id');
    if (semantic.hasNode(node.id)) throw new CatalogIntegrityError(RELATION_NAMES.concepts, keys, 'duplicate concept_name');
    concepts.set(row.concept_id, node);
    semantic.addNode(node);
  }

  const lookup = <T>(map: Map<number, T>, id: number, relation: string, keys: RowKeys, what: string): T => {
    const hit = map.get(id);
    if (!hit) throw new CatalogIntegrityError(relation, keys, `unknown ${what} ${id}`);
    return hit;
  };

  // ---------- fields + CAN_MEAN ----------
  const primaries = new Set<string>();
  const fieldRows = validateRows('conceptFields', snapshot.conceptFields, ConceptFieldRow, ['concept_id', 'table_name', 'field_name']);
  for (const { row, keys } of fieldRows) {
    const rel = RELATION_NAMES.conceptFields;
    const concept = lookup(concepts, row.concept_id, rel, keys, 'concept_id');
    // Field ids and qualified lookups split "table.column" on the first dot.
    if (row.table_name.includes('.')) {
      throw new CatalogIntegrityError(rel, keys, `table_name ${row.table_name} contains '.'`);
    }
    if (opts.strictFieldTables && !schema.hasNode(row.table_name)) {
      throw new CatalogIntegrityError(rel, keys, `unknown table_name ${row.table_name}`);
    }
    const fieldId = nodeIds.field(row.table_name, row.field_name);
    if (!semantic.hasNode(fieldId)) {
      semantic.addNode({ id: fieldId, kind: 'Field', table: row.table_name, column: row.field_name });
    }
    if (semantic.hasEdge(fieldId, concept.id)) throw new CatalogIntegrityError(rel, keys, 'duplicate concept field');
    if (row.is_primary) {
      const slot = `${concept.id}\u0000${row.table_name}`;
      if (primaries.has(slot)) {
        throw new CatalogIntegrityError(rel, keys, `second primary field for ${concept.name} in ${row.table_name}`);
      }
      primaries.add(slot);
    }
    semantic.addEdge({ from: fieldId, to: concept.id, kind: 'CAN_MEAN', isPrimary: row.is_primary, tableAlias: row.table_alias });
  }

  // ---------- associations ----------
  for (const { row, keys } of validateRows('intentPerspectives', snapshot.intentPerspectives, IntentPerspectiveRow, ['intent_id', 'perspective_id'])) {
    const rel = RELATION_NAMES.intentPerspectives;
    const intent = lookup(intents, row.intent_id, rel, keys, 'intent_id');
    const perspective = lookup(perspectives, row.perspective_id, rel, keys, 'perspective_id');
    if (semantic.hasEdge(intent.id, perspective.id)) throw new CatalogIntegrityError(rel, keys, 'duplicate association');
    semantic.addEdge({ from: intent.id, to: perspective.id, kind: 'OPERATES_WITHIN', weight: row.intent_factor_weight });
  }

  for (const { row, keys } of validateRows('perspectiveConcepts', snapshot.perspectiveConcepts, PerspectiveConceptRow, ['perspective_id', 'concept_id'])) {
    const rel = RELATION_NAMES.perspectiveConcepts;
    const perspective = lookup(perspectives, row.perspective_id, rel, keys, 'perspective_id');
    const concept = lookup(concepts, row.concept_id, rel, keys, 'concept_id');
    if (semantic.hasEdge(perspective.id, concept.id)) throw new CatalogIntegrityError(rel, keys, 'duplicate association');
    semantic.addEdge({
      from: perspective.id, to: concept.id, kind: 'USES_DEFINITION',
      elevation: row.elevation_weight, rationale: row.rationale,
    });
  }

  for (const { row, keys } of validateRows('intentConcepts', snapshot.intentConcepts, IntentConceptRow, ['intent_id', 'concept_id'])) {
    const rel = RELATION_NAMES.intentConcepts;
    const intent = lookup(intents, row.intent_id, rel, keys, 'intent_id');
    const concept = lookup(concepts, row.concept_id, rel, keys, 'concept_id');
    if (semantic.hasEdge(intent.id, concept.id)) throw new CatalogIntegrityError(rel, keys, 'duplicate association');
    semantic.addEdge({ from: intent.id, to: concept.id, kind: intentEdgeKind(row.intent_factor_weight), weight: row.intent_factor_weight });
  }

  return { schema: schema.freeze(), semantic: semantic.freeze() };
}
