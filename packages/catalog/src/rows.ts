// packages/catalog/src/rows.ts
// Row-level validation for the catalog relations. Drivers disagree on
// numeric and boolean representations, so everything is normalized here.
import { z } from 'zod';

const numeric = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'not a number')])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

const id = z
  .union([z.number().int(), z.string().trim().regex(/^\d+$/, 'not an integer id')])
  .transform((v) => Number(v));

const text = z.string().trim().min(1);

const optText = z
  .string()
  .nullish()
  .transform((v) => (v == null || v.trim() === '' ? null : v));

const flag = z
  .union([z.boolean(), z.literal(0), z.literal(1), z.literal('0'), z.literal('1')])
  .nullish()
  .transform((v) => v === true || v === 1 || v === '1');

const unit = (what: string) => numeric.refine((n) => n >= 0 && n <= 1, `${what} must be within [0, 1]`);

export const TableRow = z.object({
  table_name: text,
  table_type: optText.transform((v) => v ?? 'table'),
  description: optText,
});

export const EdgeRow = z.object({
  from_table: text,
  to_table: text,
  relationship_type: optText.transform((v) => v ?? 'related'),
  join_column: optText,
  weight: numeric.nullish()
    .transform((v) => v ?? 1)
    .refine((n) => n > 0, 'weight must be positive'),
  join_column_description: optText,
  natural_language_alias: optText,
  few_shot_example: optText,
  context: optText,
});

export const IntentRow = z.object({ intent_id: id, intent_name: text, description: optText });
export const PerspectiveRow = z.object({ perspective_id: id, perspective_name: text, description: optText });
export const ConceptRow = z.object({ concept_id: id, concept_name: text, description: optText });

export const ConceptFieldRow = z.object({
  concept_id: id,
  table_name: text,
  field_name: text,
  is_primary: flag,
  table_alias: optText,
});

export const IntentPerspectiveRow = z.object({
  intent_id: id,
  perspective_id: id,
  intent_factor_weight: unit('intent_factor_weight').nullish().transform((v) => v ?? 1),
});

export const PerspectiveConceptRow = z.object({
  perspective_id: id,
  concept_id: id,
  elevation_weight: unit('elevation_weight').nullish().transform((v) => v ?? null),
  rationale: optText,
});

export const IntentConceptRow = z.object({
  intent_id: id,
  concept_id: id,
  intent_factor_weight: numeric.pipe(z.union([z.literal(-1), z.literal(0), z.literal(1)])),
});

export type TableRow = z.infer<typeof TableRow>;
export type EdgeRow = z.infer<typeof EdgeRow>;
export type IntentRow = z.infer<typeof IntentRow>;
export type PerspectiveRow = z.infer<typeof PerspectiveRow>;
export type ConceptRow = z.infer<typeof ConceptRow>;
export type ConceptFieldRow = z.infer<typeof ConceptFieldRow>;
export type IntentPerspectiveRow = z.infer<typeof IntentPerspectiveRow>;
export type PerspectiveConceptRow = z.infer<typeof PerspectiveConceptRow>;
export type IntentConceptRow = z.infer<typeof IntentConceptRow>;

/** Raw rows per relation, as read from storage (or from a snapshot file). */
export const CatalogSnapshotSchema = z.object({
  tables: z.array(z.unknown()),
  edges: z.array(z.unknown()).default([]),
  intents: z.array(z.unknown()).default([]),
  perspectives: z.array(z.unknown()).default([]),
  concepts: z.array(z.unknown()).default([]),
  conceptFields: z.array(z.unknown()).default([]),
  intentPerspectives: z.array(z.unknown()).default([]),
  perspectiveConcepts: z.array(z.unknown()).default([]),
  intentConcepts: z.array(z.unknown()).default([]),
});

export type CatalogSnapshot = z.infer<typeof CatalogSnapshotSchema>;

export const RELATION_NAMES: Record<keyof CatalogSnapshot, string> = {
  tables: 'schema_nodes',
  edges: 'schema_edges',
  intents: 'schema_intents',
  perspectives: 'schema_perspectives',
  concepts: 'schema_concepts',
  conceptFields: 'schema_concept_fields',
  intentPerspectives: 'schema_intent_perspectives',
  perspectiveConcepts: 'schema_perspective_concepts',
  intentConcepts: 'schema_intent_concepts',
};
