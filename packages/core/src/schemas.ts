// packages/core/src/schemas.ts
import { z } from 'zod';
import type { CatalogEdge, CatalogNode } from './types';

const Description = z.string().nullable();

// nodes (discriminated on kind)
export const TableNodeSchema = z.object({
  id: z.string().min(1),
  kind: z.literal('Table'),
  name: z.string().min(1),
  tableType: z.string(),
  description: Description,
}).strict();

const namedNode = <K extends 'Intent' | 'Perspective' | 'Concept'>(kind: K) =>
  z.object({
    id: z.string().min(1),
    kind: z.literal(kind),
    name: z.string().min(1),
    catalogId: z.number().int(),
    description: Description,
  }).strict();

export const IntentNodeSchema = namedNode('Intent');
export const PerspectiveNodeSchema = namedNode('Perspective');
export const ConceptNodeSchema = namedNode('Concept');

export const FieldNodeSchema = z.object({
  id: z.string().min(1),
  kind: z.literal('Field'),
  table: z.string().min(1),
  column: z.string().min(1),
}).strict();

export const CatalogNodeSchema = z.discriminatedUnion('kind', [
  TableNodeSchema,
  IntentNodeSchema,
  PerspectiveNodeSchema,
  ConceptNodeSchema,
  FieldNodeSchema,
]);

// edges (discriminated on kind)
export const JoinEnrichmentSchema = z.record(z.string());

export const JoinEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  kind: z.literal('JOIN'),
  relationshipKind: z.string(),
  joinColumn: z.string().nullable(),
  weight: z.number().finite().positive(),
  enrichment: JoinEnrichmentSchema,
}).strict();

export const OperatesWithinEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  kind: z.literal('OPERATES_WITHIN'),
  weight: z.number().min(0).max(1),
}).strict();

export const UsesDefinitionEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  kind: z.literal('USES_DEFINITION'),
  elevation: z.number().min(0).max(1).nullable(),
  rationale: z.string().nullable(),
}).strict();

export const CanMeanEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  kind: z.literal('CAN_MEAN'),
  isPrimary: z.boolean(),
  tableAlias: z.string().nullable(),
}).strict();

export const IntentWeightSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)]);

const intentConceptEdge = <K extends 'ELEVATES' | 'SUPPRESSES' | 'NEUTRAL'>(kind: K, weight: -1 | 0 | 1) =>
  z.object({
    from: z.string(),
    to: z.string(),
    kind: z.literal(kind),
    weight: z.literal(weight),
  }).strict();

export const CatalogEdgeSchema = z.discriminatedUnion('kind', [
  JoinEdgeSchema,
  OperatesWithinEdgeSchema,
  UsesDefinitionEdgeSchema,
  CanMeanEdgeSchema,
  intentConceptEdge('ELEVATES', 1),
  intentConceptEdge('SUPPRESSES', -1),
  intentConceptEdge('NEUTRAL', 0),
]);

export function parseCatalogNode(raw: unknown): CatalogNode {
  return CatalogNodeSchema.parse(raw);
}

export function parseCatalogEdge(raw: unknown): CatalogEdge {
  return CatalogEdgeSchema.parse(raw);
}
