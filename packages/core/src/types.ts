// --------------------
// Nodes
// --------------------
// Ids are namespaced per kind so that a table, a concept and an intent can
// share a display name without colliding.
export type NodeKind = 'Table' | 'Intent' | 'Perspective' | 'Concept' | 'Field';

export interface TableNode {
  id: string;          // table name
  kind: 'Table';
  name: string;
  tableType: string;   // fact | dimension | reference | ...
  description: string | null;
}

export interface IntentNode {
  id: string;          // intent:<name>
  kind: 'Intent';
  name: string;
  catalogId: number;
  description: string | null;
}

export interface PerspectiveNode {
  id: string;          // perspective:<name>
  kind: 'Perspective';
  name: string;
  catalogId: number;
  description: string | null;
}

export interface ConceptNode {
  id: string;          // concept:<name>
  kind: 'Concept';
  name: string;
  catalogId: number;
  description: string | null;
}

export interface FieldNode {
  id: string;          // field:<table>.<column>
  kind: 'Field';
  table: string;
  column: string;
}

export type SemanticNode = IntentNode | PerspectiveNode | ConceptNode | FieldNode;
export type CatalogNode = TableNode | SemanticNode;

// --------------------
// Edges
// --------------------
export type EdgeKind =
  | 'JOIN'
  | 'OPERATES_WITHIN'
  | 'USES_DEFINITION'
  | 'CAN_MEAN'
  | 'ELEVATES'
  | 'SUPPRESSES'
  | 'NEUTRAL';

/**
 * Free-form enrichment carried by join edges. Known keys:
 * joinColumnDescription, naturalLanguageAlias, exampleQuery, context.
 */
export type JoinEnrichment = Partial<Record<string, string>>;

export const ENRICHMENT_KEYS = ['joinColumnDescription', 'naturalLanguageAlias', 'exampleQuery', 'context'] as const;

export interface JoinEdge {
  from: string;
  to: string;
  kind: 'JOIN';
  relationshipKind: string;
  joinColumn: string | null;
  weight: number;      // path cost, > 0
  enrichment: JoinEnrichment;
}

export interface OperatesWithinEdge {
  from: string;        // intent
  to: string;          // perspective
  kind: 'OPERATES_WITHIN';
  weight: number;      // 0..1
}

/**
 * Perspective -> Concept. A non-null `elevation` makes this the perspective's
 * ELEVATES (> 0) or SUPPRESSES (= 0) edge for the concept.
 */
export interface UsesDefinitionEdge {
  from: string;        // perspective
  to: string;          // concept
  kind: 'USES_DEFINITION';
  elevation: number | null;
  rationale: string | null;
}

export interface CanMeanEdge {
  from: string;        // field
  to: string;          // concept
  kind: 'CAN_MEAN';
  isPrimary: boolean;
  tableAlias: string | null;
}

export type IntentWeight = -1 | 0 | 1;

export interface IntentConceptEdge {
  from: string;        // intent
  to: string;          // concept
  kind: 'ELEVATES' | 'SUPPRESSES' | 'NEUTRAL';
  weight: IntentWeight;
}

export type SemanticEdge = OperatesWithinEdge | UsesDefinitionEdge | CanMeanEdge | IntentConceptEdge;
export type CatalogEdge = JoinEdge | SemanticEdge;

export type DefinitionLabel = 'USES_DEFINITION' | 'ELEVATES' | 'SUPPRESSES';

// --------------------
// Id helpers
// --------------------
export const nodeIds = {
  table: (name: string) => name,
  intent: (name: string) => `intent:${name}`,
  perspective: (name: string) => `perspective:${name}`,
  concept: (name: string) => `concept:${name}`,
  field: (table: string, column: string) => `field:${table}.${column}`,
} as const;

export function intentEdgeKind(weight: IntentWeight): IntentConceptEdge['kind'] {
  if (weight === 1) return 'ELEVATES';
  if (weight === -1) return 'SUPPRESSES';
  return 'NEUTRAL';
}

export function definitionLabel(edge: UsesDefinitionEdge): DefinitionLabel {
  if (edge.elevation === null) return 'USES_DEFINITION';
  return edge.elevation > 0 ? 'ELEVATES' : 'SUPPRESSES';
}

/** Code-unit ordering; never locale-dependent. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
