// packages/resolver/src/interpretations.ts
import { compareNames, isGraphEngineError, nodeIds, type ErrorCode, type IntentNode } from '@lattice/core';
import type { SemanticGraph } from '@lattice/graph';
import { resolveConcept, type ConceptOptions, type ConceptScore } from './elevation';

export type Interpretation =
  | {
      intent: string;
      ok: true;
      concept: string;
      table: string;
      column: string;
      score: number;
      /** Every candidate concept's score under this intent, best first. */
      scores: ConceptScore[];
      /** Candidates the intent itself elevates or suppresses. */
      elevated: string[];
      suppressed: string[];
      summary: string;
    }
  | { intent: string; ok: false; code: ErrorCode; message: string };

/** How one field name reads under every intent in the catalog, intents in name order. */
export function compareInterpretations(
  semantic: SemanticGraph,
  fieldName: string,
  opts: Omit<ConceptOptions, 'tieBreak'> = {}
): Interpretation[] {
  const intents = semantic.nodesOfKind('Intent').map((n) => n.name).sort(compareNames);
  return intents.map((intent): Interpretation => {
    try {
      const r = resolveConcept(semantic, intent, fieldName, opts);
      return {
        intent,
        ok: true,
        concept: r.concept,
        table: r.table,
        column: r.column,
        score: r.score,
        scores: r.rationale.scores,
        elevated: r.rationale.scores.filter((c) => c.intentWeight === 1).map((c) => c.concept),
        suppressed: r.rationale.scores.filter((c) => c.intentWeight === -1).map((c) => c.concept),
        summary: r.rationale.summary,
      };
    } catch (e) {
      if (!isGraphEngineError(e) || e.code === 'SG_CANCELLED') throw e;
      return { intent, ok: false, code: e.code, message: e.message };
    }
  });
}

export interface FieldRef {
  table: string;
  column: string;
}

export interface IntentRank {
  intent: string;
  confidence: number;
  matched: number;
  total: number;
  concepts: string[];
}

function elevatedConcepts(semantic: SemanticGraph, intent: IntentNode): Set<string> {
  const engaged = semantic
    .outEdges(intent.id)
    .filter((e) => e.kind === 'OPERATES_WITHIN' && e.weight === 1)
    .map((e) => e.to);
  const out = new Set<string>();
  for (const e of semantic.outEdges(intent.id)) {
    if (e.kind !== 'ELEVATES' || e.weight !== 1) continue;
    const defined = engaged.some((p) => {
      if (!semantic.hasEdge(p, e.to)) return false;
      return semantic.getEdge(p, e.to)?.kind === 'USES_DEFINITION';
    });
    if (defined) out.add(e.to);
  }
  return out;
}

/**
 * Guesses which intents a set of fields serves. A field matches an intent
 * when it CAN_MEAN a concept the intent elevates directly and one of the
 * intent's fully engaged perspectives defines.
 */
export function rankIntents(semantic: SemanticGraph, fields: FieldRef[]): IntentRank[] {
  if (fields.length === 0) return [];
  const ranks: IntentRank[] = [];
  for (const intent of semantic.nodesOfKind('Intent')) {
    const elevated = elevatedConcepts(semantic, intent);
    const hitConcepts = new Set<string>();
    const weights: number[] = [];
    for (const f of fields) {
      const fieldId = nodeIds.field(f.table, f.column);
      if (!semantic.hasNode(fieldId)) continue;
      const hits = semantic
        .outEdges(fieldId)
        .filter((e) => e.kind === 'CAN_MEAN' && elevated.has(e.to))
        .map((e) => e.to);
      if (hits.length === 0) continue;
      for (const c of hits) hitConcepts.add(c);
      const direct = hits.map((c) => {
        const e = semantic.getEdge(intent.id, c);
        return e && e.kind === 'ELEVATES' ? e.weight : 0;
      });
      weights.push(Math.max(...direct));
    }
    if (weights.length === 0) continue;
    const avg = weights.reduce((a, b) => a + b, 0) / weights.length;
    ranks.push({
      intent: intent.name,
      confidence: Math.round((weights.length / fields.length) * avg * 1000) / 1000,
      matched: weights.length,
      total: fields.length,
      concepts: [...hitConcepts]
        .map((id) => {
          const n = semantic.getNode(id);
          return n && n.kind === 'Concept' ? n.name : id;
        })
        .sort(compareNames),
    });
  }
  return ranks.sort((a, b) => b.confidence - a.confidence || compareNames(a.intent, b.intent));
}
