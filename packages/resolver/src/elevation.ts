// packages/resolver/src/elevation.ts
import {
  AmbiguousResolutionError,
  checkCancelled,
  compareNames,
  definitionLabel,
  NoApplicableConceptError,
  nodeIds,
  type AmbiguousCandidate,
  type CanMeanEdge,
  type ConceptNode,
  type DefinitionLabel,
  type FieldNode,
  type IntentConceptEdge,
  type IntentNode,
  type IntentWeight,
  UnknownNodeError,
} from '@lattice/core';
import type { SemanticGraph } from '@lattice/graph';

export type TieBreakPolicy = 'lexicographic' | 'strict';

export interface ConceptOptions {
  /** Restrict candidates to one table. */
  tableScope?: string;
  tieBreak?: TieBreakPolicy;
  signal?: AbortSignal;
}

export interface DecidingPerspective {
  name: string;
  label: DefinitionLabel;
  elevation: number | null;
  operatesWithinWeight: number;
  contribution: number;
  note: string | null;
}

export interface ConceptScore {
  concept: string;
  score: number;
  perspectiveElevation: number;
  intentWeight: IntentWeight;
}

export interface ConceptRationale {
  decidingPerspective: DecidingPerspective | null;
  intentEdge: { kind: IntentConceptEdge['kind']; weight: IntentWeight } | null;
  tieBreak: 'none' | 'table' | 'concept_name';
  scores: ConceptScore[];
  summary: string;
}

export interface ConceptResolution {
  intent: string;
  field: string;
  concept: string;
  table: string;
  column: string;
  tableAlias: string | null;
  score: number;
  rationale: ConceptRationale;
}

interface Candidate {
  field: FieldNode;
  edge: CanMeanEdge;
}

interface Scored {
  concept: ConceptNode;
  candidates: Candidate[];
  score: number;
  perspectiveElevation: number;
  intentWeight: IntentWeight;
  perspective: DecidingPerspective | null;
  intentEdge: IntentConceptEdge | null;
}

// Scores are sums of products of catalog decimals; compare them at a fixed precision.
const round = (n: number) => Math.round(n * 1e9) / 1e9;

/** "table.column" carries its own scope; a bare name does not. */
export function splitFieldName(fieldName: string): { table: string | null; column: string } {
  const dot = fieldName.indexOf('.');
  if (dot <= 0 || dot === fieldName.length - 1) return { table: null, column: fieldName };
  return { table: fieldName.slice(0, dot), column: fieldName.slice(dot + 1) };
}

export function requireIntent(semantic: SemanticGraph, intentName: string): IntentNode {
  const node = semantic.getNode(nodeIds.intent(intentName));
  if (!node || node.kind !== 'Intent') throw new UnknownNodeError(nodeIds.intent(intentName), 'intent');
  return node;
}

function candidatesFor(semantic: SemanticGraph, column: string, scope: string | null): Candidate[] {
  const out: Candidate[] = [];
  for (const field of semantic.nodesOfKind('Field')) {
    if (field.column !== column || (scope !== null && field.table !== scope)) continue;
    for (const edge of semantic.outEdges(field.id)) {
      if (edge.kind === 'CAN_MEAN') out.push({ field, edge });
    }
  }
  return out;
}

function decidingPerspective(semantic: SemanticGraph, intent: IntentNode, concept: ConceptNode): DecidingPerspective | null {
  let best: DecidingPerspective | null = null;
  for (const ow of semantic.outEdges(intent.id)) {
    if (ow.kind !== 'OPERATES_WITHIN' || ow.weight <= 0) continue;
    if (!semantic.hasEdge(ow.to, concept.id)) continue;
    const def = semantic.getEdge(ow.to, concept.id);
    if (!def || def.kind !== 'USES_DEFINITION') continue;
    const perspective = semantic.requireNode(ow.to);
    const contribution = round(ow.weight * (def.elevation ?? 0));
    const cand: DecidingPerspective = {
      name: perspective.kind === 'Perspective' ? perspective.name : perspective.id,
      label: definitionLabel(def),
      elevation: def.elevation,
      operatesWithinWeight: ow.weight,
      contribution,
      note: def.rationale,
    };
    if (!best || contribution > best.contribution || (contribution === best.contribution && compareNames(cand.name, best.name) < 0)) {
      best = cand;
    }
  }
  return best;
}

function directEdge(semantic: SemanticGraph, intent: IntentNode, concept: ConceptNode): IntentConceptEdge | null {
  if (!semantic.hasEdge(intent.id, concept.id)) return null;
  const e = semantic.getEdge(intent.id, concept.id);
  if (!e) return null;
  return e.kind === 'ELEVATES' || e.kind === 'SUPPRESSES' || e.kind === 'NEUTRAL' ? e : null;
}

const aliasKey = (c: Candidate) => c.edge.tableAlias ?? c.field.table;

function smallestAlias(s: Scored): string {
  return s.candidates.map(aliasKey).sort(compareNames)[0] ?? '';
}

function ambiguous(scored: Scored[]): AmbiguousCandidate[] {
  return scored.flatMap((s) =>
    s.candidates.map((c) => ({
      concept: s.concept.name,
      table: c.field.table,
      column: c.field.column,
      score: s.score,
      isPrimary: c.edge.isPrimary,
    }))
  );
}

function summarize(intent: IntentNode, winner: Scored, pick: Candidate, tieBreak: ConceptRationale['tieBreak']): string {
  const parts: string[] = [];
  const p = winner.perspective;
  if (p) {
    parts.push(
      `${intent.name} OPERATES_WITHIN ${p.name} (w=${p.operatesWithinWeight}) ${p.label} ${winner.concept.name}` +
        ` (elevation=${p.elevation ?? 'none'})`
    );
  }
  if (winner.intentEdge) parts.push(`${intent.name} ${winner.intentEdge.kind} ${winner.concept.name}`);
  parts.push(`${pick.field.table}.${pick.field.column} CAN_MEAN ${winner.concept.name}`);
  if (tieBreak !== 'none') parts.push(`tie broken by ${tieBreak}`);
  parts.push(`score=${winner.score}`);
  return parts.join('; ');
}

/**
 * Picks the concept (and table) an ambiguous field name means for an intent.
 *
 * score = max over the intent's perspectives of operates-within weight x
 * elevation, plus the intent's direct weight on the concept. Highest score
 * wins; ties go to the smallest table alias, then concept name, unless
 * `tieBreak: 'strict'` is set. Among the winner's fields a single candidate
 * or the unique primary one is chosen; under a table scope only a primary
 * field qualifies.
 */
export function resolveConcept(
  semantic: SemanticGraph,
  intentName: string,
  fieldName: string,
  opts: ConceptOptions = {}
): ConceptResolution {
  checkCancelled(opts.signal, 'resolveConcept');
  const intent = requireIntent(semantic, intentName);

  const { table: implied, column } = splitFieldName(fieldName);
  const scope = opts.tableScope ?? implied;
  if (opts.tableScope !== undefined && implied !== null && implied !== opts.tableScope) {
    throw new NoApplicableConceptError(fieldName, opts.tableScope);
  }

  const candidates = candidatesFor(semantic, column, scope);
  if (candidates.length === 0) throw new NoApplicableConceptError(fieldName, scope);

  const byConcept = new Map<string, Candidate[]>();
  for (const c of candidates) {
    const list = byConcept.get(c.edge.to) ?? [];
    list.push(c);
    byConcept.set(c.edge.to, list);
  }

  const scored: Scored[] = [];
  for (const [conceptId, list] of byConcept) {
    checkCancelled(opts.signal, 'resolveConcept');
    const node = semantic.requireNode(conceptId, 'concept');
    if (node.kind !== 'Concept') continue;
    const perspective = decidingPerspective(semantic, intent, node);
    const intentEdge = directEdge(semantic, intent, node);
    const perspectiveElevation = perspective ? perspective.contribution : 0;
    const intentWeight: IntentWeight = intentEdge ? intentEdge.weight : 0;
    scored.push({
      concept: node,
      candidates: list,
      score: round(perspectiveElevation + intentWeight),
      perspectiveElevation,
      intentWeight,
      perspective,
      intentEdge,
    });
  }
  if (scored.length === 0) throw new NoApplicableConceptError(fieldName, scope);
  scored.sort((a, b) => b.score - a.score || compareNames(a.concept.name, b.concept.name));

  const top = scored[0].score;
  const tied = scored.filter((s) => s.score === top);
  let tieBreak: ConceptRationale['tieBreak'] = 'none';
  let winner = tied[0];
  if (tied.length > 1) {
    if (opts.tieBreak === 'strict') {
      throw new AmbiguousResolutionError(intent.name, fieldName, 'score_tie', ambiguous(tied));
    }
    const ranked = [...tied].sort(
      (a, b) => compareNames(smallestAlias(a), smallestAlias(b)) || compareNames(a.concept.name, b.concept.name)
    );
    winner = ranked[0];
    tieBreak = smallestAlias(ranked[0]) === smallestAlias(ranked[1]) ? 'concept_name' : 'table';
  }

  // A scoped lookup needs the concept's primary field in that table; an
  // unscoped one takes a lone candidate or the unique primary.
  let pick: Candidate;
  const primaries = winner.candidates.filter((c) => c.edge.isPrimary);
  if (scope === null && winner.candidates.length === 1) {
    pick = winner.candidates[0];
  } else if (primaries.length === 1) {
    pick = primaries[0];
  } else {
    throw new AmbiguousResolutionError(intent.name, fieldName, 'table_ambiguous', ambiguous([winner]));
  }

  return {
    intent: intent.name,
    field: fieldName,
    concept: winner.concept.name,
    table: pick.field.table,
    column: pick.field.column,
    tableAlias: pick.edge.tableAlias,
    score: winner.score,
    rationale: {
      decidingPerspective: winner.perspective,
      intentEdge: winner.intentEdge ? { kind: winner.intentEdge.kind, weight: winner.intentEdge.weight } : null,
      tieBreak,
      scores: scored.map((s) => ({
        concept: s.concept.name,
        score: s.score,
        perspectiveElevation: s.perspectiveElevation,
        intentWeight: s.intentWeight,
      })),
      summary: summarize(intent, winner, pick, tieBreak),
    },
  };
}
