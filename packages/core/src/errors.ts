// packages/core/src/errors.ts
// Error taxonomy. Every error carries the identifiers needed to fix the
// catalog (or retry the store operation) in `details` and in its message.

export type ErrorCode =
  | 'SG_UNKNOWN_NODE'
  | 'SG_DUPLICATE_NODE'
  | 'SG_DUPLICATE_EDGE'
  | 'SG_GRAPH_FROZEN'
  | 'SG_CATALOG_INTEGRITY'
  | 'SG_NO_PATH'
  | 'SG_NO_APPLICABLE_CONCEPT'
  | 'SG_AMBIGUOUS_RESOLUTION'
  | 'SG_STORE_UNAVAILABLE'
  | 'SG_PARTIAL_WRITE'
  | 'SG_GRAPH_NOT_FOUND'
  | 'SG_GRAPH_EXISTS'
  | 'SG_CANCELLED'
  | 'SG_CONFIG';

export class GraphEngineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class UnknownNodeError extends GraphEngineError {
  constructor(readonly nodeId: string, role?: string) {
    super('SG_UNKNOWN_NODE', `Unknown node${role ? ` (${role})` : ''}: ${nodeId}`, { nodeId, ...(role ? { role } : {}) });
  }
}

export class DuplicateNodeError extends GraphEngineError {
  constructor(readonly nodeId: string) {
    super('SG_DUPLICATE_NODE', `Duplicate node: ${nodeId}`, { nodeId });
  }
}

export class DuplicateEdgeError extends GraphEngineError {
  constructor(readonly from: string, readonly to: string) {
    super('SG_DUPLICATE_EDGE', `Duplicate edge: ${from} -> ${to}`, { from, to });
  }
}

export class GraphFrozenError extends GraphEngineError {
  constructor(operation: string) {
    super('SG_GRAPH_FROZEN', `Graph is frozen; ${operation} rejected (rebuild instead)`, { operation });
  }
}

export class CatalogIntegrityError extends GraphEngineError {
  constructor(
    readonly relation: string,
    readonly rowKeys: Record<string, unknown>,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('SG_CATALOG_INTEGRITY', `${relation} ${JSON.stringify(rowKeys)}: ${reason}`, { relation, rowKeys, reason }, options);
  }
}

export class NoPathError extends GraphEngineError {
  constructor(readonly source: string, readonly target: string) {
    super('SG_NO_PATH', `No join path between ${source} and ${target}`, { source, target });
  }
}

export class NoApplicableConceptError extends GraphEngineError {
  constructor(readonly field: string, readonly tableScope: string | null) {
    super(
      'SG_NO_APPLICABLE_CONCEPT',
      `No concept CAN_MEAN field "${field}"${tableScope ? ` in table ${tableScope}` : ''}`,
      { field, tableScope }
    );
  }
}

export interface AmbiguousCandidate {
  concept: string;
  table: string;
  column: string;
  score: number;
  isPrimary?: boolean;
}

export class AmbiguousResolutionError extends GraphEngineError {
  constructor(
    readonly intent: string,
    readonly field: string,
    readonly reason: 'score_tie' | 'table_ambiguous',
    readonly candidates: AmbiguousCandidate[]
  ) {
    const list = candidates.map((c) => `${c.concept}@${c.table}.${c.column}(${c.score})`).join(', ');
    super(
      'SG_AMBIGUOUS_RESOLUTION',
      `Ambiguous resolution of "${field}" for intent ${intent} (${reason}): ${list}`,
      { intent, field, reason, candidates }
    );
  }
}

export class StoreUnavailableError extends GraphEngineError {
  constructor(readonly store: string, options?: { cause?: unknown }) {
    const why = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('SG_STORE_UNAVAILABLE', `Graph store unavailable (${store})${why}`, { store }, options);
  }
}

export type WritePhase = 'nodes' | 'edges' | 'commit';

export class PartialWriteError extends GraphEngineError {
  constructor(
    readonly store: string,
    readonly phase: WritePhase,
    readonly batchIndex: number | null,
    options?: { cause?: unknown }
  ) {
    const why = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(
      'SG_PARTIAL_WRITE',
      `Write of graph ${store} failed in ${phase}${batchIndex === null ? '' : ` batch ${batchIndex}`}${why}; re-run with overwrite=true`,
      { store, phase, batchIndex },
      options
    );
  }
}

export class GraphNotFoundError extends GraphEngineError {
  constructor(readonly store: string) {
    super('SG_GRAPH_NOT_FOUND', `Graph not found in store: ${store}`, { store });
  }
}

export class GraphExistsError extends GraphEngineError {
  constructor(readonly store: string) {
    super('SG_GRAPH_EXISTS', `Graph already exists in store: ${store} (pass overwrite=true to replace it)`, { store });
  }
}

export class OperationCancelledError extends GraphEngineError {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    const why = options?.cause instanceof Error ? ` (${options.cause.name})` : '';
    super('SG_CANCELLED', `Operation cancelled: ${operation}${why}`, { operation }, options);
  }
}

export class ConfigError extends GraphEngineError {
  constructor(readonly issues: Array<{ path: string; msg: string }>) {
    super('SG_CONFIG', `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.msg}`).join('; ')}`, { issues });
  }
}

export function isGraphEngineError(e: unknown): e is GraphEngineError {
  return e instanceof GraphEngineError;
}
