// apps/http/src/app.ts
import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  isGraphEngineError,
  rootLogger,
  StoreUnavailableError,
  withDeadline,
  type ErrorCode,
} from '@lattice/core';
import { graphStats, type Catalog } from '@lattice/graph';
import type { GraphPersistence, PersistResult } from '@lattice/graph-store';
import {
  compareInterpretations,
  describeJoinPath,
  rankIntents,
  resolveConcept,
  resolveJoinPath,
  resolveJoinPlan,
} from '@lattice/resolver';
import {
  InterpretationsParams,
  InterpretationsQuery,
  JoinPathBody,
  JoinPlanBody,
  PersistBody,
  RankIntentsBody,
  ResolveConceptBody,
} from './bodies';

export type CatalogLoader = (signal?: AbortSignal) => Promise<Catalog>;

/**
 * Holds the catalog every request reads. A reload builds a complete new
 * catalog first and swaps the reference only on success, so in-flight
 * requests keep the snapshot they started with.
 */
export class CatalogHolder {
  private catalog: Catalog;
  private loaded: Date;
  private reloadCount = 0;
  private pending: Promise<Catalog> | null = null;

  constructor(initial: Catalog, private readonly loader: CatalogLoader) {
    this.catalog = initial;
    this.loaded = new Date();
  }

  static async create(loader: CatalogLoader, signal?: AbortSignal): Promise<CatalogHolder> {
    return new CatalogHolder(await loader(signal), loader);
  }

  get current(): Catalog { return this.catalog; }
  get loadedAt(): string { return this.loaded.toISOString(); }
  get reloads(): number { return this.reloadCount; }

  /** Concurrent callers share one rebuild. */
  async reload(signal?: AbortSignal): Promise<Catalog> {
    if (!this.pending) {
      this.pending = this.loader(signal)
        .then((next) => {
          this.catalog = next;
          this.loaded = new Date();
          this.reloadCount++;
          return next;
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }
}

export interface AppOptions {
  holder: CatalogHolder;
  persistence?: GraphPersistence | null;
  graphNames: { schema: string; semantic: string };
  ioTimeoutMs?: number;
  corsOrigins?: string[];
  rateLimitMax?: number;
}

const STATUS: Record<ErrorCode, number> = {
  SG_UNKNOWN_NODE: 404,
  SG_GRAPH_NOT_FOUND: 404,
  SG_NO_PATH: 422,
  SG_NO_APPLICABLE_CONCEPT: 422,
  SG_CATALOG_INTEGRITY: 422,
  SG_AMBIGUOUS_RESOLUTION: 409,
  SG_GRAPH_EXISTS: 409,
  SG_CONFIG: 400,
  SG_STORE_UNAVAILABLE: 503,
  SG_PARTIAL_WRITE: 502,
  SG_CANCELLED: 504,
  SG_DUPLICATE_NODE: 500,
  SG_DUPLICATE_EDGE: 500,
  SG_GRAPH_FROZEN: 500,
};

function classifyError(err: unknown): { status: number; body: Record<string, unknown> } {
  if (err instanceof ZodError) {
    const details = err.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
    return { status: 400, body: { code: 'VALIDATION', message: 'Invalid request', details } };
  }
  if (isGraphEngineError(err)) {
    return { status: STATUS[err.code], body: { code: err.code, message: err.message, details: err.details } };
  }
  const statusCode = typeof err === 'object' && err !== null && 'statusCode' in err ? err.statusCode : undefined;
  const message = err instanceof Error ? err.message : String(err);
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return { status: statusCode, body: { code: 'BAD_REQUEST', message } };
  }
  return { status: 500, body: { code: 'INTERNAL', message: 'Request failed' } };
}

/** Fastify app over a catalog holder; main() in index.ts wires real I/O into it. */
export async function buildApp(opts: AppOptions) {
  const app = Fastify({
    logger: rootLogger(),
    requestIdHeader: 'x-request-id',
    bodyLimit: 1_000_000,
  });
  const { holder } = opts;
  const persistence = opts.persistence ?? null;
  const deadline = () => withDeadline(undefined, opts.ioTimeoutMs);

  const allow = opts.corsOrigins ?? [];
  await app.register(cors, {
    origin: (origin, cb) => {
      cb(null, !origin || allow.length === 0 || allow.includes(origin));
    },
    credentials: true,
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute',
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, rep) => {
    const { status, body } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.info({ code: body.code, requestId: req.id }, 'request-rejected');
    rep.status(status).send({ ...body, requestId: req.id });
  });

  // ---------- join paths ----------
  app.post('/join-path', async (req) => {
    const { source, target } = JoinPathBody.parse(req.body);
    const steps = resolveJoinPath(holder.current.schema, source, target);
    return {
      source,
      target,
      cost: steps.reduce((sum, s) => sum + s.weight, 0),
      steps,
      description: describeJoinPath(steps),
    };
  });

  app.post('/join-plan', async (req) => {
    const { tables } = JoinPlanBody.parse(req.body);
    const plan = resolveJoinPlan(holder.current.schema, tables);
    return { ...plan, description: describeJoinPath(plan.steps) };
  });

  // ---------- concepts ----------
  app.post('/resolve-concept', async (req) => {
    const body = ResolveConceptBody.parse(req.body);
    return resolveConcept(holder.current.semantic, body.intent, body.field, {
      tableScope: body.tableScope,
      tieBreak: body.tieBreak,
    });
  });

  app.get('/interpretations/:field', async (req) => {
    const { field } = InterpretationsParams.parse(req.params);
    const { tableScope } = InterpretationsQuery.parse(req.query);
    return { field, interpretations: compareInterpretations(holder.current.semantic, field, { tableScope }) };
  });

  app.post('/intents/rank', async (req) => {
    const { fields } = RankIntentsBody.parse(req.body);
    return { ranks: rankIntents(holder.current.semantic, fields) };
  });

  // ---------- catalog lifecycle ----------
  app.post('/reload', async (req) => {
    const next = await holder.reload(deadline());
    req.log.info({ reloads: holder.reloads }, 'catalog-reloaded');
    return {
      ok: true,
      loadedAt: holder.loadedAt,
      schema: graphStats(next.schema),
      semantic: graphStats(next.semantic),
    };
  });

  app.post('/graphs/persist', async (req) => {
    const body = PersistBody.parse(req.body ?? {});
    if (!persistence) throw new StoreUnavailableError('not configured');
    const { schema, semantic } = holder.current;
    const results: PersistResult[] = [];
    for (const which of body.graphs) {
      const graph = which === 'schema' ? schema : semantic;
      const name = which === 'schema' ? opts.graphNames.schema : opts.graphNames.semantic;
      results.push(await persistence.persist(graph, name, {
        overwrite: body.overwrite,
        batchSize: body.batchSize,
        signal: deadline(),
      }));
    }
    return { results };
  });

  app.get('/stats', async () => ({
    loadedAt: holder.loadedAt,
    reloads: holder.reloads,
    schema: graphStats(holder.current.schema),
    semantic: graphStats(holder.current.semantic),
  }));

  // ---------- health ----------
  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const catalog = { ok: true, loadedAt: holder.loadedAt };
    if (!persistence) return { ok: true, catalog, store: { ok: true, configured: false } };
    const [ping] = await Promise.allSettled([persistence.ping()]);
    const store = ping.status === 'fulfilled'
      ? { ok: true, configured: true }
      : { ok: false, configured: true, error: ping.reason instanceof Error ? ping.reason.message : String(ping.reason) };
    return { ok: store.ok, catalog, store };
  });

  return app;
}

export type App = Awaited<ReturnType<typeof buildApp>>;
