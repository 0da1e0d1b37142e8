/* apps/http/test/app.spec.ts */
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildCatalog } from '@lattice/catalog';
import { GraphPersistence } from '@lattice/graph-store';
import { buildApp, CatalogHolder, type App, type AppOptions } from '../src/app';
import { fixtureCatalog, fixtureSnapshot, isRecord } from '../../../tests/helpers';
import { MemoryGraphStoreDriver } from '../../../packages/graph-store/test/memory-driver';

const graphNames = { schema: 'schema_graph', semantic: 'semantic_layer' };

async function appWith(overrides: Partial<AppOptions> = {}): Promise<App> {
  const holder = await CatalogHolder.create(async () => fixtureCatalog());
  return buildApp({ holder, graphNames, ...overrides });
}

function body(res: { json(): unknown }): Record<string, unknown> {
  const b = res.json();
  if (!isRecord(b)) throw new Error('expected a JSON object');
  return b;
}

describe('http app', () => {
  let app: App;
  beforeEach(async () => {
    app = await appWith();
  });
  afterEach(async () => {
    await app.close();
  });

  it('answers health checks and echoes the request id', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz', headers: { 'x-request-id': 'req-abc' } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(res.headers['x-request-id']).toBe('req-abc');
  });

  it('reports readiness without a store', async () => {
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(body(res).store).toEqual({ ok: true, configured: false });
    expect(body(res).ok).toBe(true);
  });

  it('resolves a join path with its cost and description', async () => {
    const res = await app.inject({ method: 'POST', url: '/join-path', payload: { source: 'equipment', target: 'customer' } });
    expect(res.statusCode).toBe(200);
    const b = body(res);
    expect(b.cost).toBe(3);
    expect(b.description).toEqual([
      'equipment -> product on product_id: equipment that makes the product',
      'product -> order on product_id: ordered_in',
      'order -> customer on customer_id: customer who placed the order',
    ]);
  });

  it('maps engine errors to status codes', async () => {
    const noPath = await app.inject({ method: 'POST', url: '/join-path', payload: { source: 'audit_log', target: 'customer' } });
    expect(noPath.statusCode).toBe(422);
    expect(body(noPath)).toMatchObject({
      code: 'SG_NO_PATH',
      message: 'No join path between audit_log and customer',
      details: { source: 'audit_log', target: 'customer' },
    });

    const unknown = await app.inject({ method: 'POST', url: '/join-path', payload: { source: 'ghost', target: 'order' } });
    expect(unknown.statusCode).toBe(404);
    expect(body(unknown).code).toBe('SG_UNKNOWN_NODE');

    const tie = await app.inject({
      method: 'POST',
      url: '/resolve-concept',
      payload: { intent: 'cost-review', field: 'severity', tieBreak: 'strict' },
    });
    expect(tie.statusCode).toBe(409);
    expect(body(tie).code).toBe('SG_AMBIGUOUS_RESOLUTION');
  });

  it('rejects malformed bodies with the failing paths', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/join-path',
      payload: { source: 'order', extra: 1 },
      headers: { 'x-request-id': 'req-bad' },
    });
    expect(res.statusCode).toBe(400);
    const b = body(res);
    expect(b.code).toBe('VALIDATION');
    expect(b.requestId).toBe('req-bad');
    expect(Array.isArray(b.details)).toBe(true);
  });

  it('resolves a concept with its rationale', async () => {
    const res = await app.inject({ method: 'POST', url: '/resolve-concept', payload: { intent: 'quality-review', field: 'severity' } });
    expect(res.statusCode).toBe(200);
    expect(body(res)).toMatchObject({
      intent: 'quality-review',
      concept: 'MATERIAL_NON_CONFORMANCE',
      table: 'non_conformant_materials',
      column: 'severity',
      score: 1,
    });
  });

  it('lists interpretations of a field per intent', async () => {
    const res = await app.inject({ method: 'GET', url: '/interpretations/severity' });
    expect(body(res).interpretations).toMatchObject([
      { intent: 'cost-review', ok: true, concept: 'PRODUCTION_DEFECT' },
      { intent: 'production-tracking', ok: true, concept: 'PRODUCTION_DEFECT', score: 2 },
      { intent: 'quality-review', ok: true, concept: 'MATERIAL_NON_CONFORMANCE', table: 'non_conformant_materials' },
    ]);
  });

  it('ranks intents for a set of fields', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/intents/rank',
      payload: { fields: [{ table: 'product_defects', column: 'severity' }, { table: 'customer', column: 'name' }] },
    });
    expect(body(res).ranks).toEqual([
      { intent: 'production-tracking', confidence: 0.5, matched: 1, total: 2, concepts: ['PRODUCTION_DEFECT'] },
    ]);
  });

  it('refuses to persist without a configured store', async () => {
    const res = await app.inject({ method: 'POST', url: '/graphs/persist', payload: {} });
    expect(res.statusCode).toBe(503);
    expect(body(res).code).toBe('SG_STORE_UNAVAILABLE');
  });

  it('leaves CORS headers off for origins outside the allow-list', async () => {
    const strict = await appWith({ corsOrigins: ['http://ok.test'] });
    const ok = await strict.inject({ method: 'GET', url: '/healthz', headers: { origin: 'http://ok.test' } });
    const no = await strict.inject({ method: 'GET', url: '/healthz', headers: { origin: 'http://other.test' } });
    expect(ok.headers['access-control-allow-origin']).toBe('http://ok.test');
    expect(no.headers['access-control-allow-origin']).toBeUndefined();
    await strict.close();
  });

  it('rate limits per client', async () => {
    const limited = await appWith({ rateLimitMax: 2 });
    const codes: number[] = [];
    for (let i = 0; i < 3; i++) codes.push((await limited.inject({ method: 'GET', url: '/healthz' })).statusCode);
    expect(codes).toEqual([200, 200, 429]);
    await limited.close();
  });
});

describe('catalog reload', () => {
  it('swaps in the rebuilt catalog and keeps the old one when a rebuild fails', async () => {
    let snapshot = fixtureSnapshot();
    const holder = await CatalogHolder.create(async () => buildCatalog(snapshot));
    const app = await buildApp({ holder, graphNames });

    snapshot = { ...snapshot, tables: [...snapshot.tables, { table_name: 'warehouse', table_type: 'dimension', description: null }] };
    const ok = await app.inject({ method: 'POST', url: '/reload' });
    expect(ok.statusCode).toBe(200);
    expect(body(ok).schema).toMatchObject({ nodes: 9, edges: 6 });

    snapshot = { ...snapshot, edges: [...snapshot.edges, { from_table: 'warehouse', to_table: 'nowhere', relationship_type: 'stores', join_column: null, weight: 1 }] };
    const bad = await app.inject({ method: 'POST', url: '/reload' });
    expect(bad.statusCode).toBe(422);
    expect(body(bad).code).toBe('SG_CATALOG_INTEGRITY');

    const stats = await app.inject({ method: 'GET', url: '/stats' });
    expect(body(stats)).toMatchObject({ reloads: 1, schema: { nodes: 9 } });
    await app.close();
  });

  it('shares one rebuild between concurrent reloads', async () => {
    let builds = 0;
    const holder = await CatalogHolder.create(async () => {
      builds++;
      return fixtureCatalog();
    });
    await Promise.all([holder.reload(), holder.reload()]);
    expect(builds).toBe(2);
    expect(holder.reloads).toBe(1);
  });
});

describe('graph persistence over http', () => {
  let driver: MemoryGraphStoreDriver;
  let app: App;
  beforeEach(async () => {
    driver = new MemoryGraphStoreDriver();
    app = await appWith({ persistence: new GraphPersistence(driver) });
  });
  afterEach(async () => {
    await app.close();
  });

  it('persists both graphs and refuses a second write without overwrite', async () => {
    const res = await app.inject({ method: 'POST', url: '/graphs/persist', payload: {} });
    expect(res.statusCode).toBe(200);
    expect(body(res).results).toEqual([
      { name: 'schema_graph', generation: 1, nodes: 8, edges: 6, batches: 2, replacedGeneration: null },
      { name: 'semantic_layer', generation: 1, nodes: 15, edges: 16, batches: 2, replacedGeneration: null },
    ]);

    const again = await app.inject({ method: 'POST', url: '/graphs/persist', payload: { graphs: ['schema'] } });
    expect(again.statusCode).toBe(409);
    expect(body(again).code).toBe('SG_GRAPH_EXISTS');

    const over = await app.inject({ method: 'POST', url: '/graphs/persist', payload: { graphs: ['schema'], overwrite: true } });
    expect(body(over).results).toMatchObject([{ name: 'schema_graph', generation: 2, replacedGeneration: 1 }]);
  });

  it('reports an unreachable store on readiness and on writes', async () => {
    driver.down = true;
    const ready = await app.inject({ method: 'GET', url: '/readyz' });
    expect(body(ready)).toMatchObject({
      ok: false,
      store: { ok: false, configured: true, error: 'Graph store unavailable (memory): connection refused' },
    });

    const res = await app.inject({ method: 'POST', url: '/graphs/persist', payload: {} });
    expect(res.statusCode).toBe(503);
  });
});
