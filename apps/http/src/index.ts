// apps/http/src/index.ts
import { loadConfig, rootLogger, withDeadline } from '@lattice/core';
import { createCatalogDb, loadCatalog } from '@lattice/catalog';
import { createGraphStore } from '@lattice/graph-store';
import { buildApp, CatalogHolder } from './app';

async function main() {
  const cfg = loadConfig();
  const log = rootLogger();
  log.level = cfg.logLevel;

  const db = createCatalogDb(cfg.catalog);
  const { driver, persistence } = createGraphStore(cfg);
  const holder = await CatalogHolder.create(
    (signal) => loadCatalog(db, { signal }),
    withDeadline(undefined, cfg.ioTimeoutMs)
  );

  const app = await buildApp({
    holder,
    persistence,
    graphNames: cfg.graphs,
    ioTimeoutMs: cfg.ioTimeoutMs,
    corsOrigins: cfg.http.corsOrigins,
  });

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([db.destroy(), driver.close(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: cfg.http.port, host: cfg.http.host });
  app.log.info(`HTTP on :${cfg.http.port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
