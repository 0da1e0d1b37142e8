// packages/core/src/logger.ts
import pino, { type Logger } from 'pino';

let root: Logger | undefined;

/** Root logger shared by every package and handed to Fastify in apps/http. */
export function rootLogger(): Logger {
  if (!root) {
    root = pino({
      name: 'lattice',
      level: process.env.LOG_LEVEL?.trim() || 'info',
    });
  }
  return root;
}

export function createLogger(component: string): Logger {
  return rootLogger().child({ component });
}

export type { Logger };
