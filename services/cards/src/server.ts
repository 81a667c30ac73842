import Fastify from 'fastify';
import type { CardCache } from './cache/cardCache';
import { registerCacheRoutes } from './routes/cache';
import { registerCardRoutes } from './routes/cards';

export interface BuildAppOptions {
  cache: CardCache;
  /** Fastify request log level; omit to disable request logging. */
  logLevel?: string;
}

export async function buildApp({ cache, logLevel }: BuildAppOptions) {
  const app = Fastify({ logger: logLevel ? { level: logLevel } : false });

  app.get('/health', async () => {
    try {
      const stats = await cache.stats();
      return { status: 'ok', store: 'ok', cards: stats.cards };
    } catch (err) {
      app.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerCardRoutes(app, cache);
  await registerCacheRoutes(app, cache);
  return app;
}
