import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CardCache } from '../cache/cardCache';
import { badRequest, sendCacheError } from './errors';

const refreshSchema = z
  .object({
    force: z.boolean().optional(),
  })
  .default({});

export async function registerCacheRoutes(app: FastifyInstance, cache: CardCache) {
  // Bulk refresh; only runs when the corpus has aged out unless forced
  app.post('/cache.refresh', async (req, reply) => {
    const parsed = refreshSchema.safeParse(req.body ?? undefined);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      const result = await cache.refresh({ force: parsed.data.force });
      return reply.send({
        refreshed: result.refreshed,
        card_count: result.cardCount,
        refreshed_at: result.refreshedAt,
      });
    } catch (err) {
      req.log.error({ err }, 'Bulk refresh failed');
      return sendCacheError(reply, err);
    }
  });

  app.get('/cache.stats', async (_req, reply) => {
    const stats = await cache.stats();
    return reply.send({
      cards: stats.cards,
      last_bulk_refresh: stats.lastBulkRefresh,
      schema_version: stats.schemaVersion,
      cache_dir: stats.cacheDir,
    });
  });
}
