import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CardCache } from '../cache/cardCache';
import type { CardQuery } from '../types';
import { badRequest, notFound, sendCacheError } from './errors';

// ---------- Schemas ----------
const idParamsSchema = z.object({
  id: z.string().min(1),
});

const namedQuerySchema = z.object({
  exact: z.string().min(1, 'exact required'),
});

const mtgoId = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().int().nonnegative(),
);

const mtgoParamsSchema = z.object({ mtgoId });

const lookupQuerySchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  mtgo_id: mtgoId.optional(),
});

const imageParamsSchema = z.object({
  id: z.string().min(1),
  format: z.string().min(1),
});

// ---------- Routes ----------
export async function registerCardRoutes(app: FastifyInstance, cache: CardCache) {
  async function lookup(query: CardQuery) {
    const card = await cache.resolve(query);
    return card ? card.toJSON() : null;
  }

  app.get('/cards/named', async (req, reply) => {
    const parsed = namedQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const card = await lookup({ name: parsed.data.exact });
    return card ? reply.send(card) : notFound(reply);
  });

  app.get('/cards/mtgo/:mtgoId', async (req, reply) => {
    const parsed = mtgoParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const card = await lookup({ mtgoId: parsed.data.mtgoId });
    return card ? reply.send(card) : notFound(reply);
  });

  // Generic form: exactly one of id, name, mtgo_id
  app.get('/cards/lookup', async (req, reply) => {
    const parsed = lookupQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { id, name, mtgo_id } = parsed.data;
    try {
      const card = await lookup({ id, name, mtgoId: mtgo_id });
      return card ? reply.send(card) : notFound(reply);
    } catch (err) {
      return sendCacheError(reply, err);
    }
  });

  app.get('/cards/:id', async (req, reply) => {
    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const card = await lookup({ id: parsed.data.id });
    return card ? reply.send(card) : notFound(reply);
  });

  app.get('/cards/:id/image/:format', async (req, reply) => {
    const parsed = imageParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const card = await cache.resolve({ id: parsed.data.id });
    if (!card) return notFound(reply);
    try {
      const path = await card.getImagePath(parsed.data.format);
      return reply.send({ id: card.id, format: parsed.data.format, path });
    } catch (err) {
      return sendCacheError(reply, err);
    }
  });
}
