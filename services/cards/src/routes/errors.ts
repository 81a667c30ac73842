import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import { isCardCacheError, type CardCacheErrorCode } from '../errors';

const STATUS_BY_CODE: Record<CardCacheErrorCode, number> = {
  invalid_query: 400,
  unsupported_format: 400,
  missing_images: 404,
  transport_failure: 502,
  manifest_entry_not_found: 502,
};

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

export function notFound(reply: FastifyReply) {
  return reply.code(404).send({ error: 'not_found' });
}

/** Maps cache errors to a status; anything else is left to Fastify's handler. */
export function sendCacheError(reply: FastifyReply, err: unknown) {
  if (!isCardCacheError(err)) throw err;
  return reply.code(STATUS_BY_CODE[err.code]).send({ error: err.code, message: err.message });
}
