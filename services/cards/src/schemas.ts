import { z } from 'zod';
import type { CardDocument, CardRecord } from './types';

// Only the fields the cache indexes on are checked; the rest is stored as-is.
export const cardDocumentSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    mtgo_id: z.number().int().optional(),
    image_uris: z.record(z.string()).optional(),
  })
  .passthrough();

export const bulkManifestEntrySchema = z
  .object({
    type: z.string(),
    download_uri: z.string().url().optional(),
    permalink_uri: z.string().url().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export const bulkManifestSchema = z.object({
  data: z.array(bulkManifestEntrySchema),
});

export type BulkManifestEntry = z.infer<typeof bulkManifestEntrySchema>;
export type BulkManifest = z.infer<typeof bulkManifestSchema>;

export const cardQuerySchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    mtgoId: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine((q) => [q.id, q.name, q.mtgoId].filter((v) => v !== undefined).length === 1, {
    message: 'exactly one of id, name or mtgoId is required',
  });

export function parseCardDocument(value: unknown): CardDocument | null {
  const parsed = cardDocumentSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function toCardRecord(doc: CardDocument): CardRecord {
  const record: CardRecord = { id: doc.id, name: doc.name, payload: doc };
  if (doc.mtgo_id !== undefined) record.mtgoId = doc.mtgo_id;
  return record;
}
