export type CardId = string;
export type MtgoId = number;
export type UnixSeconds = number;

/** Card document exactly as upstream returned it. */
export type CardDocument = Record<string, unknown> & {
  id: CardId;
  name: string;
  mtgo_id?: MtgoId;
  image_uris?: Record<string, string>;
};

export interface CardRecord {
  id: CardId;       // immutable primary key
  name: string;
  mtgoId?: MtgoId;
  payload: CardDocument;
}

export interface CacheMetadata {
  lastBulkRefresh: UnixSeconds;
  schemaVersion: string;
}

export interface UrlResponseCacheEntry {
  url: string;
  fetchedAt: UnixSeconds;
  payload: unknown;
}

// One of these per lookup; exactly one key must be set.
export interface CardQuery {
  id?: CardId;
  name?: string;
  mtgoId?: MtgoId;
}

export type CardSelector =
  | { by: 'id'; id: CardId }
  | { by: 'name'; name: string }
  | { by: 'mtgoId'; mtgoId: MtgoId };

export type Clock = () => UnixSeconds;
