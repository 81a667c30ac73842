import type {
  CacheMetadata,
  CardId,
  CardRecord,
  MtgoId,
  UnixSeconds,
  UrlResponseCacheEntry,
} from '../types';

/** Bumped whenever the persisted layout changes; a mismatch triggers a rebuild. */
export const STORE_SCHEMA_VERSION = '3';

/**
 * A replacement corpus being staged beside the live one. Readers keep seeing
 * the live corpus until `commit` swaps the staged one in.
 */
export interface BulkLoad {
  /** Stages a batch; a repeated id keeps its first occurrence. */
  add(records: CardRecord[]): Promise<void>;
  /** Swaps the staged cards in and stamps `lastBulkRefresh` in one transaction. Returns the card count. */
  commit(refreshedAt: UnixSeconds): Promise<number>;
  /** Discards the staged cards; the live corpus is untouched. */
  abort(): Promise<void>;
}

/**
 * Persistent store behind a cache instance.
 *
 * Every call runs inside one transaction that has committed (or rolled back)
 * by the time the promise settles. Implementations never keep a transaction
 * open across calls, so no transaction ever spans a network request.
 */
export interface CardStore {
  getById(id: CardId): Promise<CardRecord | null>;
  findByName(name: string): Promise<CardRecord[]>;
  findByMtgoId(mtgoId: MtgoId): Promise<CardRecord[]>;
  insertCard(record: CardRecord): Promise<void>;
  clearAllCards(): Promise<void>;
  beginBulkLoad(): Promise<BulkLoad>;
  /** Stages `records` and commits them as one swap. */
  replaceAllCards(records: Iterable<CardRecord>, refreshedAt: UnixSeconds): Promise<number>;
  countCards(): Promise<number>;
  /** Returns the singleton metadata row, creating the default one if absent. */
  getMetadata(): Promise<CacheMetadata>;
  setMetadata(lastBulkRefresh: UnixSeconds): Promise<void>;
  getUrlEntry(url: string): Promise<UrlResponseCacheEntry | null>;
  putUrlEntry(url: string, fetchedAt: UnixSeconds, payload: unknown): Promise<void>;
  close(): Promise<void>;
}

/** Stages an in-memory corpus and commits it; the staged rows are dropped on failure. */
export async function stageAndCommit(
  load: BulkLoad,
  records: Iterable<CardRecord>,
  refreshedAt: UnixSeconds,
): Promise<number> {
  try {
    await load.add([...records]);
    return await load.commit(refreshedAt);
  } catch (err) {
    await load.abort();
    throw err;
  }
}
