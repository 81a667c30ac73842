import type Redis from 'ioredis';
import type { ChainableCommander } from 'ioredis';
import { STORE_SCHEMA_VERSION, stageAndCommit, type BulkLoad, type CardStore } from '../contracts/cardStore';
import { childLogger, type Logger } from '../logger';
import type {
  CacheMetadata,
  CardDocument,
  CardId,
  CardRecord,
  MtgoId,
  UnixSeconds,
  UrlResponseCacheEntry,
} from '../types';

export interface RedisStoreOptions {
  /** Key prefix; one per application identity so caches can share a server. */
  namespace: string;
  logger?: Logger;
  /** Quit the client on close(). */
  ownsClient?: boolean;
}

const SCAN_COUNT = 500;
const DELETE_BATCH = 500;

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * Cards live under a numbered generation (`cards:<ns>:g<n>:...`); `gen` points
 * at the live one. Metadata and URL entries sit outside any generation.
 */
function keys(ns: string) {
  const p = `cards:${ns}:`;
  const g = (gen: number) => `${p}g${gen}:`;
  return {
    prefix: p,
    all: `${escapeGlob(p)}*`,
    generationKeys: `${escapeGlob(p)}g*`,
    gen: `${p}gen`,
    generations: `${p}generations`,
    card: (gen: number, id: CardId) => `${g(gen)}card:${id}`,
    cards: (gen: number) => `${g(gen)}cards`,
    name: (gen: number, name: string) => `${g(gen)}name:${name}`,
    mtgo: (gen: number, mtgoId: MtgoId) => `${g(gen)}mtgo:${mtgoId}`,
    meta: `${p}meta`,
    url: (url: string) => `${p}url:${url}`,
  };
}

type KeySpace = ReturnType<typeof keys>;

const GENERATION_KEY = /^g(\d+):/;

function generationOf(k: KeySpace, key: string): number | null {
  const match = GENERATION_KEY.exec(key.slice(k.prefix.length));
  return match && match[1] !== undefined ? Number(match[1]) : null;
}

function toHash(record: CardRecord): Record<string, string> {
  return {
    id: record.id,
    name: record.name,
    mtgo_id: record.mtgoId === undefined ? '' : String(record.mtgoId),
    payload: JSON.stringify(record.payload),
  };
}

function fromHash(hash: Record<string, string>): CardRecord | null {
  if (!hash.id || !hash.payload) return null;
  const payload: CardDocument = JSON.parse(hash.payload);
  const record: CardRecord = { id: hash.id, name: hash.name ?? '', payload };
  if (hash.mtgo_id) record.mtgoId = Number(hash.mtgo_id);
  return record;
}

function fromIndexHash(hash: Record<string, string>): CardRecord[] {
  return Object.keys(hash)
    .sort()
    .map((id) => {
      const record: CardRecord = JSON.parse(hash[id] ?? '{}');
      return record;
    })
    .filter((r) => Boolean(r.id));
}

async function execOrThrow(multi: ChainableCommander): Promise<unknown[]> {
  const results = await multi.exec();
  if (!results) throw new Error('redis transaction aborted');
  return results.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}

/**
 * `CardStore` on Redis. Each record lives in a hash; the name and MTGO
 * indexes are hashes of id -> serialized record so one HGETALL answers a scan.
 *
 * A bulk load writes a fresh generation and swaps the `gen` pointer together
 * with the metadata in one MULTI. Older generations are then deleted by key
 * pattern, so a write that landed in a retired generation is unreachable and
 * swept with it. Card writes made through one store instance are serialized.
 */
export class RedisCardStore implements CardStore {
  private readonly redis: Redis;
  private readonly k: KeySpace;
  private readonly log: Logger;
  private readonly ownsClient: boolean;
  private writes: Promise<void> = Promise.resolve();

  private constructor(redis: Redis, options: RedisStoreOptions) {
    this.redis = redis;
    this.k = keys(options.namespace);
    this.log = options.logger ?? childLogger('redis-store');
    this.ownsClient = options.ownsClient ?? false;
  }

  static async open(redis: Redis, options: RedisStoreOptions): Promise<RedisCardStore> {
    const store = new RedisCardStore(redis, options);
    await store.migrate();
    return store;
  }

  private async migrate() {
    const version = await this.redis.hget(this.k.meta, 'schema_version');
    if (version === null || version === STORE_SCHEMA_VERSION) return;

    this.log.warn(
      { found: version, expected: STORE_SCHEMA_VERSION },
      'Store layout mismatch; dropping and recreating all keys',
    );
    await this.deleteMatching(this.k.all, () => true);
  }

  async getById(id: CardId): Promise<CardRecord | null> {
    const gen = await this.liveGeneration();
    return fromHash(await this.redis.hgetall(this.k.card(gen, id)));
  }

  async findByName(name: string): Promise<CardRecord[]> {
    const gen = await this.liveGeneration();
    return fromIndexHash(await this.redis.hgetall(this.k.name(gen, name)));
  }

  async findByMtgoId(mtgoId: MtgoId): Promise<CardRecord[]> {
    const gen = await this.liveGeneration();
    return fromIndexHash(await this.redis.hgetall(this.k.mtgo(gen, mtgoId)));
  }

  async insertCard(record: CardRecord): Promise<void> {
    await this.exclusive(async () => {
      const gen = await this.liveGeneration();
      // never update in place
      if (await this.redis.exists(this.k.card(gen, record.id))) return;
      const multi = this.redis.multi();
      this.queueInsert(multi, gen, record);
      await execOrThrow(multi);
    });
  }

  async clearAllCards(): Promise<void> {
    const empty = await this.allocateGeneration();
    await this.exclusive(() => this.redis.set(this.k.gen, String(empty)));
    await this.sweepBelow(empty);
  }

  async beginBulkLoad(): Promise<BulkLoad> {
    const gen = await this.allocateGeneration();
    const seen = new Set<CardId>();
    let active = true;
    const ensureOpen = () => {
      if (!active) throw new Error(`bulk load g${gen} is already finished`);
    };
    this.log.debug({ gen }, 'Staging bulk load');

    return {
      add: async (records) => {
        ensureOpen();
        const multi = this.redis.multi();
        for (const record of records) {
          if (seen.has(record.id)) continue;
          seen.add(record.id);
          this.queueInsert(multi, gen, record);
        }
        await execOrThrow(multi);
      },
      commit: async (refreshedAt) => {
        ensureOpen();
        active = false;
        await this.exclusive(async () => {
          const live = await this.liveGeneration();
          if (live >= gen) {
            throw new Error(`bulk load g${gen} was superseded by g${live}`);
          }
          await execOrThrow(
            this.redis
              .multi()
              .set(this.k.gen, String(gen))
              .hset(this.k.meta, {
                last_bulk_refresh: String(refreshedAt),
                schema_version: STORE_SCHEMA_VERSION,
              }),
          );
        });
        await this.sweepBelow(gen);
        return seen.size;
      },
      abort: async () => {
        active = false;
        await this.deleteMatching(this.k.generationKeys, (key) => generationOf(this.k, key) === gen);
      },
    };
  }

  async replaceAllCards(records: Iterable<CardRecord>, refreshedAt: UnixSeconds): Promise<number> {
    return stageAndCommit(await this.beginBulkLoad(), records, refreshedAt);
  }

  async countCards(): Promise<number> {
    const gen = await this.liveGeneration();
    return this.redis.scard(this.k.cards(gen));
  }

  async getMetadata(): Promise<CacheMetadata> {
    const [, , hash] = await execOrThrow(
      this.redis
        .multi()
        .hsetnx(this.k.meta, 'last_bulk_refresh', '0')
        .hsetnx(this.k.meta, 'schema_version', STORE_SCHEMA_VERSION)
        .hgetall(this.k.meta),
    );
    const meta = isStringRecord(hash) ? hash : {};
    return {
      lastBulkRefresh: Number(meta.last_bulk_refresh ?? '0'),
      schemaVersion: meta.schema_version ?? STORE_SCHEMA_VERSION,
    };
  }

  async setMetadata(lastBulkRefresh: UnixSeconds): Promise<void> {
    await this.redis.hset(this.k.meta, {
      last_bulk_refresh: String(lastBulkRefresh),
      schema_version: STORE_SCHEMA_VERSION,
    });
  }

  async getUrlEntry(url: string): Promise<UrlResponseCacheEntry | null> {
    const hash = await this.redis.hgetall(this.k.url(url));
    if (!hash.url || !hash.payload) return null;
    return { url: hash.url, fetchedAt: Number(hash.fetched_at), payload: JSON.parse(hash.payload) };
  }

  async putUrlEntry(url: string, fetchedAt: UnixSeconds, payload: unknown): Promise<void> {
    await execOrThrow(
      this.redis
        .multi()
        .del(this.k.url(url))
        .hset(this.k.url(url), {
          url,
          fetched_at: String(fetchedAt),
          payload: JSON.stringify(payload),
        }),
    );
  }

  async close(): Promise<void> {
    if (this.ownsClient) await this.redis.quit();
  }

  private async liveGeneration(): Promise<number> {
    return Number((await this.redis.get(this.k.gen)) ?? '0');
  }

  private allocateGeneration(): Promise<number> {
    return this.redis.incr(this.k.generations);
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const turn = this.writes.then(fn);
    // keep the chain alive even when a write fails
    this.writes = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private queueInsert(multi: ChainableCommander, gen: number, record: CardRecord) {
    const serialized = JSON.stringify(record);
    multi.hset(this.k.card(gen, record.id), toHash(record));
    multi.sadd(this.k.cards(gen), record.id);
    multi.hset(this.k.name(gen, record.name), record.id, serialized);
    if (record.mtgoId !== undefined) {
      multi.hset(this.k.mtgo(gen, record.mtgoId), record.id, serialized);
    }
  }

  private async sweepBelow(live: number) {
    const removed = await this.deleteMatching(this.k.generationKeys, (key) => {
      const gen = generationOf(this.k, key);
      return gen !== null && gen < live;
    });
    this.log.debug({ live, removed }, 'Swept retired generations');
  }

  private async deleteMatching(pattern: string, select: (key: string) => boolean): Promise<number> {
    let cursor = '0';
    let removed = 0;
    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      cursor = String(next);
      const doomed = batch.filter(select);
      for (let i = 0; i < doomed.length; i += DELETE_BATCH) {
        removed += await this.redis.del(...doomed.slice(i, i + DELETE_BATCH));
      }
    } while (cursor !== '0');
    return removed;
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
