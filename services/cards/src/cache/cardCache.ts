import { Card, type ImageSource } from '../card';
import { defaults } from '../config';
import type { CardStore } from '../contracts/cardStore';
import type { Transport } from '../contracts/transport';
import { scryfallEndpoints } from '../http/endpoints';
import { childLogger, logger as rootLogger, type Logger } from '../logger';
import type { CacheMetadata, CardQuery, Clock } from '../types';
import { BulkRefresher, type RefreshResult } from './bulkRefresh';
import { ImageStore } from './images';
import { CardResolver } from './resolver';
import { ResponseCache } from './responseCache';

export interface CardCacheOptions {
  /** Store handle owned by the caller; one per cache instance. */
  store: CardStore;
  transport: Transport;
  /** Writable directory for downloaded art. */
  cacheDir: string;
  refreshPeriodSeconds?: number;
  bulkDataType?: string;
  responseTtlSeconds?: number;
  apiBaseUrl?: string;
  clock?: Clock;
  logger?: Logger;
}

export interface CacheStats extends CacheMetadata {
  cards: number;
  cacheDir: string;
}

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Read-through card cache. Use `CardCache.open`, which brings the local corpus
 * up to date before any lookup is served.
 */
export class CardCache implements ImageSource {
  private readonly store: CardStore;
  private readonly cacheDir: string;
  private readonly resolver: CardResolver;
  private readonly refresher: BulkRefresher;
  private readonly images: ImageStore;
  private readonly log: Logger;

  private constructor(options: CardCacheOptions) {
    const clock = options.clock ?? systemClock;
    const log = options.logger ?? rootLogger;
    const endpoints = scryfallEndpoints(options.apiBaseUrl ?? defaults.apiBaseUrl);

    this.store = options.store;
    this.cacheDir = options.cacheDir;
    this.log = childLogger('card-cache', log);
    this.refresher = new BulkRefresher({
      store: options.store,
      transport: options.transport,
      endpoints,
      clock,
      periodSeconds: options.refreshPeriodSeconds ?? defaults.refreshPeriodSeconds,
      bulkDataType: options.bulkDataType ?? defaults.bulkDataType,
      logger: childLogger('bulk-refresh', log),
    });
    this.resolver = new CardResolver({
      store: options.store,
      responses: new ResponseCache(options.store, { clock, logger: childLogger('response-cache', log) }),
      transport: options.transport,
      endpoints,
      ttlSeconds: options.responseTtlSeconds ?? defaults.responseTtlSeconds,
      logger: childLogger('resolver', log),
    });
    this.images = new ImageStore({
      cacheDir: options.cacheDir,
      transport: options.transport,
      logger: childLogger('images', log),
    });
  }

  /** Builds a cache and runs the staleness check; a failed bulk refresh rejects. */
  static async open(options: CardCacheOptions): Promise<CardCache> {
    const cache = new CardCache(options);
    await cache.refresh();
    return cache;
  }

  async resolve(query: CardQuery): Promise<Card | null> {
    const doc = await this.resolver.resolve(query);
    return doc ? new Card(doc, this) : null;
  }

  getImagePath(card: Card, format: string): Promise<string> {
    return this.images.getImagePath(card.data, format);
  }

  getCacheDirectory(): string {
    return this.cacheDir;
  }

  refresh(options: { force?: boolean } = {}): Promise<RefreshResult> {
    return this.refresher.refreshIfStale(options);
  }

  async stats(): Promise<CacheStats> {
    const meta = await this.store.getMetadata();
    return { ...meta, cards: await this.store.countCards(), cacheDir: this.cacheDir };
  }

  async close(): Promise<void> {
    this.log.debug('closing store');
    await this.store.close();
  }
}
