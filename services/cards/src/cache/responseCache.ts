import type { CardStore } from '../contracts/cardStore';
import { isSuccess, type TransportResponse } from '../contracts/transport';
import { errorMessage } from '../errors';
import { childLogger, type Logger } from '../logger';
import type { Clock } from '../types';

export type FetchFn = () => Promise<TransportResponse>;

export interface ResponseCacheOptions {
  clock: Clock;
  logger?: Logger;
}

/**
 * Memoizes GET responses by exact URL on top of the store.
 *
 * Failures here are soft: a bad status, a network error or a body that is not
 * JSON is logged and reported as `null`, never thrown.
 */
export class ResponseCache {
  private readonly store: CardStore;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(store: CardStore, options: ResponseCacheOptions) {
    this.store = store;
    this.clock = options.clock;
    this.log = options.logger ?? childLogger('response-cache');
  }

  async fetchWithCache(url: string, ttlSeconds: number, fetchFn: FetchFn): Promise<unknown | null> {
    const now = this.clock();
    const entry = await this.store.getUrlEntry(url);
    if (entry && entry.fetchedAt + ttlSeconds > now) {
      this.log.debug({ url, fetchedAt: entry.fetchedAt }, 'response cache hit');
      return entry.payload;
    }

    let payload: unknown;
    try {
      const res = await fetchFn();
      if (!isSuccess(res.status)) {
        this.log.warn({ url, status: res.status }, 'Remote lookup failed');
        return null;
      }
      payload = JSON.parse(res.body);
    } catch (err) {
      this.log.warn({ url, err: errorMessage(err) }, 'Remote lookup failed');
      return null;
    }

    this.log.debug({ url, fetchedAt: now }, 'storing response');
    await this.store.putUrlEntry(url, now, payload);
    return payload;
  }
}
