import { TransportError, errorMessage } from '../errors';
import { isSuccess, type Transport, type TransportResponse } from '../contracts/transport';
import { childLogger, type Logger } from '../logger';

type FetchImpl = typeof fetch;

const DEFAULT_MIN_INTERVAL_MS = 100;
const DEFAULT_RETRY_AFTER_MS = 1000;
const USER_AGENT = 'scryfall-card-cache/0.1';

export interface PacedTransportOptions {
  /** Minimum spacing between the start of two requests. */
  minIntervalMs?: number;
  fetch?: FetchImpl;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * `fetch`-backed transport that spaces requests out. Every request made
 * through one instance shares a single budget: calls queue behind each other
 * and start at least `minIntervalMs` apart. A 429 is waited out once using
 * its Retry-After header.
 */
export class PacedTransport implements Transport {
  private readonly minIntervalMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastStart = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: PacedTransportOptions = {}) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS);
    const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
    if (!fetchImpl) {
      throw new Error('PacedTransport: fetch implementation required');
    }
    this.fetchImpl = fetchImpl.bind(globalThis);
    this.log = options.logger ?? childLogger('transport');
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async get(url: string): Promise<TransportResponse> {
    const res = await this.request(url);
    return { status: res.status, body: await res.text() };
  }

  async getStream(url: string): Promise<AsyncIterable<Uint8Array>> {
    const res = await this.request(url);
    if (!isSuccess(res.status)) {
      const detail = await safeReadBody(res);
      throw new TransportError(url, `${res.status} ${res.statusText}${detail}`, { status: res.status });
    }
    if (!res.body) {
      throw new TransportError(url, 'response has no body', { status: res.status });
    }
    return readChunks(res.body);
  }

  private async request(url: string): Promise<Response> {
    let res = await this.paced(url);
    if (res.status === 429) {
      const waitMs = retryAfterMs(res.headers.get('retry-after'));
      this.log.warn({ url, waitMs }, 'Rate limited upstream; retrying once');
      await res.body?.cancel();
      await this.sleep(waitMs);
      res = await this.paced(url);
    }
    return res;
  }

  private paced(url: string): Promise<Response> {
    const turn = this.queue.then(async () => {
      const wait = this.lastStart + this.minIntervalMs - this.now();
      if (wait > 0) await this.sleep(wait);
      this.lastStart = this.now();
    });
    // keep the chain alive even when a request fails
    this.queue = turn.catch(() => undefined);
    return turn.then(() => this.send(url));
  }

  private async send(url: string): Promise<Response> {
    this.log.debug({ url }, 'GET');
    try {
      return await this.fetchImpl(url, {
        method: 'GET',
        headers: { accept: 'application/json;q=0.9,*/*;q=0.8', 'user-agent': USER_AGENT },
      });
    } catch (err) {
      throw new TransportError(url, errorMessage(err), { cause: err });
    }
  }
}

async function* readChunks(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let settled = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        settled = true;
        return;
      }
      if (value) yield value;
    }
  } catch (err) {
    settled = true;
    throw err;
  } finally {
    // consumer stopped early: release the connection
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}

function retryAfterMs(header: string | null): number {
  if (!header) return DEFAULT_RETRY_AFTER_MS;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : DEFAULT_RETRY_AFTER_MS;
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
