import { Readable } from 'stream';
import StreamArray from 'stream-json/streamers/StreamArray.js';
import type { BulkLoad, CardStore } from '../contracts/cardStore';
import { isSuccess, type Transport } from '../contracts/transport';
import { ManifestEntryNotFoundError, TransportError, errorMessage } from '../errors';
import type { ScryfallEndpoints } from '../http/endpoints';
import { childLogger, type Logger } from '../logger';
import { bulkManifestSchema, cardDocumentSchema, toCardRecord, type BulkManifest, type BulkManifestEntry } from '../schemas';
import type { CardRecord, Clock, UnixSeconds } from '../types';

const DEFAULT_BATCH_SIZE = 1000;

export interface BulkRefreshOptions {
  store: CardStore;
  transport: Transport;
  endpoints: ScryfallEndpoints;
  clock: Clock;
  periodSeconds: number;
  bulkDataType: string;
  /** Cards staged per store write while the dataset streams in. */
  batchSize?: number;
  logger?: Logger;
}

export interface RefreshResult {
  refreshed: boolean;
  cardCount: number;
  refreshedAt: UnixSeconds;
}

export function findManifestEntry(manifest: BulkManifest, type: string): BulkManifestEntry | undefined {
  return manifest.data.find((entry) => entry.type === type);
}

/**
 * Replaces the whole card corpus from an upstream bulk snapshot. Nothing on
 * this path goes through the response cache, and every failure is thrown: a
 * cache that cannot load its dataset is not usable.
 */
export class BulkRefresher {
  private readonly store: CardStore;
  private readonly transport: Transport;
  private readonly endpoints: ScryfallEndpoints;
  private readonly clock: Clock;
  private readonly periodSeconds: number;
  private readonly bulkDataType: string;
  private readonly batchSize: number;
  private readonly log: Logger;
  private inFlight?: Promise<RefreshResult>;

  constructor(options: BulkRefreshOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.endpoints = options.endpoints;
    this.clock = options.clock;
    this.periodSeconds = options.periodSeconds;
    this.bulkDataType = options.bulkDataType;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.log = options.logger ?? childLogger('bulk-refresh');
  }

  async isStale(): Promise<boolean> {
    const meta = await this.store.getMetadata();
    return this.clock() > meta.lastBulkRefresh + this.periodSeconds;
  }

  /** Refreshes when the corpus has aged out, or unconditionally with `force`. */
  async refreshIfStale(options: { force?: boolean } = {}): Promise<RefreshResult> {
    if (!options.force && !(await this.isStale())) {
      const meta = await this.store.getMetadata();
      return { refreshed: false, cardCount: await this.store.countCards(), refreshedAt: meta.lastBulkRefresh };
    }
    this.log.info({ periodSeconds: this.periodSeconds, force: Boolean(options.force) }, 'Bulk refresh due');
    return this.refresh();
  }

  /** Runs a refresh now; a call made while one is running joins it. */
  refresh(): Promise<RefreshResult> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async run(): Promise<RefreshResult> {
    const manifest = bulkManifestSchema.safeParse(await this.getJson(this.endpoints.bulkManifest()));
    if (!manifest.success) {
      throw new TransportError(this.endpoints.bulkManifest(), 'bulk data manifest is malformed');
    }

    const entry = findManifestEntry(manifest.data, this.bulkDataType);
    if (!entry) throw new ManifestEntryNotFoundError(this.bulkDataType);

    const uri = entry.download_uri ?? entry.permalink_uri;
    if (!uri) {
      throw new TransportError(this.endpoints.bulkManifest(), `entry ${entry.type} has no download uri`);
    }

    this.log.info({ type: entry.type, uri, updatedAt: entry.updated_at }, 'Downloading bulk dataset');
    const load = await this.store.beginBulkLoad();
    try {
      const skipped = await this.stage(load, uri);
      if (skipped > 0) {
        this.log.warn({ skipped }, 'Skipped bulk entries without id or name');
      }
      const refreshedAt = this.clock();
      const cardCount = await load.commit(refreshedAt);
      this.log.info({ cardCount, refreshedAt }, 'Finished bulk card insertion');
      return { refreshed: true, cardCount, refreshedAt };
    } catch (err) {
      await load.abort();
      throw err;
    }
  }

  // Cards are staged batch by batch as the array streams in; the live corpus
  // is only replaced by the commit.
  private async stage(load: BulkLoad, uri: string): Promise<number> {
    let batch: CardRecord[] = [];
    let skipped = 0;
    for await (const item of this.streamDataset(uri)) {
      const parsed = cardDocumentSchema.safeParse(item);
      if (!parsed.success) {
        skipped += 1;
        continue;
      }
      batch.push(toCardRecord(parsed.data));
      if (batch.length >= this.batchSize) {
        await load.add(batch);
        batch = [];
      }
    }
    if (batch.length > 0) await load.add(batch);
    return skipped;
  }

  private async *streamDataset(uri: string): AsyncGenerator<unknown> {
    const source = Readable.from(await this.transport.getStream(uri));
    const parser = StreamArray.withParser();
    source.once('error', (err) => parser.destroy(err));
    source.pipe(parser);
    try {
      for await (const entry of parser) yield entryValue(entry);
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(uri, `invalid bulk dataset: ${errorMessage(err)}`, { cause: err });
    } finally {
      source.destroy();
    }
  }

  private async getJson(url: string): Promise<unknown> {
    const res = await this.transport.get(url);
    if (!isSuccess(res.status)) {
      throw new TransportError(url, `status ${res.status}`, { status: res.status });
    }
    try {
      return JSON.parse(res.body);
    } catch (err) {
      throw new TransportError(url, `invalid JSON: ${errorMessage(err)}`, { status: res.status, cause: err });
    }
  }
}

function entryValue(entry: unknown): unknown {
  return typeof entry === 'object' && entry !== null && 'value' in entry ? entry.value : undefined;
}
