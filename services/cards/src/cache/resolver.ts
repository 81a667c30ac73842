import type { CardStore } from '../contracts/cardStore';
import type { Transport } from '../contracts/transport';
import { InvalidQueryError } from '../errors';
import type { ScryfallEndpoints } from '../http/endpoints';
import { childLogger, type Logger } from '../logger';
import { cardQuerySchema, parseCardDocument, toCardRecord } from '../schemas';
import type { CardDocument, CardQuery, CardRecord, CardSelector } from '../types';
import type { ResponseCache } from './responseCache';

export interface ResolverOptions {
  store: CardStore;
  responses: ResponseCache;
  transport: Transport;
  endpoints: ScryfallEndpoints;
  ttlSeconds: number;
  logger?: Logger;
}

export function toSelector(query: CardQuery): CardSelector {
  const parsed = cardQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InvalidQueryError(parsed.error.issues[0]?.message);
  }
  const { id, name, mtgoId } = parsed.data;
  if (id !== undefined) return { by: 'id', id };
  if (name !== undefined) return { by: 'name', name };
  if (mtgoId !== undefined) return { by: 'mtgoId', mtgoId };
  throw new InvalidQueryError();
}

/**
 * Answers card lookups from the store first, then from the URL response
 * cache or the network. Each key space has its own write-back rule.
 */
export class CardResolver {
  private readonly store: CardStore;
  private readonly responses: ResponseCache;
  private readonly transport: Transport;
  private readonly endpoints: ScryfallEndpoints;
  private readonly ttlSeconds: number;
  private readonly log: Logger;

  constructor(options: ResolverOptions) {
    this.store = options.store;
    this.responses = options.responses;
    this.transport = options.transport;
    this.endpoints = options.endpoints;
    this.ttlSeconds = options.ttlSeconds;
    this.log = options.logger ?? childLogger('resolver');
  }

  async resolve(query: CardQuery): Promise<CardDocument | null> {
    const selector = toSelector(query);
    switch (selector.by) {
      case 'id':
        return this.byId(selector.id);
      case 'name':
        return this.byIndex(
          `name ${selector.name}`,
          () => this.store.findByName(selector.name),
          this.endpoints.cardByName(selector.name),
        );
      case 'mtgoId':
        return this.byIndex(
          `MTGO id ${selector.mtgoId}`,
          () => this.store.findByMtgoId(selector.mtgoId),
          this.endpoints.cardByMtgoId(selector.mtgoId),
        );
    }
  }

  // A stored id is served as-is; its freshness is bounded by bulk refresh only.
  private async byId(id: string): Promise<CardDocument | null> {
    const local = await this.store.getById(id);
    if (local) return local.payload;

    this.log.debug({ id }, 'Card not found in store');
    const remote = await this.fetchRemote(this.endpoints.cardById(id));
    if (remote) await this.writeBack(remote);
    return remote;
  }

  /**
   * Name and MTGO id are not unique upstream, so only a single local match is
   * trusted. Write-back happens only when nothing matched locally; with two or
   * more matches the remote answer is returned but not stored.
   */
  private async byIndex(
    label: string,
    scan: () => Promise<CardRecord[]>,
    url: string,
  ): Promise<CardDocument | null> {
    const matches = await scan();
    if (matches.length === 1 && matches[0]) {
      this.log.debug({ key: label }, 'Returning single stored match');
      return matches[0].payload;
    }

    this.log.debug({ key: label, matches: matches.length }, 'Store lookup inconclusive; asking upstream');
    const remote = await this.fetchRemote(url);
    if (remote && matches.length === 0) await this.writeBack(remote);
    return remote;
  }

  private async fetchRemote(url: string): Promise<CardDocument | null> {
    const payload = await this.responses.fetchWithCache(url, this.ttlSeconds, () => this.transport.get(url));
    if (payload === null) return null;
    const doc = parseCardDocument(payload);
    if (!doc) {
      this.log.warn({ url }, 'Upstream returned something that is not a card');
    }
    return doc;
  }

  private async writeBack(doc: CardDocument) {
    this.log.debug({ id: doc.id }, 'Saving card to store');
    await this.store.insertCard(toCardRecord(doc));
  }
}
