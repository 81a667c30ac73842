import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ONE_DAY } from '../src/config';
import { ResponseCache } from '../src/cache/responseCache';
import type { SqliteCardStore } from '../src/storage/sqliteCardStore';
import { FakeTransport, fakeClock, memoryStore, silentLogger } from './helpers/fakes';

const URL_A = 'http://api.test/cards/a';
const NOW = 1_700_000_000;

describe('ResponseCache', () => {
  let store: SqliteCardStore;
  let transport: FakeTransport;
  let clock: ReturnType<typeof fakeClock>;
  let cache: ResponseCache;

  const fetchA = () => cache.fetchWithCache(URL_A, ONE_DAY, () => transport.get(URL_A));

  beforeEach(() => {
    store = memoryStore();
    transport = new FakeTransport();
    clock = fakeClock(NOW);
    cache = new ResponseCache(store, { clock, logger: silentLogger });
  });

  it('fetches on a miss and stores the document with the current time', async () => {
    transport.json(URL_A, { id: 'a' });
    expect(await fetchA()).toEqual({ id: 'a' });
    expect(await store.getUrlEntry(URL_A)).toEqual({ url: URL_A, fetchedAt: NOW, payload: { id: 'a' } });
  });

  it('serves a fresh entry without calling fetchFn', async () => {
    await store.putUrlEntry(URL_A, NOW - ONE_DAY + 1, { id: 'cached' });
    const fetchFn = vi.fn(() => transport.get(URL_A));

    expect(await cache.fetchWithCache(URL_A, ONE_DAY, fetchFn)).toEqual({ id: 'cached' });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('treats an entry one second past the ttl as expired', async () => {
    await store.putUrlEntry(URL_A, NOW - ONE_DAY - 1, { id: 'stale' });
    transport.json(URL_A, { id: 'fresh' });

    expect(await fetchA()).toEqual({ id: 'fresh' });
    expect(transport.callsTo(URL_A)).toBe(1);
    expect((await store.getUrlEntry(URL_A))?.fetchedAt).toBe(NOW);
  });

  it('treats an entry exactly ttl old as expired', async () => {
    await store.putUrlEntry(URL_A, NOW - ONE_DAY, { id: 'edge' });
    transport.json(URL_A, { id: 'fresh' });
    expect(await fetchA()).toEqual({ id: 'fresh' });
  });

  it('returns null on a non-2xx status and keeps the previous entry', async () => {
    await store.putUrlEntry(URL_A, NOW - ONE_DAY - 10, { id: 'stale' });
    transport.status(URL_A, 503, 'unavailable');

    expect(await fetchA()).toBeNull();
    expect(await store.getUrlEntry(URL_A)).toEqual({ url: URL_A, fetchedAt: NOW - ONE_DAY - 10, payload: { id: 'stale' } });
  });

  it('returns null when the transport throws', async () => {
    transport.fail(URL_A);
    expect(await fetchA()).toBeNull();
    expect(await store.getUrlEntry(URL_A)).toBeNull();
  });

  it('returns null when the body is not JSON', async () => {
    transport.status(URL_A, 200, '<html>oops');
    expect(await fetchA()).toBeNull();
    expect(await store.getUrlEntry(URL_A)).toBeNull();
  });

  it('refetches after the clock moves past the window', async () => {
    transport.json(URL_A, { id: 'a', v: 1 });
    await fetchA();
    transport.json(URL_A, { id: 'a', v: 2 });

    clock.advance(ONE_DAY - 1);
    expect(await fetchA()).toEqual({ id: 'a', v: 1 });
    clock.advance(1);
    expect(await fetchA()).toEqual({ id: 'a', v: 2 });
    expect(transport.callsTo(URL_A)).toBe(2);
  });
});
