import type Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { beforeEach, describe, expect, it } from 'vitest';
import { STORE_SCHEMA_VERSION } from '../src/contracts/cardStore';
import { RedisCardStore } from '../src/storage/redisCardStore';
import { toCardRecord } from '../src/schemas';
import type { CardRecord } from '../src/types';
import { card, silentLogger } from './helpers/fakes';

const rec = (id: string, name: string, mtgoId?: number): CardRecord =>
  toCardRecord(card(id, name, mtgoId === undefined ? {} : { mtgo_id: mtgoId }));

let redis: Redis;

beforeEach(async () => {
  // ioredis-mock shares data between instances; start each test clean
  redis = new RedisMock() as unknown as Redis;
  await redis.flushall();
});

/** Card keys of every generation, sorted. */
async function cardKeys(): Promise<string[]> {
  const all = await redis.keys('cards:test:g*');
  return all.filter((key) => /^cards:test:g\d+:/.test(key)).sort();
}

async function open(namespace = 'test') {
  return RedisCardStore.open(redis, { namespace, logger: silentLogger });
}

describe('RedisCardStore', () => {
  it('stores cards and answers the three lookups', async () => {
    const store = await open();
    await store.insertCard(rec('c-1', 'Island', 7));
    await store.insertCard(rec('c-2', 'Island', 7));
    await store.insertCard(rec('c-3', 'Swamp'));

    expect(await store.getById('c-3')).toEqual({
      id: 'c-3',
      name: 'Swamp',
      payload: { object: 'card', id: 'c-3', name: 'Swamp' },
    });
    expect(await store.getById('nope')).toBeNull();
    expect((await store.findByName('Island')).map((r) => r.id)).toEqual(['c-1', 'c-2']);
    expect((await store.findByMtgoId(7)).map((r) => r.id)).toEqual(['c-1', 'c-2']);
    expect(await store.countCards()).toBe(3);
  });

  it('ignores a second insert of the same id', async () => {
    const store = await open();
    await store.insertCard(rec('c-1', 'Forest'));
    await store.insertCard(rec('c-1', 'Renamed'));
    expect((await store.getById('c-1'))?.name).toBe('Forest');
    expect(await store.findByName('Renamed')).toEqual([]);
  });

  it('keeps application namespaces apart', async () => {
    const a = await open('app-a');
    const b = await open('app-b');
    await a.insertCard(rec('c-1', 'Forest'));
    expect(await b.getById('c-1')).toBeNull();
    expect(await b.countCards()).toBe(0);
  });

  it('creates default metadata once and updates it', async () => {
    const store = await open();
    expect(await store.getMetadata()).toEqual({ lastBulkRefresh: 0, schemaVersion: STORE_SCHEMA_VERSION });
    await store.setMetadata(42);
    expect(await store.getMetadata()).toEqual({ lastBulkRefresh: 42, schemaVersion: STORE_SCHEMA_VERSION });
  });

  it('replaceAllCards drops old cards and their index entries', async () => {
    const store = await open();
    await store.insertCard(rec('old-1', 'Old', 3));
    const count = await store.replaceAllCards([rec('n-1', 'New'), rec('n-1', 'New'), rec('n-2', 'New', 3)], 77);

    expect(count).toBe(2);
    expect(await store.getById('old-1')).toBeNull();
    expect(await store.findByName('Old')).toEqual([]);
    expect((await store.findByMtgoId(3)).map((r) => r.id)).toEqual(['n-2']);
    expect((await store.getMetadata()).lastBulkRefresh).toBe(77);
  });

  it('serves the live corpus while a bulk load is staged', async () => {
    const store = await open();
    await store.insertCard(rec('old-1', 'Old'));
    const load = await store.beginBulkLoad();
    await load.add([rec('n-1', 'New')]);

    expect(await store.getById('n-1')).toBeNull();
    expect(await store.countCards()).toBe(1);

    expect(await load.commit(10)).toBe(1);
    expect(await store.getById('old-1')).toBeNull();
    expect((await store.getById('n-1'))?.name).toBe('New');
  });

  it('leaves no keys behind from an aborted load', async () => {
    const store = await open();
    await store.insertCard(rec('c-1', 'Forest'));
    const load = await store.beginBulkLoad();
    await load.add([rec('n-1', 'New', 4)]);
    await load.abort();

    expect(await store.countCards()).toBe(1);
    expect(await store.findByMtgoId(4)).toEqual([]);
    expect(await cardKeys()).toEqual([
      'cards:test:g0:card:c-1',
      'cards:test:g0:cards',
      'cards:test:g0:name:Forest',
    ]);
  });

  it('keeps a write-back made during a swap consistent with the indexes', async () => {
    const store = await open();
    const swap = store.replaceAllCards([rec('n-1', 'New')], 20);
    await store.insertCard(rec('stray', 'Stray'));
    await swap;

    const stray = await store.getById('stray');
    const byName = await store.findByName('Stray');
    expect(byName.map((r) => r.id)).toEqual(stray ? ['stray'] : []);
    expect(await store.countCards()).toBe(stray ? 2 : 1);

    await store.replaceAllCards([rec('z-1', 'Zed')], 30);
    expect(await store.getById('stray')).toBeNull();
    expect(await store.findByName('Stray')).toEqual([]);
    expect(await store.countCards()).toBe(1);
    expect(await cardKeys()).toEqual(['cards:test:g2:card:z-1', 'cards:test:g2:cards', 'cards:test:g2:name:Zed']);
  });

  it('refuses to commit a load older than the live corpus', async () => {
    const store = await open();
    const older = await store.beginBulkLoad();
    await older.add([rec('o-1', 'Older')]);
    await store.replaceAllCards([rec('n-1', 'Newer')], 40);

    await expect(older.commit(50)).rejects.toThrow('superseded');
    await older.abort();
    expect((await store.getById('n-1'))?.name).toBe('Newer');
    expect((await store.getMetadata()).lastBulkRefresh).toBe(40);
  });

  it('clearAllCards empties the corpus', async () => {
    const store = await open();
    await store.insertCard(rec('c-1', 'Forest'));
    await store.clearAllCards();
    expect(await store.countCards()).toBe(0);
    expect(await store.findByName('Forest')).toEqual([]);
  });

  it('round-trips url entries and replaces them', async () => {
    const store = await open();
    await store.putUrlEntry('http://api.test/cards/x', 5, { id: 'x' });
    await store.putUrlEntry('http://api.test/cards/x', 6, { id: 'x', v: 2 });
    expect(await store.getUrlEntry('http://api.test/cards/x')).toEqual({
      url: 'http://api.test/cards/x',
      fetchedAt: 6,
      payload: { id: 'x', v: 2 },
    });
  });

  it('wipes keys written under another schema version', async () => {
    const store = await open();
    await store.insertCard(rec('c-1', 'Forest'));
    await store.putUrlEntry('u', 1, { id: 'c-1' });
    await store.setMetadata(100);
    await redis.hset('cards:test:meta', 'schema_version', 'legacy');

    const reopened = await open();
    expect(await reopened.countCards()).toBe(0);
    expect(await reopened.getById('c-1')).toBeNull();
    expect(await reopened.getUrlEntry('u')).toBeNull();
    expect((await reopened.getMetadata()).lastBulkRefresh).toBe(0);
  });
});
