import fs from 'fs';
import dotenv from 'dotenv';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TWELVE_WEEKS } from '../src/config';

const ENV_KEYS = [
  'PORT',
  'HOST',
  'LOG_LEVEL',
  'CARD_CACHE_APP',
  'CARD_CACHE_APP_VERSION',
  'CARD_CACHE_DIR',
  'CARD_STORE',
  'REDIS_URL',
  'SCRYFALL_API_URL',
  'SCRYFALL_MIN_INTERVAL_MS',
  'BULK_REFRESH_PERIOD_S',
  'BULK_DATA_TYPE',
];

async function loadConfig() {
  vi.resetModules();
  return (await import('../src/config')).config;
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('documents every variable it reads in .env.example', () => {
    const example = dotenv.parse(fs.readFileSync(new URL('../../../.env.example', import.meta.url)));
    expect(Object.keys(example).sort()).toEqual([...ENV_KEYS].sort());
    expect(Number(example.BULK_REFRESH_PERIOD_S)).toBe(TWELVE_WEEKS);
  });

  it('reads the app version and refresh period from the environment', async () => {
    vi.stubEnv('CARD_CACHE_APP_VERSION', '1.4');
    vi.stubEnv('BULK_REFRESH_PERIOD_S', '3600');
    const config = await loadConfig();
    expect(config.cache.version).toBe('1.4');
    expect(config.bulk.periodSeconds).toBe(3600);
  });

  it('treats an empty app version as none', async () => {
    vi.stubEnv('CARD_CACHE_APP_VERSION', '');
    const config = await loadConfig();
    expect(config.cache.version).toBeUndefined();
  });

  it('rejects an unknown store backend', async () => {
    vi.stubEnv('CARD_STORE', 'mongo');
    await expect(loadConfig()).rejects.toThrow('Unsupported CARD_STORE: mongo');
  });
});
