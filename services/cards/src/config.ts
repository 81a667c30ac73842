import 'dotenv/config';

export const ONE_DAY = 24 * 60 * 60;
export const TWELVE_WEEKS = 12 * 7 * ONE_DAY;

const DEFAULT_API_URL = 'https://api.scryfall.com';
const DEFAULT_BULK_DATA_TYPE = 'default_cards';

export type StoreBackend = 'sqlite' | 'redis';

function parseStoreBackend(raw: string | undefined): StoreBackend {
  if (!raw || raw === 'sqlite') return 'sqlite';
  if (raw === 'redis') return 'redis';
  throw new Error(`Unsupported CARD_STORE: ${raw}`);
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  cache: {
    application: process.env.CARD_CACHE_APP || 'default',
    version: process.env.CARD_CACHE_APP_VERSION || undefined,
    // empty means "resolve from the platform data dir"
    dir: process.env.CARD_CACHE_DIR || '',
    responseTtlSeconds: ONE_DAY,
  },
  store: {
    backend: parseStoreBackend(process.env.CARD_STORE),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  },
  api: {
    baseUrl: process.env.SCRYFALL_API_URL || DEFAULT_API_URL,
    // Scryfall asks for no more than 10 requests per second
    minIntervalMs: parseInt(process.env.SCRYFALL_MIN_INTERVAL_MS || '100', 10),
  },
  bulk: {
    periodSeconds: parseInt(process.env.BULK_REFRESH_PERIOD_S || String(TWELVE_WEEKS), 10),
    type: process.env.BULK_DATA_TYPE || DEFAULT_BULK_DATA_TYPE,
  },
};

export const defaults = {
  apiBaseUrl: DEFAULT_API_URL,
  bulkDataType: DEFAULT_BULK_DATA_TYPE,
  refreshPeriodSeconds: TWELVE_WEEKS,
  responseTtlSeconds: ONE_DAY,
};
