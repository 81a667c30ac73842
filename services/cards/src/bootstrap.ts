import { CardCache } from './cache/cardCache';
import { config } from './config';
import { resolveCacheDirectory } from './dirs';
import { PacedTransport } from './http/pacedTransport';
import { childLogger, logger } from './logger';
import { openCardStore } from './storage';

/** Wires a `CardCache` from environment configuration. */
export async function createCardCacheFromConfig(): Promise<CardCache> {
  const cacheDir = resolveCacheDirectory({
    application: config.cache.application,
    version: config.cache.version,
    baseDir: config.cache.dir || undefined,
  });
  logger.debug({ cacheDir }, 'Card cache directory');

  const store = await openCardStore({
    backend: config.store.backend,
    cacheDir,
    namespace: config.cache.application,
    redisUrl: config.store.redisUrl,
    logger: childLogger('store'),
  });

  try {
    return await CardCache.open({
      store,
      transport: new PacedTransport({ minIntervalMs: config.api.minIntervalMs }),
      cacheDir,
      apiBaseUrl: config.api.baseUrl,
      refreshPeriodSeconds: config.bulk.periodSeconds,
      bulkDataType: config.bulk.type,
      responseTtlSeconds: config.cache.responseTtlSeconds,
    });
  } catch (err) {
    await store.close();
    throw err;
  }
}
