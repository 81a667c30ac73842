export { CardCache, type CardCacheOptions, type CacheStats } from './cache/cardCache';
export type { RefreshResult } from './cache/bulkRefresh';
export { Card } from './card';
export { createCardCacheFromConfig } from './bootstrap';
export { resolveCacheDirectory, cacheDirectoryFor } from './dirs';
export { PacedTransport, type PacedTransportOptions } from './http/pacedTransport';
export type { Transport, TransportResponse } from './contracts/transport';
export type { CardStore } from './contracts/cardStore';
export { SqliteCardStore } from './storage/sqliteCardStore';
export { RedisCardStore } from './storage/redisCardStore';
export { openCardStore } from './storage';
export * from './errors';
export type * from './types';
