import path from 'path';
import type { StoreBackend } from '../config';
import type { CardStore } from '../contracts/cardStore';
import type { Logger } from '../logger';
import { createRedis } from '../redis/client';
import { RedisCardStore } from './redisCardStore';
import { SQLITE_FILENAME, SqliteCardStore } from './sqliteCardStore';

export interface OpenStoreOptions {
  backend: StoreBackend;
  cacheDir: string;
  /** Redis key prefix; ignored by SQLite, whose file already lives per application. */
  namespace: string;
  redisUrl?: string;
  logger?: Logger;
}

export async function openCardStore(options: OpenStoreOptions): Promise<CardStore> {
  switch (options.backend) {
    case 'sqlite':
      return SqliteCardStore.open(path.join(options.cacheDir, SQLITE_FILENAME), { logger: options.logger });
    case 'redis': {
      if (!options.redisUrl) throw new Error('redisUrl required for the redis store');
      return RedisCardStore.open(createRedis(options.redisUrl), {
        namespace: options.namespace,
        logger: options.logger,
        ownsClient: true,
      });
    }
  }
}
