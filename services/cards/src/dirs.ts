import fs from 'fs';
import os from 'os';
import path from 'path';

const PACKAGE_DIR = 'scryfall-card-cache';

export interface CacheDirectoryOptions {
  /** Application identity; each one gets its own store file. */
  application: string;
  version?: string;
  /** Explicit root, e.g. from CARD_CACHE_DIR. */
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homedir?: string;
}

function platformDataDir(env: NodeJS.ProcessEnv, platform: NodeJS.Platform, home: string): string {
  if (platform === 'win32') {
    return env.LOCALAPPDATA || path.join(home, 'AppData', 'Local');
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support');
  }
  return env.XDG_DATA_HOME || path.join(home, '.local', 'share');
}

/** Where the store file and downloaded art for one application live. */
export function cacheDirectoryFor(options: CacheDirectoryOptions): string {
  const env = options.env ?? process.env;
  const segments = [options.application];
  if (options.version) segments.push(options.version);

  if (options.baseDir) return path.join(options.baseDir, ...segments);

  const root = platformDataDir(env, options.platform ?? process.platform, options.homedir ?? os.homedir());
  return path.join(root, PACKAGE_DIR, ...segments);
}

export function resolveCacheDirectory(options: CacheDirectoryOptions): string {
  const dir = cacheDirectoryFor(options);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return dir;
}
