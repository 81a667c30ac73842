import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Transport } from '../contracts/transport';
import { MissingImagesError, TransportError, UnsupportedFormatError, errorMessage } from '../errors';
import { childLogger, type Logger } from '../logger';
import type { CardDocument } from '../types';

export const ART_CACHE_DIR = 'art_cache';
const PARTIAL_SUFFIX = '._part';

/** Everything upstream serves is a JPEG except the `png` format. */
export function imageExtension(format: string): 'png' | 'jpg' {
  return format === 'png' ? 'png' : 'jpg';
}

export function imagePathFor(cacheDir: string, cardId: string, format: string): string {
  return path.join(cacheDir, ART_CACHE_DIR, format, `${cardId}.${imageExtension(format)}`);
}

export function imageUriFor(card: CardDocument, format: string): string {
  const uris = card.image_uris;
  if (!uris) throw new MissingImagesError(card.id);
  const uri = uris[format];
  if (!uri) throw new UnsupportedFormatError(card.id, format);
  return uri;
}

export interface ImageStoreOptions {
  cacheDir: string;
  transport: Transport;
  logger?: Logger;
}

/** Downloads card art once into the cache directory and serves the path after that. */
export class ImageStore {
  private readonly cacheDir: string;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly pending = new Map<string, Promise<void>>();

  constructor(options: ImageStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.transport = options.transport;
    this.log = options.logger ?? childLogger('images');
  }

  async getImagePath(card: CardDocument, format: string): Promise<string> {
    const uri = imageUriFor(card, format);
    const target = imagePathFor(this.cacheDir, card.id, format);

    if (fs.existsSync(target)) return target;

    // one download per target; later callers wait on it
    let download = this.pending.get(target);
    if (!download) {
      download = this.download(uri, target).finally(() => this.pending.delete(target));
      this.pending.set(target, download);
    }
    await download;
    return target;
  }

  // Written beside the target and renamed, so an interrupted download never
  // leaves a truncated file at the final path.
  private async download(uri: string, target: string) {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const partial = `${target}.${process.pid}.${randomUUID()}${PARTIAL_SUFFIX}`;
    this.log.debug({ uri, partial }, 'Downloading image');
    try {
      const chunks = await this.transport.getStream(uri);
      await pipeline(Readable.from(chunks), fs.createWriteStream(partial));
      await fs.promises.rename(partial, target);
    } catch (err) {
      await fs.promises.rm(partial, { force: true });
      if (err instanceof TransportError) throw err;
      throw new TransportError(uri, errorMessage(err), { cause: err });
    }
    this.log.debug({ uri, target }, 'Stored image');
  }
}
