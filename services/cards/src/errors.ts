export type CardCacheErrorCode =
  | 'invalid_query'
  | 'transport_failure'
  | 'manifest_entry_not_found'
  | 'missing_images'
  | 'unsupported_format';

/** Base class for every failure the cache reports to its callers. */
export class CardCacheError extends Error {
  readonly code: CardCacheErrorCode;

  constructor(code: CardCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidQueryError extends CardCacheError {
  constructor(message = 'exactly one of id, name or mtgoId is required') {
    super('invalid_query', message);
  }
}

export class TransportError extends CardCacheError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, detail: string, options?: { status?: number; cause?: unknown }) {
    super('transport_failure', `request to ${url} failed: ${detail}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class ManifestEntryNotFoundError extends CardCacheError {
  readonly bulkType: string;

  constructor(bulkType: string) {
    super('manifest_entry_not_found', `bulk data manifest has no entry of type ${bulkType}`);
    this.bulkType = bulkType;
  }
}

export class MissingImagesError extends CardCacheError {
  constructor(cardId: string) {
    super('missing_images', `card ${cardId} has no image uris`);
  }
}

export class UnsupportedFormatError extends CardCacheError {
  readonly format: string;

  constructor(cardId: string, format: string) {
    super('unsupported_format', `card ${cardId} has no image in format ${format}`);
    this.format = format;
  }
}

export function isCardCacheError(err: unknown): err is CardCacheError {
  return err instanceof CardCacheError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
