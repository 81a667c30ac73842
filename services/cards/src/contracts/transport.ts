export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Outbound HTTP used by the cache. Pacing (and any retry policy) belongs to
 * the implementation; callers only interpret status and body.
 */
export interface Transport {
  get(url: string): Promise<TransportResponse>;
  /** Streams a 2xx body; rejects with `TransportError` otherwise. */
  getStream(url: string): Promise<AsyncIterable<Uint8Array>>;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
