import { ReadableStream } from 'stream/web';
import { describe, expect, it } from 'vitest';
import { PacedTransport } from '../src/http/pacedTransport';
import { TransportError } from '../src/errors';
import { silentLogger } from './helpers/fakes';

type FetchImpl = typeof fetch;

function fakeTimers() {
  let now = 1_000;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
    sleeps,
  };
}

function jsonResponse(payload: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

describe('PacedTransport', () => {
  it('spaces consecutive requests by the minimum interval', async () => {
    const timers = fakeTimers();
    const urls: string[] = [];
    const mockFetch: FetchImpl = async (input) => {
      urls.push(String(input));
      return jsonResponse({ ok: true });
    };
    const transport = new PacedTransport({ minIntervalMs: 100, fetch: mockFetch, logger: silentLogger, ...timers });

    await transport.get('http://api.test/a');
    timers.advance(30);
    await transport.get('http://api.test/b');
    await transport.get('http://api.test/c');

    expect(urls).toEqual(['http://api.test/a', 'http://api.test/b', 'http://api.test/c']);
    expect(timers.sleeps).toEqual([70, 100]);
  });

  it('shares one budget between parallel lookups and downloads', async () => {
    const timers = fakeTimers();
    const starts: number[] = [];
    const mockFetch: FetchImpl = async (input) => {
      starts.push(timers.now());
      return String(input).includes('img') ? new Response('bytes') : jsonResponse({ ok: true });
    };
    const transport = new PacedTransport({ minIntervalMs: 100, fetch: mockFetch, logger: silentLogger, ...timers });

    await Promise.all([
      transport.get('http://api.test/a'),
      transport.getStream('http://img.test/b'),
      transport.get('http://api.test/c'),
      transport.getStream('http://img.test/d'),
    ]);

    expect(starts).toHaveLength(4);
    const sorted = [...starts].sort((a, b) => a - b);
    for (let i = 1; i < sorted.length; i += 1) {
      expect((sorted[i] ?? 0) - (sorted[i - 1] ?? 0)).toBeGreaterThanOrEqual(100);
    }
    expect(timers.sleeps).toEqual([100, 100, 100]);
  });

  it('returns status and body for non-2xx answers', async () => {
    const mockFetch: FetchImpl = async () => jsonResponse({ object: 'error' }, 404);
    const transport = new PacedTransport({ minIntervalMs: 0, fetch: mockFetch, logger: silentLogger });

    expect(await transport.get('http://api.test/x')).toEqual({ status: 404, body: '{"object":"error"}' });
  });

  it('waits out a 429 once using Retry-After', async () => {
    const timers = fakeTimers();
    let calls = 0;
    const mockFetch: FetchImpl = async () => {
      calls += 1;
      return calls === 1 ? jsonResponse({}, 429, { 'retry-after': '2' }) : jsonResponse({ id: 'x' });
    };
    const transport = new PacedTransport({ minIntervalMs: 0, fetch: mockFetch, logger: silentLogger, ...timers });

    const res = await transport.get('http://api.test/x');
    expect(res.status).toBe(200);
    expect(calls).toBe(2);
    expect(timers.sleeps).toEqual([2000]);
  });

  it('wraps network errors in TransportError', async () => {
    const mockFetch: FetchImpl = async () => {
      throw new Error('ECONNREFUSED');
    };
    const transport = new PacedTransport({ minIntervalMs: 0, fetch: mockFetch, logger: silentLogger });

    const err = await transport.get('http://api.test/x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ url: 'http://api.test/x', message: 'request to http://api.test/x failed: ECONNREFUSED' });
  });

  it('streams a successful body and rejects a failed one', async () => {
    const mockFetch: FetchImpl = async (input) =>
      String(input).endsWith('ok') ? new Response('abc', { status: 200 }) : new Response('gone', { status: 410 });
    const transport = new PacedTransport({ minIntervalMs: 0, fetch: mockFetch, logger: silentLogger });

    const chunks: Buffer[] = [];
    for await (const chunk of await transport.getStream('http://img.test/ok')) chunks.push(Buffer.from(chunk));
    expect(Buffer.concat(chunks).toString('utf8')).toBe('abc');

    await expect(transport.getStream('http://img.test/bad')).rejects.toMatchObject({ status: 410 });
  });

  it('cancels the body when the consumer stops reading', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('first'));
        controller.enqueue(new TextEncoder().encode('second'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const mockFetch: FetchImpl = async () => new Response(body, { status: 200 });
    const transport = new PacedTransport({ minIntervalMs: 0, fetch: mockFetch, logger: silentLogger });

    let read = 0;
    for await (const chunk of await transport.getStream('http://img.test/big')) {
      read += chunk.length;
      break;
    }
    expect(read).toBe(5);
    expect(cancelled).toBe(true);
  });
});
