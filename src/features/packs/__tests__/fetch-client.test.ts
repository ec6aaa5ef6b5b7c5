import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_TIMEOUT_MS } from '@/config';
import { createMemoryLogger } from '@/lib/log';
import { PackFetchClient, looksLikeJSON, previewBytes } from '@/features/packs/fetch-client';
import { FakeNetwork, bytesOf } from '../../../../tests/helpers/catalog';

const URL_OK = 'https://primary.test/catalog/INDEX.json';

function setup(timeoutMs = 1_000) {
  const net = new FakeNetwork();
  const logger = createMemoryLogger();
  const client = new PackFetchClient({ fetch: net.fetch, timeoutMs, logger });
  return { net, logger, client };
}

describe('PackFetchClient', () => {
  it('returns the body bytes of a JSON response', async () => {
    const { net, client, logger } = setup();
    net.json(URL_OK, { schemaVersion: 1, packs: [] });
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success).toBe(true);
    if (res.success) expect(new TextDecoder().decode(res.data)).toBe('{"schemaVersion":1,"packs":[]}');
    expect(logger.events('debug')).toEqual(['fetch:ok']);
    expect(logger.entries[0]?.data).toMatchObject({
      label: 'manifest',
      status: 200,
      contentType: 'application/json',
      bytes: 30,
      preview: '{"schemaVersion":1,"packs":[]}',
    });
  });

  it('sends a cache-bypassing GET', async () => {
    const { net } = setup();
    net.json(URL_OK, {});
    const spy = vi.fn(net.fetch);
    const client = new PackFetchClient({ fetch: spy });
    await client.fetch(URL_OK, 'manifest');
    const init = spy.mock.calls[0]?.[1];
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ accept: 'application/json', 'cache-control': 'no-cache', pragma: 'no-cache' });
  });

  it('rejects URLs ending in a slash without a request', async () => {
    const { net, client, logger } = setup();
    const res = await client.fetch('https://primary.test/catalog/', 'manifest');
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.kind).toBe('invalidURL');
      expect(res.error.message).toBe('Unable to load manifest: invalid URL https://primary.test/catalog/.');
    }
    expect(net.calls).toEqual([]);
    expect(logger.events('warn')).toEqual(['fetch:invalid-url']);
  });

  it('rejects relative URLs', async () => {
    const { net, client } = setup();
    const res = await client.fetch('packs/foo/pack.json', 'pack foo');
    expect(res.success ? undefined : res.error.kind).toBe('invalidURL');
    expect(net.calls).toEqual([]);
  });

  it('maps a non-2xx status to httpStatus', async () => {
    const { client, logger } = setup();
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.kind).toBe('httpStatus');
      expect(res.error.status).toBe(404);
      expect(res.error.message).toBe('Unable to load manifest (HTTP 404).');
    }
    expect(logger.entries[0]).toMatchObject({ level: 'warn', event: 'fetch:http-status', data: { status: 404, preview: 'not found' } });
  });

  it('refuses a 200 whose body is not JSON', async () => {
    const { net, client, logger } = setup();
    net.text(URL_OK, '<!doctype html><p>portal</p>', 200, 'text/html');
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success ? undefined : res.error.kind).toBe('notJSON');
    expect(logger.events('warn')).toEqual(['fetch:not-json']);
  });

  it('maps a thrown transport error to network', async () => {
    const { net, client } = setup();
    net.drop(URL_OK, 'getaddrinfo ENOTFOUND primary.test');
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.kind).toBe('network');
      expect(res.error.message).toBe('Unable to load manifest: getaddrinfo ENOTFOUND primary.test.');
    }
  });

  it('times out a request that never answers', async () => {
    const { net, client, logger } = setup(10);
    net.hang(URL_OK);
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.kind).toBe('timeout');
      expect(res.error.message).toBe('Unable to load manifest: request timed out.');
    }
    expect(logger.events('warn')).toEqual(['fetch:timeout']);
  });

  it('falls back to the configured default timeout', async () => {
    vi.useFakeTimers();
    const net = new FakeNetwork();
    net.hang(URL_OK);
    const client = new PackFetchClient({ fetch: net.fetch });
    let settled = false;
    const pending = client.fetch(URL_OK, 'manifest').then((res) => {
      settled = true;
      return res;
    });
    await vi.advanceTimersByTimeAsync(DEFAULT_TIMEOUT_MS - 1);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    const res = await pending;
    expect(res.success ? undefined : res.error.kind).toBe('timeout');
  });

  it('fails fast once the caller signal is aborted', async () => {
    const { net, client } = setup();
    net.json(URL_OK, {});
    const ac = new AbortController();
    ac.abort();
    const res = await client.fetch(URL_OK, 'manifest', ac.signal);
    expect(res.success ? undefined : res.error.kind).toBe('timeout');
    expect(net.calls).toEqual([]);
  });

  it('aborts an in-flight request when the caller signal fires', async () => {
    const { net, client } = setup(60_000);
    net.hang(URL_OK);
    const ac = new AbortController();
    const pending = client.fetch(URL_OK, 'manifest', ac.signal);
    ac.abort();
    const res = await pending;
    expect(res.success ? undefined : res.error.kind).toBe('timeout');
  });

  it('keeps going when the logger throws', async () => {
    const net = new FakeNetwork().json(URL_OK, []);
    const throwing = {
      debug() { throw new Error('log sink down'); },
      info() { throw new Error('log sink down'); },
      warn() { throw new Error('log sink down'); },
    };
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const client = new PackFetchClient({ fetch: net.fetch, logger: throwing });
    const res = await client.fetch(URL_OK, 'manifest');
    expect(res.success).toBe(true);
  });
});

describe('looksLikeJSON', () => {
  it('accepts objects and arrays after whitespace or a BOM', () => {
    expect(looksLikeJSON(bytesOf(' \n\t{"a":1}'))).toBe(true);
    expect(looksLikeJSON(bytesOf('[1]'))).toBe(true);
    expect(looksLikeJSON(new Uint8Array([0xef, 0xbb, 0xbf, 0x7b, 0x7d]))).toBe(true);
  });

  it('rejects scalars, markup and empty bodies', () => {
    expect(looksLikeJSON(bytesOf('"text"'))).toBe(false);
    expect(looksLikeJSON(bytesOf('<html>'))).toBe(false);
    expect(looksLikeJSON(bytesOf('   '))).toBe(false);
    expect(looksLikeJSON(new Uint8Array())).toBe(false);
  });
});

describe('previewBytes', () => {
  it('flattens control characters and whitespace runs', () => {
    expect(previewBytes(bytesOf('{"a":\n\n  1}'))).toBe('{"a": 1}');
  });

  it('marks truncation', () => {
    expect(previewBytes(bytesOf('abcdefgh'), 4)).toBe('abcd…');
  });
});
