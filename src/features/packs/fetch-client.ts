import { DEFAULT_TIMEOUT_MS } from '@/config';
import { getHttpFetch, type FetchLike } from '@/lib/http';
import { fail, ok, type Result } from '@/lib/result';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import { FetchError } from './errors';

const PREVIEW_BYTES = 96;

export interface FetchClientOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: PacksLogger;
}

/**
 * Single GET with a bounded timeout. Transport success alone is not enough:
 * the body has to look like JSON, which keeps captive portals and HTML error
 * pages from passing as documents.
 */
export class PackFetchClient {
  private readonly fetchImpl: FetchLike | undefined;
  private readonly timeoutMs: number;
  private readonly logger: PacksLogger;

  constructor(opts: FetchClientOptions = {}) {
    this.fetchImpl = opts.fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = opts.logger ?? silentLogger;
  }

  async fetch(url: string, label: string, signal?: AbortSignal): Promise<Result<Uint8Array, FetchError>> {
    if (url.endsWith('/') || !isAbsoluteURL(url)) {
      return this.failure(FetchError.invalidURL(url, label), label);
    }
    if (signal?.aborted) {
      return this.failure(FetchError.timeout(url, label), label);
    }

    const ac = new AbortController();
    const onOuterAbort = () => ac.abort();
    signal?.addEventListener('abort', onOuterAbort, { once: true });
    const t = setTimeout(() => ac.abort(), this.timeoutMs);
    try {
      const f = this.fetchImpl ?? getHttpFetch();
      const res = await f(url, {
        method: 'GET',
        headers: { accept: 'application/json', 'cache-control': 'no-cache', pragma: 'no-cache' },
        signal: ac.signal,
      });
      const bytes = new Uint8Array(await res.arrayBuffer());
      const line = {
        label,
        url,
        status: res.status,
        contentType: res.headers.get('content-type'),
        bytes: bytes.byteLength,
        preview: previewBytes(bytes),
      };
      if (res.status < 200 || res.status > 299) {
        safeLog(this.logger, 'warn', 'fetch:http-status', line);
        return fail(FetchError.httpStatus(res.status, url, label));
      }
      if (!looksLikeJSON(bytes)) {
        safeLog(this.logger, 'warn', 'fetch:not-json', line);
        return fail(FetchError.notJSON(url, label));
      }
      safeLog(this.logger, 'debug', 'fetch:ok', line);
      return ok(bytes);
    } catch (err) {
      const error = ac.signal.aborted ? FetchError.timeout(url, label) : FetchError.network(url, label, err);
      return this.failure(error, label);
    } finally {
      clearTimeout(t);
      signal?.removeEventListener('abort', onOuterAbort);
    }
  }

  private failure(error: FetchError, label: string): Result<never, FetchError> {
    safeLog(this.logger, 'warn', `fetch:${kebab(error.kind)}`, { label, url: error.url, message: error.message });
    return fail(error);
  }
}

/** True when the first non-whitespace byte (after an optional UTF-8 BOM) opens an object or array. */
export function looksLikeJSON(bytes: Uint8Array): boolean {
  let i = bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf ? 3 : 0;
  for (; i < bytes.length; i++) {
    const b = bytes[i];
    if (b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d) continue;
    return b === 0x7b || b === 0x5b;
  }
  return false;
}

const previewDecoder = new TextDecoder('utf-8');

export function previewBytes(bytes: Uint8Array, max = PREVIEW_BYTES): string {
  const text = previewDecoder.decode(bytes.subarray(0, max));
  // eslint-disable-next-line no-control-regex
  const printable = text.replace(/[\u0000-\u001f\u007f\ufffd]/g, ' ').replace(/\s+/g, ' ').trim();
  return bytes.byteLength > max ? `${printable}…` : printable;
}

function isAbsoluteURL(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

function kebab(kind: string): string {
  return kind.replace(/[A-Z]+/g, (m) => `-${m.toLowerCase()}`);
}
