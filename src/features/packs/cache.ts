import { z } from 'zod';
import { fail, ok, type Result } from '@/lib/result';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import { CacheError } from './errors';
import type { BlobStore } from './blob-store';
import type { CachedCatalog, CachedPack } from './types';

export const CACHE_BLOB_KEY = 'catalog-cache.json';
const CACHE_FORMAT_VERSION = 1;

const CacheBlobSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  savedAt: z.string().optional(),
  manifest: z.string(),
  packs: z.array(z.object({
    packID: z.string(),
    pack: z.string(),
    scales: z.record(z.string(), z.string()),
  })),
});

type CacheBlob = z.infer<typeof CacheBlobSchema>;

const SAFE_CHAR = /^[\p{L}\p{M}\p{N}_-]$/u;

/** Replaces every code point outside letters, digits, `-` and `_` with `_`. */
export function safePathComponent(raw: string): string {
  let out = '';
  for (const ch of raw) out += SAFE_CHAR.test(ch) ? ch : '_';
  return out;
}

/**
 * Keys scale bytes by their sanitized path. Returns undefined when two scale
 * paths of the pack sanitize to the same key, since a lookup could not tell
 * them apart.
 */
export function toCachedPack(packID: string, packBytes: Uint8Array, scaleBytesByPath: ReadonlyMap<string, Uint8Array>): CachedPack | undefined {
  const byKey = new Map<string, Uint8Array>();
  for (const [scalePath, bytes] of scaleBytesByPath) {
    const key = safePathComponent(scalePath);
    if (byKey.has(key)) return undefined;
    byKey.set(key, bytes);
  }
  return { packID, packBytes, scaleBytesByKey: Object.fromEntries(byKey) };
}

// Lookups accept both the sanitized and the raw key so caches written under
// either convention stay readable. An exact id always wins over a sanitized one.
export function findCachedPack(catalog: CachedCatalog, packID: string): CachedPack | undefined {
  const exact = catalog.packs.find((p) => p.packID === packID);
  if (exact) return exact;
  const safe = safePathComponent(packID);
  return catalog.packs.find((p) => p.packID === safe);
}

export function cachedScaleBytes(pack: CachedPack, scalePath: string): Uint8Array | undefined {
  return pack.scaleBytesByKey[safePathComponent(scalePath)] ?? pack.scaleBytesByKey[scalePath];
}

/**
 * Last-known-good catalog bytes, stored as a single blob that every save
 * overwrites in full. Nothing here ever deletes the cache.
 */
export class CacheStore {
  constructor(
    private readonly blobs: BlobStore,
    private readonly logger: PacksLogger = silentLogger,
    private readonly key: string = CACHE_BLOB_KEY,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Throws on storage failure; callers treat caching as best-effort. */
  async save(manifestBytes: Uint8Array, packs: readonly CachedPack[]): Promise<void> {
    const blob: CacheBlob = {
      version: CACHE_FORMAT_VERSION,
      savedAt: this.now().toISOString(),
      manifest: toBase64(manifestBytes),
      packs: packs.map((p) => ({
        packID: p.packID,
        pack: toBase64(p.packBytes),
        scales: Object.fromEntries(Object.entries(p.scaleBytesByKey).map(([k, v]) => [k, toBase64(v)])),
      })),
    };
    await this.blobs.write(this.key, new TextEncoder().encode(JSON.stringify(blob)));
    safeLog(this.logger, 'debug', 'cache:saved', { packs: packs.length });
  }

  async load(): Promise<Result<CachedCatalog, CacheError>> {
    let raw: Uint8Array | undefined;
    try {
      raw = await this.blobs.read(this.key);
    } catch (err) {
      return this.unavailable('cache could not be read', err);
    }
    if (!raw) return this.unavailable('no cache has been written');

    let json: unknown;
    try {
      json = JSON.parse(new TextDecoder().decode(raw));
    } catch (err) {
      return this.unavailable('cache blob is not valid JSON', err);
    }
    const parsed = CacheBlobSchema.safeParse(json);
    if (!parsed.success) return this.unavailable('cache blob has an unexpected shape');
    if (parsed.data.packs.length === 0) return this.unavailable('cache holds no packs');

    const catalog: CachedCatalog = {
      manifestBytes: fromBase64(parsed.data.manifest),
      packs: parsed.data.packs.map((p) => ({
        packID: p.packID,
        packBytes: fromBase64(p.pack),
        scaleBytesByKey: Object.fromEntries(Object.entries(p.scales).map(([k, v]) => [k, fromBase64(v)])),
      })),
    };
    safeLog(this.logger, 'debug', 'cache:loaded', { packs: catalog.packs.length, savedAt: parsed.data.savedAt ?? null });
    return ok(catalog);
  }

  private unavailable(reason: string, cause?: unknown): Result<never, CacheError> {
    safeLog(this.logger, 'info', 'cache:unavailable', { reason });
    return fail(new CacheError(reason, cause === undefined ? undefined : { cause }));
  }
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function fromBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}
