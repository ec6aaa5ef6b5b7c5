import { fail, ok, type Result } from '@/lib/result';
import { CacheError, type PacksError } from './errors';
import { packDocumentPath, scaleDocumentPath } from './endpoints';
import { cachedScaleBytes, findCachedPack } from './cache';
import type { DualSourceFetcher } from './fetcher';
import type { CachedCatalog, PackIndexEntry, PackScaleRef } from './types';

/** Where the Aggregator reads pack and scale bytes from. */
export interface PackSource {
  readonly name: 'remote' | 'cache';
  packBytes(entry: PackIndexEntry): Promise<Result<Uint8Array, PacksError>>;
  scaleBytes(entry: PackIndexEntry, scale: PackScaleRef): Promise<Result<Uint8Array, PacksError>>;
}

export function remoteSource(fetcher: DualSourceFetcher, signal?: AbortSignal): PackSource {
  return {
    name: 'remote',
    packBytes: (entry) => fetcher.fetchWithFallback(packDocumentPath(entry), `pack ${entry.packID}`, signal),
    scaleBytes: (entry, scale) => fetcher.fetchWithFallback(scaleDocumentPath(entry, scale), `scale ${entry.packID}/${scale.path}`, signal),
  };
}

export function cacheSource(catalog: CachedCatalog): PackSource {
  return {
    name: 'cache',
    async packBytes(entry) {
      const cached = findCachedPack(catalog, entry.packID);
      return cached ? ok(cached.packBytes) : fail(new CacheError(`pack ${entry.packID} is not cached`));
    },
    async scaleBytes(entry, scale) {
      const cached = findCachedPack(catalog, entry.packID);
      const bytes = cached && cachedScaleBytes(cached, scale.path);
      return bytes ? ok(bytes) : fail(new CacheError(`scale ${entry.packID}/${scale.path} is not cached`));
    },
  };
}
