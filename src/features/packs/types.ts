import type { ScalePayload } from './schema';

export type { PackIndex, PackIndexEntry, PackDocument, PackScaleRef, RatioRef, ScalePayload, ScaleEnvelope } from './schema';

export interface AssembledScale {
  id: string;
  title: string;
  payload: ScalePayload;
  primeLimit: number;
  size: number;
}

/** One pack as the presentation layer consumes it. */
export interface AssembledRecord {
  /** Manifest entry id. */
  id: string;
  /** The pack document's own id, or the manifest id when the document leaves it empty. */
  packID: string;
  title: string;
  authorName: string;
  authorURL?: string;
  license: string;
  dateString: string;
  parsedDate?: Date;
  description: string;
  version: string;
  scaleCount: number;
  primeLimitMin: number;
  primeLimitMax: number;
  scales: AssembledScale[];
  /** Position in the manifest of the refresh that produced this record. */
  indexOrder: number;
  contentHash: string;
}

/** Raw bytes of one fully validated pack, the unit of write-through caching. */
export interface CachedPack {
  packID: string;
  packBytes: Uint8Array;
  /** Keyed by sanitized scale path. */
  scaleBytesByKey: Record<string, Uint8Array>;
}

export interface CachedCatalog {
  manifestBytes: Uint8Array;
  packs: CachedPack[];
}

export type LoadState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'loaded' }
  | { status: 'failed'; message: string }
  | { status: 'schemaMismatch' };

export type LoadStatus = LoadState['status'];
