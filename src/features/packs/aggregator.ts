import { sha256Hex } from '@/lib/hash';
import { fail, ok, type Result } from '@/lib/result';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import { AssemblyError, DecodeError, UnexpectedPackError, isSchemaMismatch, type PacksError } from './errors';
import { PackDocumentKind, ScaleDocument, SchemaDecoder } from './decoder';
import { detectedPrimeLimit, type PrimeLimitFn } from './prime-limit';
import { parseAuthorURL, parsePackDate, sanitizeDescription, scaleTitle } from './presentation';
import type { PackSource } from './sources';
import type { AssembledRecord, AssembledScale, PackDocument, PackIndex, PackIndexEntry } from './types';

/** Everything known about one pack once it has been fully validated. */
export interface AssembledPack {
  entry: PackIndexEntry;
  record: AssembledRecord;
  packBytes: Uint8Array;
  /** Keyed by the scale's raw path, in the pack's own order. */
  scaleBytesByPath: ReadonlyMap<string, Uint8Array>;
}

export interface SkippedPack {
  packID: string;
  indexOrder: number;
  error: PacksError;
}

export interface AssemblyOutcome {
  records: AssembledRecord[];
  sawSchemaMismatch: boolean;
  skipped: SkippedPack[];
}

export interface AssembleOptions {
  /** Runs after each pack is assembled, before the next entry is read. */
  onPackAssembled?: (pack: AssembledPack) => void | Promise<void>;
}

export interface AggregatorDeps {
  decoder?: SchemaDecoder;
  primeLimit?: PrimeLimitFn;
  logger?: PacksLogger;
}

export class Aggregator {
  private readonly decoder: SchemaDecoder;
  private readonly primeLimit: PrimeLimitFn;
  private readonly logger: PacksLogger;

  constructor(deps: AggregatorDeps = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.decoder = deps.decoder ?? new SchemaDecoder(this.logger);
    this.primeLimit = deps.primeLimit ?? detectedPrimeLimit;
  }

  /**
   * Walk the manifest in order and assemble every pack whose document and
   * scales all decode. A failing entry is logged and skipped; it never stops
   * the walk, and a pack with any unreadable scale is dropped as a whole.
   */
  async assembleAll(manifest: PackIndex, source: PackSource, opts: AssembleOptions = {}): Promise<AssemblyOutcome> {
    const outcome: AssemblyOutcome = { records: [], sawSchemaMismatch: false, skipped: [] };
    for (const [indexOrder, entry] of manifest.packs.entries()) {
      let result: Result<AssembledPack, PacksError>;
      try {
        result = await this.assembleEntry(entry, indexOrder, source);
      } catch (err) {
        result = fail(new UnexpectedPackError(entry.packID, err));
      }
      if (!result.success) {
        if (isSchemaMismatch(result.error)) outcome.sawSchemaMismatch = true;
        outcome.skipped.push({ packID: entry.packID, indexOrder, error: result.error });
        safeLog(this.logger, 'warn', 'pack:skipped', { source: source.name, packID: entry.packID, indexOrder, kind: result.error.kind, message: result.error.message });
        continue;
      }
      outcome.records.push(result.data.record);
      safeLog(this.logger, 'debug', 'pack:assembled', { source: source.name, packID: result.data.record.packID, indexOrder, scales: result.data.record.scaleCount });
      await opts.onPackAssembled?.(result.data);
    }
    return outcome;
  }

  private async assembleEntry(entry: PackIndexEntry, indexOrder: number, source: PackSource): Promise<Result<AssembledPack, PacksError>> {
    const packBytes = await source.packBytes(entry);
    if (!packBytes.success) return packBytes;
    const pack = this.decoder.decode(packBytes.data, PackDocumentKind, `pack ${entry.packID}`);
    if (!pack.success) return pack;

    const scaleBytesByPath = new Map<string, Uint8Array>();
    const scales: AssembledScale[] = [];
    for (const ref of pack.data.scales) {
      const bytes = await source.scaleBytes(entry, ref);
      if (!bytes.success) return bytes;
      const envelope = this.decoder.decode(bytes.data, ScaleDocument, `scale ${entry.packID}/${ref.path}`);
      if (!envelope.success) return envelope;
      scaleBytesByPath.set(ref.path, bytes.data);
      scales.push({
        id: ref.id,
        title: scaleTitle(ref.title),
        payload: envelope.data.payload,
        primeLimit: this.primeLimit(envelope.data.payload.refs),
        size: envelope.data.payload.refs.length,
      });
    }

    const orderedScaleBytes = pack.data.scales.map((ref) => scaleBytesByPath.get(ref.path) ?? new Uint8Array());
    const record = buildRecord(entry, indexOrder, pack.data, scales, sha256Hex([packBytes.data, ...orderedScaleBytes]));
    return ok({ entry, record, packBytes: packBytes.data, scaleBytesByPath });
  }
}

export function buildRecord(
  entry: PackIndexEntry,
  indexOrder: number,
  pack: PackDocument,
  scales: AssembledScale[],
  contentHash: string,
): AssembledRecord {
  const limits = scales.map((s) => s.primeLimit);
  const record: AssembledRecord = {
    id: entry.packID,
    packID: pack.packID === '' ? entry.packID : pack.packID,
    title: pack.title,
    authorName: pack.author.name,
    license: pack.license,
    dateString: pack.date,
    description: sanitizeDescription(pack.description),
    version: pack.version,
    scaleCount: scales.length,
    primeLimitMin: limits.length ? Math.min(...limits) : 0,
    primeLimitMax: limits.length ? Math.max(...limits) : 0,
    scales,
    indexOrder,
    contentHash,
  };
  const authorURL = parseAuthorURL(pack.author.url);
  if (authorURL) record.authorURL = authorURL;
  const parsedDate = parsePackDate(pack.date);
  if (parsedDate) record.parsedDate = parsedDate;
  return record;
}

/**
 * Turn a walk into the refresh outcome: any record at all is success, an
 * empty walk is a schema mismatch if one was seen, otherwise "nothing loaded".
 */
export function finishAssembly(outcome: AssemblyOutcome): Result<AssembledRecord[], DecodeError | AssemblyError> {
  if (outcome.records.length > 0) return ok(outcome.records);
  return fail(outcome.sawSchemaMismatch ? DecodeError.schemaMismatch('catalog') : new AssemblyError());
}
