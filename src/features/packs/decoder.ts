import type { z } from 'zod';
import { fail, ok, type Result } from '@/lib/result';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import { DecodeError } from './errors';
import {
  PackIndexSchema,
  PackSchema,
  ScaleEnvelopeSchema,
  type PackDocument,
  type PackIndex,
  type ScaleEnvelope,
} from './schema';

/** A document type this build can read, with the schema versions it understands. */
export interface DocumentKind<T> {
  name: string;
  supportedVersions: readonly number[];
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const SUPPORTED_SCHEMA_VERSION = 1;

export const IndexDocument: DocumentKind<PackIndex> = {
  name: 'index',
  supportedVersions: [SUPPORTED_SCHEMA_VERSION],
  schema: PackIndexSchema,
};

export const PackDocumentKind: DocumentKind<PackDocument> = {
  name: 'pack',
  supportedVersions: [SUPPORTED_SCHEMA_VERSION],
  schema: PackSchema,
};

export const ScaleDocument: DocumentKind<ScaleEnvelope> = {
  name: 'scale',
  supportedVersions: [SUPPORTED_SCHEMA_VERSION],
  schema: ScaleEnvelopeSchema,
};

const utf8 = new TextDecoder('utf-8');

export class SchemaDecoder {
  constructor(private readonly logger: PacksLogger = silentLogger) {}

  /**
   * Decode raw bytes into a typed document.
   *
   * The version gate runs before the structural check, so a document that
   * declares an unknown schemaVersion is a schema mismatch even if the rest of
   * it would not validate either. Anything that is not a JSON object is a
   * plain decode error.
   */
  decode<T>(bytes: Uint8Array, kind: DocumentKind<T>, label: string): Result<T, DecodeError> {
    let json: unknown;
    try {
      json = JSON.parse(utf8.decode(bytes));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return this.decodeFailure(kind, label, '', `invalid JSON (${reason})`);
    }

    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      return this.decodeFailure(kind, label, '', peekStructure(json));
    }

    const version: unknown = 'schemaVersion' in json ? json.schemaVersion : undefined;
    if (typeof version !== 'number' || !kind.supportedVersions.includes(version)) {
      safeLog(this.logger, 'warn', 'decode:schema-mismatch', { label, document: kind.name, schemaVersion: version ?? null, supported: kind.supportedVersions });
      return fail(DecodeError.schemaMismatch(label));
    }

    const parsed = kind.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue ? formatCodingPath(issue.path) : '';
      return this.decodeFailure(kind, label, path, peekStructure(json), issue?.message);
    }
    safeLog(this.logger, 'debug', 'decode:ok', { label, document: kind.name });
    return ok(parsed.data);
  }

  private decodeFailure<T>(kind: DocumentKind<T>, label: string, codingPath: string, peek: string, issue?: string): Result<T, DecodeError> {
    safeLog(this.logger, 'warn', 'decode:failed', { label, document: kind.name, codingPath: codingPath || '<root>', issue: issue ?? null, peek });
    return fail(DecodeError.decode(label, codingPath, peek));
  }
}

/** `scales[2].path` style rendering of a zod issue path. */
export function formatCodingPath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') out += `[${segment}]`;
    else out += out ? `.${segment}` : segment;
  }
  return out;
}

/**
 * Best-effort structural summary of a parsed payload for log lines: the sorted
 * top-level keys of an object, or the length of an array. Never throws and
 * never includes values.
 */
export function peekStructure(value: unknown): string {
  try {
    if (Array.isArray(value)) return `array(length=${value.length})`;
    if (value === null) return 'null';
    if (typeof value === 'object') {
      const keys = Object.keys(value).sort();
      return keys.length ? `keys: ${keys.join(', ')}` : 'empty object';
    }
    return typeof value;
  } catch {
    return 'unavailable';
  }
}
