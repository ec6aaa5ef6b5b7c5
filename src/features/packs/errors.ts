export type FetchErrorKind = 'invalidURL' | 'httpStatus' | 'notJSON' | 'network' | 'timeout';
export type DecodeErrorKind = 'decode' | 'schemaMismatch';
export type PacksErrorKind = FetchErrorKind | DecodeErrorKind | 'cacheUnavailable' | 'empty' | 'unexpected';

export const SCHEMA_MISMATCH_MESSAGE = 'This pack format is newer than your app.';
export const CACHE_UNAVAILABLE_MESSAGE = 'No cached scale packs are available.';
export const EMPTY_CATALOG_MESSAGE = 'No scale packs could be loaded.';

/** Base class of every error the sync engine surfaces; `kind` drives recovery. */
export abstract class PacksError extends Error {
  abstract readonly kind: PacksErrorKind;
}

export class FetchError extends PacksError {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }

  static invalidURL(url: string, label: string): FetchError {
    return new FetchError('invalidURL', `Unable to load ${label}: invalid URL ${url}.`, url);
  }

  static httpStatus(status: number, url: string, label: string): FetchError {
    return new FetchError('httpStatus', `Unable to load ${label} (HTTP ${status}).`, url, status);
  }

  static notJSON(url: string, label: string): FetchError {
    return new FetchError('notJSON', `Unable to load ${label}: response was not JSON.`, url);
  }

  static network(url: string, label: string, cause: unknown): FetchError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new FetchError('network', `Unable to load ${label}: ${reason}.`, url, undefined, { cause });
  }

  static timeout(url: string, label: string): FetchError {
    return new FetchError('timeout', `Unable to load ${label}: request timed out.`, url);
  }
}

export class DecodeError extends PacksError {
  private constructor(
    readonly kind: DecodeErrorKind,
    message: string,
    readonly label: string,
    readonly codingPath?: string,
    readonly peek?: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }

  static decode(label: string, codingPath: string, peek: string): DecodeError {
    return new DecodeError('decode', `Unable to read ${label}.`, label, codingPath, peek);
  }

  static schemaMismatch(label: string): DecodeError {
    return new DecodeError('schemaMismatch', SCHEMA_MISMATCH_MESSAGE, label);
  }
}

export class CacheError extends PacksError {
  readonly kind = 'cacheUnavailable';

  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super(CACHE_UNAVAILABLE_MESSAGE, options);
    this.name = 'CacheError';
  }
}

export class AssemblyError extends PacksError {
  readonly kind = 'empty';

  constructor() {
    super(EMPTY_CATALOG_MESSAGE);
    this.name = 'AssemblyError';
  }
}

/** A pack whose assembly threw instead of returning a result. */
export class UnexpectedPackError extends PacksError {
  readonly kind = 'unexpected';

  constructor(readonly packID: string, cause: unknown) {
    super(`Pack ${packID} could not be assembled: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'UnexpectedPackError';
  }
}

export function isSchemaMismatch(error: unknown): error is DecodeError {
  return error instanceof DecodeError && error.kind === 'schemaMismatch';
}
