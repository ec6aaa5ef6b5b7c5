export { loadPacksConfig, defaultPacksConfig, ConfigError, type PacksConfig } from './config';
export { createConsoleLogger, createMemoryLogger, silentLogger, type PacksLogger, type LogEntry } from './lib/log';
export type { Result } from './lib/result';
export * from './features/packs/errors';
export type * from './features/packs/types';
export { joinURL, resolveEndpoint, packDocumentPath, scaleDocumentPath, type PackEndpoints } from './features/packs/endpoints';
export { PackFetchClient, type FetchClientOptions } from './features/packs/fetch-client';
export { DualSourceFetcher } from './features/packs/fetcher';
export { SchemaDecoder, IndexDocument, PackDocumentKind, ScaleDocument, SUPPORTED_SCHEMA_VERSION } from './features/packs/decoder';
export { detectedPrimeLimit, type PrimeLimitFn } from './features/packs/prime-limit';
export { FileBlobStore, MemoryBlobStore, type BlobStore } from './features/packs/blob-store';
export { CacheStore, safePathComponent } from './features/packs/cache';
export { Aggregator, finishAssembly } from './features/packs/aggregator';
export { InstallRegistry, installRecordFor, type InstallRecord } from './features/packs/install-registry';
export { ErrorReporter, ErrorCategory, ErrorSeverity, globalErrorReporter } from './utils/error-reporter';
export { createPacksStore, createDefaultPacksStore, createDefaultPacksServices } from './stores';
export type { PacksStore, PacksStoreDeps, PacksStoreState } from './stores';
