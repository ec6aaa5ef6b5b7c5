import { createStore, type StoreApi } from "zustand/vanilla";

import { DEFAULT_MIN_REFRESH_INTERVAL_MS, DEFAULT_REFRESH_BUDGET_MS } from "@/config";
import { fail, type Result } from "@/lib/result";
import { safeLog, silentLogger, type PacksLogger } from "@/lib/log";
import { Aggregator, finishAssembly, type AssembledPack, type SkippedPack } from "@/features/packs/aggregator";
import { toCachedPack, type CacheStore } from "@/features/packs/cache";
import { IndexDocument, SchemaDecoder } from "@/features/packs/decoder";
import { isSchemaMismatch, type PacksError } from "@/features/packs/errors";
import type { DualSourceFetcher } from "@/features/packs/fetcher";
import { cacheSource, remoteSource } from "@/features/packs/sources";
import type { AssembledRecord, CachedPack, LoadState } from "@/features/packs/types";
import { ErrorSeverity, globalErrorReporter, type ErrorReporter } from "@/utils/error-reporter";

export type PacksStoreDeps = {
  fetcher: DualSourceFetcher;
  cache: CacheStore;
  decoder?: SchemaDecoder;
  aggregator?: Aggregator;
  logger?: PacksLogger;
  reporter?: ErrorReporter;
  now?: () => number;
  /** Overall time allowed for one refresh, manifest and every pack included. */
  refreshBudgetMs?: number;
  /** A non-forced refresh this soon after a remote success does nothing. */
  minRefreshIntervalMs?: number;
};

export type PacksStoreState = {
  records: AssembledRecord[];
  state: LoadState;
  /** True when `records` came from the local cache because the network failed. */
  servedFromCache: boolean;
  lastRefreshedAt: number | null;
  // actions
  refresh: (force?: boolean) => Promise<void>;
  currentRecords: () => AssembledRecord[];
  currentState: () => LoadState;
};

// Consumers read and subscribe; only refresh() writes.
export type PacksStore = Pick<StoreApi<PacksStoreState>, "getState" | "subscribe">;

type RemoteOutcome =
  | { success: true; data: AssembledRecord[] }
  | { success: false; error: PacksError; manifestLevel: boolean };

/** The sync orchestrator: one per process, collaborators injected at startup. */
export function createPacksStore(deps: PacksStoreDeps): PacksStore {
  const logger = deps.logger ?? silentLogger;
  const decoder = deps.decoder ?? new SchemaDecoder(logger);
  const aggregator = deps.aggregator ?? new Aggregator({ decoder, logger });
  const reporter = deps.reporter ?? globalErrorReporter;
  const now = deps.now ?? Date.now;
  const budgetMs = deps.refreshBudgetMs ?? DEFAULT_REFRESH_BUDGET_MS;
  const minIntervalMs = deps.minRefreshIntervalMs ?? DEFAULT_MIN_REFRESH_INTERVAL_MS;

  function reportSkipped(skipped: SkippedPack[], source: string) {
    for (const s of skipped) {
      reporter.report(s.error, {
        severity: ErrorSeverity.LOW,
        context: { operation: "assemble-pack", source, packID: s.packID, indexOrder: s.indexOrder },
      });
    }
  }

  // Rewrites the whole blob with every pack assembled so far, so a refresh cut
  // short still leaves the packs that did complete on disk.
  async function writeThrough(manifestBytes: Uint8Array, written: CachedPack[], pack: AssembledPack) {
    const cached = toCachedPack(pack.entry.packID, pack.packBytes, pack.scaleBytesByPath);
    if (!cached) {
      safeLog(logger, "warn", "cache:key-collision", { packID: pack.entry.packID });
      return;
    }
    written.push(cached);
    try {
      await deps.cache.save(manifestBytes, written);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      reporter.report(error, {
        severity: ErrorSeverity.LOW,
        context: { operation: "cache-save", packID: pack.entry.packID },
      });
    }
  }

  async function loadRemote(signal: AbortSignal): Promise<RemoteOutcome> {
    const manifestBytes = await deps.fetcher.fetchWithFallback(deps.fetcher.indexPath, "manifest", signal);
    if (!manifestBytes.success) return { success: false, error: manifestBytes.error, manifestLevel: true };
    const manifest = decoder.decode(manifestBytes.data, IndexDocument, "manifest");
    if (!manifest.success) return { success: false, error: manifest.error, manifestLevel: true };

    const written: CachedPack[] = [];
    const outcome = await aggregator.assembleAll(manifest.data, remoteSource(deps.fetcher, signal), {
      onPackAssembled: (pack) => writeThrough(manifestBytes.data, written, pack),
    });
    reportSkipped(outcome.skipped, "remote");
    const result = finishAssembly(outcome);
    return result.success ? result : { success: false, error: result.error, manifestLevel: false };
  }

  async function loadCached(): Promise<Result<AssembledRecord[], PacksError>> {
    const cached = await deps.cache.load();
    if (!cached.success) return cached;
    const manifest = decoder.decode(cached.data.manifestBytes, IndexDocument, "cached manifest");
    if (!manifest.success) return fail(manifest.error);
    const outcome = await aggregator.assembleAll(manifest.data, cacheSource(cached.data));
    reportSkipped(outcome.skipped, "cache");
    return finishAssembly(outcome);
  }

  const store = createStore<PacksStoreState>()((set, get) => {
    function settleFailure(error: PacksError) {
      reporter.report(error, { context: { operation: "refresh" } });
      if (isSchemaMismatch(error)) set({ state: { status: "schemaMismatch" } });
      else set({ state: { status: "failed", message: error.message } });
      safeLog(logger, "warn", "refresh:failed", { kind: error.kind, message: error.message });
    }

    function settleLoaded(records: AssembledRecord[], servedFromCache: boolean) {
      set({ records, state: { status: "loaded" }, servedFromCache, lastRefreshedAt: now() });
      safeLog(logger, "info", "refresh:loaded", { source: servedFromCache ? "cache" : "remote", packs: records.length });
    }

    async function runRefresh(signal: AbortSignal) {
      const remote = await loadRemote(signal);
      if (remote.success) {
        settleLoaded(remote.data, false);
        return;
      }
      // A manifest the app cannot read means the app is outdated; an older
      // cached catalog would only hide that.
      if (remote.manifestLevel && isSchemaMismatch(remote.error)) {
        settleFailure(remote.error);
        return;
      }

      safeLog(logger, "info", "refresh:cache-fallback", { kind: remote.error.kind, message: remote.error.message });
      const cached = await loadCached();
      if (cached.success) {
        settleLoaded(cached.data, true);
        return;
      }
      settleFailure(isSchemaMismatch(cached.error) ? cached.error : remote.error);
    }

    function isFresh(s: PacksStoreState) {
      return (
        s.state.status === "loaded" &&
        !s.servedFromCache &&
        s.lastRefreshedAt !== null &&
        now() - s.lastRefreshedAt < minIntervalMs
      );
    }

    return {
      records: [],
      state: { status: "idle" },
      servedFromCache: false,
      lastRefreshedAt: null,
      async refresh(force = false) {
        const current = get();
        if (current.state.status === "loading") return;
        if (!force && isFresh(current)) {
          safeLog(logger, "debug", "refresh:fresh", { lastRefreshedAt: current.lastRefreshedAt });
          return;
        }

        set({ state: { status: "loading" }, servedFromCache: false });
        const budget = new AbortController();
        const timer = setTimeout(() => budget.abort(), budgetMs);
        try {
          await runRefresh(budget.signal);
        } catch (err) {
          const error = err instanceof Error ? err : new Error(String(err));
          reporter.report(error, { context: { operation: "refresh" } });
          set({ state: { status: "failed", message: error.message } });
        } finally {
          clearTimeout(timer);
        }
      },
      currentRecords: () => get().records,
      currentState: () => get().state,
    };
  });

  return { getState: store.getState, subscribe: store.subscribe };
}
