import { loadPacksConfig, type PacksConfig } from "@/config";
import { createConsoleLogger, type PacksLogger } from "@/lib/log";
import { FileBlobStore } from "@/features/packs/blob-store";
import { CacheStore } from "@/features/packs/cache";
import { PackFetchClient } from "@/features/packs/fetch-client";
import { DualSourceFetcher } from "@/features/packs/fetcher";
import { InstallRegistry } from "@/features/packs/install-registry";
import { ErrorReporter } from "@/utils/error-reporter";
import { createPacksStore, type PacksStore } from "./packs.store";

export { createPacksStore } from "./packs.store";
export type { PacksStore, PacksStoreDeps, PacksStoreState } from "./packs.store";

export interface DefaultPacksServices {
  store: PacksStore;
  installs: InstallRegistry;
  reporter: ErrorReporter;
  logger: PacksLogger;
}

/**
 * Production wiring: global fetch, the file-backed cache under
 * `config.cacheDir` and console logging. Call once at startup.
 */
export function createDefaultPacksServices(config: Readonly<PacksConfig> = loadPacksConfig()): DefaultPacksServices {
  const logger = createConsoleLogger({ debug: config.debug });
  const reporter = new ErrorReporter({ logger });
  const blobs = new FileBlobStore(config.cacheDir);
  const client = new PackFetchClient({ timeoutMs: config.timeoutMs, logger });
  const fetcher = new DualSourceFetcher(
    client,
    { primaryBase: config.primaryBase, fallbackBase: config.fallbackBase, indexPath: config.indexPath },
    logger,
  );
  const store = createPacksStore({
    fetcher,
    cache: new CacheStore(blobs, logger),
    logger,
    reporter,
    refreshBudgetMs: config.refreshBudgetMs,
    minRefreshIntervalMs: config.minRefreshIntervalMs,
  });
  return { store, installs: new InstallRegistry(blobs, logger), reporter, logger };
}

export function createDefaultPacksStore(config: Readonly<PacksConfig> = loadPacksConfig()): PacksStore {
  return createDefaultPacksServices(config).store;
}
