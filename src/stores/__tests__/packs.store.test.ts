import { describe, it, expect } from "vitest";
import { DEFAULT_MIN_REFRESH_INTERVAL_MS } from "@/config";
import { CACHE_BLOB_KEY } from "@/features/packs/cache";
import { MemoryBlobStore, type BlobStore } from "@/features/packs/blob-store";
import type { LoadStatus } from "@/features/packs/types";
import { ErrorCategory } from "@/utils/error-reporter";
import type { CachedPack } from "@/features/packs/types";
import {
  FALLBACK_BASE,
  PRIMARY_BASE,
  bytesOf,
  meantonePack,
  meantoneScale,
  sampleCatalogFiles,
  sampleIndex,
  septimalScaleA,
} from "../../../tests/helpers/catalog";
import { START_TIME, createHarness } from "../../../tests/helpers/harness";

function loadedHarness(opts: Parameters<typeof createHarness>[0] = {}) {
  const h = createHarness(opts);
  h.net.serve(PRIMARY_BASE, sampleCatalogFiles());
  return h;
}

describe("packs.store", () => {
  it("starts idle and empty", () => {
    const { store } = createHarness();
    expect(store.getState().currentState()).toEqual({ status: "idle" });
    expect(store.getState().currentRecords()).toEqual([]);
    expect(store.getState().lastRefreshedAt).toBeNull();
  });

  it("loads the remote catalog", async () => {
    const { store, net } = loadedHarness();
    await store.getState().refresh();
    const s = store.getState();
    expect(s.state).toEqual({ status: "loaded" });
    expect(s.servedFromCache).toBe(false);
    expect(s.lastRefreshedAt).toBe(START_TIME);
    expect(s.records.map((r) => r.id)).toEqual(["meantone", "septimal"]);
    expect(net.callsTo(FALLBACK_BASE)).toEqual([]);
  });

  it("notifies subscribers of each transition", async () => {
    const { store } = loadedHarness();
    const seen: LoadStatus[] = [];
    const unsubscribe = store.subscribe((s) => seen.push(s.state.status));
    await store.getState().refresh();
    unsubscribe();
    expect(seen).toEqual(["loading", "loaded"]);
  });

  it("ignores a refresh while one is in flight", async () => {
    const { store, net } = loadedHarness();
    const first = store.getState().refresh();
    expect(store.getState().state.status).toBe("loading");
    const second = store.getState().refresh(true);
    await Promise.all([first, second]);
    expect(net.calls).toHaveLength(6);
    expect(store.getState().records).toHaveLength(2);
  });

  it("skips a non-forced refresh inside the freshness window", async () => {
    const { store, net, advance } = loadedHarness();
    await store.getState().refresh();
    net.calls.length = 0;

    advance(DEFAULT_MIN_REFRESH_INTERVAL_MS - 1);
    await store.getState().refresh();
    expect(net.calls).toEqual([]);

    await store.getState().refresh(true);
    expect(net.calls).toHaveLength(6);
  });

  it("refreshes again once the window has passed", async () => {
    const { store, net, advance, now } = loadedHarness();
    await store.getState().refresh();
    net.calls.length = 0;
    advance(DEFAULT_MIN_REFRESH_INTERVAL_MS);
    await store.getState().refresh();
    expect(net.calls).toHaveLength(6);
    expect(store.getState().lastRefreshedAt).toBe(now());
  });

  it("does not treat a cache-served catalog as fresh", async () => {
    const h = loadedHarness();
    await h.store.getState().refresh();
    h.net.reset();
    await h.store.getState().refresh(true);
    expect(h.store.getState().servedFromCache).toBe(true);

    h.net.calls.length = 0;
    await h.store.getState().refresh();
    expect(h.net.calls.length).toBeGreaterThan(0);
  });

  it("writes the cache through after every assembled pack", async () => {
    const blobs = new MemoryBlobStore();
    const writes: number[] = [];
    const counting: BlobStore = {
      read: (key) => blobs.read(key),
      write: async (key, bytes) => {
        writes.push(bytes.byteLength);
        await blobs.write(key, bytes);
      },
    };
    const { store } = loadedHarness({ blobs: counting });
    await store.getState().refresh();
    expect(writes).toHaveLength(2);
    expect(writes[1]).toBeGreaterThan(writes[0] ?? 0);
    expect(blobs.has(CACHE_BLOB_KEY)).toBe(true);
  });

  it("keeps a remote success when the cache cannot be written", async () => {
    const failing: BlobStore = {
      read: async () => undefined,
      write: async () => {
        throw new Error("EACCES: permission denied");
      },
    };
    const { store, reporter } = loadedHarness({ blobs: failing });
    await store.getState().refresh();
    expect(store.getState().state).toEqual({ status: "loaded" });
    expect(reporter.getStats().errorsByCategory[ErrorCategory.STORAGE]).toBe(2);
  });

  it("reports a failure when the refresh budget runs out", async () => {
    const { store, net, reporter } = createHarness({ refreshBudgetMs: 20, timeoutMs: 60_000 });
    net.hang(`${PRIMARY_BASE}INDEX.json`);
    await store.getState().refresh();
    expect(store.getState().state).toEqual({ status: "failed", message: "Unable to load manifest: request timed out." });
    expect(net.calls).toEqual([`${PRIMARY_BASE}INDEX.json`]);
    expect(reporter.getRecentReports(1)[0]?.category).toBe(ErrorCategory.TIMEOUT);
  });

  it("keeps the previous records when a later refresh fails", async () => {
    const readOnly: BlobStore = {
      read: async () => undefined,
      write: async () => {
        throw new Error("EROFS: read-only file system");
      },
    };
    const { store, net } = loadedHarness({ blobs: readOnly });
    await store.getState().refresh();
    net.reset();
    net.status(`${PRIMARY_BASE}INDEX.json`, 500);
    net.status(`${FALLBACK_BASE}INDEX.json`, 500);

    await store.getState().refresh(true);
    expect(store.getState().state).toEqual({ status: "failed", message: "Unable to load manifest (HTTP 500)." });
    expect(store.getState().records.map((r) => r.id)).toEqual(["meantone", "septimal"]);
  });
  it("leaves a pack out of the cache when two of its scale paths share a key", async () => {
    const h = createHarness();
    h.net.serve(PRIMARY_BASE, {
      ...sampleCatalogFiles(),
      "INDEX.json": { schemaVersion: 1, packs: [{ packID: "meantone", path: "packs/meantone" }, { packID: "twins", path: "packs/twins" }] },
      "packs/twins/pack.json": {
        schemaVersion: 1,
        packID: "twins",
        title: "Twins",
        author: { name: "Test Author" },
        scales: [
          { id: "one", title: "One", path: "scales/one.json" },
          { id: "two", title: "Two", path: "scales_one.json" },
        ],
      },
      "packs/twins/scales/one.json": meantoneScale,
      "packs/twins/scales_one.json": septimalScaleA,
    });

    await h.store.getState().refresh();

    expect(h.store.getState().records.map((r) => r.id)).toEqual(["meantone", "twins"]);
    expect(h.logger.events("warn")).toContain("cache:key-collision");
    const cached = await h.cache.load();
    expect(cached.success && cached.data.packs.map((p) => p.packID)).toEqual(["meantone"]);
  });

  describe("cache fallback", () => {
    const cachedMeantone: CachedPack = { packID: "meantone", packBytes: bytesOf(meantonePack), scaleBytesByKey: {} };

    function offlineHarness() {
      const h = createHarness();
      h.net.status(`${PRIMARY_BASE}INDEX.json`, 500);
      h.net.status(`${FALLBACK_BASE}INDEX.json`, 500);
      return h;
    }

    it("ends in schemaMismatch when the cached manifest is too new", async () => {
      const h = offlineHarness();
      await h.cache.save(bytesOf({ ...sampleIndex, schemaVersion: 2 }), [cachedMeantone]);
      await h.store.getState().refresh();
      expect(h.store.getState().state).toEqual({ status: "schemaMismatch" });
      expect(h.store.getState().servedFromCache).toBe(false);
    });

    it("keeps the network message when the cached manifest cannot be read", async () => {
      const h = offlineHarness();
      await h.cache.save(bytesOf("not json"), [cachedMeantone]);
      await h.store.getState().refresh();
      expect(h.store.getState().state).toEqual({ status: "failed", message: "Unable to load manifest (HTTP 500)." });
    });

    it("keeps the network message when the cache assembles nothing", async () => {
      const h = offlineHarness();
      const stray: CachedPack = { packID: "elsewhere", packBytes: bytesOf(meantonePack), scaleBytesByKey: {} };
      await h.cache.save(bytesOf(sampleIndex), [stray]);
      await h.store.getState().refresh();
      expect(h.store.getState().state).toEqual({ status: "failed", message: "Unable to load manifest (HTTP 500)." });
      expect(h.store.getState().records).toEqual([]);
    });
  });
});
