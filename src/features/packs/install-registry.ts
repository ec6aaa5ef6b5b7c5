import { z } from 'zod';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import type { BlobStore } from './blob-store';
import type { AssembledRecord } from './types';

export const INSTALL_REGISTRY_KEY = 'install-registry-v1.json';

const InstallRecordSchema = z.object({
  installedScaleIDs: z.array(z.string()),
  installedAt: z.string(),
  installedVersion: z.string(),
  installedContentHash: z.string(),
});

const RegistryBlobSchema = z.object({
  version: z.literal(1),
  installed: z.record(z.string(), InstallRecordSchema),
});

export type InstallRecord = z.infer<typeof InstallRecordSchema>;

type RegistryState = { installed: Record<string, InstallRecord> };

/** Builds the record to store when every scale of `pack` gets installed. */
export function installRecordFor(pack: AssembledRecord, installedAt: Date = new Date()): InstallRecord {
  return {
    installedScaleIDs: pack.scales.map((s) => s.id),
    installedAt: installedAt.toISOString(),
    installedVersion: pack.version,
    installedContentHash: pack.contentHash,
  };
}

/**
 * Which packs the user has installed, and from which content. Persisted as
 * one blob; a missing or unreadable blob means nothing is installed.
 */
export class InstallRegistry {
  private readonly store: StoreApi<RegistryState> = createStore<RegistryState>()(() => ({ installed: {} }));

  constructor(
    private readonly blobs: BlobStore,
    private readonly logger: PacksLogger = silentLogger,
    private readonly key: string = INSTALL_REGISTRY_KEY,
  ) {}

  async load(): Promise<void> {
    let installed: Record<string, InstallRecord> = {};
    try {
      const raw = await this.blobs.read(this.key);
      if (raw) {
        const parsed = RegistryBlobSchema.safeParse(JSON.parse(new TextDecoder().decode(raw)));
        if (parsed.success) installed = parsed.data.installed;
        else safeLog(this.logger, 'warn', 'install:registry-invalid', { key: this.key });
      }
    } catch (err) {
      safeLog(this.logger, 'warn', 'install:registry-unreadable', { key: this.key, message: err instanceof Error ? err.message : String(err) });
    }
    this.store.setState({ installed });
  }

  record(packID: string): InstallRecord | undefined {
    return this.store.getState().installed[packID];
  }

  isInstalled(packID: string): boolean {
    return this.record(packID) !== undefined;
  }

  /** True when the pack is installed from content other than `pack`'s current content. */
  updateAvailable(pack: AssembledRecord): boolean {
    const installed = this.record(pack.packID);
    return installed !== undefined && installed.installedContentHash !== pack.contentHash;
  }

  installedPackIDs(): string[] {
    return Object.keys(this.store.getState().installed);
  }

  async setInstalled(packID: string, record: InstallRecord): Promise<void> {
    this.store.setState((s) => ({ installed: { ...s.installed, [packID]: record } }));
    await this.persist();
  }

  async removeInstalled(packID: string): Promise<void> {
    const { [packID]: removed, ...rest } = this.store.getState().installed;
    if (!removed) return;
    this.store.setState({ installed: rest });
    await this.persist();
  }

  subscribe(listener: (installed: Record<string, InstallRecord>) => void): () => void {
    return this.store.subscribe((s) => listener(s.installed));
  }

  // Best-effort: the in-memory registry stays authoritative for this process.
  private async persist(): Promise<void> {
    const blob: z.infer<typeof RegistryBlobSchema> = { version: 1, installed: this.store.getState().installed };
    try {
      await this.blobs.write(this.key, new TextEncoder().encode(JSON.stringify(blob)));
    } catch (err) {
      safeLog(this.logger, 'warn', 'install:registry-save-failed', { key: this.key, message: err instanceof Error ? err.message : String(err) });
    }
  }
}
