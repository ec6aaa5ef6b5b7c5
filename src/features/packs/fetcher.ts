import type { Result } from '@/lib/result';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';
import type { FetchError } from './errors';
import { resolveEndpoint, type PackEndpoints } from './endpoints';
import type { PackFetchClient } from './fetch-client';

/**
 * Primary host first, the CDN mirror once on any failure. The fallback's
 * outcome is returned as-is; nothing is merged between the two sources.
 */
export class DualSourceFetcher {
  constructor(
    private readonly client: PackFetchClient,
    private readonly endpoints: PackEndpoints,
    private readonly logger: PacksLogger = silentLogger,
  ) {}

  get indexPath(): string {
    return this.endpoints.indexPath;
  }

  async fetchWithFallback(relativePath: string, label: string, signal?: AbortSignal): Promise<Result<Uint8Array, FetchError>> {
    const { primary, fallback } = resolveEndpoint(this.endpoints, relativePath);
    const first = await this.client.fetch(primary, label, signal);
    if (first.success) return first;
    safeLog(this.logger, 'info', 'fetch:fallback', { label, reason: first.error.kind, fallback });
    return this.client.fetch(fallback, label, signal);
  }
}
