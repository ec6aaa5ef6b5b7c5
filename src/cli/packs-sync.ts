#!/usr/bin/env node
import { ConfigError, loadPacksConfig } from "@/config";
import { SCHEMA_MISMATCH_MESSAGE } from "@/features/packs/errors";
import type { AssembledRecord } from "@/features/packs/types";
import type { InstallRegistry } from "@/features/packs/install-registry";
import { createDefaultPacksServices, type PacksStore } from "@/stores";

export const USAGE = "Usage: scale-pack-sync [--force] [--cache-dir <dir>]";

export interface PacksSyncArgs {
  force: boolean;
  cacheDir?: string;
  help: boolean;
}

export interface RunPacksSyncResult {
  report: string;
  exitCode: number;
}

export function parseArgs(argv: readonly string[]): PacksSyncArgs {
  const args: PacksSyncArgs = { force: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--force" || arg === "-f") args.force = true;
    else if (arg === "--help" || arg === "-h") args.help = true;
    else if (arg === "--cache-dir") {
      const dir = argv[++i];
      if (!dir) throw new Error("--cache-dir needs a directory");
      args.cacheDir = dir;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

export function formatRecordLine(record: AssembledRecord, installs?: InstallRegistry): string {
  const scales = `${record.scaleCount} ${record.scaleCount === 1 ? "scale" : "scales"}`;
  const limits = `${record.primeLimitMin}–${record.primeLimitMax}-limit`;
  let line = `${record.indexOrder + 1}. ${record.title} — ${record.authorName} · ${scales} · ${limits} · ${record.contentHash.slice(0, 12)}`;
  if (installs?.updateAvailable(record)) line += " · update available";
  else if (installs?.isInstalled(record.packID)) line += " · installed";
  return line;
}

/**
 * Pure runner: performs one refresh on `store` and renders the outcome.
 * Does not print or exit.
 */
export async function runPacksSync(
  store: PacksStore,
  opts: { force?: boolean; installs?: InstallRegistry } = {},
): Promise<RunPacksSyncResult> {
  await store.getState().refresh(opts.force ?? false);
  const { state, records, servedFromCache } = store.getState();
  switch (state.status) {
    case "loaded": {
      const lines: string[] = [];
      if (servedFromCache) lines.push("Offline: showing cached scale packs.");
      for (const record of records) lines.push(formatRecordLine(record, opts.installs));
      return { report: lines.join("\n"), exitCode: 0 };
    }
    case "schemaMismatch":
      return { report: `${SCHEMA_MISMATCH_MESSAGE} Update to load scale packs.`, exitCode: 2 };
    case "failed":
      return { report: state.message, exitCode: 1 };
    default:
      return { report: `Refresh ended in state ${state.status}.`, exitCode: 1 };
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  const config = loadPacksConfig(process.env, args.cacheDir ? { cacheDir: args.cacheDir } : {});
  const { store, installs } = createDefaultPacksServices(config);
  await installs.load();
  const { report, exitCode } = await runPacksSync(store, { force: args.force, installs });
  if (exitCode === 0) console.log(report);
  else console.error(report);
  process.exitCode = exitCode;
}

// Only execute if invoked directly (not when imported for tests)
if (process.argv[1] && /packs-sync\.ts$/.test(process.argv[1])) {
  main().catch((e: unknown) => {
    if (e instanceof ConfigError) console.error(e.message);
    else console.error(e);
    console.error(USAGE);
    process.exit(1);
  });
}
