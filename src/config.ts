import { z } from 'zod';
import { readEnv, isDebugEnabled } from '@/lib/log';

export const DEFAULT_PRIMARY_BASE = 'https://raw.githubusercontent.com/scale-packs/catalog/main/';
export const DEFAULT_FALLBACK_BASE = 'https://cdn.jsdelivr.net/gh/scale-packs/catalog@main/';
export const DEFAULT_INDEX_PATH = 'INDEX.json';
export const DEFAULT_TIMEOUT_MS = 12_000;
export const DEFAULT_REFRESH_BUDGET_MS = 120_000;
export const DEFAULT_MIN_REFRESH_INTERVAL_MS = 5 * 60_000;
export const DEFAULT_CACHE_DIR = '.scale-packs';

export interface PacksConfig {
  primaryBase: string;
  fallbackBase: string;
  indexPath: string;
  timeoutMs: number;
  refreshBudgetMs: number;
  minRefreshIntervalMs: number;
  cacheDir: string;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

const httpBase = z.string().url().refine((v) => /^https?:\/\//i.test(v), 'must be an http(s) URL');
const positiveInt = z.coerce.number().int().positive();

// Env variable -> config key, with the schema each raw string must satisfy.
const ENV_MAP = {
  PACKS_PRIMARY_BASE: ['primaryBase', httpBase],
  PACKS_FALLBACK_BASE: ['fallbackBase', httpBase],
  PACKS_INDEX_PATH: ['indexPath', z.string().min(1)],
  PACKS_TIMEOUT_MS: ['timeoutMs', positiveInt],
  PACKS_REFRESH_BUDGET_MS: ['refreshBudgetMs', positiveInt],
  PACKS_MIN_REFRESH_INTERVAL_MS: ['minRefreshIntervalMs', z.coerce.number().int().nonnegative()],
  PACKS_CACHE_DIR: ['cacheDir', z.string().min(1)],
} as const;

export const defaultPacksConfig: Readonly<PacksConfig> = Object.freeze({
  primaryBase: DEFAULT_PRIMARY_BASE,
  fallbackBase: DEFAULT_FALLBACK_BASE,
  indexPath: DEFAULT_INDEX_PATH,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  refreshBudgetMs: DEFAULT_REFRESH_BUDGET_MS,
  minRefreshIntervalMs: DEFAULT_MIN_REFRESH_INTERVAL_MS,
  cacheDir: DEFAULT_CACHE_DIR,
  debug: false,
});

/**
 * Build the configuration from environment variables, falling back to defaults.
 * Throws ConfigError naming the first variable that fails validation.
 */
export function loadPacksConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<PacksConfig> = {}): Readonly<PacksConfig> {
  const config: PacksConfig = { ...defaultPacksConfig, debug: isDebugEnabled(env) };
  for (const [variable, [key, schema]] of Object.entries(ENV_MAP)) {
    const raw = readEnv(variable, env);
    if (raw === undefined) continue;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) throw new ConfigError(variable, parsed.error.issues[0]?.message ?? 'invalid value');
    assign(config, key, parsed.data);
  }
  return Object.freeze({ ...config, ...overrides });
}

function assign(config: PacksConfig, key: (typeof ENV_MAP)[keyof typeof ENV_MAP][0], value: string | number): void {
  switch (key) {
    case 'primaryBase':
    case 'fallbackBase':
    case 'indexPath':
    case 'cacheDir':
      config[key] = String(value);
      break;
    case 'timeoutMs':
    case 'refreshBudgetMs':
    case 'minRefreshIntervalMs':
      config[key] = Number(value);
      break;
  }
}
