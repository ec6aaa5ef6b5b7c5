export type LogLevel = 'debug' | 'info' | 'warn';

export type LogData = Record<string, unknown>;

export interface PacksLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
}

export interface LogEntry {
  level: LogLevel;
  event: string;
  data: LogData;
}

export function readEnv(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const dbg = (readEnv('PACKS_DEBUG', env) || '').toLowerCase();
  return dbg === '1' || dbg === 'true';
}

/**
 * Console-backed logger. Lines look like `[packs:fetch] {"status":200,...}`.
 * Debug lines are dropped unless `debug` is set (defaults to PACKS_DEBUG).
 */
export function createConsoleLogger(opts: { debug?: boolean } = {}): PacksLogger {
  const debug = opts.debug ?? isDebugEnabled();
  const line = (event: string, data?: LogData) => (data ? `[packs:${event}] ${stringify(data)}` : `[packs:${event}]`);
  return {
    debug(event, data) { if (debug) console.debug(line(event, data)); },
    info(event, data) { console.info(line(event, data)); },
    warn(event, data) { console.warn(line(event, data)); },
  };
}

export const silentLogger: PacksLogger = {
  debug() {},
  info() {},
  warn() {},
};

export function createMemoryLogger(): PacksLogger & { entries: LogEntry[]; events(level?: LogLevel): string[] } {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (event: string, data: LogData = {}) => { entries.push({ level, event, data }); };
  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    events(level) {
      return entries.filter((e) => !level || e.level === level).map((e) => e.event);
    },
  };
}

// Diagnostics must never change control flow: a throwing logger is ignored here.
export function safeLog(logger: PacksLogger, level: LogLevel, event: string, data?: LogData): void {
  try {
    logger[level](event, data);
  } catch (err) {
    if (logger !== silentLogger) console.warn(`[packs:logger-failed] ${event}`, err);
  }
}

function stringify(data: LogData): string {
  try {
    return JSON.stringify(data);
  } catch {
    return '{"unserializable":true}';
  }
}
