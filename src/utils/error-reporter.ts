import { PacksError } from '@/features/packs/errors';
import { safeLog, silentLogger, type PacksLogger } from '@/lib/log';

// Error categories for better organization and handling
export enum ErrorCategory {
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  PARSING = 'parsing',
  VALIDATION = 'validation',
  STORAGE = 'storage',
  UNKNOWN = 'unknown'
}

// Error severity levels
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

// User-friendly error message templates
const ERROR_MESSAGES: Record<ErrorCategory, { title: string; message: string; suggestions: string[] }> = {
  [ErrorCategory.NETWORK]: {
    title: 'Connection Error',
    message: 'Unable to reach the pack catalog. Cached packs are shown when available.',
    suggestions: ['Check your internet connection', 'Try again in a few moments']
  },
  [ErrorCategory.TIMEOUT]: {
    title: 'Request Timeout',
    message: 'The pack catalog took too long to respond.',
    suggestions: ['Try again in a few moments', 'Check your internet connection']
  },
  [ErrorCategory.PARSING]: {
    title: 'Unreadable Pack',
    message: 'A pack document could not be read and was left out.',
    suggestions: ['Refresh later; the pack may be mid-update', 'Report the pack to its author']
  },
  [ErrorCategory.VALIDATION]: {
    title: 'Update Required',
    message: 'The pack catalog uses a newer format than this version understands.',
    suggestions: ['Update the app to the latest version']
  },
  [ErrorCategory.STORAGE]: {
    title: 'Storage Error',
    message: 'The local pack cache could not be read or written.',
    suggestions: ['Check available disk space', 'Check permissions on the cache directory']
  },
  [ErrorCategory.UNKNOWN]: {
    title: 'Unexpected Error',
    message: 'An unexpected error occurred while loading packs.',
    suggestions: ['Try again', 'Report the problem if it persists']
  }
};

// Enhanced error information
export interface ErrorReport {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError: Error;
  context?: Record<string, unknown>;
  userMessage: {
    title: string;
    message: string;
    suggestions: string[];
  };
}

// Error reporting configuration
export interface ErrorReporterConfig {
  enableLogging?: boolean;
  maxStoredReports?: number;
  logger?: PacksLogger;
  now?: () => Date;
}

// Error statistics for monitoring
export interface ErrorStats {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
}

export type ErrorListener = (report: ErrorReport) => void;

/**
 * Centralized error reporting: categorises, keeps the most recent reports,
 * logs them and notifies subscribers.
 */
export class ErrorReporter {
  private reports: ErrorReport[] = [];
  private listeners: ErrorListener[] = [];
  private counter = 0;
  private readonly config: Required<Omit<ErrorReporterConfig, 'logger'>> & { logger: PacksLogger };

  constructor(config: ErrorReporterConfig = {}) {
    this.config = {
      enableLogging: true,
      maxStoredReports: 100,
      now: () => new Date(),
      ...config,
      logger: config.logger ?? silentLogger,
    };
  }

  /**
   * Report a new error with automatic categorization and user-friendly messaging
   */
  report(
    error: Error,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
    } = {}
  ): ErrorReport {
    const category = options.category ?? categorizeError(error);
    const severity = options.severity ?? determineSeverity(category);

    const report: ErrorReport = {
      id: `err_${++this.counter}`,
      timestamp: this.config.now(),
      category,
      severity,
      originalError: error,
      context: options.context,
      userMessage: ERROR_MESSAGES[category],
    };

    this.reports.push(report);
    if (this.reports.length > this.config.maxStoredReports) {
      this.reports = this.reports.slice(-this.config.maxStoredReports);
    }

    if (this.config.enableLogging) {
      safeLog(this.config.logger, severity === ErrorSeverity.LOW ? 'info' : 'warn', `error:${category}`, {
        severity,
        message: error.message,
        ...(options.context ?? {}),
      });
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(report);
      } catch (err) {
        safeLog(this.config.logger, 'warn', 'error:listener-failed', { message: err instanceof Error ? err.message : String(err) });
      }
    }
    return report;
  }

  subscribe(listener: ErrorListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index > -1) this.listeners.splice(index, 1);
    };
  }

  getRecentReports(limit = 10): ErrorReport[] {
    return this.reports.slice(-limit);
  }

  getStats(): ErrorStats {
    const errorsByCategory: Record<ErrorCategory, number> = {
      [ErrorCategory.NETWORK]: 0,
      [ErrorCategory.TIMEOUT]: 0,
      [ErrorCategory.PARSING]: 0,
      [ErrorCategory.VALIDATION]: 0,
      [ErrorCategory.STORAGE]: 0,
      [ErrorCategory.UNKNOWN]: 0,
    };
    const errorsBySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0,
    };
    for (const r of this.reports) {
      errorsByCategory[r.category]++;
      errorsBySeverity[r.severity]++;
    }
    return { totalErrors: this.reports.length, errorsByCategory, errorsBySeverity };
  }

  clear(): void {
    this.reports = [];
  }
}

/**
 * Categorize an error: sync-engine errors by kind, anything else by message.
 */
export function categorizeError(error: Error): ErrorCategory {
  if (error instanceof PacksError) {
    switch (error.kind) {
      case 'invalidURL':
      case 'httpStatus':
      case 'notJSON':
      case 'network':
        return ErrorCategory.NETWORK;
      case 'timeout':
        return ErrorCategory.TIMEOUT;
      case 'decode':
        return ErrorCategory.PARSING;
      case 'schemaMismatch':
        return ErrorCategory.VALIDATION;
      case 'cacheUnavailable':
        return ErrorCategory.STORAGE;
      case 'empty':
      case 'unexpected':
        return ErrorCategory.UNKNOWN;
    }
  }

  const message = error.message.toLowerCase();
  if (message.includes('timeout') || error.name.toLowerCase().includes('timeout')) return ErrorCategory.TIMEOUT;
  if (message.includes('network') || message.includes('fetch') || message.includes('connection')) return ErrorCategory.NETWORK;
  if (message.includes('enoent') || message.includes('eacces') || message.includes('enospc') || message.includes('storage')) return ErrorCategory.STORAGE;
  if (message.includes('json') || message.includes('parse') || message.includes('syntax')) return ErrorCategory.PARSING;
  return ErrorCategory.UNKNOWN;
}

function determineSeverity(category: ErrorCategory): ErrorSeverity {
  switch (category) {
    case ErrorCategory.VALIDATION:
      return ErrorSeverity.HIGH;
    case ErrorCategory.NETWORK:
    case ErrorCategory.TIMEOUT:
    case ErrorCategory.STORAGE:
      return ErrorSeverity.MEDIUM;
    default:
      return ErrorSeverity.LOW;
  }
}

export const globalErrorReporter = new ErrorReporter();
