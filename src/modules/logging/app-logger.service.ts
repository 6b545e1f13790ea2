import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single request.
 */
export interface CorrelationContext {
  /** Propagated from X-Request-Id or generated. */
  requestId: string;
  method?: string;
  path?: string;
  /** Set once AccessGuard has resolved the caller. */
  principalId?: number;
  /** Which credential resolver accepted the request. */
  authType?: 'session' | 'token' | 'public';
  startTime?: number;
}

export interface StructuredLogEntry {
  /** ISO-8601 */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  principalId?: number;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

const SENSITIVE_KEY = /secret|password|token|authorization|bearer|verifier|cookie/i;

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * AppLogger: leveled, correlation-aware structured logger.
 *
 * - TRACE → FATAL levels with per-category overrides
 * - request correlation carried across async boundaries
 * - JSON lines in production, pretty output in development
 * - configured once from the LOG_* variables
 *
 * Usage:
 *   this.logger.info(LogCategory.PROVISIONING, 'Principal created', { username });
 *   this.logger.warn(LogCategory.ITEMS, 'Cross-owner write rejected', { inventoryId });
 */
@Injectable()
export class AppLogger {
  private readonly config: LogConfig;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  enrichContext(partial: Partial<CorrelationContext>): void {
    const current = correlationStorage.getStore();
    if (current) {
      Object.assign(current, partial);
    }
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Core logging logic ───────────────────────────────────────────

  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (category) {
      const override = this.config.categoryLevels[category];
      if (override !== undefined) {
        return level >= override;
      }
    }
    return level >= this.config.globalLevel;
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      principalId: ctx?.principalId,
      method: ctx?.method,
      path: ctx?.path,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    if (this.config.format === 'json') {
      this.emitJson(level, entry);
    } else {
      this.emitPretty(level, entry);
    }
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Redact secrets by key name, truncate oversized values. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEY.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (/body/i.test(key) && !this.config.includePayloads) {
        result[key] = '[omitted]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emitJson(level: LogLevel, entry: StructuredLogEntry): void {
    const line = JSON.stringify(entry) + '\n';
    if (level >= LogLevel.WARN) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(12);
    const reqId = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
    const who = entry.principalId !== undefined ? ` p:${entry.principalId}` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';
    const method = entry.method ? ` ${entry.method}` : '';
    const path = entry.path ? ` ${entry.path}` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${reqId}${who}${method}${path}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack && this.config.includeStackTraces) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;  // magenta
      default: return text;
    }
  }
}
