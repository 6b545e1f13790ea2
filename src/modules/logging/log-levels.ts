/**
 * Log levels, ascending severity (RFC 5424 / OpenTelemetry ordering):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 *   TRACE : request/response bodies, signed upstream calls.
 *   DEBUG : credential resolution, scope decisions, config reads.
 *   INFO  : principal provisioned, session established, inventory created.
 *   WARN  : rejected credentials, ownership violations, slow requests.
 *   ERROR : upstream failures, provisioning failures, unexpected errors.
 *   FATAL : required secret missing in production.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). Unknown values fall back to INFO. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  switch (upper) {
    case 'TRACE': return LogLevel.TRACE;
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'FATAL': return LogLevel.FATAL;
    case 'OFF': return LogLevel.OFF;
  }
  const num = Number(upper);
  if (Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) {
    return num;
  }
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Functional area a log line belongs to. */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Credential resolution and access checks */
  AUTH = 'auth',
  /** USOS OAuth1 handshake and profile fetch */
  OAUTH = 'oauth',
  /** Principal find-or-create and attribute reconciliation */
  PROVISIONING = 'provisioning',
  INVENTORY = 'inventory',
  ITEMS = 'items',
  DATABASE = 'database',
  GENERAL = 'general',
}

const CATEGORY_VALUES: ReadonlySet<string> = new Set(Object.values(LogCategory));

export function isLogCategory(value: string): value is LogCategory {
  return CATEGORY_VALUES.has(value);
}

export interface LogConfig {
  /** Minimum level emitted when no category override applies. */
  globalLevel: LogLevel;

  /**
   * Per-category overrides.
   * Example: { 'oauth': LogLevel.TRACE, 'http': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Keep request/response bodies in TRACE output. */
  includePayloads: boolean;

  /** Keep stack traces in ERROR/FATAL output. */
  includeStackTraces: boolean;

  /** Longer string or serialized values are truncated. */
  maxPayloadSizeBytes: number;

  format: 'json' | 'pretty';
}

export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  const requestedFormat = process.env.LOG_FORMAT;
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includePayloads: process.env.LOG_INCLUDE_PAYLOADS === 'true' || (!isProd && process.env.LOG_INCLUDE_PAYLOADS !== 'false'),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : (requestedFormat === 'json' ? 'json' : 'pretty'),
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS.
 * Format: "oauth=TRACE,auth=WARN,http=DEBUG"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
