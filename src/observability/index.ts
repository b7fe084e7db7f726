/**
 * Logging and metrics for the bulk bridge.
 *
 * Pluggable interfaces with console, no-op and in-memory implementations.
 */

// ============================================================================
// Logger Interface
// ============================================================================

export enum LogLevel {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Create a child logger with additional context */
  child(context: LogContext): Logger;
}

// Credentials that may end up in request context or config dumps
const SECRET_KEYS: ReadonlySet<string> = new Set([
  'token',
  'accesstoken',
  'access_token',
  'secret',
  'clientsecret',
  'client_secret',
  'password',
  'authorization',
]);

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Copies `obj`, replacing the values of `keys` (lower-cased) at any depth.
 */
export function redact(obj: LogContext, keys: ReadonlySet<string> = SECRET_KEYS): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(obj)) {
    if (keys.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redact(value, keys);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Shared level dispatch; subclasses decide where an entry goes.
 */
abstract class ContextLogger implements Logger {
  protected readonly context: LogContext;

  protected constructor(context: LogContext) {
    this.context = context;
  }

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.DEBUG, message, { ...this.context, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.INFO, message, { ...this.context, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.emit(LogLevel.WARN, message, { ...this.context, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.emit(LogLevel.ERROR, message, { ...this.context, ...context });
  }

  abstract child(context: LogContext): Logger;

  protected abstract emit(level: LogLevel, message: string, context: LogContext): void;
}

/**
 * JSON-lines logger on stderr; stdout carries command output.
 */
export class ConsoleLogger extends ContextLogger {
  private readonly level: LogLevel;

  constructor(options: { level?: LogLevel; context?: LogContext } = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.INFO;
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({ level: this.level, context: { ...this.context, ...context } });
  }

  protected emit(level: LogLevel, message: string, context: LogContext): void {
    if (level < this.level) return;

    const safe = redact(context);
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: LogLevel[level],
        message,
        ...(Object.keys(safe).length > 0 ? { context: safe } : {}),
      })
    );
  }
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Records entries for assertions. Children append to the parent's list.
 */
export class InMemoryLogger extends ContextLogger {
  private readonly entries: LogEntry[];

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    super(context);
    this.entries = entries;
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  protected emit(level: LogLevel, message: string, context: LogContext): void {
    this.entries.push({ level, message, context, timestamp: new Date() });
  }
}

/**
 * Maps a textual level (`debug`, `INFO`, ...) to a LogLevel.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

// ============================================================================
// Metrics Interface
// ============================================================================

export const MetricNames = {
  REQUESTS_TOTAL: 'bulk_requests_total',
  REQUEST_LATENCY: 'bulk_request_latency_ms',
  ERRORS_TOTAL: 'bulk_errors_total',
  RETRIES_TOTAL: 'bulk_retries_total',
  TOKEN_REFRESH_TOTAL: 'bulk_token_refresh_total',

  JOBS_CREATED: 'bulk_jobs_created_total',
  JOBS_TERMINAL: 'bulk_jobs_terminal_total',
  JOB_POLLS: 'bulk_job_polls_total',
  BATCHES_UPLOADED: 'bulk_batches_uploaded_total',
  ROWS_UPLOADED: 'bulk_rows_uploaded_total',
  RESULT_PAGES: 'bulk_result_pages_total',
  RESULT_ROWS: 'bulk_result_rows_total',
  OUTCOMES_SUCCEEDED: 'bulk_outcomes_succeeded_total',
  OUTCOMES_FAILED: 'bulk_outcomes_failed_total',

  /** Chunks of a partitioned export not yet terminal */
  CHUNKS_PENDING: 'bulk_chunks_pending',
} as const;

export type MetricTags = Record<string, string>;

export interface MetricsCollector {
  increment(name: string, value?: number, tags?: MetricTags): void;
  gauge(name: string, value: number, tags?: MetricTags): void;
  timing(name: string, durationMs: number, tags?: MetricTags): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  timing(): void {}
}

export interface MetricEntry {
  name: string;
  type: 'counter' | 'gauge' | 'timing';
  value: number;
  tags?: MetricTags;
}

function seriesKey(name: string, tags?: MetricTags): string {
  const pairs = Object.entries(tags ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(',')}}`;
}

/**
 * Keeps every data point; counters and gauges are also indexed by series.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly series = new Map<string, number>();

  increment(name: string, value: number = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.series.set(key, (this.series.get(key) ?? 0) + value);
    this.entries.push({ name, type: 'counter', value, tags });
  }

  gauge(name: string, value: number, tags?: MetricTags): void {
    this.series.set(seriesKey(name, tags), value);
    this.entries.push({ name, type: 'gauge', value, tags });
  }

  timing(name: string, durationMs: number, tags?: MetricTags): void {
    this.entries.push({ name, type: 'timing', value: durationMs, tags });
  }

  getEntries(): MetricEntry[] {
    return [...this.entries];
  }

  /** Sum of a counter across all tag sets when `tags` is omitted */
  getCounter(name: string, tags?: MetricTags): number {
    if (tags) {
      return this.series.get(seriesKey(name, tags)) ?? 0;
    }
    return this.entries
      .filter((e) => e.type === 'counter' && e.name === name)
      .reduce((sum, e) => sum + e.value, 0);
  }

  getGauge(name: string, tags?: MetricTags): number | undefined {
    return this.series.get(seriesKey(name, tags));
  }
}

// ============================================================================
// Observability Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
  };
}

export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
  };
}

export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(),
  };
}
