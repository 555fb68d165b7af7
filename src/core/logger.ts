/**
 * Structured JSON logging for the conformance harness.
 *
 * Provides component-scoped loggers with level filtering and an injectable
 * sink. Every entry carries level, ts, component and msg; run, category and
 * method context is promoted to top-level fields so a single run's output
 * can be filtered without parsing `meta`.
 *
 * @example
 * ```ts
 * const logger = createLogger('suite').withContext({ run: 'run-1' });
 * logger.info('category finished', { category: 'performance', duration_ms: 412 });
 * // → {"level":"info","ts":"...","component":"suite","msg":"category finished","run":"run-1","category":"performance","duration_ms":412}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  run?: string;
  category?: string;
  method?: string;
  duration_ms?: number;
  ok?: boolean;
  status?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  run?: string;
  category?: string;
  method?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/**
 * Metadata keys that must never appear in log output. Plugin requests may
 * carry credentials in tags or attributes.
 */
export const NEVER_LOG_FIELDS = new Set([
  'apiKey',
  'api_key',
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const CONTEXT_KEYS = ['run', 'category', 'method'] as const;
const PROMOTED_KEYS = new Set<string>([...CONTEXT_KEYS, 'duration_ms', 'ok', 'status']);

function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> | undefined {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = { name: value.name, message: value.message };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  for (const key of CONTEXT_KEYS) {
    const value = meta[key];
    if (typeof value === 'string') entry[key] = value;
  }
  if (typeof meta.duration_ms === 'number') entry.duration_ms = meta.duration_ms;
  if (typeof meta.ok === 'boolean') entry.ok = meta.ok;
  if (typeof meta.status === 'string') entry.status = meta.status;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'harness'`, `'category:performance'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      for (const key of CONTEXT_KEYS) {
        const value = boundContext[key];
        if (value) entry[key] = value;
      }
    }

    if (meta) {
      promote(entry, meta);
      const sanitized = sanitizeMeta(meta);
      if (sanitized !== undefined) {
        entry.meta = sanitized;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}
