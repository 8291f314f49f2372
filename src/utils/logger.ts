/**
 * Leveled stderr logging for arena and config modules.
 *
 * Every module logs through `createLogger(prefix)`. Nothing is printed
 * below `info` unless LINKED_HEAP_LOG_LEVEL (or setLogLevel) lowers it, so
 * structural mutations, which log at `debug`, stay quiet by default.
 * LINKED_HEAP_LOG_JSON=true switches to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EmitLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export type Logger = Record<EmitLevel, (msg: string, meta?: Record<string, unknown>) => void>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

const envLevel = process.env.LINKED_HEAP_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let jsonLines = process.env.LINKED_HEAP_LOG_JSON === 'true';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function setJsonMode(enabled: boolean): void {
  jsonLines = enabled;
}

function renderMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

/**
 * Render an entry as `[HH:MM:SS] LEVEL message (k=v ...)`, or as JSON in
 * JSON mode.
 */
export function format(entry: LogEntry): string {
  if (jsonLines) {
    return JSON.stringify(entry);
  }

  const clock = entry.timestamp.slice(11, 19);
  const line = `[${clock}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  return entry.meta && Object.keys(entry.meta).length > 0
    ? `${line} (${renderMeta(entry.meta)})`
    : line;
}

function emit(level: EmitLevel, prefix: string, msg: string, meta?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: `[${prefix}] ${msg}`,
    meta,
  };
  process.stderr.write(format(entry) + '\n');
}

/**
 * Logger whose messages carry a `[prefix]` tag naming the module.
 */
export function createLogger(prefix: string): Logger {
  const at =
    (level: EmitLevel) =>
    (msg: string, meta?: Record<string, unknown>): void =>
      emit(level, prefix, msg, meta);

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
