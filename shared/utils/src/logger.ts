import { isLogLevel, LOG_LEVELS, type LogLevel } from '@autopilot/shared-types';

const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credentials',
  'accesstoken',
  'access_token',
]);

const REDACTED = '[REDACTED]';

function sanitize(value: unknown, seen = new WeakSet<object>()): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object') return value;

  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { name: value.name, message: sanitizeString(value.message) };
  if (value instanceof Map) return sanitize(Object.fromEntries(value), seen);
  if (value instanceof Set) return sanitize([...value], seen);

  if (Array.isArray(value)) {
    return value.map(item => sanitize(item, seen));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : sanitize(entry, seen);
  }
  return sanitized;
}

// URL credentials and key=value secrets inside free text
const SENSITIVE_PATTERNS = [
  /(?<=:\/\/[^:/\s]+:)[^@\s]+(?=@)/g,
  /(?<=password[=:])\s*\S+/gi,
  /(?<=token[=:])\s*\S+/gi,
  /(?<=apikey[=:])\s*\S+/gi,
  /(?<=authorization[=:])\s*\S+/gi,
];

function sanitizeString(str: string): string {
  let result = str;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

function safeContext(context: unknown): string {
  if (context instanceof Error) {
    return sanitizeString(context.stack ?? context.message);
  }
  return JSON.stringify(sanitize(context));
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * Leveled console logger.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO ] [engine] message {"ctx":1}`.
 * Context objects are serialized with secret-looking keys redacted.
 */
class Logger {
  // shared with every child, so setLevel anywhere applies to the whole tree
  private readonly threshold: { level: LogLevel };
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(
    level: LogLevel = 'info',
    options: { scope?: string; sink?: LogSink; threshold?: { level: LogLevel } } = {}
  ) {
    this.threshold = options.threshold ?? { level };
    this.scope = options.scope;
    this.sink = options.sink ?? consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.threshold.level);
  }

  debug(message: string, context?: unknown) {
    this.write('debug', message, context);
  }

  info(message: string, context?: unknown) {
    this.write('info', message, context);
  }

  warn(message: string, context?: unknown) {
    this.write('warn', message, context);
  }

  error(message: string, context?: unknown) {
    this.write('error', message, context);
  }

  setLevel(level: LogLevel) {
    this.threshold.level = level;
  }

  getLevel(): LogLevel {
    return this.threshold.level;
  }

  /**
   * Derive a logger that tags every line with `scope` and shares this
   * logger's sink and level.
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.threshold.level, { scope: nested, sink: this.sink, threshold: this.threshold });
  }

  private write(level: LogLevel, message: string, context?: unknown) {
    if (!this.shouldLog(level)) {
      return;
    }
    this.sink(level, this.format(level, message, context));
  }

  private format(level: LogLevel, message: string, context?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const scope = this.scope ? ` [${this.scope}]` : '';
    const head = `[${timestamp}] [${levelStr}]${scope} ${sanitizeString(message)}`;
    if (context === undefined) {
      return head;
    }
    return `${head} ${safeContext(context)}`;
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export { Logger };
