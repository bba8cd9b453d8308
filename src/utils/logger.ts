/**
 * Structured Logger
 * One JSON line per entry; digit runs that could be card numbers are redacted
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;

export type LogLevel = keyof typeof LEVELS;

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export interface LoggerOptions {
  /** Overrides PAN_LOG_LEVEL */
  level?: LogLevel;
  /** Destination for a finished line (default: stdout, stderr for errors) */
  write?: (line: string, level: EntryLevel) => void;
}

/** 13 or more digits, optionally split by single separators */
const DIGIT_RUN = /\d(?:[ \t_-]?\d){12,}/g;

export const REDACTED = '[REDACTED]';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function getThreshold(level?: LogLevel): number {
  if (level !== undefined) return LEVELS[level];
  const env = (process.env['PAN_LOG_LEVEL'] ?? 'info').toLowerCase();
  return isLogLevel(env) ? LEVELS[env] : LEVELS.info;
}

/**
 * Replaces digit runs long enough to be a PAN
 */
export function redactDigits(text: string): string {
  return text.replace(DIGIT_RUN, REDACTED);
}

/**
 * Redacts every string reachable from a log payload
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') return redactDigits(value);
  if (value === null || typeof value !== 'object') return value;
  if (depth > 5) return '[DEPTH_LIMIT]';

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactDigits(value.message),
      ...('code' in value && typeof value.code === 'string' ? { code: value.code } : {}),
    };
  }

  if (Array.isArray(value)) {
    return value.slice(0, 100).map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = redactValue(item, depth + 1);
  }
  return result;
}

function defaultWrite(line: string, level: EntryLevel): void {
  if (level === 'error') process.stderr.write(line + '\n');
  else process.stdout.write(line + '\n');
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const sink = options.write ?? defaultWrite;

  const write = (level: EntryLevel, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold(options.level)) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg: redactDigits(msg),
    };
    if (data !== undefined) entry['data'] = redactValue(data);
    sink(JSON.stringify(entry), level);
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
