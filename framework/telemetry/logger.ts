/**
 * Structured Logging
 *
 * Leveled logger with merged context. Entries go to a sink: JSON lines in
 * production, colored lines in development, an array in tests. Context
 * values under secret-bearing keys (session keys, CSRF tokens, cookies)
 * are masked before they reach the sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  /** Context keys whose values are replaced with [redacted] */
  redact?: readonly string[];
  output?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_REDACTED_KEYS: readonly string[] = ['sessionKey', 'csrfToken', 'token', 'cookie', 'secretKey'];

const REDACTED = '[redacted]';

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly context: Record<string, unknown>;
  private readonly redact: ReadonlySet<string>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.redact = new Set(options.redact ?? DEFAULT_REDACTED_KEYS);
    this.sink = options.output ?? (this.format === 'json' ? jsonSink : prettySink);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      redact: [...this.redact],
      output: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const merged: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({ ...this.context, ...context })) {
      merged[key] = this.redact.has(key) ? REDACTED : value;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: merged,
    };
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    this.sink(entry);
  }
}

function streamFor(level: LogLevel): NodeJS.WriteStream {
  return level === 'error' || level === 'warn' ? process.stderr : process.stdout;
}

/**
 * One JSON object per line
 */
export function jsonSink(entry: LogEntry): void {
  streamFor(entry.level).write(JSON.stringify(entry) + '\n');
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Colored single-line output for development
 */
export function prettySink(entry: LogEntry): void {
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }
  line += '\n';
  if (entry.error?.stack) {
    line += `${DIM}${entry.error.stack}${RESET}\n`;
  }
  streamFor(entry.level).write(line);
}

/**
 * Logger for an application environment: JSON in production, pretty
 * elsewhere
 */
export function createLogger(options: { logLevel: LogLevel; env: string }): Logger {
  return new Logger({
    level: options.logLevel,
    format: options.env === 'production' ? 'json' : 'pretty',
  });
}

/**
 * Logger that collects entries in memory, for tests and diagnostics
 */
export function createMemoryLogger(level: LogLevel = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger for code that runs outside an application
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    defaultLogger = createLogger({
      logLevel: env === 'production' ? 'info' : env === 'test' ? 'warn' : 'debug',
      env,
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
