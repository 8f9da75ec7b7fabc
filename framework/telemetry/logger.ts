/**
 * Structured Logging
 *
 * Leveled logger with per-logger context. Development output is colored
 * and human readable; production output is one JSON object per line.
 * Warnings and errors go to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? ((entry) => this.write(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context. The child shares the
   * parent's output and starts at the parent's level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = serializeError(error);
    }

    this.output(entry);
  }

  private write(entry: LogEntry): void {
    const line = this.format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
    if (LOG_LEVELS[entry.level] >= LOG_LEVELS.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Flatten an error and its `cause` chain into plain data
 */
export function serializeError(error: Error, depth = 0): SerializedError {
  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause instanceof Error && depth < 5) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }
  return serialized;
}

function formatPretty(entry: LogEntry): string {
  const timestamp = DIM + entry.timestamp + RESET;
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;

  let output = `${timestamp} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }

  for (let err = entry.error; err; err = err.cause) {
    output += `\n${DIM}${err.stack ?? `${err.name}: ${err.message}`}${RESET}`;
  }

  return output;
}

export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  userAgent?: string;
}

/**
 * Child logger carrying request identity
 */
export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  return baseLogger.child({
    requestId: context.requestId,
    method: context.method,
    path: context.path,
    userAgent: context.userAgent,
  });
}

/**
 * Build a logger with the defaults for an environment: debug + pretty in
 * development, error-only in test, info + json in production. An explicit
 * level wins.
 */
export function createLogger(env: string, level?: LogLevel): Logger {
  return new Logger({
    level: level ?? (env === 'production' ? 'info' : env === 'test' ? 'error' : 'debug'),
    format: env === 'production' ? 'json' : 'pretty',
  });
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger, created from NODE_ENV on first use
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(process.env.NODE_ENV ?? 'development');
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
