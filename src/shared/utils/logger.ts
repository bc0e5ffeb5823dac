/**
 * Logger for the portal client
 *
 * Small leveled logger passed around as a handle:
 * - Minimal logging by default (warn level)
 * - No global instance; components get a logger through their config
 * - Helpers for redacting sensitive values
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LogSink {
  error(line: string): void;
  warn(line: string): void;
  info(line: string): void;
  debug(line: string): void;
}

export interface LoggerConfig {
  /** Log level (default: 'warn') */
  level?: LogLevel;
  /** Component/module name for prefixing logs */
  component?: string;
  /** Where formatted lines go (default: console, on stderr) */
  sink?: LogSink;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// stdout is reserved for command output, so every level goes to stderr
const consoleSink: LogSink = {
  error: line => console.error(line),
  warn: line => console.error(line),
  info: line => console.error(line),
  debug: line => console.error(line)
};

export class Logger {
  private level: LogLevel;
  private levelNum: number;
  private component: string;
  private sink: LogSink;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'warn';
    this.levelNum = LOG_LEVELS[this.level];
    this.component = config.component ?? 'MisisId';
    this.sink = config.sink ?? consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= this.levelNum;
  }

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}`;
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;

    this.sink.error(this.formatMessage('error', message));

    if (error instanceof Error && error.stack && this.levelNum >= LOG_LEVELS.debug) {
      this.sink.error(error.stack);
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    this.sink.warn(this.formatMessage('warn', message));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    this.sink.info(this.formatMessage('info', message));
  }

  debug(message: string, data?: unknown): void {
    if (!this.shouldLog('debug')) return;

    this.sink.debug(this.formatMessage('debug', message));

    if (data !== undefined) {
      this.sink.debug(`  Data: ${JSON.stringify(data, null, 2)}`);
    }
  }

  /**
   * Create a child logger with a different component name
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component,
      sink: this.sink
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.levelNum = LOG_LEVELS[level];
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, config?: Omit<LoggerConfig, 'component'>): Logger {
  return new Logger({ ...config, component });
}

/**
 * Redact sensitive values in an object for safe logging
 */
export function redactSensitive(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = ['login', 'password', 'token', 'secret', 'cookie', 'session']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(k => keyLower.includes(k.toLowerCase()));

    if (isSensitive && typeof value === 'string') {
      result[key] = value.length > 0 ? '<redacted>' : '';
    } else if (isPlainRecord(value)) {
      result[key] = redactSensitive(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Safely truncate a string for logging (useful for logins, etc.)
 */
export function truncateForLog(value: string, showChars: number = 3): string {
  if (value.length <= showChars) return '*'.repeat(value.length);
  return value.substring(0, showChars) + '***';
}
