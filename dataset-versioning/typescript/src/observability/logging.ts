/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export type LogContext = Record<string, unknown>;

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json', 'compact'];

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;
  private readonly write: (line: string) => void;

  constructor(config?: Partial<LoggingConfig>, write: (line: string) => void = (line) => console.log(line)) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
    this.write = write;
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;
    const fields = context && Object.keys(context).length > 0 ? context : undefined;

    if (this.config.format === 'json') {
      this.write(JSON.stringify({ timestamp, level, message, ...context }));
    } else if (this.config.format === 'compact') {
      const contextStr = fields ? ` ${JSON.stringify(fields)}` : '';
      this.write(`[${level.toUpperCase()}] ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      parts.push(message);
      if (fields) {
        parts.push('\n  ' + Object.entries(fields)
          .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
          .join('\n  '));
      }
      this.write(parts.join(' '));
    }
  }
}

/**
 * Logger that discards everything. Used when no logger is supplied.
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Returns a logger that merges `bound` into the context of every entry.
 * Fields given at the call site win over bound ones.
 */
export function withLogContext(logger: Logger, bound: LogContext): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...bound, ...context });
  return {
    trace: (message, context) => logger.trace(message, merge(context)),
    debug: (message, context) => logger.debug(message, merge(context)),
    info: (message, context) => logger.info(message, merge(context)),
    warn: (message, context) => logger.warn(message, merge(context)),
    error: (message, context) => logger.error(message, merge(context)),
  };
}
