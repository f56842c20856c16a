/**
 * Structured logging for the batcher
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';
export type LogContext = Record<string, unknown>;

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Name printed with every line, e.g. the batcher's purpose. */
  target?: string;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
  };
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp?: string;
  target?: string;
  context?: LogContext;
}

/**
 * `[2024-05-01T10:00:00.000Z] [WARN] orders: Job rejected` followed by one
 * indented `key: value` line per context entry.
 */
export function formatPretty(record: LogRecord): string {
  const head = [
    record.timestamp ? `[${record.timestamp}]` : undefined,
    `[${record.level.toUpperCase()}]`,
    record.target ? `${record.target}:` : undefined,
    record.message,
  ].filter((part): part is string => part !== undefined);

  const lines = Object.entries(record.context ?? {}).map(
    ([key, value]) => `  ${key}: ${JSON.stringify(value)}`
  );
  return [head.join(' '), ...lines].join('\n');
}

/**
 * One JSON object per line; context keys sit beside `level` and `message`.
 */
export function formatJson(record: LogRecord): string {
  const { context, ...fields } = record;
  return JSON.stringify({ ...fields, ...context });
}

/**
 * Logger writing one line per call to `console.log`
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;
  private readonly minLevel: number;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
    this.minLevel = LEVELS.indexOf(this.config.level);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVELS.indexOf(level) < this.minLevel) {
      return;
    }
    const record: LogRecord = {
      level,
      message,
      timestamp: this.config.includeTimestamps ? new Date().toISOString() : undefined,
      target: this.config.target,
      context,
    };
    console.log(this.config.format === 'json' ? formatJson(record) : formatPretty(record));
  }
}

/**
 * Logger that discards everything; the batcher's default
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Logs an error with context
 */
export function logError(
  logger: Logger,
  message: string,
  error: unknown,
  context?: LogContext
): void {
  if (error instanceof Error) {
    logger.error(message, {
      ...context,
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack,
    });
    return;
  }
  logger.error(message, { ...context, errorMessage: String(error) });
}
