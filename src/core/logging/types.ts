/**
 * Structured logger used throughout the reconciler
 */
export interface ReconcilerLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages. The error, when given, is serialized under `error`.
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): ReconcilerLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Configuration options for the reconciler logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output file (default: stdout)
   */
  destination?: string;

  options?: {
    timestamp?: boolean;
  };
}
