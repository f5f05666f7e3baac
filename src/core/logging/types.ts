/**
 * Logger interface providing structured logging for reconciliation runs
 */
export interface ReconcilerLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log informational messages
   */
  info(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log warning messages
   */
  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Log fatal error messages (most severe)
   */
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): ReconcilerLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Configuration options for the reconciler logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold. `silent` disables output entirely.
   */
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false)
   */
  pretty?: boolean | undefined;

  /**
   * Output destination file (default: stdout)
   */
  destination?: string | undefined;

  options?:
    | {
        /**
         * Include timestamp in logs (default: true)
         */
        timestamp?: boolean | undefined;
      }
    | undefined;
}

/**
 * Logger context for binding additional metadata
 */
export interface LoggerContext {
  component?: string;
  resourceId?: string;
  clusterName?: string;
  [key: string]: unknown;
}
