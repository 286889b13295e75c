/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/** Severity threshold for console output. `silent` suppresses everything. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Interface for logging throughout snakify.
 *
 * @example
 * ```typescript
 * logger.info('refactor src/Widget.h ..');
 * logger.error(new Error('Failed'), 'Operation failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ mode: 'walk' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, hidden unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
