/**
 * Error codes used throughout snakify.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'FileSystemError'
  | 'IOError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all snakify errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IOError', 'Failed to read src/Widget.h', {
 *   cause: originalError,
 *   details: { path: 'src/Widget.h' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the tree cannot be walked or a rename would clobber
 * an existing path.
 */
export class FileSystemError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FileSystemError', message, options);
  }
}

/**
 * Error thrown when a file cannot be read or written.
 */
export class IOError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('IOError', message, options);
  }
}

/**
 * Extracts the Node error code (ENOENT, EACCES, ...) from an unknown error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Returns `error` unchanged if it is already an AppError, otherwise wraps it
 * with the given factory so the original stays reachable through `cause`.
 */
export function toAppError(
  error: unknown,
  wrap: (message: string, options: AppErrorOptions) => AppError,
  context: string,
): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  const code = errnoCode(error);
  return wrap(`${context}: ${reason}`, {
    cause: error,
    details: code ? { errno: code } : undefined,
  });
}
