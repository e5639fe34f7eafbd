/**
 * Error codes used throughout mender.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'OracleError'
  | 'PatchError'
  | 'VerificationError'
  | 'DetectorError'
  | 'GitError'
  | 'RemediationError'
  | 'RateLimitError'
  | 'TimeoutError'
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
 * Base error class for all mender errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('OracleError', 'completion request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
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
 * Error thrown when the code-generation backend fails (transport, backend or timeout).
 */
export class OracleError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('OracleError', message, options);
  }
}

/**
 * Error thrown when a patch operation fails.
 */
export class PatchOpError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PatchError', message, options);
  }
}

/**
 * Error thrown when verification of a candidate cannot complete.
 */
export class VerificationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('VerificationError', message, options);
  }
}

/**
 * Error thrown when a detector cannot be loaded or configured.
 */
export class DetectorError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DetectorError', message, options);
  }
}

/**
 * Error thrown when a git command fails.
 */
export class GitError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('GitError', message, options);
  }
}

/**
 * Error thrown when the isolated branch for a batch cannot be created.
 * The batch must not touch any file after this.
 */
export class BranchCreationError extends GitError {
  /** Name of the branch that could not be created */
  public readonly branch: string;

  constructor(branch: string, options: AppErrorOptions = {}) {
    super(`Could not create isolated branch "${branch}". Check that the working tree is clean.`, options);
    this.branch = branch;
  }
}

/**
 * Error thrown when a second remediation is opened for a file that already has one.
 */
export class ConcurrentRemediationError extends AppError {
  /** Path of the file that is already being remediated */
  public readonly filePath: string;

  constructor(filePath: string, options: AppErrorOptions = {}) {
    super('RemediationError', `File is already being remediated: ${filePath}`, options);
    this.filePath = filePath;
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Wraps an unknown thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Whether `error` is a Node.js system error with the given code, e.g. `ENOENT`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
