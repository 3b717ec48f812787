/**
 * Error codes used throughout the release pipeline.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ToolchainError'
  | 'CompileError'
  | 'StripError'
  | 'PackagingError'
  | 'ArtifactStoreError'
  | 'VersionError'
  | 'VersionMismatch'
  | 'AuthenticationError'
  | 'ReleaseExists'
  | 'PublishBlocked'
  | 'RetryExhausted'
  | 'TimeoutError'
  | 'ProcessError'
  | 'TransientError'
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
 * Base error class for all pipeline errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('CompileError', 'cargo build failed', {
 *   cause: originalError,
 *   details: { target: 'x86_64-unknown-linux-gnu', exitCode: 101 }
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
 * Error thrown when CLI usage is incorrect, e.g. a malformed tag.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when installing a toolchain, a target or system packages fails.
 */
export class ToolchainError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolchainError', message, options);
  }
}

/**
 * Error thrown when the release compile of a target fails.
 */
export class CompileError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CompileError', message, options);
  }
}

/**
 * Error thrown when stripping debug symbols from a binary fails.
 */
export class StripError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StripError', message, options);
  }
}

/**
 * Error thrown when an archive cannot be written or compressed.
 */
export class PackagingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PackagingError', message, options);
  }
}

export type ArtifactStoreFailure = 'exists' | 'missing' | 'invalid-name' | 'checksum' | 'io';

/**
 * Error thrown when the artifact store rejects a write or cannot serve a read.
 */
export class ArtifactStoreError extends AppError {
  /** What went wrong with the store operation */
  public readonly reason: ArtifactStoreFailure;

  constructor(
    reason: ArtifactStoreFailure,
    message: string,
    options: AppErrorOptions = {},
  ) {
    super('ArtifactStoreError', message, {
      ...options,
      details: { reason, ...(typeof options.details === 'object' ? options.details : {}) },
    });
    this.reason = reason;
  }
}

/**
 * Error thrown when the project metadata does not yield a usable version.
 */
export class VersionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('VersionError', message, options);
  }
}

/**
 * Error thrown when the triggering tag and the resolved version disagree.
 */
export class VersionMismatchError extends AppError {
  public readonly tag: string;
  public readonly version: string;

  constructor(tag: string, version: string, options: AppErrorOptions = {}) {
    super(
      'VersionMismatch',
      `Tag "${tag}" does not match project version "${version}"`,
      { ...options, details: { tag, version } },
    );
    this.tag = tag;
    this.version = version;
  }
}

/**
 * Error thrown when the release host rejects the credential.
 */
export class AuthenticationError extends AppError {
  /** HTTP status returned by the host, when known */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('AuthenticationError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when a release with the same tag already exists.
 */
export class ReleaseExistsError extends AppError {
  public readonly tag: string;

  constructor(tag: string, options: AppErrorOptions = {}) {
    super('ReleaseExists', `A release for tag "${tag}" already exists`, {
      ...options,
      details: { tag },
    });
    this.tag = tag;
  }
}

/**
 * Error thrown when publishing is attempted while a prerequisite job has not succeeded.
 */
export class PublishBlockedError extends AppError {
  /** Jobs that did not reach success */
  public readonly blockingJobs: string[];

  constructor(blockingJobs: string[], options: AppErrorOptions = {}) {
    super('PublishBlocked', `Publish blocked by unsuccessful jobs: ${blockingJobs.join(', ')}`, {
      ...options,
      details: { blockingJobs },
    });
    this.blockingJobs = blockingJobs;
  }
}

/**
 * Error thrown when a retried operation fails on its final attempt.
 */
export class RetryExhaustedError extends AppError {
  /** Name of the retried operation */
  public readonly operation: string;
  /** Number of attempts made, including the first */
  public readonly attempts: number;

  constructor(operation: string, attempts: number, options: AppErrorOptions = {}) {
    const causeMessage = options.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('RetryExhausted', `${operation} failed after ${attempts} attempts${causeMessage}`, {
      ...options,
      details: { operation, attempts },
    });
    this.operation = operation;
    this.attempts = attempts;
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
 * Error thrown when a subprocess fails to start or cannot be run.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown for failures that are expected to clear on their own
 * (network hiccups, 5xx responses from the release host).
 */
export class TransientError extends AppError {
  /** HTTP status returned by the remote side, when known */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('TransientError', message, options);
    this.status = options.status;
  }
}

/**
 * Returns the process exit code for an error: 2 for user-correctable errors, 1 otherwise.
 */
export function exitCodeFor(error: unknown): 1 | 2 {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}
