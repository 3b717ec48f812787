import {
  ArtifactStoreError,
  Logger,
  RetryConfig,
  RetryExhaustedError,
  TimeoutError,
  ToolchainError,
  TransientError,
  eventMeta,
} from '@tagship/shared';

/**
 * Bounded retry for externally facing operations: toolchain and package
 * installs, artifact uploads, release creation.
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * ```
 *
 * Retriable: `TransientError`, `TimeoutError`, `ToolchainError`, store I/O
 * failures, HTTP 429 and 5xx, and ETIMEDOUT/ECONNRESET/ECONNREFUSED network errors. Everything else,
 * authentication and release collisions included, fails on the first attempt.
 */
export function isRetriableError(error: unknown): boolean {
  if (
    error instanceof TransientError ||
    error instanceof TimeoutError ||
    error instanceof ToolchainError
  ) {
    return true;
  }
  if (error instanceof ArtifactStoreError) {
    return error.reason === 'io';
  }

  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }

  const code = networkCode(error);
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

function networkCode(error: object): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error && typeof error.cause === 'object' && error.cause !== null) {
    return networkCode(error.cause);
  }
  return undefined;
}

export function retryDelay(options: RetryConfig, attempt: number): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

export interface RetryContext {
  logger: Logger;
  runId: string;
}

export async function withRetry<T>(
  operation: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryConfig,
  ctx: RetryContext,
): Promise<T> {
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (!isRetriableError(error)) {
        throw error;
      }
      if (attempt > options.maxRetries) {
        throw new RetryExhaustedError(operation, attempt, { cause: error });
      }

      const delayMs = retryDelay(options, attempt);
      const message = error instanceof Error ? error.message : String(error);
      await ctx.logger.log({
        ...eventMeta(ctx.runId),
        type: 'RetryScheduled',
        payload: { operation, attempt, delayMs: Math.round(delayMs), error: message },
      });
      await ctx.logger.warn(`${operation} failed (attempt ${attempt}): ${message}; retrying`);

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
