import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { LlmError, toError } from '@triangulate/shared/src/utils/errors.js';

const log = createChildLogger('llm:retry');

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429', 'rate limit', 'too many requests', 'resource exhausted',
  '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
  'econnreset', 'etimedout', 'timeout', 'network',
  'socket hang up', 'econnrefused',
];

function readStatus(error: Error): number | undefined {
  for (const field of ['status', 'statusCode', 'code']) {
    if (field in error) {
      const value: unknown = Reflect.get(error, field);
      if (typeof value === 'number') {
        return value;
      }
    }
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatus(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export function computeBackoffMs(attempt: number, baseDelayMs = DEFAULT_BASE_DELAY_MS): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly signal?: AbortSignal;
}

/**
 * Runs `fn`, retrying transient failures with exponential backoff and jitter.
 * Permanent failures and exhausted retries surface as LlmError; an aborted
 * signal rethrows its reason untouched.
 */
export async function withTransientRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await fn();
    } catch (error) {
      options.signal?.throwIfAborted();
      lastError = toError(error);

      if (!isTransientError(error)) {
        throw new LlmError(`${operation} failed: ${lastError.message}`, false, lastError);
      }

      log.warn(
        { operation, attempt: attempt + 1, maxAttempts, error: lastError.message },
        'Transient error, retrying',
      );

      if (attempt < maxAttempts - 1) {
        await sleep(computeBackoffMs(attempt, baseDelayMs));
      }
    }
  }

  throw new LlmError(
    `${operation} failed after ${String(maxAttempts)} attempts: ${lastError?.message ?? 'unknown error'}`,
    true,
    lastError,
  );
}
