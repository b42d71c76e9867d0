import { setTimeout as sleep } from 'timers/promises';
import { invalidArgument, isDispatchError, type DispatchErrorKind } from './errors';
import { noopLogger } from './logger';
import type { Logger } from './types';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Error kinds worth another attempt. */
  retryOn?: readonly DispatchErrorKind[];
  logger?: Logger;
  /** Stops waiting between attempts; the pending attempt is not retried. */
  signal?: AbortSignal;
}

const DEFAULT_BASE_DELAY_MS = 250;
const DEFAULT_MAX_DELAY_MS = 10_000;
const DEFAULT_RETRY_ON: readonly DispatchErrorKind[] = ['timeout', 'transport_error', 'server_error'];

/**
 * Caller-side retry for a single dispatch operation.
 *
 * The dispatcher never retries on its own; callers that want retries wrap the
 * call here with an explicit attempt budget. Only DispatchErrors whose kind is
 * listed in `retryOn` are retried, anything else is rethrown immediately.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw invalidArgument(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const retryOn = policy.retryOn ?? DEFAULT_RETRY_ON;
  const logger = policy.logger ?? noopLogger;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = isDispatchError(error) && retryOn.includes(error.kind);
      if (!retryable || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delayMs = computeBackoff(baseDelayMs, maxDelayMs, attempt);
      logger.warn('dispatch.retry', { attempt, maxAttempts: policy.maxAttempts, delayMs, kind: error.kind });
      await sleep(delayMs, undefined, policy.signal ? { signal: policy.signal } : undefined);
    }
  }
}

export function computeBackoff(baseMs: number, maxMs: number, attempt: number): number {
  const exp = baseMs * 2 ** (attempt - 1);
  const jitter = Math.random() * baseMs;
  return Math.min(exp + jitter, maxMs);
}
