import { RunTimeoutError, TransientIOError, errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { sleep as defaultSleep } from './utils.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  policy: RetryPolicy;
  /** Operation name for logs. */
  label: string;
  /** Epoch ms after which no new attempt or backoff may start. */
  deadline?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * policy.factor ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientIOError && !(err instanceof RunTimeoutError);
}

/**
 * Run `fn`, retrying TransientIOError with exponential backoff.
 * Any other error, or the last transient one, propagates unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, label, deadline } = options;
  const log = options.logger ?? rootLogger;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  for (let attempt = 1; ; attempt += 1) {
    if (deadline !== undefined && now() >= deadline) {
      throw new RunTimeoutError(`Run deadline exceeded before ${label}`, { label, attempt });
    }

    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err) || attempt >= policy.maxAttempts) {
        throw err;
      }

      const delayMs = backoffDelay(policy, attempt);
      if (deadline !== undefined && now() + delayMs >= deadline) {
        throw new RunTimeoutError(`Run deadline leaves no time to retry ${label}`, {
          label,
          attempt,
          cause: errorMessage(err),
        });
      }

      log.warn(
        { op: label, attempt, maxAttempts: policy.maxAttempts, delayMs, error: errorMessage(err) },
        'Transient failure, retrying',
      );
      await sleep(delayMs);
    }
  }
}
