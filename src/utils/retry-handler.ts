import { setTimeout as delay } from 'timers/promises';
import logger from './logger';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export type StatusClass = 'success' | 'retryable' | 'fatal';

/** Largest delay Node timers honour; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];

/**
 * Wait time before retrying after failed attempt `attempt` (1-based). Walks the
 * schedule and then holds at its last entry. No jitter is applied.
 */
export function delayForAttempt(attempt: number, schedule: readonly number[]): number {
  if (schedule.length === 0) {
    throw new Error('Backoff schedule must contain at least one delay');
  }
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new Error(`Attempt must be a positive integer, got ${attempt}`);
  }

  return schedule[Math.min(attempt - 1, schedule.length - 1)];
}

export function classifyStatus(statusCode: number, successStatuses: readonly number[]): StatusClass {
  if (successStatuses.includes(statusCode)) {
    return 'success';
  }
  if (RETRYABLE_STATUS_CODES.includes(statusCode)) {
    return 'retryable';
  }
  // 401/403/404/413 and anything unrecognised: backoff cannot fix these.
  return 'fatal';
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(Math.min(ms, MAX_TIMER_DELAY_MS), undefined, { signal });
}

export interface RetryOptions<T> {
  maxAttempts: number;
  schedule: readonly number[];
  shouldRetry: (result: T) => boolean;
  sleep?: Sleeper;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, result: T) => void;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

/**
 * Runs `fn` until it yields a result `shouldRetry` rejects or the attempt
 * budget is spent. `fn` reports failures as values; exceptions it throws
 * propagate untouched. The last result is returned either way.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<RetryResult<T>> {
  const { maxAttempts, schedule, shouldRetry, onRetry, signal } = options;
  const wait = options.sleep ?? sleep;

  if (maxAttempts < 1) {
    throw new Error(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  let attempt = 1;
  for (;;) {
    const result = await fn(attempt);

    if (!shouldRetry(result) || attempt >= maxAttempts) {
      return { result, attempts: attempt };
    }

    const delayMs = delayForAttempt(attempt, schedule);

    logger.warn(`Retry attempt ${attempt}/${maxAttempts} failed, waiting ${delayMs}ms`);

    if (onRetry) {
      onRetry(attempt, delayMs, result);
    }

    await wait(delayMs, signal);
    attempt++;
  }
}
