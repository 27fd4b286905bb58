/**
 * Retry wrapper for planner calls
 */

import { PlanningUnavailableError } from '../errors';
import { loggers } from '../utils/logger';

const log = loggers.planner;

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Exponential backoff with ±25% jitter: initial, 2x, 4x, ... capped
 */
export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number = 30000): number {
  const exponentialDelay = initialDelayMs * Math.pow(2, attempt);
  const baseDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = baseDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.floor(baseDelay + jitter);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a planner operation, retrying failures; throws PlanningUnavailableError
 * once the attempts are used up
 */
export async function withPlanningRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt + 1 >= options.maxAttempts) break;

      const delayMs = backoffDelay(attempt, options.initialDelayMs, options.maxDelayMs);
      log.warn({
        operation,
        attempt: attempt + 1,
        maxAttempts: options.maxAttempts,
        delayMs,
        errorMessage: error instanceof Error ? error.message : String(error),
      }, `Planner ${operation} failed, retrying in ${delayMs}ms`);
      await sleep(delayMs);
    }
  }

  log.error({ operation, attempts: options.maxAttempts }, `Planner ${operation} unavailable`);
  throw new PlanningUnavailableError(options.maxAttempts, lastError);
}
