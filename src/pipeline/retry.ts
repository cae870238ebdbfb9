/**
 * Retry wrapper with exponential backoff.
 *
 * withRetry() decorates any async function; stages compose it onto their
 * work function instead of inheriting retry behavior.
 *
 * Usage:
 * ```typescript
 * const execute = withRetry(deployBackend, {
 *   maxAttempts: 3,
 *   baseDelayMs: 1000,
 *   label: "backend",
 *   logger,
 * });
 * ```
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logging/index.js";
import { errorMessage, NonRetryableError } from "./errors.js";

export interface RetryOptions {
  /** Total attempts including the first (1 = no retry) */
  maxAttempts: number;
  /** Delay unit; the wait after attempt n is baseDelayMs * 2^n */
  baseDelayMs: number;
  /** Cap on a single wait */
  maxDelayMs?: number;
  /** Name used in log entries */
  label?: string;
  logger?: Logger;
  /** Defaults to "anything but a NonRetryableError" */
  isRetryable?: (err: unknown) => boolean;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_DELAY_MS = 60_000;

export function isRetryableError(err: unknown): boolean {
  return !(err instanceof NonRetryableError);
}

/**
 * Delay after a failed attempt (1-based).
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number = DEFAULT_MAX_DELAY_MS
): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Wrap an async function so that thrown, retryable errors trigger another
 * attempt. Intermediate failures are logged; only the last error propagates.
 * A resolved value (including a resolved "failed" outcome) is returned as is.
 */
export function withRetry<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: RetryOptions
): (...args: A) => Promise<R> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const isRetryable = options.isRetryable ?? isRetryableError;
  const wait = options.sleep ?? ((ms: number) => sleep(ms));
  const label = options.label ?? (fn.name || "operation");

  return async (...args: A): Promise<R> => {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(...args);
      } catch (err) {
        if (attempt >= maxAttempts || !isRetryable(err)) {
          throw err;
        }
        const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
        options.logger?.warn(`${label} attempt ${attempt}/${maxAttempts} failed, retrying`, {
          error: errorMessage(err),
          delayMs,
        });
        await wait(delayMs);
      }
    }
  };
}
