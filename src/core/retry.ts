/**
 * Bounded retry policy for external calls: per-attempt timeout,
 * exponential backoff, and retryable error classification.
 *
 * A timed-out attempt is treated exactly like any other retryable failure.
 * Each attempt gets its own AbortSignal, aborted when that attempt times out.
 */
import { TimeoutError, toError } from "./errors.js";
import type { Logger } from "../utils/logger.js";

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout. 0 disables it. */
  timeoutMs: number;
}

export interface RetryOptions {
  label: string;
  isRetryable?: (error: Error) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_CLASSIFIER_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  timeoutMs: 60_000,
};

export const DEFAULT_EXECUTION_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
  timeoutMs: 30_000,
};

export const DEFAULT_TRANSPORT_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4_000,
  timeoutMs: 60_000,
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Run `fn` under `policy`. Resolves with the first successful result;
 * rejects with a RetryExhaustedError carrying the last error otherwise.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);
  let lastError: Error = new Error(`${options.label} was not attempted`);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await withTimeout(fn, policy.timeoutMs, options.label);
    } catch (err) {
      lastError = toError(err);

      if (attempt < attempts && isRetryable(lastError)) {
        const delay = backoffDelay(policy, attempt);
        logger.debug(
          {
            operation: options.label,
            attempt,
            delay,
            error: lastError.message,
          },
          "Retrying after failure"
        );
        await sleep(delay);
        continue;
      }

      throw new RetryExhaustedError(options.label, attempt, lastError);
    }
  }

  throw new RetryExhaustedError(options.label, attempts, lastError);
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(label: string, attempts: number, lastError: Error) {
    super(`${label} failed after ${attempts} attempt(s): ${lastError.message}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) return fn(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      fn(controller.signal),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(label, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function defaultSleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Model calls: retry everything except credential and permission errors. */
export function isRetryableModelError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const status = "status" in error ? error.status : undefined;

  if (status === 401 || status === 403) return false;
  if (
    message.includes("401") ||
    message.includes("unauthorized") ||
    message.includes("invalid api key") ||
    message.includes("authentication")
  ) {
    return false;
  }
  return true;
}
