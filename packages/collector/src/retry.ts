/**
 * @lpvault/collector — Session retry.
 *
 * Launch and navigation may fail for reasons that clear on a second try
 * (slow network, a browser that did not start). Only SessionErrors are
 * retried; extraction and storage failures surface on the first attempt.
 *
 * The n-th failure waits min(baseDelayMs * 2^(n-1) + jitter, maxDelayMs).
 */

import { setTimeout as delay } from "node:timers/promises";
import { SessionError } from "./types.js";

export interface RetryPolicy {
  /** Attempts including the first. Default: 2 */
  readonly maxAttempts: number;
  /** Wait after the first failure. Default: 2000 */
  readonly baseDelayMs: number;
  /** Upper bound on any wait. Default: 10000 */
  readonly maxDelayMs: number;
  /** Upper bound on the random part of a wait. Default: 250 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  baseDelayMs: 2000,
  maxDelayMs: 10000,
  jitterMs: 250,
};

/**
 * Called before each wait with the number of failures so far.
 */
export type RetryListener = (failures: number, err: SessionError, delayMs: number) => void;

export interface RetryOptions {
  readonly policy?: RetryPolicy;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Source of jitter in [0, 1) */
  readonly random?: () => number;
  readonly onRetry?: RetryListener;
}

/**
 * Every attempt of a browser session failed.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: SessionError,
  ) {
    super(`Browser session failed ${attempts} times, last with: ${lastError.message}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Misuse (SESSION_NOT_OPEN) is a bug and never retried.
 */
export function isTransientSessionError(err: unknown): err is SessionError {
  return err instanceof SessionError && err.code !== "SESSION_NOT_OPEN";
}

export function backoffDelay(failures: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** (failures - 1);
  return Math.min(exponential + random() * policy.jitterMs, policy.maxDelayMs);
}

/**
 * Run `attempt` until it succeeds, fails permanently or runs out of tries.
 *
 * @throws {RetryExhaustedError} after `maxAttempts` transient failures
 * @throws the first error that is not a transient SessionError
 */
export async function retrySession<T>(attempt: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  for (let failures = 1; ; failures++) {
    try {
      return await attempt();
    } catch (err: unknown) {
      if (!isTransientSessionError(err)) {
        throw err;
      }
      if (failures >= policy.maxAttempts) {
        throw new RetryExhaustedError(failures, err);
      }

      const wait = backoffDelay(failures, policy, options.random);
      options.onRetry?.(failures, err, wait);
      await sleep(wait);
    }
  }
}
