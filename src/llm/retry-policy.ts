// src/llm/retry-policy.ts

/**
 * @file Retry policy for model calls: exponential backoff with jitter, capped,
 * honouring (but never exceeding the cap for) provider `Retry-After` hints.
 */

import { ConfigurationError } from '../core/errors';

/** Scales a raw backoff delay using a random source in [0, 1). */
export type JitterFunction = (delayMs: number, random: () => number) => number;

export interface RetryPolicy {
  /** Attempts per model, the first call included. */
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  /** Upper bound for any single delay, provider hints included. */
  capMs: number;
  retryableStatuses: readonly number[];
  jitter: JitterFunction;
}

/** Keeps between 50% and 100% of the raw delay. */
export const equalJitter: JitterFunction = (delayMs, random) => delayMs * (0.5 + random() * 0.5);

export const noJitter: JitterFunction = (delayMs) => delayMs;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  backoffFactor: 2,
  capMs: 30_000,
  retryableStatuses: [429, 500, 502, 503, 504],
  jitter: equalJitter,
};

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigurationError('RetryPolicy.maxAttempts must be a positive integer.', {
      maxAttempts: policy.maxAttempts,
    });
  }
  if (policy.baseDelayMs < 0 || policy.capMs < 0) {
    throw new ConfigurationError('RetryPolicy delays must not be negative.');
  }
  if (policy.backoffFactor < 1) {
    throw new ConfigurationError('RetryPolicy.backoffFactor must be at least 1.');
  }
  return policy;
}

/**
 * Backoff delay before retry number `retryIndex` (0 for the first retry), after
 * jitter and the cap.
 */
export function computeBackoffDelay(policy: RetryPolicy, retryIndex: number, random: () => number = Math.random): number {
  const raw = policy.baseDelayMs * Math.pow(policy.backoffFactor, retryIndex);
  return Math.min(policy.capMs, Math.max(0, policy.jitter(raw, random)));
}

export function isRetryableStatus(policy: RetryPolicy, status: number | undefined): boolean {
  return status !== undefined && policy.retryableStatuses.includes(status);
}

/**
 * Parses a `Retry-After` header value (delta seconds or an HTTP date) into
 * milliseconds. Returns undefined when the value is missing or unreadable.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Delay sequence for one request. Delays never decrease from one retry to the
 * next and never exceed `policy.capMs`.
 */
export class BackoffSchedule {
  private lastDelayMs = 0;
  private retries = 0;

  constructor(
    private readonly policy: RetryPolicy,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Delay before the next retry. A provider hint replaces the computed backoff
   * but is still clamped to the cap.
   */
  next(retryAfterMs?: number): number {
    const computed =
      retryAfterMs !== undefined && retryAfterMs >= 0
        ? retryAfterMs
        : computeBackoffDelay(this.policy, this.retries, this.random);
    const delayMs = Math.min(this.policy.capMs, Math.max(this.lastDelayMs, computed));
    this.lastDelayMs = delayMs;
    this.retries++;
    return delayMs;
  }

  get retryCount(): number {
    return this.retries;
  }
}
