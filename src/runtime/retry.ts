/**
 * Retry Policies
 * Bounded exponential backoff around a single fallible operation
 */

import {
  ConfigurationError,
  errorMessage,
  isRetryableError,
} from "../errors";
import { noopSink, type EventSink } from "./events";

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the first retry, in milliseconds */
  initialDelay: number;
  /** Upper bound for a single delay, in milliseconds (default: none) */
  maxDelay?: number;
  /** Backoff multiplier (e.g., 2 for exponential backoff) */
  backoffMultiplier: number;
  /** Random extra delay of up to this many milliseconds */
  jitter?: number;
  /** Decide whether an error is worth another attempt */
  retryIf?: (error: unknown) => boolean;
}

export interface RetryContext {
  /** The attempt that just failed (1-indexed) */
  attempt: number;
  /** Error from that attempt */
  lastError: string;
  /** Delay before the next attempt (ms) */
  delay: number;
  /** Total time spent waiting so far (ms) */
  totalDelay: number;
}

export interface RetryOptions {
  /** Name reported in retry and failure events */
  source?: string;
  /** Lineage tag reported in events */
  tag?: string;
  sink?: EventSink;
  signal?: AbortSignal;
  onRetry?: (context: RetryContext) => void;
  /** Replaces the timer, mostly for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelay: 1000,
  backoffMultiplier: 2,
  jitter: 0,
};

/**
 * Reject policies the backoff loop cannot honor
 */
export function assertRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigurationError(
      `maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`,
      { field: "maxAttempts" },
    );
  }
  if (!Number.isFinite(policy.initialDelay) || policy.initialDelay < 0) {
    throw new ConfigurationError(
      `initialDelay must be >= 0, got ${policy.initialDelay}`,
      { field: "initialDelay" },
    );
  }
  if (
    !Number.isFinite(policy.backoffMultiplier) ||
    policy.backoffMultiplier < 1
  ) {
    throw new ConfigurationError(
      `backoffMultiplier must be >= 1, got ${policy.backoffMultiplier}`,
      { field: "backoffMultiplier" },
    );
  }
  if (policy.maxDelay !== undefined && !(policy.maxDelay >= 0)) {
    throw new ConfigurationError(
      `maxDelay must be >= 0, got ${policy.maxDelay}`,
      { field: "maxDelay" },
    );
  }
  if (
    policy.jitter !== undefined &&
    (!Number.isFinite(policy.jitter) || policy.jitter < 0)
  ) {
    throw new ConfigurationError(`jitter must be >= 0, got ${policy.jitter}`, {
      field: "jitter",
    });
  }
}

/**
 * Calculate delay after a failed attempt (1-indexed)
 */
export function calculateDelay(policy: RetryPolicy, attempt: number): number {
  const baseDelay = Math.min(
    policy.initialDelay * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelay ?? Number.POSITIVE_INFINITY,
  );

  if (policy.jitter) {
    return baseDelay + Math.random() * policy.jitter;
  }

  return baseDelay;
}

/**
 * Sleep utility for delays
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run an operation under a policy and report how it went
 */
export async function attemptWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
  assertRetryPolicy(policy);

  const sink = options.sink ?? noopSink;
  const source = options.source ?? "operation";
  const wait = options.sleep ?? sleep;
  const retryIf = policy.retryIf ?? isRetryableError;
  let totalDelay = 0;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (e) {
      if (attempt >= policy.maxAttempts || !retryIf(e)) {
        sink({
          type: "failure",
          source,
          tag: options.tag,
          attempts: attempt,
          error: errorMessage(e),
        });
        return { ok: false, error: e, attempts: attempt };
      }

      const delay = calculateDelay(policy, attempt);
      totalDelay += delay;

      sink({
        type: "retry",
        source,
        tag: options.tag,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        error: errorMessage(e),
      });
      options.onRetry?.({
        attempt,
        lastError: errorMessage(e),
        delay,
        totalDelay,
      });

      options.signal?.throwIfAborted();
      await wait(delay, options.signal);
    }
  }
}

/**
 * Execute a function with retry logic. The last error is rethrown as-is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions | ((context: RetryContext) => void) = {},
): Promise<T> {
  const resolved =
    typeof options === "function" ? { onRetry: options } : options;
  const outcome = await attemptWithRetry(fn, policy, resolved);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

/**
 * Create a custom retry policy
 */
export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  const policy = {
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
  };
  assertRetryPolicy(policy);
  return policy;
}

export interface NoGreeOptions {
  /** Extra attempts after the first one (default 3) */
  retries?: number;
  /** Delay before the first retry in ms (default 1000) */
  initialDelay?: number;
  backoffMultiplier?: number;
  /** Name reported in events, defaults to the function's name */
  name?: string;
  sink?: EventSink;
}

/**
 * Wrap an async function so every call retries with backoff.
 * `retries` counts extra attempts, so `retries: 2` means three calls at most.
 */
export function noGree(options: NoGreeOptions = {}) {
  const policy = createRetryPolicy({
    maxAttempts: (options.retries ?? 3) + 1,
    initialDelay: options.initialDelay ?? 1000,
    backoffMultiplier: options.backoffMultiplier ?? 2,
  });

  return <This, A extends unknown[], T>(
    fn: (this: This, ...args: A) => Promise<T>,
  ) =>
    function (this: This, ...args: A): Promise<T> {
      return withRetry(() => fn.apply(this, args), policy, {
        source: options.name ?? (fn.name || "anonymous"),
        sink: options.sink,
      });
    };
}

/**
 * Common retry policies
 */
export const RETRY_POLICIES = {
  /** No retries */
  none: createRetryPolicy({ maxAttempts: 1 }),

  /** Fast retry for transient errors (3 attempts, 250ms initial delay) */
  fast: createRetryPolicy({
    maxAttempts: 3,
    initialDelay: 250,
    maxDelay: 2000,
    backoffMultiplier: 2,
  }),

  /** Standard retry (3 attempts, 1s initial delay) */
  standard: DEFAULT_RETRY_POLICY,

  /** Patient retry for rate-limited APIs (8 attempts, 2s initial delay) */
  patient: createRetryPolicy({
    maxAttempts: 8,
    initialDelay: 2000,
    maxDelay: 60000,
    backoffMultiplier: 1.5,
  }),
};
