// ── Retry with Exponential Backoff + Jitter ──────────────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts after the first call (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000); doubles each retry */
  baseDelayMs?: number;
  /** Upper bound for a single backoff delay (default: 15000) */
  maxDelayMs?: number;
  /** Which HTTP status codes should trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "LLM call") */
  label?: string;
  /** Stops further attempts once aborted */
  signal?: AbortSignal;
  /** Injected for tests; rejects with the abort reason once `signal` aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, "signal">> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15_000,
  retryableStatuses: [408, 409, 429, 500, 502, 503, 504],
  label: "API call",
  sleep,
  random: Math.random,
};

/**
 * Wraps an async function with exponential backoff retry logic.
 * Only retries on network errors, timeouts or HTTP status codes in the
 * retryable list. Anything else is rethrown immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    maxDelayMs,
    retryableStatuses,
    label,
    sleep: wait,
    random,
  } = { ...DEFAULT_OPTIONS, ...opts };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    opts.signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error, retryableStatuses)) {
        throw error; // non-retryable; fail immediately
      }

      if (attempt === maxRetries || opts.signal?.aborted) {
        break; // exhausted all retries
      }

      const delayMs = backoffDelay(baseDelayMs, attempt, maxDelayMs, random);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying API call",
      );
      await wait(delayMs, opts.signal);
    }
  }

  throw lastError;
}

/** Full exponential delay, capped, scaled into [50%, 100%) by jitter. */
export function backoffDelay(
  baseDelayMs: number,
  attempt: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const capped = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  return Math.round(capped * (0.5 + random() * 0.5));
}

// ── Helpers ──────────────────────────────────────────────

const TRANSIENT_ERROR_NAMES = new Set([
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "TimeoutError",
]);

export function isRetryable(
  error: unknown,
  retryableStatuses: number[] = DEFAULT_OPTIONS.retryableStatuses,
): boolean {
  // Network errors (fetch failures, timeouts)
  if (error instanceof TypeError) return true;
  if (error instanceof Error) {
    if (TRANSIENT_ERROR_NAMES.has(error.name)) return true;
    if (error.message.includes("ECONNRESET")) return true;
    if (error.message.includes("ETIMEDOUT")) return true;
  }

  // HTTP status-based errors (OpenAI SDK wraps these)
  const status = getStatusCode(error);
  if (status !== undefined && retryableStatuses.includes(status)) return true;

  return false;
}

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null) {
    // OpenAI SDK errors have a `status` property
    if ("status" in error && typeof error.status === "number") {
      return error.status;
    }
    // Some errors have statusCode
    if ("statusCode" in error && typeof error.statusCode === "number") {
      return error.statusCode;
    }
  }
  return undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
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
