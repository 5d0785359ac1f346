import { isNetworkError, statusOf } from "./errors.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** "fixed" waits `baseDelayMs` every time, "exponential" doubles it. */
  backoff?: "fixed" | "exponential";
  retryOn?: (err: unknown) => boolean;
  /** Server-mandated wait for this error, used instead of the backoff (capped at `maxDelayMs`). */
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

function isRetryableError(err: unknown): boolean {
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  if (status && status >= 500 && status < 600) return true;
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const backoff = opts.backoff ?? "exponential";
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      const mandated = opts.retryAfterMs?.(err);
      const delay =
        mandated !== undefined
          ? Math.min(mandated, maxDelay)
          : backoff === "fixed"
            ? baseDelay
            : Math.min(baseDelay * 2 ** attempt, maxDelay);
      opts.onRetry?.(err, attempt + 1, delay);
      if (delay > 0) await sleep(delay);
    }
  }
  throw lastError;
}

/**
 * `Retry-After` (in seconds) carried by an HTTP error, as milliseconds.
 * Reads both fetch `Headers` and plain header records.
 */
export function retryAfterFromHeaders(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("headers" in err)) return undefined;
  const headers = err.headers;
  let value: string | null | undefined;
  if (headers instanceof Headers) {
    value = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    const raw = headers["retry-after"];
    value = typeof raw === "string" ? raw : undefined;
  }
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds * 1000;
}
