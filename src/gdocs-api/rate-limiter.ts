/**
 * Rate limiting for Docs API calls.
 *
 * A token bucket (default 5 requests per second) paces outgoing calls and
 * {@link withRetry} retries 429 / 5xx failures with jittered exponential
 * backoff, honouring a server-provided `Retry-After` delay when present.
 */

/**
 * Token bucket rate limiter.
 *
 * Tokens are refilled to `maxTokens` every `refillIntervalMs` milliseconds.
 * Callers must {@link acquire} a token before making an API call.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillIntervalMs: number;

  constructor(maxTokens = 5, refillIntervalMs = 1000) {
    if (maxTokens < 1) {
      throw new RangeError(`maxTokens must be at least 1, got ${maxTokens}`);
    }
    this.maxTokens = maxTokens;
    this.refillIntervalMs = refillIntervalMs;
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Acquire a single token, waiting for the next refill if the bucket is empty.
   */
  async acquire(): Promise<void> {
    this.refill();
    while (this.tokens <= 0) {
      const waitMs = Math.max(this.refillIntervalMs - (Date.now() - this.lastRefill), 1);
      await sleep(waitMs);
      this.refill();
    }
    this.tokens--;
  }

  /** Number of tokens currently available without waiting. */
  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    if (now - this.lastRefill >= this.refillIntervalMs) {
      this.tokens = this.maxTokens;
      this.lastRefill = now;
    }
  }
}

// --- Exponential Backoff Retry ---

/** Facts about a failed attempt that drive the retry decision. */
export interface RetryInfo {
  /** HTTP status, or `undefined` for non-HTTP failures (never retried). */
  status: number | undefined;
  /** Server-requested delay, overriding the computed backoff. */
  retryAfterMs?: number;
}

/**
 * Options controlling retry behaviour.
 */
export interface RetryOptions {
  /** Maximum retries for HTTP 429 (Too Many Requests). Default: 4. */
  maxRetries429?: number;
  /** Maximum retries for HTTP 5xx (Server Error). Default: 3. */
  maxRetries5xx?: number;
  /** Base delay in ms before first 429 retry. Default: 1000. */
  baseDelay429Ms?: number;
  /** Base delay in ms before first 5xx retry. Default: 2000. */
  baseDelay5xxMs?: number;
  /** Called before each retry sleep. */
  onRetry?: (info: RetryInfo, attempt: number, delayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS = {
  maxRetries429: 4,
  maxRetries5xx: 3,
  baseDelay429Ms: 1000,
  baseDelay5xxMs: 2000,
};

/**
 * Execute `fn` with exponential-backoff retry for transient errors.
 *
 * - **429**: retries up to `maxRetries429` times with delays 1s, 2s, 4s, 8s ...
 * - **5xx**: retries up to `maxRetries5xx` times with delays 2s, 4s, 8s ...
 * - **4xx (except 429)** and non-HTTP errors: rethrown immediately.
 *
 * @param fn - The async operation to execute.
 * @param classify - Extract retry facts from a caught error.
 * @param options - Override default retry parameters.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  classify: (error: unknown) => RetryInfo,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let attempt429 = 0;
  let attempt5xx = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const info = classify(error);
      const { status } = info;
      let delay: number;

      if (status === 429 && attempt429 < opts.maxRetries429) {
        delay = info.retryAfterMs ?? jitter(opts.baseDelay429Ms * Math.pow(2, attempt429));
        attempt429++;
      } else if (status !== undefined && status >= 500 && attempt5xx < opts.maxRetries5xx) {
        delay = info.retryAfterMs ?? jitter(opts.baseDelay5xxMs * Math.pow(2, attempt5xx));
        attempt5xx++;
      } else {
        throw error;
      }

      opts.onRetry?.(info, attempt429 + attempt5xx, delay);
      await sleep(delay);
    }
  }
}

/**
 * Parse a `Retry-After` header value (delta seconds or HTTP date) to ms.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(seconds * 1000, 0);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(date - now, 0);
}

function jitter(baseDelay: number): number {
  return baseDelay * (0.5 + Math.random() * 0.5);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
