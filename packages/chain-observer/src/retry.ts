/**
 * Retry with exponential backoff.
 *
 * Shared by the reconnect supervisor, reply submission and the
 * analysis step of the monitor loop.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

/**
 * Delay shape shared by every backoff in the node.
 */
export interface BackoffConfig {
  /** Base delay in ms before first retry. Default: 1000 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 30000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig extends BackoffConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Called before sleeping between attempts.
 */
export type RetryListener = (err: unknown, attempt: number, delayMs: number) => void;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: BackoffConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute a function with retry on failure.
 *
 * @param shouldRetry - Predicate to determine if an error is retryable (default: all errors)
 * @param sleepFn - Sleep function (injectable for testing)
 * @param onRetry - Notified before each sleep with the one-based attempt that failed
 * @throws RetryExhaustedError if all attempts fail
 * @throws The failing error itself when shouldRetry returns false
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
  onRetry?: RetryListener,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // Last attempt: fall through to throw without sleeping
      if (attempt < config.maxAttempts - 1) {
        const delay = computeDelay(attempt, config);
        onRetry?.(err, attempt + 1, delay);
        await sleepFn(delay);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/**
 * Default XRPL retry predicate.
 *
 * Returns true for transient/network errors that may succeed on retry.
 * Returns false for permanent errors that will never succeed.
 */
export function isRetryableXrplError(err: unknown): boolean {
  if (!(err instanceof Error)) return true;

  const msg = err.message.toLowerCase();

  const permanentPatterns = [
    "tembad",         // temBAD_AMOUNT, temBAD_FEE, etc.
    "tefinvalid",
    "tefdst_tag",     // tefDST_TAG_NEEDED
    "tecno_dst",      // destination account does not exist
    "tecpath_dry",    // no trust line / liquidity for the token
    "tecunfunded",
    "temmalformed",
    "temredundant",
    "not connected",  // caller should reconnect, not retry blindly
  ];

  for (const pattern of permanentPatterns) {
    if (msg.includes(pattern)) return false;
  }

  return true;
}
