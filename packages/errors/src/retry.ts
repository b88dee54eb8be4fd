import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Stops further attempts once aborted; the last error is rethrown. */
  signal?: AbortSignal;
  /** Called before each backoff sleep. Defaults to a console warning. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Determines whether an error is retryable.
 * Client errors (4xx) are NOT retried; server errors (5xx) and network errors ARE retried.
 */
function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Does NOT retry on 4xx (client) errors -- only 5xx and network errors.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;
  const signal = options?.signal;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || signal?.aborted) {
        break;
      }

      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      if (options?.onRetry) {
        options.onRetry(attempt + 1, delay, error);
      } else {
        console.warn(
          `[retry] Attempt ${String(attempt + 1)}/${String(maxRetries)} failed, retrying in ${String(delay)}ms...`,
        );
      }
      await sleep(delay, signal);

      if (signal?.aborted) {
        break;
      }
    }
  }

  throw lastError;
}
