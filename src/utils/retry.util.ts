// Retry utility with exponential backoff and jitter

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.1 = 10% jitter)
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

/** Non-2xx HTTP response from an upstream API. */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelay);

  // Add jitter: randomize ±jitterFactor
  const jitterRange = cappedDelay * options.jitterFactor;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;

  return Math.max(0, cappedDelay + jitter);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or
 * `maxRetries` retries are used up. An aborted `signal` stops retrying and
 * rethrows the abort reason.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  isRetryable: (error: Error) => boolean,
  signal?: AbortSignal
): Promise<T> {
  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (signal?.aborted || !isRetryable(lastError)) {
        throw lastError;
      }

      // Don't delay after last attempt
      if (attempt < options.maxRetries) {
        await sleep(calculateDelay(attempt, options), signal);
      }
    }
  }

  throw new RetryExhaustedError(
    `Operation failed after ${options.maxRetries + 1} attempts`,
    options.maxRetries + 1,
    lastError
  );
}

// Common retry predicates
export function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('fetch failed') ||
    message.includes('network')
  );
}

export function isHttpRetryable(statusCode?: number): boolean {
  if (!statusCode) return false;
  return (
    statusCode === 429 ||  // Too Many Requests
    statusCode >= 500      // Server errors
  );
}
