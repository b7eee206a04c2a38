import { HttpError, isHttpRetryable, isNetworkError, retryWithBackoff, RetryExhaustedError, RetryOptions } from './retry.util';

describe('retryWithBackoff', () => {
  const options: RetryOptions = { maxRetries: 2, baseDelay: 0, maxDelay: 0, jitterFactor: 0 };

  // Test: Retryable failures are retried until success
  it('should return the first successful result after retryable failures', async () => {
    // Arrange: Fails twice with a network error, then succeeds
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('network down'))
      .mockRejectedValueOnce(new Error('network down'))
      .mockResolvedValueOnce('ok');

    // Act
    const result = await retryWithBackoff(operation, options, isNetworkError);

    // Assert
    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  // Test: Non-retryable errors are rethrown immediately
  it('should rethrow a non-retryable error without retrying', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('bad request'));

    await expect(retryWithBackoff(operation, options, isNetworkError)).rejects.toThrow('bad request');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  // Test: Exhaustion carries attempt count and last error
  it('should throw RetryExhaustedError when every attempt fails', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('timeout while connecting'));

    const error = await retryWithBackoff(operation, options, isNetworkError).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError.message).toBe('timeout while connecting');
    }
    expect(operation).toHaveBeenCalledTimes(3);
  });

  // Test: Aborted signal stops before the first attempt
  it('should not call the operation when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('caller went away'));
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(retryWithBackoff(operation, options, isNetworkError, controller.signal)).rejects.toThrow('caller went away');
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('retry predicates', () => {
  it('should treat 429 and 5xx as retryable HTTP statuses', () => {
    expect(isHttpRetryable(429)).toBe(true);
    expect(isHttpRetryable(503)).toBe(true);
    expect(isHttpRetryable(404)).toBe(false);
    expect(isHttpRetryable(undefined)).toBe(false);
  });

  it('should carry the status code on HttpError', () => {
    const error = new HttpError('HTTP 502: Bad Gateway', 502);

    expect(error.statusCode).toBe(502);
    expect(error.name).toBe('HttpError');
  });
});
