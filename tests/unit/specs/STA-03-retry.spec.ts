/**
 * STA-03: DynamoDB Retry
 *
 * Throttling and 5xx errors are retried with backoff; anything else is
 * rethrown on the first attempt.
 */

import { describe, it, expect, vi } from 'vitest';
import { calculateDelay, isRetryableError, withRetry } from '@sso-login/shared';

const FAST = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

function awsError(name: string, httpStatusCode?: number): Error {
  const error = new Error(name);
  error.name = name;
  if (httpStatusCode !== undefined) {
    Object.assign(error, { $metadata: { httpStatusCode } });
  }
  return error;
}

describe('STA-03: DynamoDB Retry', () => {
  it('should classify throttling and server errors as retryable', () => {
    expect(isRetryableError(awsError('ProvisionedThroughputExceededException'))).toBe(true);
    expect(isRetryableError(awsError('SomethingElse', 503))).toBe(true);
    expect(isRetryableError(awsError('ConditionalCheckFailedException', 400))).toBe(false);
    expect(isRetryableError('not an error')).toBe(false);
  });

  it('should cap the delay at the configured maximum', () => {
    for (let attempt = 0; attempt < 10; attempt++) {
      const delay = calculateDelay(attempt, { maxRetries: 10, baseDelayMs: 50, maxDelayMs: 1000 });
      expect(delay).toBeGreaterThanOrEqual(0);
      expect(delay).toBeLessThan(1000);
    }
  });

  it('should retry a throttled operation until it succeeds', async () => {
    const operation = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(awsError('ThrottlingException'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, FAST)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured retries', async () => {
    const operation = vi.fn<[], Promise<string>>().mockRejectedValue(awsError('ThrottlingException'));

    await expect(withRetry(operation, FAST)).rejects.toThrow('ThrottlingException');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry other errors', async () => {
    const operation = vi.fn<[], Promise<string>>().mockRejectedValue(awsError('ConditionalCheckFailedException', 400));

    await expect(withRetry(operation, FAST)).rejects.toThrow('ConditionalCheckFailedException');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
