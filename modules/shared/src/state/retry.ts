/**
 * SSO Login - DynamoDB Retry
 *
 * Exponential backoff with full jitter for throttled or transient DynamoDB
 * failures. Every other error is rethrown on the first attempt.
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

export interface RetryConfig {
    /** Attempts after the first one */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelayMs: 50,
    maxDelayMs: 1000,
};

const RETRYABLE_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
]);

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/**
 * Whether an AWS SDK v3 error is worth retrying.
 */
export function isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    if (RETRYABLE_ERROR_NAMES.has(error.name)) {
        return true;
    }

    const metadata: unknown = Reflect.get(error, '$metadata');
    if (typeof metadata === 'object' && metadata !== null) {
        const status: unknown = Reflect.get(metadata, 'httpStatusCode');
        return typeof status === 'number' && RETRYABLE_STATUS_CODES.has(status);
    }
    return false;
}

/**
 * Delay before retry `attempt` (0-indexed): uniform in [0, min(max, base * 2^attempt)).
 */
export function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
    const ceiling = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
    return Math.floor(Math.random() * ceiling);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= config.maxRetries || !isRetryableError(error)) {
                throw error;
            }
            await sleep(calculateDelay(attempt, config));
        }
    }
}
