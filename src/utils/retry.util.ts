import { logger } from '../config/logger';
import { ParseError, UpstreamError, errorMessage } from '../errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    // Stops further attempts, including a backoff wait in progress
    signal?: AbortSignal;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

/**
 * Retry Utility
 *
 * Retries transient upstream failures with exponential backoff. Errors the
 * Language-Model Client already classified carry their own `retryable` flag;
 * anything else is judged by its code, status and message.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            signal
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay, signal);

                if (signal?.aborted) {
                    logger.warn({
                        operation: operationName,
                        attempt
                    }, `${operationName} abandoned, caller aborted`);
                    break;
                }
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError === null ? undefined : errorMessage(lastError)
        }, `${operationName} gave up`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (error instanceof UpstreamError) {
            return error.retryable;
        }

        if (error instanceof ParseError || typeof error !== 'object' || error === null) {
            return false;
        }

        const code = 'code' in error ? error.code : undefined;
        const status = 'status' in error ? error.status : undefined;
        const message = error instanceof Error ? error.message.toLowerCase() : '';

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        // Rate limits and server-side failures
        if (status === 408 || status === 409 || status === 429 || (typeof status === 'number' && status >= 500)) {
            return true;
        }

        return ['timeout', 'timed out', 'rate limit', 'connection', 'network']
            .some(fragment => message.includes(fragment));
    }

    /**
     * Sleep for specified milliseconds, waking early if the signal aborts
     */
    private static sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise(resolve => {
            if (signal?.aborted) {
                resolve();
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, ms);

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}
