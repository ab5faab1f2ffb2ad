import { logger } from '../config/logger';
import { errorMessage, ProviderError } from '../errors';
import { sleep } from './async.util';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    /** Randomize each delay in [0, delay] ("full jitter"). */
    jitter?: boolean;
    operationName?: string;
    signal?: AbortSignal;
    isRetryable?: (error: unknown) => boolean;
    random?: () => number;
}

/**
 * Retry Utility
 *
 * Retry logic with exponential backoff and optional jitter for calls to
 * external providers and stores.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            jitter = false,
            operationName = 'operation',
            signal,
            isRetryable = RetryUtil.isRetryableError,
            random = Math.random
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            signal?.throwIfAborted();
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation(attempt);

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;
                const retryable = isRetryable(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts || signal?.aborted) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = RetryUtil.computeDelay(attempt, { baseDelay, maxDelay, backoffMultiplier, jitter, random });

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await sleep(delay, signal);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: errorMessage(lastError)
        }, `${operationName} failed after retries`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Exponential delay for the given (1-based) attempt, capped at maxDelay.
     */
    static computeDelay(
        attempt: number,
        options: { baseDelay: number; maxDelay: number; backoffMultiplier: number; jitter: boolean; random: () => number }
    ): number {
        const capped = Math.min(
            options.baseDelay * Math.pow(options.backoffMultiplier, attempt - 1),
            options.maxDelay
        );
        return options.jitter ? Math.floor(options.random() * capped) : capped;
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (error instanceof ProviderError) {
            return error.retryable;
        }
        if (!(error instanceof Error)) {
            return false;
        }

        const code = 'code' in error ? error.code : undefined;
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        const status = 'status' in error ? error.status : undefined;
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        const message = error.message.toLowerCase();
        return message.includes('timeout') ||
            message.includes('rate limit') ||
            message.includes('connection') ||
            message.includes('network');
    }
}
