/**
 * Axios retry helper
 *
 * Retries on network errors, timeouts and 5xx responses with exponential
 * backoff. 4xx client errors are thrown immediately.
 */

import axios from 'axios';
import type { Logger } from 'pino';

export interface RetryOptions {
    /** Retries after the first attempt */
    retries: number;
    /** Delay before the first retry; doubles each retry */
    initialDelayMs: number;
    logger: Logger;
}

const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'ERR_NETWORK']);

/**
 * Whether a failed request is worth repeating
 */
export function isRetryableRequestError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;

    const status = error.response?.status;
    if (status !== undefined) {
        return status >= 500;
    }
    return error.code === undefined || RETRYABLE_CODES.has(error.code);
}

/**
 * Execute an axios request with retry logic and exponential backoff.
 */
export async function axiosWithRetry<T>(
    requestFn: () => Promise<T>,
    context: string,
    options: RetryOptions
): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= options.retries; attempt++) {
        try {
            return await requestFn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            // Don't retry on 4xx client errors (bad request, auth failed, etc.)
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            if (status !== undefined && status >= 400 && status < 500) {
                options.logger.warn({ context, status, attempt }, 'ERP client error - not retrying');
                throw lastError;
            }

            const isRetryable = isRetryableRequestError(error);
            if (!isRetryable || attempt === options.retries) {
                options.logger.error({ context, error: lastError.message, attempt, isRetryable }, 'ERP request failed');
                throw lastError;
            }

            const delay = options.initialDelayMs * Math.pow(2, attempt);
            options.logger.warn({ context, error: lastError.message, attempt, nextRetryMs: delay }, 'ERP request failed - retrying');
            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }

    throw lastError ?? new Error('Request failed after retries');
}
