/**
 * ERP HTTP Client
 * Reads ex-employee records from the remote ERP directory.
 *
 * - fetchAll(): bulk listing used by the cache refresh
 * - fetchOne(staffId): single lookup used when the cache misses
 *
 * Every call runs inside the `erp_api` circuit breaker, and each request is
 * retried on network errors and 5xx. Anything the ERP could not answer
 * surfaces as TransientRemoteError.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { EmployeeRecord } from '@regverify/shared';
import { erpLogger } from '../../utils/logger.js';
import { axiosWithRetry } from '../../utils/httpRetry.js';
import { CircuitBreakerOpenError, type CircuitBreaker } from '../../utils/circuitBreaker.js';
import { TransientRemoteError } from '../../utils/errors.js';
import { normalizeStaffId, parseEmployeePayload } from './erpRecordSchema.js';

// ============================================================================
// Contracts
// ============================================================================

/** Anything that can produce the full employee directory */
export interface EmployeeSource {
    fetchAll(): Promise<EmployeeRecord[]>;
}

/** Remote ERP: full listing plus point lookups */
export interface ErpRemote extends EmployeeSource {
    fetchOne(staffId: string): Promise<EmployeeRecord | null>;
}

export interface HttpErpClientOptions {
    baseUrl: string;
    endpoint: string;
    lookupEndpoint: string;
    timeoutMs: number;
    retryCount: number;
    retryDelayMs: number;
    apiKey?: string | null;
    basicAuth?: { username: string; password: string } | null;
    circuit: CircuitBreaker;
    /** Preconfigured axios instance; built from the options when omitted */
    http?: AxiosInstance;
}

// ============================================================================
// Error classification
// ============================================================================

/**
 * Convert a failed ERP call into a TransientRemoteError
 */
export function toTransientRemoteError(error: unknown, context: string): TransientRemoteError {
    if (error instanceof TransientRemoteError) {
        return error;
    }

    if (error instanceof CircuitBreakerOpenError) {
        const until = error.resetAt ? ` until ${error.resetAt.toISOString()}` : '';
        return new TransientRemoteError(`ERP circuit is open${until}`, error.circuitName, null, error);
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status ?? null;
        if (status !== null) {
            return new TransientRemoteError(`ERP ${context} failed with HTTP ${status}`, 'erp_api', status, error);
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new TransientRemoteError(`ERP ${context} timed out`, 'erp_api', null, error);
        }
        return new TransientRemoteError(`ERP ${context} failed: ${error.code ?? error.message}`, 'erp_api', null, error);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    return new TransientRemoteError(`ERP ${context} failed: ${cause.message}`, 'erp_api', null, cause);
}

// ============================================================================
// Client
// ============================================================================

export class HttpErpClient implements ErpRemote {
    private readonly http: AxiosInstance;
    private readonly options: HttpErpClientOptions;

    constructor(options: HttpErpClientOptions) {
        this.options = options;
        this.http = options.http ?? axios.create(HttpErpClient.buildAxiosConfig(options));
    }

    static buildAxiosConfig(options: HttpErpClientOptions): AxiosRequestConfig {
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (options.apiKey) {
            headers['X-API-Key'] = options.apiKey;
        }

        return {
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers,
            ...(options.basicAuth ? { auth: options.basicAuth } : {}),
        };
    }

    async fetchAll(): Promise<EmployeeRecord[]> {
        const startedAt = Date.now();

        try {
            const body = await this.options.circuit.execute(() =>
                axiosWithRetry(
                    async () => (await this.http.get<unknown>(this.options.endpoint)).data,
                    'fetchAll',
                    this.retryOptions()
                )
            );

            const { records, skipped } = parseEmployeePayload(body);
            erpLogger.info(
                { records: records.length, skipped, durationMs: Date.now() - startedAt },
                'Fetched ERP directory'
            );
            return records;
        } catch (error) {
            throw toTransientRemoteError(error, 'directory fetch');
        }
    }

    async fetchOne(staffId: string): Promise<EmployeeRecord | null> {
        const wanted = normalizeStaffId(staffId);

        try {
            const body = await this.options.circuit.execute(() =>
                axiosWithRetry(
                    async () => {
                        try {
                            const response = await this.http.get<unknown>(this.options.lookupEndpoint, {
                                params: { staffid: staffId.trim() },
                            });
                            return response.data;
                        } catch (error) {
                            // Unknown staff id: an answer, not a failure
                            if (axios.isAxiosError(error) && error.response?.status === 404) {
                                return null;
                            }
                            throw error;
                        }
                    },
                    `fetchOne:${wanted}`,
                    this.retryOptions()
                )
            );

            if (body === null || body === '') {
                return null;
            }

            const { records } = parseEmployeePayload(body);
            return records.find(record => record.staffId === wanted) ?? null;
        } catch (error) {
            throw toTransientRemoteError(error, `lookup of ${wanted}`);
        }
    }

    private retryOptions() {
        return {
            retries: this.options.retryCount,
            initialDelayMs: this.options.retryDelayMs,
            logger: erpLogger,
        };
    }
}
