/**
 * Pipeline Configuration
 *
 * Builds the immutable PipelineConfig from validated environment variables.
 * Cron expressions and the time zone are parsed here, once; anything invalid
 * is a ConfigurationError and stops startup.
 */

import type { RetryPolicy } from '@regverify/shared';
import { ConfigurationError } from '../utils/errors.js';
import { parseCadenceWindows, type CadenceWindows } from '../services/scheduling/cadenceParser.js';
import { getEnv, type Env } from './env.js';

// ============================================
// TYPES
// ============================================

export interface ErpConfig {
    baseUrl: string;
    endpoint: string;
    lookupEndpoint: string;
    timeoutMs: number;
    retryCount: number;
    retryDelayMs: number;
    apiKey: string | null;
    basicAuth: { username: string; password: string } | null;
    circuitFailureThreshold: number;
    circuitResetTimeoutMs: number;
    mockMode: boolean;
    cacheEnabled: boolean;
    cacheOnly: boolean;
    cacheRefreshIntervalMinutes: number;
}

export interface SchedulingConfig {
    smartScheduling: boolean;
    timeZone: string;
    windows: CadenceWindows;
}

export interface JobConfig {
    batchSize: number;
    concurrency: number;
    retryPolicy: RetryPolicy;
    nameMatchThreshold: number;
}

export interface VerificationConfig {
    jwtSecret: string;
    tokenTtlDays: number;
    baseUrl: string;
}

export interface EmailConfig {
    resendApiKey: string | null;
    from: string;
    portalName: string;
}

export interface PipelineConfig {
    nodeEnv: Env['NODE_ENV'];
    databaseUrl: string;
    disableBackgroundWorkers: boolean;
    erp: ErpConfig;
    scheduling: SchedulingConfig;
    jobs: JobConfig;
    verification: VerificationConfig;
    email: EmailConfig;
}

// ============================================
// BUILDERS
// ============================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
        if (typeof child === 'object' && child !== null && !(child instanceof Set) && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

function buildErpConfig(env: Env): ErpConfig {
    const mockMode = env.ERP_MOCK_MODE === 'true';
    const cacheEnabled = env.ERP_CACHE_ENABLED === 'true';
    const cacheOnly = env.ERP_CACHE_ONLY === 'true';

    if (cacheOnly && !cacheEnabled) {
        throw new ConfigurationError('ERP_CACHE_ONLY=true requires ERP_CACHE_ENABLED=true');
    }

    const username = env.ERP_BASIC_AUTH_USERNAME;
    const password = env.ERP_BASIC_AUTH_PASSWORD;
    if (Boolean(username) !== Boolean(password)) {
        throw new ConfigurationError('ERP_BASIC_AUTH_USERNAME and ERP_BASIC_AUTH_PASSWORD must be set together');
    }

    return {
        baseUrl: env.ERP_BASE_URL ?? '',
        endpoint: env.ERP_ENDPOINT ?? '',
        lookupEndpoint: env.ERP_LOOKUP_ENDPOINT ?? '',
        timeoutMs: env.ERP_TIMEOUT_SECONDS * 1000,
        retryCount: env.ERP_RETRY_COUNT,
        retryDelayMs: env.ERP_RETRY_DELAY_SECONDS * 1000,
        apiKey: env.ERP_API_KEY ?? null,
        basicAuth: username && password ? { username, password } : null,
        circuitFailureThreshold: env.ERP_CIRCUIT_FAILURE_THRESHOLD,
        circuitResetTimeoutMs: env.ERP_CIRCUIT_BREAK_SECONDS * 1000,
        mockMode,
        cacheEnabled,
        cacheOnly,
        cacheRefreshIntervalMinutes: env.ERP_CACHE_REFRESH_INTERVAL_MINUTES,
    };
}

/**
 * Build the pipeline configuration from a validated environment
 *
 * @throws ConfigurationError for invalid cron expressions, time zones or flag combinations
 */
export function buildPipelineConfig(env: Env): Readonly<PipelineConfig> {
    const windows = parseCadenceWindows(
        {
            businessHours: env.JOB_BUSINESS_HOURS_SCHEDULE,
            offHours: env.JOB_OFF_HOURS_SCHEDULE,
            weekend: env.JOB_WEEKEND_SCHEDULE,
        },
        env.JOB_TIMEZONE
    );

    return deepFreeze({
        nodeEnv: env.NODE_ENV,
        databaseUrl: env.DATABASE_URL,
        disableBackgroundWorkers: env.DISABLE_BACKGROUND_WORKERS === 'true',
        erp: buildErpConfig(env),
        scheduling: {
            smartScheduling: env.JOB_SMART_SCHEDULING === 'true',
            timeZone: env.JOB_TIMEZONE,
            windows,
        },
        jobs: {
            batchSize: env.JOB_BATCH_SIZE,
            concurrency: env.JOB_CONCURRENCY,
            retryPolicy: {
                maxRetryAttempts: env.JOB_MAX_RETRY_ATTEMPTS,
                retryDelayMs: env.JOB_RETRY_DELAY_MINUTES * 60_000,
                backoff: env.JOB_RETRY_BACKOFF,
                transientPolicy: env.JOB_TRANSIENT_POLICY,
            },
            nameMatchThreshold: env.NAME_MATCH_THRESHOLD,
        },
        verification: {
            jwtSecret: env.JWT_SECRET,
            tokenTtlDays: env.VERIFICATION_TOKEN_TTL_DAYS,
            baseUrl: env.VERIFICATION_BASE_URL,
        },
        email: {
            resendApiKey: env.RESEND_API_KEY ?? null,
            from: env.EMAIL_FROM,
            portalName: env.PORTAL_NAME,
        },
    });
}

/** Configuration for the current process environment */
export function loadPipelineConfig(): Readonly<PipelineConfig> {
    return buildPipelineConfig(getEnv());
}
