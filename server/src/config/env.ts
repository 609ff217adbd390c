/**
 * Centralized Environment Variable Validation
 *
 * Validates ALL environment variables once at startup using Zod.
 * Invalid configuration is a ConfigurationError listing every failed variable.
 *
 * USAGE:
 * - `getEnv()` for the process environment (parsed once, then memoised)
 * - `parseEnv(source)` to validate an explicit record (tests, CLI overrides)
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Map it into PipelineConfig in config/pipeline.ts
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.enum(['true', 'false']).default(defaultValue);

const boundedInt = (min: number, max: number, defaultValue: number) =>
    z.coerce.number().int().min(min).max(max).default(defaultValue);

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** Secret key for signing verification tokens */
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),

    /** PostgreSQL connection string */
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Disable background workers (useful when running one-off CLI commands) */
    DISABLE_BACKGROUND_WORKERS: booleanFlag('false'),

    // ----------------------------------------
    // ERP INTEGRATION
    // ----------------------------------------

    /** ERP base URL, e.g. https://erp.example.com */
    ERP_BASE_URL: z.string().url().optional(),

    /** Path of the bulk ex-employee listing */
    ERP_ENDPOINT: z.string().optional(),

    /** Path of the single-record lookup (takes ?staffid=) */
    ERP_LOOKUP_ENDPOINT: z.string().optional(),

    /** Request timeout for ERP calls (seconds) */
    ERP_TIMEOUT_SECONDS: boundedInt(1, 600, 10),

    /** Retries per ERP request on network errors and 5xx */
    ERP_RETRY_COUNT: boundedInt(0, 10, 3),

    /** Initial delay between ERP retries (seconds), doubles each retry */
    ERP_RETRY_DELAY_SECONDS: boundedInt(0, 300, 2),

    /** Optional API key sent as X-API-Key */
    ERP_API_KEY: z.string().optional(),

    /** Optional basic auth credentials */
    ERP_BASIC_AUTH_USERNAME: z.string().optional(),
    ERP_BASIC_AUTH_PASSWORD: z.string().optional(),

    /** Consecutive failures before the ERP circuit opens */
    ERP_CIRCUIT_FAILURE_THRESHOLD: boundedInt(1, 100, 5),

    /** How long the ERP circuit stays open (seconds) */
    ERP_CIRCUIT_BREAK_SECONDS: boundedInt(1, 3600, 30),

    /** Serve ERP data from the bundled fixture instead of the network */
    ERP_MOCK_MODE: booleanFlag('false'),

    /** Keep a local snapshot of the ERP directory */
    ERP_CACHE_ENABLED: booleanFlag('true'),

    /** Never call the ERP per registration; cache misses are rejections */
    ERP_CACHE_ONLY: booleanFlag('false'),

    /** Minutes between full cache refreshes */
    ERP_CACHE_REFRESH_INTERVAL_MINUTES: boundedInt(1, 1440, 60),

    // ----------------------------------------
    // BACKGROUND JOB
    // ----------------------------------------

    /** Cron expression for weekday business hours */
    JOB_BUSINESS_HOURS_SCHEDULE: z.string().default('*/2 8-17 * * 1-5'),

    /** Cron expression for weekday evenings and nights */
    JOB_OFF_HOURS_SCHEDULE: z.string().default('*/15 18-23,0-7 * * 1-5'),

    /** Cron expression for weekends */
    JOB_WEEKEND_SCHEDULE: z.string().default('*/30 * * * 0,6'),

    /** IANA time zone the schedules are read in */
    JOB_TIMEZONE: z.string().default('Africa/Nairobi'),

    /** Switch cadence by time of day; false = always business hours */
    JOB_SMART_SCHEDULING: booleanFlag('true'),

    /** Registrations loaded per batch */
    JOB_BATCH_SIZE: boundedInt(1, 1000, 100),

    /** Registrations validated in parallel within a batch */
    JOB_CONCURRENCY: boundedInt(1, 50, 5),

    /** Validation attempts before a registration is rejected */
    JOB_MAX_RETRY_ATTEMPTS: boundedInt(1, 50, 5),

    /** Minutes before a failed registration is retried */
    JOB_RETRY_DELAY_MINUTES: boundedInt(1, 1440, 10),

    /** fixed: same delay every attempt; exponential: doubles per attempt */
    JOB_RETRY_BACKOFF: z.enum(['fixed', 'exponential']).default('fixed'),

    /** consume: ERP outages count against the retry budget; exempt: they do not */
    JOB_TRANSIENT_POLICY: z.enum(['consume', 'exempt']).default('consume'),

    /** Minimum name similarity (%) between registration and ERP; 0 disables */
    NAME_MATCH_THRESHOLD: boundedInt(0, 100, 80),

    // ----------------------------------------
    // EMAIL VERIFICATION
    // ----------------------------------------

    /** Days a verification link stays valid */
    VERIFICATION_TOKEN_TTL_DAYS: boundedInt(1, 365, 30),

    /** Page that receives ?token= from the verification email */
    VERIFICATION_BASE_URL: z.string().url().default('http://localhost:3000/verify'),

    // ----------------------------------------
    // RESEND
    // ----------------------------------------

    /** Resend API key for sending emails */
    RESEND_API_KEY: z.string().optional(),

    /** Sender address for verification emails */
    EMAIL_FROM: z.string().default('Alumni Registrations <noreply@example.com>'),

    /** Name shown in email headers and subjects */
    PORTAL_NAME: z.string().min(1).default('Alumni Portal'),
}).superRefine((value, ctx) => {
    if (value.ERP_MOCK_MODE === 'true') return;

    for (const key of ['ERP_BASE_URL', 'ERP_ENDPOINT', 'ERP_LOOKUP_ENDPOINT'] as const) {
        if (!value[key]) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [key],
                message: `${key} is required unless ERP_MOCK_MODE=true`,
            });
        }
    }
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate an environment record.
 *
 * @throws ConfigurationError listing each variable that failed and why
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            return `${path}: ${issue.message}`;
        });
        throw new ConfigurationError('Environment validation failed', issues);
    }
    return result.data;
}

let cachedEnv: Env | null = null;

/** Parsed process environment, validated on first use */
export function getEnv(): Env {
    if (!cachedEnv) {
        cachedEnv = parseEnv(process.env);
    }
    return cachedEnv;
}
