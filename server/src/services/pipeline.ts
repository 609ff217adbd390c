/**
 * Verification Pipeline
 *
 * Wires the ERP cache, validator, batch runner and both loops from a
 * PipelineConfig and exposes the operational entry points:
 *
 * - triggerImmediateRefresh(): reload the ERP cache now
 * - getCacheStats(): current cache statistics
 * - runBatchNow(): process due registrations now
 * - getStatus(): loops, cache and circuit breaker in one object
 * - confirmEmailVerification(token): approved → active
 *
 * start()/stop() drive the background loops.
 */

import type { PipelineConfig } from '../config/pipeline.js';
import {
    ERP_CIRCUIT_NAME,
    getCircuitBreaker,
    type CircuitStatus,
} from '../utils/circuitBreaker.js';
import { workerLogger } from '../utils/logger.js';
import type { WorkerRunTracker } from '../utils/workerRunTracker.js';
import { ErpCache, type CacheStats } from './erp/erpCache.js';
import { HttpErpClient, type ErpRemote } from './erp/erpClient.js';
import { ErpDirectory } from './erp/erpDirectory.js';
import { MockErpClient } from './erp/mockErpClient.js';
import {
    EmailNotificationSender,
    createEmailTransport,
    type EmailTransport,
} from './email/notificationSender.js';
import { BatchRunner, type BatchResult } from './registrations/batchRunner.js';
import { EmailVerificationService, type EmailVerificationResult } from './registrations/emailVerification.js';
import type { RegistrationStore } from './registrations/registrationStore.js';
import { RegistrationValidator } from './registrations/registrationValidator.js';
import { CadenceScheduler } from './scheduling/cadenceScheduler.js';
import { VerificationTokenService } from './verificationToken.js';
import { BatchSchedulingLoop, type BatchSchedulingLoopStatus } from './workers/batchSchedulingLoop.js';
import { CacheRefreshLoop, type CacheRefreshLoopStatus } from './workers/cacheRefreshLoop.js';

// ============================================
// TYPES
// ============================================

export interface PipelineDeps {
    store: RegistrationStore;
    tracker: WorkerRunTracker;
    /** Overrides the client chosen from config (mock or HTTP) */
    erp?: ErpRemote;
    /** Overrides the transport chosen from RESEND_API_KEY */
    emailTransport?: EmailTransport;
    now?: () => Date;
}

export interface PipelineStatus {
    cache: CacheStats & { enabled: boolean; cacheOnly: boolean };
    cacheRefresh: CacheRefreshLoopStatus;
    batches: BatchSchedulingLoopStatus;
    erpCircuit: CircuitStatus;
    mockMode: boolean;
}

export interface VerificationPipeline {
    triggerImmediateRefresh(): Promise<CacheStats>;
    getCacheStats(): CacheStats;
    runBatchNow(): Promise<BatchResult>;
    getStatus(): PipelineStatus;
    confirmEmailVerification(token: string): Promise<EmailVerificationResult>;
    start(): void;
    stop(): Promise<void>;
}

// ============================================
// FACTORY
// ============================================

export function createErpRemote(config: PipelineConfig): ErpRemote {
    const { erp } = config;
    if (erp.mockMode) {
        workerLogger.warn('ERP_MOCK_MODE=true, serving employee records from the bundled fixture');
        return new MockErpClient();
    }

    return new HttpErpClient({
        baseUrl: erp.baseUrl,
        endpoint: erp.endpoint,
        lookupEndpoint: erp.lookupEndpoint,
        timeoutMs: erp.timeoutMs,
        retryCount: erp.retryCount,
        retryDelayMs: erp.retryDelayMs,
        apiKey: erp.apiKey,
        basicAuth: erp.basicAuth,
        circuit: getCircuitBreaker(ERP_CIRCUIT_NAME, {
            failureThreshold: erp.circuitFailureThreshold,
            resetTimeoutMs: erp.circuitResetTimeoutMs,
        }),
    });
}

export function createVerificationPipeline(config: PipelineConfig, deps: PipelineDeps): VerificationPipeline {
    const now = deps.now ?? (() => new Date());
    const { erp, jobs, verification, email } = config;

    const remote = deps.erp ?? createErpRemote(config);
    // The fixture is already in memory; mock mode looks it up directly
    const cacheEnabled = erp.cacheEnabled && !erp.mockMode;
    const cache = new ErpCache(remote, { now });
    const directory = new ErpDirectory(remote, cache, {
        cacheEnabled,
        cacheOnly: erp.cacheOnly,
    });
    const validator = new RegistrationValidator(directory, {
        nameMatchThreshold: jobs.nameMatchThreshold,
    });

    const tokens = new VerificationTokenService({
        secret: verification.jwtSecret,
        ttlDays: verification.tokenTtlDays,
    });
    const notifier = new EmailNotificationSender(
        deps.emailTransport ?? createEmailTransport(email.resendApiKey),
        { from: email.from, portalName: email.portalName, tokenTtlDays: verification.tokenTtlDays }
    );

    const runner = new BatchRunner(
        { store: deps.store, validator, notifier, tokens },
        {
            batchSize: jobs.batchSize,
            concurrency: jobs.concurrency,
            retryPolicy: jobs.retryPolicy,
            verificationBaseUrl: verification.baseUrl,
            now,
        }
    );
    const emailVerification = new EmailVerificationService(deps.store, tokens, jobs.retryPolicy);

    const scheduler = new CadenceScheduler({
        windows: config.scheduling.windows,
        smartScheduling: config.scheduling.smartScheduling,
        timeZone: config.scheduling.timeZone,
    });

    const cacheRefreshLoop = new CacheRefreshLoop(cache, deps.tracker, {
        intervalMinutes: erp.cacheRefreshIntervalMinutes,
        enabled: cacheEnabled,
    });
    const batchLoop = new BatchSchedulingLoop(runner, scheduler, deps.tracker, { now });
    const circuit = getCircuitBreaker(ERP_CIRCUIT_NAME);

    return {
        triggerImmediateRefresh: () => cacheRefreshLoop.triggerNow(),
        getCacheStats: () => cache.stats(),
        runBatchNow: () => batchLoop.runNow(),
        confirmEmailVerification: (token) => emailVerification.confirm(token, now()),
        getStatus: () => ({
            cache: { ...cache.stats(), enabled: cacheEnabled, cacheOnly: directory.cacheOnly },
            cacheRefresh: cacheRefreshLoop.getStatus(),
            batches: batchLoop.getStatus(),
            erpCircuit: circuit.getStatus(),
            mockMode: erp.mockMode,
        }),
        start: () => {
            cacheRefreshLoop.start();
            batchLoop.start();
        },
        stop: async () => {
            await Promise.all([cacheRefreshLoop.stop(), batchLoop.stop()]);
        },
    };
}
