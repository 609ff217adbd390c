/**
 * Verification daemon
 *
 * Keeps the ERP cache warm and processes pending registrations on the
 * configured cadence until SIGINT/SIGTERM. Started by `regverify start`.
 */

import { createRuntime } from './runtime.js';
import { startAllWorkers, stopAllWorkers } from './services/workerRegistry.js';
import logger from './utils/logger.js';
import { getErrorMessage } from './utils/errors.js';

export async function main(): Promise<void> {
    const runtime = createRuntime();
    const { config } = runtime;

    logger.info(
        {
            nodeEnv: config.nodeEnv,
            mockMode: config.erp.mockMode,
            cacheEnabled: config.erp.cacheEnabled,
            cacheOnly: config.erp.cacheOnly,
            smartScheduling: config.scheduling.smartScheduling,
            timeZone: config.scheduling.timeZone,
        },
        'Starting registration verification pipeline'
    );

    await startAllWorkers(runtime.pipeline, runtime.tracker, {
        disableBackgroundWorkers: config.disableBackgroundWorkers,
    });

    let stopping = false;
    const onSignal = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, 'Shutdown signal received');
        stopAllWorkers()
            .then(async (results) => {
                // pool closes only after the loops have stopped
                await runtime.close();
                process.exitCode = results.every((r) => r.success) ? 0 : 1;
            })
            .catch((err: unknown) => {
                logger.error({ error: getErrorMessage(err) }, 'Shutdown failed');
                process.exitCode = 1;
            });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

export { createRuntime, type PipelineRuntime } from './runtime.js';
export type { VerificationPipeline, PipelineStatus } from './services/pipeline.js';
export type { BatchResult } from './services/registrations/batchRunner.js';
export type { CacheStats } from './services/erp/erpCache.js';
export type { EmailVerificationResult } from './services/registrations/emailVerification.js';
export { isPipelineError, getErrorMessage } from './utils/errors.js';
