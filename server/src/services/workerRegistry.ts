/**
 * Worker Registry: single place that starts the background loops.
 *
 * index.ts calls startAllWorkers() on startup and stopAllWorkers() on
 * SIGINT/SIGTERM. Every stop handler goes through the shutdown coordinator,
 * each with its own timeout.
 */

import { workerLogger } from '../utils/logger.js';
import type { WorkerRunTracker } from '../utils/workerRunTracker.js';
import defaultCoordinator, { type ShutdownCoordinator, type ShutdownResult } from '../utils/shutdownCoordinator.js';
import type { VerificationPipeline } from './pipeline.js';

export interface WorkerRegistryOptions {
    disableBackgroundWorkers: boolean;
    coordinator?: ShutdownCoordinator;
    /** Time a running batch gets to finish on shutdown */
    shutdownTimeoutMs?: number;
}

export async function startAllWorkers(
    pipeline: VerificationPipeline,
    tracker: WorkerRunTracker,
    options: WorkerRegistryOptions
): Promise<void> {
    const coordinator = options.coordinator ?? defaultCoordinator;

    // Runs left "running" by a previous process
    await tracker.cleanupStaleRuns();

    if (options.disableBackgroundWorkers) {
        workerLogger.warn('Background workers disabled (DISABLE_BACKGROUND_WORKERS=true)');
        return;
    }

    pipeline.start();
    coordinator.register('verificationPipeline', () => pipeline.stop(), options.shutdownTimeoutMs ?? 30_000);
    workerLogger.info('Background workers started');
}

export async function stopAllWorkers(coordinator: ShutdownCoordinator = defaultCoordinator): Promise<ShutdownResult[]> {
    return coordinator.shutdown();
}
