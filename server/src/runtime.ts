/**
 * Runtime assembly shared by the daemon and the CLI:
 * config → database → store → tracker → pipeline
 */

import { loadPipelineConfig, type PipelineConfig } from './config/pipeline.js';
import { createKysely, destroyKysely, type KyselyDB } from './db/index.js';
import { createVerificationPipeline, type VerificationPipeline } from './services/pipeline.js';
import { KyselyRegistrationStore } from './services/registrations/kyselyRegistrationStore.js';
import { dbLogger } from './utils/logger.js';
import { WorkerRunTracker } from './utils/workerRunTracker.js';

export interface PipelineRuntime {
    config: Readonly<PipelineConfig>;
    db: KyselyDB;
    tracker: WorkerRunTracker;
    pipeline: VerificationPipeline;
    /** Close the connection pool */
    close(): Promise<void>;
}

/**
 * @throws ConfigurationError when the environment is invalid
 */
export function createRuntime(config: Readonly<PipelineConfig> = loadPipelineConfig()): PipelineRuntime {
    const db = createKysely(config.databaseUrl);
    const tracker = new WorkerRunTracker(db);
    const pipeline = createVerificationPipeline(config, {
        store: new KyselyRegistrationStore(db),
        tracker,
    });

    return {
        config,
        db,
        tracker,
        pipeline,
        close: async () => {
            await destroyKysely();
            dbLogger.debug('Database pool closed');
        },
    };
}
