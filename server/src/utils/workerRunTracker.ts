/**
 * Worker Run Tracker
 *
 * Wraps worker execution to persist run history in the worker_runs table.
 * If a DB write fails (or there is no DB) the worker still runs.
 */

import type { KyselyDB } from '../db/index.js';
import logger from './logger.js';

const runLogger = logger.child({ module: 'worker-run-tracker' });

export type TriggerType = 'scheduled' | 'manual' | 'startup';

export class WorkerRunTracker {
    private readonly db: KyselyDB | null;

    constructor(db: KyselyDB | null) {
        this.db = db;
    }

    /**
     * Wrap a worker function to track its run in worker_runs.
     * - Creates a "running" record before execution
     * - Updates to "completed" or "failed" after
     * - Re-throws errors so existing worker error handling still works
     * - Returns the original result transparently
     */
    async track<T>(
        workerName: string,
        fn: () => Promise<T>,
        triggeredBy: TriggerType = 'scheduled'
    ): Promise<T> {
        const startedAt = new Date();
        const runId = await this.createRun(workerName, startedAt, triggeredBy);

        try {
            const result = await fn();
            await this.finishRun(workerName, runId, {
                status: 'completed',
                completedAt: new Date(),
                durationMs: Date.now() - startedAt.getTime(),
                result: JSON.stringify(result ?? null),
                error: null,
            });
            return result;
        } catch (error) {
            await this.finishRun(workerName, runId, {
                status: 'failed',
                completedAt: new Date(),
                durationMs: Date.now() - startedAt.getTime(),
                result: null,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    /**
     * Mark any runs still in "running" state as failed.
     * Called once on startup; these are runs that were interrupted by a restart.
     */
    async cleanupStaleRuns(): Promise<void> {
        if (!this.db) return;

        try {
            const result = await this.db
                .updateTable('worker_runs')
                .set({
                    status: 'failed',
                    error: 'Process restarted before completion',
                    completedAt: new Date(),
                })
                .where('status', '=', 'running')
                .executeTakeFirst();

            const count = Number(result.numUpdatedRows);
            if (count > 0) {
                runLogger.info({ count }, 'Marked stale worker runs as failed');
            }
        } catch (err) {
            runLogger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Failed to cleanup stale runs');
        }
    }

    private async createRun(workerName: string, startedAt: Date, triggeredBy: TriggerType): Promise<string | null> {
        if (!this.db) return null;

        try {
            const run = await this.db
                .insertInto('worker_runs')
                .values({ workerName, startedAt, triggeredBy, status: 'running' })
                .returning('id')
                .executeTakeFirstOrThrow();
            return run.id;
        } catch (err) {
            runLogger.warn({ workerName, error: err instanceof Error ? err.message : String(err) }, 'Failed to create worker run record');
            return null;
        }
    }

    private async finishRun(
        workerName: string,
        runId: string | null,
        update: {
            status: 'completed' | 'failed';
            completedAt: Date;
            durationMs: number;
            result: string | null;
            error: string | null;
        }
    ): Promise<void> {
        if (!this.db || !runId) return;

        try {
            await this.db
                .updateTable('worker_runs')
                .set(update)
                .where('id', '=', runId)
                .execute();
        } catch (err) {
            runLogger.warn({ workerName, error: err instanceof Error ? err.message : String(err) }, 'Failed to update worker run');
        }
    }
}
