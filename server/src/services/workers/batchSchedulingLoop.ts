/**
 * Batch Scheduling Loop
 *
 * wait (cadence delay) → run one batch → repeat.
 * The delay is asked for again after every run, so the loop speeds up and
 * slows down as the cadence window changes. A failed batch is logged and the
 * next wait starts as usual.
 *
 * Exports: start(), stop(), getStatus(), runNow()
 */

import type { BatchResult, BatchRunner } from '../registrations/batchRunner.js';
import type { CadenceScheduler } from '../scheduling/cadenceScheduler.js';
import { schedulerLogger } from '../../utils/logger.js';
import { getErrorMessage, getErrorName } from '../../utils/errors.js';
import type { TriggerType, WorkerRunTracker } from '../../utils/workerRunTracker.js';

export const BATCH_WORKER = 'registration_batch';

export interface BatchSchedulingLoopStatus {
    schedulerActive: boolean;
    isRunning: boolean;
    currentCadence: string;
    nextRunAt: Date | null;
    lastRunAt: Date | null;
    lastResult: BatchResult | null;
    lastError: string | null;
}

export interface BatchSchedulingLoopOptions {
    now?: () => Date;
}

export class BatchSchedulingLoop {
    private readonly runner: BatchRunner;
    private readonly scheduler: CadenceScheduler;
    private readonly tracker: WorkerRunTracker;
    private readonly now: () => Date;

    private active = false;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private nextRunAt: Date | null = null;
    private current: Promise<BatchResult> | null = null;
    private lastRunAt: Date | null = null;
    private lastResult: BatchResult | null = null;
    private lastError: string | null = null;

    constructor(
        runner: BatchRunner,
        scheduler: CadenceScheduler,
        tracker: WorkerRunTracker,
        options: BatchSchedulingLoopOptions = {}
    ) {
        this.runner = runner;
        this.scheduler = scheduler;
        this.tracker = tracker;
        this.now = options.now ?? (() => new Date());
    }

    start(): void {
        if (this.active) {
            schedulerLogger.warn('Batch scheduling loop already started');
            return;
        }
        this.active = true;
        schedulerLogger.info('Starting registration batch loop');
        this.scheduleNext();
    }

    /**
     * Cancel the pending wait and let a running batch finish
     */
    async stop(): Promise<void> {
        this.active = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.nextRunAt = null;

        if (this.current) {
            schedulerLogger.info('Waiting for running batch to finish');
            await this.current.catch((err: unknown) =>
                schedulerLogger.warn({ error: getErrorMessage(err) }, 'Batch in flight at shutdown failed')
            );
        }
        schedulerLogger.info('Registration batch loop stopped');
    }

    /**
     * Run a batch immediately. Joins the batch already running, if any.
     *
     * @throws StorageError when the batch cannot be loaded
     */
    runNow(): Promise<BatchResult> {
        return this.runTracked('manual');
    }

    getStatus(): BatchSchedulingLoopStatus {
        return {
            schedulerActive: this.active,
            isRunning: this.current !== null,
            currentCadence: this.scheduler.currentCadence(this.now()).name,
            nextRunAt: this.nextRunAt,
            lastRunAt: this.lastRunAt,
            lastResult: this.lastResult,
            lastError: this.lastError,
        };
    }

    private scheduleNext(): void {
        // a restart while the previous batch was finishing has already armed one
        if (!this.active || this.timer) return;

        const now = this.now();
        const delayMs = this.scheduler.nextRunDelay(now);
        this.nextRunAt = new Date(now.getTime() + delayMs);
        schedulerLogger.debug(
            { cadence: this.scheduler.currentCadence(now).name, delayMs, nextRunAt: this.nextRunAt },
            'Next batch scheduled'
        );

        this.timer = setTimeout(() => {
            this.timer = null;
            this.nextRunAt = null;
            this.runTracked('scheduled')
                .finally(() => this.scheduleNext())
                .catch((err: unknown) =>
                    schedulerLogger.error(
                        { errorName: getErrorName(err), error: getErrorMessage(err) },
                        'Scheduled batch failed'
                    )
                );
        }, delayMs);
    }

    private runTracked(triggeredBy: TriggerType): Promise<BatchResult> {
        if (this.current) {
            schedulerLogger.debug({ triggeredBy }, 'Batch already running, joining it');
            return this.current;
        }

        const run = this.tracker.track(BATCH_WORKER, () => this.runOnce(), triggeredBy);
        this.current = run.finally(() => {
            this.current = null;
        });
        return this.current;
    }

    private async runOnce(): Promise<BatchResult> {
        try {
            const result = await this.runner.runOnce();
            this.lastResult = result;
            this.lastError = null;
            return result;
        } catch (error) {
            this.lastError = getErrorMessage(error);
            throw error;
        } finally {
            this.lastRunAt = this.now();
        }
    }
}
