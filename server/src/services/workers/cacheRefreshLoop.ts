/**
 * Cache Refresh Loop
 *
 * Keeps the ERP snapshot warm: one refresh at start, then one every
 * `intervalMinutes`. A failed refresh is logged and the next tick tries again.
 *
 * Exports: start(), stop(), getStatus(), triggerNow()
 */

import type { CacheStats, ErpCache } from '../erp/erpCache.js';
import { workerLogger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { TriggerType, WorkerRunTracker } from '../../utils/workerRunTracker.js';

const log = workerLogger.child({ worker: 'cache-refresh' });

export const CACHE_REFRESH_WORKER = 'erp_cache_refresh';

export interface CacheRefreshLoopOptions {
    intervalMinutes: number;
    /** false when caching is disabled or the ERP is mocked */
    enabled: boolean;
}

export interface CacheRefreshLoopStatus {
    enabled: boolean;
    schedulerActive: boolean;
    isRunning: boolean;
    intervalMinutes: number;
    lastRunAt: Date | null;
    lastRunSucceeded: boolean | null;
}

export class CacheRefreshLoop {
    private readonly cache: ErpCache;
    private readonly tracker: WorkerRunTracker;
    private readonly options: CacheRefreshLoopOptions;

    private interval: ReturnType<typeof setInterval> | null = null;
    private current: Promise<CacheStats> | null = null;
    private lastRunAt: Date | null = null;
    private lastRunSucceeded: boolean | null = null;

    constructor(cache: ErpCache, tracker: WorkerRunTracker, options: CacheRefreshLoopOptions) {
        this.cache = cache;
        this.tracker = tracker;
        this.options = options;
    }

    start(): void {
        if (!this.options.enabled) {
            log.info('ERP cache refresh disabled (cache off or mock mode)');
            return;
        }
        if (this.interval) {
            log.warn('Cache refresh loop already started');
            return;
        }

        const intervalMs = this.options.intervalMinutes * 60 * 1000;
        log.info({ intervalMinutes: this.options.intervalMinutes }, 'Starting ERP cache refresh loop');

        this.runTracked('startup').catch((err: unknown) =>
            log.error({ error: getErrorMessage(err) }, 'Startup refresh failed')
        );
        this.interval = setInterval(() => {
            this.runTracked('scheduled').catch((err: unknown) =>
                log.error({ error: getErrorMessage(err) }, 'Scheduled refresh failed')
            );
        }, intervalMs);
    }

    /** Clears the timer and waits for a refresh that is already running */
    async stop(): Promise<void> {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
            log.info('ERP cache refresh loop stopped');
        }
        if (this.current) {
            await this.current.catch((err: unknown) =>
                log.warn({ error: getErrorMessage(err) }, 'Refresh in flight at shutdown failed')
            );
        }
    }

    /**
     * Refresh now, outside the schedule. Joins a refresh already in flight.
     */
    triggerNow(): Promise<CacheStats> {
        return this.runTracked('manual');
    }

    getStatus(): CacheRefreshLoopStatus {
        return {
            enabled: this.options.enabled,
            schedulerActive: this.interval !== null,
            isRunning: this.current !== null,
            intervalMinutes: this.options.intervalMinutes,
            lastRunAt: this.lastRunAt,
            lastRunSucceeded: this.lastRunSucceeded,
        };
    }

    private runTracked(triggeredBy: TriggerType): Promise<CacheStats> {
        if (this.current) {
            return this.current;
        }

        const run = this.tracker.track(CACHE_REFRESH_WORKER, () => this.refreshOnce(), triggeredBy);
        this.current = run.finally(() => {
            this.current = null;
        });
        return this.current;
    }

    private async refreshOnce(): Promise<CacheStats> {
        const result = await this.cache.refresh();
        this.lastRunAt = new Date();
        this.lastRunSucceeded = result.success;
        if (!result.success) {
            log.warn({ error: result.error, cachedRecordCount: result.stats.cachedRecordCount }, 'Refresh did not update the cache');
        }
        return result.stats;
    }
}
