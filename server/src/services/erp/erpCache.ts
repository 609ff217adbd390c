/**
 * @module erpCache
 * In-memory snapshot of the ERP employee directory.
 *
 * Key features:
 * - Full reload only: a refresh builds a new Map and swaps it in with one assignment,
 *   so lookups never observe a half-populated snapshot
 * - Concurrent refresh() calls share the in-flight promise
 * - A failed refresh keeps the previous snapshot and records the error
 * - A successful but empty fetch never replaces a non-empty snapshot
 *
 * Usage:
 * - `const result = await cache.refresh()` (never throws)
 * - `cache.lookup('S100')` (synchronous, case-insensitive)
 * - `cache.stats()`
 */

import type { EmployeeRecord } from '@regverify/shared';
import { cacheLogger } from '../../utils/logger.js';
import { getErrorMessage, getErrorName } from '../../utils/errors.js';
import type { EmployeeSource } from './erpClient.js';
import { normalizeStaffId } from './erpRecordSchema.js';

export interface CacheStats {
    cachedRecordCount: number;
    /** Time of the last successful refresh */
    lastRefreshedAt: Date | null;
    /** Outcome of the most recent refresh; false before the first one */
    lastRefreshSucceeded: boolean;
    lastError: string | null;
    /** Milliseconds since lastRefreshedAt */
    cacheAgeMs: number | null;
    refreshInProgress: boolean;
}

export type CacheRefreshResult =
    | { success: true; stats: CacheStats }
    | { success: false; error: string; stats: CacheStats };

export interface ErpCacheOptions {
    /** Clock for timestamps; defaults to the wall clock */
    now?: () => Date;
}

export class ErpCache {
    private snapshot: ReadonlyMap<string, EmployeeRecord>;
    private lastRefreshedAt: Date | null;
    private lastRefreshSucceeded: boolean;
    private lastError: string | null;
    private inFlight: Promise<CacheRefreshResult> | null;

    private readonly source: EmployeeSource;
    private readonly now: () => Date;

    constructor(source: EmployeeSource, options: ErpCacheOptions = {}) {
        this.source = source;
        this.now = options.now ?? (() => new Date());
        this.snapshot = new Map();
        this.lastRefreshedAt = null;
        this.lastRefreshSucceeded = false;
        this.lastError = null;
        this.inFlight = null;
    }

    /**
     * Reload the whole directory. Callers arriving while a refresh runs
     * receive the same promise.
     */
    refresh(): Promise<CacheRefreshResult> {
        if (this.inFlight) {
            cacheLogger.debug('Refresh already in progress, joining it');
            return this.inFlight;
        }

        this.inFlight = this.performRefresh().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    /**
     * Record for a staff id in the current snapshot
     */
    lookup(staffId: string): EmployeeRecord | null {
        const key = normalizeStaffId(staffId);
        if (!key) return null;
        return this.snapshot.get(key) ?? null;
    }

    get size(): number {
        return this.snapshot.size;
    }

    stats(): CacheStats {
        return {
            cachedRecordCount: this.snapshot.size,
            lastRefreshedAt: this.lastRefreshedAt,
            lastRefreshSucceeded: this.lastRefreshSucceeded,
            lastError: this.lastError,
            cacheAgeMs: this.lastRefreshedAt
                ? Math.max(0, this.now().getTime() - this.lastRefreshedAt.getTime())
                : null,
            refreshInProgress: this.inFlight !== null,
        };
    }

    private async performRefresh(): Promise<CacheRefreshResult> {
        const startedAt = Date.now();
        cacheLogger.info({ cachedRecordCount: this.snapshot.size }, 'ERP cache refresh started');

        let records: EmployeeRecord[];
        try {
            records = await this.source.fetchAll();
        } catch (error) {
            return this.recordFailure(getErrorMessage(error), getErrorName(error));
        }

        if (records.length === 0 && this.snapshot.size > 0) {
            return this.recordFailure(
                `ERP returned an empty directory; keeping ${this.snapshot.size} cached records`,
                'EmptyDirectory'
            );
        }

        const next = new Map<string, EmployeeRecord>();
        for (const record of records) {
            const key = normalizeStaffId(record.staffId);
            if (key) next.set(key, record);
        }

        this.snapshot = next;
        this.lastRefreshedAt = this.now();
        this.lastRefreshSucceeded = true;
        this.lastError = null;

        cacheLogger.info(
            { cachedRecordCount: next.size, durationMs: Date.now() - startedAt },
            'ERP cache refreshed'
        );
        return { success: true, stats: this.statsAfterRefresh() };
    }

    private recordFailure(message: string, errorName: string): CacheRefreshResult {
        this.lastRefreshSucceeded = false;
        this.lastError = message;
        cacheLogger.error(
            { error: message, errorName, cachedRecordCount: this.snapshot.size },
            'ERP cache refresh failed, serving previous snapshot'
        );
        return { success: false, error: message, stats: this.statsAfterRefresh() };
    }

    /** Stats as seen once the running refresh has settled */
    private statsAfterRefresh(): CacheStats {
        return { ...this.stats(), refreshInProgress: false };
    }
}
