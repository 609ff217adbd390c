/**
 * Unit tests for the cache refresh loop
 */

import { CacheRefreshLoop } from '../cacheRefreshLoop.js';
import { ErpCache } from '../../erp/erpCache.js';
import { WorkerRunTracker } from '../../../utils/workerRunTracker.js';
import { FakeErp, MINUTE, flushPromises, makeRecord, t0 } from '../../../__tests__/fakes.js';

function setup(enabled = true) {
    const erp = new FakeErp([makeRecord()]);
    const cache = new ErpCache(erp);
    const loop = new CacheRefreshLoop(cache, new WorkerRunTracker(null), { intervalMinutes: 60, enabled });
    return { erp, cache, loop };
}

describe('CacheRefreshLoop', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(t0);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('refreshes at start and then on every interval', async () => {
        const { erp, loop } = setup();

        loop.start();
        expect(loop.getStatus().isRunning).toBe(true);
        await loop.triggerNow();
        expect(erp.fetchAllCalls).toBe(1);

        vi.advanceTimersByTime(60 * MINUTE);
        await loop.triggerNow();
        expect(erp.fetchAllCalls).toBe(2);

        await loop.stop();
    });

    it('reports the last run', async () => {
        const { cache, loop } = setup();

        loop.start();
        const stats = await loop.triggerNow();

        expect(stats.cachedRecordCount).toBe(1);
        expect(cache.size).toBe(1);
        expect(loop.getStatus()).toEqual({
            enabled: true,
            schedulerActive: true,
            isRunning: false,
            intervalMinutes: 60,
            lastRunAt: t0,
            lastRunSucceeded: true,
        });

        await loop.stop();
    });

    it('records a failed refresh and keeps the schedule', async () => {
        const { erp, loop } = setup();
        erp.failWith = new Error('ERP unreachable');

        loop.start();
        const stats = await loop.triggerNow();

        expect(stats.lastError).toBe('ERP unreachable');
        expect(loop.getStatus().lastRunSucceeded).toBe(false);
        expect(loop.getStatus().schedulerActive).toBe(true);

        await loop.stop();
    });

    it('stops scheduling after stop()', async () => {
        const { erp, loop } = setup();

        loop.start();
        await loop.stop();
        expect(erp.fetchAllCalls).toBe(1);

        vi.advanceTimersByTime(180 * MINUTE);

        expect(erp.fetchAllCalls).toBe(1);
        expect(loop.getStatus().schedulerActive).toBe(false);
    });

    it('lets a running refresh finish before stop resolves', async () => {
        const { erp, cache, loop } = setup();
        erp.hold = true;

        loop.start();
        let stopped = false;
        const stopping = loop.stop().then(() => {
            stopped = true;
        });
        await flushPromises();

        expect(stopped).toBe(false);
        expect(loop.getStatus().isRunning).toBe(true);
        expect(cache.size).toBe(0);

        erp.release();
        await stopping;

        expect(stopped).toBe(true);
        expect(erp.fetchAllCalls).toBe(1);
        expect(cache.size).toBe(1);
        expect(loop.getStatus().isRunning).toBe(false);
    });

    it('does not schedule when disabled but still refreshes on demand', async () => {
        const { erp, loop } = setup(false);

        loop.start();
        expect(loop.getStatus().schedulerActive).toBe(false);
        expect(erp.fetchAllCalls).toBe(0);

        await loop.triggerNow();
        expect(erp.fetchAllCalls).toBe(1);
    });
});
