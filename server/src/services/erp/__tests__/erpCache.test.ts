/**
 * Unit tests for the ERP cache
 */

import { ErpCache } from '../erpCache.js';
import { TransientRemoteError } from '../../../utils/errors.js';
import { FakeErp, flushPromises, makeRecord, t0 } from '../../../__tests__/fakes.js';

function directory(count: number) {
    return Array.from({ length: count }, (_, i) =>
        makeRecord({ staffId: `EMP${String(i + 1).padStart(4, '0')}`, fullName: `Employee ${i + 1}` })
    );
}

describe('ErpCache', () => {
    let clock: Date;
    const now = () => clock;

    beforeEach(() => {
        clock = t0;
    });

    it('starts empty', () => {
        const cache = new ErpCache(new FakeErp(), { now });

        expect(cache.stats()).toEqual({
            cachedRecordCount: 0,
            lastRefreshedAt: null,
            lastRefreshSucceeded: false,
            lastError: null,
            cacheAgeMs: null,
            refreshInProgress: false,
        });
        expect(cache.lookup('EMP0001')).toBeNull();
    });

    it('loads the whole directory on refresh', async () => {
        const cache = new ErpCache(new FakeErp(directory(250)), { now });

        const result = await cache.refresh();

        expect(result.success).toBe(true);
        expect(result.stats.cachedRecordCount).toBe(250);
        expect(result.stats.lastRefreshedAt).toEqual(t0);
        expect(result.stats.refreshInProgress).toBe(false);
        expect(cache.size).toBe(250);
        expect(cache.lookup('emp0250')?.fullName).toBe('Employee 250');
    });

    it('reports cache age from the last successful refresh', async () => {
        const cache = new ErpCache(new FakeErp(directory(1)), { now });
        await cache.refresh();

        clock = new Date(t0.getTime() + 90_000);

        expect(cache.stats().cacheAgeMs).toBe(90_000);
    });

    it('shares one fetch between concurrent refresh calls', async () => {
        const erp = new FakeErp(directory(3));
        erp.hold = true;
        const cache = new ErpCache(erp, { now });

        const first = cache.refresh();
        const second = cache.refresh();
        await flushPromises();
        expect(cache.stats().refreshInProgress).toBe(true);

        erp.release();
        const [a, b] = await Promise.all([first, second]);

        expect(erp.fetchAllCalls).toBe(1);
        expect(first).toBe(second);
        expect(a).toBe(b);
        expect(cache.stats().refreshInProgress).toBe(false);
    });

    it('starts a new fetch once the previous refresh has settled', async () => {
        const erp = new FakeErp(directory(3));
        const cache = new ErpCache(erp, { now });

        const first = await cache.refresh();
        const second = await cache.refresh();

        expect(erp.fetchAllCalls).toBe(2);
        expect(second.stats.cachedRecordCount).toBe(first.stats.cachedRecordCount);
        expect(second.stats.cachedRecordCount).toBe(3);
    });

    it('serves the old snapshot while a refresh is running', async () => {
        const erp = new FakeErp(directory(2));
        const cache = new ErpCache(erp, { now });
        await cache.refresh();

        erp.records = directory(5);
        erp.hold = true;
        const pending = cache.refresh();
        await flushPromises();

        expect(cache.size).toBe(2);
        expect(cache.lookup('EMP0005')).toBeNull();

        erp.release();
        await pending;
        expect(cache.size).toBe(5);
    });

    it('keeps the previous snapshot when a refresh fails', async () => {
        const erp = new FakeErp(directory(10));
        const cache = new ErpCache(erp, { now });
        await cache.refresh();

        erp.failWith = new TransientRemoteError('ERP directory fetch failed with HTTP 502');
        clock = new Date(t0.getTime() + 60_000);
        const result = await cache.refresh();

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBe('ERP directory fetch failed with HTTP 502');
        }
        expect(cache.stats()).toEqual({
            cachedRecordCount: 10,
            lastRefreshedAt: t0,
            lastRefreshSucceeded: false,
            lastError: 'ERP directory fetch failed with HTTP 502',
            cacheAgeMs: 60_000,
            refreshInProgress: false,
        });
        expect(cache.lookup('EMP0001')).not.toBeNull();
    });

    it('refuses to replace a populated snapshot with an empty directory', async () => {
        const erp = new FakeErp(directory(4));
        const cache = new ErpCache(erp, { now });
        await cache.refresh();

        erp.records = [];
        const result = await cache.refresh();

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBe('ERP returned an empty directory; keeping 4 cached records');
        }
        expect(cache.size).toBe(4);
    });

    it('accepts an empty directory when nothing was cached yet', async () => {
        const cache = new ErpCache(new FakeErp([]), { now });

        const result = await cache.refresh();

        expect(result.success).toBe(true);
        expect(cache.stats().lastRefreshedAt).toEqual(t0);
    });

    it('clears the error after a later success', async () => {
        const erp = new FakeErp(directory(1));
        erp.failWith = new Error('socket hang up');
        const cache = new ErpCache(erp, { now });
        await cache.refresh();
        expect(cache.stats().lastError).toBe('socket hang up');

        erp.failWith = null;
        await cache.refresh();

        expect(cache.stats().lastError).toBeNull();
        expect(cache.stats().lastRefreshSucceeded).toBe(true);
    });
});
