/**
 * Unit tests for the shutdown coordinator
 */

import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
    it('runs every handler and reports each result', async () => {
        const coordinator = new ShutdownCoordinator();
        const stopped: string[] = [];
        coordinator.register('cache', async () => {
            stopped.push('cache');
        });
        coordinator.register('batches', () => {
            throw new Error('still running');
        });

        const results = await coordinator.shutdown();

        expect(stopped).toEqual(['cache']);
        expect(results.map(({ name, success, error }) => ({ name, success, error }))).toEqual([
            { name: 'cache', success: true, error: undefined },
            { name: 'batches', success: false, error: 'still running' },
        ]);
    });

    it('gives up on a handler after its timeout', async () => {
        const coordinator = new ShutdownCoordinator();
        coordinator.register('stuck', () => new Promise<void>(() => undefined), 20);

        const [result] = await coordinator.shutdown();

        expect(result.success).toBe(false);
        expect(result.error).toBe('Timeout');
    });

    it('only shuts down once', async () => {
        const coordinator = new ShutdownCoordinator();
        let calls = 0;
        coordinator.register('once', () => {
            calls++;
        });

        await coordinator.shutdown();
        const second = await coordinator.shutdown();

        expect(second).toEqual([]);
        expect(calls).toBe(1);
        expect(coordinator.isInProgress()).toBe(true);
    });

    it('replaces a handler registered twice under one name', () => {
        const coordinator = new ShutdownCoordinator();
        coordinator.register('loop', () => undefined, 1000);
        coordinator.register('loop', () => undefined, 5000);
        coordinator.unregister('missing');

        expect(coordinator.getStatus()).toEqual([{ name: 'loop', registered: true, timeout: 5000 }]);
    });
});
