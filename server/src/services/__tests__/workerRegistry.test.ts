/**
 * Unit tests for starting and stopping the background workers
 */

import { startAllWorkers, stopAllWorkers } from '../workerRegistry.js';
import type { VerificationPipeline } from '../pipeline.js';
import { ShutdownCoordinator } from '../../utils/shutdownCoordinator.js';
import { WorkerRunTracker } from '../../utils/workerRunTracker.js';

function fakePipeline() {
    const calls: string[] = [];
    const pipeline: VerificationPipeline = {
        triggerImmediateRefresh: vi.fn(),
        getCacheStats: vi.fn(),
        runBatchNow: vi.fn(),
        getStatus: vi.fn(),
        confirmEmailVerification: vi.fn(),
        start: () => {
            calls.push('start');
        },
        stop: async () => {
            calls.push('stop');
        },
    };
    return { pipeline, calls };
}

describe('workerRegistry', () => {
    const tracker = new WorkerRunTracker(null);

    it('starts the pipeline and stops it through the coordinator', async () => {
        const { pipeline, calls } = fakePipeline();
        const coordinator = new ShutdownCoordinator();

        await startAllWorkers(pipeline, tracker, { disableBackgroundWorkers: false, coordinator });
        expect(calls).toEqual(['start']);
        expect(coordinator.getStatus()).toEqual([{ name: 'verificationPipeline', registered: true, timeout: 30_000 }]);

        const results = await stopAllWorkers(coordinator);

        expect(calls).toEqual(['start', 'stop']);
        expect(results.map((r) => r.success)).toEqual([true]);
    });

    it('does nothing when background workers are disabled', async () => {
        const { pipeline, calls } = fakePipeline();
        const coordinator = new ShutdownCoordinator();

        await startAllWorkers(pipeline, tracker, { disableBackgroundWorkers: true, coordinator });

        expect(calls).toEqual([]);
        expect(coordinator.getStatus()).toEqual([]);
    });

    it('uses the configured shutdown timeout', async () => {
        const { pipeline } = fakePipeline();
        const coordinator = new ShutdownCoordinator();

        await startAllWorkers(pipeline, tracker, { disableBackgroundWorkers: false, coordinator, shutdownTimeoutMs: 5_000 });

        expect(coordinator.getStatus()[0].timeout).toBe(5_000);
    });
});
