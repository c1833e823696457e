import { describe, expect, it, vi } from 'vitest';
import { GatewayMetrics } from '../../src/services/gateway-metrics.js';
import { TaskTracker } from '../../src/services/task-tracker.js';
import { deferred } from '../helpers/fixtures.js';

function untilAborted(signal: AbortSignal): Promise<void> {
    return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => {
            const error = new Error('aborted');
            error.name = 'AbortError';
            reject(error);
        }, { once: true });
    });
}

describe('TaskTracker', () => {
    it('counts live tasks and forgets them once they finish', async () => {
        const tracker = new TaskTracker();
        const gate = deferred();

        const task = tracker.spawn('persist', () => gate.promise);
        expect(tracker.activeCount()).toBe(1);
        expect(tracker.list().map((entry) => entry.name)).toEqual(['persist']);

        gate.resolve();
        await task.done;
        expect(tracker.activeCount()).toBe(0);
    });

    it('logs and counts failures without rejecting', async () => {
        const metrics = new GatewayMetrics();
        const tracker = new TaskTracker({ metrics });

        const task = tracker.spawn('broken', async () => {
            throw new Error('disk full');
        });

        await expect(task.done).resolves.toBeUndefined();
        expect(metrics.get('tasks.failed')).toBe(1);
        expect(tracker.activeCount()).toBe(0);
    });

    it('cancelAll aborts every task through its signal', async () => {
        const metrics = new GatewayMetrics();
        const tracker = new TaskTracker({ metrics });

        tracker.spawn('a', untilAborted);
        tracker.spawn('b', untilAborted);

        const result = await tracker.cancelAll(1000);
        expect(result).toEqual({ total: 2, settled: 2, timedOut: false });
        expect(metrics.get('tasks.cancelled')).toBe(2);
        expect(tracker.activeCount()).toBe(0);
    });

    it('never starts work cancelled in the tick it was spawned', async () => {
        const metrics = new GatewayMetrics();
        const tracker = new TaskTracker({ metrics });
        const work = vi.fn(untilAborted);

        const task = tracker.spawn('late', work);
        task.cancel();
        await task.done;

        expect(work).not.toHaveBeenCalled();
        expect(metrics.get('tasks.cancelled')).toBe(1);
        expect(tracker.activeCount()).toBe(0);
    });

    it('cancelAll gives up on tasks that ignore their signal', async () => {
        const tracker = new TaskTracker();
        const gate = deferred();

        const work = vi.fn(() => gate.promise);

        tracker.spawn('stubborn', work);
        await vi.waitFor(() => expect(work).toHaveBeenCalled());
        const result = await tracker.cancelAll(10);

        expect(result).toEqual({ total: 1, settled: 0, timedOut: true });
        gate.resolve();
    });

    it('cancelAll with nothing running returns immediately', async () => {
        const tracker = new TaskTracker();
        await expect(tracker.cancelAll(10)).resolves.toEqual({ total: 0, settled: 0, timedOut: false });
    });

    it('waitForAll resolves true once tasks settle', async () => {
        const tracker = new TaskTracker();
        const gate = deferred();
        tracker.spawn('slow', () => gate.promise);

        const waiting = tracker.waitForAll(1000);
        gate.resolve();
        await expect(waiting).resolves.toBe(true);
    });
});
