import { describe, it, expect, vi } from 'vitest';
import type { CycleSummary } from '../../engine/types.js';
import { CycleInProgressError, InventoryUnavailableError, StateStoreError } from '../../utils/errors.js';
import { CycleScheduler, type CycleRunner } from '../scheduler.js';

function summary(runId: string): CycleSummary {
    return {
        runId,
        startedAt: new Date('2024-05-01T12:00:00.000Z'),
        completedAt: new Date('2024-05-01T12:00:05.000Z'),
        dryRun: false,
        devicesPolled: 2,
        degradedDevices: [],
        partialDevices: [],
        unstable: [],
        counts: { add: 1, update: 0, remove: 0, confirm: 0, unchanged: 0, conflict: 0, skipped: 0 },
        failed: 0,
        outcomes: [],
    };
}

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('CycleScheduler', () => {
    it('runs a cycle and remembers its summary without outcomes', async () => {
        const runner: CycleRunner = { runCycle: vi.fn(async () => summary('run-1')) };
        const scheduler = new CycleScheduler(runner, { intervalSeconds: 60 });

        const result = await scheduler.runOnce();

        expect(result.runId).toBe('run-1');
        const status = scheduler.getStatus();
        expect(status.running).toBe(false);
        expect(status.lastRun).toBeInstanceOf(Date);
        expect(status.lastError).toBeNull();
        expect(status.lastSummary).not.toHaveProperty('outcomes');
        expect(status.lastSummary?.runId).toBe('run-1');
    });

    it('refuses to start a second cycle while one is running', async () => {
        const gate = deferred<CycleSummary>();
        const scheduler = new CycleScheduler({ runCycle: () => gate.promise }, { intervalSeconds: 60 });

        const first = scheduler.runOnce();
        expect(scheduler.isRunning()).toBe(true);
        await expect(scheduler.runOnce()).rejects.toBeInstanceOf(CycleInProgressError);

        gate.resolve(summary('run-1'));
        await first;
        expect(scheduler.isRunning()).toBe(false);
    });

    it('records the error of a failed cycle', async () => {
        const scheduler = new CycleScheduler(
            { runCycle: async () => Promise.reject(new InventoryUnavailableError('NetBox unreachable')) },
            { intervalSeconds: 60 },
        );

        await expect(scheduler.runOnce()).rejects.toThrow('NetBox unreachable');
        expect(scheduler.getStatus().lastError).toBe('NetBox unreachable');
        expect(scheduler.isRunning()).toBe(false);
    });

    it('keeps looping after a failed cycle and stops when aborted', async () => {
        const controller = new AbortController();
        let calls = 0;
        const runner: CycleRunner = {
            runCycle: async () => {
                calls++;
                if (calls === 1) throw new InventoryUnavailableError('NetBox unreachable');
                controller.abort();
                return summary('run-2');
            },
        };
        const scheduler = new CycleScheduler(runner, { intervalSeconds: 0 });

        await scheduler.runForever(controller.signal);

        expect(calls).toBe(2);
        expect(scheduler.getStatus().nextRun).toBeNull();
        expect(scheduler.getStatus().lastSummary?.runId).toBe('run-2');
    });

    it('waits for a triggered cycle instead of treating it as a failure', async () => {
        const controller = new AbortController();
        const gate = deferred<CycleSummary>();
        const runner: CycleRunner = { runCycle: vi.fn(() => gate.promise) };
        const scheduler = new CycleScheduler(runner, { intervalSeconds: 3600 });

        const triggered = scheduler.runOnce();
        const loop = scheduler.runForever(controller.signal);
        expect(scheduler.getStatus().nextRun).toBeNull();

        gate.resolve(summary('run-1'));
        await triggered;
        await vi.waitFor(() => expect(scheduler.getStatus().nextRun).not.toBeNull());
        controller.abort();
        await loop;

        expect(runner.runCycle).toHaveBeenCalledTimes(1);
        expect(scheduler.getStatus().lastError).toBeNull();
        expect(scheduler.getStatus().lastSummary?.runId).toBe('run-1');
    });

    it('ends the loop on a state store failure', async () => {
        const controller = new AbortController();
        const runner: CycleRunner = {
            runCycle: vi.fn(async () => Promise.reject(new StateStoreError('disk full'))),
        };
        const scheduler = new CycleScheduler(runner, { intervalSeconds: 0 });

        await expect(scheduler.runForever(controller.signal)).rejects.toBeInstanceOf(StateStoreError);
        expect(runner.runCycle).toHaveBeenCalledTimes(1);
    });

    it('wakes from the interval sleep when aborted', async () => {
        const controller = new AbortController();
        const runner: CycleRunner = { runCycle: vi.fn(async () => summary('run-1')) };
        const scheduler = new CycleScheduler(runner, { intervalSeconds: 3600 });

        const loop = scheduler.runForever(controller.signal);
        await vi.waitFor(() => expect(scheduler.getStatus().nextRun).not.toBeNull());
        controller.abort();
        await loop;

        expect(runner.runCycle).toHaveBeenCalledTimes(1);
        expect(scheduler.getStatus().nextRun).toBeNull();
    });
});
