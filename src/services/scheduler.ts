/**
 * Cycle Scheduler
 *
 * Runs the cabling pipeline once or on a fixed interval. Only one cycle runs
 * at a time; the interval counts from the end of one cycle to the start of
 * the next.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { CycleSummary } from '../engine/types.js';
import { CycleInProgressError, StateStoreError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface CycleRunner {
    runCycle(): Promise<CycleSummary>;
}

export interface SchedulerOptions {
    intervalSeconds: number;
    logger?: Logger;
}

export type CycleReport = Omit<CycleSummary, 'outcomes'>;

export interface SchedulerStatus {
    running: boolean;
    intervalSeconds: number;
    lastRun: Date | null;
    nextRun: Date | null;
    lastSummary: CycleReport | null;
    lastError: string | null;
}

export class CycleScheduler {
    private readonly logger: Logger;
    private running = false;
    private current: Promise<CycleSummary> | null = null;
    private lastRun: Date | null = null;
    private nextRun: Date | null = null;
    private lastSummary: CycleReport | null = null;
    private lastError: string | null = null;

    constructor(
        private readonly pipeline: CycleRunner,
        private readonly options: SchedulerOptions,
    ) {
        this.logger = options.logger ?? createLogger('scheduler');
    }

    /**
     * Run one cycle now
     *
     * @throws CycleInProgressError when a cycle is already running
     */
    async runOnce(): Promise<CycleSummary> {
        if (this.running) throw new CycleInProgressError();

        this.running = true;
        this.nextRun = null;
        try {
            const cycle = this.pipeline.runCycle();
            this.current = cycle;
            const summary = await cycle;
            const { outcomes: _outcomes, ...report } = summary;
            this.lastSummary = report;
            this.lastError = null;
            return summary;
        } catch (error) {
            this.lastError = errorMessage(error);
            throw error;
        } finally {
            this.running = false;
            this.current = null;
            this.lastRun = new Date();
        }
    }

    /**
     * Repeat cycles until the signal aborts
     *
     * A failed cycle is logged and the loop continues; a state store failure
     * ends the loop. When a triggered cycle is already running, the loop waits
     * for it and counts it as its own.
     */
    async runForever(signal: AbortSignal): Promise<void> {
        const intervalMs = this.options.intervalSeconds * 1000;
        this.logger.info({ intervalSeconds: this.options.intervalSeconds }, 'Scheduler started');

        while (!signal.aborted) {
            try {
                await this.runOnce();
            } catch (error) {
                if (error instanceof StateStoreError) throw error;
                if (error instanceof CycleInProgressError) {
                    this.logger.debug('Cycle already running, waiting for it to finish');
                    await this.settled();
                } else {
                    this.logger.error({ err: errorMessage(error) }, 'Cabling cycle failed');
                }
            }

            if (signal.aborted) break;
            this.nextRun = new Date(Date.now() + intervalMs);
            try {
                await sleep(intervalMs, undefined, { signal });
            } catch (error) {
                if (signal.aborted) break;
                throw error;
            }
        }

        this.nextRun = null;
        this.logger.info('Scheduler stopped');
    }

    private async settled(): Promise<void> {
        const cycle = this.current;
        if (!cycle) return;
        // The trigger that started the cycle reports its failure
        await cycle.then(
            () => undefined,
            (error: unknown) => this.logger.debug({ err: errorMessage(error) }, 'Triggered cycle failed'),
        );
    }

    isRunning(): boolean {
        return this.running;
    }

    getStatus(): SchedulerStatus {
        return {
            running: this.running,
            intervalSeconds: this.options.intervalSeconds,
            lastRun: this.lastRun,
            nextRun: this.nextRun,
            lastSummary: this.lastSummary,
            lastError: this.lastError,
        };
    }
}
