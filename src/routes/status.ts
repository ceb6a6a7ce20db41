/**
 * Status API Routes
 *
 * Scheduler state, run history and the confirmed link snapshot
 */

import { Router, Request, Response } from 'express';
import type { StateStore } from '../db/state-store.js';
import type { CycleScheduler, CycleReport } from '../services/scheduler.js';
import { CycleInProgressError } from '../utils/errors.js';
import { formatEndpoint } from '../utils/helpers.js';
import type { SnapshotEntry } from '../engine/types.js';

export interface StatusRouterDeps {
    scheduler: CycleScheduler;
    store: Pick<StateStore, 'listRuns' | 'loadAll' | 'getDevice'>;
}

function reportJson(report: CycleReport) {
    return {
        ...report,
        startedAt: report.startedAt.toISOString(),
        completedAt: report.completedAt.toISOString(),
        unstable: report.unstable.map(formatEndpoint),
    };
}

function entryJson(entry: SnapshotEntry) {
    return {
        device: entry.device,
        interface: entry.interface,
        remote: entry.remote,
        cableId: entry.cableId,
        runId: entry.runId,
        confirmedAt: entry.confirmedAt.toISOString(),
    };
}

export function createStatusRouter({ scheduler, store }: StatusRouterDeps): Router {
    const router = Router();

    /**
     * GET /api/v1/status
     * Scheduler state and the last cycle summary
     */
    router.get('/status', (req: Request, res: Response) => {
        const status = scheduler.getStatus();
        res.json({
            running: status.running,
            intervalSeconds: status.intervalSeconds,
            lastRun: status.lastRun?.toISOString() || null,
            nextRun: status.nextRun?.toISOString() || null,
            lastError: status.lastError,
            lastSummary: status.lastSummary ? reportJson(status.lastSummary) : null,
        });
    });

    /**
     * GET /api/v1/runs?limit=20
     * Run history, newest first
     */
    router.get('/runs', (req: Request, res: Response) => {
        const limit = req.query.limit === undefined ? 20 : parseInt(String(req.query.limit), 10);
        if (Number.isNaN(limit) || limit < 1) {
            return res.status(400).json({ error: 'limit must be a positive integer' });
        }

        try {
            const runs = store.listRuns(limit);
            res.json({
                count: runs.length,
                runs: runs.map(run => ({
                    ...run,
                    startedAt: run.startedAt.toISOString(),
                    finishedAt: run.finishedAt?.toISOString() || null,
                })),
            });
        } catch (error) {
            res.status(500).json({ error: error instanceof Error ? error.message : 'Failed to list runs' });
        }
    });

    /**
     * GET /api/v1/links?device=sw1
     * Confirmed snapshot entries, optionally for one device
     */
    router.get('/links', (req: Request, res: Response) => {
        const device = typeof req.query.device === 'string' ? req.query.device : undefined;
        try {
            const entries = device ? store.getDevice(device) : [...store.loadAll().values()];
            res.json({ count: entries.length, links: entries.map(entryJson) });
        } catch (error) {
            res.status(500).json({ error: error instanceof Error ? error.message : 'Failed to list links' });
        }
    });

    /**
     * POST /api/v1/runs/trigger
     * Run one cycle now and return its summary
     */
    router.post('/runs/trigger', async (req: Request, res: Response) => {
        try {
            const summary = await scheduler.runOnce();
            const { outcomes, ...report } = summary;
            res.json({
                ...reportJson(report),
                outcomes: outcomes.map(o => ({ kind: o.action.kind, status: o.status, cableId: o.cableId, error: o.error })),
            });
        } catch (error) {
            if (error instanceof CycleInProgressError) {
                return res.status(409).json({ error: error.message });
            }
            res.status(500).json({ error: error instanceof Error ? error.message : 'Cycle failed' });
        }
    });

    return router;
}
