/**
 * State Store
 *
 * Durable per-(device, interface) link snapshot and run history on SQLite.
 * One process writes; better-sqlite3 is synchronous so there is no
 * interleaving within a call.
 */

import { and, desc, eq, sql } from 'drizzle-orm';
import type { Endpoint, SnapshotEntry } from '../engine/types.js';
import { StateStoreError, errorMessage } from '../utils/errors.js';
import { endpointKey } from '../utils/helpers.js';
import { openDatabase, linkSnapshots, runHistory, type DatabaseHandle, type LinkSnapshotRow, type RunHistoryRow } from './index.js';

export interface RunRecord {
    id: string;
    startedAt: Date;
    finishedAt: Date | null;
    dryRun: boolean;
    status: 'completed' | 'failed';
    devicesPolled: number;
    degradedDevices: number;
    unstableInterfaces: number;
    added: number;
    updated: number;
    removed: number;
    confirmed: number;
    unchanged: number;
    conflicts: number;
    skipped: number;
    failed: number;
    errorMessage: string | null;
}

export const MAX_RUN_HISTORY_PAGE = 200;

function toEntry(row: LinkSnapshotRow): SnapshotEntry {
    const remote =
        row.remoteDevice !== null && row.remoteInterface !== null
            ? { device: row.remoteDevice, interface: row.remoteInterface }
            : null;
    return {
        device: row.device,
        interface: row.interfaceName,
        remote,
        cableId: row.cableId,
        runId: row.runId,
        confirmedAt: row.confirmedAt,
    };
}

function toRunRecord(row: RunHistoryRow): RunRecord {
    return { ...row };
}

export class StateStore {
    private closed = false;

    private constructor(private readonly handle: DatabaseHandle) {}

    /**
     * @throws StateStoreError when the file cannot be opened or initialized
     */
    static open(path: string): StateStore {
        try {
            return new StateStore(openDatabase(path));
        } catch (error) {
            throw new StateStoreError(`Cannot open state store at ${path}: ${errorMessage(error)}`, { cause: error });
        }
    }

    get(endpoint: Endpoint): SnapshotEntry | null {
        return this.guard('read snapshot entry', () => {
            const row = this.handle.db
                .select()
                .from(linkSnapshots)
                .where(and(eq(linkSnapshots.device, endpoint.device), eq(linkSnapshots.interfaceName, endpoint.interface)))
                .get();
            return row ? toEntry(row) : null;
        });
    }

    getDevice(device: string): SnapshotEntry[] {
        return this.guard('read device snapshot', () =>
            this.handle.db
                .select()
                .from(linkSnapshots)
                .where(eq(linkSnapshots.device, device))
                .orderBy(linkSnapshots.interfaceName)
                .all()
                .map(toEntry),
        );
    }

    /**
     * Every entry keyed by endpoint key
     */
    loadAll(): Map<string, SnapshotEntry> {
        return this.guard('load snapshot', () => {
            const entries = new Map<string, SnapshotEntry>();
            const rows = this.handle.db
                .select()
                .from(linkSnapshots)
                .orderBy(linkSnapshots.device, linkSnapshots.interfaceName)
                .all();
            for (const row of rows) {
                const entry = toEntry(row);
                entries.set(endpointKey(entry), entry);
            }
            return entries;
        });
    }

    upsert(entry: SnapshotEntry): void {
        this.upsertMany([entry]);
    }

    /**
     * Insert or replace entries in one transaction
     */
    upsertMany(entries: readonly SnapshotEntry[]): void {
        if (entries.length === 0) return;
        this.guard('write snapshot', () => {
            const now = new Date();
            this.handle.db.transaction((tx) => {
                for (const entry of entries) {
                    const values = {
                        remoteDevice: entry.remote?.device ?? null,
                        remoteInterface: entry.remote?.interface ?? null,
                        cableId: entry.cableId,
                        runId: entry.runId,
                        confirmedAt: entry.confirmedAt,
                        updatedAt: now,
                    };
                    tx.insert(linkSnapshots)
                        .values({ device: entry.device, interfaceName: entry.interface, createdAt: now, ...values })
                        .onConflictDoUpdate({
                            target: [linkSnapshots.device, linkSnapshots.interfaceName],
                            set: values,
                        })
                        .run();
                }
            });
        });
    }

    recordRun(record: RunRecord): void {
        this.guard('record run', () => {
            this.handle.db.insert(runHistory).values(record).run();
        });
    }

    /**
     * Most recent runs first
     */
    listRuns(limit = 20): RunRecord[] {
        const capped = Math.min(Math.max(1, Math.trunc(limit)), MAX_RUN_HISTORY_PAGE);
        return this.guard('list runs', () =>
            this.handle.db
                .select()
                .from(runHistory)
                .orderBy(desc(runHistory.startedAt), desc(sql`rowid`))
                .limit(capped)
                .all()
                .map(toRunRecord),
        );
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.handle.sqlite.close();
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof StateStoreError) throw error;
            throw new StateStoreError(`State store failed to ${operation}: ${errorMessage(error)}`, { cause: error });
        }
    }
}
