/**
 * Reconciliation Driver
 *
 * Applies a ChangeSet to the inventory: deletions first, then
 * re-terminations, then new cables. Each action stands alone; a failed
 * inventory call marks that action failed and the rest continue. Snapshot
 * entries are written only after the inventory accepted the change.
 */

import type { CableStatus } from '../config.js';
import type { BaseInventoryConnector } from '../connectors/base.js';
import { InventoryApiError, errorMessage } from '../utils/errors.js';
import { formatEndpoint, sameEndpoint } from '../utils/helpers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { ActionKind, ActionOutcome, ChangeAction, ChangeSet, Endpoint, LinkPair, SnapshotEntry } from './types.js';

export interface SnapshotWriter {
    upsertMany(entries: readonly SnapshotEntry[]): void;
}

export interface ReconcilerOptions {
    dryRun: boolean;
    cableStatus: CableStatus;
    logger?: Logger;
    now?: () => Date;
}

const APPLY_ORDER: Record<ActionKind, number> = {
    remove: 0,
    update: 1,
    add: 2,
    confirm: 3,
    unchanged: 4,
    conflict: 4,
    skipped: 4,
};

export const CABLE_TAG = 'autocabling:lldp';

/**
 * Description written on every cable the engine creates
 */
export function cableDescription(runId: string, createdAt: Date): string {
    const timestamp = createdAt.toISOString().replace(/\.\d{3}Z$/, 'Z');
    return [CABLE_TAG, `run=${runId}`, `created=${timestamp}`].join(' | ');
}

function pairEntries(pair: LinkPair, tracked: Endpoint[], cableId: number | null, runId: string, at: Date): SnapshotEntry[] {
    return tracked.map(endpoint => ({
        device: endpoint.device,
        interface: endpoint.interface,
        remote: sameEndpoint(endpoint, pair.a) ? pair.b : pair.a,
        cableId,
        runId,
        confirmedAt: at,
    }));
}

function describe(action: ChangeAction): Record<string, unknown> {
    if ('pair' in action) {
        return { action: action.kind, device: action.pair.a.device, interface: action.pair.a.interface, remote: formatEndpoint(action.pair.b) };
    }
    const [first, ...rest] = action.kind === 'remove' ? action.tracked : action.endpoints;
    return {
        action: action.kind,
        device: first?.device,
        interface: first?.interface,
        remote: rest.length > 0 ? rest.map(formatEndpoint).join(', ') : undefined,
    };
}

export class ReconciliationDriver {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(
        private readonly inventory: BaseInventoryConnector,
        private readonly store: SnapshotWriter,
        private readonly options: ReconcilerOptions,
    ) {
        this.logger = options.logger ?? createLogger('reconciler');
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Apply every action, one at a time
     *
     * Outcomes come back in application order.
     *
     * @throws StateStoreError when a snapshot write fails; the cycle stops there
     */
    async apply(changeSet: ChangeSet): Promise<ActionOutcome[]> {
        const ordered = [...changeSet.actions].sort((x, y) => APPLY_ORDER[x.kind] - APPLY_ORDER[y.kind]);
        const outcomes: ActionOutcome[] = [];
        for (const action of ordered) {
            outcomes.push(await this.applyAction(action, changeSet.runId));
        }
        return outcomes;
    }

    private async applyAction(action: ChangeAction, runId: string): Promise<ActionOutcome> {
        const context = describe(action);

        if (action.kind === 'unchanged') {
            return { action, status: 'noop', cableId: action.cableId };
        }
        if (action.kind === 'conflict' || action.kind === 'skipped') {
            this.logger.warn({ ...context, reason: action.reason }, action.kind === 'conflict' ? 'Cabling conflict' : 'Link skipped');
            return { action, status: 'noop', cableId: null };
        }

        if (this.options.dryRun) {
            const cableId = action.kind === 'add' ? null : action.cableId;
            this.logger.info({ ...context, cableId, reason: action.reason }, 'DRY RUN: would apply change');
            return { action, status: 'planned', cableId };
        }

        let cableId: number | null;
        let entries: SnapshotEntry[];
        try {
            ({ cableId, entries } = await this.mutate(action, runId));
        } catch (error) {
            if (!(error instanceof InventoryApiError)) throw error;
            this.logger.error(
                { ...context, status: error.status, endpoint: error.endpoint, err: errorMessage(error) },
                'Inventory rejected change',
            );
            return { action, status: 'failed', cableId: null, error: errorMessage(error) };
        }

        this.store.upsertMany(entries);
        this.logger.info({ ...context, cableId, reason: action.reason }, 'Applied change');
        return { action, status: 'applied', cableId };
    }

    private async mutate(
        action: Exclude<ChangeAction, { kind: 'unchanged' | 'conflict' | 'skipped' }>,
        runId: string,
    ): Promise<{ cableId: number | null; entries: SnapshotEntry[] }> {
        const at = this.now();

        switch (action.kind) {
            case 'add': {
                const cable = await this.inventory.createCable({
                    ...action.terminations,
                    status: this.options.cableStatus,
                    description: cableDescription(runId, at),
                });
                return { cableId: cable.id, entries: pairEntries(action.pair, action.tracked, cable.id, runId, at) };
            }

            case 'update': {
                const cable =
                    action.cableId !== null
                        ? await this.inventory.updateCable(action.cableId, action.terminations)
                        : await this.inventory.createCable({
                              ...action.terminations,
                              status: this.options.cableStatus,
                              description: cableDescription(runId, at),
                          });
                return { cableId: cable.id, entries: pairEntries(action.pair, action.tracked, cable.id, runId, at) };
            }

            case 'remove': {
                if (action.cableId !== null) {
                    try {
                        await this.inventory.deleteCable(action.cableId);
                    } catch (error) {
                        if (!(error instanceof InventoryApiError && error.isNotFound)) throw error;
                        this.logger.debug({ cableId: action.cableId }, 'Cable already gone from inventory');
                    }
                }
                const entries = action.tracked.map(endpoint => ({
                    device: endpoint.device,
                    interface: endpoint.interface,
                    remote: null,
                    cableId: null,
                    runId,
                    confirmedAt: at,
                }));
                return { cableId: action.cableId, entries };
            }

            case 'confirm':
                return { cableId: action.cableId, entries: pairEntries(action.pair, action.tracked, action.cableId, runId, at) };
        }
    }
}
