import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StateStore } from '../../db/state-store.js';
import { InventoryApiError, StateStoreError } from '../../utils/errors.js';
import { canonicalPair } from '../../utils/helpers.js';
import { ep, MemoryInventory } from '../../__tests__/fakes.js';
import { cableDescription, ReconciliationDriver } from '../reconciler.js';
import type { ChangeAction, ChangeSet } from '../types.js';

const sw1Gi1 = ep('sw1', 'Gi0/1');
const sw1Gi2 = ep('sw1', 'Gi0/2');
const sw2Gi5 = ep('sw2', 'Gi0/5');
const sw3Gi2 = ep('sw3', 'Gi0/2');

const now = new Date('2024-05-01T12:00:00.000Z');

function addAction(): ChangeAction {
    return {
        kind: 'add',
        pair: canonicalPair(sw1Gi1, sw2Gi5),
        terminations: { aInterfaceId: 11, bInterfaceId: 25 },
        tracked: [sw1Gi1, sw2Gi5],
        reason: 'new link',
    };
}

function changeSet(...actions: ChangeAction[]): ChangeSet {
    return { runId: 'run-1', actions };
}

describe('cableDescription', () => {
    it('tags the cable with the run and creation time', () => {
        expect(cableDescription('run-1', now)).toBe('autocabling:lldp | run=run-1 | created=2024-05-01T12:00:00Z');
    });
});

describe('ReconciliationDriver', () => {
    let inventory: MemoryInventory;
    let store: StateStore;

    beforeEach(() => {
        inventory = new MemoryInventory()
            .addDevice(1, 'sw1', '10.0.0.1')
            .addDevice(2, 'sw2', '10.0.0.2')
            .addDevice(3, 'sw3', '10.0.0.3')
            .addInterface(11, 'sw1', 'Gi0/1')
            .addInterface(12, 'sw1', 'Gi0/2')
            .addInterface(25, 'sw2', 'Gi0/5')
            .addInterface(32, 'sw3', 'Gi0/2');
        store = StateStore.open(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    function driver(dryRun = false): ReconciliationDriver {
        return new ReconciliationDriver(inventory, store, { dryRun, cableStatus: 'planned', now: () => now });
    }

    it('creates a cable and records both tracked endpoints', async () => {
        const outcomes = await driver().apply(changeSet(addAction()));

        expect(outcomes).toEqual([{ action: addAction(), status: 'applied', cableId: 100 }]);
        expect(inventory.cables.get(100)).toMatchObject({
            status: 'planned',
            description: 'autocabling:lldp | run=run-1 | created=2024-05-01T12:00:00Z',
        });
        expect(store.get(sw1Gi1)).toEqual({
            device: 'sw1',
            interface: 'Gi0/1',
            remote: sw2Gi5,
            cableId: 100,
            runId: 'run-1',
            confirmedAt: now,
        });
        expect(store.get(sw2Gi5)?.remote).toEqual(sw1Gi1);
    });

    it('applies deletions before re-terminations before additions', async () => {
        inventory.connect(7, 12, 25).connect(8, 11, 32);

        const outcomes = await driver().apply(
            changeSet(
                addAction(),
                {
                    kind: 'update',
                    pair: canonicalPair(sw1Gi2, sw3Gi2),
                    terminations: { aInterfaceId: 12, bInterfaceId: 32 },
                    tracked: [sw1Gi2],
                    cableId: 8,
                    previous: [sw1Gi1, sw3Gi2],
                    reason: 'moved',
                },
                { kind: 'remove', key: 'cable:7', tracked: [sw2Gi5], cableId: 7, reason: 'gone' },
            ),
        );

        expect(outcomes.map(o => o.action.kind)).toEqual(['remove', 'update', 'add']);
        expect(inventory.calls).toEqual(['delete:7', 'update:8', 'create:11-25']);
        expect(outcomes.map(o => o.status)).toEqual(['applied', 'applied', 'applied']);
    });

    it('creates a cable for a moved link that has no managed cable left', async () => {
        const moved = new ReconciliationDriver(inventory, store, { dryRun: false, cableStatus: 'connected', now: () => now });
        const action: ChangeAction = {
            kind: 'update',
            pair: canonicalPair(sw1Gi2, sw3Gi2),
            terminations: { aInterfaceId: 12, bInterfaceId: 32 },
            tracked: [sw1Gi2],
            cableId: null,
            previous: [sw2Gi5],
            reason: 'neighbor changed and no managed cable is attached, creating one',
        };

        const outcomes = await moved.apply(changeSet(action));

        expect(outcomes).toEqual([{ action, status: 'applied', cableId: 100 }]);
        expect(inventory.calls).toEqual(['create:12-32']);
        expect(inventory.cables.get(100)).toMatchObject({
            status: 'connected',
            description: 'autocabling:lldp | run=run-1 | created=2024-05-01T12:00:00Z',
        });
        expect(store.get(sw1Gi2)).toEqual({
            device: 'sw1',
            interface: 'Gi0/2',
            remote: sw3Gi2,
            cableId: 100,
            runId: 'run-1',
            confirmedAt: now,
        });
        expect(store.get(sw3Gi2)).toBeNull();
    });

    it('records a removal as a transition to no neighbor', async () => {
        inventory.connect(7, 11, 25);
        store.upsert({ device: 'sw1', interface: 'Gi0/1', remote: sw2Gi5, cableId: 7, runId: 'run-0', confirmedAt: now });

        await driver().apply(
            changeSet({ kind: 'remove', key: 'cable:7', tracked: [sw1Gi1], cableId: 7, reason: 'gone' }),
        );

        expect(inventory.cables.has(7)).toBe(false);
        expect(store.get(sw1Gi1)).toMatchObject({ remote: null, cableId: null, runId: 'run-1' });
    });

    it('treats a cable that is already gone as deleted', async () => {
        const outcomes = await driver().apply(
            changeSet({ kind: 'remove', key: 'cable:55', tracked: [sw1Gi1], cableId: 55, reason: 'gone' }),
        );

        expect(outcomes[0].status).toBe('applied');
        expect(store.get(sw1Gi1)?.remote).toBeNull();
    });

    it('keeps going after an inventory failure and writes nothing for the failed action', async () => {
        inventory.connect(7, 12, 25);
        inventory.failures.create = new InventoryApiError('NetBox API error: 500 - boom', 500, 'POST /api/dcim/cables/');

        const outcomes = await driver().apply(
            changeSet(addAction(), { kind: 'remove', key: 'cable:7', tracked: [sw1Gi2], cableId: 7, reason: 'gone' }),
        );

        expect(outcomes.map(o => [o.action.kind, o.status])).toEqual([
            ['remove', 'applied'],
            ['add', 'failed'],
        ]);
        expect(outcomes[1].error).toBe('NetBox API error: 500 - boom');
        expect(store.get(sw1Gi1)).toBeNull();
        expect(store.get(sw1Gi2)?.remote).toBeNull();
    });

    it('plans changes without touching inventory or store in dry-run', async () => {
        inventory.connect(7, 12, 25);

        const outcomes = await driver(true).apply(
            changeSet(addAction(), { kind: 'remove', key: 'cable:7', tracked: [sw1Gi2], cableId: 7, reason: 'gone' }),
        );

        expect(outcomes.map(o => [o.action.kind, o.status, o.cableId])).toEqual([
            ['remove', 'planned', 7],
            ['add', 'planned', null],
        ]);
        expect(inventory.calls).toEqual([]);
        expect(store.loadAll().size).toBe(0);
    });

    it('reports conflicts, skips and unchanged links as no-ops', async () => {
        const outcomes = await driver().apply(
            changeSet(
                { kind: 'conflict', key: 'k', endpoints: [sw1Gi1], reason: 'r' },
                { kind: 'skipped', key: 'k2', endpoints: [sw2Gi5], reason: 'r' },
                { kind: 'unchanged', pair: canonicalPair(sw1Gi1, sw2Gi5), cableId: 4 },
            ),
        );

        expect(outcomes.map(o => [o.status, o.cableId])).toEqual([
            ['noop', null],
            ['noop', null],
            ['noop', 4],
        ]);
        expect(inventory.calls).toEqual([]);
        expect(store.loadAll().size).toBe(0);
    });

    it('records a confirmed cable without calling the inventory', async () => {
        await driver().apply(
            changeSet({ kind: 'confirm', pair: canonicalPair(sw1Gi1, sw2Gi5), tracked: [sw2Gi5], cableId: null, reason: 'r' }),
        );

        expect(inventory.calls).toEqual([]);
        expect(store.get(sw2Gi5)).toMatchObject({ remote: sw1Gi1, cableId: null });
    });

    it('stops the cycle when the state store fails', async () => {
        const failing = {
            upsertMany(): void {
                throw new StateStoreError('disk full');
            },
        };
        const broken = new ReconciliationDriver(inventory, failing, { dryRun: false, cableStatus: 'planned' });

        await expect(broken.apply(changeSet(addAction()))).rejects.toBeInstanceOf(StateStoreError);
    });
});
