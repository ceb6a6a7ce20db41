/**
 * In-process stand-ins for SNMP and the inventory
 */

import {
    BaseInventoryConnector,
    type CableDraft,
    type CableTerminationIds,
    type DeviceFilter,
    type InventoryDevice,
    type InventoryInterface,
} from '../connectors/base.js';
import type { SnmpSession, SnmpTarget, SnmpTransport, SnmpVarbind } from '../engine/snmp.js';
import type { SnapshotSource } from '../engine/stability.js';
import type {
    CableRecord,
    DeviceReading,
    DeviceSnapshot,
    Endpoint,
    InventoryInterfaceRef,
    InventoryView,
    LinkConfidence,
    PollTarget,
    SnapshotEntry,
    StabilizedLink,
} from '../engine/types.js';
import { InventoryApiError } from '../utils/errors.js';
import { endpointKey } from '../utils/helpers.js';

export function ep(device: string, iface: string): Endpoint {
    return { device, interface: iface };
}

// ============================================
// SNMP
// ============================================

export type WalkTable = Record<string, SnmpVarbind[]>;

export class FakeSnmpTransport implements SnmpTransport {
    opened: SnmpTarget[] = [];
    closed = 0;
    walked: string[] = [];

    constructor(
        private readonly tables: Record<string, WalkTable>,
        private readonly failures: Record<string, Error> = {},
    ) {}

    open(target: SnmpTarget): SnmpSession {
        this.opened.push(target);
        const table = this.tables[target.address] ?? {};
        const failure = this.failures[target.address];
        return {
            walk: async (oid: string) => {
                this.walked.push(oid);
                if (failure) throw failure;
                return table[oid] ?? [];
            },
            close: () => {
                this.closed++;
            },
        };
    }
}

/**
 * Column varbinds from index → value pairs
 */
export function column(base: string, values: Record<string, unknown>): SnmpVarbind[] {
    return Object.entries(values).map(([index, value]) => ({ oid: `${base}.${index}`, value }));
}

// ============================================
// Snapshots and readings
// ============================================

export function snapshot(
    device: string,
    round: number,
    neighbors: Record<string, Endpoint | null>,
    excluded: string[] = [],
): DeviceSnapshot {
    return {
        device,
        round,
        observedAt: new Date('2024-05-01T12:00:00.000Z'),
        neighbors: new Map(Object.entries(neighbors)),
        excluded,
    };
}

/**
 * SnapshotSource answering every round with the same table, or failing
 */
export class StaticNeighborSource implements SnapshotSource {
    reads: Array<{ device: string; round: number }> = [];
    /** Interfaces each device reports as excluded */
    excluded: Record<string, string[]> = {};

    constructor(
        public tables: Record<string, Record<string, Endpoint | null>>,
        public failures: Record<string, Error> = {},
    ) {}

    async read(target: PollTarget & { address: string }, round: number): Promise<DeviceSnapshot> {
        this.reads.push({ device: target.name, round });
        const failure = this.failures[target.name];
        if (failure) throw failure;
        return snapshot(target.name, round, this.tables[target.name] ?? {}, this.excluded[target.name] ?? []);
    }
}

export function link(local: Endpoint, remote: Endpoint | null, confidence: LinkConfidence = 'stable'): StabilizedLink {
    return { local, remote: confidence === 'stable' ? remote : null, confidence, observations: [] };
}

export function reading(
    device: string,
    links: StabilizedLink[],
    health: DeviceReading['health'] = 'ok',
    excluded: string[] = [],
): DeviceReading {
    return { device, health, links, errors: [], excluded };
}

export function entry(local: Endpoint, remote: Endpoint | null, cableId: number | null, runId = 'run-0'): SnapshotEntry {
    return {
        device: local.device,
        interface: local.interface,
        remote,
        cableId,
        runId,
        confirmedAt: new Date('2024-04-30T08:00:00.000Z'),
    };
}

export function priorOf(...entries: SnapshotEntry[]): Map<string, SnapshotEntry> {
    return new Map(entries.map(e => [endpointKey(e), e]));
}

export function cable(id: number, a: [number, Endpoint], b: [number, Endpoint], status = 'planned'): CableRecord {
    return {
        id,
        status,
        description: '',
        aSide: [{ interfaceId: a[0], ...a[1] }],
        bSide: [{ interfaceId: b[0], ...b[1] }],
    };
}

export function viewOf(
    interfaces: Array<[Endpoint, number, number | null]>,
    cables: CableRecord[] = [],
): InventoryView {
    const refs = new Map<string, InventoryInterfaceRef>();
    for (const [endpoint, id, cableId] of interfaces) refs.set(endpointKey(endpoint), { id, cableId });
    return { interfaces: refs, cables: new Map(cables.map(c => [c.id, c])) };
}

// ============================================
// Inventory
// ============================================

export interface InventoryFailures {
    devices?: Error;
    create?: InventoryApiError;
    update?: InventoryApiError;
    delete?: InventoryApiError;
}

export class MemoryInventory extends BaseInventoryConnector {
    devices: InventoryDevice[] = [];
    interfaces: InventoryInterface[] = [];
    cables = new Map<number, CableRecord>();
    calls: string[] = [];
    failures: InventoryFailures = {};
    private nextCableId = 100;

    constructor() {
        super('Memory', 'memory');
    }

    addDevice(id: number, name: string, primaryAddress: string | null, role: string | null = 'leaf'): this {
        this.devices.push({ id, name, primaryAddress, site: 'dc1', role });
        return this;
    }

    addInterface(id: number, deviceName: string, name: string): this {
        const device = this.devices.find(d => d.name === deviceName);
        if (!device) throw new Error(`unknown device ${deviceName}`);
        this.interfaces.push({ id, name, deviceId: device.id, deviceName, cableId: null });
        return this;
    }

    /**
     * Seed an existing cable between two interface ids
     */
    connect(id: number, aInterfaceId: number, bInterfaceId: number): this {
        this.cables.set(id, this.buildCable(id, { aInterfaceId, bInterfaceId }, 'connected', ''));
        return this;
    }

    interfaceById(id: number): InventoryInterface {
        const iface = this.interfaces.find(i => i.id === id);
        if (!iface) throw new Error(`unknown interface ${id}`);
        return iface;
    }

    async testConnection(): Promise<{ success: boolean; message: string }> {
        return { success: true, message: 'Connected to memory inventory' };
    }

    async getDevices(filter: DeviceFilter): Promise<InventoryDevice[]> {
        if (this.failures.devices) throw this.failures.devices;
        return this.devices.filter(
            d => (!filter.role || d.role === filter.role) && (!filter.site || d.site === filter.site),
        );
    }

    async findDeviceByName(name: string): Promise<InventoryDevice | null> {
        return this.devices.find(d => d.name === name) ?? null;
    }

    async getInterfaces(deviceId: number): Promise<InventoryInterface[]> {
        return this.interfaces.filter(i => i.deviceId === deviceId).map(i => ({ ...i }));
    }

    async getCables(ids: readonly number[]): Promise<CableRecord[]> {
        return ids.flatMap(id => {
            const record = this.cables.get(id);
            return record ? [record] : [];
        });
    }

    async createCable(draft: CableDraft): Promise<CableRecord> {
        if (this.failures.create) throw this.failures.create;
        const id = this.nextCableId++;
        const record = this.buildCable(id, draft, draft.status, draft.description);
        this.cables.set(id, record);
        this.calls.push(`create:${draft.aInterfaceId}-${draft.bInterfaceId}`);
        return record;
    }

    async updateCable(id: number, terminations: CableTerminationIds): Promise<CableRecord> {
        if (this.failures.update) throw this.failures.update;
        const existing = this.cables.get(id);
        if (!existing) throw new InventoryApiError('Not found', 404, `PATCH dcim/cables/${id}/`);
        this.detach(id);
        const record = this.buildCable(id, terminations, existing.status, existing.description);
        this.cables.set(id, record);
        this.calls.push(`update:${id}`);
        return record;
    }

    async deleteCable(id: number): Promise<void> {
        if (this.failures.delete) throw this.failures.delete;
        if (!this.cables.has(id)) throw new InventoryApiError('Not found', 404, `DELETE dcim/cables/${id}/`);
        this.detach(id);
        this.cables.delete(id);
        this.calls.push(`delete:${id}`);
    }

    private buildCable(id: number, ids: CableTerminationIds, status: string, description: string): CableRecord {
        const a = this.interfaceById(ids.aInterfaceId);
        const b = this.interfaceById(ids.bInterfaceId);
        a.cableId = id;
        b.cableId = id;
        return {
            id,
            status,
            description,
            aSide: [{ interfaceId: a.id, device: a.deviceName, interface: a.name }],
            bSide: [{ interfaceId: b.id, device: b.deviceName, interface: b.name }],
        };
    }

    private detach(id: number): void {
        for (const iface of this.interfaces) {
            if (iface.cableId === id) iface.cableId = null;
        }
    }
}
