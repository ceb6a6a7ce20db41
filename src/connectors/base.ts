/**
 * Base connector interface for inventory (DCIM) integrations
 */

import type { CableStatus } from '../config.js';
import type { CableRecord } from '../engine/types.js';

export interface InventoryDevice {
    id: number;
    name: string;
    /** Management address without prefix length */
    primaryAddress: string | null;
    site: string | null;
    role: string | null;
}

export interface InventoryInterface {
    id: number;
    name: string;
    deviceId: number;
    deviceName: string;
    cableId: number | null;
}

export interface DeviceFilter {
    role: string | null;
    site: string | null;
}

export interface CableTerminationIds {
    aInterfaceId: number;
    bInterfaceId: number;
}

export interface CableDraft extends CableTerminationIds {
    status: CableStatus;
    description: string;
}

/**
 * Base class for inventory connectors
 *
 * Every failing call rejects with InventoryApiError.
 */
export abstract class BaseInventoryConnector {
    protected name: string;
    protected type: 'netbox' | 'memory' | 'other';

    constructor(name: string, type: BaseInventoryConnector['type']) {
        this.name = name;
        this.type = type;
    }

    /**
     * Test connection to the inventory
     */
    abstract testConnection(): Promise<{ success: boolean; message: string }>;

    /**
     * Devices to poll, selected by role and site
     */
    abstract getDevices(filter: DeviceFilter): Promise<InventoryDevice[]>;

    abstract findDeviceByName(name: string): Promise<InventoryDevice | null>;

    abstract getInterfaces(deviceId: number): Promise<InventoryInterface[]>;

    /**
     * Cables by id; ids the inventory does not know are left out
     */
    abstract getCables(ids: readonly number[]): Promise<CableRecord[]>;

    abstract createCable(draft: CableDraft): Promise<CableRecord>;

    /**
     * Re-terminate an existing cable onto a new interface pair
     */
    abstract updateCable(id: number, terminations: CableTerminationIds): Promise<CableRecord>;

    abstract deleteCable(id: number): Promise<void>;

    /**
     * Get connector name
     */
    getName(): string {
        return this.name;
    }

    /**
     * Get connector type
     */
    getType(): BaseInventoryConnector['type'] {
        return this.type;
    }
}
