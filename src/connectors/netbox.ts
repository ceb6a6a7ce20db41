/**
 * NetBox Connector
 *
 * DCIM devices, interfaces and cables over the NetBox REST API.
 * API Docs: <netbox-url>/api/schema/swagger-ui/
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { InventoryConfig } from '../config.js';
import type { CableRecord, CableTermination } from '../engine/types.js';
import { InventoryApiError, errorMessage } from '../utils/errors.js';
import {
    BaseInventoryConnector,
    type CableDraft,
    type CableTerminationIds,
    type DeviceFilter,
    type InventoryDevice,
    type InventoryInterface,
} from './base.js';

const PAGE_SIZE = 1000;
const CABLE_ID_BATCH = 50;

const slugRef = z.object({ slug: z.string() }).nullable().optional();

const deviceSchema = z.object({
    id: z.number(),
    name: z.string().nullable(),
    primary_ip: z.object({ address: z.string() }).nullable().optional(),
    site: slugRef,
    // NetBox < 3.6 calls it device_role
    role: slugRef,
    device_role: slugRef,
});

const interfaceSchema = z.object({
    id: z.number(),
    name: z.string(),
    device: z.object({ id: z.number(), name: z.string().nullable().optional() }),
    cable: z.object({ id: z.number() }).nullable().optional(),
});

const terminationSchema = z.object({
    object_type: z.string(),
    object_id: z.number(),
    object: z
        .object({
            name: z.string().optional(),
            device: z.object({ name: z.string().nullable().optional() }).optional(),
        })
        .optional(),
});

const cableSchema = z.object({
    id: z.number(),
    status: z.union([z.string(), z.object({ value: z.string() })]).nullable().optional(),
    description: z.string().nullable().optional(),
    a_terminations: z.array(terminationSchema).optional(),
    b_terminations: z.array(terminationSchema).optional(),
});

const pageSchema = z.object({
    next: z.string().nullable().optional(),
    results: z.array(z.unknown()),
});

const statusSchema = z.object({
    'netbox-version': z.string().optional(),
});

type NetBoxDevice = z.infer<typeof deviceSchema>;
type NetBoxCable = z.infer<typeof cableSchema>;
type NetBoxTermination = z.infer<typeof terminationSchema>;

function toDevice(device: NetBoxDevice): InventoryDevice {
    const address = device.primary_ip?.address.split('/')[0] ?? '';
    return {
        id: device.id,
        name: device.name ?? `device-${device.id}`,
        primaryAddress: address || null,
        site: device.site?.slug ?? null,
        role: device.role?.slug ?? device.device_role?.slug ?? null,
    };
}

function toTerminations(terminations: NetBoxTermination[] | undefined): CableTermination[] {
    return (terminations ?? [])
        .filter(t => t.object_type === 'dcim.interface')
        .map(t => ({
            interfaceId: t.object_id,
            device: t.object?.device?.name ?? '',
            interface: t.object?.name ?? '',
        }));
}

function toCable(cable: NetBoxCable): CableRecord {
    const status = typeof cable.status === 'string' ? cable.status : cable.status?.value;
    return {
        id: cable.id,
        status: status ?? 'unknown',
        description: cable.description ?? '',
        aSide: toTerminations(cable.a_terminations),
        bSide: toTerminations(cable.b_terminations),
    };
}

function terminationBody(ids: CableTerminationIds) {
    return {
        a_terminations: [{ object_type: 'dcim.interface', object_id: ids.aInterfaceId }],
        b_terminations: [{ object_type: 'dcim.interface', object_id: ids.bInterfaceId }],
    };
}

export class NetBoxConnector extends BaseInventoryConnector {
    private readonly baseUrl: string;
    private readonly dispatcher: Dispatcher | undefined;

    constructor(
        private readonly config: InventoryConfig,
        dispatcher?: Dispatcher,
    ) {
        super('NetBox', 'netbox');
        this.baseUrl = config.url.replace(/\/$/, '');
        this.dispatcher =
            dispatcher ?? (config.verifyTls ? undefined : new Agent({ connect: { rejectUnauthorized: false } }));
    }

    private async request(method: string, target: string, body?: unknown): Promise<unknown> {
        const url = target.startsWith('http') ? target : `${this.baseUrl}/api/${target}`;
        const endpoint = `${method} ${url.replace(this.baseUrl, '')}`;

        let response: Awaited<ReturnType<typeof fetch>>;
        try {
            response = await fetch(url, {
                method,
                headers: {
                    Authorization: `${this.config.authScheme} ${this.config.token}`,
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                dispatcher: this.dispatcher,
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (error) {
            throw new InventoryApiError(`NetBox request failed: ${errorMessage(error)}`, null, endpoint, { cause: error });
        }

        if (!response.ok) {
            const detail = await response.text();
            throw new InventoryApiError(
                `NetBox API error: ${response.status} - ${detail.slice(0, 500)}`,
                response.status,
                endpoint,
            );
        }

        if (response.status === 204) return null;
        try {
            return await response.json();
        } catch (error) {
            throw new InventoryApiError(`NetBox returned invalid JSON: ${errorMessage(error)}`, response.status, endpoint, {
                cause: error,
            });
        }
    }

    private async fetch<S extends z.ZodTypeAny>(
        target: string,
        schema: S,
        options?: { method?: string; body?: unknown },
    ): Promise<z.output<S>> {
        const method = options?.method ?? 'GET';
        const payload = await this.request(method, target, options?.body);
        return this.parse(schema, payload, `${method} ${target}`);
    }

    private parse<S extends z.ZodTypeAny>(schema: S, payload: unknown, endpoint: string): z.output<S> {
        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
            throw new InventoryApiError(
                `Unexpected NetBox response: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
                null,
                endpoint,
            );
        }
        return parsed.data;
    }

    /**
     * Follow `next` links until every page is read
     */
    private async getAll<S extends z.ZodTypeAny>(endpoint: string, params: URLSearchParams, item: S): Promise<Array<z.output<S>>> {
        params.set('limit', String(PAGE_SIZE));
        const results: Array<z.output<S>> = [];
        let next: string | null = `${endpoint}?${params.toString()}`;

        while (next) {
            const page: z.infer<typeof pageSchema> = await this.fetch(next, pageSchema);
            for (const raw of page.results) results.push(this.parse(item, raw, endpoint));
            next = page.next ?? null;
        }
        return results;
    }

    async testConnection(): Promise<{ success: boolean; message: string }> {
        try {
            const status = await this.fetch('status/', statusSchema);
            const version = status['netbox-version'];
            return {
                success: true,
                message: version ? `Connected to NetBox ${version}` : 'Connected to NetBox',
            };
        } catch (error) {
            return {
                success: false,
                message: error instanceof Error ? error.message : 'Connection failed',
            };
        }
    }

    async getDevices(filter: DeviceFilter): Promise<InventoryDevice[]> {
        const params = new URLSearchParams();
        if (filter.role) params.set('role', filter.role);
        if (filter.site) params.set('site', filter.site);

        const devices = await this.getAll('dcim/devices/', params, deviceSchema);
        return devices.map(toDevice);
    }

    async findDeviceByName(name: string): Promise<InventoryDevice | null> {
        const devices = await this.getAll('dcim/devices/', new URLSearchParams({ name }), deviceSchema);
        const match = devices.find(device => device.name === name);
        return match ? toDevice(match) : null;
    }

    async getInterfaces(deviceId: number): Promise<InventoryInterface[]> {
        const params = new URLSearchParams({ device_id: String(deviceId) });
        const interfaces = await this.getAll('dcim/interfaces/', params, interfaceSchema);

        return interfaces.map(iface => ({
            id: iface.id,
            name: iface.name,
            deviceId: iface.device.id,
            deviceName: iface.device.name ?? '',
            cableId: iface.cable?.id ?? null,
        }));
    }

    async getCables(ids: readonly number[]): Promise<CableRecord[]> {
        const unique = [...new Set(ids)];
        const cables: CableRecord[] = [];

        for (let i = 0; i < unique.length; i += CABLE_ID_BATCH) {
            const params = new URLSearchParams();
            for (const id of unique.slice(i, i + CABLE_ID_BATCH)) params.append('id', String(id));
            const batch = await this.getAll('dcim/cables/', params, cableSchema);
            cables.push(...batch.map(toCable));
        }
        return cables;
    }

    async createCable(draft: CableDraft): Promise<CableRecord> {
        const cable = await this.fetch('dcim/cables/', cableSchema, {
            method: 'POST',
            body: {
                ...terminationBody(draft),
                status: draft.status,
                description: draft.description,
            },
        });
        return toCable(cable);
    }

    async updateCable(id: number, terminations: CableTerminationIds): Promise<CableRecord> {
        const cable = await this.fetch(`dcim/cables/${id}/`, cableSchema, {
            method: 'PATCH',
            body: terminationBody(terminations),
        });
        return toCable(cable);
    }

    async deleteCable(id: number): Promise<void> {
        await this.request('DELETE', `dcim/cables/${id}/`);
    }
}
