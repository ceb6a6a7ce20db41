/**
 * SNMP Neighbor Reader
 *
 * Reads one switch's interface table and LLDP-MIB remote table and returns
 * a snapshot: every local interface mapped to its advertised neighbor, or
 * null when nothing is advertised on it.
 */

import type { InterfaceFilterConfig } from '../config.js';
import { NeighborTableUnavailableError } from '../utils/errors.js';
import { formatMac, normalizeDeviceName, sanitizeSnmpString } from '../utils/helpers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SnmpSession, SnmpTransport, SnmpVarbind } from './snmp.js';
import type { DeviceSnapshot, Endpoint, NeighborTable, PollTarget } from './types.js';

// IF-MIB
export const IF_DESCR = '1.3.6.1.2.1.2.2.1.2';
export const IF_NAME = '1.3.6.1.2.1.31.1.1.1.1';

// LLDP-MIB lldpLocPortTable, indexed by lldpLocPortNum
export const LLDP_LOC_PORT_ID = '1.0.8802.1.1.2.1.3.7.1.3';
export const LLDP_LOC_PORT_DESC = '1.0.8802.1.1.2.1.3.7.1.4';

// LLDP-MIB lldpRemTable, indexed by lldpRemTimeMark.lldpRemLocalPortNum.lldpRemIndex
export const LLDP_REM_PORT_ID_SUBTYPE = '1.0.8802.1.1.2.1.4.1.1.6';
export const LLDP_REM_PORT_ID = '1.0.8802.1.1.2.1.4.1.1.7';
export const LLDP_REM_PORT_DESC = '1.0.8802.1.1.2.1.4.1.1.8';
export const LLDP_REM_SYS_NAME = '1.0.8802.1.1.2.1.4.1.1.9';

// LldpPortIdSubtype
const PORT_ID_INTERFACE_ALIAS = 1;
const PORT_ID_MAC_ADDRESS = 3;
const PORT_ID_INTERFACE_NAME = 5;

interface RemoteRow {
    localPortNum: number;
    sysName?: string;
    portIdSubtype?: number;
    portId?: unknown;
    portDesc?: string;
}

function toText(value: unknown): string {
    if (Buffer.isBuffer(value)) return sanitizeSnmpString(value.toString('utf8'));
    if (typeof value === 'string') return sanitizeSnmpString(value);
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    return '';
}

function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') return value;
    const parsed = Number.parseInt(toText(value), 10);
    return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Index suffix of a column OID, e.g. "<base>.0.12.3" → "0.12.3"
 */
function indexOf(oid: string, base: string): string | null {
    const prefix = `${base}.`;
    return oid.startsWith(prefix) ? oid.slice(prefix.length) : null;
}

function columnByIndex(varbinds: SnmpVarbind[], base: string): Map<string, unknown> {
    const column = new Map<string, unknown>();
    for (const vb of varbinds) {
        const index = indexOf(vb.oid, base);
        if (index !== null) column.set(index, vb.value);
    }
    return column;
}

export class NeighborReader {
    private readonly excluded: Set<string>;
    private readonly excludePatterns: RegExp[];
    private readonly logger: Logger;

    constructor(
        private readonly transport: SnmpTransport,
        private readonly filter: InterfaceFilterConfig,
        logger?: Logger,
    ) {
        this.excluded = new Set(filter.exclude.map(name => name.toLowerCase()));
        this.excludePatterns = filter.excludePatterns.map(pattern => new RegExp(pattern, 'i'));
        this.logger = logger ?? createLogger('neighbor-reader');
    }

    /**
     * Query one device once
     *
     * @throws SnmpTimeoutError | SnmpUnreachableError | NeighborTableUnavailableError
     */
    async read(target: PollTarget & { address: string }, round: number): Promise<DeviceSnapshot> {
        const observedAt = new Date();
        const session = this.transport.open({ device: target.name, address: target.address });

        try {
            const interfaces = await this.readInterfaces(session, target.name);
            const localPorts = await this.readLocalPorts(session, target.name, interfaces);
            const remotes = await this.readRemoteRows(session);

            const neighbors: NeighborTable = new Map();
            const excluded: string[] = [];
            for (const name of interfaces.values()) {
                if (this.isExcluded(name)) excluded.push(name);
                else neighbors.set(name, null);
            }

            const byPort = new Map<number, Map<string, Endpoint>>();
            for (const row of remotes) {
                const neighbor = this.decodeNeighbor(row);
                if (!neighbor) continue;
                const seen = byPort.get(row.localPortNum) ?? new Map<string, Endpoint>();
                seen.set(`${neighbor.device}::${neighbor.interface}`, neighbor);
                byPort.set(row.localPortNum, seen);
            }

            for (const [portNum, seen] of byPort) {
                const local = localPorts.get(portNum);
                if (!local || !neighbors.has(local)) continue;

                if (seen.size > 1) {
                    this.logger.debug(
                        { device: target.name, interface: local, neighbors: [...seen.keys()] },
                        'Port advertises several neighbors, leaving it out',
                    );
                    neighbors.delete(local);
                    continue;
                }
                const [neighbor] = seen.values();
                neighbors.set(local, neighbor);
            }

            // Rows without a usable neighbor identity make the port unknowable
            for (const row of remotes) {
                const local = localPorts.get(row.localPortNum);
                if (local && !byPort.has(row.localPortNum)) neighbors.delete(local);
            }

            return { device: target.name, round, observedAt, neighbors, excluded };
        } finally {
            session.close();
        }
    }

    isExcluded(interfaceName: string): boolean {
        if (this.excluded.has(interfaceName.toLowerCase())) return true;
        return this.excludePatterns.some(pattern => pattern.test(interfaceName));
    }

    /**
     * ifIndex → interface name (ifName, falling back to ifDescr)
     */
    private async readInterfaces(session: SnmpSession, device: string): Promise<Map<number, string>> {
        let column = columnByIndex(await session.walk(IF_NAME), IF_NAME);
        if (column.size === 0) {
            column = columnByIndex(await session.walk(IF_DESCR), IF_DESCR);
        }
        if (column.size === 0) {
            throw new NeighborTableUnavailableError(device, `${device} returned an empty interface table`);
        }

        const interfaces = new Map<number, string>();
        for (const [index, value] of column) {
            const ifIndex = Number.parseInt(index, 10);
            const name = toText(value);
            if (!Number.isNaN(ifIndex) && name) interfaces.set(ifIndex, name);
        }
        return interfaces;
    }

    /**
     * lldpLocPortNum → local interface name
     *
     * The port id or description usually carries the interface name; when
     * neither matches a known interface the port number is taken as ifIndex.
     */
    private async readLocalPorts(
        session: SnmpSession,
        device: string,
        interfaces: Map<number, string>,
    ): Promise<Map<number, string>> {
        const portIds = columnByIndex(await session.walk(LLDP_LOC_PORT_ID), LLDP_LOC_PORT_ID);
        const portDescs = columnByIndex(await session.walk(LLDP_LOC_PORT_DESC), LLDP_LOC_PORT_DESC);

        if (portIds.size === 0 && portDescs.size === 0) {
            throw new NeighborTableUnavailableError(device, `${device} does not expose the LLDP local port table`);
        }

        const known = new Set(interfaces.values());
        const ports = new Map<number, string>();
        for (const index of new Set([...portIds.keys(), ...portDescs.keys()])) {
            const portNum = Number.parseInt(index, 10);
            if (Number.isNaN(portNum)) continue;

            const candidates = [toText(portIds.get(index)), toText(portDescs.get(index))];
            const name = candidates.find(candidate => known.has(candidate)) ?? interfaces.get(portNum);
            if (name) ports.set(portNum, name);
        }
        return ports;
    }

    private async readRemoteRows(session: SnmpSession): Promise<RemoteRow[]> {
        const rows = new Map<string, RemoteRow>();

        const rowFor = (oid: string, base: string): RemoteRow | null => {
            const index = indexOf(oid, base);
            if (index === null) return null;
            const parts = index.split('.');
            if (parts.length !== 3) return null;
            const localPortNum = Number.parseInt(parts[1], 10);
            if (Number.isNaN(localPortNum)) return null;
            const row = rows.get(index) ?? { localPortNum };
            rows.set(index, row);
            return row;
        };

        for (const vb of await session.walk(LLDP_REM_SYS_NAME)) {
            const row = rowFor(vb.oid, LLDP_REM_SYS_NAME);
            if (row) row.sysName = toText(vb.value);
        }
        for (const vb of await session.walk(LLDP_REM_PORT_ID_SUBTYPE)) {
            const row = rowFor(vb.oid, LLDP_REM_PORT_ID_SUBTYPE);
            if (row) row.portIdSubtype = toNumber(vb.value);
        }
        for (const vb of await session.walk(LLDP_REM_PORT_ID)) {
            const row = rowFor(vb.oid, LLDP_REM_PORT_ID);
            if (row) row.portId = vb.value;
        }
        for (const vb of await session.walk(LLDP_REM_PORT_DESC)) {
            const row = rowFor(vb.oid, LLDP_REM_PORT_DESC);
            if (row) row.portDesc = toText(vb.value);
        }

        return [...rows.values()];
    }

    private decodeNeighbor(row: RemoteRow): Endpoint | null {
        const device = normalizeDeviceName(row.sysName ?? '', this.filter.stripDomain);
        if (!device) return null;

        let iface = '';
        if (row.portIdSubtype === PORT_ID_INTERFACE_NAME || row.portIdSubtype === PORT_ID_INTERFACE_ALIAS) {
            iface = toText(row.portId);
        }
        if (!iface && row.portDesc) {
            iface = row.portDesc;
        }
        if (!iface && row.portIdSubtype === PORT_ID_MAC_ADDRESS && Buffer.isBuffer(row.portId) && row.portId.length === 6) {
            iface = formatMac(row.portId);
        }
        if (!iface) {
            iface = toText(row.portId);
        }

        return iface ? { device, interface: iface } : null;
    }
}
