import { randomUUID } from 'crypto';
import type { Endpoint, LinkPair } from '../engine/types.js';

/**
 * Generate a unique ID for runs
 */
export function generateId(): string {
    return randomUUID();
}

/**
 * Map key for an endpoint
 */
export function endpointKey(endpoint: Endpoint): string {
    return `${endpoint.device}::${endpoint.interface}`;
}

export function formatEndpoint(endpoint: Endpoint | null): string {
    return endpoint ? `${endpoint.device}:${endpoint.interface}` : 'none';
}

export function sameEndpoint(a: Endpoint | null, b: Endpoint | null): boolean {
    if (a === null || b === null) return a === b;
    return a.device === b.device && a.interface === b.interface;
}

function compareEndpoints(a: Endpoint, b: Endpoint): number {
    if (a.device !== b.device) return a.device < b.device ? -1 : 1;
    if (a.interface !== b.interface) return a.interface < b.interface ? -1 : 1;
    return 0;
}

/**
 * Order two endpoints lexicographically (device, then interface) so both
 * directions of a link share one key
 */
export function canonicalPair(x: Endpoint, y: Endpoint): LinkPair {
    const [a, b] = compareEndpoints(x, y) <= 0 ? [x, y] : [y, x];
    return { key: `${endpointKey(a)}<->${endpointKey(b)}`, a, b };
}

export function sortEndpoints(endpoints: Endpoint[]): Endpoint[] {
    return [...endpoints].sort(compareEndpoints);
}

/**
 * Neighbor system names often carry the domain (sw2.dc1.example.net)
 * while the inventory stores the short name
 */
export function normalizeDeviceName(name: string, stripDomain: boolean): string {
    const trimmed = name.trim();
    if (!stripDomain || isValidIpv4(trimmed)) return trimmed;
    const dot = trimmed.indexOf('.');
    return dot > 0 ? trimmed.slice(0, dot) : trimmed;
}

/**
 * Format a 6-byte buffer as aa:bb:cc:dd:ee:ff
 */
export function formatMac(bytes: Buffer): string {
    return [...bytes].map(b => b.toString(16).padStart(2, '0')).join(':');
}

/**
 * Strip control characters and invalid code points from SNMP strings
 */
export function sanitizeSnmpString(value: string): string {
    return value
        .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
        .replace(/[\uFFFD\uFFFE\uFFFF]/g, '')
        .trim();
}

/**
 * Validate IPv4 address
 */
export function isValidIpv4(ip: string): boolean {
    const ipRegex = /^(\d{1,3}\.){3}\d{1,3}$/;
    if (!ipRegex.test(ip)) return false;

    const octets = ip.split('.').map(Number);
    return octets.every(o => o >= 0 && o <= 255);
}
