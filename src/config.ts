/**
 * Configuration
 *
 * Environment variables are validated once at startup into an immutable
 * AppConfig that is passed to every component.
 */

import { z } from 'zod';
import { ConfigError } from './utils/errors.js';
import type { LogFormat } from './utils/logger.js';

export type SnmpVersion = '1' | '2c';
export type CableStatus = 'planned' | 'connected' | 'decommissioning';
export type AuthScheme = 'Token' | 'Bearer';

export interface InventoryConfig {
    url: string;
    token: string;
    authScheme: AuthScheme;
    verifyTls: boolean;
    timeoutMs: number;
    deviceRole: string | null;
    site: string | null;
}

export interface SnmpConfig {
    community: string;
    version: SnmpVersion;
    timeoutMs: number;
    retries: number;
    port: number;
    walkTimeoutMs: number;
    concurrency: number;
}

export interface StabilityConfig {
    runs: number;
    intervalMs: number;
}

export interface InterfaceFilterConfig {
    exclude: string[];
    excludePatterns: string[];
    stripDomain: boolean;
}

export interface AppConfig {
    inventory: InventoryConfig;
    snmp: SnmpConfig;
    stability: StabilityConfig;
    interfaces: InterfaceFilterConfig;
    stateDbPath: string;
    pollIntervalSeconds: number;
    dryRun: boolean;
    cableStatus: CableStatus;
    status: {
        port: number;
        host: string;
    };
    logging: {
        level: string;
        format: LogFormat;
    };
}

/** Port-channels, SVIs, loopbacks, tunnels and out-of-band management ports never carry LLDP cabling */
export const DEFAULT_EXCLUDE_PATTERNS = [
    '^(po|port-channel|bond|ae)\\d',
    '^(vlan|vl|irb|bvi)\\d*',
    '^(lo|loopback)\\d*',
    '^(tu|tunnel)\\d',
    '^(null|nve)\\d',
    '^(mgmt|management|me)\\d*',
];

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const flag = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value, ctx) => {
            const normalized = value?.trim().toLowerCase();
            if (!normalized) return fallback;
            if (TRUE_VALUES.has(normalized)) return true;
            if (FALSE_VALUES.has(normalized)) return false;
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `expected a boolean, got "${value}"`,
            });
            return z.NEVER;
        });

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
    z.coerce.number().int().min(min).max(max).default(fallback);

const optionalText = z
    .string()
    .optional()
    .transform(value => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : null;
    });

const commaList = (fallback: string[]) =>
    z
        .string()
        .optional()
        .transform(value => {
            if (value === undefined || value.trim() === '') return fallback;
            return value
                .split(',')
                .map(item => item.trim())
                .filter(item => item.length > 0);
        });

const regexList = commaList(DEFAULT_EXCLUDE_PATTERNS).superRefine((patterns, ctx) => {
    for (const pattern of patterns) {
        try {
            new RegExp(pattern, 'i');
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid pattern "${pattern}"` });
        }
    }
});

const envSchema = z.object({
    NETBOX_URL: z.string({ required_error: 'is required' }).trim().url(),
    NETBOX_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
    NETBOX_AUTH_SCHEME: z.enum(['Token', 'Bearer']).default('Token'),
    NETBOX_VERIFY_SSL: flag(true),
    NETBOX_TIMEOUT: integer(30, 1),
    SWITCHES_ROLE: optionalText,
    SWITCHES_SITE: optionalText,
    SNMP_COMMUNITY: z.string().min(1).default('public'),
    SNMP_VERSION: z.enum(['1', '2c']).default('2c'),
    SNMP_TIMEOUT: integer(5, 1),
    SNMP_RETRIES: integer(2, 0, 10),
    SNMP_PORT: integer(161, 1, 65535),
    SNMP_WALK_TIMEOUT: integer(60, 1),
    SNMP_CONCURRENCY: integer(8, 1, 256),
    STABILITY_RUNS: integer(2, 1, 20),
    STABILITY_INTERVAL: integer(5, 0),
    STATE_DB_PATH: z.string().trim().min(1).default('./data/state.db'),
    POLL_INTERVAL: integer(0, 0),
    DRY_RUN: flag(false),
    CABLE_STATUS: z.enum(['planned', 'connected', 'decommissioning']).default('planned'),
    EXCLUDE_INTERFACES: commaList([]),
    EXCLUDE_INTERFACE_PATTERNS: regexList,
    STRIP_DOMAIN: flag(true),
    STATUS_PORT: integer(0, 0, 65535),
    STATUS_HOST: z.string().trim().min(1).default('127.0.0.1'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

/**
 * Build the application configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const e = parsed.data;
    const config: AppConfig = {
        inventory: {
            url: e.NETBOX_URL.replace(/\/+$/, ''),
            token: e.NETBOX_TOKEN,
            authScheme: e.NETBOX_AUTH_SCHEME,
            verifyTls: e.NETBOX_VERIFY_SSL,
            timeoutMs: e.NETBOX_TIMEOUT * 1000,
            deviceRole: e.SWITCHES_ROLE,
            site: e.SWITCHES_SITE,
        },
        snmp: {
            community: e.SNMP_COMMUNITY,
            version: e.SNMP_VERSION,
            timeoutMs: e.SNMP_TIMEOUT * 1000,
            retries: e.SNMP_RETRIES,
            port: e.SNMP_PORT,
            walkTimeoutMs: e.SNMP_WALK_TIMEOUT * 1000,
            concurrency: e.SNMP_CONCURRENCY,
        },
        stability: {
            runs: e.STABILITY_RUNS,
            intervalMs: e.STABILITY_INTERVAL * 1000,
        },
        interfaces: {
            exclude: e.EXCLUDE_INTERFACES,
            excludePatterns: e.EXCLUDE_INTERFACE_PATTERNS,
            stripDomain: e.STRIP_DOMAIN,
        },
        stateDbPath: e.STATE_DB_PATH,
        pollIntervalSeconds: e.POLL_INTERVAL,
        dryRun: e.DRY_RUN,
        cableStatus: e.CABLE_STATUS,
        status: {
            port: e.STATUS_PORT,
            host: e.STATUS_HOST,
        },
        logging: {
            level: e.LOG_LEVEL,
            format: e.LOG_FORMAT,
        },
    };

    return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
    for (const child of Object.values(value)) {
        if (child !== null && typeof child === 'object') deepFreeze(child);
    }
    return Object.freeze(value);
}
