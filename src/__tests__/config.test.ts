import { describe, it, expect } from 'vitest';
import { DEFAULT_EXCLUDE_PATTERNS, loadConfig } from '../config.js';
import { ConfigError } from '../utils/errors.js';

const required = { NETBOX_URL: 'https://netbox.test/', NETBOX_TOKEN: 'test-secret' };

function issuesOf(env: NodeJS.ProcessEnv): string[] {
    try {
        loadConfig(env);
    } catch (error) {
        if (error instanceof ConfigError) return error.issues;
        throw error;
    }
    return [];
}

describe('loadConfig', () => {
    it('applies defaults for everything optional', () => {
        const config = loadConfig(required);

        expect(config.inventory).toEqual({
            url: 'https://netbox.test',
            token: 'test-secret',
            authScheme: 'Token',
            verifyTls: true,
            timeoutMs: 30_000,
            deviceRole: null,
            site: null,
        });
        expect(config.snmp).toEqual({
            community: 'public',
            version: '2c',
            timeoutMs: 5000,
            retries: 2,
            port: 161,
            walkTimeoutMs: 60_000,
            concurrency: 8,
        });
        expect(config.stability).toEqual({ runs: 2, intervalMs: 5000 });
        expect(config.interfaces).toEqual({ exclude: [], excludePatterns: DEFAULT_EXCLUDE_PATTERNS, stripDomain: true });
        expect(config.stateDbPath).toBe('./data/state.db');
        expect(config.pollIntervalSeconds).toBe(0);
        expect(config.dryRun).toBe(false);
        expect(config.cableStatus).toBe('planned');
        expect(config.status).toEqual({ port: 0, host: '127.0.0.1' });
        expect(config.logging).toEqual({ level: 'info', format: 'json' });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            ...required,
            NETBOX_VERIFY_SSL: 'no',
            SWITCHES_ROLE: ' leaf ',
            SWITCHES_SITE: '',
            SNMP_VERSION: '1',
            STABILITY_RUNS: '3',
            STABILITY_INTERVAL: '0',
            DRY_RUN: 'TRUE',
            CABLE_STATUS: 'connected',
            EXCLUDE_INTERFACES: 'Gi0/48, ,mgmt0',
            EXCLUDE_INTERFACE_PATTERNS: '^eth\\d+$',
            POLL_INTERVAL: '300',
        });

        expect(config.inventory.verifyTls).toBe(false);
        expect(config.inventory.deviceRole).toBe('leaf');
        expect(config.inventory.site).toBeNull();
        expect(config.snmp.version).toBe('1');
        expect(config.stability).toEqual({ runs: 3, intervalMs: 0 });
        expect(config.dryRun).toBe(true);
        expect(config.cableStatus).toBe('connected');
        expect(config.interfaces.exclude).toEqual(['Gi0/48', 'mgmt0']);
        expect(config.interfaces.excludePatterns).toEqual(['^eth\\d+$']);
        expect(config.pollIntervalSeconds).toBe(300);
    });

    it('lists every missing required variable', () => {
        expect(issuesOf({})).toEqual(['NETBOX_URL: is required', 'NETBOX_TOKEN: is required']);
    });

    it('rejects malformed values', () => {
        expect(issuesOf({ ...required, DRY_RUN: 'maybe' })).toEqual(['DRY_RUN: expected a boolean, got "maybe"']);
        expect(issuesOf({ ...required, EXCLUDE_INTERFACE_PATTERNS: '^ok$,(' })).toEqual([
            'EXCLUDE_INTERFACE_PATTERNS: invalid pattern "("',
        ]);
        expect(issuesOf({ ...required, STABILITY_RUNS: '0' })).toHaveLength(1);
        expect(issuesOf({ ...required, NETBOX_URL: 'not a url' })).toHaveLength(1);
    });

    it('returns a frozen configuration', () => {
        const config = loadConfig(required);

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.inventory)).toBe(true);
        expect(Object.isFrozen(config.interfaces.exclude)).toBe(true);
    });
});
