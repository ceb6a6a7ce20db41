/**
 * Error taxonomy
 *
 * Per-device and per-action errors are recovered and reported in the cycle
 * summary. StateStoreError, InventoryUnavailableError and ConfigError are fatal.
 */

export class CablingError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type SnmpErrorCode = 'timeout' | 'unreachable' | 'unsupported';

export abstract class SnmpError extends CablingError {
    abstract readonly code: SnmpErrorCode;

    constructor(
        readonly device: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

/** Request timed out after all retries, or the walk deadline passed */
export class SnmpTimeoutError extends SnmpError {
    readonly code = 'timeout';
}

export class SnmpUnreachableError extends SnmpError {
    readonly code = 'unreachable';
}

/** The device answers SNMP but exposes no LLDP local port table */
export class NeighborTableUnavailableError extends SnmpError {
    readonly code = 'unsupported';
}

export class InventoryApiError extends CablingError {
    constructor(
        message: string,
        readonly status: number | null,
        readonly endpoint: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }

    get isNotFound(): boolean {
        return this.status === 404;
    }
}

export class InventoryUnavailableError extends CablingError {}

export class StateStoreError extends CablingError {}

export class ConfigError extends CablingError {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    }
}

export class CycleInProgressError extends CablingError {
    constructor() {
        super('A polling cycle is already in progress');
    }
}

/**
 * Render an unknown thrown value for logs and summaries
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const EXIT_CODES = {
    ok: 0,
    config: 1,
    stateStore: 2,
    inventoryUnavailable: 3,
} as const;

/**
 * Process exit code for an error that ended a single-run invocation
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof StateStoreError) return EXIT_CODES.stateStore;
    if (error instanceof InventoryUnavailableError) return EXIT_CODES.inventoryUnavailable;
    return EXIT_CODES.config;
}
