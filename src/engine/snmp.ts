/**
 * SNMP transport
 *
 * Thin session wrapper over net-snmp: open a community session, walk a
 * subtree, close. Errors are mapped onto the SNMP error taxonomy.
 */

import snmp from 'net-snmp';
import type { SnmpConfig } from '../config.js';
import { SnmpTimeoutError, SnmpUnreachableError, errorMessage } from '../utils/errors.js';

export interface SnmpTarget {
    device: string;
    address: string;
}

export interface SnmpVarbind {
    oid: string;
    value: unknown;
}

export interface SnmpSession {
    walk(oid: string): Promise<SnmpVarbind[]>;
    close(): void;
}

export interface SnmpTransport {
    open(target: SnmpTarget): SnmpSession;
}

const MAX_REPETITIONS = 20;

export class NetSnmpTransport implements SnmpTransport {
    constructor(private readonly config: SnmpConfig) {}

    open(target: SnmpTarget): SnmpSession {
        return new NetSnmpSession(target, this.config);
    }
}

class NetSnmpSession implements SnmpSession {
    private readonly session: ReturnType<typeof snmp.createSession>;
    private sessionError: Error | null = null;
    private closed = false;

    constructor(
        private readonly target: SnmpTarget,
        private readonly config: SnmpConfig,
    ) {
        this.session = snmp.createSession(target.address, config.community, {
            version: config.version === '1' ? snmp.Version1 : snmp.Version2c,
            timeout: config.timeoutMs,
            retries: config.retries,
            port: config.port,
        });

        // An unhandled 'error' event would crash the process
        this.session.on('error', (error: Error) => {
            this.sessionError = error;
        });
    }

    walk(oid: string): Promise<SnmpVarbind[]> {
        const { device, address } = this.target;
        const varbinds: SnmpVarbind[] = [];
        // SNMPv1 has no GETBULK
        const maxRepetitions = this.config.version === '1' ? 1 : MAX_REPETITIONS;

        return new Promise((resolve, reject) => {
            let settled = false;

            const finish = (error: Error | null) => {
                if (settled) return;
                settled = true;
                clearTimeout(deadline);
                if (error) reject(error);
                else resolve(varbinds);
            };

            const deadline = setTimeout(() => {
                finish(new SnmpTimeoutError(
                    device,
                    `SNMP walk of ${oid} on ${address} exceeded ${this.config.walkTimeoutMs}ms`,
                ));
            }, this.config.walkTimeoutMs);

            try {
                this.session.subtree(
                    oid,
                    maxRepetitions,
                    (batch) => {
                        for (const vb of batch) {
                            if (snmp.isVarbindError(vb)) continue;
                            varbinds.push({ oid: vb.oid, value: vb.value });
                        }
                    },
                    (error) => {
                        finish(error ? this.mapError(error, oid) : null);
                    },
                );
            } catch (error) {
                finish(this.mapError(error, oid));
            }
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        try {
            this.session.close();
        } catch (error) {
            // Closing a session whose socket already failed throws
            this.sessionError = this.sessionError ?? (error instanceof Error ? error : null);
        }
    }

    private mapError(error: unknown, oid: string): Error {
        const { device, address } = this.target;
        if (error instanceof Error && error.name === 'RequestTimedOutError') {
            return new SnmpTimeoutError(
                device,
                `SNMP request to ${address} timed out after ${this.config.retries} retries`,
                { cause: error },
            );
        }
        const detail = this.sessionError ? `${errorMessage(error)} (${this.sessionError.message})` : errorMessage(error);
        return new SnmpUnreachableError(device, `SNMP walk of ${oid} on ${address} failed: ${detail}`, {
            cause: error,
        });
    }
}
