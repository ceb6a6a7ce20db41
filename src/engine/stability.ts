/**
 * Stability Gate
 *
 * A link is only trusted when every one of N independent reads reports the
 * same neighbor. There is no majority vote: any disagreement, and any missing
 * observation, makes the interface unstable for this cycle.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { StabilityConfig } from '../config.js';
import { SnmpError, errorMessage } from '../utils/errors.js';
import { sameEndpoint } from '../utils/helpers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type {
    DeviceReading,
    DeviceSnapshot,
    NeighborObservation,
    PollTarget,
    RoundResult,
    StabilizedLink,
} from './types.js';

/**
 * Collapse N round results for one device into one link per interface
 *
 * Pure: no I/O and no clock, so it can be driven with fixed observation
 * sequences.
 */
export function evaluateStability(
    device: string,
    rounds: readonly RoundResult[],
    expectedRuns: number,
): DeviceReading {
    if (!Number.isInteger(expectedRuns) || expectedRuns < 1) {
        throw new RangeError(`Stability run count must be a positive integer, got ${expectedRuns}`);
    }

    const snapshots: DeviceSnapshot[] = [];
    const errors: string[] = [];
    for (const result of rounds) {
        if (result.ok) snapshots.push(result.snapshot);
        else errors.push(`round ${result.round}: ${result.error.message}`);
    }

    if (snapshots.length === 0) {
        return { device, health: 'degraded', links: [], errors, excluded: [] };
    }

    const complete = snapshots.length === expectedRuns && rounds.length === expectedRuns;

    const interfaces = new Set<string>();
    for (const snapshot of snapshots) {
        for (const name of snapshot.neighbors.keys()) interfaces.add(name);
    }

    const links: StabilizedLink[] = [];
    for (const name of [...interfaces].sort()) {
        const local = { device, interface: name };
        const observations: NeighborObservation[] = [];
        for (const snapshot of snapshots) {
            const remote = snapshot.neighbors.get(name);
            if (remote === undefined) continue;
            observations.push({ local, remote, observedAt: snapshot.observedAt, round: snapshot.round });
        }

        const first = observations[0];
        const agreed =
            complete &&
            observations.length === expectedRuns &&
            observations.every(observation => sameEndpoint(observation.remote, first.remote));

        if (!agreed) {
            links.push({ local, remote: null, confidence: 'unstable', observations });
        } else if (first.remote === null) {
            links.push({ local, remote: null, confidence: 'absent', observations });
        } else {
            links.push({ local, remote: { ...first.remote }, confidence: 'stable', observations });
        }
    }

    const excluded = new Set(snapshots.flatMap(snapshot => snapshot.excluded));
    return { device, health: complete ? 'ok' : 'partial', links, errors, excluded: [...excluded].sort() };
}

export interface SnapshotSource {
    read(target: PollTarget & { address: string }, round: number): Promise<DeviceSnapshot>;
}

export class StabilityGate {
    private readonly logger: Logger;

    constructor(
        private readonly reader: SnapshotSource,
        private readonly config: StabilityConfig,
        logger?: Logger,
    ) {
        this.logger = logger ?? createLogger('stability-gate');
    }

    /**
     * Read the device N times and evaluate the rounds together
     *
     * SNMP failures are captured per round; only unexpected errors propagate.
     */
    async sample(target: PollTarget): Promise<DeviceReading> {
        const { address } = target;
        if (!address) {
            this.logger.warn({ device: target.name }, 'Device has no management address, skipping');
            return {
                device: target.name,
                health: 'degraded',
                links: [],
                errors: ['no management address in inventory'],
                excluded: [],
            };
        }

        const rounds: RoundResult[] = [];
        for (let round = 1; round <= this.config.runs; round++) {
            if (round > 1 && this.config.intervalMs > 0) {
                await sleep(this.config.intervalMs);
            }
            try {
                const snapshot = await this.reader.read({ name: target.name, address }, round);
                rounds.push({ ok: true, snapshot });
            } catch (error) {
                if (!(error instanceof SnmpError)) throw error;
                this.logger.warn(
                    { device: target.name, round, code: error.code, err: errorMessage(error) },
                    'Stability round failed',
                );
                rounds.push({ ok: false, round, error });
            }
        }

        const reading = evaluateStability(target.name, rounds, this.config.runs);

        if (reading.health === 'degraded') {
            this.logger.warn({ device: target.name, errors: reading.errors }, 'Device failed every stability round');
        }
        for (const link of reading.links) {
            if (link.confidence !== 'unstable') continue;
            this.logger.warn(
                {
                    device: link.local.device,
                    interface: link.local.interface,
                    observed: link.observations.map(o => (o.remote ? `${o.remote.device}:${o.remote.interface}` : null)),
                },
                'Neighbor observations disagree across stability rounds',
            );
        }

        return reading;
    }
}
