/**
 * Cabling Pipeline
 *
 * One polling cycle: load the prior snapshot, sample every switch through
 * the stability gate, resolve the involved endpoints in the inventory, diff,
 * apply, record the run.
 */

import type { CableStatus } from '../config.js';
import type { BaseInventoryConnector, DeviceFilter, InventoryDevice } from '../connectors/base.js';
import type { RunRecord, StateStore } from '../db/state-store.js';
import { InventoryApiError, InventoryUnavailableError, StateStoreError, errorMessage } from '../utils/errors.js';
import { endpointKey, formatEndpoint, generateId } from '../utils/helpers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ReconciliationDriver } from './reconciler.js';
import { computeChangeSet, countActions } from './topology-diff.js';
import type {
    CableRecord,
    CycleSummary,
    DeviceReading,
    InventoryInterfaceRef,
    InventoryView,
    PollTarget,
    SnapshotEntry,
} from './types.js';

export interface DeviceSampler {
    sample(target: PollTarget): Promise<DeviceReading>;
}

export type CycleStore = Pick<StateStore, 'loadAll' | 'upsertMany' | 'recordRun'>;

export interface PipelineOptions {
    dryRun: boolean;
    cableStatus: CableStatus;
    concurrency: number;
    devices: DeviceFilter;
    logger?: Logger;
}

export function toRunRecord(summary: CycleSummary): RunRecord {
    return {
        id: summary.runId,
        startedAt: summary.startedAt,
        finishedAt: summary.completedAt,
        dryRun: summary.dryRun,
        status: 'completed',
        devicesPolled: summary.devicesPolled,
        degradedDevices: summary.degradedDevices.length,
        unstableInterfaces: summary.unstable.length,
        added: summary.counts.add,
        updated: summary.counts.update,
        removed: summary.counts.remove,
        confirmed: summary.counts.confirm,
        unchanged: summary.counts.unchanged,
        conflicts: summary.counts.conflict,
        skipped: summary.counts.skipped,
        failed: summary.failed,
        errorMessage: null,
    };
}

export class CablingPipeline {
    private readonly logger: Logger;
    private readonly driver: ReconciliationDriver;

    constructor(
        private readonly inventory: BaseInventoryConnector,
        private readonly sampler: DeviceSampler,
        private readonly store: CycleStore,
        private readonly options: PipelineOptions,
    ) {
        this.logger = options.logger ?? createLogger('pipeline');
        this.driver = new ReconciliationDriver(inventory, store, {
            dryRun: options.dryRun,
            cableStatus: options.cableStatus,
            logger: options.logger,
        });
    }

    /**
     * Run one full cycle
     *
     * @throws StateStoreError | InventoryUnavailableError
     */
    async runCycle(): Promise<CycleSummary> {
        const runId = generateId();
        const startedAt = new Date();
        const log = this.logger.child({ runId });

        // Read before anything in this cycle writes
        const prior = this.store.loadAll();

        try {
            const devices = await this.listDevices();
            log.info({ devices: devices.length, dryRun: this.options.dryRun }, 'Starting cabling cycle');

            const readings = await this.sampleAll(devices, log);
            const view = await this.buildInventoryView(devices, readings, prior, log);
            const changeSet = computeChangeSet({ runId, readings, prior, inventory: view });
            const outcomes = await this.driver.apply(changeSet);

            const summary: CycleSummary = {
                runId,
                startedAt,
                completedAt: new Date(),
                dryRun: this.options.dryRun,
                devicesPolled: readings.length,
                degradedDevices: readings.filter(r => r.health === 'degraded').map(r => r.device),
                partialDevices: readings.filter(r => r.health === 'partial').map(r => r.device),
                unstable: readings.flatMap(r => r.links.filter(l => l.confidence === 'unstable').map(l => l.local)),
                counts: countActions(changeSet),
                failed: outcomes.filter(o => o.status === 'failed').length,
                outcomes,
            };

            if (!this.options.dryRun) {
                this.store.recordRun(toRunRecord(summary));
            }
            this.report(summary, log);
            return summary;
        } catch (error) {
            if (!(error instanceof StateStoreError) && !this.options.dryRun) {
                this.recordFailure(runId, startedAt, error, log);
            }
            throw error;
        }
    }

    private async listDevices(): Promise<InventoryDevice[]> {
        try {
            return await this.inventory.getDevices(this.options.devices);
        } catch (error) {
            throw new InventoryUnavailableError(
                `Cannot list devices from ${this.inventory.getName()}: ${errorMessage(error)}`,
                { cause: error },
            );
        }
    }

    /**
     * Sample devices in batches; a batch must finish before the next starts
     */
    private async sampleAll(devices: InventoryDevice[], log: Logger): Promise<DeviceReading[]> {
        const readings: DeviceReading[] = [];
        const batchSize = Math.max(1, this.options.concurrency);

        for (let i = 0; i < devices.length; i += batchSize) {
            const batch = devices.slice(i, i + batchSize);
            const results = await Promise.allSettled(
                batch.map(device => this.sampler.sample({ name: device.name, address: device.primaryAddress })),
            );

            results.forEach((result, index) => {
                const device = batch[index].name;
                if (result.status === 'fulfilled') {
                    readings.push(result.value);
                    return;
                }
                log.error({ device, err: errorMessage(result.reason) }, 'Sampling failed unexpectedly');
                readings.push({ device, health: 'degraded', links: [], errors: [errorMessage(result.reason)], excluded: [] });
            });
        }
        return readings;
    }

    /**
     * Resolve the interfaces and cables of every device the diff can touch
     */
    private async buildInventoryView(
        devices: InventoryDevice[],
        readings: DeviceReading[],
        prior: ReadonlyMap<string, SnapshotEntry>,
        log: Logger,
    ): Promise<InventoryView> {
        const known = new Map(devices.map(device => [device.name, device]));
        const involved = new Set<string>();
        const relevant = new Set<string>();

        for (const reading of readings) {
            if (reading.health !== 'ok') continue;
            involved.add(reading.device);
            for (const link of reading.links) {
                if (link.confidence === 'stable' && link.remote) {
                    involved.add(link.remote.device);
                    relevant.add(endpointKey(link.local));
                    relevant.add(endpointKey(link.remote));
                } else if (link.confidence === 'absent' && prior.get(endpointKey(link.local))?.remote) {
                    relevant.add(endpointKey(link.local));
                }
            }
        }

        const interfaces = new Map<string, InventoryInterfaceRef>();
        for (const name of [...involved].sort()) {
            const device = known.get(name) ?? (await this.lookupDevice(name, log));
            if (!device) continue;

            try {
                for (const iface of await this.inventory.getInterfaces(device.id)) {
                    interfaces.set(endpointKey({ device: name, interface: iface.name }), {
                        id: iface.id,
                        cableId: iface.cableId,
                    });
                }
            } catch (error) {
                if (!(error instanceof InventoryApiError)) throw error;
                log.warn({ device: name, err: errorMessage(error) }, 'Cannot read device interfaces, leaving them unresolved');
            }
        }

        const cableIds = new Set<number>();
        for (const key of relevant) {
            const cableId = interfaces.get(key)?.cableId;
            if (cableId !== undefined && cableId !== null) cableIds.add(cableId);
        }

        let cables: CableRecord[];
        try {
            cables = await this.inventory.getCables([...cableIds]);
        } catch (error) {
            throw new InventoryUnavailableError(`Cannot read cables from ${this.inventory.getName()}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        return { interfaces, cables: new Map(cables.map(cable => [cable.id, cable])) };
    }

    private async lookupDevice(name: string, log: Logger): Promise<InventoryDevice | null> {
        try {
            const device = await this.inventory.findDeviceByName(name);
            if (!device) log.warn({ device: name }, 'Neighbor device not found in inventory');
            return device;
        } catch (error) {
            if (!(error instanceof InventoryApiError)) throw error;
            log.warn({ device: name, err: errorMessage(error) }, 'Cannot look up neighbor device');
            return null;
        }
    }

    private recordFailure(runId: string, startedAt: Date, error: unknown, log: Logger): void {
        try {
            this.store.recordRun({
                ...toRunRecord({
                    runId,
                    startedAt,
                    completedAt: new Date(),
                    dryRun: false,
                    devicesPolled: 0,
                    degradedDevices: [],
                    partialDevices: [],
                    unstable: [],
                    counts: countActions({ runId, actions: [] }),
                    failed: 0,
                    outcomes: [],
                }),
                status: 'failed',
                errorMessage: errorMessage(error),
            });
        } catch (recordError) {
            log.error({ err: errorMessage(recordError) }, 'Cannot record failed run');
        }
    }

    private report(summary: CycleSummary, log: Logger): void {
        for (const device of summary.degradedDevices) {
            log.warn({ device }, 'Device degraded this cycle, its links were not evaluated');
        }
        if (summary.unstable.length > 0) {
            log.warn(
                { count: summary.unstable.length, interfaces: summary.unstable.map(formatEndpoint) },
                'Unstable interfaces left untouched',
            );
        }
        log.info(
            {
                devices: summary.devicesPolled,
                degraded: summary.degradedDevices.length,
                partial: summary.partialDevices.length,
                unstable: summary.unstable.length,
                ...summary.counts,
                failed: summary.failed,
                durationMs: summary.completedAt.getTime() - summary.startedAt.getTime(),
            },
            summary.dryRun ? 'Cabling cycle complete (dry run)' : 'Cabling cycle complete',
        );
    }
}
