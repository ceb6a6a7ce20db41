#!/usr/bin/env node
/**
 * lldp-autocabling
 *
 * Polls switches for LLDP neighbors over SNMP and keeps the inventory's
 * cable records in line with what they report.
 */

import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import type { Server } from 'http';
import { loadConfig, type AppConfig } from './config.js';
import { createInventoryConnector } from './connectors/index.js';
import { StateStore } from './db/state-store.js';
import { NeighborReader } from './engine/neighbor-reader.js';
import { CablingPipeline } from './engine/pipeline.js';
import { NetSnmpTransport } from './engine/snmp.js';
import { StabilityGate } from './engine/stability.js';
import { createApp } from './server.js';
import { CycleScheduler } from './services/scheduler.js';
import { ConfigError, EXIT_CODES, errorMessage, exitCodeFor } from './utils/errors.js';
import { configureLogging, createLogger } from './utils/logger.js';

interface CliOptions {
    envFile: string;
    dryRun?: boolean;
    once?: boolean;
    logLevel?: string;
    logFormat?: string;
    statusPort?: string;
}

const program = new Command();
program
    .name('lldp-autocabling')
    .description('Discover switch cabling over SNMP/LLDP and reconcile it against the inventory')
    .option('--env-file <path>', 'Environment file to load', '.env')
    .option('--dry-run', 'Compute and report changes without touching the inventory or the state store')
    .option('--once', 'Run a single cycle even when POLL_INTERVAL is set')
    .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace, silent)')
    .option('--log-format <format>', 'Log format (json or pretty)')
    .option('--status-port <port>', 'Serve the status API on this port while running recurring cycles')
    .parse(process.argv);

const options = program.opts<CliOptions>();

loadEnv({ path: options.envFile });

/**
 * Command line flags take precedence over the environment
 */
function buildEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (options.dryRun) env.DRY_RUN = 'true';
    if (options.logLevel) env.LOG_LEVEL = options.logLevel;
    if (options.logFormat) env.LOG_FORMAT = options.logFormat;
    if (options.statusPort) env.STATUS_PORT = options.statusPort;
    return env;
}

async function main(): Promise<number> {
    let logger = createLogger('main');

    let config: AppConfig;
    try {
        config = loadConfig(buildEnv());
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        logger.fatal({ issues: error.issues }, 'Invalid configuration');
        return EXIT_CODES.config;
    }

    configureLogging(config.logging);
    logger = createLogger('main');

    let store: StateStore;
    try {
        store = StateStore.open(config.stateDbPath);
    } catch (error) {
        logger.fatal({ path: config.stateDbPath, err: errorMessage(error) }, 'Cannot open state store');
        return exitCodeFor(error);
    }

    const inventory = createInventoryConnector(config.inventory);
    const reader = new NeighborReader(new NetSnmpTransport(config.snmp), config.interfaces);
    const gate = new StabilityGate(reader, config.stability);
    const pipeline = new CablingPipeline(inventory, gate, store, {
        dryRun: config.dryRun,
        cableStatus: config.cableStatus,
        concurrency: config.snmp.concurrency,
        devices: { role: config.inventory.deviceRole, site: config.inventory.site },
    });
    const scheduler = new CycleScheduler(pipeline, { intervalSeconds: config.pollIntervalSeconds });

    if (config.dryRun) {
        logger.warn('Dry run: no cable will be created, changed or deleted');
    }

    const recurring = config.pollIntervalSeconds > 0 && !options.once;
    let server: Server | null = null;

    try {
        if (!recurring) {
            await scheduler.runOnce();
            return EXIT_CODES.ok;
        }

        const connection = await inventory.testConnection();
        if (connection.success) logger.info(connection.message);
        else logger.warn({ err: connection.message }, 'Inventory not reachable yet, cycles will retry');

        const controller = new AbortController();
        const stop = (signal: NodeJS.Signals) => {
            logger.info({ signal }, 'Shutting down after the current cycle');
            controller.abort();
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);

        if (config.status.port > 0) {
            const { port, host } = config.status;
            server = createApp({ scheduler, store }).listen(port, host, () => {
                logger.info({ url: `http://${host}:${port}` }, 'Status API listening');
            });
        }

        await scheduler.runForever(controller.signal);
        return EXIT_CODES.ok;
    } catch (error) {
        logger.fatal({ err: errorMessage(error) }, 'Cabling run aborted');
        return exitCodeFor(error);
    } finally {
        server?.close();
        store.close();
    }
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        createLogger('main').fatal({ err: errorMessage(error) }, 'Unexpected failure');
        process.exitCode = 1;
    },
);
