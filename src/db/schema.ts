import { sqliteTable, text, integer, primaryKey } from 'drizzle-orm/sqlite-core';

// ============================================
// LINK SNAPSHOT
// ============================================

/**
 * Last confirmed neighbor of every polled interface
 *
 * A row is never deleted: a link that went away is recorded with a null
 * remote so the next cycle can tell "confirmed gone" from "never seen".
 */
export const linkSnapshots = sqliteTable('link_snapshots', {
    device: text('device').notNull(),
    interfaceName: text('interface_name').notNull(),

    // Null pair = no neighbor
    remoteDevice: text('remote_device'),
    remoteInterface: text('remote_interface'),

    // Inventory cable created or re-terminated by the engine
    cableId: integer('cable_id'),

    runId: text('run_id').notNull(),
    confirmedAt: integer('confirmed_at', { mode: 'timestamp' }).notNull(),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
    updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
    pk: primaryKey({ columns: [table.device, table.interfaceName] }),
}));

// ============================================
// RUN HISTORY
// ============================================

export const runHistory = sqliteTable('run_history', {
    id: text('id').primaryKey(),
    startedAt: integer('started_at', { mode: 'timestamp' }).notNull(),
    finishedAt: integer('finished_at', { mode: 'timestamp' }),
    dryRun: integer('dry_run', { mode: 'boolean' }).notNull().default(false),
    status: text('status').$type<'completed' | 'failed'>().notNull(),

    devicesPolled: integer('devices_polled').notNull().default(0),
    degradedDevices: integer('degraded_devices').notNull().default(0),
    unstableInterfaces: integer('unstable_interfaces').notNull().default(0),

    // Per action kind
    added: integer('added').notNull().default(0),
    updated: integer('updated').notNull().default(0),
    removed: integer('removed').notNull().default(0),
    confirmed: integer('confirmed').notNull().default(0),
    unchanged: integer('unchanged').notNull().default(0),
    conflicts: integer('conflicts').notNull().default(0),
    skipped: integer('skipped').notNull().default(0),
    failed: integer('failed').notNull().default(0),

    errorMessage: text('error_message'),
});

// Type exports
export type LinkSnapshotRow = typeof linkSnapshots.$inferSelect;
export type RunHistoryRow = typeof runHistory.$inferSelect;
