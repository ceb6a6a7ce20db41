import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type StateDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
    db: StateDatabase;
    sqlite: Database.Database;
}

// Export schema for use elsewhere
export * from './schema.js';

/**
 * Open (or create) the SQLite file and make sure the tables exist
 *
 * ':memory:' opens a throwaway database.
 */
export function openDatabase(path: string): DatabaseHandle {
    if (path !== ':memory:') {
        // Ensure data directory exists
        const dataDir = dirname(path);
        if (!existsSync(dataDir)) {
            mkdirSync(dataDir, { recursive: true });
        }
    }

    const sqlite = new Database(path);
    try {
        sqlite.pragma('journal_mode = WAL');
        initializeSchema(sqlite);
    } catch (error) {
        sqlite.close();
        throw error;
    }

    return { db: drizzle(sqlite, { schema }), sqlite };
}

function initializeSchema(sqlite: Database.Database): void {
    sqlite.exec(`
    CREATE TABLE IF NOT EXISTS link_snapshots (
      device TEXT NOT NULL,
      interface_name TEXT NOT NULL,
      remote_device TEXT,
      remote_interface TEXT,
      cable_id INTEGER,
      run_id TEXT NOT NULL,
      confirmed_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (device, interface_name)
    );

    CREATE TABLE IF NOT EXISTS run_history (
      id TEXT PRIMARY KEY,
      started_at INTEGER NOT NULL,
      finished_at INTEGER,
      dry_run INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL,
      devices_polled INTEGER NOT NULL DEFAULT 0,
      degraded_devices INTEGER NOT NULL DEFAULT 0,
      unstable_interfaces INTEGER NOT NULL DEFAULT 0,
      added INTEGER NOT NULL DEFAULT 0,
      updated INTEGER NOT NULL DEFAULT 0,
      removed INTEGER NOT NULL DEFAULT 0,
      confirmed INTEGER NOT NULL DEFAULT 0,
      unchanged INTEGER NOT NULL DEFAULT 0,
      conflicts INTEGER NOT NULL DEFAULT 0,
      skipped INTEGER NOT NULL DEFAULT 0,
      failed INTEGER NOT NULL DEFAULT 0,
      error_message TEXT
    );

    -- Indexes for common queries
    CREATE INDEX IF NOT EXISTS idx_link_snapshots_cable ON link_snapshots(cable_id);
    CREATE INDEX IF NOT EXISTS idx_run_history_started ON run_history(started_at);
  `);
}
