import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation.
 *
 * Two kinds of database are managed: scratch files that back a single
 * disk-resident data table, and snapshot files holding a whole model.
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
}

const createMigrationHistory: Migration = {
  version: 1,
  name: 'create_migration_history_table',
  up: async (db: Database) => {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS migration_history (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      );
    `);
  }
};

export const scratchTableMigrations: Migration[] = [
  createMigrationHistory,
  {
    version: 2,
    name: 'create_table_entries',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS table_entries (
          entry_key TEXT PRIMARY KEY,
          entry_value TEXT NOT NULL
        );
      `);
    }
  }
];

export const snapshotMigrations: Migration[] = [
  createMigrationHistory,
  {
    version: 2,
    name: 'create_snapshot_meta',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS snapshot_meta (
          meta_key TEXT PRIMARY KEY,
          meta_value TEXT NOT NULL
        );
      `);
    }
  },
  {
    version: 3,
    name: 'create_snapshot_tables',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS snapshot_tables (
          table_name TEXT PRIMARY KEY,
          on_disk INTEGER NOT NULL DEFAULT 0
        );
      `);

      await db.exec(`
        CREATE TABLE IF NOT EXISTS snapshot_entries (
          table_name TEXT NOT NULL,
          entry_key TEXT NOT NULL,
          entry_value TEXT NOT NULL,
          PRIMARY KEY (table_name, entry_key),
          FOREIGN KEY (table_name) REFERENCES snapshot_tables(table_name) ON DELETE CASCADE
        );
      `);
    }
  }
];

export async function runMigrations(db: Database, migrations: Migration[] = snapshotMigrations): Promise<void> {
  // Ensure migration history table exists first
  await createMigrationHistory.up(db);

  const currentVersionResult = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  const currentVersion = currentVersionResult?.version || 0;

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      try {
        await db.exec('BEGIN TRANSACTION;');
        await migration.up(db);

        await db.run(
          'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
          [migration.version, migration.name, new Date().toISOString()]
        );

        await db.exec('COMMIT;');
      } catch (error) {
        await db.exec('ROLLBACK;');
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }
  }
}
