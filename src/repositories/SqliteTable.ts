import { Database } from 'sqlite';
import { createScratchDatabase, removeDatabase } from '../config/database';
import { runMigrations, scratchTableMigrations } from '../database/migrations';
import { ReadWriteLock } from '../services/locking/ReadWriteLock';
import { TableEntryRow } from '../types/models';
import { DataTable, TableCodec } from './DataTable';

/**
 * DataTable stored in its own SQLite scratch file. The file is deleted
 * when the table is closed.
 */
export class SqliteTable<V> implements DataTable<V> {
  readonly onDisk = true;
  readonly lock = new ReadWriteLock();
  private closed = false;

  private constructor(
    readonly name: string,
    readonly codec: TableCodec<V>,
    private readonly db: Database,
    readonly location: string
  ) {}

  static async create<V>(name: string, codec: TableCodec<V>, scratchDir?: string): Promise<SqliteTable<V>> {
    const { db, filename } = await createScratchDatabase(name, scratchDir);
    await runMigrations(db, scratchTableMigrations);
    return new SqliteTable(name, codec, db, filename);
  }

  async get(key: string): Promise<V | undefined> {
    const row = await this.db.get<TableEntryRow>(
      'SELECT entry_key, entry_value FROM table_entries WHERE entry_key = ?',
      [key]
    );
    return row ? this.codec.decode(row.entry_value) : undefined;
  }

  async set(key: string, value: V): Promise<void> {
    await this.db.run(
      `INSERT INTO table_entries (entry_key, entry_value) VALUES (?, ?)
       ON CONFLICT(entry_key) DO UPDATE SET entry_value = excluded.entry_value`,
      [key, this.codec.encode(value)]
    );
  }

  async delete(key: string): Promise<void> {
    await this.db.run('DELETE FROM table_entries WHERE entry_key = ?', [key]);
  }

  async entries(): Promise<Array<[string, V]>> {
    const rows = await this.db.all<TableEntryRow[]>(
      'SELECT entry_key, entry_value FROM table_entries ORDER BY entry_key'
    );
    return rows.map((row): [string, V] => [row.entry_key, this.codec.decode(row.entry_value)]);
  }

  async size(): Promise<number> {
    const result = await this.db.get<{ count: number }>('SELECT COUNT(*) as count FROM table_entries');
    return result?.count ?? 0;
  }

  async clear(): Promise<void> {
    await this.db.run('DELETE FROM table_entries');
  }

  async replaceAll(entries: Array<[string, V]>): Promise<void> {
    try {
      await this.db.exec('BEGIN TRANSACTION;');
      await this.db.run('DELETE FROM table_entries');

      const statement = await this.db.prepare(
        'INSERT INTO table_entries (entry_key, entry_value) VALUES (?, ?)'
      );
      try {
        for (const [key, value] of entries) {
          await statement.run(key, this.codec.encode(value));
        }
      } finally {
        await statement.finalize();
      }

      await this.db.exec('COMMIT;');
    } catch (error) {
      await this.db.exec('ROLLBACK;');
      console.error(`❌ Failed to rewrite data table ${this.name}:`, error);
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await removeDatabase(this.db, this.location);
  }
}
