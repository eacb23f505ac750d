import { promises as fs } from 'fs';
import { Database } from 'sqlite';
import { resolveClassifierOptions } from '../config/classifier';
import { openDatabase } from '../config/database';
import { runMigrations, snapshotMigrations } from '../database/migrations';
import {
  SNAPSHOT_FORMAT_VERSION,
  SnapshotMeta,
  encodedTableToRows,
  rowsToEncodedTable,
  rowsToSnapshotMeta,
  snapshotMetaToRows
} from '../models/transformers';
import { ResourceError, modelKindSchema } from '../models/validation';
import { ClassificationModel } from '../services/ml/ClassificationModel';
import { SnapshotEntryRow, SnapshotMetaRow, SnapshotTableRow } from '../types/models';
import { EncodedTable } from './TableRegistry';

export interface ModelSnapshot {
  meta: SnapshotMeta;
  tables: EncodedTable[];
}

/**
 * Saves and loads whole models as single SQLite snapshot files
 */
export class SnapshotRepository {
  /**
   * Write every table of the model, taken under lock-all, to `filename`.
   * An existing snapshot at that path is replaced.
   */
  async save(model: ClassificationModel, filename: string): Promise<void> {
    const tables = await model.tables.withAllLocked(() => model.tables.exportTables());
    const meta: SnapshotMeta = {
      kind: model.kind,
      options: model.options,
      version: SNAPSHOT_FORMAT_VERSION,
      savedAt: new Date()
    };

    let db: Database | undefined;
    try {
      db = await openDatabase(filename);
      await runMigrations(db, snapshotMigrations);
      await this.writeSnapshot(db, meta, tables);
    } catch (error) {
      console.error(`❌ Failed to save snapshot ${filename}:`, error);
      throw new ResourceError(`Can't save classifier to '${filename}'`, filename, error);
    } finally {
      await db?.close();
    }
  }

  async load(filename: string): Promise<ModelSnapshot> {
    let db: Database | undefined;
    try {
      // Opening would silently create an empty database
      await fs.access(filename);
      db = await openDatabase(filename);
      return await this.readSnapshot(db);
    } catch (error) {
      console.error(`❌ Failed to load snapshot ${filename}:`, error);
      throw new ResourceError(`Can't load classifier from '${filename}'`, filename, error);
    } finally {
      await db?.close();
    }
  }

  private async writeSnapshot(db: Database, meta: SnapshotMeta, tables: EncodedTable[]): Promise<void> {
    try {
      await db.exec('BEGIN TRANSACTION;');
      await db.run('DELETE FROM snapshot_entries');
      await db.run('DELETE FROM snapshot_tables');
      await db.run('DELETE FROM snapshot_meta');

      for (const row of snapshotMetaToRows(meta)) {
        await db.run('INSERT INTO snapshot_meta (meta_key, meta_value) VALUES (?, ?)', [row.meta_key, row.meta_value]);
      }

      const insertEntry = await db.prepare(
        'INSERT INTO snapshot_entries (table_name, entry_key, entry_value) VALUES (?, ?, ?)'
      );
      try {
        for (const encoded of tables) {
          const rows = encodedTableToRows(encoded);
          await db.run(
            'INSERT INTO snapshot_tables (table_name, on_disk) VALUES (?, ?)',
            [rows.table.table_name, rows.table.on_disk]
          );
          for (const entry of rows.entries) {
            await insertEntry.run(entry.table_name, entry.entry_key, entry.entry_value);
          }
        }
      } finally {
        await insertEntry.finalize();
      }

      await db.exec('COMMIT;');
    } catch (error) {
      await db.exec('ROLLBACK;');
      throw error;
    }
  }

  private async readSnapshot(db: Database): Promise<ModelSnapshot> {
    const meta = rowsToSnapshotMeta(
      await db.all<SnapshotMetaRow[]>('SELECT meta_key, meta_value FROM snapshot_meta')
    );

    if (meta.version !== SNAPSHOT_FORMAT_VERSION) {
      throw new Error(`Unsupported snapshot version ${meta.version ?? '(none)'}`);
    }

    const kind = modelKindSchema.validate(meta.kind);
    if (kind.error) {
      throw kind.error;
    }

    const options: unknown = JSON.parse(meta.options ?? '{}');
    if (typeof options !== 'object' || options === null || Array.isArray(options)) {
      throw new Error('Snapshot options are not an object');
    }

    const tableRows = await db.all<SnapshotTableRow[]>(
      'SELECT table_name, on_disk FROM snapshot_tables ORDER BY table_name'
    );
    const entryRows = await db.all<SnapshotEntryRow[]>(
      'SELECT table_name, entry_key, entry_value FROM snapshot_entries ORDER BY table_name, entry_key'
    );

    return {
      meta: {
        kind: kind.value,
        options: resolveClassifierOptions({ ...options }),
        version: meta.version,
        savedAt: new Date(meta.saved_at ?? 0)
      },
      tables: tableRows.map(row => rowsToEncodedTable(row, entryRows))
    };
  }
}
