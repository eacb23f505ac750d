import { EncodedTable } from '../repositories/TableRegistry';
import {
  ClassifierOptions,
  ModelKind,
  SnapshotEntryRow,
  SnapshotMetaRow,
  SnapshotTableRow
} from '../types/models';

/**
 * Transformation functions between snapshot rows and model state
 */

export const SNAPSHOT_FORMAT_VERSION = '1';

export interface SnapshotMeta {
  kind: ModelKind;
  options: ClassifierOptions;
  version: string;
  savedAt: Date;
}

// Meta transformations
export function snapshotMetaToRows(meta: SnapshotMeta): SnapshotMetaRow[] {
  return [
    { meta_key: 'kind', meta_value: meta.kind },
    { meta_key: 'options', meta_value: JSON.stringify(meta.options) },
    { meta_key: 'version', meta_value: meta.version },
    { meta_key: 'saved_at', meta_value: meta.savedAt.toISOString() }
  ];
}

/**
 * Raw meta values keyed by name; options are left as parsed JSON for the
 * caller to validate
 */
export function rowsToSnapshotMeta(rows: SnapshotMetaRow[]): Record<string, string> {
  return Object.fromEntries(rows.map(row => [row.meta_key, row.meta_value]));
}

// Table transformations
export function encodedTableToRows(table: EncodedTable): { table: SnapshotTableRow; entries: SnapshotEntryRow[] } {
  return {
    table: {
      table_name: table.name,
      on_disk: table.onDisk ? 1 : 0
    },
    entries: table.entries.map(([key, value]) => ({
      table_name: table.name,
      entry_key: key,
      entry_value: value
    }))
  };
}

export function rowsToEncodedTable(table: SnapshotTableRow, entries: SnapshotEntryRow[]): EncodedTable {
  return {
    name: table.table_name,
    onDisk: Boolean(table.on_disk),
    entries: entries
      .filter(entry => entry.table_name === table.table_name)
      .map((entry): [string, string] => [entry.entry_key, entry.entry_value])
  };
}
