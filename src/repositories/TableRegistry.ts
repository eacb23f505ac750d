import { ConfigurationError } from '../models/validation';
import { LockMode, ReleaseLock } from '../services/locking/ReadWriteLock';
import { DataTable, TableCodec } from './DataTable';
import { MemoryTable } from './MemoryTable';
import { SqliteTable } from './SqliteTable';

export interface LockRequest {
  table: DataTable<unknown>;
  mode: LockMode;
}

export interface EncodedTable {
  name: string;
  onDisk: boolean;
  entries: Array<[string, string]>;
}

/**
 * Owns the named data tables of one model. Multi-table locks are always
 * taken in table-name order so concurrent operations cannot deadlock.
 */
export class TableRegistry {
  private tables = new Map<string, DataTable<unknown>>();

  constructor(private readonly scratchDir?: string) {}

  /**
   * Create a table on the requested backend. Names must be unique.
   */
  async addDataTable<V>(name: string, codec: TableCodec<V>, onDisk: boolean = false): Promise<DataTable<V>> {
    if (this.tables.has(name)) {
      throw new ConfigurationError(`Data table ${name} conflicts with existing element`);
    }

    const table: DataTable<V> = onDisk
      ? await SqliteTable.create(name, codec, this.scratchDir)
      : new MemoryTable(name, codec);

    this.tables.set(name, table);
    return table;
  }

  has(name: string): boolean {
    return this.tables.has(name);
  }

  names(): string[] {
    return Array.from(this.tables.keys()).sort();
  }

  /**
   * Where disk-backed tables keep their data, keyed by table name
   */
  locations(): Record<string, string> {
    const locations: Record<string, string> = {};
    for (const [name, table] of this.tables) {
      if (table.location) {
        locations[name] = table.location;
      }
    }
    return locations;
  }

  /**
   * Acquire several table locks in name order; resolves to a release function
   */
  async lock(requests: LockRequest[]): Promise<ReleaseLock> {
    const ordered = [...requests].sort((a, b) => a.table.name.localeCompare(b.table.name));
    const releases: ReleaseLock[] = [];

    for (const request of ordered) {
      releases.push(await request.table.lock.acquire(request.mode));
    }

    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  async withLocks<T>(requests: LockRequest[], fn: () => Promise<T> | T): Promise<T> {
    const release = await this.lock(requests);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Exclusive lock on every table, for whole-model operations
   */
  lockAll(): Promise<ReleaseLock> {
    return this.lock(Array.from(this.tables.values()).map(table => ({ table, mode: 'write' as const })));
  }

  async withAllLocked<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.lockAll();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Encoded contents of every table. Callers hold lockAll.
   */
  async exportTables(): Promise<EncodedTable[]> {
    const exported: EncodedTable[] = [];

    for (const name of this.names()) {
      const table = this.requireTable(name);
      const entries = await table.entries();
      exported.push({
        name,
        onDisk: table.onDisk,
        entries: entries.map(([key, value]): [string, string] => [key, table.codec.encode(value)])
      });
    }

    return exported;
  }

  /**
   * Replace the contents of existing tables with encoded entries. Callers
   * hold lockAll.
   */
  async importTables(tables: EncodedTable[]): Promise<void> {
    for (const encoded of tables) {
      const table = this.requireTable(encoded.name);
      await table.replaceAll(
        encoded.entries.map(([key, raw]): [string, unknown] => [key, table.codec.decode(raw)])
      );
    }
  }

  /**
   * Close every table, deleting scratch files of disk-backed ones
   */
  async close(): Promise<void> {
    for (const table of this.tables.values()) {
      await table.close();
    }
  }

  private requireTable(name: string): DataTable<unknown> {
    const table = this.tables.get(name);
    if (!table) {
      throw new ConfigurationError(`Unknown data table ${name}`);
    }
    return table;
  }
}
