import { ReadWriteLock } from '../services/locking/ReadWriteLock';
import { DataTable, TableCodec } from './DataTable';

/**
 * DataTable held in a Map. Values are stored by reference, so callers
 * replace records instead of mutating what `get` returned.
 */
export class MemoryTable<V> implements DataTable<V> {
  readonly onDisk = false;
  readonly lock = new ReadWriteLock();
  private store = new Map<string, V>();

  constructor(
    readonly name: string,
    readonly codec: TableCodec<V>
  ) {}

  async get(key: string): Promise<V | undefined> {
    return this.store.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.store.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  /**
   * Entries in key order, matching the SQLite backend
   */
  async entries(): Promise<Array<[string, V]>> {
    return Array.from(this.store.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async size(): Promise<number> {
    return this.store.size;
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  async replaceAll(entries: Array<[string, V]>): Promise<void> {
    this.store = new Map(entries);
  }

  async close(): Promise<void> {
    this.store.clear();
  }
}
