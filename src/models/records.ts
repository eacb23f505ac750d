/**
 * Helpers for records keyed by user-supplied names such as categories.
 *
 * Records are built without a prototype and read through own properties
 * only, so names like `constructor` or `__proto__` are ordinary keys.
 */

export function createRecord<V>(): Record<string, V> {
  return Object.create(null);
}

export function recordFromEntries<V>(entries: Iterable<readonly [string, V]>): Record<string, V> {
  const record = createRecord<V>();
  for (const [key, value] of entries) {
    record[key] = value;
  }
  return record;
}

export function copyRecord<V>(record: Record<string, V> | undefined): Record<string, V> {
  return recordFromEntries(record ? Object.entries(record) : []);
}

export function getOwn<V>(record: Record<string, V> | undefined, key: string): V | undefined {
  return record !== undefined && Object.hasOwn(record, key) ? record[key] : undefined;
}
