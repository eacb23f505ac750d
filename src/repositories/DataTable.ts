import Joi from 'joi';
import { ReadWriteLock } from '../services/locking/ReadWriteLock';
import { ResourceError } from '../models/validation';
import { createRecord } from '../models/records';
import { Predictor } from '../types/models';

/**
 * Serialises table values for disk-backed tables, snapshots and clones
 */
export interface TableCodec<V> {
  encode(value: V): string;
  decode(raw: string): V;
}

/**
 * Key-value table with a pluggable backend. Methods do no locking of their
 * own: callers hold `lock` in the mode their operation needs.
 */
export interface DataTable<V> {
  readonly name: string;
  readonly onDisk: boolean;
  readonly lock: ReadWriteLock;
  readonly codec: TableCodec<V>;
  /** Scratch file backing the table, when it lives on disk */
  readonly location?: string;

  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
  entries(): Promise<Array<[string, V]>>;
  size(): Promise<number>;
  clear(): Promise<void>;
  /** Replace the whole contents in one step */
  replaceAll(entries: Array<[string, V]>): Promise<void>;
  close(): Promise<void>;
}

function parseEntry(tableName: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ResourceError(`Corrupt entry in data table '${tableName}'`, tableName, error);
  }
}

function validateEntry<V>(tableName: string, schema: Joi.AnySchema<V>, value: unknown): V {
  const result = schema.validate(value);
  if (result.error) {
    throw new ResourceError(`Invalid entry in data table '${tableName}': ${result.error.message}`, tableName, result.error);
  }
  return result.value;
}

export function jsonCodec<V>(tableName: string, schema: Joi.AnySchema<V>): TableCodec<V> {
  return {
    encode: (value: V) => JSON.stringify(value),
    decode: (raw: string) => validateEntry(tableName, schema, parseEntry(tableName, raw))
  };
}

/**
 * Codec for records keyed by category. Each value is checked on its own
 * and the decoded record has no prototype.
 */
export function recordCodec<V>(tableName: string, valueSchema: Joi.AnySchema<V>): TableCodec<Record<string, V>> {
  return {
    encode: (value: Record<string, V>) => JSON.stringify(value),
    decode: (raw: string) => {
      const parsed = parseEntry(tableName, raw);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ResourceError(`Invalid entry in data table '${tableName}': "value" must be of type object`, tableName);
      }
      const record = createRecord<V>();
      for (const [key, value] of Object.entries(parsed)) {
        record[key] = validateEntry(tableName, valueSchema, value);
      }
      return record;
    }
  };
}

// Value schemas for the tables the models use
export const countSchema = Joi.number().integer().min(0).required();

export const positiveNumberSchema = Joi.number().greater(0).required();

export const predictorSchema = Joi.array<Predictor>()
  .ordered(Joi.number().min(0).max(1).required(), Joi.number().min(0).max(1).required())
  .required();
