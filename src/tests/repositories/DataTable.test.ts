import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DataTable, countSchema, jsonCodec, predictorSchema, recordCodec } from '../../repositories/DataTable';
import { MemoryTable } from '../../repositories/MemoryTable';
import { SqliteTable } from '../../repositories/SqliteTable';
import { recordFromEntries } from '../../models/records';
import { ResourceError } from '../../models/validation';
import { CategoryCounts } from '../../types/models';

describe('jsonCodec', () => {
  const codec = jsonCodec('categories', countSchema);

  it('should encode and decode single values', () => {
    expect(codec.encode(3)).toBe('3');
    expect(codec.decode('3')).toBe(3);
  });

  it('should reject malformed JSON with a ResourceError', () => {
    expect(() => codec.decode('{not json')).toThrow(ResourceError);
  });

  it('should reject values that do not match the schema', () => {
    expect(() => codec.decode('-1')).toThrow("Invalid entry in data table 'categories'");
  });
});

describe('recordCodec', () => {
  const codec = recordCodec('word_count', countSchema);

  it('should encode values as JSON', () => {
    expect(codec.encode({ SPAM: 2 })).toBe('{"SPAM":2}');
  });

  it('should decode and validate values', () => {
    expect(codec.decode('{"SPAM":2,"NOTSPAM":0}')).toEqual({ SPAM: 2, NOTSPAM: 0 });
  });

  it('should reject malformed JSON with a ResourceError', () => {
    expect(() => codec.decode('{not json')).toThrow(ResourceError);
  });

  it('should reject values that do not match the schema', () => {
    expect(() => codec.decode('{"SPAM":-1}')).toThrow("Invalid entry in data table 'word_count'");
    expect(() => codec.decode('[1,2]')).toThrow("Invalid entry in data table 'word_count'");
  });

  it('should decode category names that shadow object members as plain keys', () => {
    const decoded = codec.decode('{"__proto__":2,"constructor":1}');

    expect(Object.getPrototypeOf(decoded)).toBeNull();
    expect(Object.keys(decoded)).toEqual(['__proto__', 'constructor']);
    expect(decoded['__proto__']).toBe(2);
    expect(codec.encode(decoded)).toBe('{"__proto__":2,"constructor":1}');
  });

  it('should accept predictor records and reject out-of-range probabilities', () => {
    const predictors = recordCodec('word_score', predictorSchema);
    expect(predictors.decode('{"SPAM":[0.5,0.25]}')).toEqual({ SPAM: [0.5, 0.25] });
    expect(() => predictors.decode('{"SPAM":[1.5,2.25]}')).toThrow(ResourceError);
  });
});

describe.each([
  { backend: 'memory', onDisk: false },
  { backend: 'sqlite', onDisk: true }
])('$backend data table', ({ onDisk }) => {
  let scratchDir: string;
  let table: DataTable<CategoryCounts>;

  beforeAll(async () => {
    scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-sieve-table-'));
  });

  afterAll(async () => {
    await fs.rm(scratchDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    const codec = recordCodec('word_count', countSchema);
    table = onDisk
      ? await SqliteTable.create('word_count', codec, scratchDir)
      : new MemoryTable('word_count', codec);
  });

  afterEach(async () => {
    await table.close();
  });

  it('should report its backend', () => {
    expect(table.onDisk).toBe(onDisk);
    expect(table.location === undefined).toBe(!onDisk);
  });

  it('should store, overwrite and delete entries', async () => {
    await table.set('body:hello', { SPAM: 1 });
    expect(await table.get('body:hello')).toEqual({ SPAM: 1 });

    await table.set('body:hello', { SPAM: 2, NOTSPAM: 1 });
    expect(await table.get('body:hello')).toEqual({ SPAM: 2, NOTSPAM: 1 });

    await table.delete('body:hello');
    expect(await table.get('body:hello')).toBeUndefined();
    expect(await table.size()).toBe(0);
  });

  it('should keep category names that shadow object members', async () => {
    await table.set('body:odd', recordFromEntries([['__proto__', 2], ['constructor', 1]]));

    const stored = await table.get('body:odd');
    expect(stored === undefined ? [] : Object.entries(stored)).toEqual([['__proto__', 2], ['constructor', 1]]);
  });

  it('should list entries in key order', async () => {
    await table.set('subject:zebra', { SPAM: 1 });
    await table.set('body:apple', { NOTSPAM: 1 });
    await table.set('from:a@example.com', { SPAM: 3 });

    expect(await table.entries()).toEqual([
      ['body:apple', { NOTSPAM: 1 }],
      ['from:a@example.com', { SPAM: 3 }],
      ['subject:zebra', { SPAM: 1 }]
    ]);
  });

  it('should replace the whole contents at once', async () => {
    await table.set('body:old', { SPAM: 1 });

    await table.replaceAll([
      ['body:new', { NOTSPAM: 4 }],
      ['body:other', { SPAM: 2 }]
    ]);

    expect(await table.get('body:old')).toBeUndefined();
    expect(await table.size()).toBe(2);
    expect(await table.get('body:new')).toEqual({ NOTSPAM: 4 });
  });

  it('should clear all entries', async () => {
    await table.set('body:a1', { SPAM: 1 });
    await table.set('body:b2', { SPAM: 1 });

    await table.clear();

    expect(await table.size()).toBe(0);
  });
});

describe('SqliteTable scratch files', () => {
  let scratchDir: string;

  beforeEach(async () => {
    scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-sieve-scratch-'));
  });

  afterEach(async () => {
    await fs.rm(scratchDir, { recursive: true, force: true });
  });

  it('should create its file in the scratch directory and delete it on close', async () => {
    const table = await SqliteTable.create('categories', jsonCodec('categories', countSchema), scratchDir);
    expect(path.dirname(table.location)).toBe(scratchDir);
    await expect(fs.access(table.location)).resolves.toBeUndefined();

    await table.close();

    await expect(fs.access(table.location)).rejects.toThrow();
  });

  it('should keep separate files for tables with the same name', async () => {
    const first = await SqliteTable.create('categories', jsonCodec('categories', countSchema), scratchDir);
    const second = await SqliteTable.create('categories', jsonCodec('categories', countSchema), scratchDir);

    await first.set('SPAM', 3);

    expect(first.location).not.toBe(second.location);
    expect(await second.get('SPAM')).toBeUndefined();

    await first.close();
    await second.close();
  });
});
