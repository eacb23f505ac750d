import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface ScratchDatabase {
  db: Database;
  filename: string;
}

/**
 * Open a SQLite database file, creating its directory if needed
 */
export async function openDatabase(filename: string): Promise<Database> {
  if (filename !== ':memory:') {
    await fs.mkdir(path.dirname(filename), { recursive: true });
  }

  const db = await open({
    filename,
    driver: sqlite3.Database
  });

  await db.exec('PRAGMA foreign_keys = ON');

  return db;
}

/**
 * Resolve the directory used for disk-backed table files
 */
export function getScratchDirectory(scratchDir?: string): string {
  return scratchDir || process.env.CLASSIFIER_SCRATCH_DIR || path.join(os.tmpdir(), 'mail-sieve');
}

/**
 * Create a fresh, uniquely named database file for one disk-backed table
 */
export async function createScratchDatabase(tableName: string, scratchDir?: string): Promise<ScratchDatabase> {
  const filename = path.join(getScratchDirectory(scratchDir), `${tableName}-${uuidv4()}.db`);
  const db = await openDatabase(filename);

  // Scratch tables are rebuilt from snapshots, never recovered after a crash
  await db.exec('PRAGMA synchronous = OFF');
  await db.exec('PRAGMA journal_mode = MEMORY');

  return { db, filename };
}

/**
 * Close a database and delete its file along with any journal left behind
 */
export async function removeDatabase(db: Database, filename: string): Promise<void> {
  await db.close();
  for (const file of [filename, `${filename}-journal`]) {
    await fs.rm(file, { force: true });
  }
}
