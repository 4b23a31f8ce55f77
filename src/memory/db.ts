import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

export const DEFAULT_DB_PATH = join(homedir(), '.guarded-agent', 'transcripts.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const schemaPath = join(here, 'schema.sql');
  return readFileSync(schemaPath, 'utf-8');
}

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

/**
 * Open (or reuse) the SQLite database at `dbPath` and apply the schema.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  const existing = INSTANCES.get(dbPath);
  if (existing) {
    return existing;
  }

  ensureDirectory(dbPath);

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(getSchemaSql());

  INSTANCES.set(dbPath, db);
  return db;
}

export function closeDatabase(dbPath: string = DEFAULT_DB_PATH): void {
  const db = INSTANCES.get(dbPath);
  if (!db) return;
  db.close();
  INSTANCES.delete(dbPath);
}
