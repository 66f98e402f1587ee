import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.swarm-trader', 'swarm-trader.sqlite');
const INSTANCES = new Map<string, Database.Database>();
let configuredPath: string | null = null;

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const schemaPath = join(here, 'schema.sql');
  return readFileSync(schemaPath, 'utf-8');
}

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

function applySchema(db: Database.Database): void {
  db.exec(getSchemaSql());
}

/** Sets the path used by `openDatabase()` when none is passed (from `memory.dbPath`). */
export function setDatabasePath(path: string | null | undefined): void {
  configuredPath = path ?? null;
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath =
    dbPath ?? configuredPath ?? process.env.SWARM_TRADER_DB_PATH ?? DEFAULT_DB_PATH;

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  if (resolvedPath !== ':memory:') {
    ensureDirectory(resolvedPath);
  }

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  applySchema(db);

  INSTANCES.set(resolvedPath, db);
  return db;
}
