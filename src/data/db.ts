/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync, unlinkSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export const MEMORY_DB = ':memory:';

let db: Database.Database | null = null;

export function getDbPath(): string {
  const configured = process.env.DB_PATH?.trim();
  if (configured === MEMORY_DB) return MEMORY_DB;
  if (configured) {
    return isAbsolute(configured) ? configured : join(process.cwd(), configured);
  }
  return join(process.cwd(), 'data', 'scanner.db');
}

/** Open a connection and bring its schema up to date. */
export function openDatabase(dbPath: string = getDbPath()): Database.Database {
  if (dbPath !== MEMORY_DB) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(dbPath);
  if (dbPath !== MEMORY_DB) {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');

  runMigrations(database);
  return database;
}

export function initializeDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  logger.info({ dbPath, isNew: dbPath === MEMORY_DB || !existsSync(dbPath) }, 'Initializing database');
  db = openDatabase(dbPath);
  return db;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    throw new Error(`migrations_not_found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    database.exec(readFileSync(join(migrationsDir, file), 'utf-8'));
  }

  logger.debug({ migrationsDir, files }, 'Database migrations applied');
}

export function getDatabase(): Database.Database {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Database connection closed');
  }
}

export function resetDatabase(): void {
  closeDatabase();

  const dbPath = getDbPath();
  if (dbPath === MEMORY_DB) return;
  for (const path of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (existsSync(path)) unlinkSync(path);
  }

  logger.info({ dbPath }, 'Database reset complete');
}
