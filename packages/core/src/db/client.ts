/**
 * Database Client Setup
 *
 * Initializes Drizzle ORM over better-sqlite3, applies pragmas and
 * migrations.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import * as schema from '../schema/index.js';
import { logger } from '../utils/logger.js';

export type DatabaseClient = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  /** SQLite file path, or ':memory:' */
  sqliteFilePath: string;
  /** SQLite Write-Ahead Logging (ignored for ':memory:') */
  enableWAL?: boolean;
}

const MEMORY_DATABASE = ':memory:';

// Underlying better-sqlite3 handle for each drizzle client, for raw DDL and close()
const rawHandles = new WeakMap<DatabaseClient, Database.Database>();

/**
 * Initialize database connection
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseClient {
  const filePath = config.sqliteFilePath;
  const inMemory = filePath === MEMORY_DATABASE;

  if (!inMemory) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  const sqlite = new Database(filePath);

  if (!inMemory) {
    try {
      fs.chmodSync(filePath, 0o600);
    } catch (err) {
      logger.warn({ err }, `[db] Could not set file permissions on ${filePath}`);
    }

    if (config.enableWAL !== false) {
      sqlite.pragma('journal_mode = WAL');
      logger.debug('[db] SQLite WAL mode enabled');
    }
  }

  // Required for ON DELETE CASCADE (SQLite default is OFF)
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });
  rawHandles.set(db, sqlite);

  logger.info(`[db] SQLite initialized: ${filePath}`);
  return db;
}

function rawHandle(db: DatabaseClient): Database.Database {
  const handle = rawHandles.get(db);
  if (!handle) {
    throw new Error('[db] Database client was not created by initializeDatabase()');
  }
  return handle;
}

/**
 * Apply migrations from packages/core/drizzle/ in lexicographic order
 */
export function runMigrations(db: DatabaseClient): void {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  const migrationsDir = path.join(currentDir, '../../drizzle');

  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`[db] Migrations directory not found: ${migrationsDir}`);
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const sqlite = rawHandle(db);
  for (const file of files) {
    const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    try {
      sqlite.exec(sqlContent);
      logger.debug(`[db] Migration complete: ${file}`);
    } catch (err) {
      logger.error({ err }, `[db] Migration failed: ${file}`);
      throw err;
    }
  }

  logger.info(`[db] All migrations complete (${files.length} files)`);
}

/**
 * Close database connection
 */
export function closeDatabase(db: DatabaseClient): void {
  const sqlite = rawHandles.get(db);
  if (!sqlite) {
    return;
  }
  sqlite.close();
  rawHandles.delete(db);
  logger.info('[db] SQLite connection closed');
}

/**
 * Health check - verify database connectivity
 */
export function checkDatabaseHealth(db: DatabaseClient): boolean {
  try {
    rawHandle(db).prepare('SELECT 1').get();
    return true;
  } catch (err) {
    logger.error({ err }, '[db] Health check failed');
    return false;
  }
}
