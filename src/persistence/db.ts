/**
 * SQLite connection for shard session storage.
 * Several processes may run disjoint shard ids against one file, so writers
 * wait on a busy lock instead of failing.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

/** How long a write waits for another process's lock, in ms. */
export const BUSY_TIMEOUT_MS = 5000;

/**
 * Open (creating it and its directory if needed) the session database.
 * @param dbPath - Path to SQLite database file, or `:memory:`
 */
export function initializeDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }

  const journalMode = db.pragma('journal_mode', { simple: true });
  logger.info({ dbPath, journalMode }, 'Session database opened');

  return db;
}
