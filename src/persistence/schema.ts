/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/** Schema version after every migration has run. */
export const SCHEMA_VERSION = 2;

export function getSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);
  logger.debug({ currentVersion }, 'Database schema version check');

  const migrations: Array<() => void> = [
    // Migration 1: resume state per shard
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS shard_sessions (
          shard_id INTEGER PRIMARY KEY,
          session_id TEXT NOT NULL,
          seq INTEGER,
          resume_url TEXT,
          updated_at INTEGER NOT NULL
        );
      `);
    },
    // Migration 2: remember the shard count a session was opened with
    () => {
      db.exec(`
        ALTER TABLE shard_sessions ADD COLUMN shard_count INTEGER;
      `);
    },
  ];

  for (let i = currentVersion; i < migrations.length; i++) {
    const targetVersion = i + 1;
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    db.transaction(() => {
      migrations[i]!();
      db.pragma(`user_version = ${targetVersion}`);
    })();
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}
