import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';
import { BUSY_TIMEOUT_MS, initializeDatabase } from '../db.js';

describe('initializeDatabase', () => {
  const dirs: string[] = [];
  const open: Database.Database[] = [];

  afterEach(() => {
    for (const db of open.splice(0)) {
      db.close();
    }
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('creates missing directories and uses WAL for a file database', () => {
    const dir = mkdtempSync(join(tmpdir(), 'shardwire-db-'));
    dirs.push(dir);
    const dbPath = join(dir, 'nested', 'sessions.db');

    const db = initializeDatabase(dbPath);
    open.push(db);

    expect(existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('synchronous', { simple: true })).toBe(1);
    expect(db.pragma('busy_timeout', { simple: true })).toBe(BUSY_TIMEOUT_MS);
  });

  it('opens an in-memory database without touching the filesystem', () => {
    const db = initializeDatabase(':memory:');
    open.push(db);

    expect(db.pragma('journal_mode', { simple: true })).toBe('memory');
    expect(db.pragma('busy_timeout', { simple: true })).toBe(BUSY_TIMEOUT_MS);
  });
});
