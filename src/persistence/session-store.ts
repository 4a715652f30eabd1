/**
 * SQLite-backed SessionStore.
 * Lets a restarted process RESUME its shards instead of identifying again.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import type { SessionStore } from '../gateway/supervisor.js';
import type { ShardSession } from '../gateway/shard.js';

const SessionRowSchema = z.object({
  session_id: z.string(),
  seq: z.number().int().nullable(),
  resume_url: z.string().nullable(),
  shard_count: z.number().int().nullable(),
  updated_at: z.number().int(),
});

export interface StoredSession extends ShardSession {
  shardId: number;
  shardCount: number | null;
  updatedAt: number;
}

export class SqliteSessionStore implements SessionStore {
  private readonly shardCount: number;
  private readonly selectStmt: Database.Statement<[number]>;
  private readonly selectAllStmt: Database.Statement<[]>;
  private readonly upsertStmt: Database.Statement<[number, string, number | null, string | null, number, number]>;
  private readonly deleteStmt: Database.Statement<[number]>;

  /**
   * @param shardCount - Sessions opened under another shard count are ignored on load
   */
  constructor(db: Database.Database, shardCount: number) {
    this.shardCount = shardCount;
    this.selectStmt = db.prepare<[number]>(
      'SELECT session_id, seq, resume_url, shard_count, updated_at FROM shard_sessions WHERE shard_id = ?',
    );
    this.selectAllStmt = db.prepare<[]>(
      'SELECT shard_id, session_id, seq, resume_url, shard_count, updated_at FROM shard_sessions ORDER BY shard_id',
    );
    this.upsertStmt = db.prepare<[number, string, number | null, string | null, number, number]>(`
      INSERT INTO shard_sessions (shard_id, session_id, seq, resume_url, shard_count, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(shard_id) DO UPDATE SET
        session_id = excluded.session_id,
        seq = excluded.seq,
        resume_url = excluded.resume_url,
        shard_count = excluded.shard_count,
        updated_at = excluded.updated_at
    `);
    this.deleteStmt = db.prepare<[number]>('DELETE FROM shard_sessions WHERE shard_id = ?');
  }

  load(shardId: number): ShardSession | null {
    const parsed = SessionRowSchema.safeParse(this.selectStmt.get(shardId));
    if (!parsed.success) {
      return null;
    }
    const row = parsed.data;
    if (row.shard_count !== null && row.shard_count !== this.shardCount) {
      logger.info(
        { shard: shardId, storedShardCount: row.shard_count, shardCount: this.shardCount },
        'Ignoring stored session from a different shard count',
      );
      this.delete(shardId);
      return null;
    }
    return { sessionId: row.session_id, seq: row.seq, resumeUrl: row.resume_url };
  }

  save(shardId: number, session: ShardSession): void {
    if (session.sessionId === null) {
      this.delete(shardId);
      return;
    }
    this.upsertStmt.run(shardId, session.sessionId, session.seq, session.resumeUrl, this.shardCount, Date.now());
  }

  delete(shardId: number): void {
    this.deleteStmt.run(shardId);
  }

  /** Every stored session, for diagnostics. */
  list(): StoredSession[] {
    const rows = z.array(SessionRowSchema.extend({ shard_id: z.number().int() })).parse(this.selectAllStmt.all());
    return rows.map((row) => ({
      shardId: row.shard_id,
      sessionId: row.session_id,
      seq: row.seq,
      resumeUrl: row.resume_url,
      shardCount: row.shard_count,
      updatedAt: row.updated_at,
    }));
  }
}
