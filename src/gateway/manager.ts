/**
 * Shard manager: owns one ShardSupervisor per shard id.
 * Shards are started one after another with a pause between identifies,
 * and stopped together.
 */

import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { sleep } from '../shared/sleep.js';
import { ShardSupervisor, type ShardStatus, type ShardSupervisorOptions } from './supervisor.js';

export interface ShardManagerOptions extends Omit<ShardSupervisorOptions, 'shardId'> {
  /** Shards this process runs. Default: every id below shardCount. */
  shardIds?: number[];
  /** Pause between two shard starts. Default 5000. */
  startDelayMs?: number;
}

export class ShardManager {
  private readonly shards = new Map<number, ShardSupervisor>();
  private readonly startDelayMs: number;
  private readonly log: Logger;
  private readonly stopStarting = new AbortController();
  private closing: Promise<void> | undefined;

  constructor(options: ShardManagerOptions) {
    const { shardIds, startDelayMs, ...supervisorOptions } = options;
    this.startDelayMs = startDelayMs ?? 5000;
    this.log = (options.logger ?? rootLogger).child({ component: 'shards' });

    const ids = shardIds ?? Array.from({ length: options.shardCount }, (_, i) => i);
    for (const id of ids) {
      if (!Number.isInteger(id) || id < 0 || id >= options.shardCount) {
        throw new RangeError(`Shard id ${id} is outside 0..${options.shardCount - 1}`);
      }
      this.shards.set(id, new ShardSupervisor({ ...supervisorOptions, shardId: id }));
    }
  }

  get size(): number {
    return this.shards.size;
  }

  /**
   * Get the supervisor for one shard.
   * @throws RangeError if this manager does not run the shard.
   */
  get(shardId: number): ShardSupervisor {
    const shard = this.shards.get(shardId);
    if (!shard) {
      throw new RangeError(`Shard ${shardId} is not managed here`);
    }
    return shard;
  }

  getAll(): ShardSupervisor[] {
    return Array.from(this.shards.values());
  }

  statuses(): ShardStatus[] {
    return this.getAll().map((shard) => shard.status());
  }

  /**
   * Start every shard in id order and wait for each to become ready.
   * If one fails to start the others are closed and the error is rethrown.
   */
  async start(): Promise<void> {
    let first = true;
    for (const shard of this.shards.values()) {
      if (!first) {
        await sleep(this.startDelayMs, this.stopStarting.signal);
      }
      first = false;
      if (this.stopStarting.signal.aborted) {
        return;
      }

      this.log.info({ shard: shard.id, count: shard.count }, `Starting shard ${shard.id}`);
      try {
        await shard.start();
      } catch (err) {
        this.log.error({ err, shard: shard.id }, `Shard ${shard.id} failed to start`);
        await this.close();
        throw err;
      }
    }
    this.log.info({ shards: this.shards.size }, 'All shards started');
  }

  /**
   * Wait until every shard has stopped.
   * @throws the first fatal error raised by any shard
   */
  async join(): Promise<void> {
    await Promise.all(this.getAll().filter((shard) => shard.isStarted).map((shard) => shard.join()));
  }

  /** Stop every shard. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.stopStarting.abort();
    await Promise.all(this.getAll().map((shard) => shard.close()));
    this.log.info('All shards stopped');
  }
}
