import type { ShardStatus } from '../gateway/supervisor.js';

/** Anything that can report shard statuses; ShardManager in production. */
export interface ShardStatusSource {
  statuses(): ShardStatus[];
}
