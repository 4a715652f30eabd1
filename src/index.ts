/**
 * shardwire library entry point.
 * The process entry point lives in main.ts.
 */

export { logger, shardLogger, type Logger } from './shared/logger.js';
export * from './shared/errors.js';
export { monotonicNow, sleep } from './shared/sleep.js';

export { loadConfig, resolveConfigPath } from './config/loader.js';
export * from './config/types.js';

export {
  BaseRateLimiter,
  ManualRateLimiter,
  WindowedBurstRateLimiter,
  type Waiter,
} from './ratelimit/limiters.js';
export { ExponentialBackoff, type BackoffOptions } from './ratelimit/backoff.js';
export {
  RestBucket,
  RestBucketManager,
  UNKNOWN_HASH,
  unknownBucketHash,
  type BucketLease,
  type BucketManagerOptions,
  type BucketManagerStats,
  type BucketStats,
} from './ratelimit/buckets.js';

export * from './rest/routes.js';
export { RestClient, type RestClientOptions, type RequestOptions } from './rest/client.js';
export { parseRateLimitHeaders, parseTooManyRequests } from './rest/headers.js';

export * from './gateway/opcodes.js';
export * from './gateway/intents.js';
export * from './gateway/types.js';
export {
  GatewayShardConnection,
  ShardState,
  emptySession,
  type Compression,
  type ConnectionOutcome,
  type ShardConnectionOptions,
  type ShardSession,
} from './gateway/shard.js';
export {
  ShardSupervisor,
  type SessionStore,
  type ShardStatus,
  type ShardSupervisorOptions,
} from './gateway/supervisor.js';
export { ShardManager, type ShardManagerOptions } from './gateway/manager.js';
export { WsTransport, type GatewaySocket, type GatewayTransport } from './gateway/transport.js';
export { createEventRouter, on, type EventRoute } from './gateway/event-router.js';

export { initializeDatabase } from './persistence/db.js';
export { migrateSchema } from './persistence/schema.js';
export { SqliteSessionStore, type StoredSession } from './persistence/session-store.js';

export { createStatusApp, serveStatus } from './api/server.js';
