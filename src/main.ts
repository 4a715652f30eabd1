/**
 * shardwire process entry point.
 * Bootstraps configuration, the bucket manager and REST client, session
 * persistence, the shard manager and the optional status API, then runs
 * until a signal or a fatal shard error stops it.
 */

import type { ServerType } from '@hono/node-server';
import type Database from 'better-sqlite3';
import { logger } from './shared/logger.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import type { PresenceConfig } from './config/types.js';
import { RestBucketManager } from './ratelimit/buckets.js';
import { RestClient } from './rest/client.js';
import { resolveIntents, describeIntents } from './gateway/intents.js';
import { WsTransport } from './gateway/transport.js';
import { ShardManager } from './gateway/manager.js';
import { createEventRouter, on } from './gateway/event-router.js';
import { GuildCreateSchema, MessageCreateSchema, type Presence } from './gateway/types.js';
import type { SessionStore } from './gateway/supervisor.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { SqliteSessionStore } from './persistence/session-store.js';
import { createStatusApp, serveStatus } from './api/server.js';

function toPresence(config: PresenceConfig): Presence {
  return {
    since: null,
    status: config.status,
    afk: config.afk,
    activities: config.activity ? [config.activity] : [],
  };
}

// --- Bootstrap ---

logger.info('shardwire v0.1.0 starting...');

const configPath = resolveConfigPath();
const config = loadConfig(configPath);

// Update logger level from config
logger.level = config.settings.logLevel;

const buckets = new RestBucketManager({
  maxRateLimitMs: config.rest.maxRateLimitMs,
  globalRequestsPerSecond: config.rest.globalRequestsPerSecond,
});
buckets.start(config.rest.gcPollMs, config.rest.gcExpireMs);

const rest = new RestClient({
  token: config.token,
  baseUrl: config.rest.baseUrl,
  buckets,
  maxRetries: config.rest.maxRetries,
  timeoutMs: config.rest.requestTimeoutMs,
});

// --- Gateway URL and shard count ---

let gatewayUrl = config.gateway.url;
let shardCount = config.gateway.shardCount;
if (gatewayUrl === undefined || shardCount === undefined) {
  const info = await rest.fetchGatewayBot();
  gatewayUrl ??= info.url;
  shardCount ??= info.shards;
  logger.info(
    {
      url: info.url,
      shards: info.shards,
      sessionStartsRemaining: info.session_start_limit.remaining,
      maxConcurrency: info.session_start_limit.max_concurrency,
    },
    'Fetched gateway information',
  );
}

// --- Session persistence ---

let db: Database.Database | undefined;
let sessionStore: SessionStore | undefined;
if (config.settings.dbPath !== undefined) {
  db = initializeDatabase(config.settings.dbPath);
  migrateSchema(db);
  sessionStore = new SqliteSessionStore(db, shardCount);
}

// --- Shards ---

const intents = resolveIntents(config.gateway.intents);
logger.info({ intents: describeIntents(intents) }, `Using intents ${intents}`);

const dispatch = createEventRouter(
  {
    GUILD_CREATE: on(GuildCreateSchema, (shard, guild) => {
      logger.info({ shard: shard.id, guild: guild.id, name: guild.name }, 'Guild available');
    }),
    MESSAGE_CREATE: on(MessageCreateSchema, (shard, message) => {
      logger.debug({ shard: shard.id, channel: message.channel_id, message: message.id }, 'Message received');
    }),
  },
  {
    fallback: (shard, eventName) => {
      logger.trace({ shard: shard.id, event: eventName }, 'Event received');
    },
  },
);

const manager = new ShardManager({
  shardCount,
  shardIds: config.gateway.shardIds,
  token: config.token,
  url: gatewayUrl,
  version: config.gateway.version,
  compression: config.gateway.compression,
  intents,
  largeThreshold: config.gateway.largeThreshold,
  presence: config.gateway.presence ? toPresence(config.gateway.presence) : undefined,
  transport: new WsTransport({ handshakeTimeoutMs: config.gateway.handshakeTimeoutMs }),
  dispatch,
  sessionStore,
  startDelayMs: config.gateway.startDelayMs,
  restartWindowMs: config.gateway.restartWindowMs,
  reconnectDelayMs: config.gateway.reconnectDelayMs,
  backoff: config.gateway.backoff,
});

// --- Status API ---

let server: ServerType | undefined;
if (config.settings.statusPort !== undefined) {
  server = serveStatus(createStatusApp({ shards: manager, buckets }), config.settings.statusPort);
}

// --- Graceful shutdown ---

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  await manager.close();
  buckets.close();
  if (db) {
    db.close();
    logger.info('Database closed');
  }
  if (server) {
    const closing = server;
    await new Promise<void>((resolve) => closing.close(() => resolve()));
    logger.info('Server closed');
  }
}

function stop(exitCode: number): void {
  shutdown().then(
    () => process.exit(exitCode),
    (err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    },
  );
}

process.on('SIGINT', () => stop(0));
process.on('SIGTERM', () => stop(0));

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

// --- Run ---

try {
  await manager.start();
  logger.info({ shards: manager.size, shardCount }, 'Ready');
  await manager.join();
} catch (err) {
  logger.fatal({ err }, 'Gateway stopped with a fatal error');
  stop(1);
}
