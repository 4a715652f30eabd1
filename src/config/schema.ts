/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';
import { isIntentName, type IntentName } from '../gateway/intents.js';

/** Schema for a gateway intent written by name, e.g. `GUILD_MESSAGES`. */
export const IntentNameSchema = z.custom<IntentName>(
  (value) => typeof value === 'string' && isIntentName(value),
  { message: 'Unknown gateway intent' },
);

/** Schema for the presence sent with IDENTIFY. */
export const PresenceConfigSchema = z.object({
  status: z.enum(['online', 'idle', 'dnd', 'invisible', 'offline']).default('online'),
  afk: z.boolean().default(false),
  activity: z
    .object({
      name: z.string().min(1, { message: 'Activity name must not be empty' }),
      type: z.number().int().min(0).max(5).default(0),
      url: z.url().optional(),
    })
    .optional(),
});

/** Schema for reconnect backoff tuning. */
export const BackoffConfigSchema = z.object({
  base: z.number().gt(1).default(1.85),
  maximumMs: z.number().int().min(1000).default(600000),
  jitterRatio: z.number().min(0).lt(1).default(0.1),
});

/** Schema for gateway settings. */
export const GatewayConfigSchema = z.object({
  /** Taken from GET /gateway/bot when omitted. */
  url: z.url({ message: 'gateway.url must be a valid URL' }).optional(),
  version: z.number().int().positive().default(10),
  compression: z.enum(['zlib-stream', 'none']).default('zlib-stream'),
  intents: z
    .array(IntentNameSchema)
    .min(1, { message: 'At least one intent is required' }),
  largeThreshold: z.number().int().min(50).max(250).default(250),
  /** Taken from GET /gateway/bot when omitted. */
  shardCount: z.number().int().positive().optional(),
  shardIds: z.array(z.number().int().min(0)).optional(),
  startDelayMs: z.number().int().min(0).default(5000),
  restartWindowMs: z.number().int().min(0).default(30000),
  reconnectDelayMs: z.number().int().min(0).default(5000),
  handshakeTimeoutMs: z.number().int().min(1000).default(30000),
  backoff: BackoffConfigSchema.prefault({}),
  presence: PresenceConfigSchema.optional(),
});

/** Schema for REST client and bucket manager settings. */
export const RestConfigSchema = z.object({
  baseUrl: z.url({ message: 'rest.baseUrl must be a valid URL' }).default('https://discord.com/api/v10'),
  maxRateLimitMs: z.number().int().positive().optional(),
  globalRequestsPerSecond: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(1).default(5),
  requestTimeoutMs: z.number().int().min(1000).default(30000),
  gcPollMs: z.number().int().min(1000).default(20000),
  gcExpireMs: z.number().int().min(0).default(10000),
});

/** Schema for process-level settings. */
export const SettingsSchema = z.object({
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  /** SQLite file holding resume state. Sessions are not persisted when omitted. */
  dbPath: z.string().min(1).optional(),
  /** Port of the status API. The API is off when omitted. */
  statusPort: z.number().int().min(1).max(65535).optional(),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    token: z.string().min(1, { message: 'token must not be empty (or set SHARDWIRE_TOKEN)' }),
    gateway: GatewayConfigSchema,
    rest: RestConfigSchema.prefault({}),
    settings: SettingsSchema.prefault({}),
  })
  .refine(
    (config) => {
      const { shardIds, shardCount } = config.gateway;
      return shardIds === undefined || shardCount === undefined || shardIds.every((id) => id < shardCount);
    },
    {
      message: 'gateway.shardIds must all be below gateway.shardCount',
    },
  );
