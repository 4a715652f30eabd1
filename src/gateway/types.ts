/**
 * Gateway wire types.
 * Inbound frames are validated with Zod before the shard acts on them;
 * outbound command payloads are plain interfaces.
 */

import { z } from 'zod';

/** Envelope of every gateway frame. */
export const GatewayPayloadSchema = z.object({
  op: z.number().int(),
  d: z.unknown().optional(),
  s: z.number().int().nullable().optional(),
  t: z.string().nullable().optional(),
});

export type GatewayPayload = z.infer<typeof GatewayPayloadSchema>;

export const HelloSchema = z.object({
  heartbeat_interval: z.number().positive(),
});

export const ReadySchema = z.object({
  v: z.number().int().optional(),
  session_id: z.string().min(1),
  resume_gateway_url: z.string().optional(),
  user: z.object({
    id: z.string(),
    username: z.string(),
  }),
  shard: z.tuple([z.number().int(), z.number().int()]).optional(),
});

export type ReadyPayload = z.infer<typeof ReadySchema>;

export const InvalidSessionSchema = z.boolean();

/** Response of `GET /gateway/bot`. */
export const GatewayBotSchema = z.object({
  url: z.string(),
  shards: z.number().int().positive(),
  session_start_limit: z.object({
    total: z.number().int(),
    remaining: z.number().int(),
    reset_after: z.number(),
    max_concurrency: z.number().int().positive(),
  }),
});

export type GatewayBot = z.infer<typeof GatewayBotSchema>;

/**
 * The few dispatch payloads the library reads itself. Everything else is
 * handed to the consumer unparsed.
 */
export const GuildCreateSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  unavailable: z.boolean().optional(),
});

export const MessageCreateSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  guild_id: z.string().optional(),
  content: z.string(),
});

export type Status = 'online' | 'idle' | 'dnd' | 'invisible' | 'offline';

export interface Activity {
  name: string;
  /** 0 playing, 1 streaming, 2 listening, 3 watching, 4 custom, 5 competing. */
  type: number;
  url?: string | null;
  state?: string | null;
}

/** Presence sent in IDENTIFY and PRESENCE_UPDATE. */
export interface Presence {
  /** Epoch ms since the client went idle, or null. */
  since: number | null;
  activities: Activity[];
  status: Status;
  afk: boolean;
}

export interface IdentifyProperties {
  os: string;
  browser: string;
  device: string;
}

export interface IdentifyPayload {
  token: string;
  properties: IdentifyProperties;
  compress: boolean;
  large_threshold: number;
  shard: [number, number];
  intents: number;
  presence?: Presence;
}

export interface ResumePayload {
  token: string;
  session_id: string;
  seq: number;
}

export interface VoiceStateUpdate {
  guild_id: string;
  channel_id: string | null;
  self_mute: boolean;
  self_deaf: boolean;
}

export interface RequestGuildMembers {
  guild_id: string;
  query?: string;
  limit: number;
  presences?: boolean;
  user_ids?: string[];
  nonce?: string;
}

/**
 * Receives every dispatch a shard sees, including the synthetic
 * CONNECTED and DISCONNECTED events. Returned promises are not awaited by
 * the shard; rejections are logged.
 */
export type RawEventDispatcher = (
  shard: ShardInfo,
  eventName: string,
  payload: unknown,
) => void | Promise<void>;

/** What a dispatch callback learns about the shard that produced an event. */
export interface ShardInfo {
  id: number;
  count: number;
}
