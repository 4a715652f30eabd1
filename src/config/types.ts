/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  GatewayConfigSchema,
  RestConfigSchema,
  SettingsSchema,
  PresenceConfigSchema,
  BackoffConfigSchema,
} from './schema.js';

/** Fully validated configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** Gateway connection and sharding settings. */
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

/** REST client and bucket manager settings. */
export type RestConfig = z.infer<typeof RestConfigSchema>;

/** Process-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;

export type PresenceConfig = z.infer<typeof PresenceConfigSchema>;

export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;

// Re-export schemas for convenience
export {
  ConfigSchema,
  GatewayConfigSchema,
  RestConfigSchema,
  SettingsSchema,
  PresenceConfigSchema,
  BackoffConfigSchema,
} from './schema.js';
