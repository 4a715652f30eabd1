/**
 * Raw event router.
 * Turns a table of `{ schema, handler }` entries keyed by event name into a
 * RawEventDispatcher. Payloads are validated with Zod before the handler
 * sees them; invalid payloads are logged and dropped.
 */

import { z } from 'zod';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import type { RawEventDispatcher, ShardInfo } from './types.js';

export interface EventRoute<S extends z.ZodType> {
  schema: S;
  handler(shard: ShardInfo, payload: z.infer<S>): void | Promise<void>;
}

/** Build a route with the handler's payload type inferred from the schema. */
export function on<S extends z.ZodType>(
  schema: S,
  handler: (shard: ShardInfo, payload: z.infer<S>) => void | Promise<void>,
): EventRoute<S> {
  return { schema, handler };
}

export interface EventRouterOptions {
  /** Receives events without a route. */
  fallback?: RawEventDispatcher;
  logger?: Logger;
}

export function createEventRouter(
  routes: Record<string, EventRoute<z.ZodType>>,
  options: EventRouterOptions = {},
): RawEventDispatcher {
  const log = (options.logger ?? rootLogger).child({ component: 'events' });
  const table = new Map(Object.entries(routes));

  return async (shard, eventName, payload) => {
    const route = table.get(eventName);
    if (!route) {
      await options.fallback?.(shard, eventName, payload);
      return;
    }

    const parsed = route.schema.safeParse(payload);
    if (!parsed.success) {
      log.warn(
        { shard: shard.id, event: eventName, issues: z.prettifyError(parsed.error) },
        `Dropping ${eventName} with an invalid payload`,
      );
      return;
    }
    await route.handler(shard, parsed.data);
  };
}
