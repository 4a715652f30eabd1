/**
 * GET /health handler.
 * Reports whether every shard is READY. Degraded answers with 503 so a
 * load balancer or orchestrator probe can act on it.
 */

import { Hono } from 'hono';
import { ShardState } from '../../gateway/shard.js';
import type { ShardStatusSource } from '../types.js';

/**
 * Create health routes with injected dependencies.
 * @param shards - Source of live shard statuses.
 * @returns Hono app with GET / route for health checks.
 */
export function createHealthRoutes(shards: ShardStatusSource) {
  const app = new Hono();

  app.get('/', (c) => {
    const statuses = shards.statuses();
    const ready = statuses.filter((status) => status.state === ShardState.READY).length;
    const healthy = statuses.length > 0 && ready === statuses.length;

    return c.json(
      {
        status: healthy ? 'ok' : 'degraded',
        version: '0.1.0',
        uptime: process.uptime(),
        shards: { total: statuses.length, ready },
      },
      healthy ? 200 : 503,
    );
  });

  return app;
}
