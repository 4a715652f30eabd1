/**
 * Status API: a small Hono app over the shard manager and bucket manager,
 * served with @hono/node-server.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { logger } from '../shared/logger.js';
import type { RestBucketManager } from '../ratelimit/buckets.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createShardRoutes } from './routes/shards.js';
import { createRateLimitRoutes } from './routes/ratelimits.js';
import type { ShardStatusSource } from './types.js';

export interface StatusAppDeps {
  shards: ShardStatusSource;
  buckets: RestBucketManager;
}

export function createStatusApp(deps: StatusAppDeps): Hono {
  const app = new Hono();
  app.onError(errorHandler);
  app.notFound((c) => c.json({ error: { message: `No route for ${c.req.method} ${c.req.path}`, code: 404 } }, 404));

  app.route('/health', createHealthRoutes(deps.shards));
  app.route('/shards', createShardRoutes(deps.shards));
  app.route('/ratelimits', createRateLimitRoutes(deps.buckets));

  return app;
}

/** Start listening; close the returned server on shutdown. */
export function serveStatus(app: Hono, port: number): ServerType {
  return serve({ fetch: app.fetch, port }, (info) => {
    logger.info({ port: info.port }, `Status API listening on port ${info.port}`);
  });
}
