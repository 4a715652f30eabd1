/**
 * Rate limit status routes.
 * Provides live state of every REST bucket and the global gate.
 */

import { Hono } from 'hono';
import type { RestBucketManager } from '../../ratelimit/buckets.js';

/**
 * Create rate limit routes with injected bucket manager dependency.
 * @param buckets - RestBucketManager whose buckets are reported.
 * @returns Hono sub-app with rate limit endpoints.
 */
export function createRateLimitRoutes(buckets: RestBucketManager) {
  const app = new Hono();

  app.get('/', (c) => {
    const stats = buckets.getStats();

    return c.json({
      global: {
        throttled: stats.globalThrottleMs > 0,
        retryAfterMs: stats.globalThrottleMs,
      },
      routes: stats.routes,
      buckets: stats.buckets.map((bucket) => ({
        hash: bucket.hash,
        route: bucket.route,
        unknown: bucket.unknown,
        remaining: bucket.remaining,
        limit: bucket.limit,
        resetAfterMs: bucket.resetAfterMs,
        queued: bucket.queued,
        throttling: bucket.throttling,
      })),
    });
  });

  return app;
}
