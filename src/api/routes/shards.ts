/**
 * Shard status routes.
 * Lists every shard this process runs with its state, session and counters.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import type { ShardStatusSource } from '../types.js';

const ShardIdSchema = z.coerce.number().int().min(0);

export function createShardRoutes(shards: ShardStatusSource) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({ shards: shards.statuses() });
  });

  app.get('/:id', (c) => {
    const id = ShardIdSchema.safeParse(c.req.param('id'));
    if (!id.success) {
      throw new HTTPException(400, { message: `Invalid shard id: ${c.req.param('id')}` });
    }
    const status = shards.statuses().find((entry) => entry.id === id.data);
    if (!status) {
      throw new HTTPException(404, { message: `Shard ${id.data} is not running in this process` });
    }
    return c.json(status);
  });

  return app;
}
