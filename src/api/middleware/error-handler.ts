/**
 * Global error handler for the status API.
 * Converts errors thrown by route handlers into `{ error: { message, code } }`
 * JSON responses.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../shared/logger.js';
import { ConfigError } from '../../shared/errors.js';

/**
 * Error mapping:
 * - HTTPException -> its own status and message
 * - ConfigError -> 500 (no internal details exposed)
 * - Unknown -> 500 (generic server error)
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return c.json({ error: { message: err.message, code: err.status } }, err.status);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json({ error: { message: 'Internal configuration error', code: 500 } }, 500);
  }

  // Unknown error -- log full details but return generic message
  logger.error({ err }, 'Unhandled error');
  return c.json({ error: { message: 'Internal server error', code: 500 } }, 500);
};
