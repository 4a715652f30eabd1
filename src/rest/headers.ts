/**
 * Rate limit header and 429 body parsing.
 * Wire values are in seconds; everything returned here is in milliseconds.
 */

import { z } from 'zod';

export interface RateLimitHeaders {
  bucket: string;
  remaining: number;
  limit: number;
  resetAfterMs: number;
  global: boolean;
}

/** Body of a 429 response. */
export const TooManyRequestsSchema = z.object({
  retry_after: z.number().nonnegative(),
  global: z.boolean().default(false),
  message: z.string().optional(),
});

export interface TooManyRequests {
  retryAfterMs: number;
  global: boolean;
}

function readNumber(headers: Headers, name: string, fallback: number): number {
  const value = headers.get(name);
  if (value === null) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Read the X-RateLimit-* headers of a response.
 * Returns null when the response carries no bucket, in which case the
 * route stays on its placeholder.
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitHeaders | null {
  const bucket = headers.get('x-ratelimit-bucket');
  if (bucket === null || bucket === '') {
    return null;
  }
  return {
    bucket,
    remaining: Math.trunc(readNumber(headers, 'x-ratelimit-remaining', 1)),
    limit: Math.trunc(readNumber(headers, 'x-ratelimit-limit', 1)),
    resetAfterMs: Math.max(0, readNumber(headers, 'x-ratelimit-reset-after', 0) * 1000),
    global: headers.get('x-ratelimit-global') === 'true',
  };
}

/**
 * Interpret a 429. The JSON body wins; without one the Retry-After header
 * (seconds) is used, and the global flag comes from X-RateLimit-Global.
 */
export function parseTooManyRequests(headers: Headers, body: string): TooManyRequests {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    raw = undefined;
  }

  const parsed = TooManyRequestsSchema.safeParse(raw);
  if (parsed.success) {
    return {
      retryAfterMs: parsed.data.retry_after * 1000,
      global: parsed.data.global || headers.get('x-ratelimit-global') === 'true',
    };
  }
  return {
    retryAfterMs: Math.max(0, readNumber(headers, 'retry-after', 1) * 1000),
    global: headers.get('x-ratelimit-global') === 'true',
  };
}
