import { describe, it, expect } from 'vitest';
import { parseRateLimitHeaders, parseTooManyRequests } from '../headers.js';

describe('parseRateLimitHeaders', () => {
  it('should convert the reset window to milliseconds', () => {
    const headers = new Headers({
      'X-RateLimit-Bucket': 'abcd1234',
      'X-RateLimit-Remaining': '4',
      'X-RateLimit-Limit': '5',
      'X-RateLimit-Reset-After': '1.25',
    });

    expect(parseRateLimitHeaders(headers)).toEqual({
      bucket: 'abcd1234',
      remaining: 4,
      limit: 5,
      resetAfterMs: 1250,
      global: false,
    });
  });

  it('should return null without a bucket header', () => {
    expect(parseRateLimitHeaders(new Headers({ 'X-RateLimit-Remaining': '4' }))).toBeNull();
  });

  it('should fall back to defaults for missing or malformed values', () => {
    const headers = new Headers({
      'X-RateLimit-Bucket': 'abcd1234',
      'X-RateLimit-Remaining': 'lots',
    });

    expect(parseRateLimitHeaders(headers)).toEqual({
      bucket: 'abcd1234',
      remaining: 1,
      limit: 1,
      resetAfterMs: 0,
      global: false,
    });
  });
});

describe('parseTooManyRequests', () => {
  it('should read retry_after and the global flag from the body', () => {
    const body = JSON.stringify({ message: 'You are being rate limited.', retry_after: 0.5, global: true });

    expect(parseTooManyRequests(new Headers(), body)).toEqual({ retryAfterMs: 500, global: true });
  });

  it('should default global to false', () => {
    expect(parseTooManyRequests(new Headers(), '{"retry_after":2}')).toEqual({
      retryAfterMs: 2000,
      global: false,
    });
  });

  it('should fall back to the Retry-After header when the body is not JSON', () => {
    const headers = new Headers({ 'Retry-After': '3', 'X-RateLimit-Global': 'true' });

    expect(parseTooManyRequests(headers, '<html>slow down</html>')).toEqual({
      retryAfterMs: 3000,
      global: true,
    });
  });
});
