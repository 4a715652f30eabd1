import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  GatewayError,
  GatewayProtocolError,
  GatewayServerClosedConnectionError,
  GatewayTransportError,
  HttpResponseError,
  HttpTransportError,
  RateLimitTooLongError,
  RateLimiterClosedError,
  RouteCompileError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('gateway errors', () => {
  it('share the GatewayError base', () => {
    expect(new GatewayTransportError('down')).toBeInstanceOf(GatewayError);
    expect(new GatewayProtocolError('bad frame')).toBeInstanceOf(GatewayError);
    expect(new GatewayServerClosedConnectionError(4004, '', false, true)).toBeInstanceOf(GatewayError);
  });

  it('keeps the transport cause', () => {
    const cause = new Error('ECONNRESET');
    const err = new GatewayTransportError('Socket failed', cause);
    expect(err.name).toBe('GatewayTransportError');
    expect(err.cause).toBe(cause);
  });

  it('describes a server close with its reason', () => {
    const err = new GatewayServerClosedConnectionError(4004, 'Authentication failed.', false, true);
    expect(err.name).toBe('GatewayServerClosedConnectionError');
    expect(err.message).toBe('Gateway closed the connection with code 4004 (Authentication failed.)');
    expect(err.code).toBe(4004);
    expect(err.canResume).toBe(false);
    expect(err.isFatal).toBe(true);
  });

  it('leaves out an empty close reason', () => {
    const err = new GatewayServerClosedConnectionError(4009, '', true, false);
    expect(err.message).toBe('Gateway closed the connection with code 4009');
  });
});

describe('rate limit errors', () => {
  it('names the closed limiter', () => {
    const err = new RateLimiterClosedError('global');
    expect(err.name).toBe('RateLimiterClosedError');
    expect(err.message).toBe('Rate limiter "global" was closed while waiting');
    expect(err.limiter).toBe('global');
  });

  it('reports the wait and the maximum', () => {
    const err = new RateLimitTooLongError('GET /channels/1', 5000, 1000);
    expect(err.message).toBe(
      'Route GET /channels/1 is rate limited for 5000ms, above the maximum of 1000ms',
    );
    expect(err.retryAfterMs).toBe(5000);
    expect(err.maxRateLimitMs).toBe(1000);
  });
});

describe('REST errors', () => {
  it('names the missing route parameter', () => {
    const err = new RouteCompileError('/channels/{channel}', 'channel');
    expect(err.message).toBe('Missing value for "{channel}" in route /channels/{channel}');
    expect(err.param).toBe('channel');
  });

  it('wraps a fetch failure', () => {
    const err = new HttpTransportError('GET /gateway/bot', new TypeError('fetch failed'));
    expect(err.message).toBe('Request to GET /gateway/bot failed: fetch failed');
    expect(err.cause).toBeInstanceOf(TypeError);
  });

  it('keeps the status and body of a failed response', () => {
    const err = new HttpResponseError('GET /guilds/1', 403, '{"code":50001}');
    expect(err.message).toBe('GET /guilds/1 returned 403');
    expect(err.status).toBe(403);
    expect(err.body).toBe('{"code":50001}');
  });
});
