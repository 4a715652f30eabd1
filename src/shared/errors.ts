/**
 * Custom error classes for shardwire.
 * Protocol signals (zombie, reconnect, invalid session) are not errors; they
 * travel as ConnectionOutcome values. Everything here is either fatal or a
 * caller programming mistake.
 */

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Base class for gateway failures that escape the supervisor. */
export class GatewayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

/** The WebSocket could not be opened or failed at the socket level. */
export class GatewayTransportError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GatewayTransportError';
  }
}

/** The server sent something the protocol does not allow at this point. */
export class GatewayProtocolError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayProtocolError';
  }
}

/** The server closed the connection with a code that stops the shard. */
export class GatewayServerClosedConnectionError extends GatewayError {
  public readonly code: number;
  public readonly reason: string;
  public readonly canResume: boolean;
  public readonly isFatal: boolean;

  constructor(code: number, reason: string, canResume: boolean, isFatal: boolean) {
    super(`Gateway closed the connection with code ${code}${reason ? ` (${reason})` : ''}`);
    this.name = 'GatewayServerClosedConnectionError';
    this.code = code;
    this.reason = reason;
    this.canResume = canResume;
    this.isFatal = isFatal;
  }
}

/** Pending acquire() rejected because its limiter was closed. */
export class RateLimiterClosedError extends Error {
  public readonly limiter: string;

  constructor(limiter: string) {
    super(`Rate limiter "${limiter}" was closed while waiting`);
    this.name = 'RateLimiterClosedError';
    this.limiter = limiter;
  }
}

/** A route is limited for longer than the caller is willing to wait. */
export class RateLimitTooLongError extends Error {
  public readonly route: string;
  public readonly retryAfterMs: number;
  public readonly maxRateLimitMs: number;

  constructor(route: string, retryAfterMs: number, maxRateLimitMs: number) {
    super(
      `Route ${route} is rate limited for ${retryAfterMs}ms, above the maximum of ${maxRateLimitMs}ms`,
    );
    this.name = 'RateLimitTooLongError';
    this.route = route;
    this.retryAfterMs = retryAfterMs;
    this.maxRateLimitMs = maxRateLimitMs;
  }
}

/** A route template was compiled without a value for one of its placeholders. */
export class RouteCompileError extends Error {
  public readonly template: string;
  public readonly param: string;

  constructor(template: string, param: string) {
    super(`Missing value for "{${param}}" in route ${template}`);
    this.name = 'RouteCompileError';
    this.template = template;
    this.param = param;
  }
}

/** fetch() itself failed (DNS, connection reset, abort). */
export class HttpTransportError extends Error {
  public readonly route: string;

  constructor(route: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${route} failed: ${detail}`, { cause });
    this.name = 'HttpTransportError';
    this.route = route;
  }
}

/** Non-2xx response that is not a handled 429. */
export class HttpResponseError extends Error {
  public readonly route: string;
  public readonly status: number;
  public readonly body: string;

  constructor(route: string, status: number, body: string) {
    super(`${route} returned ${status}`);
    this.name = 'HttpResponseError';
    this.route = route;
    this.status = status;
    this.body = body;
  }
}
