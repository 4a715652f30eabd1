/**
 * REST client.
 * Every request goes through the RestBucketManager: acquire a lease, send
 * with fetch, feed the rate limit headers back, release. A 429 throttles
 * the bucket (or the global gate) and the request is retried.
 */

import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { HttpResponseError, HttpTransportError, RateLimitTooLongError } from '../shared/errors.js';
import type { RestBucketManager } from '../ratelimit/buckets.js';
import { GatewayBotSchema, type GatewayBot } from '../gateway/types.js';
import { parseRateLimitHeaders, parseTooManyRequests, type TooManyRequests } from './headers.js';
import { GET_GATEWAY_BOT, type CompiledRoute, type Route, type RouteParams } from './routes.js';

export interface RestClientOptions {
  token: string;
  baseUrl: string;
  buckets: RestBucketManager;
  /** Attempts per request when the server keeps answering 429. Default 5. */
  maxRetries?: number;
  /** Per-attempt timeout. Default 30000. */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export interface RequestOptions {
  params?: RouteParams;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Sent as X-Audit-Log-Reason. */
  reason?: string;
  signal?: AbortSignal;
}

export class RestClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly buckets: RestBucketManager;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly log: Logger;

  constructor(options: RestClientOptions) {
    this.token = options.token;
    this.baseUrl = options.baseUrl;
    this.buckets = options.buckets;
    this.maxRetries = options.maxRetries ?? 5;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.userAgent = options.userAgent ?? 'shardwire (0.1.0)';
    this.log = (options.logger ?? rootLogger).child({ component: 'rest' });
  }

  /**
   * Send a request and return the decoded JSON body, or undefined for 204.
   * @throws RateLimitTooLongError when a 429 asks for a wait above the bucket manager's maximum
   * @throws HttpResponseError for other non-2xx responses, a body that is not JSON, or when retries run out
   * @throws HttpTransportError when fetch itself fails
   */
  async request(route: Route, options: RequestOptions = {}): Promise<unknown> {
    const compiled = route.compile(options.params);
    const url = this.buildUrl(compiled, options.query);

    for (let attempt = 1; ; attempt++) {
      const lease = await this.buckets.acquire(compiled, options.signal);
      let response: Response;
      let text: string;
      let tooMany: TooManyRequests | undefined;
      try {
        const started = performance.now();
        response = await this.send(compiled, url, options);
        text = await response.text();
        this.log.debug(
          {
            route: compiled.toString(),
            status: response.status,
            attempt,
            latencyMs: Math.round(performance.now() - started),
          },
          'REST response',
        );

        const rateLimit = parseRateLimitHeaders(response.headers);
        if (rateLimit !== null) {
          this.buckets.updateRateLimits(
            compiled,
            rateLimit.bucket,
            rateLimit.remaining,
            rateLimit.limit,
            rateLimit.resetAfterMs,
          );
        }
        if (response.status === 429) {
          tooMany = parseTooManyRequests(response.headers, text);
          this.applyTooManyRequests(compiled, tooMany);
        }
      } finally {
        // Released after any 429 is applied, so a placeholder that was limited stays closed.
        lease.release(tooMany !== undefined);
      }

      if (tooMany !== undefined) {
        if (tooMany.retryAfterMs > this.buckets.maxRateLimitMs) {
          throw new RateLimitTooLongError(
            compiled.toString(),
            tooMany.retryAfterMs,
            this.buckets.maxRateLimitMs,
          );
        }
        if (attempt >= this.maxRetries) {
          throw new HttpResponseError(compiled.toString(), 429, text);
        }
        this.log.warn(
          { route: compiled.toString(), retryAfterMs: tooMany.retryAfterMs, global: tooMany.global, attempt },
          'Rate limited, retrying',
        );
        continue;
      }

      if (!response.ok) {
        this.log.error({ route: compiled.toString(), status: response.status }, 'REST request failed');
        throw new HttpResponseError(compiled.toString(), response.status, text);
      }

      if (response.status === 204 || text === '') {
        return undefined;
      }
      try {
        return JSON.parse(text);
      } catch {
        this.log.error({ route: compiled.toString(), status: response.status }, 'REST response is not JSON');
        throw new HttpResponseError(compiled.toString(), response.status, text);
      }
    }
  }

  /** `GET /gateway/bot`: gateway URL, recommended shard count and session start limits. */
  async fetchGatewayBot(): Promise<GatewayBot> {
    const body = await this.request(GET_GATEWAY_BOT);
    const parsed = GatewayBotSchema.safeParse(body);
    if (!parsed.success) {
      throw new HttpResponseError(GET_GATEWAY_BOT.compile().toString(), 200, JSON.stringify(body));
    }
    return parsed.data;
  }

  private applyTooManyRequests(route: CompiledRoute, tooMany: TooManyRequests): void {
    if (tooMany.global) {
      this.buckets.throttleGlobal(tooMany.retryAfterMs);
    } else {
      this.buckets.markRateLimited(route, tooMany.retryAfterMs);
    }
  }

  private buildUrl(route: CompiledRoute, query: RequestOptions['query']): string {
    const url = new URL(route.createUrl(this.baseUrl));
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(route: CompiledRoute, url: string, options: RequestOptions): Promise<Response> {
    const headers: Record<string, string> = {
      'Authorization': `Bot ${this.token}`,
      'User-Agent': this.userAgent,
      'Accept': 'application/json',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (options.reason !== undefined) {
      headers['X-Audit-Log-Reason'] = encodeURIComponent(options.reason);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    try {
      return await fetch(url, {
        method: route.method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal,
      });
    } catch (err) {
      this.log.warn({ route: route.toString(), err }, 'REST transport failure');
      throw new HttpTransportError(route.toString(), err);
    }
  }
}
