/**
 * REST bucket manager.
 * Maps every compiled route to the bucket that currently governs it,
 * discovers bucket identity lazily from response headers, and hands queued
 * callers over when a placeholder bucket turns out to be a real one.
 * One manager is shared by every REST call site of a client; it is never a
 * module-level singleton.
 */

import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { RateLimitTooLongError } from '../shared/errors.js';
import { monotonicNow } from '../shared/sleep.js';
import { ManualRateLimiter, WindowedBurstRateLimiter } from './limiters.js';
import type { CompiledRoute } from '../rest/routes.js';

/** Prefix of placeholder buckets whose real hash is not known yet. */
export const UNKNOWN_HASH = 'UNKNOWN';

/** Placeholder key, unique per compiled route so unrelated unknown routes never share a quota. */
export function unknownBucketHash(route: CompiledRoute): string {
  return `${UNKNOWN_HASH};${route.method} ${route.compiledPath}`;
}

/**
 * Rate limit state for one real bucket hash, or a placeholder for one
 * compiled route until the server reveals its bucket.
 *
 * A placeholder lets a single discovery request through and parks everyone
 * else. When that request comes back without rate limit headers the
 * placeholder is opened and stops limiting altogether; when it was rejected
 * by a global 429 the next queued caller becomes the discovery request.
 */
export class RestBucket extends WindowedBurstRateLimiter {
  readonly route: CompiledRoute;
  readonly isUnknown: boolean;
  /** Last time acquire() was called, for diagnostics. */
  lastUsedAt = 0;

  constructor(name: string, route: CompiledRoute) {
    const isUnknown = name.startsWith(UNKNOWN_HASH);
    // Real buckets start at one call per second until the first headers arrive.
    super(name, isUnknown ? Number.POSITIVE_INFINITY : 1000, 1);
    this.route = route;
    this.isUnknown = isUnknown;
    if (isUnknown) {
      this.resetAt = Number.POSITIVE_INFINITY;
    }
  }

  override acquire(signal?: AbortSignal): Promise<void> {
    this.lastUsedAt = monotonicNow();
    return super.acquire(signal);
  }

  /** Apply the values of one response's rate limit headers. */
  updateRateLimit(remaining: number, limit: number, resetAt: number): void {
    this.update(remaining, limit, resetAt);
  }

  /** Stop limiting and release everyone waiting. Used for placeholders only. */
  open(now: number = monotonicNow()): void {
    this.limit = Number.POSITIVE_INFINITY;
    this.remaining = Number.POSITIVE_INFINITY;
    // Zero-length windows keep resetAt trailing the clock, so GC can expire it.
    this.periodMs = 0;
    this.resetAt = now;
    this.wake();
  }

  /** Let exactly one more caller through as the discovery request. */
  rearmDiscovery(): void {
    this.remaining = 1;
    this.wake();
  }

  /** True when the placeholder is still waiting for its discovery response. */
  get isAwaitingDiscovery(): boolean {
    return this.isUnknown && this.resetAt === Number.POSITIVE_INFINITY && Number.isFinite(this.limit);
  }
}

/** Returned by acquire(); release it once the response has been processed. */
export interface BucketLease {
  readonly route: CompiledRoute;
  readonly bucket: string;
  /**
   * @param rateLimited - the response was a 429, so a placeholder must not
   * take the missing headers as proof that the route is unlimited
   */
  release(rateLimited?: boolean): void;
}

export interface BucketManagerOptions {
  /**
   * Longest wait acquire() accepts before throwing RateLimitTooLongError.
   * Unlimited when omitted.
   */
  maxRateLimitMs?: number;
  /** Proactive global budget in requests per second. Disabled when omitted. */
  globalRequestsPerSecond?: number;
  logger?: Logger;
}

export interface BucketStats {
  hash: string;
  route: string;
  unknown: boolean;
  remaining: number | null;
  limit: number | null;
  resetAfterMs: number | null;
  queued: number;
  throttling: boolean;
}

export interface BucketManagerStats {
  buckets: BucketStats[];
  routes: number;
  globalThrottleMs: number;
}

/** Coordinates every REST bucket and the global gate. */
export class RestBucketManager {
  /** Route template key → last known server bucket hash. Never shrinks. */
  readonly routesToHashes = new Map<string, string>();
  /** Real bucket hash (or placeholder key) → live bucket. */
  readonly buckets = new Map<string, RestBucket>();
  readonly globalGate = new ManualRateLimiter('global');
  readonly globalAllowance: WindowedBurstRateLimiter | undefined;
  readonly maxRateLimitMs: number;

  private readonly log: Logger;
  private gcTimer: NodeJS.Timeout | undefined;

  constructor(options: BucketManagerOptions = {}) {
    this.maxRateLimitMs = options.maxRateLimitMs ?? Number.POSITIVE_INFINITY;
    this.globalAllowance =
      options.globalRequestsPerSecond !== undefined
        ? new WindowedBurstRateLimiter('global-allowance', 1000, options.globalRequestsPerSecond)
        : undefined;
    this.log = (options.logger ?? rootLogger).child({ component: 'buckets' });
  }

  get isStarted(): boolean {
    return this.gcTimer !== undefined;
  }

  /**
   * Start the periodic garbage collector.
   * Calling it again while running does nothing.
   */
  start(pollPeriodMs = 20_000, expireAfterMs = 10_000): void {
    if (this.gcTimer !== undefined) {
      return;
    }
    this.gcTimer = setInterval(() => this.doGcPass(expireAfterMs), pollPeriodMs);
    this.gcTimer.unref();
    this.log.debug({ pollPeriodMs, expireAfterMs }, 'Bucket garbage collector started');
  }

  /** Stop GC and close every bucket, rejecting anyone still waiting. */
  close(): void {
    if (this.gcTimer !== undefined) {
      clearInterval(this.gcTimer);
      this.gcTimer = undefined;
    }
    for (const bucket of this.buckets.values()) {
      bucket.close();
    }
    this.buckets.clear();
    this.globalGate.close();
    this.globalAllowance?.close();
  }

  /**
   * Remove buckets that are idle: nobody waiting, no throttle running, and
   * their window ended more than `expireAfterMs` ago.
   */
  doGcPass(expireAfterMs: number, now: number = monotonicNow()): void {
    let purged = 0;
    let active = 0;

    for (const [hash, bucket] of this.buckets) {
      if (bucket.isEmpty && !bucket.isThrottling && bucket.resetAt + expireAfterMs < now) {
        bucket.close();
        this.buckets.delete(hash);
        purged += 1;
      } else if (bucket.resetAt >= now) {
        active += 1;
      }
    }

    this.log.trace(
      { purged, active, survival: this.buckets.size - active },
      'Bucket garbage collection pass',
    );
  }

  /** Bucket key that currently governs `route`. */
  resolveBucketHash(route: CompiledRoute): string {
    const bucketHash = this.routesToHashes.get(route.route.key);
    return bucketHash === undefined ? unknownBucketHash(route) : route.realBucketHash(bucketHash);
  }

  /**
   * Wait for permission to send a request on `route`.
   * Order: global gate, bucket, then the global gate again in case a global
   * 429 arrived while this caller sat in the bucket queue.
   * @throws RateLimitTooLongError when the bucket would hold the caller longer than maxRateLimitMs
   */
  async acquire(route: CompiledRoute, signal?: AbortSignal): Promise<BucketLease> {
    await this.acquireGlobal(signal);

    // Resolved after the global wait: the placeholder may have been replaced meanwhile.
    const hash = this.resolveBucketHash(route);
    let bucket = this.buckets.get(hash);
    if (bucket === undefined) {
      bucket = new RestBucket(hash, route);
      this.buckets.set(hash, bucket);
      this.log.debug({ route: route.toString(), bucket: hash }, 'Route mapped to new bucket');
    }

    const now = monotonicNow();
    const retryAfterMs = bucket.resetAt - now;
    if (!bucket.isUnknown && bucket.isRateLimited(now) && retryAfterMs > this.maxRateLimitMs) {
      throw new RateLimitTooLongError(route.toString(), retryAfterMs, this.maxRateLimitMs);
    }

    await bucket.acquire(signal);
    if (this.globalGate.isThrottling) {
      await this.globalGate.acquire(signal);
    }

    return this.createLease(route, bucket);
  }

  /**
   * Feed one response's rate limit headers back in.
   * Moves waiters off the placeholder when the real bucket becomes known.
   */
  updateRateLimits(
    route: CompiledRoute,
    bucketHash: string,
    remaining: number,
    limit: number,
    resetAfterMs: number,
    now: number = monotonicNow(),
  ): void {
    this.routesToHashes.set(route.route.key, bucketHash);
    const realHash = route.realBucketHash(bucketHash);
    const resetAt = now + resetAfterMs;

    let bucket = this.buckets.get(realHash);
    if (bucket === undefined) {
      bucket = new RestBucket(realHash, route);
      this.buckets.set(realHash, bucket);
      this.log.debug({ route: route.toString(), bucket: realHash }, 'Discovered bucket');
    }
    bucket.updateRateLimit(remaining, limit, resetAt);

    const placeholderHash = unknownBucketHash(route);
    const placeholder = this.buckets.get(placeholderHash);
    if (placeholder !== undefined && placeholder !== bucket) {
      this.buckets.delete(placeholderHash);
      const waiters = placeholder.takeWaiters();
      bucket.adoptWaiters(waiters);
      placeholder.close();
      if (waiters.length > 0) {
        this.log.debug(
          { from: placeholderHash, to: realHash, waiters: waiters.length },
          'Moved waiters to real bucket',
        );
      }
    }
  }

  /** A 429 with the global flag: hold every route for `retryAfterMs`. */
  throttleGlobal(retryAfterMs: number): void {
    const wasThrottling = this.globalGate.isThrottling;
    this.globalGate.throttle(retryAfterMs);
    if (!wasThrottling) {
      this.log.warn({ retryAfterMs }, 'Global rate limit hit');
    }
  }

  /** A 429 without the global flag: the route's bucket ran dry early. */
  markRateLimited(route: CompiledRoute, retryAfterMs: number): void {
    const bucket = this.buckets.get(this.resolveBucketHash(route));
    if (bucket === undefined) {
      return;
    }
    bucket.markExhausted(retryAfterMs);
    this.log.warn({ route: route.toString(), bucket: bucket.name, retryAfterMs }, 'Bucket rate limited');
  }

  getStats(now: number = monotonicNow()): BucketManagerStats {
    const buckets: BucketStats[] = [];
    for (const [hash, bucket] of this.buckets) {
      buckets.push({
        hash,
        route: bucket.route.toString(),
        unknown: bucket.isUnknown,
        remaining: Number.isFinite(bucket.remaining) ? bucket.remaining : null,
        limit: Number.isFinite(bucket.limit) ? bucket.limit : null,
        resetAfterMs: Number.isFinite(bucket.resetAt) ? bucket.timeUntilReset(now) : null,
        queued: bucket.queueSize,
        throttling: bucket.isThrottling,
      });
    }
    return {
      buckets,
      routes: this.routesToHashes.size,
      globalThrottleMs: this.globalGate.remainingMs(now),
    };
  }

  private async acquireGlobal(signal?: AbortSignal): Promise<void> {
    await this.globalGate.acquire(signal);
    if (this.globalAllowance !== undefined) {
      await this.globalAllowance.acquire(signal);
    }
  }

  private createLease(route: CompiledRoute, bucket: RestBucket): BucketLease {
    let released = false;
    return {
      route,
      bucket: bucket.name,
      release: (rateLimited = false) => {
        if (released) {
          return;
        }
        released = true;
        if (!bucket.isAwaitingDiscovery || this.buckets.get(bucket.name) !== bucket) {
          return;
        }
        if (rateLimited) {
          bucket.rearmDiscovery();
          this.log.debug({ bucket: bucket.name }, 'Discovery request was rate limited, next caller retries it');
        } else {
          // A discovery request that revealed nothing must not strand the queue behind it.
          bucket.open();
          this.log.debug({ bucket: bucket.name }, 'No bucket revealed, placeholder opened');
        }
      },
    };
  }
}
