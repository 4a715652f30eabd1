/**
 * Rate-limit primitives.
 * A ManualRateLimiter is a gate someone else opens and closes (the global
 * REST gate); a WindowedBurstRateLimiter lets `limit` callers through per
 * window and queues the rest (REST buckets, outbound gateway commands).
 * Both release strictly in arrival order and only ever delay; cancellation
 * goes through an AbortSignal on acquire().
 */

import { RateLimiterClosedError } from '../shared/errors.js';
import { abortError, monotonicNow, sleep } from '../shared/sleep.js';

/** A queued acquire() call. `owner` changes when waiters are handed to another limiter. */
export interface Waiter {
  owner: BaseRateLimiter;
  resolve: () => void;
  reject: (err: Error) => void;
}

/** Shared FIFO queue handling for both limiter kinds. */
export abstract class BaseRateLimiter {
  readonly name: string;
  protected queue: Waiter[] = [];
  protected closed = false;

  constructor(name: string) {
    this.name = name;
  }

  /** Wait until this caller may proceed. */
  abstract acquire(signal?: AbortSignal): Promise<void>;

  /** Number of callers currently waiting. */
  get queueSize(): number {
    return this.queue.length;
  }

  /** True when nobody is waiting. */
  get isEmpty(): boolean {
    return this.queue.length === 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Reject every waiting caller and refuse new ones.
   * Subclasses stop their timers first and then call this.
   */
  close(): void {
    this.closed = true;
    const pending = this.queue;
    this.queue = [];
    for (const waiter of pending) {
      waiter.reject(new RateLimiterClosedError(this.name));
    }
  }

  /** Remove all waiters, in order, so another limiter can adopt them. */
  takeWaiters(): Waiter[] {
    const taken = this.queue;
    this.queue = [];
    return taken;
  }

  /** Append waiters taken from another limiter behind the current queue. */
  adoptWaiters(waiters: Waiter[]): void {
    for (const waiter of waiters) {
      waiter.owner = this;
      this.queue.push(waiter);
    }
  }

  protected enqueue(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed) {
        reject(new RateLimiterClosedError(this.name));
        return;
      }
      if (signal?.aborted) {
        reject(abortError(signal));
        return;
      }

      const onAbort = (): void => {
        const owner = waiter.owner;
        const index = owner.queue.indexOf(waiter);
        if (index !== -1) {
          owner.queue.splice(index, 1);
        }
        reject(signal ? abortError(signal) : new Error('The operation was aborted'));
      };

      const waiter: Waiter = {
        owner: this,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /** Release the head of the queue. Returns false when the queue was empty. */
  protected releaseNext(): boolean {
    const waiter = this.queue.shift();
    if (waiter === undefined) {
      return false;
    }
    waiter.resolve();
    return true;
  }
}

/**
 * Gate that is open until `throttle()` closes it for a fixed cooldown.
 * Only one cooldown timer ever exists.
 */
export class ManualRateLimiter extends BaseRateLimiter {
  private timer: NodeJS.Timeout | undefined;
  private unlockAt = 0;

  constructor(name = 'global') {
    super(name);
  }

  /** True while a cooldown is pending. */
  get isThrottling(): boolean {
    return this.timer !== undefined;
  }

  /** Milliseconds until the gate reopens, 0 when open. */
  remainingMs(now: number = monotonicNow()): number {
    return this.timer === undefined ? 0 : Math.max(0, this.unlockAt - now);
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new RateLimiterClosedError(this.name));
    }
    if (this.timer === undefined) {
      return Promise.resolve();
    }
    return this.enqueue(signal);
  }

  /**
   * Close the gate for `retryAfterMs`.
   * While already throttled the deadline only moves later, never earlier.
   */
  throttle(retryAfterMs: number): void {
    if (this.closed) {
      return;
    }

    const unlockAt = monotonicNow() + Math.max(0, retryAfterMs);
    if (this.timer !== undefined) {
      if (unlockAt <= this.unlockAt) {
        return;
      }
      clearTimeout(this.timer);
    }

    this.unlockAt = unlockAt;
    this.timer = setTimeout(() => this.unlock(), unlockAt - monotonicNow());
  }

  override close(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    super.close();
  }

  private unlock(): void {
    this.timer = undefined;
    this.unlockAt = 0;
    while (this.releaseNext()) {
      // drain
    }
  }
}

/**
 * Fixed-window limiter: `limit` callers per `periodMs`.
 * Callers beyond capacity queue up; a single throttle task sleeps until the
 * window resets, refills to `limit` and releases them in order.
 */
export class WindowedBurstRateLimiter extends BaseRateLimiter {
  /** Calls left in the current window. */
  remaining: number;
  /** Capacity of one window. */
  limit: number;
  periodMs: number;
  /** Monotonic ms (see monotonicNow) at which the current window ends. 0 means no window has started. */
  resetAt = 0;

  private throttling = false;
  private throttleTask: Promise<void> | undefined;
  private wakeController: AbortController | undefined;

  constructor(name: string, periodMs: number, limit: number) {
    super(name);
    this.periodMs = periodMs;
    this.limit = limit;
    this.remaining = limit;
  }

  /** True while the throttle task is sleeping or draining the queue. */
  get isThrottling(): boolean {
    return this.throttling;
  }

  /**
   * Whether the current window is used up.
   * An expired window is refilled to `limit` (never more) as a side effect.
   */
  isRateLimited(now: number = monotonicNow()): boolean {
    if (this.resetAt <= now) {
      this.remaining = this.limit;
      this.resetAt = now + this.periodMs;
      return this.remaining <= 0;
    }
    return this.remaining <= 0;
  }

  /** Milliseconds until the current window ends. */
  timeUntilReset(now: number = monotonicNow()): number {
    return Math.max(0, this.resetAt - now);
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new RateLimiterClosedError(this.name));
    }

    if (!this.throttling && this.queue.length === 0 && !this.isRateLimited()) {
      this.drip();
      return Promise.resolve();
    }

    const acquired = this.enqueue(signal);
    this.ensureThrottle();
    return acquired;
  }

  /**
   * Recalibrate from an authoritative source (response headers).
   * A sleeping throttle is woken so queued callers see the new window at once.
   */
  update(remaining: number, limit: number, resetAt: number, now: number = monotonicNow()): void {
    this.remaining = remaining;
    this.limit = limit;
    this.resetAt = resetAt;
    this.periodMs = Math.max(0, resetAt - now);
    this.wake();
  }

  /**
   * The window ran out earlier than tracked: zero `remaining` and keep
   * everyone waiting until at least `now + retryAfterMs`.
   */
  markExhausted(retryAfterMs: number, now: number = monotonicNow()): void {
    const until = now + Math.max(0, retryAfterMs);
    this.remaining = 0;
    this.resetAt = Number.isFinite(this.resetAt) ? Math.max(this.resetAt, until) : until;
    this.wake();
  }

  override adoptWaiters(waiters: Waiter[]): void {
    super.adoptWaiters(waiters);
    if (this.queue.length > 0) {
      this.ensureThrottle();
    }
  }

  /** Consume one unit of the current window. */
  protected drip(): void {
    this.remaining -= 1;
  }

  /** Interrupt a sleeping throttle so it re-reads `remaining` and `resetAt`. */
  protected wake(): void {
    this.wakeController?.abort();
  }

  /** Resolves once the throttle task (if any) has finished. */
  async idle(): Promise<void> {
    await this.throttleTask;
  }

  override close(): void {
    super.close();
    this.wake();
  }

  protected ensureThrottle(): void {
    if (this.throttling || this.closed) {
      return;
    }
    this.throttling = true;
    this.throttleTask = this.throttle();
  }

  private async throttle(): Promise<void> {
    try {
      while (this.queue.length > 0 && !this.closed) {
        if (this.isRateLimited(monotonicNow())) {
          await this.sleepUntilReset();
          continue;
        }
        this.drip();
        this.releaseNext();
      }
    } finally {
      this.throttling = false;
    }
  }

  private async sleepUntilReset(): Promise<void> {
    const controller = new AbortController();
    this.wakeController = controller;
    try {
      const delay = this.resetAt - monotonicNow();
      if (Number.isFinite(delay)) {
        await sleep(delay, controller.signal);
      } else {
        // No known reset: wait until an update or close wakes us.
        await new Promise<void>((resolve) => {
          controller.signal.addEventListener('abort', () => resolve(), { once: true });
        });
      }
    } finally {
      if (this.wakeController === controller) {
        this.wakeController = undefined;
      }
    }
  }
}
