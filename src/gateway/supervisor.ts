/**
 * Keep-alive loop for one shard.
 * Builds a fresh GatewayShardConnection per attempt, decides from each
 * ConnectionOutcome whether to resume, identify again, back off or stop,
 * and owns the session that survives between attempts.
 */

import { logger as rootLogger, shardLogger, type Logger } from '../shared/logger.js';
import { GatewayServerClosedConnectionError, GatewayTransportError } from '../shared/errors.js';
import { monotonicNow, sleep } from '../shared/sleep.js';
import { ExponentialBackoff, type BackoffOptions } from '../ratelimit/backoff.js';
import {
  GatewayShardConnection,
  ShardState,
  emptySession,
  type ConnectionOutcome,
  type ShardConnectionOptions,
  type ShardSession,
} from './shard.js';
import type { Presence, RequestGuildMembers, VoiceStateUpdate } from './types.js';

/** Persists resume state so a restarted process can RESUME instead of IDENTIFY. */
export interface SessionStore {
  load(shardId: number): ShardSession | null;
  save(shardId: number, session: ShardSession): void;
  delete(shardId: number): void;
}

export interface ShardSupervisorOptions
  extends Omit<ShardConnectionOptions, 'session' | 'onReady' | 'onStateChange'> {
  backoff?: BackoffOptions;
  /** Attempts restarted within this window are backed off. Default 30000. */
  restartWindowMs?: number;
  /** Pause after RECONNECT or INVALID_SESSION. Default 5000. */
  reconnectDelayMs?: number;
  sessionStore?: SessionStore;
}

export interface ShardStatus {
  id: number;
  count: number;
  state: ShardState;
  sessionId: string | null;
  seq: number | null;
  heartbeatLatencyMs: number | null;
  reconnectCount: number;
  disconnectCount: number;
}

export class ShardSupervisor {
  readonly id: number;
  readonly count: number;
  readonly session: ShardSession;

  reconnectCount = 0;
  disconnectCount = 0;

  private readonly connectionOptions: Omit<ShardConnectionOptions, 'session'>;
  private readonly sessionStore: SessionStore | undefined;
  private readonly log: Logger;
  private readonly backoff: ExponentialBackoff;
  private readonly restartWindowMs: number;
  private readonly reconnectDelayMs: number;
  private readonly stopSleep = new AbortController();

  private connection: GatewayShardConnection | undefined;
  private presence: Presence | undefined;
  private task: Promise<void> | undefined;
  private done: Promise<void> | undefined;
  private fatalError: unknown;
  private closing: Promise<void> | undefined;
  private closeRequested = false;
  private markReady: (() => void) | undefined;
  private _state = ShardState.NOT_RUNNING;

  constructor(options: ShardSupervisorOptions) {
    const { backoff, restartWindowMs, reconnectDelayMs, sessionStore, ...connectionOptions } = options;
    this.connectionOptions = connectionOptions;
    this.sessionStore = sessionStore;
    this.id = options.shardId;
    this.count = options.shardCount;
    this.log = shardLogger(options.shardId, options.logger ?? rootLogger);
    this.backoff = new ExponentialBackoff(backoff);
    this.restartWindowMs = restartWindowMs ?? 30_000;
    this.reconnectDelayMs = reconnectDelayMs ?? 5000;
    this.presence = options.presence;
    this.session = emptySession();
  }

  get state(): ShardState {
    return this._state;
  }

  get heartbeatLatencyMs(): number | null {
    return this.connection?.heartbeatLatencyMs ?? null;
  }

  get isStarted(): boolean {
    return this.task !== undefined;
  }

  status(): ShardStatus {
    return {
      id: this.id,
      count: this.count,
      state: this._state,
      sessionId: this.session.sessionId,
      seq: this.session.seq,
      heartbeatLatencyMs: this.heartbeatLatencyMs,
      reconnectCount: this.reconnectCount,
      disconnectCount: this.disconnectCount,
    };
  }

  /**
   * Start the keep-alive loop and wait until the shard is READY (or
   * RESUMED), or until the loop ends first.
   * @throws GatewayServerClosedConnectionError and any other fatal error raised before readiness
   */
  async start(): Promise<void> {
    if (this.task !== undefined) {
      throw new Error(`Shard ${this.id} has already been started`);
    }

    const stored = this.sessionStore?.load(this.id);
    if (stored) {
      Object.assign(this.session, stored);
      this.log.info({ sessionId: stored.sessionId, seq: stored.seq }, 'Loaded stored session');
    }

    const ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
    const task = this.keepAlive();
    this.task = task;
    this.done = task.then(
      () => undefined,
      (err: unknown) => {
        this.fatalError = err;
        this.log.error({ err }, `Shard ${this.id} stopped with a fatal error`);
      },
    );

    await Promise.race([task, ready]);
  }

  /**
   * Wait for the keep-alive loop to finish.
   * @throws the fatal error that stopped the shard, if any
   */
  async join(): Promise<void> {
    if (this.done === undefined) {
      throw new Error(`Shard ${this.id} has not been started`);
    }
    await this.done;
    if (this.fatalError !== undefined) {
      throw this.fatalError;
    }
  }

  /** Request shutdown and wait for the loop to end. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  async updatePresence(presence: Presence): Promise<void> {
    this.presence = presence;
    if (this.connection !== undefined && this._state === ShardState.READY) {
      await this.connection.updatePresence(presence);
    }
  }

  async updateVoiceState(update: VoiceStateUpdate): Promise<void> {
    await this.requireReady().updateVoiceState(update);
  }

  async requestGuildMembers(request: RequestGuildMembers): Promise<void> {
    await this.requireReady().requestGuildMembers(request);
  }

  private requireReady(): GatewayShardConnection {
    if (this.connection === undefined || this._state !== ShardState.READY) {
      throw new GatewayTransportError(`Shard ${this.id} is not ready`);
    }
    return this.connection;
  }

  private async shutdown(): Promise<void> {
    this.closeRequested = true;
    this.log.debug('Stopping shard');
    this.stopSleep.abort();
    if (this.connection !== undefined) {
      await this.connection.close();
    }
    if (this.done !== undefined) {
      await this.done;
    }
    this.setState(ShardState.STOPPED);
  }

  private async keepAlive(): Promise<void> {
    let lastStartedAt: number | null = null;
    let skipBackoff = true;

    while (!this.closeRequested) {
      const now = monotonicNow();
      if (!skipBackoff && lastStartedAt !== null && now - lastStartedAt < this.restartWindowMs) {
        const delayMs = Math.round(this.backoff.next());
        this.log.info({ delayMs }, `Restarted within ${this.restartWindowMs}ms, backing off`);
        await sleep(delayMs, this.stopSleep.signal);
        if (this.closeRequested) {
          break;
        }
      } else {
        this.backoff.reset();
      }

      if (lastStartedAt !== null) {
        this.reconnectCount += 1;
      }
      lastStartedAt = monotonicNow();
      skipBackoff = false;

      const outcome = await this.runAttempt();
      this.persistSession();

      switch (outcome.kind) {
        case 'transport-error':
          this.log.error({ err: outcome.error }, 'Failed to connect to the gateway, will retry');
          break;
        case 'zombie':
          this.log.warn('Connection became a zombie, restarting');
          break;
        case 'invalid-session':
          if (outcome.resumable) {
            this.log.warn('Invalid session, will attempt to resume');
          } else {
            this.log.warn('Invalid session, will identify again');
            this.clearSession();
          }
          skipBackoff = true;
          await sleep(this.reconnectDelayMs, this.stopSleep.signal);
          break;
        case 'reconnect':
          this.log.warn('Gateway asked for a reconnect');
          skipBackoff = true;
          await sleep(this.reconnectDelayMs, this.stopSleep.signal);
          break;
        case 'server-closed':
          if (outcome.fatal) {
            this.setState(ShardState.STOPPED);
            throw new GatewayServerClosedConnectionError(
              outcome.code,
              outcome.reason,
              outcome.resumable,
              true,
            );
          }
          if (!outcome.resumable) {
            this.clearSession();
          }
          this.log.warn({ code: outcome.code }, 'Disconnected by the gateway, will reconnect');
          break;
        case 'client-closed':
          this.log.info('Shard shut down');
          return;
      }
    }
  }

  private async runAttempt(): Promise<ConnectionOutcome> {
    const connection = new GatewayShardConnection({
      ...this.connectionOptions,
      presence: this.presence,
      logger: this.log,
      session: this.session,
      onReady: () => {
        this.persistSession();
        this.markReady?.();
      },
      onStateChange: (state) => this.setState(state),
    });
    this.connection = connection;

    try {
      return await connection.run();
    } finally {
      if (connection.heartbeatIntervalMs !== null) {
        this.disconnectCount += 1;
      }
    }
  }

  private clearSession(): void {
    this.session.seq = null;
    this.session.sessionId = null;
    this.session.resumeUrl = null;
    this.sessionStore?.delete(this.id);
  }

  private persistSession(): void {
    if (this.sessionStore !== undefined && this.session.sessionId !== null) {
      this.sessionStore.save(this.id, this.session);
    }
  }

  private setState(state: ShardState): void {
    this._state = state;
  }
}
