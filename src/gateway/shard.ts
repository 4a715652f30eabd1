/**
 * One gateway connection attempt for one shard.
 * Opens the socket, performs HELLO then IDENTIFY or RESUME, runs the
 * heartbeat loop next to the poll loop, and reports how the attempt ended
 * as a ConnectionOutcome. A new GatewayShardConnection is built for every
 * attempt; session state lives in the ShardSession the supervisor owns.
 */

import { logger as rootLogger, shardLogger, type Logger } from '../shared/logger.js';
import { GatewayProtocolError, GatewayTransportError, RateLimiterClosedError } from '../shared/errors.js';
import { monotonicNow, sleep } from '../shared/sleep.js';
import { WindowedBurstRateLimiter } from '../ratelimit/limiters.js';
import { ZlibStreamInflater } from './inflater.js';
import { CloseCode, OpCode, canResumeAfterClose, closeCodeName, isFatalCloseCode } from './opcodes.js';
import {
  GatewayPayloadSchema,
  HelloSchema,
  InvalidSessionSchema,
  ReadySchema,
  type GatewayPayload,
  type IdentifyPayload,
  type IdentifyProperties,
  type Presence,
  type RawEventDispatcher,
  type RequestGuildMembers,
  type ResumePayload,
  type ShardInfo,
  type VoiceStateUpdate,
} from './types.js';
import type { GatewaySocket, GatewayTransport } from './transport.js';

export enum ShardState {
  NOT_RUNNING = 'NOT_RUNNING',
  CONNECTING = 'CONNECTING',
  WAITING_FOR_READY = 'WAITING_FOR_READY',
  READY = 'READY',
  RESUMING = 'RESUMING',
  STOPPING = 'STOPPING',
  STOPPED = 'STOPPED',
}

/** Resume state carried from one connection attempt to the next. */
export interface ShardSession {
  seq: number | null;
  sessionId: string | null;
  resumeUrl: string | null;
}

export function emptySession(): ShardSession {
  return { seq: null, sessionId: null, resumeUrl: null };
}

/** How a connection attempt ended. Errors that stop the shard are thrown instead. */
export type ConnectionOutcome =
  | { kind: 'transport-error'; error: Error }
  | { kind: 'zombie' }
  | { kind: 'invalid-session'; resumable: boolean }
  | { kind: 'reconnect' }
  | { kind: 'server-closed'; code: number; reason: string; resumable: boolean; fatal: boolean }
  | { kind: 'client-closed' };

export type Compression = 'zlib-stream' | 'none';

export interface ShardConnectionOptions {
  shardId: number;
  shardCount: number;
  token: string;
  /** Gateway URL without query string, e.g. wss://gateway.example.test */
  url: string;
  version: number;
  compression: Compression;
  intents: number;
  largeThreshold: number;
  presence?: Presence;
  properties?: IdentifyProperties;
  transport: GatewayTransport;
  session: ShardSession;
  dispatch: RawEventDispatcher;
  logger?: Logger;
  /** Called on READY and RESUMED. */
  onReady?: (event: 'READY' | 'RESUMED') => void;
  onStateChange?: (state: ShardState) => void;
  /** Outbound command budget. Default 120 per 60 seconds. */
  commandLimit?: { limit: number; periodMs: number };
}

export const DEFAULT_PROPERTIES: IdentifyProperties = {
  os: process.platform,
  browser: 'shardwire',
  device: 'shardwire',
};

type Received = { kind: 'payload'; payload: GatewayPayload } | { kind: 'end'; outcome: ConnectionOutcome };

export class GatewayShardConnection {
  private readonly options: ShardConnectionOptions;
  private readonly log: Logger;
  private readonly session: ShardSession;
  private readonly commandLimiter: WindowedBurstRateLimiter;
  private readonly loops = new AbortController();
  private readonly internalHandlers: ReadonlyMap<string, (data: unknown) => void>;

  private socket: GatewaySocket | undefined;
  private inflater: ZlibStreamInflater | undefined;
  private started = false;
  private closeRequested = false;
  private _state = ShardState.NOT_RUNNING;

  heartbeatIntervalMs: number | null = null;
  heartbeatLatencyMs: number | null = null;
  lastHeartbeatSentAt: number | null = null;
  lastMessageReceivedAt: number | null = null;

  constructor(options: ShardConnectionOptions) {
    this.options = options;
    this.session = options.session;
    this.log = options.logger ?? shardLogger(options.shardId, rootLogger);
    const budget = options.commandLimit ?? { limit: 120, periodMs: 60_000 };
    this.commandLimiter = new WindowedBurstRateLimiter(
      `shard-${options.shardId}-commands`,
      budget.periodMs,
      budget.limit,
    );
    this.internalHandlers = new Map<string, (data: unknown) => void>([
      ['READY', (data) => this.handleReady(data)],
      ['RESUMED', () => this.handleResumed()],
    ]);
  }

  get state(): ShardState {
    return this._state;
  }

  get info(): ShardInfo {
    return { id: this.options.shardId, count: this.options.shardCount };
  }

  /** True when this attempt will RESUME rather than IDENTIFY. */
  get willResume(): boolean {
    return this.session.sessionId !== null && this.session.seq !== null;
  }

  /** Full connection URL including version, encoding and compression. */
  buildUrl(): string {
    const base =
      this.willResume && this.session.resumeUrl !== null ? this.session.resumeUrl : this.options.url;
    const url = new URL(base);
    url.searchParams.set('v', String(this.options.version));
    url.searchParams.set('encoding', 'json');
    if (this.options.compression === 'zlib-stream') {
      url.searchParams.set('compress', 'zlib-stream');
    }
    return url.toString();
  }

  /**
   * Run the attempt to completion.
   * @throws GatewayProtocolError when the server breaks the protocol
   */
  async run(): Promise<ConnectionOutcome> {
    if (this.started) {
      throw new Error('A GatewayShardConnection can only run once');
    }
    this.started = true;
    this.setState(ShardState.CONNECTING);

    const url = this.buildUrl();
    this.log.debug({ url }, 'Connecting to gateway');

    let socket: GatewaySocket;
    try {
      socket = await this.options.transport.connect(url);
    } catch (err) {
      this.setState(ShardState.STOPPED);
      const error = err instanceof Error ? err : new Error(String(err));
      return { kind: 'transport-error', error };
    }

    this.socket = socket;
    if (this.closeRequested) {
      await socket.close(CloseCode.NORMAL_CLOSURE, 'client requested shutdown');
      this.setState(ShardState.STOPPED);
      return { kind: 'client-closed' };
    }

    this.inflater = this.options.compression === 'zlib-stream' ? new ZlibStreamInflater() : undefined;
    this.dispatch('CONNECTED', {});

    try {
      const outcome = await this.runConnected(socket);
      this.log.debug({ outcome: outcome.kind }, 'Connection attempt finished');
      return outcome;
    } finally {
      this.loops.abort();
      if (socket.isOpen) {
        await socket.close(CloseCode.DO_NOT_INVALIDATE_SESSION, 'connection attempt ended');
      }
      this.inflater?.close();
      this.commandLimiter.close();
      this.setState(ShardState.STOPPED);
      this.dispatch('DISCONNECTED', {});
    }
  }

  /**
   * Ask the attempt to end. The poll loop sees the close frame and run()
   * resolves with `client-closed`.
   */
  async close(): Promise<void> {
    if (this.closeRequested) {
      return;
    }
    this.closeRequested = true;
    if (this._state !== ShardState.NOT_RUNNING && this._state !== ShardState.STOPPED) {
      this.setState(ShardState.STOPPING);
    }
    this.loops.abort();

    const socket = this.socket;
    if (socket?.isOpen) {
      await socket.close(CloseCode.NORMAL_CLOSURE, 'client requested shutdown');
    }
  }

  /** Send a raw command through the outbound rate limiter. */
  async send(op: OpCode, d: unknown): Promise<void> {
    const socket = this.socket;
    if (socket === undefined || !socket.isOpen) {
      throw new GatewayTransportError(`Cannot send opcode ${op}: shard ${this.options.shardId} is not connected`);
    }
    // Aborted with the loops, so a queued command never holds up the end of an attempt.
    await this.commandLimiter.acquire(this.loops.signal);
    this.log.trace({ payload: { op, d } }, 'Sending gateway frame');
    await socket.send(JSON.stringify({ op, d }));
  }

  async updatePresence(presence: Presence): Promise<void> {
    await this.send(OpCode.PRESENCE_UPDATE, presence);
  }

  async updateVoiceState(update: VoiceStateUpdate): Promise<void> {
    await this.send(OpCode.VOICE_STATE_UPDATE, update);
  }

  async requestGuildMembers(request: RequestGuildMembers): Promise<void> {
    await this.send(OpCode.REQUEST_GUILD_MEMBERS, request);
  }

  private async runConnected(socket: GatewaySocket): Promise<ConnectionOutcome> {
    const first = await this.receive(socket);
    if (first.kind === 'end') {
      return first.outcome;
    }
    if (first.payload.op !== OpCode.HELLO) {
      throw new GatewayProtocolError(`Expected HELLO (op 10) but received op ${first.payload.op}`);
    }
    const hello = HelloSchema.safeParse(first.payload.d);
    if (!hello.success) {
      throw new GatewayProtocolError('Malformed HELLO payload');
    }

    this.heartbeatIntervalMs = hello.data.heartbeat_interval;
    this.lastMessageReceivedAt = monotonicNow();
    this.log.debug({ heartbeatIntervalMs: this.heartbeatIntervalMs }, 'Received HELLO');

    const heartbeat = this.heartbeatLoop(this.heartbeatIntervalMs);
    const poll = this.handshakeAndPoll(socket);

    // The heartbeat loop only settles with an outcome for a zombie; otherwise keep polling.
    const firstDone = await Promise.race([heartbeat, poll]);
    const outcome = firstDone ?? (await poll);

    this.loops.abort();
    if (outcome.kind === 'zombie' || outcome.kind === 'reconnect' || outcome.kind === 'invalid-session') {
      this.setState(ShardState.STOPPING);
      await socket.close(CloseCode.DO_NOT_INVALIDATE_SESSION, outcome.kind);
    }
    await Promise.allSettled([heartbeat, poll]);
    return outcome;
  }

  private async handshakeAndPoll(socket: GatewaySocket): Promise<ConnectionOutcome> {
    if (this.willResume) {
      this.setState(ShardState.RESUMING);
      await this.sendIgnoringClosedSocket(() => this.resume());
    } else {
      this.setState(ShardState.WAITING_FOR_READY);
      await this.sendIgnoringClosedSocket(() => this.identify());
    }
    return this.pollLoop(socket);
  }

  /**
   * Run a send that may race with the attempt ending. A send that failed on
   * a closing socket, or was cancelled while queued for the command limiter,
   * is logged and left to the poll loop, which reads the close frame next.
   */
  private async sendIgnoringClosedSocket(send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (err) {
      const cancelled =
        err instanceof RateLimiterClosedError || (err instanceof Error && err.name === 'AbortError');
      if (!(err instanceof GatewayTransportError) && !cancelled) {
        throw err;
      }
      this.log.debug({ err }, 'Send abandoned as the connection ends');
    }
  }

  private async identify(): Promise<void> {
    const payload: IdentifyPayload = {
      token: this.options.token,
      properties: this.options.properties ?? DEFAULT_PROPERTIES,
      compress: false,
      large_threshold: this.options.largeThreshold,
      shard: [this.options.shardId, this.options.shardCount],
      intents: this.options.intents,
    };
    if (this.options.presence !== undefined) {
      payload.presence = this.options.presence;
    }
    this.log.debug({ intents: this.options.intents }, 'Sending IDENTIFY');
    await this.send(OpCode.IDENTIFY, payload);
  }

  private async resume(): Promise<void> {
    const { sessionId, seq } = this.session;
    if (sessionId === null || seq === null) {
      throw new GatewayProtocolError('Cannot RESUME without a session id and sequence');
    }
    const payload: ResumePayload = { token: this.options.token, session_id: sessionId, seq };
    this.log.debug({ sessionId, seq }, 'Sending RESUME');
    await this.send(OpCode.RESUME, payload);
  }

  private async pollLoop(socket: GatewaySocket): Promise<ConnectionOutcome> {
    for (;;) {
      const received = await this.receive(socket);
      if (received.kind === 'end') {
        return received.outcome;
      }
      const { payload } = received;

      switch (payload.op) {
        case OpCode.DISPATCH:
          this.handleDispatch(payload);
          break;
        case OpCode.HEARTBEAT:
          this.log.debug('Server requested a heartbeat');
          await this.sendIgnoringClosedSocket(() => this.sendHeartbeat());
          break;
        case OpCode.HEARTBEAT_ACK:
          this.handleHeartbeatAck();
          break;
        case OpCode.RECONNECT:
          this.log.info('Server requested a reconnect');
          return { kind: 'reconnect' };
        case OpCode.INVALID_SESSION: {
          const parsed = InvalidSessionSchema.safeParse(payload.d);
          const resumable = parsed.success && parsed.data;
          this.log.warn({ resumable }, 'Session was invalidated');
          return { kind: 'invalid-session', resumable };
        }
        default:
          this.log.debug({ op: payload.op }, 'Ignoring unexpected opcode');
      }
    }
  }

  private async heartbeatLoop(intervalMs: number): Promise<ConnectionOutcome | undefined> {
    const signal = this.loops.signal;
    while (!signal.aborted) {
      const lastReceived = this.lastMessageReceivedAt ?? monotonicNow();
      if (monotonicNow() - lastReceived > intervalMs) {
        this.log.warn(
          { silentForMs: monotonicNow() - lastReceived, heartbeatIntervalMs: intervalMs },
          'No message received within the heartbeat interval, connection is a zombie',
        );
        return { kind: 'zombie' };
      }

      try {
        await this.sendHeartbeat();
      } catch (err) {
        if (!signal.aborted) {
          this.log.warn({ err }, 'Failed to send heartbeat');
        }
        return undefined;
      }

      await sleep(intervalMs, signal);
    }
    return undefined;
  }

  private async sendHeartbeat(): Promise<void> {
    this.lastHeartbeatSentAt = monotonicNow();
    await this.send(OpCode.HEARTBEAT, this.session.seq);
  }

  private handleHeartbeatAck(): void {
    if (this.lastHeartbeatSentAt !== null) {
      this.heartbeatLatencyMs = monotonicNow() - this.lastHeartbeatSentAt;
      this.log.trace({ latencyMs: this.heartbeatLatencyMs }, 'Heartbeat acknowledged');
    }
  }

  private handleDispatch(payload: GatewayPayload): void {
    if (typeof payload.s === 'number') {
      this.session.seq = payload.s;
    }
    const eventName = payload.t ?? 'UNKNOWN';
    this.internalHandlers.get(eventName)?.(payload.d);
    this.dispatch(eventName, payload.d);
  }

  private handleReady(data: unknown): void {
    const ready = ReadySchema.safeParse(data);
    if (!ready.success) {
      throw new GatewayProtocolError('Malformed READY payload');
    }
    this.session.sessionId = ready.data.session_id;
    this.session.resumeUrl = ready.data.resume_gateway_url ?? null;
    this.setState(ShardState.READY);
    this.log.info(
      { sessionId: ready.data.session_id, user: ready.data.user.username },
      `Shard ${this.options.shardId} is ready`,
    );
    this.options.onReady?.('READY');
  }

  private handleResumed(): void {
    this.setState(ShardState.READY);
    this.log.info({ seq: this.session.seq }, `Shard ${this.options.shardId} resumed`);
    this.options.onReady?.('RESUMED');
  }

  /** Hand an event to the consumer without waiting for it. */
  private dispatch(eventName: string, payload: unknown): void {
    const shard = this.info;
    void Promise.resolve()
      .then(() => this.options.dispatch(shard, eventName, payload))
      .catch((err: unknown) => {
        this.log.error({ err, event: eventName }, 'Event dispatch callback failed');
      });
  }

  /** Next decoded frame, or how the socket ended. */
  private async receive(socket: GatewaySocket): Promise<Received> {
    for (;;) {
      const message = await socket.receive();

      let text: string;
      switch (message.type) {
        case 'close':
          return { kind: 'end', outcome: this.closeOutcome(message.code, message.reason) };
        case 'error':
          if (this.closeRequested) {
            return { kind: 'end', outcome: { kind: 'client-closed' } };
          }
          this.log.warn({ err: message.error }, 'Gateway socket error');
          return { kind: 'end', outcome: { kind: 'transport-error', error: message.error } };
        case 'text':
          if (this.inflater?.hasPartialMessage) {
            throw new GatewayProtocolError('Received a text frame while a compressed message was incomplete');
          }
          text = message.data;
          break;
        case 'binary': {
          if (this.inflater === undefined) {
            text = message.data.toString('utf8');
            break;
          }
          let inflated: string | undefined;
          try {
            inflated = await this.inflater.push(message.data);
          } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            throw new GatewayProtocolError(`Failed to inflate a compressed frame: ${detail}`);
          }
          if (inflated === undefined) {
            continue;
          }
          text = inflated;
          break;
        }
      }

      this.lastMessageReceivedAt = monotonicNow();
      return { kind: 'payload', payload: this.decode(text) };
    }
  }

  private decode(text: string): GatewayPayload {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new GatewayProtocolError('Received a frame that is not valid JSON');
    }
    const parsed = GatewayPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GatewayProtocolError('Received a frame without a valid opcode');
    }
    return parsed.data;
  }

  private closeOutcome(code: number, reason: string): ConnectionOutcome {
    // Also covers the close this attempt sent itself after a zombie, reconnect or invalid session.
    if (this.closeRequested || this.loops.signal.aborted) {
      return { kind: 'client-closed' };
    }
    const resumable = canResumeAfterClose(code);
    const fatal = isFatalCloseCode(code);
    this.log.warn(
      { code, codeName: closeCodeName(code), reason, resumable, fatal },
      'Gateway closed the connection',
    );
    return { kind: 'server-closed', code, reason, resumable, fatal };
  }

  private setState(state: ShardState): void {
    if (this._state === state) {
      return;
    }
    this._state = state;
    this.options.onStateChange?.(state);
  }
}
