import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ShardSupervisor, type SessionStore, type ShardSupervisorOptions } from '../supervisor.js';
import { ShardState, type ShardSession } from '../shard.js';
import { OpCode } from '../opcodes.js';
import { GatewayServerClosedConnectionError, GatewayTransportError } from '../../shared/errors.js';
import { silentLogger } from '../../shared/__tests__/silent-logger.js';
import { FakeTransport, type FakeGatewaySocket } from './fake-socket.js';

class MemorySessionStore implements SessionStore {
  readonly sessions = new Map<number, ShardSession>();

  load(shardId: number): ShardSession | null {
    const session = this.sessions.get(shardId);
    return session ? { ...session } : null;
  }

  save(shardId: number, session: ShardSession): void {
    this.sessions.set(shardId, { ...session });
  }

  delete(shardId: number): void {
    this.sessions.delete(shardId);
  }
}

function readyPayload(sessionId: string) {
  return {
    session_id: sessionId,
    resume_gateway_url: 'wss://resume.example.test',
    user: { id: '100', username: 'test-bot' },
  };
}

function createSupervisor(overrides: Partial<ShardSupervisorOptions> = {}) {
  const transport = new FakeTransport();
  const sessionStore = new MemorySessionStore();
  const supervisor = new ShardSupervisor({
    shardId: 0,
    shardCount: 1,
    token: 'test-token',
    url: 'wss://gateway.example.test',
    version: 10,
    compression: 'none',
    intents: 513,
    largeThreshold: 250,
    transport,
    dispatch: () => undefined,
    logger: silentLogger,
    sessionStore,
    backoff: { base: 2, jitterRatio: 0 },
    ...overrides,
  });
  return { supervisor, transport, sessionStore };
}

/** Walk a fresh socket through HELLO and READY. */
function makeReady(socket: FakeGatewaySocket, sessionId = 'xyz', seq = 1): void {
  socket.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
  socket.serverSend({ op: OpCode.DISPATCH, t: 'READY', s: seq, d: readyPayload(sessionId) });
}

describe('ShardSupervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve start() once the shard is ready', async () => {
    const { supervisor, transport, sessionStore } = createSupervisor();
    const started = supervisor.start();
    makeReady(await transport.socket(0));
    await started;

    expect(supervisor.state).toBe(ShardState.READY);
    expect(supervisor.status()).toEqual({
      id: 0,
      count: 1,
      state: ShardState.READY,
      sessionId: 'xyz',
      seq: 1,
      heartbeatLatencyMs: null,
      reconnectCount: 0,
      disconnectCount: 0,
    });
    expect(sessionStore.sessions.get(0)).toEqual({
      seq: 1,
      sessionId: 'xyz',
      resumeUrl: 'wss://resume.example.test',
    });

    await supervisor.close();
  });

  it('should refuse to start twice', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    makeReady(await transport.socket(0));
    await started;

    await expect(supervisor.start()).rejects.toThrow('Shard 0 has already been started');

    await supervisor.close();
  });

  it('should identify again after a non-resumable invalid session', async () => {
    const { supervisor, transport, sessionStore } = createSupervisor();
    const started = supervisor.start();
    const first = await transport.socket(0);
    makeReady(first);
    await started;

    first.serverSend({ op: OpCode.INVALID_SESSION, d: false });
    await vi.advanceTimersByTimeAsync(0);

    expect(first.closedWith?.code).toBe(3000);
    expect(supervisor.session).toEqual({ seq: null, sessionId: null, resumeUrl: null });
    expect(sessionStore.sessions.has(0)).toBe(false);
    expect(transport.sockets).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(5000);
    const second = await transport.socket(1);
    expect(second.url).toBe('wss://gateway.example.test/?v=10&encoding=json');

    second.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    await vi.advanceTimersByTimeAsync(0);
    expect(second.sentOps()).toContain(OpCode.IDENTIFY);
    expect(supervisor.reconnectCount).toBe(1);
    expect(supervisor.disconnectCount).toBe(1);

    await supervisor.close();
  });

  it('should resume after a resumable invalid session', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    const first = await transport.socket(0);
    makeReady(first, 'abc', 42);
    await started;

    first.serverSend({ op: OpCode.INVALID_SESSION, d: true });
    await vi.advanceTimersByTimeAsync(5000);

    const second = await transport.socket(1);
    expect(second.url).toBe('wss://resume.example.test/?v=10&encoding=json');
    second.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    await vi.advanceTimersByTimeAsync(0);

    expect(second.sent.find((frame) => frame.op === OpCode.RESUME)?.d).toEqual({
      token: 'test-token',
      session_id: 'abc',
      seq: 42,
    });

    await supervisor.close();
  });

  it('should resume after the gateway asks for a reconnect', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    const first = await transport.socket(0);
    makeReady(first, 'abc', 5);
    await started;

    first.serverSend({ op: OpCode.RECONNECT });
    await vi.advanceTimersByTimeAsync(4999);
    expect(transport.sockets).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    const second = await transport.socket(1);
    second.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    second.serverSend({ op: OpCode.DISPATCH, t: 'RESUMED', s: 6, d: {} });
    await vi.advanceTimersByTimeAsync(0);

    expect(second.sentOps()).toContain(OpCode.RESUME);
    expect(supervisor.state).toBe(ShardState.READY);
    expect(supervisor.session.seq).toBe(6);

    await supervisor.close();
  });

  it('should stop with an error on a fatal close code', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    const socket = await transport.socket(0);
    socket.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    socket.serverClose(4004, 'Authentication failed.');

    const error = await started.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GatewayServerClosedConnectionError);
    expect(error).toMatchObject({ code: 4004, canResume: false, isFatal: true });
    expect(supervisor.state).toBe(ShardState.STOPPED);
    await expect(supervisor.join()).rejects.toBe(error);
  });

  it('should clear the session after a non-resumable close and keep it after a resumable one', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    const first = await transport.socket(0);
    makeReady(first, 'abc', 3);
    await started;

    first.serverClose(4009, 'Session timed out.');
    await vi.advanceTimersByTimeAsync(0);
    expect(supervisor.session.sessionId).toBe('abc');

    // Restarted within the window, so the first backoff delay applies: 2^2 seconds.
    await vi.advanceTimersByTimeAsync(4000);
    const second = await transport.socket(1);
    expect(second.url).toBe('wss://resume.example.test/?v=10&encoding=json');

    second.serverClose(1000, 'Going away');
    await vi.advanceTimersByTimeAsync(0);
    expect(supervisor.session.sessionId).toBeNull();

    await supervisor.close();
  });

  it('should back off between failed connection attempts', async () => {
    const { supervisor, transport } = createSupervisor();
    transport.failNext(2);
    const started = supervisor.start();

    await vi.advanceTimersByTimeAsync(3999);
    expect(supervisor.reconnectCount).toBe(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(supervisor.reconnectCount).toBe(1);

    await vi.advanceTimersByTimeAsync(7999);
    expect(transport.sockets).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(supervisor.reconnectCount).toBe(2);

    makeReady(await transport.socket(0));
    await started;
    expect(supervisor.state).toBe(ShardState.READY);

    await supervisor.close();
  });

  it('should resume from a stored session on first start', async () => {
    const { supervisor, transport, sessionStore } = createSupervisor();
    sessionStore.save(0, { seq: 42, sessionId: 'abc', resumeUrl: 'wss://resume.example.test' });

    const started = supervisor.start();
    const socket = await transport.socket(0);
    expect(socket.url).toBe('wss://resume.example.test/?v=10&encoding=json');

    socket.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    socket.serverSend({ op: OpCode.DISPATCH, t: 'RESUMED', s: 43, d: {} });
    await started;

    expect(sessionStore.sessions.get(0)?.seq).toBe(43);
    await supervisor.close();
  });

  it('should close once however often close() is called', async () => {
    const { supervisor, transport } = createSupervisor();
    const started = supervisor.start();
    const socket = await transport.socket(0);
    makeReady(socket);
    await started;

    const first = supervisor.close();
    const second = supervisor.close();
    expect(second).toBe(first);
    await first;

    expect(socket.closedWith?.code).toBe(1000);
    expect(supervisor.state).toBe(ShardState.STOPPED);
    await expect(supervisor.join()).resolves.toBeUndefined();
    expect(transport.sockets).toHaveLength(1);
  });

  it('should send presence updates only while ready', async () => {
    const { supervisor, transport } = createSupervisor();
    const presence = { since: null, activities: [], status: 'dnd' as const, afk: false };

    await supervisor.updatePresence(presence);
    await expect(
      supervisor.requestGuildMembers({ guild_id: '1', query: '', limit: 0 }),
    ).rejects.toBeInstanceOf(GatewayTransportError);

    const started = supervisor.start();
    const socket = await transport.socket(0);
    socket.serverSend({ op: OpCode.HELLO, d: { heartbeat_interval: 41250 } });
    await vi.advanceTimersByTimeAsync(0);
    expect(socket.sent.find((frame) => frame.op === OpCode.IDENTIFY)?.d).toMatchObject({ presence });

    socket.serverSend({ op: OpCode.DISPATCH, t: 'READY', s: 1, d: readyPayload('xyz') });
    await started;
    await supervisor.requestGuildMembers({ guild_id: '1', query: '', limit: 0 });
    expect(socket.sent[socket.sent.length - 1]).toEqual({
      op: OpCode.REQUEST_GUILD_MEMBERS,
      d: { guild_id: '1', query: '', limit: 0 },
    });

    await supervisor.close();
  });
});
