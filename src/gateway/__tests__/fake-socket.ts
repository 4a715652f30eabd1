import { GatewayTransportError } from '../../shared/errors.js';
import { SocketInbox, type GatewaySocket, type GatewayTransport, type SocketMessage } from '../transport.js';

export interface SentFrame {
  op: number;
  d: unknown;
}

/** In-process gateway socket: the test plays the server. */
export class FakeGatewaySocket implements GatewaySocket {
  readonly url: string;
  readonly sent: SentFrame[] = [];
  closedWith: { code: number; reason: string } | undefined;
  private readonly inbox = new SocketInbox();

  constructor(url: string) {
    this.url = url;
  }

  get isOpen(): boolean {
    return !this.inbox.isClosed;
  }

  receive(): Promise<SocketMessage> {
    return this.inbox.next();
  }

  async send(data: string): Promise<void> {
    if (!this.isOpen) {
      throw new GatewayTransportError('socket is closed');
    }
    const frame: unknown = JSON.parse(data);
    if (typeof frame === 'object' && frame !== null && 'op' in frame && typeof frame.op === 'number') {
      this.sent.push({ op: frame.op, d: 'd' in frame ? frame.d : undefined });
    }
  }

  async close(code: number, reason = ''): Promise<void> {
    if (!this.isOpen) {
      return;
    }
    this.closedWith = { code, reason };
    this.inbox.push({ type: 'close', code, reason });
  }

  /** Server side: send a JSON frame. */
  serverSend(payload: { op: number; d?: unknown; s?: number | null; t?: string | null }): void {
    this.inbox.push({ type: 'text', data: JSON.stringify(payload) });
  }

  serverSendRaw(message: SocketMessage): void {
    this.inbox.push(message);
  }

  /** Server side: close the connection. */
  serverClose(code: number, reason = ''): void {
    this.inbox.push({ type: 'close', code, reason });
  }

  sentOps(): number[] {
    return this.sent.map((frame) => frame.op);
  }
}

/** Hands out FakeGatewaySockets, or fails connects queued with failNext(). */
export class FakeTransport implements GatewayTransport {
  readonly sockets: FakeGatewaySocket[] = [];
  private failures = 0;
  private readonly waiters: ((socket: FakeGatewaySocket) => void)[] = [];

  failNext(count = 1): void {
    this.failures += count;
  }

  async connect(url: string): Promise<GatewaySocket> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new GatewayTransportError(`connect to ${url} refused`);
    }
    const socket = new FakeGatewaySocket(url);
    this.sockets.push(socket);
    for (const waiter of this.waiters.splice(0)) {
      waiter(socket);
    }
    return socket;
  }

  /** Resolves with the socket of the `index`-th successful connect. */
  socket(index: number): Promise<FakeGatewaySocket> {
    const existing = this.sockets[index];
    if (existing !== undefined) {
      return Promise.resolve(existing);
    }
    return new Promise((resolve) => {
      const check = (socket: FakeGatewaySocket): void => {
        if (this.sockets.indexOf(socket) === index) {
          resolve(socket);
        } else {
          this.waiters.push(check);
        }
      };
      this.waiters.push(check);
    });
  }
}
