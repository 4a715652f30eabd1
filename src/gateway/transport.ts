/**
 * WebSocket transport for gateway shards.
 * The shard talks to a GatewaySocket, a pull-based view of a socket:
 * frames, the close frame and socket errors all come out of receive() in
 * order. WsTransport provides it on top of the `ws` package; tests provide
 * an in-process one.
 */

import { once } from 'node:events';
import WebSocket from 'ws';
import { GatewayTransportError } from '../shared/errors.js';

export type SocketMessage =
  | { type: 'text'; data: string }
  | { type: 'binary'; data: Buffer }
  | { type: 'close'; code: number; reason: string }
  | { type: 'error'; error: Error };

export interface GatewaySocket {
  /** Next inbound message. Once a close arrives, every later call returns it again. */
  receive(): Promise<SocketMessage>;
  send(data: string): Promise<void>;
  /** Send a close frame and wait until the socket is gone. */
  close(code: number, reason?: string): Promise<void>;
  readonly isOpen: boolean;
}

export interface GatewayTransport {
  /** @throws GatewayTransportError when the connection cannot be opened */
  connect(url: string): Promise<GatewaySocket>;
}

/**
 * FIFO of inbound socket messages with a single pending reader.
 * After a close message has been queued nothing else is accepted.
 */
export class SocketInbox {
  private readonly messages: SocketMessage[] = [];
  private reader: ((message: SocketMessage) => void) | undefined;
  private closeMessage: Extract<SocketMessage, { type: 'close' }> | undefined;

  get isClosed(): boolean {
    return this.closeMessage !== undefined;
  }

  push(message: SocketMessage): void {
    if (this.closeMessage !== undefined) {
      return;
    }
    if (message.type === 'close') {
      this.closeMessage = message;
    }

    const reader = this.reader;
    if (reader !== undefined) {
      this.reader = undefined;
      reader(message);
      return;
    }
    this.messages.push(message);
  }

  next(): Promise<SocketMessage> {
    const queued = this.messages.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closeMessage !== undefined) {
      return Promise.resolve(this.closeMessage);
    }
    return new Promise((resolve) => {
      this.reader = resolve;
    });
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(new Uint8Array(data));
}

/** GatewaySocket backed by a `ws` client. */
export class WsGatewaySocket implements GatewaySocket {
  private readonly ws: WebSocket;
  private readonly inbox = new SocketInbox();
  private readonly closeTimeoutMs: number;

  constructor(ws: WebSocket, closeTimeoutMs = 5000) {
    this.ws = ws;
    this.closeTimeoutMs = closeTimeoutMs;

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        this.inbox.push({ type: 'binary', data: toBuffer(data) });
      } else {
        this.inbox.push({ type: 'text', data: toBuffer(data).toString('utf8') });
      }
    });
    ws.on('close', (code, reason) => {
      this.inbox.push({ type: 'close', code, reason: reason.toString('utf8') });
    });
    ws.on('error', (error) => {
      this.inbox.push({ type: 'error', error });
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  receive(): Promise<SocketMessage> {
    return this.inbox.next();
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(data, (err) => {
        if (err) {
          reject(new GatewayTransportError('Failed to send gateway frame', err));
        } else {
          resolve();
        }
      });
    });
  }

  async close(code: number, reason = ''): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return;
    }

    const closed = once(this.ws, 'close');
    const timer = setTimeout(() => this.ws.terminate(), this.closeTimeoutMs);
    timer.unref();
    try {
      this.ws.close(code, reason);
      await closed;
    } finally {
      clearTimeout(timer);
    }
  }
}

export interface WsTransportOptions {
  /** Handshake timeout in ms. Default 30000. */
  handshakeTimeoutMs?: number;
  /** Extra headers sent with the upgrade request. */
  headers?: Record<string, string>;
}

/** Opens real gateway connections with the `ws` package. */
export class WsTransport implements GatewayTransport {
  private readonly options: WsTransportOptions;

  constructor(options: WsTransportOptions = {}) {
    this.options = options;
  }

  async connect(url: string): Promise<GatewaySocket> {
    const ws = new WebSocket(url, {
      perMessageDeflate: false,
      handshakeTimeout: this.options.handshakeTimeoutMs ?? 30_000,
      headers: this.options.headers,
    });
    // Listeners go on before the handshake finishes so no frame is missed.
    const socket = new WsGatewaySocket(ws);

    try {
      await once(ws, 'open');
    } catch (err) {
      ws.terminate();
      const message = err instanceof Error ? err.message : String(err);
      throw new GatewayTransportError(`Failed to connect to ${url}: ${message}`, err);
    }

    return socket;
  }
}
