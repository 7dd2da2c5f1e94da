import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { createLogger, type Logger } from '../src/logger.ts';
import { parseClientMessage } from './protocol.ts';
import type { ServerMessage, WelcomeMsg } from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;
/** Frames above maxMessageBytes * this are refused by ws itself (close 1009). */
const HARD_PAYLOAD_FACTOR = 4;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  /** Set once the client has sent a valid hello. */
  greeted: boolean;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
  logger?: Logger;
}

/** Status stream for observers: hello/welcome handshake, then broadcasts. */
export class WsHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private welcomeJson: string;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;
  private logger: Logger;

  constructor(httpServer: Server, welcome: WelcomeMsg, options: WsHubOptions = {}) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.logger = options.logger ?? createLogger('silent');
    // Frames between the two limits reach handleMessage and get a protocol error.
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes * HARD_PAYLOAD_FACTOR
    });
    this.welcomeJson = JSON.stringify(welcome);
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  getClientCount(): number {
    return this.connections.size;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  /** Sends to every greeted client that is not backed up. */
  broadcast(message: ServerMessage): void {
    const payload = JSON.stringify(message);
    for (const state of this.connections.values()) {
      if (!state.greeted) continue;
      if (state.socket.readyState !== WebSocket.OPEN) continue;
      if (state.socket.bufferedAmount > this.maxBufferedAmount) continue;
      state.socket.send(payload);
    }
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      greeted: false
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    socket.on('close', () => {
      this.connections.delete(state.id);
    });
    // ws has already started closing the socket when it reports a frame error.
    socket.on('error', (err) => {
      this.logger.warn('ws', `client ${state.id} dropped: ${err.message}`);
      this.connections.delete(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    const size = payloadSize(data);
    if (size > this.maxMessageBytes) {
      this.protocolError(state, 'message too large');
      return;
    }
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadToText(data));
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    switch (msg.type) {
      case 'hello':
        if (state.greeted) {
          this.protocolError(state, 'duplicate hello');
          return;
        }
        state.greeted = true;
        state.socket.send(this.welcomeJson);
        return;
      case 'ping':
        if (!state.greeted) {
          this.protocolError(state, 'hello required before ping');
          return;
        }
        this.send(state, msg.t === undefined ? { type: 'pong' } : { type: 'pong', t: msg.t });
        return;
    }
  }

  private send(state: ConnectionState, message: ServerMessage): void {
    if (state.socket.readyState !== WebSocket.OPEN) return;
    state.socket.send(JSON.stringify(message));
  }

  private protocolError(state: ConnectionState, message: string): void {
    this.send(state, { type: 'error', message });
    state.socket.close(1008, message);
  }
}

function payloadSize(data: RawData): number {
  if (Array.isArray(data)) return data.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  return data.byteLength;
}

function payloadToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}
