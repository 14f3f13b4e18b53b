/**
 * Remote client endpoint over a `ws` WebSocket.
 *
 * Socket callbacks only enqueue; the session drains the queue from its tick
 * through `receiveEvent`, so the remote and in-process transports look the
 * same to the scheduler. A frame that fails to decode closes the socket and
 * is raised as a protocol desync when the session reaches it.
 */

import { Buffer } from 'node:buffer';
import WebSocket from 'ws';
import { createLogger } from '../core/logger';
import { SessionError } from '../core/errors';
import { MessageQueue } from './messageQueue';
import { NO_CLIENT_EVENT, type Client, type ClientEvent, type ToServer } from './protocol';
import { decodeToClient, encodeToServer } from './wireCodec';

const log = createLogger('WebSocketClient');

type QueuedEvent = ClientEvent | { type: 'MalformedFrame'; error: Error };

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export class WebSocketClient implements Client {
  private readonly socket: WebSocket;
  private readonly queue = new MessageQueue<QueuedEvent>();
  private closed = false;

  constructor(socket: WebSocket) {
    this.socket = socket;

    if (socket.readyState === WebSocket.OPEN) {
      this.queue.push({ type: 'Connected' });
    }

    socket.on('open', () => {
      log.info('connected');
      this.queue.push({ type: 'Connected' });
    });

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.closed) return;
      if (!isBinary) {
        this.fail(new Error('Received a text frame; only binary frames are accepted'));
        return;
      }
      const decoded = decodeToClient(toBytes(data));
      if (!decoded.ok) {
        this.fail(decoded.error);
        return;
      }
      this.queue.push({ type: 'ServerMessage', message: decoded.value });
    });

    socket.on('error', (err: Error) => {
      log.warn('socket error:', err.message);
    });

    socket.on('close', (code: number) => {
      if (this.closed) return;
      this.closed = true;
      log.info(`disconnected (code ${code})`);
      this.queue.push({ type: 'Disconnected' });
    });
  }

  /** Open a connection; `Connected` is queued once the handshake completes. */
  static connect(url: string): WebSocketClient {
    return new WebSocketClient(new WebSocket(url));
  }

  receiveEvent(): ClientEvent {
    const event = this.queue.shift();
    if (event === undefined) return NO_CLIENT_EVENT;
    if (event.type === 'MalformedFrame') {
      throw new SessionError('protocol_desync', `Malformed frame from server: ${event.error.message}`, {
        cause: event.error,
      });
    }
    return event;
  }

  send(message: ToServer): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      log.debug(`dropping ${message.type}: socket not open`);
      return;
    }
    this.socket.send(encodeToServer(message));
  }

  /** Close the connection; `Disconnected` is queued immediately. */
  disconnect(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.push({ type: 'Disconnected' });
    this.socket.close();
  }

  private fail(error: Error): void {
    log.error('malformed frame:', error.message);
    this.closed = true;
    this.queue.push({ type: 'MalformedFrame', error });
    this.socket.close(1002, 'protocol error');
  }
}
