/**
 * In-process duplex channel for integrated single-player sessions.
 *
 * Two independent queues, one per direction. Each has exactly one producer
 * (the opposite endpoint) and one consumer (its owner).
 */

import { createLogger } from '../core/logger';
import { MessageQueue } from './messageQueue';
import {
  NO_CLIENT_EVENT,
  NO_SERVER_EVENT,
  type Client,
  type ClientEvent,
  type PlayerId,
  type Server,
  type ServerEvent,
  type ToClient,
  type ToServer,
} from './protocol';

const log = createLogger('InProcessChannel');

interface ChannelState {
  toClient: MessageQueue<ClientEvent>;
  toServer: MessageQueue<ServerEvent>;
  clientId: PlayerId;
  open: boolean;
}

export class InProcessClient implements Client {
  private readonly state: ChannelState;

  constructor(state: ChannelState) {
    this.state = state;
  }

  receiveEvent(): ClientEvent {
    return this.state.toClient.shift() ?? NO_CLIENT_EVENT;
  }

  send(message: ToServer): void {
    if (!this.state.open) {
      log.debug(`dropping ${message.type} sent after disconnect`);
      return;
    }
    this.state.toServer.push({ type: 'ClientMessage', id: this.state.clientId, message });
  }

  /** Leave the session; the server observes ClientDisconnected. */
  disconnect(): void {
    if (!this.state.open) return;
    this.state.open = false;
    this.state.toServer.push({ type: 'ClientDisconnected', id: this.state.clientId });
  }
}

export class InProcessServer implements Server {
  private readonly state: ChannelState;

  constructor(state: ChannelState) {
    this.state = state;
  }

  receiveEvent(): ServerEvent {
    return this.state.toServer.shift() ?? NO_SERVER_EVENT;
  }

  send(client: PlayerId, message: ToClient): void {
    if (client !== this.state.clientId) {
      throw new Error(`In-process server has no client ${client} (only ${this.state.clientId})`);
    }
    if (!this.state.open) {
      log.debug(`dropping ${message.type} for disconnected client ${client}`);
      return;
    }
    this.state.toClient.push({ type: 'ServerMessage', message });
  }

  /** Drop the client; it observes Disconnected. */
  disconnect(client: PlayerId): void {
    if (client !== this.state.clientId || !this.state.open) return;
    this.state.open = false;
    this.state.toClient.push({ type: 'Disconnected' });
  }
}

/**
 * Create a connected client/server pair. Both sides start with their
 * connection event queued.
 */
export function createInProcessChannel(clientId: PlayerId = 0): { client: InProcessClient; server: InProcessServer } {
  const state: ChannelState = {
    toClient: new MessageQueue<ClientEvent>(),
    toServer: new MessageQueue<ServerEvent>(),
    clientId,
    open: true,
  };
  state.toClient.push({ type: 'Connected' });
  state.toServer.push({ type: 'ClientConnected', id: clientId });
  return { client: new InProcessClient(state), server: new InProcessServer(state) };
}
