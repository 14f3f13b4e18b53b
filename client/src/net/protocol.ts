/**
 * Synchronization protocol between a client and a server endpoint.
 *
 * Both endpoints are non-blocking: `receiveEvent` returns `NoEvent` when
 * nothing is queued and `send` only enqueues. Messages in one direction are
 * delivered in send order; nothing is guaranteed across the two directions.
 * A sent message belongs to the receiver; senders keep no reference to it.
 */

import type { ChunkSnapshot } from '../world/chunkCodec';
import type { GameData } from '../world/blockRegistry';

export type PlayerId = number;

// ── Messages ────────────────────────────────────────────────────

export type ToClient =
  /** Registries, meshes and atlas; sent once at session start. */
  | { type: 'GameData'; data: GameData }
  /** Full chunk snapshot; sent whenever the server (re)pushes a chunk. */
  | { type: 'Chunk'; chunk: ChunkSnapshot };

export type ToServer =
  /** Player position after local collision resolution. At most once per client tick. */
  { type: 'SetPos'; x: number; y: number; z: number };

// ── Events ──────────────────────────────────────────────────────

export type ClientEvent =
  | { type: 'NoEvent' }
  | { type: 'Connected' }
  | { type: 'Disconnected' }
  | { type: 'ServerMessage'; message: ToClient };

export type ServerEvent =
  | { type: 'NoEvent' }
  | { type: 'ClientConnected'; id: PlayerId }
  | { type: 'ClientDisconnected'; id: PlayerId }
  | { type: 'ClientMessage'; id: PlayerId; message: ToServer };

export const NO_CLIENT_EVENT: ClientEvent = Object.freeze({ type: 'NoEvent' });
export const NO_SERVER_EVENT: ServerEvent = Object.freeze({ type: 'NoEvent' });

// ── Endpoints ───────────────────────────────────────────────────

export interface Client {
  receiveEvent(): ClientEvent;
  send(message: ToServer): void;
}

export interface Server {
  receiveEvent(): ServerEvent;
  send(client: PlayerId, message: ToClient): void;
}
