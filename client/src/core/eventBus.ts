/**
 * Typed event bus for session events.
 * Listeners run synchronously inside emit, on the tick that produced the event.
 */

import type { ChunkMeshData, ChunkPos } from '../types';

type Listener<T> = (payload: T) => void;

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> } = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set: Set<Listener<EventMap[K]>> | undefined = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    const registered = set;
    registered.add(listener);

    return () => {
      registered.delete(listener);
      if (registered.size === 0 && this.listeners[event] === registered) {
        delete this.listeners[event];
      }
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      listener(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    delete this.listeners[event];
  }

  clear(): void {
    this.listeners = {};
  }
}

// ── Session Event Map ───────────────────────────────────────────

export interface SessionEventMap {
  game_data_received: { blockCount: number; itemCount: number };
  chunk_received: ChunkPos;
  chunk_meshed: ChunkMeshData;
  disconnected: void;
}
