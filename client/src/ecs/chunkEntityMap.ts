/**
 * Bidirectional map between chunk positions and ECS entity IDs.
 *
 * One per session. Chunk systems use it to find the entity for a position
 * and to create it the first time a chunk arrives.
 */

import { removeEntity } from 'bitecs';
import { chunkPosKey, type ChunkKey, type ChunkPos } from '../types';
import { createChunkEntity } from './archetypes';
import type { ComponentWorld } from './components';

export class ChunkEntityMap {
  private readonly chunkToEid = new Map<ChunkKey, number>();
  private readonly eidToChunk = new Map<number, ChunkKey>();

  /** Get the ECS entity for a chunk, or undefined if none exists. */
  getChunkEid(pos: ChunkPos): number | undefined {
    return this.chunkToEid.get(chunkPosKey(pos));
  }

  /** Check if a chunk entity exists for the given position. */
  hasChunkEntity(pos: ChunkPos): boolean {
    return this.chunkToEid.has(chunkPosKey(pos));
  }

  /** Entity for `pos`, creating a chunk entity on first use. */
  getOrCreate(world: ComponentWorld, pos: ChunkPos): number {
    const key = chunkPosKey(pos);
    const existing = this.chunkToEid.get(key);
    if (existing !== undefined) return existing;

    const eid = createChunkEntity(world);
    this.chunkToEid.set(key, eid);
    this.eidToChunk.set(eid, key);
    return eid;
  }

  /** Position key of a chunk entity, or undefined for other entities. */
  getChunkKey(eid: number): ChunkKey | undefined {
    return this.eidToChunk.get(eid);
  }

  /** Remove every tracked chunk entity from the world. */
  clear(world: ComponentWorld): void {
    for (const eid of this.eidToChunk.keys()) {
      removeEntity(world, eid);
    }
    this.chunkToEid.clear();
    this.eidToChunk.clear();
  }

  /** Number of tracked chunk entities. */
  get size(): number {
    return this.chunkToEid.size;
  }
}
