/**
 * Chunk store: the client's partial replica of the world.
 *
 * Absent chunks are a normal condition; block queries into them read as air.
 */

import { AIR_BLOCK_ID, CHUNK_SIZE } from '../config';
import { floorDiv, floorMod } from '../core/math';
import { chunkPosKey, makeChunkKey, type BlockId, type ChunkKey, type ChunkPos } from '../types';
import type { Chunk } from './chunk';

export class ChunkStore {
  private readonly chunkMap = new Map<ChunkKey, Chunk>();

  /** Insert or replace the chunk at its position. Last write wins. */
  setChunk(chunk: Chunk): void {
    this.chunkMap.set(chunkPosKey(chunk.pos), chunk);
  }

  getChunk(pos: ChunkPos): Chunk | undefined {
    return this.chunkMap.get(chunkPosKey(pos));
  }

  hasChunk(pos: ChunkPos): boolean {
    return this.chunkMap.has(chunkPosKey(pos));
  }

  /** Block at an integer world coordinate; air when the owning chunk is unknown. */
  getBlock(x: number, y: number, z: number): BlockId {
    const chunk = this.chunkMap.get(makeChunkKey(
      floorDiv(x, CHUNK_SIZE),
      floorDiv(y, CHUNK_SIZE),
      floorDiv(z, CHUNK_SIZE),
    ));
    if (!chunk) return AIR_BLOCK_ID;
    return chunk.getBlock(floorMod(x, CHUNK_SIZE), floorMod(y, CHUNK_SIZE), floorMod(z, CHUNK_SIZE));
  }

  get chunkCount(): number {
    return this.chunkMap.size;
  }

  chunks(): IterableIterator<Chunk> {
    return this.chunkMap.values();
  }
}
