/**
 * Immutable chunk of CHUNK_SIZE³ block ids.
 *
 * A chunk is replaced wholesale when a fresher snapshot arrives; nothing
 * mutates one after construction.
 */

import { CHUNK_SIZE, CHUNK_VOLUME } from '../config';
import { localIndex } from '../core/math';
import type { BlockId, ChunkPos } from '../types';

export class Chunk {
  readonly pos: ChunkPos;
  private readonly blocks: Uint16Array;

  private constructor(pos: ChunkPos, blocks: Uint16Array) {
    this.pos = pos;
    this.blocks = blocks;
  }

  /**
   * Wrap a snapshot's block array. The array is owned by the chunk from here
   * on; callers hand it over and keep no reference.
   */
  static fromBlocks(pos: ChunkPos, blocks: Uint16Array): Chunk {
    if (blocks.length !== CHUNK_VOLUME) {
      throw new RangeError(`Chunk block array has length ${blocks.length}, expected ${CHUNK_VOLUME}`);
    }
    return new Chunk({ px: pos.px, py: pos.py, pz: pos.pz }, blocks);
  }

  /** A chunk filled with a single block id. */
  static filled(pos: ChunkPos, id: BlockId): Chunk {
    return Chunk.fromBlocks(pos, new Uint16Array(CHUNK_VOLUME).fill(id));
  }

  /** Block at a chunk-local coordinate, each axis in [0, CHUNK_SIZE). */
  getBlock(x: number, y: number, z: number): BlockId {
    if (x < 0 || x >= CHUNK_SIZE || y < 0 || y >= CHUNK_SIZE || z < 0 || z >= CHUNK_SIZE) {
      throw new RangeError(`Local block coordinate (${x}, ${y}, ${z}) outside chunk`);
    }
    return this.blocks[localIndex(x, y, z)] ?? 0;
  }

  /** Unchecked read by flat index, for the mesher's inner loops. */
  blockAt(index: number): BlockId {
    return this.blocks[index] ?? 0;
  }

  /** Backing array for encoders. Must not be written to. */
  get data(): Uint16Array {
    return this.blocks;
  }
}
