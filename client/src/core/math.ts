/**
 * Integer math for block and chunk addressing.
 * Zero allocations except where a coordinate object is returned.
 */

import { CHUNK_SIZE } from '../config';
import type { ChunkPos } from '../types';

/** Clamp value between min and max inclusive. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Integer division rounding toward negative infinity. */
export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

/** Modulo whose result takes the sign of the divisor (always in [0, b) for b > 0). */
export function floorMod(a: number, b: number): number {
  const m = a % b;
  return m < 0 ? m + b : m;
}

/** Chunk containing world block coordinate (x, y, z). */
export function blockToChunk(x: number, y: number, z: number): ChunkPos {
  return {
    px: floorDiv(x, CHUNK_SIZE),
    py: floorDiv(y, CHUNK_SIZE),
    pz: floorDiv(z, CHUNK_SIZE),
  };
}

/** Flat index of a chunk-local coordinate: x fastest, then y, then z. */
export function localIndex(x: number, y: number, z: number): number {
  return x + CHUNK_SIZE * (y + CHUNK_SIZE * z);
}

/** World block coordinate of a chunk's (0,0,0) corner. */
export function chunkOrigin(pos: ChunkPos): [number, number, number] {
  return [pos.px * CHUNK_SIZE, pos.py * CHUNK_SIZE, pos.pz * CHUNK_SIZE];
}

export function offsetChunkPos(pos: ChunkPos, dx: number, dy: number, dz: number): ChunkPos {
  return { px: pos.px + dx, py: pos.py + dy, pz: pos.pz + dz };
}

/** The 27 positions of the 3x3x3 block centred on `pos` (pos included), x fastest. */
export function chunkNeighborhood(pos: ChunkPos): ChunkPos[] {
  const result: ChunkPos[] = [];
  for (let dz = -1; dz <= 1; dz++) {
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        result.push(offsetChunkPos(pos, dx, dy, dz));
      }
    }
  }
  return result;
}
