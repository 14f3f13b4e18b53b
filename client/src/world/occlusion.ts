/**
 * Neighbor occlusion snapshot for one chunk.
 *
 * Built once per dirty chunk per tick from the chunk store, then handed to the
 * mesher so meshing stays a pure function of its inputs. Covers the one-block
 * shell around the chunk: faces, edges and corners of all 26 neighbors.
 *
 * Absent neighbors read as non-opaque, so boundary faces are drawn.
 */

import { CHUNK_SIZE } from '../config';
import { isOpaque, type BlockMesh, type ChunkPos } from '../types';
import type { ChunkStore } from './chunkStore';

const PADDED = CHUNK_SIZE + 2;

function paddedIndex(x: number, y: number, z: number): number {
  return (x + 1) + PADDED * ((y + 1) + PADDED * (z + 1));
}

export class AdjacentChunkOcclusion {
  /** 1 where the shell block is opaque. Interior cells are unused. */
  private readonly opaque: Uint8Array;

  private constructor(opaque: Uint8Array) {
    this.opaque = opaque;
  }

  /** Snapshot with every neighbor absent. */
  static empty(): AdjacentChunkOcclusion {
    return new AdjacentChunkOcclusion(new Uint8Array(PADDED * PADDED * PADDED));
  }

  static fromStore(store: ChunkStore, pos: ChunkPos, meshes: readonly BlockMesh[]): AdjacentChunkOcclusion {
    const opaque = new Uint8Array(PADDED * PADDED * PADDED);

    for (let dz = -1; dz <= 1; dz++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          if (dx === 0 && dy === 0 && dz === 0) continue;
          const neighbor = store.getChunk({ px: pos.px + dx, py: pos.py + dy, pz: pos.pz + dz });
          if (!neighbor) continue;

          // Shell cells that fall inside this neighbor: one layer thick on each
          // offset axis, the full span on axes with zero offset.
          const xs = dx === 0 ? [0, CHUNK_SIZE] : dx < 0 ? [CHUNK_SIZE - 1, CHUNK_SIZE] : [0, 1];
          const ys = dy === 0 ? [0, CHUNK_SIZE] : dy < 0 ? [CHUNK_SIZE - 1, CHUNK_SIZE] : [0, 1];
          const zs = dz === 0 ? [0, CHUNK_SIZE] : dz < 0 ? [CHUNK_SIZE - 1, CHUNK_SIZE] : [0, 1];

          for (let lz = zs[0] ?? 0; lz < (zs[1] ?? 0); lz++) {
            for (let ly = ys[0] ?? 0; ly < (ys[1] ?? 0); ly++) {
              for (let lx = xs[0] ?? 0; lx < (xs[1] ?? 0); lx++) {
                if (!isOpaque(meshes[neighbor.getBlock(lx, ly, lz)])) continue;
                opaque[paddedIndex(lx + dx * CHUNK_SIZE, ly + dy * CHUNK_SIZE, lz + dz * CHUNK_SIZE)] = 1;
              }
            }
          }
        }
      }
    }

    return new AdjacentChunkOcclusion(opaque);
  }

  /**
   * Whether the shell block at a chunk-relative coordinate is opaque.
   * Each axis is in [-1, CHUNK_SIZE] and at least one axis lies outside the chunk.
   */
  isOpaque(x: number, y: number, z: number): boolean {
    return this.opaque[paddedIndex(x, y, z)] === 1;
  }
}
