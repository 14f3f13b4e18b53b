/**
 * Axis-aligned box collision against the voxel grid.
 *
 * Movement is resolved one axis at a time (x, then y, then z). Each axis
 * sweeps the box's leading face through the grid cells it would cross and
 * stops flush against the first solid one. Later axes sweep from the box
 * already offset by earlier ones, so a diagonal move can never cut through
 * the corner between two solid blocks.
 *
 * Pure: neither the world nor the box is modified.
 */

import { COLLISION_EPSILON } from '../config';
import { isOpaque, type Aabb, type BlockMesh, type Vec3 } from '../types';
import type { ChunkStore } from '../world/chunkStore';

export interface BlockContainer {
  /** Whether the block at an integer world coordinate blocks movement. */
  isBlockFull(x: number, y: number, z: number): boolean;
}

/** Collision view of the chunk store. Blocks in absent chunks are not full. */
export function createBlockContainer(store: ChunkStore, meshes: readonly BlockMesh[]): BlockContainer {
  return {
    isBlockFull: (x, y, z) => isOpaque(meshes[store.getBlock(x, y, z)]),
  };
}

type Axis = 0 | 1 | 2;
type Triple = [number, number, number];

const EPS = COLLISION_EPSILON;
/** Cross-section axes for each sweep axis. */
const U_AXIS: readonly [Axis, Axis, Axis] = [1, 2, 0];
const V_AXIS: readonly [Axis, Axis, Axis] = [2, 0, 1];

/** Whether any block in the cross-section of the box at `cell` along `axis` is full. */
function layerBlocked(
  container: BlockContainer,
  min: Triple,
  max: Triple,
  axis: Axis,
  cell: number,
): boolean {
  const u = U_AXIS[axis];
  const v = V_AXIS[axis];
  const u0 = Math.floor(min[u] + EPS);
  const u1 = Math.ceil(max[u] - EPS) - 1;
  const v0 = Math.floor(min[v] + EPS);
  const v1 = Math.ceil(max[v] - EPS) - 1;
  const p: Triple = [0, 0, 0];
  p[axis] = cell;

  for (let i = u0; i <= u1; i++) {
    p[u] = i;
    for (let j = v0; j <= v1; j++) {
      p[v] = j;
      if (container.isBlockFull(p[0], p[1], p[2])) return true;
    }
  }
  return false;
}

/** Largest displacement along `axis`, up to `d`, that keeps the box out of full blocks. */
function sweepAxis(container: BlockContainer, min: Triple, max: Triple, axis: Axis, d: number): number {
  if (d > 0) {
    const edge = max[axis];
    const last = Math.ceil(edge + d) - 1;
    for (let c = Math.ceil(edge - EPS); c <= last; c++) {
      if (layerBlocked(container, min, max, axis, c)) return Math.max(0, c - edge);
    }
  } else {
    const edge = min[axis];
    const last = Math.floor(edge + d);
    for (let c = Math.floor(edge + EPS) - 1; c >= last; c--) {
      if (layerBlocked(container, min, max, axis, c)) return Math.min(0, c + 1 - edge);
    }
  }
  return d;
}

/**
 * Clip a requested displacement so that `box` ends flush against, never
 * inside, any full block. Returns the displacement actually allowed.
 */
export function resolveMovement(container: BlockContainer, box: Aabb, requested: Vec3): Vec3 {
  const { center: c, halfExtents: h } = box;
  const min: Triple = [c.x - h.x, c.y - h.y, c.z - h.z];
  const max: Triple = [c.x + h.x, c.y + h.y, c.z + h.z];
  const want: Triple = [requested.x, requested.y, requested.z];
  const actual: Triple = [0, 0, 0];

  for (const axis of [0, 1, 2] as const) {
    const d = want[axis];
    if (d === 0) continue;
    const moved = sweepAxis(container, min, max, axis, d);
    actual[axis] = moved;
    min[axis] += moved;
    max[axis] += moved;
  }

  return { x: actual[0], y: actual[1], z: actual[2] };
}
