/**
 * Greedy meshing for voxel chunks.
 *
 * For each of the six face directions (+X, -X, +Y, -Y, +Z, -Z, in that order)
 * and each layer perpendicular to the direction's axis, a 2D mask marks the
 * visible faces: near block opaque, far block not opaque. The far block may
 * live in a neighbor chunk, read through the occlusion snapshot; unknown
 * neighbors count as not opaque so the boundary face is drawn.
 *
 * Active cells with the same block id are merged into rectangles (row-major:
 * grow width, then height, then clear), and each rectangle becomes one quad.
 *
 * Vertex layout (VERTEX_STRIDE floats):
 *   0-2  position, chunk-local block units
 *   3-5  face normal
 *   6-7  uv in block units across the quad (0..w, 0..h)
 *   8-11 atlas rect x, y, width, height
 * The shader tiles with `rect.xy + fract(uv) * rect.zw`.
 *
 * Output order depends only on the inputs, so re-meshing an unchanged chunk
 * against an unchanged snapshot yields identical buffers.
 *
 * No THREE.js dependency -- pure TypeScript arrays.
 */

import { CHUNK_LAYER, CHUNK_SIZE, VERTEX_STRIDE, VERTICES_PER_QUAD } from '../config';
import { chunkOrigin } from '../core/math';
import { BlockFace, type BlockMesh, type ChunkMeshData, type TextureRect } from '../types';
import type { Chunk } from './chunk';
import type { AdjacentChunkOcclusion } from './occlusion';

// ── Direction Table ────────────────────────────────────────────────

type Axis = 0 | 1 | 2;

interface FaceDirection {
  face: BlockFace;
  /** Axis the face normal lies on. */
  axis: Axis;
  sign: 1 | -1;
  /** Flat-index strides along the normal axis and the two mask axes. */
  strideA: number;
  strideU: number;
  strideV: number;
}

// Mask axes are u = (axis + 1) % 3 and v = (axis + 2) % 3, so u × v points
// along +axis and the (0, du, du+dv, dv) corner order is CCW seen from +axis.
const S = CHUNK_SIZE;
const DIRECTIONS: readonly FaceDirection[] = [
  { face: BlockFace.EAST, axis: 0, sign: 1, strideA: 1, strideU: S, strideV: S * S },
  { face: BlockFace.WEST, axis: 0, sign: -1, strideA: 1, strideU: S, strideV: S * S },
  { face: BlockFace.TOP, axis: 1, sign: 1, strideA: S, strideU: S * S, strideV: 1 },
  { face: BlockFace.BOTTOM, axis: 1, sign: -1, strideA: S, strideU: S * S, strideV: 1 },
  { face: BlockFace.SOUTH, axis: 2, sign: 1, strideA: S * S, strideU: 1, strideV: S },
  { face: BlockFace.NORTH, axis: 2, sign: -1, strideA: S * S, strideU: 1, strideV: S },
];

// ── Scratch Buffers ────────────────────────────────────────────────

/** Dynamic typed array that grows by doubling, avoids per-element GC pressure. */
class GrowableFloat32 {
  data: Float32Array;
  length: number;

  constructor(initialCapacity: number) {
    this.data = new Float32Array(initialCapacity);
    this.length = 0;
  }

  push2(a: number, b: number): void {
    this.ensure(2);
    this.data[this.length++] = a;
    this.data[this.length++] = b;
  }

  push3(a: number, b: number, c: number): void {
    this.ensure(3);
    this.data[this.length++] = a;
    this.data[this.length++] = b;
    this.data[this.length++] = c;
  }

  push4(a: number, b: number, c: number, d: number): void {
    this.ensure(4);
    this.data[this.length++] = a;
    this.data[this.length++] = b;
    this.data[this.length++] = c;
    this.data[this.length++] = d;
  }

  /** Return a trimmed copy of the underlying buffer. */
  toFloat32Array(): Float32Array {
    return this.data.slice(0, this.length);
  }

  reset(): void {
    this.length = 0;
  }

  private ensure(extra: number): void {
    if (this.length + extra <= this.data.length) return;
    let capacity = this.data.length * 2;
    while (capacity < this.length + extra) capacity *= 2;
    const next = new Float32Array(capacity);
    next.set(this.data);
    this.data = next;
  }
}

class GrowableUint32 {
  data: Uint32Array;
  length: number;

  constructor(initialCapacity: number) {
    this.data = new Uint32Array(initialCapacity);
    this.length = 0;
  }

  push6(a: number, b: number, c: number, d: number, e: number, f: number): void {
    if (this.length + 6 > this.data.length) {
      this.grow();
    }
    this.data[this.length++] = a;
    this.data[this.length++] = b;
    this.data[this.length++] = c;
    this.data[this.length++] = d;
    this.data[this.length++] = e;
    this.data[this.length++] = f;
  }

  toUint32Array(): Uint32Array {
    return this.data.slice(0, this.length);
  }

  reset(): void {
    this.length = 0;
  }

  private grow(): void {
    const next = new Uint32Array(this.data.length * 2);
    next.set(this.data);
    this.data = next;
  }
}

/**
 * Reusable working memory for the mesher. The scheduler keeps one and passes
 * it to every call; it is cleared, never reallocated, between chunks.
 */
export class MeshScratch {
  readonly vertices = new GrowableFloat32(4096 * VERTEX_STRIDE);
  readonly indices = new GrowableUint32(6144);
  /** Block id per mask cell; 0 means no face or already merged. */
  readonly mask = new Int32Array(CHUNK_LAYER);
  vertexCount = 0;
  quadCount = 0;

  reset(): void {
    this.vertices.reset();
    this.indices.reset();
    this.mask.fill(0);
    this.vertexCount = 0;
    this.quadCount = 0;
  }
}

const defaultScratch = new MeshScratch();

// ── Helpers ────────────────────────────────────────────────────────

function maskAt(mask: Int32Array, idx: number): number {
  return mask[idx] ?? 0;
}

/** Opacity of a shell block just outside the chunk, addressed in (axis, u, v) terms. */
function shellOpaque(
  occlusion: AdjacentChunkOcclusion,
  axis: Axis,
  layer: number,
  u: number,
  v: number,
): boolean {
  switch (axis) {
    case 0: return occlusion.isOpaque(layer, u, v);
    case 1: return occlusion.isOpaque(v, layer, u);
    case 2: return occlusion.isOpaque(u, v, layer);
  }
}

/** Push one vertex position given in (axis, u, v) terms. */
function pushPosition(scratch: MeshScratch, axis: Axis, a: number, u: number, v: number): void {
  switch (axis) {
    case 0: scratch.vertices.push3(a, u, v); break;
    case 1: scratch.vertices.push3(v, a, u); break;
    case 2: scratch.vertices.push3(u, v, a); break;
  }
}

function faceTexture(mesh: BlockMesh | undefined, face: BlockFace): TextureRect | undefined {
  if (!mesh || mesh.kind !== 'full_cube') return undefined;
  return mesh.textures[face];
}

// ── Quad Emitter ───────────────────────────────────────────────────

/**
 * Emit a w×h quad on the plane `a = plane`, anchored at (u0, v0).
 *
 * Corners:
 *   v3 ---- v2      v0 = anchor, v1 = +du, v2 = +du+dv, v3 = +dv
 *   |       |
 *   v0 ---- v1
 *
 * Triangles (0, 1, 2), (0, 2, 3) face +axis; the negative direction
 * reverses them to (0, 2, 1), (0, 3, 2).
 */
function emitQuad(
  scratch: MeshScratch,
  dir: FaceDirection,
  plane: number,
  u0: number,
  v0: number,
  w: number,
  h: number,
  rect: TextureRect,
): void {
  const base = scratch.vertexCount;
  const nx = dir.axis === 0 ? dir.sign : 0;
  const ny = dir.axis === 1 ? dir.sign : 0;
  const nz = dir.axis === 2 ? dir.sign : 0;

  const corners: ReadonlyArray<readonly [number, number]> = [
    [0, 0],
    [w, 0],
    [w, h],
    [0, h],
  ];
  for (const [cu, cv] of corners) {
    pushPosition(scratch, dir.axis, plane, u0 + cu, v0 + cv);
    scratch.vertices.push3(nx, ny, nz);
    scratch.vertices.push2(cu, cv);
    scratch.vertices.push4(rect.x, rect.y, rect.width, rect.height);
  }

  if (dir.sign > 0) {
    scratch.indices.push6(base, base + 1, base + 2, base, base + 2, base + 3);
  } else {
    scratch.indices.push6(base, base + 2, base + 1, base, base + 3, base + 2);
  }

  scratch.vertexCount += VERTICES_PER_QUAD;
  scratch.quadCount++;
}

// ── Mask Construction ──────────────────────────────────────────────

function buildLayerMask(
  chunk: Chunk,
  occlusion: AdjacentChunkOcclusion,
  meshes: readonly BlockMesh[],
  dir: FaceDirection,
  layer: number,
  mask: Int32Array,
): boolean {
  const farLayer = layer + dir.sign;
  const farInside = farLayer >= 0 && farLayer < S;
  let any = false;

  for (let v = 0; v < S; v++) {
    for (let u = 0; u < S; u++) {
      const idx = layer * dir.strideA + u * dir.strideU + v * dir.strideV;
      const id = chunk.blockAt(idx);
      const near = meshes[id];
      let value = 0;
      if (near !== undefined && near.kind === 'full_cube') {
        const farOpaque = farInside
          ? meshes[chunk.blockAt(idx + dir.sign * dir.strideA)]?.kind === 'full_cube'
          : shellOpaque(occlusion, dir.axis, farLayer, u, v);
        if (!farOpaque) {
          value = id;
          any = true;
        }
      }
      mask[v * S + u] = value;
    }
  }
  return any;
}

// ── Greedy Merge ───────────────────────────────────────────────────

function mergeLayer(
  scratch: MeshScratch,
  meshes: readonly BlockMesh[],
  dir: FaceDirection,
  layer: number,
): void {
  const mask = scratch.mask;
  const plane = dir.sign > 0 ? layer + 1 : layer;

  for (let v = 0; v < S; v++) {
    for (let u = 0; u < S; u++) {
      const key = maskAt(mask, v * S + u);
      if (key === 0) continue;

      // Extend width (along u)
      let w = 1;
      while (u + w < S && maskAt(mask, v * S + u + w) === key) {
        w++;
      }

      // Extend height (along v) while the whole row matches
      let h = 1;
      let canExtend = true;
      while (v + h < S && canExtend) {
        for (let du = 0; du < w; du++) {
          if (maskAt(mask, (v + h) * S + u + du) !== key) {
            canExtend = false;
            break;
          }
        }
        if (canExtend) h++;
      }

      // Clear mask for merged cells
      for (let dv = 0; dv < h; dv++) {
        for (let du = 0; du < w; du++) {
          mask[(v + dv) * S + u + du] = 0;
        }
      }

      const rect = faceTexture(meshes[key], dir.face);
      if (rect) {
        emitQuad(scratch, dir, plane, u, v, w, h, rect);
      }

      u += w - 1;
    }
  }
}

// ── Main Entry Point ───────────────────────────────────────────────

/**
 * Mesh one chunk against a neighbor occlusion snapshot.
 *
 * `scratch` is cleared and refilled; the returned arrays are compact copies
 * the caller may keep after the next call.
 */
export function greedyMeshChunk(
  chunk: Chunk,
  occlusion: AdjacentChunkOcclusion,
  meshes: readonly BlockMesh[],
  scratch: MeshScratch = defaultScratch,
): ChunkMeshData {
  scratch.reset();

  for (const dir of DIRECTIONS) {
    for (let layer = 0; layer < S; layer++) {
      if (buildLayerMask(chunk, occlusion, meshes, dir, layer, scratch.mask)) {
        mergeLayer(scratch, meshes, dir, layer);
      }
    }
  }

  return {
    pos: chunk.pos,
    origin: chunkOrigin(chunk.pos),
    vertices: scratch.vertices.toFloat32Array(),
    indices: scratch.indices.toUint32Array(),
    quadCount: scratch.quadCount,
  };
}
