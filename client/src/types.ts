/**
 * Core type definitions for the Voxelmere client.
 */

// ── Blocks ──────────────────────────────────────────────────────

/** Registry-assigned block identifier (u16). 0 is always air. */
export type BlockId = number;

/** Normalized rectangle into the shared texture atlas. */
export interface TextureRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Face order used by FullCube textures and the mesher's direction table. */
export const BlockFace = {
  EAST: 0,   // +X
  WEST: 1,   // -X
  TOP: 2,    // +Y
  BOTTOM: 3, // -Y
  SOUTH: 4,  // +Z
  NORTH: 5,  // -Z
} as const;
export type BlockFace = (typeof BlockFace)[keyof typeof BlockFace];

export type FaceTextures = readonly [TextureRect, TextureRect, TextureRect, TextureRect, TextureRect, TextureRect];

export type BlockMesh =
  | { kind: 'empty' }
  | { kind: 'full_cube'; textures: FaceTextures };

export function isOpaque(mesh: BlockMesh | undefined): boolean {
  return mesh !== undefined && mesh.kind === 'full_cube';
}

/** How a block definition renders, as carried in game data. */
export type BlockType =
  | { kind: 'air' }
  | { kind: 'normal_cube'; faceTextures: readonly [string, string, string, string, string, string] };

export interface Block {
  name: string;
  blockType: BlockType;
}

// ── Items & Models ──────────────────────────────────────────────

export type ItemId = number;

export type ItemType = { kind: 'normal_item'; texture: string };

export interface Item {
  name: string;
  itemType: ItemType;
}

export type ItemMesh = {
  kind: 'simple_mesh';
  meshId: number;
  scale: number;
  meshCenter: readonly [number, number, number];
};

/** Dense voxel model: one packed RGBA colour per voxel, 0 = empty. */
export interface VoxelModel {
  sizeX: number;
  sizeY: number;
  sizeZ: number;
  voxels: Uint32Array;
}

/** RGBA8 texture atlas image. */
export interface AtlasImage {
  width: number;
  height: number;
  data: Uint8Array;
}

// ── Chunks ──────────────────────────────────────────────────────

export interface ChunkPos {
  readonly px: number;
  readonly py: number;
  readonly pz: number;
}

export type ChunkKey = `${number},${number},${number}`;

export function makeChunkKey(px: number, py: number, pz: number): ChunkKey {
  return `${px},${py},${pz}`;
}

export function chunkPosKey(pos: ChunkPos): ChunkKey {
  return makeChunkKey(pos.px, pos.py, pos.pz);
}

export function parseChunkKey(key: ChunkKey): ChunkPos {
  const [px = 0, py = 0, pz = 0] = key.split(',').map(Number);
  return { px, py, pz };
}

/** Mesh output for one chunk, positions relative to `origin`. */
export interface ChunkMeshData {
  pos: ChunkPos;
  /** World-space block coordinate of the chunk's (0,0,0) corner. */
  origin: readonly [number, number, number];
  /** Interleaved vertices, VERTEX_STRIDE floats each. */
  vertices: Float32Array;
  indices: Uint32Array;
  quadCount: number;
}

// ── Player ──────────────────────────────────────────────────────

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Axis-aligned box described by its center and half-extents. */
export interface Aabb {
  center: Vec3;
  halfExtents: Vec3;
}

export interface YawPitch {
  /** Degrees in [-180, 180]. */
  yaw: number;
  /** Degrees in [-90, 90]. */
  pitch: number;
}

export interface PlayerInput {
  moveForward: boolean;
  moveBackward: boolean;
  moveLeft: boolean;
  moveRight: boolean;
  moveUp: boolean;
  moveDown: boolean;
  flying: boolean;
  yaw: number;
  pitch: number;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
