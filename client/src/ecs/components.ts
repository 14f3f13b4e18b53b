/**
 * ECS component definitions (bitECS v0.4.0 API).
 *
 * Data components are plain objects with pre-allocated TypedArray stores,
 * indexed by entity ID (eid). Each world gets its own set from
 * `createComponents`, so entity ids of two sessions never share a slot.
 * No Three.js objects, data only.
 *
 * Convention: Float64Array for world positions (block coordinates grow
 *             past float32 precision), Float32Array for speeds and angles,
 *             Uint8Array for booleans, Uint32Array for counters.
 *             Chunk positions live in ChunkEntityMap, not in a store.
 */

import type { World } from 'bitecs';

/** Default store size: one player plus one entity per loaded chunk. */
export const MAX_ENTITIES = 20_000;

export function createComponents(capacity: number = MAX_ENTITIES) {
  const N = capacity;
  return {
    capacity,

    // ── Spatial ────────────────────────────────────────────────────

    /** Center of the entity's bounding box, world block units. */
    Position: {
      x: new Float64Array(N),
      y: new Float64Array(N),
      z: new Float64Array(N),
    },

    /** Blocks per second. */
    Velocity: {
      x: new Float32Array(N),
      y: new Float32Array(N),
      z: new Float32Array(N),
    },

    /** View orientation in degrees. */
    Rotation: {
      yaw: new Float32Array(N),
      pitch: new Float32Array(N),
    },

    /** Half-extents of the axis-aligned bounding box around Position. */
    BoundingBox: {
      hx: new Float32Array(N),
      hy: new Float32Array(N),
      hz: new Float32Array(N),
    },

    /** 1 while the box rests on a full block. */
    OnGround: {
      value: new Uint8Array(N),
    },

    // ── Chunk ──────────────────────────────────────────────────────

    /** Summary of the mesh currently published for the chunk. */
    MeshRef: {
      quadCount: new Uint32Array(N),
      /** Bumped on every publish; 0 means never meshed. */
      version: new Uint32Array(N),
    },
  };
}

export type Components = ReturnType<typeof createComponents>;

/** Any world that carries its own component stores. */
export type ComponentWorld = World<{ components: Components }>;

/** Throws once `eid` no longer fits the world's stores. */
export function assertStoreCapacity(components: Components, eid: number): void {
  if (eid >= components.capacity) {
    throw new RangeError(`Entity ${eid} exceeds component store capacity ${components.capacity}`);
  }
}

// ── Tags ─────────────────────────────────────────────────────────
// No data, so one object serves every world.

export const IsPlayer = {};
export const IsChunk = {};
/** Chunk needs re-meshing this tick. */
export const MeshDirty = {};
