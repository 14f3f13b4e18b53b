/**
 * Entity archetype factory functions.
 *
 * Each archetype adds the required set of components to a new entity.
 * These functions are the canonical way to create entities in the ECS.
 */

import { addEntity, addComponent, removeEntity } from 'bitecs';
import { DEFAULT_PITCH, DEFAULT_YAW, PLAYER_HALF_EXTENTS } from '../config';
import type { Vec3 } from '../types';
import { IsChunk, IsPlayer, assertStoreCapacity, type ComponentWorld } from './components';

function addStoredEntity(world: ComponentWorld): number {
  const eid = addEntity(world);
  try {
    assertStoreCapacity(world.components, eid);
  } catch (err) {
    removeEntity(world, eid);
    throw err;
  }
  return eid;
}

// ── Player ───────────────────────────────────────────────────────

export function addPlayerArchetype(world: ComponentWorld, eid: number, spawn: Vec3): void {
  const { Position, Velocity, Rotation, BoundingBox, OnGround } = world.components;
  addComponent(world, eid, IsPlayer);
  addComponent(world, eid, Position);
  addComponent(world, eid, Velocity);
  addComponent(world, eid, Rotation);
  addComponent(world, eid, BoundingBox);
  addComponent(world, eid, OnGround);

  Position.x[eid] = spawn.x;
  Position.y[eid] = spawn.y;
  Position.z[eid] = spawn.z;
  Velocity.x[eid] = 0;
  Velocity.y[eid] = 0;
  Velocity.z[eid] = 0;
  Rotation.yaw[eid] = DEFAULT_YAW;
  Rotation.pitch[eid] = DEFAULT_PITCH;
  BoundingBox.hx[eid] = PLAYER_HALF_EXTENTS.x;
  BoundingBox.hy[eid] = PLAYER_HALF_EXTENTS.y;
  BoundingBox.hz[eid] = PLAYER_HALF_EXTENTS.z;
  OnGround.value[eid] = 0;
}

export function createPlayerEntity(world: ComponentWorld, spawn: Vec3): number {
  const eid = addStoredEntity(world);
  addPlayerArchetype(world, eid, spawn);
  return eid;
}

// ── Chunk ────────────────────────────────────────────────────────

export function addChunkArchetype(world: ComponentWorld, eid: number): void {
  const { MeshRef } = world.components;
  addComponent(world, eid, IsChunk);
  addComponent(world, eid, MeshRef);

  MeshRef.quadCount[eid] = 0;
  MeshRef.version[eid] = 0;
}

/**
 * Create a new chunk entity and return its eid. The position is tracked by
 * ChunkEntityMap. Throws RangeError when the stores are full.
 */
export function createChunkEntity(world: ComponentWorld): number {
  const eid = addStoredEntity(world);
  addChunkArchetype(world, eid);
  return eid;
}
