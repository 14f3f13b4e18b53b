/**
 * ECS system pipeline.
 *
 * All systems execute in fixed order on the caller's thread.
 * ClientSession calls `runPipeline(world, delta)` once per tick.
 * A system that throws aborts the rest of the tick.
 */

import type { ClientWorld } from './world';
import { networkSystem } from './systems/networkSystem';
import { chunkMeshSystem } from './systems/chunkMeshSystem';
import { playerMovementSystem } from './systems/playerMovementSystem';
import { positionSyncSystem } from './systems/positionSyncSystem';

export type ECSSystem = (world: ClientWorld, delta: number) => void;

/**
 * Ordered system list. Index = execution priority.
 *
 * 1. Network: apply queued server messages, mark chunks dirty
 * 2. ChunkMesh: re-mesh every dirty chunk (needs 1's chunk writes)
 * 3. PlayerMovement: move the player against the updated store
 * 4. PositionSync: send the resolved position (needs 3)
 */
const systems: readonly ECSSystem[] = [
  /* 1 */ networkSystem,
  /* 2 */ chunkMeshSystem,
  /* 3 */ playerMovementSystem,
  /* 4 */ positionSyncSystem,
];

/** Run all ECS systems in order. */
export function runPipeline(world: ClientWorld, delta: number): void {
  for (const system of systems) {
    system(world, delta);
  }
}
