/**
 * ECS public API.
 *
 * Re-exports the pieces needed by ClientSession and by tests.
 */

export { createClientWorld } from './world';
export type { ClientWorld, SessionResources } from './world';
export { runPipeline } from './pipeline';
export type { ECSSystem } from './pipeline';

// Components
export {
  createComponents, assertStoreCapacity, MAX_ENTITIES,
  IsPlayer, IsChunk, MeshDirty,
} from './components';
export type { Components, ComponentWorld } from './components';

// Archetypes
export {
  createPlayerEntity, createChunkEntity,
  addPlayerArchetype, addChunkArchetype,
} from './archetypes';

// Chunk entity map
export { ChunkEntityMap } from './chunkEntityMap';

// Systems
export { networkSystem } from './systems/networkSystem';
export { chunkMeshSystem } from './systems/chunkMeshSystem';
export { playerMovementSystem } from './systems/playerMovementSystem';
export { positionSyncSystem } from './systems/positionSyncSystem';
