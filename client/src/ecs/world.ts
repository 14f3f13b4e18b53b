/**
 * ECS world for one client session.
 *
 * The bitECS world doubles as the session's resource container: everything
 * the systems share (transport, chunk store, registries, mesh output) is
 * attached as world context, so systems keep the `(world, delta)` shape.
 */

import { createWorld, type World } from 'bitecs';
import type { EventBus, SessionEventMap } from '../core/eventBus';
import type { FrameStats } from '../core/frameStats';
import type { Client } from '../net/protocol';
import type { MovementSpeeds } from '../physics/camera';
import type { PlayerInput } from '../types';
import type { GameData } from '../world/blockRegistry';
import type { ChunkMeshStore } from '../world/chunkMeshStore';
import type { ChunkStore } from '../world/chunkStore';
import type { MeshScratch } from '../world/greedyMesher';
import type { ChunkEntityMap } from './chunkEntityMap';
import type { Components } from './components';

export interface SessionResources {
  /** Component stores owned by this world. */
  components: Components;
  client: Client;
  chunks: ChunkStore;
  /** Installed by the first GameData message; undefined until then. */
  gameData: GameData | undefined;
  meshes: ChunkMeshStore;
  chunkEntities: ChunkEntityMap;
  scratch: MeshScratch;
  events: EventBus<SessionEventMap>;
  stats: FrameStats;
  /** Latest input snapshot, replaced by the session owner each frame. */
  input: PlayerInput;
  speeds: MovementSpeeds;
  /** Entity id of the local player; set right after the world is created. */
  player: number;
}

export type ClientWorld = World<SessionResources>;

export function createClientWorld(resources: SessionResources): ClientWorld {
  return createWorld(resources);
}
