/**
 * System #2: ChunkMeshSystem
 *
 * Re-meshes every chunk tagged MeshDirty against a fresh occlusion
 * snapshot of its neighbors and publishes the result, replacing the
 * previous mesh for that position. All dirty chunks are processed in the
 * tick they were marked.
 *
 * Frequency: every tick
 */

import { query, removeComponent } from 'bitecs';
import { createLogger } from '../../core/logger';
import { AdjacentChunkOcclusion } from '../../world/occlusion';
import { greedyMeshChunk } from '../../world/greedyMesher';
import { parseChunkKey } from '../../types';
import { IsChunk, MeshDirty } from '../components';
import type { ClientWorld } from '../world';

const log = createLogger('ChunkMesh');

export function chunkMeshSystem(world: ClientWorld, _delta: number): void {
  const { MeshRef } = world.components;
  // Copied: removing MeshDirty reorders the live query array.
  const eids = Array.from(query(world, [IsChunk, MeshDirty]));
  const gameData = world.gameData;
  if (eids.length === 0 || !gameData) {
    world.stats.recordMeshing(0, 0);
    return;
  }

  const start = performance.now();
  let meshed = 0;

  for (const eid of eids) {
    removeComponent(world, eid, MeshDirty);
    const key = world.chunkEntities.getChunkKey(eid);
    if (key === undefined) continue;
    const pos = parseChunkKey(key);
    const chunk = world.chunks.getChunk(pos);
    if (!chunk) continue;

    const occlusion = AdjacentChunkOcclusion.fromStore(world.chunks, pos, gameData.meshes);
    const mesh = greedyMeshChunk(chunk, occlusion, gameData.meshes, world.scratch);
    world.meshes.publish(mesh);

    MeshRef.quadCount[eid] = mesh.quadCount;
    MeshRef.version[eid] = (MeshRef.version[eid] ?? 0) + 1;
    meshed++;
    world.events.emit('chunk_meshed', mesh);
  }

  const elapsed = performance.now() - start;
  world.stats.recordMeshing(meshed, elapsed);
  log.debug(`meshed ${meshed} chunks in ${elapsed.toFixed(2)}ms`);
}
