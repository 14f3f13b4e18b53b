/**
 * System #1: NetworkSystem
 *
 * Drains every queued client event. GameData installs the registries once;
 * each Chunk replaces the stored chunk and marks it and its present
 * neighbors for re-meshing. Anything the client cannot apply ends the
 * session with a protocol desync; a transport disconnect ends it too.
 *
 * Frequency: every tick
 */

import { addComponent } from 'bitecs';
import { CHUNK_VOLUME } from '../../config';
import { SessionError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import { chunkNeighborhood } from '../../core/math';
import type { ToClient } from '../../net/protocol';
import { chunkPosKey } from '../../types';
import { validateGameData } from '../../world/blockRegistry';
import { Chunk } from '../../world/chunk';
import { findUnregisteredBlock, type ChunkSnapshot } from '../../world/chunkCodec';
import { MeshDirty } from '../components';
import type { ClientWorld } from '../world';

const log = createLogger('Network');

function applyChunk(world: ClientWorld, snapshot: ChunkSnapshot): void {
  const key = chunkPosKey(snapshot.pos);
  if (!world.gameData) {
    throw new SessionError('protocol_desync', `Chunk ${key} arrived before game data`);
  }
  if (snapshot.blocks.length !== CHUNK_VOLUME) {
    throw new SessionError(
      'protocol_desync',
      `Chunk ${key} has ${snapshot.blocks.length} blocks, expected ${CHUNK_VOLUME}`,
    );
  }
  const unknown = findUnregisteredBlock(snapshot.blocks, world.gameData.blocks.size);
  if (unknown !== undefined) {
    throw new SessionError(
      'protocol_desync',
      `Chunk ${key} contains block id ${unknown}, registry has ${world.gameData.blocks.size} blocks`,
    );
  }

  world.chunks.setChunk(Chunk.fromBlocks(snapshot.pos, snapshot.blocks));
  log.debug(`chunk ${key} applied`);
  world.events.emit('chunk_received', snapshot.pos);

  for (const pos of chunkNeighborhood(snapshot.pos)) {
    if (!world.chunks.hasChunk(pos)) continue;
    addComponent(world, world.chunkEntities.getOrCreate(world, pos), MeshDirty);
  }
}

function applyMessage(world: ClientWorld, message: ToClient): void {
  switch (message.type) {
    case 'GameData': {
      if (world.gameData) {
        log.debug('ignoring repeated game data');
        return;
      }
      const problems = validateGameData(message.data);
      if (problems.length > 0) {
        throw new SessionError('protocol_desync', `Invalid game data: ${problems.join('; ')}`);
      }
      world.gameData = message.data;
      log.info(`game data received: ${message.data.blocks.size} blocks, ${message.data.items.size} items`);
      world.events.emit('game_data_received', {
        blockCount: message.data.blocks.size,
        itemCount: message.data.items.size,
      });
      return;
    }
    case 'Chunk':
      applyChunk(world, message.chunk);
      return;
  }
}

export function networkSystem(world: ClientWorld, _delta: number): void {
  for (;;) {
    const event = world.client.receiveEvent();
    switch (event.type) {
      case 'NoEvent':
        return;
      case 'Connected':
        log.info('connected to server');
        break;
      case 'Disconnected':
        world.events.emit('disconnected', undefined);
        throw new SessionError('disconnected', 'Server closed the connection');
      case 'ServerMessage':
        applyMessage(world, event.message);
        break;
    }
  }
}
