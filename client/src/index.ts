/**
 * Public API of the Voxelmere client engine.
 */

export * from './config';
export type * from './types';
export { BlockFace, chunkPosKey, isOpaque, makeChunkKey, parseChunkKey } from './types';

export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './core/logger';
export type { Logger, LogLevel } from './core/logger';
export { SessionError, isSessionError } from './core/errors';
export type { SessionErrorKind } from './core/errors';
export { EventBus } from './core/eventBus';
export type { SessionEventMap } from './core/eventBus';
export { FrameStats } from './core/frameStats';
export type { FrameStatsSnapshot } from './core/frameStats';
export { blockToChunk, chunkNeighborhood, floorDiv, floorMod, localIndex } from './core/math';

// World
export { Chunk } from './world/chunk';
export { ChunkStore } from './world/chunkStore';
export { Registry, createGameData, validateGameData } from './world/blockRegistry';
export type { BlockDefinition, GameData, GameDataDefinitions, ItemDefinition } from './world/blockRegistry';
export { AdjacentChunkOcclusion } from './world/occlusion';
export { MeshScratch, greedyMeshChunk } from './world/greedyMesher';
export { ChunkMeshStore, createChunkGeometry } from './world/chunkMeshStore';
export { CHUNK_FRAME_BYTES, decodeChunk, encodeChunk, findUnregisteredBlock } from './world/chunkCodec';
export type { ChunkSnapshot } from './world/chunkCodec';

// Physics & input
export { createBlockContainer, resolveMovement } from './physics/aabb';
export type { BlockContainer } from './physics/aabb';
export { computeMovement, settleAfterCollision, updateYawPitch, viewDirection } from './physics/camera';
export type { MovementSpeeds, MovementStep } from './physics/camera';
export * from './input/inputState';

// Network
export type * from './net/protocol';
export { NO_CLIENT_EVENT, NO_SERVER_EVENT } from './net/protocol';
export { MessageQueue } from './net/messageQueue';
export { InProcessClient, InProcessServer, createInProcessChannel } from './net/inProcess';
export { WebSocketClient } from './net/webSocketClient';
export { decodeToClient, decodeToServer, encodeToClient, encodeToServer } from './net/wireCodec';

// Session
export { ClientSession } from './engine/ClientSession';
export type { ClientSessionOptions } from './engine/ClientSession';
export { Engine } from './engine/Engine';
