/**
 * Shared test data: a small block set and chunk builders.
 */

import { CHUNK_VOLUME } from '../config';
import { localIndex } from '../core/math';
import type { BlockId, ChunkPos, TextureRect } from '../types';
import { createGameData, type GameData } from '../world/blockRegistry';
import { Chunk } from '../world/chunk';

export const STONE_RECT: TextureRect = { x: 0, y: 0, width: 0.25, height: 0.25 };
export const DIRT_RECT: TextureRect = { x: 0.25, y: 0, width: 0.25, height: 0.25 };
export const GRASS_TOP_RECT: TextureRect = { x: 0.5, y: 0, width: 0.25, height: 0.25 };

export const AIR = 0;
export const STONE = 1;
export const DIRT = 2;
/** Registered without textures, so it renders Empty. */
export const GLASS = 3;
export const GRASS = 4;

export function testGameData(): GameData {
  return createGameData({
    textures: new Map([
      ['stone', STONE_RECT],
      ['dirt', DIRT_RECT],
      ['grass_top', GRASS_TOP_RECT],
    ]),
    textureAtlas: { width: 2, height: 2, data: new Uint8Array(16) },
    blocks: [
      { name: 'stone', faceTextures: ['stone', 'stone', 'stone', 'stone', 'stone', 'stone'] },
      { name: 'dirt', faceTextures: ['dirt', 'dirt', 'dirt', 'dirt', 'dirt', 'dirt'] },
      { name: 'glass' },
      { name: 'grass', faceTextures: ['dirt', 'dirt', 'grass_top', 'dirt', 'dirt', 'dirt'] },
    ],
  });
}

/** Chunk with the listed local blocks set and air elsewhere. */
export function chunkWith(pos: ChunkPos, blocks: ReadonlyArray<[x: number, y: number, z: number, id: BlockId]>): Chunk {
  const data = new Uint16Array(CHUNK_VOLUME);
  for (const [x, y, z, id] of blocks) data[localIndex(x, y, z)] = id;
  return Chunk.fromBlocks(pos, data);
}

/** Block array with the bottom `height` layers set to `id`. */
export function layeredBlocks(height: number, id: BlockId): Uint16Array {
  const data = new Uint16Array(CHUNK_VOLUME);
  for (let z = 0; z < 32; z++) {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < 32; x++) data[localIndex(x, y, z)] = id;
    }
  }
  return data;
}
