import { describe, it, expect } from 'vitest';
import { CHUNK_VOLUME } from '../config';
import { Chunk } from '../world/chunk';
import { ChunkStore } from '../world/chunkStore';
import { AIR, DIRT, STONE, chunkWith } from './fixtures';

describe('Chunk', () => {
  it('rejects a block array of the wrong length', () => {
    expect(() => Chunk.fromBlocks({ px: 0, py: 0, pz: 0 }, new Uint16Array(10))).toThrow(RangeError);
  });

  it('rejects local coordinates outside the chunk', () => {
    const chunk = Chunk.filled({ px: 0, py: 0, pz: 0 }, STONE);
    expect(chunk.getBlock(31, 31, 31)).toBe(STONE);
    expect(() => chunk.getBlock(32, 0, 0)).toThrow(RangeError);
    expect(() => chunk.getBlock(0, -1, 0)).toThrow(RangeError);
  });

  it('exposes its blocks in flat index order', () => {
    const chunk = chunkWith({ px: 0, py: 0, pz: 0 }, [[3, 4, 5, DIRT], [0, 0, 0, STONE]]);
    expect(chunk.data).toHaveLength(CHUNK_VOLUME);
    expect(chunk.blockAt(0)).toBe(STONE);
    expect(chunk.blockAt(chunk.data.length - 1)).toBe(AIR);
  });
});

describe('ChunkStore', () => {
  it('reads air from chunks that have not arrived', () => {
    const store = new ChunkStore();
    expect(store.getBlock(0, 0, 0)).toBe(AIR);
    expect(store.getBlock(-1000, 5, 77)).toBe(AIR);
    expect(store.getChunk({ px: 0, py: 0, pz: 0 })).toBeUndefined();
  });

  it('addresses negative world coordinates with floor division', () => {
    const store = new ChunkStore();
    store.setChunk(chunkWith({ px: -1, py: 0, pz: -1 }, [[31, 0, 31, STONE], [0, 5, 31, DIRT]]));

    expect(store.getBlock(-1, 0, -1)).toBe(STONE);
    expect(store.getBlock(-32, 5, -1)).toBe(DIRT);
    expect(store.getBlock(-33, 5, -1)).toBe(AIR);
    expect(store.getBlock(0, 0, -1)).toBe(AIR);
  });

  it('replaces a chunk wholesale on a repeated write', () => {
    const store = new ChunkStore();
    const pos = { px: 2, py: -1, pz: 0 };
    store.setChunk(Chunk.filled(pos, AIR));
    store.setChunk(Chunk.filled(pos, STONE));

    expect(store.chunkCount).toBe(1);
    expect(store.hasChunk(pos)).toBe(true);
    expect(store.getBlock(64, -32, 0)).toBe(STONE);
    expect([...store.chunks()].map((c) => c.pos)).toEqual([pos]);
  });
});
