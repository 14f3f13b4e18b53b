import { describe, it, expect } from 'vitest';
import { BlockFace } from '../types';
import { Registry, createGameData, validateGameData } from '../world/blockRegistry';
import { DIRT_RECT, GRASS_TOP_RECT, STONE_RECT, testGameData } from './fixtures';

describe('Registry', () => {
  it('assigns dense ids in registration order', () => {
    const reg = new Registry<number>();
    expect(reg.register('a', 10)).toBe(0);
    expect(reg.register('b', 20)).toBe(1);
    expect(reg.getIdByName('b')).toBe(1);
    expect(reg.getValueById(0)).toBe(10);
    expect(reg.getNameById(1)).toBe('b');
    expect(reg.getIdByName('missing')).toBeUndefined();
    expect([...reg.entries()]).toEqual([[0, 'a', 10], [1, 'b', 20]]);
  });

  it('rejects duplicate names', () => {
    const reg = new Registry<string>();
    reg.register('stone', 'x');
    expect(() => reg.register('stone', 'y')).toThrow('Registry already contains an entry named "stone"');
    expect(reg.size).toBe(1);
  });
});

describe('createGameData', () => {
  it('registers air at id 0 with an empty mesh', () => {
    const data = testGameData();
    expect(data.blocks.getNameById(0)).toBe('air');
    expect(data.meshes[0]).toEqual({ kind: 'empty' });
  });

  it('resolves face textures per block', () => {
    const data = testGameData();
    const grass = data.meshes[data.blocks.getIdByName('grass') ?? -1];
    expect(grass?.kind).toBe('full_cube');
    if (grass?.kind !== 'full_cube') return;
    expect(grass.textures[BlockFace.TOP]).toEqual(GRASS_TOP_RECT);
    expect(grass.textures[BlockFace.EAST]).toEqual(DIRT_RECT);
    expect(data.meshes[1]).toEqual({ kind: 'full_cube', textures: [STONE_RECT, STONE_RECT, STONE_RECT, STONE_RECT, STONE_RECT, STONE_RECT] });
  });

  it('gives texture-less blocks an empty mesh', () => {
    const data = testGameData();
    expect(data.meshes[data.blocks.getIdByName('glass') ?? -1]).toEqual({ kind: 'empty' });
    expect(data.meshes).toHaveLength(data.blocks.size);
  });

  it('fails on an unknown texture name', () => {
    expect(() =>
      createGameData({
        textures: new Map([['stone', STONE_RECT]]),
        textureAtlas: { width: 1, height: 1, data: new Uint8Array(4) },
        blocks: [{ name: 'stone', faceTextures: ['stone', 'stone', 'stone', 'stone', 'stone', 'nope'] }],
      }),
    ).toThrow('Block "stone" references unknown texture "nope"');
  });

  it('registers an item model and scales it to one block', () => {
    const model = { sizeX: 4, sizeY: 8, sizeZ: 2, voxels: new Uint32Array(64) };
    const data = createGameData({
      textures: new Map(),
      textureAtlas: { width: 1, height: 1, data: new Uint8Array(4) },
      blocks: [],
      items: [{ name: 'torch', texture: 'torch', model }],
    });

    expect(data.items.getIdByName('torch')).toBe(0);
    expect(data.models.getIdByName('item:torch')).toBe(0);
    expect(data.itemMeshes[0]).toEqual({ kind: 'simple_mesh', meshId: 0, scale: 0.125, meshCenter: [2, 4, 1] });
  });
});

describe('validateGameData', () => {
  it('accepts consistent data', () => {
    expect(validateGameData(testGameData())).toEqual([]);
  });

  it('reports a mesh table that does not match the block registry', () => {
    const data = { ...testGameData(), meshes: [{ kind: 'empty' as const }] };
    expect(validateGameData(data)).toEqual(['meshes has 1 entries for 5 blocks']);
  });
});
