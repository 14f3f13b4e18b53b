import { describe, it, expect } from 'vitest';

import { VERTEX_STRIDE } from '../config';
import type { ChunkMeshData } from '../types';
import { Chunk } from '../world/chunk';
import { ChunkStore } from '../world/chunkStore';
import { MeshScratch, greedyMeshChunk } from '../world/greedyMesher';
import { AdjacentChunkOcclusion } from '../world/occlusion';
import { DIRT, DIRT_RECT, GRASS, GRASS_TOP_RECT, STONE, chunkWith, layeredBlocks, testGameData } from './fixtures';

const { meshes } = testGameData();
const origin = { px: 0, py: 0, pz: 0 };

type V3 = [number, number, number];

function attr(mesh: ChunkMeshData, vertex: number, offset: number, size: number): number[] {
  const base = vertex * VERTEX_STRIDE + offset;
  return Array.from(mesh.vertices.subarray(base, base + size));
}

function vertexPos(mesh: ChunkMeshData, vertex: number): V3 {
  const [x = 0, y = 0, z = 0] = attr(mesh, vertex, 0, 3);
  return [x, y, z];
}

/** Normals of every quad, read from each quad's first vertex. */
function quadNormals(mesh: ChunkMeshData): string[] {
  const normals: string[] = [];
  for (let q = 0; q < mesh.quadCount; q++) normals.push(attr(mesh, q * 4, 3, 3).join(','));
  return normals;
}

/** Geometric normal of triangle (a, b, c) by the right-hand rule. */
function triangleNormal(a: V3, b: V3, c: V3): V3 {
  const e1: V3 = [b[0] - a[0], b[1] - a[1], b[2] - a[2]];
  const e2: V3 = [c[0] - a[0], c[1] - a[1], c[2] - a[2]];
  return [e1[1] * e2[2] - e1[2] * e2[1], e1[2] * e2[0] - e1[0] * e2[2], e1[0] * e2[1] - e1[1] * e2[0]];
}

function surroundedStore(center: Chunk, neighborId: number): ChunkStore {
  const store = new ChunkStore();
  for (let dz = -1; dz <= 1; dz++) {
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (dx === 0 && dy === 0 && dz === 0) continue;
        store.setChunk(Chunk.filled({ px: dx, py: dy, pz: dz }, neighborId));
      }
    }
  }
  store.setChunk(center);
  return store;
}

describe('greedyMeshChunk', () => {
  it('emits nothing for an all-air chunk', () => {
    const mesh = greedyMeshChunk(Chunk.filled(origin, 0), AdjacentChunkOcclusion.empty(), meshes);
    expect(mesh.quadCount).toBe(0);
    expect(mesh.vertices).toHaveLength(0);
    expect(mesh.indices).toHaveLength(0);
  });

  it('emits six outward quads for an isolated block', () => {
    const chunk = chunkWith({ px: 1, py: -1, pz: 0 }, [[5, 6, 7, STONE]]);
    const mesh = greedyMeshChunk(chunk, AdjacentChunkOcclusion.empty(), meshes);

    expect(mesh.quadCount).toBe(6);
    expect(mesh.vertices).toHaveLength(24 * VERTEX_STRIDE);
    expect(mesh.indices).toHaveLength(36);
    expect(mesh.origin).toEqual([32, -32, 0]);
    expect(quadNormals(mesh)).toEqual(['1,0,0', '-1,0,0', '0,1,0', '0,-1,0', '0,0,1', '0,0,-1']);

    for (let q = 0; q < 6; q++) {
      const [i0 = 0, i1 = 0, i2 = 0] = Array.from(mesh.indices.subarray(q * 6, q * 6 + 3));
      const geometric = triangleNormal(vertexPos(mesh, i0), vertexPos(mesh, i1), vertexPos(mesh, i2));
      const stored = attr(mesh, i0, 3, 3);
      const dot = geometric[0] * (stored[0] ?? 0) + geometric[1] * (stored[1] ?? 0) + geometric[2] * (stored[2] ?? 0);
      expect(dot).toBeGreaterThan(0);
    }
  });

  it('places each face on the block boundary', () => {
    const chunk = chunkWith(origin, [[5, 6, 7, STONE]]);
    const mesh = greedyMeshChunk(chunk, AdjacentChunkOcclusion.empty(), meshes);

    // +X quad comes first; its four corners lie on x = 6
    expect([0, 1, 2, 3].map((v) => vertexPos(mesh, v)[0])).toEqual([6, 6, 6, 6]);
    // -X quad second; x = 5
    expect([4, 5, 6, 7].map((v) => vertexPos(mesh, v)[0])).toEqual([5, 5, 5, 5]);
  });

  it('merges a full layer into a single top quad', () => {
    const chunk = Chunk.fromBlocks(origin, layeredBlocks(1, STONE));
    const mesh = greedyMeshChunk(chunk, AdjacentChunkOcclusion.empty(), meshes);

    const tops = quadNormals(mesh).flatMap((n, q) => (n === '0,1,0' ? [q] : []));
    expect(tops).toEqual([2]);
    expect([8, 9, 10, 11].map((v) => vertexPos(mesh, v))).toEqual([
      [0, 1, 0],
      [0, 1, 32],
      [32, 1, 32],
      [32, 1, 0],
    ]);
    expect(attr(mesh, 10, 6, 2)).toEqual([32, 32]);
    expect(mesh.quadCount).toBe(6);
  });

  it('draws only the exposed face when every neighbor is solid', () => {
    const chunk = Chunk.fromBlocks(origin, layeredBlocks(1, STONE));
    const store = surroundedStore(chunk, STONE);
    const occlusion = AdjacentChunkOcclusion.fromStore(store, origin, meshes);
    const mesh = greedyMeshChunk(chunk, occlusion, meshes);

    expect(quadNormals(mesh)).toEqual(['0,1,0']);
  });

  it('emits nothing for a solid chunk enclosed by solid neighbors', () => {
    const chunk = Chunk.filled(origin, STONE);
    const store = surroundedStore(chunk, STONE);
    const mesh = greedyMeshChunk(chunk, AdjacentChunkOcclusion.fromStore(store, origin, meshes), meshes);
    expect(mesh.quadCount).toBe(0);
  });

  it('draws faces against unknown neighbors', () => {
    const mesh = greedyMeshChunk(Chunk.filled(origin, STONE), AdjacentChunkOcclusion.empty(), meshes);
    expect(mesh.quadCount).toBe(6);
    for (let q = 0; q < 6; q++) {
      expect(attr(mesh, q * 4 + 2, 6, 2)).toEqual([32, 32]);
    }
  });

  it('hides a boundary face behind an opaque neighbor block', () => {
    const chunk = chunkWith(origin, [[31, 0, 0, STONE]]);
    const store = new ChunkStore();
    store.setChunk(chunkWith({ px: 1, py: 0, pz: 0 }, [[0, 0, 0, STONE]]));
    const mesh = greedyMeshChunk(chunk, AdjacentChunkOcclusion.fromStore(store, origin, meshes), meshes);

    expect(mesh.quadCount).toBe(5);
    expect(quadNormals(mesh)).not.toContain('1,0,0');
  });

  it('does not merge faces of different blocks', () => {
    const same = greedyMeshChunk(chunkWith(origin, [[0, 0, 0, STONE], [1, 0, 0, STONE]]), AdjacentChunkOcclusion.empty(), meshes);
    const mixed = greedyMeshChunk(chunkWith(origin, [[0, 0, 0, STONE], [1, 0, 0, DIRT]]), AdjacentChunkOcclusion.empty(), meshes);

    expect(same.quadCount).toBe(6);
    expect(mixed.quadCount).toBe(10);
  });

  it('takes the atlas rect from the face being drawn', () => {
    const mesh = greedyMeshChunk(chunkWith(origin, [[0, 0, 0, GRASS]]), AdjacentChunkOcclusion.empty(), meshes);
    const rect = (q: number): number[] => attr(mesh, q * 4, 8, 4);

    expect(rect(2)).toEqual([GRASS_TOP_RECT.x, GRASS_TOP_RECT.y, GRASS_TOP_RECT.width, GRASS_TOP_RECT.height]);
    expect(rect(0)).toEqual([DIRT_RECT.x, DIRT_RECT.y, DIRT_RECT.width, DIRT_RECT.height]);
  });

  it('is deterministic and leaves earlier output intact when the scratch is reused', () => {
    const scratch = new MeshScratch();
    const chunk = chunkWith(origin, [[3, 3, 3, STONE], [4, 3, 3, DIRT], [10, 0, 31, GRASS]]);
    const first = greedyMeshChunk(chunk, AdjacentChunkOcclusion.empty(), meshes, scratch);
    const firstCopy = first.vertices.slice();
    greedyMeshChunk(Chunk.filled(origin, STONE), AdjacentChunkOcclusion.empty(), meshes, scratch);
    const again = greedyMeshChunk(chunk, AdjacentChunkOcclusion.empty(), meshes, scratch);

    expect(first.vertices).toEqual(firstCopy);
    expect(again.vertices).toEqual(first.vertices);
    expect(again.indices).toEqual(first.indices);
    expect(again.quadCount).toBe(first.quadCount);
  });
});
