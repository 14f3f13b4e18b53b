/**
 * Published chunk meshes, keyed by chunk position, plus the THREE geometry
 * built from each. Publishing a mesh for a position replaces (and disposes)
 * the previous one.
 *
 * Geometry shares the mesh's vertex buffer through an interleaved buffer:
 * position(3) normal(3) uv(2) atlasRect(4).
 */

import * as THREE from 'three';
import { VERTEX_STRIDE } from '../config';
import { chunkPosKey, type ChunkKey, type ChunkMeshData, type ChunkPos } from '../types';

interface MeshEntry {
  data: ChunkMeshData;
  geometry: THREE.BufferGeometry;
}

/** Build a BufferGeometry over a chunk mesh. Positions stay chunk-local; place the mesh at `origin`. */
export function createChunkGeometry(data: ChunkMeshData): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  const buffer = new THREE.InterleavedBuffer(data.vertices, VERTEX_STRIDE);
  geometry.setAttribute('position', new THREE.InterleavedBufferAttribute(buffer, 3, 0));
  geometry.setAttribute('normal', new THREE.InterleavedBufferAttribute(buffer, 3, 3));
  geometry.setAttribute('uv', new THREE.InterleavedBufferAttribute(buffer, 2, 6));
  geometry.setAttribute('atlasRect', new THREE.InterleavedBufferAttribute(buffer, 4, 8));
  geometry.setIndex(new THREE.BufferAttribute(data.indices, 1));
  geometry.computeBoundingSphere();
  return geometry;
}

export class ChunkMeshStore {
  private readonly entries = new Map<ChunkKey, MeshEntry>();

  /** Install the mesh for `data.pos`, disposing any geometry it replaces. */
  publish(data: ChunkMeshData): THREE.BufferGeometry {
    const key = chunkPosKey(data.pos);
    this.entries.get(key)?.geometry.dispose();
    const geometry = createChunkGeometry(data);
    this.entries.set(key, { data, geometry });
    return geometry;
  }

  getMesh(pos: ChunkPos): ChunkMeshData | undefined {
    return this.entries.get(chunkPosKey(pos))?.data;
  }

  getGeometry(pos: ChunkPos): THREE.BufferGeometry | undefined {
    return this.entries.get(chunkPosKey(pos))?.geometry;
  }

  get size(): number {
    return this.entries.size;
  }

  get totalQuads(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.data.quadCount;
    return total;
  }

  *meshes(): IterableIterator<ChunkMeshData> {
    for (const entry of this.entries.values()) yield entry.data;
  }

  dispose(): void {
    for (const entry of this.entries.values()) entry.geometry.dispose();
    this.entries.clear();
  }
}
