/**
 * Binary chunk snapshot encoder/decoder.
 * Format: 65552 bytes total
 *   Header (16 bytes): magic[2], version[1], padding[1], px[4], py[4], pz[4]
 *   Blocks (65536 bytes): 32³ uint16 block ids, x fastest, then y, then z
 * All multi-byte fields are little-endian; chunk coordinates are signed.
 */

import { CHUNK_VOLUME } from '../config';
import type { ChunkPos, Result } from '../types';

const MAGIC = 0x5856; // 'VX'
const VERSION = 1;
export const CHUNK_HEADER_BYTES = 16;
export const CHUNK_FRAME_BYTES = CHUNK_HEADER_BYTES + CHUNK_VOLUME * 2;

/** Wire form of `ToClient.Chunk`: a position and a full block array. */
export interface ChunkSnapshot {
  pos: ChunkPos;
  blocks: Uint16Array;
}

/** Decode a binary chunk frame. */
export function decodeChunk(bytes: Uint8Array): Result<ChunkSnapshot> {
  if (bytes.byteLength !== CHUNK_FRAME_BYTES) {
    return { ok: false, error: new Error(`Invalid chunk size: ${bytes.byteLength}, expected ${CHUNK_FRAME_BYTES}`) };
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const magic = view.getUint16(0, true);
  if (magic !== MAGIC) {
    return {
      ok: false,
      error: new Error(`Invalid chunk magic: 0x${magic.toString(16)}, expected 0x${MAGIC.toString(16)}`),
    };
  }

  const version = view.getUint8(2);
  if (version !== VERSION) {
    return { ok: false, error: new Error(`Unsupported chunk version: ${version}`) };
  }

  const pos: ChunkPos = {
    px: view.getInt32(4, true),
    py: view.getInt32(8, true),
    pz: view.getInt32(12, true),
  };

  const blocks = new Uint16Array(CHUNK_VOLUME);
  for (let i = 0; i < CHUNK_VOLUME; i++) {
    blocks[i] = view.getUint16(CHUNK_HEADER_BYTES + i * 2, true);
  }

  return { ok: true, value: { pos, blocks } };
}

/** Encode a chunk snapshot into a binary frame. */
export function encodeChunk(snapshot: ChunkSnapshot): Uint8Array {
  if (snapshot.blocks.length !== CHUNK_VOLUME) {
    throw new RangeError(`Chunk block array has length ${snapshot.blocks.length}, expected ${CHUNK_VOLUME}`);
  }

  const bytes = new Uint8Array(CHUNK_FRAME_BYTES);
  const view = new DataView(bytes.buffer);

  // Header
  view.setUint16(0, MAGIC, true);
  view.setUint8(2, VERSION);
  view.setUint8(3, 0); // padding
  view.setInt32(4, snapshot.pos.px, true);
  view.setInt32(8, snapshot.pos.py, true);
  view.setInt32(12, snapshot.pos.pz, true);

  for (let i = 0; i < CHUNK_VOLUME; i++) {
    view.setUint16(CHUNK_HEADER_BYTES + i * 2, snapshot.blocks[i] ?? 0, true);
  }

  return bytes;
}

/**
 * Check a snapshot against a registry size.
 * Returns the first unregistered block id found, or undefined if all are known.
 */
export function findUnregisteredBlock(blocks: Uint16Array, registeredCount: number): number | undefined {
  for (let i = 0; i < blocks.length; i++) {
    const id = blocks[i] ?? 0;
    if (id >= registeredCount) return id;
  }
  return undefined;
}
