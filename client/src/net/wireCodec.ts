/**
 * Binary framing for the remote transport.
 *
 * Every frame starts with one tag byte:
 *   0  GameData  UTF-8 JSON; byte arrays carried as base64
 *   1  Chunk     chunk frame (see chunkCodec)
 *   2  SetPos    3 × float64 LE
 */

import { Buffer } from 'node:buffer';
import type { AtlasImage, Block, BlockMesh, FaceTextures, Item, ItemMesh, Result, TextureRect, VoxelModel } from '../types';
import { Registry, type GameData } from '../world/blockRegistry';
import { decodeChunk, encodeChunk } from '../world/chunkCodec';
import type { ToClient, ToServer } from './protocol';

export const TAG_GAME_DATA = 0;
export const TAG_CHUNK = 1;
export const TAG_SET_POS = 2;

const SET_POS_BYTES = 1 + 3 * 8;

class WireFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireFormatError';
  }
}

// ── GameData JSON ───────────────────────────────────────────────

interface GameDataWire {
  blocks: Block[];
  meshes: BlockMesh[];
  textureAtlas: { width: number; height: number; data: string };
  models: { name: string; sizeX: number; sizeY: number; sizeZ: number; voxels: string }[];
  items: Item[];
  itemMeshes: ItemMesh[];
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function uint32ToBase64(values: Uint32Array): string {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < values.length; i++) view.setUint32(i * 4, values[i] ?? 0, true);
  return toBase64(bytes);
}

function gameDataToWire(data: GameData): GameDataWire {
  return {
    blocks: [...data.blocks.entries()].map(([, , block]) => block),
    meshes: [...data.meshes],
    textureAtlas: {
      width: data.textureAtlas.width,
      height: data.textureAtlas.height,
      data: toBase64(data.textureAtlas.data),
    },
    models: [...data.models.entries()].map(([, name, model]) => ({
      name,
      sizeX: model.sizeX,
      sizeY: model.sizeY,
      sizeZ: model.sizeZ,
      voxels: uint32ToBase64(model.voxels),
    })),
    items: [...data.items.entries()].map(([, , item]) => item),
    itemMeshes: [...data.itemMeshes],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(obj: Record<string, unknown>, key: string, path: string): unknown {
  if (!(key in obj)) throw new WireFormatError(`${path}.${key} is missing`);
  return obj[key];
}

function asRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new WireFormatError(`${path} must be an object`);
  return value;
}

function asArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new WireFormatError(`${path} must be an array`);
  return value;
}

function asNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new WireFormatError(`${path} must be a finite number`);
  return value;
}

function asString(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new WireFormatError(`${path} must be a string`);
  return value;
}

function asSix<T>(value: unknown, path: string, parse: (v: unknown, p: string) => T): readonly [T, T, T, T, T, T] {
  const arr = asArray(value, path);
  if (arr.length !== 6) throw new WireFormatError(`${path} must have 6 entries`);
  return [
    parse(arr[0], `${path}[0]`),
    parse(arr[1], `${path}[1]`),
    parse(arr[2], `${path}[2]`),
    parse(arr[3], `${path}[3]`),
    parse(arr[4], `${path}[4]`),
    parse(arr[5], `${path}[5]`),
  ];
}

function parseRect(value: unknown, path: string): TextureRect {
  const o = asRecord(value, path);
  return {
    x: asNumber(field(o, 'x', path), `${path}.x`),
    y: asNumber(field(o, 'y', path), `${path}.y`),
    width: asNumber(field(o, 'width', path), `${path}.width`),
    height: asNumber(field(o, 'height', path), `${path}.height`),
  };
}

function parseBlockMesh(value: unknown, path: string): BlockMesh {
  const o = asRecord(value, path);
  const kind = field(o, 'kind', path);
  if (kind === 'empty') return { kind: 'empty' };
  if (kind === 'full_cube') {
    const textures: FaceTextures = asSix(field(o, 'textures', path), `${path}.textures`, parseRect);
    return { kind: 'full_cube', textures };
  }
  throw new WireFormatError(`${path}.kind "${String(kind)}" is not a block mesh`);
}

function parseBlock(value: unknown, path: string): Block {
  const o = asRecord(value, path);
  const name = asString(field(o, 'name', path), `${path}.name`);
  const bt = asRecord(field(o, 'blockType', path), `${path}.blockType`);
  const kind = field(bt, 'kind', `${path}.blockType`);
  if (kind === 'air') return { name, blockType: { kind: 'air' } };
  if (kind === 'normal_cube') {
    const faceTextures = asSix(field(bt, 'faceTextures', `${path}.blockType`), `${path}.blockType.faceTextures`, asString);
    return { name, blockType: { kind: 'normal_cube', faceTextures } };
  }
  throw new WireFormatError(`${path}.blockType.kind "${String(kind)}" is not a block type`);
}

function parseItem(value: unknown, path: string): Item {
  const o = asRecord(value, path);
  const it = asRecord(field(o, 'itemType', path), `${path}.itemType`);
  if (field(it, 'kind', `${path}.itemType`) !== 'normal_item') {
    throw new WireFormatError(`${path}.itemType.kind is not an item type`);
  }
  return {
    name: asString(field(o, 'name', path), `${path}.name`),
    itemType: { kind: 'normal_item', texture: asString(field(it, 'texture', `${path}.itemType`), `${path}.itemType.texture`) },
  };
}

function parseItemMesh(value: unknown, path: string): ItemMesh {
  const o = asRecord(value, path);
  if (field(o, 'kind', path) !== 'simple_mesh') throw new WireFormatError(`${path}.kind is not an item mesh`);
  const center = asArray(field(o, 'meshCenter', path), `${path}.meshCenter`);
  if (center.length !== 3) throw new WireFormatError(`${path}.meshCenter must have 3 entries`);
  return {
    kind: 'simple_mesh',
    meshId: asNumber(field(o, 'meshId', path), `${path}.meshId`),
    scale: asNumber(field(o, 'scale', path), `${path}.scale`),
    meshCenter: [
      asNumber(center[0], `${path}.meshCenter[0]`),
      asNumber(center[1], `${path}.meshCenter[1]`),
      asNumber(center[2], `${path}.meshCenter[2]`),
    ],
  };
}

function parseAtlas(value: unknown): AtlasImage {
  const o = asRecord(value, 'textureAtlas');
  const width = asNumber(field(o, 'width', 'textureAtlas'), 'textureAtlas.width');
  const height = asNumber(field(o, 'height', 'textureAtlas'), 'textureAtlas.height');
  const data = new Uint8Array(Buffer.from(asString(field(o, 'data', 'textureAtlas'), 'textureAtlas.data'), 'base64'));
  if (data.length !== width * height * 4) {
    throw new WireFormatError(`textureAtlas.data has ${data.length} bytes, expected ${width * height * 4}`);
  }
  return { width, height, data };
}

function parseModel(value: unknown, path: string): [string, VoxelModel] {
  const o = asRecord(value, path);
  const sizeX = asNumber(field(o, 'sizeX', path), `${path}.sizeX`);
  const sizeY = asNumber(field(o, 'sizeY', path), `${path}.sizeY`);
  const sizeZ = asNumber(field(o, 'sizeZ', path), `${path}.sizeZ`);
  const bytes = Buffer.from(asString(field(o, 'voxels', path), `${path}.voxels`), 'base64');
  if (bytes.length !== sizeX * sizeY * sizeZ * 4) {
    throw new WireFormatError(`${path}.voxels has ${bytes.length} bytes, expected ${sizeX * sizeY * sizeZ * 4}`);
  }
  const voxels = new Uint32Array(bytes.length / 4);
  for (let i = 0; i < voxels.length; i++) voxels[i] = bytes.readUInt32LE(i * 4);
  return [asString(field(o, 'name', path), `${path}.name`), { sizeX, sizeY, sizeZ, voxels }];
}

function gameDataFromWire(value: unknown): GameData {
  const o = asRecord(value, 'gameData');

  const blocks = new Registry<Block>();
  asArray(field(o, 'blocks', 'gameData'), 'blocks').forEach((b, i) => {
    const block = parseBlock(b, `blocks[${i}]`);
    blocks.register(block.name, block);
  });
  const meshes = asArray(field(o, 'meshes', 'gameData'), 'meshes').map((m, i) => parseBlockMesh(m, `meshes[${i}]`));

  const models = new Registry<VoxelModel>();
  asArray(field(o, 'models', 'gameData'), 'models').forEach((m, i) => {
    const [name, model] = parseModel(m, `models[${i}]`);
    models.register(name, model);
  });

  const items = new Registry<Item>();
  asArray(field(o, 'items', 'gameData'), 'items').forEach((it, i) => {
    const item = parseItem(it, `items[${i}]`);
    items.register(item.name, item);
  });
  const itemMeshes = asArray(field(o, 'itemMeshes', 'gameData'), 'itemMeshes').map((m, i) =>
    parseItemMesh(m, `itemMeshes[${i}]`),
  );

  return { blocks, meshes, textureAtlas: parseAtlas(field(o, 'textureAtlas', 'gameData')), models, items, itemMeshes };
}

// ── Frames ──────────────────────────────────────────────────────

function withTag(tag: number, payload: Uint8Array): Uint8Array {
  const frame = new Uint8Array(payload.length + 1);
  frame[0] = tag;
  frame.set(payload, 1);
  return frame;
}

export function encodeToClient(message: ToClient): Uint8Array {
  switch (message.type) {
    case 'GameData':
      return withTag(TAG_GAME_DATA, new TextEncoder().encode(JSON.stringify(gameDataToWire(message.data))));
    case 'Chunk':
      return withTag(TAG_CHUNK, encodeChunk(message.chunk));
  }
}

export function encodeToServer(message: ToServer): Uint8Array {
  const frame = new Uint8Array(SET_POS_BYTES);
  const view = new DataView(frame.buffer);
  view.setUint8(0, TAG_SET_POS);
  view.setFloat64(1, message.x, true);
  view.setFloat64(9, message.y, true);
  view.setFloat64(17, message.z, true);
  return frame;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function decodeToClient(frame: Uint8Array): Result<ToClient> {
  if (frame.length === 0) return { ok: false, error: new WireFormatError('Empty frame') };
  const payload = frame.subarray(1);

  switch (frame[0]) {
    case TAG_GAME_DATA:
      try {
        const json: unknown = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(payload));
        return { ok: true, value: { type: 'GameData', data: gameDataFromWire(json) } };
      } catch (err) {
        return { ok: false, error: toError(err) };
      }
    case TAG_CHUNK: {
      const decoded = decodeChunk(payload);
      if (!decoded.ok) return decoded;
      return { ok: true, value: { type: 'Chunk', chunk: decoded.value } };
    }
    default:
      return { ok: false, error: new WireFormatError(`Unknown client-bound tag ${String(frame[0])}`) };
  }
}

export function decodeToServer(frame: Uint8Array): Result<ToServer> {
  if (frame[0] !== TAG_SET_POS) {
    return { ok: false, error: new WireFormatError(`Unknown server-bound tag ${String(frame[0])}`) };
  }
  if (frame.length !== SET_POS_BYTES) {
    return { ok: false, error: new WireFormatError(`SetPos frame has ${frame.length} bytes, expected ${SET_POS_BYTES}`) };
  }
  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  return {
    ok: true,
    value: { type: 'SetPos', x: view.getFloat64(1, true), y: view.getFloat64(9, true), z: view.getFloat64(17, true) },
  };
}
