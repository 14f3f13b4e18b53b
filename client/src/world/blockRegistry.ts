/**
 * Name-to-id registries and the immutable game data a session is built on.
 *
 * Ids are dense and assigned in registration order. The block registry always
 * starts with air at id 0, whose mesh is Empty. After `createGameData`
 * returns, nothing in the client mutates these tables.
 */

import { AIR_BLOCK_ID } from '../config';
import { createLogger } from '../core/logger';
import type {
  AtlasImage,
  Block,
  BlockMesh,
  FaceTextures,
  Item,
  ItemMesh,
  TextureRect,
  VoxelModel,
} from '../types';

const log = createLogger('Registry');

export class Registry<T> {
  private readonly names: string[] = [];
  private readonly values: T[] = [];
  private readonly ids = new Map<string, number>();

  /** Register a value under a unique name and return its id. */
  register(name: string, value: T): number {
    if (this.ids.has(name)) {
      throw new Error(`Registry already contains an entry named "${name}"`);
    }
    const id = this.values.length;
    this.names.push(name);
    this.values.push(value);
    this.ids.set(name, id);
    return id;
  }

  getIdByName(name: string): number | undefined {
    return this.ids.get(name);
  }

  getValueById(id: number): T | undefined {
    return this.values[id];
  }

  getNameById(id: number): string | undefined {
    return this.names[id];
  }

  get size(): number {
    return this.values.length;
  }

  *entries(): IterableIterator<[id: number, name: string, value: T]> {
    for (let i = 0; i < this.values.length; i++) {
      const name = this.names[i];
      const value = this.values[i];
      if (name !== undefined && value !== undefined) yield [i, name, value];
    }
  }
}

/** Everything the server sends once at session start. */
export interface GameData {
  blocks: Registry<Block>;
  /** Indexed by block id; same length as `blocks`. */
  meshes: readonly BlockMesh[];
  textureAtlas: AtlasImage;
  models: Registry<VoxelModel>;
  items: Registry<Item>;
  /** Indexed by item id; same length as `items`. */
  itemMeshes: readonly ItemMesh[];
}

export interface BlockDefinition {
  name: string;
  /** Texture names in BlockFace order; omitted for air-like blocks. */
  faceTextures?: readonly [string, string, string, string, string, string];
}

export interface ItemDefinition {
  name: string;
  texture: string;
  /** Model registered for the item, with its center and scale. */
  model: VoxelModel;
}

export interface GameDataDefinitions {
  /** Texture name → atlas rect, as produced by the texture packer. */
  textures: ReadonlyMap<string, TextureRect>;
  textureAtlas: AtlasImage;
  blocks: readonly BlockDefinition[];
  models?: ReadonlyMap<string, VoxelModel>;
  items?: readonly ItemDefinition[];
}

function lookupTexture(textures: ReadonlyMap<string, TextureRect>, name: string, owner: string): TextureRect {
  const rect = textures.get(name);
  if (!rect) {
    throw new Error(`Block "${owner}" references unknown texture "${name}"`);
  }
  return rect;
}

/**
 * Build registries and meshes from already-loaded definitions.
 * Air is registered first at id 0 with an Empty mesh; `blocks` may not redefine it.
 */
export function createGameData(defs: GameDataDefinitions): GameData {
  const blocks = new Registry<Block>();
  const meshes: BlockMesh[] = [];

  const airId = blocks.register('air', { name: 'air', blockType: { kind: 'air' } });
  meshes.push({ kind: 'empty' });
  if (airId !== AIR_BLOCK_ID) {
    throw new Error(`Air registered with id ${airId}, expected ${AIR_BLOCK_ID}`);
  }

  for (const def of defs.blocks) {
    if (def.faceTextures) {
      const names = def.faceTextures;
      const textures: FaceTextures = [
        lookupTexture(defs.textures, names[0], def.name),
        lookupTexture(defs.textures, names[1], def.name),
        lookupTexture(defs.textures, names[2], def.name),
        lookupTexture(defs.textures, names[3], def.name),
        lookupTexture(defs.textures, names[4], def.name),
        lookupTexture(defs.textures, names[5], def.name),
      ];
      blocks.register(def.name, { name: def.name, blockType: { kind: 'normal_cube', faceTextures: names } });
      meshes.push({ kind: 'full_cube', textures });
    } else {
      blocks.register(def.name, { name: def.name, blockType: { kind: 'air' } });
      meshes.push({ kind: 'empty' });
    }
  }

  const models = new Registry<VoxelModel>();
  for (const [name, model] of defs.models ?? []) {
    models.register(name, model);
  }

  const items = new Registry<Item>();
  const itemMeshes: ItemMesh[] = [];
  for (const def of defs.items ?? []) {
    const meshId = models.register(`item:${def.name}`, def.model);
    items.register(def.name, { name: def.name, itemType: { kind: 'normal_item', texture: def.texture } });
    itemMeshes.push({
      kind: 'simple_mesh',
      meshId,
      scale: 1 / Math.max(def.model.sizeX, def.model.sizeY),
      meshCenter: [def.model.sizeX / 2, def.model.sizeY / 2, def.model.sizeZ / 2],
    });
  }

  log.info(`Registered ${blocks.size} blocks, ${items.size} items, ${models.size} models`);

  return { blocks, meshes, textureAtlas: defs.textureAtlas, models, items, itemMeshes };
}

/**
 * Check the one-descriptor-per-block invariant on game data received from a peer.
 * Returns a list of problems; empty means the data is usable.
 */
export function validateGameData(data: GameData): string[] {
  const errors: string[] = [];
  if (data.meshes.length !== data.blocks.size) {
    errors.push(`meshes has ${data.meshes.length} entries for ${data.blocks.size} blocks`);
  }
  const air = data.meshes[AIR_BLOCK_ID];
  if (!air || air.kind !== 'empty') {
    errors.push('block 0 must be air with an Empty mesh');
  }
  if (data.itemMeshes.length !== data.items.size) {
    errors.push(`itemMeshes has ${data.itemMeshes.length} entries for ${data.items.size} items`);
  }
  return errors;
}
