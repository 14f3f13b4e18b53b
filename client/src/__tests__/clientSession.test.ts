import { describe, it, expect, vi } from 'vitest';
import { CHUNK_VOLUME, DEFAULT_PITCH, validateAndLoadConfig } from '../config';
import { isSessionError, type SessionError } from '../core/errors';
import { ClientSession } from '../engine/ClientSession';
import { createInProcessChannel } from '../net/inProcess';
import type { PlayerInput } from '../types';
import { STONE, layeredBlocks, testGameData } from './fixtures';

function connectedSession(spawn?: { x: number; y: number; z: number }) {
  const { client, server } = createInProcessChannel();
  const session = new ClientSession(client, { spawn });
  return { session, server };
}

function solid(): Uint16Array {
  return new Uint16Array(CHUNK_VOLUME).fill(STONE);
}

function input(overrides: Partial<PlayerInput>): PlayerInput {
  return {
    moveForward: false,
    moveBackward: false,
    moveLeft: false,
    moveRight: false,
    moveUp: false,
    moveDown: false,
    flying: true,
    yaw: 0,
    pitch: DEFAULT_PITCH,
    ...overrides,
  };
}

function tickError(session: ClientSession): SessionError | undefined {
  try {
    session.tick(0.016);
  } catch (err) {
    if (isSessionError(err)) return err;
    throw err;
  }
  return undefined;
}

const ORIGIN = { px: 0, py: 0, pz: 0 };

describe('ClientSession', () => {
  it('applies chunks in arrival order within a tick', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: new Uint16Array(CHUNK_VOLUME) } });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: solid() } });
    const meshed = vi.fn();
    session.events.on('chunk_meshed', meshed);

    session.tick(0.016);

    expect(session.chunks.getBlock(5, 5, 5)).toBe(STONE);
    expect(session.meshes.getMesh(ORIGIN)?.quadCount).toBe(6);
    expect(meshed).toHaveBeenCalledTimes(1);
    expect(session.ticks).toBe(1);
  });

  it('re-meshes a chunk when a neighbor arrives', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: solid() } });
    session.tick(0.016);
    expect(session.meshes.getMesh(ORIGIN)?.quadCount).toBe(6);

    const meshed: string[] = [];
    session.events.on('chunk_meshed', (mesh) => meshed.push(`${mesh.pos.px},${mesh.pos.py},${mesh.pos.pz}`));
    server.send(0, { type: 'Chunk', chunk: { pos: { px: 1, py: 0, pz: 0 }, blocks: solid() } });
    session.tick(0.016);

    expect(meshed.sort()).toEqual(['0,0,0', '1,0,0']);
    expect(session.meshes.getMesh(ORIGIN)?.quadCount).toBe(5);
    expect(session.meshes.getMesh({ px: 1, py: 0, pz: 0 })?.quadCount).toBe(5);
  });

  it('counts mesh versions on the chunk entity', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: solid() } });
    session.tick(0.016);
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: layeredBlocks(1, STONE) } });
    session.tick(0.016);

    const eid = session.world.chunkEntities.getChunkEid(ORIGIN) ?? -1;
    const { MeshRef } = session.world.components;
    expect(MeshRef.version[eid]).toBe(2);
    expect(MeshRef.quadCount[eid]).toBe(6);
  });

  it('ends the session on an unregistered block id', () => {
    const { session, server } = connectedSession();
    const blocks = new Uint16Array(CHUNK_VOLUME);
    blocks[10] = 99;
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks } });

    const err = tickError(session);
    expect(err?.kind).toBe('protocol_desync');
    expect(err?.message).toBe('Chunk 0,0,0 contains block id 99, registry has 5 blocks');
    expect(session.chunks.hasChunk(ORIGIN)).toBe(false);

    const after = tickError(session);
    expect(after?.kind).toBe('session_closed');
    expect(session.isClosed).toBe(true);
    expect(session.closeReason?.kind).toBe('protocol_desync');
  });

  it('treats a chunk before game data as a desync', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: solid() } });

    const err = tickError(session);
    expect(err?.kind).toBe('protocol_desync');
    expect(err?.message).toBe('Chunk 0,0,0 arrived before game data');
  });

  it('keeps the first game data', () => {
    const { session, server } = connectedSession();
    const first = testGameData();
    server.send(0, { type: 'GameData', data: first });
    server.send(0, { type: 'GameData', data: testGameData() });
    session.tick(0.016);
    expect(session.gameData).toBe(first);
  });

  it('ends the session when the server disconnects', () => {
    const { session, server } = connectedSession();
    const onDisconnect = vi.fn();
    session.events.on('disconnected', onDisconnect);
    server.disconnect(0);

    const err = tickError(session);
    expect(err?.kind).toBe('disconnected');
    expect(onDisconnect).toHaveBeenCalledTimes(1);
    expect(session.isClosed).toBe(true);
  });

  it('reports the player position every tick', () => {
    const { session, server } = connectedSession();
    expect(server.receiveEvent()).toEqual({ type: 'ClientConnected', id: 0 });

    session.tick(0.016);
    session.tick(0.016);

    const setPos = { type: 'ClientMessage', id: 0, message: { type: 'SetPos', x: 0.4, y: 1.6, z: 0.4 } };
    expect(server.receiveEvent()).toEqual(setPos);
    expect(server.receiveEvent()).toEqual(setPos);
    expect(server.receiveEvent().type).toBe('NoEvent');
  });

  it('flies through empty space', () => {
    const { session } = connectedSession();
    session.setInput(input({ moveUp: true, moveForward: true }));
    session.tick(0.1);

    const pos = session.playerPosition;
    expect(pos.x).toBeCloseTo(0.4);
    expect(pos.y).toBeCloseTo(3.1);
    expect(pos.z).toBeCloseTo(0.4 - 1.5);
    expect(session.playerRotation).toEqual({ yaw: 0, pitch: DEFAULT_PITCH });
  });

  it('walks down onto the floor and stays there', () => {
    const { session, server } = connectedSession({ x: 0.4, y: 3, z: 0.4 });
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: layeredBlocks(1, STONE) } });
    session.setInput(input({ flying: false }));

    for (let i = 0; i < 10; i++) session.tick(0.1);

    expect(session.playerPosition.y).toBeCloseTo(1.9, 5);
    expect(session.playerOnGround).toBe(true);
  });

  it('keeps player state separate between live sessions', () => {
    const a = connectedSession({ x: 10, y: 5, z: 0 }).session;
    const b = connectedSession({ x: -50, y: 5, z: 0 }).session;

    expect(a.playerPosition.x).toBe(10);
    expect(b.playerPosition.x).toBe(-50);

    b.setInput(input({ moveUp: true }));
    b.tick(0.1);
    a.tick(0.1);

    expect(a.playerPosition).toEqual({ x: 10, y: 5, z: 0 });
    expect(b.playerPosition.x).toBe(-50);
    expect(b.playerPosition.y).toBeCloseTo(6.5);
  });

  it('meshes each dirty chunk at its own position', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: { px: 3, py: -2, pz: 9 }, blocks: solid() } });
    session.tick(0.016);

    expect([...session.meshes.meshes()].map((m) => m.pos)).toEqual([{ px: 3, py: -2, pz: 9 }]);
    expect(session.meshes.getMesh(ORIGIN)).toBeUndefined();
  });

  it('cannot tick after dispose', () => {
    const { session, server } = connectedSession();
    server.send(0, { type: 'GameData', data: testGameData() });
    server.send(0, { type: 'Chunk', chunk: { pos: ORIGIN, blocks: solid() } });
    session.tick(0.016);
    const disposed = vi.fn();
    session.onDispose(disposed);

    session.dispose();

    expect(disposed).toHaveBeenCalledTimes(1);
    expect(session.meshes.size).toBe(0);
    expect(tickError(session)?.kind).toBe('session_closed');
  });

  it('rejects an invalid config', () => {
    const { client } = createInProcessChannel();
    const config = { ...validateAndLoadConfig().config, flySpeed: 0 };
    expect(() => new ClientSession(client, { config })).toThrow('Invalid client config: flySpeed must be greater than 0');
  });
});
