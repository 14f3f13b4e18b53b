/**
 * ClientSession: the tick-driven update scheduler.
 *
 * Owns the ECS world and every resource the systems share. The ECS pipeline
 * (runPipeline) is the SOLE update path; the chunk store is written and the
 * mesher invoked only from inside `tick`.
 *
 * A SessionError raised by any system ends the session: it is rethrown from
 * that tick, and every later tick throws `session_closed`.
 */

import {
  DEFAULT_PITCH,
  DEFAULT_YAW,
  SPAWN_POSITION,
  validateAndLoadConfig,
  type ClientRuntimeConfig,
} from '../config';
import { SessionError, isSessionError } from '../core/errors';
import { EventBus, type SessionEventMap } from '../core/eventBus';
import { FrameStats, type FrameStatsSnapshot } from '../core/frameStats';
import { createLogger } from '../core/logger';
import {
  ChunkEntityMap,
  createClientWorld,
  createComponents,
  createPlayerEntity,
  runPipeline,
  type ClientWorld,
} from '../ecs';
import type { Client } from '../net/protocol';
import type { PlayerInput, Vec3, YawPitch } from '../types';
import type { GameData } from '../world/blockRegistry';
import { ChunkMeshStore } from '../world/chunkMeshStore';
import { ChunkStore } from '../world/chunkStore';
import { MeshScratch } from '../world/greedyMesher';

const log = createLogger('ClientSession');

export interface ClientSessionOptions {
  config?: ClientRuntimeConfig;
  spawn?: Vec3;
}

function idleInput(): PlayerInput {
  return {
    moveForward: false,
    moveBackward: false,
    moveLeft: false,
    moveRight: false,
    moveUp: false,
    moveDown: false,
    flying: true,
    yaw: DEFAULT_YAW,
    pitch: DEFAULT_PITCH,
  };
}

export class ClientSession {
  readonly world: ClientWorld;
  readonly events = new EventBus<SessionEventMap>();
  readonly config: ClientRuntimeConfig;

  private failure: SessionError | undefined;
  private tickCount = 0;
  private disposeCallbacks: (() => void)[] = [];

  constructor(client: Client, options: ClientSessionOptions = {}) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new Error(`Invalid client config: ${errors.join('; ')}`);
    }
    this.config = config;

    this.world = createClientWorld({
      components: createComponents(),
      client,
      chunks: new ChunkStore(),
      gameData: undefined,
      meshes: new ChunkMeshStore(),
      chunkEntities: new ChunkEntityMap(),
      scratch: new MeshScratch(),
      events: this.events,
      stats: new FrameStats(),
      input: idleInput(),
      speeds: { flySpeed: config.flySpeed, walkSpeed: config.walkSpeed },
      player: -1,
    });
    this.world.player = createPlayerEntity(this.world, options.spawn ?? SPAWN_POSITION);

    log.info(`${config.appName} session created`);
  }

  // ── Tick ────────────────────────────────────────────────────────

  /**
   * Advance the session by `delta` seconds: apply server messages, re-mesh
   * dirty chunks, move the player, report its position.
   */
  tick(delta: number): void {
    if (this.failure) {
      throw new SessionError('session_closed', `Session ended: ${this.failure.message}`, { cause: this.failure });
    }

    try {
      runPipeline(this.world, delta);
    } catch (err) {
      if (isSessionError(err)) {
        this.failure = err;
        if (err.kind === 'protocol_desync') {
          log.error('protocol desync:', err.message);
        } else if (err.kind === 'disconnected') {
          log.warn('disconnected:', err.message);
        } else {
          log.info('session ended:', err.message);
        }
      }
      throw err;
    }

    this.tickCount++;
    this.world.stats.addFrame();
  }

  // ── Input ───────────────────────────────────────────────────────

  /** Input applied from the next tick on. */
  setInput(input: PlayerInput): void {
    this.world.input = input;
  }

  // ── Accessors ───────────────────────────────────────────────────

  get isClosed(): boolean {
    return this.failure !== undefined;
  }

  /** The error that ended the session, if any. */
  get closeReason(): SessionError | undefined {
    return this.failure;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get chunks(): ChunkStore {
    return this.world.chunks;
  }

  get meshes(): ChunkMeshStore {
    return this.world.meshes;
  }

  get gameData(): GameData | undefined {
    return this.world.gameData;
  }

  get playerPosition(): Vec3 {
    const { Position } = this.world.components;
    const eid = this.world.player;
    return { x: Position.x[eid] ?? 0, y: Position.y[eid] ?? 0, z: Position.z[eid] ?? 0 };
  }

  get playerRotation(): YawPitch {
    const { Rotation } = this.world.components;
    const eid = this.world.player;
    return { yaw: Rotation.yaw[eid] ?? 0, pitch: Rotation.pitch[eid] ?? 0 };
  }

  get playerOnGround(): boolean {
    return this.world.components.OnGround.value[this.world.player] === 1;
  }

  stats(): FrameStatsSnapshot {
    return this.world.stats.snapshot();
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /** Register a callback to run on session dispose. */
  onDispose(fn: () => void): void {
    this.disposeCallbacks.push(fn);
  }

  /** Release geometries, chunk entities and listeners. The session cannot tick afterwards. */
  dispose(): void {
    for (const fn of this.disposeCallbacks) fn();
    this.disposeCallbacks = [];
    this.world.meshes.dispose();
    this.world.chunkEntities.clear(this.world);
    this.events.clear();
    this.failure ??= new SessionError('session_closed', 'Session disposed');
    log.info('session disposed');
  }
}
