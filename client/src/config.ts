/**
 * Global constants for the Voxelmere client.
 * All magic numbers live here, nowhere else.
 */

import { isLogLevel, type LogLevel } from './core/logger';

// ── World Dimensions ────────────────────────────────────────────
export const APP_NAME = 'Voxelmere';
export const CHUNK_SIZE = 32;
export const CHUNK_VOLUME = CHUNK_SIZE * CHUNK_SIZE * CHUNK_SIZE; // 32768
export const CHUNK_LAYER = CHUNK_SIZE * CHUNK_SIZE; // 1024

/** Block id reserved for air in every registry. */
export const AIR_BLOCK_ID = 0;

// ── Meshing ─────────────────────────────────────────────────────
/** Floats per emitted vertex: position(3) + normal(3) + uv(2) + atlas rect(4). */
export const VERTEX_STRIDE = 12;
export const VERTICES_PER_QUAD = 4;
export const INDICES_PER_QUAD = 6;

// ── Player ──────────────────────────────────────────────────────
export const PLAYER_HALF_EXTENTS = { x: 0.4, y: 0.9, z: 0.4 } as const;
export const SPAWN_POSITION = { x: 0.4, y: 1.6, z: 0.4 } as const;
export const DEFAULT_YAW = -127;
export const DEFAULT_PITCH = -17;

// ── Movement ────────────────────────────────────────────────────
export const FLY_SPEED = 15; // blocks/s
export const WALK_SPEED = 4.3; // blocks/s
export const JUMP_SPEED = 8; // blocks/s upward
export const GRAVITY = 25; // blocks/s²
export const TERMINAL_VELOCITY = 50; // blocks/s

/** Tolerance used by the collision sweep when comparing against block faces. */
export const COLLISION_EPSILON = 1e-7;

// ── Loop ────────────────────────────────────────────────────────
export const TICK_RATE = 60; // ticks/s for the headless loop
export const DEFAULT_SERVER_URL = 'ws://localhost:9000';

// ── Input ───────────────────────────────────────────────────────
export const MOUSE_SPEED = 0.2; // degrees per pixel

// ── Frame Stats ─────────────────────────────────────────────────
export const FPS_WINDOW_SECONDS = 2;

// ── Client Runtime Config Loading ──────────────────────────────

/** Chunk radii (+x, -x, +y, -y, +z, -z) the server is asked to stream. */
export type RenderDistance = readonly [number, number, number, number, number, number];

export interface ClientRuntimeConfig {
  appName: string;
  chunkSize: number;
  mouseSpeed: number;
  invertMouse: boolean;
  flySpeed: number;
  walkSpeed: number;
  renderDistance: RenderDistance;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: ClientRuntimeConfig;
  errors: string[];
}

const DEFAULT_RUNTIME_CONFIG: ClientRuntimeConfig = {
  appName: APP_NAME,
  chunkSize: CHUNK_SIZE,
  mouseSpeed: MOUSE_SPEED,
  invertMouse: false,
  flySpeed: FLY_SPEED,
  walkSpeed: WALK_SPEED,
  renderDistance: [0, 0, 0, 0, 0, 0],
  logLevel: 'info',
};

const POSITIVE_NUMBER_FIELDS = [
  'mouseSpeed',
  'flySpeed',
  'walkSpeed',
] as const;

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<ClientRuntimeConfig> = {},
): ConfigValidationResult {
  const config: ClientRuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  const errors: string[] = [];

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  if (typeof config.appName !== 'string' || config.appName.trim().length === 0) {
    errors.push('appName must be a non-empty string');
  }

  // Chunk geometry is baked into the wire format and the meshing buffers.
  if (config.chunkSize !== CHUNK_SIZE) {
    errors.push(`chunkSize must equal the compiled chunk size (${CHUNK_SIZE}), got ${config.chunkSize}`);
  }

  if (config.renderDistance.length !== 6) {
    errors.push(`renderDistance must have 6 entries, got ${config.renderDistance.length}`);
  }
  config.renderDistance.forEach((radius, i) => {
    if (!Number.isInteger(radius) || radius < 0) {
      errors.push(`renderDistance[${i}] must be a non-negative integer, got ${radius}`);
    }
  });

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, got ${String(config.logLevel)}`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

/**
 * Map VOXELMERE_* environment variables onto config overrides, then validate.
 * Unset variables keep their defaults; malformed ones surface as validation errors.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  const overrides: Partial<ClientRuntimeConfig> = {};

  const mouseSpeed = parseNumber(env.VOXELMERE_MOUSE_SPEED);
  if (mouseSpeed !== undefined) overrides.mouseSpeed = mouseSpeed;

  const flySpeed = parseNumber(env.VOXELMERE_FLY_SPEED);
  if (flySpeed !== undefined) overrides.flySpeed = flySpeed;

  const walkSpeed = parseNumber(env.VOXELMERE_WALK_SPEED);
  if (walkSpeed !== undefined) overrides.walkSpeed = walkSpeed;

  if (env.VOXELMERE_INVERT_MOUSE !== undefined) {
    overrides.invertMouse = env.VOXELMERE_INVERT_MOUSE === '1' || env.VOXELMERE_INVERT_MOUSE === 'true';
  }

  const level = env.LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) {
      overrides.logLevel = level;
    } else {
      const result = validateAndLoadConfig(overrides);
      result.errors.push(`LOG_LEVEL must be one of debug, info, warn, error, got ${level}`);
      return { ...result, valid: false };
    }
  }

  const rd = env.VOXELMERE_RENDER_DISTANCE;
  if (rd !== undefined && rd !== '') {
    const parts = rd.split(',').map((p) => Number(p.trim()));
    const [a = NaN, b = NaN, c = NaN, d = NaN, e = NaN, f = NaN] = parts;
    if (parts.length !== 6) {
      const result = validateAndLoadConfig(overrides);
      result.errors.push(`VOXELMERE_RENDER_DISTANCE must list 6 comma-separated radii, got ${parts.length}`);
      return { ...result, valid: false };
    }
    overrides.renderDistance = [a, b, c, d, e, f];
  }

  return validateAndLoadConfig(overrides);
}
