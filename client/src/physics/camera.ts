/**
 * First-person orientation and movement intent.
 *
 * Angles are degrees. Yaw 0 looks down -Z and grows counter-clockwise seen
 * from above, matching a THREE camera's `rotation.y`.
 */

import * as THREE from 'three';
import {
  FLY_SPEED,
  GRAVITY,
  JUMP_SPEED,
  MOUSE_SPEED,
  TERMINAL_VELOCITY,
  WALK_SPEED,
} from '../config';
import { clamp } from '../core/math';
import type { PlayerInput, Vec3, YawPitch } from '../types';

/** Apply a mouse delta in pixels. Yaw wraps into [-180, 180], pitch clamps to [-90, 90]. */
export function updateYawPitch(
  rotation: YawPitch,
  dx: number,
  dy: number,
  mouseSpeed: number = MOUSE_SPEED,
  invert = false,
): YawPitch {
  let yaw = rotation.yaw - mouseSpeed * dx;
  const pitch = rotation.pitch - (invert ? -1 : 1) * mouseSpeed * dy;

  if (yaw < -180) yaw += 360;
  if (yaw > 180) yaw -= 360;

  return { yaw, pitch: clamp(pitch, -90, 90) };
}

/** Unit view direction for a yaw/pitch pair. */
export function viewDirection(rotation: YawPitch, target = new THREE.Vector3()): THREE.Vector3 {
  const yaw = THREE.MathUtils.degToRad(rotation.yaw);
  const pitch = THREE.MathUtils.degToRad(rotation.pitch);
  return target.set(
    -Math.sin(yaw) * Math.cos(pitch),
    Math.sin(pitch),
    -Math.cos(yaw) * Math.cos(pitch),
  );
}

export interface MovementSpeeds {
  flySpeed: number;
  walkSpeed: number;
}

export interface MovementStep {
  /** Displacement to hand to the collision resolver. */
  displacement: Vec3;
  /** Velocity after this step, before collision. */
  velocity: Vec3;
}

const scratchForward = new THREE.Vector3();
const scratchRight = new THREE.Vector3();
const scratchWish = new THREE.Vector3();

/**
 * Turn one tick of input into a requested displacement.
 *
 * Flying moves at a constant speed on all three axes. Walking moves
 * horizontally and integrates gravity; jumping needs ground contact.
 */
export function computeMovement(
  input: PlayerInput,
  velocity: Vec3,
  onGround: boolean,
  delta: number,
  speeds: MovementSpeeds = { flySpeed: FLY_SPEED, walkSpeed: WALK_SPEED },
): MovementStep {
  const yaw = THREE.MathUtils.degToRad(input.yaw);
  scratchForward.set(-Math.sin(yaw), 0, -Math.cos(yaw));
  scratchRight.set(Math.cos(yaw), 0, -Math.sin(yaw));

  const wish = scratchWish.set(0, 0, 0);
  if (input.moveForward) wish.add(scratchForward);
  if (input.moveBackward) wish.sub(scratchForward);
  if (input.moveRight) wish.add(scratchRight);
  if (input.moveLeft) wish.sub(scratchRight);
  if (wish.lengthSq() > 0) wish.normalize();

  let vy: number;
  if (input.flying) {
    wish.multiplyScalar(speeds.flySpeed);
    vy = 0;
    if (input.moveUp) vy += speeds.flySpeed;
    if (input.moveDown) vy -= speeds.flySpeed;
  } else {
    wish.multiplyScalar(speeds.walkSpeed);
    vy = onGround && velocity.y <= 0 ? 0 : velocity.y;
    if (onGround && input.moveUp) vy = JUMP_SPEED;
    vy = Math.max(vy - GRAVITY * delta, -TERMINAL_VELOCITY);
  }

  const next: Vec3 = { x: wish.x, y: vy, z: wish.z };
  return {
    displacement: { x: next.x * delta, y: next.y * delta, z: next.z * delta },
    velocity: next,
  };
}

/**
 * Reconcile velocity with what the collision resolver allowed.
 * A clipped axis loses its velocity; a clipped downward move means ground contact.
 */
export function settleAfterCollision(
  step: MovementStep,
  actual: Vec3,
): { velocity: Vec3; onGround: boolean } {
  const { displacement: wanted, velocity } = step;
  return {
    velocity: {
      x: actual.x === wanted.x ? velocity.x : 0,
      y: actual.y === wanted.y ? velocity.y : 0,
      z: actual.z === wanted.z ? velocity.z : 0,
    },
    onGround: wanted.y < 0 && actual.y > wanted.y,
  };
}
