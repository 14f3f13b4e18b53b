/**
 * System #3: PlayerMovementSystem
 *
 * Turns the current input snapshot into a requested displacement, clips it
 * against the chunk store and moves the player. Chunks that have not
 * arrived are empty space.
 *
 * Frequency: every tick
 */

import { createBlockContainer, resolveMovement } from '../../physics/aabb';
import { computeMovement, settleAfterCollision } from '../../physics/camera';
import type { ClientWorld } from '../world';

export function playerMovementSystem(world: ClientWorld, delta: number): void {
  const { BoundingBox, OnGround, Position, Rotation, Velocity } = world.components;
  const eid = world.player;
  const input = world.input;

  Rotation.yaw[eid] = input.yaw;
  Rotation.pitch[eid] = input.pitch;

  const step = computeMovement(
    input,
    { x: Velocity.x[eid] ?? 0, y: Velocity.y[eid] ?? 0, z: Velocity.z[eid] ?? 0 },
    OnGround.value[eid] === 1,
    delta,
    world.speeds,
  );

  const container = createBlockContainer(world.chunks, world.gameData?.meshes ?? []);
  const box = {
    center: { x: Position.x[eid] ?? 0, y: Position.y[eid] ?? 0, z: Position.z[eid] ?? 0 },
    halfExtents: { x: BoundingBox.hx[eid] ?? 0, y: BoundingBox.hy[eid] ?? 0, z: BoundingBox.hz[eid] ?? 0 },
  };
  const actual = resolveMovement(container, box, step.displacement);

  Position.x[eid] = box.center.x + actual.x;
  Position.y[eid] = box.center.y + actual.y;
  Position.z[eid] = box.center.z + actual.z;

  const settled = settleAfterCollision(step, actual);
  Velocity.x[eid] = settled.velocity.x;
  Velocity.y[eid] = settled.velocity.y;
  Velocity.z[eid] = settled.velocity.z;
  OnGround.value[eid] = settled.onGround ? 1 : 0;
}
