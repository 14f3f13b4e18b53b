/**
 * System #4: PositionSyncSystem
 *
 * Reports the player's resolved position to the server, once per tick.
 *
 * Frequency: every tick
 */

import type { ClientWorld } from '../world';

export function positionSyncSystem(world: ClientWorld, _delta: number): void {
  const { Position } = world.components;
  const eid = world.player;
  world.client.send({
    type: 'SetPos',
    x: Position.x[eid] ?? 0,
    y: Position.y[eid] ?? 0,
    z: Position.z[eid] ?? 0,
  });
}
