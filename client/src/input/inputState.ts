/**
 * Keyboard state, keyed by physical scancode.
 */

import type { PlayerInput, YawPitch } from '../types';

// PC set-1 scancodes for a QWERTY layout.
export const MOVE_FORWARD = 17; // W
export const MOVE_LEFT = 30; // A
export const MOVE_BACKWARD = 31; // S
export const MOVE_RIGHT = 32; // D
export const MOVE_UP = 57; // Space
export const MOVE_DOWN = 42; // Left Shift
export const TOGGLE_FLIGHT = 33; // F
export const TOGGLE_CULLING = 46; // C

export class InputState {
  private readonly keys = new Map<number, boolean>();
  private flying = true;
  private culling = true;

  /**
   * Record a key transition. Toggle keys flip on the released→pressed edge.
   * Returns whether the key's state changed.
   */
  processKeyboardInput(scancode: number, pressed: boolean): boolean {
    const previous = this.keys.get(scancode) ?? false;
    this.keys.set(scancode, pressed);
    if (pressed && !previous) {
      if (scancode === TOGGLE_FLIGHT) this.flying = !this.flying;
      if (scancode === TOGGLE_CULLING) this.culling = !this.culling;
    }
    return previous !== pressed;
  }

  isKeyPressed(scancode: number): boolean {
    return this.keys.get(scancode) ?? false;
  }

  get isFlying(): boolean {
    return this.flying;
  }

  get cullingEnabled(): boolean {
    return this.culling;
  }

  /** Release everything, e.g. when the window loses focus. Toggles keep their value. */
  clear(): void {
    this.keys.clear();
  }

  /** Snapshot for the movement system. Movement keys read as released unless allowed. */
  getPhysicsInput(yawPitch: YawPitch, allowMovement: boolean): PlayerInput {
    const held = (key: number): boolean => allowMovement && this.isKeyPressed(key);
    return {
      moveForward: held(MOVE_FORWARD),
      moveBackward: held(MOVE_BACKWARD),
      moveLeft: held(MOVE_LEFT),
      moveRight: held(MOVE_RIGHT),
      moveUp: held(MOVE_UP),
      moveDown: held(MOVE_DOWN),
      flying: this.flying,
      yaw: yawPitch.yaw,
      pitch: yawPitch.pitch,
    };
  }
}
