/**
 * Engine: drives a ClientSession from a fixed-rate timer.
 *
 * Owns the pieces that sit in front of the session: the input state, the
 * camera orientation and the loop clock. All simulation runs through
 * `ClientSession.tick`; the Engine only feeds it input and a delta.
 *
 * Does NOT own:
 *   - Transport setup (the caller hands over a connected Client)
 *   - Rendering (consumers read `session.meshes`)
 */

import * as THREE from 'three';
import { DEFAULT_PITCH, DEFAULT_YAW, TICK_RATE } from '../config';
import { isSessionError, type SessionError } from '../core/errors';
import { createLogger } from '../core/logger';
import { InputState } from '../input/inputState';
import { updateYawPitch } from '../physics/camera';
import type { YawPitch } from '../types';
import type { ClientSession } from './ClientSession';

const log = createLogger('Engine');

export class Engine {
  readonly session: ClientSession;
  readonly input = new InputState();
  readonly clock = new THREE.Clock(false);

  private rotation: YawPitch = { yaw: DEFAULT_YAW, pitch: DEFAULT_PITCH };
  private focused = true;
  private timer: ReturnType<typeof setInterval> | undefined;
  private stopCallbacks: ((reason: SessionError | undefined) => void)[] = [];

  constructor(session: ClientSession) {
    this.session = session;
  }

  // ── Input ───────────────────────────────────────────────────────

  handleKey(scancode: number, pressed: boolean): void {
    this.input.processKeyboardInput(scancode, pressed);
  }

  handleMouseMove(dx: number, dy: number): void {
    if (!this.focused) return;
    const { mouseSpeed, invertMouse } = this.session.config;
    this.rotation = updateYawPitch(this.rotation, dx, dy, mouseSpeed, invertMouse);
  }

  /** Losing focus releases every held key and freezes movement. */
  setFocused(focused: boolean): void {
    this.focused = focused;
    if (!focused) this.input.clear();
  }

  get orientation(): YawPitch {
    return this.rotation;
  }

  /** Face culling toggle for whatever renders `session.meshes`. */
  get cullingEnabled(): boolean {
    return this.input.cullingEnabled;
  }

  // ── Loop ────────────────────────────────────────────────────────

  /** Register a callback for when the loop stops; receives the error that ended it, if any. */
  onStop(fn: (reason: SessionError | undefined) => void): void {
    this.stopCallbacks.push(fn);
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(tickRate: number = TICK_RATE): void {
    if (this.timer !== undefined) return;
    this.clock.start();
    this.timer = setInterval(this.loop, 1000 / tickRate);
    log.info(`Tick loop started at ${tickRate} Hz`);
  }

  stop(reason?: SessionError): void {
    if (this.timer === undefined) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.clock.stop();

    for (const fn of this.stopCallbacks) fn(reason);
    this.stopCallbacks = [];
    log.info('Tick loop stopped');
  }

  /** Apply the current input and advance the session by `delta` seconds. */
  step(delta: number): void {
    this.session.setInput(this.input.getPhysicsInput(this.rotation, this.focused));
    this.session.tick(delta);
  }

  private loop = (): void => {
    try {
      this.step(this.clock.getDelta());
    } catch (err) {
      if (!isSessionError(err)) throw err;
      this.stop(err);
    }
  };
}
