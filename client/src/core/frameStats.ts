/**
 * Frame statistics for the HUD: FPS over a sliding window plus
 * per-tick meshing cost.
 */

import { FPS_WINDOW_SECONDS } from '../config';

export interface FrameStatsSnapshot {
  fps: number;
  lastMeshingMs: number;
  totalMeshingMs: number;
  chunksMeshedLastTick: number;
  chunksMeshedTotal: number;
}

export class FrameStats {
  /** Frame timestamps in ms, oldest first. */
  private frames: number[] = [];
  private readonly windowMs: number;

  private lastMeshingMs = 0;
  private totalMeshingMs = 0;
  private chunksMeshedLastTick = 0;
  private chunksMeshedTotal = 0;

  constructor(windowSeconds: number = FPS_WINDOW_SECONDS) {
    this.windowMs = windowSeconds * 1000;
  }

  /** Record a rendered frame at `now` (ms). */
  addFrame(now: number = performance.now()): void {
    let drop = 0;
    while (drop < this.frames.length && now - (this.frames[drop] ?? now) >= this.windowMs) {
      drop++;
    }
    if (drop > 0) this.frames.splice(0, drop);
    this.frames.push(now);
  }

  /** Frames per second averaged over the window. */
  get fps(): number {
    return Math.floor(this.frames.length / (this.windowMs / 1000));
  }

  recordMeshing(chunkCount: number, elapsedMs: number): void {
    this.chunksMeshedLastTick = chunkCount;
    this.chunksMeshedTotal += chunkCount;
    this.lastMeshingMs = elapsedMs;
    this.totalMeshingMs += elapsedMs;
  }

  snapshot(): FrameStatsSnapshot {
    return {
      fps: this.fps,
      lastMeshingMs: Math.round(this.lastMeshingMs * 100) / 100,
      totalMeshingMs: Math.round(this.totalMeshingMs * 100) / 100,
      chunksMeshedLastTick: this.chunksMeshedLastTick,
      chunksMeshedTotal: this.chunksMeshedTotal,
    };
  }

  reset(): void {
    this.frames.length = 0;
    this.lastMeshingMs = 0;
    this.totalMeshingMs = 0;
    this.chunksMeshedLastTick = 0;
    this.chunksMeshedTotal = 0;
  }
}
