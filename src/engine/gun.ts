// src/engine/gun.ts

import { CONFIG } from '../config';
import type { Point } from '../rendering/draw_commands';

/** Which guns a shot toward a target may use. */
export type FireSector = 'left' | 'right' | 'both';

/** Wraps an angle into (-π, π]. */
export function normalizeAngle(angle: number): number {
  let a = angle;
  while (a > Math.PI) a -= Math.PI * 2;
  while (a <= -Math.PI) a += Math.PI * 2;
  return a;
}

/** Turns `current` toward `target` by at most `maxStep` radians, the short way round. */
export function turnToward(current: number, target: number, maxStep: number): number {
  const delta = normalizeAngle(target - current);
  if (Math.abs(delta) <= maxStep) return normalizeAngle(target);
  return normalizeAngle(current + Math.sign(delta) * maxStep);
}

/**
 * Targets near the nose or the tail use both guns; otherwise only the gun
 * on the target's side fires. Positive relative angles are on the left gun's side.
 */
export function fireSector(targetAngle: number, facing: number): FireSector {
  const relative = normalizeAngle(targetAngle - facing);
  const magnitude = Math.abs(relative);
  if (magnitude <= CONFIG.ENGINE_FIRE_OVERLAP || magnitude >= Math.PI - CONFIG.ENGINE_FIRE_OVERLAP) {
    return 'both';
  }
  return relative > 0 ? 'left' : 'right';
}

/**
 * One hull-mounted gun: aim angle, autofire spool and shot timing.
 * Spool rises only on updates where spoolUp() was called and falls otherwise.
 */
export class Gun {
  readonly offset: Readonly<Point>;
  angle: number;
  private spoolLevel = 0;
  private spooling = false;
  private lastAutofireTime = Number.NEGATIVE_INFINITY;

  constructor(offset: Readonly<Point>, initialAngle: number) {
    this.offset = offset;
    this.angle = initialAngle;
  }

  get spool(): number {
    return this.spoolLevel;
  }

  spoolUp(dt: number): void {
    this.spooling = true;
    this.spoolLevel = Math.min(1, this.spoolLevel + dt / CONFIG.ENGINE_SPOOL_TIME);
  }

  /** Per-update bookkeeping: spool decay and turning toward the aim target. */
  update(dt: number, targetAngle: number | null): void {
    if (!this.spooling && this.spoolLevel > 0) {
      this.spoolLevel = Math.max(0, this.spoolLevel - dt / CONFIG.ENGINE_SPOOL_TIME);
    }
    this.spooling = false;

    if (targetAngle !== null) {
      this.angle = turnToward(this.angle, targetAngle, CONFIG.ENGINE_TURN_RATE * dt);
    }
  }

  /** Cooldown shrinks linearly from the start value at 0% spool to the minimum at 100%. */
  get autofireCooldown(): number {
    const range = CONFIG.ENGINE_AUTOFIRE_COOLDOWN_START - CONFIG.ENGINE_AUTOFIRE_COOLDOWN_MIN;
    return CONFIG.ENGINE_AUTOFIRE_COOLDOWN_START - range * this.spoolLevel;
  }

  /** True, and the shot is recorded, when the autofire cooldown has elapsed at `now`. */
  tryAutofire(now: number): boolean {
    if (now - this.lastAutofireTime < this.autofireCooldown) return false;
    this.lastAutofireTime = now;
    return true;
  }
}
