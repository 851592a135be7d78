// src/engine/local_engine.ts

import { CONFIG } from '../config';
import type { MoveCommand, SessionEngine } from '../core/engine';
import type { RawProjectile, RawSceneSnapshot } from '../core/scene_snapshot';
import type { RgbColour } from '../rendering/colour';
import type { Point } from '../rendering/draw_commands';
import { rotatePoint } from '../rendering/geometry';
import { logger } from '../utils/logger';
import { Gun, fireSector, turnToward, type FireSector } from './gun';
import { StarField } from './star_field';

export interface ShotType {
  speed: number;
  size: number;
  length: number;
  lifetime: number;
  colour: RgbColour;
}

interface LiveProjectile {
  x: number;
  y: number;
  vx: number;
  vy: number;
  age: number;
  shot: Readonly<ShotType>;
}

const MOVE_VECTORS: Readonly<Record<MoveCommand, Readonly<Point>>> = {
  move_up: { x: 0, y: -1 },
  move_down: { x: 0, y: 1 },
  move_left: { x: -1, y: 0 },
  move_right: { x: 1, y: 0 },
};

/**
 * In-process simulation behind the SessionEngine boundary.
 * Ship motion, gun aim and spool, projectiles, camera follow and the star field.
 * Coordinates are logical world units; `facing` is the world direction of travel
 * and the reported rotation is the hull's visual rotation (0 = nose up).
 */
export class LocalEngine implements SessionEngine {
  private time = 0;
  private readonly player = { x: 0, y: 0, vx: 0, vy: 0, facing: CONFIG.DEFAULT_HEADING };
  private readonly camera: Point;
  private readonly guns: { left: Gun; right: Gun };
  private readonly stars: StarField;
  private projectiles: LiveProjectile[] = [];

  private pendingMoves: MoveCommand[] = [];
  private aimTarget: Point | null = null;
  private altMode = false;
  private boostMode = false;
  private controlMode = false;

  private autofireHeld = false;
  private autofireStartTime = 0;
  private autofiredThisHold = false;
  private lastTrackingTime = Number.NEGATIVE_INFINITY;

  constructor(seed: string = CONFIG.SEED) {
    this.camera = {
      x: this.player.x - CONFIG.LOGICAL_WIDTH / 2,
      y: this.player.y - CONFIG.LOGICAL_HEIGHT / 2,
    };
    this.guns = {
      left: new Gun(CONFIG.LEFT_GUN_OFFSET, this.player.facing),
      right: new Gun(CONFIG.RIGHT_GUN_OFFSET, this.player.facing),
    };
    this.stars = new StarField(seed, this.camera);
    logger.info(`[LocalEngine] Session created with seed "${seed}".`);
  }

  /** Seconds of simulated time so far. */
  get elapsed(): number {
    return this.time;
  }

  get projectileCount(): number {
    return this.projectiles.length;
  }

  sendCommand(name: MoveCommand): void {
    this.pendingMoves.push(name);
  }

  /** Screen position in logical units; resolved against the camera as it is now. */
  setMouseTarget(x: number, y: number): void {
    this.aimTarget = { x: x + this.camera.x, y: y + this.camera.y };
  }

  startAutofire(): void {
    this.autofireHeld = true;
    this.autofireStartTime = this.time;
  }

  stopAutofire(): void {
    this.autofireHeld = false;
  }

  /** A release after autofire already fired this hold is not a click and fires nothing. */
  startShootingTracking(): void {
    if (this.autofiredThisHold) {
      this.autofiredThisHold = false;
      return;
    }
    if (this.time - this.lastTrackingTime < CONFIG.ENGINE_TRACKING_COOLDOWN) {
      logger.debug('[LocalEngine] Tracking shot ignored, still cooling down.');
      return;
    }
    this.lastTrackingTime = this.time;
    this.fireFrom(this.currentSector(), CONFIG.ENGINE_TRACKING_SHOT, gun => gun.angle);
  }

  stopShootingTracking(): void {
    // Tracking shots are single events; nothing stays active
  }

  setAltMode(enabled: boolean): void {
    this.altMode = enabled;
  }

  setBoostMode(enabled: boolean): void {
    this.boostMode = enabled;
  }

  setControlMode(enabled: boolean): void {
    this.controlMode = enabled;
  }

  update(dtSeconds: number): void {
    if (!Number.isFinite(dtSeconds) || dtSeconds < 0) {
      throw new RangeError(`Time step must be a finite, non-negative number of seconds, got ${dtSeconds}.`);
    }
    const input = this.drainMoves();
    this.time += dtSeconds;

    // Shots spawn from the pre-movement hull position
    const targetAngle = this.aimAngle();
    this.updateAutofire(dtSeconds);
    this.guns.left.update(dtSeconds, targetAngle);
    this.guns.right.update(dtSeconds, targetAngle);

    this.movePlayer(input, dtSeconds);
    this.updateProjectiles(dtSeconds);
    const shift = this.followPlayer();
    this.stars.update(dtSeconds, this.camera, shift);
  }

  getRenderData(): Required<RawSceneSnapshot> {
    const projectiles = this.projectiles.map(
      (projectile): RawProjectile => ({
        x: projectile.x,
        y: projectile.y,
        length: projectile.shot.length,
        width: projectile.shot.size,
        rotation: Math.atan2(projectile.vy, projectile.vx),
        color: [projectile.shot.colour.r, projectile.shot.colour.g, projectile.shot.colour.b],
      })
    );
    return {
      player_x: this.player.x,
      player_y: this.player.y,
      player_rotation: this.player.facing + Math.PI / 2,
      player_vx: this.player.vx,
      player_vy: this.player.vy,
      camera_x: this.camera.x,
      camera_y: this.camera.y,
      left_gun_angle: this.guns.left.angle,
      right_gun_angle: this.guns.right.angle,
      left_gun_spool: this.guns.left.spool,
      right_gun_spool: this.guns.right.spool,
      stars: this.stars.toRenderData(),
      projectiles,
    };
  }

  // Unit vector from this tick's movement intents, zero when idle
  private drainMoves(): Point {
    let dx = 0;
    let dy = 0;
    this.pendingMoves.forEach(move => {
      const vector = MOVE_VECTORS[move];
      if (vector.x !== 0) dx = vector.x;
      if (vector.y !== 0) dy = vector.y;
    });
    this.pendingMoves = [];

    const magnitude = Math.hypot(dx, dy);
    return magnitude > 0 ? { x: dx / magnitude, y: dy / magnitude } : { x: 0, y: 0 };
  }

  private aimAngle(): number | null {
    if (!this.aimTarget) return null;
    return Math.atan2(this.aimTarget.y - this.player.y, this.aimTarget.x - this.player.x);
  }

  private currentSector(): FireSector {
    return fireSector(this.aimAngle() ?? this.player.facing, this.player.facing);
  }

  private updateAutofire(dt: number): void {
    if (!this.autofireHeld) return;
    this.guns.left.spoolUp(dt);
    this.guns.right.spoolUp(dt);
    if (this.time - this.autofireStartTime < CONFIG.ENGINE_AUTOFIRE_DELAY) return;

    this.autofiredThisHold = true;
    this.fireFrom(this.currentSector(), CONFIG.ENGINE_AUTOFIRE_SHOT, gun => gun.tryAutofire(this.time) ? gun.angle : null);
  }

  /** Spawns one shot per gun in the sector; `aimOf` returns null for a gun that must hold fire. */
  private fireFrom(sector: FireSector, shot: Readonly<ShotType>, aimOf: (gun: Gun) => number | null): void {
    const firing: Gun[] = [];
    if (sector !== 'right') firing.push(this.guns.left);
    if (sector !== 'left') firing.push(this.guns.right);

    firing.forEach(gun => {
      const angle = aimOf(gun);
      if (angle === null) return;
      if (this.projectiles.length >= CONFIG.ENGINE_MAX_PROJECTILES) {
        logger.debug('[LocalEngine] Projectile limit reached, shot dropped.');
        return;
      }
      const mount = rotatePoint(gun.offset, this.player.facing + Math.PI / 2);
      this.projectiles.push({
        x: this.player.x + mount.x,
        y: this.player.y + mount.y,
        vx: Math.cos(angle) * shot.speed + this.player.vx,
        vy: Math.sin(angle) * shot.speed + this.player.vy,
        age: 0,
        shot,
      });
    });
  }

  private movePlayer(input: Point, dt: number): void {
    let speed = CONFIG.ENGINE_PLAYER_SPEED;
    if (this.boostMode) speed *= CONFIG.ENGINE_BOOST_MULTIPLIER;
    if (this.controlMode) speed *= CONFIG.ENGINE_CONTROL_MULTIPLIER;

    this.player.vx = input.x * speed;
    this.player.vy = input.y * speed;
    this.player.x += this.player.vx * dt;
    this.player.y += this.player.vy * dt;

    // Alt mode strafes: the hull keeps its heading while moving
    const moving = input.x !== 0 || input.y !== 0;
    if (moving && !this.altMode) {
      this.player.facing = turnToward(this.player.facing, Math.atan2(input.y, input.x), CONFIG.ENGINE_TURN_RATE * dt);
    }
  }

  private updateProjectiles(dt: number): void {
    this.projectiles.forEach(projectile => {
      projectile.x += projectile.vx * dt;
      projectile.y += projectile.vy * dt;
      projectile.age += dt;
    });
    this.projectiles = this.projectiles.filter(projectile => projectile.age < projectile.shot.lifetime);
  }

  /** Eases the camera toward centring the player; returns how far it moved. */
  private followPlayer(): Point {
    const targetX = this.player.x - CONFIG.LOGICAL_WIDTH / 2;
    const targetY = this.player.y - CONFIG.LOGICAL_HEIGHT / 2;
    const smoothing = this.cameraSmoothing();

    const shift = { x: (targetX - this.camera.x) * smoothing, y: (targetY - this.camera.y) * smoothing };
    this.camera.x += shift.x;
    this.camera.y += shift.y;
    return shift;
  }

  // Faster ships get a tighter camera
  private cameraSmoothing(): number {
    if (this.controlMode) return CONFIG.ENGINE_CAMERA_SNAP_SMOOTHING;
    const speed = Math.hypot(this.player.vx, this.player.vy);
    const slow = CONFIG.ENGINE_CAMERA_SLOW_SPEED;
    const fast = CONFIG.ENGINE_CAMERA_FAST_SPEED;
    if (speed <= slow) return CONFIG.ENGINE_CAMERA_SMOOTHING;
    if (speed >= fast) return CONFIG.ENGINE_CAMERA_MAX_SMOOTHING;
    const t = (speed - slow) / (fast - slow);
    return CONFIG.ENGINE_CAMERA_SMOOTHING + t * (CONFIG.ENGINE_CAMERA_MAX_SMOOTHING - CONFIG.ENGINE_CAMERA_SMOOTHING);
  }
}
