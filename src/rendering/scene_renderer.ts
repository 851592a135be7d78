// src/rendering/scene_renderer.ts

import { CONFIG } from '../config';
import { STAR_COLOURS, STAR_SPOKES } from '../constants';
import type { SceneSnapshot, Star, Projectile } from '../core/scene_snapshot';
import { logger } from '../utils/logger';
import { twinkleColour } from './colour';
import type { DrawCommand, Point } from './draw_commands';
import { rotatePoint, starPolygon, toScreen } from './geometry';
import type { ViewportState } from './viewport_scaler';

/** A gun barrel as drawn: mount point on the hull and muzzle end. */
export interface GunSegment {
  mount: Point;
  muzzle: Point;
}

/**
 * Turns a scene snapshot into device-space draw commands.
 * Holds no per-frame state: the same snapshot and viewport always give the same commands.
 * Order is background, stars, guns, ship, projectiles, HUD.
 */
export class SceneRenderer {
  constructor() {
    logger.debug('[SceneRenderer] Instance created.');
  }

  render(snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand[] {
    const commands: DrawCommand[] = [{ kind: 'clear', layer: 'background', colour: { ...CONFIG.BACKGROUND_COLOUR } }];

    snapshot.stars.forEach(star => commands.push(this.drawStar(star, snapshot, viewport)));
    commands.push(...this.drawGuns(snapshot, viewport));
    commands.push(...this.drawShip(snapshot, viewport));
    snapshot.projectiles.forEach(projectile => commands.push(this.drawProjectile(projectile, snapshot, viewport)));
    commands.push(...this.drawHud(snapshot, viewport));

    return commands;
  }

  /** Ship position in device pixels. */
  shipScreenPosition(snapshot: SceneSnapshot, viewport: ViewportState): Point {
    return toScreen(snapshot.playerX, snapshot.playerY, snapshot.cameraX, snapshot.cameraY, viewport);
  }

  /** Tip, rear-right and rear-left corners of the hull, rotated by heading. */
  shipVertices(snapshot: SceneSnapshot, viewport: ViewportState): Point[] {
    const scale = viewport.scaleFactor;
    const halfWidth = (CONFIG.PLAYER_WIDTH / 2) * scale;
    const halfHeight = (CONFIG.PLAYER_HEIGHT / 2) * scale;
    const centre = this.shipScreenPosition(snapshot, viewport);

    const body: Point[] = [
      { x: 0, y: -halfHeight },
      { x: halfWidth, y: halfHeight },
      { x: -halfWidth, y: halfHeight },
    ];
    return body.map(vertex => {
      const rotated = rotatePoint(vertex, snapshot.playerRotation);
      return { x: centre.x + rotated.x, y: centre.y + rotated.y };
    });
  }

  /**
   * Left and right barrels. Mounts ride on the hull (offset rotated by heading),
   * barrels point along each gun's own aim angle.
   */
  gunSegments(snapshot: SceneSnapshot, viewport: ViewportState): [GunSegment, GunSegment] {
    const scale = viewport.scaleFactor;
    const centre = this.shipScreenPosition(snapshot, viewport);
    const barrel = CONFIG.GUN_LENGTH * scale;

    const segment = (offset: Point, aim: number): GunSegment => {
      const rotated = rotatePoint(offset, snapshot.playerRotation);
      const mount = { x: centre.x + rotated.x * scale, y: centre.y + rotated.y * scale };
      return {
        mount,
        muzzle: { x: mount.x + Math.cos(aim) * barrel, y: mount.y + Math.sin(aim) * barrel },
      };
    };

    return [
      segment(CONFIG.LEFT_GUN_OFFSET, snapshot.leftGunAngle),
      segment(CONFIG.RIGHT_GUN_OFFSET, snapshot.rightGunAngle),
    ];
  }

  /** Debug telemetry shown in the HUD, one entry per line. */
  hudLines(snapshot: SceneSnapshot): string[] {
    const percent = (spool: number) => `${Math.round(spool * 100)}%`;
    return [
      `Player: (${snapshot.playerX.toFixed(1)}, ${snapshot.playerY.toFixed(1)})`,
      `Camera: (${snapshot.cameraX.toFixed(1)}, ${snapshot.cameraY.toFixed(1)})`,
      `Spool L: ${percent(snapshot.leftGunSpool)}  R: ${percent(snapshot.rightGunSpool)}`,
      'WASD/Arrows: Move  Space/Click: Fire',
      'ESC: Quit',
    ];
  }

  private drawStar(star: Star, snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand {
    const centre = toScreen(star.x, star.y, snapshot.cameraX, snapshot.cameraY, viewport);
    const radius = star.size * viewport.scaleFactor;
    const colour = twinkleColour(STAR_COLOURS[star.color], star.twinkle);

    if (star.shape === 'circle') {
      return { kind: 'circle', layer: 'star', centre, radius, colour };
    }
    const { spokes, offset } = STAR_SPOKES[star.shape];
    return { kind: 'polygon', layer: 'star', points: starPolygon(centre, radius, spokes, offset), colour };
  }

  private drawGuns(snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand[] {
    const width = Math.max(1, Math.round(CONFIG.GUN_STROKE_WIDTH * viewport.scaleFactor));
    return this.gunSegments(snapshot, viewport).map(({ mount, muzzle }): DrawCommand => ({
      kind: 'line',
      layer: 'gun',
      from: mount,
      to: muzzle,
      colour: { ...CONFIG.GUN_COLOUR },
      width,
    }));
  }

  private drawShip(snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand[] {
    const points = this.shipVertices(snapshot, viewport);
    const strokeWidth = Math.max(1, Math.round(CONFIG.PLAYER_STROKE_WIDTH * viewport.scaleFactor));
    return [
      { kind: 'polygon', layer: 'ship', points, colour: { ...CONFIG.PLAYER_FILL_COLOUR } },
      { kind: 'polygon', layer: 'ship', points, colour: { ...CONFIG.PLAYER_COLOUR }, strokeWidth },
    ];
  }

  // Drawn shorter and wider than the engine's hit geometry
  private drawProjectile(projectile: Projectile, snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand {
    const scale = viewport.scaleFactor;
    const centre = toScreen(projectile.x, projectile.y, snapshot.cameraX, snapshot.cameraY, viewport);
    const halfLength = (projectile.length * CONFIG.PROJECTILE_LENGTH_FACTOR * scale) / 2;
    const dx = Math.cos(projectile.rotation) * halfLength;
    const dy = Math.sin(projectile.rotation) * halfLength;
    return {
      kind: 'line',
      layer: 'projectile',
      from: { x: centre.x - dx, y: centre.y - dy },
      to: { x: centre.x + dx, y: centre.y + dy },
      colour: { ...projectile.color },
      width: Math.max(1, Math.trunc(projectile.width * CONFIG.PROJECTILE_WIDTH_FACTOR * scale)),
    };
  }

  // Fixed device-pixel anchor, independent of camera and scale
  private drawHud(snapshot: SceneSnapshot, viewport: ViewportState): DrawCommand[] {
    return this.hudLines(snapshot).map((text, index): DrawCommand => ({
      kind: 'text',
      layer: 'hud',
      text,
      position: { x: CONFIG.HUD_ORIGIN_X, y: CONFIG.HUD_ORIGIN_Y + index * CONFIG.HUD_LINE_HEIGHT },
      colour: { ...CONFIG.HUD_COLOUR },
      font: viewport.font,
    }));
  }
}
