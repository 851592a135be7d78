// src/engine/star_field.ts

import { CONFIG } from '../config';
import { STAR_COLOUR_TAGS, STAR_SHAPES, type StarColourTag, type StarShape } from '../constants';
import type { RawStar } from '../core/scene_snapshot';
import type { Point } from '../rendering/draw_commands';
import { logger } from '../utils/logger';
import { PRNG } from '../utils/prng';

interface FieldStar {
  x: number;
  y: number;
  depth: number; // 0.1 (far) to 1.0 (near)
  size: number;
  color: StarColourTag;
  shape: StarShape;
  brightness: number; // Peak brightness, 0.5 to 1.0
  phase: number;
  twinkleSpeed: number; // Radians per second
}

type Edge = 'top' | 'bottom' | 'left' | 'right';
const EDGES: readonly Edge[] = ['top', 'bottom', 'left', 'right'];

/**
 * Decorative background around the camera. Stars drift with camera motion
 * in proportion to their depth and are recycled once they fall too far off screen.
 */
export class StarField {
  private readonly prng: PRNG;
  private readonly stars: FieldStar[] = [];

  constructor(seed: string, camera: Readonly<Point>) {
    this.prng = new PRNG(seed);
    const margin = CONFIG.ENGINE_STAR_MARGIN;
    for (let i = 0; i < CONFIG.ENGINE_STAR_COUNT; i++) {
      this.stars.push(
        this.createStar(
          camera.x + this.prng.range(-margin, CONFIG.LOGICAL_WIDTH + margin),
          camera.y + this.prng.range(-margin, CONFIG.LOGICAL_HEIGHT + margin)
        )
      );
    }
    logger.debug(`[StarField] Seeded ${this.stars.length} stars from "${this.prng.seed}".`);
  }

  get count(): number {
    return this.stars.length;
  }

  /** Advances twinkle, applies parallax for the camera shift and recycles stars outside the margin. */
  update(dt: number, camera: Readonly<Point>, cameraShift: Readonly<Point>): void {
    let recycled = 0;
    this.stars.forEach((star, index) => {
      star.x += cameraShift.x * star.depth * CONFIG.ENGINE_STAR_PARALLAX;
      star.y += cameraShift.y * star.depth * CONFIG.ENGINE_STAR_PARALLAX;
      star.phase += star.twinkleSpeed * dt;

      if (this.isOutside(star, camera)) {
        this.stars[index] = this.createStarAtEdge(camera);
        recycled++;
      }
    });
    if (recycled > 0) {
      logger.debug(`[StarField] Recycled ${recycled} star(s).`);
    }
  }

  toRenderData(): RawStar[] {
    return this.stars.map(star => ({
      x: star.x,
      y: star.y,
      size: star.size,
      color: star.color,
      shape: star.shape,
      twinkle: (star.brightness * (Math.sin(star.phase) + 1)) / 2,
    }));
  }

  private isOutside(star: FieldStar, camera: Readonly<Point>): boolean {
    const margin = CONFIG.ENGINE_STAR_MARGIN;
    const screenX = star.x - camera.x;
    const screenY = star.y - camera.y;
    return (
      screenX < -margin ||
      screenX > CONFIG.LOGICAL_WIDTH + margin ||
      screenY < -margin ||
      screenY > CONFIG.LOGICAL_HEIGHT + margin
    );
  }

  private createStarAtEdge(camera: Readonly<Point>): FieldStar {
    const { min, max } = CONFIG.ENGINE_STAR_EDGE_BAND;
    const across = (extent: number) => this.prng.range(-100, extent + 100);
    const out = () => this.prng.range(min, max);

    switch (this.prng.pick(EDGES)) {
      case 'top':
        return this.createStar(camera.x + across(CONFIG.LOGICAL_WIDTH), camera.y - out());
      case 'bottom':
        return this.createStar(camera.x + across(CONFIG.LOGICAL_WIDTH), camera.y + CONFIG.LOGICAL_HEIGHT + out());
      case 'left':
        return this.createStar(camera.x - out(), camera.y + across(CONFIG.LOGICAL_HEIGHT));
      case 'right':
        return this.createStar(camera.x + CONFIG.LOGICAL_WIDTH + out(), camera.y + across(CONFIG.LOGICAL_HEIGHT));
    }
  }

  // Mostly small stars with the odd large one
  private createStar(x: number, y: number): FieldStar {
    const size = this.prng.chance(0.7) ? this.prng.range(0.3, 2.0) : this.prng.range(2.0, 5.0);
    return {
      x,
      y,
      depth: this.prng.range(0.1, 1.0),
      size,
      color: this.prng.pick(STAR_COLOUR_TAGS),
      shape: this.prng.pick(STAR_SHAPES),
      brightness: this.prng.range(0.5, 1.0),
      phase: this.prng.range(0, Math.PI * 2),
      twinkleSpeed: this.prng.range(0.5, 2.0),
    };
  }
}
