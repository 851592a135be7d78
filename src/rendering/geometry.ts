// src/rendering/geometry.ts

import { CONFIG } from '../config';
import type { Point } from './draw_commands';
import type { ViewportState } from './viewport_scaler';

/** Standard 2D rotation: (x cos θ - y sin θ, x sin θ + y cos θ). */
export function rotatePoint(point: Point, angle: number): Point {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return {
    x: point.x * cos - point.y * sin,
    y: point.x * sin + point.y * cos,
  };
}

/**
 * Maps a logical-space position to device pixels relative to the camera.
 * Positions scale with the viewport; the camera offset is scaled the same way.
 */
export function toScreen(logicalX: number, logicalY: number, cameraX: number, cameraY: number, viewport: ViewportState): Point {
  const scale = viewport.scaleFactor;
  return {
    x: logicalX * scale - cameraX * scale,
    y: logicalY * scale - cameraY * scale,
  };
}

/**
 * Outline of a pointed star: outer tips alternating with inner notches.
 * Tip i sits at i * (2π / spokes) + offset; each notch sits halfway to the next tip.
 * @returns 2 * spokes vertices, tip first.
 */
export function starPolygon(
  centre: Point,
  radius: number,
  spokes: number,
  offset: number,
  innerRatio: number = CONFIG.STAR_INNER_RADIUS_RATIO
): Point[] {
  const step = (Math.PI * 2) / spokes;
  const innerRadius = radius * innerRatio;
  const points: Point[] = [];
  for (let i = 0; i < spokes; i++) {
    const angle = i * step + offset;
    const innerAngle = angle + step / 2;
    points.push(
      { x: centre.x + Math.cos(angle) * radius, y: centre.y + Math.sin(angle) * radius },
      { x: centre.x + Math.cos(innerAngle) * innerRadius, y: centre.y + Math.sin(innerAngle) * innerRadius }
    );
  }
  return points;
}
