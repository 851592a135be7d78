// src/rendering/draw_commands.ts

import type { RgbColour } from './colour';

/** A position in device pixels. */
export interface Point {
  x: number;
  y: number;
}

/** Scene layer a command belongs to, listed back to front. */
export type DrawLayer = 'background' | 'star' | 'gun' | 'ship' | 'projectile' | 'hud';

export type DrawCommand =
  | { kind: 'clear'; layer: DrawLayer; colour: RgbColour }
  | { kind: 'circle'; layer: DrawLayer; centre: Point; radius: number; colour: RgbColour }
  // Filled when strokeWidth is absent, outlined otherwise
  | { kind: 'polygon'; layer: DrawLayer; points: Point[]; colour: RgbColour; strokeWidth?: number }
  | { kind: 'line'; layer: DrawLayer; from: Point; to: Point; colour: RgbColour; width: number }
  | { kind: 'text'; layer: DrawLayer; text: string; position: Point; colour: RgbColour; font: string };
