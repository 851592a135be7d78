// src/constants.ts

import type { RgbColour } from './rendering/colour';

/** Categorical colour tags the engine assigns to stars. */
export type StarColourTag = 'white' | 'light_blue' | 'cyan' | 'light_purple' | 'pink' | 'pale_yellow';

/** Star outlines the renderer knows how to draw. */
export type StarShape = 'circle' | 'four_point' | 'six_point';

/** Base RGB for each star colour tag (cool palette). Never mutated. */
export const STAR_COLOURS: Readonly<Record<StarColourTag, Readonly<RgbColour>>> = Object.freeze({
  white: Object.freeze({ r: 255, g: 255, b: 255 }),
  light_blue: Object.freeze({ r: 173, g: 216, b: 230 }),
  cyan: Object.freeze({ r: 0, g: 255, b: 255 }),
  light_purple: Object.freeze({ r: 221, g: 160, b: 221 }),
  pink: Object.freeze({ r: 255, g: 182, b: 193 }),
  pale_yellow: Object.freeze({ r: 238, g: 232, b: 170 }),
});

export const STAR_COLOUR_TAGS: readonly StarColourTag[] = Object.freeze([
  'white', 'light_blue', 'cyan', 'light_purple', 'pink', 'pale_yellow',
]);

export const STAR_SHAPES: readonly StarShape[] = Object.freeze(['circle', 'four_point', 'six_point']);

/** Spoke count and angular offset for the pointed star outlines. */
export const STAR_SPOKES: Readonly<Record<Exclude<StarShape, 'circle'>, { spokes: number; offset: number }>> =
  Object.freeze({
    four_point: { spokes: 4, offset: -Math.PI / 4 },
    six_point: { spokes: 6, offset: -Math.PI / 6 },
  });

export function isStarColourTag(value: unknown): value is StarColourTag {
  return STAR_COLOUR_TAGS.some(tag => tag === value);
}

export function isStarShape(value: unknown): value is StarShape {
  return STAR_SHAPES.some(shape => shape === value);
}
