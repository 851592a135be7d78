// src/rendering/colour.ts (Australian English spelling)

/** Simple interface for an RGB colour object. */
export interface RgbColour {
    r: number;
    g: number;
    b: number;
}

/**
 * Scales each channel by a brightness multiplier, truncating to whole values.
 * Results are clamped to 0-255.
 */
export function scaleChannels(colour: Readonly<RgbColour>, factor: number): RgbColour {
    const scale = (channel: number) => Math.max(0, Math.min(255, Math.trunc(channel * factor)));
    return { r: scale(colour.r), g: scale(colour.g), b: scale(colour.b) };
}

/**
 * Applies a star's twinkle phase to its base colour.
 * A phase of 0 halves every channel, a phase of 1 leaves the colour as is.
 * @param twinkle Phase in [0, 1]; values outside are clamped.
 */
export function twinkleColour(base: Readonly<RgbColour>, twinkle: number): RgbColour {
    const phase = Math.max(0, Math.min(1, twinkle));
    return scaleChannels(base, 0.5 + phase * 0.5);
}

/** Formats a colour for CanvasRenderingContext2D fill/stroke styles. */
export function rgbToCss(colour: Readonly<RgbColour>): string {
    return `rgb(${colour.r}, ${colour.g}, ${colour.b})`;
}

/** Checks that a value is an {r, g, b} record of finite numbers. */
export function isRgbColour(value: unknown): value is RgbColour {
    if (typeof value !== 'object' || value === null) return false;
    if (!('r' in value) || !('g' in value) || !('b' in value)) return false;
    return [value.r, value.g, value.b].every(channel => typeof channel === 'number' && Number.isFinite(channel));
}
