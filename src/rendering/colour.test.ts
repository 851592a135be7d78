// src/rendering/colour.test.ts

import { describe, it, expect } from 'vitest';
import { scaleChannels, twinkleColour, rgbToCss, isRgbColour, RgbColour } from './colour';
import { STAR_COLOURS } from '../constants';

describe('Colour Utilities', () => {

    describe('twinkleColour', () => {
        it('should leave white untouched at full twinkle', () => {
            expect(twinkleColour(STAR_COLOURS.white, 1.0)).toEqual({ r: 255, g: 255, b: 255 });
        });

        it('should halve and truncate white at zero twinkle', () => {
            expect(twinkleColour(STAR_COLOURS.white, 0.0)).toEqual({ r: 127, g: 127, b: 127 });
        });

        it('should truncate each channel of a tinted colour', () => {
            // light_blue (173, 216, 230) * 0.75 = (129.75, 162, 172.5)
            expect(twinkleColour(STAR_COLOURS.light_blue, 0.5)).toEqual({ r: 129, g: 162, b: 172 });
        });

        it('should keep every channel between half and full brightness', () => {
            const base: RgbColour = { r: 221, g: 160, b: 7 };
            for (const phase of [0, 0.1, 0.33, 0.5, 0.77, 0.9, 1]) {
                const out = twinkleColour(base, phase);
                (['r', 'g', 'b'] as const).forEach(channel => {
                    expect(out[channel]).toBeGreaterThanOrEqual(Math.floor(base[channel] * 0.5));
                    expect(out[channel]).toBeLessThanOrEqual(base[channel]);
                });
            }
        });

        it('should clamp phases outside [0, 1]', () => {
            expect(twinkleColour(STAR_COLOURS.white, -3)).toEqual({ r: 127, g: 127, b: 127 });
            expect(twinkleColour(STAR_COLOURS.white, 4)).toEqual({ r: 255, g: 255, b: 255 });
        });
    });

    describe('scaleChannels', () => {
        it('should clamp results to 0-255', () => {
            expect(scaleChannels({ r: 200, g: 10, b: 0 }, 2)).toEqual({ r: 255, g: 20, b: 0 });
            expect(scaleChannels({ r: 50, g: 0, b: 0 }, -1)).toEqual({ r: 0, g: 0, b: 0 });
        });
    });

    describe('rgbToCss', () => {
        it('should format a css rgb() string', () => {
            expect(rgbToCss({ r: 20, g: 20, b: 30 })).toBe('rgb(20, 20, 30)');
        });
    });

    describe('isRgbColour', () => {
        it('should accept records of finite channels only', () => {
            expect(isRgbColour({ r: 1, g: 2, b: 3 })).toBe(true);
            expect(isRgbColour({ r: 1, g: 2 })).toBe(false);
            expect(isRgbColour({ r: 1, g: NaN, b: 3 })).toBe(false);
            expect(isRgbColour([1, 2, 3])).toBe(false);
            expect(isRgbColour(null)).toBe(false);
        });
    });
});
