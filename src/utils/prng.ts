// src/utils/prng.ts

/**
 * Seeded pseudo-random source (Mulberry32) for the local engine's star field.
 * Same seed, same sequence.
 */
export class PRNG {
    private readonly initialSeed: string;
    private state: number;

    constructor(seed: string) {
        this.initialSeed = seed;
        this.state = PRNG.hashString(seed);
        // Discard the first outputs, they correlate with short seeds
        for (let i = 0; i < 10; i++) this.next();
    }

    private static hashString(str: string): number {
        let h = 9;
        for (let i = 0; i < str.length;) {
            h = Math.imul(h ^ str.charCodeAt(i++), 9 ** 9);
        }
        return (h ^ h >>> 9) >>> 0;
    }

    /** Float in [0, 1). */
    next(): number {
        let t = this.state += 0x6D2B79F5;
        t = Math.imul(t ^ t >>> 15, t | 1);
        t ^= t + Math.imul(t ^ t >>> 7, t | 61);
        this.state = t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    }

    /** Float in [min, max). */
    range(min: number, max: number): number {
        return this.next() * (max - min) + min;
    }

    /** True with the given probability. */
    chance(probability: number): boolean {
        return this.next() < probability;
    }

    pick<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new RangeError('Cannot pick from an empty list.');
        }
        return items[Math.floor(this.next() * items.length)];
    }

    get seed(): string {
        return this.initialSeed;
    }
}
