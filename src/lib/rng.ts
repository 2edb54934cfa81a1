/**
 * Random sources for pattern selection
 * Uses a linear congruential generator (LCG) when a seed is given
 */

/**
 * Returns a number between 0 (inclusive) and 1 (exclusive)
 */
export type RandomSource = () => number;

export class SeededRNG {
    private seed: number;

    constructor(seed: number) {
        // Ensure seed is a positive integer
        this.seed = Math.floor(Math.abs(seed)) % 2 ** 32 || 1;
    }

    random(): number {
        // LCG parameters (from Numerical Recipes)
        this.seed = (this.seed * 1664525 + 1013904223) % 2 ** 32;
        return this.seed / 2 ** 32;
    }

    asSource(): RandomSource {
        return () => this.random();
    }
}

/**
 * Seeded LCG when a seed is given, Math.random otherwise
 */
export function createRandomSource(seed?: number): RandomSource {
    return seed === undefined ? Math.random : new SeededRNG(seed).asSource();
}

/**
 * Uniform draw of an index in [0, length)
 */
export function pickIndex(length: number, random: RandomSource): number {
    // Guard against sources that return exactly 1
    return Math.min(length - 1, Math.floor(random() * length));
}
