/**
 * A source of pseudo-random numbers in [0, 1).
 */
export type RandomSource = () => number;

// A simple seeded PRNG (mulberry32)
export function mulberry32(a: number): RandomSource {
    return function () {
        a |= 0; a = a + 0x6D2B79F5 | 0;
        let t = Math.imul(a ^ a >>> 15, 1 | a);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Draws a fresh 32-bit seed.
 */
export function randomSeed(): number {
    return Math.floor(Math.random() * 4294967296);
}

/**
 * Returns a shuffled copy of the items (Fisher-Yates).
 */
export function shuffled<T>(items: readonly T[], random: RandomSource): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}
