// src/core/transforms/random.ts

import seedrandom from 'seedrandom';
import type { Random, Range } from '../../@types/index.ts';
import { config } from '../../config/index.ts';

/**
 * Creates a reproducible source of uniform numbers in [0, 1).
 */
export function createRandom(seed: string = config.randomSeed): Random {
    return seedrandom(seed);
}

export function uniform(random: Random, [low, high]: Range): number {
    return low + (high - low) * random();
}

/**
 * Draws an integer in `[low, high)`.
 */
export function randomInt(random: Random, low: number, high: number): number {
    return low + Math.floor(random() * (high - low));
}

/**
 * Returns a shuffled copy of `items` (Fisher-Yates driven by `random`).
 */
export function shuffled<T>(random: Random, items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = randomInt(random, 0, i + 1);
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}
