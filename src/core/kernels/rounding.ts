// src/core/kernels/rounding.ts

import _ from 'lodash';

/**
 * Rounds to the nearest integer, ties to the even neighbour.
 */
export function roundHalfEven(value: number): number {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
}

/** Clamps to 0..255 and truncates toward zero. */
export function truncateToByte(value: number): number {
    return Math.trunc(_.clamp(value, 0, 255));
}

/** Clamps to 0..255 and rounds ties to even. */
export function roundToByte(value: number): number {
    return roundHalfEven(_.clamp(value, 0, 255));
}

/** Clamps to 0..255 and rounds ties upward. */
export function roundHalfUpToByte(value: number): number {
    return Math.floor(_.clamp(value, 0, 255) + 0.5);
}
