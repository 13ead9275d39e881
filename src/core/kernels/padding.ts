// src/core/kernels/padding.ts

import type { Ltrb, PaddingMode } from '../../@types/index.ts';

/**
 * Maps a coordinate outside `[0, size)` back into the source for the non-constant padding modes.
 *
 * `reflect` mirrors around the edge pixel without repeating it, `symmetric` repeats it. Offsets
 * wider than the source keep reflecting periodically.
 */
export function padIndex(index: number, size: number, mode: Exclude<PaddingMode, 'constant'>): number {
    if (index >= 0 && index < size) return index;
    switch (mode) {
        case 'edge':
            return index < 0 ? 0 : size - 1;
        case 'reflect': {
            if (size === 1) return 0;
            const period = 2 * (size - 1);
            const m = ((index % period) + period) % period;
            return m < size ? m : period - m;
        }
        case 'symmetric': {
            const period = 2 * size;
            const m = ((index % period) + period) % period;
            return m < size ? m : period - 1 - m;
        }
    }
}

/**
 * Pads one plane. `fillValue` is only read in constant mode.
 */
export function padPlane(
    plane: Float32Array,
    width: number,
    height: number,
    [left, top, right, bottom]: Ltrb,
    mode: PaddingMode,
    fillValue: number,
): Float32Array {
    const outWidth = width + left + right;
    const outHeight = height + top + bottom;
    const out = new Float32Array(outWidth * outHeight);

    if (mode === 'constant') {
        out.fill(fillValue);
        for (let y = 0; y < height; y++) {
            out.set(plane.subarray(y * width, (y + 1) * width), (y + top) * outWidth + left);
        }
        return out;
    }

    const columns = Array.from({ length: outWidth }, (_, x) => padIndex(x - left, width, mode));
    for (let y = 0; y < outHeight; y++) {
        const row = padIndex(y - top, height, mode) * width;
        for (let x = 0; x < outWidth; x++) {
            out[y * outWidth + x] = plane[row + columns[x]];
        }
    }
    return out;
}
