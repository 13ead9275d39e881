// src/core/kernels/resample.ts

import { InterpolationMode } from '../interpolation/interpolationModes.ts';

/**
 * Source taps feeding one output position along an axis.
 */
export interface AxisTap {
    indices: number[];
    weights: number[];
}

interface ResampleFilter {
    support: number;
    weight(x: number): number;
}

const BICUBIC_A_OBJECT = -0.5;
const BICUBIC_A_ARRAY = -0.75;

function sinc(x: number): number {
    if (x === 0) return 1;
    const px = Math.PI * x;
    return Math.sin(px) / px;
}

function cubic(x: number, a: number): number {
    const ax = Math.abs(x);
    if (ax < 1) return ((a + 2) * ax - (a + 3)) * ax * ax + 1;
    if (ax < 2) return (((ax - 5) * ax + 8) * ax - 4) * a;
    return 0;
}

/**
 * Filters of the object backend, evaluated in units of source pixels.
 */
const ObjectFilters: Readonly<Record<Exclude<InterpolationMode, InterpolationMode.Nearest>, ResampleFilter>> =
    Object.freeze({
        [InterpolationMode.Box]: { support: 0.5, weight: (x) => (x > -0.5 && x <= 0.5 ? 1 : 0) },
        [InterpolationMode.Bilinear]: { support: 1, weight: (x) => Math.max(0, 1 - Math.abs(x)) },
        [InterpolationMode.Hamming]: {
            support: 1,
            weight: (x) => (Math.abs(x) >= 1 ? 0 : sinc(x) * (0.54 + 0.46 * Math.cos(Math.PI * x))),
        },
        [InterpolationMode.Bicubic]: { support: 2, weight: (x) => cubic(x, BICUBIC_A_OBJECT) },
        [InterpolationMode.Lanczos]: { support: 3, weight: (x) => (Math.abs(x) >= 3 ? 0 : sinc(x) * sinc(x / 3)) },
    });

/**
 * Taps for the object backend: the filter is widened by the downscale factor so that shrinking
 * averages every covered source pixel, and nearest picks the pixel under each output centre.
 */
export function objectAxisTaps(inSize: number, outSize: number, mode: InterpolationMode): AxisTap[] {
    const scale = inSize / outSize;
    if (mode === InterpolationMode.Nearest) {
        return Array.from({ length: outSize }, (_, i) => ({
            indices: [Math.min(Math.floor((i + 0.5) * scale), inSize - 1)],
            weights: [1],
        }));
    }

    const filter = ObjectFilters[mode];
    const filterScale = Math.max(scale, 1);
    const support = filter.support * filterScale;
    return Array.from({ length: outSize }, (_, i) => {
        const center = (i + 0.5) * scale;
        const start = Math.max(Math.trunc(center - support + 0.5), 0);
        const end = Math.min(Math.trunc(center + support + 0.5), inSize);
        const indices: number[] = [];
        const weights: number[] = [];
        for (let x = start; x < end; x++) {
            indices.push(x);
            weights.push(filter.weight((x - center + 0.5) / filterScale));
        }
        return { indices, weights: normalizeWeights(weights) };
    });
}

/**
 * Taps for the array backend: half-pixel aligned sampling (corners not aligned), no antialiasing,
 * out-of-range neighbours clamped to the border.
 */
export function arrayAxisTaps(inSize: number, outSize: number, mode: InterpolationMode): AxisTap[] {
    const scale = inSize / outSize;
    const clampIndex = (index: number) => Math.min(Math.max(index, 0), inSize - 1);
    return Array.from({ length: outSize }, (_, i): AxisTap => {
        switch (mode) {
            case InterpolationMode.Nearest:
                return { indices: [Math.min(Math.floor(i * scale), inSize - 1)], weights: [1] };
            case InterpolationMode.Bilinear: {
                const src = Math.max((i + 0.5) * scale - 0.5, 0);
                const i0 = Math.min(Math.floor(src), inSize - 1);
                const i1 = Math.min(i0 + 1, inSize - 1);
                const lambda = src - i0;
                return { indices: [i0, i1], weights: [1 - lambda, lambda] };
            }
            case InterpolationMode.Bicubic: {
                const src = (i + 0.5) * scale - 0.5;
                const i0 = Math.floor(src);
                const t = src - i0;
                return {
                    indices: [i0 - 1, i0, i0 + 1, i0 + 2].map(clampIndex),
                    weights: [cubic(t + 1, BICUBIC_A_ARRAY), cubic(t, BICUBIC_A_ARRAY), cubic(1 - t, BICUBIC_A_ARRAY), cubic(2 - t, BICUBIC_A_ARRAY)],
                };
            }
            default:
                throw new RangeError(`No array resampling taps for "${mode}".`);
        }
    });
}

function normalizeWeights(weights: number[]): number[] {
    const total = weights.reduce((sum, w) => sum + w, 0);
    return total === 0 ? weights : weights.map((w) => w / total);
}

/**
 * Resamples one plane separably, columns first then rows.
 */
export function resamplePlane(
    plane: Float32Array,
    width: number,
    height: number,
    xTaps: readonly AxisTap[],
    yTaps: readonly AxisTap[],
): Float32Array {
    const outWidth = xTaps.length;
    const outHeight = yTaps.length;

    const horizontal = new Float32Array(height * outWidth);
    for (let y = 0; y < height; y++) {
        const row = y * width;
        for (let x = 0; x < outWidth; x++) {
            const { indices, weights } = xTaps[x];
            let acc = 0;
            for (let k = 0; k < indices.length; k++) acc += plane[row + indices[k]] * weights[k];
            horizontal[y * outWidth + x] = acc;
        }
    }

    const out = new Float32Array(outHeight * outWidth);
    for (let y = 0; y < outHeight; y++) {
        const { indices, weights } = yTaps[y];
        for (let x = 0; x < outWidth; x++) {
            let acc = 0;
            for (let k = 0; k < indices.length; k++) acc += horizontal[indices[k] * outWidth + x] * weights[k];
            out[y * outWidth + x] = acc;
        }
    }
    return out;
}
