// src/core/kernels/convolution.ts

import _ from 'lodash';
import { padIndex } from './padding.ts';

/**
 * Samples of the Gaussian density on `kernelSize` integer offsets centred on zero, normalised to
 * sum to one.
 */
export function gaussianKernel1d(kernelSize: number, sigma: number): number[] {
    const half = (kernelSize - 1) * 0.5;
    const samples = _.range(kernelSize).map((i) => Math.exp(-0.5 * ((i - half) / sigma) ** 2));
    const total = _.sum(samples);
    return samples.map((value) => value / total);
}

/**
 * Convolves a plane with a separable kernel, rows then columns, reflecting at the borders.
 */
export function convolveSeparable(
    plane: Float32Array,
    width: number,
    height: number,
    kernelX: readonly number[],
    kernelY: readonly number[],
): Float32Array {
    const halfX = Math.floor(kernelX.length / 2);
    const halfY = Math.floor(kernelY.length / 2);

    const rows = new Float32Array(plane.length);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let acc = 0;
            for (let k = 0; k < kernelX.length; k++) {
                acc += plane[y * width + padIndex(x + k - halfX, width, 'reflect')] * kernelX[k];
            }
            rows[y * width + x] = acc;
        }
    }

    const out = new Float32Array(plane.length);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let acc = 0;
            for (let k = 0; k < kernelY.length; k++) {
                acc += rows[padIndex(y + k - halfY, height, 'reflect') * width + x] * kernelY[k];
            }
            out[y * width + x] = acc;
        }
    }
    return out;
}
