// src/core/kernels/warp.ts

import type { AffineMatrix } from '../../@types/index.ts';
import { InterpolationMode } from '../interpolation/interpolationModes.ts';

/**
 * Fills an `outWidth x outHeight` plane by mapping every output pixel centre through `matrix`
 * (output → source) and sampling the source there. Samples falling outside the source take
 * `fillValue`.
 */
export function warpAffinePlane(
    plane: Float32Array,
    width: number,
    height: number,
    matrix: AffineMatrix,
    outWidth: number,
    outHeight: number,
    interpolation: InterpolationMode,
    fillValue: number,
): Float32Array {
    const [a, b, c, d, e, f] = matrix;
    const out = new Float32Array(outWidth * outHeight);
    const at = (x: number, y: number) =>
        x >= 0 && x < width && y >= 0 && y < height ? plane[y * width + x] : fillValue;

    for (let y = 0; y < outHeight; y++) {
        for (let x = 0; x < outWidth; x++) {
            const u = a * (x + 0.5) + b * (y + 0.5) + c;
            const v = d * (x + 0.5) + e * (y + 0.5) + f;
            if (interpolation === InterpolationMode.Nearest) {
                out[y * outWidth + x] = at(Math.floor(u), Math.floor(v));
                continue;
            }
            if (u < 0 || v < 0 || u > width || v > height) {
                out[y * outWidth + x] = fillValue;
                continue;
            }
            const sx = u - 0.5;
            const sy = v - 0.5;
            const x0 = Math.floor(sx);
            const y0 = Math.floor(sy);
            const dx = sx - x0;
            const dy = sy - y0;
            const clampX = (i: number) => Math.min(Math.max(i, 0), width - 1);
            const clampY = (i: number) => Math.min(Math.max(i, 0), height - 1);
            out[y * outWidth + x] =
                at(clampX(x0), clampY(y0)) * (1 - dx) * (1 - dy) +
                at(clampX(x0 + 1), clampY(y0)) * dx * (1 - dy) +
                at(clampX(x0), clampY(y0 + 1)) * (1 - dx) * dy +
                at(clampX(x0 + 1), clampY(y0 + 1)) * dx * dy;
        }
    }
    return out;
}
