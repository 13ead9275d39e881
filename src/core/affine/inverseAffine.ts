// src/core/affine/inverseAffine.ts

import type { AffineMatrix, Point } from '../../@types/index.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Computes the inverse of the affine map `M = T * C * RSS * C^-1`, i.e.
 * `M^-1 = C * RSS^-1 * C^-1 * T^-1`, where
 *
 * - `T` translates by `translate`,
 * - `C` moves the origin to `center`,
 * - `RSS` rotates by `angle` (degrees, counter-clockwise), scales by `scale` and shears by
 *   `shear` (degrees along x and y).
 *
 * The result maps output pixel coordinates back to source coordinates, which is what resampling
 * needs.
 *
 * @return {AffineMatrix} Row-major `[a, b, c, d, e, f]`.
 */
export function inverseAffineMatrix(
    center: Point,
    angle: number,
    translate: Point,
    scale: number,
    shear: Point,
): AffineMatrix {
    if (!Number.isFinite(scale) || scale <= 0) {
        throw new ValidationError(`Affine scale must be a positive number, got ${scale}.`);
    }
    const rot = toRadians(angle);
    const sx = toRadians(shear[0]);
    const sy = toRadians(shear[1]);
    const [cx, cy] = center;
    const [tx, ty] = translate;

    // RSS without scaling; its determinant is 1.
    const a = Math.cos(rot - sy) / Math.cos(sy);
    const b = (-Math.cos(rot - sy) * Math.tan(sx)) / Math.cos(sy) - Math.sin(rot);
    const c = Math.sin(rot - sy) / Math.cos(sy);
    const d = (-Math.sin(rot - sy) * Math.tan(sx)) / Math.cos(sy) + Math.cos(rot);

    const matrix: AffineMatrix = [d / scale, -b / scale, 0, -c / scale, a / scale, 0];

    matrix[2] += matrix[0] * (-cx - tx) + matrix[1] * (-cy - ty);
    matrix[5] += matrix[3] * (-cx - tx) + matrix[4] * (-cy - ty);

    matrix[2] += cx;
    matrix[5] += cy;

    return matrix;
}

/** Maps a point through a 2x3 affine matrix. */
export function applyAffine(matrix: AffineMatrix, x: number, y: number): Point {
    const [a, b, c, d, e, f] = matrix;
    return [a * x + b * y + c, d * x + e * y + f];
}
