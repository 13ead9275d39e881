// tests/affine.test.ts
import { describe, expect, it } from 'vitest';

import { applyAffine, inverseAffineMatrix } from '../src/core/affine/inverseAffine.ts';
import { ValidationError } from '../src/utils/errors/transformErrors.ts';

const expectMatrixCloseTo = (actual: number[], expected: number[]) => {
    expect(actual).toHaveLength(6);
    expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, 12));
};

describe('inverseAffineMatrix', () => {
    it('should return the identity for a neutral transform', () => {
        expectMatrixCloseTo(inverseAffineMatrix([0, 0], 0, [0, 0], 1, [0, 0]), [1, 0, 0, 0, 1, 0]);
    });

    it('should invert a translation', () => {
        const matrix = inverseAffineMatrix([0, 0], 0, [3, 4], 1, [0, 0]);
        expectMatrixCloseTo(matrix, [1, 0, -3, 0, 1, -4]);
        const [x, y] = applyAffine(matrix, 3, 4);
        expect(x).toBeCloseTo(0, 12);
        expect(y).toBeCloseTo(0, 12);
    });

    it('should invert a scale about the centre', () => {
        const matrix = inverseAffineMatrix([2, 2], 0, [0, 0], 2, [0, 0]);
        expectMatrixCloseTo(matrix, [0.5, 0, 1, 0, 0.5, 1]);
    });

    it('should map output points back through a rotation', () => {
        const matrix = inverseAffineMatrix([0, 0], 90, [0, 0], 1, [0, 0]);
        const [x, y] = applyAffine(matrix, 1, 0);
        expect(x).toBeCloseTo(0, 12);
        expect(y).toBeCloseTo(-1, 12);
    });

    it('should reject non-positive scales', () => {
        expect(() => inverseAffineMatrix([0, 0], 0, [0, 0], 0, [0, 0])).toThrow(ValidationError);
    });
});
