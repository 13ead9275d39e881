// src/core/interpolation/interpolationModes.ts

import type { ILogger } from '../../@types/index.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';

/**
 * Interpolation modes known to the engine. Each backend supports a subset per primitive.
 */
export enum InterpolationMode {
    Nearest = 'nearest',
    Bilinear = 'bilinear',
    Bicubic = 'bicubic',
    Box = 'box',
    Hamming = 'hamming',
    Lanczos = 'lanczos',
}

/**
 * Integer codes of the legacy interpolation enumeration.
 */
export const LegacyInterpolationCodes: Readonly<Record<number, InterpolationMode>> = Object.freeze({
    0: InterpolationMode.Nearest,
    1: InterpolationMode.Lanczos,
    2: InterpolationMode.Bilinear,
    3: InterpolationMode.Bicubic,
    4: InterpolationMode.Box,
    5: InterpolationMode.Hamming,
});

const modeValues: ReadonlySet<string> = new Set(Object.values(InterpolationMode));

export function isInterpolationMode(value: unknown): value is InterpolationMode {
    return typeof value === 'string' && modeValues.has(value);
}

/**
 * Accepts an interpolation mode or a legacy integer code. Legacy codes are mapped and reported as
 * deprecated through `logger`.
 *
 * @throws {ValidationError} For unknown codes and values.
 */
export function resolveInterpolation(value: InterpolationMode | number, logger: ILogger): InterpolationMode {
    if (typeof value === 'number') {
        const mode = Number.isInteger(value) ? LegacyInterpolationCodes[value] : undefined;
        if (mode === undefined) {
            throw new ValidationError(`Unknown legacy interpolation code ${value}.`);
        }
        logger.warn(
            `Argument interpolation should be of type InterpolationMode instead of int (got ${value}, using "${mode}").`,
        );
        return mode;
    }
    if (!isInterpolationMode(value)) {
        throw new ValidationError(`Unknown interpolation mode "${String(value)}".`);
    }
    return value;
}
