// src/core/functional/validation.ts

import type { BackendTraits, Fill, IRasterImage, Ltrb, SizeInput } from '../../@types/index.ts';
import type { InterpolationMode } from '../interpolation/interpolationModes.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';

export function assertInteger(value: number, name: string): void {
    if (!Number.isInteger(value)) {
        throw new ValidationError(`${name} must be an integer, got ${value}.`);
    }
}

export function assertPositiveInt(value: number, name: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ValidationError(`${name} must be a positive integer, got ${value}.`);
    }
}

/**
 * Expands one, two or four padding values to left/top/right/bottom.
 */
export function toLtrb(padding: number | readonly number[]): Ltrb {
    const values = typeof padding === 'number' ? [padding] : padding;
    values.forEach((value) => {
        if (!Number.isInteger(value) || value < 0) {
            throw new ValidationError(`Padding values must be non-negative integers, got ${value}.`);
        }
    });
    switch (values.length) {
        case 1:
            return [values[0], values[0], values[0], values[0]];
        case 2:
            return [values[0], values[1], values[0], values[1]];
        case 4:
            return [values[0], values[1], values[2], values[3]];
        default:
            throw new ValidationError(
                `Padding must be provided as a single value, or a sequence of 2 or 4 values, got ${values.length}.`,
            );
    }
}

/**
 * Reads a crop size given as `n`, `[n]` or `[h, w]`.
 */
export function toHeightWidth(size: SizeInput, name = 'size'): [number, number] {
    const values = typeof size === 'number' ? [size, size] : size.length === 1 ? [size[0], size[0]] : size;
    if (values.length !== 2) {
        throw new ValidationError(`Please provide only two dimensions (h, w) for ${name}, got ${values.length}.`);
    }
    const [height, width] = values;
    assertPositiveInt(height, `${name} height`);
    assertPositiveInt(width, `${name} width`);
    return [height, width];
}

/**
 * Checks a constant fill against the backend's fill policy and the image's channel count.
 */
export function assertFill(traits: BackendTraits, image: IRasterImage, fill: Fill): void {
    if (typeof fill === 'number') {
        if (!Number.isFinite(fill)) throw new ValidationError(`Fill must be a finite number, got ${fill}.`);
        return;
    }
    if (!traits.perChannelFill) {
        throw new ValidationError(`Only a scalar fill is supported for ${traits.variant} images.`);
    }
    if (fill.length !== image.channels) {
        throw new ValidationError(`Fill needs ${image.channels} values, got ${fill.length}.`);
    }
}

/**
 * Rejects an interpolation mode the backend does not offer for `primitive`. Backends that do not
 * register the primitive at all are left to the dispatcher.
 */
export function assertInterpolation(
    traits: BackendTraits,
    primitive: 'resize' | 'rotate',
    mode: InterpolationMode,
): void {
    if (traits.capabilities.has(primitive) && !traits.interpolationModes[primitive].has(mode)) {
        const supported = [...traits.interpolationModes[primitive]].join(', ');
        throw new ValidationError(
            `Interpolation "${mode}" is not supported by ${primitive} on ${traits.variant} images (supported: ${supported}).`,
        );
    }
}

export function assertChannels(image: IRasterImage, allowed: readonly number[], operation: string): void {
    if (!allowed.includes(image.channels)) {
        throw new ValidationError(
            `${operation} expects an image with ${allowed.join(' or ')} channels, got ${image.channels}.`,
        );
    }
}

export function assertNonNegativeFactor(value: number, name: string): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new ValidationError(`${name} must be a non-negative number, got ${value}.`);
    }
}
