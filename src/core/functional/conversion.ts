// src/core/functional/conversion.ts

import type { ArrayDType, ImageMode } from '../../@types/index.ts';
import { ArrayImage } from '../image/ArrayImage.ts';
import type { Image } from '../image/index.ts';
import { ObjectImage } from '../image/ObjectImage.ts';
import { channelsForMode, modeForChannels } from '../image/channels.ts';
import { splitChannels, mergeChannels } from '../kernels/planes.ts';
import { truncateToByte } from '../kernels/rounding.ts';
import { ImageVariant } from '../backends/backendVariants.ts';
import {
    TypeMismatchError,
    UnsupportedRepresentationError,
    ValidationError,
} from '../../utils/errors/transformErrors.ts';

const FLOAT_TO_BYTE_SCALE = 256 - 1e-3;

function objectToPlanes(image: ObjectImage): Float32Array[] {
    const { data, info } = image.toRaw();
    return splitChannels(data, info.width, info.height, info.channels);
}

function requireObjectImage(image: unknown): ObjectImage {
    if (!(image instanceof ObjectImage)) throw new TypeMismatchError(image);
    return image;
}

function requireArrayImage(image: unknown, primitive: string): ArrayImage {
    if (image instanceof ArrayImage) return image;
    if (image instanceof ObjectImage) throw new UnsupportedRepresentationError(primitive, ImageVariant.Object);
    throw new TypeMismatchError(image);
}

/**
 * Converts an ObjectImage to a float32 `[C, H, W]` array with values in 0..1.
 */
export function toArrayImage(image: ObjectImage): ArrayImage {
    const source = requireObjectImage(image);
    const planes = objectToPlanes(source).map((plane) => plane.map((value) => value / 255));
    const data = new Float32Array(planes.length * source.width * source.height);
    planes.forEach((plane, c) => data.set(plane, c * plane.length));
    return new ArrayImage(data, [source.channels, source.height, source.width], 'float32');
}

/**
 * Converts an ObjectImage to a uint8 `[C, H, W]` array, keeping the byte values.
 */
export function pilToArray(image: ObjectImage): ArrayImage {
    const source = requireObjectImage(image);
    const planes = objectToPlanes(source);
    const data = new Float32Array(planes.length * source.width * source.height);
    planes.forEach((plane, c) => data.set(plane, c * plane.length));
    return new ArrayImage(data, [source.channels, source.height, source.width], 'uint8');
}

/**
 * Converts a single `[C, H, W]` array to an ObjectImage. Float values are scaled by 255 and
 * truncated.
 *
 * @param {ArrayImage} image - A single, unbatched array image.
 * @param {ImageMode} [mode] - Must agree with the channel count; derived from it when omitted.
 * @return {ObjectImage} The converted image.
 */
export function toObjectImage(image: ArrayImage, mode?: ImageMode): ObjectImage {
    const source = requireArrayImage(image, 'toObjectImage');
    if (source.batchShape.length > 0) {
        throw new ValidationError(`Expected a [C, H, W] array, got shape [${source.shape.join(', ')}].`);
    }
    const resolvedMode = mode ?? modeForChannels(source.channels);
    if (channelsForMode(resolvedMode) !== source.channels) {
        throw new ValidationError(`Mode ${resolvedMode} does not fit an image with ${source.channels} channels.`);
    }
    const scale = source.dtype === 'float32' ? 255 : 1;
    const planes = Array.from({ length: source.channels }, (_, c) => source.plane(c));
    const data = mergeChannels(planes, (value) => truncateToByte(value * scale));
    return ObjectImage.fromRaw(data, source.width, source.height, resolvedMode);
}

/**
 * Changes the value domain of an array image, rescaling values.
 */
export function convertImageDtype(image: ArrayImage, dtype: ArrayDType): ArrayImage {
    const source = requireArrayImage(image, 'convertImageDtype');
    if (source.dtype === dtype) return source.clone();
    const data =
        dtype === 'uint8'
            ? source.data.map((value) => truncateToByte(value * FLOAT_TO_BYTE_SCALE))
            : source.data.map((value) => value / 255);
    return new ArrayImage(data, source.shape, dtype);
}

/**
 * Normalises a float32 array image channel-wise: `(value - mean[c]) / std[c]`.
 *
 * The input is left untouched unless `inplace` is set, in which case its buffer is overwritten and
 * the same image is returned.
 *
 * @param {ArrayImage} image - A float32 array image.
 * @param {number[]} mean - One value per channel, or one for all.
 * @param {number[]} std - One value per channel, or one for all; none may be zero.
 * @param {boolean} [inplace=false] - Overwrite the input instead of allocating.
 * @return {ArrayImage} The normalised image.
 */
export function normalize(
    image: ArrayImage,
    mean: readonly number[],
    std: readonly number[],
    inplace?: boolean,
): ArrayImage;
export function normalize<I extends Image>(image: I, mean: readonly number[], std: readonly number[], inplace?: boolean): I;
export function normalize(
    image: Image,
    mean: readonly number[],
    std: readonly number[],
    inplace = false,
): Image {
    const source = requireArrayImage(image, 'normalize');
    if (source.dtype !== 'float32') {
        throw new ValidationError(`Input should be a float32 image, got ${source.dtype}.`);
    }
    const perChannel = (values: readonly number[], name: string): number[] => {
        if (values.length === 1) return new Array<number>(source.channels).fill(values[0]);
        if (values.length !== source.channels) {
            throw new ValidationError(`${name} needs 1 or ${source.channels} values, got ${values.length}.`);
        }
        return [...values];
    };
    const means = perChannel(mean, 'mean');
    const stds = perChannel(std, 'std');
    if (stds.some((value) => value === 0)) {
        throw new ValidationError('std evaluated to zero, leading to division by zero.');
    }

    const target = inplace ? source : source.clone();
    for (let index = 0; index < target.planeCount; index++) {
        const c = index % target.channels;
        const plane = target.plane(index);
        for (let i = 0; i < plane.length; i++) {
            plane[i] = (plane[i] - means[c]) / stds[c];
        }
    }
    return target;
}
