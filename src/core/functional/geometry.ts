// src/core/functional/geometry.ts

import type { AffineMatrix, Fill, Ltrb, PaddingMode, Point, SizeInput } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';
import { dispatch, getBackendTraits } from '../backends/dispatcher.ts';
import { InterpolationMode, resolveInterpolation } from '../interpolation/interpolationModes.ts';
import { applyAffine, inverseAffineMatrix } from '../affine/inverseAffine.ts';
import { roundHalfEven } from '../kernels/rounding.ts';
import { config } from '../../config/index.ts';
import { getFunctionalLogger } from '../../utils/logging/logUtils.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import {
    assertFill,
    assertInteger,
    assertInterpolation,
    assertPositiveInt,
    toHeightWidth,
    toLtrb,
} from './validation.ts';

export type FiveCrop<I> = [I, I, I, I, I];
export type TenCrop<I> = [I, I, I, I, I, I, I, I, I, I];

const PADDING_MODES: readonly PaddingMode[] = ['constant', 'edge', 'reflect', 'symmetric'];

/**
 * Returns `[width, height]` of any image.
 */
export function getImageSize(image: Image): [number, number] {
    getBackendTraits(image);
    return [image.width, image.height];
}

export function getImageNumChannels(image: Image): number {
    getBackendTraits(image);
    return image.channels;
}

/**
 * Pads the image on all sides.
 *
 * @param {I} image - The image to pad.
 * @param {number | number[]} padding - One value for every side, `[left/right, top/bottom]`, or
 *   `[left, top, right, bottom]`.
 * @param {Fill} fill - Constant fill; a per-channel tuple is only accepted for ObjectImages.
 * @param {PaddingMode} mode - `reflect` mirrors without repeating the edge pixel, `symmetric` repeats it.
 * @return {I} A new, larger image of the same representation.
 */
export function pad<I extends Image>(image: I, padding: number | readonly number[], fill?: Fill, mode?: PaddingMode): I;
export function pad(
    image: Image,
    padding: number | readonly number[],
    fill: Fill = 0,
    mode: PaddingMode = 'constant',
): Image {
    const traits = getBackendTraits(image);
    const ltrb = toLtrb(padding);
    if (!PADDING_MODES.includes(mode)) {
        throw new ValidationError(`Padding mode should be one of ${PADDING_MODES.join(', ')}, got "${mode}".`);
    }
    assertFill(traits, image, fill);
    return dispatch(image, 'pad', (backend, img) => backend.pad(img, ltrb, fill, mode));
}

/**
 * Crops the box `(top, left, height, width)`. A box reaching outside the image is served by first
 * zero-padding the image by the overrun on each side and then cropping the padded image.
 */
export function crop<I extends Image>(image: I, top: number, left: number, height: number, width: number): I;
export function crop(image: Image, top: number, left: number, height: number, width: number): Image {
    getBackendTraits(image);
    assertInteger(top, 'top');
    assertInteger(left, 'left');
    assertPositiveInt(height, 'height');
    assertPositiveInt(width, 'width');

    const right = left + width;
    const bottom = top + height;
    if (left < 0 || top < 0 || right > image.width || bottom > image.height) {
        const overrun: Ltrb = [
            Math.max(-left, 0),
            Math.max(-top, 0),
            Math.max(right - image.width, 0),
            Math.max(bottom - image.height, 0),
        ];
        const padded = pad(image, overrun, 0, 'constant');
        return crop(padded, top + overrun[1], left + overrun[0], height, width);
    }
    return dispatch(image, 'crop', (backend, img) => backend.crop(img, top, left, height, width));
}

/**
 * Crops the centre of the image. A crop larger than the image pads it with zeros first, putting
 * the odd pixel of an uneven excess on the trailing side.
 *
 * @param {SizeInput} outputSize - `n`, `[n]` or `[h, w]`.
 */
export function centerCrop<I extends Image>(image: I, outputSize: SizeInput): I;
export function centerCrop(image: Image, outputSize: SizeInput): Image {
    getBackendTraits(image);
    const [cropHeight, cropWidth] = toHeightWidth(outputSize, 'output size');

    let current: Image = image;
    if (cropWidth > image.width || cropHeight > image.height) {
        const excessW = Math.max(cropWidth - image.width, 0);
        const excessH = Math.max(cropHeight - image.height, 0);
        current = pad(
            image,
            [
                Math.floor(excessW / 2),
                Math.floor(excessH / 2),
                excessW - Math.floor(excessW / 2),
                excessH - Math.floor(excessH / 2),
            ],
            0,
        );
        if (current.width === cropWidth && current.height === cropHeight) {
            return current;
        }
    }

    const top = roundHalfEven((current.height - cropHeight) / 2);
    const left = roundHalfEven((current.width - cropWidth) / 2);
    return crop(current, top, left, cropHeight, cropWidth);
}

/**
 * Computes the `[height, width]` a resize produces. A single value is the target of the shorter
 * edge; the longer edge keeps the aspect ratio and is truncated.
 */
export function computeResizeSize(width: number, height: number, size: SizeInput): [number, number] {
    if (typeof size !== 'number' && size.length === 2) {
        return toHeightWidth(size);
    }
    if (typeof size !== 'number' && size.length !== 1) {
        throw new ValidationError(`Size should be a number or a sequence of 1 or 2 values, got ${size.length}.`);
    }
    const target = typeof size === 'number' ? size : size[0];
    assertPositiveInt(target, 'size');

    const short = Math.min(width, height);
    const long = Math.max(width, height);
    if (short === target) return [height, width];
    const newLong = Math.trunc((target * long) / short);
    return width <= height ? [newLong, target] : [target, newLong];
}

/**
 * Resizes the image.
 *
 * @param {I} image - The image to resize.
 * @param {SizeInput} size - `[h, w]` for an exact size, or one value for the shorter edge.
 * @param {InterpolationMode | number} interpolation - Legacy integer codes are accepted with a deprecation warning. Array
 *   images support nearest, bilinear and bicubic; ObjectImages support every mode.
 * @return {I} The resized image, or a copy when the size does not change.
 */
export function resize<I extends Image>(image: I, size: SizeInput, interpolation?: InterpolationMode | number): I;
export function resize(
    image: Image,
    size: SizeInput,
    interpolation: InterpolationMode | number = config.interpolation.resize,
): Image {
    const traits = getBackendTraits(image);
    const mode = resolveInterpolation(interpolation, getFunctionalLogger());
    assertInterpolation(traits, 'resize', mode);
    const [height, width] = computeResizeSize(image.width, image.height, size);
    if (height === image.height && width === image.width) {
        return image.clone();
    }
    return dispatch(image, 'resize', (backend, img) => backend.resize(img, height, width, mode));
}

/**
 * @deprecated Use {@link resize}.
 */
export function scale<I extends Image>(image: I, size: SizeInput, interpolation?: InterpolationMode | number): I;
export function scale(image: Image, size: SizeInput, interpolation?: InterpolationMode | number): Image {
    getFunctionalLogger().warn('The use of scale is deprecated, please use resize instead.');
    return resize(image, size, interpolation);
}

/**
 * Crops then resizes; exactly `resize(crop(image, ...), size, interpolation)`.
 */
export function resizedCrop<I extends Image>(
    image: I,
    top: number,
    left: number,
    height: number,
    width: number,
    size: SizeInput,
    interpolation?: InterpolationMode | number,
): I;
export function resizedCrop(
    image: Image,
    top: number,
    left: number,
    height: number,
    width: number,
    size: SizeInput,
    interpolation: InterpolationMode | number = config.interpolation.resize,
): Image {
    return resize(crop(image, top, left, height, width), size, interpolation);
}

export function hflip<I extends Image>(image: I): I;
export function hflip(image: Image): Image {
    return dispatch(image, 'hflip', (backend, img) => backend.hflip(img));
}

export function vflip<I extends Image>(image: I): I;
export function vflip(image: Image): Image {
    return dispatch(image, 'vflip', (backend, img) => backend.vflip(img));
}

/**
 * Crops the four corners and the centre: `[topLeft, topRight, bottomLeft, bottomRight, center]`.
 * Unlike {@link centerCrop}, a crop larger than the image is rejected rather than padded.
 */
export function fiveCrop<I extends Image>(image: I, size: SizeInput): FiveCrop<I>;
export function fiveCrop(image: Image, size: SizeInput): FiveCrop<Image> {
    getBackendTraits(image);
    const [cropHeight, cropWidth] = toHeightWidth(size);
    const { width, height } = image;
    if (cropWidth > width || cropHeight > height) {
        throw new ValidationError(
            `Requested crop size (${cropHeight}, ${cropWidth}) is bigger than input size (${height}, ${width}).`,
        );
    }

    return [
        crop(image, 0, 0, cropHeight, cropWidth),
        crop(image, 0, width - cropWidth, cropHeight, cropWidth),
        crop(image, height - cropHeight, 0, cropHeight, cropWidth),
        crop(image, height - cropHeight, width - cropWidth, cropHeight, cropWidth),
        centerCrop(image, [cropHeight, cropWidth]),
    ];
}

/**
 * {@link fiveCrop} of the image followed by {@link fiveCrop} of its flip (horizontal unless
 * `verticalFlip`).
 */
export function tenCrop<I extends Image>(image: I, size: SizeInput, verticalFlip?: boolean): TenCrop<I>;
export function tenCrop(image: Image, size: SizeInput, verticalFlip = false): TenCrop<Image> {
    const [cropHeight, cropWidth] = toHeightWidth(size);
    const firstFive = fiveCrop(image, [cropHeight, cropWidth]);
    const flipped = verticalFlip ? vflip(image) : hflip(image);
    const secondFive = fiveCrop(flipped, [cropHeight, cropWidth]);
    return [...firstFive, ...secondFive];
}

export interface RotateOptions {
    /** Defaults to nearest. Legacy integer codes are accepted with a deprecation warning. */
    interpolation?: InterpolationMode | number;
    /** Grow the output so the whole rotated image fits; assumes rotation about the centre. */
    expand?: boolean;
    /** `[x, y]` in pixels from the top-left corner; defaults to the image centre. */
    center?: Point;
    fill?: Fill;
}

const EXPAND_TOLERANCE = 1e4;

/**
 * Output size and matrix for `expand`: the canvas grows to the bounding box of the four rotated
 * corners and the matrix is shifted so the rotated image stays centred.
 */
function expandTarget(matrix: AffineMatrix, width: number, height: number): [AffineMatrix, number, number] {
    const corners: Point[] = [
        [0, 0],
        [width, 0],
        [width, height],
        [0, height],
    ].map(([x, y]) => applyAffine(matrix, x, y));
    const snap = (value: number) => Math.trunc(value * EXPAND_TOLERANCE) / EXPAND_TOLERANCE;
    const xs = corners.map(([x]) => snap(x));
    const ys = corners.map(([, y]) => snap(y));
    const outWidth = Math.ceil(Math.max(...xs)) - Math.floor(Math.min(...xs));
    const outHeight = Math.ceil(Math.max(...ys)) - Math.floor(Math.min(...ys));

    const [c, f] = applyAffine(matrix, -(outWidth - width) / 2, -(outHeight - height) / 2);
    const expanded: AffineMatrix = [matrix[0], matrix[1], c, matrix[3], matrix[4], f];
    return [expanded, outWidth, outHeight];
}

/**
 * Rotates the image counter-clockwise by `angle` degrees. Only ObjectImages can be rotated; array
 * images fail with an UnsupportedRepresentationError.
 */
export function rotate<I extends Image>(image: I, angle: number, options?: RotateOptions): I;
export function rotate(image: Image, angle: number, options: RotateOptions = {}): Image {
    const traits = getBackendTraits(image);
    if (!Number.isFinite(angle)) {
        throw new ValidationError(`Rotation angle must be a finite number, got ${angle}.`);
    }
    const interpolation = resolveInterpolation(
        options.interpolation ?? config.interpolation.rotate,
        getFunctionalLogger(),
    );
    assertInterpolation(traits, 'rotate', interpolation);
    const fill = options.fill ?? 0;
    assertFill(traits, image, fill);

    const center: Point = options.center ?? [image.width * 0.5, image.height * 0.5];
    // The inverse matrix maps output to source, hence the negated angle.
    let matrix = inverseAffineMatrix(center, -angle, [0, 0], 1, [0, 0]);
    let width = image.width;
    let height = image.height;
    if (options.expand) {
        [matrix, width, height] = expandTarget(matrix, width, height);
    }

    return dispatch(image, 'rotate', (backend, img) =>
        backend.rotate(img, { matrix, width, height, interpolation, fill }),
    );
}
