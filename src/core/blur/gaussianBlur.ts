// src/core/blur/gaussianBlur.ts

import type { Image } from '../image/index.ts';
import { ArrayImage } from '../image/ArrayImage.ts';
import { getBackendTraits } from '../backends/dispatcher.ts';
import { convolveSeparable, gaussianKernel1d } from '../kernels/convolution.ts';
import { roundToByte } from '../kernels/rounding.ts';
import { pilToArray, toObjectImage } from '../functional/conversion.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';

/**
 * Sigma used when none is given for a kernel of `kernelSize` taps.
 */
export function defaultSigma(kernelSize: number): number {
    return kernelSize * 0.15 + 0.35;
}

function toKernelSizes(kernelSize: number | readonly number[]): [number, number] {
    const sizes = typeof kernelSize === 'number' ? [kernelSize, kernelSize] : kernelSize;
    if (sizes.length !== 2) {
        throw new ValidationError(`If kernel_size is a sequence its length should be 2, got ${sizes.length}.`);
    }
    sizes.forEach((size) => {
        if (!Number.isInteger(size) || size <= 0 || size % 2 === 0) {
            throw new ValidationError(`kernel_size should have odd and positive integers, got [${sizes.join(', ')}].`);
        }
    });
    return [sizes[0], sizes[1]];
}

function toSigmas(sigma: number | readonly number[] | undefined, [kx, ky]: [number, number]): [number, number] {
    const sigmas =
        sigma === undefined
            ? [defaultSigma(kx), defaultSigma(ky)]
            : typeof sigma === 'number'
              ? [sigma, sigma]
              : sigma.length === 1
                ? [sigma[0], sigma[0]]
                : sigma;
    if (sigmas.length !== 2) {
        throw new ValidationError(`If sigma is a sequence, its length should be 2, got ${sigmas.length}.`);
    }
    sigmas.forEach((value) => {
        if (!Number.isFinite(value) || value <= 0) {
            throw new ValidationError(`sigma should have positive values, got [${sigmas.join(', ')}].`);
        }
    });
    return [sigmas[0], sigmas[1]];
}

function blurArray(image: ArrayImage, kernelX: number[], kernelY: number[]): ArrayImage {
    const planes: Float32Array[] = [];
    for (let index = 0; index < image.planeCount; index++) {
        const out = convolveSeparable(image.plane(index), image.width, image.height, kernelX, kernelY);
        planes.push(image.dtype === 'uint8' ? out.map(roundToByte) : out);
    }
    return image.withPlanes(planes, image.height, image.width);
}

/**
 * Blurs with a separable Gaussian kernel, reflecting at the borders. ObjectImages are converted to
 * a uint8 array, blurred and converted back.
 *
 * @param {number | number[]} kernelSize - Odd positive size, or `[kx, ky]`.
 * @param {number | number[]} [sigma] - Standard deviation, or `[sx, sy]`; defaults to `0.15 * k + 0.35` per axis.
 */
export function gaussianBlur<I extends Image>(
    image: I,
    kernelSize: number | readonly number[],
    sigma?: number | readonly number[],
): I;
export function gaussianBlur(
    image: Image,
    kernelSize: number | readonly number[],
    sigma?: number | readonly number[],
): Image {
    getBackendTraits(image);
    const [kx, ky] = toKernelSizes(kernelSize);
    const [sx, sy] = toSigmas(sigma, [kx, ky]);
    const kernelX = gaussianKernel1d(kx, sx);
    const kernelY = gaussianKernel1d(ky, sy);

    if (image instanceof ArrayImage) {
        return blurArray(image, kernelX, kernelY);
    }
    return toObjectImage(blurArray(pilToArray(image), kernelX, kernelY), image.mode);
}
