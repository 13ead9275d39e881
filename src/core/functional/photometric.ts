// src/core/functional/photometric.ts

import type { BackendTraits } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';
import { dispatch, getBackendTraits } from '../backends/dispatcher.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import { assertChannels, assertNonNegativeFactor } from './validation.ts';

const COLOR_CHANNELS = [1, 3] as const;
const COLOR_ALPHA_CHANNELS = [1, 2, 3, 4] as const;

function blendableChannels(traits: BackendTraits): readonly number[] {
    return traits.keepsAlpha ? COLOR_ALPHA_CHANNELS : COLOR_CHANNELS;
}

/**
 * Scales intensities: 0 gives a black image, 1 the original, 2 doubles the brightness.
 */
export function adjustBrightness<I extends Image>(image: I, brightnessFactor: number): I;
export function adjustBrightness(image: Image, brightnessFactor: number): Image {
    const traits = getBackendTraits(image);
    assertNonNegativeFactor(brightnessFactor, 'brightness factor');
    assertChannels(image, blendableChannels(traits), 'adjustBrightness');
    return dispatch(image, 'adjustBrightness', (backend, img) => backend.adjustBrightness(img, brightnessFactor));
}

/**
 * Blends with the image's mean luminance: 0 gives a flat gray image, 1 the original.
 */
export function adjustContrast<I extends Image>(image: I, contrastFactor: number): I;
export function adjustContrast(image: Image, contrastFactor: number): Image {
    const traits = getBackendTraits(image);
    assertNonNegativeFactor(contrastFactor, 'contrast factor');
    assertChannels(image, blendableChannels(traits), 'adjustContrast');
    return dispatch(image, 'adjustContrast', (backend, img) => backend.adjustContrast(img, contrastFactor));
}

/**
 * Blends with the grayscale version: 0 gives a black and white image, 1 the original.
 */
export function adjustSaturation<I extends Image>(image: I, saturationFactor: number): I;
export function adjustSaturation(image: Image, saturationFactor: number): Image {
    const traits = getBackendTraits(image);
    assertNonNegativeFactor(saturationFactor, 'saturation factor');
    assertChannels(image, blendableChannels(traits), 'adjustSaturation');
    return dispatch(image, 'adjustSaturation', (backend, img) => backend.adjustSaturation(img, saturationFactor));
}

/**
 * Rotates the hue by `hueFactor` turns in HSV space. Both -0.5 and 0.5 give the complementary
 * colours. Single-channel images come back unchanged.
 *
 * @param {number} hueFactor - In [-0.5, 0.5].
 */
export function adjustHue<I extends Image>(image: I, hueFactor: number): I;
export function adjustHue(image: Image, hueFactor: number): Image {
    getBackendTraits(image);
    if (!Number.isFinite(hueFactor) || hueFactor < -0.5 || hueFactor > 0.5) {
        throw new ValidationError(`hue factor (${hueFactor}) is not in [-0.5, 0.5].`);
    }
    assertChannels(image, COLOR_CHANNELS, 'adjustHue');
    return dispatch(image, 'adjustHue', (backend, img) => backend.adjustHue(img, hueFactor));
}

/**
 * Converts to grayscale with luma weights.
 *
 * @param {number} numOutputChannels - 1 for a single channel, 3 to repeat the luma in r, g and b.
 */
export function rgbToGrayscale<I extends Image>(image: I, numOutputChannels?: number): I;
export function rgbToGrayscale(image: Image, numOutputChannels: number = 1): Image {
    getBackendTraits(image);
    if (numOutputChannels !== 1 && numOutputChannels !== 3) {
        throw new ValidationError(`num_output_channels should be either 1 or 3, got ${numOutputChannels}.`);
    }
    assertChannels(image, COLOR_CHANNELS, 'rgbToGrayscale');
    const outputChannels = numOutputChannels === 1 ? 1 : 3;
    return dispatch(image, 'rgbToGrayscale', (backend, img) => backend.rgbToGrayscale(img, outputChannels));
}
