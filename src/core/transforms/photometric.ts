// src/core/transforms/photometric.ts

import type { ITransform, Random, Range } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';
import {
    adjustBrightness,
    adjustContrast,
    adjustHue,
    adjustSaturation,
    rgbToGrayscale,
} from '../functional/photometric.ts';
import { normalize } from '../functional/conversion.ts';
import { gaussianBlur } from '../blur/gaussianBlur.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import { createRandom, shuffled, uniform } from './random.ts';

type JitterInput = number | Range;

/**
 * Turns a jitter amount into the range factors are drawn from. A number `v` means
 * `[center - v, center + v]`; a range yielding only `center` disables the adjustment.
 */
function toJitterRange(
    value: JitterInput,
    name: string,
    center: number,
    bounds: Range,
    clipFirstAtZero: boolean,
): Range | undefined {
    let range: Range;
    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value < 0) {
            throw new ValidationError(`If ${name} is a single number, it must be non-negative, got ${value}.`);
        }
        range = [center - value, center + value];
        if (clipFirstAtZero) range[0] = Math.max(range[0], 0);
    } else {
        range = [value[0], value[1]];
    }
    const [low, high] = range;
    if (!(bounds[0] <= low && low <= high && high <= bounds[1])) {
        throw new ValidationError(`${name} values should be between [${bounds.join(', ')}], got [${low}, ${high}].`);
    }
    return low === center && high === center ? undefined : range;
}

export interface ColorJitterOptions {
    brightness?: JitterInput;
    contrast?: JitterInput;
    saturation?: JitterInput;
    hue?: JitterInput;
    random?: Random;
}

type Adjustment = <I extends Image>(image: I) => I;

/**
 * Randomly changes brightness, contrast, saturation and hue, applying the enabled adjustments in a
 * random order.
 */
export class ColorJitter implements ITransform {
    readonly brightness?: Range;
    readonly contrast?: Range;
    readonly saturation?: Range;
    readonly hue?: Range;
    private readonly random: Random;

    constructor(options: ColorJitterOptions = {}) {
        this.brightness = toJitterRange(options.brightness ?? 0, 'brightness', 1, [0, Infinity], true);
        this.contrast = toJitterRange(options.contrast ?? 0, 'contrast', 1, [0, Infinity], true);
        this.saturation = toJitterRange(options.saturation ?? 0, 'saturation', 1, [0, Infinity], true);
        this.hue = toJitterRange(options.hue ?? 0, 'hue', 0, [-0.5, 0.5], false);
        this.random = options.random ?? createRandom();
    }

    /**
     * Draws the order and factors of one application.
     */
    getParams(): Adjustment[] {
        const adjustments: Adjustment[] = [];
        for (const index of shuffled(this.random, [0, 1, 2, 3])) {
            if (index === 0 && this.brightness) {
                const factor = uniform(this.random, this.brightness);
                adjustments.push((image) => adjustBrightness(image, factor));
            } else if (index === 1 && this.contrast) {
                const factor = uniform(this.random, this.contrast);
                adjustments.push((image) => adjustContrast(image, factor));
            } else if (index === 2 && this.saturation) {
                const factor = uniform(this.random, this.saturation);
                adjustments.push((image) => adjustSaturation(image, factor));
            } else if (index === 3 && this.hue) {
                const factor = uniform(this.random, this.hue);
                adjustments.push((image) => adjustHue(image, factor));
            }
        }
        return adjustments;
    }

    apply<I extends Image>(image: I): I {
        return this.getParams().reduce<I>((current, adjust) => adjust(current), image);
    }
}

export class Grayscale implements ITransform {
    constructor(readonly numOutputChannels: 1 | 3 = 1) {}

    apply<I extends Image>(image: I): I {
        return rgbToGrayscale(image, this.numOutputChannels);
    }
}

/**
 * Blurs with a fixed kernel size and a sigma drawn uniformly from `sigma` on every application.
 */
export class GaussianBlur implements ITransform {
    readonly kernelSize: [number, number];
    readonly sigma: Range;
    private readonly random: Random;

    constructor(kernelSize: number | readonly number[], sigma: number | Range = [0.1, 2], random?: Random) {
        const sizes = typeof kernelSize === 'number' ? [kernelSize, kernelSize] : kernelSize;
        if (sizes.length !== 2 || sizes.some((size) => !Number.isInteger(size) || size <= 0 || size % 2 === 0)) {
            throw new ValidationError(`Kernel size should be odd and positive integers, got [${sizes.join(', ')}].`);
        }
        this.kernelSize = [sizes[0], sizes[1]];
        const range: Range = typeof sigma === 'number' ? [sigma, sigma] : sigma;
        if (!(range[0] > 0 && range[0] <= range[1])) {
            throw new ValidationError(`sigma values should be positive and of the form (min, max), got [${range.join(', ')}].`);
        }
        this.sigma = range;
        this.random = random ?? createRandom();
    }

    apply<I extends Image>(image: I): I {
        const sigma = uniform(this.random, this.sigma);
        return gaussianBlur(image, this.kernelSize, [sigma, sigma]);
    }
}

/**
 * Normalises float32 array images channel-wise; ObjectImages are rejected.
 */
export class Normalize implements ITransform {
    readonly mean: readonly number[];
    readonly std: readonly number[];

    constructor(
        mean: readonly number[],
        std: readonly number[],
        readonly inplace = false,
    ) {
        if (std.some((value) => value === 0)) {
            throw new ValidationError('std evaluated to zero, leading to division by zero.');
        }
        this.mean = [...mean];
        this.std = [...std];
    }

    apply<I extends Image>(image: I): I {
        return normalize(image, this.mean, this.std, this.inplace);
    }
}
