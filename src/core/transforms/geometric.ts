// src/core/transforms/geometric.ts

import type { Fill, ITransform, Ltrb, PaddingMode, Point, Random, Range, SizeInput } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';
import { centerCrop, crop, hflip, pad, resize, resizedCrop, rotate, vflip } from '../functional/geometry.ts';
import { InterpolationMode } from '../interpolation/interpolationModes.ts';
import { assertPositiveInt, toHeightWidth, toLtrb } from '../functional/validation.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import { config } from '../../config/index.ts';
import { createRandom, randomInt, uniform } from './random.ts';

function checkResizeSize(size: SizeInput): SizeInput {
    const values = typeof size === 'number' ? [size] : size;
    if (values.length !== 1 && values.length !== 2) {
        throw new ValidationError(`Size should be a number or a sequence of 1 or 2 values, got ${values.length}.`);
    }
    values.forEach((value) => assertPositiveInt(value, 'size'));
    return typeof size === 'number' ? size : [...size];
}

function checkProbability(p: number): number {
    if (!Number.isFinite(p) || p < 0 || p > 1) {
        throw new ValidationError(`Probability must be in [0, 1], got ${p}.`);
    }
    return p;
}

function checkRange(range: Range, name: string): Range {
    const [low, high] = range;
    if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
        throw new ValidationError(`${name} should be an increasing pair of numbers, got [${low}, ${high}].`);
    }
    return [low, high];
}

export class Resize implements ITransform {
    readonly size: SizeInput;

    constructor(
        size: SizeInput,
        readonly interpolation: InterpolationMode | number = config.interpolation.resize,
    ) {
        this.size = checkResizeSize(size);
    }

    apply<I extends Image>(image: I): I {
        return resize(image, this.size, this.interpolation);
    }
}

export class CenterCrop implements ITransform {
    readonly size: [number, number];

    constructor(size: SizeInput) {
        this.size = toHeightWidth(size);
    }

    apply<I extends Image>(image: I): I {
        return centerCrop(image, this.size);
    }
}

export class Pad implements ITransform {
    readonly padding: Ltrb;

    constructor(
        padding: number | readonly number[],
        readonly fill: Fill = 0,
        readonly mode: PaddingMode = 'constant',
    ) {
        this.padding = toLtrb(padding);
    }

    apply<I extends Image>(image: I): I {
        return pad(image, this.padding, this.fill, this.mode);
    }
}

export interface RandomCropOptions {
    padding?: number | readonly number[];
    /** Pad images smaller than the crop up to its size first. */
    padIfNeeded?: boolean;
    fill?: Fill;
    paddingMode?: PaddingMode;
    random?: Random;
}

/**
 * Crops a window of fixed size at a random position.
 */
export class RandomCrop implements ITransform {
    readonly size: [number, number];
    private readonly padding?: Ltrb;
    private readonly padIfNeeded: boolean;
    private readonly fill: Fill;
    private readonly paddingMode: PaddingMode;
    private readonly random: Random;

    constructor(size: SizeInput, options: RandomCropOptions = {}) {
        this.size = toHeightWidth(size);
        this.padding = options.padding === undefined ? undefined : toLtrb(options.padding);
        this.padIfNeeded = options.padIfNeeded ?? false;
        this.fill = options.fill ?? 0;
        this.paddingMode = options.paddingMode ?? 'constant';
        this.random = options.random ?? createRandom();
    }

    apply<I extends Image>(image: I): I {
        const [cropHeight, cropWidth] = this.size;
        let current = image;
        if (this.padding) {
            current = pad(current, this.padding, this.fill, this.paddingMode);
        }
        if (this.padIfNeeded && current.width < cropWidth) {
            current = pad(current, [cropWidth - current.width, 0], this.fill, this.paddingMode);
        }
        if (this.padIfNeeded && current.height < cropHeight) {
            current = pad(current, [0, cropHeight - current.height], this.fill, this.paddingMode);
        }

        const { width, height } = current;
        if (width < cropWidth || height < cropHeight) {
            throw new ValidationError(
                `Required crop size (${cropHeight}, ${cropWidth}) is larger than input image size (${height}, ${width}).`,
            );
        }
        const top = randomInt(this.random, 0, height - cropHeight + 1);
        const left = randomInt(this.random, 0, width - cropWidth + 1);
        return crop(current, top, left, cropHeight, cropWidth);
    }
}

export class RandomHorizontalFlip implements ITransform {
    readonly p: number;

    constructor(
        p = 0.5,
        private readonly random: Random = createRandom(),
    ) {
        this.p = checkProbability(p);
    }

    apply<I extends Image>(image: I): I {
        return this.random() < this.p ? hflip(image) : image;
    }
}

export class RandomVerticalFlip implements ITransform {
    readonly p: number;

    constructor(
        p = 0.5,
        private readonly random: Random = createRandom(),
    ) {
        this.p = checkProbability(p);
    }

    apply<I extends Image>(image: I): I {
        return this.random() < this.p ? vflip(image) : image;
    }
}

export interface RandomResizedCropOptions {
    /** Bounds of the crop area relative to the image area. */
    scale?: Range;
    /** Bounds of the crop aspect ratio (width / height). */
    ratio?: Range;
    interpolation?: InterpolationMode | number;
    random?: Random;
}

/** Crop box as `[top, left, height, width]`. */
export type CropBox = [number, number, number, number];

const RESIZED_CROP_ATTEMPTS = 10;

/**
 * Crops a random area with a random aspect ratio and resizes it to `size`.
 */
export class RandomResizedCrop implements ITransform {
    readonly size: [number, number];
    readonly scale: Range;
    readonly ratio: Range;
    readonly interpolation: InterpolationMode | number;
    private readonly random: Random;

    constructor(size: SizeInput, options: RandomResizedCropOptions = {}) {
        this.size = toHeightWidth(size);
        this.scale = checkRange(options.scale ?? [0.08, 1], 'scale');
        this.ratio = checkRange(options.ratio ?? [3 / 4, 4 / 3], 'ratio');
        if (this.ratio[0] <= 0) {
            throw new ValidationError(`ratio values must be positive, got [${this.ratio.join(', ')}].`);
        }
        this.interpolation = options.interpolation ?? config.interpolation.resize;
        this.random = options.random ?? createRandom();
    }

    /**
     * Picks the crop box. Falls back to a centred crop clamped to the ratio bounds when no sampled
     * box fits within the image.
     */
    getParams(width: number, height: number): CropBox {
        const area = width * height;
        const logRatio: Range = [Math.log(this.ratio[0]), Math.log(this.ratio[1])];

        for (let attempt = 0; attempt < RESIZED_CROP_ATTEMPTS; attempt++) {
            const targetArea = area * uniform(this.random, this.scale);
            const aspectRatio = Math.exp(uniform(this.random, logRatio));
            const w = Math.round(Math.sqrt(targetArea * aspectRatio));
            const h = Math.round(Math.sqrt(targetArea / aspectRatio));
            if (w > 0 && w <= width && h > 0 && h <= height) {
                return [randomInt(this.random, 0, height - h + 1), randomInt(this.random, 0, width - w + 1), h, w];
            }
        }

        const inRatio = width / height;
        let w = width;
        let h = height;
        if (inRatio < this.ratio[0]) {
            h = Math.round(w / this.ratio[0]);
        } else if (inRatio > this.ratio[1]) {
            w = Math.round(h * this.ratio[1]);
        }
        return [Math.floor((height - h) / 2), Math.floor((width - w) / 2), h, w];
    }

    apply<I extends Image>(image: I): I {
        const [top, left, height, width] = this.getParams(image.width, image.height);
        return resizedCrop(image, top, left, height, width, this.size, this.interpolation);
    }
}

export interface RandomRotationOptions {
    interpolation?: InterpolationMode | number;
    expand?: boolean;
    center?: Point;
    fill?: Fill;
    random?: Random;
}

/**
 * Rotates by an angle drawn uniformly from `degrees` (or `[-degrees, degrees]`).
 */
export class RandomRotation implements ITransform {
    readonly degrees: Range;
    private readonly options: Omit<RandomRotationOptions, 'random'>;
    private readonly random: Random;

    constructor(degrees: number | Range, options: RandomRotationOptions = {}) {
        if (typeof degrees === 'number') {
            if (!Number.isFinite(degrees) || degrees < 0) {
                throw new ValidationError(`If degrees is a single number, it must be non-negative, got ${degrees}.`);
            }
            this.degrees = [-degrees, degrees];
        } else {
            this.degrees = checkRange(degrees, 'degrees');
        }
        const { random, ...rotateOptions } = options;
        this.options = rotateOptions;
        this.random = random ?? createRandom();
    }

    apply<I extends Image>(image: I): I {
        return rotate(image, uniform(this.random, this.degrees), this.options);
    }
}
