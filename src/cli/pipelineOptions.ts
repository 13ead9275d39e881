// src/cli/pipelineOptions.ts

import { InvalidArgumentError, type Command } from 'commander';
import type { ITransform } from '../@types/index.ts';
import { Compose } from '../core/transforms/Compose.ts';
import { Lambda } from '../core/transforms/Lambda.ts';
import { CenterCrop, Pad, Resize } from '../core/transforms/geometric.ts';
import { Grayscale } from '../core/transforms/photometric.ts';
import { gaussianBlur } from '../core/blur/gaussianBlur.ts';
import { hflip, rotate, vflip } from '../core/functional/geometry.ts';
import {
    adjustBrightness,
    adjustContrast,
    adjustHue,
    adjustSaturation,
} from '../core/functional/photometric.ts';

export interface TransformCliOptions {
    resize?: number[];
    centerCrop?: number[];
    pad?: number[];
    hflip?: boolean;
    vflip?: boolean;
    rotate?: number;
    brightness?: number;
    contrast?: number;
    saturation?: number;
    hue?: number;
    grayscale?: boolean;
    blur?: number[];
}

export function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`"${value}" is not a number.`);
    }
    return parsed;
}

/**
 * Parses a comma-separated list such as `224,224`.
 */
export function parseNumberList(value: string): number[] {
    return value.split(',').map((part) => parseNumber(part));
}

/**
 * Declares the transform flags shared by every command.
 */
export function addTransformOptions(command: Command): Command {
    return command
        .option('--resize <size>', 'Resize to "h,w", or the shorter edge to "n"', parseNumberList)
        .option('--center-crop <size>', 'Crop the centre to "h,w" or "n"', parseNumberList)
        .option('--pad <padding>', 'Zero-pad by "n", "lr,tb" or "l,t,r,b"', parseNumberList)
        .option('--hflip', 'Flip horizontally')
        .option('--vflip', 'Flip vertically')
        .option('--rotate <degrees>', 'Rotate counter-clockwise', parseNumber)
        .option('--brightness <factor>', 'Adjust brightness', parseNumber)
        .option('--contrast <factor>', 'Adjust contrast', parseNumber)
        .option('--saturation <factor>', 'Adjust saturation', parseNumber)
        .option('--hue <factor>', 'Shift hue by a factor in [-0.5, 0.5]', parseNumber)
        .option('--grayscale', 'Convert to grayscale')
        .option('--blur <kernel>', 'Gaussian blur with kernel "k", "kx,ky" or "kx,ky,sigma"', parseNumberList);
}

/**
 * Builds the pipeline the flags describe. Steps run in a fixed order: geometry first, then
 * colour, then blur.
 */
export function buildPipeline(options: TransformCliOptions): ITransform {
    const steps: ITransform[] = [];
    if (options.resize) steps.push(new Resize(options.resize));
    if (options.centerCrop) steps.push(new CenterCrop(options.centerCrop));
    if (options.pad) steps.push(new Pad(options.pad));
    if (options.hflip) steps.push(new Lambda((image) => hflip(image)));
    if (options.vflip) steps.push(new Lambda((image) => vflip(image)));

    const { rotate: angle, brightness, contrast, saturation, hue } = options;
    if (angle !== undefined) steps.push(new Lambda((image) => rotate(image, angle)));
    if (brightness !== undefined) steps.push(new Lambda((image) => adjustBrightness(image, brightness)));
    if (contrast !== undefined) steps.push(new Lambda((image) => adjustContrast(image, contrast)));
    if (saturation !== undefined) steps.push(new Lambda((image) => adjustSaturation(image, saturation)));
    if (hue !== undefined) steps.push(new Lambda((image) => adjustHue(image, hue)));
    if (options.grayscale) steps.push(new Grayscale());

    if (options.blur) {
        const [kx, ky = kx, sigma] = options.blur;
        steps.push(new Lambda((image) => gaussianBlur(image, [kx, ky], sigma)));
    }
    return new Compose(steps);
}
