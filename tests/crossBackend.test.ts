// tests/crossBackend.test.ts
import { describe, expect, it } from 'vitest';

import type { Image } from '../src/core/image/index.ts';
import { ObjectImage } from '../src/core/image/ObjectImage.ts';
import { pilToArray } from '../src/core/functional/conversion.ts';
import { centerCrop, crop, hflip, pad, resize, vflip } from '../src/core/functional/geometry.ts';
import {
    adjustBrightness,
    adjustContrast,
    adjustHue,
    adjustSaturation,
    rgbToGrayscale,
} from '../src/core/functional/photometric.ts';
import { gaussianBlur } from '../src/core/blur/gaussianBlur.ts';
import { InterpolationMode } from '../src/core/interpolation/interpolationModes.ts';
import { maxAbsDifference, randomObjectImage } from './helpers/images.ts';

type Primitive = <I extends Image>(image: I) => I;

const cases: Array<[string, Primitive, number]> = [
    ['crop', (image) => crop(image, 1, 2, 3, 4), 0],
    ['centerCrop', (image) => centerCrop(image, [8, 3]), 0],
    ['pad constant', (image) => pad(image, [1, 2, 3, 4], 9), 0],
    ['pad edge', (image) => pad(image, 2, 0, 'edge'), 0],
    ['pad reflect', (image) => pad(image, [3, 1], 0, 'reflect'), 0],
    ['pad symmetric', (image) => pad(image, [1, 3], 0, 'symmetric'), 0],
    ['hflip', (image) => hflip(image), 0],
    ['vflip', (image) => vflip(image), 0],
    ['resize bilinear upscale', (image) => resize(image, [9, 11], InterpolationMode.Bilinear), 1],
    ['adjustBrightness', (image) => adjustBrightness(image, 1.7), 0],
    ['adjustContrast', (image) => adjustContrast(image, 0.5), 1],
    ['adjustSaturation', (image) => adjustSaturation(image, 0.5), 1],
    ['adjustHue', (image) => adjustHue(image, 0.2), 1],
    ['rgbToGrayscale', (image) => rgbToGrayscale(image, 3), 1],
    ['gaussianBlur', (image) => gaussianBlur(image, [3, 5], [0.7, 1.2]), 0],
];

describe('cross-representation agreement', () => {
    const objectImage = randomObjectImage('RGB', 7, 5, 'agreement');
    const arrayImage = pilToArray(objectImage);

    it('resize bicubic should stay within a few levels on a smooth ramp', () => {
        const ramp = ObjectImage.fromRaw([0, 50, 100, 150, 200, 250], 6, 1, 'L');
        const fromObject = pilToArray(resize(ramp, [1, 12], InterpolationMode.Bicubic));
        const fromArray = resize(pilToArray(ramp), [1, 12], InterpolationMode.Bicubic);
        expect(fromArray.shape).toEqual(fromObject.shape);
        expect(maxAbsDifference(fromArray.data, fromObject.data)).toBeLessThanOrEqual(3);
    });

    it.each(cases)('%s should give matching results on both backends', (_name, primitive, tolerance) => {
        const fromObject: ObjectImage = primitive(objectImage);
        const fromArray = primitive(arrayImage);
        const expected = pilToArray(fromObject);
        expect(fromArray.shape).toEqual(expected.shape);
        expect(maxAbsDifference(fromArray.data, expected.data)).toBeLessThanOrEqual(tolerance);
    });
});
