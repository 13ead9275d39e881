// tests/transforms.test.ts
import { describe, expect, it } from 'vitest';

import {
    CenterCrop,
    ColorJitter,
    Compose,
    createRandom,
    GaussianBlur,
    Grayscale,
    Lambda,
    Normalize,
    Pad,
    RandomCrop,
    RandomHorizontalFlip,
    RandomResizedCrop,
    RandomRotation,
    RandomVerticalFlip,
    Resize,
} from '../src/core/transforms/index.ts';
import { hflip, rotate } from '../src/core/functional/geometry.ts';
import { adjustBrightness } from '../src/core/functional/photometric.ts';
import { gaussianBlur } from '../src/core/blur/gaussianBlur.ts';
import { ArrayImage } from '../src/core/image/ArrayImage.ts';
import { ObjectImage } from '../src/core/image/ObjectImage.ts';
import { UnsupportedRepresentationError, ValidationError } from '../src/utils/errors/transformErrors.ts';
import { shuffled } from '../src/core/transforms/random.ts';
import { grayImage, grayRows, randomObjectImage, rawBytes } from './helpers/images.ts';

const constant = (value: number) => () => value;

const counting4x4 = () => grayImage([
    [0, 1, 2, 3],
    [4, 5, 6, 7],
    [8, 9, 10, 11],
    [12, 13, 14, 15],
]);

describe('transforms', () => {
    describe('createRandom', () => {
        it('should be reproducible for a seed', () => {
            const first = createRandom('test-seed');
            const second = createRandom('test-seed');
            const drawn = [first(), first(), first()];
            expect([second(), second(), second()]).toEqual(drawn);
            drawn.forEach((value) => {
                expect(value).toBeGreaterThanOrEqual(0);
                expect(value).toBeLessThan(1);
            });
        });

        it('should shuffle without losing items', () => {
            expect(shuffled(createRandom('test-seed'), [0, 1, 2, 3]).sort()).toEqual([0, 1, 2, 3]);
            expect(shuffled(constant(0), [0, 1, 2, 3])).toEqual([1, 2, 3, 0]);
        });
    });

    describe('Compose', () => {
        it('should chain transforms in order', () => {
            const pipeline = new Compose([new Pad(1), new CenterCrop(2)]);
            const image = grayImage([
                [1, 2],
                [3, 4],
            ]);
            expect(grayRows(pipeline.apply(image))).toEqual([
                [1, 2],
                [3, 4],
            ]);
            expect(new Compose([]).apply(image)).toBe(image);
        });

        it('should run functional steps through Lambda', () => {
            const pipeline = new Compose([new Lambda((image) => hflip(image)), new Resize([1, 2])]);
            const result = pipeline.apply(ArrayImage.fromValues([1, 2, 3, 4], [1, 1, 4], 'uint8'));
            expect(result.shape).toEqual([1, 1, 2]);
            expect(Array.from(result.data)).toEqual([4, 2]);
        });
    });

    describe('Resize', () => {
        it('should validate its size in the constructor', () => {
            expect(() => new Resize([1, 2, 3])).toThrow(ValidationError);
            expect(() => new Resize(0)).toThrow(ValidationError);
            expect(new Resize(25).apply(ObjectImage.create('RGB', 100, 50)).size).toEqual([50, 25]);
        });
    });

    describe('RandomCrop', () => {
        it('should place the window where the random source says', () => {
            expect(grayRows(new RandomCrop(2, { random: constant(0) }).apply(counting4x4()))).toEqual([
                [0, 1],
                [4, 5],
            ]);
            expect(grayRows(new RandomCrop(2, { random: constant(0.999) }).apply(counting4x4()))).toEqual([
                [10, 11],
                [14, 15],
            ]);
        });

        it('should pad small images only when asked', () => {
            const image = grayImage([
                [1, 2],
                [3, 4],
            ]);
            expect(() => new RandomCrop(3, { random: constant(0) }).apply(image)).toThrow(ValidationError);
            const cropped = new RandomCrop(3, { padIfNeeded: true, random: constant(0) }).apply(image);
            expect(grayRows(cropped)).toEqual([
                [0, 0, 0],
                [0, 1, 2],
                [0, 3, 4],
            ]);
        });

        it('should pad before cropping when padding is given', () => {
            const cropped = new RandomCrop(4, { padding: 1, fill: 9, random: constant(0) }).apply(
                grayImage([
                    [1, 2],
                    [3, 4],
                ]),
            );
            expect(grayRows(cropped)).toEqual([
                [9, 9, 9, 9],
                [9, 1, 2, 9],
                [9, 3, 4, 9],
                [9, 9, 9, 9],
            ]);
        });
    });

    describe('random flips', () => {
        it('should flip with probability p', () => {
            const image = counting4x4();
            expect(grayRows(new RandomHorizontalFlip(1).apply(image))[0]).toEqual([3, 2, 1, 0]);
            expect(new RandomHorizontalFlip(0).apply(image)).toBe(image);
            expect(grayRows(new RandomVerticalFlip(0.5, constant(0.2)).apply(image))[0]).toEqual([12, 13, 14, 15]);
            expect(new RandomVerticalFlip(0.5, constant(0.7)).apply(image)).toBe(image);
            expect(() => new RandomHorizontalFlip(1.5)).toThrow(ValidationError);
        });
    });

    describe('RandomResizedCrop', () => {
        it('should sample a box inside the image', () => {
            const transform = new RandomResizedCrop(4, { random: constant(0.5) });
            expect(transform.getParams(10, 10)).toEqual([2, 2, 7, 7]);
            expect(transform.apply(ObjectImage.create('RGB', 10, 10)).size).toEqual([4, 4]);
        });

        it('should fall back to a centred crop within the ratio bounds', () => {
            const transform = new RandomResizedCrop(4, { scale: [1, 1], ratio: [2, 3], random: constant(0.5) });
            expect(transform.getParams(10, 10)).toEqual([2, 0, 5, 10]);
        });

        it('should reject inverted ranges', () => {
            expect(() => new RandomResizedCrop(4, { scale: [1, 0.5] })).toThrow(ValidationError);
        });
    });

    describe('ColorJitter', () => {
        it('should do nothing when every amount is zero', () => {
            const image = randomObjectImage('RGB', 3, 3);
            expect(new ColorJitter().apply(image)).toBe(image);
        });

        it('should draw factors from the configured ranges', () => {
            const image = randomObjectImage('RGB', 3, 3);
            const jitter = new ColorJitter({ brightness: [0.5, 0.5], random: createRandom('test-seed') });
            expect(rawBytes(jitter.apply(image))).toEqual(rawBytes(adjustBrightness(image, 0.5)));
        });

        it('should turn single amounts into ranges around the neutral factor', () => {
            const jitter = new ColorJitter({ brightness: 0.2, contrast: 2, saturation: [0.5, 1.5], hue: 0.1 });
            expect(jitter.brightness?.[0]).toBeCloseTo(0.8, 12);
            expect(jitter.brightness?.[1]).toBeCloseTo(1.2, 12);
            expect(jitter.contrast).toEqual([0, 3]);
            expect(jitter.saturation).toEqual([0.5, 1.5]);
            expect(jitter.hue).toEqual([-0.1, 0.1]);
            expect(jitter.getParams()).toHaveLength(4);
        });

        it('should reject amounts outside their bounds', () => {
            expect(() => new ColorJitter({ brightness: -1 })).toThrow(ValidationError);
            expect(() => new ColorJitter({ hue: 0.6 })).toThrow(ValidationError);
            expect(() => new ColorJitter({ contrast: [1.5, 0.5] })).toThrow(ValidationError);
        });
    });

    describe('Grayscale', () => {
        it('should convert with the requested channel count', () => {
            expect(new Grayscale().apply(randomObjectImage('RGB', 2, 2)).mode).toBe('L');
            expect(new Grayscale(3).apply(randomObjectImage('RGB', 2, 2)).mode).toBe('RGB');
        });
    });

    describe('GaussianBlur', () => {
        it('should blur with a sigma drawn from its range', () => {
            const image = randomObjectImage('RGB', 5, 5);
            const blurred = new GaussianBlur(3, [0.5, 0.5]).apply(image);
            expect(rawBytes(blurred)).toEqual(rawBytes(gaussianBlur(image, [3, 3], [0.5, 0.5])));
        });

        it('should validate kernel size and sigma', () => {
            expect(() => new GaussianBlur(4)).toThrow(ValidationError);
            expect(() => new GaussianBlur(3, [2, 1])).toThrow(ValidationError);
            expect(() => new GaussianBlur(3, 0)).toThrow(ValidationError);
        });
    });

    describe('RandomRotation', () => {
        it('should rotate by an angle drawn from its range', () => {
            const image = randomObjectImage('RGB', 5, 5);
            const rotated = new RandomRotation([90, 90]).apply(image);
            expect(rawBytes(rotated)).toEqual(rawBytes(rotate(image, 90)));
            expect(new RandomRotation(30).degrees).toEqual([-30, 30]);
            expect(() => new RandomRotation(-5)).toThrow(ValidationError);
        });
    });

    describe('Normalize', () => {
        it('should normalise array images and reject ObjectImages', () => {
            const transform = new Normalize([0.5], [0.25]);
            const result = transform.apply(ArrayImage.fromValues([0.75, 0.25], [1, 1, 2]));
            expect(Array.from(result.data)).toEqual([1, -1]);
            expect(() => transform.apply(grayImage([[1]]))).toThrow(UnsupportedRepresentationError);
            expect(() => new Normalize([0], [0])).toThrow(ValidationError);
        });
    });
});
