import seedrandom from 'seedrandom';
import type { ArrayDType, ImageMode } from '../../src/@types/index.ts';
import { ArrayImage } from '../../src/core/image/ArrayImage.ts';
import { ObjectImage } from '../../src/core/image/ObjectImage.ts';
import { channelsForMode } from '../../src/core/image/channels.ts';

export function randomObjectImage(mode: ImageMode, width: number, height: number, seed = 'object-image'): ObjectImage {
    const random = seedrandom(seed);
    const data = Array.from({ length: width * height * channelsForMode(mode) }, () => Math.floor(random() * 256));
    return ObjectImage.fromRaw(data, width, height, mode);
}

export function randomArrayImage(shape: number[], dtype: ArrayDType = 'float32', seed = 'array-image'): ArrayImage {
    const random = seedrandom(seed);
    const length = shape.reduce((product, dim) => product * dim, 1);
    const values = Array.from({ length }, () => (dtype === 'uint8' ? Math.floor(random() * 256) : random()));
    return ArrayImage.fromValues(values, shape, dtype);
}

/** Builds an `L` image whose pixel values are given row by row. */
export function grayImage(rows: number[][]): ObjectImage {
    return ObjectImage.fromRaw(rows.flat(), rows[0].length, rows.length, 'L');
}

/** Reads a single-channel ObjectImage back into rows. */
export function grayRows(image: ObjectImage): number[][] {
    const { data } = image.toRaw();
    return Array.from({ length: image.height }, (_, y) => Array.from(data.subarray(y * image.width, (y + 1) * image.width)));
}

export function rawBytes(image: ObjectImage): number[] {
    return Array.from(image.toRaw().data);
}

export function maxAbsDifference(a: ArrayLike<number>, b: ArrayLike<number>): number {
    let max = 0;
    for (let i = 0; i < a.length; i++) {
        max = Math.max(max, Math.abs(a[i] - b[i]));
    }
    return max;
}
