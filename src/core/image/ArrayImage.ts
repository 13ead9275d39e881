// src/core/image/ArrayImage.ts

import type { ArrayDType, ChannelCount, IRasterImage } from '../../@types/index.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import { assertPositiveInteger, toChannelCount } from './channels.ts';

/**
 * Dense image buffer laid out as `[...batch, C, H, W]`. Values are stored as float32 whatever the
 * `dtype`; a `uint8` image holds integers in 0..255 and a `float32` image values in 0..1.
 */
export class ArrayImage implements IRasterImage {
    readonly kind = 'array';
    readonly shape: readonly number[];
    readonly channels: ChannelCount;
    readonly height: number;
    readonly width: number;

    constructor(
        readonly data: Float32Array,
        shape: readonly number[],
        readonly dtype: ArrayDType = 'float32',
    ) {
        if (shape.length < 3) {
            throw new ValidationError(`Array images need a [..., C, H, W] shape, got [${shape.join(', ')}].`);
        }
        shape.forEach((dim, axis) => assertPositiveInteger(dim, `shape[${axis}]`));
        const expected = shape.reduce((product, dim) => product * dim, 1);
        if (data.length !== expected) {
            throw new ValidationError(`Shape [${shape.join(', ')}] needs ${expected} values, got ${data.length}.`);
        }
        this.shape = Object.freeze([...shape]);
        this.channels = toChannelCount(shape[shape.length - 3]);
        this.height = shape[shape.length - 2];
        this.width = shape[shape.length - 1];
    }

    static zeros(shape: readonly number[], dtype: ArrayDType = 'float32'): ArrayImage {
        const length = shape.reduce((product, dim) => product * dim, 1);
        return new ArrayImage(new Float32Array(length), shape, dtype);
    }

    static fromValues(values: ArrayLike<number>, shape: readonly number[], dtype: ArrayDType = 'float32'): ArrayImage {
        return new ArrayImage(Float32Array.from(values), shape, dtype);
    }

    /** Leading axes in front of `[C, H, W]`. */
    get batchShape(): readonly number[] {
        return this.shape.slice(0, -3);
    }

    /** Number of `[C, H, W]` images held by the buffer. */
    get batchSize(): number {
        return this.batchShape.reduce((product, dim) => product * dim, 1);
    }

    /** Number of `H x W` planes held by the buffer. */
    get planeCount(): number {
        return this.batchSize * this.channels;
    }

    get planeSize(): number {
        return this.height * this.width;
    }

    /** Largest value of the dtype's range. */
    get maxValue(): number {
        return this.dtype === 'uint8' ? 255 : 1;
    }

    /**
     * Reads a value; `batchIndex` counts `[C, H, W]` images across all leading axes.
     */
    get(batchIndex: number, channel: number, y: number, x: number): number {
        return this.data[((batchIndex * this.channels + channel) * this.height + y) * this.width + x];
    }

    /** Returns the `index`-th `H x W` plane as a view. */
    plane(index: number): Float32Array {
        return this.data.subarray(index * this.planeSize, (index + 1) * this.planeSize);
    }

    clone(): ArrayImage {
        return new ArrayImage(new Float32Array(this.data), this.shape, this.dtype);
    }

    /**
     * Assembles a new image with this image's leading axes and dtype from one plane per
     * `(batch, channel)` pair.
     */
    withPlanes(planes: readonly Float32Array[], height: number, width: number, channels: number = this.channels): ArrayImage {
        const data = new Float32Array(planes.length * height * width);
        planes.forEach((plane, index) => data.set(plane, index * height * width));
        return new ArrayImage(data, [...this.batchShape, channels, height, width], this.dtype);
    }
}
