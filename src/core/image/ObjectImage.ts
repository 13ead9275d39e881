// src/core/image/ObjectImage.ts

import type { ChannelCount, Fill, ImageMode, IRasterImage, IRawImageData } from '../../@types/index.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';
import { assertPositiveInteger, channelsForMode, modeForChannels, toChannelCount } from './channels.ts';

/**
 * Decoded 2-D pixel grid with a colour mode. Pixels are only reachable through the accessors;
 * the backing bytes never leave the instance without a copy.
 */
export class ObjectImage implements IRasterImage {
    readonly kind = 'object';
    readonly channels: ChannelCount;
    readonly #pixels: Uint8ClampedArray;

    private constructor(
        readonly mode: ImageMode,
        readonly width: number,
        readonly height: number,
        pixels: Uint8ClampedArray,
    ) {
        this.channels = channelsForMode(mode);
        this.#pixels = pixels;
    }

    /**
     * Creates an image filled with a constant value (scalar or one value per channel).
     */
    static create(mode: ImageMode, width: number, height: number, fill: Fill = 0): ObjectImage {
        assertPositiveInteger(width, 'width');
        assertPositiveInteger(height, 'height');
        const channels = channelsForMode(mode);
        const values = typeof fill === 'number' ? new Array<number>(channels).fill(fill) : fill;
        if (values.length !== channels) {
            throw new ValidationError(`Fill needs ${channels} values for mode ${mode}, got ${values.length}.`);
        }
        const pixels = new Uint8ClampedArray(width * height * channels);
        for (let i = 0; i < pixels.length; i++) {
            pixels[i] = values[i % channels];
        }
        return new ObjectImage(mode, width, height, pixels);
    }

    /**
     * Builds an image from interleaved row-major bytes. The bytes are copied.
     *
     * @param {ArrayLike<number>} data - `width * height * channels` values, clamped to 0..255.
     * @param {ImageMode | number} mode - Colour mode, or the channel count to derive one from.
     */
    static fromRaw(data: ArrayLike<number>, width: number, height: number, mode: ImageMode | number): ObjectImage {
        assertPositiveInteger(width, 'width');
        assertPositiveInteger(height, 'height');
        const resolvedMode = typeof mode === 'number' ? modeForChannels(toChannelCount(mode)) : mode;
        const channels = channelsForMode(resolvedMode);
        if (data.length !== width * height * channels) {
            throw new ValidationError(
                `Expected ${width * height * channels} values for a ${width}x${height} ${resolvedMode} image, got ${data.length}.`,
            );
        }
        return new ObjectImage(resolvedMode, width, height, Uint8ClampedArray.from(data));
    }

    get size(): [number, number] {
        return [this.width, this.height];
    }

    /** Reads one pixel as a value per channel. */
    getPixel(x: number, y: number): number[] {
        const offset = this.offsetOf(x, y);
        return Array.from(this.#pixels.subarray(offset, offset + this.channels));
    }

    /** Writes one pixel; values are clamped and rounded to 0..255. */
    putPixel(x: number, y: number, value: readonly number[]): void {
        if (value.length !== this.channels) {
            throw new ValidationError(`Pixel needs ${this.channels} values, got ${value.length}.`);
        }
        this.#pixels.set(value, this.offsetOf(x, y));
    }

    /** Copies the pixels out as interleaved bytes. */
    toRaw(): IRawImageData {
        return {
            data: new Uint8Array(this.#pixels),
            info: { width: this.width, height: this.height, channels: this.channels },
        };
    }

    clone(): ObjectImage {
        return new ObjectImage(this.mode, this.width, this.height, new Uint8ClampedArray(this.#pixels));
    }

    private offsetOf(x: number, y: number): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new ValidationError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} image.`);
        }
        return (y * this.width + x) * this.channels;
    }
}
