// src/core/backends/strategies/ArrayImageBackend.ts

import _ from 'lodash';
import type { Fill, ImageBackend, IWarpTarget, Ltrb, PaddingMode, Primitive } from '../../../@types/index.ts';
import { ArrayImage } from '../../image/ArrayImage.ts';
import { InterpolationMode } from '../../interpolation/interpolationModes.ts';
import { cropPlane, flipPlaneHorizontal, flipPlaneVertical } from '../../kernels/planes.ts';
import { padPlane } from '../../kernels/padding.ts';
import { arrayAxisTaps, resamplePlane } from '../../kernels/resample.ts';
import { blendValue, floatLuma, shiftHue } from '../../kernels/color.ts';
import { roundToByte, truncateToByte } from '../../kernels/rounding.ts';
import { UnsupportedRepresentationError } from '../../../utils/errors/transformErrors.ts';
import { ImageVariant } from '../backendVariants.ts';

const FLOAT_TO_BYTE_SCALE = 256 - 1e-3;

/**
 * Backend for `[...batch, C, H, W]` buffers. Every primitive runs plane by plane, so any number of
 * leading axes is supported. It registers no `rotate`.
 */
export class ArrayImageBackend implements ImageBackend<ArrayImage> {
    readonly variant = ImageVariant.Array;
    readonly capabilities: ReadonlySet<Primitive> = new Set<Primitive>([
        'crop',
        'pad',
        'resize',
        'hflip',
        'vflip',
        'adjustBrightness',
        'adjustContrast',
        'adjustSaturation',
        'adjustHue',
        'rgbToGrayscale',
    ]);
    readonly interpolationModes = {
        resize: new Set([InterpolationMode.Nearest, InterpolationMode.Bilinear, InterpolationMode.Bicubic]),
        rotate: new Set<InterpolationMode>(),
    };
    readonly perChannelFill = false;
    readonly keepsAlpha = false;

    public crop(image: ArrayImage, top: number, left: number, height: number, width: number): ArrayImage {
        return image.withPlanes(
            this.planes(image).map((plane) => cropPlane(plane, image.width, top, left, height, width)),
            height,
            width,
        );
    }

    public pad(image: ArrayImage, padding: Ltrb, fill: Fill, mode: PaddingMode): ArrayImage {
        const [left, top, right, bottom] = padding;
        const scalar = typeof fill === 'number' ? fill : fill[0];
        const fillValue = image.dtype === 'uint8' ? truncateToByte(scalar) : scalar;
        return image.withPlanes(
            this.planes(image).map((plane) => padPlane(plane, image.width, image.height, padding, mode, fillValue)),
            image.height + top + bottom,
            image.width + left + right,
        );
    }

    public resize(image: ArrayImage, height: number, width: number, interpolation: InterpolationMode): ArrayImage {
        const xTaps = arrayAxisTaps(image.width, width, interpolation);
        const yTaps = arrayAxisTaps(image.height, height, interpolation);
        const planes = this.planes(image).map((plane) => {
            const out = resamplePlane(plane, image.width, image.height, xTaps, yTaps);
            return image.dtype === 'uint8' ? out.map(roundToByte) : out;
        });
        return image.withPlanes(planes, height, width);
    }

    public hflip(image: ArrayImage): ArrayImage {
        return image.withPlanes(
            this.planes(image).map((plane) => flipPlaneHorizontal(plane, image.width, image.height)),
            image.height,
            image.width,
        );
    }

    public vflip(image: ArrayImage): ArrayImage {
        return image.withPlanes(
            this.planes(image).map((plane) => flipPlaneVertical(plane, image.width, image.height)),
            image.height,
            image.width,
        );
    }

    /**
     * Array images cannot be rotated yet; the dispatcher rejects the call before it gets here.
     */
    public rotate(_image: ArrayImage, _target: IWarpTarget): ArrayImage {
        throw new UnsupportedRepresentationError('rotate', this.variant);
    }

    public adjustBrightness(image: ArrayImage, factor: number): ArrayImage {
        return this.blend(image, factor, (planes) => planes.map((plane) => new Float32Array(plane.length)));
    }

    public adjustContrast(image: ArrayImage, factor: number): ArrayImage {
        return this.blend(image, factor, (planes) => {
            const gray = this.luma(image, planes);
            const mean = _.mean(Array.from(gray));
            return planes.map((plane) => new Float32Array(plane.length).fill(mean));
        });
    }

    public adjustSaturation(image: ArrayImage, factor: number): ArrayImage {
        return this.blend(image, factor, (planes) => {
            const gray = this.luma(image, planes);
            return planes.map(() => gray);
        });
    }

    public adjustHue(image: ArrayImage, hueFactor: number): ArrayImage {
        if (image.channels === 1) return image.clone();
        const toUnit = (v: number) => (image.dtype === 'uint8' ? v / 255 : v);
        const fromUnit = (v: number) => (image.dtype === 'uint8' ? Math.trunc(v * FLOAT_TO_BYTE_SCALE) : v);
        const out: Float32Array[] = [];
        for (let b = 0; b < image.batchSize; b++) {
            const [red, green, blue] = this.batchPlanes(image, b);
            const planes = [red, green, blue].map((plane) => new Float32Array(plane.length));
            for (let i = 0; i < red.length; i++) {
                const rgb = shiftHue(toUnit(red[i]), toUnit(green[i]), toUnit(blue[i]), hueFactor);
                rgb.forEach((value, c) => (planes[c][i] = fromUnit(value)));
            }
            out.push(...planes);
        }
        return image.withPlanes(out, image.height, image.width);
    }

    public rgbToGrayscale(image: ArrayImage, numOutputChannels: 1 | 3): ArrayImage {
        const out: Float32Array[] = [];
        for (let b = 0; b < image.batchSize; b++) {
            const gray = this.luma(image, this.batchPlanes(image, b));
            for (let c = 0; c < numOutputChannels; c++) out.push(new Float32Array(gray));
        }
        return image.withPlanes(out, image.height, image.width, numOutputChannels);
    }

    private planes(image: ArrayImage): Float32Array[] {
        return _.range(image.planeCount).map((index) => image.plane(index));
    }

    private batchPlanes(image: ArrayImage, batchIndex: number): Float32Array[] {
        return _.range(image.channels).map((c) => image.plane(batchIndex * image.channels + c));
    }

    /**
     * Luma plane of one `[C, H, W]` image; a single channel is its own luma. uint8 luma is
     * truncated to whole levels.
     */
    private luma(image: ArrayImage, planes: readonly Float32Array[]): Float32Array {
        if (planes.length === 1) return new Float32Array(planes[0]);
        const [red, green, blue] = planes;
        const gray = new Float32Array(red.length);
        for (let i = 0; i < gray.length; i++) {
            const value = floatLuma(red[i], green[i], blue[i]);
            gray[i] = image.dtype === 'uint8' ? Math.trunc(value) : value;
        }
        return gray;
    }

    /**
     * Blends every `[C, H, W]` image toward the baseline planes `degenerate` builds for it.
     */
    private blend(
        image: ArrayImage,
        factor: number,
        degenerate: (planes: Float32Array[]) => Float32Array[],
    ): ArrayImage {
        const out: Float32Array[] = [];
        for (let b = 0; b < image.batchSize; b++) {
            const planes = this.batchPlanes(image, b);
            const baselines = degenerate(planes);
            planes.forEach((plane, c) => {
                const blended = new Float32Array(plane.length);
                for (let i = 0; i < plane.length; i++) {
                    blended[i] = this.toDomain(image, blendValue(plane[i], baselines[c][i], factor));
                }
                out.push(blended);
            });
        }
        return image.withPlanes(out, image.height, image.width);
    }

    /** Clamps into the dtype's range, truncating to whole levels for uint8. */
    private toDomain(image: ArrayImage, value: number): number {
        return image.dtype === 'uint8' ? truncateToByte(value) : _.clamp(value, 0, image.maxValue);
    }
}
