// src/core/backends/strategies/ObjectImageBackend.ts

import _ from 'lodash';
import type { Fill, ImageBackend, IWarpTarget, Ltrb, PaddingMode, Primitive } from '../../../@types/index.ts';
import { ObjectImage } from '../../image/ObjectImage.ts';
import { InterpolationMode } from '../../interpolation/interpolationModes.ts';
import { cropPlane, flipPlaneHorizontal, flipPlaneVertical, mergeChannels, splitChannels } from '../../kernels/planes.ts';
import { padPlane } from '../../kernels/padding.ts';
import { objectAxisTaps, resamplePlane } from '../../kernels/resample.ts';
import { warpAffinePlane } from '../../kernels/warp.ts';
import { blendValue, fixedPointLuma, shiftHue } from '../../kernels/color.ts';
import { roundHalfUpToByte, roundToByte, truncateToByte } from '../../kernels/rounding.ts';
import { ImageVariant } from '../backendVariants.ts';

/**
 * Backend for ObjectImages. Pixels are read out through `toRaw`, processed as float planes and
 * written back as a new image of the same mode (grayscale conversion aside).
 */
export class ObjectImageBackend implements ImageBackend<ObjectImage> {
    readonly variant = ImageVariant.Object;
    readonly capabilities: ReadonlySet<Primitive> = new Set<Primitive>([
        'crop',
        'pad',
        'resize',
        'hflip',
        'vflip',
        'rotate',
        'adjustBrightness',
        'adjustContrast',
        'adjustSaturation',
        'adjustHue',
        'rgbToGrayscale',
    ]);
    readonly interpolationModes = {
        resize: new Set(Object.values(InterpolationMode)),
        rotate: new Set([InterpolationMode.Nearest, InterpolationMode.Bilinear]),
    };
    readonly perChannelFill = true;
    readonly keepsAlpha = true;

    public crop(image: ObjectImage, top: number, left: number, height: number, width: number): ObjectImage {
        return this.mapPlanes(image, width, height, (plane) => cropPlane(plane, image.width, top, left, height, width));
    }

    public pad(image: ObjectImage, padding: Ltrb, fill: Fill, mode: PaddingMode): ObjectImage {
        const [left, top, right, bottom] = padding;
        return this.mapPlanes(
            image,
            image.width + left + right,
            image.height + top + bottom,
            (plane, c) => padPlane(plane, image.width, image.height, padding, mode, this.fillFor(fill, c)),
        );
    }

    public resize(image: ObjectImage, height: number, width: number, interpolation: InterpolationMode): ObjectImage {
        const xTaps = objectAxisTaps(image.width, width, interpolation);
        const yTaps = objectAxisTaps(image.height, height, interpolation);
        return this.mapPlanes(
            image,
            width,
            height,
            (plane) => resamplePlane(plane, image.width, image.height, xTaps, yTaps),
            roundHalfUpToByte,
        );
    }

    public hflip(image: ObjectImage): ObjectImage {
        return this.mapPlanes(image, image.width, image.height, (plane) =>
            flipPlaneHorizontal(plane, image.width, image.height),
        );
    }

    public vflip(image: ObjectImage): ObjectImage {
        return this.mapPlanes(image, image.width, image.height, (plane) =>
            flipPlaneVertical(plane, image.width, image.height),
        );
    }

    public rotate(image: ObjectImage, target: IWarpTarget): ObjectImage {
        const { matrix, width, height, interpolation, fill } = target;
        return this.mapPlanes(
            image,
            width,
            height,
            (plane, c) =>
                warpAffinePlane(plane, image.width, image.height, matrix, width, height, interpolation, this.fillFor(fill, c)),
            roundHalfUpToByte,
        );
    }

    public adjustBrightness(image: ObjectImage, factor: number): ObjectImage {
        return this.blend(image, factor, (planes) => planes.map((plane) => new Float32Array(plane.length)));
    }

    public adjustContrast(image: ObjectImage, factor: number): ObjectImage {
        return this.blend(image, factor, (planes) => {
            const mean = Math.trunc(_.mean(Array.from(this.luma(planes))) + 0.5);
            return planes.map((plane) => new Float32Array(plane.length).fill(mean));
        });
    }

    public adjustSaturation(image: ObjectImage, factor: number): ObjectImage {
        return this.blend(image, factor, (planes) => {
            const gray = this.luma(planes);
            return planes.map(() => gray);
        });
    }

    public adjustHue(image: ObjectImage, hueFactor: number): ObjectImage {
        if (image.channels === 1) return image.clone();
        const [red, green, blue] = this.readPlanes(image);
        const planes = [red, green, blue].map((plane) => new Float32Array(plane.length));
        for (let i = 0; i < red.length; i++) {
            const rgb = shiftHue(red[i] / 255, green[i] / 255, blue[i] / 255, hueFactor);
            rgb.forEach((value, c) => (planes[c][i] = value * 255));
        }
        return ObjectImage.fromRaw(mergeChannels(planes, roundHalfUpToByte), image.width, image.height, image.mode);
    }

    public rgbToGrayscale(image: ObjectImage, numOutputChannels: 1 | 3): ObjectImage {
        const gray = this.luma(this.readPlanes(image));
        const planes = _.times(numOutputChannels, () => gray);
        return ObjectImage.fromRaw(
            mergeChannels(planes, roundToByte),
            image.width,
            image.height,
            numOutputChannels === 1 ? 'L' : 'RGB',
        );
    }

    private readPlanes(image: ObjectImage): Float32Array[] {
        const { data, info } = image.toRaw();
        return splitChannels(data, info.width, info.height, info.channels);
    }

    /**
     * Applies `fn` to every channel plane and assembles a `width x height` image of the same mode.
     */
    private mapPlanes(
        image: ObjectImage,
        width: number,
        height: number,
        fn: (plane: Float32Array, channel: number) => Float32Array,
        toByte: (value: number) => number = roundToByte,
    ): ObjectImage {
        const planes = this.readPlanes(image).map(fn);
        return ObjectImage.fromRaw(mergeChannels(planes, toByte), width, height, image.mode);
    }

    /** Fixed-point luma plane; a single channel is its own luma. */
    private luma(planes: readonly Float32Array[]): Float32Array {
        if (planes.length === 1) return new Float32Array(planes[0]);
        const [red, green, blue] = planes;
        return red.map((r, i) => fixedPointLuma(r, green[i], blue[i]));
    }

    /**
     * Blends the colour planes with `degenerate(colour planes)`; an alpha plane (LA, RGBA) is copied.
     */
    private blend(
        image: ObjectImage,
        factor: number,
        degenerate: (planes: Float32Array[]) => Float32Array[],
    ): ObjectImage {
        const planes = this.readPlanes(image);
        const alpha = image.channels % 2 === 0 ? planes.pop() : undefined;
        const baselines = degenerate(planes);
        const blended = planes.map((plane, c) =>
            Float32Array.from(plane, (value, i) => truncateToByte(blendValue(value, baselines[c][i], factor))),
        );
        if (alpha) blended.push(alpha);
        return ObjectImage.fromRaw(mergeChannels(blended, roundToByte), image.width, image.height, image.mode);
    }

    private fillFor(fill: Fill, channel: number): number {
        return typeof fill === 'number' ? fill : fill[channel];
    }
}
