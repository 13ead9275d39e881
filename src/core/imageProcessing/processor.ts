// src/core/imageProcessing/processor.ts

import type { ObjectImage } from '../image/ObjectImage.ts';
import { toObjectImage } from '../functional/conversion.ts';
import type { Image } from '../image/index.ts';
import { ArrayImage } from '../image/ArrayImage.ts';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.ts';

const processor = new SharpImageProcessor();

/**
 * Loads an image file into an ObjectImage.
 */
export async function loadImage(path: string): Promise<ObjectImage> {
    return await processor.loadImage(path);
}

/**
 * Writes an image to `outputPngPath` as PNG. Array images are converted to an ObjectImage first
 * and must therefore hold a single `[C, H, W]` image.
 */
export async function writeImage(image: Image, outputPngPath: string): Promise<void> {
    await processor.writeImage(image instanceof ArrayImage ? toObjectImage(image) : image, outputPngPath);
}
