// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { IImageCodec } from '../../../@types/index.ts';
import { ObjectImage } from '../../image/ObjectImage.ts';
import { config } from '../../../config/index.ts';

export class SharpImageProcessor implements IImageCodec {
    /**
     * Decodes any file sharp can read into an ObjectImage. The colour mode follows the decoded
     * channel count: grey files load as `L`, files with alpha keep it.
     */
    public async loadImage(path: string): Promise<ObjectImage> {
        const { data, info } = await sharp(path).raw().toBuffer({ resolveWithObject: true });
        return ObjectImage.fromRaw(data, info.width, info.height, info.channels);
    }

    /**
     * Writes an ObjectImage as PNG, using the configured compression settings.
     */
    public async writeImage(image: ObjectImage, outputPngPath: string): Promise<void> {
        const { data, info } = image.toRaw();
        await sharp(data, {
            raw: {
                width: info.width,
                height: info.height,
                channels: info.channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }
}
