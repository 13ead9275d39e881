// src/config/index.ts

import os from 'node:os';
import { InterpolationMode } from '../core/interpolation/interpolationModes.ts';

export const config = {
    interpolation: {
        resize: InterpolationMode.Bilinear,
        rotate: InterpolationMode.Nearest,
    },
    imageCompression: {
        compressionLevel: 7,
        adaptiveFiltering: false,
    },
    batch: {
        concurrency: Math.max(1, os.cpus().length - 1),
        extensions: ['.png', '.jpg', '.jpeg', '.webp', '.tif', '.tiff'],
    },
    randomSeed: 'frame-transforms',
};
