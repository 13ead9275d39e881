// src/core/image/channels.ts

import type { ChannelCount, ImageMode } from '../../@types/index.ts';
import { ValidationError } from '../../utils/errors/transformErrors.ts';

/**
 * Narrows a channel count read from a buffer or a shape.
 * @throws {ValidationError} If the count is not 1, 2, 3 or 4.
 */
export function toChannelCount(value: number): ChannelCount {
    switch (value) {
        case 1:
        case 2:
        case 3:
        case 4:
            return value;
        default:
            throw new ValidationError(`Images must have 1 to 4 channels, got ${value}.`);
    }
}

export function modeForChannels(channels: ChannelCount): ImageMode {
    switch (channels) {
        case 1:
            return 'L';
        case 2:
            return 'LA';
        case 3:
            return 'RGB';
        case 4:
            return 'RGBA';
    }
}

export function channelsForMode(mode: ImageMode): ChannelCount {
    switch (mode) {
        case 'L':
            return 1;
        case 'LA':
            return 2;
        case 'RGB':
            return 3;
        case 'RGBA':
            return 4;
    }
}

export function assertPositiveInteger(value: number, name: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ValidationError(`${name} must be a positive integer, got ${value}.`);
    }
}
