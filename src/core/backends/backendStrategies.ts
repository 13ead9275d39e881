// src/core/backends/backendStrategies.ts

import type { ImageBackend } from '../../@types/index.ts';
import type { ArrayImage } from '../image/ArrayImage.ts';
import type { ObjectImage } from '../image/ObjectImage.ts';
import { ArrayImageBackend } from './strategies/ArrayImageBackend.ts';
import { ObjectImageBackend } from './strategies/ObjectImageBackend.ts';
import { ImageVariant } from './backendVariants.ts';

export { ImageVariant } from './backendVariants.ts';

export interface BackendRegistry {
    readonly [ImageVariant.Object]: ImageBackend<ObjectImage>;
    readonly [ImageVariant.Array]: ImageBackend<ArrayImage>;
}

/**
 * Mapping of image variants to their backend implementations. Built once at load time and frozen.
 */
export const BackendStrategyMap: BackendRegistry = Object.freeze({
    [ImageVariant.Object]: new ObjectImageBackend(),
    [ImageVariant.Array]: new ArrayImageBackend(),
});
