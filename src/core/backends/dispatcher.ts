// src/core/backends/dispatcher.ts

import type { BackendTraits, ImageBackend, Primitive } from '../../@types/index.ts';
import { ArrayImage } from '../image/ArrayImage.ts';
import { ObjectImage } from '../image/ObjectImage.ts';
import type { Image } from '../image/index.ts';
import { TypeMismatchError, UnsupportedRepresentationError } from '../../utils/errors/transformErrors.ts';
import { BackendStrategyMap, ImageVariant } from './backendStrategies.ts';

/**
 * Invokes one primitive on the backend matching the image; generic so the image keeps its variant.
 */
export type BackendCall = <I extends Image>(backend: ImageBackend<I>, image: I) => I;

export function isImage(value: unknown): value is Image {
    return value instanceof ObjectImage || value instanceof ArrayImage;
}

/**
 * Returns what the backend for `image` declares, so parameters can be checked before dispatch.
 *
 * @throws {TypeMismatchError} If `image` is neither representation.
 */
export function getBackendTraits(image: unknown): BackendTraits {
    if (image instanceof ObjectImage) return BackendStrategyMap[ImageVariant.Object];
    if (image instanceof ArrayImage) return BackendStrategyMap[ImageVariant.Array];
    throw new TypeMismatchError(image);
}

/**
 * Routes `primitive` to the backend registered for the image's variant.
 *
 * @throws {TypeMismatchError} If `image` is neither representation.
 * @throws {UnsupportedRepresentationError} If that backend does not register `primitive`.
 */
export function dispatch(image: unknown, primitive: Primitive, call: BackendCall): Image {
    if (image instanceof ObjectImage) {
        return call(requireCapability(BackendStrategyMap[ImageVariant.Object], primitive), image);
    }
    if (image instanceof ArrayImage) {
        return call(requireCapability(BackendStrategyMap[ImageVariant.Array], primitive), image);
    }
    throw new TypeMismatchError(image);
}

function requireCapability<B extends BackendTraits>(backend: B, primitive: Primitive): B {
    if (!backend.capabilities.has(primitive)) {
        throw new UnsupportedRepresentationError(primitive, backend.variant);
    }
    return backend;
}
