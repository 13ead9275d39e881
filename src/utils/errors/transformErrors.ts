// src/utils/errors/transformErrors.ts

/**
 * Base class of every error raised by the transform engine.
 */
export class TransformError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Malformed transform parameters. Always raised before any pixel is touched.
 */
export class ValidationError extends TransformError {}

/**
 * The image variant has no backend implementation for the requested primitive.
 */
export class UnsupportedRepresentationError extends TransformError {
    constructor(
        readonly primitive: string,
        readonly variant: string,
    ) {
        super(`"${primitive}" is not supported for ${variant} images.`);
    }
}

/**
 * The value handed to a primitive is neither an ObjectImage nor an ArrayImage.
 */
export class TypeMismatchError extends TransformError {
    constructor(readonly received: unknown) {
        super(`Expected an ObjectImage or an ArrayImage, got ${describeValue(received)}.`);
    }
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'object') return value.constructor?.name ?? 'object';
    return typeof value;
}
