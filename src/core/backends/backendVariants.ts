// src/core/backends/backendVariants.ts

/**
 * Image representations the engine dispatches on.
 */
export enum ImageVariant {
    Object = 'object',
    Array = 'array',
}
