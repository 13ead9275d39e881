// src/index.ts

export * from './@types/index.ts';
export * from './core/image/index.ts';
export * from './core/functional/index.ts';
export * from './core/transforms/index.ts';
export { InterpolationMode, LegacyInterpolationCodes } from './core/interpolation/interpolationModes.ts';
export { ImageVariant } from './core/backends/backendVariants.ts';
export { getBackendTraits } from './core/backends/dispatcher.ts';
export { loadImage, writeImage } from './core/imageProcessing/processor.ts';
export { applyToFile, processBatch } from './core/runner/transformRunner.ts';
export { TransformError, TypeMismatchError, UnsupportedRepresentationError, ValidationError } from './utils/errors/transformErrors.ts';
export { getFunctionalLogger, getLogger, LoggerNames, NoopLogFacility } from './utils/logging/logUtils.ts';
export { config } from './config/index.ts';
