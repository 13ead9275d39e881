// src/core/functional/index.ts

export * from './geometry.ts';
export * from './photometric.ts';
export * from './conversion.ts';
export { gaussianBlur, defaultSigma } from '../blur/gaussianBlur.ts';
export { inverseAffineMatrix, applyAffine } from '../affine/inverseAffine.ts';
