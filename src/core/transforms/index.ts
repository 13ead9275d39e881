// src/core/transforms/index.ts

export * from './Compose.ts';
export * from './Lambda.ts';
export * from './geometric.ts';
export * from './photometric.ts';
export { createRandom } from './random.ts';
