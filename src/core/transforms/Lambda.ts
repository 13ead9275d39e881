// src/core/transforms/Lambda.ts

import type { ITransform } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';

export type ImageFunction = <I extends Image>(image: I) => I;

/**
 * Wraps a functional primitive as a pipeline step.
 */
export class Lambda implements ITransform {
    constructor(private readonly fn: ImageFunction) {}

    apply<I extends Image>(image: I): I {
        return this.fn(image);
    }
}
