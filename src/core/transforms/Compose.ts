// src/core/transforms/Compose.ts

import type { ITransform } from '../../@types/index.ts';
import type { Image } from '../image/index.ts';

/**
 * Chains transforms, feeding each one the output of the previous one.
 */
export class Compose implements ITransform {
    readonly transforms: readonly ITransform[];

    constructor(transforms: readonly ITransform[]) {
        this.transforms = [...transforms];
    }

    apply<I extends Image>(image: I): I {
        return this.transforms.reduce<I>((current, transform) => transform.apply(current), image);
    }
}
