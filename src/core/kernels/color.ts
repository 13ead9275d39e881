// src/core/kernels/color.ts

/**
 * Luma weights used by the array backend.
 */
export const LUMA_WEIGHTS = Object.freeze({ r: 0.2989, g: 0.587, b: 0.114 });

/**
 * ITU-R 601-2 luma in 16-bit fixed point, as used by the object backend.
 */
export function fixedPointLuma(r: number, g: number, b: number): number {
    return (r * 19595 + g * 38470 + b * 7471 + 0x8000) >> 16;
}

export function floatLuma(r: number, g: number, b: number): number {
    return LUMA_WEIGHTS.r * r + LUMA_WEIGHTS.g * g + LUMA_WEIGHTS.b * b;
}

/**
 * Linear blend toward `original` from `baseline`: factor 0 gives the baseline, 1 the original.
 */
export function blendValue(original: number, baseline: number, factor: number): number {
    return baseline + factor * (original - baseline);
}

/**
 * RGB in 0..1 to HSV with every component in 0..1.
 */
export function rgbToHsv(r: number, g: number, b: number): [number, number, number] {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const delta = max - min;
    const s = max === 0 ? 0 : delta / max;
    if (delta === 0) return [0, s, max];

    let h: number;
    if (max === r) {
        h = (g - b) / delta;
    } else if (max === g) {
        h = (b - r) / delta + 2;
    } else {
        h = (r - g) / delta + 4;
    }
    h /= 6;
    return [h < 0 ? h + 1 : h, s, max];
}

export function hsvToRgb(h: number, s: number, v: number): [number, number, number] {
    const sector = Math.floor(h * 6);
    const f = h * 6 - sector;
    const p = v * (1 - s);
    const q = v * (1 - s * f);
    const t = v * (1 - s * (1 - f));
    switch (((sector % 6) + 6) % 6) {
        case 0:
            return [v, t, p];
        case 1:
            return [q, v, p];
        case 2:
            return [p, v, t];
        case 3:
            return [p, q, v];
        case 4:
            return [t, p, v];
        default:
            return [v, p, q];
    }
}

/**
 * Rotates the hue of one RGB value (0..1 components) by `shift` turns.
 */
export function shiftHue(r: number, g: number, b: number, shift: number): [number, number, number] {
    const [h, s, v] = rgbToHsv(r, g, b);
    const shifted = (((h + shift) % 1) + 1) % 1;
    return hsvToRgb(shifted, s, v);
}
