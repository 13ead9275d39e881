// src/core/kernels/planes.ts

/**
 * Splits interleaved (HWC) bytes into one float plane per channel.
 */
export function splitChannels(data: Uint8Array, width: number, height: number, channels: number): Float32Array[] {
    const size = width * height;
    const planes = Array.from({ length: channels }, () => new Float32Array(size));
    for (let i = 0; i < size; i++) {
        for (let c = 0; c < channels; c++) {
            planes[c][i] = data[i * channels + c];
        }
    }
    return planes;
}

/**
 * Interleaves float planes back into bytes, converting each value with `toByte`.
 */
export function mergeChannels(planes: readonly Float32Array[], toByte: (value: number) => number): Uint8Array {
    const channels = planes.length;
    const size = planes[0].length;
    const data = new Uint8Array(size * channels);
    for (let i = 0; i < size; i++) {
        for (let c = 0; c < channels; c++) {
            data[i * channels + c] = toByte(planes[c][i]);
        }
    }
    return data;
}

/**
 * Copies the in-bounds window `[top, top + height) x [left, left + width)` out of a plane.
 */
export function cropPlane(
    plane: Float32Array,
    planeWidth: number,
    top: number,
    left: number,
    height: number,
    width: number,
): Float32Array {
    const out = new Float32Array(height * width);
    for (let y = 0; y < height; y++) {
        const start = (top + y) * planeWidth + left;
        out.set(plane.subarray(start, start + width), y * width);
    }
    return out;
}

export function flipPlaneHorizontal(plane: Float32Array, width: number, height: number): Float32Array {
    const out = new Float32Array(plane.length);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            out[y * width + x] = plane[y * width + (width - 1 - x)];
        }
    }
    return out;
}

export function flipPlaneVertical(plane: Float32Array, width: number, height: number): Float32Array {
    const out = new Float32Array(plane.length);
    for (let y = 0; y < height; y++) {
        out.set(plane.subarray((height - 1 - y) * width, (height - y) * width), y * width);
    }
    return out;
}
