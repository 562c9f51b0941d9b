/**
 * @module pixel-buffer
 * Construction and comparison helpers for RGBA {@link PixelBuffer}s.
 */

import type { PixelBuffer } from '@replay-editor/types';

/** Create a transparent black buffer. */
export function createBuffer(width: number, height: number): PixelBuffer {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid buffer dimensions ${width}x${height}`);
  }
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/** Wrap existing RGBA samples, checking the length against the dimensions. */
export function wrapBuffer(
  data: Uint8ClampedArray | Uint8Array,
  width: number,
  height: number,
): PixelBuffer {
  const expected = width * height * 4;
  if (data.length !== expected) {
    throw new RangeError(
      `Pixel data length ${data.length} does not match ${width}x${height} (expected ${expected})`,
    );
  }
  const samples =
    data instanceof Uint8ClampedArray
      ? data
      : new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength);
  return { width, height, data: samples };
}

/** Create a buffer filled with one RGBA color. */
export function solidBuffer(
  width: number,
  height: number,
  rgba: readonly [number, number, number, number],
): PixelBuffer {
  const buffer = createBuffer(width, height);
  const d = buffer.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = rgba[0];
    d[i + 1] = rgba[1];
    d[i + 2] = rgba[2];
    d[i + 3] = rgba[3];
  }
  return buffer;
}

/** Deep copy. */
export function cloneBuffer(src: PixelBuffer): PixelBuffer {
  return { width: src.width, height: src.height, data: new Uint8ClampedArray(src.data) };
}

/** True when both buffers have the same dimensions and identical bytes. */
export function buffersEqual(a: PixelBuffer, b: PixelBuffer): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  const da = a.data;
  const db = b.data;
  if (da.length !== db.length) return false;
  for (let i = 0; i < da.length; i++) {
    if (da[i] !== db[i]) return false;
  }
  return true;
}

/** Read one pixel as `[r, g, b, a]`. */
export function getPixel(buffer: PixelBuffer, x: number, y: number): [number, number, number, number] {
  const i = (y * buffer.width + x) * 4;
  const d = buffer.data;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

/** Copy the half-open rectangle `[left, right) x [top, bottom)` into a new buffer. */
export function cropBuffer(
  src: PixelBuffer,
  left: number,
  top: number,
  right: number,
  bottom: number,
): PixelBuffer {
  const out = createBuffer(right - left, bottom - top);
  const rowBytes = (right - left) * 4;
  for (let y = top; y < bottom; y++) {
    const from = (y * src.width + left) * 4;
    out.data.set(src.data.subarray(from, from + rowBytes), (y - top) * rowBytes);
  }
  return out;
}

/** Write `patch` into `dst` with its top-left corner at (`left`, `top`). Mutates `dst`. */
export function pasteBuffer(dst: PixelBuffer, patch: PixelBuffer, left: number, top: number): void {
  const rowBytes = patch.width * 4;
  for (let y = 0; y < patch.height; y++) {
    const from = y * rowBytes;
    dst.data.set(patch.data.subarray(from, from + rowBytes), ((top + y) * dst.width + left) * 4);
  }
}
