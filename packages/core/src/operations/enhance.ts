/**
 * @module operations/enhance
 * Factor-driven enhancements.
 *
 * Each enhancement blends the image with a "degenerate" version of itself:
 * `out = degenerate * (1 - factor) + image * factor`. A factor of 1 returns
 * the image, 0 returns the degenerate image, values above 1 extrapolate.
 *
 * | name       | degenerate image                          |
 * |------------|-------------------------------------------|
 * | brightness | black                                     |
 * | color      | grayscale of the image                    |
 * | contrast   | flat gray at the rounded mean luminance   |
 * | sharpness  | the image run through the `smooth` kernel |
 *
 * Alpha is copied unchanged. The input is never modified.
 */

import type { EnhancementName, PixelBuffer } from '@replay-editor/types';
import { UnknownOperation } from '../errors';
import { createBuffer } from '../pixel-buffer';
import { clamp255, convolve } from './convolve';
import { KERNELS } from './kernels';

/** ITU-R 601-2 luma in 16-bit fixed point, rounded. */
export function luma(r: number, g: number, b: number): number {
  return (r * 19595 + g * 38470 + b * 7471 + 0x8000) >> 16;
}

function grayscaleOf(src: PixelBuffer): PixelBuffer {
  const out = createBuffer(src.width, src.height);
  const s = src.data;
  const d = out.data;
  for (let i = 0; i < s.length; i += 4) {
    const l = luma(s[i], s[i + 1], s[i + 2]);
    d[i] = l;
    d[i + 1] = l;
    d[i + 2] = l;
    d[i + 3] = s[i + 3];
  }
  return out;
}

/** Mean luma over every pixel, rounded half up. 0 for an empty buffer. */
export function meanLuma(src: PixelBuffer): number {
  const s = src.data;
  const count = s.length / 4;
  if (count === 0) return 0;
  let sum = 0;
  for (let i = 0; i < s.length; i += 4) {
    sum += luma(s[i], s[i + 1], s[i + 2]);
  }
  return Math.floor(sum / count + 0.5);
}

function flatGray(src: PixelBuffer, level: number): PixelBuffer {
  const out = createBuffer(src.width, src.height);
  const d = out.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = level;
    d[i + 1] = level;
    d[i + 2] = level;
  }
  return out;
}

function degenerateOf(src: PixelBuffer, name: EnhancementName): PixelBuffer {
  switch (name) {
    case 'brightness':
      return createBuffer(src.width, src.height);
    case 'color':
      return grayscaleOf(src);
    case 'contrast':
      return flatGray(src, meanLuma(src));
    case 'sharpness':
      return convolve(src, KERNELS.smooth);
    default:
      throw new UnknownOperation(String(name));
  }
}

/**
 * Apply an enhancement to the whole of `src`.
 * @param factor - Blend factor; 1 leaves the image unchanged.
 */
export function enhance(src: PixelBuffer, name: EnhancementName, factor: number): PixelBuffer {
  const degenerate = degenerateOf(src, name);
  const out = createBuffer(src.width, src.height);
  const s = src.data;
  const g = degenerate.data;
  const d = out.data;
  const inv = 1 - factor;
  for (let i = 0; i < s.length; i += 4) {
    d[i] = clamp255(g[i] * inv + s[i] * factor);
    d[i + 1] = clamp255(g[i + 1] * inv + s[i + 1] * factor);
    d[i + 2] = clamp255(g[i + 2] * inv + s[i + 2] * factor);
    d[i + 3] = s[i + 3];
  }
  return out;
}
