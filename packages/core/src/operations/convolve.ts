/**
 * @module operations/convolve
 * Kernel convolution over RGBA buffers.
 * Returns a new buffer and does NOT modify the input.
 */

import type { PixelBuffer } from '@replay-editor/types';
import { createBuffer } from '../pixel-buffer';
import type { Kernel } from './kernels';

/** Clamp 0-255. */
export function clamp255(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.round(v);
}

/**
 * Convolve the RGB channels of `src` with `kernel`. Samples outside the
 * buffer repeat the nearest edge pixel. Alpha is copied unchanged.
 */
export function convolve(src: PixelBuffer, kernel: Kernel): PixelBuffer {
  const { width: w, height: h } = src;
  const out = createBuffer(w, h);
  const s = src.data;
  const d = out.data;
  const r = (kernel.size - 1) / 2;
  const { weights, scale, offset } = kernel;

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      let sr = 0;
      let sg = 0;
      let sb = 0;
      let k = 0;
      for (let ky = -r; ky <= r; ky++) {
        const yy = Math.min(h - 1, Math.max(0, y + ky));
        for (let kx = -r; kx <= r; kx++) {
          const wt = weights[k++];
          if (wt === 0) continue;
          const xx = Math.min(w - 1, Math.max(0, x + kx));
          const i = (yy * w + xx) * 4;
          sr += s[i] * wt;
          sg += s[i + 1] * wt;
          sb += s[i + 2] * wt;
        }
      }
      const o = (y * w + x) * 4;
      d[o] = clamp255(sr / scale + offset);
      d[o + 1] = clamp255(sg / scale + offset);
      d[o + 2] = clamp255(sb / scale + offset);
      d[o + 3] = s[o + 3];
    }
  }

  return out;
}
