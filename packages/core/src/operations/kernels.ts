/**
 * @module operations/kernels
 * Convolution kernels for the filter operations.
 *
 * Each output sample is `sum(weight * input) / scale + offset`, rounded and
 * clamped to 0-255. Weights are listed row by row.
 */

import type { FilterName } from '@replay-editor/types';

/** A square convolution kernel. */
export interface Kernel {
  /** Side length: 3 or 5. */
  readonly size: 3 | 5;
  /** Divisor applied to the weighted sum. */
  readonly scale: number;
  /** Added after scaling. */
  readonly offset: number;
  /** `size * size` weights, row-major. */
  readonly weights: readonly number[];
}

/** Kernel per filter name. */
export const KERNELS: Readonly<Record<FilterName, Kernel>> = {
  blur: {
    size: 5,
    scale: 16,
    offset: 0,
    weights: [
      1, 1, 1, 1, 1,
      1, 0, 0, 0, 1,
      1, 0, 0, 0, 1,
      1, 0, 0, 0, 1,
      1, 1, 1, 1, 1,
    ],
  },
  contour: {
    size: 3,
    scale: 1,
    offset: 255,
    weights: [-1, -1, -1, -1, 8, -1, -1, -1, -1],
  },
  detail: {
    size: 3,
    scale: 6,
    offset: 0,
    weights: [0, -1, 0, -1, 10, -1, 0, -1, 0],
  },
  edge_enhance: {
    size: 3,
    scale: 2,
    offset: 0,
    weights: [-1, -1, -1, -1, 10, -1, -1, -1, -1],
  },
  edge_enhance_more: {
    size: 3,
    scale: 1,
    offset: 0,
    weights: [-1, -1, -1, -1, 9, -1, -1, -1, -1],
  },
  emboss: {
    size: 3,
    scale: 1,
    offset: 128,
    weights: [-1, 0, 0, 0, 1, 0, 0, 0, 0],
  },
  find_edges: {
    size: 3,
    scale: 1,
    offset: 0,
    weights: [-1, -1, -1, -1, 8, -1, -1, -1, -1],
  },
  sharpen: {
    size: 3,
    scale: 16,
    offset: 0,
    weights: [-2, -2, -2, -2, 32, -2, -2, -2, -2],
  },
  smooth: {
    size: 3,
    scale: 13,
    offset: 0,
    weights: [1, 1, 1, 1, 5, 1, 1, 1, 1],
  },
  smooth_more: {
    size: 5,
    scale: 100,
    offset: 0,
    weights: [
      1, 1, 1, 1, 1,
      1, 5, 5, 5, 1,
      1, 5, 44, 5, 1,
      1, 5, 5, 5, 1,
      1, 1, 1, 1, 1,
    ],
  },
};
