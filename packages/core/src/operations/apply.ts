/**
 * @module operations/apply
 * The operation adapter: applies one filter or enhancement to a buffer,
 * restricted to a resolved region.
 *
 * Rectangle regions crop the buffer, transform the crop, and paste it back,
 * so the operation only sees pixels inside the rectangle. Mask regions run the
 * operation over the whole buffer and take transformed pixels where the mask
 * is set. Pixels outside the region are always copied unchanged, and an empty
 * region yields a byte-identical copy of the input.
 */

import type { Operation, PixelBuffer, ResolvedRegion } from '@replay-editor/types';
import { isEnhancementName, isFilterName } from '../action';
import { UnknownOperation } from '../errors';
import { cloneBuffer, cropBuffer, pasteBuffer } from '../pixel-buffer';
import { isEmptyRegion, isFullRegion } from '../region-resolver';
import { convolve } from './convolve';
import { enhance } from './enhance';
import { KERNELS } from './kernels';

/**
 * Contract between the resolution engine and the operation library.
 *
 * `apply` must be deterministic, keep the canvas size, leave pixels outside
 * `region` untouched, treat an empty region as a no-op, and never mutate its
 * input. It may return a promise, e.g. when work is handed to a worker.
 */
export interface OperationAdapter {
  apply(buffer: PixelBuffer, region: ResolvedRegion, operation: Operation): PixelBuffer | Promise<PixelBuffer>;
}

/** Run an operation over every pixel of `src`. */
function transformWhole(src: PixelBuffer, operation: Operation): PixelBuffer {
  if ('factor' in operation) {
    if (!isEnhancementName(operation.name)) throw new UnknownOperation(operation.name);
    return enhance(src, operation.name, operation.factor);
  }
  if (!isFilterName(operation.name)) throw new UnknownOperation(operation.name);
  return convolve(src, KERNELS[operation.name]);
}

/**
 * Apply `operation` to `buffer` inside `region`.
 * @throws UnknownOperation for a name the library does not implement.
 */
export function applyOperation(
  buffer: PixelBuffer,
  region: ResolvedRegion,
  operation: Operation,
): PixelBuffer {
  if (isEmptyRegion(region)) {
    return cloneBuffer(buffer);
  }

  if (region.kind === 'rect') {
    if (isFullRegion(region, buffer)) {
      return transformWhole(buffer, operation);
    }
    const { left, top, right, bottom } = region;
    const patch = transformWhole(cropBuffer(buffer, left, top, right, bottom), operation);
    const out = cloneBuffer(buffer);
    pasteBuffer(out, patch, left, top);
    return out;
  }

  if (region.width !== buffer.width || region.height !== buffer.height) {
    throw new RangeError(
      `Mask ${region.width}x${region.height} does not match buffer ${buffer.width}x${buffer.height}`,
    );
  }
  const transformed = transformWhole(buffer, operation);
  const out = cloneBuffer(buffer);
  const mask = region.data;
  const t = transformed.data;
  const d = out.data;
  for (let p = 0; p < mask.length; p++) {
    if (mask[p] === 0) continue;
    const i = p * 4;
    d[i] = t[i];
    d[i + 1] = t[i + 1];
    d[i + 2] = t[i + 2];
    d[i + 3] = t[i + 3];
  }
  return out;
}

/** The built-in operation library as an {@link OperationAdapter}. */
export const referenceAdapter: OperationAdapter = {
  apply: applyOperation,
};
