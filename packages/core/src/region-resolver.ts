/**
 * @module region-resolver
 * Resolves recorded selections against concrete buffer dimensions.
 *
 * Selections are recorded in display coordinates, whose vertical axis points
 * up from the bottom edge. Buffer rows run top-down, so every y coordinate is
 * flipped as `height - y` on the way in.
 *
 * - absent selection → rectangle covering the whole buffer
 * - rectangle → half-open {@link RectRegion} clamped to the buffer
 * - lasso → {@link MaskRegion} rasterized with the even-odd rule, sampling
 *   pixel centres; fewer than three vertices give an empty mask
 */

import type {
  LassoSelection,
  MaskRegion,
  Point,
  RectRegion,
  RectSelection,
  ResolvedRegion,
  SelectionDescriptor,
  Size,
} from '@replay-editor/types';
import { parseSelection } from './selection';

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Rectangle covering a whole buffer. */
export function fullRegion(size: Size): RectRegion {
  return { kind: 'rect', left: 0, top: 0, right: size.width, bottom: size.height };
}

/** Mask with nothing selected. */
export function emptyMask(size: Size): MaskRegion {
  return { kind: 'mask', width: size.width, height: size.height, data: new Uint8Array(size.width * size.height) };
}

/**
 * Resolve a display-space rectangle. Coordinates are truncated toward zero,
 * each axis is ordered low to high, then `top = height - y1` and
 * `bottom = height - y0`.
 */
export function resolveRect(selection: RectSelection, size: Size): RectRegion {
  const { width, height } = size;
  const [xa, xb] = selection.x.map(Math.trunc);
  const [ya, yb] = selection.y.map(Math.trunc);
  const x0 = Math.min(xa, xb);
  const x1 = Math.max(xa, xb);
  const y0 = Math.min(ya, yb);
  const y1 = Math.max(ya, yb);

  return {
    kind: 'rect',
    left: clamp(x0, 0, width),
    top: clamp(height - y1, 0, height),
    right: clamp(x1, 0, width),
    bottom: clamp(height - y0, 0, height),
  };
}

/**
 * Fill a polygon (buffer coordinates) into a mask using the even-odd rule.
 * A pixel is selected when its centre lies inside.
 */
export function rasterizePolygon(points: readonly Point[], size: Size): MaskRegion {
  const mask = emptyMask(size);
  if (points.length < 3 || size.width === 0 || size.height === 0) return mask;

  const { width, height, data } = mask;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }
  const yStart = clamp(Math.floor(minY), 0, height);
  const yEnd = clamp(Math.ceil(maxY), 0, height);
  const crossings: number[] = [];

  for (let y = yStart; y < yEnd; y++) {
    const sy = y + 0.5;
    crossings.length = 0;

    for (let i = 0; i < points.length; i++) {
      const p1 = points[i];
      const p2 = points[(i + 1) % points.length];
      // Half-open test so a vertex on the scanline is counted once
      if ((p1.y <= sy && p2.y > sy) || (p2.y <= sy && p1.y > sy)) {
        const t = (sy - p1.y) / (p2.y - p1.y);
        crossings.push(p1.x + t * (p2.x - p1.x));
      }
    }

    crossings.sort((a, b) => a - b);
    const row = y * width;
    for (let i = 0; i + 1 < crossings.length; i += 2) {
      // Pixel x is inside when crossings[i] <= x + 0.5 < crossings[i + 1]
      const from = clamp(Math.ceil(crossings[i] - 0.5), 0, width);
      const to = clamp(Math.ceil(crossings[i + 1] - 0.5), 0, width);
      data.fill(1, row + from, row + to);
    }
  }

  return mask;
}

/** Flip a display-space lasso into buffer space and rasterize it. */
export function resolveLasso(selection: LassoSelection, size: Size): MaskRegion {
  const flipped = selection.points.map((p) => ({ x: p.x, y: size.height - p.y }));
  return rasterizePolygon(flipped, size);
}

/**
 * Resolve a recorded selection against a buffer of `size`.
 * @throws InvalidSelection when the descriptor has missing or non-numeric fields.
 */
export function resolveRegion(descriptor: SelectionDescriptor, size: Size): ResolvedRegion {
  const selection = parseSelection(descriptor);
  if (selection === null) return fullRegion(size);
  switch (selection.type) {
    case 'rect':
      return resolveRect(selection, size);
    case 'lasso':
      return resolveLasso(selection, size);
  }
}

/** Number of pixels a region selects. */
export function regionPixelCount(region: ResolvedRegion): number {
  if (region.kind === 'rect') {
    return Math.max(0, region.right - region.left) * Math.max(0, region.bottom - region.top);
  }
  let count = 0;
  for (let i = 0; i < region.data.length; i++) {
    count += region.data[i];
  }
  return count;
}

/** True when a region selects no pixels. */
export function isEmptyRegion(region: ResolvedRegion): boolean {
  if (region.kind === 'rect') {
    return region.right <= region.left || region.bottom <= region.top;
  }
  return !region.data.includes(1);
}

/** True when the region covers the whole buffer of `size`. */
export function isFullRegion(region: ResolvedRegion, size: Size): boolean {
  return regionPixelCount(region) === size.width * size.height;
}
