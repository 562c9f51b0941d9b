/**
 * @module region
 * Selections resolved against concrete buffer dimensions.
 */

/**
 * Half-open rectangle in buffer coordinates: columns `[left, right)`,
 * rows `[top, bottom)`. Already clamped to the buffer.
 */
export interface RectRegion {
  readonly kind: 'rect';
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/** Per-pixel selection. `data[y * width + x]` is 1 when selected, else 0. */
export interface MaskRegion {
  readonly kind: 'mask';
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/** A selection in buffer space. An empty region affects no pixels. */
export type ResolvedRegion = RectRegion | MaskRegion;
