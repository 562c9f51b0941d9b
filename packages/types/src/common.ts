/**
 * @module common
 * Common primitive types used across all packages.
 */

/** 2D point in display or buffer space. */
export interface Point {
  /** X coordinate */
  x: number;
  /** Y coordinate */
  y: number;
}

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/**
 * An 8-bit RGBA pixel buffer, row-major with the top row first.
 *
 * Buffers handed out by the engine are logically immutable: every operation
 * produces a new buffer and the cache returns fresh copies.
 */
export interface PixelBuffer {
  /** Width in pixels */
  readonly width: number;
  /** Height in pixels */
  readonly height: number;
  /** RGBA samples. Length is always `width * height * 4`. */
  readonly data: Uint8ClampedArray;
}
