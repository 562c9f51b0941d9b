/**
 * @module buffer-codec
 * Raw storage format for cached buffers.
 *
 * Layout: `RPLB` magic, width and height as big-endian uint32, then
 * `width * height * 4` RGBA bytes. No compression, so a cache read costs one
 * copy.
 */

import type { PixelBuffer } from '@replay-editor/types';
import { DecodeError } from './errors';

const MAGIC = [0x52, 0x50, 0x4c, 0x42]; // "RPLB"
export const BUFFER_HEADER_BYTES = 12;

/** Serialize a buffer for a cache backend. */
export function encodeBuffer(buffer: PixelBuffer): Uint8Array {
  const out = new Uint8Array(BUFFER_HEADER_BYTES + buffer.data.length);
  out.set(MAGIC, 0);
  const view = new DataView(out.buffer);
  view.setUint32(4, buffer.width);
  view.setUint32(8, buffer.height);
  out.set(buffer.data, BUFFER_HEADER_BYTES);
  return out;
}

/**
 * Decode bytes written by {@link encodeBuffer}. The result owns a fresh copy
 * of the samples, so callers may mutate it without touching the stored bytes.
 * @throws DecodeError for a bad magic or a length that disagrees with the header.
 */
export function decodeBuffer(bytes: Uint8Array): PixelBuffer {
  if (bytes.length < BUFFER_HEADER_BYTES || MAGIC.some((b, i) => bytes[i] !== b)) {
    throw new DecodeError('Not a cached buffer (bad header)');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const width = view.getUint32(4);
  const height = view.getUint32(8);
  const expected = BUFFER_HEADER_BYTES + width * height * 4;
  if (bytes.length !== expected) {
    throw new DecodeError(`Cached buffer is ${bytes.length} bytes, header says ${expected}`);
  }
  return { width, height, data: new Uint8ClampedArray(bytes.subarray(BUFFER_HEADER_BYTES)) };
}
