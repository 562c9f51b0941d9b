/**
 * @module png-codec
 * PNG encoder/decoder using fflate for the zlib streams inside IDAT.
 * Pure TypeScript, no browser APIs required.
 *
 * Decoding accepts 8-bit, non-interlaced grayscale, gray+alpha, RGB and RGBA
 * images and always yields an RGBA {@link PixelBuffer}. Encoding always writes
 * 8-bit RGBA. Malformed input raises {@link DecodeError}.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { PixelBuffer } from '@replay-editor/types';
import { DecodeError } from './errors';
import { wrapBuffer } from './pixel-buffer';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

/** Write one chunk (length, type, data, CRC) at `offset`; returns the offset after it. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const end = typeStart + 4 + data.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Samples per pixel for each supported color type. */
const CHANNELS: Readonly<Record<number, number>> = {
  0: 1, // grayscale
  2: 3, // RGB
  4: 2, // grayscale + alpha
  6: 4, // RGBA
};

/** True when `bytes` start with the PNG signature. */
export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

/**
 * Encode a buffer as an 8-bit RGBA PNG.
 * Uses filter type 0 (None) on every scanline.
 */
export function encodePng(image: PixelBuffer): Uint8Array {
  const { data, width, height } = image;

  if (data.length !== width * height * 4) {
    throw new RangeError(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const rowBytes = width * 4;
  const raw = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    raw[y * (1 + rowBytes)] = 0; // filter: None
    raw.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = zlibSync(raw);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA
  // compression, filter and interlace methods stay 0

  const out = new Uint8Array(8 + (12 + 13) + (12 + compressed.length) + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/** Reverse the per-scanline filters in place of a fresh array of `height * rowBytes`. */
function unfilter(raw: Uint8Array, width: number, height: number, bpp: number): Uint8Array {
  const rowBytes = width * bpp;
  if (raw.length < height * (1 + rowBytes)) {
    throw new DecodeError(`PNG image data is truncated (${raw.length} of ${height * (1 + rowBytes)} bytes)`);
  }
  const out = new Uint8Array(height * rowBytes);

  for (let y = 0; y < height; y++) {
    const filterType = raw[y * (1 + rowBytes)];
    const src = y * (1 + rowBytes) + 1;
    const dst = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const a = x >= bpp ? out[dst + x - bpp] : 0; // left
      const b = y > 0 ? out[dst - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? out[dst - rowBytes + x - bpp] : 0; // above-left

      let predicted: number;
      switch (filterType) {
        case 0:
          predicted = 0;
          break;
        case 1:
          predicted = a;
          break;
        case 2:
          predicted = b;
          break;
        case 3:
          predicted = (a + b) >> 1;
          break;
        case 4:
          predicted = paethPredictor(a, b, c);
          break;
        default:
          throw new DecodeError(`Unsupported PNG filter type ${filterType} on row ${y}`);
      }
      out[dst + x] = (raw[src + x] + predicted) & 0xff;
    }
  }
  return out;
}

/** Expand unfiltered samples of any supported color type to RGBA. */
function toRgba(samples: Uint8Array, pixelCount: number, channels: number): Uint8ClampedArray {
  const rgba = new Uint8ClampedArray(pixelCount * 4);
  for (let p = 0; p < pixelCount; p++) {
    const s = p * channels;
    const o = p * 4;
    switch (channels) {
      case 1:
        rgba[o] = rgba[o + 1] = rgba[o + 2] = samples[s];
        rgba[o + 3] = 255;
        break;
      case 2:
        rgba[o] = rgba[o + 1] = rgba[o + 2] = samples[s];
        rgba[o + 3] = samples[s + 1];
        break;
      case 3:
        rgba[o] = samples[s];
        rgba[o + 1] = samples[s + 1];
        rgba[o + 2] = samples[s + 2];
        rgba[o + 3] = 255;
        break;
      default:
        rgba[o] = samples[s];
        rgba[o + 1] = samples[s + 1];
        rgba[o + 2] = samples[s + 2];
        rgba[o + 3] = samples[s + 3];
    }
  }
  return rgba;
}

/**
 * Decode a PNG file into an RGBA buffer.
 * Supports filter types 0-4 (None, Sub, Up, Average, Paeth).
 *
 * @throws DecodeError for anything that is not a supported, well-formed PNG.
 */
export function decodePng(png: Uint8Array): PixelBuffer {
  if (!isPng(png)) {
    throw new DecodeError('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    const type = String.fromCharCode(png[offset + 4], png[offset + 5], png[offset + 6], png[offset + 7]);
    const dataStart = offset + 8;
    if (dataStart + length + 4 > png.length) {
      throw new DecodeError(`PNG chunk ${type} at byte ${offset} is truncated`);
    }

    if (type === 'IHDR') {
      width = read32(png, dataStart);
      height = read32(png, dataStart + 4);
      const bitDepth = png[dataStart + 8];
      const colorType = png[dataStart + 9];
      const interlace = png[dataStart + 12];
      const ch = CHANNELS[colorType];
      if (bitDepth !== 8 || ch === undefined || interlace !== 0) {
        throw new DecodeError(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}`,
        );
      }
      channels = ch;
    } else if (type === 'IDAT') {
      idatChunks.push(png.subarray(dataStart, dataStart + length));
    } else if (type === 'IEND') {
      break;
    }

    offset = dataStart + length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0 || channels === 0) {
    throw new DecodeError('PNG missing IHDR chunk');
  }
  if (idatChunks.length === 0) {
    throw new DecodeError('PNG has no IDAT chunk');
  }

  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  let inflated: Uint8Array;
  try {
    inflated = unzlibSync(combined);
  } catch (err) {
    throw new DecodeError('PNG image data failed to inflate', err);
  }

  const samples = unfilter(inflated, width, height, channels);
  return wrapBuffer(toRgba(samples, width * height, channels), width, height);
}
