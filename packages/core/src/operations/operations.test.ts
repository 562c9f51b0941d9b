import { describe, it, expect } from 'vitest';
import type { MaskRegion, PixelBuffer } from '@replay-editor/types';
import { applyOperation, referenceAdapter } from './apply';
import { convolve } from './convolve';
import { enhance, luma, meanLuma } from './enhance';
import { KERNELS } from './kernels';
import { buffersEqual, cloneBuffer, createBuffer, getPixel, solidBuffer } from '../pixel-buffer';
import { FILTER_NAMES } from '../action';

/** 3x3 gray image: black with one bright centre pixel. */
function centreDot(level: number): PixelBuffer {
  const buf = solidBuffer(3, 3, [0, 0, 0, 255]);
  buf.data.set([level, level, level, 255], 4 * 4);
  return buf;
}

describe('convolve', () => {
  it('leaves a solid image unchanged for every normalized kernel', () => {
    const src = solidBuffer(8, 8, [200, 100, 50, 255]);
    const normalized = ['blur', 'detail', 'edge_enhance', 'edge_enhance_more', 'sharpen', 'smooth', 'smooth_more'] as const;
    for (const name of normalized) {
      expect(buffersEqual(convolve(src, KERNELS[name]), src)).toBe(true);
    }
  });

  it('applies the kernel offset on flat areas', () => {
    const src = solidBuffer(4, 4, [10, 20, 30, 255]);

    expect(getPixel(convolve(src, KERNELS.find_edges), 1, 1)).toEqual([0, 0, 0, 255]);
    expect(getPixel(convolve(src, KERNELS.emboss), 1, 1)).toEqual([128, 128, 128, 255]);
    expect(getPixel(convolve(src, KERNELS.contour), 1, 1)).toEqual([255, 255, 255, 255]);
  });

  it('spreads a single bright pixel with smooth, repeating edge samples', () => {
    const out = convolve(centreDot(130), KERNELS.smooth);

    expect(getPixel(out, 1, 1)).toEqual([50, 50, 50, 255]);
    expect(getPixel(out, 0, 0)).toEqual([10, 10, 10, 255]);
    expect(getPixel(out, 1, 0)).toEqual([10, 10, 10, 255]);
    expect(getPixel(out, 2, 2)).toEqual([10, 10, 10, 255]);
  });

  it('copies alpha and never modifies its input', () => {
    const src = solidBuffer(2, 2, [40, 40, 40, 77]);
    const before = cloneBuffer(src);
    const out = convolve(src, KERNELS.sharpen);

    expect(getPixel(out, 0, 0)[3]).toBe(77);
    expect(buffersEqual(src, before)).toBe(true);
    expect(out.data).not.toBe(src.data);
  });
});

describe('enhance', () => {
  it('scales brightness by the factor', () => {
    const out = enhance(solidBuffer(2, 2, [100, 60, 20, 255]), 'brightness', 1.5);
    expect(getPixel(out, 0, 0)).toEqual([150, 90, 30, 255]);
  });

  it('clamps extrapolated values', () => {
    const out = enhance(solidBuffer(1, 1, [200, 10, 0, 255]), 'brightness', 2);
    expect(getPixel(out, 0, 0)).toEqual([255, 20, 0, 255]);
  });

  it('fully desaturates at color factor 0', () => {
    const out = enhance(solidBuffer(1, 1, [255, 0, 0, 255]), 'color', 0);
    expect(getPixel(out, 0, 0)).toEqual([76, 76, 76, 255]);
  });

  it('leaves a flat gray image unchanged under any contrast', () => {
    const src = solidBuffer(3, 3, [128, 128, 128, 255]);
    expect(buffersEqual(enhance(src, 'contrast', 3), src)).toBe(true);
  });

  it('returns the image unchanged at factor 1', () => {
    const src = centreDot(130);
    expect(buffersEqual(enhance(src, 'sharpness', 1), src)).toBe(true);
  });

  it('computes luma with full-range weights', () => {
    expect(luma(255, 255, 255)).toBe(255);
    expect(luma(128, 128, 128)).toBe(128);
    expect(meanLuma(createBuffer(0, 0))).toBe(0);
  });
});

describe('applyOperation', () => {
  const blur = { name: 'blur' } as const;
  const brighten = { name: 'brightness', factor: 2 } as const;

  it('returns an identical copy for an empty region', () => {
    const src = centreDot(200);
    const out = applyOperation(src, { kind: 'rect', left: 1, top: 1, right: 1, bottom: 3 }, blur);

    expect(buffersEqual(out, src)).toBe(true);
    expect(out.data).not.toBe(src.data);
  });

  it('transforms the whole buffer for a full region', () => {
    const src = solidBuffer(2, 2, [50, 50, 50, 255]);
    const out = applyOperation(src, { kind: 'rect', left: 0, top: 0, right: 2, bottom: 2 }, brighten);

    expect(getPixel(out, 0, 0)).toEqual([100, 100, 100, 255]);
    expect(getPixel(out, 1, 1)).toEqual([100, 100, 100, 255]);
  });

  it('only changes pixels inside a rectangle', () => {
    const src = solidBuffer(4, 4, [50, 50, 50, 255]);
    const out = applyOperation(src, { kind: 'rect', left: 0, top: 0, right: 2, bottom: 2 }, brighten);

    expect(getPixel(out, 0, 0)).toEqual([100, 100, 100, 255]);
    expect(getPixel(out, 1, 1)).toEqual([100, 100, 100, 255]);
    expect(getPixel(out, 2, 0)).toEqual([50, 50, 50, 255]);
    expect(getPixel(out, 0, 2)).toEqual([50, 50, 50, 255]);
    expect(getPixel(src, 0, 0)).toEqual([50, 50, 50, 255]);
  });

  it('composites through a mask', () => {
    const src = solidBuffer(2, 2, [50, 50, 50, 255]);
    const mask: MaskRegion = { kind: 'mask', width: 2, height: 2, data: new Uint8Array([0, 1, 0, 0]) };
    const out = applyOperation(src, mask, brighten);

    expect(getPixel(out, 1, 0)).toEqual([100, 100, 100, 255]);
    expect(getPixel(out, 0, 0)).toEqual([50, 50, 50, 255]);
    expect(getPixel(out, 1, 1)).toEqual([50, 50, 50, 255]);
  });

  it('rejects a mask of the wrong size', () => {
    const mask: MaskRegion = { kind: 'mask', width: 3, height: 3, data: new Uint8Array(9).fill(1) };
    expect(() => applyOperation(solidBuffer(2, 2, [0, 0, 0, 255]), mask, blur)).toThrow(
      'Mask 3x3 does not match buffer 2x2',
    );
  });

  it('is exposed as the reference adapter', async () => {
    const src = solidBuffer(4, 4, [30, 30, 30, 255]);
    for (const name of FILTER_NAMES) {
      const region = { kind: 'rect', left: 0, top: 0, right: 4, bottom: 4 } as const;
      const out = await referenceAdapter.apply(src, region, { name });
      expect(out.width).toBe(4);
      expect(out.height).toBe(4);
    }
  });
});
