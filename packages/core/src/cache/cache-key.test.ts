import { describe, it, expect } from 'vitest';
import { computeCacheKey, imageSignature, SIGNATURE_LENGTH } from './cache-key';
import { createEnhanceAction, createFilterAction } from '../action';

const blur = createFilterAction('blur');
const brighten = createEnhanceAction('brightness', 1.5);

describe('computeCacheKey', () => {
  it('is a SHA-256 hex digest', () => {
    expect(computeCacheKey('s1', 'sig', [blur])).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is stable for equal prefixes', () => {
    expect(computeCacheKey('s1', 'sig', [blur, brighten])).toBe(
      computeCacheKey('s1', 'sig', [createFilterAction('blur'), createEnhanceAction('brightness', 1.5)]),
    );
  });

  it('depends on order, session and image', () => {
    const key = computeCacheKey('s1', 'sig', [blur, brighten]);

    expect(computeCacheKey('s1', 'sig', [brighten, blur])).not.toBe(key);
    expect(computeCacheKey('s2', 'sig', [blur, brighten])).not.toBe(key);
    expect(computeCacheKey('s1', 'other', [blur, brighten])).not.toBe(key);
    expect(computeCacheKey('s1', 'sig', [blur])).not.toBe(key);
  });

  it('distinguishes the empty prefix', () => {
    expect(computeCacheKey('s1', 'sig', [])).not.toBe(computeCacheKey('s1', 'sig', [blur]));
  });
});

describe('imageSignature', () => {
  it('is a short hex fingerprint of the bytes', () => {
    const sig = imageSignature(new Uint8Array([1, 2, 3]));

    expect(sig).toHaveLength(SIGNATURE_LENGTH);
    expect(sig).toMatch(/^[0-9a-f]+$/);
    expect(imageSignature(new Uint8Array([1, 2, 3]))).toBe(sig);
    expect(imageSignature(new Uint8Array([1, 2, 4]))).not.toBe(sig);
  });
});
