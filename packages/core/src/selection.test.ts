import { describe, it, expect } from 'vitest';
import { parseSelection } from './selection';
import { InvalidSelection } from './errors';

describe('parseSelection', () => {
  it('treats absent and empty payloads as the whole canvas', () => {
    expect(parseSelection(null)).toBeNull();
    expect(parseSelection(undefined)).toBeNull();
    expect(parseSelection({})).toBeNull();
  });

  it('treats a click-only payload as the whole canvas', () => {
    expect(parseSelection({ points: [{ x: 3, y: 4 }] })).toBeNull();
  });

  it('accepts the canonical rectangle shape', () => {
    expect(parseSelection({ type: 'rect', x: [10, 50], y: [20, 80] })).toEqual({
      type: 'rect',
      x: [10, 50],
      y: [20, 80],
    });
  });

  it('accepts a plot-widget range payload', () => {
    expect(parseSelection({ range: { x: [1.5, 9], y: [2, 7.25] } })).toEqual({
      type: 'rect',
      x: [1.5, 9],
      y: [2, 7.25],
    });
  });

  it('zips column-wise lasso points', () => {
    expect(parseSelection({ lassoPoints: { x: [0, 10, 10], y: [0, 0, 10] } })).toEqual({
      type: 'lasso',
      points: [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
      ],
    });
  });

  it('accepts the canonical lasso shape', () => {
    const points = [
      { x: 1, y: 1 },
      { x: 5, y: 1 },
      { x: 5, y: 5 },
    ];
    expect(parseSelection({ type: 'lasso', points })).toEqual({ type: 'lasso', points });
  });

  it('rejects a rectangle with a missing axis', () => {
    expect(() => parseSelection({ type: 'rect', x: [1, 2] })).toThrow(InvalidSelection);
    expect(() => parseSelection({ type: 'rect', x: [1, 2] })).toThrow('selection.y must be a [min, max] pair');
  });

  it('rejects non-numeric coordinates', () => {
    expect(() => parseSelection({ range: { x: ['1', 2], y: [0, 1] } })).toThrow(
      'range.x must contain finite numbers',
    );
    expect(() => parseSelection({ range: { x: [0, Infinity], y: [0, 1] } })).toThrow(InvalidSelection);
  });

  it('rejects lasso columns of different lengths', () => {
    expect(() => parseSelection({ lassoPoints: { x: [1, 2, 3], y: [1, 2] } })).toThrow(
      'lassoPoints.x and lassoPoints.y differ in length (3 vs 2)',
    );
  });

  it('rejects unknown selection types and fields', () => {
    expect(() => parseSelection({ type: 'ellipse' })).toThrow('Unknown selection type: "ellipse"');
    expect(() => parseSelection({ box: [1, 2] })).toThrow('Unrecognized selection fields: box');
    expect(() => parseSelection('rect')).toThrow('Selection must be an object, got string');
  });

  it('reports INVALID_SELECTION as its code', () => {
    try {
      parseSelection([1, 2]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSelection);
      expect(err).toMatchObject({ code: 'INVALID_SELECTION' });
    }
  });
});
