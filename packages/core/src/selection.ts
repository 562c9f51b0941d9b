/**
 * @module selection
 * Parsing of raw selection payloads into {@link SelectionDescriptor}s.
 *
 * Accepts the canonical shapes (`{ type: 'rect', x, y }`,
 * `{ type: 'lasso', points }`) and the plot-widget payloads a browser client
 * posts (`{ range: { x, y } }`, `{ lassoPoints: { x: [...], y: [...] } }`).
 * Coordinates stay in display space; flipping happens in the region resolver.
 */

import type { LassoSelection, Point, RectSelection, SelectionDescriptor } from '@replay-editor/types';
import { InvalidSelection } from './errors';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isFiniteNum(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function parsePair(v: unknown, field: string): [number, number] {
  if (!Array.isArray(v) || v.length !== 2) {
    throw new InvalidSelection(`${field} must be a [min, max] pair`);
  }
  const [a, b]: unknown[] = v;
  if (!isFiniteNum(a) || !isFiniteNum(b)) {
    throw new InvalidSelection(`${field} must contain finite numbers`);
  }
  return [a, b];
}

function parseRect(x: unknown, y: unknown, field: string): RectSelection {
  return { type: 'rect', x: parsePair(x, `${field}.x`), y: parsePair(y, `${field}.y`) };
}

function parsePoints(v: unknown, field: string): Point[] {
  if (!Array.isArray(v)) {
    throw new InvalidSelection(`${field} must be an array of points`);
  }
  return v.map((p: unknown, i) => {
    if (!isRecord(p) || !isFiniteNum(p.x) || !isFiniteNum(p.y)) {
      throw new InvalidSelection(`${field}[${i}] must have finite numeric x and y`);
    }
    return { x: p.x, y: p.y };
  });
}

/** Zip the column-wise `{ x: [...], y: [...] }` layout of a lasso payload into points. */
function zipLassoColumns(v: unknown): Point[] {
  if (!isRecord(v) || !Array.isArray(v.x) || !Array.isArray(v.y)) {
    throw new InvalidSelection('lassoPoints must have x and y arrays');
  }
  const xs: unknown[] = v.x;
  const ys: unknown[] = v.y;
  if (xs.length !== ys.length) {
    throw new InvalidSelection(
      `lassoPoints.x and lassoPoints.y differ in length (${xs.length} vs ${ys.length})`,
    );
  }
  return xs.map((x, i) => {
    const y = ys[i];
    if (!isFiniteNum(x) || !isFiniteNum(y)) {
      throw new InvalidSelection(`lassoPoints[${i}] must be finite numbers`);
    }
    return { x, y };
  });
}

function lasso(points: Point[]): LassoSelection {
  return { type: 'lasso', points };
}

/**
 * Parse a raw selection payload.
 *
 * `null`, `undefined`, `{}` and a click-only payload (`{ points: [...] }`)
 * select the whole canvas and yield `null`.
 *
 * @throws InvalidSelection when the payload is structurally malformed.
 */
export function parseSelection(raw: unknown): SelectionDescriptor {
  if (raw === null || raw === undefined) return null;
  if (!isRecord(raw)) {
    throw new InvalidSelection(`Selection must be an object, got ${Array.isArray(raw) ? 'array' : typeof raw}`);
  }

  if ('type' in raw) {
    switch (raw.type) {
      case 'rect':
        return parseRect(raw.x, raw.y, 'selection');
      case 'lasso':
        return lasso(parsePoints(raw.points, 'selection.points'));
      default:
        throw new InvalidSelection(`Unknown selection type: ${JSON.stringify(raw.type)}`);
    }
  }

  if ('range' in raw) {
    if (!isRecord(raw.range)) {
      throw new InvalidSelection('range must be an object with x and y');
    }
    return parseRect(raw.range.x, raw.range.y, 'range');
  }

  if ('lassoPoints' in raw) {
    return lasso(zipLassoColumns(raw.lassoPoints));
  }

  const keys = Object.keys(raw);
  if (keys.every((k) => k === 'points')) return null;
  throw new InvalidSelection(`Unrecognized selection fields: ${keys.join(', ')}`);
}
