/**
 * @module stable-stringify
 * JSON serialization that does not depend on object key insertion order.
 *
 * Object keys are sorted recursively; array order is preserved. Identical
 * values always produce identical text, which makes the output usable as
 * cache-key material.
 */

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function normalize(value: unknown, path: string): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`stableStringify: non-finite number at ${path}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => normalize(item, `${path}[${i}]`));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const field = value[key];
      // undefined fields are dropped, as JSON.stringify does
      if (field === undefined) continue;
      out[key] = normalize(field, `${path}.${key}`);
    }
    return out;
  }
  throw new TypeError(`stableStringify: unsupported ${typeof value} at ${path}`);
}

/** Serialize `value` to canonical JSON. Throws `TypeError` on values JSON cannot represent faithfully. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value, '$'));
}
