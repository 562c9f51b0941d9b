/**
 * @module cache/cache-key
 * Content addressing for resolved buffers.
 *
 * A prefix of a session's stack is identified by the SHA-256 of the canonical
 * encoding of `(sessionId, imageSignature, actions)`. Equal prefixes of the
 * same upload map to the same key; any change to an action, its order, the
 * session or the image yields a different one.
 */

import { createHash } from 'node:crypto';
import type { Action } from '@replay-editor/types';
import { serializeActions } from '../action-stack';
import { stableStringify } from '../stable-stringify';

/** Length of the hex image signature. */
export const SIGNATURE_LENGTH = 16;

/** Key for the buffer obtained by applying `prefix` to the session's image. */
export function computeCacheKey(
  sessionId: string,
  imageSignature: string,
  prefix: readonly Action[],
): string {
  const payload = stableStringify({
    sessionId,
    imageSignature,
    actions: serializeActions(prefix),
  });
  return createHash('sha256').update(payload, 'utf8').digest('hex');
}

/** Short fingerprint of uploaded image bytes. */
export function imageSignature(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex').slice(0, SIGNATURE_LENGTH);
}
