/**
 * @module action
 * Construction and validation of {@link Action}s.
 *
 * Operation names are checked when an action is built, so an action that
 * exists is always one the operation library can apply. Raw payloads from the
 * wire go through {@link parseAction}, which also accepts the legacy record
 * layout `{ type, operation, selectedData }` where enhancement operations are
 * `{ enhancement, enhancement_factor }`.
 */

import type {
  Action,
  EnhanceAction,
  EnhancementName,
  FilterAction,
  FilterName,
  SelectionDescriptor,
} from '@replay-editor/types';
import { UnknownOperation, ValidationError } from './errors';
import { parseSelection } from './selection';

/** Every filter name, in menu order. */
export const FILTER_NAMES = [
  'blur',
  'contour',
  'detail',
  'edge_enhance',
  'edge_enhance_more',
  'emboss',
  'find_edges',
  'sharpen',
  'smooth',
  'smooth_more',
] as const satisfies readonly FilterName[];

/** Every enhancement name, in menu order. */
export const ENHANCEMENT_NAMES = [
  'brightness',
  'color',
  'contrast',
  'sharpness',
] as const satisfies readonly EnhancementName[];

/** Inclusive bounds accepted for an enhancement factor. */
export const MIN_ENHANCEMENT_FACTOR = 0;
export const MAX_ENHANCEMENT_FACTOR = 10;

export function isFilterName(name: string): name is FilterName {
  return (FILTER_NAMES as readonly string[]).includes(name);
}

export function isEnhancementName(name: string): name is EnhancementName {
  return (ENHANCEMENT_NAMES as readonly string[]).includes(name);
}

/**
 * Build a filter action.
 * @throws UnknownOperation for a name outside {@link FILTER_NAMES}.
 */
export function createFilterAction(name: string, selection: SelectionDescriptor = null): FilterAction {
  if (!isFilterName(name)) {
    throw new UnknownOperation(name);
  }
  const action: FilterAction = { kind: 'filter', operation: Object.freeze({ name }), selection };
  return Object.freeze(action);
}

/**
 * Build an enhancement action.
 * @throws UnknownOperation for a name outside {@link ENHANCEMENT_NAMES}.
 * @throws ValidationError when `factor` is not finite or out of bounds.
 */
export function createEnhanceAction(
  name: string,
  factor: number,
  selection: SelectionDescriptor = null,
): EnhanceAction {
  if (!isEnhancementName(name)) {
    throw new UnknownOperation(name);
  }
  if (
    typeof factor !== 'number' ||
    !Number.isFinite(factor) ||
    factor < MIN_ENHANCEMENT_FACTOR ||
    factor > MAX_ENHANCEMENT_FACTOR
  ) {
    throw new ValidationError(
      `Enhancement factor must be a number between ${MIN_ENHANCEMENT_FACTOR} and ${MAX_ENHANCEMENT_FACTOR}, got ${String(factor)}`,
    );
  }
  const action: EnhanceAction = { kind: 'enhance', operation: Object.freeze({ name, factor }), selection };
  return Object.freeze(action);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function operationName(op: unknown): string {
  if (typeof op === 'string') return op;
  if (isRecord(op)) {
    if (typeof op.name === 'string') return op.name;
    if (typeof op.enhancement === 'string') return op.enhancement;
  }
  throw new ValidationError('operation must be a name or an object with a name');
}

function enhancementFactor(op: unknown): number {
  if (isRecord(op)) {
    const factor = op.factor ?? op.enhancement_factor;
    if (typeof factor === 'number') return factor;
  }
  throw new ValidationError('enhance operation requires a numeric factor');
}

/**
 * Validate a raw action payload and build the corresponding {@link Action}.
 *
 * @throws ValidationError for a malformed record or an unrecognized `kind`.
 * @throws InvalidSelection for a malformed selection.
 * @throws UnknownOperation for an unknown operation name.
 */
export function parseAction(raw: unknown): Action {
  if (!isRecord(raw)) {
    throw new ValidationError('Action must be an object');
  }
  const kind = raw.kind ?? raw.type;
  if (kind !== 'filter' && kind !== 'enhance') {
    throw new ValidationError(`Unknown action kind: ${kind === undefined ? 'undefined' : JSON.stringify(kind)}`);
  }
  const selection = parseSelection(raw.selection !== undefined ? raw.selection : raw.selectedData);
  const name = operationName(raw.operation);

  return kind === 'filter'
    ? createFilterAction(name, selection)
    : createEnhanceAction(name, enhancementFactor(raw.operation), selection);
}

/** Short label for logs and tool output, e.g. `enhance:brightness(1.5)@rect`. */
export function describeAction(action: Action): string {
  const where = action.selection ? `@${action.selection.type}` : '';
  switch (action.kind) {
    case 'filter':
      return `filter:${action.operation.name}${where}`;
    case 'enhance':
      return `enhance:${action.operation.name}(${action.operation.factor})${where}`;
  }
}
