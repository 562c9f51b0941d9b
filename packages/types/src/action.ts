/**
 * @module action
 * Edit actions recorded on an action stack.
 *
 * An action is a closed tagged union over `kind`. Operation names are string
 * literal unions so that every switch over them is checked for exhaustiveness.
 */

import type { Point } from './common';

/** Convolution filters understood by the operation library. */
export type FilterName =
  | 'blur'
  | 'contour'
  | 'detail'
  | 'edge_enhance'
  | 'edge_enhance_more'
  | 'emboss'
  | 'find_edges'
  | 'sharpen'
  | 'smooth'
  | 'smooth_more';

/** Factor-driven enhancements understood by the operation library. */
export type EnhancementName = 'brightness' | 'color' | 'contrast' | 'sharpness';

/** A parameterless filter. */
export interface FilterOperation {
  readonly name: FilterName;
}

/** An enhancement blended with its degenerate image by `factor` (1 = unchanged). */
export interface EnhanceOperation {
  readonly name: EnhancementName;
  readonly factor: number;
}

/** Rectangle in display coordinates (vertical axis points up). */
export interface RectSelection {
  readonly type: 'rect';
  /** Horizontal extent `[x0, x1]`. */
  readonly x: readonly [number, number];
  /** Vertical extent `[y0, y1]`, measured from the bottom edge. */
  readonly y: readonly [number, number];
}

/** Free-form polygon in display coordinates (vertical axis points up). */
export interface LassoSelection {
  readonly type: 'lasso';
  /** Ordered polygon vertices. The path closes implicitly. */
  readonly points: readonly Point[];
}

/**
 * The raw selection recorded with an action. `null` means the whole canvas.
 * Resolution against concrete buffer dimensions happens later, at replay time.
 */
export type SelectionDescriptor = RectSelection | LassoSelection | null;

/** Apply a filter, optionally restricted to a selection. */
export interface FilterAction {
  readonly kind: 'filter';
  readonly operation: FilterOperation;
  readonly selection: SelectionDescriptor;
}

/** Apply an enhancement, optionally restricted to a selection. */
export interface EnhanceAction {
  readonly kind: 'enhance';
  readonly operation: EnhanceOperation;
  readonly selection: SelectionDescriptor;
}

/** One immutable edit step. */
export type Action = FilterAction | EnhanceAction;

/** Discriminator of {@link Action}. */
export type ActionKind = Action['kind'];

/** The operation part of any action. */
export type Operation = Action['operation'];
