/**
 * @module action-stack
 * The ordered record of edits applied to a session's image.
 *
 * An {@link ActionStack} is an immutable value: `append` and `truncate`
 * return a new stack with `version` bumped, leaving the original untouched,
 * so a resolver reading one stack never observes a later mutation.
 * Insertion order is application order.
 */

import type { Action } from '@replay-editor/types';
import { parseAction } from './action';
import { OutOfRange, ReplayError, ValidationError, errorMessage } from './errors';
import { stableStringify } from './stable-stringify';

/**
 * Canonical serialization of a list of actions: a JSON array of
 * `{ kind, operation, selection }` records with object keys sorted.
 */
export function serializeActions(actions: readonly Action[]): string {
  return stableStringify(
    actions.map((a) => ({ kind: a.kind, operation: a.operation, selection: a.selection })),
  );
}

export class ActionStack {
  /** Mutation counter: 0 for a fresh stack, +1 per append or truncate. */
  readonly version: number;

  private readonly actions: readonly Action[];

  private constructor(actions: readonly Action[], version: number) {
    this.actions = Object.freeze([...actions]);
    this.version = version;
  }

  /** A stack with no actions at version 0. */
  static empty(): ActionStack {
    return new ActionStack([], 0);
  }

  /**
   * Build a stack from actions, validating each one.
   * @throws ValidationError, InvalidSelection or UnknownOperation tagged with the index.
   */
  static from(actions: readonly unknown[], version = 0): ActionStack {
    return new ActionStack(parseAll(actions), version);
  }

  /**
   * Decode the output of {@link ActionStack.serialize}.
   * @throws ValidationError for malformed JSON or records; record errors carry `actionIndex`.
   */
  static deserialize(text: string, version = 0): ActionStack {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(`Action stack is not valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new ValidationError('Action stack must be a JSON array');
    }
    return ActionStack.from(parsed, version);
  }

  get length(): number {
    return this.actions.length;
  }

  get isEmpty(): boolean {
    return this.actions.length === 0;
  }

  /** The action at `index`. */
  at(index: number): Action {
    if (!Number.isInteger(index) || index < 0 || index >= this.actions.length) {
      throw new OutOfRange(`Action index ${index} is outside 0..${this.actions.length - 1}`);
    }
    return this.actions[index];
  }

  /** The first `n` actions. */
  prefix(n: number): readonly Action[] {
    this.checkLength(n);
    return this.actions.slice(0, n);
  }

  toArray(): readonly Action[] {
    return this.actions;
  }

  /**
   * Return a new stack with `action` appended. Typed actions are re-validated
   * like raw payloads.
   * @throws ValidationError, InvalidSelection or UnknownOperation.
   */
  append(action: unknown): ActionStack {
    const parsed = parseOne(action, this.actions.length);
    return new ActionStack([...this.actions, parsed], this.version + 1);
  }

  /**
   * Return a new stack keeping only the first `n` actions (undo).
   * @throws OutOfRange when `n` is not an integer in `0..length`.
   */
  truncate(n: number): ActionStack {
    this.checkLength(n);
    return new ActionStack(this.actions.slice(0, n), this.version + 1);
  }

  /** Canonical, order-preserving encoding. Identical stacks serialize identically. */
  serialize(): string {
    return serializeActions(this.actions);
  }

  /** True when both stacks hold the same actions, regardless of version. */
  equals(other: ActionStack): boolean {
    return this.serialize() === other.serialize();
  }

  private checkLength(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > this.actions.length) {
      throw new OutOfRange(`Cannot keep ${n} actions of a stack of ${this.actions.length}`);
    }
  }
}

function parseOne(raw: unknown, index: number): Action {
  try {
    return parseAction(raw);
  } catch (err) {
    if (err instanceof ReplayError) throw err.atAction(index);
    throw err;
  }
}

function parseAll(raws: readonly unknown[]): Action[] {
  return raws.map((raw, i) => parseOne(raw, i));
}
