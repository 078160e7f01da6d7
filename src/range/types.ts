/**
 * Core types of the range algebra.
 *
 * @packageDocumentation
 */

import { formatPath, formatValue } from '../utils/values.js';

/**
 * One step of a path: a map key or a sequence index.
 */
export type PathSegment = string | number;

/**
 * Location of a value inside a configuration, outermost key first.
 */
export type Path = readonly PathSegment[];

/**
 * Callback applied to every scalar leaf during a fold.
 *
 * @typeParam A - The accumulator type.
 */
export type LeafFolder<A> = (range: Range, path: Path, acc: A, value: unknown) => A;

/**
 * A validator and folder for one kind of value.
 *
 * `complete` turns a raw value into its completed form (defaults filled in,
 * elements validated) or returns a {@link RangeViolation}; it never throws.
 * `fold` completes the value again and calls the folder once per scalar leaf,
 * left to right.
 *
 * @typeParam T - The completed value type.
 */
export interface Range<T = unknown> {
  /** Human-readable description, used in error messages. */
  readonly description: string;

  /**
   * Validates and completes a raw value.
   *
   * @param path - Location of the value, used for violations.
   * @param value - The raw value.
   */
  complete(path: Path, value: unknown): T | RangeViolation;

  /**
   * Folds over the scalar leaves of a raw or completed value.
   *
   * @param path - Location of the value.
   * @param f - Called once per scalar leaf.
   * @param init - Initial accumulator.
   * @param value - Raw or completed value.
   */
  fold<A>(path: Path, f: LeafFolder<A>, init: A, value: unknown): A;
}

/**
 * A rejected value. Returned from `complete`, never thrown.
 */
export class RangeViolation {
  /**
   * @param range - The range that rejected the value, or `null` when the value
   *   does not fit the schema's shape (unknown key, non-map section).
   * @param path - Where the rejection happened.
   * @param value - The offending raw value.
   */
  constructor(
    public readonly range: Range | null,
    public readonly path: Path,
    public readonly value: unknown
  ) {}
}

/**
 * Type guard for completion results.
 */
export function isRangeViolation(value: unknown): value is RangeViolation {
  return value instanceof RangeViolation;
}

/**
 * Renders a violation as a one-line message naming the rejecting range,
 * the path and the offending value.
 *
 * @example
 * ```typescript
 * formatRangeViolation(violation);
 * // => "Value 70000 at port is not in range 'integer between 1 and 65535'"
 * ```
 */
export function formatRangeViolation(violation: RangeViolation): string {
  const where = formatPath(violation.path);
  const what = formatValue(violation.value);
  if (violation.range === null) {
    return `Value ${what} at ${where} does not fit the schema`;
  }
  return `Value ${what} at ${where} is not in range '${violation.range.description}'`;
}
