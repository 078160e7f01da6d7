/**
 * Range combinators.
 *
 * Every combinator returns a new immutable {@link Range} whose `complete` and
 * `fold` are derived from its inputs. Composite ranges validate their parts in
 * order and return the first violation unchanged.
 *
 * @packageDocumentation
 */

import { reportFatal } from '../errors.js';
import { formatPath, formatValue, isConfigMap, isNil } from '../utils/values.js';
import { isRangeViolation, RangeViolation } from './types.js';
import type { LeafFolder, Path, PathSegment, Range } from './types.js';

/**
 * Completion function of a scalar range. Receives the range itself so that
 * violations can name it.
 */
export type Completer<T> = (range: Range<T>, path: Path, value: unknown) => T | RangeViolation;

type Folder<T> = <A>(range: Range<T>, path: Path, f: LeafFolder<A>, init: A, value: unknown) => A;

function makeRange<T>(description: string, completer: Completer<T>, folder: Folder<T>): Range<T> {
  const range: Range<T> = {
    description,
    complete(path: Path, value: unknown): T | RangeViolation {
      return completer(range, path, value);
    },
    fold<A>(path: Path, f: LeafFolder<A>, init: A, value: unknown): A {
      return folder(range, path, f, init, value);
    },
  };
  return range;
}

/**
 * Unwraps a completion result inside a fold. Folding a value that does not
 * complete means the caller skipped validation, which is a program error.
 *
 * @throws ConfigurationError with code `FOLD_PRECONDITION`.
 */
export function expectCompleted<T>(range: Range, path: Path, result: T | RangeViolation): T {
  if (isRangeViolation(result)) {
    return reportFatal(
      'fold',
      'FOLD_PRECONDITION',
      `cannot fold over ${formatValue(result.value)} at ${formatPath(result.path)}: rejected by '${range.description}'`,
      { path, value: result.value }
    );
  }
  return result;
}

const foldScalar = <T, A>(
  range: Range<T>,
  path: Path,
  f: LeafFolder<A>,
  init: A,
  value: unknown
): A => f(range, path, init, expectCompleted(range, path, range.complete(path, value)));

/**
 * Builds a range over a single scalar value. Its fold completes the value and
 * applies the folder once.
 *
 * @param description - Human-readable description.
 * @param completer - Completion function.
 */
export function scalarRange<T>(description: string, completer: Completer<T>): Range<T> {
  return makeRange(description, completer, foldScalar);
}

/**
 * Accepts anything; nil becomes `dflt`.
 */
export function anyRange(dflt: unknown = undefined): Range {
  return scalarRange('any value', (_range, _path, value) => (isNil(value) ? dflt : value));
}

/**
 * Accepts anything except nil.
 */
export function nonNilRange(): Range {
  return scalarRange('non-nil value', (range, path, value) =>
    isNil(value) ? new RangeViolation(range, path, value) : value
  );
}

/**
 * Accepts values satisfying `pred`; nil becomes `dflt`. The default itself is
 * not checked.
 *
 * @param description - Human-readable description.
 * @param pred - Type guard deciding membership.
 * @param dflt - Value substituted for nil.
 */
export function predicateRange<T>(
  description: string,
  pred: (value: unknown) => value is T,
  dflt: T
): Range<T> {
  return scalarRange(description, (range, path, value) => {
    if (isNil(value)) {
      return dflt;
    }
    return pred(value) ? value : new RangeViolation(range, path, value);
  });
}

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';
const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value);

/** Booleans; nil becomes `dflt`. */
export function booleanRange(dflt: boolean): Range<boolean> {
  return predicateRange('boolean', isBoolean, dflt);
}

/** Strings; nil becomes `dflt`. */
export function stringRange(dflt: string): Range<string> {
  return predicateRange('string', isString, dflt);
}

/** Strings with at least one character; nil becomes `dflt`. */
export function nonemptyStringRange(dflt: string): Range<string> {
  return predicateRange(
    'non-empty string',
    (value): value is string => isString(value) && value.length > 0,
    dflt
  );
}

/** Integers; nil becomes `dflt`. */
export function integerRange(dflt: number): Range<number> {
  return predicateRange('integer', isInteger, dflt);
}

/**
 * Integers in `[min, max]`; nil becomes `dflt`.
 *
 * @example
 * ```typescript
 * const port = integerBetweenRange(1, 65535, 8080);
 * port.complete(['port'], undefined); // => 8080
 * ```
 */
export function integerBetweenRange(min: number, max: number, dflt: number): Range<number> {
  return predicateRange(
    `integer between ${String(min)} and ${String(max)}`,
    (value): value is number => isInteger(value) && value >= min && value <= max,
    dflt
  );
}

/**
 * Nil completes to `undefined` without consulting `range`; anything else is
 * delegated. Folding over nil visits one leaf holding `undefined`.
 */
export function optionalRange<T>(range: Range<T>): Range<T | undefined> {
  return makeRange<T | undefined>(
    `optional ${range.description}`,
    (_self, path, value) => (isNil(value) ? undefined : range.complete(path, value)),
    (self, path, f, init, value) =>
      isNil(value) ? f(self, path, init, undefined) : range.fold(path, f, init, value)
  );
}

/**
 * Substitutes `dflt` for nil before delegating to `range`, so the default has
 * to satisfy `range`.
 */
export function optionalDefaultRange<T>(range: Range<T>, dflt: unknown): Range<T> {
  return makeRange<T>(
    `${range.description}, default ${formatValue(dflt)}`,
    (_self, path, value) => range.complete(path, isNil(value) ? dflt : value),
    (_self, path, f, init, value) => range.fold(path, f, init, isNil(value) ? dflt : value)
  );
}

/**
 * Accepts values for which `equals(candidate, value)` holds for some candidate;
 * the matching candidate is the completed value. Nil becomes `dflt`.
 *
 * @example
 * ```typescript
 * const level = oneOfRangeCustomCompare(
 *   ['debug', 'info'],
 *   'info',
 *   (candidate, value) => typeof value === 'string' && candidate === value.toLowerCase()
 * );
 * level.complete([], 'DEBUG'); // => 'debug'
 * ```
 */
export function oneOfRangeCustomCompare<T>(
  values: readonly T[],
  dflt: T,
  equals: (candidate: T, value: unknown) => boolean
): Range<T> {
  return scalarRange(`one of ${values.map(formatValue).join(', ')}`, (range, path, value) => {
    if (isNil(value)) {
      return dflt;
    }
    for (const candidate of values) {
      if (equals(candidate, value)) {
        return candidate;
      }
    }
    return new RangeViolation(range, path, value);
  });
}

/**
 * Accepts members of `values` (compared with `===`); nil becomes `dflt`.
 */
export function oneOfRange<T>(values: readonly T[], dflt: T): Range<T> {
  return oneOfRangeCustomCompare(values, dflt, (candidate, value) => candidate === value);
}

/**
 * Tries each range in order; the first one to accept wins, even if a later one
 * would fit better. For alternatives of different types, give `T` explicitly:
 * `anyOfRange<number | string>(integerRange(0), stringRange(''))`.
 */
export function anyOfRange<T>(...ranges: readonly Range<T>[]): Range<T> {
  const accepting = (path: Path, value: unknown): Range<T> | undefined =>
    ranges.find((range) => !isRangeViolation(range.complete(path, value)));

  return makeRange<T>(
    `any of (${ranges.map((range) => range.description).join(', ')})`,
    (self, path, value) => {
      for (const range of ranges) {
        const result = range.complete(path, value);
        if (!isRangeViolation(result)) {
          return result;
        }
      }
      return new RangeViolation(self, path, value);
    },
    (self, path, f, init, value) => {
      const range = accepting(path, value);
      if (range === undefined) {
        return reportFatal(
          'fold',
          'FOLD_PRECONDITION',
          `cannot fold over ${formatValue(value)} at ${formatPath(path)}: rejected by '${self.description}'`,
          { path, value }
        );
      }
      return range.fold(path, f, init, value);
    }
  );
}

/**
 * Elements of an array or Set, or `undefined` for anything else.
 */
function sequenceElements(value: unknown): readonly unknown[] | undefined {
  if (Array.isArray(value)) {
    const elements: readonly unknown[] = value;
    return elements;
  }
  if (value instanceof Set) {
    const elements: unknown[] = [];
    for (const element of value.values()) {
      elements.push(element);
    }
    return elements;
  }
  return undefined;
}

/**
 * Completes `elements` against `rangeAt(i)`, stopping at the first violation.
 */
function completeElements<T>(
  path: Path,
  elements: readonly unknown[],
  rangeAt: (index: number) => Range<T> | undefined
): T[] | RangeViolation {
  const completed: T[] = [];
  for (const [index, element] of elements.entries()) {
    const range = rangeAt(index);
    if (range === undefined) {
      break;
    }
    const result = range.complete([...path, index], element);
    if (isRangeViolation(result)) {
      return result;
    }
    completed.push(result);
  }
  return completed;
}

function foldElements<A>(
  path: Path,
  f: LeafFolder<A>,
  init: A,
  elements: readonly unknown[],
  rangeAt: (index: number) => Range | undefined
): A {
  let acc = init;
  for (const [index, element] of elements.entries()) {
    const range = rangeAt(index);
    if (range === undefined) {
      break;
    }
    acc = range.fold([...path, index], f, acc, element);
  }
  return acc;
}

/**
 * Arrays (or Sets) whose elements all satisfy `range`; nil becomes `[]`.
 * Stops at the first rejected element.
 */
export function sequenceOfRange<T>(range: Range<T>): Range<readonly T[]> {
  return makeRange<readonly T[]>(
    `sequence of ${range.description}`,
    (self, path, value) => {
      if (isNil(value)) {
        return [];
      }
      const elements = sequenceElements(value);
      if (elements === undefined) {
        return new RangeViolation(self, path, value);
      }
      return completeElements(path, elements, () => range);
    },
    (self, path, f, init, value) => {
      expectCompleted(self, path, self.complete(path, value));
      return foldElements(path, f, init, sequenceElements(value) ?? [], () => range);
    }
  );
}

/**
 * Like {@link sequenceOfRange}, completed to a Set.
 */
export function setOfRange<T>(range: Range<T>): Range<ReadonlySet<T>> {
  const sequence = sequenceOfRange(range);
  return makeRange<ReadonlySet<T>>(
    `set of ${range.description}`,
    (self, path, value) => {
      const result = sequence.complete(path, value);
      if (isRangeViolation(result)) {
        return result.range === sequence ? new RangeViolation(self, path, value) : result;
      }
      return new Set(result);
    },
    (self, path, f, init, value) => {
      const members = expectCompleted(self, path, self.complete(path, value));
      return foldElements(path, f, init, [...members], () => range);
    }
  );
}

/**
 * Fixed-position sequences: element `i` must satisfy `ranges[i]`. Elements and
 * ranges are paired up to the shorter of the two; nil becomes `[]`.
 */
export function tupleOfRange(...ranges: readonly Range[]): Range<readonly unknown[]> {
  const rangeAt = (index: number): Range | undefined => ranges[index];
  return makeRange<readonly unknown[]>(
    `tuple of (${ranges.map((range) => range.description).join(', ')})`,
    (self, path, value) => {
      if (isNil(value)) {
        return [];
      }
      const elements = sequenceElements(value);
      if (elements === undefined) {
        return new RangeViolation(self, path, value);
      }
      return completeElements(path, elements, rangeAt);
    },
    (self, path, f, init, value) => {
      expectCompleted(self, path, self.complete(path, value));
      return foldElements(path, f, init, sequenceElements(value) ?? [], rangeAt);
    }
  );
}

function mapEntries(value: unknown): readonly [unknown, unknown][] | undefined {
  if (isConfigMap(value)) {
    return Object.entries(value);
  }
  if (value instanceof Map) {
    const entries: [unknown, unknown][] = [];
    for (const [key, entry] of value.entries()) {
      entries.push([key, entry]);
    }
    return entries;
  }
  return undefined;
}

function keySegment(key: unknown): PathSegment {
  return typeof key === 'string' || typeof key === 'number' ? key : formatValue(key);
}

/**
 * Maps (plain objects or Map instances) whose keys satisfy `keyRange` and
 * values satisfy `valueRange`; nil becomes an empty map. Keys and values are
 * checked at the entry's path, key first.
 */
export function mapOfRange<K, V>(keyRange: Range<K>, valueRange: Range<V>): Range<ReadonlyMap<K, V>> {
  return makeRange<ReadonlyMap<K, V>>(
    `map of ${keyRange.description} to ${valueRange.description}`,
    (self, path, value) => {
      if (isNil(value)) {
        return new Map<K, V>();
      }
      const entries = mapEntries(value);
      if (entries === undefined) {
        return new RangeViolation(self, path, value);
      }
      const completed = new Map<K, V>();
      for (const [key, entry] of entries) {
        const entryPath = [...path, keySegment(key)];
        const completedKey = keyRange.complete(entryPath, key);
        if (isRangeViolation(completedKey)) {
          return completedKey;
        }
        const completedValue = valueRange.complete(entryPath, entry);
        if (isRangeViolation(completedValue)) {
          return completedValue;
        }
        completed.set(completedKey, completedValue);
      }
      return completed;
    },
    (self, path, f, init, value) => {
      expectCompleted(self, path, self.complete(path, value));
      let acc = init;
      for (const [key, entry] of mapEntries(value) ?? []) {
        const entryPath = [...path, keySegment(key)];
        acc = keyRange.fold(entryPath, f, acc, key);
        acc = valueRange.fold(entryPath, f, acc, entry);
      }
      return acc;
    }
  );
}

/**
 * Post-processes values completed by `range` with `f`. Violations pass through
 * untouched. The mapped value is folded as a scalar.
 *
 * @example
 * ```typescript
 * const hostname = rangeMap('lower-case host', stringRange('localhost'), (s) => s.toLowerCase());
 * ```
 */
export function rangeMap<T, U>(description: string, range: Range<T>, f: (value: T) => U): Range<U> {
  return scalarRange<U>(description, (_self, path, value) => {
    const result = range.complete(path, value);
    return isRangeViolation(result) ? result : f(result);
  });
}
