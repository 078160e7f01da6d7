/**
 * Range algebra: validators and folders for configuration values.
 *
 * @packageDocumentation
 */

export { formatRangeViolation, isRangeViolation, RangeViolation } from './types.js';
export type { LeafFolder, Path, PathSegment, Range } from './types.js';
export {
  anyOfRange,
  anyRange,
  booleanRange,
  expectCompleted,
  integerBetweenRange,
  integerRange,
  mapOfRange,
  nonemptyStringRange,
  nonNilRange,
  oneOfRange,
  oneOfRangeCustomCompare,
  optionalDefaultRange,
  optionalRange,
  predicateRange,
  rangeMap,
  scalarRange,
  sequenceOfRange,
  setOfRange,
  stringRange,
  tupleOfRange,
} from './combinators.js';
export type { Completer } from './combinators.js';
