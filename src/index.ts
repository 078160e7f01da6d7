/**
 * schemaconf
 *
 * Schema-driven validation, composition and diffing of nested configuration
 * data.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export {
  anyOfRange,
  anyRange,
  booleanRange,
  expectCompleted,
  formatRangeViolation,
  integerBetweenRange,
  integerRange,
  isRangeViolation,
  mapOfRange,
  nonemptyStringRange,
  nonNilRange,
  oneOfRange,
  oneOfRangeCustomCompare,
  optionalDefaultRange,
  optionalRange,
  predicateRange,
  rangeMap,
  RangeViolation,
  scalarRange,
  sequenceOfRange,
  setOfRange,
  stringRange,
  tupleOfRange,
  type Completer,
  type LeafFolder,
  type Path,
  type PathSegment,
  type Range,
} from './range/index.js';

export {
  schema,
  section,
  setting,
  type Schema,
  type SchemaNodeOptions,
  type Section,
  type Setting,
} from './schema/index.js';

export { applyProfiles, mergeConfigMaps, mergeSansProfiles, PROFILES_KEY } from './merge/index.js';

export { normalizeAndCheck, schemaRange } from './normalize/index.js';

export {
  access,
  accessSection,
  Configuration,
  diffConfigurations,
  makeConfiguration,
  reduceScalarSettings,
  sectionSubconfig,
  type ConfigurationDiff,
  type KeyRef,
  type MakeConfigurationOptions,
} from './configuration/index.js';

export { ConfigurationError, reportFatal, type ConfigurationErrorCode } from './errors.js';

export { Logger, logger, type LogEntry, type LogLevel, type LoggerOptions, type LogSink } from './utils/logger.js';

export type { ConfigMap } from './utils/values.js';
