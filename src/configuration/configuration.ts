/**
 * Validated configurations.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'node:util';
import { reportFatal } from '../errors.js';
import { normalizeAndCheck, schemaRange } from '../normalize/normalize.js';
import { formatRangeViolation, isRangeViolation } from '../range/types.js';
import type { LeafFolder, Path } from '../range/types.js';
import type { Schema, Section, Setting } from '../schema/types.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { copyConfigMap, deepFreeze, formatPath, getKey, hasKey, isConfigMap } from '../utils/values.js';
import type { ConfigMap } from '../utils/values.js';

/**
 * An immutable, fully normalized configuration together with its schema.
 * Obtained from {@link makeConfiguration} or {@link sectionSubconfig}.
 */
export class Configuration {
  /** The normalized map. A deep-frozen copy; the caller's containers are never frozen. */
  public readonly map: ConfigMap;
  /** The schema `map` conforms to. */
  public readonly schema: Schema;

  private constructor(map: ConfigMap, schema: Schema) {
    this.map = deepFreeze(copyConfigMap(map));
    this.schema = schema;
    Object.freeze(this);
  }

  /** @internal */
  static fromNormalized(map: ConfigMap, schema: Schema): Configuration {
    return new Configuration(map, schema);
  }
}

/**
 * Options for {@link makeConfiguration}.
 */
export interface MakeConfigurationOptions {
  /**
   * Logger receiving `configuration_created` (debug) and
   * `configuration_rejected` (warn) events.
   * @defaultValue the package logger
   */
  readonly logger?: Logger;
}

/**
 * Validates `configMap` against `schema` after applying `profileNames`.
 *
 * @param schema - Schema to check against.
 * @param profileNames - Profiles to apply, in order.
 * @param configMap - Raw top-level map.
 * @param options - Logging options.
 * @returns The validated configuration.
 * @throws ConfigurationError with code `RANGE_VIOLATION` when validation fails;
 *   the message names the rejecting range, the path and the offending value.
 *
 * @example
 * ```typescript
 * const config = makeConfiguration(demoSchema, ['production'], rawMap);
 * access(config, 'host', 'db');
 * ```
 */
export function makeConfiguration(
  schema: Schema,
  profileNames: readonly string[],
  configMap: unknown,
  options: MakeConfigurationOptions = {}
): Configuration {
  const log = (options.logger ?? defaultLogger).child('configuration');
  const result = normalizeAndCheck(schema, profileNames, configMap);

  if (isRangeViolation(result)) {
    const message = formatRangeViolation(result);
    log.warn('configuration_rejected', { schema: schema.description, message });
    return reportFatal('makeConfiguration', 'RANGE_VIOLATION', message, {
      path: result.path,
      value: result.value,
      range: result.range?.description ?? null,
    });
  }

  log.debug('configuration_created', {
    schema: schema.description,
    profiles: [...profileNames],
  });
  return Configuration.fromNormalized(result, schema);
}

/**
 * A section or setting, given as the schema node or by key.
 */
export type KeyRef = string | Setting | Section;

function keyOf(ref: KeyRef): string {
  return typeof ref === 'string' ? ref : ref.key;
}

function walkSections(
  who: string,
  config: Configuration,
  sections: readonly KeyRef[]
): { map: ConfigMap; schema: Schema; path: string[] } {
  let map = config.map;
  let schema = config.schema;
  const path: string[] = [];

  for (const ref of sections) {
    const key = keyOf(ref);
    path.push(key);
    const node = schema.sectionsByKey.get(key);
    const value = getKey(map, key);
    if (node === undefined || !isConfigMap(value)) {
      return reportFatal(who, 'UNKNOWN_ACCESS_PATH', `no section at ${formatPath(path)}`, { path });
    }
    map = value;
    schema = node.schema;
  }
  return { map, schema, path };
}

/**
 * Reads the map of a nested section.
 *
 * @param config - The configuration.
 * @param sections - Section path, outermost first.
 * @throws ConfigurationError with code `UNKNOWN_ACCESS_PATH`.
 */
export function accessSection(config: Configuration, ...sections: readonly KeyRef[]): ConfigMap {
  return walkSections('accessSection', config, sections).map;
}

/**
 * Reads a setting, optionally inside nested sections.
 *
 * @example
 * ```typescript
 * access(config, 'port');        // top-level setting
 * access(config, 'host', 'db');  // setting `host` of section `db`
 * ```
 *
 * @throws ConfigurationError with code `UNKNOWN_ACCESS_PATH`.
 */
export function access(config: Configuration, settingRef: KeyRef, ...sections: readonly KeyRef[]): unknown {
  const { map, schema, path } = walkSections('access', config, sections);
  const key = keyOf(settingRef);
  if (!schema.settingsByKey.has(key) || !hasKey(map, key)) {
    return reportFatal('access', 'UNKNOWN_ACCESS_PATH', `no setting at ${formatPath([...path, key])}`, {
      path: [...path, key],
    });
  }
  return getKey(map, key);
}

/**
 * The configuration of a nested section, checked against that section's schema.
 *
 * @throws ConfigurationError with code `UNKNOWN_ACCESS_PATH`.
 */
export function sectionSubconfig(config: Configuration, ...sections: readonly KeyRef[]): Configuration {
  const { map, schema } = walkSections('sectionSubconfig', config, sections);
  return Configuration.fromNormalized(map, schema);
}

/**
 * One setting whose value differs between two configurations.
 */
export interface ConfigurationDiff {
  /** Section keys followed by the setting key. */
  readonly path: Path;
  /** Value in the first configuration. */
  readonly left: unknown;
  /** Value in the second configuration. */
  readonly right: unknown;
}

function* diffMaps(
  schema: Schema,
  path: Path,
  left: ConfigMap,
  right: ConfigMap
): Generator<ConfigurationDiff, void, undefined> {
  for (const node of schema.settings) {
    const a = getKey(left, node.key);
    const b = getKey(right, node.key);
    if (!isDeepStrictEqual(a, b)) {
      yield { path: [...path, node.key], left: a, right: b };
    }
  }
  for (const node of schema.sections) {
    const a = getKey(left, node.key);
    const b = getKey(right, node.key);
    yield* diffMaps(node.schema, [...path, node.key], isConfigMap(a) ? a : {}, isConfigMap(b) ? b : {});
  }
}

/**
 * Lazily lists the settings whose values differ, walking `schema` settings
 * first, then sections. Sections never produce entries of their own.
 *
 * @example
 * ```typescript
 * [...diffConfigurations(demoSchema, before, after)];
 * // => [{ path: ['port'], left: 8080, right: 9090 }]
 * ```
 */
export function diffConfigurations(
  schema: Schema,
  configA: Configuration,
  configB: Configuration
): Generator<ConfigurationDiff, void, undefined> {
  return diffMaps(schema, [], configA.map, configB.map);
}

/**
 * Folds `f` over every scalar leaf of `configMap` in document order (at each
 * level, settings before sections).
 *
 * @param schema - Schema of the map.
 * @param f - Called with the leaf's range, path, accumulator and value.
 * @param init - Initial accumulator.
 * @param configMap - Raw or normalized map. Must validate.
 * @throws ConfigurationError with code `FOLD_PRECONDITION` if `configMap`
 *   does not validate.
 */
export function reduceScalarSettings<A>(schema: Schema, f: LeafFolder<A>, init: A, configMap: unknown): A {
  return schemaRange(schema).fold([], f, init, configMap);
}
