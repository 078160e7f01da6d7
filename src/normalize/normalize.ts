/**
 * Validation and completion of raw configuration maps against a schema.
 *
 * Normalization turns a raw nested map into one holding exactly the declared
 * settings and sections, each completed by its range, with defaults and
 * inherited values filled in. The first violation found anywhere is returned
 * unchanged; no partial result is produced.
 *
 * Inheritance flows outer to inner in a single pass: a setting marked
 * `inherit` hands its raw value down, a section marked `inherit` hands down its
 * completed map, and nested levels use these in place of their own defaults.
 *
 * @packageDocumentation
 */

import { applyProfiles } from '../merge/merge.js';
import { expectCompleted } from '../range/combinators.js';
import { isRangeViolation, RangeViolation } from '../range/types.js';
import type { LeafFolder, Path, Range } from '../range/types.js';
import type { Schema } from '../schema/types.js';
import { logger } from '../utils/logger.js';
import { formatPath, getKey, hasKey, isConfigMap, isNil } from '../utils/values.js';
import type { ConfigMap } from '../utils/values.js';

const log = logger.child('normalize');

/**
 * Completes one level of the schema. `inheritedMap` is copied, never mutated.
 *
 * Every present setting is completed before any unknown key is reported, so a
 * rejected setting wins over an unknown key even when the unknown key comes
 * first in `value`.
 */
function completeSchema(
  schema: Schema,
  value: unknown,
  inheritedMap: ConfigMap,
  path: Path
): ConfigMap | RangeViolation {
  const raw = isNil(value) ? {} : value;
  if (!isConfigMap(raw)) {
    return new RangeViolation(null, path, value);
  }

  const inherited: Record<string, unknown> = { ...inheritedMap };
  const completed = new Map<string, unknown>();
  const keys = Object.keys(raw);

  for (const key of keys) {
    const node = schema.settingsByKey.get(key);
    if (node === undefined) {
      continue;
    }
    const rawValue = getKey(raw, key);
    const result = node.range.complete([...path, key], rawValue);
    if (isRangeViolation(result)) {
      return result;
    }
    completed.set(key, result);
    if (node.inherit) {
      inherited[key] = rawValue;
    }
  }

  for (const key of keys) {
    if (!schema.settingsByKey.has(key) && !schema.sectionsByKey.has(key)) {
      return new RangeViolation(null, [...path, key], getKey(raw, key));
    }
  }

  for (const node of schema.settings) {
    if (completed.has(node.key)) {
      continue;
    }
    if (hasKey(inherited, node.key)) {
      completed.set(node.key, getKey(inherited, node.key));
      continue;
    }
    const result = node.range.complete([...path, node.key], undefined);
    if (isRangeViolation(result)) {
      return result;
    }
    completed.set(node.key, result);
  }

  for (const key of keys) {
    const node = schema.sectionsByKey.get(key);
    if (node === undefined) {
      continue;
    }
    const result = completeSchema(node.schema, getKey(raw, key), inherited, [...path, key]);
    if (isRangeViolation(result)) {
      return result;
    }
    completed.set(key, result);
    if (node.inherit) {
      inherited[key] = result;
    }
  }

  for (const node of schema.sections) {
    if (completed.has(node.key)) {
      continue;
    }
    if (hasKey(inherited, node.key)) {
      completed.set(node.key, getKey(inherited, node.key));
      continue;
    }
    const result = completeSchema(node.schema, {}, inherited, [...path, node.key]);
    if (isRangeViolation(result)) {
      return result;
    }
    completed.set(node.key, result);
  }

  // Declaration order: settings, then sections.
  const ordered: Record<string, unknown> = {};
  for (const node of [...schema.settings, ...schema.sections]) {
    ordered[node.key] = completed.get(node.key);
  }
  return ordered;
}

/**
 * Applies profiles to `configMap`, then validates and completes it.
 *
 * A `null` or `undefined` map, top-level or for a section, is treated as empty.
 *
 * @param schema - Schema to check against.
 * @param profileNames - Profiles to apply before validation, in order.
 * @param configMap - Raw top-level map, possibly holding `profiles`.
 * @param inheritedMap - Values inherited from an enclosing level.
 * @param path - Location of `configMap`.
 * @returns The normalized map, or the first violation.
 * @throws ConfigurationError with code `MISSING_PROFILE` when a requested
 *   profile is not defined.
 *
 * @example
 * ```typescript
 * const result = normalizeAndCheck(demoSchema, [], { port: 9090 });
 * if (isRangeViolation(result)) {
 *   console.error(formatRangeViolation(result));
 * }
 * ```
 */
export function normalizeAndCheck(
  schema: Schema,
  profileNames: readonly string[],
  configMap: unknown,
  inheritedMap: ConfigMap = {},
  path: Path = []
): ConfigMap | RangeViolation {
  const raw = isNil(configMap) ? {} : configMap;
  if (!isConfigMap(raw)) {
    return new RangeViolation(null, path, configMap);
  }

  const result = completeSchema(schema, applyProfiles(schema, raw, profileNames), inheritedMap, path);
  if (isRangeViolation(result)) {
    log.debug('range_violation', {
      schema: schema.description,
      path: formatPath(result.path),
      range: result.range?.description ?? null,
    });
  }
  return result;
}

/**
 * Where a level finds the raw value of an inherited key, and the inherited
 * values that were in scope when that value was completed.
 */
interface InheritedSource {
  readonly value: unknown;
  readonly context: InheritedSources;
}

type InheritedSources = ReadonlyMap<string, InheritedSource>;

/**
 * Folds one level of an already validated map over raw values, resolving
 * defaults and inherited keys the way {@link completeSchema} does.
 */
function foldSchema<A>(
  schema: Schema,
  path: Path,
  f: LeafFolder<A>,
  init: A,
  value: unknown,
  inheritedSources: InheritedSources
): A {
  const raw = isConfigMap(value) ? value : {};
  const keys = Object.keys(raw);
  const inherited = new Map(inheritedSources);

  for (const key of keys) {
    if (schema.settingsByKey.get(key)?.inherit === true) {
      inherited.set(key, { value: getKey(raw, key), context: inheritedSources });
    }
  }

  const present = new Map<string, InheritedSource>();
  for (const key of keys) {
    const node = schema.sectionsByKey.get(key);
    if (node === undefined) {
      continue;
    }
    const source = { value: getKey(raw, key), context: new Map(inherited) };
    present.set(key, source);
    if (node.inherit) {
      inherited.set(key, source);
    }
  }

  let acc = init;
  for (const node of schema.settings) {
    const nodeValue = hasKey(raw, node.key) ? getKey(raw, node.key) : inherited.get(node.key)?.value;
    acc = node.range.fold([...path, node.key], f, acc, nodeValue);
  }
  for (const node of schema.sections) {
    const source = present.get(node.key) ?? inherited.get(node.key);
    acc =
      source === undefined
        ? foldSchema(node.schema, [...path, node.key], f, acc, {}, inherited)
        : foldSchema(node.schema, [...path, node.key], f, acc, source.value, source.context);
  }
  return acc;
}

/**
 * The range of maps conforming to `schema`.
 *
 * `complete` is normalization without profiles. `fold` checks that the map
 * completes, then visits, at every level, each setting's leaves in
 * declaration order, then each section. Settings are folded over their raw
 * values, so ranges whose completion changes the value's type fold too.
 */
export function schemaRange(schema: Schema): Range<ConfigMap> {
  const range: Range<ConfigMap> = {
    description: schema.description,
    complete(path: Path, value: unknown): ConfigMap | RangeViolation {
      return completeSchema(schema, value, {}, path);
    },
    fold<A>(path: Path, f: LeafFolder<A>, init: A, value: unknown): A {
      expectCompleted(range, path, range.complete(path, value));
      return foldSchema(schema, path, f, init, value, new Map<string, InheritedSource>());
    },
  };
  return range;
}
