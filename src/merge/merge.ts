/**
 * Schema-guided composition of raw configuration maps.
 *
 * Merging happens before validation, so values are not checked against their
 * ranges here. Keys are checked: a key the schema does not declare means the
 * caller passed a map for the wrong schema, and is reported as fatal.
 *
 * @packageDocumentation
 */

import { reportFatal } from '../errors.js';
import type { Path } from '../range/types.js';
import type { Schema } from '../schema/types.js';
import { logger } from '../utils/logger.js';
import { formatPath, formatValue, getKey, hasKey, isConfigMap } from '../utils/values.js';
import type { ConfigMap } from '../utils/values.js';

/**
 * Reserved top-level key holding named profiles.
 */
export const PROFILES_KEY = 'profiles';

const log = logger.child('merge');

function expectMap(who: string, path: Path, value: unknown): ConfigMap {
  if (!isConfigMap(value)) {
    return reportFatal(who, 'NOT_A_MAP', `expected a map at ${formatPath(path)}, got ${formatValue(value)}`, {
      path,
      value,
    });
  }
  return value;
}

function unionKeys(c1: ConfigMap, c2: ConfigMap): string[] {
  const keys = Object.keys(c1);
  for (const key of Object.keys(c2)) {
    if (!hasKey(c1, key)) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Deep merge of two raw maps guided by `schema`; `c2` wins.
 *
 * For a setting, the result holds `c2`'s value whenever `c2` has the key
 * (an explicit `null`/`undefined` included), else `c1`'s. Sections are merged
 * recursively, with `{}` standing in for a side whose section is absent or nil.
 *
 * @param schema - Schema of both maps.
 * @param path - Location of the maps, for error reports.
 * @param c1 - Base map.
 * @param c2 - Overriding map.
 * @throws ConfigurationError with code `UNKNOWN_SCHEMA_KEY` for a key the
 *   schema does not declare, or `NOT_A_MAP` for a non-map input.
 */
export function mergeSansProfiles(schema: Schema, path: Path, c1: unknown, c2: unknown): ConfigMap {
  const left = expectMap('mergeSansProfiles', path, c1);
  const right = expectMap('mergeSansProfiles', path, c2);
  const merged: Record<string, unknown> = {};

  for (const key of unionKeys(left, right)) {
    if (schema.settingsByKey.has(key)) {
      merged[key] = hasKey(right, key) ? getKey(right, key) : getKey(left, key);
      continue;
    }
    const sectionNode = schema.sectionsByKey.get(key);
    if (sectionNode === undefined) {
      return reportFatal(
        'mergeSansProfiles',
        'UNKNOWN_SCHEMA_KEY',
        `'${key}' at ${formatPath(path)} is neither a setting nor a section of '${schema.description}'`,
        { path, key }
      );
    }
    merged[key] = mergeSansProfiles(
      sectionNode.schema,
      [...path, key],
      getKey(left, key) ?? {},
      getKey(right, key) ?? {}
    );
  }

  return merged;
}

function splitProfiles(who: string, map: ConfigMap): { base: ConfigMap; profiles: ConfigMap | undefined } {
  if (!hasKey(map, PROFILES_KEY)) {
    return { base: map, profiles: undefined };
  }
  const base: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(map)) {
    if (key !== PROFILES_KEY) {
      base[key] = value;
    }
  }
  return { base, profiles: expectMap(who, [PROFILES_KEY], getKey(map, PROFILES_KEY)) };
}

function mergeTwo(schema: Schema, c1: unknown, c2: unknown): ConfigMap {
  const left = splitProfiles('mergeConfigMaps', expectMap('mergeConfigMaps', [], c1));
  const right = splitProfiles('mergeConfigMaps', expectMap('mergeConfigMaps', [], c2));
  const merged: Record<string, unknown> = { ...mergeSansProfiles(schema, [], left.base, right.base) };

  if (left.profiles !== undefined || right.profiles !== undefined) {
    merged[PROFILES_KEY] = { ...left.profiles, ...right.profiles };
  }
  return merged;
}

/**
 * Merges raw top-level maps left to right, later maps winning.
 *
 * The `profiles` maps are combined by plain key overwrite: a profile defined in
 * a later map replaces the same-named profile wholesale, and profile contents
 * are not checked against the schema.
 *
 * @example
 * ```typescript
 * mergeConfigMaps(serverSchema, defaults, fromFile, fromCommandLine);
 * ```
 */
export function mergeConfigMaps(
  schema: Schema,
  c1: unknown,
  c2: unknown,
  ...rest: readonly unknown[]
): ConfigMap {
  let merged = mergeTwo(schema, c1, c2);
  for (const next of rest) {
    merged = mergeTwo(schema, merged, next);
  }
  return merged;
}

/**
 * Overlays the named profiles onto the base map.
 *
 * The `profiles` key is removed; each named profile is merged over the result
 * so far, so later names win over earlier names and over the base.
 *
 * @param schema - Schema of the base map and of every profile.
 * @param configMap - Raw top-level map, possibly holding `profiles`.
 * @param profileNames - Profiles to apply, in order.
 * @throws ConfigurationError with code `MISSING_PROFILE` for an unknown name.
 */
export function applyProfiles(schema: Schema, configMap: unknown, profileNames: readonly string[]): ConfigMap {
  const { base, profiles } = splitProfiles('applyProfiles', expectMap('applyProfiles', [], configMap));
  const available = profiles ?? {};

  const selected = profileNames.map((name) => {
    if (!hasKey(available, name)) {
      return reportFatal('applyProfiles', 'MISSING_PROFILE', `profile '${name}' is not defined`, {
        profile: name,
        defined: Object.keys(available),
      });
    }
    return getKey(available, name);
  });

  if (profileNames.length > 0) {
    log.debug('profiles_applied', { profiles: [...profileNames] });
  }
  return selected.reduce<ConfigMap>((acc, profile) => mergeSansProfiles(schema, [], acc, profile), base);
}
