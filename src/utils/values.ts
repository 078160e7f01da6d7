/**
 * Helpers for the untyped data that flows through validation.
 *
 * @packageDocumentation
 */

import { inspect } from 'node:util';

/**
 * A raw or normalized configuration map keyed by schema keys.
 */
export type ConfigMap = Readonly<Record<string, unknown>>;

/**
 * Nil is either `null` or `undefined`.
 */
export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Returns true for plain objects (object literals, parsed JSON/TOML tables,
 * `Object.create(null)`), false for arrays, class instances, Maps and Sets.
 */
export function isConfigMap(value: unknown): value is ConfigMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Own-property lookup that does not consult the prototype chain.
 */
export function hasKey(map: ConfigMap, key: string): boolean {
  return Object.hasOwn(map, key);
}

/**
 * Reads an own property, or `undefined` when absent.
 */
export function getKey(map: ConfigMap, key: string): unknown {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * Rebuilds plain objects and arrays all the way down so the result shares no
 * mutable container with `value`. Other values are returned as they are.
 */
export function deepCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(deepCopy);
  }
  if (isConfigMap(value)) {
    return copyConfigMap(value);
  }
  return value;
}

/**
 * {@link deepCopy} for a map.
 */
export function copyConfigMap(map: ConfigMap): ConfigMap {
  const copy: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(map)) {
    copy[key] = deepCopy(entry);
  }
  return copy;
}

/**
 * Recursively freezes plain objects and arrays. Maps and Sets are left as they
 * are; they are exposed through read-only types.
 */
export function deepFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const element of value) {
      deepFreeze(element);
    }
    Object.freeze(value);
  } else if (isConfigMap(value)) {
    for (const element of Object.values(value)) {
      deepFreeze(element);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Renders a value for error messages.
 */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Renders a path as `a.b[0].c`, or `<root>` for the empty path.
 */
export function formatPath(path: readonly (string | number)[]): string {
  if (path.length === 0) {
    return '<root>';
  }
  let rendered = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      rendered += `[${String(segment)}]`;
    } else {
      rendered += rendered === '' ? segment : `.${segment}`;
    }
  }
  return rendered;
}
