/**
 * Schema construction.
 *
 * @packageDocumentation
 */

import { reportFatal } from '../errors.js';
import type { Range } from '../range/types.js';
import type { Schema, SchemaNodeOptions, Section, Setting } from './types.js';

/**
 * Declares a setting.
 *
 * @example
 * ```typescript
 * const port = setting('port', 'Port to listen on', integerBetweenRange(1, 65535, 8080));
 * ```
 */
export function setting<T>(
  key: string,
  description: string,
  range: Range<T>,
  options: SchemaNodeOptions = {}
): Setting<T> {
  const node: Setting<T> = {
    kind: 'setting',
    key,
    description,
    range,
    inherit: options.inherit ?? false,
  };
  return Object.freeze(node);
}

/**
 * Declares a section holding a nested schema.
 */
export function section(key: string, schema: Schema, options: SchemaNodeOptions = {}): Section {
  const node: Section = {
    kind: 'section',
    key,
    schema,
    inherit: options.inherit ?? false,
  };
  return Object.freeze(node);
}

/**
 * Builds a schema from settings and sections.
 *
 * @param description - Human-readable description.
 * @param entries - Settings and sections, in document order.
 * @throws ConfigurationError with code `DUPLICATE_SCHEMA_KEY` when two entries
 *   share a key.
 */
export function schema(description: string, ...entries: readonly (Setting | Section)[]): Schema {
  const settings: Setting[] = [];
  const sections: Section[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.key)) {
      return reportFatal('schema', 'DUPLICATE_SCHEMA_KEY', `duplicate key '${entry.key}' in schema '${description}'`, {
        key: entry.key,
        schema: description,
      });
    }
    seen.add(entry.key);
    if (entry.kind === 'setting') {
      settings.push(entry);
    } else {
      sections.push(entry);
    }
  }

  const built: Schema = {
    description,
    settings: Object.freeze(settings),
    settingsByKey: new Map(settings.map((s): [string, Setting] => [s.key, s])),
    sections: Object.freeze(sections),
    sectionsByKey: new Map(sections.map((s): [string, Section] => [s.key, s])),
  };
  return Object.freeze(built);
}
