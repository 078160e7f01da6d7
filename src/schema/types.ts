/**
 * Schema model types.
 *
 * @packageDocumentation
 */

import type { Range } from '../range/types.js';

/**
 * A leaf of the schema: one named key governed by a range.
 *
 * @typeParam T - Completed value type of the setting's range.
 */
export interface Setting<T = unknown> {
  readonly kind: 'setting';
  /** Key under which the value appears in a configuration map. */
  readonly key: string;
  /** Human-readable description. */
  readonly description: string;
  /** Range governing the setting's value. */
  readonly range: Range<T>;
  /**
   * Whether the value set at this level becomes the default for the
   * same-named setting in nested sections.
   */
  readonly inherit: boolean;
}

/**
 * An inner node of the schema: a nested schema under one key.
 */
export interface Section {
  readonly kind: 'section';
  /** Key under which the nested map appears. */
  readonly key: string;
  /** Schema of the nested map. */
  readonly schema: Schema;
  /**
   * Whether the completed section at this level becomes the default for the
   * same-named section in nested sections.
   */
  readonly inherit: boolean;
}

/**
 * A set of settings and sections. Entries keep declaration order.
 */
export interface Schema {
  readonly description: string;
  readonly settings: readonly Setting[];
  readonly settingsByKey: ReadonlyMap<string, Setting>;
  readonly sections: readonly Section[];
  readonly sectionsByKey: ReadonlyMap<string, Section>;
}

/**
 * Options for {@link Setting} and {@link Section} construction.
 */
export interface SchemaNodeOptions {
  /**
   * Propagate the value to nested sections.
   * @defaultValue false
   */
  readonly inherit?: boolean;
}
