/**
 * Schema model: settings, sections and schemas.
 *
 * @packageDocumentation
 */

export { schema, section, setting } from './schema.js';
export type { Schema, SchemaNodeOptions, Section, Setting } from './types.js';
