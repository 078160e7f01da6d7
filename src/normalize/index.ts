/**
 * Normalization of raw maps against a schema.
 *
 * @packageDocumentation
 */

export { normalizeAndCheck, schemaRange } from './normalize.js';
