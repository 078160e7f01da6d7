/**
 * Merging raw maps and applying profiles.
 *
 * @packageDocumentation
 */

export { applyProfiles, mergeConfigMaps, mergeSansProfiles, PROFILES_KEY } from './merge.js';
