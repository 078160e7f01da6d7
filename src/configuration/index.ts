/**
 * Validated configurations: construction, access, diff and fold.
 *
 * @packageDocumentation
 */

export {
  access,
  accessSection,
  Configuration,
  diffConfigurations,
  makeConfiguration,
  reduceScalarSettings,
  sectionSubconfig,
} from './configuration.js';
export type { ConfigurationDiff, KeyRef, MakeConfigurationOptions } from './configuration.js';
