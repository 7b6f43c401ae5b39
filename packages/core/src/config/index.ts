/**
 * Configuration module for culturegrid
 *
 * Handles loading, parsing, normalizing and validating culturegrid.config.json.
 */

export type { CheckConfig, CultureGridConfig, RawCultureGridConfig, LoadConfigResult } from './types.js';

export {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_CONFIG_VERSION,
  DEFAULT_RESOURCES_DIR,
  DEFAULT_NEUTRAL_CULTURE,
  DEFAULT_FAIL_ON_MISMATCH,
  DEFAULT_INCLUDE_INVARIANT,
} from './defaults.js';

export {
  ensureStringArray,
  ensureUniqueStrings,
  normalizePositiveInteger,
  normalizeCheckConfig,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, assertConfigValid, hasUnsafeConfigValue, type ConfigValidationIssue } from './validator.js';

export { findUp, loadConfig, loadConfigWithMeta } from './loader.js';
