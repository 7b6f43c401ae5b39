/**
 * Default configuration values for culturegrid
 */

export const DEFAULT_CONFIG_FILENAME = 'culturegrid.config.json';
export const DEFAULT_CONFIG_VERSION = 1;
export const DEFAULT_RESOURCES_DIR = 'resources';
export const DEFAULT_NEUTRAL_CULTURE = 'en';
export const DEFAULT_FAIL_ON_MISMATCH = true;
export const DEFAULT_INCLUDE_INVARIANT = false;
