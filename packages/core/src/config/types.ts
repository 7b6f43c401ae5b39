/**
 * Configuration type definitions for culturegrid
 */

// ─────────────────────────────────────────────────────────────────────────────
// Check Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface CheckConfig {
  /**
   * Fail the `check` command when any entry has a format parameter mismatch.
   * Defaults to true.
   */
  failOnMismatch: boolean;
  /**
   * Also list invariant entries whose cultures disagree.
   * They never count as mismatches. Defaults to false.
   */
  includeInvariant: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Configuration Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface CultureGridConfig {
  /**
   * Configuration schema version. Defaults to 1 when omitted.
   */
  configVersion: number;
  /**
   * Directory holding the resource files, relative to the config file.
   */
  resourcesDir: string;
  /**
   * Culture tag the neutral files are written in. Used as a label in reports.
   */
  neutralCulture: string;
  /**
   * Explicit culture order. Cultures found on disk but not listed are appended
   * alphabetically; an empty list means "alphabetical".
   */
  cultures: string[];
  /**
   * Cultures whose languages refuse changes (renames, edits).
   */
  readOnlyCultures: string[];
  check: CheckConfig;
}

export type RawCultureGridConfig = Partial<Omit<CultureGridConfig, 'check'>> & {
  check?: Partial<CheckConfig>;
};

export interface LoadConfigResult {
  config: CultureGridConfig;
  configPath: string;
  projectRoot: string;
}
