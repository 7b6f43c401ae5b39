import { getFormatParameterSignature } from './format-parameters.js';
import type { ResourceEntity } from './resource-entity.js';

export interface CultureFinding {
  culture: string;
  error: string;
  value: string;
  signature: string;
}

export interface EntryFinding {
  key: string;
  neutralValue: string;
  neutralSignature: string;
  isInvariant: boolean;
  hasFormatParameterMismatch: boolean;
  cultures: CultureFinding[];
}

export interface EntityReport {
  entity: string;
  cultures: string[];
  totalKeys: number;
  invariantKeys: number;
  mismatchedKeys: number;
  findings: EntryFinding[];
}

export interface EntityReportOptions {
  /** List invariant entries whose cultures disagree, even though they never count as mismatches. */
  includeInvariant?: boolean;
}

/**
 * Summarize format parameter findings for every entry of an entity.
 */
export function buildEntityReport(entity: ResourceEntity, options: EntityReportOptions = {}): EntityReport {
  const findings: EntryFinding[] = [];
  let invariantKeys = 0;
  let mismatchedKeys = 0;

  for (const entry of entity.entries) {
    const isInvariant = entry.isInvariant;
    if (isInvariant) {
      invariantKeys += 1;
    }

    const hasMismatch = entry.hasFormatParameterMismatch;
    if (hasMismatch) {
      mismatchedKeys += 1;
    }

    const disagrees = hasMismatch || (isInvariant && entry.hasFormatParameterMismatchIn(entry.cultures));
    if (!disagrees || (isInvariant && !options.includeInvariant)) {
      continue;
    }

    const neutralValue = entry.values.get(entry.neutralCulture) ?? '';
    const cultures: CultureFinding[] = [];
    for (const [culture, error] of entry.errors) {
      if (!error) {
        continue;
      }
      const value = entry.values.get(culture) ?? '';
      cultures.push({
        culture: culture.toString(),
        error,
        value,
        signature: getFormatParameterSignature(value),
      });
    }

    findings.push({
      key: entry.key,
      neutralValue,
      neutralSignature: getFormatParameterSignature(neutralValue),
      isInvariant,
      hasFormatParameterMismatch: hasMismatch,
      cultures,
    });
  }

  return {
    entity: entity.name,
    cultures: entity.cultures.map((culture) => culture.toString()),
    totalKeys: entity.entries.length,
    invariantKeys,
    mismatchedKeys,
    findings,
  };
}
