/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { CheckConfig, CultureGridConfig } from './types.js';
import {
  DEFAULT_CONFIG_VERSION,
  DEFAULT_FAIL_ON_MISMATCH,
  DEFAULT_INCLUDE_INVARIANT,
  DEFAULT_NEUTRAL_CULTURE,
  DEFAULT_RESOURCES_DIR,
} from './defaults.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureUniqueStrings(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const id = value.toLowerCase();
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    result.push(value);
  }
  return result;
}

function ensureString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function ensureBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

export function normalizePositiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

export function normalizeCheckConfig(value: unknown): CheckConfig {
  const raw = isRecord(value) ? value : {};
  return {
    failOnMismatch: ensureBoolean(raw.failOnMismatch, DEFAULT_FAIL_ON_MISMATCH),
    includeInvariant: ensureBoolean(raw.includeInvariant, DEFAULT_INCLUDE_INVARIANT),
  };
}

export function normalizeConfig(raw: unknown): CultureGridConfig {
  const input = isRecord(raw) ? raw : {};

  return {
    configVersion: normalizePositiveInteger(input.configVersion, DEFAULT_CONFIG_VERSION),
    resourcesDir: ensureString(input.resourcesDir, DEFAULT_RESOURCES_DIR),
    neutralCulture: ensureString(input.neutralCulture, DEFAULT_NEUTRAL_CULTURE),
    cultures: ensureUniqueStrings(ensureStringArray(input.cultures)),
    readOnlyCultures: ensureUniqueStrings(ensureStringArray(input.readOnlyCultures)),
    check: normalizeCheckConfig(input.check),
  };
}
