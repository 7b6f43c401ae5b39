import { CultureKey } from '../culture-key.js';
import type { CultureGridConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

const SHELL_META_PATTERN = /[;"'`|&<>$]/;
const MAX_PATH_LIKE_LENGTH = 320;

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

export function hasUnsafeConfigValue(value: string): boolean {
  return containsControlCharacters(value) || SHELL_META_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (hasUnsafeConfigValue(value)) {
    issues.push({ field, message: 'contains control characters or shell metacharacters' });
  }
}

function validateCulture(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!CultureKey.isValidTag(value)) {
    issues.push({ field, message: 'must be a culture tag such as "de" or "pt-BR"' });
  }
}

function validateCultureList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((value, index) => {
    validateCulture(`${field}[${index}]`, value, issues);
  });
}

export function validateConfig(config: CultureGridConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePathLike('resourcesDir', config.resourcesDir, issues);
  validateCulture('neutralCulture', config.neutralCulture, issues);
  validateCultureList('cultures', config.cultures, issues);
  validateCultureList('readOnlyCultures', config.readOnlyCultures, issues);

  const neutral = config.neutralCulture.toLowerCase();
  if (config.cultures.some((culture) => culture.toLowerCase() === neutral)) {
    issues.push({ field: 'cultures', message: 'must not repeat the neutral culture' });
  }

  return issues;
}

export function assertConfigValid(config: CultureGridConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new Error(`Invalid culturegrid configuration:\n${details}`);
}
