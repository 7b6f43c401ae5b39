/**
 * Positional format parameters such as `{0}`, `{1,-8}` or `{2:yyyy-MM-dd}`.
 *
 * Group 1 is the parameter index; alignment and format spec are accepted but ignored.
 */
const FORMAT_PARAMETER_PATTERN = /\{(\d+)(,-?\d+)?(:[^{}\s]+)?\}/g;

export const FORMAT_PARAMETER_MISMATCH_ERROR = 'Format parameter mismatch';

function normalizeIndex(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

function compareIndices(a: string, b: string): number {
  return a.length - b.length || (a < b ? -1 : a > b ? 1 : 0);
}

/**
 * Distinct parameter indices used by a value, ascending.
 *
 * Indices stay strings so arbitrarily large ones never collide through number precision.
 */
export function extractFormatParameterIndices(value: string | null | undefined): string[] {
  if (!value) {
    return [];
  }

  const indices = new Set<string>();
  const regex = new RegExp(FORMAT_PARAMETER_PATTERN.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = regex.exec(value)) !== null) {
    indices.add(normalizeIndex(match[1]));
  }

  return Array.from(indices).sort(compareIndices);
}

/**
 * The set bits of a value's parameter bit pattern (bit N set iff `{N}` occurs), joined by commas.
 * Two values have equal bit patterns exactly when their signatures are equal.
 */
export function getFormatParameterSignature(value: string | null | undefined): string {
  return extractFormatParameterIndices(value).join(',');
}

/**
 * True when the non-empty values use more than one distinct parameter pattern.
 * Empty or missing values are left out: a missing translation is not a mismatch.
 */
export function hasFormatParameterMismatches(values: Iterable<string | null | undefined>): boolean {
  const signatures = new Set<string>();
  for (const value of values) {
    if (!value) {
      continue;
    }
    signatures.add(getFormatParameterSignature(value));
    if (signatures.size > 1) {
      return true;
    }
  }
  return false;
}
