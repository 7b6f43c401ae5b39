import { describe, expect, it } from 'vitest';
import {
  extractFormatParameterIndices,
  getFormatParameterSignature,
  hasFormatParameterMismatches,
} from './format-parameters.js';

describe('format parameters', () => {
  describe('extractFormatParameterIndices', () => {
    it('collects distinct indices in ascending order', () => {
      expect(extractFormatParameterIndices('{1} of {0}, again {1}')).toEqual(['0', '1']);
    });

    it('accepts alignment and format specs', () => {
      expect(extractFormatParameterIndices('{0,10} {1,-5} {2:N2} {3,4:yyyy-MM-dd}')).toEqual(['0', '1', '2', '3']);
    });

    it('ignores named and malformed placeholders', () => {
      expect(extractFormatParameterIndices('{name} {{0}} {-1} {0x}')).toEqual(['0']);
    });

    it('does not let a format spec swallow the next placeholder', () => {
      expect(extractFormatParameterIndices('{0:x}{1}')).toEqual(['0', '1']);
    });

    it('treats leading zeros as the same index', () => {
      expect(extractFormatParameterIndices('{00} {0}')).toEqual(['0']);
    });

    it('orders large indices numerically', () => {
      expect(extractFormatParameterIndices('{10} {2} {123456789012345678901}')).toEqual([
        '2',
        '10',
        '123456789012345678901',
      ]);
    });

    it('returns nothing for empty input', () => {
      expect(extractFormatParameterIndices('')).toEqual([]);
      expect(extractFormatParameterIndices(undefined)).toEqual([]);
    });
  });

  describe('getFormatParameterSignature', () => {
    it('joins the set bits', () => {
      expect(getFormatParameterSignature('Hello {2} and {0}')).toBe('0,2');
      expect(getFormatParameterSignature('Bonjour')).toBe('');
    });
  });

  describe('hasFormatParameterMismatches', () => {
    it('flags a translation that dropped its placeholder', () => {
      expect(hasFormatParameterMismatches(['Hello {0}', 'Bonjour'])).toBe(true);
    });

    it('accepts matching placeholders in a different order', () => {
      expect(hasFormatParameterMismatches(['{0} of {1}', '{1} von {0}'])).toBe(false);
    });

    it('skips empty and missing values', () => {
      expect(hasFormatParameterMismatches(['Hi', '', undefined, null])).toBe(false);
      expect(hasFormatParameterMismatches(['Hello {0}', '', 'Hallo {0}'])).toBe(false);
    });

    it('is false with no values at all', () => {
      expect(hasFormatParameterMismatches([])).toBe(false);
    });
  });
});
