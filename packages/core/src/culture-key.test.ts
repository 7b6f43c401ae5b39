import { describe, expect, it } from 'vitest';
import { CultureKey } from './culture-key.js';

describe('CultureKey', () => {
  it('parses empty input as the neutral culture', () => {
    expect(CultureKey.parse('')).toBe(CultureKey.neutral);
    expect(CultureKey.parse(undefined).isNeutral).toBe(true);
    expect(CultureKey.neutral.toString()).toBe('neutral');
  });

  it('compares by tag, ignoring case', () => {
    expect(CultureKey.parse('pt-BR').equals(CultureKey.parse('pt-br'))).toBe(true);
    expect(CultureKey.parse('de').equals(CultureKey.parse('fr'))).toBe(false);
    expect(CultureKey.parse('de').equals(CultureKey.neutral)).toBe(false);
  });

  it('rejects malformed tags', () => {
    expect(() => CultureKey.parse('de DE')).toThrow('Invalid culture tag: "de DE"');
    expect(CultureKey.isValidTag('backup')).toBe(false);
    expect(CultureKey.isValidTag('zh-Hant-TW')).toBe(true);
  });
});
