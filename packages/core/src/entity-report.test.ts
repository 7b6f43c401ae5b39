import { describe, expect, it } from 'vitest';
import { CultureKey } from './culture-key.js';
import { buildEntityReport } from './entity-report.js';
import { FORMAT_PARAMETER_MISMATCH_ERROR } from './format-parameters.js';
import { InMemoryResourceLanguage } from './resource-language.js';
import { ResourceEntity } from './resource-entity.js';

function createEntity(): ResourceEntity {
  return new ResourceEntity('Strings', [
    new InMemoryResourceLanguage(CultureKey.neutral, {
      greeting: { value: 'Hello {0}' },
      count: { value: '{0} of {1}' },
      code: { value: 'ID-{0}', comment: '@Invariant' },
      plain: { value: 'Plain' },
    }),
    new InMemoryResourceLanguage(CultureKey.parse('de'), {
      greeting: { value: 'Hallo' },
      count: { value: '{0} von {1}' },
      code: { value: 'ID' },
      plain: { value: '' },
    }),
    new InMemoryResourceLanguage(CultureKey.parse('fr'), {
      greeting: { value: 'Bonjour {1}' },
      count: { value: '{1} sur {0}' },
    }),
  ]);
}

describe('buildEntityReport', () => {
  it('lists mismatching entries with the cultures at fault', () => {
    const report = buildEntityReport(createEntity());

    expect(report).toEqual({
      entity: 'Strings',
      cultures: ['neutral', 'de', 'fr'],
      totalKeys: 4,
      invariantKeys: 1,
      mismatchedKeys: 1,
      findings: [
        {
          key: 'greeting',
          neutralValue: 'Hello {0}',
          neutralSignature: '0',
          isInvariant: false,
          hasFormatParameterMismatch: true,
          cultures: [
            { culture: 'de', error: FORMAT_PARAMETER_MISMATCH_ERROR, value: 'Hallo', signature: '' },
            { culture: 'fr', error: FORMAT_PARAMETER_MISMATCH_ERROR, value: 'Bonjour {1}', signature: '1' },
          ],
        },
      ],
    });
  });

  it('includes disagreeing invariant entries on request without counting them', () => {
    const report = buildEntityReport(createEntity(), { includeInvariant: true });

    expect(report.mismatchedKeys).toBe(1);
    expect(report.findings.map((finding) => [finding.key, finding.isInvariant])).toEqual([
      ['greeting', false],
      ['code', true],
    ]);
    expect(report.findings[1].cultures).toEqual([
      { culture: 'de', error: FORMAT_PARAMETER_MISMATCH_ERROR, value: 'ID', signature: '' },
    ]);
  });
});
