import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import {
  CultureKey,
  InMemoryResourceLanguage,
  normalizeConfig,
  ResourceEntity,
  type ResourceNode,
} from '@culturegrid/core';
import { formatCheckSummary, runCheck } from './check-report.js';
import { ResourceFileStore } from './resource-files.js';
import type { Workspace } from './workspace.js';

function language(culture: string, nodes: Record<string, ResourceNode>): InMemoryResourceLanguage {
  return new InMemoryResourceLanguage(CultureKey.parse(culture), nodes);
}

function workspaceOf(entities: ResourceEntity[], includeInvariant = false): Workspace {
  const config = normalizeConfig({ check: { includeInvariant } });
  return {
    config,
    resourcesDir: 'resources',
    store: new ResourceFileStore('resources'),
    entities,
  };
}

describe('check report', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const createEntities = () => [
    new ResourceEntity('Errors', [language('', { failed: { value: 'Failed' } }), language('de', { failed: { value: 'Fehler' } })]),
    new ResourceEntity('Strings', [
      language('', {
        greeting: { value: 'Hello {0}' },
        code: { value: 'ID {0}', comment: '@Invariant' },
      }),
      language('de', {
        greeting: { value: 'Hallo' },
        code: { value: 'ID' },
      }),
    ]),
  ];

  it('counts keys and mismatches across entities', () => {
    const summary = runCheck(workspaceOf(createEntities()));

    expect(summary.totalKeys).toBe(3);
    expect(summary.totalMismatches).toBe(1);
    expect(summary.reports.map((report) => report.findings.map((finding) => finding.key))).toEqual([[], ['greeting']]);
  });

  it('formats findings per culture', () => {
    const lines = formatCheckSummary(runCheck(workspaceOf(createEntities())), 'en');

    expect(lines).toEqual([
      '✓ Errors: 1 keys (en, de), no mismatches',
      '⚠ Strings: 2 keys (en, de)',
      '    - "greeting": neutral {0}',
      '      de: Format parameter mismatch {}',
      '',
      'Found 1 key(s) with format parameter mismatches',
    ]);
  });

  it('lists invariant disagreements only when asked to', () => {
    const lines = formatCheckSummary(runCheck(workspaceOf(createEntities(), true)), 'en');

    expect(lines).toContain('    - "code" (invariant): neutral {0}');
    expect(lines[lines.length - 1]).toBe('Found 1 key(s) with format parameter mismatches');
  });

  it('reports a clean run', () => {
    const entity = new ResourceEntity('Strings', [
      language('', { greeting: { value: 'Hello {0}' } }),
      language('de', { greeting: { value: 'Hallo {0}' } }),
    ]);
    const lines = formatCheckSummary(runCheck(workspaceOf([entity])), 'en');

    expect(lines).toEqual(['✓ Strings: 1 keys (en, de), no mismatches', '', '✓ No format parameter mismatches in 1 key(s)']);
  });
});
