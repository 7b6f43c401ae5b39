import chalk from 'chalk';
import { buildEntityReport, type EntityReport } from '@culturegrid/core';
import type { Workspace } from './workspace.js';

export interface CheckSummary {
  reports: EntityReport[];
  totalKeys: number;
  totalMismatches: number;
  warnings: string[];
}

export function runCheck(workspace: Workspace): CheckSummary {
  const reports = workspace.entities.map((entity) =>
    buildEntityReport(entity, { includeInvariant: workspace.config.check.includeInvariant })
  );

  return {
    reports,
    totalKeys: reports.reduce((sum, report) => sum + report.totalKeys, 0),
    totalMismatches: reports.reduce((sum, report) => sum + report.mismatchedKeys, 0),
    warnings: [...workspace.store.warnings],
  };
}

export function formatCheckSummary(summary: CheckSummary, neutralLabel: string): string[] {
  const lines: string[] = [];

  for (const warning of summary.warnings) {
    lines.push(chalk.yellow(`⚠ ${warning}`));
  }

  for (const report of summary.reports) {
    const cultures = report.cultures.map((culture) => (culture === 'neutral' ? neutralLabel : culture)).join(', ');
    if (!report.findings.length) {
      lines.push(chalk.green(`✓ ${report.entity}: ${report.totalKeys} keys (${cultures}), no mismatches`));
      continue;
    }

    lines.push(chalk.yellow(`⚠ ${report.entity}: ${report.totalKeys} keys (${cultures})`));
    for (const finding of report.findings) {
      const label = finding.isInvariant ? ' (invariant)' : '';
      lines.push(chalk.dim(`    - "${finding.key}"${label}: neutral {${finding.neutralSignature}}`));
      for (const culture of finding.cultures) {
        lines.push(chalk.dim(`      ${culture.culture}: ${culture.error} {${culture.signature}}`));
      }
    }
  }

  lines.push('');
  if (summary.totalMismatches === 0) {
    lines.push(chalk.green(`✓ No format parameter mismatches in ${summary.totalKeys} key(s)`));
  } else {
    lines.push(chalk.yellow(`Found ${summary.totalMismatches} key(s) with format parameter mismatches`));
  }

  return lines;
}

export function printCheckSummary(summary: CheckSummary, neutralLabel: string): void {
  for (const line of formatCheckSummary(summary, neutralLabel)) {
    console.log(line);
  }
}
