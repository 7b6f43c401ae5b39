import path from 'path';
import chalk from 'chalk';
import type { ResourceFileStats } from './resource-files.js';

export function printWriteSummary(stats: ResourceFileStats[]): void {
  if (!stats.length) {
    console.log(chalk.gray('No resource files changed.'));
    return;
  }

  for (const file of stats) {
    const relative = path.relative(process.cwd(), file.path) || file.path;
    const parts = [
      file.added.length ? `+${file.added.length}` : '',
      file.updated.length ? `~${file.updated.length}` : '',
      file.removed.length ? `-${file.removed.length}` : '',
    ].filter(Boolean);
    console.log(chalk.green(`Wrote ${relative} (${file.totalKeys} keys${parts.length ? `, ${parts.join(' ')}` : ''})`));
  }
}
