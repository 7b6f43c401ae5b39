import type { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILENAME, loadConfigWithMeta } from '@culturegrid/core';
import { toCliError, withErrorHandling } from '../utils/errors.js';
import { printWriteSummary } from '../utils/write-summary.js';
import { findEntry, loadWorkspace } from '../utils/workspace.js';

interface RenameKeyOptions {
  config: string;
  write?: boolean;
}

export function registerRename(program: Command): void {
  program
    .command('rename-key')
    .description('Rename a resource key in every culture of one resource')
    .argument('<resource>', 'Resource name (file name without culture and extension)')
    .argument('<oldKey>', 'Existing resource key')
    .argument('<newKey>', 'Replacement resource key')
    .option('-c, --config <path>', 'Path to culturegrid config file', DEFAULT_CONFIG_FILENAME)
    .option('--write', 'Write changes to disk (defaults to dry-run)', false)
    .action(
      withErrorHandling(async (resource: string, oldKey: string, newKey: string, options: RenameKeyOptions) => {
        const { config, projectRoot } = await loadConfigWithMeta(options.config);
        const workspace = await loadWorkspace(config, projectRoot);
        const entry = findEntry(workspace, resource, oldKey);

        try {
          entry.setKey(newKey);
        } catch (error) {
          throw toCliError(error, 'Rename failed');
        }

        console.log(chalk.green(`Renamed "${oldKey}" to "${newKey}" in ${resource} (${entry.cultures.length} culture(s))`));

        if (!options.write) {
          console.log(chalk.cyan('\nDRY RUN - No files were modified'));
          console.log(chalk.yellow('Run again with --write to apply changes.'));
          return;
        }

        printWriteSummary(await workspace.store.flush());
      })
    );
}
