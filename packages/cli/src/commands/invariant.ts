import type { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILENAME, loadConfigWithMeta } from '@culturegrid/core';
import { toCliError, withErrorHandling } from '../utils/errors.js';
import { printWriteSummary } from '../utils/write-summary.js';
import { findEntry, loadWorkspace } from '../utils/workspace.js';

interface InvariantOptions {
  config: string;
  clear?: boolean;
  write?: boolean;
}

export function registerInvariant(program: Command): void {
  program
    .command('invariant')
    .description('Mark a key as invariant (no translation needed) or clear the mark')
    .argument('<resource>', 'Resource name (file name without culture and extension)')
    .argument('<key>', 'Resource key')
    .option('-c, --config <path>', 'Path to culturegrid config file', DEFAULT_CONFIG_FILENAME)
    .option('--clear', 'Remove the invariant mark instead of adding it', false)
    .option('--write', 'Write changes to disk (defaults to dry-run)', false)
    .action(
      withErrorHandling(async (resource: string, key: string, options: InvariantOptions) => {
        const { config, projectRoot } = await loadConfigWithMeta(options.config);
        const workspace = await loadWorkspace(config, projectRoot);
        const entry = findEntry(workspace, resource, key);
        const target = !options.clear;

        if (entry.isInvariant === target) {
          console.log(chalk.gray(`"${key}" is already ${target ? 'invariant' : 'not invariant'}`));
          return;
        }

        try {
          entry.isInvariant = target;
        } catch (error) {
          throw toCliError(error, 'Update failed');
        }

        console.log(chalk.green(`"${key}" comment is now "${entry.comment}"`));

        if (!options.write) {
          console.log(chalk.cyan('\nDRY RUN - No files were modified'));
          console.log(chalk.yellow('Run again with --write to apply changes.'));
          return;
        }

        printWriteSummary(await workspace.store.flush());
      })
    );
}
