import type { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILENAME, loadConfigWithMeta } from '@culturegrid/core';
import { runCheck, printCheckSummary } from '../utils/check-report.js';
import { withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES } from '../utils/exit-codes.js';
import { loadWorkspace } from '../utils/workspace.js';

interface CheckCommandOptions {
  config: string;
  json?: boolean;
  strict?: boolean;
}

export function registerCheck(program: Command): void {
  program
    .command('check')
    .description('Report format parameter mismatches between cultures')
    .option('-c, --config <path>', 'Path to culturegrid config file', DEFAULT_CONFIG_FILENAME)
    .option('--json', 'Print raw JSON results', false)
    .option('--strict', 'Exit with an error code on any mismatch, whatever the config says', false)
    .action(
      withErrorHandling(async (options: CheckCommandOptions) => {
        const { config, projectRoot } = await loadConfigWithMeta(options.config);
        const workspace = await loadWorkspace(config, projectRoot);
        const summary = runCheck(workspace);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printCheckSummary(summary, config.neutralCulture);
        }

        if (summary.totalMismatches > 0 && (options.strict || config.check.failOnMismatch)) {
          if (!options.json) {
            console.error(chalk.red('Check failed: format parameters differ between cultures.'));
          }
          process.exitCode = EXIT_CODES.FORMAT_MISMATCH;
        }
      })
    );
}
