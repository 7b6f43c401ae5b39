import { Command } from 'commander';
import { registerCheck } from './commands/check.js';
import { registerInvariant } from './commands/invariant.js';
import { registerRename } from './commands/rename.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('culturegrid')
    .description('Consistency checks and key maintenance for multi-culture resource files')
    .version('0.1.0');

  registerCheck(program);
  registerRename(program);
  registerInvariant(program);

  return program;
}
