/**
 * Builds the `clockwork` commander program. Options declared here apply
 * to every subcommand and may appear before or after its name.
 */

import { Command } from 'commander';
import { registerGithubCommand } from './commands/github.js';
import { registerHuddlesCommand } from './commands/huddles.js';
import { registerFormatCommand } from './commands/format.js';
import { registerReportCommand } from './commands/report.js';
import { registerInitCommand } from './commands/init.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('clockwork')
    .version('0.1.0')
    .description('Turn a week of commits and huddles into a reviewable time-entry report')
    .option('--path <dir>', 'Directory containing .clockwork.yml', '.')
    .option('--verbose', 'Print debug logging to stderr')
    // Set before registration so subcommands inherit it
    .exitOverride();

  registerGithubCommand(program);
  registerHuddlesCommand(program);
  registerFormatCommand(program);
  registerReportCommand(program);
  registerInitCommand(program);

  return program;
}
