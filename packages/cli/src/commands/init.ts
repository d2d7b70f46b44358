/**
 * `clockwork init` command.
 * Writes a commented .clockwork.yml with the defaults filled in.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_FILENAME, writeDefaultConfig } from '@clockwork/core';
import { failRun } from '../runtime.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create a default ${CONFIG_FILENAME}`)
    .option('--force', 'Overwrite an existing config file')
    .action(async (_opts: unknown, command: Command) => {
      const options = command.optsWithGlobals<{ path: string; force?: boolean }>();
      try {
        const configDir = path.resolve(options.path);
        const existing = path.join(configDir, CONFIG_FILENAME);

        if (fs.existsSync(existing) && !options.force) {
          console.error(
            chalk.yellow(`${existing} already exists. Use --force to overwrite it.`)
          );
          return;
        }

        fs.mkdirSync(configDir, { recursive: true });
        const written = writeDefaultConfig(configDir);
        console.error(chalk.green(`Created ${chalk.bold(written)}`));
        console.error(chalk.gray('Set github.org and huddles.user_id, or export GITHUB_ORG and SLACK_USER_ID.'));
      } catch (error: unknown) {
        await failRun(error);
      }
    });
}
