/**
 * Plumbing shared by every command: settings, logging, output routing and
 * error exits. Report data goes to stdout or a file; everything else goes
 * to stderr.
 */

import chalk from 'chalk';
import * as path from 'node:path';
import {
  loadConfig,
  resolveSettings,
  initLogger,
  getLogger,
  errorMessage,
  writeFileEnsuringDir,
  ClockworkError,
  type LogEntry,
  type ResolvedSettings,
  type SettingFlags,
} from '@clockwork/core';

/** Program-wide options (`--path`, `--verbose`) plus the per-command `-o` */
export type CommonOptions = {
  path: string;
  verbose?: boolean;
  output?: string;
};

/** Print a status line to stderr */
export function status(message: string): void {
  console.error(chalk.gray(message));
}

/** Echo a log entry to stderr in the CLI's colours */
function printLogEntry(entry: LogEntry): void {
  const line = `[${entry.category}] ${entry.message}`;
  switch (entry.level) {
    case 'error':
      console.error(chalk.red(line));
      break;
    case 'warn':
      console.error(chalk.yellow(`Warning: ${line}`));
      break;
    default:
      console.error(chalk.gray(line));
  }
}

/**
 * Load .clockwork.yml from `--path`, apply env and flag overrides, and
 * install the run's logger.
 */
export function prepareRun(
  runName: string,
  options: CommonOptions,
  flags: SettingFlags = {}
): ResolvedSettings {
  const configDir = path.resolve(options.path);
  const config = loadConfig(configDir);
  const settings = resolveSettings(flags, process.env, config);

  const logger = initLogger({
    logDir: settings.logDir,
    runName,
    level: options.verbose ? 'debug' : 'warn',
    onLog: printLogEntry,
  });
  logger.debug('cli', `Running ${runName}`, { configDir });

  return settings;
}

/** Write command output to the `-o` file, or stdout when none is given */
export function writeOutput(content: string, output: string | undefined, what: string): void {
  if (output) {
    const outputPath = path.resolve(output);
    writeFileEnsuringDir(outputPath, content);
    console.error(chalk.green(`${what} written to ${outputPath}`));
    return;
  }
  process.stdout.write(content + '\n');
}

/**
 * Report an error on stderr and mark the run as failed. The process ends
 * on its own with status 1 once the log file is closed.
 */
export async function failRun(error: unknown): Promise<void> {
  const logger = getLogger();
  logger.debug('cli', 'Run failed', { error: errorMessage(error) });
  await logger.close();
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  if (process.env.CLOCKWORK_DEBUG && error instanceof Error && !(error instanceof ClockworkError)) {
    console.error(chalk.gray(error.stack ?? ''));
  }
  process.exitCode = 1;
}
