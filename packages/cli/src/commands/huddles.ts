/**
 * `clockwork huddles` command.
 *
 * Reads the newest Slack huddle export, keeps the huddles the user took
 * part in during the period, and prints them as a JSON task list.
 */

import { Command } from 'commander';
import {
  ConfigError,
  getLogger,
  plural,
  type DateRange,
  type Task,
} from '@clockwork/core';
import {
  findLatestExport,
  loadHuddleExport,
  rotateExportBackup,
} from '@clockwork/integrations';
import {
  buildHuddleTasks,
  resolveDateRange,
  stringifyTaskList,
} from '@clockwork/timesheet';
import { failRun, prepareRun, status, writeOutput, type CommonOptions } from '../runtime.js';

export interface HuddleCollectOptions {
  dir: string;
  pattern: string;
  participantId: string;
  label: string;
  range: DateRange;
}

export interface HuddleCollection {
  tasks: Task[];
  /** The export that was read, or null when none was found */
  exportFile: string | null;
}

/** Locate and load the export, then aggregate the user's huddles */
export async function collectHuddleTasks(options: HuddleCollectOptions): Promise<HuddleCollection> {
  const exportFile = await findLatestExport(options.dir, options.pattern);
  if (!exportFile) {
    status(`No ${options.pattern} file found in ${options.dir}`);
    status('Export your huddles from Slack in the browser and save the file there.');
    return { tasks: [], exportFile: null };
  }

  const { huddles, skipped } = loadHuddleExport(exportFile);
  status(`Loaded huddles from ${exportFile}`);
  if (skipped > 0) {
    status(`Skipped ${plural(skipped, 'invalid record')}`);
  }

  const tasks = buildHuddleTasks(huddles, {
    participantId: options.participantId,
    range: options.range,
    label: options.label,
  });
  status(tasks.length > 0 ? `Found ${plural(tasks.length, 'huddle')}` : 'No huddles found for the specified period.');

  return { tasks, exportFile };
}

/** The Slack member ID is required to pick the user's huddles */
export function requireSlackUserId(userId: string | undefined): string {
  if (!userId) {
    throw new ConfigError(
      'SLACK_USER_ID not set.',
      'Set the environment variable, huddles.user_id in .clockwork.yml, or use --slack-user-id.\n' +
        'Find your member ID in Slack under Profile → More → Copy member ID.'
    );
  }
  return userId;
}

/** Print the run header and collect huddle tasks. Shared with `clockwork report`. */
export async function runHuddleCollection(
  settings: { slackUserId?: string; huddlesPath: string; huddlesPattern: string; huddleLabel: string },
  range: DateRange
): Promise<HuddleCollection> {
  const participantId = requireSlackUserId(settings.slackUserId);
  status(`Generating Slack huddles report for user ${participantId}`);
  status(`Week: ${range.start} to ${range.end}`);

  return collectHuddleTasks({
    dir: settings.huddlesPath,
    pattern: settings.huddlesPattern,
    participantId,
    label: settings.huddleLabel,
    range,
  });
}

/** Move the export aside once its data has been written out */
export function finishExport(exportFile: string | null, keepExport: boolean | undefined): void {
  if (!exportFile || keepExport) return;
  const { backupPath, removed } = rotateExportBackup(exportFile);
  if (backupPath && removed) {
    status(`Moved ${exportFile} to ${backupPath}`);
  }
}

type HuddlesCommandOptions = CommonOptions & {
  slackUserId?: string;
  slackHuddlesPath?: string;
  keepExport?: boolean;
};

export function registerHuddlesCommand(program: Command): void {
  program
    .command('huddles')
    .description('Generate JSON task data from a Slack huddle export')
    .argument('[start]', 'Start date (YYYY-MM-DD)')
    .argument('[end]', 'End date (YYYY-MM-DD)')
    .option('-o, --output <file>', 'Write JSON to a file instead of stdout')
    .option('--slack-user-id <id>', 'Your Slack member ID (default: $SLACK_USER_ID)')
    .option('--slack-huddles-path <dir>', 'Directory with the huddle export (default: ~/Downloads)')
    .option('--keep-export', 'Leave the export file in place instead of moving it to a backup')
    .action(async (start: string | undefined, end: string | undefined, _opts: unknown, command: Command) => {
      const options = command.optsWithGlobals<HuddlesCommandOptions>();
      try {
        const settings = prepareRun('huddles', options, options);
        const range = resolveDateRange({ start, end, today: new Date() });
        const { tasks, exportFile } = await runHuddleCollection(settings, range);

        writeOutput(stringifyTaskList(tasks), options.output, 'JSON data');
        finishExport(exportFile, options.keepExport);
      } catch (error: unknown) {
        await failRun(error);
      } finally {
        await getLogger().close();
      }
    });
}
