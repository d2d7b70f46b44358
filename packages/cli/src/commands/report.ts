/**
 * `clockwork report` command.
 * Runs both collectors and renders the combined report in one step.
 */

import { Command } from 'commander';
import { getLogger, type Task } from '@clockwork/core';
import { mergeTaskLists, renderReport, resolveDateRange } from '@clockwork/timesheet';
import { failRun, prepareRun, status, writeOutput, type CommonOptions } from '../runtime.js';
import { runGithubCollection } from './github.js';
import { finishExport, runHuddleCollection } from './huddles.js';

type ReportCommandOptions = CommonOptions & {
  org?: string;
  email?: string;
  commitWindow?: string;
  slackUserId?: string;
  slackHuddlesPath?: string;
  keepExport?: boolean;
  skipGithub?: boolean;
  skipHuddles?: boolean;
};

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Collect GitHub and huddle activity and render the time-entry report')
    .argument('[start]', 'Start date (YYYY-MM-DD)')
    .argument('[end]', 'End date (YYYY-MM-DD)')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--org <org>', 'GitHub organization (default: $GITHUB_ORG)')
    .option('--email <email>', 'Commit author email (default: git config user.email)')
    .option('--commit-window <minutes>', 'Minutes of work assumed before each commit')
    .option('--slack-user-id <id>', 'Your Slack member ID (default: $SLACK_USER_ID)')
    .option('--slack-huddles-path <dir>', 'Directory with the huddle export (default: ~/Downloads)')
    .option('--keep-export', 'Leave the huddle export in place instead of moving it to a backup')
    .option('--skip-github', 'Do not collect GitHub activity')
    .option('--skip-huddles', 'Do not collect Slack huddles')
    .action(async (start: string | undefined, end: string | undefined, _opts: unknown, command: Command) => {
      const options = command.optsWithGlobals<ReportCommandOptions>();
      try {
        const settings = prepareRun('report', options, options);
        const range = resolveDateRange({ start, end, today: new Date() });

        let githubTasks: Task[] = [];
        if (!options.skipGithub) {
          githubTasks = await runGithubCollection(settings, range);
        }

        let huddleTasks: Task[] = [];
        let exportFile: string | null = null;
        if (!options.skipHuddles) {
          ({ tasks: huddleTasks, exportFile } = await runHuddleCollection(settings, range));
        }

        const report = renderReport(mergeTaskLists(githubTasks, huddleTasks));
        if (report === null) {
          status('No tasks to report');
        } else {
          writeOutput(report, options.output, 'Report');
        }
        finishExport(exportFile, options.keepExport);
      } catch (error: unknown) {
        await failRun(error);
      } finally {
        await getLogger().close();
      }
    });
}
