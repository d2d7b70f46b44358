/**
 * `clockwork github` command.
 *
 * Collects the user's commits on merged pull requests across an
 * organization and prints them as a JSON task list.
 */

import { Command } from 'commander';
import ora from 'ora';
import {
  ConfigError,
  createGitClient,
  resolveAuthorEmail,
  getLogger,
  plural,
  type DateRange,
  type Task,
} from '@clockwork/core';
import {
  createGhRunner,
  fetchPullRequestActivity,
  getGhLogin,
  type GhRunner,
} from '@clockwork/integrations';
import {
  buildPullRequestTasks,
  resolveDateRange,
  stringifyTaskList,
} from '@clockwork/timesheet';
import { failRun, prepareRun, status, writeOutput, type CommonOptions } from '../runtime.js';

export interface GithubCollectOptions {
  gh: GhRunner;
  org: string;
  authorEmail: string;
  range: DateRange;
  commitWindowMinutes: number;
  onProgress?: (message: string) => void;
}

/** Fetch pull request activity through `gh` and aggregate it into tasks */
export async function collectGithubTasks(options: GithubCollectOptions): Promise<Task[]> {
  const activities = await fetchPullRequestActivity({
    gh: options.gh,
    org: options.org,
    range: options.range,
    onProgress: options.onProgress,
  });

  return buildPullRequestTasks(activities, {
    authorEmail: options.authorEmail,
    range: options.range,
    commitWindowMinutes: options.commitWindowMinutes,
  });
}

/** The organization is required for any GitHub lookup */
export function requireOrg(org: string | undefined): string {
  if (!org) {
    throw new ConfigError(
      'GitHub organization not set.',
      'Use --org, $GITHUB_ORG or github.org in .clockwork.yml.'
    );
  }
  return org;
}

/**
 * Resolve identity, print the run header and collect tasks behind a
 * spinner. Shared with `clockwork report`.
 */
export async function runGithubCollection(
  settings: { org?: string; email?: string; commitWindowMinutes: number },
  range: DateRange
): Promise<Task[]> {
  const org = requireOrg(settings.org);
  const authorEmail = await resolveAuthorEmail(settings.email, createGitClient(process.cwd()));

  const gh = createGhRunner();
  const login = await getGhLogin(gh);
  status(`Generating time report for ${login ?? 'unknown user'} (${authorEmail}) in ${org}`);
  status(`Week: ${range.start} to ${range.end}`);

  const spinner = ora({ text: 'Searching for merged PRs with your commits...', stream: process.stderr }).start();
  let tasks: Task[];
  try {
    tasks = await collectGithubTasks({
      gh,
      org,
      authorEmail,
      range,
      commitWindowMinutes: settings.commitWindowMinutes,
      onProgress: (message) => {
        spinner.text = message;
        getLogger().info('github', message);
      },
    });
  } catch (error: unknown) {
    spinner.fail('Failed to collect GitHub activity');
    throw error;
  }

  if (tasks.length === 0) {
    spinner.info('No commits found for the specified period.');
  } else {
    spinner.succeed(`Found commits on ${plural(tasks.length, 'PR')}`);
  }
  return tasks;
}

type GithubCommandOptions = CommonOptions & {
  org?: string;
  email?: string;
  commitWindow?: string;
};

export function registerGithubCommand(program: Command): void {
  program
    .command('github')
    .description('Generate JSON task data from commits on merged GitHub pull requests')
    .argument('[start]', 'Start date (YYYY-MM-DD)')
    .argument('[end]', 'End date (YYYY-MM-DD)')
    .option('-o, --output <file>', 'Write JSON to a file instead of stdout')
    .option('--org <org>', 'GitHub organization (default: $GITHUB_ORG)')
    .option('--email <email>', 'Commit author email (default: git config user.email)')
    .option('--commit-window <minutes>', 'Minutes of work assumed before each commit')
    .action(async (start: string | undefined, end: string | undefined, _opts: unknown, command: Command) => {
      const options = command.optsWithGlobals<GithubCommandOptions>();
      try {
        const settings = prepareRun('github', options, options);
        const range = resolveDateRange({ start, end, today: new Date() });
        const tasks = await runGithubCollection(settings, range);
        writeOutput(stringifyTaskList(tasks), options.output, 'JSON data');
      } catch (error: unknown) {
        await failRun(error);
      } finally {
        await getLogger().close();
      }
    });
}
