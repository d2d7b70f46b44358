/**
 * Source-control task aggregator.
 * Turns merged pull requests and their commits into one task per PR,
 * operating on PullRequestActivity[] that has already been fetched.
 *
 * Each commit is assumed to close a fixed window of work (30 minutes by
 * default). This is a heuristic, not a measurement.
 */

import {
  getLogger,
  DEFAULT_COMMIT_WINDOW_MINUTES,
  type DateRange,
  type PullRequestActivity,
  type Task,
} from '@clockwork/core';
import { toEpochBounds } from '../range.js';
import { commitWindow, mergeSessions } from '../sessions.js';
import { buildTaskLabel } from '../tags.js';

export interface PullRequestTaskOptions {
  /** Only commits by this author count */
  authorEmail: string;
  range: DateRange;
  commitWindowMinutes?: number;
}

interface PullRequestGroup {
  repo: string;
  title: string;
  timestamps: number[];
}

/** Parse a commit author date to epoch seconds, or null when unparseable */
export function parseCommitTimestamp(authoredAt: string): number | null {
  const ms = Date.parse(authoredAt);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

/**
 * Group commits by pull request (`repo#number`) and build a task for every
 * PR with at least one in-range commit by the author.
 *
 * @returns Tasks in first-seen PR order; the renderer does the final sort
 */
export function buildPullRequestTasks(
  activities: readonly PullRequestActivity[],
  options: PullRequestTaskOptions
): Task[] {
  const log = getLogger();
  const bounds = toEpochBounds(options.range);
  const offsetSeconds = (options.commitWindowMinutes ?? DEFAULT_COMMIT_WINDOW_MINUTES) * 60;
  const author = options.authorEmail.trim().toLowerCase();

  const groups = new Map<string, PullRequestGroup>();

  for (const pr of activities) {
    const key = `${pr.repo}#${pr.number}`;
    let group = groups.get(key);
    if (!group) {
      group = { repo: pr.repo, title: pr.title, timestamps: [] };
      groups.set(key, group);
    }

    for (const commit of pr.commits) {
      if (commit.authorEmail.trim().toLowerCase() !== author) continue;

      const ts = parseCommitTimestamp(commit.authoredAt);
      if (ts === null) {
        log.skippedRecord('github', 'unparseable commit date', commit.authoredAt);
        continue;
      }
      if (ts < bounds.start || ts > bounds.end) continue;

      group.timestamps.push(ts);
    }
  }

  const tasks: Task[] = [];

  for (const [key, group] of groups) {
    if (group.timestamps.length === 0) continue;

    const sorted = [...group.timestamps].sort((a, b) => a - b);
    const sessions = mergeSessions(sorted.map((ts) => commitWindow(ts, offsetSeconds)));

    log.debug('github', `Built task for ${key}`, {
      commits: sorted.length,
      sessions: sessions.length,
    });

    tasks.push({
      name: buildTaskLabel(group.title, group.repo),
      sessions,
      sort_timestamp: sorted[0],
    });
  }

  return tasks;
}
