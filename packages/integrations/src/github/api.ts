/**
 * GitHub data access through the `gh` CLI.
 * Lists an organization's repositories, the pull requests merged in a
 * period, and the commits on each of them.
 */

import { z } from 'zod';
import {
  getLogger,
  CollaboratorError,
  type CommitRecord,
  type DateRange,
  type PullRequestActivity,
} from '@clockwork/core';
import type { GhRunner } from './gh.js';

// ─── Wire schemas ─────────────────────────────────────────────────

const repoListSchema = z.array(z.object({ name: z.string().min(1) }));

const pullRequestListSchema = z.array(
  z.object({
    number: z.number().int(),
    title: z.string(),
  })
);

/** One line of the jq projection used by listPullRequestCommits */
const commitLineSchema = z.object({
  sha: z.string(),
  message: z.string().default(''),
  email: z.string(),
  date: z.string(),
});

/** jq filter projecting the commits endpoint to one compact object per line */
const COMMIT_PROJECTION =
  '.[] | {sha: .sha, message: .commit.message, email: .commit.author.email, date: .commit.author.date}';

/** Merged pull request summary */
export interface MergedPullRequest {
  number: number;
  title: string;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

// ─── API Functions ───────────────────────────────────────────────

/** Login of the authenticated `gh` user, for status output only */
export async function getGhLogin(gh: GhRunner): Promise<string | null> {
  const login = await gh(['api', '/user', '--jq', '.login']);
  return login ? login : null;
}

/**
 * List repository names in an organization.
 * Throws CollaboratorError when `gh` fails, since nothing else can run.
 */
export async function listOrgRepos(gh: GhRunner, org: string): Promise<string[]> {
  const raw = await gh(['repo', 'list', org, '--limit', '1000', '--json', 'name']);
  if (raw === null) {
    throw new CollaboratorError(`Could not fetch repositories for ${org}`, 'gh repo list');
  }

  const result = repoListSchema.safeParse(parseJson(raw || '[]'));
  if (!result.success) {
    throw new CollaboratorError(`Unexpected repository list for ${org}`, 'gh repo list');
  }
  return result.data.map((r) => r.name);
}

/**
 * List pull requests merged within the range (inclusive dates).
 * A failing or malformed response is treated as "no pull requests".
 */
export async function listMergedPullRequests(
  gh: GhRunner,
  org: string,
  repo: string,
  range: DateRange
): Promise<MergedPullRequest[]> {
  const raw = await gh([
    'pr', 'list',
    '--repo', `${org}/${repo}`,
    '--state', 'merged',
    '--search', `merged:${range.start}..${range.end}`,
    '--json', 'number,title',
    '--limit', '100',
  ]);
  if (!raw) return [];

  const result = pullRequestListSchema.safeParse(parseJson(raw));
  if (!result.success) {
    getLogger().skippedRecord('github', `malformed pull request list for ${repo}`, raw);
    return [];
  }
  return result.data;
}

/**
 * List the commits on a pull request. Output is parsed line by line and
 * lines that do not decode are skipped.
 */
export async function listPullRequestCommits(
  gh: GhRunner,
  org: string,
  repo: string,
  pullNumber: number
): Promise<CommitRecord[]> {
  const raw = await gh([
    'api', '--paginate',
    `repos/${org}/${repo}/pulls/${pullNumber}/commits`,
    '--jq', COMMIT_PROJECTION,
  ]);
  if (!raw) return [];

  const log = getLogger();
  const commits: CommitRecord[] = [];

  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;
    const result = commitLineSchema.safeParse(parseJson(line));
    if (!result.success) {
      log.skippedRecord('github', 'malformed commit line', line);
      continue;
    }
    commits.push({
      sha: result.data.sha,
      message: result.data.message,
      authorEmail: result.data.email,
      authoredAt: result.data.date,
    });
  }

  return commits;
}

// ─── Collection ──────────────────────────────────────────────────

export interface FetchActivityOptions {
  gh: GhRunner;
  org: string;
  range: DateRange;
  /** Status callback, e.g. "Checking 3 PRs in billing-service..." */
  onProgress?: (message: string) => void;
}

/**
 * Walk every repository of the organization and collect merged pull
 * requests in the range together with their commits.
 */
export async function fetchPullRequestActivity(
  options: FetchActivityOptions
): Promise<PullRequestActivity[]> {
  const { gh, org, range, onProgress } = options;
  const log = getLogger();

  onProgress?.('Fetching repositories...');
  const repos = await listOrgRepos(gh, org);
  onProgress?.(`Found ${repos.length} repositories`);
  log.info('github', 'Listed repositories', { org, count: repos.length });

  const activities: PullRequestActivity[] = [];

  for (const repo of repos) {
    const prs = await listMergedPullRequests(gh, org, repo, range);
    if (prs.length === 0) continue;

    onProgress?.(`Checking ${prs.length} PRs in ${repo}...`);

    for (const pr of prs) {
      const commits = await listPullRequestCommits(gh, org, repo, pr.number);
      if (commits.length === 0) continue;
      activities.push({ repo, number: pr.number, title: pr.title, commits });
    }
  }

  log.info('github', 'Collected pull request activity', {
    org,
    pullRequests: activities.length,
  });
  return activities;
}
