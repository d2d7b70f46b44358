/**
 * @clockwork/integrations - External collaborators: the GitHub CLI and
 * the Slack huddle export file.
 */

// GitHub
export { createGhRunner, type GhRunner, type GhRunnerOptions } from './github/gh.js';
export {
  getGhLogin,
  listOrgRepos,
  listMergedPullRequests,
  listPullRequestCommits,
  fetchPullRequestActivity,
  type MergedPullRequest,
  type FetchActivityOptions,
} from './github/api.js';

// Slack huddles
export {
  findLatestExport,
  loadHuddleExport,
  rotateExportBackup,
  type HuddleExport,
  type RotationResult,
} from './slack/huddle-export.js';
