/**
 * Git helper utilities using simple-git.
 * Only the local identity is read from git; commit data comes from GitHub.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { ConfigError } from './errors.js';

/** Create a git client for the given directory */
export function createGitClient(cwd: string): SimpleGit {
  return simpleGit(cwd);
}

/** Read `user.email` from git config, or null when unset or git is unavailable */
export async function getConfiguredEmail(git: SimpleGit): Promise<string | null> {
  try {
    const result = await git.getConfig('user.email');
    const value = result.value?.trim();
    return value ? value : null;
  } catch {
    return null;
  }
}

/**
 * Resolve the commit author identity: an explicit value wins, otherwise
 * git config is consulted. Throws when neither yields an email.
 */
export async function resolveAuthorEmail(
  explicit: string | undefined,
  git: SimpleGit
): Promise<string> {
  if (explicit) return explicit;

  const fromGit = await getConfiguredEmail(git);
  if (!fromGit) {
    throw new ConfigError(
      'Could not get git user email.',
      'Set it with `git config user.email you@example.com`, $GIT_AUTHOR_EMAIL or --email.'
    );
  }
  return fromGit;
}
