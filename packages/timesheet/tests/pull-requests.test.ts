import { afterEach, describe, it, expect } from 'vitest';
import {
  initLogger,
  resetLogger,
  type CommitRecord,
  type PullRequestActivity,
} from '@clockwork/core';
import { buildPullRequestTasks, parseCommitTimestamp } from '../src/collectors/pull-requests.js';

const RANGE = { start: '2026-10-12', end: '2026-10-18' };
const ME = 'dev@example.com';
/** 2026-10-13T09:00:00Z */
const T = Date.UTC(2026, 9, 13, 9) / 1000;

function commit(authoredAt: string, authorEmail = ME): CommitRecord {
  return { sha: `sha-${authoredAt}`, message: 'work', authorEmail, authoredAt };
}

function pr(overrides: Partial<PullRequestActivity> = {}): PullRequestActivity {
  return {
    repo: 'web-app',
    number: 1,
    title: 'ENG 99 Add retries',
    commits: [],
    ...overrides,
  };
}

afterEach(async () => {
  await resetLogger();
});

describe('parseCommitTimestamp', () => {
  it('parses UTC and offset dates to epoch seconds', () => {
    expect(parseCommitTimestamp('2026-10-13T09:00:00Z')).toBe(T);
    expect(parseCommitTimestamp('2026-10-13T11:00:00+02:00')).toBe(T);
  });

  it('returns null for unparseable dates', () => {
    expect(parseCommitTimestamp('last tuesday')).toBeNull();
  });
});

describe('buildPullRequestTasks', () => {
  it('builds one task with merged commit windows', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:00:00Z'), commit('2026-10-13T09:10:00Z')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks).toEqual([
      {
        name: 'Add retries #eng99',
        sessions: [{ start: T - 1800, end: T + 600 }],
        sort_timestamp: T,
      },
    ]);
  });

  it('ignores commits by other authors', () => {
    const tasks = buildPullRequestTasks(
      [
        pr({ number: 1, commits: [commit('2026-10-13T09:00:00Z', 'someone@example.com')] }),
        pr({ number: 2, title: 'Mine', commits: [commit('2026-10-13T09:00:00Z')] }),
      ],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks.map((t) => t.name)).toEqual(['Mine #web-app']);
  });

  it('compares author emails without regard to case or padding', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:00:00Z', 'Dev@Example.COM')] })],
      { authorEmail: ' dev@example.com ', range: RANGE }
    );
    expect(tasks).toHaveLength(1);
  });

  it('includes both range boundaries and nothing beyond them', () => {
    const tasks = buildPullRequestTasks(
      [
        pr({
          commits: [
            commit('2026-10-11T23:59:59Z'),
            commit('2026-10-12T00:00:00Z'),
            commit('2026-10-18T23:59:59Z'),
            commit('2026-10-19T00:00:00Z'),
          ],
        }),
      ],
      { authorEmail: ME, range: RANGE }
    );
    const first = Date.UTC(2026, 9, 12) / 1000;
    const last = Date.UTC(2026, 9, 18, 23, 59, 59) / 1000;
    expect(tasks).toEqual([
      {
        name: 'Add retries #eng99',
        sessions: [
          { start: first - 1800, end: first },
          { start: last - 1800, end: last },
        ],
        sort_timestamp: first,
      },
    ]);
  });

  it('drops pull requests with no qualifying commits', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-01T10:00:00Z')] }), pr({ number: 2, commits: [] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks).toEqual([]);
  });

  it('skips commits with unparseable dates and logs them', () => {
    const logger = initLogger({});
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('not a date'), commit('2026-10-13T09:00:00Z')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks[0]?.sessions).toEqual([{ start: T - 1800, end: T }]);

    const skipped = logger.allEntries.filter((e) => e.message === 'Skipped malformed record');
    expect(skipped).toHaveLength(1);
    expect(skipped[0]?.data).toEqual({ reason: 'unparseable commit date', rawFirst200: 'not a date' });
  });

  it('groups entries for the same pull request', () => {
    const tasks = buildPullRequestTasks(
      [
        pr({ commits: [commit('2026-10-13T09:10:00Z')] }),
        pr({ repo: 'api', number: 1, title: 'Other repo', commits: [commit('2026-10-14T09:00:00Z')] }),
        pr({ commits: [commit('2026-10-13T09:00:00Z')] }),
      ],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks).toEqual([
      {
        name: 'Add retries #eng99',
        sessions: [{ start: T - 1800, end: T + 600 }],
        sort_timestamp: T,
      },
      {
        name: 'Other repo #api',
        sessions: [{ start: T + 86_400 - 1800, end: T + 86_400 }],
        sort_timestamp: T + 86_400,
      },
    ]);
  });

  it('opens a new session after a gap longer than the window', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:00:00Z'), commit('2026-10-13T10:00:00Z')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks[0]?.sessions).toEqual([
      { start: T - 1800, end: T },
      { start: T + 1800, end: T + 3600 },
    ]);
  });

  it('merges windows that exactly touch', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:00:00Z'), commit('2026-10-13T09:30:00Z')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks[0]?.sessions).toEqual([{ start: T - 1800, end: T + 1800 }]);
  });

  it('honours a custom commit window', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:00:00Z'), commit('2026-10-13T09:20:00Z')] })],
      { authorEmail: ME, range: RANGE, commitWindowMinutes: 15 }
    );
    expect(tasks[0]?.sessions).toEqual([
      { start: T - 900, end: T },
      { start: T + 300, end: T + 1200 },
    ]);
  });

  it('sorts commits that arrive out of order', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T09:10:00Z'), commit('2026-10-13T09:00:00Z')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks[0]?.sort_timestamp).toBe(T);
    expect(tasks[0]?.sessions).toEqual([{ start: T - 1800, end: T + 600 }]);
  });

  it('reads commit dates with a UTC offset', () => {
    const tasks = buildPullRequestTasks(
      [pr({ commits: [commit('2026-10-13T11:00:00+02:00')] })],
      { authorEmail: ME, range: RANGE }
    );
    expect(tasks[0]?.sort_timestamp).toBe(T);
  });
});
