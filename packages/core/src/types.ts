/**
 * Shared type definitions for the Clockwork platform.
 * Activity records coming in from collaborators and the task list
 * handed to the report renderer are defined here.
 */

// ─── Report Types ──────────────────────────────────────────────────

/** A half-open interval [start, end) in epoch seconds */
export interface Session {
  start: number;
  end: number;
}

/**
 * A named unit of work in the time report.
 * `sort_timestamp` keeps its snake_case spelling because tasks are
 * exchanged as JSON between the collectors and the formatter.
 */
export interface Task {
  name: string;
  sessions: Session[];
  sort_timestamp: number;
}

/** Inclusive calendar-date range, both ends as YYYY-MM-DD */
export interface DateRange {
  start: string;
  end: string;
}

/** Inclusive epoch-second bounds of a DateRange */
export interface EpochBounds {
  start: number;
  end: number;
}

// ─── Source-control Types ──────────────────────────────────────────

/** A commit on a pull request, as reported by the GitHub CLI */
export interface CommitRecord {
  sha: string;
  message: string;
  authorEmail: string;
  /** ISO-8601 author date, `Z` or numeric offset */
  authoredAt: string;
}

/** A merged pull request together with its commits */
export interface PullRequestActivity {
  repo: string;
  number: number;
  title: string;
  commits: CommitRecord[];
}

// ─── Huddle Types ──────────────────────────────────────────────────

/** A voice huddle from the Slack export file */
export interface HuddleRecord {
  id: string;
  participant_history: string[];
  /** Epoch seconds; absent on huddles that never started */
  date_start?: number;
  /** Epoch seconds; absent on huddles still in progress */
  date_end?: number;
}

// ─── Configuration Types ───────────────────────────────────────────

/** Parsed contents of .clockwork.yml */
export interface ClockworkConfig {
  github: {
    org?: string;
    email?: string;
    commitWindowMinutes: number;
  };
  huddles: {
    userId?: string;
    path: string;
    pattern: string;
    label: string;
  };
  logging: {
    dir?: string;
  };
}
