/**
 * Session merging.
 *
 * Candidates must arrive sorted by start time; the merger never re-sorts.
 * A candidate that starts at or before the end of the running session
 * (overlap or touch) extends it, anything later opens a new session.
 */

import type { Session } from '@clockwork/core';

/**
 * Collapse overlapping or touching candidates into the minimal ordered set
 * of disjoint sessions. The input is not modified.
 */
export function mergeSessions(candidates: readonly Session[]): Session[] {
  const merged: Session[] = [];
  let current: Session | null = null;

  for (const candidate of candidates) {
    if (current && candidate.start <= current.end) {
      current.end = Math.max(current.end, candidate.end);
      continue;
    }
    current = { start: candidate.start, end: candidate.end };
    merged.push(current);
  }

  return merged;
}

/** The window of work assumed to precede a point-in-time event */
export function commitWindow(timestamp: number, offsetSeconds: number): Session {
  return { start: timestamp - offsetSeconds, end: timestamp };
}

/** Whole minutes covered by a session */
export function sessionMinutes(session: Session): number {
  return Math.floor((session.end - session.start) / 60);
}
