/**
 * Voice-huddle task aggregator.
 * Every huddle the participant joined inside the period becomes its own
 * single-session task; huddles are never merged with each other.
 */

import {
  getLogger,
  DEFAULT_HUDDLE_LABEL,
  type DateRange,
  type HuddleRecord,
  type Task,
} from '@clockwork/core';
import { toEpochBounds } from '../range.js';

export interface HuddleTaskOptions {
  participantId: string;
  range: DateRange;
  label?: string;
}

/**
 * Keep the participant's huddles that overlap the range and turn each into
 * a task. The session is trimmed to whole minutes.
 */
export function buildHuddleTasks(
  huddles: readonly HuddleRecord[],
  options: HuddleTaskOptions
): Task[] {
  const log = getLogger();
  const bounds = toEpochBounds(options.range);
  const label = options.label ?? DEFAULT_HUDDLE_LABEL;
  const tasks: Task[] = [];

  for (const huddle of huddles) {
    if (!huddle.participant_history.includes(options.participantId)) continue;

    const { date_start: start, date_end: end } = huddle;
    if (start === undefined || end === undefined) continue;

    if (end < start) {
      log.debug('huddles', 'Skipped huddle ending before it starts', { id: huddle.id });
      continue;
    }

    // Overlap test against the inclusive range bounds
    if (end < bounds.start || start > bounds.end) continue;

    const minutes = Math.floor((end - start) / 60);
    tasks.push({
      name: label,
      sessions: [{ start, end: start + minutes * 60 }],
      sort_timestamp: start,
    });
  }

  log.debug('huddles', 'Filtered huddles', {
    total: huddles.length,
    kept: tasks.length,
  });

  return tasks;
}
