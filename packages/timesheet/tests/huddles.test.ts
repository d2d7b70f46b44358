import { describe, it, expect } from 'vitest';
import { DEFAULT_HUDDLE_LABEL, type HuddleRecord } from '@clockwork/core';
import { buildHuddleTasks } from '../src/collectors/huddles.js';

const RANGE = { start: '2026-10-12', end: '2026-10-18' };
const ME = 'U_TEST_ME';
const RANGE_START = Date.UTC(2026, 9, 12) / 1000;
const RANGE_END = Date.UTC(2026, 9, 18, 23, 59, 59) / 1000;
/** 2026-10-14T15:00:00Z */
const H = Date.UTC(2026, 9, 14, 15) / 1000;

function huddle(overrides: Partial<HuddleRecord> = {}): HuddleRecord {
  return {
    id: 'h1',
    participant_history: [ME, 'U_TEST_OTHER'],
    date_start: H,
    date_end: H + 1800,
    ...overrides,
  };
}

describe('buildHuddleTasks', () => {
  it('turns a huddle into a single-session task', () => {
    const tasks = buildHuddleTasks([huddle()], { participantId: ME, range: RANGE });
    expect(tasks).toEqual([
      { name: DEFAULT_HUDDLE_LABEL, sessions: [{ start: H, end: H + 1800 }], sort_timestamp: H },
    ]);
  });

  it('skips huddles the participant did not join', () => {
    const tasks = buildHuddleTasks([huddle({ participant_history: ['U_TEST_OTHER'] })], {
      participantId: ME,
      range: RANGE,
    });
    expect(tasks).toEqual([]);
  });

  it('skips huddles without both timestamps', () => {
    const tasks = buildHuddleTasks(
      [huddle({ date_start: undefined }), huddle({ id: 'h2', date_end: undefined })],
      { participantId: ME, range: RANGE }
    );
    expect(tasks).toEqual([]);
  });

  it('skips huddles that end before they start', () => {
    const tasks = buildHuddleTasks([huddle({ date_end: H - 60 })], { participantId: ME, range: RANGE });
    expect(tasks).toEqual([]);
  });

  it('keeps huddles that overlap either edge of the range', () => {
    const tasks = buildHuddleTasks(
      [
        huddle({ id: 'before', date_start: RANGE_START - 600, date_end: RANGE_START + 600 }),
        huddle({ id: 'after', date_start: RANGE_END - 60, date_end: RANGE_END + 3540 }),
        huddle({ id: 'outside', date_start: RANGE_END + 1, date_end: RANGE_END + 600 }),
        huddle({ id: 'earlier', date_start: RANGE_START - 3600, date_end: RANGE_START - 1 }),
      ],
      { participantId: ME, range: RANGE }
    );
    expect(tasks.map((t) => t.sort_timestamp)).toEqual([RANGE_START - 600, RANGE_END - 60]);
  });

  it('trims sessions to whole minutes', () => {
    const tasks = buildHuddleTasks([huddle({ date_end: H + 1799 })], { participantId: ME, range: RANGE });
    expect(tasks[0]?.sessions).toEqual([{ start: H, end: H + 1740 }]);
  });

  it('never merges huddles with each other', () => {
    const tasks = buildHuddleTasks(
      [huddle(), huddle({ id: 'h2', date_start: H + 600, date_end: H + 2400 })],
      { participantId: ME, range: RANGE, label: 'Standup #meetings' }
    );
    expect(tasks).toEqual([
      { name: 'Standup #meetings', sessions: [{ start: H, end: H + 1800 }], sort_timestamp: H },
      { name: 'Standup #meetings', sessions: [{ start: H + 600, end: H + 2400 }], sort_timestamp: H + 600 },
    ]);
  });
});
