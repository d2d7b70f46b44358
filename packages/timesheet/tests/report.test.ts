import { describe, it, expect } from 'vitest';
import type { Task } from '@clockwork/core';
import { formatSessionStart, renderReport, sortTasks } from '../src/report.js';

/** Local wall-clock time in epoch seconds */
function local(year: number, month: number, day: number, hour: number, minute: number): number {
  return new Date(year, month - 1, day, hour, minute).getTime() / 1000;
}

describe('formatSessionStart', () => {
  it('formats local time as DD Mon YYYY, HH:MM', () => {
    expect(formatSessionStart(local(2026, 1, 5, 23, 59))).toBe('05 Jan 2026, 23:59');
    expect(formatSessionStart(local(2026, 10, 14, 9, 5))).toBe('14 Oct 2026, 09:05');
  });
});

describe('renderReport', () => {
  it('returns null when there are no tasks', () => {
    expect(renderReport([])).toBeNull();
  });

  it('renders the header and every session', () => {
    const start = local(2026, 10, 14, 9, 5);
    const report = renderReport([
      {
        name: 'Add retries #eng99',
        sessions: [
          { start, end: start + 3600 },
          { start: start + 7200, end: start + 7200 + 119 },
        ],
        sort_timestamp: start,
      },
    ]);

    expect(report).toBe(
      [
        '# Time Entry Submission',
        '# Review and confirm the sessions below:',
        '# Save and close this file to submit, or delete all content to cancel',
        '',
        'tasks:',
        '  - taskName: "Add retries #eng99"',
        '    focus:',
        '      - 14 Oct 2026, 09:05, 60 min',
        '      - 14 Oct 2026, 11:05, 1 min',
      ].join('\n')
    );
  });

  it('orders tasks by sort timestamp', () => {
    const early = local(2026, 10, 13, 8, 0);
    const late = local(2026, 10, 15, 14, 30);
    const report = renderReport([
      { name: 'Later', sessions: [{ start: late, end: late + 1800 }], sort_timestamp: late },
      { name: 'Earlier', sessions: [{ start: early, end: early + 900 }], sort_timestamp: early },
    ]);

    const names = (report ?? '').split('\n').filter((line) => line.startsWith('  - taskName:'));
    expect(names).toEqual(['  - taskName: "Earlier"', '  - taskName: "Later"']);
  });

  it('escapes quotes and backslashes in task names', () => {
    const start = local(2026, 10, 14, 9, 0);
    const report = renderReport([
      { name: 'Say "hi" C:\\tmp', sessions: [{ start, end: start + 60 }], sort_timestamp: start },
    ]);
    expect(report?.split('\n')[5]).toBe('  - taskName: "Say \\"hi\\" C:\\\\tmp"');
  });

  it('keeps names with line breaks and control characters on one line', () => {
    const start = local(2026, 10, 14, 9, 0);
    const report = renderReport([
      { name: 'Line one\nLine two\tend\r\u0007', sessions: [{ start, end: start + 60 }], sort_timestamp: start },
    ]);
    const lines = report?.split('\n') ?? [];
    expect(lines).toHaveLength(8);
    expect(lines[5]).toBe('  - taskName: "Line one\\nLine two\\tend\\r\\x07"');
  });

  it('renders a task with no sessions as an empty focus list', () => {
    const report = renderReport([{ name: 'Empty', sessions: [], sort_timestamp: 0 }]);
    expect(report?.split('\n').slice(5)).toEqual(['  - taskName: "Empty"', '    focus:']);
  });
});

describe('sortTasks', () => {
  it('is stable for equal timestamps and leaves the input alone', () => {
    const tasks: Task[] = [
      { name: 'b', sessions: [], sort_timestamp: 10 },
      { name: 'a', sessions: [], sort_timestamp: 10 },
      { name: 'c', sessions: [], sort_timestamp: 5 },
    ];
    expect(sortTasks(tasks).map((t) => t.name)).toEqual(['c', 'b', 'a']);
    expect(tasks.map((t) => t.name)).toEqual(['b', 'a', 'c']);
  });
});
