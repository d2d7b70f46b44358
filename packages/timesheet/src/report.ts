/**
 * Time-entry report renderer.
 *
 * Produces the YAML-like text a reviewer edits before submission. The
 * report is never parsed back by Clockwork.
 */

import type { Task } from '@clockwork/core';
import { sessionMinutes } from './sessions.js';

export const REPORT_HEADER = [
  '# Time Entry Submission',
  '# Review and confirm the sessions below:',
  '# Save and close this file to submit, or delete all content to cancel',
] as const;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** `DD Mon YYYY, HH:MM` in local time */
export function formatSessionStart(epochSeconds: number): string {
  const d = new Date(epochSeconds * 1000);
  return `${pad2(d.getDate())} ${MONTHS[d.getMonth()]} ${d.getFullYear()}, ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

const NAMED_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

const NEEDS_ESCAPE = /[\\"\u0000-\u001f\u007f]/g;

/**
 * Double-quote a task name using YAML double-quoted escapes, so the name
 * always stays on its own line.
 */
function quoteName(name: string): string {
  const escaped = name.replace(
    NEEDS_ESCAPE,
    (ch) => NAMED_ESCAPES[ch] ?? `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`
  );
  return `"${escaped}"`;
}

/** Sort tasks by earliest activity without touching the caller's array */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => a.sort_timestamp - b.sort_timestamp);
}

/**
 * Render tasks into the report text.
 *
 * @returns The report, or null when there is nothing to report
 */
export function renderReport(tasks: readonly Task[]): string | null {
  if (tasks.length === 0) return null;

  const lines: string[] = [...REPORT_HEADER, '', 'tasks:'];

  for (const task of sortTasks(tasks)) {
    lines.push(`  - taskName: ${quoteName(task.name)}`);
    lines.push('    focus:');
    for (const session of task.sessions) {
      lines.push(`      - ${formatSessionStart(session.start)}, ${sessionMinutes(session)} min`);
    }
  }

  return lines.join('\n');
}
