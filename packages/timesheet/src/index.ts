/**
 * @clockwork/timesheet - Period resolution, session merging, task
 * aggregation and report rendering.
 */

export {
  resolveDateRange,
  toEpochBounds,
  parseIsoDate,
  formatLocalDate,
} from './range.js';

export { mergeSessions, commitWindow, sessionMinutes } from './sessions.js';

export { extractTicketTag, stripTicketTag, buildTaskLabel } from './tags.js';

export {
  buildPullRequestTasks,
  parseCommitTimestamp,
  type PullRequestTaskOptions,
} from './collectors/pull-requests.js';

export { buildHuddleTasks, type HuddleTaskOptions } from './collectors/huddles.js';

export {
  renderReport,
  formatSessionStart,
  sortTasks,
  REPORT_HEADER,
} from './report.js';

export {
  parseTaskList,
  stringifyTaskList,
  mergeTaskLists,
  taskListSchema,
} from './task-list.js';
