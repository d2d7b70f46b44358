/**
 * Validation of the JSON task list exchanged between the collectors and
 * the formatter.
 */

import { z } from 'zod';
import { InputError, errorMessage, type Task } from '@clockwork/core';

const sessionSchema = z
  .object({
    start: z.number().finite(),
    end: z.number().finite(),
  })
  .refine((s) => s.start <= s.end, { message: 'session ends before it starts' });

const taskSchema = z.object({
  name: z.string().min(1),
  sessions: z.array(sessionSchema),
  sort_timestamp: z.number().finite(),
});

export const taskListSchema = z.array(taskSchema);

/**
 * Parse and validate a JSON task list.
 * Throws InputError on invalid JSON or a wrong shape.
 */
export function parseTaskList(text: string): Task[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new InputError(`Invalid JSON input: ${errorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new InputError('Input must be a JSON array of tasks');
  }

  const result = taskListSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new InputError(`Invalid task list at ${where || '(root)'}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/** Serialise tasks the way the collectors print them */
export function stringifyTaskList(tasks: readonly Task[]): string {
  return JSON.stringify(tasks, null, 2);
}

/** Concatenate task lists from several sources */
export function mergeTaskLists(...lists: ReadonlyArray<readonly Task[]>): Task[] {
  return lists.flatMap((list) => [...list]);
}
