/**
 * `clockwork format` command.
 *
 * Turns a JSON task list (from a file or stdin) into the editable
 * time-entry report.
 */

import { Command } from 'commander';
import * as fs from 'node:fs';
import { getLogger, errorMessage, InputError, type Task } from '@clockwork/core';
import { parseTaskList, renderReport } from '@clockwork/timesheet';
import { failRun, prepareRun, status, writeOutput, type CommonOptions } from '../runtime.js';

const USAGE_HINT =
  'Usage: clockwork format < tasks.json\n' +
  '   or: clockwork github | clockwork format';

/** Read all of stdin as UTF-8 text */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** Read a task file, turning fs errors into InputError */
function readTaskFile(input: string): string {
  try {
    return fs.readFileSync(input, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InputError(`File not found: ${input}`);
    }
    throw new InputError(`Could not read ${input}: ${errorMessage(error)}`);
  }
}

/**
 * Load the task list from `input`, or from stdin when no path is given.
 * Unreadable files, empty stdin and malformed JSON raise InputError.
 */
export async function readTaskInput(
  input: string | undefined,
  stdin: () => Promise<string> = readStdin
): Promise<Task[]> {
  if (input) {
    return parseTaskList(readTaskFile(input));
  }

  const text = (await stdin()).trim();
  if (!text) {
    throw new InputError(`No input data provided\n${USAGE_HINT}`);
  }
  return parseTaskList(text);
}

export function registerFormatCommand(program: Command): void {
  program
    .command('format')
    .description('Format a JSON task list into an editable time-entry report')
    .argument('[input]', 'Input JSON file (default: stdin)')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .action(async (input: string | undefined, _opts: unknown, command: Command) => {
      const options = command.optsWithGlobals<CommonOptions>();
      try {
        prepareRun('format', options);
        const tasks = await readTaskInput(input);
        const report = renderReport(tasks);

        if (report === null) {
          status('No tasks to report');
          return;
        }
        writeOutput(report, options.output, 'Report');
      } catch (error: unknown) {
        await failRun(error);
      } finally {
        await getLogger().close();
      }
    });
}
