/**
 * Slack huddle export file handling.
 *
 * The export is a JSON file saved from the browser into a downloads-like
 * directory. The newest matching file is read; after a successful run it
 * is moved aside into a single `.bak` copy.
 */

import * as fs from 'node:fs';
import { glob } from 'glob';
import { z } from 'zod';
import {
  getLogger,
  expandHome,
  errorMessage,
  InputError,
  DEFAULT_HUDDLES_PATTERN,
  type HuddleRecord,
} from '@clockwork/core';

const huddleSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  participant_history: z.array(z.string()).default([]),
  date_start: z.number().nullish(),
  date_end: z.number().nullish(),
});

export interface HuddleExport {
  file: string;
  huddles: HuddleRecord[];
  /** Records that were dropped because they did not validate */
  skipped: number;
}

/**
 * Return the most recently modified file in `dir` matching `pattern`,
 * or null when the directory is missing or has no match.
 */
export async function findLatestExport(
  dir: string,
  pattern: string = DEFAULT_HUDDLES_PATTERN
): Promise<string | null> {
  const root = expandHome(dir);
  if (!fs.existsSync(root)) return null;

  const matches = await glob(pattern, { cwd: root, absolute: true, nodir: true });

  let latest: { file: string; mtimeMs: number } | null = null;
  for (const file of matches) {
    const { mtimeMs } = fs.statSync(file);
    if (!latest || mtimeMs > latest.mtimeMs) {
      latest = { file, mtimeMs };
    }
  }
  return latest?.file ?? null;
}

/**
 * Read an export file. Accepts a bare array of huddles or an object with a
 * `huddles` array; anything else is an InputError.
 */
export function loadHuddleExport(file: string): HuddleExport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error: unknown) {
    throw new InputError(`Error loading ${file}: ${errorMessage(error)}`);
  }

  let rawRecords: unknown[];
  if (Array.isArray(parsed)) {
    rawRecords = parsed;
  } else if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'huddles' in parsed &&
    Array.isArray(parsed.huddles)
  ) {
    rawRecords = parsed.huddles;
  } else {
    throw new InputError(`Error loading ${file}: expected an array of huddles or an object with a "huddles" array`);
  }

  const log = getLogger();
  const huddles: HuddleRecord[] = [];
  let skipped = 0;

  for (const raw of rawRecords) {
    const result = huddleSchema.safeParse(raw);
    if (!result.success) {
      skipped++;
      log.skippedRecord('huddles', result.error.issues[0]?.message ?? 'invalid huddle', JSON.stringify(raw) ?? '');
      continue;
    }
    const { id, participant_history, date_start, date_end } = result.data;
    huddles.push({
      id,
      participant_history,
      ...(date_start != null ? { date_start } : {}),
      ...(date_end != null ? { date_end } : {}),
    });
  }

  log.info('huddles', 'Loaded huddle export', { file, loaded: huddles.length, skipped });
  return { file, huddles, skipped };
}

export interface RotationResult {
  backupPath: string | null;
  removed: boolean;
}

/**
 * Copy the export to `<file>.bak`, replacing any earlier backup, then
 * delete the export. Failures are logged as warnings and never thrown.
 * The export is kept when the backup could not be written.
 */
export function rotateExportBackup(file: string): RotationResult {
  const log = getLogger();
  const backupPath = `${file}.bak`;

  try {
    fs.copyFileSync(file, backupPath);
  } catch (error: unknown) {
    log.warn('huddles', `Could not back up ${file}`, { error: errorMessage(error) });
    return { backupPath: null, removed: false };
  }

  try {
    fs.unlinkSync(file);
  } catch (error: unknown) {
    log.warn('huddles', `Could not remove ${file}`, { error: errorMessage(error) });
    return { backupPath, removed: false };
  }

  log.info('huddles', 'Rotated huddle export', { file, backupPath });
  return { backupPath, removed: true };
}
