/**
 * Runner for the GitHub CLI (`gh`).
 *
 * `gh` carries its own authentication, so Clockwork never sees a token.
 * A failed invocation resolves to null; callers decide whether that means
 * "no data" or a hard failure.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { getLogger } from '@clockwork/core';

const execFileAsync = promisify(execFile);

/** Run `gh` with the given arguments, resolving trimmed stdout or null on failure */
export type GhRunner = (args: string[]) => Promise<string | null>;

export interface GhRunnerOptions {
  /** Executable to run, `gh` on the PATH by default */
  binary?: string;
  /** Largest stdout accepted, in bytes */
  maxBuffer?: number;
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return error instanceof Error ? error.message : undefined;
}

/** Create a GhRunner backed by child_process.execFile (no shell involved) */
export function createGhRunner(options: GhRunnerOptions = {}): GhRunner {
  const binary = options.binary ?? 'gh';
  const maxBuffer = options.maxBuffer ?? 64 * 1024 * 1024;

  return async (args: string[]): Promise<string | null> => {
    const log = getLogger();
    const started = Date.now();
    try {
      const { stdout } = await execFileAsync(binary, args, { encoding: 'utf8', maxBuffer });
      log.command({ program: binary, args, ok: true, latencyMs: Date.now() - started });
      return stdout.trim();
    } catch (error: unknown) {
      log.command({
        program: binary,
        args,
        ok: false,
        latencyMs: Date.now() - started,
        stderr: stderrOf(error),
      });
      return null;
    }
  };
}
