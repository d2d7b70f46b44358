import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { spawnSync } from 'node:child_process';
import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CollaboratorError, getLogger, initLogger, resetLogger } from '@clockwork/core';
import { failRun } from '../src/runtime.js';

const ROOT = fileURLToPath(new URL('../../../', import.meta.url));
const ENTRY = fileURLToPath(new URL('../src/index.ts', import.meta.url));

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'clockwork-failure-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await resetLogger();
  process.exitCode = undefined;
  rmSync(dir, { recursive: true, force: true });
});

function readOnlyLog(logDir: string): string {
  const files = readdirSync(logDir);
  expect(files).toHaveLength(1);
  return readFileSync(join(logDir, files[0] ?? ''), 'utf-8');
}

describe('failRun', () => {
  it('flushes the log file before reporting the error', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    initLogger({ logDir: dir, runName: 'github', level: 'error' });
    getLogger().warn('github', 'gh repo list failed');

    await failRun(new CollaboratorError('Could not fetch repositories for test-org', 'gh repo list'));

    const lines = readOnlyLog(dir).trim().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toMatch(/ WARN  \[github\]   gh repo list failed$/);
    expect(lines[2]).toMatch(
      / DEBUG \[cli\]      Run failed \{"error":"Could not fetch repositories for test-org"\}$/
    );
    expect(lines[3]).toMatch(/ DEBUG \[logger\]   Log session ended /);

    expect(process.exitCode).toBe(1);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain('Error: Could not fetch repositories for test-org');
  });
});

describe('a failing command', () => {
  it('exits with status 1 and leaves the failure in the log file', () => {
    const logDir = join(dir, 'logs');
    const result = spawnSync(process.execPath, ['--import', 'tsx', ENTRY, 'github', '--path', dir], {
      cwd: ROOT,
      env: { ...process.env, GITHUB_ORG: '', CLOCKWORK_LOG_DIR: logDir },
      encoding: 'utf-8',
      timeout: 60_000,
    });

    expect(result.status).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('GitHub organization not set.');

    const log = readOnlyLog(logDir);
    expect(log).toContain('Run failed {"error":"GitHub organization not set.');
    expect(log).toContain('Log session ended');
  }, 60_000);
});
