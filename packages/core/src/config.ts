/**
 * YAML configuration loader for .clockwork.yml files, plus the
 * flag → environment → file → default resolution used by every command.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { InputError, errorMessage } from './errors.js';
import type { ClockworkConfig } from './types.js';
import { expandHome } from './utils.js';

export const CONFIG_FILENAME = '.clockwork.yml';

export const DEFAULT_COMMIT_WINDOW_MINUTES = 30;
export const DEFAULT_HUDDLES_PATH = '~/Downloads';
export const DEFAULT_HUDDLES_PATTERN = 'slack_huddles*.json';
export const DEFAULT_HUDDLE_LABEL = 'Slack huddle #meetings';

/** YAML sections holding only comments load as null; treat them as absent */
const emptyAsUndefined = (value: unknown): unknown => (value === null ? undefined : value);

const githubSchema = z
  .object({
    org: z.string().min(1).optional(),
    email: z.string().min(1).optional(),
    commitWindowMinutes: z.number().int().min(1).max(24 * 60).default(DEFAULT_COMMIT_WINDOW_MINUTES),
  })
  .default({});

const huddlesSchema = z
  .object({
    userId: z.string().min(1).optional(),
    path: z.string().default(DEFAULT_HUDDLES_PATH),
    pattern: z.string().default(DEFAULT_HUDDLES_PATTERN),
    label: z.string().min(1).default(DEFAULT_HUDDLE_LABEL),
  })
  .default({});

const loggingSchema = z
  .object({
    dir: z.string().optional(),
  })
  .default({});

const configSchema = z.object({
  github: z.preprocess(emptyAsUndefined, githubSchema),
  huddles: z.preprocess(emptyAsUndefined, huddlesSchema),
  logging: z.preprocess(emptyAsUndefined, loggingSchema),
});

/** Default configuration when no .clockwork.yml is found */
export function getDefaultConfig(): ClockworkConfig {
  return configSchema.parse({});
}

/**
 * Load and validate a .clockwork.yml config file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(configDir: string): ClockworkConfig {
  const configPath = path.join(configDir, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error: unknown) {
    throw new InputError(`Could not parse ${configPath}: ${errorMessage(error)}`);
  }

  // An empty file loads as undefined
  const normalized = normalizeKeys(parsed ?? {});
  const result = configSchema.safeParse(normalized);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid ${configPath}: ${issues}`);
  }
  return result.data;
}

/**
 * Write a default .clockwork.yml config file to the given directory.
 */
export function writeDefaultConfig(configDir: string): string {
  const configPath = path.join(configDir, CONFIG_FILENAME);
  const defaultYaml = `# Clockwork configuration
# Every value can be overridden by an environment variable or a CLI flag.

github:
  # Organization whose repositories are scanned ($GITHUB_ORG, --org)
  # org: my-org
  # Commit author to report on ($GIT_AUTHOR_EMAIL, --email).
  # Defaults to \`git config user.email\`.
  # email: me@example.com
  # Minutes of work assumed before each commit
  commit_window_minutes: ${DEFAULT_COMMIT_WINDOW_MINUTES}

huddles:
  # Slack member ID ($SLACK_USER_ID, --slack-user-id)
  # user_id: U0000000
  # Directory holding the huddle export ($SLACK_HUDDLES_PATH, --slack-huddles-path)
  path: ${DEFAULT_HUDDLES_PATH}
  pattern: "${DEFAULT_HUDDLES_PATTERN}"
  label: "${DEFAULT_HUDDLE_LABEL}"

logging:
  # Write a log file per run here ($CLOCKWORK_LOG_DIR)
  # dir: ~/.clockwork/logs
`;

  fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}

// ─── Settings resolution ────────────────────────────────────────────

/** Values given on the command line */
export interface SettingFlags {
  org?: string;
  email?: string;
  commitWindow?: string;
  slackUserId?: string;
  slackHuddlesPath?: string;
}

/** Settings after applying flag → env → file → default precedence */
export interface ResolvedSettings {
  org?: string;
  email?: string;
  commitWindowMinutes: number;
  slackUserId?: string;
  huddlesPath: string;
  huddlesPattern: string;
  huddleLabel: string;
  logDir?: string;
}

type Env = Record<string, string | undefined>;

/** Return the first value that is a non-blank string */
function firstSet(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return undefined;
}

/**
 * Combine CLI flags, environment variables and the loaded config file.
 * Environment is passed in rather than read from `process.env`.
 */
export function resolveSettings(
  flags: SettingFlags,
  env: Env,
  config: ClockworkConfig
): ResolvedSettings {
  let commitWindowMinutes = config.github.commitWindowMinutes;
  if (flags.commitWindow !== undefined) {
    const parsed = Number(flags.commitWindow);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new InputError(`Invalid commit window: ${flags.commitWindow} (expected whole minutes)`);
    }
    commitWindowMinutes = parsed;
  }

  const huddlesPath = firstSet(flags.slackHuddlesPath, env.SLACK_HUDDLES_PATH) ?? config.huddles.path;
  const logDir = firstSet(env.CLOCKWORK_LOG_DIR, config.logging.dir);

  return {
    org: firstSet(flags.org, env.GITHUB_ORG, config.github.org),
    email: firstSet(flags.email, env.GIT_AUTHOR_EMAIL, config.github.email),
    commitWindowMinutes,
    slackUserId: firstSet(flags.slackUserId, env.SLACK_USER_ID, config.huddles.userId),
    huddlesPath: expandHome(huddlesPath),
    huddlesPattern: config.huddles.pattern,
    huddleLabel: config.huddles.label,
    ...(logDir ? { logDir: expandHome(logDir) } : {}),
  };
}
