/**
 * @clockwork/core - Shared types, errors, logging, configuration and git helpers.
 * This is the foundation package that all other Clockwork packages depend on.
 */

// Types
export * from './types.js';

// Errors
export {
  ClockworkError,
  InputError,
  ConfigError,
  CollaboratorError,
  errorMessage,
} from './errors.js';

// Config
export {
  loadConfig,
  writeDefaultConfig,
  getDefaultConfig,
  resolveSettings,
  CONFIG_FILENAME,
  DEFAULT_COMMIT_WINDOW_MINUTES,
  DEFAULT_HUDDLES_PATH,
  DEFAULT_HUDDLES_PATTERN,
  DEFAULT_HUDDLE_LABEL,
  type SettingFlags,
  type ResolvedSettings,
} from './config.js';

// Logger
export {
  Logger,
  initLogger,
  getLogger,
  resetLogger,
  formatLogLine,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

// Git
export {
  createGitClient,
  getConfiguredEmail,
  resolveAuthorEmail,
} from './git.js';

// Utils
export {
  expandHome,
  writeFileEnsuringDir,
  plural,
} from './utils.js';
