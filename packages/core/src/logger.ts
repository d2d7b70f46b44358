/**
 * Structured logger for Clockwork.
 *
 * Keeps every entry of the run in memory, forwards entries to an optional
 * callback (the CLI uses it to echo to stderr), and appends them to a log
 * file when a log directory is configured.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for the run's log file; no file is written when omitted */
  logDir?: string;
  /** Prefix of the log file name, usually the command being run */
  runName?: string;
  /** Lowest level forwarded to `onLog` (entries are always kept in memory) */
  level?: LogLevel;
  /** Invoked on every entry at or above `level` */
  onLog?: (entry: LogEntry) => void;
}

// ─── Log level ordering ─────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private readonly logFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.minLevel = opts.level ?? 'debug';
    this.onLog = opts.onLog;

    if (opts.logDir) {
      fs.mkdirSync(opts.logDir, { recursive: true });
      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(opts.logDir, `${opts.runName ?? 'clockwork'}-${timestamp}.log`);
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.debug('logger', 'Log session started', { logFile: this.logFilePath });
    } else {
      this.logFilePath = null;
    }
  }

  /** Path to the current log file, or null when logging only in memory */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /** All entries captured this session (in-memory) */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  // ── Public logging methods ────────────────────────────────────────

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  // ── Specialised helpers ───────────────────────────────────────────

  /** Log an external command and how it ended */
  command(opts: { program: string; args: string[]; ok: boolean; latencyMs: number; stderr?: string }): void {
    const data: Record<string, unknown> = {
      args: opts.args,
      latencyMs: opts.latencyMs,
    };
    if (opts.stderr) data.stderrPreview = opts.stderr.slice(0, 500);
    if (opts.ok) {
      this.debug('exec', `${opts.program} succeeded`, data);
    } else {
      this.warn('exec', `${opts.program} failed`, data);
    }
  }

  /** Log a record that was dropped because it did not decode */
  skippedRecord(category: string, reason: string, raw: string): void {
    this.debug(category, 'Skipped malformed record', {
      reason,
      rawFirst200: raw.slice(0, 200),
    });
  }

  /** Flush and close the log file; resolves once everything is on disk */
  close(): Promise<void> {
    const stream = this.fileStream;
    if (!stream) return Promise.resolve();

    this.debug('logger', 'Log session ended', {
      totalEntries: this.entries.length,
    });
    this.fileStream = null;

    return new Promise((resolve) => {
      // A failed write must not keep the process from ending
      stream.once('error', () => resolve());
      stream.end(() => resolve());
    });
  }

  // ── Core write ────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    this.entries.push(entry);
    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel]) {
      this.onLog?.(entry);
    }

    this.fileStream?.write(formatLogLine(entry) + '\n');
  }
}

/** Render an entry as a single log-file line */
export function formatLogLine(entry: LogEntry): string {
  const lvl = entry.level.toUpperCase().padEnd(5);
  const cat = `[${entry.category}]`.padEnd(10);
  let line = `${entry.timestamp} ${lvl} ${cat} ${entry.message}`;
  if (entry.data) {
    line += ' ' + JSON.stringify(entry.data);
  }
  return line;
}

// ─── Global singleton (set once per CLI run) ────────────────────────

let globalLogger: Logger | null = null;
const silentLogger = new Logger();

/** Initialise the global logger. Call once at CLI startup. */
export function initLogger(opts: LoggerOptions): Logger {
  if (globalLogger) {
    // close() never rejects
    void globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}

/** Get the current global logger, or an in-memory one if none initialised. */
export function getLogger(): Logger {
  return globalLogger ?? silentLogger;
}

/** Close and forget the global logger */
export async function resetLogger(): Promise<void> {
  const logger = globalLogger;
  globalLogger = null;
  await logger?.close();
}
