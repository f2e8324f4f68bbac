/**
 * Structured logger for ctxmirror.
 *
 * Writes debug logs to `.ctxmirror/logs/` automatically so users can
 * share log files when filing issues.  The CLI echoes entries to the
 * console through `onLog` when `--verbose` is active; the engine itself
 * never prints.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DATA_DIR_NAME } from './paths.js';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

/** The logging surface engine components depend on */
export interface LogSink {
  debug(category: string, message: string, data?: Record<string, unknown>): void;
  info(category: string, message: string, data?: Record<string, unknown>): void;
  warn(category: string, message: string, data?: Record<string, unknown>): void;
  error(category: string, message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Project directory; logs go to `<projectDir>/.ctxmirror/logs/` */
  projectDir: string;
  /** Log file prefix, usually the CLI command name */
  session?: string;
  /** If true, entries below `info` are also passed to `onLog` */
  verbose?: boolean;
  /** Set to false to keep entries in memory only */
  writeToFile?: boolean;
  /** An optional callback invoked on every log entry (for testing / custom sinks) */
  onLog?: (entry: LogEntry) => void;
  /** In-memory entries kept for `allEntries`; oldest are dropped first */
  maxEntries?: number;
}

// ─── Log level ordering ─────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger implements LogSink {
  private logFilePath: string;
  private verbose: boolean;
  private onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private maxEntries: number;
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions) {
    this.verbose = opts.verbose ?? false;
    this.onLog = opts.onLog;
    this.maxEntries = opts.maxEntries ?? 1000;
    this.logFilePath = '';

    if (opts.writeToFile ?? true) {
      const logDir = path.join(opts.projectDir, DATA_DIR_NAME, 'logs');
      fs.mkdirSync(logDir, { recursive: true });

      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(logDir, `${opts.session ?? 'ctxmirror'}-${timestamp}.log`);

      // Open write stream for append
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      // Losing the log file (e.g. its directory was removed) falls back to memory only
      this.fileStream.on('error', (error) => {
        this.fileStream = null;
        this.warn('logger', 'Log file unavailable, keeping entries in memory', {
          error: error.message,
        });
      });
      this.info('logger', 'Log session started', { logFile: this.logFilePath });
    }
  }

  /** Path to the current log file, empty when logging to memory only */
  get filePath(): string {
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

  /** Entries at or above `level`, optionally limited to one category */
  filter(level: LogLevel, category?: string): LogEntry[] {
    return this.entries.filter(
      (entry) =>
        LEVEL_PRIORITY[entry.level] >= LEVEL_PRIORITY[level] &&
        (category === undefined || entry.category === category)
    );
  }

  /** Flush and close the log file */
  close(): void {
    if (this.fileStream) {
      this.info('logger', 'Log session ended', {
        totalEntries: this.entries.length,
      });
      this.fileStream.end();
      this.fileStream = null;
    }
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
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    // Debug entries reach the sink only in verbose mode
    if (this.verbose || LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.info) {
      this.onLog?.(entry);
    }

    this.fileStream?.write(this.formatForFile(entry) + '\n');
  }

  private formatForFile(entry: LogEntry): string {
    const ts = entry.timestamp;
    const lvl = entry.level.toUpperCase().padEnd(5);
    const cat = `[${entry.category}]`.padEnd(14);
    let line = `${ts} ${lvl} ${cat} ${entry.message}`;
    if (entry.data) {
      line += ' ' + JSON.stringify(entry.data);
    }
    return line;
  }
}

/** A logger that keeps entries in memory only. Handy for tests and library callers. */
export function createMemoryLogger(opts: Omit<LoggerOptions, 'projectDir' | 'writeToFile'> = {}): Logger {
  return new Logger({ ...opts, projectDir: '', writeToFile: false });
}

// ─── Process-wide logger (CLI only) ─────────────────────────────────

let globalLogger: Logger | null = null;

/** Initialise the process logger. Call once at CLI startup. */
export function initLogger(opts: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}
