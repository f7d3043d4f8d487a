// Buffered file logger and per-component loggers
// Nothing is written unless a log file is configured (QUIRE_LOG_FILE or createLogger).

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Env } from './env.ts';

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type LogFormat = 'json' | 'text' | 'structured';

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
  sessionId?: string;
}

export interface LoggerOptions {
  /** Log file path; empty turns file output off */
  logFile?: string;
  level?: LogLevel;
  format?: LogFormat;
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;
  /** Entries held in memory before they are appended to the file */
  bufferSize?: number;
  /** Milliseconds between background flushes; 0 means flush only when full or asked */
  flushInterval?: number;
  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

type ResolvedOptions = Required<LoggerOptions>;
type EntryFormatter = (entry: LogEntry, options: ResolvedOptions) => string;

function hasContext(entry: LogEntry): entry is LogEntry & { context: Record<string, unknown> } {
  return entry.context !== undefined && Object.keys(entry.context).length > 0;
}

// Prefix fields shared by the text and structured formats
function prefix(entry: LogEntry, options: ResolvedOptions, style: 'text' | 'structured'): string[] {
  const fields: string[] = [];
  const time = entry.timestamp.toISOString();
  if (options.includeTimestamp) {
    fields.push(style === 'text' ? `[${time}]` : time);
  }
  if (options.includeLevel) {
    fields.push(style === 'text' ? entry.level.padEnd(5) : `[${entry.level}]`);
  }
  if (options.includeSource && entry.source) {
    fields.push(style === 'text' ? `[${entry.source}]` : `${entry.source}:`);
  }
  return fields;
}

const FORMATTERS: Record<LogFormat, EntryFormatter> = {
  json: entry =>
    JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      message: entry.message,
      context: entry.context,
      source: entry.source,
      sessionId: entry.sessionId,
      error: entry.error && {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),

  text: (entry, options) => {
    let line = [...prefix(entry, options, 'text'), entry.message].join(' ');
    if (hasContext(entry)) {
      line += ` | ${JSON.stringify(entry.context)}`;
    }
    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
    }
    return line;
  },

  structured: (entry, options) => {
    let line = [...prefix(entry, options, 'structured'), entry.message].join(' ');
    if (hasContext(entry)) {
      const pairs = Object.entries(entry.context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
      line += ` | ${pairs.join(', ')}`;
    }
    if (entry.error) {
      line += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n  Stack: ${entry.error.stack}`;
      }
    }
    return line;
  },
};

function emptyLevelCounts(): Record<LogLevel, number> {
  return { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 };
}

export class Logger {
  readonly sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

  private _options: ResolvedOptions;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats = {
    totalEntries: 0,
    entriesByLevel: emptyLevelCounts(),
    currentFileSize: 0,
    bufferSize: 0,
    lastFlush: new Date(),
  };
  private _file?: string;
  private _timer?: NodeJS.Timeout;
  private _disabled = false;
  private _flushOnExit = (): void => this.flush();

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? '',
      level: options.level ?? 'INFO',
      format: options.format ?? 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize ?? 100,
      flushInterval: options.flushInterval ?? 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel ?? 'WARN',
    };
  }

  /** True once opened without a log file, or after close() */
  get disabled(): boolean {
    return this._disabled;
  }

  get level(): LogLevel {
    return this._options.level;
  }

  get logFile(): string | undefined {
    return this._file;
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  /**
   * Create the log directory, start the flush timer and flush on process
   * exit. Called on first use; a logger without a log file, or whose
   * directory cannot be created, disables itself here.
   */
  open(): void {
    if (this._file || this._disabled) {
      return;
    }
    const logFile = this._options.logFile.trim();
    if (logFile === '') {
      this._disabled = true;
      return;
    }

    try {
      mkdirSync(dirname(logFile), { recursive: true });
    } catch (error) {
      this._fail(logFile, error);
      return;
    }
    this._file = logFile;

    if (this._options.flushInterval > 0) {
      this._timer = setInterval(() => this.flush(), this._options.flushInterval);
      this._timer.unref();
    }
    process.once('exit', this._flushOnExit);

    this._record({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: { sessionId: this.sessionId, logFile },
      source: 'Logger',
    });
  }

  formatEntry(entry: LogEntry): string {
    return FORMATTERS[this._options.format](entry, this._options) + '\n';
  }

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  /**
   * Append buffered entries to the log file. A failed write is reported once
   * on stderr and disables the logger.
   */
  flush(): void {
    if (!this._file || this._buffer.length === 0) {
      return;
    }

    const content = this._buffer.splice(0).map(entry => this.formatEntry(entry)).join('');
    try {
      appendFileSync(this._file, content);
    } catch (error) {
      this._fail(this._file, error);
      return;
    }

    this._stats.currentFileSize += Buffer.byteLength(content);
    this._stats.lastFlush = new Date();
    this._stats.bufferSize = 0;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  /** Write a closing entry, flush and stop. Later entries are dropped. */
  close(): void {
    this._stop();

    if (this._file) {
      this._buffer.push({
        timestamp: new Date(),
        level: 'INFO',
        message: 'Logging session ended',
        context: { sessionId: this.sessionId, totalEntries: this._stats.totalEntries },
        source: 'Logger',
        sessionId: this.sessionId,
      });
      this.flush();
      this._file = undefined;
    }
    this._disabled = true;
  }

  private _stop(): void {
    clearInterval(this._timer);
    this._timer = undefined;
    process.removeListener('exit', this._flushOnExit);
  }

  private _fail(logFile: string, error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Logging disabled: cannot write to log file "${logFile}": ${reason}`);
    this._stop();
    this._buffer = [];
    this._stats.bufferSize = 0;
    this._file = undefined;
    this._disabled = true;
  }

  private _log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    source?: string,
    error?: Error
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this._options.level]) {
      return;
    }
    this._record({ timestamp: new Date(), level, message, error, context, source, sessionId: this.sessionId });
  }

  private _record(entry: LogEntry): void {
    this.open();

    const { consoleOutput, consoleLevel } = this._options;
    if (consoleOutput && LOG_LEVELS[entry.level] >= LOG_LEVELS[consoleLevel]) {
      this._mirror(entry);
    }

    if (this._disabled) {
      return;
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;
    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this.flush();
    }
  }

  private _mirror(entry: LogEntry): void {
    const line = this.formatEntry(entry).trimEnd();
    switch (entry.level) {
      case 'ERROR':
      case 'FATAL':
        console.error(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

function levelFromEnv(): LogLevel | undefined {
  const level = Env.get('QUIRE_LOG_LEVEL')?.toUpperCase();
  return level && isLogLevel(level) ? level : undefined;
}

function defaultOptions(): LoggerOptions {
  return {
    level: levelFromEnv() ?? 'INFO',
    logFile: Env.get('QUIRE_LOG_FILE') ?? '',
    format: 'structured',
    consoleOutput: false,
    consoleLevel: 'ERROR',
  };
}

let globalLogger: Logger | undefined;

/**
 * Create and open a logger. Unset options come from QUIRE_LOG_LEVEL and
 * QUIRE_LOG_FILE, then from the Logger defaults.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = new Logger({ ...defaultOptions(), ...options });
  logger.open();
  return logger;
}

export function getGlobalLogger(): Logger {
  globalLogger ??= createLogger();
  return globalLogger;
}

/** Install `logger` as the global logger, closing the one it replaces */
export function setGlobalLogger(logger: Logger): void {
  if (globalLogger && globalLogger !== logger) {
    globalLogger.close();
  }
  globalLogger = logger;
}

export interface ComponentLogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  fatal(message: string, error?: Error, context?: Record<string, unknown>): void;
  flush(): void;
}

/**
 * Logger that tags entries with `source`. The global logger is looked up on
 * every call, so module-level component loggers follow setGlobalLogger().
 */
export function getLogger(source: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, source),
    debug: (message, context) => getGlobalLogger().debug(message, context, source),
    info: (message, context) => getGlobalLogger().info(message, context, source),
    warn: (message, context) => getGlobalLogger().warn(message, context, source),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, source),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, source),
    flush: () => getGlobalLogger().flush(),
  };
}
