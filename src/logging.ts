// File-based logging for the viewer.
// The terminal belongs to the UI while it runs, so log output goes to a file.

import { Env } from './env.ts';
import { ConfigError, ensureError } from './errors.ts';
import { mkdirSync, writeTextFileSync } from './runtime/mod.ts';

/**
 * Get default log file path (~/.cache/teletext-viewer/logs/viewer.log)
 */
function getDefaultLogFile(): string {
  const home = Env.get('HOME') || Env.get('USERPROFILE') || '.';
  return `${home}/.cache/teletext-viewer/logs/viewer.log`;
}

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export const LOG_FORMATS = ['structured', 'text', 'json'] as const;
export type LogFormat = typeof LOG_FORMATS[number];

export function isLogFormat(value: unknown): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
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
  // Path to log file; empty string disables file logging
  logFile?: string;

  level?: LogLevel;

  format?: LogFormat;
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  bufferSize?: number;
  flushInterval?: number; // in milliseconds
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _currentLogFile?: string;
  private _disabled = false;
  private _writeFailure?: string;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? getDefaultLogFile(),
      level: options.level || 'INFO',
      format: options.format || 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval ?? 1000,
    };

    this._sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      currentFileSize: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  get isDisabled(): boolean {
    return this._disabled;
  }

  initializeSync(): void {
    if (this._currentLogFile || this._disabled) {
      return;
    }

    if (this._options.logFile.trim() === '') {
      this._disabled = true;
      return;
    }

    this._currentLogFile = this._options.logFile;

    const logDir = this._currentLogFile.includes('/')
      ? this._currentLogFile.substring(0, this._currentLogFile.lastIndexOf('/'))
      : '.';

    if (logDir && logDir !== '.') {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        this._disabled = true;
        this._currentLogFile = undefined;
        throw new ConfigError(
          `Cannot create log directory ${logDir} for ${this._options.logFile}: ${ensureError(error).message}`,
          { cause: error },
        );
      }
    }

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => {
        this._flushOrStop();
      }, this._options.flushInterval);
      // The flush timer must never keep the process alive on its own
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: {
        sessionId: this._sessionId,
        logFile: this._currentLogFile,
      },
      source: 'Logger',
    });
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    if (!this._currentLogFile) {
      this.initializeSync();
    }
    if (this._disabled) {
      return;
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this._flushOrStop();
    }
  }

  // A write failure stops file logging; close() reports it once the
  // terminal is back.
  private _flushOrStop(): void {
    try {
      this._flushSync();
    } catch (error) {
      this._writeFailure = ensureError(error).message;
      this._disabled = true;
      this._buffer = [];
      this._stats.bufferSize = 0;
      if (this._flushTimer) {
        clearInterval(this._flushTimer);
        this._flushTimer = undefined;
      }
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || this._disabled || !this._currentLogFile) return;

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      writeTextFileSync(this._currentLogFile, content, { append: true });
      this._stats.currentFileSize += Buffer.byteLength(content);
      this._stats.lastFlush = new Date();
      this._stats.bufferSize = this._buffer.length;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to write to log file: ${errorMessage}`);
    }
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      error,
      source,
      sessionId: this._sessionId,
    });
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

  getStats(): LoggerStats {
    return { ...this._stats };
  }

  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }

    if (this._writeFailure) {
      console.error(`Logging stopped: ${this._writeFailure}`);
      this._writeFailure = undefined;
      return;
    }

    if (this._disabled || !this._currentLogFile) {
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: {
        sessionId: this._sessionId,
        stats: this._stats,
      },
      source: 'Logger',
      sessionId: this._sessionId,
    });

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');
    try {
      writeTextFileSync(this._currentLogFile, content, { append: true });
    } catch (error) {
      // Last write on shutdown; the terminal is already restored at this point
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`Failed to write to log file "${this._currentLogFile}": ${errorMessage}`);
    }
    this._currentLogFile = undefined;
  }
}

function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('TELETEXT_LOG_LEVEL')?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return undefined;
}

function getLogFormatFromEnv(): LogFormat | undefined {
  const envFormat = Env.get('TELETEXT_LOG_FORMAT')?.toLowerCase();
  return isLogFormat(envFormat) ? envFormat : undefined;
}

function createDefaultLoggerOptions(): LoggerOptions {
  return {
    // Environment variables take precedence over defaults
    level: getLogLevelFromEnv() || 'INFO',
    logFile: Env.get('TELETEXT_LOG_FILE') ?? getDefaultLogFile(),
    format: getLogFormatFromEnv() || 'structured',
    includeTimestamp: true,
    includeLevel: true,
    includeSource: true,
    bufferSize: 100,
    flushInterval: 1000,
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  const logger = new Logger({ ...createDefaultLoggerOptions(), ...options });
  logger.initializeSync();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(createDefaultLoggerOptions());
  }
  return globalLogger;
}

/**
 * Replace the global logger (used once the CLI has resolved its config).
 * The previous logger is closed.
 */
export function setGlobalLogger(logger: Logger): void {
  if (globalLogger && globalLogger !== logger) {
    globalLogger.close();
  }
  globalLogger = logger;
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

/**
 * Component logger bound to a source name. The global logger is looked up
 * on every call, so module-level loggers follow setGlobalLogger().
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
  };
}
