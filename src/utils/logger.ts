/**
 * Bross Sequential Analysis - Logger
 * ===================================
 * Levelled logging to the console and an optional append-only file
 */

import * as fs from 'fs';
import * as path from 'path';

// ============================================================================
// LOG LEVELS
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// ============================================================================
// COLORS FOR TERMINAL
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

export interface LoggerOptions {
  level?: LogLevel;
  console?: boolean;
  file?: boolean;
  filePath?: string;
}

/** Where formatted lines go; shared between a logger and its children */
interface LogSink {
  level: LogLevel;
  console: boolean;
  fileStream: fs.WriteStream | null;
}

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class Logger {
  private sink: LogSink;
  private scope: string | null;

  constructor(options?: LoggerOptions, scope: string | null = null, sink?: LogSink) {
    this.scope = scope;
    this.sink = sink ?? {
      level: options?.level ?? 'info',
      console: options?.console ?? true,
      fileStream: null,
    };

    if (!sink && options?.file && options.filePath) {
      this.sink.fileStream = Logger.openFile(options.filePath);
    }
  }

  private static openFile(filePath: string): fs.WriteStream {
    const absolutePath = path.resolve(filePath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    return fs.createWriteStream(absolutePath, { flags: 'a' });
  }

  /**
   * Logger writing to the same outputs, prefixing messages with a scope
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(undefined, nested, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.sink.level];
  }

  private formatData(data: unknown): string {
    if (data instanceof Error) return data.stack ?? `${data.name}: ${data.message}`;
    return typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data);
  }

  /**
   * Plain line for the log file
   */
  formatMessage(level: LogLevel, message: string, data?: unknown, timestamp = new Date().toISOString()): string {
    const levelStr = level.toUpperCase().padEnd(5);
    const scopeStr = this.scope ? ` [${this.scope}]` : '';
    let formatted = `[${timestamp}] [${levelStr}]${scopeStr} ${message}`;
    if (data !== undefined) {
      formatted += `\n${this.formatData(data)}`;
    }
    return formatted;
  }

  private formatConsoleMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const color = LEVEL_COLORS[level];
    const levelStr = level.toUpperCase().padEnd(5);
    const scopeStr = this.scope ? ` ${COLORS.magenta}[${this.scope}]${COLORS.reset}` : '';

    let formatted = `${COLORS.dim}[${timestamp}]${COLORS.reset} ${color}[${levelStr}]${COLORS.reset}${scopeStr} ${message}`;
    if (data !== undefined) {
      formatted += `\n${COLORS.dim}${this.formatData(data)}${COLORS.reset}`;
    }
    return formatted;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    if (this.sink.console) {
      const consoleMsg = this.formatConsoleMessage(level, message, data);
      if (level === 'error') {
        console.error(consoleMsg);
      } else if (level === 'warn') {
        console.warn(consoleMsg);
      } else {
        console.log(consoleMsg);
      }
    }

    if (this.sink.fileStream) {
      this.sink.fileStream.write(this.formatMessage(level, message, data) + '\n');
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  setLevel(level: LogLevel): void {
    this.sink.level = level;
  }

  getLevel(): LogLevel {
    return this.sink.level;
  }

  /**
   * Close file stream
   */
  close(): void {
    if (this.sink.fileStream) {
      this.sink.fileStream.end();
      this.sink.fileStream = null;
    }
  }
}

// ============================================================================
// SINGLETON LOGGER
// ============================================================================

let globalLogger: Logger | null = null;

export function initLogger(options?: LoggerOptions): Logger {
  globalLogger?.close();
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
