/**
 * Logger module for tracking chunk assessment and filtering
 * Logs to console and, optionally, to a file with timestamps and log levels
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

export interface LoggerOptions {
  logDirectory?: string;
  writeToFile?: boolean;
  minLevel?: LogLevel;
}

export class Logger {
  private readonly logDirectory: string;
  private readonly writeToFile: boolean;
  private readonly minLevel: LogLevel;
  private logFilePath: string | null = null;
  private logStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logDirectory = options.logDirectory ?? './logs';
    this.writeToFile = options.writeToFile ?? true;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  /**
   * Open the log file on first use so importing the module has no side effects
   */
  private stream(): fs.WriteStream | null {
    if (!this.writeToFile) return null;

    if (!this.logStream) {
      if (!fs.existsSync(this.logDirectory)) {
        fs.mkdirSync(this.logDirectory, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(this.logDirectory, `chunk-filter-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
    }

    return this.logStream;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /**
   * Main logging method
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}`;
    const file = this.stream();

    if (file) {
      file.write(logMessage + '\n');

      if (data !== undefined) {
        const dataString = typeof data === 'object'
          ? JSON.stringify(data, null, 2)
          : String(data);
        file.write(`  Data: ${dataString}\n`);
      }
    }

    const consoleMessage = this.formatConsoleMessage(level, message);
    if (level === LogLevel.ERROR) {
      console.error(consoleMessage);
    } else if (level === LogLevel.WARN) {
      console.warn(consoleMessage);
    } else {
      console.log(consoleMessage);
    }

    if (data !== undefined) {
      console.log('  Data:', data);
    }
  }

  private formatConsoleMessage(level: LogLevel, message: string): string {
    return `[${level}] ${message}`;
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log errors, with the stack written to the file
   */
  error(message: string, error?: unknown): void {
    const detail = error instanceof Error ? error.message : error;
    this.log(LogLevel.ERROR, message, detail);

    if (error instanceof Error && error.stack && this.isEnabled(LogLevel.ERROR)) {
      this.stream()?.write(`  Stack: ${error.stack}\n`);
    }
  }

  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log separator line for readability
   */
  separator(char: string = '=', length: number = 80): void {
    if (!this.isEnabled(LogLevel.INFO)) return;

    const line = char.repeat(length);
    this.stream()?.write(line + '\n');
    console.log(line);
  }

  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogFilePath(): string | null {
    return this.logFilePath;
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const upper = value.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const isTest = env.NODE_ENV === 'test';

  return {
    logDirectory: env.LOG_DIR || './logs',
    writeToFile: !isTest && env.LOG_TO_FILE !== 'false',
    minLevel: parseLogLevel(env.LOG_LEVEL) ?? (isTest ? LogLevel.ERROR : LogLevel.INFO)
  };
}

// Export singleton instance
export const logger = new Logger(loggerOptionsFromEnv());
