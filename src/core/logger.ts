/**
 * Console logger with level filtering and optional colour.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface LoggerOptions {
  level?: LogLevel;
  colors?: boolean;
  timestamps?: boolean;
  /** Receives each formatted line. Defaults to the console. */
  write?: (level: LogLevel, line: string) => void;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class ConsoleLogger implements Logger {
  private threshold: number;
  private colors: boolean;
  private timestamps: boolean;
  private write: (level: LogLevel, line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LOG_LEVELS[options.level ?? 'info'];
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? writeToConsole;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.threshold) {
      return;
    }

    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString().slice(11, 23)}]`);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    parts.push(this.colors ? LEVEL_COLORS[level](levelStr) : levelStr);
    parts.push(message);

    this.write(level, parts.join(' '));

    if (meta !== undefined && Object.keys(meta).length > 0) {
      const metaStr = JSON.stringify(meta, null, 2)
        .split('\n')
        .map((line) => '  ' + line)
        .join('\n');
      this.write(level, this.colors ? chalk.gray(metaStr) : metaStr);
    }
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
