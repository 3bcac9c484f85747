/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Directory for rotating log files. Console only when omitted.
   */
  logDir?: string;
  silent?: boolean;
}

const ICONS: Record<string, string> = {
  error: chalk.red('❌'),
  warn: chalk.yellow('⚠️ '),
  info: chalk.green('✅'),
  debug: chalk.dim('··'),
};

function colorFor(level: string): (text: string) => string {
  switch (level) {
    case 'error':
      return chalk.red;
    case 'warn':
      return chalk.yellow;
    case 'debug':
      return chalk.dim;
    default:
      return chalk.green;
  }
}

const consoleFormat = winston.format.printf((info) => {
  const icon = ICONS[info.level] ?? '';
  const message = colorFor(info.level)(String(info.message));
  return `${icon} ${message}`;
});

export class Logger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;
  private consoleTransport: winston.transport;

  constructor(options: LoggerOptions = {}) {
    this.consoleTransport = new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error'],
    });

    const transports: winston.transport[] = [this.consoleTransport];

    if (options.logDir) {
      const absoluteLogDir = path.resolve(process.cwd(), options.logDir);
      try {
        if (!fs.existsSync(absoluteLogDir)) {
          fs.mkdirSync(absoluteLogDir, { recursive: true });
        }
        this.fileLoggingEnabled = true;
      } catch (error) {
        console.warn(
          `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
        );
      }

      if (this.fileLoggingEnabled) {
        transports.push(
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%-error.log',
            datePattern: 'YYYYMMDD',
            level: 'error',
            maxSize: '10m',
            maxFiles: '30d',
          }),
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%.log',
            datePattern: 'YYYYMMDD',
            maxSize: '10m',
            maxFiles: '30d',
          })
        );
      }
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  get level(): string {
    return this.logger.level;
  }

  isFileLoggingEnabled(): boolean {
    return this.fileLoggingEnabled;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Flush pending writes and close all transports
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Build the run logger from the resolved configuration.
 */
export function createLogger(config: { debug: boolean; logLevel?: LogLevel; logDir?: string }): Logger {
  return new Logger({
    level: config.debug ? 'debug' : (config.logLevel ?? 'info'),
    logDir: config.logDir,
  });
}
