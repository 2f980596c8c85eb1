import chalk from 'chalk';
import { LogLevelName } from '../types/config.types';

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  none: LogLevel.NONE,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) {
    return undefined;
  }
  const key = name.trim().toLowerCase();
  return isLogLevelName(key) ? LEVELS_BY_NAME[key] : undefined;
}

/**
 * Structured payload attached to operation log events
 */
export interface LogEvent {
  action: string;
  params?: Record<string, unknown>;
  outcome: string;
}

/**
 * Logging collaborator injected into core services
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export class LoggerService implements Logger {
  private level: LogLevel = LogLevel.INFO;

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      console.error(chalk.red('❌ Error:'), message, ...args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      console.warn(chalk.yellow('⚠️ Warn:'), message, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(message, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.gray('🔍 Debug:'), message, ...args);
    }
  }

  public success(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(chalk.green('✅ Success:'), message, ...args);
    }
  }
}

export const logger = new LoggerService();
