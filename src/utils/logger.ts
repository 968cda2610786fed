import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return LogLevel[upper];
  }
  return LogLevel.DEBUG;
}

class Logger {
  private logDir: string;
  private minLevel: LogLevel;
  private writeFiles: boolean;
  private dirReady = false;

  constructor() {
    this.logDir = path.join(process.cwd(), 'logs');
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
    // Test runs set NODE_ENV=test; keep the logs/ folder out of them unless asked for
    this.writeFiles = process.env.LOG_TO_FILE
      ? process.env.LOG_TO_FILE !== 'false'
      : process.env.NODE_ENV !== 'test';
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg => {
      if (arg instanceof Error) return arg.stack || arg.message;
      return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg);
    }).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(formatted: string): void {
    if (!this.writeFiles) return;
    try {
      if (!this.dirReady) {
        fs.ensureDirSync(this.logDir);
        this.dirReady = true;
      }
      const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
      fs.appendFileSync(logFile, formatted + '\n');
    } catch (error) {
      this.writeFiles = false;
      console.error(chalk.red(`Log file output disabled: ${error instanceof Error ? error.message : error}`));
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message, ...args);
    console.log(chalk.gray(formatted));
    this.writeToFile(formatted);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.blue(formatted));
    this.writeToFile(formatted);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.WARN)) return;
    const formatted = this.formatMessage(LogLevel.WARN, message, ...args);
    console.log(chalk.yellow(formatted));
    this.writeToFile(formatted);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    const formatted = this.formatMessage(LogLevel.ERROR, message, ...args);
    console.error(chalk.red(formatted));
    this.writeToFile(formatted);
  }
}

export const logger = new Logger();
