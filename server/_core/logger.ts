import fs from 'fs';
import path from 'path';
import { ENV } from './env';
import type { ProxyLog } from '../proxy/types';

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

export function parseLogLevel(value: string): LogLevel {
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for app.log; null keeps output on the console only. */
  logDir?: string | null;
  /** Defaults to true. */
  console?: boolean;
}

function describeArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export class Logger {
  private logFile: string | null = null;
  private readonly level: LogLevel;
  private readonly toConsole: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.toConsole = options.console ?? true;

    const logDir = options.logDir ?? null;
    if (logDir) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.logFile = path.join(logDir, 'app.log');
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: string) {
    const timestamp = new Date().toISOString();
    const contextStr = context ? `[${context}]` : '';
    return `${timestamp} [${level}] ${contextStr} ${message}`;
  }

  private writeToFile(message: string) {
    if (!this.logFile) return;
    fs.appendFile(this.logFile, message + '\n', (err) => {
      if (err) {
        console.error('Failed to write to log file:', err);
      }
    });
  }

  private log(level: LogLevel, message: string, context: string | undefined, args: unknown[]) {
    if (!this.isEnabled(level)) return;

    const formatted = this.formatMessage(level, message, context);
    if (this.toConsole) {
      const sink =
        level === LogLevel.ERROR ? console.error
        : level === LogLevel.WARN ? console.warn
        : level === LogLevel.DEBUG ? console.debug
        : console.info;
      sink(formatted, ...args);
    }
    this.writeToFile(formatted + (args.length ? ' ' + args.map(describeArg).join(' ') : ''));
  }

  debug(message: string, context?: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, context, args);
  }

  info(message: string, context?: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, context, args);
  }

  warn(message: string, context?: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, context, args);
  }

  error(message: string, context?: string, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, context, args);
  }
}

export const logger = new Logger({
  level: parseLogLevel(ENV.logLevel),
  logDir: ENV.logDir,
});

/**
 * Adapts a Logger to the two-method sink the proxy core writes to, tagging
 * every line with the given context.
 */
export function scopedLog(context: string, target: Logger = logger): ProxyLog {
  return {
    debug: (message) => target.debug(message, context),
    error: (message, cause) =>
      cause === undefined ? target.error(message, context) : target.error(message, context, cause),
  };
}

export const silentLog: ProxyLog = {
  debug: () => {},
  error: () => {},
};
