/**
 * Leveled console logger
 *
 * Stages report captured failures at debug level; the CLI reuses the same
 * logger for its diagnostics.
 *
 * @module logging/logger
 */

import chalk from 'chalk';
import { config, type LogLevel } from '../config/index.js';

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Colourize output with chalk */
  color?: boolean;
  /** Prefix written before every message, e.g. "[fluentpipe]" */
  prefix?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLevelEnabled(current: LogLevel, level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[current];
}

/**
 * Create a logger that writes through the console.
 *
 * debug/info go to stdout, warn/error to stderr.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;
  const paint: chalk.Chalk = new chalk.Instance({
    level: (options.color ?? config.color) ? chalk.level : 0,
  });
  const prefix = options.prefix ? `${options.prefix} ` : '';

  return {
    level,
    debug(message, ...args) {
      if (isLevelEnabled(level, 'debug')) {
        console.log(paint.dim(`${prefix}[DEBUG] ${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (isLevelEnabled(level, 'info')) {
        console.log(`${prefix}${message}`, ...args);
      }
    },
    warn(message, ...args) {
      if (isLevelEnabled(level, 'warn')) {
        console.warn(paint.yellow(`${prefix}Warning: ${message}`), ...args);
      }
    },
    error(message, ...args) {
      if (isLevelEnabled(level, 'error')) {
        console.error(paint.red(`${prefix}Error: ${message}`), ...args);
      }
    },
  };
}

let activeLogger: Logger | undefined;

/** Process-wide logger, created on first use from the runtime config. */
export function getLogger(): Logger {
  activeLogger ??= createLogger();
  return activeLogger;
}

/** Replace the process-wide logger (the CLI does this for --verbose/--quiet). */
export function setLogger(logger: Logger): void {
  activeLogger = logger;
}
