/**
 * Leveled console logger with chalk coloring.
 */

import chalk from 'chalk';
import { sanitizeForLog } from './log-sanitizer.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((id) => id === value);
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const enabled = (target: LogLevel): boolean => LEVEL_RANK[target] >= LEVEL_RANK[level];
  return {
    level,
    debug(message) {
      if (enabled('debug')) sink.out(chalk.gray(sanitizeForLog(message)));
    },
    info(message) {
      if (enabled('info')) sink.out(sanitizeForLog(message));
    },
    success(message) {
      if (enabled('info')) sink.out(chalk.green(sanitizeForLog(message)));
    },
    warn(message) {
      if (enabled('warn')) sink.err(chalk.yellow(sanitizeForLog(message)));
    },
    error(message) {
      if (enabled('error')) sink.err(chalk.red(sanitizeForLog(message)));
    },
  };
}
