import type { LogLevel } from '../config/index.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: number = LEVELS.info;

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

/**
 * Console logger with a level gate. Services log through this so tests and
 * quiet deployments can turn the chatter down with LOG_LEVEL.
 */
export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (threshold <= LEVELS.debug) console.debug(message, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (threshold <= LEVELS.info) console.log(message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (threshold <= LEVELS.warn) console.warn(message, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    if (threshold <= LEVELS.error) console.error(message, ...details);
  },
};
