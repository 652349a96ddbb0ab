import { format } from 'util';
import type { LogLevel } from '../config/config';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] <= LEVEL_WEIGHT[currentLevel];
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  forStream(streamId: string): Logger;
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  error: line => console.error(line),
  warn: line => console.warn(line),
  info: line => console.log(line),
  debug: line => console.debug(line),
};

function createLogger(prefix = ''): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!isLevelEnabled(level)) return;
    const text = format(message, ...args);
    SINKS[level](`[${formatTimestamp()}] [${level.toUpperCase()}] ${prefix}${text}`);
  };

  return {
    error: (message, ...args) => write('error', message, args),
    warn: (message, ...args) => write('warn', message, args),
    info: (message, ...args) => write('info', message, args),
    debug: (message, ...args) => write('debug', message, args),
    forStream: streamId => createLogger(`${prefix}[${streamId}] `),
  };
}

export const LOG: Logger = createLogger();

/**
 * Writable-like sink so morgan access lines go through the logger
 */
export const morganStream = {
  write: (line: string): void => {
    LOG.info(line.trimEnd());
  },
};
