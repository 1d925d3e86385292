import { appendFileSync, mkdirSync } from 'fs';

import { safeJsonStringify } from './json-utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

const MAX_LOG_ENTRIES = parseInt(process.env.MAX_LOG_ENTRIES ?? '1000', 10);
const logBuffer: LogEntry[] = [];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let configuredLevel: LogLevel | undefined;
let configuredLevelWins = false;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  if (configuredLevel && configuredLevelWins) {
    return configuredLevel;
  }
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return configuredLevel ?? 'info';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug' && process.env.DEBUG === 'true') {
    return true;
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function addToBuffer(entry: LogEntry): void {
  logBuffer.push(entry);
  if (logBuffer.length > MAX_LOG_ENTRIES) {
    logBuffer.shift();
  }
}

function getLogDir(): string {
  return process.env.LOG_DIR ?? './logs';
}

function getCurrentLogFile(): string {
  const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return `${getLogDir()}/orchestrator-${dateStr}.log`;
}

function writeToFile(entry: LogEntry): void {
  if (process.env.DISABLE_FILE_LOGGING === 'true') {
    return;
  }
  try {
    mkdirSync(getLogDir(), { recursive: true });
    appendFileSync(getCurrentLogFile(), safeJsonStringify(entry) + '\n');
  } catch (err) {
    console.error('Failed to write to log file:', err);
  }
}

function logToConsole(level: LogLevel, message: string, meta?: unknown): void {
  const prefix = `[${new Date().toISOString()}] ${level.toUpperCase()}: ${message}`;
  const args: unknown[] = meta === undefined ? [prefix] : [prefix, meta];

  if (level === 'error') {
    console.error(...args);
  } else if (level === 'warn') {
    console.warn(...args);
  } else {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}

function write(level: LogLevel, message: string, meta?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  addToBuffer(entry);
  writeToFile(entry);
  logToConsole(level, message, meta);
}

export const logger = {
  debug: (message: string, meta?: unknown): void => write('debug', message, meta),
  info: (message: string, meta?: unknown): void => write('info', message, meta),
  warn: (message: string, meta?: unknown): void => write('warn', message, meta),
  error: (message: string, meta?: unknown): void => write('error', message, meta),

  /**
   * Set the threshold used when LOG_LEVEL is not present in the environment.
   * With `overrideEnv` the threshold applies even when LOG_LEVEL is set.
   */
  setLevel: (level: LogLevel, options: { overrideEnv?: boolean } = {}): void => {
    configuredLevel = level;
    configuredLevelWins = options.overrideEnv ?? false;
  },

  getLevel: (): LogLevel => getLogLevel(),

  getLogs: (limit?: number): LogEntry[] => {
    if (limit !== undefined && limit > 0) {
      return logBuffer.slice(-limit);
    }
    return [...logBuffer];
  },

  clearLogs: (): void => {
    logBuffer.length = 0;
  },
};
