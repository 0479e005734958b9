import { SUMFILE_LOG_LEVEL_ENV } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_PREFIX = '[sumfile-mcp]';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function getLogLevel(): LogLevel {
  const raw = process.env[SUMFILE_LOG_LEVEL_ENV]?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

function write(level: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[getLogLevel()]) return;
  // Always stderr: stdout carries JSON-RPC or CLI output.
  console.error(LOG_PREFIX, ...args);
}

export const log = {
  debug: (...args: unknown[]): void => write('debug', args),
  info: (...args: unknown[]): void => write('info', args),
  warn: (...args: unknown[]): void => write('warn', args),
  error: (...args: unknown[]): void => write('error', args),
};
