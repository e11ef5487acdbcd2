/**
 * Process-wide logger backed by electron-log's Node entry point.
 *
 * Writes to the console and to a rotating log file. Services prefix
 * messages with their component name, e.g. `[AudioCapture] ...`.
 */

import electronLog from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const MAX_LOG_SIZE_BYTES = 5 * 1024 * 1024; // 5MB

electronLog.transports.file.maxSize = MAX_LOG_SIZE_BYTES;
electronLog.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';

function parseLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

export function setLogLevel(level: LogLevel): void {
  electronLog.transports.file.level = level;
  electronLog.transports.console.level = level;
}

export function getLogFilePath(): string {
  return electronLog.transports.file.getFile().path;
}

setLogLevel(parseLevel(process.env.SCRIBEKEY_LOG_LEVEL) ?? 'info');

export const logger = {
  log: (...params: unknown[]): void => electronLog.info(...params),
  info: (...params: unknown[]): void => electronLog.info(...params),
  warn: (...params: unknown[]): void => electronLog.warn(...params),
  error: (...params: unknown[]): void => electronLog.error(...params),
  debug: (...params: unknown[]): void => electronLog.debug(...params),
};
