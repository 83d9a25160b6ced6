/**
 * Log Manager - diagnostic log lines on stderr
 *
 * Output meant for the user (tables, status lines, JSON) goes to stdout;
 * log lines never do.
 */
import fs from 'fs';
import { LOG_LEVELS, loadConfig } from './config-manager.js';
import type { LogLevel } from '../lib/types/config.js';

let _logFile: string | null = null;
let _levelOverride: LogLevel | null = null;

/**
 * Send log lines to a file instead of stderr
 */
export function setLogFile(file: string | null): void {
  _logFile = file;
}

/**
 * Force a minimum level regardless of config (tests, --verbose)
 */
export function setLogLevel(level: LogLevel | null): void {
  _levelOverride = level;
}

export function getLogLevel(): LogLevel {
  return _levelOverride ?? loadConfig().logging.level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getLogLevel());
}

export function formatLogLine(level: LogLevel, message: string, context?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const ctx = context ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${ctx}\n`;
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  const line = formatLogLine(level, message, context);

  if (_logFile) {
    fs.appendFileSync(_logFile, line);
  } else {
    process.stderr.write(line);
  }
}

export function logDebug(message: string, context?: Record<string, unknown>): void {
  log('debug', message, context);
}

export function logInfo(message: string, context?: Record<string, unknown>): void {
  log('info', message, context);
}

export function logWarn(message: string, context?: Record<string, unknown>): void {
  log('warn', message, context);
}
