import { existsSync, mkdirSync, appendFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export const DEFAULT_LOG_DIR = join(homedir(), '.rawterm', 'logs');

// Logging stays off until a directory is configured
let logDirectory: string | null = null;

export interface LoggerOptions {
  directory: string | null;
}

/**
 * Point the logger at a directory, or pass null to turn file logging off
 */
export function configureLogger(options: LoggerOptions): void {
  logDirectory = options.directory;
}

export function getLogDirectory(): string | null {
  return logDirectory;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

/**
 * Log file path for today, creating the directory on first use
 */
export function getLogFilePath(directory: string, date = new Date()): string {
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  const day = date.toISOString().split('T')[0]; // YYYY-MM-DD
  return join(directory, `rawterm-${day}.log`);
}

/**
 * Format log entry as string
 */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${dataStr}\n`;
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (!logDirectory) return;
  try {
    const now = new Date();
    const entry: LogEntry = {
      timestamp: now.toISOString(),
      level,
      message,
      data,
    };
    appendFileSync(getLogFilePath(logDirectory, now), formatLogEntry(entry), 'utf-8');
  } catch {
    // Logging must never take the terminal down with it
  }
}

/**
 * Logger API
 */
export const logger = {
  info: (message: string, data?: unknown) => writeLog('info', message, data),
  warn: (message: string, data?: unknown) => writeLog('warn', message, data),
  error: (message: string, data?: unknown) => writeLog('error', message, data),
  debug: (message: string, data?: unknown) => writeLog('debug', message, data),
};

/**
 * Log a session lifecycle step
 */
export function logSession(operation: 'initialize' | 'teardown' | 'reapply', data?: Record<string, unknown>): void {
  writeLog('info', `Session ${operation}`, data);
}

/**
 * Log application error
 */
export function logAppError(error: Error, context?: string): void {
  logger.error('Application error', {
    context,
    message: error.message,
    stack: error.stack,
  });
}
