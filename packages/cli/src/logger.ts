/**
 * Debug logger for the berth CLI
 * Appends to .berth/debug.log in the working directory, or ~/.berth/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const BERTH_DIR = '.berth';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'OP';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** A mutating call issued against the container runtime */
  operation(kind: string, target: string): void;
}

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (logFilePath) return logFilePath;

  const localDir = path.join(process.cwd(), BERTH_DIR);
  if (fs.existsSync(localDir)) {
    logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    return logFilePath;
  }

  const homeDir = path.join(homedir(), BERTH_DIR);
  try {
    fs.mkdirSync(homeDir, { recursive: true });
  } catch {
    // Writes below will fail quietly as well
  }
  logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
  return logFilePath;
}

function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) return;

  const backupPath = `${logPath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

function startSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();
  const separator = '='.repeat(80);
  try {
    rotate(logPath);
    fs.appendFileSync(logPath, `\n${separator}\n[${new Date().toISOString()}] berth ${process.argv.slice(2).join(' ')}\n${separator}\n`);
  } catch {
    // The debug log never interrupts a command
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown, now = new Date()): string {
  let entry = `[${now.toISOString()}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.cause !== undefined) {
      entry += `\n  Cause: ${data.cause instanceof Error ? data.cause.message : String(data.cause)}`;
    }
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (data !== undefined) {
    let serialized: string;
    try {
      serialized = typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data);
    } catch {
      serialized = '[Could not serialize]';
    }
    entry += `\n  Data: ${serialized.split('\n').join('\n  ')}`;
  }

  return entry + '\n';
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  startSession();
  try {
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch {
    // The debug log never interrupts a command
  }
}

/**
 * Create a logger whose entries are prefixed with the command or service name
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => writeLog('DEBUG', `[${scope}] ${message}`, data),
    info: (message, data) => writeLog('INFO', `[${scope}] ${message}`, data),
    warn: (message, data) => writeLog('WARN', `[${scope}] ${message}`, data),
    error: (message, data) => writeLog('ERROR', `[${scope}] ${message}`, data),
    operation: (kind, target) => writeLog('OP', `[${scope}] ${kind} ${target}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  operation: () => {},
};
