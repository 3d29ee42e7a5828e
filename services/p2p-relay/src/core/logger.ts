/**
 * Structured JSON logger with file rotation.
 * All relay modules log through this instead of ad-hoc console calls.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LoggingConfig, LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  ts: string;
  level: LogLevel;
  module: string;
  msg: string;
  data?: Record<string, unknown>;
}

let _logDir: string = '';
let _minLevel: LogLevel = 'info';
let _maxSizeMB = 10;
let _maxFiles = 5;
let _toFile = false;

/**
 * Initialize the logger from config. Call once at relay start.
 * Relative log dirs resolve against baseDir.
 */
export function initLogger(config: LoggingConfig, baseDir: string = process.cwd()): void {
  _logDir = path.resolve(baseDir, config.dir);
  _minLevel = config.level;
  _maxSizeMB = config.rotation.max_size_mb;
  _maxFiles = config.rotation.max_files;
  _toFile = config.to_file;

  if (_toFile) fs.mkdirSync(_logDir, { recursive: true });
}

function getLogFile(): string {
  return path.join(_logDir, 'relay.log');
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[_minLevel];
}

/**
 * Rotate logs if the current file exceeds the size limit.
 */
function rotateIfNeeded(): void {
  const logFile = getLogFile();
  if (!fs.existsSync(logFile)) return;

  const stats = fs.statSync(logFile);
  if (stats.size < _maxSizeMB * 1024 * 1024) return;

  // relay.log -> relay.log.1 -> relay.log.2 -> ...
  for (let i = _maxFiles - 1; i >= 1; i--) {
    const src = `${logFile}.${i}`;
    const dst = `${logFile}.${i + 1}`;
    if (fs.existsSync(src)) {
      if (i + 1 >= _maxFiles) {
        fs.unlinkSync(src);
      } else {
        fs.renameSync(src, dst);
      }
    }
  }
  fs.renameSync(logFile, `${logFile}.1`);
}

function writeLog(entry: LogEntry): void {
  if (_toFile) {
    rotateIfNeeded();
    fs.appendFileSync(getLogFile(), JSON.stringify(entry) + '\n');
  }

  const suffix = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  if (entry.level === 'error') {
    console.error(`[${entry.level}] ${entry.module}: ${entry.msg}${suffix}`);
  } else {
    console.log(`[${entry.level}] ${entry.module}: ${entry.msg}${suffix}`);
  }
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Create a scoped logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>) => {
    if (shouldLog(level)) writeLog({ ts: new Date().toISOString(), level, module, msg, data });
  };
  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}

/**
 * Flatten an unknown thrown value into loggable fields.
 */
export function errorData(err: unknown): Record<string, unknown> {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
