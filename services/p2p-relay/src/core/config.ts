/**
 * Config loader: reads relay.config.yaml and provides typed access.
 * Environment variables override the file for the common deployment knobs.
 */

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';

// ── Config types ─────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  port: number;
  host: string;
  body_limit: string;      // express.json limit, e.g. "1mb"
  allowed_origins: string[]; // CORS origins; ["*"] allows any
}

export interface QueueConfig {
  max_messages_per_user: number;
  retention_hours: number;
  cleanup_interval: string; // e.g. "1h"
}

export interface HeartbeatConfig {
  interval: string;        // sweep period, e.g. "30s"
  timeout: string;         // idle threshold, e.g. "60s"
}

export interface LogRotationConfig {
  max_size_mb: number;
  max_files: number;
}

export interface LoggingConfig {
  level: LogLevel;
  dir: string;
  to_file: boolean;
  rotation: LogRotationConfig;
}

export interface RelayConfig {
  server: ServerConfig;
  queue: QueueConfig;
  heartbeat: HeartbeatConfig;
  logging: LoggingConfig;
}

export const CONFIG_FILE = 'relay.config.yaml';

// ── Defaults ─────────────────────────────────────────────────

export const DEFAULTS: RelayConfig = {
  server: { port: 3000, host: '0.0.0.0', body_limit: '1mb', allowed_origins: ['*'] },
  queue: { max_messages_per_user: 1000, retention_hours: 168, cleanup_interval: '1h' },
  heartbeat: { interval: '30s', timeout: '60s' },
  logging: {
    level: 'info',
    dir: 'logs',
    to_file: true,
    rotation: { max_size_mb: 10, max_files: 5 },
  },
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ── Helpers ──────────────────────────────────────────────────

/**
 * Parse an interval string like "3m", "15m", "1h", "30s" into milliseconds.
 */
export function parseInterval(interval: string): number {
  const match = interval.match(/^(\d+)(s|m|h)$/);
  if (!match) throw new Error(`Invalid interval format: "${interval}" (use e.g. "3m", "30s", "1h")`);
  const [, num, unit] = match;
  const value = parseInt(num ?? '', 10);
  switch (unit) {
    case 's': return value * 1000;
    case 'm': return value * 60 * 1000;
    case 'h': return value * 60 * 60 * 1000;
    default: throw new Error(`Unknown unit: ${unit}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values override target.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isRecord(value)) throw new Error(`Config section "${key}" must be a mapping`);
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, where: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`Config value ${where}.${key} must be a non-negative number`);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Config value ${where}.${key} must be a non-empty string`);
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string, where: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`Config value ${where}.${key} must be a non-empty list of strings`);
  }
  const list: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || item.length === 0) {
      throw new Error(`Config value ${where}.${key} must be a non-empty list of strings`);
    }
    list.push(item);
  }
  return list;
}

function readBoolean(raw: Record<string, unknown>, key: string, where: string): boolean {
  const value = raw[key];
  if (typeof value !== 'boolean') throw new Error(`Config value ${where}.${key} must be true or false`);
  return value;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLevel(raw: Record<string, unknown>): LogLevel {
  const value = raw.level;
  if (!isLogLevel(value)) throw new Error(`Config value logging.level must be one of ${LOG_LEVELS.join(', ')}`);
  return value;
}

/**
 * Validate a merged raw object into a typed config. Interval strings are
 * checked here so a bad value fails at startup rather than at first sweep.
 */
function validate(raw: Record<string, unknown>): RelayConfig {
  const server = section(raw, 'server');
  const queue = section(raw, 'queue');
  const heartbeat = section(raw, 'heartbeat');
  const logging = section(raw, 'logging');
  const rotation = section(logging, 'rotation');

  const config: RelayConfig = {
    server: {
      port: readNumber(server, 'port', 'server'),
      host: readString(server, 'host', 'server'),
      body_limit: readString(server, 'body_limit', 'server'),
      allowed_origins: readStringList(server, 'allowed_origins', 'server'),
    },
    queue: {
      max_messages_per_user: readNumber(queue, 'max_messages_per_user', 'queue'),
      retention_hours: readNumber(queue, 'retention_hours', 'queue'),
      cleanup_interval: readString(queue, 'cleanup_interval', 'queue'),
    },
    heartbeat: {
      interval: readString(heartbeat, 'interval', 'heartbeat'),
      timeout: readString(heartbeat, 'timeout', 'heartbeat'),
    },
    logging: {
      level: readLevel(logging),
      dir: readString(logging, 'dir', 'logging'),
      to_file: readBoolean(logging, 'to_file', 'logging'),
      rotation: {
        max_size_mb: readNumber(rotation, 'max_size_mb', 'logging.rotation'),
        max_files: readNumber(rotation, 'max_files', 'logging.rotation'),
      },
    },
  };

  if (config.queue.max_messages_per_user < 1) {
    throw new Error('Config value queue.max_messages_per_user must be at least 1');
  }
  parseInterval(config.queue.cleanup_interval);
  parseInterval(config.heartbeat.interval);
  parseInterval(config.heartbeat.timeout);

  return config;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new Error(`Environment variable ${name} must be an integer, got "${value}"`);
  return parsed;
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const items = (env[name] ?? '').split(',').map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    server: {
      port: envInt(env, 'PORT'),
      host: env.HOST || undefined,
      allowed_origins: envList(env, 'ALLOWED_ORIGINS'),
    },
    queue: {
      max_messages_per_user: envInt(env, 'MAX_OFFLINE_MESSAGES'),
      retention_hours: envInt(env, 'MESSAGE_RETENTION_HOURS'),
    },
    logging: { level: env.LOG_LEVEL || undefined },
  };
}

// ── Loader ───────────────────────────────────────────────────

/**
 * Load config from relay.config.yaml in projectDir, falling back to defaults
 * when the file is absent. Env overrides are applied last.
 */
export function loadConfig(projectDir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const configPath = path.join(projectDir, CONFIG_FILE);
  let merged = deepMerge({}, Object.fromEntries(Object.entries(DEFAULTS)));

  if (fs.existsSync(configPath)) {
    const parsed: unknown = yaml.load(fs.readFileSync(configPath, 'utf8'));
    if (parsed !== undefined && parsed !== null) {
      if (!isRecord(parsed)) throw new Error(`${configPath} must contain a YAML mapping`);
      merged = deepMerge(merged, parsed);
    }
  }

  return validate(deepMerge(merged, envOverrides(env)));
}
