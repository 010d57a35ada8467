import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { isLogLevel, LogLevel } from '../common/logger';
import { isRecord, parseAddress } from '../common/utils';
import { RunRole } from '../types';

export interface HarnessConfig {
  role: RunRole;
  /** `host:port` */
  address: string;
  durationSeconds: number;
  /** Scheduler iterations per second */
  tickRate: number;
  /** Client updates per second */
  sendRate: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<HarnessConfig> = Object.freeze({
  role: 'server',
  address: '127.0.0.1:25570',
  durationSeconds: 10,
  tickRate: 64,
  sendRate: 64,
  logLevel: 'info'
});

/**
 * YAML file layout
 */
export interface YamlHarnessConfig {
  run_type?: string;
  ip?: string;
  duration?: number;
  tick_rate?: number;
  send_rate?: number;
  log_level?: string;
}

const YAML_KEYS: Record<keyof YamlHarnessConfig, keyof HarnessConfig> = {
  run_type: 'role',
  ip: 'address',
  duration: 'durationSeconds',
  tick_rate: 'tickRate',
  send_rate: 'sendRate',
  log_level: 'logLevel'
};

function isYamlKey(key: string): key is keyof YamlHarnessConfig {
  return Object.prototype.hasOwnProperty.call(YAML_KEYS, key);
}

export function isRunRole(value: unknown): value is RunRole {
  return value === 'server' || value === 'client';
}

function requirePositive(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${field} must be a positive number`);
  }
  return value;
}

/**
 * Parse YAML content into a partial configuration
 */
export function parseConfigYaml(content: string): Partial<HarnessConfig> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error('Configuration must be a mapping');
  }

  const config: Partial<HarnessConfig> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isYamlKey(key)) {
      throw new Error(`Unknown configuration key: ${key}`);
    }
    const field = YAML_KEYS[key];
    switch (field) {
      case 'role':
        if (!isRunRole(value)) throw new Error('run_type must be "server" or "client"');
        config.role = value;
        break;
      case 'address':
        if (typeof value !== 'string') throw new Error('ip must be a string');
        config.address = value;
        break;
      case 'logLevel':
        if (!isLogLevel(value)) throw new Error('log_level must be one of debug, info, warn, error');
        config.logLevel = value;
        break;
      case 'durationSeconds':
        config.durationSeconds = requirePositive(value, key);
        break;
      case 'tickRate':
        config.tickRate = requirePositive(value, key);
        break;
      case 'sendRate':
        config.sendRate = requirePositive(value, key);
        break;
    }
  }
  return config;
}

/**
 * Load configuration from YAML file
 */
export async function loadConfigFile(filePath: string): Promise<Partial<HarnessConfig>> {
  try {
    const content = await fs.readFile(filePath, 'utf8');
    return parseConfigYaml(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${errorMessage}`);
  }
}

export function validateConfig(config: HarnessConfig): HarnessConfig {
  if (!isRunRole(config.role)) {
    throw new Error('role must be "server" or "client"');
  }
  parseAddress(config.address);
  requirePositive(config.durationSeconds, 'duration');
  requirePositive(config.tickRate, 'tick rate');
  requirePositive(config.sendRate, 'send rate');
  if (!isLogLevel(config.logLevel)) {
    throw new Error('log level must be one of debug, info, warn, error');
  }
  return config;
}

/**
 * Merge configuration layers, later ones taking precedence, and validate
 */
export function resolveConfig(...layers: Partial<HarnessConfig>[]): HarnessConfig {
  const merged: HarnessConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return validateConfig(merged);
}
