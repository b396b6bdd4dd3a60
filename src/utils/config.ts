import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'fs';
import {
  EngineConfig,
  ResolvedConfig,
  DEFAULT_CONFIG,
  VALID_CONFIG_KEYS,
  ConfigKey,
  NumericConfigKey,
} from '../types/config';
import { logger } from './logger';

/**
 * Get the data directory
 * Respects FOCUS_ANALYTICS_DATA_DIR environment variable
 */
export function getDataDir(): string {
  const customDir = process.env.FOCUS_ANALYTICS_DATA_DIR;

  if (customDir) {
    return customDir;
  }

  return join(homedir(), '.local', 'share', 'focus-analytics');
}

export function getConfigDir(): string {
  return join(homedir(), '.config', 'focus-analytics');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getDatabasePath(): string {
  return join(getDataDir(), 'analytics.db');
}

export function ensureDataDir(): void {
  const dataDir = getDataDir();

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }
}

/**
 * Fill in defaults and drop values that would break the engine
 */
export function resolveConfig(partial: EngineConfig = {}): ResolvedConfig {
  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };

  for (const key of VALID_CONFIG_KEYS) {
    const value = partial[key];
    if (value === undefined) {
      continue;
    }

    if (key === 'reportFormat') {
      if (value === 'terminal' || value === 'json') {
        resolved.reportFormat = value;
      } else {
        logger.warning(`Ignoring invalid ${key}: ${String(value)}`);
      }
      continue;
    }

    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      resolved[key] = value;
    } else {
      logger.warning(`Ignoring invalid ${key}: ${String(value)}`);
    }
  }

  return resolved;
}

/**
 * Load user configuration
 * Returns default config if file doesn't exist or is invalid
 */
export function loadConfig(): ResolvedConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const contents = readFileSync(configPath, 'utf-8');
    const parsed: EngineConfig = JSON.parse(contents);
    return resolveConfig(parsed);
  } catch (error) {
    logger.warning(`Could not parse config file, using defaults: ${error}`);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save user configuration
 * Only non-default values are written
 */
export function saveConfig(config: EngineConfig): void {
  ensureConfigDir();
  const resolved = resolveConfig(config);

  const toSave: EngineConfig = {};
  for (const key of VALID_CONFIG_KEYS) {
    if (resolved[key] !== DEFAULT_CONFIG[key]) {
      Object.assign(toSave, { [key]: resolved[key] });
    }
  }

  writeFileSync(getConfigPath(), JSON.stringify(toSave, null, 2) + '\n', 'utf-8');
}

export function isValidConfigKey(key: string): key is ConfigKey {
  return (VALID_CONFIG_KEYS as readonly string[]).includes(key);
}

export function isNumericConfigKey(key: ConfigKey): key is NumericConfigKey {
  return key !== 'reportFormat';
}

/**
 * Validate a config value for a given key
 */
export function isValidConfigValue(key: ConfigKey, value: string): boolean {
  if (key === 'reportFormat') {
    return value === 'terminal' || value === 'json';
  }

  if (!/^\d+$/.test(value)) {
    return false;
  }
  return parseInt(value, 10) > 0;
}

/**
 * Apply a validated string value to a config object
 */
export function withConfigValue(config: EngineConfig, key: ConfigKey, value: string): EngineConfig {
  if (!isNumericConfigKey(key)) {
    return { ...config, reportFormat: value === 'json' ? 'json' : 'terminal' };
  }
  const next: EngineConfig = { ...config };
  next[key] = parseInt(value, 10);
  return next;
}
