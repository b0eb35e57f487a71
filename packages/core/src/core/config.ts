import { join } from 'path';
import { DepsourceConfig } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

/**
 * Configuration management for depsource
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const DEFAULT_CONFIG: DepsourceConfig = {};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPositiveInteger(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Config field '${key}' must be a positive integer`, { key, value });
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`Config field '${key}' must be a non-empty string`, { key, value });
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Config field '${key}' must be a list of strings`, { key, value });
  }
  return value;
}

/**
 * Validate a parsed config document. Unknown keys are ignored.
 */
export function parseDepsourceConfig(raw: unknown): DepsourceConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration structure: expected an object');
  }
  const config: DepsourceConfig = { ...DEFAULT_CONFIG };
  const downloadTimeoutMs = readPositiveInteger(raw, 'downloadTimeoutMs');
  const updateConcurrency = readPositiveInteger(raw, 'updateConcurrency');
  const platformTags = readStringList(raw, 'platformTags');
  const defaultSourcesListUrl = readString(raw, 'defaultSourcesListUrl');
  const gbpdistroTargetsUrl = readString(raw, 'gbpdistroTargetsUrl');

  if (downloadTimeoutMs !== undefined) config.downloadTimeoutMs = downloadTimeoutMs;
  if (updateConcurrency !== undefined) config.updateConcurrency = updateConcurrency;
  if (platformTags !== undefined) config.platformTags = platformTags;
  if (defaultSourcesListUrl !== undefined) config.defaultSourcesListUrl = defaultSourcesListUrl;
  if (gbpdistroTargetsUrl !== undefined) config.gbpdistroTargetsUrl = gbpdistroTargetsUrl;
  return config;
}

class ConfigManager {
  private config: DepsourceConfig | null = null;
  private readonly configDir: string;

  constructor(configDir: string) {
    this.configDir = configDir;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file; a missing file means defaults
   */
  async load(): Promise<DepsourceConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    try {
      logger.debug(`Loading config from: ${configPath}`);
      this.config = parseDepsourceConfig(await readJsonOrJsoncFile(configPath));
      return this.config;
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(`${configPath}: ${error.message}`, error.details);
      }
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`, { configPath });
    }
  }

  /**
   * Get a configuration value
   */
  async get<K extends keyof DepsourceConfig>(key: K): Promise<DepsourceConfig[K]> {
    const config = await this.load();
    return config[key];
  }
}

export { ConfigManager };
