import { join } from 'path';
import { CraftPkgConfig, CraftPkgDirectories, InstallPolicy } from '../types/index.js';
import { readJsoncFile, writeJsonFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { DEFAULTS, FILE_PATTERNS } from '../constants/index.js';
import { getCraftPkgDirectories } from './directory.js';

/**
 * Configuration management for the craftpkg CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];
const DEFAULT_CONFIG_FILE = FILE_PATTERNS.CONFIG_JSONC; // Use JSONC by default for new configs

export const INSTALL_POLICIES: readonly InstallPolicy[] = ['auto', 'manual', 'main-only'];

export function createDefaultConfig(): CraftPkgConfig {
  return {
    registry: {
      baseUrl: DEFAULTS.REGISTRY_BASE_URL,
      userAgent: DEFAULTS.USER_AGENT
    },
    downloads: {
      concurrency: DEFAULTS.CONCURRENCY,
      retries: DEFAULTS.RETRIES
    },
    dependencies: {
      policy: 'manual'
    },
    scan: {
      pageSize: DEFAULTS.SCAN_PAGE_SIZE
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration: '${key}' must be an object`);
  }
  return value;
}

function stringValue(raw: Record<string, unknown>, key: string, path: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Invalid configuration: '${path}' must be a non-empty string`);
  }
  return value;
}

function integerValue(raw: Record<string, unknown>, key: string, path: string, fallback: number, min: number): number {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid configuration: '${path}' must be a number`);
  }
  return Math.max(min, Math.floor(value));
}

export function isInstallPolicy(value: unknown): value is InstallPolicy {
  return typeof value === 'string' && INSTALL_POLICIES.some(policy => policy === value);
}

/**
 * Merge file values over the defaults, validating every known key.
 * Unknown keys are ignored.
 */
export function parseConfig(raw: unknown): CraftPkgConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration structure');
  }

  const defaults = createDefaultConfig();
  const registry = section(raw, 'registry');
  const downloads = section(raw, 'downloads');
  const dependencies = section(raw, 'dependencies');
  const scan = section(raw, 'scan');

  const policy = dependencies.policy ?? defaults.dependencies.policy;
  if (!isInstallPolicy(policy)) {
    throw new ConfigError(
      `Invalid configuration: 'dependencies.policy' must be one of ${INSTALL_POLICIES.join(', ')}`
    );
  }

  return {
    registry: {
      baseUrl: stringValue(registry, 'baseUrl', 'registry.baseUrl', defaults.registry.baseUrl).replace(/\/+$/, ''),
      userAgent: stringValue(registry, 'userAgent', 'registry.userAgent', defaults.registry.userAgent)
    },
    downloads: {
      concurrency: integerValue(downloads, 'concurrency', 'downloads.concurrency', defaults.downloads.concurrency, 1),
      retries: integerValue(downloads, 'retries', 'downloads.retries', defaults.downloads.retries, 0)
    },
    dependencies: {
      policy
    },
    scan: {
      pageSize: integerValue(scan, 'pageSize', 'scan.pageSize', defaults.scan.pageSize, 1)
    }
  };
}

/**
 * Loads config.jsonc (or config.json) from the craftpkg home. A missing file
 * is created with the defaults so users have something to edit.
 */
export class ConfigManager {
  private config: CraftPkgConfig | null = null;

  constructor(private readonly dirs: CraftPkgDirectories = getCraftPkgDirectories()) {}

  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  async load(): Promise<CraftPkgConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      const defaults = createDefaultConfig();
      const target = join(this.dirs.config, DEFAULT_CONFIG_FILE);
      logger.debug(`No config file, writing defaults to ${target}`);
      try {
        await writeJsonFile(target, defaults);
      } catch (error) {
        throw new ConfigError(`Failed to write default configuration: ${describeError(error)}`, { error });
      }
      this.config = defaults;
      return defaults;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to read ${configPath}: ${describeError(error)}`, { error });
    }
    this.config = parseConfig(raw);
    return this.config;
  }
}
