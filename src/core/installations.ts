import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { CraftPkgDirectories, Installation, InstallationMode } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { ConfigError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getCraftPkgDirectories } from './directory.js';

/**
 * Game installations are declared in installations.yml:
 *
 *   installations:
 *     - name: fabric-main
 *       gameVersion: "1.20.1"
 *       loader: fabric
 *       loaderVersion: "0.15.11"
 *       directory: ~/games/fabric-main
 *       mode: local
 *
 * The file is read-only for craftpkg. All scalars are read as strings so
 * versions such as 1.20 keep their trailing zero.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredString(entry: Record<string, unknown>, key: string, label: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Installation ${label}: '${key}' is required`);
  }
  return value.trim();
}

function parseMode(value: unknown, label: string): InstallationMode {
  if (value === undefined || value === 'local') {
    return { kind: 'local' };
  }
  if (value === 'remote') {
    return { kind: 'remote' };
  }
  throw new ConfigError(`Installation ${label}: 'mode' must be 'local' or 'remote'`);
}

function resolveDirectory(directory: string, baseDir: string): string {
  if (directory === '~' || directory.startsWith('~/')) {
    return path.join(os.homedir(), directory.slice(1));
  }
  return path.resolve(baseDir, directory);
}

/**
 * Parse installations.yml content. Relative directories resolve against baseDir.
 */
export function parseInstallations(content: string, baseDir: string): Installation[] {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new ConfigError(`Failed to parse ${FILE_PATTERNS.INSTALLATIONS_YML}: ${error}`, { error });
  }

  if (parsed === undefined || parsed === null) {
    return [];
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${FILE_PATTERNS.INSTALLATIONS_YML} must contain a mapping`);
  }

  const list = parsed.installations ?? [];
  if (!Array.isArray(list)) {
    throw new ConfigError(`${FILE_PATTERNS.INSTALLATIONS_YML}: 'installations' must be a list`);
  }

  const seen = new Set<string>();
  return list.map((entry: unknown, index: number): Installation => {
    const fallbackLabel = `#${index + 1}`;
    if (!isRecord(entry)) {
      throw new ConfigError(`Installation ${fallbackLabel} must be a mapping`);
    }
    const name = requiredString(entry, 'name', fallbackLabel);
    const label = `'${name}'`;
    if (seen.has(name)) {
      throw new ConfigError(`Installation ${label} is declared more than once`);
    }
    seen.add(name);

    const loaderVersion = entry.loaderVersion;
    return {
      name,
      gameVersion: requiredString(entry, 'gameVersion', label),
      loader: requiredString(entry, 'loader', label).toLowerCase(),
      ...(typeof loaderVersion === 'string' && loaderVersion.length > 0 ? { loaderVersion } : {}),
      directory: resolveDirectory(requiredString(entry, 'directory', label), baseDir),
      mode: parseMode(entry.mode, label)
    };
  });
}

/**
 * Read access to the configured game installations
 */
export class InstallationRepository {
  private installations: Installation[] | null = null;
  private readonly filePath: string;

  constructor(dirs: CraftPkgDirectories = getCraftPkgDirectories()) {
    this.filePath = path.join(dirs.config, FILE_PATTERNS.INSTALLATIONS_YML);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async list(): Promise<Installation[]> {
    if (this.installations) {
      return this.installations;
    }

    if (!(await exists(this.filePath))) {
      logger.debug(`No installations file at ${this.filePath}`);
      this.installations = [];
      return this.installations;
    }

    const content = await readTextFile(this.filePath);
    this.installations = parseInstallations(content, path.dirname(this.filePath));
    logger.debug(`Loaded ${this.installations.length} installation(s)`, { file: this.filePath });
    return this.installations;
  }

  async find(name: string): Promise<Installation | undefined> {
    const installations = await this.list();
    return installations.find(installation => installation.name === name);
  }

  /**
   * Look up an installation by name; a missing or unknown name is a validation failure.
   */
  async require(name: string | undefined): Promise<Installation> {
    if (!name || name.trim().length === 0) {
      throw new ValidationError('no target installation selected (use --installation <name>)');
    }
    const installation = await this.find(name.trim());
    if (!installation) {
      const known = (await this.list()).map(i => i.name);
      throw new ValidationError(
        `unknown installation '${name}'`,
        { known, file: this.filePath }
      );
    }
    return installation;
  }
}
