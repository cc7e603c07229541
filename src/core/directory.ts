import * as os from 'os';
import * as path from 'path';
import { CraftPkgDirectories, Installation, InstallablePackageType } from '../types/index.js';
import { DIR_PATTERNS, CRAFTPKG_DIRS, RESOURCE_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Get craftpkg directories using the dotfile convention (~/.craftpkg).
 * CRAFTPKG_HOME replaces the whole root, which tests use to stay out of $HOME.
 */
export function getCraftPkgDirectories(env: NodeJS.ProcessEnv = process.env): CraftPkgDirectories {
  const root = env.CRAFTPKG_HOME && env.CRAFTPKG_HOME.trim().length > 0
    ? path.resolve(env.CRAFTPKG_HOME)
    : path.join(os.homedir(), DIR_PATTERNS.CRAFTPKG);

  return {
    config: root,
    data: root,  // Same directory - follows dotfile convention
    cache: path.join(root, CRAFTPKG_DIRS.CACHE)
  };
}

/**
 * Ensure all craftpkg directories exist
 */
export async function ensureCraftPkgDirectories(
  dirs: CraftPkgDirectories = getCraftPkgDirectories()
): Promise<CraftPkgDirectories> {
  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.data),
      ensureDir(dirs.cache)
    ]);

    logger.debug('craftpkg directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create craftpkg directories', { error, directories: dirs });
    throw error;
  }
}

/**
 * Name of the directory holding resources of the given type,
 * taking archive extensions into account: datapacks and resource packs
 * shipped as .jar archives are loaded from the mods directory.
 */
export function getResourceDirName(packageType: InstallablePackageType, fileName?: string): string {
  if (
    fileName &&
    (packageType === 'datapack' || packageType === 'resourcepack') &&
    isJarName(fileName)
  ) {
    return RESOURCE_DIRS.mod;
  }
  return RESOURCE_DIRS[packageType];
}

/**
 * Absolute resource directory of an installation for a package type
 */
export function getResourceDirectory(
  installation: Installation,
  packageType: InstallablePackageType,
  fileName?: string
): string {
  return path.join(installation.directory, getResourceDirName(packageType, fileName));
}

export function isJarName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith('.jar') || lower.endsWith('.jar.disable');
}
