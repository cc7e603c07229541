/**
 * Shared constants for craftpkg
 * This file provides a single source of truth for directory names,
 * file patterns, and other constants used throughout the application.
 */

import type { InstallablePackageType, PackageType } from '../types/index.js';

export const DIR_PATTERNS = {
  CRAFTPKG: '.craftpkg'
} as const;

export const CRAFTPKG_DIRS = {
  CACHE: 'cache'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  INSTALLATIONS_YML: 'installations.yml',
  HASH_CACHE_JSON: 'hashes.json',
  PART_SUFFIX: '.part',
  /** Reserved suffix marking a resource file as disabled */
  DISABLED_SUFFIX: '.disable',
  /** Globs for content files inside a resource directory */
  CONTENT_FILES: ['*.jar', '*.zip', '*.jar.disable', '*.zip.disable']
} as const;

export const PACKAGE_TYPES: readonly PackageType[] = ['mod', 'datapack', 'shader', 'resourcepack', 'modpack'];

export const INSTALLABLE_PACKAGE_TYPES: readonly InstallablePackageType[] = ['mod', 'datapack', 'shader', 'resourcepack'];

/**
 * Resource directory (relative to the installation directory) per package type.
 */
export const RESOURCE_DIRS: Record<InstallablePackageType, string> = {
  mod: 'mods',
  datapack: 'datapacks',
  shader: 'shaderpacks',
  resourcepack: 'resourcepacks'
};

export const LOADERS = {
  VANILLA: 'vanilla',
  /** Loader tag the registry uses for datapack releases */
  DATAPACK: 'datapack',
  /** Loader tag the registry uses for vanilla resource pack releases */
  MINECRAFT: 'minecraft'
} as const;

/** Project id prefixes of files that were not installed from the registry */
export const LOCAL_PROJECT_PREFIXES = ['local_', 'file_'] as const;

export const DEFAULTS = {
  VERSION: '0.1.0',
  REGISTRY_BASE_URL: 'https://api.modrinth.com/v2',
  USER_AGENT: 'craftpkg/0.1.0',
  CONCURRENCY: 64,
  RETRIES: 2,
  SCAN_PAGE_SIZE: 200
} as const;
