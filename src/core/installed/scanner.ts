/**
 * Resource directory scanner.
 *
 * Lists the content files of one resource directory, hashes them in pages
 * (yielding to the event loop between pages) and names each file's project
 * from the hash metadata cache, falling back to a registry hash lookup.
 * Files nobody can identify get a `file_` id derived from their name.
 */

import { join, extname } from 'path';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { minimatch } from 'minimatch';
import type { InstalledEntry, InstallablePackageType } from '../../types/index.js';
import type { ContentRegistryClient } from '../registry/registry-client.js';
import type { HashMetadataCache } from './hash-metadata-cache.js';
import { DEFAULTS, FILE_PATTERNS } from '../../constants/index.js';
import { listEntries, type DirectoryEntry } from '../../utils/fs.js';
import { sha1File } from '../../utils/hash.js';
import { isAbortError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isDisabledName, toEnabledName } from '../resources/disable-toggle.js';
import { isJarName } from '../directory.js';

export interface ScanOptions {
  pageSize?: number;
  metadata?: HashMetadataCache;
  /** Used to identify files missing from the metadata cache */
  registry?: ContentRegistryClient;
  signal?: AbortSignal;
}

/** Pack types that may also be unpacked into a folder */
const FOLDER_PACK_TYPES: readonly InstallablePackageType[] = ['shader', 'resourcepack', 'datapack'];

export function isContentFileName(fileName: string): boolean {
  return FILE_PATTERNS.CONTENT_FILES.some(pattern => minimatch(fileName, pattern, { nocase: true, dot: false }));
}

/**
 * Local id for a file the registry does not know
 */
export function localProjectId(fileName: string): string {
  const enabled = toEnabledName(fileName);
  const base = enabled.slice(0, enabled.length - extname(enabled).length) || enabled;
  return `file_${base.toLowerCase().replace(/[^a-z0-9._-]+/g, '-')}`;
}

async function identify(
  hash: string,
  packageType: InstallablePackageType,
  options: ScanOptions
): Promise<string | undefined> {
  const cached = await options.metadata?.get(hash);
  if (cached) {
    return cached.projectId;
  }
  if (!options.registry) {
    return undefined;
  }

  try {
    const release = await options.registry.fetchReleaseByHash(hash, options.signal);
    if (release) {
      await options.metadata?.set(hash, { projectId: release.projectId, packageType });
      return release.projectId;
    }
  } catch (error) {
    if (isAbortError(error)) throw error;
    logger.warn(`Hash lookup failed for ${hash}: ${describeError(error)}`, { error });
  }
  return undefined;
}

async function scanFile(
  directory: string,
  entry: DirectoryEntry,
  packageType: InstallablePackageType,
  options: ScanOptions
): Promise<InstalledEntry | null> {
  let hash: string;
  try {
    hash = await sha1File(join(directory, entry.name));
  } catch (error) {
    logger.warn(`Skipping unreadable file ${entry.name}`, { directory, error });
    return null;
  }

  const projectId = (await identify(hash, packageType, options)) ?? localProjectId(entry.name);
  return {
    hash,
    projectId,
    fileName: entry.name,
    disabled: isDisabledName(entry.name)
  };
}

async function listOrEmpty(directory: string): Promise<DirectoryEntry[]> {
  try {
    return await listEntries(directory);
  } catch (error) {
    logger.debug(`Resource directory not readable, treating as empty: ${directory}`, { error });
    return [];
  }
}

/** Run fn over items a page at a time, yielding to the event loop between pages */
async function mapInPages<T, R>(
  items: readonly T[],
  options: ScanOptions,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const pageSize = Math.max(1, options.pageSize ?? DEFAULTS.SCAN_PAGE_SIZE);
  const results: R[] = [];
  for (let start = 0; start < items.length; start += pageSize) {
    options.signal?.throwIfAborted();
    results.push(...(await Promise.all(items.slice(start, start + pageSize).map(fn))));
    if (start + pageSize < items.length) {
      await yieldToLoop();
    }
  }
  return results;
}

/**
 * Scan one resource directory. A missing or unreadable directory yields an
 * empty list.
 */
export async function scanInstalled(
  directory: string,
  packageType: InstallablePackageType,
  options: ScanOptions = {}
): Promise<InstalledEntry[]> {
  const entries = await listOrEmpty(directory);

  const files = entries
    .filter(entry => entry.isFile && isContentFileName(entry.name))
    .sort((a, b) => a.name.localeCompare(b.name));

  const folders: InstalledEntry[] = FOLDER_PACK_TYPES.includes(packageType)
    ? entries
        .filter(entry => entry.isDirectory)
        .sort((a, b) => a.name.localeCompare(b.name))
        .map(entry => ({
          hash: '',
          projectId: localProjectId(entry.name),
          fileName: entry.name,
          disabled: isDisabledName(entry.name)
        }))
    : [];

  const results = await mapInPages(files, options, entry => scanFile(directory, entry, packageType, options));
  const scanned = results.filter((result): result is InstalledEntry => result !== null);

  try {
    await options.metadata?.flush();
  } catch (error) {
    logger.warn('Failed to save hash metadata after scan', { error });
  }
  logger.debug(`Scanned ${scanned.length} file(s) and ${folders.length} folder(s) in ${directory}`);
  return [...scanned, ...folders];
}

/**
 * Datapacks and resource packs shipped as .jar live among the mods. Only
 * jars the metadata cache records under the requested type are returned;
 * the registry is not asked, since the mods scan already identifies them.
 */
export async function scanArchivedPacks(
  modsDirectory: string,
  packageType: InstallablePackageType,
  options: ScanOptions = {}
): Promise<InstalledEntry[]> {
  const { metadata } = options;
  if (!metadata) {
    return [];
  }

  const jars = (await listOrEmpty(modsDirectory))
    .filter(entry => entry.isFile && isJarName(entry.name))
    .sort((a, b) => a.name.localeCompare(b.name));

  const results = await mapInPages(jars, options, async (entry): Promise<InstalledEntry | null> => {
    let hash: string;
    try {
      hash = await sha1File(join(modsDirectory, entry.name));
    } catch (error) {
      logger.warn(`Skipping unreadable file ${entry.name}`, { directory: modsDirectory, error });
      return null;
    }
    const recorded = await metadata.get(hash);
    if (recorded?.packageType !== packageType) {
      return null;
    }
    return { hash, projectId: recorded.projectId, fileName: entry.name, disabled: isDisabledName(entry.name) };
  });

  const found = results.filter((result): result is InstalledEntry => result !== null);
  logger.debug(`Found ${found.length} ${packageType} archive(s) in ${modsDirectory}`);
  return found;
}
