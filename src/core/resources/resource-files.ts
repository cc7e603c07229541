import { join } from 'path';
import type { Installation, InstallablePackageType } from '../../types/index.js';
import { getResourceDirectory } from '../directory.js';
import { remove } from '../../utils/fs.js';
import { sha1File } from '../../utils/hash.js';
import { ResourceNotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { findPresentName, toDisabledName, toEnabledName } from './disable-toggle.js';

export interface LocatedResourceFile {
  directory: string;
  /** Name currently on disk (enabled or disabled form) */
  fileName: string;
  path: string;
}

/**
 * Find a tracked resource file in an installation, in either of its names
 */
export async function locateResourceFile(
  installation: Installation,
  packageType: InstallablePackageType,
  fileName: string
): Promise<LocatedResourceFile | null> {
  const directory = getResourceDirectory(installation, packageType, fileName);
  const present = await findPresentName(directory, fileName);
  if (!present) {
    return null;
  }
  return { directory, fileName: present, path: join(directory, present) };
}

/**
 * Hash of a file, or undefined for folders and unreadable files
 */
export async function tryHashFile(path: string): Promise<string | undefined> {
  try {
    return await sha1File(path);
  } catch (error) {
    logger.debug(`Could not hash ${path}`, { error });
    return undefined;
  }
}

/**
 * Delete a resource file. Fails when the name is empty or no variant of the
 * file exists; removal errors surface as FileSystemError.
 */
export async function deleteResourceFile(
  installation: Installation,
  packageType: InstallablePackageType,
  fileName: string | undefined
): Promise<{ fileName: string; hash?: string }> {
  if (!fileName || fileName.trim().length === 0) {
    throw new ValidationError('file name is required to delete a resource');
  }

  const located = await locateResourceFile(installation, packageType, fileName);
  if (!located) {
    throw new ResourceNotFoundError(`file '${toEnabledName(fileName)}' in ${installation.name}`);
  }

  const hash = await tryHashFile(located.path);
  await remove(located.path);
  logger.info(`Deleted ${located.path}`);
  return { fileName: located.fileName, ...(hash ? { hash } : {}) };
}

/**
 * Remove both the enabled and disabled variants of a file, if present
 */
export async function removeFileVariants(directory: string, fileName: string): Promise<void> {
  const enabled = toEnabledName(fileName);
  await remove(join(directory, enabled));
  await remove(join(directory, toDisabledName(enabled)));
}
