/**
 * Enable/disable state of a resource file is carried by its name alone:
 * `<name>.disable` is disabled, `<name>` is enabled. Renaming between the two
 * is the whole toggle, so an interrupted toggle leaves a valid state behind.
 */

import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, renamePath } from '../../utils/fs.js';
import { ResourceNotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const SUFFIX = FILE_PATTERNS.DISABLED_SUFFIX;

export function isDisabledName(fileName: string): boolean {
  return fileName.endsWith(SUFFIX) && fileName.length > SUFFIX.length;
}

export function toDisabledName(fileName: string): string {
  return isDisabledName(fileName) ? fileName : `${fileName}${SUFFIX}`;
}

export function toEnabledName(fileName: string): string {
  return isDisabledName(fileName) ? fileName.slice(0, -SUFFIX.length) : fileName;
}

export function toggleName(fileName: string): string {
  return isDisabledName(fileName) ? toEnabledName(fileName) : toDisabledName(fileName);
}

/**
 * Locate a resource by its enabled name, checking both variants on disk.
 * Returns the name currently present, or null.
 */
export async function findPresentName(directory: string, fileName: string): Promise<string | null> {
  const enabled = toEnabledName(fileName);
  if (await exists(join(directory, enabled))) {
    return enabled;
  }
  const disabled = toDisabledName(enabled);
  if (await exists(join(directory, disabled))) {
    return disabled;
  }
  return null;
}

export interface ToggleResult {
  previousName: string;
  fileName: string;
  disabled: boolean;
}

/**
 * Rename a resource file to its other state.
 * `fileName` may be given in either variant; the one present on disk is toggled.
 */
export async function toggleResourceFile(directory: string, fileName: string): Promise<ToggleResult> {
  if (fileName.trim().length === 0 || fileName === SUFFIX) {
    throw new ValidationError('file name is required to toggle a resource');
  }

  const presentName = await findPresentName(directory, fileName);
  if (!presentName) {
    throw new ResourceNotFoundError(`file '${toEnabledName(fileName)}' in ${directory}`);
  }

  const nextName = toggleName(presentName);
  if (await exists(join(directory, nextName))) {
    throw new ValidationError(`both '${presentName}' and '${nextName}' exist in ${directory}`);
  }

  await renamePath(join(directory, presentName), join(directory, nextName));
  logger.info(`Toggled ${presentName} -> ${nextName}`);

  return {
    previousName: presentName,
    fileName: nextName,
    disabled: isDisabledName(nextName)
  };
}
