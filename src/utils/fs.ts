import { promises as fs, type Stats } from 'fs';
import { basename, dirname, join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system helpers. Every failure other than "not there" is raised as a
 * FileSystemError carrying the path involved.
 */

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await fs.stat(path);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw new FileSystemError(`Failed to stat: ${path}`, { path, error });
  }
}

export async function exists(path: string): Promise<boolean> {
  return (await statOrNull(path)) !== null;
}

export async function isFile(path: string): Promise<boolean> {
  return (await statOrNull(path))?.isFile() ?? false;
}

export async function getFileSize(path: string): Promise<number> {
  const stats = await statOrNull(path);
  if (!stats) {
    throw new FileSystemError(`No such file: ${path}`, { path });
  }
  return stats.size;
}

export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write a text file through a temporary sibling that is renamed over the
 * target, so the target is either the old or the new content.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const temporary = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(temporary, content, 'utf8');
    await fs.rename(temporary, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/** Remove a file or directory tree; a missing path is not an error */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

export interface DirectoryEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Entries of a directory, without OS junk such as .DS_Store or Thumbs.db
 */
export async function listEntries(dirPath: string): Promise<DirectoryEntry[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => !isJunk(entry.name))
      .map(entry => ({
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory()
      }));
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}

export async function renamePath(srcPath: string, destPath: string): Promise<void> {
  try {
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

/**
 * Parse a JSON file that may contain comments and trailing commas.
 * Callers validate the returned shape.
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  const [first] = errors;
  if (first) {
    throw new FileSystemError(
      `Invalid JSON in ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { path, errors }
    );
  }
  return result;
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFileAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
}
