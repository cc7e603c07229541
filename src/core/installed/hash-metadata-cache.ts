import { join } from 'path';
import type { PackageType } from '../../types/index.js';
import { FILE_PATTERNS, PACKAGE_TYPES } from '../../constants/index.js';
import { exists, readTextFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Persistent hash -> project mapping, so scans can name files without
 * asking the registry again. Stored at <cache>/hashes.json.
 */

export interface HashMetadata {
  projectId: string;
  title?: string;
  packageType?: PackageType;
  recordedAt: string;
}

export interface HashMetadataCache {
  get(hash: string): Promise<HashMetadata | null>;
  set(hash: string, metadata: Omit<HashMetadata, 'recordedAt'>): Promise<void>;
  /** Write pending changes to disk */
  flush(): Promise<void>;
}

interface HashCacheFile {
  version: 1;
  entries: Record<string, HashMetadata>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMetadata(value: unknown): HashMetadata | null {
  if (!isRecord(value) || typeof value.projectId !== 'string') {
    return null;
  }
  const packageType = PACKAGE_TYPES.find(type => type === value.packageType);
  return {
    projectId: value.projectId,
    ...(typeof value.title === 'string' ? { title: value.title } : {}),
    ...(packageType ? { packageType } : {}),
    recordedAt: typeof value.recordedAt === 'string' ? value.recordedAt : new Date(0).toISOString()
  };
}

async function readCacheFile(filePath: string): Promise<Map<string, HashMetadata>> {
  const entries = new Map<string, HashMetadata>();
  if (!(await exists(filePath))) {
    return entries;
  }

  try {
    const content = await readTextFile(filePath);
    const parsed: unknown = JSON.parse(content);
    const rawEntries = isRecord(parsed) && isRecord(parsed.entries) ? parsed.entries : {};
    for (const [hash, value] of Object.entries(rawEntries)) {
      const metadata = toMetadata(value);
      if (metadata) {
        entries.set(hash, metadata);
      }
    }
  } catch (error) {
    logger.warn(`Failed to read cache file at ${filePath}`, { error });
  }
  return entries;
}

export function createHashMetadataCache(cacheDir: string): HashMetadataCache {
  const filePath = join(cacheDir, FILE_PATTERNS.HASH_CACHE_JSON);
  let loading: Promise<Map<string, HashMetadata>> | null = null;
  let dirty = false;

  const load = (): Promise<Map<string, HashMetadata>> => {
    if (!loading) {
      loading = readCacheFile(filePath);
    }
    return loading;
  };

  return {
    async get(hash: string): Promise<HashMetadata | null> {
      const entries = await load();
      return entries.get(hash) ?? null;
    },

    async set(hash: string, metadata: Omit<HashMetadata, 'recordedAt'>): Promise<void> {
      const entries = await load();
      const existing = entries.get(hash);
      if (existing && existing.projectId === metadata.projectId && existing.packageType === metadata.packageType) {
        return;
      }
      entries.set(hash, { ...metadata, recordedAt: new Date().toISOString() });
      dirty = true;
    },

    async flush(): Promise<void> {
      if (!dirty) {
        return;
      }
      const entries = await load();
      const data: HashCacheFile = { version: 1, entries: Object.fromEntries(entries) };
      dirty = false;
      await writeJsonFile(filePath, data);
      logger.debug(`Saved hash metadata for ${entries.size} file(s)`, { filePath });
    }
  };
}
