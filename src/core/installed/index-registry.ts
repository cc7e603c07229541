import { join } from 'path';
import type { Installation, InstallablePackageType, InstalledEntry } from '../../types/index.js';
import type { ContentRegistryClient } from '../registry/registry-client.js';
import type { HashMetadataCache } from './hash-metadata-cache.js';
import { InstalledContentIndex } from './installed-content-index.js';
import { scanArchivedPacks, scanInstalled, type ScanOptions } from './scanner.js';
import { getResourceDirectory } from '../directory.js';
import { RESOURCE_DIRS } from '../../constants/index.js';

export interface InstalledIndexRegistryOptions {
  pageSize?: number;
  metadata?: HashMetadataCache;
  /** Registry used to identify files the metadata cache does not know */
  registry?: ContentRegistryClient;
}

/**
 * Hands out one InstalledContentIndex per (installation, package type), so
 * repeated "is installed" checks reuse the cached scan.
 */
export class InstalledIndexRegistry {
  private readonly indexes = new Map<string, InstalledContentIndex>();

  constructor(private readonly options: InstalledIndexRegistryOptions = {}) {}

  get(installation: Installation, packageType: InstallablePackageType): InstalledContentIndex {
    const directory = getResourceDirectory(installation, packageType);
    const key = `${directory}|${packageType}`;
    let index = this.indexes.get(key);
    if (!index) {
      index = new InstalledContentIndex(directory, packageType, signal =>
        this.scan(installation, packageType, { ...this.options, ...(signal ? { signal } : {}) })
      );
      this.indexes.set(key, index);
    }
    return index;
  }

  /** Get the index for a pair, scanning it first when it has never been scanned */
  async load(
    installation: Installation,
    packageType: InstallablePackageType,
    signal?: AbortSignal
  ): Promise<InstalledContentIndex> {
    const index = this.get(installation, packageType);
    await index.ensureScanned(signal);
    return index;
  }

  private async scan(
    installation: Installation,
    packageType: InstallablePackageType,
    options: ScanOptions
  ): Promise<InstalledEntry[]> {
    const entries = await scanInstalled(getResourceDirectory(installation, packageType), packageType, options);
    if (packageType !== 'datapack' && packageType !== 'resourcepack') {
      return entries;
    }
    const modsDirectory = join(installation.directory, RESOURCE_DIRS.mod);
    return [...entries, ...(await scanArchivedPacks(modsDirectory, packageType, options))];
  }

  /** Forget every cached scan */
  clear(): void {
    this.indexes.clear();
  }
}
