/**
 * Update detection for installed resources.
 *
 * The installed file's hash is compared with the primary file of the default
 * compatible release. Files that were not installed from the registry
 * (`local_` and `file_` ids) never report an update.
 */

import type { Installation, InstallablePackageType, Project } from '../../types/index.js';
import type { ContentRegistryClient } from '../registry/registry-client.js';
import type { InstalledIndexRegistry } from '../installed/index-registry.js';
import type { UpdateCheckResult } from '../install/orchestrator/types.js';
import { LOCAL_PROJECT_PREFIXES } from '../../constants/index.js';
import { primaryHash, selectDefault } from '../install/version-selection.js';
import { locateResourceFile, tryHashFile } from '../resources/resource-files.js';
import { logger } from '../../utils/logger.js';

export interface UpdateCheckerDeps {
  registry: ContentRegistryClient;
  indexes: InstalledIndexRegistry;
}

export function isLocalOnlyProject(projectId: string): boolean {
  return LOCAL_PROJECT_PREFIXES.some(prefix => projectId.startsWith(prefix));
}

interface InstalledFile {
  fileName: string;
  hash: string;
}

/**
 * Current file of a project: the tracked file name (or its disabled variant)
 * when the caller knows it, otherwise the index entry for the project id.
 */
async function findInstalledFile(
  deps: UpdateCheckerDeps,
  project: Project,
  installation: Installation,
  packageType: InstallablePackageType,
  signal?: AbortSignal
): Promise<InstalledFile | null> {
  if (project.fileName) {
    const located = await locateResourceFile(installation, packageType, project.fileName);
    if (located) {
      const hash = await tryHashFile(located.path);
      return hash ? { fileName: located.fileName, hash } : null;
    }
  }

  const index = await deps.indexes.load(installation, packageType, signal);
  const entry = index.findByProject(project.id).find(candidate => candidate.hash.length > 0);
  return entry ? { fileName: entry.fileName, hash: entry.hash } : null;
}

export async function checkForUpdate(
  deps: UpdateCheckerDeps,
  project: Project,
  installation: Installation,
  packageType: InstallablePackageType,
  signal?: AbortSignal
): Promise<UpdateCheckResult> {
  if (isLocalOnlyProject(project.id)) {
    return { hasUpdate: false };
  }

  const installed = await findInstalledFile(deps, project, installation, packageType, signal);
  if (!installed) {
    logger.debug(`No installed file found for ${project.id} in ${installation.name}`);
    return { hasUpdate: false };
  }

  const releases = await deps.registry.fetchCompatibleReleases(
    project.id,
    installation.gameVersion,
    installation.loader,
    packageType,
    signal
  );
  const latestRelease = selectDefault(releases);
  const latestHash = primaryHash(latestRelease);

  if (!latestRelease || !latestHash) {
    return { hasUpdate: false, currentHash: installed.hash, currentFileName: installed.fileName };
  }

  return {
    hasUpdate: latestHash !== installed.hash,
    currentHash: installed.hash,
    currentFileName: installed.fileName,
    latestHash,
    latestRelease
  };
}
