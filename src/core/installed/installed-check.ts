import type { Installation, InstallablePackageType, VersionRelease } from '../../types/index.js';
import type { InstalledContentIndex } from './installed-content-index.js';
import { primaryHash, selectDefault } from '../install/version-selection.js';

/**
 * Whether a project counts as installed in an index.
 *
 * Mods are matched by content hash so renamed files still count: the default
 * release's primary file for local installations, any compatible release's
 * primary file for remote ones. Every other package type is matched by
 * project id.
 */
export function isProjectInstalled(
  index: InstalledContentIndex,
  projectId: string,
  packageType: InstallablePackageType,
  releases: readonly VersionRelease[],
  installation: Installation
): boolean {
  if (packageType !== 'mod') {
    return index.containsProject(projectId);
  }

  if (installation.mode.kind === 'remote') {
    return releases.some(release => {
      const hash = primaryHash(release);
      return hash !== undefined && index.contains(hash);
    });
  }

  const hash = primaryHash(selectDefault(releases));
  return hash !== undefined && index.contains(hash);
}
