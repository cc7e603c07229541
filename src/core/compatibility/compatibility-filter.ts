/**
 * Compatibility Filter
 *
 * Decides whether a project can be placed in an installation, keyed by
 * package type. Resource packs and shaders ignore the installation's loader
 * on modded installations; mods and datapacks do not.
 */

import type { Installation, PackageType, ProjectDetail } from '../../types/index.js';
import { LOADERS } from '../../constants/index.js';

export function isCompatible(
  detail: Pick<ProjectDetail, 'gameVersions' | 'loaders'>,
  installation: Pick<Installation, 'gameVersion' | 'loader'>,
  packageType: PackageType
): boolean {
  const supportsVersion = detail.gameVersions.includes(installation.gameVersion);
  const supportedLoaders = new Set(detail.loaders.map(loader => loader.toLowerCase()));
  const localLoader = installation.loader.toLowerCase();
  const isVanilla = localLoader === LOADERS.VANILLA;

  if (packageType === 'datapack' && isVanilla) {
    return supportsVersion && supportedLoaders.has(LOADERS.DATAPACK);
  }
  if (packageType === 'shader' && !isVanilla) {
    return supportsVersion;
  }
  if (packageType === 'resourcepack') {
    return isVanilla
      ? supportsVersion && supportedLoaders.has(LOADERS.MINECRAFT)
      : supportsVersion;
  }
  return supportsVersion && supportedLoaders.has(localLoader);
}

/**
 * Loader tags to query compatible releases with.
 * An empty list means no loader filter.
 */
export function releaseLoaderFilter(packageType: PackageType, loader: string): string[] {
  switch (packageType) {
    case 'datapack':
      return [LOADERS.DATAPACK];
    case 'resourcepack':
      return [LOADERS.MINECRAFT];
    case 'shader':
      return [];
    default:
      return [loader.toLowerCase()];
  }
}

/**
 * Installations a project can be installed into. For mods, installations
 * that already hold the project are left out.
 */
export async function filterCompatibleInstallations(
  detail: ProjectDetail,
  installations: readonly Installation[],
  packageType: PackageType,
  isInstalled?: (installation: Installation) => Promise<boolean>
): Promise<Installation[]> {
  const compatible = installations.filter(installation => isCompatible(detail, installation, packageType));

  // Only mods trigger a directory scan here
  if (packageType !== 'mod' || !isInstalled) {
    return compatible;
  }

  const flags = await Promise.all(compatible.map(installation => isInstalled(installation)));
  return compatible.filter((_installation, index) => !flags[index]);
}
