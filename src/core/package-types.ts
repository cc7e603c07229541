import { InstallablePackageType, PackageType } from '../types/index.js';
import { INSTALLABLE_PACKAGE_TYPES, PACKAGE_TYPES } from '../constants/index.js';
import { UnsupportedPackageTypeError, ValidationError } from '../utils/errors.js';

const ALIASES: Record<string, PackageType> = {
  mods: 'mod',
  datapacks: 'datapack',
  shaders: 'shader',
  shaderpack: 'shader',
  shaderpacks: 'shader',
  resourcepacks: 'resourcepack',
  'resource-pack': 'resourcepack',
  modpacks: 'modpack'
};

export function isPackageType(value: string): value is PackageType {
  return PACKAGE_TYPES.some(type => type === value);
}

export function isInstallablePackageType(value: PackageType): value is InstallablePackageType {
  return INSTALLABLE_PACKAGE_TYPES.some(type => type === value);
}

/**
 * Parse a user-supplied package type (case-insensitive, plural forms accepted)
 */
export function parsePackageType(input: string): PackageType {
  const normalized = input.trim().toLowerCase();
  if (isPackageType(normalized)) {
    return normalized;
  }
  const alias = ALIASES[normalized];
  if (alias) {
    return alias;
  }
  throw new ValidationError(
    `unknown package type '${input}' (expected one of ${PACKAGE_TYPES.join(', ')})`
  );
}

/**
 * Narrow to a package type that lives as single files in a resource directory.
 * Modpacks are rejected before any side effect happens.
 */
export function requireInstallable(packageType: string, operation: string): InstallablePackageType {
  const normalized = packageType.trim().toLowerCase();
  if (isPackageType(normalized) && isInstallablePackageType(normalized)) {
    return normalized;
  }
  throw new UnsupportedPackageTypeError(packageType, operation);
}
