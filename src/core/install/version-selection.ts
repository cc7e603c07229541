import type { ReleaseFile, VersionRelease } from '../../types/index.js';

/**
 * Default release choice: the first compatible release the registry returned.
 * This is a default, not a judgement of which release is best; users may
 * override it before downloading.
 */
export function selectDefault(releases: readonly VersionRelease[]): VersionRelease | undefined {
  return releases[0];
}

/**
 * The file to install from a release: the first file flagged primary,
 * otherwise the first file.
 */
export function selectPrimaryFile(release: VersionRelease): ReleaseFile | undefined {
  return release.files.find(file => file.primary) ?? release.files[0];
}

export function findRelease(releases: readonly VersionRelease[], releaseId: string): VersionRelease | undefined {
  return releases.find(release => release.id === releaseId || release.versionNumber === releaseId);
}

/** Hash of the file a release would install, if it has any file */
export function primaryHash(release: VersionRelease | undefined): string | undefined {
  return release ? selectPrimaryFile(release)?.hash : undefined;
}
