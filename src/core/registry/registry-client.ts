import type { PackageType, ProjectDetail, VersionRelease } from '../../types/index.js';

/**
 * Read-only view of the content registry used by resolution and install.
 */
export interface ContentRegistryClient {
  /** Project metadata; null when the registry does not know the project */
  fetchProjectDetail(projectId: string, signal?: AbortSignal): Promise<ProjectDetail | null>;

  /**
   * Releases matching the installation's game version and loader, newest first.
   * An empty list means no compatible release exists.
   */
  fetchCompatibleReleases(
    projectId: string,
    gameVersion: string,
    loader: string,
    packageType: PackageType,
    signal?: AbortSignal
  ): Promise<VersionRelease[]>;

  /** Identify a file by its sha1; null when unknown to the registry */
  fetchReleaseByHash(hash: string, signal?: AbortSignal): Promise<VersionRelease | null>;
}
