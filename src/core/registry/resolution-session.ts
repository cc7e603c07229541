import type { PackageType, ProjectDetail, VersionRelease } from '../../types/index.js';
import type { ContentRegistryClient } from './registry-client.js';
import { releaseLoaderFilter } from '../compatibility/compatibility-filter.js';

/**
 * Memoising view of a registry client for one user action.
 *
 * Each project detail and each (project, game version, loader filter) release
 * query hits the underlying client at most once, including concurrent callers
 * which share the in-flight request. Failed lookups are not remembered so a
 * retry within the same action goes back to the registry.
 */
export class ResolutionSession implements ContentRegistryClient {
  private readonly details = new Map<string, Promise<ProjectDetail | null>>();
  private readonly releases = new Map<string, Promise<VersionRelease[]>>();
  private readonly byHash = new Map<string, Promise<VersionRelease | null>>();

  constructor(private readonly client: ContentRegistryClient) {}

  fetchProjectDetail(projectId: string, signal?: AbortSignal): Promise<ProjectDetail | null> {
    return this.memo(this.details, projectId, () => this.client.fetchProjectDetail(projectId, signal));
  }

  fetchCompatibleReleases(
    projectId: string,
    gameVersion: string,
    loader: string,
    packageType: PackageType,
    signal?: AbortSignal
  ): Promise<VersionRelease[]> {
    const key = [projectId, gameVersion, releaseLoaderFilter(packageType, loader).join(',')].join('|');
    return this.memo(this.releases, key, () =>
      this.client.fetchCompatibleReleases(projectId, gameVersion, loader, packageType, signal)
    );
  }

  fetchReleaseByHash(hash: string, signal?: AbortSignal): Promise<VersionRelease | null> {
    return this.memo(this.byHash, hash, () => this.client.fetchReleaseByHash(hash, signal));
  }

  /** Drop everything remembered so far */
  clear(): void {
    this.details.clear();
    this.releases.clear();
    this.byHash.clear();
  }

  private memo<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }
    const pending = load();
    cache.set(key, pending);
    void pending.catch(() => {
      if (cache.get(key) === pending) {
        cache.delete(key);
      }
    });
    return pending;
  }
}
