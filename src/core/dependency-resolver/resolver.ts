/**
 * Dependency Resolver
 *
 * Computes the transitive set of declared dependencies of a project that are
 * missing from an installation. Depth-first in declaration order; the visited
 * set is seeded with the root so cycles terminate and a dependency shared by
 * several ancestors is resolved once (first visit wins).
 *
 * Resolution is a pure read: it downloads nothing and never mutates an
 * index (scanning one that was never scanned is a read).
 */

import type { Installation, InstallablePackageType, ProjectDetail, VersionRelease } from '../../types/index.js';
import type { ContentRegistryClient } from '../registry/registry-client.js';
import type { InstalledIndexRegistry } from '../installed/index-registry.js';
import type { DependencyResolutionResult, MissingDependency, ResolveOptions } from './types.js';
import { isCompatible } from '../compatibility/compatibility-filter.js';
import { isInstallablePackageType } from '../package-types.js';
import { isProjectInstalled } from '../installed/installed-check.js';
import { ResourceNotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface DependencyResolverDeps {
  registry: ContentRegistryClient;
  indexes: InstalledIndexRegistry;
}

export class DependencyResolver {
  constructor(private readonly deps: DependencyResolverDeps) {}

  async resolveMissingDependencies(
    rootProjectId: string,
    installation: Installation,
    options: ResolveOptions = {}
  ): Promise<DependencyResolutionResult> {
    if (!rootProjectId || rootProjectId.trim().length === 0) {
      throw new ValidationError('project id is required');
    }
    const { signal } = options;

    const root = options.root ?? await this.deps.registry.fetchProjectDetail(rootProjectId, signal);
    if (!root) {
      throw new ResourceNotFoundError(`project '${rootProjectId}'`);
    }

    const visited = new Set<string>([rootProjectId, root.id]);
    const missing: MissingDependency[] = [];
    const unresolved: string[] = [];

    const visit = async (dependencyIds: readonly string[]): Promise<void> => {
      for (const dependencyId of dependencyIds) {
        if (visited.has(dependencyId)) continue;
        visited.add(dependencyId);
        signal?.throwIfAborted();

        const detail = await this.deps.registry.fetchProjectDetail(dependencyId, signal);
        if (!detail) {
          logger.warn(`Dependency '${dependencyId}' of '${root.id}' could not be resolved`);
          unresolved.push(dependencyId);
          continue;
        }
        visited.add(detail.id);

        const packageType = detail.packageType;
        if (!isInstallablePackageType(packageType)) {
          logger.debug(`Skipping dependency ${detail.id}: ${packageType} is not placed as a file`);
          continue;
        }
        if (!isCompatible(detail, installation, packageType)) {
          logger.debug(`Skipping dependency ${detail.id}: not compatible with ${installation.name}`);
          continue;
        }

        const releases = await this.deps.registry.fetchCompatibleReleases(
          detail.id,
          installation.gameVersion,
          installation.loader,
          packageType,
          signal
        );

        if (await this.isSatisfied(detail, packageType, releases, installation, signal)) {
          logger.debug(`Dependency ${detail.id} already installed in ${installation.name}`);
          continue;
        }

        missing.push({ detail, releases });
        await visit(detail.dependencies);
      }
    };

    await visit(root.dependencies);

    logger.debug(`Resolved ${missing.length} missing dependenc${missing.length === 1 ? 'y' : 'ies'} for ${root.id}`, {
      installation: installation.name,
      missing: missing.map(item => item.detail.id),
      unresolved
    });

    return { root, missing, unresolved };
  }

  private async isSatisfied(
    detail: ProjectDetail,
    packageType: InstallablePackageType,
    releases: readonly VersionRelease[],
    installation: Installation,
    signal?: AbortSignal
  ): Promise<boolean> {
    const index = await this.deps.indexes.load(installation, packageType, signal);
    return isProjectInstalled(index, detail.id, packageType, releases, installation);
  }
}
