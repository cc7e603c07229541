import type { ProjectDetail, VersionRelease } from '../../types/index.js';

/**
 * A declared dependency that is not present in the target installation,
 * with the releases that could satisfy it (newest first, possibly empty).
 */
export interface MissingDependency {
  detail: ProjectDetail;
  releases: VersionRelease[];
}

export interface DependencyResolutionResult {
  root: ProjectDetail;
  /** Missing dependencies in first-visit order */
  missing: MissingDependency[];
  /** Declared dependency ids the registry could not resolve */
  unresolved: string[];
}

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Already-fetched root detail, to avoid a second lookup */
  root?: ProjectDetail;
}
