/**
 * Dependency Resolution
 *
 * Transient state of one manual install: the missing dependencies, their
 * candidate releases, the user's current selection and per-item download
 * state. Lives as long as the confirmation step and is never persisted.
 */

import type {
  DependencyDownloadState,
  Installation,
  InstallablePackageType,
  ProjectDetail,
  VersionRelease
} from '../../types/index.js';
import type { MissingDependency } from '../dependency-resolver/types.js';
import { findRelease, selectDefault } from './version-selection.js';
import { ResourceNotFoundError, ValidationError } from '../../utils/errors.js';

export type ResolutionState = 'idle' | 'downloading' | 'failed' | 'retrying' | 'completed' | 'cancelled';

export interface DependencyResolutionInit {
  root: ProjectDetail;
  rootPackageType: InstallablePackageType;
  rootReleases: VersionRelease[];
  installation: Installation;
  missing: MissingDependency[];
  unresolved?: string[];
}

export class DependencyResolution {
  readonly root: ProjectDetail;
  readonly rootPackageType: InstallablePackageType;
  readonly rootReleases: VersionRelease[];
  readonly installation: Installation;
  /** Missing dependencies in resolution order */
  readonly missing: ProjectDetail[];
  readonly releases = new Map<string, VersionRelease[]>();
  readonly selected = new Map<string, VersionRelease>();
  readonly states = new Map<string, DependencyDownloadState>();
  readonly errors = new Map<string, string>();
  readonly unresolved: string[];
  rootRelease: VersionRelease | undefined;
  overallState: ResolutionState = 'idle';
  private controller = new AbortController();
  private detachCaller: (() => void) | null = null;

  constructor(init: DependencyResolutionInit) {
    this.root = init.root;
    this.rootPackageType = init.rootPackageType;
    this.rootReleases = init.rootReleases;
    this.rootRelease = selectDefault(init.rootReleases);
    this.installation = init.installation;
    this.unresolved = [...(init.unresolved ?? [])];
    this.missing = init.missing.map(item => item.detail);

    for (const { detail, releases } of init.missing) {
      this.releases.set(detail.id, releases);
      const preselected = selectDefault(releases);
      if (preselected) {
        this.selected.set(detail.id, preselected);
      }
      this.states.set(detail.id, 'idle');
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get allDependenciesDownloaded(): boolean {
    return this.missing.every(detail => this.states.get(detail.id) === 'success');
  }

  /** Ids of dependencies that still need a download, in resolution order */
  get pendingIds(): string[] {
    return this.missing
      .filter(detail => this.states.get(detail.id) !== 'success')
      .map(detail => detail.id);
  }

  get failedIds(): string[] {
    return this.missing
      .filter(detail => this.states.get(detail.id) === 'failed')
      .map(detail => detail.id);
  }

  has(dependencyId: string): boolean {
    return this.states.has(dependencyId);
  }

  getDetail(dependencyId: string): ProjectDetail | undefined {
    return this.missing.find(detail => detail.id === dependencyId);
  }

  /**
   * Override the release to install for a dependency (or for the root project)
   */
  selectRelease(projectId: string, releaseId: string): VersionRelease {
    const isRoot = projectId === this.root.id;
    if (!isRoot && !this.has(projectId)) {
      throw new ValidationError(`'${projectId}' is not a missing dependency of ${this.root.id}`);
    }

    const candidates = isRoot ? this.rootReleases : this.releases.get(projectId) ?? [];
    const release = findRelease(candidates, releaseId);
    if (!release) {
      throw new ResourceNotFoundError(`version '${releaseId}' of '${projectId}'`);
    }

    if (isRoot) {
      this.rootRelease = release;
    } else {
      this.selected.set(projectId, release);
    }
    return release;
  }

  setItemState(dependencyId: string, state: DependencyDownloadState, error?: string): void {
    this.states.set(dependencyId, state);
    if (state === 'failed' && error) {
      this.errors.set(dependencyId, error);
    } else {
      this.errors.delete(dependencyId);
    }
  }

  /** Whether a batch or a single retry is running */
  get isBusy(): boolean {
    return this.overallState === 'downloading' || this.overallState === 'retrying';
  }

  /** Cancel this resolution when the caller's signal aborts, until released */
  followSignal(signal: AbortSignal): void {
    this.releaseSignal();
    const onAbort = (): void => this.cancel();
    signal.addEventListener('abort', onAbort, { once: true });
    this.detachCaller = () => signal.removeEventListener('abort', onAbort);
  }

  releaseSignal(): void {
    this.detachCaller?.();
    this.detachCaller = null;
  }

  /** Abort in-flight downloads. Completed items keep their state. */
  cancel(): void {
    this.releaseSignal();
    this.controller.abort();
    this.overallState = 'cancelled';
  }

  /** A cancelled resolution gets a fresh signal when the user tries again */
  renewSignal(): void {
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
  }
}
