import { dirname } from 'path';
import type { Installation, InstallablePackageType, Project, VersionRelease } from '../../../types/index.js';
import type { LocalFileHandle } from '../../download/download-executor.js';
import type { OutputPort } from '../../ports/output.js';
import type { PromptPort } from '../../ports/prompt.js';
import type {
  DeleteResult,
  InstallActionState,
  InstallationOrchestratorDeps,
  InstallOptions,
  InstallOutcome,
  OrchestratorSettings,
  StateChangeListener,
  UpdateCheckResult
} from './types.js';
import { PromptTier } from '../../interaction-policy.js';
import { resolveOutput, resolvePrompt } from '../../ports/index.js';
import { ResolutionSession } from '../../registry/resolution-session.js';
import { DependencyResolver } from '../../dependency-resolver/resolver.js';
import { DependencyResolution } from '../dependency-resolution.js';
import { findRelease, selectDefault, selectPrimaryFile } from '../version-selection.js';
import { getResourceDirectory } from '../../directory.js';
import { isInstallablePackageType, requireInstallable } from '../../package-types.js';
import { isProjectInstalled } from '../../installed/installed-check.js';
import { isDisabledName, toggleResourceFile } from '../../resources/disable-toggle.js';
import { deleteResourceFile, removeFileVariants } from '../../resources/resource-files.js';
import { checkForUpdate } from '../../update/update-checker.js';
import { runWithConcurrency } from '../../../utils/concurrency-pool.js';
import { DEFAULTS } from '../../../constants/index.js';
import {
  DependencyBatchError,
  ResourceNotFoundError,
  ValidationError,
  describeError,
  isAbortError,
  type BatchItemFailure
} from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

const DEFAULT_SETTINGS: OrchestratorSettings = {
  concurrency: DEFAULTS.CONCURRENCY,
  policy: 'manual'
};

/** States from which a new install may be submitted */
const SETTLED_STATES: ReadonlySet<InstallActionState> = new Set(['idle', 'installed', 'failed']);

const CANCELLED: InstallOutcome = { status: 'cancelled' };

/**
 * InstallationOrchestrator drives one install action at a time.
 *
 * Responsibilities:
 * - Validate input and reject duplicate submissions
 * - Pick the root release and resolve missing dependencies
 * - Apply the dependency policy (auto, manual, main-only)
 * - Download dependencies with bounded concurrency, then the root
 * - Record every placed file in the installed index and the hash cache
 * - Update, toggle and delete already-installed resources
 */
export class InstallationOrchestrator {
  private actionState: InstallActionState = 'idle';
  private readonly listeners = new Set<StateChangeListener>();
  private readonly settings: OrchestratorSettings;
  private readonly output: OutputPort;
  private readonly prompt: PromptPort;

  constructor(private readonly deps: InstallationOrchestratorDeps) {
    this.settings = {
      concurrency: Math.max(1, deps.settings?.concurrency ?? DEFAULT_SETTINGS.concurrency),
      policy: deps.settings?.policy ?? DEFAULT_SETTINGS.policy
    };
    this.output = resolveOutput(deps);
    this.prompt = resolvePrompt(deps);
  }

  get state(): InstallActionState {
    return this.actionState;
  }

  /** Subscribe to action state changes; returns an unsubscribe function */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Install a project into an installation.
   *
   * With the manual policy and no prompt available the resolution is
   * returned for the caller to drive through downloadAllAndContinue,
   * downloadMainOnly, retryDownloadDependency or cancel.
   */
  async install(project: Project, installation: Installation, options: InstallOptions = {}): Promise<InstallOutcome> {
    if (!SETTLED_STATES.has(this.actionState)) {
      throw new ValidationError(`an install is already in progress (state: ${this.actionState})`);
    }
    if (!project.id || project.id.trim().length === 0) {
      throw new ValidationError('project id is required');
    }
    if (!installation.directory) {
      throw new ValidationError(`installation '${installation.name}' has no directory`);
    }
    const packageType = requireInstallable(project.packageType, 'install');
    const policy = options.policy ?? this.settings.policy;
    const { signal } = options;

    let resolution: DependencyResolution | undefined;
    this.setState('loading');
    try {
      // Step 1: root release
      const session = new ResolutionSession(this.deps.registry);
      const rootReleases = await session.fetchCompatibleReleases(
        project.id,
        installation.gameVersion,
        installation.loader,
        packageType,
        signal
      );
      const rootRelease = this.pickRootRelease(project.id, rootReleases, options.versionId);

      if (policy === 'main-only') {
        this.setState('downloading');
        const file = await this.placeRelease(project.id, project.title, packageType, rootRelease, installation, signal);
        this.setState('installed');
        return { status: 'installed', file, dependencies: [], skippedDependencies: [] };
      }

      // Step 2: missing dependencies
      const root = await session.fetchProjectDetail(project.id, signal);
      if (!root) {
        throw new ResourceNotFoundError(`project '${project.id}'`);
      }
      const resolver = new DependencyResolver({ registry: session, indexes: this.deps.indexes });
      const result = await resolver.resolveMissingDependencies(project.id, installation, {
        root,
        ...(signal ? { signal } : {})
      });

      resolution = new DependencyResolution({
        root,
        rootPackageType: packageType,
        rootReleases,
        installation,
        missing: result.missing,
        unresolved: result.unresolved
      });
      resolution.rootRelease = rootRelease;
      if (signal) resolution.followSignal(signal);

      // Step 3: apply the policy
      if (resolution.missing.length === 0) {
        this.setState('downloading');
        return await this.installRoot(resolution, [], []);
      }

      if (policy === 'auto') {
        this.setState('auto-installing');
        resolution.overallState = 'downloading';
        const dependencies = await this.downloadDependencies(resolution, true);
        this.setState('downloading');
        return await this.installRoot(resolution, dependencies, []);
      }

      this.setState('manual-confirm');
      if (this.deps.interactionPolicy?.canPrompt(PromptTier.Confirmation)) {
        return await this.confirmInteractively(resolution);
      }
      return { status: 'awaiting-confirmation', resolution };
    } catch (error) {
      // A resolution that failed inside install is never handed out
      resolution?.releaseSignal();
      return this.settleFailure(error, resolution);
    }
  }

  /**
   * Resolve the missing dependencies of a project into a resolution the
   * caller drives. Null when nothing is missing.
   */
  async prepareManualDependencies(
    project: Project,
    installation: Installation,
    signal?: AbortSignal
  ): Promise<DependencyResolution | null> {
    const packageType = requireInstallable(project.packageType, 'install');
    const session = new ResolutionSession(this.deps.registry);
    const resolver = new DependencyResolver({ registry: session, indexes: this.deps.indexes });
    const result = await resolver.resolveMissingDependencies(project.id, installation, signal ? { signal } : {});
    if (result.missing.length === 0) {
      return null;
    }

    const rootReleases = await session.fetchCompatibleReleases(
      project.id,
      installation.gameVersion,
      installation.loader,
      packageType,
      signal
    );
    return new DependencyResolution({
      root: result.root,
      rootPackageType: packageType,
      rootReleases,
      installation,
      missing: result.missing,
      unresolved: result.unresolved
    });
  }

  /**
   * Download every dependency that is not yet downloaded, wait for all of
   * them, then install the root. A failed batch leaves the resolution
   * failed; calling again retries only what did not succeed.
   */
  async downloadAllAndContinue(resolution: DependencyResolution): Promise<InstallOutcome> {
    this.assertAcceptsBatch(resolution);
    resolution.renewSignal();
    resolution.overallState = resolution.overallState === 'failed' ? 'retrying' : 'downloading';
    this.setState('downloading');

    try {
      const dependencies = await this.downloadDependencies(resolution, false);
      return await this.installRoot(resolution, dependencies, []);
    } catch (error) {
      if (!isAbortError(error)) {
        resolution.overallState = 'failed';
      }
      return this.settleFailure(error, resolution);
    }
  }

  /** Skip the missing dependencies and install the root only */
  async downloadMainOnly(resolution: DependencyResolution): Promise<InstallOutcome> {
    this.assertAcceptsBatch(resolution);
    resolution.renewSignal();
    resolution.overallState = 'downloading';
    this.setState('downloading');

    try {
      return await this.installRoot(resolution, [], resolution.pendingIds);
    } catch (error) {
      if (!isAbortError(error)) {
        resolution.overallState = 'failed';
      }
      return this.settleFailure(error, resolution);
    }
  }

  /** Download one dependency again with its currently selected release */
  async retryDownloadDependency(resolution: DependencyResolution, dependencyId: string): Promise<LocalFileHandle> {
    if (!resolution.has(dependencyId)) {
      throw new ValidationError(`'${dependencyId}' is not a missing dependency of ${resolution.root.id}`);
    }
    this.assertAcceptsBatch(resolution);
    resolution.renewSignal();
    resolution.overallState = 'retrying';

    try {
      return await this.downloadDependency(resolution, dependencyId);
    } finally {
      if (!resolution.signal.aborted) {
        const complete = resolution.allDependenciesDownloaded;
        resolution.overallState = complete ? 'idle' : 'failed';
        this.setState(complete ? 'manual-confirm' : 'failed');
      }
    }
  }

  /** Abort in-flight downloads; files already placed stay recorded */
  cancel(resolution: DependencyResolution): void {
    resolution.cancel();
    this.setState('idle');
    logger.info(`Cancelled install of ${resolution.root.id}`);
  }

  async checkForUpdate(project: Project, installation: Installation, signal?: AbortSignal): Promise<UpdateCheckResult> {
    const packageType = requireInstallable(project.packageType, 'check for updates');
    return checkForUpdate(this.deps, project, installation, packageType, signal);
  }

  /**
   * Replace the installed file with the latest compatible release and check
   * again. A disabled file stays disabled.
   */
  async performUpdate(project: Project, installation: Installation, signal?: AbortSignal): Promise<UpdateCheckResult> {
    const packageType = requireInstallable(project.packageType, 'update');
    const check = await checkForUpdate(this.deps, project, installation, packageType, signal);
    if (!check.hasUpdate || !check.latestRelease) {
      return check;
    }

    const index = this.deps.indexes.get(installation, packageType);
    const current = check.currentFileName;
    const wasDisabled = current !== undefined && isDisabledName(current);

    if (current) {
      await removeFileVariants(getResourceDirectory(installation, packageType, current), current);
      index.removeFile(current);
    }
    if (check.currentHash) {
      index.remove(check.currentHash);
    }

    const handle = await this.placeRelease(
      project.id,
      project.title,
      packageType,
      check.latestRelease,
      installation,
      signal
    );

    let fileName = handle.fileName;
    if (wasDisabled) {
      const toggled = await toggleResourceFile(dirname(handle.path), handle.fileName);
      index.rename(toggled.previousName, toggled.fileName);
      fileName = toggled.fileName;
    }

    logger.info(`Updated ${project.id} in ${installation.name} to ${check.latestRelease.versionNumber}`);
    return checkForUpdate(this.deps, { ...project, fileName }, installation, packageType, signal);
  }

  /** Toggle the disabled state of an installed file; returns the new name */
  async toggleDisabled(project: Project, installation: Installation): Promise<string> {
    const packageType = requireInstallable(project.packageType, 'toggle');
    if (!project.fileName) {
      throw new ValidationError(`no file is recorded for '${project.id}'`);
    }

    const directory = getResourceDirectory(installation, packageType, project.fileName);
    const result = await toggleResourceFile(directory, project.fileName);
    this.deps.indexes.get(installation, packageType).rename(result.previousName, result.fileName);
    return result.fileName;
  }

  async deleteResource(project: Project, installation: Installation): Promise<DeleteResult> {
    const packageType = requireInstallable(project.packageType, 'delete');
    const result = await deleteResourceFile(installation, packageType, project.fileName);

    const index = this.deps.indexes.get(installation, packageType);
    index.removeFile(result.fileName);
    if (result.hash) {
      index.remove(result.hash);
    }
    return result;
  }

  /** Whether the install action for a project should show as done */
  async isInstalled(project: Project, installation: Installation, signal?: AbortSignal): Promise<boolean> {
    const packageType = project.packageType;
    if (!isInstallablePackageType(packageType)) {
      return false;
    }

    const index = await this.deps.indexes.load(installation, packageType, signal);
    const releases = packageType === 'mod'
      ? await this.deps.registry.fetchCompatibleReleases(
          project.id,
          installation.gameVersion,
          installation.loader,
          packageType,
          signal
        )
      : [];
    return isProjectInstalled(index, project.id, packageType, releases, installation);
  }

  private assertAcceptsBatch(resolution: DependencyResolution): void {
    if (resolution.isBusy || this.actionState === 'downloading' || this.actionState === 'auto-installing') {
      throw new ValidationError(`downloads for ${resolution.root.id} are already running`);
    }
  }

  private pickRootRelease(projectId: string, releases: VersionRelease[], versionId?: string): VersionRelease {
    if (versionId) {
      const requested = findRelease(releases, versionId);
      if (!requested) {
        throw new ResourceNotFoundError(`version '${versionId}' of '${projectId}'`);
      }
      return requested;
    }

    const release = selectDefault(releases);
    if (!release) {
      throw new ResourceNotFoundError(`compatible release of '${projectId}'`);
    }
    return release;
  }

  private async confirmInteractively(resolution: DependencyResolution): Promise<InstallOutcome> {
    if (this.deps.interactionPolicy?.canPrompt(PromptTier.VersionSelection)) {
      for (const detail of resolution.missing) {
        const releases = resolution.releases.get(detail.id) ?? [];
        if (releases.length < 2) continue;
        const choice = await this.prompt.select(
          `Release of ${detail.title}`,
          releases.map(release => ({ label: release.versionNumber, value: release.id, hint: release.name })),
          resolution.selected.get(detail.id)?.id
        );
        resolution.selectRelease(detail.id, choice);
      }
    }

    const lines = resolution.missing.map(detail => {
      const release = resolution.selected.get(detail.id);
      return `${detail.title} (${detail.id})  ${release ? release.versionNumber : 'no compatible release'}`;
    });
    this.output.note(lines.join('\n'), `${resolution.root.title} needs ${lines.length} more`);

    const action = await this.prompt.select(
      'Install dependencies?',
      [
        { label: 'Download all and continue', value: 'all' },
        { label: `Download ${resolution.root.title} only`, value: 'main' },
        { label: 'Cancel', value: 'cancel' }
      ],
      'all'
    );

    if (action === 'all') {
      return this.downloadAllAndContinue(resolution);
    }
    if (action === 'main') {
      return this.downloadMainOnly(resolution);
    }
    this.cancel(resolution);
    return CANCELLED;
  }

  /**
   * Download the pending dependencies of a resolution. With failFast no new
   * item starts after the first failure.
   */
  private async downloadDependencies(resolution: DependencyResolution, failFast: boolean): Promise<LocalFileHandle[]> {
    const pending = resolution.pendingIds;
    const { results, hadFailure } = await runWithConcurrency(
      pending.map(id => () => this.downloadDependency(resolution, id)),
      this.settings.concurrency,
      { failFast }
    );
    resolution.signal.throwIfAborted();

    const handles: LocalFileHandle[] = [];
    const failures: BatchItemFailure[] = [];
    const succeeded: string[] = [];
    results.forEach((result, position) => {
      const id = pending[position];
      if (id === undefined) return;
      if (result.status === 'fulfilled') {
        handles.push(result.value);
        succeeded.push(id);
      } else if (result.status === 'rejected') {
        failures.push({ id, error: describeError(result.error) });
      }
    });

    if (hadFailure) {
      throw new DependencyBatchError(failures, succeeded);
    }
    return handles;
  }

  private async downloadDependency(resolution: DependencyResolution, dependencyId: string): Promise<LocalFileHandle> {
    const detail = resolution.getDetail(dependencyId);
    if (!detail) {
      throw new ValidationError(`'${dependencyId}' is not a missing dependency of ${resolution.root.id}`);
    }

    resolution.setItemState(dependencyId, 'downloading');
    try {
      const release = resolution.selected.get(dependencyId);
      if (!release) {
        throw new ResourceNotFoundError(`compatible release of '${dependencyId}'`);
      }
      const packageType = requireInstallable(detail.packageType, 'install');
      const handle = await this.placeRelease(
        detail.id,
        detail.title,
        packageType,
        release,
        resolution.installation,
        resolution.signal
      );
      resolution.setItemState(dependencyId, 'success');
      return handle;
    } catch (error) {
      if (isAbortError(error)) {
        resolution.setItemState(dependencyId, 'idle');
      } else {
        resolution.setItemState(dependencyId, 'failed', describeError(error));
      }
      throw error;
    }
  }

  private async installRoot(
    resolution: DependencyResolution,
    dependencies: LocalFileHandle[],
    skippedDependencies: string[]
  ): Promise<InstallOutcome> {
    const release = resolution.rootRelease;
    if (!release) {
      throw new ResourceNotFoundError(`compatible release of '${resolution.root.id}'`);
    }

    const file = await this.placeRelease(
      resolution.root.id,
      resolution.root.title,
      resolution.rootPackageType,
      release,
      resolution.installation,
      resolution.signal
    );
    resolution.overallState = 'completed';
    resolution.releaseSignal();
    this.setState('installed');
    return { status: 'installed', file, dependencies, skippedDependencies };
  }

  /** Download the primary file of a release and record it */
  private async placeRelease(
    projectId: string,
    title: string,
    packageType: InstallablePackageType,
    release: VersionRelease,
    installation: Installation,
    signal?: AbortSignal
  ): Promise<LocalFileHandle> {
    const file = selectPrimaryFile(release);
    if (!file) {
      throw new ResourceNotFoundError(`file of release '${release.versionNumber}' of '${projectId}'`);
    }

    const { onProgress } = this.deps;
    const handle = await this.deps.downloader.downloadFile({
      url: file.url,
      expectedHash: file.hash,
      fileName: file.fileName,
      destinationDir: getResourceDirectory(installation, packageType, file.fileName),
      ...(signal ? { signal } : {}),
      ...(onProgress
        ? { onProgress: (received: number, total?: number) => onProgress(file.fileName, received, total) }
        : {})
    });

    await this.record(handle, projectId, title, packageType, installation);
    this.output.success(`${handle.reused ? 'Already present' : 'Installed'}: ${handle.fileName}`);
    return handle;
  }

  private async record(
    handle: LocalFileHandle,
    projectId: string,
    title: string,
    packageType: InstallablePackageType,
    installation: Installation
  ): Promise<void> {
    this.deps.indexes.get(installation, packageType).insert(handle.hash, projectId, handle.fileName);

    const { metadata } = this.deps;
    if (!metadata) return;
    await metadata.set(handle.hash, { projectId, title, packageType });
    try {
      await metadata.flush();
    } catch (error) {
      logger.warn(`Could not save hash metadata for ${handle.fileName}`, { error });
    }
  }

  /** Cancellation settles to idle and reports cancelled; anything else fails the action */
  private settleFailure(error: unknown, resolution?: DependencyResolution): InstallOutcome {
    if (isAbortError(error)) {
      if (resolution) resolution.overallState = 'cancelled';
      this.setState('idle');
      return CANCELLED;
    }
    this.setState('failed');
    throw error;
  }

  private setState(next: InstallActionState): void {
    const previous = this.actionState;
    if (previous === next) return;
    this.actionState = next;
    logger.debug(`Install action: ${previous} -> ${next}`);
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
