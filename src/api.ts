/**
 * Library surface of craftpkg, for callers that drive installs without the CLI.
 */

export type {
  CraftPkgConfig,
  Installation,
  InstallationMode,
  InstallablePackageType,
  InstalledEntry,
  InstallPolicy,
  PackageType,
  Project,
  ProjectDetail,
  ReleaseFile,
  VersionRelease
} from './types/index.js';
export { CraftPkgError, ErrorCodes } from './types/index.js';
export type { ExecutionContext } from './types/execution-context.js';

export { InstallationOrchestrator } from './core/install/orchestrator/orchestrator.js';
export type {
  DeleteResult,
  InstallActionState,
  InstallationOrchestratorDeps,
  InstallOptions,
  InstallOutcome,
  OrchestratorSettings,
  UpdateCheckResult
} from './core/install/orchestrator/types.js';
export { DependencyResolution, type ResolutionState } from './core/install/dependency-resolution.js';
export { selectDefault, selectPrimaryFile, findRelease } from './core/install/version-selection.js';

export { DependencyResolver } from './core/dependency-resolver/resolver.js';
export type { DependencyResolutionResult, MissingDependency } from './core/dependency-resolver/types.js';

export {
  isCompatible,
  filterCompatibleInstallations,
  releaseLoaderFilter
} from './core/compatibility/compatibility-filter.js';

export { InstalledContentIndex } from './core/installed/installed-content-index.js';
export { InstalledIndexRegistry } from './core/installed/index-registry.js';
export { scanInstalled } from './core/installed/scanner.js';
export { createHashMetadataCache, type HashMetadataCache } from './core/installed/hash-metadata-cache.js';

export { DownloadExecutor, type FileDownloader, type LocalFileHandle } from './core/download/download-executor.js';

export type { ContentRegistryClient } from './core/registry/registry-client.js';
export { ModrinthRegistryClient } from './core/registry/modrinth-client.js';
export { ResolutionSession } from './core/registry/resolution-session.js';

export {
  isDisabledName,
  toDisabledName,
  toEnabledName,
  toggleName
} from './core/resources/disable-toggle.js';

export { ConfigManager } from './core/config.js';
export { InstallationRepository } from './core/installations.js';
export { silentOutput, consoleOutput, type OutputPort, type PromptPort } from './core/ports/index.js';
export { createInteractionPolicy, PromptTier, type InteractionPolicy } from './core/interaction-policy.js';
export { createRuntime, type Runtime } from './runtime.js';
