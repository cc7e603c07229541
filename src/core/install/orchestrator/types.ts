import type { InstallPolicy, VersionRelease } from '../../../types/index.js';
import type { ContentRegistryClient } from '../../registry/registry-client.js';
import type { FileDownloader, LocalFileHandle } from '../../download/download-executor.js';
import type { InstalledIndexRegistry } from '../../installed/index-registry.js';
import type { HashMetadataCache } from '../../installed/hash-metadata-cache.js';
import type { InteractionPolicy } from '../../interaction-policy.js';
import type { OutputPort } from '../../ports/output.js';
import type { PromptPort } from '../../ports/prompt.js';
import type { DependencyResolution } from '../dependency-resolution.js';

/**
 * State of the current install action.
 *
 *   idle -> loading -> (auto-installing | manual-confirm) -> downloading -> (installed | failed)
 *
 * Cancellation always returns to idle.
 */
export type InstallActionState =
  | 'idle'
  | 'loading'
  | 'auto-installing'
  | 'manual-confirm'
  | 'downloading'
  | 'installed'
  | 'failed';

export type StateChangeListener = (state: InstallActionState, previous: InstallActionState) => void;

export interface OrchestratorSettings {
  /** Maximum concurrent dependency downloads */
  concurrency: number;
  /** Policy used when an install call does not name one */
  policy: InstallPolicy;
}

export interface InstallationOrchestratorDeps {
  registry: ContentRegistryClient;
  downloader: FileDownloader;
  indexes: InstalledIndexRegistry;
  metadata?: HashMetadataCache;
  settings?: Partial<OrchestratorSettings>;
  output?: OutputPort;
  prompt?: PromptPort;
  interactionPolicy?: InteractionPolicy;
  onProgress?: (fileName: string, receivedBytes: number, totalBytes?: number) => void;
}

export interface InstallOptions {
  policy?: InstallPolicy;
  /** Release id or version number of the root project */
  versionId?: string;
  signal?: AbortSignal;
}

export type InstallOutcome =
  | {
      status: 'installed';
      file: LocalFileHandle;
      dependencies: LocalFileHandle[];
      /** Missing dependencies deliberately not downloaded */
      skippedDependencies: string[];
    }
  | { status: 'awaiting-confirmation'; resolution: DependencyResolution }
  | { status: 'cancelled' };

export interface UpdateCheckResult {
  hasUpdate: boolean;
  currentHash?: string;
  /** Name of the installed file, in its current enabled or disabled form */
  currentFileName?: string;
  latestHash?: string;
  latestRelease?: VersionRelease;
}

export interface DeleteResult {
  fileName: string;
  hash?: string;
}
