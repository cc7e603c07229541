/**
 * Wiring of the long-lived services used by one CLI process.
 *
 * Everything is constructed here once and passed down explicitly; nothing in
 * core reaches for a process-global instance.
 */

import type { CraftPkgConfig, CraftPkgDirectories } from './types/index.js';
import type { ExecutionContext } from './types/execution-context.js';
import { ensureCraftPkgDirectories, getCraftPkgDirectories } from './core/directory.js';
import { ConfigManager } from './core/config.js';
import { InstallationRepository } from './core/installations.js';
import { ModrinthRegistryClient } from './core/registry/modrinth-client.js';
import { DownloadExecutor } from './core/download/download-executor.js';
import { createHashMetadataCache, type HashMetadataCache } from './core/installed/hash-metadata-cache.js';
import { InstalledIndexRegistry } from './core/installed/index-registry.js';
import { InstallationOrchestrator } from './core/install/orchestrator/orchestrator.js';
import { DependencyResolver } from './core/dependency-resolver/resolver.js';
import { resolveOutput } from './core/ports/index.js';

export interface Runtime {
  directories: CraftPkgDirectories;
  config: CraftPkgConfig;
  installations: InstallationRepository;
  registry: ModrinthRegistryClient;
  downloader: DownloadExecutor;
  metadata: HashMetadataCache;
  indexes: InstalledIndexRegistry;
  resolver: DependencyResolver;
  orchestrator: InstallationOrchestrator;
  context: ExecutionContext;
}

export async function createRuntime(
  context: ExecutionContext,
  env: NodeJS.ProcessEnv = process.env
): Promise<Runtime> {
  const directories = await ensureCraftPkgDirectories(getCraftPkgDirectories(env));
  const config = await new ConfigManager(directories).load();
  const installations = new InstallationRepository(directories);

  const registry = new ModrinthRegistryClient({
    baseUrl: config.registry.baseUrl,
    userAgent: config.registry.userAgent
  });
  const downloader = new DownloadExecutor({
    userAgent: config.registry.userAgent,
    retries: config.downloads.retries
  });
  const metadata = createHashMetadataCache(directories.cache);
  const indexes = new InstalledIndexRegistry({ pageSize: config.scan.pageSize, metadata, registry });

  const orchestrator = new InstallationOrchestrator({
    registry,
    downloader,
    indexes,
    metadata,
    settings: {
      concurrency: config.downloads.concurrency,
      policy: config.dependencies.policy
    },
    output: resolveOutput(context),
    ...(context.prompt ? { prompt: context.prompt } : {}),
    ...(context.interactionPolicy ? { interactionPolicy: context.interactionPolicy } : {})
  });

  return {
    directories,
    config,
    installations,
    registry,
    downloader,
    metadata,
    indexes,
    resolver: new DependencyResolver({ registry, indexes }),
    orchestrator,
    context
  };
}
