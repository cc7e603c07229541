import type { Command } from 'commander';
import type { InstallPolicy, PackageType, Project } from '../types/index.js';
import { createCliExecutionContext } from './context.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { parsePackageType } from '../core/package-types.js';
import { INSTALL_POLICIES, isInstallPolicy } from '../core/config.js';
import { ResourceNotFoundError, ValidationError } from '../utils/errors.js';

/** Options shared by every command that targets an installation */
export interface TargetOptions {
  installation?: string;
  type?: string;
}

interface GlobalOptions {
  interactive?: boolean;
}

/**
 * Build the runtime for a command, honouring the global --interactive flag
 */
export async function openRuntime(command: Command): Promise<Runtime> {
  const { interactive } = command.optsWithGlobals<GlobalOptions>();
  const context = createCliExecutionContext(interactive ? { interactive } : {});
  return createRuntime(context);
}

export function packageTypeOption(type: string | undefined, fallback: PackageType = 'mod'): PackageType {
  return type ? parsePackageType(type) : fallback;
}

export function parsePolicy(value: string): InstallPolicy {
  const normalized = value.trim().toLowerCase();
  if (!isInstallPolicy(normalized)) {
    throw new ValidationError(`unknown policy '${value}' (expected one of ${INSTALL_POLICIES.join(', ')})`);
  }
  return normalized;
}

/**
 * Look a project up in the registry. An explicit --type overrides the
 * registry's package type.
 */
export async function lookupProject(runtime: Runtime, projectId: string, type?: string): Promise<Project> {
  const detail = await runtime.registry.fetchProjectDetail(projectId);
  if (!detail) {
    throw new ResourceNotFoundError(`project '${projectId}'`);
  }
  return {
    id: detail.id,
    title: detail.title,
    packageType: type ? parsePackageType(type) : detail.packageType
  };
}

/**
 * Abort signal tied to Ctrl+C for the duration of `work`
 */
export async function withInterrupt<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await work(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function shortHash(hash: string): string {
  return hash ? hash.slice(0, 12) : '-';
}
