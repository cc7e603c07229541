/**
 * Display utilities for dependency resolution results.
 */

import pc from 'picocolors';
import type { DependencyResolutionResult } from './types.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/index.js';
import { selectDefault } from '../install/version-selection.js';

/**
 * Display the missing dependency list to the user
 */
export function displayMissingDependencies(result: DependencyResolutionResult, output?: OutputPort): void {
  const out = output ?? resolveOutput();
  const { root, missing, unresolved } = result;

  if (missing.length === 0 && unresolved.length === 0) {
    out.success(`All dependencies of ${root.title} are installed`);
    return;
  }

  out.info(`\n${root.title} (${root.id}) is missing:\n`);

  missing.forEach((item, index) => {
    const branch = index === missing.length - 1 && unresolved.length === 0 ? '└──' : '├──';
    const release = selectDefault(item.releases);
    const version = release
      ? pc.dim(`${release.versionNumber}${item.releases.length > 1 ? ` (+${item.releases.length - 1} more)` : ''}`)
      : pc.yellow('no version available');
    out.info(`${branch} ${item.detail.title} ${pc.dim(`[${item.detail.packageType}]`)} ${version}`);
  });

  unresolved.forEach((id, index) => {
    const branch = index === unresolved.length - 1 ? '└──' : '├──';
    out.info(`${branch} ${id} ${pc.red('not found in registry')}`);
  });

  out.info(`\nTotal: ${missing.length} missing\n`);
}
